/**
 * 测试工具函数
 *
 * 提供临时文件/目录管理、项目目录搭建等测试辅助功能
 */

import { access, mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { dirname, join } from 'path'

/** 创建临时测试目录 */
export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'specloom-test-'))
}

/** 创建临时文件 */
export async function createTempFile(dir: string, name: string, content: string): Promise<string> {
  const filepath = join(dir, name)
  // 确保父目录存在
  await mkdir(dirname(filepath), { recursive: true })
  await writeFile(filepath, content, 'utf-8')
  return filepath
}

/** 按相对路径批量写入文件，如 `{ 'specloom/specs/auth/spec.md': '...' }` */
export async function createTempTree(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    await createTempFile(dir, name, content)
  }
}

/** 清理临时目录 */
export async function cleanupTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}

/** 检查路径是否存在 */
export async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}
