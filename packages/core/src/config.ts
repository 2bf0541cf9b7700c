import { readFile, writeFile } from 'fs/promises'
import { dirname, join, resolve } from 'path'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { z } from 'zod'

/** 配置文件名 */
export const CONFIG_FILE = 'specloom.yaml'

/**
 * specloom 配置 Schema
 *
 * 存储在项目根目录的 specloom.yaml 中
 */
export const SpecloomConfigSchema = z.object({
  /** specs/ 与 changes/ 所在目录，相对于项目根目录 */
  root_dir: z.string().min(1).default('specloom'),

  /** 校验配置 */
  validation: z
    .object({
      /** 将警告视为错误 */
      strict: z.boolean().default(false),
    })
    .default({}),

  /** 归档配置 */
  archive: z
    .object({
      /** 归档目录名是否带 YYYY-MM-DD- 前缀 */
      date_prefix: z.boolean().default(true),
    })
    .default({}),
})

export type SpecloomConfig = z.infer<typeof SpecloomConfigSchema>

/** 默认配置（静态，用于测试和类型） */
export const DEFAULT_CONFIG: SpecloomConfig = {
  root_dir: 'specloom',
  validation: {
    strict: false,
  },
  archive: {
    date_prefix: true,
  },
}

/** 已加载的配置及其所属的项目根目录 */
export interface LoadedConfig {
  projectDir: string
  /** 配置文件路径，未找到时为 null */
  configPath: string | null
  config: SpecloomConfig
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
    throw err
  }
}

/**
 * 解析配置文件内容
 *
 * 格式错误时返回默认配置并打印警告。
 */
export function parseConfig(content: string): SpecloomConfig {
  try {
    const parsed: unknown = parseYaml(content) ?? {}
    const result = SpecloomConfigSchema.safeParse(parsed)

    if (result.success) {
      return result.data
    }

    console.warn('Invalid config format, using defaults:', result.error.message)
    return DEFAULT_CONFIG
  } catch (err) {
    console.warn('Failed to parse config, using defaults:', err)
    return DEFAULT_CONFIG
  }
}

/**
 * 从 startDir 向上查找 specloom.yaml
 *
 * 找到时以其所在目录为项目根目录；找不到时使用默认配置，项目根目录为 startDir。
 */
export async function loadConfig(startDir: string): Promise<LoadedConfig> {
  const start = resolve(startDir)
  let dir = start

  for (;;) {
    const configPath = join(dir, CONFIG_FILE)
    const content = await readOptional(configPath)
    if (content !== null) {
      return { projectDir: dir, configPath, config: parseConfig(content) }
    }

    const parent = dirname(dir)
    if (parent === dir) break
    dir = parent
  }

  return { projectDir: start, configPath: null, config: DEFAULT_CONFIG }
}

/**
 * 配置管理器
 *
 * 负责读写项目根目录下的 specloom.yaml 配置文件。
 */
export class ConfigManager {
  private configPath: string

  constructor(projectDir: string) {
    this.configPath = join(projectDir, CONFIG_FILE)
  }

  /**
   * 读取配置
   *
   * 如果配置文件不存在，返回默认配置。
   * 如果配置文件格式错误，返回默认配置并打印警告。
   */
  async readConfig(): Promise<SpecloomConfig> {
    const content = await readOptional(this.configPath)

    if (!content) {
      return DEFAULT_CONFIG
    }

    return parseConfig(content)
  }

  /**
   * 写入配置
   */
  async writeConfig(config: Partial<SpecloomConfig>): Promise<void> {
    const current = await this.readConfig()
    const merged: SpecloomConfig = {
      ...current,
      ...config,
      validation: { ...current.validation, ...config.validation },
      archive: { ...current.archive, ...config.archive },
    }

    await writeFile(this.configPath, stringifyYaml(merged), 'utf-8')
  }
}
