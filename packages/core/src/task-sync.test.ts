import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { cleanupTempDir, createTempDir, createTempFile } from './__tests__/test-utils.js'
import { AdapterError } from './errors.js'
import type { TasksFile, TaskStatus } from './schemas.js'
import { parseTasksFile, readTasksFile, serializeTasksFile, syncTasksMarkdown, taskStatusMap } from './task-sync.js'

const MARKDOWN = `## 1. Setup
- [ ] 1.1 Install
- [x] 1.2 Configure
- [X] 1.3 Verify

## Other
- [ ] Loose
`

const TASKS_JSONC = `// accepted by hand
{
  "version": 1,
  "changeId": "demo",
  "acceptedAt": "2026-01-02T03:04:05.000Z",
  "tasks": [
    { "id": "1.1", "section": "Setup", "description": "Install", "status": "in_progress", },
  ],
}
`

describe('syncTasksMarkdown', () => {
  it('should flip only checkboxes whose status differs', () => {
    const statuses = new Map<string, TaskStatus>([
      ['1.1', 'completed'],
      ['1.2', 'in_progress'],
      ['1.3', 'completed'],
      ['9.9', 'completed'],
    ])
    const result = syncTasksMarkdown(MARKDOWN, statuses)

    expect(result.updated).toBe(2)
    expect(result.content).toBe(`## 1. Setup
- [x] 1.1 Install
- [ ] 1.2 Configure
- [X] 1.3 Verify

## Other
- [ ] Loose
`)
  })

  it('should match tasks numbered by their section', () => {
    const result = syncTasksMarkdown(MARKDOWN, new Map<string, TaskStatus>([['2.1', 'completed']]))

    expect(result.updated).toBe(1)
    expect(result.content).toBe(MARKDOWN.replace('- [ ] Loose', '- [x] Loose'))
  })

  it('should return the input when nothing changes', () => {
    const result = syncTasksMarkdown(MARKDOWN, new Map<string, TaskStatus>([['1.2', 'completed']]))
    expect(result).toEqual({ content: MARKDOWN, updated: 0 })
  })

  it('should treat pending as unchecked', () => {
    const result = syncTasksMarkdown('- [x] 2 Done\n', new Map<string, TaskStatus>([['2', 'pending']]))
    expect(result.content).toBe('- [ ] 2 Done\n')
  })
})

describe('parseTasksFile', () => {
  it('should accept comments and trailing commas', () => {
    const file = parseTasksFile(TASKS_JSONC)

    expect(file.changeId).toBe('demo')
    expect(file.summary).toBeUndefined()
    expect(taskStatusMap(file)).toEqual(new Map([['1.1', 'in_progress']]))
  })

  it('should reject unknown statuses', () => {
    expect(() => parseTasksFile(TASKS_JSONC.replace('in_progress', 'done'))).toThrow(AdapterError)
  })

  it('should reject malformed JSON', () => {
    try {
      parseTasksFile('{ "version": ', 'broken.jsonc')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(AdapterError)
      expect(error).toMatchObject({ code: 'INVALID_TASKS_FILE' })
    }
  })

  it('should read back what it serializes', () => {
    const file: TasksFile = {
      version: 1,
      changeId: 'demo',
      acceptedAt: '2026-01-02T03:04:05.000Z',
      tasks: [{ id: '1', section: '', description: 'a', status: 'pending' }],
      summary: { total: 1, completed: 0, inProgress: 0, pending: 1 },
    }
    const text = serializeTasksFile(file)

    expect(text.startsWith('// Task status for change "demo".')).toBe(true)
    expect(parseTasksFile(text)).toEqual(file)
  })
})

describe('readTasksFile', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createTempDir()
  })

  afterEach(async () => {
    await cleanupTempDir(tempDir)
  })

  it('should return null for a missing file', async () => {
    expect(await readTasksFile(join(tempDir, 'tasks.jsonc'))).toBeNull()
  })

  it('should read and validate an existing file', async () => {
    const path = await createTempFile(tempDir, 'tasks.jsonc', TASKS_JSONC)
    const file = await readTasksFile(path)
    expect(file?.tasks).toEqual([{ id: '1.1', section: 'Setup', description: 'Install', status: 'in_progress' }])
  })
})
