import { readFile } from 'fs/promises'
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser'
import { AdapterError } from './errors.js'
import type { NodeId } from './markdown/nodes.js'
import { parse } from './markdown/parser.js'
import { TasksFileSchema, type TasksFile, type TaskStatus } from './schemas.js'
import { flattenTaskSections, parseTaskSections } from './tasks.js'

export interface TaskSyncResult {
  content: string
  /** Number of checkboxes that changed */
  updated: number
}

/** Task ID to status, in file order; a later duplicate ID wins. */
export function taskStatusMap(file: TasksFile): Map<string, TaskStatus> {
  return new Map(file.tasks.map((task) => [task.id, task.status]))
}

/**
 * Bring the checkboxes of tasks.md in line with task statuses.
 *
 * `completed` checks a task; `pending` and `in_progress` uncheck it. Tasks
 * are matched by the same IDs acceptance gives them, so tasks numbered by
 * their section take part too. Only the checkbox characters of tasks whose
 * state differs are rewritten.
 */
export function syncTasksMarkdown(markdown: string, statuses: ReadonlyMap<string, TaskStatus>): TaskSyncResult {
  const document = parse(markdown)
  const nodeAtLine = new Map<number, NodeId>()
  for (const { id } of document.query('task')) nodeAtLine.set(document.line(id), id)

  const updates = new Map<NodeId, boolean>()
  for (const { task } of flattenTaskSections(parseTaskSections(document))) {
    const status = statuses.get(task.id)
    const node = nodeAtLine.get(task.line)
    if (status === undefined || node === undefined) continue
    const checked = status === 'completed'
    if (task.completed !== checked) updates.set(node, checked)
  }

  if (updates.size === 0) return { content: markdown, updated: 0 }
  return { content: document.setTasksChecked(updates).print(), updated: updates.size }
}

/**
 * Parse the text of a tasks.jsonc file. Comments and trailing commas are allowed.
 */
export function parseTasksFile(text: string, path = 'tasks.jsonc'): TasksFile {
  const errors: ParseError[] = []
  const data: unknown = parseJsonc(text, errors, { allowTrailingComma: true })
  if (errors.length > 0) {
    const [first] = errors
    throw new AdapterError(
      'INVALID_TASKS_FILE',
      `${path}: ${printParseErrorCode(first.error)} at offset ${first.offset}`
    )
  }

  const result = TasksFileSchema.safeParse(data)
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new AdapterError('INVALID_TASKS_FILE', `${path}: ${details}`)
  }
  return result.data
}

/** Read a tasks.jsonc file; null when it does not exist. */
export async function readTasksFile(path: string): Promise<TasksFile | null> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null
    throw error
  }
  return parseTasksFile(text, path)
}

export function serializeTasksFile(file: TasksFile): string {
  const header = `// Task status for change "${file.changeId}". Edit "status" here; sync updates tasks.md.\n`
  return `${header}${JSON.stringify(file, null, 2)}\n`
}
