import type { Document } from './markdown/document.js'
import type { NodeId, TaskItemNode } from './markdown/nodes.js'
import { walk } from './markdown/visitor.js'
import type { AcceptedTask, TasksFile, TaskSummary } from './schemas.js'

/**
 * A task of tasks.md with its nested subtasks.
 */
export interface TaskEntry {
  /** ID as written, or `<section>.<counter>` when the line has none */
  id: string
  /** Task text with indented detail lines appended, one per line */
  description: string
  completed: boolean
  line: number
  subtasks: TaskEntry[]
}

/**
 * A `## N. Name` section of tasks.md. Tasks before the first section land in
 * a section numbered 0 with an empty name.
 */
export interface TaskSection {
  number: number
  name: string
  line: number | null
  tasks: TaskEntry[]
}

const NUMBERED_SECTION = /^(\d+)\.\s+(.+)$/

interface OpenSection {
  section: TaskSection
  flat: TaskEntry[]
  autoNumber: number
}

/** Source lines inside a task item that belong to neither its head nor a nested task. */
function detailLines(document: Document, id: NodeId, task: TaskItemNode): string[] {
  const index = document.lineIndex
  const first = index.lineAt(task.start)
  const last = index.lineAt(Math.max(task.start, task.end - 1))
  const skipped = new Set<number>()

  walk(
    document,
    {
      taskItem: (nested, context) => {
        if (context.id === id) return
        const to = index.lineAt(Math.max(nested.start, nested.end - 1))
        for (let line = index.lineAt(nested.start); line <= to; line++) skipped.add(line)
        return 'skip'
      },
    },
    id
  )

  const lines: string[] = []
  for (let line = first + 1; line <= last; line++) {
    if (skipped.has(line)) continue
    const range = index.lineRange(line)
    const text = document.source.slice(range.start, range.end).trim()
    if (text) lines.push(text)
  }
  return lines
}

function parentId(id: string): string | null {
  const dot = id.lastIndexOf('.')
  return dot === -1 ? null : id.slice(0, dot)
}

/** Nest tasks under the task whose ID is their ID minus the last segment. */
function nestById(flat: TaskEntry[]): TaskEntry[] {
  const byId = new Map<string, TaskEntry>()
  for (const entry of flat) {
    if (!byId.has(entry.id)) byId.set(entry.id, entry)
  }

  const roots: TaskEntry[] = []
  for (const entry of flat) {
    const parent = parentId(entry.id)
    const owner = parent === null ? undefined : byId.get(parent)
    if (owner && owner !== entry) {
      owner.subtasks.push(entry)
    } else {
      roots.push(entry)
    }
  }
  return roots
}

/**
 * Group the tasks of a tasks.md document by `##` section.
 *
 * `## N. Name` headers keep their number; other `##` headers continue from
 * the highest number seen so far. Tasks without an ID are numbered
 * `<section>.<counter>`, or `<counter>` outside any section.
 */
export function parseTaskSections(document: Document): TaskSection[] {
  const sections: TaskSection[] = []
  let open: OpenSection | null = null
  let highest = 0

  const close = () => {
    if (!open) return
    open.section.tasks = nestById(open.flat)
    sections.push(open.section)
    open = null
  }

  for (const child of document.children(document.root)) {
    const node = document.node(child)
    if (node.type === 'header') {
      if (node.level !== 2) continue
      close()
      const numbered = NUMBERED_SECTION.exec(node.text)
      const number = numbered ? Number(numbered[1]) : highest + 1
      highest = Math.max(highest, number)
      open = {
        section: { number, name: numbered ? numbered[2].trim() : node.text, line: document.line(child), tasks: [] },
        flat: [],
        autoNumber: 0,
      }
      continue
    }

    walk(
      document,
      {
        taskItem: (task, context) => {
          open ??= { section: { number: 0, name: '', line: null, tasks: [] }, flat: [], autoNumber: 0 }
          let id = task.id
          if (id === null) {
            open.autoNumber += 1
            id = open.section.number > 0 ? `${open.section.number}.${open.autoNumber}` : `${open.autoNumber}`
          }
          open.flat.push({
            id,
            description: [task.description, ...detailLines(document, context.id, task)].join('\n'),
            completed: task.checked,
            line: document.line(context.id),
            subtasks: [],
          })
        },
      },
      child
    )
  }

  close()
  return sections
}

/** Tasks in document order, each with the section it belongs to. */
export function flattenTaskSections(sections: TaskSection[]): Array<{ task: TaskEntry; section: TaskSection }> {
  const flat: Array<{ task: TaskEntry; section: TaskSection }> = []
  const visit = (tasks: TaskEntry[], section: TaskSection) => {
    for (const task of tasks) {
      flat.push({ task, section })
      visit(task.subtasks, section)
    }
  }
  for (const section of sections) visit(section.tasks, section)
  return flat
}

export function summarizeTasks(tasks: readonly AcceptedTask[]): TaskSummary {
  const summary: TaskSummary = { total: tasks.length, completed: 0, inProgress: 0, pending: 0 }
  for (const task of tasks) {
    if (task.status === 'completed') summary.completed++
    else if (task.status === 'in_progress') summary.inProgress++
    else summary.pending++
  }
  return summary
}

/** The tasks.jsonc model of a change accepted at `acceptedAt`. */
export function buildTasksFile(changeId: string, sections: TaskSection[], acceptedAt: Date): TasksFile {
  const tasks = flattenTaskSections(sections).map(
    ({ task, section }): AcceptedTask => ({
      id: task.id,
      section: section.name,
      description: task.description,
      status: task.completed ? 'completed' : 'pending',
    })
  )
  return {
    version: 1,
    changeId,
    acceptedAt: acceptedAt.toISOString(),
    tasks,
    summary: summarizeTasks(tasks),
  }
}
