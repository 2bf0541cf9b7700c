import type { NodeArena } from './arena.js'
import { Document } from './document.js'
import { IncrementalMismatchError } from './errors.js'
import { childrenOf, shiftNode, type NodeId } from './nodes.js'
import { BlockParser } from './parser.js'

/** Half-open range `[start, end)` of the previous source that is replaced. */
export interface TextEdit {
  start: number
  end: number
}

function assertInRange(edit: TextEdit, length: number): void {
  const { start, end } = edit
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || start > end || end > length) {
    throw new IncrementalMismatchError(start, end, length)
  }
}

export function applyEdit(text: string, edit: TextEdit, newText: string): string {
  assertInRange(edit, text.length)
  return text.slice(0, edit.start) + newText + text.slice(edit.end)
}

function forEachInSubtree(arena: NodeArena, id: NodeId, fn: (id: NodeId) => void): void {
  const stack = [id]
  while (stack.length > 0) {
    const next = stack.pop()
    if (next === undefined) break
    stack.push(...childrenOf(arena.get(next)))
    fn(next)
  }
}

/**
 * Re-parse only the top-level blocks around an edit.
 *
 * The window starts at the last non-blank top-level block before the first
 * block touching the edit, and ends at the first line past the edit where the
 * fresh parse opens a top-level block on an old block boundary. Blocks before
 * the window keep their records; blocks after it keep their ids with spans
 * shifted. Pending task toggles carry over unless the edit replaced the
 * checkbox character itself.
 */
export function incrementalUpdate(prev: Document, edit: TextEdit, newText: string): Document {
  const oldSource = prev.source
  const source = applyEdit(oldSource, edit, newText)
  const delta = newText.length - (edit.end - edit.start)
  const editEnd = edit.start + newText.length

  const oldChildren = prev.children(prev.root)
  const arena = prev.arena.fork()

  let first = oldChildren.findIndex((id) => arena.get(id).end >= edit.start)
  if (first === -1) first = oldChildren.length
  let window = first - 1
  while (window >= 0 && arena.get(oldChildren[window]).type === 'blankLine') window--
  if (window < 0) window = 0
  const windowStart = window < oldChildren.length ? arena.get(oldChildren[window]).start : 0

  const boundaries = new Map<number, number>()
  for (let i = window; i < oldChildren.length; i++) {
    boundaries.set(arena.get(oldChildren[i]).start, i)
  }

  const parsed = new BlockParser(source, arena, windowStart, (offset) =>
    offset >= editEnd && boundaries.has(offset - delta)
  ).run()
  const kept =
    parsed.end < source.length ? (boundaries.get(parsed.end - delta) ?? oldChildren.length) : oldChildren.length

  const released = new Set<NodeId>()
  for (let i = window; i < kept; i++) {
    forEachInSubtree(arena, oldChildren[i], (id) => released.add(id))
  }

  // Toggles of re-parsed tasks follow their checkbox to its new offset.
  const toggles = new Map<number, boolean>()
  for (const id of prev.patchedTasks) {
    if (!released.has(id)) continue
    const task = arena.get(id)
    if (task.type !== 'taskItem') continue
    if (task.checkbox >= edit.start && task.checkbox < edit.end) continue
    toggles.set(task.checkbox < edit.start ? task.checkbox : task.checkbox + delta, task.checked)
  }
  for (const id of released) arena.release(id)

  const patched = new Set([...prev.patchedTasks].filter((id) => !released.has(id)))
  if (toggles.size > 0) {
    for (const block of parsed.children) {
      forEachInSubtree(arena, block, (id) => {
        const task = arena.get(id)
        if (task.type !== 'taskItem') return
        const checked = toggles.get(task.checkbox)
        if (checked === undefined || checked === task.checked) return
        arena.set(id, { ...task, checked })
        patched.add(id)
      })
    }
  }

  const suffix = oldChildren.slice(kept)
  if (delta !== 0) {
    for (const id of suffix) {
      forEachInSubtree(arena, id, (node) => arena.set(node, shiftNode(arena.get(node), delta)))
    }
  }

  arena.set(prev.root, {
    type: 'document',
    start: 0,
    end: source.length,
    children: [...oldChildren.slice(0, window), ...parsed.children, ...suffix],
  })

  return new Document(source, arena, prev.root, patched)
}
