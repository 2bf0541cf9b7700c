import type { Document } from './document.js'
import { assertNever, childrenOf, type MarkdownNode, type NodeId, type NodeOfType, type NodeType } from './nodes.js'

export type VisitSignal = 'skip' | 'stop' | void

export interface VisitContext {
  id: NodeId
  parent: NodeId | null
  depth: number
  document: Document
}

type KindCallbacks = {
  [K in NodeType]?: (node: NodeOfType<K>, context: VisitContext) => VisitSignal
}

/**
 * Pre-order visitor. `enter` runs before the per-kind callback and `leave`
 * after the subtree; returning `'skip'` from `enter` or the kind callback
 * skips the children, `'stop'` ends the walk.
 */
export interface Visitor extends KindCallbacks {
  enter?: (node: MarkdownNode, context: VisitContext) => VisitSignal
  leave?: (node: MarkdownNode, context: VisitContext) => void
}

function dispatch(visitor: Visitor, node: MarkdownNode, context: VisitContext): VisitSignal {
  switch (node.type) {
    case 'document':
      return visitor.document?.(node, context)
    case 'header':
      return visitor.header?.(node, context)
    case 'paragraph':
      return visitor.paragraph?.(node, context)
    case 'codeBlock':
      return visitor.codeBlock?.(node, context)
    case 'list':
      return visitor.list?.(node, context)
    case 'listItem':
      return visitor.listItem?.(node, context)
    case 'taskItem':
      return visitor.taskItem?.(node, context)
    case 'blankLine':
      return visitor.blankLine?.(node, context)
    case 'marker':
      return visitor.marker?.(node, context)
    case 'text':
      return visitor.text?.(node, context)
    case 'wikiLink':
      return visitor.wikiLink?.(node, context)
    case 'emphasis':
      return visitor.emphasis?.(node, context)
    case 'strong':
      return visitor.strong?.(node, context)
    case 'inlineCode':
      return visitor.inlineCode?.(node, context)
    default:
      return assertNever(node)
  }
}

/** Walk the document tree; returns false when a callback stopped the walk. */
export function walk(document: Document, visitor: Visitor, from: NodeId = document.root): boolean {
  // explicit stack keeps deep lists off the call stack
  const stack: Array<{ id: NodeId; parent: NodeId | null; depth: number; leave: boolean }> = [
    { id: from, parent: null, depth: 0, leave: false },
  ]
  while (stack.length > 0) {
    const frame = stack.pop()
    if (!frame) break
    const node = document.node(frame.id)
    const context: VisitContext = { id: frame.id, parent: frame.parent, depth: frame.depth, document }

    if (frame.leave) {
      visitor.leave?.(node, context)
      continue
    }

    let signal = visitor.enter?.(node, context)
    if (signal === 'stop') return false
    if (signal !== 'skip') {
      signal = dispatch(visitor, node, context)
      if (signal === 'stop') return false
    }

    stack.push({ ...frame, leave: true })
    if (signal === 'skip') continue
    const children = childrenOf(node)
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ id: children[i], parent: frame.id, depth: frame.depth + 1, leave: false })
    }
  }
  return true
}
