import type { Document } from './document.js'
import { childrenOf, type MarkdownNode, type NodeId } from './nodes.js'

function sameFields(a: MarkdownNode, b: MarkdownNode): boolean {
  const left = Object.entries(a).filter(([key]) => key !== 'children')
  const right = new Map(Object.entries(b).filter(([key]) => key !== 'children'))
  if (left.length !== right.size) return false
  return left.every(([key, value]) => right.has(key) && right.get(key) === value)
}

/**
 * Whether two documents have the same tree: node kinds, order, spans and
 * content fields. Node ids are ignored.
 */
export function sameStructure(a: Document, b: Document): boolean {
  if (a.source !== b.source) return false
  const stack: Array<[NodeId, NodeId]> = [[a.root, b.root]]
  while (stack.length > 0) {
    const pair = stack.pop()
    if (!pair) break
    const left = a.node(pair[0])
    const right = b.node(pair[1])
    if (!sameFields(left, right)) return false
    const leftChildren = childrenOf(left)
    const rightChildren = childrenOf(right)
    if (leftChildren.length !== rightChildren.length) return false
    for (let i = 0; i < leftChildren.length; i++) {
      stack.push([leftChildren[i], rightChildren[i]])
    }
  }
  return true
}

/** First differing node path, for test diagnostics. */
export function structureDiff(a: Document, b: Document): string | null {
  const visit = (left: NodeId, right: NodeId, path: string): string | null => {
    const l = a.node(left)
    const r = b.node(right)
    if (!sameFields(l, r)) {
      return `${path}: ${JSON.stringify({ ...l, children: undefined })} != ${JSON.stringify({ ...r, children: undefined })}`
    }
    const lc = childrenOf(l)
    const rc = childrenOf(r)
    if (lc.length !== rc.length) return `${path}: ${lc.length} children != ${rc.length}`
    for (let i = 0; i < lc.length; i++) {
      const diff = visit(lc[i], rc[i], `${path}/${i}`)
      if (diff) return diff
    }
    return null
  }
  return visit(a.root, b.root, '')
}
