import type { Document } from './document.js'
import { childrenOf, type HeaderNode, type NodeId } from './nodes.js'
import type { NodeHandle } from './query.js'

/** A header and the source it governs, up to the next header of the same or a lower level. */
export interface Section {
  id: NodeId
  header: HeaderNode
  start: number
  end: number
}

function childContaining(document: Document, children: readonly NodeId[], offset: number): NodeId | undefined {
  let lo = 0
  let hi = children.length - 1
  let found = -1
  while (lo <= hi) {
    const mid = (lo + hi) >> 1
    if (document.node(children[mid]).start <= offset) {
      found = mid
      lo = mid + 1
    } else {
      hi = mid - 1
    }
  }
  if (found === -1) return undefined
  const id = children[found]
  return offset < document.node(id).end ? id : undefined
}

function outlineSections(document: Document): Section[] {
  const sections: Section[] = []
  const open: Section[] = []
  for (const id of document.children(document.root)) {
    const node = document.node(id)
    if (node.type !== 'header') continue
    while (open.length > 0 && open[open.length - 1].header.level >= node.level) {
      const closed = open.pop()
      if (closed) closed.end = node.start
    }
    const section: Section = { id, header: node, start: node.start, end: document.source.length }
    sections.push(section)
    open.push(section)
  }
  return sections
}

/**
 * Offset lookups over one document.
 *
 * Children cover their parent's span without gaps, so the nodes at an offset
 * are found by descending from the root with one binary search per level.
 */
export class PositionIndex {
  private readonly sections: Section[]

  constructor(private readonly document: Document) {
    this.sections = outlineSections(document)
  }

  /** Nodes whose span contains the offset, outermost first. */
  nodesAt(offset: number): NodeHandle[] {
    const { document } = this
    const path: NodeHandle[] = []
    let id: NodeId | undefined = document.root
    while (id !== undefined) {
      const node = document.node(id)
      if (offset < node.start || offset >= node.end) break
      path.push({ id, node })
      id = childContaining(document, childrenOf(node), offset)
    }
    return path
  }

  /** Innermost node at the offset. */
  nodeAt(offset: number): NodeHandle | undefined {
    const path = this.nodesAt(offset)
    return path.length > 0 ? path[path.length - 1] : undefined
  }

  /** Nodes overlapping `[start, end)` in document order. */
  nodesInRange(start: number, end: number): NodeHandle[] {
    const { document } = this
    const nodes: NodeHandle[] = []
    if (start >= end) return nodes
    const stack = [document.root]
    while (stack.length > 0) {
      const id = stack.pop()
      if (id === undefined) break
      const node = document.node(id)
      if (node.start >= end || node.end <= start) continue
      nodes.push({ id, node })
      const children = childrenOf(node)
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i])
    }
    return nodes
  }

  /** Header sections containing the offset, outermost first. */
  sectionsAt(offset: number): Section[] {
    return this.sections.filter((section) => section.start <= offset && offset < section.end)
  }

  /** Innermost section containing the offset whose header passes `match`. */
  enclosingSection(offset: number, match: (header: HeaderNode) => boolean = () => true): Section | undefined {
    const sections = this.sectionsAt(offset)
    for (let i = sections.length - 1; i >= 0; i--) {
      if (match(sections[i].header)) return sections[i]
    }
    return undefined
  }
}
