import type { Document } from './document.js'
import { childrenOf, type NodeId } from './nodes.js'

/** Parent links and header outline of one document. */
export class AncestryIndex {
  private readonly parents = new Map<NodeId, NodeId>()
  private readonly outlines = new Map<NodeId, NodeId[]>()

  constructor(private readonly document: Document) {
    const stack = [document.root]
    while (stack.length > 0) {
      const id = stack.pop()
      if (id === undefined) break
      for (const child of childrenOf(document.node(id))) {
        this.parents.set(child, id)
        stack.push(child)
      }
    }

    const open: Array<{ id: NodeId; level: number }> = []
    for (const id of document.children(document.root)) {
      const node = document.node(id)
      if (node.type === 'header') {
        while (open.length > 0 && open[open.length - 1].level >= node.level) open.pop()
      }
      this.outlines.set(
        id,
        open.map((entry) => entry.id).reverse()
      )
      if (node.type === 'header') open.push({ id, level: node.level })
    }
  }

  /** Ancestors innermost first: tree parents, enclosing headers, then the document. */
  chain(id: NodeId): NodeId[] {
    const root = this.document.root
    if (id === root) return []
    const chain: NodeId[] = []
    let top = id
    for (let parent = this.parents.get(id); parent !== undefined && parent !== root; parent = this.parents.get(parent)) {
      chain.push(parent)
      top = parent
    }
    chain.push(...(this.outlines.get(top) ?? []), root)
    return chain
  }
}
