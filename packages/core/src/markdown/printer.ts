import type { ReadonlyArena } from './arena.js'
import { assertNever, type MarkdownNode, type NodeId } from './nodes.js'

export interface PrintInput {
  source: string
  arena: ReadonlyArena
  root: NodeId
  /** Replacement character per source offset */
  patches: ReadonlyMap<number, string>
}

/**
 * Print a tree back to text.
 *
 * Subtrees without a patch inside their span replay the source verbatim;
 * patched leaves copy their span with only the patched characters replaced.
 */
export function print(input: PrintInput): string {
  if (input.patches.size === 0) {
    return input.source
  }
  const offsets = [...input.patches.keys()].sort((a, b) => a - b)
  return new Printer(input, offsets).block(input.root)
}

class Printer {
  constructor(
    private readonly input: PrintInput,
    private readonly offsets: readonly number[]
  ) {}

  /** First patch offset at or after `start` lies before `end`. */
  private touched(node: MarkdownNode): boolean {
    let lo = 0
    let hi = this.offsets.length
    while (lo < hi) {
      const mid = (lo + hi) >> 1
      if (this.offsets[mid] < node.start) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }
    return lo < this.offsets.length && this.offsets[lo] < node.end
  }

  private verbatim(node: MarkdownNode): string {
    return this.input.source.slice(node.start, node.end)
  }

  private patched(node: MarkdownNode): string {
    let out = ''
    let from = node.start
    for (const offset of this.offsets) {
      if (offset < node.start || offset >= node.end) continue
      out += this.input.source.slice(from, offset) + (this.input.patches.get(offset) ?? '')
      from = offset + 1
    }
    return out + this.input.source.slice(from, node.end)
  }

  private join(children: readonly NodeId[], each: (id: NodeId) => string): string {
    let out = ''
    for (const id of children) out += each(id)
    return out
  }

  block(id: NodeId): string {
    const node = this.input.arena.get(id)
    if (!this.touched(node)) return this.verbatim(node)

    switch (node.type) {
      case 'document':
      case 'list':
      case 'listItem':
      case 'taskItem':
        // item heads mix inline nodes with nested blocks; block() routes both
        return this.join(node.children, (child) => this.block(child))
      case 'header':
      case 'paragraph':
        return this.join(node.children, (child) => this.inline(child))
      case 'codeBlock':
      case 'blankLine':
        return this.patched(node)
      case 'marker':
      case 'text':
      case 'wikiLink':
      case 'emphasis':
      case 'strong':
      case 'inlineCode':
        return this.inline(id)
      default:
        return assertNever(node)
    }
  }

  inline(id: NodeId): string {
    const node = this.input.arena.get(id)
    if (!this.touched(node)) return this.verbatim(node)

    switch (node.type) {
      case 'emphasis':
      case 'strong':
        return this.join(node.children, (child) => this.inline(child))
      case 'marker':
      case 'text':
      case 'wikiLink':
      case 'inlineCode':
        return this.patched(node)
      case 'document':
      case 'header':
      case 'paragraph':
      case 'codeBlock':
      case 'list':
      case 'listItem':
      case 'taskItem':
      case 'blankLine':
        return this.block(id)
      default:
        return assertNever(node)
    }
  }
}
