import type { MarkdownNode, NodeId } from './nodes.js'

/** Read access to an arena, as handed out by a Document. */
export interface ReadonlyArena {
  readonly size: number
  has(id: NodeId): boolean
  get(id: NodeId): MarkdownNode
  /** Mutable copy sharing every node record with this arena. */
  fork(): NodeArena
}

/**
 * Flat node storage addressed by index.
 *
 * Released slots go to a free list and are handed out again by `alloc`, so a
 * document that goes through many incremental updates does not keep growing.
 * The pool belongs to one document lineage; there is no storage shared
 * between unrelated parses.
 */
export class NodeArena implements ReadonlyArena {
  private constructor(
    private readonly slots: Array<MarkdownNode | undefined>,
    private readonly free: NodeId[]
  ) {}

  static create(): NodeArena {
    return new NodeArena([], [])
  }

  /** Number of live nodes */
  get size(): number {
    return this.slots.length - this.free.length
  }

  /** Number of slots, live or pooled */
  get capacity(): number {
    return this.slots.length
  }

  has(id: NodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.slots.length && this.slots[id] !== undefined
  }

  get(id: NodeId): MarkdownNode {
    const node = this.has(id) ? this.slots[id] : undefined
    if (!node) {
      throw new RangeError(`Node ${id} does not exist in this document`)
    }
    return node
  }

  alloc(node: MarkdownNode): NodeId {
    const reused = this.free.pop()
    if (reused !== undefined) {
      this.slots[reused] = node
      return reused
    }
    this.slots.push(node)
    return this.slots.length - 1
  }

  set(id: NodeId, node: MarkdownNode): void {
    if (!this.has(id)) {
      throw new RangeError(`Node ${id} does not exist in this document`)
    }
    this.slots[id] = node
  }

  release(id: NodeId): void {
    if (!this.has(id)) return
    this.slots[id] = undefined
    this.free.push(id)
  }

  fork(): NodeArena {
    return new NodeArena([...this.slots], [...this.free])
  }
}
