import { AncestryIndex } from './ancestry.js'
import type { NodeArena, ReadonlyArena } from './arena.js'
import { LineIndex } from './line-index.js'
import {
  childrenOf,
  isCheckedMark,
  type HeaderNode,
  type MarkdownNode,
  type NodeId,
  type TaskItemNode,
} from './nodes.js'
import { PositionIndex, type Section } from './position.js'
import { print } from './printer.js'
import { query, type NodeHandle, type QueryResult } from './query.js'
import { walk, type Visitor } from './visitor.js'

/**
 * A parsed markdown document: the source text, the node arena and the root.
 *
 * Documents never change after construction. Toggling a task or applying an
 * edit returns a new Document that shares untouched node records.
 */
export class Document {
  private lines: LineIndex | undefined
  private parents: AncestryIndex | undefined
  private positions: PositionIndex | undefined

  constructor(
    readonly source: string,
    private readonly nodes: NodeArena,
    readonly root: NodeId,
    /** Task items whose `checked` flag differs from the source text */
    readonly patchedTasks: ReadonlySet<NodeId> = new Set()
  ) {}

  get arena(): ReadonlyArena {
    return this.nodes
  }

  get lineIndex(): LineIndex {
    this.lines ??= new LineIndex(this.source)
    return this.lines
  }

  /** Parent links and header outline, built on first use. */
  get ancestry(): AncestryIndex {
    this.parents ??= new AncestryIndex(this)
    return this.parents
  }

  get positionIndex(): PositionIndex {
    this.positions ??= new PositionIndex(this)
    return this.positions
  }

  get hasPendingEdits(): boolean {
    return this.patchedTasks.size > 0
  }

  node(id: NodeId): MarkdownNode {
    return this.nodes.get(id)
  }

  children(id: NodeId): readonly NodeId[] {
    return childrenOf(this.nodes.get(id))
  }

  /** Raw source text covered by a node. */
  text(id: NodeId): string {
    const node = this.nodes.get(id)
    return this.source.slice(node.start, node.end)
  }

  /** 1-based line of a node's first character. */
  line(id: NodeId): number {
    return this.lineIndex.lineAt(this.nodes.get(id).start)
  }

  /** Innermost node at a source offset. */
  nodeAt(offset: number): NodeHandle | undefined {
    return this.positionIndex.nodeAt(offset)
  }

  nodesAt(offset: number): NodeHandle[] {
    return this.positionIndex.nodesAt(offset)
  }

  nodesInRange(start: number, end: number): NodeHandle[] {
    return this.positionIndex.nodesInRange(start, end)
  }

  enclosingSection(offset: number, match?: (header: HeaderNode) => boolean): Section | undefined {
    return this.positionIndex.enclosingSection(offset, match)
  }

  print(): string {
    const patches = new Map<number, string>()
    for (const id of this.patchedTasks) {
      const task = this.nodes.get(id)
      if (task.type === 'taskItem') {
        patches.set(task.checkbox, task.checked ? 'x' : ' ')
      }
    }
    return print({ source: this.source, arena: this.nodes, root: this.root, patches })
  }

  visit(visitor: Visitor): void {
    walk(this, visitor)
  }

  query(selector: string): QueryResult {
    return query(this, selector)
  }

  /** Tasks in document order. */
  tasks(): TaskItemNode[] {
    const tasks: TaskItemNode[] = []
    this.visit({
      taskItem: (node) => {
        tasks.push(node)
      },
    })
    return tasks
  }

  setTaskChecked(id: NodeId, checked: boolean): Document {
    return this.setTasksChecked(new Map([[id, checked]]))
  }

  /**
   * Set the checked state of several tasks at once. Printing the result
   * rewrites only the checkbox characters of the tasks whose state changed.
   */
  setTasksChecked(updates: ReadonlyMap<NodeId, boolean>): Document {
    let arena: NodeArena | undefined
    const patched = new Set(this.patchedTasks)
    for (const [id, checked] of updates) {
      const node = this.nodes.get(id)
      if (node.type !== 'taskItem') {
        throw new TypeError(`Node ${id} is a ${node.type}, not a task item`)
      }
      if (node.checked === checked) continue
      arena ??= this.nodes.fork()
      arena.set(id, { ...node, checked })
      if (checked === isCheckedMark(this.source[node.checkbox])) {
        patched.delete(id)
      } else {
        patched.add(id)
      }
    }
    return arena ? new Document(this.source, arena, this.root, patched) : this
  }
}
