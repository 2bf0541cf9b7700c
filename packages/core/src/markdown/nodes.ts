/**
 * AST node records.
 *
 * Nodes form a closed tagged union discriminated by `type`. Records are
 * immutable and reference their children by `NodeId` (an index into the
 * document's arena). Every node covers the raw source span `[start, end)`, and
 * a parent's span is covered exactly by its children, so concatenating the
 * spans of all leaves in pre-order reproduces the source.
 */

export type NodeId = number

export type HeaderLevel = 1 | 2 | 3 | 4 | 5 | 6

interface NodeBase {
  readonly start: number
  readonly end: number
}

interface ParentBase extends NodeBase {
  readonly children: readonly NodeId[]
}

export interface DocumentNode extends ParentBase {
  readonly type: 'document'
}

export interface HeaderNode extends ParentBase {
  readonly type: 'header'
  readonly level: HeaderLevel
  /** Title text without the `#` markers or a closing `#` sequence, trimmed */
  readonly text: string
}

export interface ParagraphNode extends ParentBase {
  readonly type: 'paragraph'
}

export interface CodeBlockNode extends NodeBase {
  readonly type: 'codeBlock'
  /** First word of the info string, empty when absent */
  readonly lang: string
  readonly info: string
  /** Raw lines between the fences */
  readonly content: string
  /** The opening fence run, e.g. "```" */
  readonly fence: string
  /** False when the block runs to the end of the input without a closing fence */
  readonly closed: boolean
}

export interface ListNode extends ParentBase {
  readonly type: 'list'
  readonly ordered: boolean
  /** Indentation column of the first item's marker */
  readonly column: number
}

export interface ListItemNode extends ParentBase {
  readonly type: 'listItem'
  /** Bullet or number marker as written, e.g. "-" or "3." */
  readonly marker: string
  readonly column: number
  /** Content of the item's first line, trimmed */
  readonly text: string
}

export interface TaskItemNode extends ParentBase {
  readonly type: 'taskItem'
  readonly marker: string
  readonly column: number
  /** Dotted numeric ID as written (without a trailing dot), or null when absent */
  readonly id: string | null
  readonly checked: boolean
  readonly description: string
  /** Source offset of the single checkbox character between `[` and `]` */
  readonly checkbox: number
}

export interface BlankLineNode extends NodeBase {
  readonly type: 'blankLine'
}

/** Syntax-only bytes: indentation, bullets, `#` runs, delimiters and line endings. */
export interface MarkerNode extends NodeBase {
  readonly type: 'marker'
}

export interface TextNode extends NodeBase {
  readonly type: 'text'
  readonly value: string
}

export interface WikiLinkNode extends NodeBase {
  readonly type: 'wikiLink'
  readonly target: string
  readonly display: string | null
  readonly anchor: string | null
}

export interface EmphasisNode extends ParentBase {
  readonly type: 'emphasis'
}

export interface StrongNode extends ParentBase {
  readonly type: 'strong'
}

export interface InlineCodeNode extends NodeBase {
  readonly type: 'inlineCode'
  readonly code: string
}

export type MarkdownNode =
  | DocumentNode
  | HeaderNode
  | ParagraphNode
  | CodeBlockNode
  | ListNode
  | ListItemNode
  | TaskItemNode
  | BlankLineNode
  | MarkerNode
  | TextNode
  | WikiLinkNode
  | EmphasisNode
  | StrongNode
  | InlineCodeNode

export type NodeType = MarkdownNode['type']

export type NodeOfType<T extends NodeType> = Extract<MarkdownNode, { type: T }>

export type ParentNode = Extract<MarkdownNode, { children: readonly NodeId[] }>

export type BlockNode =
  | HeaderNode
  | ParagraphNode
  | CodeBlockNode
  | ListNode
  | ListItemNode
  | TaskItemNode
  | BlankLineNode

export type InlineNode =
  | MarkerNode
  | TextNode
  | WikiLinkNode
  | EmphasisNode
  | StrongNode
  | InlineCodeNode

export function isParent(node: MarkdownNode): node is ParentNode {
  return 'children' in node
}

export function childrenOf(node: MarkdownNode): readonly NodeId[] {
  return isParent(node) ? node.children : []
}

export function isInline(node: MarkdownNode): node is InlineNode {
  switch (node.type) {
    case 'marker':
    case 'text':
    case 'wikiLink':
    case 'emphasis':
    case 'strong':
    case 'inlineCode':
      return true
    default:
      return false
  }
}

export function isListItem(node: MarkdownNode): node is ListItemNode | TaskItemNode {
  return node.type === 'listItem' || node.type === 'taskItem'
}

export function isCheckedMark(ch: string | undefined): boolean {
  return ch === 'x' || ch === 'X'
}

/** Copy of `node` with every absolute offset moved by `delta`. */
export function shiftNode(node: MarkdownNode, delta: number): MarkdownNode {
  if (delta === 0) return node
  if (node.type === 'taskItem') {
    return {
      ...node,
      start: node.start + delta,
      end: node.end + delta,
      checkbox: node.checkbox + delta,
    }
  }
  return { ...node, start: node.start + delta, end: node.end + delta }
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected node: ${JSON.stringify(value)}`)
}
