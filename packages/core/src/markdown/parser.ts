import { NodeArena } from './arena.js'
import { Document } from './document.js'
import { MarkdownError } from './errors.js'
import { parseInline } from './inline.js'
import { inlineStart, Lexer, type LexedLine } from './lexer.js'
import type { HeaderLevel, ListItemNode, NodeId, TaskItemNode } from './nodes.js'
import { indentWidth, tokenText, type Token } from './token.js'
import { toSourceText } from './utf8.js'

type LineKind = 'blank' | 'header' | 'fence' | 'item' | 'text'

interface Line extends LexedLine {
  kind: LineKind
  /** Column of the first non-blank character */
  indent: number
  /** Offset where inline content starts */
  inlineStart: number
}

interface DocumentFrame {
  kind: 'document'
  children: NodeId[]
}

interface ListFrame {
  kind: 'list'
  ordered: boolean
  column: number
  children: NodeId[]
}

type WithoutChildren<T> = T extends unknown ? Omit<T, 'children' | 'end'> : never

type ItemHead = WithoutChildren<ListItemNode | TaskItemNode>

interface ItemFrame {
  kind: 'item'
  column: number
  head: ItemHead
  children: NodeId[]
}

type Frame = DocumentFrame | ListFrame | ItemFrame

interface OpenParagraph {
  start: number
  children: NodeId[]
}

/**
 * Called before a line that opens a new top-level block, once every container
 * is closed. Returning true ends the parse at that line.
 */
export type StopAt = (offset: number) => boolean

export interface BlockParseResult {
  /** Top-level block ids in document order */
  children: NodeId[]
  /** Offset where parsing ended: the stop line, or the end of the input */
  end: number
}

const CLOSING_HASHES = /(^|[ \t]+)#+[ \t]*$/

function classify(source: string, lexed: LexedLine): Line {
  const { tokens } = lexed
  let first = 0
  if (tokens[0]?.kind === 'whitespace') first = 1
  const indent = first === 1 ? indentWidth(tokenText(source, tokens[0])) : 0

  let kind: LineKind = 'text'
  switch (tokens[first]?.kind) {
    case 'blankLine':
      kind = 'blank'
      break
    case 'headingMarker':
      kind = 'header'
      break
    case 'fenceOpen':
      kind = 'fence'
      break
    case 'listMarker':
      kind = 'item'
      break
  }
  return { ...lexed, kind, indent, inlineStart: inlineStart(lexed) }
}

/**
 * Container-stack block parser.
 *
 * Runs from a line start outside any fence and builds the top-level blocks
 * into `arena`. The caller allocates the document node.
 */
export class BlockParser {
  private readonly lexer: Lexer
  private readonly stack: Frame[] = [{ kind: 'document', children: [] }]
  private paragraph: OpenParagraph | null = null
  private afterItemHead = false

  constructor(
    private readonly source: string,
    private readonly arena: NodeArena,
    start = 0,
    private readonly stopAt?: StopAt
  ) {
    this.lexer = new Lexer(source, start)
  }

  run(): BlockParseResult {
    let line = this.nextLine()
    while (line) {
      if (line.kind === 'blank') {
        line = this.blankRun(line)
        continue
      }
      if (!this.handle(line)) {
        this.closeParagraph()
        this.closeTo(0)
        return { children: this.stack[0].children, end: line.start }
      }
      line = this.nextLine()
    }
    this.closeParagraph()
    this.closeTo(0)
    return { children: this.stack[0].children, end: this.source.length }
  }

  private nextLine(): Line | undefined {
    const lexed = this.lexer.nextLine()
    return lexed ? classify(this.source, lexed) : undefined
  }

  private get top(): Frame {
    return this.stack[this.stack.length - 1]
  }

  /** Process one non-blank line; false means the caller asked to stop here. */
  private handle(line: Line): boolean {
    switch (line.kind) {
      case 'header':
        return this.header(line)
      case 'fence':
        return this.fence(line)
      case 'item':
        return this.item(line)
      default:
        return this.text(line)
    }
  }

  private enter(depth: number, line: Line): boolean {
    this.closeTo(depth)
    return !(depth === 0 && this.stopAt?.(line.start))
  }

  private header(line: Line): boolean {
    this.closeParagraph()
    this.afterItemHead = false
    if (!this.enter(0, line)) return false

    const markerToken = line.tokens.find((t) => t.kind === 'headingMarker')
    const level = markerToken ? markerToken.end - markerToken.start : 1
    const content = this.source.slice(line.inlineStart, line.contentEnd)
    const text = content.replace(CLOSING_HASHES, '').trim()
    const children = [
      this.marker(line.start, line.inlineStart),
      ...this.inline(line),
      ...this.lineEnding(line),
    ]
    this.top.children.push(
      this.arena.alloc({
        type: 'header',
        level: toHeaderLevel(level),
        text,
        start: line.start,
        end: line.end,
        children,
      })
    )
    return true
  }

  private fence(line: Line): boolean {
    this.closeParagraph()
    this.afterItemHead = false
    if (!this.enter(this.textDepth(line.indent), line)) return false

    const open = line.tokens.find((t) => t.kind === 'fenceOpen')
    const fence = open ? tokenText(this.source, open) : '```'
    const info = this.source.slice(open ? open.end : line.inlineStart, line.contentEnd).trim()
    const lang = info.split(/\s+/)[0] ?? ''

    const contentStart = line.end
    let contentEnd = line.end
    let end = line.end
    let closed = false
    for (let inner = this.lexer.nextLine(); inner; inner = this.lexer.nextLine()) {
      end = inner.end
      if (inner.tokens.some((t) => t.kind === 'fenceClose')) {
        closed = true
        break
      }
      contentEnd = inner.end
    }

    this.top.children.push(
      this.arena.alloc({
        type: 'codeBlock',
        lang,
        info,
        content: this.source.slice(contentStart, contentEnd),
        fence,
        closed,
        start: line.start,
        end,
      })
    )
    return true
  }

  private item(line: Line): boolean {
    this.closeParagraph()
    this.afterItemHead = false
    const ordered = this.isOrdered(line)
    if (!this.enter(this.itemDepth(line.indent, ordered), line)) return false

    if (this.top.kind !== 'list') {
      this.stack.push({ kind: 'list', ordered, column: line.indent, children: [] })
    }
    this.stack.push({
      kind: 'item',
      column: line.indent,
      head: this.itemHead(line),
      children: [this.marker(line.start, line.inlineStart), ...this.inline(line), ...this.lineEnding(line)],
    })
    this.afterItemHead = true
    return true
  }

  private text(line: Line): boolean {
    if (this.paragraph) {
      this.paragraph.children.push(...this.paragraphLine(line))
      return true
    }
    if (this.afterItemHead) {
      this.afterItemHead = false
      this.paragraph = { start: line.start, children: this.paragraphLine(line) }
      return true
    }
    if (!this.enter(this.textDepth(line.indent), line)) return false
    this.paragraph = { start: line.start, children: this.paragraphLine(line) }
    return true
  }

  /**
   * Collect a run of blank lines and attach them to the container that
   * receives the next non-blank line. Returns that line.
   */
  private blankRun(first: Line): Line | undefined {
    this.closeParagraph()
    this.afterItemHead = false
    const blanks = [this.arena.alloc({ type: 'blankLine', start: first.start, end: first.end })]
    let next = this.nextLine()
    while (next && next.kind === 'blank') {
      blanks.push(this.arena.alloc({ type: 'blankLine', start: next.start, end: next.end }))
      next = this.nextLine()
    }
    this.closeTo(next ? this.depthFor(next) : 0)
    this.top.children.push(...blanks)
    return next
  }

  private depthFor(line: Line): number {
    switch (line.kind) {
      case 'header':
      case 'blank':
        return 0
      case 'item':
        return this.itemDepth(line.indent, this.isOrdered(line))
      default:
        return this.textDepth(line.indent)
    }
  }

  /**
   * Stack depth that receives a list item at `column`: the nearest item the
   * marker is indented past (a nested list), or the nearest list of the same
   * kind whose column it reaches (a sibling). Zero starts a new top-level list.
   */
  private itemDepth(column: number, ordered: boolean): number {
    for (let depth = this.stack.length - 1; depth > 0; depth--) {
      const frame = this.stack[depth]
      if (frame.kind === 'item' && column > frame.column) return depth
      if (frame.kind === 'list' && column >= frame.column && frame.ordered === ordered) return depth
    }
    return 0
  }

  /** Deepest item whose marker sits left of `column`, or the document. */
  private textDepth(column: number): number {
    for (let depth = this.stack.length - 1; depth > 0; depth--) {
      const frame = this.stack[depth]
      if (frame.kind === 'item' && column > frame.column) return depth
    }
    return 0
  }

  private isOrdered(line: Line): boolean {
    const marker = line.tokens.find((t) => t.kind === 'listMarker')
    return marker !== undefined && /\d/.test(this.source[marker.start])
  }

  private itemHead(line: Line): ItemHead {
    const find = (kind: Token['kind']) => line.tokens.find((t) => t.kind === kind)
    const marker = find('listMarker')
    const mark = find('checkboxMark')
    const markerText = marker ? tokenText(this.source, marker) : ''
    const text = this.source.slice(line.inlineStart, line.contentEnd).trim()

    if (mark) {
      const id = find('taskId')
      return {
        type: 'taskItem',
        marker: markerText,
        column: line.indent,
        id: id ? tokenText(this.source, id).replace(/\.$/, '') : null,
        checked: this.source[mark.start] !== ' ',
        description: text,
        checkbox: mark.start,
        start: line.start,
      }
    }
    return { type: 'listItem', marker: markerText, column: line.indent, text, start: line.start }
  }

  private inline(line: Line): NodeId[] {
    const tokens = line.tokens.filter(
      (t) => t.start >= line.inlineStart && t.end <= line.contentEnd && t.kind !== 'newline'
    )
    return parseInline(this.source, tokens, line.inlineStart, line.contentEnd, this.arena)
  }

  private paragraphLine(line: Line): NodeId[] {
    const children: NodeId[] = []
    if (line.inlineStart > line.start) {
      children.push(this.marker(line.start, line.inlineStart))
    }
    children.push(...this.inline(line), ...this.lineEnding(line))
    return children
  }

  private lineEnding(line: Line): NodeId[] {
    return line.end > line.contentEnd ? [this.marker(line.contentEnd, line.end)] : []
  }

  private marker(start: number, end: number): NodeId {
    return this.arena.alloc({ type: 'marker', start, end })
  }

  private spanOf(children: readonly NodeId[], fallback: number): { start: number; end: number } {
    if (children.length === 0) return { start: fallback, end: fallback }
    return {
      start: this.arena.get(children[0]).start,
      end: this.arena.get(children[children.length - 1]).end,
    }
  }

  private closeParagraph(): void {
    const paragraph = this.paragraph
    if (!paragraph) return
    this.paragraph = null
    const { end } = this.spanOf(paragraph.children, paragraph.start)
    this.top.children.push(
      this.arena.alloc({ type: 'paragraph', start: paragraph.start, end, children: paragraph.children })
    )
  }

  private closeTo(depth: number): void {
    if (this.stack.length - 1 > depth) this.closeParagraph()
    while (this.stack.length - 1 > depth) {
      const frame = this.stack.pop()
      if (!frame || frame.kind === 'document') break
      const { start, end } = this.spanOf(frame.children, 0)
      const id =
        frame.kind === 'list'
          ? this.arena.alloc({ type: 'list', ordered: frame.ordered, column: frame.column, start, end, children: frame.children })
          : this.arena.alloc({ ...frame.head, end, children: frame.children })
      this.top.children.push(id)
    }
  }
}

const HEADER_LEVELS: readonly HeaderLevel[] = [1, 2, 3, 4, 5, 6]

function toHeaderLevel(level: number): HeaderLevel {
  return HEADER_LEVELS[level - 1] ?? 1
}

/** Parse markdown text or UTF-8 bytes. Only invalid UTF-8 throws. */
export function parse(input: string | Uint8Array): Document {
  const source = toSourceText(input)
  const arena = NodeArena.create()
  const { children } = new BlockParser(source, arena).run()
  const root = arena.alloc({ type: 'document', start: 0, end: source.length, children })
  return new Document(source, arena, root)
}

export type SafeParseResult = { success: true; data: Document } | { success: false; error: MarkdownError }

export function safeParse(input: string | Uint8Array): SafeParseResult {
  try {
    return { success: true, data: parse(input) }
  } catch (error) {
    if (error instanceof MarkdownError) {
      return { success: false, error }
    }
    throw error
  }
}
