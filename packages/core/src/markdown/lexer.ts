import { isDigit, isSpaceOrTab, type Token, type TokenKind } from './token.js'
import { toSourceText } from './utf8.js'

/** Tokens of one physical line, including its line ending. */
export interface LexedLine {
  start: number
  /** End of the line including the line ending */
  end: number
  /** End of the line content, before `\n` or `\r\n` */
  contentEnd: number
  tokens: Token[]
}

interface FenceState {
  char: string
  length: number
}

const WORD_CHAR = /[\p{L}\p{N}]/u

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR.test(ch)
}

/**
 * Line-oriented scanner for the spec markdown dialect.
 *
 * The only state carried between lines is whether a fenced code block is
 * open. A lexer may start at any line start that is outside a fence, which is
 * how the incremental updater re-lexes a window of the document.
 *
 * Delimiters between bullet, checkbox, task ID and description accept any
 * amount of spaces or tabs, including none.
 */
export class Lexer {
  private pos: number
  private fence: FenceState | null = null
  private tokens: Token[] = []

  constructor(
    readonly source: string,
    start = 0
  ) {
    this.pos = start
  }

  /** Offset of the first line not yet returned by `nextLine`. */
  get offset(): number {
    return this.pos
  }

  get inFence(): boolean {
    return this.fence !== null
  }

  nextLine(): LexedLine | undefined {
    const src = this.source
    if (this.pos >= src.length) return undefined

    const start = this.pos
    const newline = src.indexOf('\n', start)
    const end = newline === -1 ? src.length : newline + 1
    let contentEnd = newline === -1 ? src.length : newline
    if (newline !== -1 && contentEnd > start && src[contentEnd - 1] === '\r') {
      contentEnd -= 1
    }
    this.pos = end
    this.tokens = []

    if (this.fence) {
      this.lexFenceLine(start, contentEnd, this.fence)
      this.push('newline', contentEnd, end)
      return { start, end, contentEnd, tokens: this.tokens }
    }

    let p = start
    while (p < contentEnd && isSpaceOrTab(src[p])) p++
    if (p === contentEnd) {
      this.push('blankLine', start, end)
      return { start, end, contentEnd, tokens: this.tokens }
    }

    this.push('whitespace', start, p)
    p = this.lexBlockPrefix(p, contentEnd)
    this.lexInline(p, contentEnd)
    this.push('newline', contentEnd, end)
    return { start, end, contentEnd, tokens: this.tokens }
  }

  private push(kind: TokenKind, start: number, end: number): void {
    if (end > start) {
      this.tokens.push({ kind, start, end })
    }
  }

  private skipSpaces(p: number, end: number): number {
    const from = p
    while (p < end && isSpaceOrTab(this.source[p])) p++
    this.push('whitespace', from, p)
    return p
  }

  private runLength(p: number, end: number, ch: string): number {
    let q = p
    while (q < end && this.source[q] === ch) q++
    return q - p
  }

  private lexFenceLine(start: number, contentEnd: number, fence: FenceState): void {
    const src = this.source
    let p = start
    while (p < contentEnd && isSpaceOrTab(src[p])) p++
    const run = this.runLength(p, contentEnd, fence.char)
    if (run >= fence.length) {
      let q = p + run
      while (q < contentEnd && isSpaceOrTab(src[q])) q++
      if (q === contentEnd) {
        this.push('whitespace', start, p)
        this.push('fenceClose', p, p + run)
        this.push('whitespace', p + run, contentEnd)
        this.fence = null
        return
      }
    }
    this.push('text', start, contentEnd)
  }

  /**
   * Emit block-level markers at the start of a line and return the offset
   * where inline content begins.
   */
  private lexBlockPrefix(p: number, end: number): number {
    const src = this.source
    const ch = src[p]

    if (ch === '#') {
      const run = this.runLength(p, end, '#')
      if (run <= 6 && (p + run === end || isSpaceOrTab(src[p + run]))) {
        this.push('headingMarker', p, p + run)
        return this.skipSpaces(p + run, end)
      }
      return p
    }

    if (ch === '`' || ch === '~') {
      const run = this.runLength(p, end, ch)
      const info = src.slice(p + run, end)
      if (run >= 3 && !(ch === '`' && info.includes('`'))) {
        this.push('fenceOpen', p, p + run)
        const infoStart = this.skipSpaces(p + run, end)
        this.push('text', infoStart, end)
        this.fence = { char: ch, length: run }
        return end
      }
      return p
    }

    if (ch === '-' || ch === '*' || ch === '+') {
      const next = src[p + 1]
      const checkboxFollows = ch === '-' && this.checkboxAt(p + 1, end)
      if (p + 1 === end || isSpaceOrTab(next) || checkboxFollows) {
        this.push('listMarker', p, p + 1)
        const q = this.skipSpaces(p + 1, end)
        return ch === '-' ? this.lexTaskPrefix(q, end) : q
      }
      return p
    }

    if (isDigit(ch)) {
      let q = p
      while (q < end && isDigit(src[q])) q++
      const delimiter = src[q]
      if (q - p <= 9 && (delimiter === '.' || delimiter === ')')) {
        if (q + 1 === end || isSpaceOrTab(src[q + 1])) {
          this.push('listMarker', p, q + 1)
          return this.skipSpaces(q + 1, end)
        }
      }
    }

    return p
  }

  private checkboxAt(p: number, end: number): boolean {
    const src = this.source
    if (p + 2 >= end) return false
    const mark = src[p + 1]
    return src[p] === '[' && (mark === ' ' || mark === 'x' || mark === 'X') && src[p + 2] === ']'
  }

  /** Checkbox, optional dotted task ID and the spacing around them. */
  private lexTaskPrefix(p: number, end: number): number {
    if (!this.checkboxAt(p, end)) return p
    this.push('checkboxOpen', p, p + 1)
    this.push('checkboxMark', p + 1, p + 2)
    this.push('checkboxClose', p + 2, p + 3)
    const q = this.skipSpaces(p + 3, end)
    const idEnd = this.scanTaskId(q, end)
    if (idEnd === q) return q
    this.push('taskId', q, idEnd)
    return this.skipSpaces(idEnd, end)
  }

  /**
   * Scan `\d+(\.\d+)*` with an optional trailing `.`. The ID only counts when
   * it is followed by whitespace or the end of the line.
   */
  private scanTaskId(p: number, end: number): number {
    const src = this.source
    let q = p
    if (!isDigit(src[q])) return p
    while (q < end && isDigit(src[q])) q++
    while (q + 1 < end && src[q] === '.' && isDigit(src[q + 1])) {
      q++
      while (q < end && isDigit(src[q])) q++
    }
    if (q < end && src[q] === '.') q++
    if (q === end || isSpaceOrTab(src[q])) return q
    return p
  }

  private lexInline(p: number, end: number): void {
    const src = this.source
    let textStart = p
    let i = p
    const flush = (upto: number) => {
      this.push('text', textStart, upto)
    }

    while (i < end) {
      const ch = src[i]

      if (ch === '\\' && i + 1 < end) {
        i += 2
        continue
      }

      if ((ch === '[' || ch === ']') && i + 1 < end && src[i + 1] === ch) {
        flush(i)
        this.push(ch === '[' ? 'wikiLinkOpen' : 'wikiLinkClose', i, i + 2)
        i += 2
        textStart = i
        continue
      }

      if (ch === '`') {
        const run = this.runLength(i, end, '`')
        flush(i)
        this.push('codeSpanDelimiter', i, i + run)
        i += run
        textStart = i
        continue
      }

      if (ch === '*' || ch === '_') {
        const run = this.runLength(i, end, ch)
        const before = i > p ? src[i - 1] : undefined
        const after = i + run < end ? src[i + run] : undefined
        if (ch === '_' && isWordChar(before) && isWordChar(after)) {
          i += run
          continue
        }
        flush(i)
        this.push('emphasisDelimiter', i, i + run)
        i += run
        textStart = i
        continue
      }

      i++
    }
    flush(end)
  }
}

const PREFIX_KINDS = new Set<TokenKind>([
  'whitespace',
  'headingMarker',
  'listMarker',
  'checkboxOpen',
  'checkboxMark',
  'checkboxClose',
  'taskId',
])

/** Offset where the inline content of a lexed line starts, after any block prefix. */
export function inlineStart(line: LexedLine): number {
  for (const token of line.tokens) {
    if (!PREFIX_KINDS.has(token.kind)) {
      return token.kind === 'newline' ? line.contentEnd : token.start
    }
  }
  return line.contentEnd
}

/** Scan a whole input into a flat, gapless token stream. */
export function tokenize(input: string | Uint8Array): Token[] {
  const lexer = new Lexer(toSourceText(input))
  const tokens: Token[] = []
  for (let line = lexer.nextLine(); line; line = lexer.nextLine()) {
    tokens.push(...line.tokens)
  }
  return tokens
}
