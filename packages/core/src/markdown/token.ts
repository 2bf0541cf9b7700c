/**
 * Token kinds produced by the lexer.
 *
 * Tokens are contiguous and gapless: for any input, the spans of the token
 * stream cover every code unit exactly once, in order.
 */
export type TokenKind =
  | 'whitespace'
  | 'newline'
  | 'blankLine'
  | 'headingMarker'
  | 'listMarker'
  | 'checkboxOpen'
  | 'checkboxMark'
  | 'checkboxClose'
  | 'taskId'
  | 'fenceOpen'
  | 'fenceClose'
  | 'text'
  | 'wikiLinkOpen'
  | 'wikiLinkClose'
  | 'emphasisDelimiter'
  | 'codeSpanDelimiter'

export interface Token {
  kind: TokenKind
  /** Inclusive start offset into the source string */
  start: number
  /** Exclusive end offset */
  end: number
}

/** A half-open `[start, end)` range of source offsets. */
export interface Span {
  start: number
  end: number
}

export function tokenText(source: string, token: Span): string {
  return source.slice(token.start, token.end)
}

export function isSpaceOrTab(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t'
}

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9'
}

/** Column width of a run of indentation; tabs advance to the next multiple of 4. */
export function indentWidth(text: string): number {
  let column = 0
  for (const ch of text) {
    if (ch === '\t') {
      column += 4 - (column % 4)
    } else if (ch === ' ') {
      column += 1
    } else {
      break
    }
  }
  return column
}
