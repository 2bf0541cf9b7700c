/** 1-based line and column of a source offset. */
export interface Position {
  line: number
  column: number
}

/**
 * Sorted line-start offsets of a source string.
 *
 * A line ends after its `\n`; a trailing `\r` stays part of the line content.
 */
export class LineIndex {
  private readonly starts: number[]

  constructor(readonly source: string) {
    const starts = [0]
    let from = 0
    for (let nl = source.indexOf('\n', from); nl !== -1; nl = source.indexOf('\n', from)) {
      from = nl + 1
      starts.push(from)
    }
    this.starts = starts
  }

  get lineCount(): number {
    return this.starts.length
  }

  offsetToPosition(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.source.length))
    let lo = 0
    let hi = this.starts.length - 1
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1
      if (this.starts[mid] <= clamped) {
        lo = mid
      } else {
        hi = mid - 1
      }
    }
    return { line: lo + 1, column: clamped - this.starts[lo] + 1 }
  }

  /** Offset of a 1-based position; the column is clamped to the line. */
  positionToOffset(position: Position): number {
    const range = this.lineRange(position.line)
    const column = Math.max(1, position.column)
    return Math.min(range.start + column - 1, range.end)
  }

  /** Offsets of a 1-based line, `end` excluding the line ending. */
  lineRange(line: number): { start: number; end: number } {
    const index = Math.max(0, Math.min(line - 1, this.starts.length - 1))
    const start = this.starts[index]
    let end = index + 1 < this.starts.length ? this.starts[index + 1] - 1 : this.source.length
    if (end > start && this.source[end - 1] === '\r') end -= 1
    return { start, end }
  }

  lineAt(offset: number): number {
    return this.offsetToPosition(offset).line
  }
}
