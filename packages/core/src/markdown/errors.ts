/**
 * Errors raised by the markdown engine.
 *
 * The engine is permissive: malformed markdown never fails a parse. These are
 * the only conditions callers have to handle.
 */

export type MarkdownErrorCode = 'ENCODING' | 'QUERY_SYNTAX' | 'INCREMENTAL_MISMATCH'

export abstract class MarkdownError extends Error {
  abstract readonly code: MarkdownErrorCode
}

/** Byte input that is not valid UTF-8. */
export class EncodingError extends MarkdownError {
  readonly code = 'ENCODING'

  constructor(readonly byteOffset: number) {
    super(`Invalid UTF-8 sequence at byte ${byteOffset}`)
    this.name = 'EncodingError'
  }
}

/** A selector that does not parse. `position` is the offending index in the selector. */
export class QuerySyntaxError extends MarkdownError {
  readonly code = 'QUERY_SYNTAX'

  constructor(
    readonly selector: string,
    readonly position: number,
    readonly reason: string
  ) {
    super(`${reason} at position ${position} in selector "${selector}"`)
    this.name = 'QuerySyntaxError'
  }
}

/** An edit range that does not lie within the document it is applied to. */
export class IncrementalMismatchError extends MarkdownError {
  readonly code = 'INCREMENTAL_MISMATCH'

  constructor(
    readonly start: number,
    readonly end: number,
    readonly length: number
  ) {
    super(`Edit range [${start}, ${end}) is outside the document (length ${length})`)
    this.name = 'IncrementalMismatchError'
  }
}
