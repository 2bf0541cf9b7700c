export { AncestryIndex } from './ancestry.js'
export { NodeArena, type ReadonlyArena } from './arena.js'
export { Document } from './document.js'
export {
  EncodingError,
  IncrementalMismatchError,
  MarkdownError,
  QuerySyntaxError,
  type MarkdownErrorCode,
} from './errors.js'
export { applyEdit, incrementalUpdate, type TextEdit } from './incremental.js'
export { parseWikiLinkContent } from './inline.js'
export { inlineStart, Lexer, tokenize, type LexedLine } from './lexer.js'
export { LineIndex, type Position } from './line-index.js'
export * from './nodes.js'
export { PositionIndex, type Section } from './position.js'
export { parse, safeParse, type SafeParseResult } from './parser.js'
export {
  attributeOf,
  count,
  exists,
  find,
  findFirst,
  parseSelector,
  query,
  QueryResult,
  type NodeHandle,
  type SelectorAttribute,
  type SelectorKind,
} from './query.js'
export { sameStructure, structureDiff } from './structure.js'
export { matchTaskLine, type TaskLineMatch } from './task-line.js'
export { indentWidth, tokenText, type Span, type Token, type TokenKind } from './token.js'
export { decodeUtf8, findInvalidUtf8 } from './utf8.js'
export { walk, type VisitContext, type Visitor, type VisitSignal } from './visitor.js'
