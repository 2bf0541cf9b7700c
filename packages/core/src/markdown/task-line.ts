import { inlineStart, Lexer } from './lexer.js'
import { tokenText } from './token.js'

export interface TaskLineMatch {
  /** Dotted task ID without a trailing dot, or null when the line has none */
  id: string | null
  checked: boolean
  description: string
}

/**
 * Match a single `- [ ] 1.2 Description` line. Only the first line of the
 * input is considered.
 */
export function matchTaskLine(line: string): TaskLineMatch | null {
  const lexed = new Lexer(line).nextLine()
  if (!lexed) return null

  const mark = lexed.tokens.find((token) => token.kind === 'checkboxMark')
  if (!mark) return null

  const id = lexed.tokens.find((token) => token.kind === 'taskId')
  return {
    id: id ? tokenText(line, id).replace(/\.$/, '') : null,
    checked: line[mark.start] !== ' ',
    description: line.slice(inlineStart(lexed), lexed.contentEnd).trim(),
  }
}
