import type { NodeArena } from './arena.js'
import type { NodeId, WikiLinkNode } from './nodes.js'
import type { Token } from './token.js'

type Atom =
  | { kind: 'text'; start: number; end: number }
  | { kind: 'node'; id: NodeId; start: number; end: number }
  | { kind: 'delimiter'; ch: string; length: number; start: number; end: number }

type DelimiterAtom = Extract<Atom, { kind: 'delimiter' }>

/** Split `[[target#anchor|display]]` content into its parts. */
export function parseWikiLinkContent(raw: string): Pick<WikiLinkNode, 'target' | 'anchor' | 'display'> {
  const pipe = raw.indexOf('|')
  const link = pipe === -1 ? raw : raw.slice(0, pipe)
  const display = pipe === -1 ? null : raw.slice(pipe + 1).trim() || null
  const hash = link.indexOf('#')
  const target = (hash === -1 ? link : link.slice(0, hash)).trim()
  const anchor = hash === -1 ? null : link.slice(hash + 1).trim() || null
  return { target, anchor, display }
}

function codeSpanContent(raw: string): string {
  if (raw.length >= 2 && raw.startsWith(' ') && raw.endsWith(' ') && raw.trim() !== '') {
    return raw.slice(1, -1)
  }
  return raw
}

/** Index of the next code span delimiter with the same run length, per token. */
function nextCodeDelimiter(tokens: readonly Token[]): number[] {
  const next = new Array<number>(tokens.length).fill(-1)
  const seen = new Map<number, number>()
  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = tokens[i]
    if (token.kind !== 'codeSpanDelimiter') continue
    const length = token.end - token.start
    next[i] = seen.get(length) ?? -1
    seen.set(length, i)
  }
  return next
}

/** Index of the first `]]` after each token. */
function nextWikiLinkClose(tokens: readonly Token[]): number[] {
  const next = new Array<number>(tokens.length).fill(-1)
  let seen = -1
  for (let i = tokens.length - 1; i >= 0; i--) {
    next[i] = seen
    if (tokens[i].kind === 'wikiLinkClose') seen = i
  }
  return next
}

/**
 * Inline pass over the content tokens of one line.
 *
 * Code spans and wikilinks bind first, left to right; emphasis is then
 * resolved over what remains. Unmatched delimiters fall back to text, and the
 * returned nodes cover `[from, to)` without gaps.
 */
export function parseInline(
  source: string,
  tokens: readonly Token[],
  from: number,
  to: number,
  arena: NodeArena
): NodeId[] {
  if (from >= to) return []

  const codeNext = nextCodeDelimiter(tokens)
  const closeNext = nextWikiLinkClose(tokens)
  const atoms: Atom[] = []

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i]
    if (token.kind === 'codeSpanDelimiter') {
      const j = codeNext[i]
      if (j !== -1) {
        const end = tokens[j].end
        const code = codeSpanContent(source.slice(token.end, tokens[j].start))
        atoms.push({
          kind: 'node',
          id: arena.alloc({ type: 'inlineCode', start: token.start, end, code }),
          start: token.start,
          end,
        })
        i = j
        continue
      }
    } else if (token.kind === 'wikiLinkOpen') {
      const j = closeNext[i]
      if (j !== -1) {
        const raw = source.slice(token.end, tokens[j].start)
        if (raw.trim() !== '') {
          const end = tokens[j].end
          atoms.push({
            kind: 'node',
            id: arena.alloc({ type: 'wikiLink', start: token.start, end, ...parseWikiLinkContent(raw) }),
            start: token.start,
            end,
          })
          i = j
          continue
        }
      }
    } else if (token.kind === 'emphasisDelimiter') {
      atoms.push({
        kind: 'delimiter',
        ch: source[token.start],
        length: token.end - token.start,
        start: token.start,
        end: token.end,
      })
      continue
    }
    atoms.push({ kind: 'text', start: token.start, end: token.end })
  }

  return resolveEmphasis(source, atoms, 0, atoms.length, from, to, arena)
}

function canOpen(source: string, atom: DelimiterAtom, to: number): boolean {
  const after = atom.end < to ? source[atom.end] : undefined
  return after !== undefined && !/\s/.test(after)
}

function canClose(source: string, atom: DelimiterAtom, from: number): boolean {
  const before = atom.start > from ? source[atom.start - 1] : undefined
  return before !== undefined && !/\s/.test(before)
}

function resolveEmphasis(
  source: string,
  atoms: readonly Atom[],
  lo: number,
  hi: number,
  from: number,
  to: number,
  arena: NodeArena
): NodeId[] {
  const out: NodeId[] = []
  let textStart = -1
  let textEnd = -1
  const flushText = () => {
    if (textStart !== -1 && textEnd > textStart) {
      out.push(arena.alloc({ type: 'text', start: textStart, end: textEnd, value: source.slice(textStart, textEnd) }))
    }
    textStart = -1
  }
  const addText = (start: number, end: number) => {
    if (textStart === -1) textStart = start
    textEnd = end
  }
  // delimiter keys that found no closer in the rest of this range
  const exhausted = new Set<string>()

  for (let i = lo; i < hi; i++) {
    const atom = atoms[i]
    if (atom.kind === 'text') {
      addText(atom.start, atom.end)
      continue
    }
    if (atom.kind === 'node') {
      flushText()
      out.push(atom.id)
      continue
    }

    const key = `${atom.ch}${atom.length}`
    if (atom.length > 2 || exhausted.has(key) || !canOpen(source, atom, to)) {
      addText(atom.start, atom.end)
      continue
    }

    let closer = -1
    for (let j = i + 1; j < hi; j++) {
      const candidate = atoms[j]
      if (
        candidate.kind === 'delimiter' &&
        candidate.ch === atom.ch &&
        candidate.length === atom.length &&
        canClose(source, candidate, from)
      ) {
        closer = j
        break
      }
    }
    if (closer === -1) {
      exhausted.add(key)
      addText(atom.start, atom.end)
      continue
    }

    const close = atoms[closer]
    flushText()
    const inner = resolveEmphasis(source, atoms, i + 1, closer, from, to, arena)
    const children = [
      arena.alloc({ type: 'marker', start: atom.start, end: atom.end }),
      ...inner,
      arena.alloc({ type: 'marker', start: close.start, end: close.end }),
    ]
    out.push(arena.alloc({ type: atom.length === 1 ? 'emphasis' : 'strong', start: atom.start, end: close.end, children }))
    i = closer
  }
  flushText()
  return out
}
