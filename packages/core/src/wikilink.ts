import { readFile, stat } from 'fs/promises'
import { join } from 'path'
import type { Document } from './markdown/document.js'
import { parse } from './markdown/parser.js'

export type WikilinkKind = 'spec' | 'change'

export interface WikilinkResolution {
  /** Candidate file for the target; the last one tried when nothing exists */
  path: string
  exists: boolean
  kind: WikilinkKind
}

/** A `[[target#anchor|display]]` occurrence in a document */
export interface WikilinkRef {
  target: string
  anchor: string | null
  line: number
}

export type WikilinkStatus = 'resolved' | 'missing-target' | 'missing-anchor'

export interface CheckedWikilink extends WikilinkRef {
  status: WikilinkStatus
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

interface Candidate {
  path: string
  kind: WikilinkKind
}

function candidates(target: string, rootDir: string): [Candidate, ...Candidate[]] {
  if (target.startsWith('specs/')) {
    return [{ path: join(rootDir, 'specs', target.slice('specs/'.length), 'spec.md'), kind: 'spec' }]
  }
  if (target.startsWith('changes/')) {
    return [{ path: join(rootDir, 'changes', target.slice('changes/'.length), 'proposal.md'), kind: 'change' }]
  }
  return [
    { path: join(rootDir, 'specs', target, 'spec.md'), kind: 'spec' },
    { path: join(rootDir, 'changes', target, 'proposal.md'), kind: 'change' },
  ]
}

/**
 * Resolve a wikilink target against the specloom root directory.
 * Bare targets are looked up as specs first, then as changes.
 */
export async function resolveWikilink(target: string, rootDir: string): Promise<WikilinkResolution> {
  const hash = target.indexOf('#')
  const name = (hash === -1 ? target : target.slice(0, hash)).trim()

  const tries = candidates(name, rootDir)
  for (const candidate of tries) {
    if (await fileExists(candidate.path)) return { ...candidate, exists: true }
  }
  const [first] = tries
  return { ...(tries.at(-1) ?? first), exists: false }
}

/**
 * Whether a document has a header the anchor points at.
 * `Requirement: X` and `Scenario: X` anchors only match headers of their level.
 */
export function anchorExists(content: string, anchor: string): boolean {
  const wanted = anchor.trim().toLowerCase()
  const kind = wanted.startsWith('requirement:') ? 'h3' : wanted.startsWith('scenario:') ? 'h4' : 'header'

  for (const { node } of parse(content).query(kind)) {
    if (node.type === 'header' && node.text.toLowerCase() === wanted) return true
  }
  return false
}

/** Every wikilink of a document, in document order. */
export function collectWikilinks(document: Document): WikilinkRef[] {
  const refs: WikilinkRef[] = []
  for (const { id, node } of document.query('wikilink')) {
    if (node.type === 'wikiLink') refs.push({ target: node.target, anchor: node.anchor, line: document.line(id) })
  }
  return refs
}

/**
 * Resolve every wikilink of a document. Anchors are checked against the
 * target file's headers.
 */
export async function checkWikilinks(document: Document, rootDir: string): Promise<CheckedWikilink[]> {
  const checked: CheckedWikilink[] = []
  const contents = new Map<string, string>()

  for (const ref of collectWikilinks(document)) {
    const resolution = await resolveWikilink(ref.target, rootDir)
    if (!resolution.exists) {
      checked.push({ ...ref, status: 'missing-target' })
      continue
    }
    if (ref.anchor === null) {
      checked.push({ ...ref, status: 'resolved' })
      continue
    }

    let content = contents.get(resolution.path)
    if (content === undefined) {
      content = await readFile(resolution.path, 'utf-8')
      contents.set(resolution.path, content)
    }
    checked.push({ ...ref, status: anchorExists(content, ref.anchor) ? 'resolved' : 'missing-anchor' })
  }

  return checked
}
