import { MergeError } from './errors.js'
import {
  countDeltaOperations,
  extractRequirements,
  normalizeRequirementName,
  type DeltaPlan,
  type Requirement,
} from './extractor.js'
import type { Document } from './markdown/document.js'
import { parse } from './markdown/parser.js'

export interface MergeCounts {
  added: number
  modified: number
  removed: number
  renamed: number
}

export interface MergeResult {
  content: string
  counts: MergeCounts
}

export interface MergeOptions {
  /** Capability directory name, used for the title of a new spec */
  capability: string
}

interface Block {
  name: string
  raw: string
}

/** `archive-workflow` → `Archive Workflow` */
export function formatCapabilityName(capability: string): string {
  return capability
    .split('-')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1) : word))
    .join(' ')
}

function trimTrailingNewlines(text: string): string {
  return text.replace(/\n+$/, '')
}

function renderBlocks(blocks: readonly string[]): string {
  return blocks.length === 0 ? '' : `\n${blocks.map(trimTrailingNewlines).join('\n\n')}\n`
}

interface RequirementsSection {
  /** Everything up to and including the `## Requirements` header line */
  preamble: string
  /** Text between the header and the first requirement */
  lead: string
  requirements: Requirement[]
  /** The next level-2 (or level-1) section onwards */
  trailing: string
}

function splitSpec(document: Document): RequirementsSection | null {
  const { source } = document
  const blocks = document.children(document.root)

  for (let i = 0; i < blocks.length; i++) {
    const header = document.node(blocks[i])
    if (header.type !== 'header' || header.level !== 2 || header.text !== 'Requirements') continue

    let end = source.length
    for (let j = i + 1; j < blocks.length; j++) {
      const next = document.node(blocks[j])
      if (next.type === 'header' && next.level <= 2) {
        end = next.start
        break
      }
    }

    const requirements = extractRequirements(document).filter((r) => r.start >= header.end && r.start < end)
    const leadEnd = requirements.length > 0 ? requirements[0].start : end
    return {
      preamble: source.slice(0, header.end),
      lead: source.slice(header.end, leadEnd).trim(),
      requirements,
      trailing: source.slice(end),
    }
  }
  return null
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`
}

function mergeNewSpec(plan: DeltaPlan, capability: string): MergeResult {
  if (plan.modified.length > 0 || plan.removed.length > 0 || plan.renamed.length > 0) {
    throw new MergeError(
      'MISSING_SPEC',
      `Spec "${capability}" does not exist; only ADDED requirements are allowed for new specs`
    )
  }

  const skeleton = `# ${formatCapabilityName(capability)} Specification\n\n## Requirements\n`
  return {
    content: skeleton + renderBlocks(plan.added.map((r) => r.rawText)),
    counts: { added: plan.added.length, modified: 0, removed: 0, renamed: 0 },
  }
}

/**
 * Apply a delta plan to a base spec.
 *
 * Operations run in the order RENAMED, REMOVED, MODIFIED, ADDED against the
 * `## Requirements` section. Text before and after that section is kept
 * byte for byte. Operations naming a requirement the base does not have are
 * skipped and not counted.
 */
export function mergeSpec(base: string | null, plan: DeltaPlan, options: MergeOptions): MergeResult {
  if (countDeltaOperations(plan) === 0) {
    throw new MergeError('EMPTY_DELTA', `Delta for "${options.capability}" has no operations`)
  }
  if (base === null) return mergeNewSpec(plan, options.capability)

  const counts: MergeCounts = { added: 0, modified: 0, removed: 0, renamed: 0 }
  const section = splitSpec(parse(base))

  let blocks: Block[] = (section?.requirements ?? []).map((r) => ({ name: r.name, raw: r.rawText }))
  const indexOf = (name: string) => {
    const key = normalizeRequirementName(name)
    return blocks.findIndex((b) => normalizeRequirementName(b.name) === key)
  }

  for (const { from, to } of plan.renamed) {
    const i = indexOf(from)
    if (i === -1) continue
    const newline = blocks[i].raw.indexOf('\n')
    const body = newline === -1 ? '' : blocks[i].raw.slice(newline)
    blocks[i] = { name: to, raw: `### Requirement: ${to}${body}` }
    counts.renamed++
  }

  for (const name of plan.removed) {
    const i = indexOf(name)
    if (i === -1) continue
    blocks = blocks.filter((_, j) => j !== i)
    counts.removed++
  }

  for (const req of plan.modified) {
    const i = indexOf(req.name)
    if (i === -1) continue
    blocks[i] = { name: req.name, raw: req.rawText }
    counts.modified++
  }

  for (const req of plan.added) {
    blocks.push({ name: req.name, raw: req.rawText })
    counts.added++
  }

  const raws = blocks.map((b) => b.raw)
  if (!section) {
    return { content: `${withNewline(base)}\n## Requirements\n${renderBlocks(raws)}`, counts }
  }

  const body = renderBlocks(section.lead ? [section.lead, ...raws] : raws)
  const trailing = section.trailing ? `\n${section.trailing}` : ''
  return { content: withNewline(section.preamble) + body + trailing, counts }
}
