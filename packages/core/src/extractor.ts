import type { Document } from './markdown/document.js'
import type { HeaderNode, NodeId } from './markdown/nodes.js'
import type { Section } from './markdown/position.js'
import { walk } from './markdown/visitor.js'

export const REQUIREMENT_PREFIX = 'Requirement:'
export const SCENARIO_PREFIX = 'Scenario:'

/**
 * A `### Requirement:` block as written in a spec or delta document.
 */
export interface Requirement {
  name: string
  /** The header line as printed when the block is renamed, e.g. "### Requirement: Login" */
  headerLine: string
  /** 1-based line of the header */
  line: number
  /** Source offsets of the block, from the header to its last non-blank block */
  start: number
  end: number
  rawText: string
  /** Names of the `#### Scenario:` headers in the block */
  scenarios: string[]
}

export interface RenameOp {
  from: string
  to: string
}

export interface DeltaPlan {
  added: Requirement[]
  modified: Requirement[]
  removed: string[]
  renamed: RenameOp[]
}

export type DeltaOperation = 'ADDED' | 'MODIFIED' | 'REMOVED' | 'RENAMED'

type DeltaSection = DeltaOperation | null

/** Key used to compare requirement names. */
export function normalizeRequirementName(name: string): string {
  return name.trim().toLowerCase()
}

export function countDeltaOperations(plan: DeltaPlan): number {
  return plan.added.length + plan.modified.length + plan.removed.length + plan.renamed.length
}

function prefixedName(text: string, prefix: string): string | null {
  return text.startsWith(prefix) ? text.slice(prefix.length).trim() : null
}

/** Name of a `### Requirement:` header, or null for any other header. */
export function requirementHeaderName(header: HeaderNode): string | null {
  return header.level === 3 ? prefixedName(header.text, REQUIREMENT_PREFIX) : null
}

/** Name of a `#### Scenario:` header, or null for any other header. */
export function scenarioHeaderName(header: HeaderNode): string | null {
  return header.level === 4 ? prefixedName(header.text, SCENARIO_PREFIX) : null
}

export interface NamedSection extends Section {
  name: string
}

function enclosingNamed(
  document: Document,
  offset: number,
  nameOf: (header: HeaderNode) => string | null
): NamedSection | undefined {
  const section = document.enclosingSection(offset, (header) => nameOf(header) !== null)
  const name = section ? nameOf(section.header) : null
  return section && name !== null ? { ...section, name } : undefined
}

/** The `### Requirement:` section containing a source offset. */
export function enclosingRequirement(document: Document, offset: number): NamedSection | undefined {
  return enclosingNamed(document, offset, requirementHeaderName)
}

/** The `#### Scenario:` section containing a source offset. */
export function enclosingScenario(document: Document, offset: number): NamedSection | undefined {
  return enclosingNamed(document, offset, scenarioHeaderName)
}

function sectionOf(header: HeaderNode): DeltaSection {
  for (const operation of ['ADDED', 'MODIFIED', 'REMOVED', 'RENAMED'] as const) {
    if (header.text.includes(`${operation} Requirements`)) return operation
  }
  return null
}

/** Builds one requirement from top-level blocks, widening it block by block. */
class RequirementBuilder {
  private readonly scenarios: string[] = []
  private end: number

  constructor(
    private readonly document: Document,
    private readonly header: NodeId,
    private readonly name: string
  ) {
    this.end = document.node(header).end
  }

  addScenario(name: string): void {
    this.scenarios.push(name)
  }

  extend(id: NodeId): void {
    const node = this.document.node(id)
    if (node.type !== 'blankLine') this.end = node.end
  }

  build(): Requirement {
    const start = this.document.node(this.header).start
    return {
      name: this.name,
      headerLine: `### ${REQUIREMENT_PREFIX} ${this.name}`,
      line: this.document.line(this.header),
      start,
      end: this.end,
      rawText: this.document.source.slice(start, this.end),
      scenarios: this.scenarios,
    }
  }
}

/**
 * Every `### Requirement:` block of a document, closed by the next
 * requirement or by a header of level 2 or less.
 */
export function extractRequirements(document: Document): Requirement[] {
  const requirements: Requirement[] = []
  let current: RequirementBuilder | null = null

  for (const id of document.children(document.root)) {
    const node = document.node(id)
    if (node.type === 'header') {
      const name = requirementHeaderName(node)
      if (name !== null) {
        if (current) requirements.push(current.build())
        current = new RequirementBuilder(document, id, name)
        continue
      }
      if (node.level <= 2) {
        if (current) requirements.push(current.build())
        current = null
        continue
      }
      const scenario = scenarioHeaderName(node)
      if (scenario !== null && current) current.addScenario(scenario)
    }
    current?.extend(id)
  }

  if (current) requirements.push(current.build())
  return requirements
}

function renameTarget(text: string): string | null {
  const at = text.indexOf(REQUIREMENT_PREFIX)
  if (at === -1) return null
  const name = text
    .slice(at + REQUIREMENT_PREFIX.length)
    .trim()
    .replace(/^`+|`+$/g, '')
    .trim()
  return name === '' ? null : name
}

/**
 * Classify the requirements of a delta document by their
 * `## ADDED|MODIFIED|REMOVED|RENAMED Requirements` section.
 *
 * Incomplete sections produce empty lists; judging them is the validator's job.
 */
export function extractDelta(document: Document): DeltaPlan {
  const plan: DeltaPlan = { added: [], modified: [], removed: [], renamed: [] }
  let section: DeltaSection = null
  let current: RequirementBuilder | null = null
  let pendingFrom: string | null = null

  const flush = () => {
    if (!current) return
    if (section === 'ADDED') plan.added.push(current.build())
    if (section === 'MODIFIED') plan.modified.push(current.build())
    current = null
  }

  for (const id of document.children(document.root)) {
    const node = document.node(id)

    if (node.type === 'header') {
      if (node.level <= 2) {
        flush()
        section = node.level === 2 ? sectionOf(node) : null
        pendingFrom = null
        continue
      }
      const name = requirementHeaderName(node)
      if (name !== null) {
        flush()
        if (section === 'ADDED' || section === 'MODIFIED') {
          current = new RequirementBuilder(document, id, name)
        } else if (section === 'REMOVED') {
          plan.removed.push(name)
        }
        continue
      }
      const scenario = scenarioHeaderName(node)
      if (scenario !== null && current) current.addScenario(scenario)
      current?.extend(id)
      continue
    }

    if (node.type === 'list' && section === 'RENAMED') {
      walk(
        document,
        {
          listItem: (item) => {
            if (item.text.includes('FROM:')) {
              pendingFrom = renameTarget(item.text)
            } else if (item.text.includes('TO:') && pendingFrom !== null) {
              const to = renameTarget(item.text)
              if (to !== null) {
                plan.renamed.push({ from: pendingFrom, to })
                pendingFrom = null
              }
            }
          },
        },
        id
      )
      continue
    }

    current?.extend(id)
  }

  flush()
  return plan
}
