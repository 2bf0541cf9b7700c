import {
  extractRequirements,
  normalizeRequirementName,
  REQUIREMENT_PREFIX,
  SCENARIO_PREFIX,
  type Requirement,
} from './extractor.js'
import type { Document } from './markdown/document.js'
import { incrementalUpdate, type TextEdit } from './markdown/incremental.js'

/**
 * A rewrite of a spec document. Transforms return the input document itself
 * when nothing matched, so callers can compare by identity.
 */
export type Transform = (document: Document) => Document

export interface Replacement extends TextEdit {
  text: string
}

export interface ScenarioInput {
  name: string
  /** Lines under the scenario header, e.g. "- WHEN ...\n- THEN ..." */
  body: string
}

/**
 * Apply non-overlapping replacements as incremental updates, last first so
 * the offsets of earlier ones stay valid.
 */
export function applyReplacements(document: Document, replacements: readonly Replacement[]): Document {
  const ordered = [...replacements].sort((a, b) => b.start - a.start)
  let result = document
  for (const { start, end, text } of ordered) {
    result = incrementalUpdate(result, { start, end }, text)
  }
  return result
}

/** Run transforms left to right, each on the previous result. */
export function pipeline(...transforms: Transform[]): Transform {
  return (document) => transforms.reduce((current, transform) => transform(current), document)
}

export function when(predicate: (document: Document) => boolean, transform: Transform): Transform {
  return (document) => (predicate(document) ? transform(document) : document)
}

function matching(document: Document, name: string): Requirement[] {
  const key = normalizeRequirementName(name)
  return extractRequirements(document).filter((requirement) => normalizeRequirementName(requirement.name) === key)
}

/** End of the top-level blank lines that follow `offset`. */
function blankRunEnd(document: Document, offset: number): number {
  let end = offset
  for (const id of document.children(document.root)) {
    const node = document.node(id)
    if (node.start < end) continue
    if (node.start !== end || node.type !== 'blankLine') break
    end = node.end
  }
  return end
}

/** Rename every requirement called `from` (case-insensitive), keeping the rest of its header line. */
export function renameRequirement(from: string, to: string): Transform {
  return (document) =>
    applyReplacements(
      document,
      matching(document, from).map((requirement) => {
        const { rawText, name } = requirement
        const nameFrom = rawText.indexOf(REQUIREMENT_PREFIX) + REQUIREMENT_PREFIX.length
        const at = requirement.start + rawText.indexOf(name, nameFrom)
        return { start: at, end: at + name.length, text: to }
      })
    )
}

/** Append a `#### Scenario:` block after the last block of every requirement called `requirement`. */
export function addScenario(requirement: string, scenario: ScenarioInput): Transform {
  const body = scenario.body.trim()
  const block = [`#### ${SCENARIO_PREFIX} ${scenario.name}`, ...(body ? [body] : [])].join('\n')
  return (document) =>
    applyReplacements(
      document,
      matching(document, requirement).map(({ end }) => ({
        start: end,
        end,
        text: `${document.source[end - 1] === '\n' ? '' : '\n'}\n${block}\n`,
      }))
    )
}

/** Delete every requirement called `name` together with the blank lines after it. */
export function removeRequirement(name: string): Transform {
  return (document) =>
    applyReplacements(
      document,
      matching(document, name).map(({ start, end }) => ({ start, end: blankRunEnd(document, end), text: '' }))
    )
}
