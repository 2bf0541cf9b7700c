import { extractDelta, extractRequirements, scenarioHeaderName, type DeltaPlan } from './extractor.js'
import type { Document } from './markdown/document.js'
import { parse } from './markdown/parser.js'
import type { Change, Delta, Requirement, Scenario, Spec, Task } from './schemas.js'
import { flattenTaskSections, parseTaskSections } from './tasks.js'

/** A delta spec file of a change: `changes/<change>/specs/<spec>/spec.md` */
export interface DeltaSpecSource {
  spec: string
  content: string
}

/** Body of the first level-2 section whose title matches, trimmed; '' when absent. */
function sectionBody(document: Document, title: RegExp): string {
  const blocks = document.children(document.root)
  for (let i = 0; i < blocks.length; i++) {
    const header = document.node(blocks[i])
    if (header.type !== 'header' || header.level !== 2 || !title.test(header.text)) continue

    let end = document.source.length
    for (let j = i + 1; j < blocks.length; j++) {
      const next = document.node(blocks[j])
      if (next.type === 'header' && next.level <= 2) {
        end = next.start
        break
      }
    }
    return document.source.slice(header.end, end).trim()
  }
  return ''
}

function documentTitle(document: Document): string | null {
  for (const id of document.children(document.root)) {
    const node = document.node(id)
    if (node.type === 'header' && node.level === 1) return node.text
  }
  return null
}

/** Flatten a delta plan into one entry per requirement change. */
export function deltasFromPlan(spec: string, plan: DeltaPlan): Delta[] {
  return [
    ...plan.added.map(
      (req): Delta => ({ spec, operation: 'ADDED', requirement: req.name, scenarios: req.scenarios, line: req.line })
    ),
    ...plan.modified.map(
      (req): Delta => ({ spec, operation: 'MODIFIED', requirement: req.name, scenarios: req.scenarios, line: req.line })
    ),
    ...plan.removed.map((name): Delta => ({ spec, operation: 'REMOVED', requirement: name, scenarios: [] })),
    ...plan.renamed.map(
      (rename): Delta => ({ spec, operation: 'RENAMED', requirement: rename.to, scenarios: [], rename })
    ),
  ]
}

/**
 * Markdown parser for specloom documents
 */
export class MarkdownParser {
  /**
   * Parse a spec markdown content into a Spec object
   */
  parseSpec(specId: string, content: string): Spec {
    const document = parse(content)

    return {
      id: specId,
      name: documentTitle(document) || specId,
      overview: sectionBody(document, /purpose|overview/i),
      requirements: this.parseRequirements(document),
      metadata: {
        version: '1.0.0',
        format: 'specloom',
      },
    }
  }

  /**
   * Requirements with their statement and scenario bodies
   */
  parseRequirements(document: Document): Requirement[] {
    const { source } = document
    const blocks = document.children(document.root)

    return extractRequirements(document).map((req) => {
      let text = ''
      const scenarios: Scenario[] = []
      let open: { name: string; bodyStart: number } | null = null

      const closeScenario = (end: number) => {
        if (open) scenarios.push({ name: open.name, rawText: source.slice(open.bodyStart, end).trim() })
        open = null
      }

      for (const id of blocks) {
        const node = document.node(id)
        if (node.start <= req.start || node.start >= req.end) continue
        const scenario = node.type === 'header' ? scenarioHeaderName(node) : null
        if (scenario !== null) {
          closeScenario(node.start)
          open = { name: scenario, bodyStart: node.end }
        } else if (!open) {
          text += source.slice(node.start, node.end)
        }
      }
      closeScenario(req.end)

      return { name: req.name, text: text.trim(), scenarios, line: req.line }
    })
  }

  /**
   * Parse a change proposal markdown content into a Change object
   */
  parseChange(
    changeId: string,
    proposalContent: string,
    tasksContent: string = '',
    deltaSpecs: readonly DeltaSpecSource[] = []
  ): Change {
    const document = parse(proposalContent)
    const deltas = deltaSpecs.flatMap(({ spec, content }) => deltasFromPlan(spec, extractDelta(parse(content))))
    const tasks = this.parseTasks(tasksContent)

    return {
      id: changeId,
      name: documentTitle(document) || changeId,
      why: sectionBody(document, /^why\b/i),
      whatChanges: sectionBody(document, /^what\b/i),
      deltas,
      tasks,
      progress: {
        total: tasks.length,
        completed: tasks.filter((t) => t.completed).length,
      },
    }
  }

  /**
   * Parse tasks from a tasks.md content
   */
  parseTasks(content: string): Task[] {
    if (!content) return []

    return flattenTaskSections(parseTaskSections(parse(content))).map(({ task, section }) => ({
      id: task.id,
      text: task.description,
      completed: task.completed,
      section: section.name || undefined,
      line: task.line,
    }))
  }
}
