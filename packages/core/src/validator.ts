import { countDeltaOperations, normalizeRequirementName, type DeltaPlan } from './extractor.js'
import type { Change, Spec } from './schemas.js'
import type { CheckedWikilink } from './wikilink.js'

export interface ValidationIssue {
  severity: 'ERROR' | 'WARNING' | 'INFO'
  message: string
  path?: string
  /** 1-based line in the validated file */
  line?: number
}

export interface ValidationResult {
  valid: boolean
  issues: ValidationIssue[]
}

export interface ValidatorOptions {
  /** Report warnings as errors */
  strict?: boolean
}

/**
 * Validator for specloom documents
 */
export class Validator {
  constructor(private readonly options: ValidatorOptions = {}) {}

  private result(issues: ValidationIssue[]): ValidationResult {
    const reported = this.options.strict
      ? issues.map((i): ValidationIssue => (i.severity === 'WARNING' ? { ...i, severity: 'ERROR' } : i))
      : issues
    return {
      valid: reported.filter((i) => i.severity === 'ERROR').length === 0,
      issues: reported,
    }
  }

  /**
   * Validate a spec document
   */
  validateSpec(spec: Spec): ValidationResult {
    const issues: ValidationIssue[] = []

    // Check overview
    if (!spec.overview || spec.overview.trim().length === 0) {
      issues.push({
        severity: 'ERROR',
        message: 'Spec must have a Purpose/Overview section',
        path: 'overview',
      })
    }

    // Check requirements
    if (spec.requirements.length === 0) {
      issues.push({
        severity: 'ERROR',
        message: 'Spec must have at least one requirement',
        path: 'requirements',
      })
    }

    const seen = new Set<string>()

    // Validate each requirement
    for (const req of spec.requirements) {
      const path = `requirements.${req.name}`

      const key = normalizeRequirementName(req.name)
      if (seen.has(key)) {
        issues.push({
          severity: 'ERROR',
          message: `Duplicate requirement: ${req.name}`,
          path,
          line: req.line,
        })
      }
      seen.add(key)

      if (!req.text.includes('SHALL') && !req.text.includes('MUST')) {
        issues.push({
          severity: 'WARNING',
          message: `Requirement should contain "SHALL" or "MUST": ${req.name}`,
          path,
          line: req.line,
        })
      }

      if (req.scenarios.length === 0) {
        issues.push({
          severity: 'WARNING',
          message: `Requirement should have at least one scenario: ${req.name}`,
          path: `${path}.scenarios`,
          line: req.line,
        })
      }

      // Check requirement text length
      if (req.text.length > 1000) {
        issues.push({
          severity: 'WARNING',
          message: `Requirement text is too long (max 1000 chars): ${req.name}`,
          path: `${path}.text`,
          line: req.line,
        })
      }
    }

    return this.result(issues)
  }

  /**
   * Validate the delta spec of a change against the spec it targets.
   * `base` is null when the change creates the spec.
   */
  validateDelta(specId: string, plan: DeltaPlan, base: Spec | null): ValidationResult {
    const issues: ValidationIssue[] = []
    const path = `specs/${specId}`

    if (countDeltaOperations(plan) === 0) {
      issues.push({
        severity: 'ERROR',
        message: `Delta for "${specId}" has no ADDED, MODIFIED, REMOVED or RENAMED requirements`,
        path,
      })
      return this.result(issues)
    }

    const existing = new Set(base?.requirements.map((r) => normalizeRequirementName(r.name)) ?? [])
    const missing = (name: string, line?: number) => {
      if (existing.has(normalizeRequirementName(name))) return
      issues.push({
        severity: 'ERROR',
        message: base
          ? `Requirement "${name}" does not exist in spec "${specId}"`
          : `Spec "${specId}" does not exist, only ADDED requirements are allowed`,
        path,
        line,
      })
    }

    for (const req of [...plan.added, ...plan.modified]) {
      if (req.scenarios.length === 0) {
        issues.push({
          severity: 'ERROR',
          message: `Requirement must have at least one scenario: ${req.name}`,
          path,
          line: req.line,
        })
      }
    }

    for (const req of plan.added) {
      if (existing.has(normalizeRequirementName(req.name))) {
        issues.push({
          severity: 'ERROR',
          message: `ADDED requirement "${req.name}" already exists in spec "${specId}"`,
          path,
          line: req.line,
        })
      }
    }
    for (const req of plan.modified) missing(req.name, req.line)
    for (const name of plan.removed) missing(name)
    for (const rename of plan.renamed) missing(rename.from)

    // A requirement may appear in one section only
    const sections = new Map<string, string>()
    const claim = (name: string, section: string, line?: number) => {
      const key = normalizeRequirementName(name)
      const previous = sections.get(key)
      if (previous !== undefined) {
        issues.push({
          severity: 'ERROR',
          message: `Requirement "${name}" appears in both ${previous} and ${section}`,
          path,
          line,
        })
        return
      }
      sections.set(key, section)
    }
    for (const req of plan.added) claim(req.name, 'ADDED', req.line)
    for (const req of plan.modified) claim(req.name, 'MODIFIED', req.line)
    for (const name of plan.removed) claim(name, 'REMOVED')
    for (const rename of plan.renamed) claim(rename.from, 'RENAMED')

    return this.result(issues)
  }

  /**
   * Validate a change proposal
   */
  validateChange(change: Change): ValidationResult {
    const issues: ValidationIssue[] = []

    // Check why section
    if (!change.why || change.why.length < 50) {
      issues.push({
        severity: 'ERROR',
        message: 'Change "Why" section must be at least 50 characters',
        path: 'why',
      })
    }

    if (change.why && change.why.length > 500) {
      issues.push({
        severity: 'WARNING',
        message: 'Change "Why" section should be under 500 characters',
        path: 'why',
      })
    }

    // Check whatChanges section
    if (!change.whatChanges || change.whatChanges.trim().length === 0) {
      issues.push({
        severity: 'ERROR',
        message: 'Change must have a "What Changes" section',
        path: 'whatChanges',
      })
    }

    // Check deltas
    if (change.deltas.length === 0) {
      issues.push({
        severity: 'WARNING',
        message: 'Change should have at least one delta',
        path: 'deltas',
      })
    }

    if (change.deltas.length > 50) {
      issues.push({
        severity: 'WARNING',
        message: 'Change has too many deltas (max 50)',
        path: 'deltas',
      })
    }

    return this.result(issues)
  }

  /**
   * Report wikilinks of one file whose target or anchor does not exist
   */
  validateWikilinks(path: string, links: readonly CheckedWikilink[]): ValidationResult {
    const issues: ValidationIssue[] = []

    for (const link of links) {
      if (link.status === 'missing-target') {
        issues.push({
          severity: 'ERROR',
          message: `Unresolved wikilink: [[${link.target}]]`,
          path,
          line: link.line,
        })
      } else if (link.status === 'missing-anchor') {
        issues.push({
          severity: 'WARNING',
          message: `Wikilink anchor not found: [[${link.target}#${link.anchor ?? ''}]]`,
          path,
          line: link.line,
        })
      }
    }

    return this.result(issues)
  }
}

/** Combine results, e.g. a change proposal and its deltas. */
export function mergeResults(...results: ValidationResult[]): ValidationResult {
  const issues = results.flatMap((r) => r.issues)
  return {
    valid: results.every((r) => r.valid),
    issues,
  }
}
