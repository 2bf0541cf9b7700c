import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import {
  AdapterError,
  addScenario,
  countDeltaOperations,
  enclosingRequirement,
  enclosingScenario,
  extractDelta,
  parse,
  removeRequirement,
  renameRequirement,
  SpecAdapter,
  type SpecAdapterOptions,
  type Transform,
  type ValidationIssue,
  type ValidationResult,
} from '@specloom/core'

export interface GlobalOptions {
  /** Directory to start looking for the project from */
  dir: string
  /** Print machine-readable JSON instead of text */
  json: boolean
}

export type ItemKind = 'spec' | 'change'

/**
 * Print `data` as JSON, or the text lines otherwise
 */
function output(options: GlobalOptions, data: unknown, lines: () => string[]): void {
  if (options.json) {
    console.log(JSON.stringify(data, null, 2))
    return
  }
  for (const line of lines()) console.log(line)
}

async function openProject(options: GlobalOptions, overrides: SpecAdapterOptions = {}): Promise<SpecAdapter> {
  const adapter = await SpecAdapter.fromConfig(resolve(options.dir), overrides)
  await adapter.assertInitialized()
  return adapter
}

async function resolveKind(adapter: SpecAdapter, item: string, kind?: ItemKind): Promise<ItemKind> {
  if (kind) return kind
  return (await adapter.listSpecs()).includes(item) ? 'spec' : 'change'
}

function formatIssue(issue: ValidationIssue): string {
  const where = issue.line === undefined ? '' : ` (line ${issue.line})`
  return `  ${issue.severity}: ${issue.message}${where}`
}

// =====================
// Project
// =====================

export async function initCommand(options: GlobalOptions): Promise<void> {
  const adapter = await SpecAdapter.fromConfig(resolve(options.dir))
  await adapter.init()
  output(options, { rootDir: adapter.rootDir }, () => [`Initialized specloom project in ${adapter.rootDir}`])
}

export interface ListOptions extends GlobalOptions {
  specs: boolean
  archived: boolean
}

export async function listCommand(options: ListOptions): Promise<void> {
  const adapter = await openProject(options)

  if (options.specs) {
    const specs = await adapter.listSpecsWithMeta()
    output(options, specs, () =>
      specs.length === 0 ? ['No specs found.'] : specs.map((s) => `${s.id}  ${s.name}  (${s.requirementCount} requirements)`)
    )
    return
  }

  if (options.archived) {
    const archived = await adapter.listArchivedChanges()
    output(options, archived, () => (archived.length === 0 ? ['No archived changes.'] : archived))
    return
  }

  const changes = await adapter.listChangesWithMeta()
  output(options, changes, () =>
    changes.length === 0
      ? ['No active changes.']
      : changes.map((c) => `${c.id}  ${c.name}  [${c.progress.completed}/${c.progress.total} tasks]`)
  )
}

export interface ShowOptions extends GlobalOptions {
  item: string
  type?: ItemKind
}

export async function showCommand(options: ShowOptions): Promise<void> {
  const adapter = await openProject(options)
  const kind = await resolveKind(adapter, options.item, options.type)

  if (kind === 'spec') {
    const spec = await adapter.readSpec(options.item)
    if (!spec) throw new AdapterError('SPEC_NOT_FOUND', `Spec '${options.item}' not found`)
    output(options, spec, () => [
      `# ${spec.name}`,
      '',
      spec.overview,
      '',
      `Requirements (${spec.requirements.length}):`,
      ...spec.requirements.map((r) => `- ${r.name} (${r.scenarios.length} scenarios)`),
    ])
    return
  }

  const change = await adapter.readChange(options.item)
  if (!change) throw new AdapterError('CHANGE_NOT_FOUND', `Change '${options.item}' not found`)
  output(options, change, () => [
    `# ${change.name}`,
    '',
    `Tasks: ${change.progress.completed}/${change.progress.total}`,
    `Deltas (${change.deltas.length}):`,
    ...change.deltas.map((d) =>
      d.rename
        ? `- ${d.operation} ${d.spec}: ${d.rename.from} -> ${d.rename.to}`
        : `- ${d.operation} ${d.spec}: ${d.requirement}`
    ),
  ])
}

// =====================
// Validation
// =====================

export interface ValidateOptions extends GlobalOptions {
  item?: string
  type?: ItemKind
  strict: boolean
}

interface ValidatedItem extends ValidationResult {
  item: string
}

/**
 * Validate one item, or every spec and change of the project
 * @returns whether everything is valid
 */
export async function validateCommand(options: ValidateOptions): Promise<boolean> {
  const adapter = await openProject(options, options.strict ? { strict: true } : {})

  const targets: Array<{ kind: ItemKind; id: string }> = []
  if (options.item) {
    targets.push({ kind: await resolveKind(adapter, options.item, options.type), id: options.item })
  } else {
    for (const id of await adapter.listSpecs()) targets.push({ kind: 'spec', id })
    for (const id of await adapter.listChanges()) targets.push({ kind: 'change', id })
  }

  const results: ValidatedItem[] = []
  for (const { kind, id } of targets) {
    const result = kind === 'spec' ? await adapter.validateSpec(id) : await adapter.validateChange(id)
    results.push({ item: `${kind}s/${id}`, ...result })
  }

  output(options, results, () => {
    if (results.length === 0) return ['Nothing to validate.']
    return results.flatMap((r) => [`${r.valid ? '✓' : '✗'} ${r.item}`, ...r.issues.map(formatIssue)])
  })
  return results.every((r) => r.valid)
}

// =====================
// Documents
// =====================

export interface FileOptions extends GlobalOptions {
  file: string
}

async function readDocument(options: FileOptions) {
  return parse(await readFile(resolve(options.dir, options.file), 'utf-8'))
}

export interface QueryOptions extends FileOptions {
  selector: string
}

export async function queryCommand(options: QueryOptions): Promise<void> {
  const document = await readDocument(options)
  const matches = [...document.query(options.selector)].map(({ id, node }) => ({
    id,
    type: node.type,
    line: document.line(id),
    text: document.text(id).split(/\r?\n/)[0],
  }))

  output(options, matches, () =>
    matches.length === 0 ? ['No matches.'] : matches.map((m) => `${m.line}: ${m.type} ${m.text}`)
  )
}

export interface LocateOptions extends FileOptions {
  line: number
}

/**
 * Show the node, section, requirement and scenario at the start of a line
 */
export async function locateCommand(options: LocateOptions): Promise<void> {
  const document = await readDocument(options)
  const offset = document.lineIndex.positionToOffset({ line: options.line, column: 1 })
  const location = {
    line: options.line,
    node: document.nodeAt(offset)?.node.type ?? null,
    section: document.enclosingSection(offset)?.header.text ?? null,
    requirement: enclosingRequirement(document, offset)?.name ?? null,
    scenario: enclosingScenario(document, offset)?.name ?? null,
  }

  output(options, location, () => [
    `${location.line}: ${location.node ?? 'end of file'}`,
    ...(location.section === null ? [] : [`section: ${location.section}`]),
    ...(location.requirement === null ? [] : [`requirement: ${location.requirement}`]),
    ...(location.scenario === null ? [] : [`scenario: ${location.scenario}`]),
  ])
}

export async function deltaCommand(options: FileOptions): Promise<void> {
  const plan = extractDelta(await readDocument(options))

  output(options, plan, () => {
    if (countDeltaOperations(plan) === 0) return ['No delta operations found.']
    return [
      ...plan.added.map((r) => `ADDED ${r.name} (${r.scenarios.length} scenarios)`),
      ...plan.modified.map((r) => `MODIFIED ${r.name} (${r.scenarios.length} scenarios)`),
      ...plan.removed.map((name) => `REMOVED ${name}`),
      ...plan.renamed.map((r) => `RENAMED ${r.from} -> ${r.to}`),
    ]
  })
}

// =====================
// Spec editing
// =====================

export interface SpecOptions extends GlobalOptions {
  spec: string
}

async function editSpec(options: SpecOptions, requirement: string, transform: Transform, done: string): Promise<void> {
  const adapter = await openProject(options)
  if (!(await adapter.transformSpec(options.spec, transform))) {
    throw new AdapterError(
      'REQUIREMENT_NOT_FOUND',
      `Requirement '${requirement}' not found in spec '${options.spec}'`
    )
  }
  output(options, { spec: options.spec, requirement }, () => [done])
}

export interface RenameRequirementOptions extends SpecOptions {
  from: string
  to: string
}

export async function renameRequirementCommand(options: RenameRequirementOptions): Promise<void> {
  await editSpec(
    options,
    options.from,
    renameRequirement(options.from, options.to),
    `Renamed requirement ${options.from} to ${options.to} in ${options.spec}`
  )
}

export interface RemoveRequirementOptions extends SpecOptions {
  name: string
}

export async function removeRequirementCommand(options: RemoveRequirementOptions): Promise<void> {
  await editSpec(
    options,
    options.name,
    removeRequirement(options.name),
    `Removed requirement ${options.name} from ${options.spec}`
  )
}

export interface AddScenarioOptions extends SpecOptions {
  requirement: string
  name: string
  /** Scenario steps, written as bullet lines */
  step?: string[]
}

export async function addScenarioCommand(options: AddScenarioOptions): Promise<void> {
  const body = (options.step ?? []).map((step) => `- ${step}`).join('\n')
  await editSpec(
    options,
    options.requirement,
    addScenario(options.requirement, { name: options.name, body }),
    `Added scenario ${options.name} to ${options.requirement} in ${options.spec}`
  )
}

// =====================
// Change lifecycle
// =====================

export interface ChangeOptions extends GlobalOptions {
  change: string
}

export interface ArchiveCommandOptions extends ChangeOptions {
  datePrefix?: boolean
  skipValidation: boolean
}

/**
 * @returns false when validation stopped the archive
 */
export async function archiveCommand(options: ArchiveCommandOptions): Promise<boolean> {
  const adapter = await openProject(options)

  if (!options.skipValidation) {
    const validation = await adapter.validateChange(options.change)
    if (!validation.valid) {
      console.error(`Change '${options.change}' is not valid:`)
      for (const issue of validation.issues) console.error(formatIssue(issue))
      return false
    }
  }

  const result = await adapter.archiveChange(options.change, { datePrefix: options.datePrefix })
  const { added, modified, removed, renamed } = result.counts
  output(options, result, () => [
    `Archived ${options.change} as ${result.archiveId}`,
    `Specs updated: ${result.capabilities.join(', ') || 'none'}`,
    `Requirements: ${added} added, ${modified} modified, ${removed} removed, ${renamed} renamed`,
  ])
  return true
}

export async function acceptCommand(options: ChangeOptions): Promise<void> {
  const adapter = await openProject(options)
  const { file } = await adapter.acceptChange(options.change)
  const total = file.tasks.length
  const completed = file.tasks.filter((t) => t.status === 'completed').length
  output(options, file, () => [`Accepted ${total} tasks for ${options.change} (${completed} completed)`])
}

export async function syncCommand(options: ChangeOptions): Promise<void> {
  const adapter = await openProject(options)
  const updated = await adapter.syncTasks(options.change)
  output(options, { updated }, () => [`Updated ${updated} task(s) in tasks.md`])
}

export interface CheckOptions extends ChangeOptions {
  task: string
  uncheck: boolean
}

export async function checkCommand(options: CheckOptions): Promise<void> {
  const adapter = await openProject(options)
  const completed = !options.uncheck
  if (!(await adapter.toggleTask(options.change, options.task, completed))) {
    throw new AdapterError('TASK_NOT_FOUND', `Task '${options.task}' not found in change '${options.change}'`)
  }
  output(options, { task: options.task, completed }, () => [
    `Marked ${options.task} as ${completed ? 'done' : 'not done'}`,
  ])
}
