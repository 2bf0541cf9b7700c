import { mkdir, readdir, readFile, rename, stat, writeFile } from 'fs/promises'
import { join } from 'path'
import { loadConfig } from './config.js'
import { AdapterError } from './errors.js'
import { extractDelta } from './extractor.js'
import { parse } from './markdown/parser.js'
import { MarkdownParser, type DeltaSpecSource } from './parser.js'
import type { Change, Spec, TasksFile, TaskStatus } from './schemas.js'
import { mergeSpec, type MergeCounts } from './spec-merger.js'
import { readTasksFile, serializeTasksFile, syncTasksMarkdown, taskStatusMap } from './task-sync.js'
import { buildTasksFile, flattenTaskSections, parseTaskSections } from './tasks.js'
import type { Transform } from './transform.js'
import { mergeResults, Validator, type ValidationResult } from './validator.js'
import { checkWikilinks, resolveWikilink, type WikilinkResolution } from './wikilink.js'

export interface SpecAdapterOptions {
  /** Directory holding specs/ and changes/, relative to the project */
  rootDir?: string
  /** Report validation warnings as errors */
  strict?: boolean
  /** Prefix archive directories with the archive date */
  archiveDatePrefix?: boolean
}

export interface ArchiveOptions {
  date?: Date
  datePrefix?: boolean
}

export interface ArchiveResult {
  /** Directory name under changes/archive */
  archiveId: string
  archivePath: string
  counts: MergeCounts
  /** Specs written by the archive, in delta order */
  capabilities: string[]
}

export interface AcceptResult {
  path: string
  file: TasksFile
}

interface ChangeFiles {
  proposal: string
  tasks: string
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null
    throw error
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

async function listDirs(dir: string, exclude: readonly string[] = []): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true })
    return entries
      .filter((e) => e.isDirectory() && !e.name.startsWith('.') && !exclude.includes(e.name))
      .map((e) => e.name)
      .sort()
  } catch {
    return []
  }
}

/** Local calendar date as YYYY-MM-DD */
export function formatArchiveDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

/**
 * specloom filesystem adapter
 * Handles reading, writing, and managing specloom files
 */
export class SpecAdapter {
  private parser = new MarkdownParser()
  private validator: Validator
  private readonly rootDirName: string
  private readonly archiveDatePrefix: boolean

  constructor(
    readonly projectDir: string,
    options: SpecAdapterOptions = {}
  ) {
    this.rootDirName = options.rootDir ?? 'specloom'
    this.archiveDatePrefix = options.archiveDatePrefix ?? true
    this.validator = new Validator({ strict: options.strict })
  }

  /**
   * Adapter for the project that owns `startDir`, configured from its specloom.yaml
   */
  static async fromConfig(startDir: string, overrides: SpecAdapterOptions = {}): Promise<SpecAdapter> {
    const { projectDir, config } = await loadConfig(startDir)
    return new SpecAdapter(projectDir, {
      rootDir: config.root_dir,
      strict: config.validation.strict,
      archiveDatePrefix: config.archive.date_prefix,
      ...overrides,
    })
  }

  get rootDir(): string {
    return join(this.projectDir, this.rootDirName)
  }

  private get specsDir() {
    return join(this.rootDir, 'specs')
  }

  private get changesDir() {
    return join(this.rootDir, 'changes')
  }

  private get archiveDir() {
    return join(this.changesDir, 'archive')
  }

  private changeDir(changeId: string) {
    return join(this.changesDir, changeId)
  }

  // =====================
  // Existence checks
  // =====================

  async isInitialized(): Promise<boolean> {
    try {
      const rootStat = await stat(this.rootDir)
      return rootStat.isDirectory()
    } catch {
      return false
    }
  }

  async assertInitialized(): Promise<void> {
    if (!(await this.isInitialized())) {
      throw new AdapterError('NOT_INITIALIZED', `No ${this.rootDirName}/ directory in ${this.projectDir}`)
    }
  }

  private async assertChange(changeId: string): Promise<void> {
    if (!(await pathExists(join(this.changeDir(changeId), 'proposal.md')))) {
      throw new AdapterError('CHANGE_NOT_FOUND', `Change '${changeId}' not found`)
    }
  }

  // =====================
  // List operations
  // =====================

  async listSpecs(): Promise<string[]> {
    return listDirs(this.specsDir)
  }

  /**
   * List specs with metadata (id and name)
   */
  async listSpecsWithMeta(): Promise<Array<{ id: string; name: string; requirementCount: number }>> {
    const ids = await this.listSpecs()
    const results = await Promise.all(
      ids.map(async (id) => {
        const spec = await this.readSpec(id)
        return { id, name: spec?.name ?? id, requirementCount: spec?.requirements.length ?? 0 }
      })
    )
    return results
  }

  async listChanges(): Promise<string[]> {
    return listDirs(this.changesDir, ['archive'])
  }

  /**
   * List changes with metadata (id, name, and progress)
   */
  async listChangesWithMeta(): Promise<
    Array<{ id: string; name: string; progress: { total: number; completed: number } }>
  > {
    const ids = await this.listChanges()
    const results = await Promise.all(
      ids.map(async (id) => {
        const change = await this.readChange(id)
        return {
          id,
          name: change?.name ?? id,
          progress: change?.progress ?? { total: 0, completed: 0 },
        }
      })
    )
    return results
  }

  async listArchivedChanges(): Promise<string[]> {
    return listDirs(this.archiveDir)
  }

  /**
   * Specs touched by a change: the directories under `changes/<id>/specs`
   */
  async listDeltaSpecs(changeId: string): Promise<string[]> {
    return listDirs(join(this.changeDir(changeId), 'specs'))
  }

  // =====================
  // Read operations
  // =====================

  async readSpecRaw(specId: string): Promise<string | null> {
    return readOptional(join(this.specsDir, specId, 'spec.md'))
  }

  async readSpec(specId: string): Promise<Spec | null> {
    const content = await this.readSpecRaw(specId)
    if (content === null) return null
    const spec = this.parser.parseSpec(specId, content)
    return {
      ...spec,
      metadata: { version: '1.0.0', format: 'specloom', sourcePath: join(this.specsDir, specId, 'spec.md') },
    }
  }

  async readChangeRaw(changeId: string): Promise<ChangeFiles | null> {
    return this.readChangeFiles(this.changeDir(changeId))
  }

  private async readChangeFiles(dir: string): Promise<ChangeFiles | null> {
    const [proposal, tasks] = await Promise.all([
      readOptional(join(dir, 'proposal.md')),
      readOptional(join(dir, 'tasks.md')),
    ])
    if (proposal === null) return null
    return { proposal, tasks: tasks ?? '' }
  }

  async readDeltaSpecs(changeId: string): Promise<DeltaSpecSource[]> {
    const specs = await this.listDeltaSpecs(changeId)
    const sources = await Promise.all(
      specs.map(async (spec) => {
        const content = await readOptional(join(this.changeDir(changeId), 'specs', spec, 'spec.md'))
        return content === null ? null : { spec, content }
      })
    )
    return sources.filter((s): s is DeltaSpecSource => s !== null)
  }

  async readChange(changeId: string): Promise<Change | null> {
    const raw = await this.readChangeRaw(changeId)
    if (!raw) return null
    const deltaSpecs = await this.readDeltaSpecs(changeId)
    return this.parser.parseChange(changeId, raw.proposal, raw.tasks, deltaSpecs)
  }

  /**
   * Read an archived change
   */
  async readArchivedChange(archiveId: string): Promise<Change | null> {
    const raw = await this.readChangeFiles(join(this.archiveDir, archiveId))
    if (!raw) return null
    return this.parser.parseChange(archiveId, raw.proposal, raw.tasks)
  }

  // =====================
  // Write operations
  // =====================

  async writeSpec(specId: string, content: string): Promise<void> {
    const specDir = join(this.specsDir, specId)
    await mkdir(specDir, { recursive: true })
    await writeFile(join(specDir, 'spec.md'), content, 'utf-8')
  }

  /**
   * Rewrite a spec through a transform and save it when anything changed
   * @returns whether the spec file was written
   */
  async transformSpec(specId: string, transform: Transform): Promise<boolean> {
    const content = await this.readSpecRaw(specId)
    if (content === null) throw new AdapterError('SPEC_NOT_FOUND', `Spec '${specId}' not found`)
    const document = parse(content)
    const result = transform(document)
    if (result === document) return false
    await this.writeSpec(specId, result.print())
    return true
  }

  // =====================
  // Archive operations
  // =====================

  /**
   * Merge every delta spec of a change into its base spec, then move the
   * change to `changes/archive/`. Nothing is written when a merge fails.
   */
  async archiveChange(changeId: string, options: ArchiveOptions = {}): Promise<ArchiveResult> {
    await this.assertChange(changeId)

    const datePrefix = options.datePrefix ?? this.archiveDatePrefix
    const archiveId = datePrefix ? `${formatArchiveDate(options.date ?? new Date())}-${changeId}` : changeId
    const archivePath = join(this.archiveDir, archiveId)
    if (await pathExists(archivePath)) {
      throw new AdapterError('ARCHIVE_EXISTS', `Archive '${archiveId}' already exists`)
    }

    const counts: MergeCounts = { added: 0, modified: 0, removed: 0, renamed: 0 }
    const merged: Array<{ spec: string; content: string }> = []
    for (const { spec, content } of await this.readDeltaSpecs(changeId)) {
      const base = await this.readSpecRaw(spec)
      const result = mergeSpec(base, extractDelta(parse(content)), { capability: spec })
      counts.added += result.counts.added
      counts.modified += result.counts.modified
      counts.removed += result.counts.removed
      counts.renamed += result.counts.renamed
      merged.push({ spec, content: result.content })
    }

    for (const { spec, content } of merged) {
      await this.writeSpec(spec, content)
    }

    await mkdir(this.archiveDir, { recursive: true })
    await rename(this.changeDir(changeId), archivePath)

    return { archiveId, archivePath, counts, capabilities: merged.map((m) => m.spec) }
  }

  // =====================
  // Init operations
  // =====================

  async init(): Promise<void> {
    await mkdir(this.specsDir, { recursive: true })
    await mkdir(this.changesDir, { recursive: true })
    await mkdir(this.archiveDir, { recursive: true })

    const projectMd = `# Project Specification

## Overview
This project uses specloom for spec-driven development.

## Structure
- \`specs/\` - Source of truth specifications
- \`changes/\` - Active change proposals
- \`changes/archive/\` - Completed changes
`
    const projectPath = join(this.rootDir, 'project.md')
    if (!(await pathExists(projectPath))) {
      await writeFile(projectPath, projectMd, 'utf-8')
    }
  }

  // =====================
  // Task operations
  // =====================

  /**
   * Freeze the tasks of tasks.md into tasks.jsonc
   */
  async acceptChange(changeId: string, now: Date = new Date()): Promise<AcceptResult> {
    await this.assertChange(changeId)

    const path = join(this.changeDir(changeId), 'tasks.jsonc')
    if (await pathExists(path)) {
      throw new AdapterError('ALREADY_ACCEPTED', `Change '${changeId}' has already been accepted`)
    }

    const markdown = await readOptional(join(this.changeDir(changeId), 'tasks.md'))
    const sections = markdown === null ? [] : parseTaskSections(parse(markdown))
    if (flattenTaskSections(sections).length === 0) {
      throw new AdapterError('NO_TASKS', `Change '${changeId}' has no tasks in tasks.md`)
    }

    const file = buildTasksFile(changeId, sections, now)
    await writeFile(path, serializeTasksFile(file), 'utf-8')
    return { path, file }
  }

  /**
   * Update the checkboxes of tasks.md from tasks.jsonc
   * @returns number of tasks whose checkbox changed
   */
  async syncTasks(changeId: string): Promise<number> {
    await this.assertChange(changeId)

    const file = await readTasksFile(join(this.changeDir(changeId), 'tasks.jsonc'))
    if (!file) {
      throw new AdapterError('NOT_ACCEPTED', `Change '${changeId}' has not been accepted`)
    }

    const tasksPath = join(this.changeDir(changeId), 'tasks.md')
    const markdown = await readOptional(tasksPath)
    if (markdown === null) {
      throw new AdapterError('NO_TASKS', `Change '${changeId}' has no tasks.md`)
    }

    const result = syncTasksMarkdown(markdown, taskStatusMap(file))
    if (result.updated > 0) {
      await writeFile(tasksPath, result.content, 'utf-8')
    }
    return result.updated
  }

  /**
   * Toggle a task's completion status in tasks.md
   * @param taskId - ID as written, or as numbered by its section
   * @returns false when the change has no such task
   */
  async toggleTask(changeId: string, taskId: string, completed: boolean): Promise<boolean> {
    const tasksPath = join(this.changeDir(changeId), 'tasks.md')
    const content = await readOptional(tasksPath)
    if (content === null) return false

    const status: TaskStatus = completed ? 'completed' : 'pending'
    const result = syncTasksMarkdown(content, new Map([[taskId, status]]))
    const exists = this.parser.parseTasks(content).some((t) => t.id === taskId)
    if (result.updated > 0) {
      await writeFile(tasksPath, result.content, 'utf-8')
    }
    return exists
  }

  // =====================
  // Wikilinks
  // =====================

  async resolveWikilink(target: string): Promise<WikilinkResolution> {
    return resolveWikilink(target, this.rootDir)
  }

  // =====================
  // Validation
  // =====================

  async validateSpec(specId: string): Promise<ValidationResult> {
    const content = await this.readSpecRaw(specId)
    if (content === null) {
      return {
        valid: false,
        issues: [{ severity: 'ERROR', message: `Spec '${specId}' not found` }],
      }
    }

    const links = await checkWikilinks(parse(content), this.rootDir)
    return mergeResults(
      this.validator.validateSpec(this.parser.parseSpec(specId, content)),
      this.validator.validateWikilinks(`specs/${specId}/spec.md`, links)
    )
  }

  async validateChange(changeId: string): Promise<ValidationResult> {
    const raw = await this.readChangeRaw(changeId)
    if (!raw) {
      return {
        valid: false,
        issues: [{ severity: 'ERROR', message: `Change '${changeId}' not found` }],
      }
    }

    const deltaSpecs = await this.readDeltaSpecs(changeId)
    const change = this.parser.parseChange(changeId, raw.proposal, raw.tasks, deltaSpecs)
    const results = [this.validator.validateChange(change)]
    for (const { spec, content } of deltaSpecs) {
      const base = await this.readSpec(spec)
      results.push(this.validator.validateDelta(spec, extractDelta(parse(content)), base))
    }

    const links = await checkWikilinks(parse(raw.proposal), this.rootDir)
    results.push(this.validator.validateWikilinks(`changes/${changeId}/proposal.md`, links))
    return mergeResults(...results)
  }
}
