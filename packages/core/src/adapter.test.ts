import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { cleanupTempDir, createTempDir, createTempTree, exists } from './__tests__/test-utils.js'
import { formatArchiveDate, SpecAdapter } from './adapter.js'
import { AdapterError, MergeError } from './errors.js'
import { parseTasksFile, serializeTasksFile } from './task-sync.js'
import { removeRequirement, renameRequirement } from './transform.js'

const AUTH_SPEC = `# Auth Specification

## Purpose
Handles sign in for every user of the product.

## Requirements

### Requirement: Login
The system SHALL log users in.

#### Scenario: Valid
- WHEN credentials are valid
- THEN the user is signed in
`

const PROPOSAL = `# Add export

## Why
Users keep asking for a way to take their data elsewhere, see [[auth]].

## What Changes
- Add CSV export
`

const TASKS = `## 1. Build
- [ ] 1.1 Write exporter
- [x] 1.2 Add route

## Docs
- [ ] Document export
`

const AUTH_DELTA = `## ADDED Requirements
### Requirement: Export
The system SHALL export user data as CSV.

#### Scenario: Download
- WHEN the user asks for an export
- THEN a CSV file is returned
`

const BILLING_DELTA = `## ADDED Requirements
### Requirement: Invoice
The system SHALL issue invoices.

#### Scenario: Monthly
- WHEN a month ends
- THEN an invoice is issued
`

async function expectAdapterError(promise: Promise<unknown>, code: string): Promise<void> {
  const error = await promise.then(
    () => null,
    (e: unknown) => e
  )
  expect(error).toBeInstanceOf(AdapterError)
  expect(error).toMatchObject({ code })
}

describe('SpecAdapter', () => {
  let tempDir: string
  let adapter: SpecAdapter

  beforeEach(async () => {
    tempDir = await createTempDir()
    adapter = new SpecAdapter(tempDir)
    await createTempTree(tempDir, {
      'specloom/specs/auth/spec.md': AUTH_SPEC,
      'specloom/changes/add-export/proposal.md': PROPOSAL,
      'specloom/changes/add-export/tasks.md': TASKS,
      'specloom/changes/add-export/specs/auth/spec.md': AUTH_DELTA,
      'specloom/changes/add-export/specs/billing/spec.md': BILLING_DELTA,
    })
  })

  afterEach(async () => {
    await cleanupTempDir(tempDir)
  })

  describe('project layout', () => {
    it('should detect an initialized project', async () => {
      expect(await adapter.isInitialized()).toBe(true)

      const other = new SpecAdapter(tempDir, { rootDir: 'other' })
      expect(await other.isInitialized()).toBe(false)
      await expectAdapterError(other.assertInitialized(), 'NOT_INITIALIZED')
    })

    it('should create the directory layout on init', async () => {
      const fresh = new SpecAdapter(join(tempDir, 'fresh'))
      await fresh.init()

      expect(await exists(join(fresh.rootDir, 'changes', 'archive'))).toBe(true)
      expect(await exists(join(fresh.rootDir, 'specs'))).toBe(true)
      expect(await readFile(join(fresh.rootDir, 'project.md'), 'utf-8')).toContain('# Project Specification')
    })

    it('should take the root directory from specloom.yaml', async () => {
      await writeFile(join(tempDir, 'specloom.yaml'), 'root_dir: docs\n', 'utf-8')
      const nested = join(tempDir, 'src')
      await mkdir(nested)

      const configured = await SpecAdapter.fromConfig(nested)

      expect(configured.projectDir).toBe(tempDir)
      expect(configured.rootDir).toBe(join(tempDir, 'docs'))
    })
  })

  describe('listing and reading', () => {
    it('should list specs, changes and delta specs', async () => {
      expect(await adapter.listSpecs()).toEqual(['auth'])
      expect(await adapter.listChanges()).toEqual(['add-export'])
      expect(await adapter.listDeltaSpecs('add-export')).toEqual(['auth', 'billing'])
      expect(await adapter.listSpecsWithMeta()).toEqual([
        { id: 'auth', name: 'Auth Specification', requirementCount: 1 },
      ])
    })

    it('should read a change with its deltas and tasks', async () => {
      const change = await adapter.readChange('add-export')

      expect(change?.name).toBe('Add export')
      expect(change?.deltas.map((d) => [d.spec, d.operation, d.requirement])).toEqual([
        ['auth', 'ADDED', 'Export'],
        ['billing', 'ADDED', 'Invoice'],
      ])
      expect(change?.progress).toEqual({ total: 3, completed: 1 })
    })

    it('should return null for missing documents', async () => {
      expect(await adapter.readSpec('nope')).toBeNull()
      expect(await adapter.readChange('nope')).toBeNull()
    })

    it('should record where a spec was read from', async () => {
      const spec = await adapter.readSpec('auth')
      expect(spec?.metadata?.sourcePath).toBe(join(tempDir, 'specloom', 'specs', 'auth', 'spec.md'))
    })
  })

  describe('validation', () => {
    it('should validate a spec', async () => {
      expect(await adapter.validateSpec('auth')).toEqual({ valid: true, issues: [] })
    })

    it('should report a missing spec', async () => {
      expect(await adapter.validateSpec('nope')).toEqual({
        valid: false,
        issues: [{ severity: 'ERROR', message: "Spec 'nope' not found" }],
      })
    })

    it('should validate a change with its deltas and wikilinks', async () => {
      expect(await adapter.validateChange('add-export')).toEqual({ valid: true, issues: [] })
    })

    it('should report delta and wikilink problems', async () => {
      await createTempTree(tempDir, {
        'specloom/changes/add-export/proposal.md': PROPOSAL.replace('[[auth]]', '[[payments]]'),
        'specloom/changes/add-export/specs/auth/spec.md': AUTH_DELTA.replace('Export', 'Login'),
      })

      const result = await adapter.validateChange('add-export')

      expect(result.valid).toBe(false)
      expect(result.issues).toEqual([
        {
          severity: 'ERROR',
          message: 'ADDED requirement "Login" already exists in spec "auth"',
          path: 'specs/auth',
          line: 2,
        },
        {
          severity: 'ERROR',
          message: 'Unresolved wikilink: [[payments]]',
          path: 'changes/add-export/proposal.md',
          line: 4,
        },
      ])
    })
  })

  describe('archiveChange', () => {
    it('should merge deltas and move the change to the archive', async () => {
      const result = await adapter.archiveChange('add-export', { date: new Date(2026, 0, 2) })

      expect(result).toEqual({
        archiveId: '2026-01-02-add-export',
        archivePath: join(tempDir, 'specloom', 'changes', 'archive', '2026-01-02-add-export'),
        counts: { added: 2, modified: 0, removed: 0, renamed: 0 },
        capabilities: ['auth', 'billing'],
      })
      expect(await adapter.readSpecRaw('auth')).toBe(`${AUTH_SPEC}
### Requirement: Export
The system SHALL export user data as CSV.

#### Scenario: Download
- WHEN the user asks for an export
- THEN a CSV file is returned
`)
      expect(await adapter.readSpecRaw('billing')).toBe(`# Billing Specification

## Requirements

${BILLING_DELTA.slice('## ADDED Requirements\n'.length)}`)
      expect(await adapter.listChanges()).toEqual([])
      expect(await adapter.listArchivedChanges()).toEqual(['2026-01-02-add-export'])
      expect((await adapter.readArchivedChange('2026-01-02-add-export'))?.name).toBe('Add export')
    })

    it('should refuse to overwrite an archive', async () => {
      await mkdir(join(tempDir, 'specloom', 'changes', 'archive', 'add-export'), { recursive: true })

      await expectAdapterError(adapter.archiveChange('add-export', { datePrefix: false }), 'ARCHIVE_EXISTS')
    })

    it('should refuse unknown changes', async () => {
      await expectAdapterError(adapter.archiveChange('nope'), 'CHANGE_NOT_FOUND')
    })

    it('should write nothing when a delta cannot be merged', async () => {
      await createTempTree(tempDir, {
        'specloom/changes/add-export/specs/ghost/spec.md':
          '## REMOVED Requirements\n### Requirement: Gone\n',
      })

      await expect(adapter.archiveChange('add-export')).rejects.toBeInstanceOf(MergeError)
      expect(await adapter.listSpecs()).toEqual(['auth'])
      expect(await adapter.readSpecRaw('auth')).toBe(AUTH_SPEC)
      expect(await adapter.listChanges()).toEqual(['add-export'])
    })
  })

  describe('tasks', () => {
    const acceptedAt = new Date('2026-01-02T03:04:05.000Z')

    it('should accept a change into tasks.jsonc', async () => {
      const { path, file } = await adapter.acceptChange('add-export', acceptedAt)

      expect(path).toBe(join(tempDir, 'specloom', 'changes', 'add-export', 'tasks.jsonc'))
      expect(file.tasks).toEqual([
        { id: '1.1', section: 'Build', description: 'Write exporter', status: 'pending' },
        { id: '1.2', section: 'Build', description: 'Add route', status: 'completed' },
        { id: '2.1', section: 'Docs', description: 'Document export', status: 'pending' },
      ])
      expect(file.summary).toEqual({ total: 3, completed: 1, inProgress: 0, pending: 2 })
      expect(parseTasksFile(await readFile(path, 'utf-8'))).toEqual(file)
    })

    it('should accept a change only once', async () => {
      await adapter.acceptChange('add-export', acceptedAt)
      await expectAdapterError(adapter.acceptChange('add-export', acceptedAt), 'ALREADY_ACCEPTED')
    })

    it('should refuse a change without tasks', async () => {
      await createTempTree(tempDir, { 'specloom/changes/empty/proposal.md': '# Empty\n' })
      await expectAdapterError(adapter.acceptChange('empty'), 'NO_TASKS')
    })

    it('should sync edited statuses back to tasks.md', async () => {
      const { path, file } = await adapter.acceptChange('add-export', acceptedAt)
      const edited = {
        ...file,
        tasks: file.tasks.map((t) => (t.id === '1.1' || t.id === '2.1' ? { ...t, status: 'completed' as const } : t)),
      }
      await writeFile(path, serializeTasksFile(edited), 'utf-8')

      expect(await adapter.syncTasks('add-export')).toBe(2)
      expect(await readFile(join(tempDir, 'specloom', 'changes', 'add-export', 'tasks.md'), 'utf-8')).toBe(
        `## 1. Build
- [x] 1.1 Write exporter
- [x] 1.2 Add route

## Docs
- [x] Document export
`
      )
    })

    it('should refuse to sync a change that was not accepted', async () => {
      await expectAdapterError(adapter.syncTasks('add-export'), 'NOT_ACCEPTED')
    })

    it('should toggle a task by ID', async () => {
      expect(await adapter.toggleTask('add-export', '1.2', false)).toBe(true)
      expect(await adapter.toggleTask('add-export', '9', true)).toBe(false)

      const tasks = await readFile(join(tempDir, 'specloom', 'changes', 'add-export', 'tasks.md'), 'utf-8')
      expect(tasks).toBe(TASKS.replace('- [x] 1.2', '- [ ] 1.2'))
    })
  })

  describe('transformSpec', () => {
    it('should write the transformed spec', async () => {
      expect(await adapter.transformSpec('auth', renameRequirement('Login', 'Sign in'))).toBe(true)
      expect(await adapter.readSpecRaw('auth')).toBe(AUTH_SPEC.replace('Requirement: Login', 'Requirement: Sign in'))
    })

    it('should leave the file alone when nothing matched', async () => {
      expect(await adapter.transformSpec('auth', removeRequirement('Logout'))).toBe(false)
      expect(await adapter.readSpecRaw('auth')).toBe(AUTH_SPEC)
    })

    it('should refuse unknown specs', async () => {
      await expectAdapterError(adapter.transformSpec('nope', removeRequirement('Login')), 'SPEC_NOT_FOUND')
    })
  })

  describe('resolveWikilink', () => {
    it('should resolve against the project root directory', async () => {
      expect(await adapter.resolveWikilink('add-export')).toEqual({
        path: join(tempDir, 'specloom', 'changes', 'add-export', 'proposal.md'),
        exists: true,
        kind: 'change',
      })
    })
  })
})

describe('formatArchiveDate', () => {
  it('should pad month and day', () => {
    expect(formatArchiveDate(new Date(2026, 2, 9))).toBe('2026-03-09')
  })
})
