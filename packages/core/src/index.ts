/**
 * @specloom/core
 *
 * Core library for specloom file operations, parsing, and validation.
 * Provides the markdown document engine, filesystem adapter, spec merger and
 * task tracking for spec-driven development workflows.
 *
 * @packageDocumentation
 */

// Markdown document engine
export * from './markdown/index.js'

// Filesystem adapter for reading/writing specloom files
export {
  SpecAdapter,
  formatArchiveDate,
  type AcceptResult,
  type ArchiveOptions,
  type ArchiveResult,
  type SpecAdapterOptions,
} from './adapter.js'

// Configuration
export {
  CONFIG_FILE,
  ConfigManager,
  DEFAULT_CONFIG,
  SpecloomConfigSchema,
  loadConfig,
  parseConfig,
  type LoadedConfig,
  type SpecloomConfig,
} from './config.js'

// Domain errors
export { AdapterError, MergeError, type AdapterErrorCode, type MergeErrorCode } from './errors.js'

// Requirement and delta extraction
export {
  countDeltaOperations,
  enclosingRequirement,
  enclosingScenario,
  extractDelta,
  extractRequirements,
  normalizeRequirementName,
  type DeltaOperation,
  type NamedSection,
  type DeltaPlan,
  type RenameOp,
  type Requirement as RequirementBlock,
} from './extractor.js'

// Markdown parser for spec and change documents
export { MarkdownParser, deltasFromPlan, type DeltaSpecSource } from './parser.js'

// Requirement transforms
export {
  addScenario,
  applyReplacements,
  pipeline,
  removeRequirement,
  renameRequirement,
  when,
  type Replacement,
  type ScenarioInput,
  type Transform,
} from './transform.js'

// Spec merging
export { formatCapabilityName, mergeSpec, type MergeCounts, type MergeOptions, type MergeResult } from './spec-merger.js'

// Task acceptance and sync
export {
  buildTasksFile,
  flattenTaskSections,
  parseTaskSections,
  summarizeTasks,
  type TaskEntry,
  type TaskSection,
} from './tasks.js'
export {
  parseTasksFile,
  readTasksFile,
  serializeTasksFile,
  syncTasksMarkdown,
  taskStatusMap,
  type TaskSyncResult,
} from './task-sync.js'

// Document validation
export {
  Validator,
  mergeResults,
  type ValidationIssue,
  type ValidationResult,
  type ValidatorOptions,
} from './validator.js'

// Wikilink resolution
export {
  anchorExists,
  checkWikilinks,
  collectWikilinks,
  resolveWikilink,
  type CheckedWikilink,
  type WikilinkKind,
  type WikilinkRef,
  type WikilinkResolution,
  type WikilinkStatus,
} from './wikilink.js'

// Zod schemas and TypeScript types
export {
  AcceptedTaskSchema,
  ChangeSchema,
  DeltaOperationSchema,
  DeltaSchema,
  RequirementSchema,
  ScenarioSchema,
  SpecSchema,
  TaskSchema,
  TaskStatusSchema,
  TaskSummarySchema,
  TasksFileSchema,
  type AcceptedTask,
  type Change,
  type Delta,
  type Requirement,
  type Scenario,
  type Spec,
  type Task,
  type TaskStatus,
  type TaskSummary,
  type TasksFile,
} from './schemas.js'
