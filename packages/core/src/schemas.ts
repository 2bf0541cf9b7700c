/**
 * Zod schemas and TypeScript types for specloom documents.
 *
 * specloom uses a structured markdown format for specifications and change proposals:
 * - Spec: A specification document with requirements and scenarios
 * - Change: A change proposal with deltas and tasks
 * - Task: A trackable work item within a change
 * - Tasks file: The accepted, machine-edited task list of a change (tasks.jsonc)
 *
 * @module schemas
 */

import { z } from 'zod'

// =====================
// Requirement Schema
// =====================

/**
 * A named test case of a requirement (`#### Scenario: <name>`).
 */
export const ScenarioSchema = z.object({
  name: z.string(),
  /** Body of the scenario, usually WHEN/THEN bullets */
  rawText: z.string(),
})

export type Scenario = z.infer<typeof ScenarioSchema>

/**
 * A requirement within a specification (`### Requirement: <name>`).
 * Requirements should use RFC 2119 keywords (SHALL, MUST, etc.)
 */
export const RequirementSchema = z.object({
  /** Name after the `Requirement:` prefix */
  name: z.string(),
  /** Statement before the first scenario, should contain SHALL/MUST keywords */
  text: z.string(),
  /** Test scenarios for this requirement */
  scenarios: z.array(ScenarioSchema),
  /** 1-based line of the requirement header */
  line: z.number().int().positive(),
})

export type Requirement = z.infer<typeof RequirementSchema>

// =====================
// Spec Schema
// =====================

/**
 * A specification document.
 * Located at: specloom/specs/{id}/spec.md
 */
export const SpecSchema = z.object({
  /** Directory name (e.g., "user-auth") */
  id: z.string(),
  /** Human-readable name from # heading */
  name: z.string(),
  /** Purpose/overview section content */
  overview: z.string(),
  /** List of requirements */
  requirements: z.array(RequirementSchema),
  /** Optional metadata */
  metadata: z
    .object({
      version: z.string().default('1.0.0'),
      format: z.literal('specloom').default('specloom'),
      sourcePath: z.string().optional(),
    })
    .optional(),
})

export type Spec = z.infer<typeof SpecSchema>

// =====================
// Delta Schema
// =====================

export const DeltaOperationSchema = z.enum(['ADDED', 'MODIFIED', 'REMOVED', 'RENAMED'])

/**
 * One requirement change of a delta spec.
 * Located at: specloom/changes/{change}/specs/{spec}/spec.md
 */
export const DeltaSchema = z.object({
  /** Target spec ID */
  spec: z.string(),
  /** Type of change */
  operation: DeltaOperationSchema,
  /** Requirement name; the new name for RENAMED */
  requirement: z.string(),
  /** Scenario names (ADDED and MODIFIED only) */
  scenarios: z.array(z.string()),
  /** 1-based line in the delta spec, when the requirement has a header there */
  line: z.number().int().positive().optional(),
  /** Rename details (for RENAMED operation) */
  rename: z
    .object({
      from: z.string(),
      to: z.string(),
    })
    .optional(),
})

export type Delta = z.infer<typeof DeltaSchema>

// =====================
// Task Schema
// =====================

/**
 * A task within a change proposal.
 * Tasks are parsed from tasks.md using checkbox syntax: - [ ] or - [x]
 */
export const TaskSchema = z.object({
  /** Dotted task ID as written, or generated from the section number (e.g., "2.3") */
  id: z.string(),
  /** Task description text */
  text: z.string(),
  /** Whether the task is completed */
  completed: z.boolean(),
  /** Optional section heading the task belongs to */
  section: z.string().optional(),
  /** 1-based line of the task in tasks.md */
  line: z.number().int().positive(),
})

export type Task = z.infer<typeof TaskSchema>

// =====================
// Change Schema
// =====================

/**
 * A change proposal document.
 * Located at: specloom/changes/{id}/proposal.md + tasks.md
 *
 * Change proposals describe why a change is needed, what will change,
 * which specs are affected (deltas), and trackable tasks.
 */
export const ChangeSchema = z.object({
  /** Directory name (e.g., "add-oauth") */
  id: z.string(),
  /** Human-readable name from # heading */
  name: z.string(),
  /** Why section - motivation for the change */
  why: z.string(),
  /** What Changes section - description of changes */
  whatChanges: z.string(),
  /** Requirement changes from the change's delta specs */
  deltas: z.array(DeltaSchema),
  /** Trackable tasks from tasks.md */
  tasks: z.array(TaskSchema),
  /** Task completion progress */
  progress: z.object({
    total: z.number(),
    completed: z.number(),
  }),
  /** Optional metadata */
  metadata: z
    .object({
      version: z.string().default('1.0.0'),
      format: z.literal('specloom-change').default('specloom-change'),
    })
    .optional(),
})

export type Change = z.infer<typeof ChangeSchema>

// =====================
// Tasks File Schema
// =====================

export const TaskStatusSchema = z.enum(['pending', 'in_progress', 'completed'])

export type TaskStatus = z.infer<typeof TaskStatusSchema>

/**
 * A task of an accepted change. `status` is the source of truth once the
 * change has been accepted; tasks.md checkboxes follow it.
 */
export const AcceptedTaskSchema = z.object({
  id: z.string(),
  /** Section title, empty for tasks outside any section */
  section: z.string(),
  description: z.string(),
  status: TaskStatusSchema,
})

export type AcceptedTask = z.infer<typeof AcceptedTaskSchema>

export const TaskSummarySchema = z.object({
  total: z.number().int().nonnegative(),
  completed: z.number().int().nonnegative(),
  inProgress: z.number().int().nonnegative(),
  pending: z.number().int().nonnegative(),
})

export type TaskSummary = z.infer<typeof TaskSummarySchema>

/**
 * Root of tasks.jsonc.
 * Located at: specloom/changes/{id}/tasks.jsonc
 */
export const TasksFileSchema = z.object({
  version: z.literal(1),
  changeId: z.string(),
  /** ISO 8601 timestamp */
  acceptedAt: z.string(),
  tasks: z.array(AcceptedTaskSchema),
  /** Written on accept; hand-edited files may leave it out */
  summary: TaskSummarySchema.optional(),
})

export type TasksFile = z.infer<typeof TasksFileSchema>
