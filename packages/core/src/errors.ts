/**
 * Errors raised by the domain layer. Each carries a stable `code` that
 * callers (the CLI in particular) can switch on.
 */

export type MergeErrorCode = 'EMPTY_DELTA' | 'MISSING_SPEC'

/** A delta that cannot be applied to its base spec. */
export class MergeError extends Error {
  constructor(
    readonly code: MergeErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'MergeError'
  }
}

export type AdapterErrorCode =
  | 'NOT_INITIALIZED'
  | 'SPEC_NOT_FOUND'
  | 'CHANGE_NOT_FOUND'
  | 'TASK_NOT_FOUND'
  | 'REQUIREMENT_NOT_FOUND'
  | 'NO_TASKS'
  | 'ALREADY_ACCEPTED'
  | 'NOT_ACCEPTED'
  | 'ARCHIVE_EXISTS'
  | 'INVALID_TASKS_FILE'

/** A filesystem operation on the project that cannot proceed. */
export class AdapterError extends Error {
  constructor(
    readonly code: AdapterErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'AdapterError'
  }
}
