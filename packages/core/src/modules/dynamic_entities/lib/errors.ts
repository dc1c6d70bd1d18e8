import type { ZodError } from 'zod'
import type { DdlOperation } from './differ'

export type ValidationIssueCode =
  | 'invalid_name'
  | 'reserved_name'
  | 'name_too_long'
  | 'duplicate_field'
  | 'column_collision'
  | 'case_only_rename'
  | 'too_many_fields'
  | 'invalid_constraint'
  | 'invalid_options'
  | 'invalid_default'
  | 'missing_default'
  | 'unknown_reference'
  | 'destructive_change_rejected'
  | 'invalid_value'
  | 'unknown_field'
  | 'reference_not_found'
  | 'record_referenced'
  | 'table_name_collision'
  | 'removal_requires_base_version'

export type ValidationIssue = {
  path: string
  code: ValidationIssueCode
  message: string
  field?: string
}

export type DynamicEntityErrorCode =
  | 'validation_failed'
  | 'destructive_change_rejected'
  | 'concurrent_modification'
  | 'migration_failed'
  | 'schema_not_ready'
  | 'not_found'

export abstract class DynamicEntityError extends Error {
  abstract readonly code: DynamicEntityErrorCode
  readonly retryable: boolean = false
}

export class ValidationError extends DynamicEntityError {
  readonly code = 'validation_failed'

  constructor(readonly issues: ValidationIssue[], message = 'Validation failed') {
    super(message)
    this.name = 'ValidationError'
  }
}

export class DestructiveChangeRejected extends DynamicEntityError {
  readonly code = 'destructive_change_rejected'

  constructor(
    readonly entityName: string,
    readonly field: string | null,
    readonly reason: string,
    readonly issues: ValidationIssue[] = [],
  ) {
    super(field ? `Destructive change to "${entityName}.${field}" rejected: ${reason}` : `Destructive change to "${entityName}" rejected: ${reason}`)
    this.name = 'DestructiveChangeRejected'
  }
}

export class ConcurrentModificationError extends DynamicEntityError {
  readonly code = 'concurrent_modification'
  override readonly retryable = true

  constructor(
    readonly entityName: string,
    readonly expectedVersion: number | null,
    readonly actualVersion: number | null,
  ) {
    super(`Entity "${entityName}" was modified concurrently (expected version ${expectedVersion ?? 'none'}, found ${actualVersion ?? 'none'})`)
    this.name = 'ConcurrentModificationError'
  }
}

export type MigrationFailureKind = 'timeout' | 'transient' | 'structural' | 'stale_plan'

export class MigrationError extends DynamicEntityError {
  readonly code = 'migration_failed'
  override readonly retryable: boolean

  constructor(
    readonly entityName: string,
    readonly kind: MigrationFailureKind,
    message: string,
    readonly operation: DdlOperation | null = null,
    readonly targetVersion: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'MigrationError'
    this.retryable = kind !== 'structural'
  }
}

export class SchemaNotReadyError extends DynamicEntityError {
  readonly code = 'schema_not_ready'
  override readonly retryable = true

  constructor(readonly entityKey: string, readonly timeoutMs: number) {
    super(`Mapping for "${entityKey}" was not ready within ${timeoutMs}ms`)
    this.name = 'SchemaNotReadyError'
  }
}

export class NotFoundError extends DynamicEntityError {
  readonly code = 'not_found'

  constructor(readonly resource: 'entity' | 'record', readonly identifier: string) {
    super(resource === 'entity' ? `Entity "${identifier}" is not defined` : `Record "${identifier}" not found`)
    this.name = 'NotFoundError'
  }
}

/** Flattens zod issues; unrecognized keys become one `unknown_field` issue per key. */
export function issuesFromZod(error: ZodError, prefix = ''): ValidationIssue[] {
  return error.issues.flatMap((issue): ValidationIssue[] => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.')
    if (issue.code === 'unrecognized_keys') {
      return issue.keys.map((key) => ({
        path: [path, key].filter(Boolean).join('.'),
        code: 'unknown_field',
        message: `Unknown field "${key}"`,
        field: key,
      }))
    }
    const head = issue.path[0]
    return [{ path, code: 'invalid_value', message: issue.message, field: typeof head === 'string' ? head : undefined }]
  })
}
