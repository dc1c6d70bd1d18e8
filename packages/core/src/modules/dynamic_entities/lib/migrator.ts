import type { Knex } from 'knex'
import { KeyedMutex, MutexTimeoutError } from '@tessera/shared/lib/async/mutex'
import { codecFor } from './codecs'
import type { ColumnSpec } from './columns'
import type { SqlDialect } from './dialect'
import { describeOperation, type DdlOperation } from './differ'
import { MigrationError } from './errors'
import {
  deleteMarker,
  insertMigrationLog,
  readMarker,
  writeAppliedMarker,
  writeMarkerFailure,
  type MarkerKey,
} from './markers'
import { entityKey, nameKey, scopeKey } from './naming'
import type { AppliedDescriptor } from './types'

export type MigrationRequest = {
  entityName: string
  tenantScope: string | null
  tableName: string
  operations: DdlOperation[]
  /** Marker version the operations were computed against */
  fromVersion: number
  targetVersion: number
  /** Snapshot stored on the marker once the operations commit */
  descriptor: AppliedDescriptor
}

export type MigrationOutcome = {
  status: 'applied' | 'skipped'
  version: number
  operations: DdlOperation[]
  attempts: number
}

export type MigrationResult =
  | { ok: true; applied: MigrationOutcome }
  | { ok: false; error: MigrationError }

export type DropRequest = {
  entityName: string
  tenantScope: string | null
  tableName: string
  fromVersion: number
}

export type MigrationExecutorOptions = {
  knex: Knex
  dialect: SqlDialect
  timeoutMs: number
  maxAttempts: number
  retryDelayMs: number
  locks?: KeyedMutex
  sleep?: (ms: number) => Promise<void>
}

const TRANSIENT_PG_CODES = new Set(['40001', '40P01', '55P03', '57014', '57P01', '53300'])
const TRANSIENT_NODE_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'SQLITE_BUSY', 'SQLITE_LOCKED'])

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

function readErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null
  return typeof error.code === 'string' ? error.code : null
}

export function isTransientDatabaseError(error: unknown): boolean {
  if (error instanceof Error && error.name === 'KnexTimeoutError') return true
  const code = readErrorCode(error)
  if (!code) return false
  return TRANSIENT_PG_CODES.has(code) || TRANSIENT_NODE_CODES.has(code) || code.startsWith('08')
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function createColumn(table: Knex.TableBuilder, column: ColumnSpec): Knex.ColumnBuilder {
  switch (column.sqlType) {
    case 'varchar':
      return table.string(column.name, column.length ?? 255)
    case 'text':
      return table.text(column.name)
    case 'bigint':
      return table.bigInteger(column.name)
    case 'numeric':
      return table.decimal(column.name, column.precision, column.scale ?? undefined)
    case 'boolean':
      return table.boolean(column.name)
    case 'timestamptz':
      return table.timestamp(column.name, { useTz: true })
    case 'uuid':
      return table.uuid(column.name)
  }
}

function defineColumn(table: Knex.TableBuilder, column: ColumnSpec, dialect: SqlDialect): Knex.ColumnBuilder {
  const builder = createColumn(table, column)
  if (column.nullable) builder.nullable()
  else builder.notNullable()
  const defaultValue = codecFor(column.kind, column.multi, dialect).encode(column.defaultValue)
  if (defaultValue !== null) builder.defaultTo(defaultValue)
  return builder
}

function defineSystemColumns(table: Knex.CreateTableBuilder, tableName: string): void {
  table.uuid('id').primary()
  table.uuid('organization_id').nullable()
  table.timestamp('created_at', { useTz: true }).notNullable()
  table.timestamp('updated_at', { useTz: true }).notNullable()
  table.text('search_text').nullable()
  table.index(['organization_id'], `${tableName.slice(0, 54)}_org_idx`)
}

async function applyOperation(trx: Knex.Transaction, op: DdlOperation, dialect: SqlDialect): Promise<void> {
  switch (op.type) {
    case 'CREATE_TABLE':
      await trx.schema.createTable(op.table, (table) => {
        defineSystemColumns(table, op.table)
        for (const column of op.columns) defineColumn(table, column, dialect)
      })
      return
    case 'ADD_COLUMN':
      await trx.schema.alterTable(op.table, (table) => {
        defineColumn(table, op.column, dialect)
      })
      return
    case 'ALTER_COLUMN':
      await trx.schema.alterTable(op.table, (table) => {
        defineColumn(table, op.to, dialect).alter()
      })
      return
    case 'REPLACE_COLUMN':
      await trx.schema.alterTable(op.table, (table) => {
        table.dropColumn(op.from.name)
      })
      await trx.schema.alterTable(op.table, (table) => {
        defineColumn(table, op.to, dialect)
      })
      return
    case 'DROP_COLUMN':
      await trx.schema.alterTable(op.table, (table) => {
        table.dropColumn(op.column.name)
      })
      return
    case 'DROP_TABLE':
      await trx.schema.dropTableIfExists(op.table)
      return
  }
}

/**
 * Applies DDL batches for one entity at a time. Each attempt runs in a single
 * transaction that also moves the version marker, so a failure leaves both the
 * table and the marker as they were.
 */
export class MigrationExecutor {
  private readonly knex: Knex
  private readonly dialect: SqlDialect
  private readonly timeoutMs: number
  private readonly maxAttempts: number
  private readonly retryDelayMs: number
  private readonly locks: KeyedMutex
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: MigrationExecutorOptions) {
    this.knex = options.knex
    this.dialect = options.dialect
    this.timeoutMs = options.timeoutMs
    this.maxAttempts = Math.max(1, options.maxAttempts)
    this.retryDelayMs = options.retryDelayMs
    this.locks = options.locks ?? new KeyedMutex()
    this.sleep = options.sleep ?? defaultSleep
  }

  async apply(request: MigrationRequest): Promise<MigrationResult> {
    const key = this.markerKey(request.entityName, request.tenantScope)
    return this.withEntityLock(request.entityName, request.tenantScope, request.targetVersion, async () => {
      const startedAt = Date.now()
      for (let attempt = 1; ; attempt += 1) {
        const current: { op: DdlOperation | null } = { op: null }
        let outcome: Omit<MigrationOutcome, 'attempts'>
        try {
          outcome = await this.runAttempt(request, key, current)
        } catch (err) {
          const error = this.classify(err, request, current.op)
          if (error.kind === 'stale_plan') return { ok: false, error }
          if (error.retryable && attempt < this.maxAttempts) {
            const delay = this.retryDelayMs * 2 ** (attempt - 1)
            console.warn(`[dynamic_entities.migrator] ${request.entityName} v${request.targetVersion} attempt ${attempt} failed (${error.kind}), retrying in ${delay}ms: ${error.message}`)
            await this.sleep(delay)
            continue
          }
          console.error(`[dynamic_entities.migrator] ${request.entityName} v${request.targetVersion} failed after ${attempt} attempt(s):`, error.message)
          await this.recordFailure(request, key, error, attempt, startedAt)
          return { ok: false, error }
        }
        if (outcome.status === 'applied') {
          // The marker is already committed.
          try {
            await this.log(request, key, 'applied', null, attempt, startedAt)
          } catch (logError) {
            console.error(`[dynamic_entities.migrator] could not log ${request.entityName} v${request.targetVersion}:`, logError)
          }
          console.info(
            `[dynamic_entities.migrator] ${request.entityName} v${request.fromVersion} -> v${request.targetVersion}: ${request.operations.map(describeOperation).join('; ') || 'no DDL'}`,
          )
        }
        return { ok: true, applied: { ...outcome, attempts: attempt } }
      }
    })
  }

  /** Drops the entity's table and marker in one transaction. */
  async drop(request: DropRequest): Promise<MigrationResult> {
    const key = this.markerKey(request.entityName, request.tenantScope)
    const operation: DdlOperation = { type: 'DROP_TABLE', table: request.tableName }
    return this.withEntityLock(request.entityName, request.tenantScope, 0, async () => {
      const startedAt = Date.now()
      try {
        await this.knex.transaction(async (trx) => {
          await this.prepareTransaction(trx, key)
          await applyOperation(trx, operation, this.dialect)
          await deleteMarker(trx, key)
        })
      } catch (err) {
        const error = this.classify(err, { ...request, targetVersion: 0 }, operation)
        console.error(`[dynamic_entities.migrator] dropping ${request.entityName} failed:`, error.message)
        return { ok: false, error }
      }
      try {
        await insertMigrationLog(this.knex, {
          ...key,
          entityName: request.entityName,
          fromVersion: request.fromVersion,
          toVersion: 0,
          operations: [operation],
          status: 'applied',
          error: null,
          attempts: 1,
          durationMs: Date.now() - startedAt,
        })
      } catch (logError) {
        console.error(`[dynamic_entities.migrator] could not log dropping ${request.entityName}:`, logError)
      }
      console.info(`[dynamic_entities.migrator] dropped ${request.entityName} (${request.tableName})`)
      return { ok: true, applied: { status: 'applied', version: 0, operations: [operation], attempts: 1 } }
    })
  }

  private markerKey(entityName: string, tenantScope: string | null): MarkerKey {
    return { nameKey: nameKey(entityName), scopeKey: scopeKey(tenantScope) }
  }

  private async withEntityLock(
    entityName: string,
    tenantScope: string | null,
    targetVersion: number,
    fn: () => Promise<MigrationResult>,
  ): Promise<MigrationResult> {
    try {
      return await this.locks.runExclusive(entityKey(entityName, tenantScope), fn, { timeoutMs: this.timeoutMs })
    } catch (err) {
      if (err instanceof MutexTimeoutError) {
        return {
          ok: false,
          error: new MigrationError(entityName, 'timeout', err.message, null, targetVersion, { cause: err }),
        }
      }
      throw err
    }
  }

  private async prepareTransaction(trx: Knex.Transaction, key: MarkerKey): Promise<void> {
    if (this.dialect !== 'postgresql') return
    const timeout = Math.max(1, Math.floor(this.timeoutMs))
    await trx.raw(`set local lock_timeout = ${timeout}`)
    await trx.raw(`set local statement_timeout = ${timeout}`)
    await trx.raw('select pg_advisory_xact_lock(hashtext(?))', [`dynamic_entities:${key.scopeKey}:${key.nameKey}`])
  }

  private async runAttempt(
    request: MigrationRequest,
    key: MarkerKey,
    current: { op: DdlOperation | null },
  ): Promise<Omit<MigrationOutcome, 'attempts'>> {
    const deadline = Date.now() + this.timeoutMs
    const checkDeadline = () => {
      if (Date.now() > deadline) {
        throw new MigrationError(
          request.entityName,
          'timeout',
          `Migration exceeded ${this.timeoutMs}ms`,
          current.op,
          request.targetVersion,
        )
      }
    }

    return this.knex.transaction(async (trx) => {
      await this.prepareTransaction(trx, key)
      const marker = await readMarker(trx, key)
      const appliedVersion = marker?.version ?? 0
      if (appliedVersion >= request.targetVersion) {
        return { status: 'skipped' as const, version: appliedVersion, operations: [] }
      }
      if (appliedVersion !== request.fromVersion) {
        throw new MigrationError(
          request.entityName,
          'stale_plan',
          `Plan computed against v${request.fromVersion} but v${appliedVersion} is applied`,
          null,
          request.targetVersion,
        )
      }
      for (const op of request.operations) {
        checkDeadline()
        current.op = op
        await applyOperation(trx, op, this.dialect)
      }
      current.op = null
      checkDeadline()
      await writeAppliedMarker(trx, key, request.descriptor)
      return { status: 'applied' as const, version: request.targetVersion, operations: request.operations }
    })
  }

  private classify(err: unknown, request: { entityName: string; targetVersion: number }, op: DdlOperation | null): MigrationError {
    if (err instanceof MigrationError) return err
    const kind = isTransientDatabaseError(err) ? 'transient' : 'structural'
    const where = op ? ` during ${describeOperation(op)}` : ''
    return new MigrationError(request.entityName, kind, `${errorMessage(err)}${where}`, op, request.targetVersion, { cause: err })
  }

  private async log(
    request: MigrationRequest,
    key: MarkerKey,
    status: 'applied' | 'failed',
    error: string | null,
    attempts: number,
    startedAt: number,
  ): Promise<void> {
    await insertMigrationLog(this.knex, {
      ...key,
      entityName: request.entityName,
      fromVersion: request.fromVersion,
      toVersion: request.targetVersion,
      operations: request.operations,
      status,
      error,
      attempts,
      durationMs: Date.now() - startedAt,
    })
  }

  private async recordFailure(
    request: MigrationRequest,
    key: MarkerKey,
    error: MigrationError,
    attempts: number,
    startedAt: number,
  ): Promise<void> {
    try {
      await writeMarkerFailure(this.knex, key, {
        entityName: request.entityName,
        tenantId: request.tenantScope,
        tableName: request.tableName,
        attemptedVersion: request.targetVersion,
        error: error.message,
      })
      await this.log(request, key, 'failed', error.message, attempts, startedAt)
    } catch (logError) {
      console.error(`[dynamic_entities.migrator] could not record failure for ${request.entityName}:`, logError)
    }
  }
}
