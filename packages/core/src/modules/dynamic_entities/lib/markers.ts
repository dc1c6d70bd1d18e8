import { randomUUID } from 'crypto'
import type { Knex } from 'knex'
import { z } from 'zod'
import { FIELD_KINDS } from './kinds'
import { parseJsonColumn, toDate } from './codecs'
import type { AppliedDescriptor } from './types'
import type { DdlOperation } from './differ'
import type { SchemaMigrationStatus } from '../data/entities'

export const MARKERS_TABLE = 'dynamic_schema_versions'
export const MIGRATION_LOG_TABLE = 'dynamic_schema_migrations'

export type MarkerKey = {
  nameKey: string
  scopeKey: string
}

export type MarkerState = MarkerKey & {
  entityName: string
  tenantId: string | null
  tableName: string
  version: number
  appliedDescriptor: AppliedDescriptor | null
  appliedAt: Date | null
  lastError: string | null
  lastErrorAt: Date | null
  lastAttemptedVersion: number | null
}

export type MigrationLogEntry = MarkerKey & {
  entityName: string
  fromVersion: number
  toVersion: number
  operations: DdlOperation[]
  status: SchemaMigrationStatus
  error: string | null
  attempts: number
  durationMs: number
}

const fieldSnapshotSchema = z.object({
  name: z.string(),
  kind: z.enum(FIELD_KINDS),
  nullable: z.boolean(),
  defaultValue: z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]).nullable().optional(),
  constraints: z.object({
    maxLength: z.number().optional(),
    regex: z.string().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    precision: z.number().optional(),
    scale: z.number().optional(),
  }).optional(),
  options: z.array(z.string()).optional(),
  multi: z.boolean().optional(),
  target: z.string().optional(),
  label: z.string().optional(),
})

export const appliedDescriptorSchema = z.object({
  name: z.string(),
  tenantScope: z.string().nullable(),
  tableName: z.string(),
  version: z.number().int(),
  fields: z.array(fieldSnapshotSchema),
})

const markerRowSchema = z.object({
  entity_name: z.string(),
  name_key: z.string(),
  scope_key: z.string(),
  tenant_id: z.string().nullable(),
  table_name: z.string(),
  version: z.coerce.number().int(),
  applied_descriptor: z.unknown(),
  applied_at: z.unknown(),
  last_error: z.string().nullable(),
  last_error_at: z.unknown(),
  last_attempted_version: z.coerce.number().int().nullable(),
})

function decodeAppliedDescriptor(raw: unknown): AppliedDescriptor | null {
  if (raw === null || raw === undefined) return null
  const parsed = appliedDescriptorSchema.safeParse(parseJsonColumn(raw))
  if (!parsed.success) {
    console.warn('[dynamic_entities.markers] Ignoring unreadable applied descriptor snapshot', parsed.error.issues[0])
    return null
  }
  return parsed.data
}

function toMarkerState(row: unknown): MarkerState {
  const parsed = markerRowSchema.parse(row)
  return {
    entityName: parsed.entity_name,
    nameKey: parsed.name_key,
    scopeKey: parsed.scope_key,
    tenantId: parsed.tenant_id,
    tableName: parsed.table_name,
    version: parsed.version,
    appliedDescriptor: decodeAppliedDescriptor(parsed.applied_descriptor),
    appliedAt: toDate(parsed.applied_at),
    lastError: parsed.last_error,
    lastErrorAt: toDate(parsed.last_error_at),
    lastAttemptedVersion: parsed.last_attempted_version,
  }
}

export async function readMarker(db: Knex | Knex.Transaction, key: MarkerKey): Promise<MarkerState | null> {
  const row: unknown = await db(MARKERS_TABLE)
    .where({ name_key: key.nameKey, scope_key: key.scopeKey })
    .first()
  return row ? toMarkerState(row) : null
}

export async function listMarkers(db: Knex | Knex.Transaction): Promise<MarkerState[]> {
  const rows: unknown[] = await db(MARKERS_TABLE).select('*')
  return rows.map(toMarkerState)
}

async function upsertMarker(
  db: Knex | Knex.Transaction,
  key: MarkerKey,
  insert: Record<string, unknown>,
  update: Record<string, unknown>,
): Promise<void> {
  const updated = await db(MARKERS_TABLE)
    .where({ name_key: key.nameKey, scope_key: key.scopeKey })
    .update({ ...update, updated_at: new Date() })
  if (updated > 0) return
  await db(MARKERS_TABLE).insert({
    id: randomUUID(),
    name_key: key.nameKey,
    scope_key: key.scopeKey,
    version: 0,
    ...insert,
    ...update,
    updated_at: new Date(),
  })
}

/** Records a successful migration; must run inside the DDL transaction. */
export async function writeAppliedMarker(
  trx: Knex.Transaction,
  key: MarkerKey,
  descriptor: AppliedDescriptor,
): Promise<void> {
  await upsertMarker(
    trx,
    key,
    { entity_name: descriptor.name, tenant_id: descriptor.tenantScope },
    {
      table_name: descriptor.tableName,
      version: descriptor.version,
      applied_descriptor: JSON.stringify(descriptor),
      applied_at: new Date(),
      last_error: null,
      last_error_at: null,
      last_attempted_version: descriptor.version,
    },
  )
}

/** Records a failed attempt without touching the applied version. */
export async function writeMarkerFailure(
  db: Knex,
  key: MarkerKey,
  failure: { entityName: string; tenantId: string | null; tableName: string; attemptedVersion: number; error: string },
): Promise<void> {
  await upsertMarker(
    db,
    key,
    { entity_name: failure.entityName, tenant_id: failure.tenantId, table_name: failure.tableName },
    {
      last_error: failure.error,
      last_error_at: new Date(),
      last_attempted_version: failure.attemptedVersion,
    },
  )
}

export async function deleteMarker(trx: Knex | Knex.Transaction, key: MarkerKey): Promise<void> {
  await trx(MARKERS_TABLE).where({ name_key: key.nameKey, scope_key: key.scopeKey }).delete()
}

export async function insertMigrationLog(db: Knex, entry: MigrationLogEntry): Promise<void> {
  await db(MIGRATION_LOG_TABLE).insert({
    id: randomUUID(),
    entity_name: entry.entityName,
    name_key: entry.nameKey,
    scope_key: entry.scopeKey,
    from_version: entry.fromVersion,
    to_version: entry.toVersion,
    operations: JSON.stringify(entry.operations),
    status: entry.status,
    error: entry.error,
    attempts: entry.attempts,
    duration_ms: Math.round(entry.durationMs),
    created_at: new Date(),
  })
}

export async function countMigrationLog(db: Knex, key: MarkerKey, status?: SchemaMigrationStatus): Promise<number> {
  const query = db(MIGRATION_LOG_TABLE).where({ name_key: key.nameKey, scope_key: key.scopeKey })
  if (status) query.andWhere({ status })
  const [row] = await query.count({ count: '*' })
  return Number(row?.count ?? 0)
}
