import type { Knex } from 'knex'
import { descriptorSubmissionSchema, dropEntitySchema } from '../data/validators'
import type { DynamicEntitiesConfig } from './config'
import type { DdlOperation } from './differ'
import {
  ConcurrentModificationError,
  DestructiveChangeRejected,
  issuesFromZod,
  NotFoundError,
  ValidationError,
  type ValidationIssue,
} from './errors'
import { listMarkers, readMarker, type MarkerState } from './markers'
import type { MigrationExecutor } from './migrator'
import { columnName, entityKey, nameKey, scopeKey } from './naming'
import type { ClusterNotifier } from './notifier'
import type { DynamicRepository, EntityDescription } from './repository'
import { fieldSignature, type DescriptorStore } from './store'
import type { SchemaSynchronizer } from './synchronizer'
import type { MappingState, RuntimeTypeBuilder } from './type-builder'
import type { DescriptorDraft, EntityDescriptor, FieldDescriptor } from './types'
import { validateDescriptor } from './validator'

export type SubmitResult = {
  descriptor: EntityDescriptor
  appliedVersion: number
  operations: DdlOperation[]
  changed: boolean
}

export type MutateOptions = {
  allowDestructive?: boolean
  /** Fail with a conflict instead of retrying when the stored version is not this one */
  baseVersion?: number
}

export type DescriptorMutator = (current: DescriptorDraft) => DescriptorDraft

export type DropResult = {
  entityName: string
  tableName: string
  droppedRows: number
}

export type EntityStatus = {
  entityName: string
  tenantScope: string | null
  tableName: string
  descriptorVersion: number
  appliedVersion: number
  inSync: boolean
  lastMigrationError: string | null
  lastMigrationErrorAt: Date | null
  lastMigrationAt: Date | null
  mappingState: MappingState
}

export type EntityTypeSummary = {
  name: string
  tenantScope: string | null
  label: string | null
  description: string | null
  version: number
  fieldCount: number
}

export type WarmUpResult = {
  ready: number
  failed: string[]
}

export type DynamicEntityServiceDeps = {
  knex: Knex
  store: DescriptorStore
  synchronizer: SchemaSynchronizer
  executor: MigrationExecutor
  builder: RuntimeTypeBuilder
  notifier: ClusterNotifier
  repository: DynamicRepository
  config: Pick<DynamicEntitiesConfig, 'saveMaxAttempts' | 'maxFieldsPerEntity'>
}

function toDraft(descriptor: EntityDescriptor): DescriptorDraft {
  return {
    name: descriptor.name,
    tenantScope: descriptor.tenantScope,
    label: descriptor.label,
    description: descriptor.description,
    fields: descriptor.fields.map((field) => ({ ...field })),
  }
}

function sameField(a: FieldDescriptor | null, b: FieldDescriptor | null): boolean {
  if (a === null || b === null) return a === b
  return fieldSignature([a]) === fieldSignature([b]) && (a.label ?? null) === (b.label ?? null)
}

function byColumn(fields: FieldDescriptor[]): Map<string, FieldDescriptor> {
  return new Map(fields.map((field): [string, FieldDescriptor] => [columnName(field.name), field]))
}

function pickText(mine: string | null | undefined, base: string | null | undefined, theirs: string | null): string | null {
  return (mine ?? null) !== (base ?? null) ? mine ?? null : theirs
}

/**
 * Replays what `draft` changed relative to `base` on top of `latest`.
 * Returns null when both sides changed the same field in different ways.
 */
function rebaseDraft(
  draft: DescriptorDraft,
  base: EntityDescriptor | null,
  latest: EntityDescriptor | null,
): DescriptorDraft | null {
  if (!latest) return base ? null : draft
  const baseFields = byColumn(base?.fields ?? [])
  const latestFields = byColumn(latest.fields)
  const draftFields = byColumn(draft.fields)

  // column -> wanted field, or null for a removal
  const touched = new Map<string, FieldDescriptor | null>()
  for (const [column, field] of draftFields) {
    if (!sameField(baseFields.get(column) ?? null, field)) touched.set(column, field)
  }
  for (const column of baseFields.keys()) {
    if (!draftFields.has(column)) touched.set(column, null)
  }
  for (const [column, wanted] of touched) {
    const theirs = latestFields.get(column) ?? null
    if (sameField(baseFields.get(column) ?? null, theirs)) continue
    if (!sameField(wanted, theirs)) return null
  }

  const fields: FieldDescriptor[] = []
  for (const field of latest.fields) {
    const column = columnName(field.name)
    if (!touched.has(column)) fields.push(field)
    else {
      const wanted = touched.get(column)
      if (wanted) fields.push(wanted)
    }
  }
  for (const field of draft.fields) {
    const column = columnName(field.name)
    if (touched.has(column) && !latestFields.has(column)) fields.push(field)
  }

  return {
    name: draft.name,
    tenantScope: draft.tenantScope,
    label: pickText(draft.label, base?.label, latest.label),
    description: pickText(draft.description, base?.description, latest.description),
    fields,
  }
}

function implicitRemovals(draft: DescriptorDraft, current: EntityDescriptor): ValidationIssue[] {
  const kept = new Set(draft.fields.map((field) => columnName(field.name)))
  return current.fields
    .filter((field) => !kept.has(columnName(field.name)))
    .map((field): ValidationIssue => ({
      path: 'fields',
      code: 'removal_requires_base_version',
      message: `Removing "${field.name}" requires baseVersion`,
      field: field.name,
    }))
}

function rejection(entityName: string, issues: ValidationIssue[]): Error {
  const destructive = issues.find((issue) => issue.code === 'destructive_change_rejected')
  if (destructive) return new DestructiveChangeRejected(entityName, destructive.field ?? null, destructive.message, issues)
  return new ValidationError(issues)
}

/**
 * Entry point for everything that changes entity definitions: validation,
 * optimistic save, physical migration and cluster notification run here in
 * that order.
 */
export class DynamicEntityService {
  private readonly knex: Knex
  private readonly store: DescriptorStore
  private readonly synchronizer: SchemaSynchronizer
  private readonly executor: MigrationExecutor
  private readonly builder: RuntimeTypeBuilder
  private readonly notifier: ClusterNotifier
  private readonly repository: DynamicRepository
  private readonly config: DynamicEntityServiceDeps['config']

  constructor(deps: DynamicEntityServiceDeps) {
    this.knex = deps.knex
    this.store = deps.store
    this.synchronizer = deps.synchronizer
    this.executor = deps.executor
    this.builder = deps.builder
    this.notifier = deps.notifier
    this.repository = deps.repository
    this.config = deps.config
  }

  async submit(input: unknown): Promise<SubmitResult> {
    const parsed = descriptorSubmissionSchema.safeParse(input)
    if (!parsed.success) throw new ValidationError(issuesFromZod(parsed.error))
    const { baseVersion, allowDestructive, ...draft } = parsed.data
    // What the draft was written against, captured on the first attempt.
    let base: EntityDescriptor | null | undefined
    return this.commit(draft.name, draft.tenantScope, (current) => {
      if (base === undefined) {
        base = current
        const removals = baseVersion === undefined && current ? implicitRemovals(draft, current) : []
        if (removals.length) throw new ValidationError(removals)
        return draft
      }
      const rebased = rebaseDraft(draft, base, current)
      if (!rebased) throw new ConcurrentModificationError(draft.name, base?.version ?? 0, current?.version ?? null)
      return rebased
    }, { baseVersion, allowDestructive })
  }

  /** Re-applies `mutator` to the latest stored descriptor on every attempt. */
  async mutate(
    name: string,
    tenantScope: string | null,
    mutator: DescriptorMutator,
    options: MutateOptions = {},
  ): Promise<SubmitResult> {
    return this.commit(name, tenantScope, (current) => {
      if (!current) throw new NotFoundError('entity', name)
      return mutator(toDraft(current))
    }, options)
  }

  async addFields(
    name: string,
    tenantScope: string | null,
    fields: FieldDescriptor[],
    options: MutateOptions = {},
  ): Promise<SubmitResult> {
    return this.mutate(name, tenantScope, (draft) => ({ ...draft, fields: [...draft.fields, ...fields] }), options)
  }

  async drop(input: unknown): Promise<DropResult> {
    const parsed = dropEntitySchema.safeParse(input)
    if (!parsed.success) throw new ValidationError(issuesFromZod(parsed.error))
    const { name, tenantScope, force } = parsed.data
    const descriptor = await this.store.findByName(name, tenantScope)
    if (!descriptor) throw new NotFoundError('entity', name)

    const candidates = await this.store.listAll(tenantScope === null ? undefined : tenantScope)
    const referrers = candidates
      .filter((other) => other.id !== descriptor.id)
      .filter((other) => other.fields.some((field) => field.kind === 'reference' && nameKey(field.target ?? '') === nameKey(descriptor.name)))
      .map((other) => other.name)
    if (referrers.length) {
      throw new DestructiveChangeRejected(descriptor.name, null, `referenced by ${referrers.join(', ')}`)
    }

    const key = { nameKey: nameKey(descriptor.name), scopeKey: scopeKey(descriptor.tenantScope) }
    const marker = await readMarker(this.knex, key)
    const rows = await this.countRows(descriptor.tableName)
    if (rows > 0 && !force) {
      throw new DestructiveChangeRejected(descriptor.name, null, `${rows} record(s) exist; pass force to drop them`)
    }

    const result = await this.executor.drop({
      entityName: descriptor.name,
      tenantScope: descriptor.tenantScope,
      tableName: descriptor.tableName,
      fromVersion: marker?.version ?? 0,
    })
    if (!result.ok) throw result.error
    await this.store.remove(descriptor.name, descriptor.tenantScope)
    this.builder.forget(entityKey(descriptor.name, descriptor.tenantScope))
    try {
      await this.notifier.publish(descriptor.name, 0, descriptor.tenantScope)
    } catch (err) {
      console.error(`[dynamic_entities.service] Failed to announce drop of ${descriptor.name}:`, err)
    }
    return { entityName: descriptor.name, tableName: descriptor.tableName, droppedRows: rows }
  }

  async status(tenantScope?: string | null): Promise<EntityStatus[]> {
    const [descriptors, markers] = await Promise.all([this.store.listAll(tenantScope), listMarkers(this.knex)])
    const byKey = new Map<string, MarkerState>(markers.map((marker) => [`${marker.scopeKey}:${marker.nameKey}`, marker] as const))
    return descriptors.map((descriptor) => {
      const key = entityKey(descriptor.name, descriptor.tenantScope)
      const marker = byKey.get(key)
      const appliedVersion = marker?.version ?? 0
      return {
        entityName: descriptor.name,
        tenantScope: descriptor.tenantScope,
        tableName: descriptor.tableName,
        descriptorVersion: descriptor.version,
        appliedVersion,
        inSync: appliedVersion === descriptor.version,
        lastMigrationError: marker?.lastError ?? null,
        lastMigrationErrorAt: marker?.lastErrorAt ?? null,
        lastMigrationAt: marker?.appliedAt ?? null,
        mappingState: this.builder.state(key),
      }
    })
  }

  async listEntityTypes(tenantScope?: string | null): Promise<EntityTypeSummary[]> {
    const descriptors = await this.store.listAll(tenantScope)
    return descriptors.map((descriptor) => ({
      name: descriptor.name,
      tenantScope: descriptor.tenantScope,
      label: descriptor.label,
      description: descriptor.description,
      version: descriptor.version,
      fieldCount: descriptor.fields.length,
    }))
  }

  async describe(name: string, tenantScope: string | null): Promise<EntityDescription> {
    return this.repository.describe({ entity: name, tenantScope })
  }

  /** Synchronizes and builds every stored entity; one failure does not stop the rest. */
  async warmUp(): Promise<WarmUpResult> {
    const descriptors = await this.store.listAll()
    const failed: string[] = []
    for (const descriptor of descriptors) {
      try {
        await this.repository.prepare({ entity: descriptor.name, tenantScope: descriptor.tenantScope })
      } catch (err) {
        failed.push(entityKey(descriptor.name, descriptor.tenantScope))
        console.error(`[dynamic_entities.service] Warm-up of ${descriptor.name} v${descriptor.version} failed:`, err)
      }
    }
    const ready = descriptors.length - failed.length
    console.info(`[dynamic_entities.service] Warmed up ${ready}/${descriptors.length} entities`)
    return { ready, failed }
  }

  private async commit(
    name: string,
    tenantScope: string | null,
    build: (current: EntityDescriptor | null) => DescriptorDraft,
    options: MutateOptions,
  ): Promise<SubmitResult> {
    const maxAttempts = options.baseVersion === undefined ? Math.max(1, this.config.saveMaxAttempts) : 1
    const key = entityKey(name, tenantScope)
    for (let attempt = 1; ; attempt += 1) {
      const current = await this.store.findByName(name, tenantScope)
      const currentVersion = current?.version ?? 0
      if (options.baseVersion !== undefined && options.baseVersion !== currentVersion) {
        throw new ConcurrentModificationError(name, options.baseVersion, current ? current.version : null)
      }
      const draft = build(current)
      const everything = await this.store.listAll()
      const visible = everything.filter((descriptor) => descriptor.tenantScope === null || descriptor.tenantScope === tenantScope)
      const tableOwners = new Map(everything
        .filter((descriptor) => entityKey(descriptor.name, descriptor.tenantScope) !== key)
        .map((descriptor): [string, string] => [descriptor.tableName, descriptor.name]))
      const result = validateDescriptor(draft, current, {
        allowDestructive: options.allowDestructive,
        knownEntities: visible.map((descriptor) => descriptor.name),
        tableOwners,
        maxFields: this.config.maxFieldsPerEntity,
      })
      if (!result.ok) throw rejection(draft.name, result.issues)

      try {
        const saved = await this.store.save(draft, { expectedVersion: currentVersion })
        const synced = await this.synchronizer.synchronize(saved.descriptor)
        return {
          descriptor: saved.descriptor,
          appliedVersion: synced.appliedVersion,
          operations: synced.operations,
          changed: saved.changed,
        }
      } catch (err) {
        if (err instanceof ConcurrentModificationError && attempt < maxAttempts) {
          console.warn(`[dynamic_entities.service] ${name} changed concurrently, retrying (${attempt}/${maxAttempts})`)
          continue
        }
        throw err
      }
    }
  }

  private async countRows(tableName: string): Promise<number> {
    if (!(await this.knex.schema.hasTable(tableName))) return 0
    const [row] = await this.knex(tableName).count({ count: '*' })
    return Number(row?.count ?? 0)
  }
}
