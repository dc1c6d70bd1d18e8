import { randomUUID } from 'crypto'
import type { Knex } from 'knex'
import { z } from 'zod'
import { containsPattern } from '@tessera/shared/lib/db/escapeLikePattern'
import { CodecError, codecFor, timestampCodec, toDate, type ColumnCodec, type DbValue } from './codecs'
import type { SqlDialect } from './dialect'
import { issuesFromZod, NotFoundError, ValidationError, type ValidationIssue } from './errors'
import type { FieldValue } from './kinds'
import { readMarker } from './markers'
import { entityKey, nameKey, scopeKey } from './naming'
import { normalizeFilters, normalizePaging, SortDir, type Filter, type QueryResult, type RecordQuery } from './query'
import type { DescriptorStore } from './store'
import type { SchemaSynchronizer } from './synchronizer'
import { mappingJsonSchema, type EntityJsonSchema, type GeneratedMapping, type RuntimeTypeBuilder } from './type-builder'
import type { EntityRef, FieldDescriptor } from './types'

export type DynamicRecord = Record<string, FieldValue | null> & {
  id: string
  organizationId: string | null
  createdAt: Date
  updatedAt: Date
}

export type RecordValues = Record<string, unknown>

export type EntityDescription = {
  entity: string
  tenantScope: string | null
  version: number
  tableName: string
  fields: FieldDescriptor[]
  jsonSchema: EntityJsonSchema
}

export type DynamicRepositoryDeps = {
  knex: Knex
  dialect: SqlDialect
  store: DescriptorStore
  synchronizer: SchemaSynchronizer
  builder: RuntimeTypeBuilder
}

type ColumnTarget = {
  column: string
  codec: ColumnCodec
  multi: boolean
}

const SYSTEM_FIELDS: ReadonlyMap<string, { column: string; timestamp: boolean }> = new Map([
  ['id', { column: 'id', timestamp: false }],
  ['organizationId', { column: 'organization_id', timestamp: false }],
  ['createdAt', { column: 'created_at', timestamp: true }],
  ['updatedAt', { column: 'updated_at', timestamp: true }],
])

const COMPARISON: Record<'gt' | 'gte' | 'lt' | 'lte', string> = { gt: '>', gte: '>=', lt: '<', lte: '<=' }

const uuidSchema = z.string().uuid()

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function invalidValue(path: string, field: string, message: string): ValidationError {
  return new ValidationError([{ path, code: 'invalid_value', message, field }])
}

/** Lower-cased text and enum values, the haystack of free-text search. */
export function buildSearchText(mapping: GeneratedMapping, values: RecordValues): string | null {
  const parts: string[] = []
  for (const field of mapping.fields) {
    if (!field.searchable) continue
    const value = values[field.field]
    if (typeof value === 'string' && value.length) parts.push(value)
    else if (Array.isArray(value)) parts.push(...value.filter((item): item is string => typeof item === 'string'))
  }
  return parts.length ? parts.join(' ').toLowerCase() : null
}

/**
 * CRUD over the physical table of a dynamic entity. Every call resolves the
 * current mapping first, synchronizing the table when the stored descriptor
 * is ahead of the applied schema.
 */
export class DynamicRepository {
  private readonly knex: Knex
  private readonly dialect: SqlDialect
  private readonly store: DescriptorStore
  private readonly synchronizer: SchemaSynchronizer
  private readonly builder: RuntimeTypeBuilder

  constructor(deps: DynamicRepositoryDeps) {
    this.knex = deps.knex
    this.dialect = deps.dialect
    this.store = deps.store
    this.synchronizer = deps.synchronizer
    this.builder = deps.builder
  }

  async prepare(ref: EntityRef): Promise<GeneratedMapping> {
    const descriptor = await this.store.resolve(ref.entity, ref.tenantScope ?? null)
    if (!descriptor) throw new NotFoundError('entity', ref.entity)
    const key = entityKey(descriptor.name, descriptor.tenantScope)
    const active = this.builder.peek(key)
    const sameDescriptor = active?.descriptorId === descriptor.id
    if (active && sameDescriptor && active.version === descriptor.version) return active

    const marker = await readMarker(this.knex, { nameKey: nameKey(descriptor.name), scopeKey: scopeKey(descriptor.tenantScope) })
    if ((marker?.version ?? 0) < descriptor.version) {
      await this.synchronizer.synchronize(descriptor)
    }
    // A dropped and re-created entity starts over at version 1.
    if (active && !sameDescriptor) this.builder.forget(key)
    else if (active) this.builder.markStale(key, descriptor.version)
    return this.builder.resolve(key, async () => descriptor)
  }

  async find(ref: EntityRef, query: RecordQuery = {}): Promise<QueryResult<DynamicRecord>> {
    const mapping = await this.prepare(ref)
    const { page, pageSize } = normalizePaging(query)
    const base = this.scoped(mapping, ref)
    for (const filter of normalizeFilters(query.filters)) this.applyFilter(base, mapping, filter)
    const search = query.search?.trim()
    if (search) {
      base.whereRaw("search_text like ? escape '\\'", [containsPattern(search.toLowerCase())])
    }

    const [countRow] = await base.clone().count({ count: '*' })
    const total = Number(countRow?.count ?? 0)

    const sorts = query.sort?.length ? query.sort : [{ field: 'createdAt', dir: SortDir.Desc }]
    for (const sort of sorts) {
      const target = this.resolveColumn(mapping, sort.field, 'sort')
      base.orderBy(target.column, sort.dir === SortDir.Desc ? 'desc' : 'asc')
    }
    if (!sorts.some((sort) => sort.field === 'id')) base.orderBy('id', 'asc')

    const rows: unknown[] = await base.select('*').limit(pageSize).offset((page - 1) * pageSize)
    return { items: rows.map((row) => this.decodeRow(mapping, row)), page, pageSize, total }
  }

  async findOne(ref: EntityRef, id: string): Promise<DynamicRecord | null> {
    const mapping = await this.prepare(ref)
    if (!uuidSchema.safeParse(id).success) return null
    const row: unknown = await this.scoped(mapping, ref).where({ id }).first()
    return row ? this.decodeRow(mapping, row) : null
  }

  /** Creates a record when `values.id` is absent, otherwise updates it. Returns the record id. */
  async save(ref: EntityRef, values: RecordValues): Promise<string> {
    const mapping = await this.prepare(ref)
    const { id, ...payload } = values
    if (id === undefined || id === null) return this.create(mapping, ref, payload)
    if (typeof id !== 'string') throw invalidValue('id', 'id', 'id must be a string')
    return this.update(mapping, ref, id, payload)
  }

  async delete(ref: EntityRef, id: string): Promise<void> {
    const mapping = await this.prepare(ref)
    if (!uuidSchema.safeParse(id).success) throw new NotFoundError('record', id)
    const existing: unknown = await this.scoped(mapping, ref).where({ id }).first('id')
    if (!existing) throw new NotFoundError('record', id)
    await this.checkReferrers(mapping, id)
    const deleted = await this.scoped(mapping, ref).where({ id }).delete()
    if (!deleted) throw new NotFoundError('record', id)
  }

  async count(ref: EntityRef): Promise<number> {
    const mapping = await this.prepare(ref)
    const [row] = await this.scoped(mapping, ref).count({ count: '*' })
    return Number(row?.count ?? 0)
  }

  async describe(ref: EntityRef): Promise<EntityDescription> {
    const mapping = await this.prepare(ref)
    return {
      entity: mapping.entityName,
      tenantScope: mapping.tenantScope,
      version: mapping.version,
      tableName: mapping.tableName,
      fields: mapping.fields.map((field) => ({ ...field.descriptor })),
      jsonSchema: mappingJsonSchema(mapping),
    }
  }

  private async create(mapping: GeneratedMapping, ref: EntityRef, payload: RecordValues): Promise<string> {
    const withDefaults: RecordValues = { ...payload }
    for (const field of mapping.fields) {
      if (withDefaults[field.field] !== undefined || field.defaultValue === null) continue
      withDefaults[field.field] = Array.isArray(field.defaultValue) ? [...field.defaultValue] : field.defaultValue
    }
    const parsed = mapping.inputSchema.safeParse(withDefaults)
    if (!parsed.success) throw new ValidationError(issuesFromZod(parsed.error))
    await this.checkReferences(mapping, ref, parsed.data)

    const id = randomUUID()
    const now = timestampCodec(this.dialect).encode(new Date())
    await this.knex(mapping.tableName).insert({
      ...this.encodeValues(mapping, parsed.data),
      id,
      organization_id: ref.organizationId ?? null,
      created_at: now,
      updated_at: now,
      search_text: buildSearchText(mapping, parsed.data),
    })
    return id
  }

  private async update(mapping: GeneratedMapping, ref: EntityRef, id: string, payload: RecordValues): Promise<string> {
    if (!uuidSchema.safeParse(id).success) throw new NotFoundError('record', id)
    const row: unknown = await this.scoped(mapping, ref).where({ id }).first()
    if (!row) throw new NotFoundError('record', id)
    const parsed = mapping.updateSchema.safeParse(payload)
    if (!parsed.success) throw new ValidationError(issuesFromZod(parsed.error))
    await this.checkReferences(mapping, ref, parsed.data)

    const merged: RecordValues = { ...this.decodeRow(mapping, row), ...parsed.data }
    await this.scoped(mapping, ref).where({ id }).update({
      ...this.encodeValues(mapping, parsed.data),
      updated_at: timestampCodec(this.dialect).encode(new Date()),
      search_text: buildSearchText(mapping, merged),
    })
    return id
  }

  private async checkReferences(mapping: GeneratedMapping, ref: EntityRef, values: RecordValues): Promise<void> {
    const issues: ValidationIssue[] = []
    for (const field of mapping.fields) {
      const value = values[field.field]
      const targetName = field.descriptor.target
      if (field.kind !== 'reference' || typeof value !== 'string' || !targetName) continue
      const target = nameKey(targetName) === nameKey(mapping.entityName)
        ? mapping
        : await this.prepare({ entity: targetName, tenantScope: ref.tenantScope })
      const exists: unknown = await this.knex(target.tableName).where({ id: value }).first('id')
      if (!exists) {
        issues.push({
          path: field.field,
          code: 'reference_not_found',
          message: `${target.entityName} "${value}" does not exist`,
          field: field.field,
        })
      }
    }
    if (issues.length) throw new ValidationError(issues)
  }

  /** Rejects deleting a row that reference fields of any entity still point at. */
  private async checkReferrers(mapping: GeneratedMapping, id: string): Promise<void> {
    const issues: ValidationIssue[] = []
    for (const descriptor of await this.store.listAll()) {
      const overlaps = descriptor.tenantScope === null || mapping.tenantScope === null || descriptor.tenantScope === mapping.tenantScope
      if (!overlaps) continue
      const fields = descriptor.fields.filter((field) =>
        field.kind === 'reference' && field.target !== undefined && nameKey(field.target) === nameKey(mapping.entityName))
      if (!fields.length) continue
      const referrer = entityKey(descriptor.name, descriptor.tenantScope) === mapping.key
        ? mapping
        : await this.prepare({ entity: descriptor.name, tenantScope: descriptor.tenantScope })
      for (const field of fields) {
        const column = referrer.byField.get(field.name)?.column
        if (!column) continue
        const qb = this.knex(referrer.tableName).where(column, id)
        if (referrer === mapping) qb.whereNot('id', id)
        const [row] = await qb.count({ count: '*' })
        const count = Number(row?.count ?? 0)
        if (count > 0) {
          issues.push({
            path: 'id',
            code: 'record_referenced',
            message: `${count} ${referrer.entityName} record(s) still reference "${id}" through "${field.name}"`,
            field: field.name,
          })
        }
      }
    }
    if (issues.length) throw new ValidationError(issues)
  }

  private scoped(mapping: GeneratedMapping, ref: EntityRef): Knex.QueryBuilder {
    const qb = this.knex(mapping.tableName)
    if (ref.organizationId) qb.where('organization_id', ref.organizationId)
    return qb
  }

  private encodeValues(mapping: GeneratedMapping, values: RecordValues): Record<string, DbValue> {
    const out: Record<string, DbValue> = {}
    for (const field of mapping.fields) {
      if (!(field.field in values)) continue
      out[field.column] = field.codec.encode(values[field.field])
    }
    return out
  }

  private decodeRow(mapping: GeneratedMapping, row: unknown): DynamicRecord {
    if (!isRow(row)) throw new Error(`[dynamic_entities.repository] Unexpected row in ${mapping.tableName}`)
    const createdAt = toDate(row.created_at)
    const updatedAt = toDate(row.updated_at)
    if (!createdAt || !updatedAt) {
      throw new Error(`[dynamic_entities.repository] Row ${String(row.id)} in ${mapping.tableName} has no timestamps`)
    }
    const record: DynamicRecord = {
      id: String(row.id),
      organizationId: row.organization_id === null || row.organization_id === undefined ? null : String(row.organization_id),
      createdAt,
      updatedAt,
    }
    for (const field of mapping.fields) {
      record[field.field] = field.codec.decode(row[field.column])
    }
    return record
  }

  private resolveColumn(mapping: GeneratedMapping, field: string, path: string): ColumnTarget {
    const mapped = mapping.byField.get(field)
    if (mapped) return { column: mapped.column, codec: mapped.codec, multi: mapped.multi }
    const system = SYSTEM_FIELDS.get(field)
    if (system) {
      return {
        column: system.column,
        codec: system.timestamp ? timestampCodec(this.dialect) : codecFor('text', false, this.dialect),
        multi: false,
      }
    }
    throw new ValidationError([
      { path: `${path}.${field}`, code: 'unknown_field', message: `Unknown field "${field}" on ${mapping.entityName}`, field },
    ])
  }

  private applyFilter(qb: Knex.QueryBuilder, mapping: GeneratedMapping, filter: Filter): void {
    const path = `filters.${filter.field}`
    const target = this.resolveColumn(mapping, filter.field, 'filters')
    const { column } = target
    const encode = (value: unknown): DbValue => {
      try {
        return target.codec.encode(value)
      } catch (err) {
        if (err instanceof CodecError) throw invalidValue(path, filter.field, err.message)
        throw err
      }
    }
    const optionPattern = (value: unknown): string => {
      if (typeof value !== 'string') throw invalidValue(path, filter.field, 'Option filters take strings')
      return containsPattern(JSON.stringify(value))
    }
    const list = (): unknown[] => {
      if (!Array.isArray(filter.value)) throw invalidValue(path, filter.field, `"${filter.op}" takes an array`)
      return filter.value
    }
    const text = (): string => {
      if (typeof filter.value !== 'string') throw invalidValue(path, filter.field, `"${filter.op}" takes a string`)
      return filter.value
    }

    switch (filter.op) {
      case 'eq':
        if (filter.value === null || filter.value === undefined) qb.whereNull(column)
        else if (target.multi) qb.whereRaw("?? like ? escape '\\'", [column, optionPattern(filter.value)])
        else qb.where(column, encode(filter.value))
        return
      case 'ne':
        if (filter.value === null || filter.value === undefined) qb.whereNotNull(column)
        else if (target.multi) qb.whereRaw("?? not like ? escape '\\'", [column, optionPattern(filter.value)])
        else qb.whereNot(column, encode(filter.value))
        return
      case 'gt':
      case 'gte':
      case 'lt':
      case 'lte':
        qb.where(column, COMPARISON[filter.op], encode(filter.value))
        return
      case 'in': {
        const values = list()
        if (!target.multi) {
          qb.whereIn(column, values.map(encode))
          return
        }
        const patterns = values.map(optionPattern)
        qb.where((inner) => {
          for (const pattern of patterns) inner.orWhereRaw("?? like ? escape '\\'", [column, pattern])
        })
        return
      }
      case 'nin': {
        const values = list()
        if (!target.multi) {
          qb.whereNotIn(column, values.map(encode))
          return
        }
        for (const value of values) qb.whereRaw("?? not like ? escape '\\'", [column, optionPattern(value)])
        return
      }
      case 'like':
        qb.where(column, 'like', text())
        return
      case 'ilike':
        qb.whereRaw('lower(??) like ?', [column, text().toLowerCase()])
        return
      case 'exists':
        if (filter.value === false) qb.whereNull(column)
        else qb.whereNotNull(column)
        return
    }
  }
}
