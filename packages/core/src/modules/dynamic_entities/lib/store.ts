import { LockMode, UniqueConstraintViolationException, type FilterQuery } from '@mikro-orm/core'
import type { EntityManager } from '@mikro-orm/knex'
import { DynamicEntityDefinition } from '../data/entities'
import type { SqlDialect } from './dialect'
import { ConcurrentModificationError } from './errors'
import { columnName, deriveTableName, GLOBAL_SCOPE_KEY, nameKey, scopeKey } from './naming'
import type { DescriptorDraft, EntityDescriptor, FieldDescriptor } from './types'

export type DescriptorSaveOptions = {
  /** Version the caller based its change on; 0 for a new entity. Omit to skip the check. */
  expectedVersion?: number
}

export type DescriptorSaveResult = {
  descriptor: EntityDescriptor
  /** The field signature changed (version bumped, or entity created) */
  changed: boolean
  created: boolean
}

export type DescriptorStoreDeps = {
  em: EntityManager
  dialect: SqlDialect
}

function cloneFields(fields: FieldDescriptor[]): FieldDescriptor[] {
  return fields.map((field) => ({
    ...field,
    constraints: field.constraints ? { ...field.constraints } : undefined,
    options: field.options ? [...field.options] : undefined,
  }))
}

function sortedConstraints(field: FieldDescriptor): Array<[string, number | string]> {
  return Object.entries(field.constraints ?? {})
    .filter((entry): entry is [string, number | string] => entry[1] !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
}

/**
 * Canonical form of everything that shapes the physical table or the
 * accepted values. Labels and field order are left out.
 */
export function fieldSignature(fields: FieldDescriptor[]): string {
  const canonical = fields
    .map((field) => ({
      column: columnName(field.name),
      name: field.name,
      kind: field.kind,
      nullable: field.nullable,
      defaultValue: field.defaultValue ?? null,
      constraints: sortedConstraints(field),
      options: field.options ?? null,
      multi: field.multi ?? false,
      target: field.target ? nameKey(field.target) : null,
    }))
    .sort((a, b) => a.column.localeCompare(b.column))
  return JSON.stringify(canonical)
}

export function toEntityDescriptor(record: DynamicEntityDefinition): EntityDescriptor {
  return {
    id: record.id,
    name: record.name,
    tenantScope: record.tenantId,
    label: record.label,
    description: record.description,
    fields: cloneFields(record.fieldsJson),
    version: record.version,
    tableName: record.tableName,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  }
}

/**
 * Durable home of entity descriptors. Every call works on its own forked
 * entity manager; saves are serialized per entity by a row lock and checked
 * against the caller's expected version.
 */
export class DescriptorStore {
  private readonly em: EntityManager
  private readonly dialect: SqlDialect

  constructor(deps: DescriptorStoreDeps) {
    this.em = deps.em
    this.dialect = deps.dialect
  }

  async findByName(name: string, tenantScope: string | null): Promise<EntityDescriptor | null> {
    const record = await this.em.fork().findOne(DynamicEntityDefinition, {
      nameKey: nameKey(name),
      scopeKey: scopeKey(tenantScope),
    })
    return record ? toEntityDescriptor(record) : null
  }

  /** Looks in the tenant's scope first, then in the global one. */
  async resolve(name: string, tenantScope: string | null): Promise<EntityDescriptor | null> {
    if (tenantScope) {
      const scoped = await this.findByName(name, tenantScope)
      if (scoped) return scoped
    }
    return this.findByName(name, null)
  }

  /**
   * `undefined` lists every scope, `null` the global one, a tenant id that
   * tenant's entities plus the global ones.
   */
  async listAll(tenantScope?: string | null): Promise<EntityDescriptor[]> {
    const em = this.em.fork()
    const where: FilterQuery<DynamicEntityDefinition> = tenantScope === undefined
      ? {}
      : tenantScope === null
        ? { scopeKey: GLOBAL_SCOPE_KEY }
        : { scopeKey: { $in: [GLOBAL_SCOPE_KEY, tenantScope] } }
    const records = await em.find(DynamicEntityDefinition, where, { orderBy: { nameKey: 'asc', scopeKey: 'asc' } })
    return records.map(toEntityDescriptor)
  }

  async save(draft: DescriptorDraft, options: DescriptorSaveOptions = {}): Promise<DescriptorSaveResult> {
    const key = { nameKey: nameKey(draft.name), scopeKey: scopeKey(draft.tenantScope) }
    try {
      return await this.em.fork().transactional(async (em) => {
        if (this.dialect === 'postgresql') {
          await em.getConnection().execute(
            'select pg_advisory_xact_lock(hashtext(?))',
            [`dynamic_entities.definitions:${key.scopeKey}:${key.nameKey}`],
            'all',
            em.getTransactionContext(),
          )
        }
        const existing = await em.findOne(
          DynamicEntityDefinition,
          key,
          this.dialect === 'postgresql' ? { lockMode: LockMode.PESSIMISTIC_WRITE } : {},
        )
        const currentVersion = existing?.version ?? 0
        if (options.expectedVersion !== undefined && options.expectedVersion !== currentVersion) {
          throw new ConcurrentModificationError(draft.name, options.expectedVersion, existing ? currentVersion : null)
        }

        if (!existing) {
          const created = em.create(DynamicEntityDefinition, {
            name: draft.name,
            nameKey: key.nameKey,
            scopeKey: key.scopeKey,
            tenantId: draft.tenantScope,
            tableName: deriveTableName(draft.name, draft.tenantScope),
            label: draft.label ?? null,
            description: draft.description ?? null,
            fieldsJson: cloneFields(draft.fields),
            version: 1,
          })
          em.persist(created)
          return { descriptor: toEntityDescriptor(created), changed: true, created: true }
        }

        const changed = fieldSignature(existing.fieldsJson) !== fieldSignature(draft.fields)
        existing.label = draft.label ?? null
        existing.description = draft.description ?? null
        existing.fieldsJson = cloneFields(draft.fields)
        existing.updatedAt = new Date()
        if (changed) existing.version = currentVersion + 1
        return { descriptor: toEntityDescriptor(existing), changed, created: false }
      })
    } catch (err) {
      if (err instanceof UniqueConstraintViolationException) {
        throw new ConcurrentModificationError(draft.name, options.expectedVersion ?? null, null)
      }
      throw err
    }
  }

  async remove(name: string, tenantScope: string | null): Promise<boolean> {
    const em = this.em.fork()
    const deleted = await em.nativeDelete(DynamicEntityDefinition, {
      nameKey: nameKey(name),
      scopeKey: scopeKey(tenantScope),
    })
    return deleted > 0
  }
}
