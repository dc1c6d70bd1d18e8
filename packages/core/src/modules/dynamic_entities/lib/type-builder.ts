import { z } from 'zod'
import { zodToJsonSchema, type JsonSchema7Type } from 'zod-to-json-schema'
import { KeyedMutex, MutexTimeoutError } from '@tessera/shared/lib/async/mutex'
import { codecFor, type ColumnCodec } from './codecs'
import type { SqlDialect } from './dialect'
import { SchemaNotReadyError } from './errors'
import { buildFieldSchema } from './field-schema'
import { SEARCHABLE_KINDS, type FieldKind } from './kinds'
import { columnName, entityKey } from './naming'
import type { DefaultValue, EntityDescriptor, FieldDescriptor } from './types'

/** Payload schema with one key per field; unknown keys rejected. */
export type PayloadSchema = z.ZodObject<Record<string, z.ZodTypeAny>, 'strict'>

export type EntityJsonSchema = JsonSchema7Type & {
  $schema?: string
  definitions?: Record<string, JsonSchema7Type>
}

export type ColumnMapping = Readonly<{
  field: string
  column: string
  kind: FieldKind
  multi: boolean
  nullable: boolean
  defaultValue: DefaultValue | null
  searchable: boolean
  codec: ColumnCodec
  descriptor: Readonly<FieldDescriptor>
}>

/** Everything the repository needs to read and write one entity's rows. Never mutated once built. */
export type GeneratedMapping = Readonly<{
  key: string
  /** Id of the descriptor row; differs when an entity is dropped and created again */
  descriptorId: string
  entityName: string
  tenantScope: string | null
  tableName: string
  version: number
  generation: number
  dialect: SqlDialect
  fields: ReadonlyArray<ColumnMapping>
  byField: ReadonlyMap<string, ColumnMapping>
  /** Create payloads: required unless nullable or defaulted */
  inputSchema: PayloadSchema
  /** Update payloads: every field optional */
  updateSchema: PayloadSchema
}>

export type MappingState = 'UNREGISTERED' | 'BUILDING' | 'ACTIVE' | 'STALE'

export type RegistrySnapshot = Readonly<{
  generation: number
  mappings: ReadonlyMap<string, GeneratedMapping>
}>

export function buildMapping(descriptor: EntityDescriptor, dialect: SqlDialect, generation: number): GeneratedMapping {
  const fields = descriptor.fields.map((field): ColumnMapping => Object.freeze({
    field: field.name,
    column: columnName(field.name),
    kind: field.kind,
    multi: field.kind === 'enum' && field.multi === true,
    nullable: field.nullable,
    defaultValue: field.defaultValue ?? null,
    searchable: SEARCHABLE_KINDS.has(field.kind),
    codec: codecFor(field.kind, field.kind === 'enum' && field.multi === true, dialect),
    descriptor: Object.freeze({ ...field }),
  }))

  const createShape: Record<string, z.ZodTypeAny> = {}
  const updateShape: Record<string, z.ZodTypeAny> = {}
  for (const field of descriptor.fields) {
    const schema = buildFieldSchema(field)
    const hasDefault = field.defaultValue !== undefined && field.defaultValue !== null
    createShape[field.name] = field.nullable || hasDefault ? schema.optional() : schema
    updateShape[field.name] = schema.optional()
  }

  return Object.freeze({
    key: entityKey(descriptor.name, descriptor.tenantScope),
    descriptorId: descriptor.id,
    entityName: descriptor.name,
    tenantScope: descriptor.tenantScope,
    tableName: descriptor.tableName,
    version: descriptor.version,
    generation,
    dialect,
    fields: Object.freeze(fields),
    byField: new Map(fields.map((mapping): [string, ColumnMapping] => [mapping.field, mapping])),
    inputSchema: z.object(createShape).strict(),
    updateSchema: z.object(updateShape).strict(),
  })
}

/** JSON Schema of the create payload, for form builders and API docs. */
export function mappingJsonSchema(mapping: GeneratedMapping): EntityJsonSchema {
  return zodToJsonSchema(mapping.inputSchema, { name: mapping.entityName, $refStrategy: 'none' })
}

export type RuntimeTypeBuilderOptions = {
  dialect: SqlDialect
  readyTimeoutMs: number
  locks?: KeyedMutex
}

/**
 * Per-process registry of generated mappings.
 *
 * Entities move UNREGISTERED -> BUILDING -> ACTIVE, and to STALE when a newer
 * schema version is announced. Builds for one entity are serialized; readers
 * that arrive mid-build wait for it. Every activation publishes a new
 * registry snapshot rather than mutating the current one.
 */
export class RuntimeTypeBuilder {
  private snapshot: RegistrySnapshot = Object.freeze({ generation: 0, mappings: new Map<string, GeneratedMapping>() })
  private readonly states = new Map<string, MappingState>()
  private readonly requiredVersions = new Map<string, number>()
  private readonly dialect: SqlDialect
  private readonly readyTimeoutMs: number
  private readonly locks: KeyedMutex

  constructor(options: RuntimeTypeBuilderOptions) {
    this.dialect = options.dialect
    this.readyTimeoutMs = options.readyTimeoutMs
    this.locks = options.locks ?? new KeyedMutex()
  }

  current(): RegistrySnapshot {
    return this.snapshot
  }

  state(key: string): MappingState {
    return this.states.get(key) ?? 'UNREGISTERED'
  }

  /** Active mapping or null; never waits. */
  peek(key: string): GeneratedMapping | null {
    if (this.state(key) !== 'ACTIVE') return null
    return this.snapshot.mappings.get(key) ?? null
  }

  /** Flags the mapping for rebuild unless it already reflects `version`. */
  markStale(key: string, version: number): void {
    const mapping = this.snapshot.mappings.get(key)
    if (mapping && mapping.version >= version) return
    this.requiredVersions.set(key, Math.max(this.requiredVersions.get(key) ?? 0, version))
    if (this.state(key) === 'ACTIVE') this.states.set(key, 'STALE')
  }

  /**
   * Returns the active mapping, building it from `load()` when missing or
   * stale. Throws {@link SchemaNotReadyError} when another build holds the
   * entity for longer than the ready timeout.
   */
  async resolve(key: string, load: () => Promise<EntityDescriptor>): Promise<GeneratedMapping> {
    const ready = this.peek(key)
    if (ready) return ready
    try {
      return await this.locks.runExclusive(key, async () => {
        const built = this.peek(key)
        if (built) return built
        const previous = this.state(key)
        this.states.set(key, 'BUILDING')
        try {
          return this.activate(key, await load())
        } catch (err) {
          this.states.set(key, previous === 'UNREGISTERED' ? 'UNREGISTERED' : 'STALE')
          throw err
        }
      }, { timeoutMs: this.readyTimeoutMs })
    } catch (err) {
      if (err instanceof MutexTimeoutError) throw new SchemaNotReadyError(key, this.readyTimeoutMs)
      throw err
    }
  }

  /** Drops an entity from the registry (after it was removed). */
  forget(key: string): void {
    this.states.delete(key)
    this.requiredVersions.delete(key)
    if (!this.snapshot.mappings.has(key)) return
    const mappings = new Map(this.snapshot.mappings)
    mappings.delete(key)
    this.snapshot = Object.freeze({ generation: this.snapshot.generation + 1, mappings })
  }

  private activate(key: string, descriptor: EntityDescriptor): GeneratedMapping {
    const generation = this.snapshot.generation + 1
    const mapping = buildMapping(descriptor, this.dialect, generation)
    const mappings = new Map(this.snapshot.mappings)
    mappings.set(key, mapping)
    this.snapshot = Object.freeze({ generation, mappings })
    const required = this.requiredVersions.get(key)
    if (required !== undefined && mapping.version < required) {
      this.states.set(key, 'STALE')
    } else {
      this.requiredVersions.delete(key)
      this.states.set(key, 'ACTIVE')
    }
    return mapping
  }
}
