import { randomUUID } from 'crypto'
import { Entity, Index, OptionalProps, PrimaryKey, Property, Unique } from '@mikro-orm/core'
import type { AppliedDescriptor, FieldDescriptor } from '../lib/types'
import type { DdlOperation } from '../lib/differ'

export type SchemaMigrationStatus = 'applied' | 'failed'

@Entity({ tableName: 'dynamic_entity_definitions' })
@Unique({ name: 'dynamic_entity_definitions_name_scope_unique', properties: ['nameKey', 'scopeKey'] })
@Unique({ name: 'dynamic_entity_definitions_table_name_unique', properties: ['tableName'] })
@Index({ name: 'dynamic_entity_definitions_tenant_idx', properties: ['tenantId'] })
export class DynamicEntityDefinition {
  [OptionalProps]?: 'id' | 'tenantId' | 'label' | 'description' | 'fieldsJson' | 'version' | 'createdAt' | 'updatedAt'

  @PrimaryKey({ type: 'uuid' })
  id: string = randomUUID()

  @Property({ name: 'name', type: 'text' })
  name!: string

  @Property({ name: 'name_key', type: 'text' })
  nameKey!: string

  @Property({ name: 'scope_key', type: 'text' })
  scopeKey!: string

  @Property({ name: 'tenant_id', type: 'text', nullable: true })
  tenantId: string | null = null

  @Property({ name: 'table_name', type: 'text' })
  tableName!: string

  @Property({ name: 'label', type: 'text', nullable: true })
  label: string | null = null

  @Property({ name: 'description', type: 'text', nullable: true })
  description: string | null = null

  @Property({ name: 'fields_json', type: 'json' })
  fieldsJson: FieldDescriptor[] = []

  @Property({ name: 'version', type: 'integer' })
  version: number = 1

  @Property({ name: 'created_at', type: Date, onCreate: () => new Date() })
  createdAt: Date = new Date()

  @Property({ name: 'updated_at', type: Date, onUpdate: () => new Date() })
  updatedAt: Date = new Date()
}

/**
 * Applied schema version per entity. Written by the migration executor in the
 * same transaction as the DDL it describes.
 */
@Entity({ tableName: 'dynamic_schema_versions' })
@Unique({ name: 'dynamic_schema_versions_name_scope_unique', properties: ['nameKey', 'scopeKey'] })
export class SchemaVersionMarker {
  [OptionalProps]?: 'id' | 'tenantId' | 'version' | 'appliedDescriptor' | 'appliedAt' | 'lastError' | 'lastErrorAt' | 'lastAttemptedVersion' | 'updatedAt'

  @PrimaryKey({ type: 'uuid' })
  id: string = randomUUID()

  @Property({ name: 'entity_name', type: 'text' })
  entityName!: string

  @Property({ name: 'name_key', type: 'text' })
  nameKey!: string

  @Property({ name: 'scope_key', type: 'text' })
  scopeKey!: string

  @Property({ name: 'tenant_id', type: 'text', nullable: true })
  tenantId: string | null = null

  @Property({ name: 'table_name', type: 'text' })
  tableName!: string

  @Property({ name: 'version', type: 'integer' })
  version: number = 0

  @Property({ name: 'applied_descriptor', type: 'json', nullable: true })
  appliedDescriptor: AppliedDescriptor | null = null

  @Property({ name: 'applied_at', type: Date, nullable: true })
  appliedAt: Date | null = null

  @Property({ name: 'last_error', type: 'text', nullable: true })
  lastError: string | null = null

  @Property({ name: 'last_error_at', type: Date, nullable: true })
  lastErrorAt: Date | null = null

  @Property({ name: 'last_attempted_version', type: 'integer', nullable: true })
  lastAttemptedVersion: number | null = null

  @Property({ name: 'updated_at', type: Date })
  updatedAt: Date = new Date()
}

@Entity({ tableName: 'dynamic_schema_migrations' })
@Index({ name: 'dynamic_schema_migrations_entity_idx', properties: ['nameKey', 'scopeKey', 'createdAt'] })
export class SchemaMigrationRecord {
  [OptionalProps]?: 'id' | 'error' | 'attempts' | 'durationMs' | 'createdAt'

  @PrimaryKey({ type: 'uuid' })
  id: string = randomUUID()

  @Property({ name: 'entity_name', type: 'text' })
  entityName!: string

  @Property({ name: 'name_key', type: 'text' })
  nameKey!: string

  @Property({ name: 'scope_key', type: 'text' })
  scopeKey!: string

  @Property({ name: 'from_version', type: 'integer' })
  fromVersion!: number

  @Property({ name: 'to_version', type: 'integer' })
  toVersion!: number

  @Property({ name: 'operations', type: 'json' })
  operations!: DdlOperation[]

  @Property({ name: 'status', type: 'text' })
  status!: SchemaMigrationStatus

  @Property({ name: 'error', type: 'text', nullable: true })
  error: string | null = null

  @Property({ name: 'attempts', type: 'integer' })
  attempts: number = 1

  @Property({ name: 'duration_ms', type: 'integer' })
  durationMs: number = 0

  @Property({ name: 'created_at', type: Date })
  createdAt: Date = new Date()
}

export const dynamicEntitiesOrmEntities = [DynamicEntityDefinition, SchemaVersionMarker, SchemaMigrationRecord]
