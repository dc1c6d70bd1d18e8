export { bootstrap, registerCoreModules, wireSchemaChangeListener } from './bootstrap'
export { metadata as dynamicEntitiesModule } from './modules/dynamic_entities'
export { DYNAMIC_ENTITIES_EVENTS } from './modules/dynamic_entities/events'
export * from './modules/dynamic_entities/lib/types'
export * from './modules/dynamic_entities/lib/errors'
export { FIELD_KINDS, type FieldKind, type FieldValue } from './modules/dynamic_entities/lib/kinds'
export { validateDescriptor, type ValidationResult, type FieldChange } from './modules/dynamic_entities/lib/validator'
export { diffSchemas, describeOperation, type DdlOperation } from './modules/dynamic_entities/lib/differ'
export { MigrationExecutor, type MigrationRequest, type MigrationResult } from './modules/dynamic_entities/lib/migrator'
export { RuntimeTypeBuilder, buildMapping, type GeneratedMapping } from './modules/dynamic_entities/lib/type-builder'
export { DescriptorStore } from './modules/dynamic_entities/lib/store'
export { SchemaSynchronizer } from './modules/dynamic_entities/lib/synchronizer'
export { DynamicRepository, type DynamicRecord } from './modules/dynamic_entities/lib/repository'
export { ClusterNotifier, type SchemaChange } from './modules/dynamic_entities/lib/notifier'
export { DynamicEntityService } from './modules/dynamic_entities/lib/service'
export type { RecordQuery, QueryResult, Filter, Where } from './modules/dynamic_entities/lib/query'
export { readDynamicEntitiesConfig, type DynamicEntitiesConfig } from './modules/dynamic_entities/lib/config'
