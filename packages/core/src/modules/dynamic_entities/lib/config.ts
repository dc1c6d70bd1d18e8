import { parseBooleanWithDefault, parsePositiveInt, type EnvSource } from '@tessera/shared/lib/env'
import { DEFAULT_MAX_FIELDS } from './validator'

export type DynamicEntitiesConfig = {
  /** Upper bound for one migration attempt, lock waits included */
  migrationTimeoutMs: number
  migrationMaxAttempts: number
  /** Base delay of the exponential backoff between migration attempts */
  migrationRetryDelayMs: number
  /** How long repository calls wait for a mapping that is being rebuilt */
  schemaReadyTimeoutMs: number
  /** Attempts of a descriptor save that lost an optimistic version check */
  saveMaxAttempts: number
  maxFieldsPerEntity: number
  /** Synchronize and build every stored descriptor when the container boots */
  warmUpOnBootstrap: boolean
}

export const DEFAULT_DYNAMIC_ENTITIES_CONFIG: DynamicEntitiesConfig = {
  migrationTimeoutMs: 30_000,
  migrationMaxAttempts: 3,
  migrationRetryDelayMs: 200,
  schemaReadyTimeoutMs: 5_000,
  saveMaxAttempts: 3,
  maxFieldsPerEntity: DEFAULT_MAX_FIELDS,
  warmUpOnBootstrap: true,
}

export function readDynamicEntitiesConfig(env: EnvSource = process.env): DynamicEntitiesConfig {
  const defaults = DEFAULT_DYNAMIC_ENTITIES_CONFIG
  return {
    migrationTimeoutMs: parsePositiveInt(env.DYNAMIC_ENTITIES_MIGRATION_TIMEOUT_MS) ?? defaults.migrationTimeoutMs,
    migrationMaxAttempts: parsePositiveInt(env.DYNAMIC_ENTITIES_MIGRATION_MAX_ATTEMPTS) ?? defaults.migrationMaxAttempts,
    migrationRetryDelayMs: parsePositiveInt(env.DYNAMIC_ENTITIES_MIGRATION_RETRY_DELAY_MS) ?? defaults.migrationRetryDelayMs,
    schemaReadyTimeoutMs: parsePositiveInt(env.DYNAMIC_ENTITIES_SCHEMA_READY_TIMEOUT_MS) ?? defaults.schemaReadyTimeoutMs,
    saveMaxAttempts: parsePositiveInt(env.DYNAMIC_ENTITIES_SAVE_MAX_ATTEMPTS) ?? defaults.saveMaxAttempts,
    maxFieldsPerEntity: parsePositiveInt(env.DYNAMIC_ENTITIES_MAX_FIELDS) ?? defaults.maxFieldsPerEntity,
    warmUpOnBootstrap: parseBooleanWithDefault(env.DYNAMIC_ENTITIES_WARM_UP, defaults.warmUpOnBootstrap),
  }
}
