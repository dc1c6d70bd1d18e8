import { createHash } from 'crypto'
import reservedWords from './reserved-words.json'

export const GLOBAL_SCOPE_KEY = '__global__'
export const TABLE_PREFIX = 'de_'

export const MAX_ENTITY_NAME_LENGTH = 48
export const MAX_FIELD_NAME_LENGTH = 60
export const MAX_IDENTIFIER_LENGTH = 63

export const IDENTIFIER_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/

/** Columns every dynamic table carries; fields may not map onto them. */
export const SYSTEM_COLUMNS = ['id', 'organization_id', 'created_at', 'updated_at', 'search_text'] as const
export type SystemColumn = (typeof SYSTEM_COLUMNS)[number]

const RESERVED = new Set<string>(reservedWords.map((word) => word.toLowerCase()))
const SYSTEM = new Set<string>(SYSTEM_COLUMNS)

export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/_+/g, '_')
    .toLowerCase()
}

export function isReservedWord(identifier: string): boolean {
  return RESERVED.has(identifier.toLowerCase())
}

export function isSystemColumn(column: string): boolean {
  return SYSTEM.has(column)
}

export const nameKey = (name: string): string => name.trim().toLowerCase()

export const scopeKey = (tenantScope: string | null | undefined): string => tenantScope ?? GLOBAL_SCOPE_KEY

export const columnName = (fieldName: string): string => toSnakeCase(fieldName)

/** Registry/lock key of an entity within its scope. */
export function entityKey(name: string, tenantScope: string | null | undefined): string {
  return `${scopeKey(tenantScope)}:${nameKey(name)}`
}

/**
 * `de_<snake name>` for global entities; tenant entities get an 8-hex suffix
 * from the tenant id so equal names in different tenants never share a table.
 */
export function deriveTableName(name: string, tenantScope: string | null): string {
  const base = `${TABLE_PREFIX}${toSnakeCase(name)}`
  if (!tenantScope) return base
  const suffix = createHash('sha1').update(tenantScope).digest('hex').slice(0, 8)
  return `${base}_${suffix}`
}
