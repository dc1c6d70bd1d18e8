import type { Knex } from 'knex'

export type SqlDialect = 'postgresql' | 'sqlite'

export function resolveDialect(knex: Knex): SqlDialect {
  const name: unknown = knex.client.dialect
  if (name === 'postgresql' || name === 'postgres' || name === 'pg') return 'postgresql'
  if (typeof name === 'string' && name.includes('sqlite')) return 'sqlite'
  throw new Error(`[dynamic_entities] Unsupported SQL dialect "${String(name)}"`)
}
