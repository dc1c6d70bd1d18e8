import 'dotenv/config'
import 'reflect-metadata'
import { MikroORM, type MigrationObject, type Options } from '@mikro-orm/core'
import type { AbstractSqlDriver } from '@mikro-orm/knex'
import { PostgreSqlDriver } from '@mikro-orm/postgresql'
import { BetterSqliteDriver } from '@mikro-orm/better-sqlite'
import { Migrator } from '@mikro-orm/migrations'
import { parseNumberWithDefault } from '../env'

export type SqlOrm = MikroORM<AbstractSqlDriver>
export type OrmEntity = NonNullable<Options['entities']>[number]
export type OrmDriverKind = 'postgresql' | 'sqlite'

declare global {
  // eslint-disable-next-line no-var
  var __tesseraOrm: SqlOrm | undefined
  // eslint-disable-next-line no-var
  var __tesseraOrmInit: Promise<SqlOrm> | undefined
}

const registeredEntities: OrmEntity[] = []
const registeredMigrations: MigrationObject[] = []

export function registerOrmEntities(entities: OrmEntity[]): void {
  for (const entity of entities) {
    if (!registeredEntities.includes(entity)) registeredEntities.push(entity)
  }
}

export function registerOrmMigrations(migrations: MigrationObject[]): void {
  for (const migration of migrations) {
    if (!registeredMigrations.some((existing) => existing.name === migration.name)) {
      registeredMigrations.push(migration)
    }
  }
}

export function getRegisteredOrmEntities(): OrmEntity[] {
  return [...registeredEntities]
}

export function resolveOrmDriverKind(clientUrl: string): OrmDriverKind {
  if (clientUrl.startsWith('sqlite:')) return 'sqlite'
  if (clientUrl.startsWith('postgres://') || clientUrl.startsWith('postgresql://')) return 'postgresql'
  throw new Error(`Unsupported DATABASE_URL scheme in "${clientUrl.split('@').pop() ?? clientUrl}"`)
}

/**
 * Builds MikroORM options for a connection URL. `sqlite:<path>` (or `sqlite::memory:`)
 * selects better-sqlite, anything else PostgreSQL with the pool read from env.
 */
export function createOrmOptions(
  clientUrl: string,
  entities: OrmEntity[],
  migrations: MigrationObject[] = [],
  env: Record<string, string | undefined> = process.env,
): Options<AbstractSqlDriver> {
  const base = {
    entities,
    debug: false,
    extensions: [Migrator],
    discovery: { warnWhenNoEntities: false },
    migrations: {
      migrationsList: migrations,
      transactional: true,
      allOrNothing: true,
    },
  }

  if (resolveOrmDriverKind(clientUrl) === 'sqlite') {
    const dbName = clientUrl.slice('sqlite:'.length) || ':memory:'
    return { ...base, driver: BetterSqliteDriver, dbName }
  }

  const idleInTxTimeoutEnv = Number(env.DB_IDLE_IN_TRANSACTION_TIMEOUT_MS)
  const idleInTransactionTimeoutMs = Number.isFinite(idleInTxTimeoutEnv)
    ? idleInTxTimeoutEnv
    : env.NODE_ENV === 'production'
      ? undefined
      : 120_000

  return {
    ...base,
    driver: PostgreSqlDriver,
    clientUrl,
    pool: {
      min: parseNumberWithDefault(env.DB_POOL_MIN, 0),
      max: parseNumberWithDefault(env.DB_POOL_MAX, 10),
      idleTimeoutMillis: parseNumberWithDefault(env.DB_POOL_IDLE_TIMEOUT, 30_000),
      acquireTimeoutMillis: parseNumberWithDefault(env.DB_POOL_ACQUIRE_TIMEOUT, 10_000),
    },
    driverOptions: {
      connection: {
        idle_in_transaction_session_timeout: idleInTransactionTimeoutMs,
      },
    },
  }
}

export async function getOrm(): Promise<SqlOrm> {
  if (globalThis.__tesseraOrm) return globalThis.__tesseraOrm
  if (globalThis.__tesseraOrmInit) return globalThis.__tesseraOrmInit

  globalThis.__tesseraOrmInit = (async () => {
    try {
      const clientUrl = process.env.DATABASE_URL
      if (!clientUrl) throw new Error('DATABASE_URL is not set')
      const orm = await MikroORM.init<AbstractSqlDriver>(
        createOrmOptions(clientUrl, getRegisteredOrmEntities(), [...registeredMigrations]),
      )
      globalThis.__tesseraOrm = orm
      return orm
    } catch (error) {
      globalThis.__tesseraOrmInit = undefined
      globalThis.__tesseraOrm = undefined
      throw error
    }
  })()

  return globalThis.__tesseraOrmInit
}

/**
 * Brings the engine's own tables up to date: registered migrations on
 * PostgreSQL, a schema update from entity metadata on SQLite. The update
 * never drops anything: dynamic tables are unknown to the metadata.
 */
export async function ensureDatabaseSchema(orm: SqlOrm, kind: OrmDriverKind): Promise<void> {
  if (kind === 'postgresql') {
    await orm.getMigrator().up()
    return
  }
  await orm.getSchemaGenerator().updateSchema({ safe: true, dropTables: false })
}

export async function closeOrm(): Promise<void> {
  const orm = globalThis.__tesseraOrm
  globalThis.__tesseraOrm = undefined
  globalThis.__tesseraOrmInit = undefined
  if (orm) await orm.close(true)
}
