import { asValue } from 'awilix'
import { createEventBus, type EventBus } from '@tessera/events'
import { registerContainerBootstrap, registerDiRegistrars, type AppContainer } from '@tessera/shared/lib/di/container'
import {
  ensureDatabaseSchema,
  registerOrmEntities,
  registerOrmMigrations,
  type OrmDriverKind,
  type SqlOrm,
} from '@tessera/shared/lib/db/mikro'
import { dynamicEntitiesOrmEntities } from './modules/dynamic_entities/data/entities'
import { register as registerDynamicEntities } from './modules/dynamic_entities/di'
import type { DynamicEntitiesConfig } from './modules/dynamic_entities/lib/config'
import { entityKey } from './modules/dynamic_entities/lib/naming'
import type { ClusterNotifier } from './modules/dynamic_entities/lib/notifier'
import type { DynamicEntityService } from './modules/dynamic_entities/lib/service'
import type { RuntimeTypeBuilder } from './modules/dynamic_entities/lib/type-builder'
import { Migration20261018093512 } from './modules/dynamic_entities/migrations/Migration20261018093512'

function createBus(container: AppContainer): EventBus {
  const resolve = <T = unknown>(name: string): T => container.resolve<T>(name)
  try {
    return createEventBus({ resolve })
  } catch (err) {
    // redis strategy without a URL: keep serving with in-process delivery only
    console.warn('[bootstrap] Event bus initialization failed; falling back to local strategy:', err instanceof Error ? err.message : err)
    return createEventBus({ resolve, strategy: 'local' })
  }
}

/** Reacts to schema changes announced by any instance, this one included. */
export function wireSchemaChangeListener(container: AppContainer): () => void {
  const notifier = container.resolve<ClusterNotifier>('clusterNotifier')
  const builder = container.resolve<RuntimeTypeBuilder>('runtimeTypeBuilder')
  return notifier.onReceive((change) => {
    const key = entityKey(change.entityName, change.tenantScope)
    if (change.version === 0) builder.forget(key)
    else builder.markStale(key, change.version)
  })
}

export async function bootstrap(container: AppContainer): Promise<void> {
  const orm = container.resolve<SqlOrm>('orm')
  await ensureDatabaseSchema(orm, container.resolve<OrmDriverKind>('databaseKind'))

  if (!container.hasRegistration('eventBus')) {
    container.register({ eventBus: asValue(createBus(container)) })
  }
  wireSchemaChangeListener(container)

  const config = container.resolve<DynamicEntitiesConfig>('dynamicEntitiesConfig')
  if (config.warmUpOnBootstrap) {
    await container.resolve<DynamicEntityService>('dynamicEntityService').warmUp()
  }
}

let registered = false

/** Registers the module's entities, migration, DI registrar and bootstrap hook with the shared layer. */
export function registerCoreModules(): void {
  if (registered) return
  registered = true
  registerOrmEntities(dynamicEntitiesOrmEntities)
  registerOrmMigrations([{ name: 'Migration20261018093512', class: Migration20261018093512 }])
  registerDiRegistrars([registerDynamicEntities])
  registerContainerBootstrap(bootstrap)
}
