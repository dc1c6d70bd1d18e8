import { asFunction } from 'awilix'
import type { Knex } from 'knex'
import type { EventBus } from '@tessera/events'
import type { AppContainer } from '@tessera/shared/lib/di/container'
import type { SqlOrm } from '@tessera/shared/lib/db/mikro'
import { KeyedMutex } from '@tessera/shared/lib/async/mutex'
import { readDynamicEntitiesConfig, type DynamicEntitiesConfig } from './lib/config'
import { resolveDialect, type SqlDialect } from './lib/dialect'
import { MigrationExecutor } from './lib/migrator'
import { ClusterNotifier } from './lib/notifier'
import { DynamicRepository } from './lib/repository'
import { DynamicEntityService } from './lib/service'
import { DescriptorStore } from './lib/store'
import { SchemaSynchronizer } from './lib/synchronizer'
import { RuntimeTypeBuilder } from './lib/type-builder'

export type DynamicEntitiesCradle = {
  orm: SqlOrm
  eventBus: EventBus
  dynamicEntitiesConfig: DynamicEntitiesConfig
  dynamicEntitiesKnex: Knex
  dynamicEntitiesDialect: SqlDialect
  schemaMigrationExecutor: MigrationExecutor
  runtimeTypeBuilder: RuntimeTypeBuilder
  clusterNotifier: ClusterNotifier
  schemaSynchronizer: SchemaSynchronizer
  descriptorStore: DescriptorStore
  dynamicRepository: DynamicRepository
  dynamicEntityService: DynamicEntityService
}

// Everything here is process-wide: mappings, locks and the knex pool are shared by all requests.
export function register(container: AppContainer) {
  container.register({
    dynamicEntitiesConfig: asFunction(() => readDynamicEntitiesConfig()).singleton(),
    dynamicEntitiesKnex: asFunction(({ orm }: DynamicEntitiesCradle) => orm.em.getKnex()).singleton(),
    dynamicEntitiesDialect: asFunction(({ dynamicEntitiesKnex }: DynamicEntitiesCradle) => resolveDialect(dynamicEntitiesKnex)).singleton(),
    schemaMigrationExecutor: asFunction(({ dynamicEntitiesKnex, dynamicEntitiesDialect, dynamicEntitiesConfig }: DynamicEntitiesCradle) =>
      new MigrationExecutor({
        knex: dynamicEntitiesKnex,
        dialect: dynamicEntitiesDialect,
        timeoutMs: dynamicEntitiesConfig.migrationTimeoutMs,
        maxAttempts: dynamicEntitiesConfig.migrationMaxAttempts,
        retryDelayMs: dynamicEntitiesConfig.migrationRetryDelayMs,
        locks: new KeyedMutex(),
      }),
    ).singleton(),
    runtimeTypeBuilder: asFunction(({ dynamicEntitiesDialect, dynamicEntitiesConfig }: DynamicEntitiesCradle) =>
      new RuntimeTypeBuilder({
        dialect: dynamicEntitiesDialect,
        readyTimeoutMs: dynamicEntitiesConfig.schemaReadyTimeoutMs,
      }),
    ).singleton(),
    clusterNotifier: asFunction(({ eventBus }: DynamicEntitiesCradle) => new ClusterNotifier(eventBus)).singleton(),
    schemaSynchronizer: asFunction(({ dynamicEntitiesKnex, schemaMigrationExecutor, clusterNotifier, runtimeTypeBuilder }: DynamicEntitiesCradle) =>
      new SchemaSynchronizer({
        knex: dynamicEntitiesKnex,
        executor: schemaMigrationExecutor,
        notifier: clusterNotifier,
        builder: runtimeTypeBuilder,
      }),
    ).singleton(),
    descriptorStore: asFunction(({ orm, dynamicEntitiesDialect }: DynamicEntitiesCradle) =>
      new DescriptorStore({ em: orm.em, dialect: dynamicEntitiesDialect }),
    ).singleton(),
    dynamicRepository: asFunction(({ dynamicEntitiesKnex, dynamicEntitiesDialect, descriptorStore, schemaSynchronizer, runtimeTypeBuilder }: DynamicEntitiesCradle) =>
      new DynamicRepository({
        knex: dynamicEntitiesKnex,
        dialect: dynamicEntitiesDialect,
        store: descriptorStore,
        synchronizer: schemaSynchronizer,
        builder: runtimeTypeBuilder,
      }),
    ).singleton(),
    dynamicEntityService: asFunction((cradle: DynamicEntitiesCradle) =>
      new DynamicEntityService({
        knex: cradle.dynamicEntitiesKnex,
        store: cradle.descriptorStore,
        synchronizer: cradle.schemaSynchronizer,
        executor: cradle.schemaMigrationExecutor,
        builder: cradle.runtimeTypeBuilder,
        notifier: cradle.clusterNotifier,
        repository: cradle.dynamicRepository,
        config: cradle.dynamicEntitiesConfig,
      }),
    ).singleton(),
  })
}
