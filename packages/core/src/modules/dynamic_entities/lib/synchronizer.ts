import type { Knex } from 'knex'
import { diffSchemas, type DdlOperation } from './differ'
import type { MigrationExecutor } from './migrator'
import { readMarker } from './markers'
import { entityKey, nameKey, scopeKey } from './naming'
import type { ClusterNotifier } from './notifier'
import type { RuntimeTypeBuilder } from './type-builder'
import { toAppliedDescriptor, type EntityDescriptor } from './types'

export type SynchronizeResult = {
  status: 'in_sync' | 'migrated'
  appliedVersion: number
  operations: DdlOperation[]
}

export type SchemaSynchronizerDeps = {
  knex: Knex
  executor: MigrationExecutor
  notifier: ClusterNotifier
  builder: RuntimeTypeBuilder
  maxPlanAttempts?: number
}

/**
 * Brings the physical table of one entity in line with its stored descriptor:
 * reads the applied marker, diffs, applies, then tells the cluster.
 */
export class SchemaSynchronizer {
  private readonly knex: Knex
  private readonly executor: MigrationExecutor
  private readonly notifier: ClusterNotifier
  private readonly builder: RuntimeTypeBuilder
  private readonly maxPlanAttempts: number

  constructor(deps: SchemaSynchronizerDeps) {
    this.knex = deps.knex
    this.executor = deps.executor
    this.notifier = deps.notifier
    this.builder = deps.builder
    this.maxPlanAttempts = deps.maxPlanAttempts ?? 3
  }

  async synchronize(descriptor: EntityDescriptor): Promise<SynchronizeResult> {
    const key = { nameKey: nameKey(descriptor.name), scopeKey: scopeKey(descriptor.tenantScope) }
    const target = toAppliedDescriptor(descriptor)
    for (let plan = 1; ; plan += 1) {
      const marker = await readMarker(this.knex, key)
      const appliedVersion = marker?.version ?? 0
      if (appliedVersion >= descriptor.version) {
        return { status: 'in_sync', appliedVersion, operations: [] }
      }
      const operations = diffSchemas(marker?.appliedDescriptor ?? null, target)
      const result = await this.executor.apply({
        entityName: descriptor.name,
        tenantScope: descriptor.tenantScope,
        tableName: descriptor.tableName,
        operations,
        fromVersion: appliedVersion,
        targetVersion: descriptor.version,
        descriptor: target,
      })
      if (!result.ok) {
        if (result.error.kind === 'stale_plan' && plan < this.maxPlanAttempts) continue
        throw result.error
      }
      if (result.applied.status === 'skipped') {
        return { status: 'in_sync', appliedVersion: result.applied.version, operations: [] }
      }
      await this.announce(descriptor)
      return { status: 'migrated', appliedVersion: result.applied.version, operations: result.applied.operations }
    }
  }

  private async announce(descriptor: EntityDescriptor): Promise<void> {
    this.builder.markStale(entityKey(descriptor.name, descriptor.tenantScope), descriptor.version)
    try {
      await this.notifier.publish(descriptor.name, descriptor.version, descriptor.tenantScope)
    } catch (err) {
      console.error(`[dynamic_entities.sync] Failed to announce ${descriptor.name} v${descriptor.version}:`, err)
    }
  }
}
