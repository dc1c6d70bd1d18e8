import { createEventBus, createLocalTransport, type EventEnvelope, type EventTransport } from '@tessera/events'
import {
  ConcurrentModificationError,
  DestructiveChangeRejected,
  MigrationError,
  NotFoundError,
  ValidationError,
} from '../lib/errors'
import { MigrationExecutor } from '../lib/migrator'
import { ClusterNotifier } from '../lib/notifier'
import { entityKey } from '../lib/naming'
import { DynamicRepository } from '../lib/repository'
import { SchemaSynchronizer } from '../lib/synchronizer'
import { RuntimeTypeBuilder } from '../lib/type-builder'
import { createHarness, type Harness } from './harness'

const INVOICE_KEY = entityKey('Invoice', null)

const unusedResolve = <T = unknown>(name: string): T => {
  throw new Error(`unexpected resolve of ${name}`)
}

const invoiceFields = [
  { name: 'amount', kind: 'decimal', nullable: false, constraints: { precision: 12, scale: 2 } },
  { name: 'dueDate', kind: 'timestamp' },
]

/** Fans every published envelope out to all subscribed buses, like a shared pub/sub channel. */
function createHub(): () => EventTransport {
  const subscribers = new Set<(envelope: EventEnvelope) => void>()
  return () => {
    let own: ((envelope: EventEnvelope) => void) | null = null
    return {
      name: 'local',
      async publish(envelope) {
        for (const subscriber of subscribers) subscriber(envelope)
      },
      async subscribe(onMessage) {
        own = onMessage
        subscribers.add(onMessage)
      },
      async close() {
        if (own) subscribers.delete(own)
      },
    }
  }
}

describe('DynamicEntityService', () => {
  let harness: Harness

  beforeEach(async () => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined)
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    jest.spyOn(console, 'error').mockImplementation(() => undefined)
    harness = await createHarness()
  })

  afterEach(async () => {
    await harness.close()
    jest.restoreAllMocks()
  })

  describe('submit', () => {
    test('creates the entity and its table', async () => {
      const result = await harness.service.submit({ name: 'Invoice', fields: invoiceFields })
      expect(result).toMatchObject({ changed: true, appliedVersion: 1 })
      expect(result.descriptor).toMatchObject({ name: 'Invoice', version: 1, tableName: 'de_invoice' })
      expect(result.operations.map((op) => op.type)).toEqual(['CREATE_TABLE'])
      expect(await harness.knex.schema.hasTable('de_invoice')).toBe(true)
    })

    test('label-only edits keep the version and run no DDL', async () => {
      await harness.service.submit({ name: 'Invoice', fields: invoiceFields })
      const result = await harness.service.submit({ name: 'Invoice', label: 'Sales invoice', fields: invoiceFields })
      expect(result).toMatchObject({ changed: false, appliedVersion: 1, operations: [] })
      expect(result.descriptor).toMatchObject({ version: 1, label: 'Sales invoice' })
    })

    test('tenant entities get their own table', async () => {
      const result = await harness.service.submit({ name: 'Invoice', tenantScope: 'tenant-a', fields: invoiceFields })
      expect(result.descriptor.tableName).toBe('de_invoice_956ed313')
      expect(await harness.knex.schema.hasTable('de_invoice_956ed313')).toBe(true)

      const id = await harness.repository.save({ entity: 'Invoice', tenantScope: 'tenant-a' }, { amount: 3 })
      expect(await harness.repository.findOne({ entity: 'Invoice', tenantScope: 'tenant-a' }, id)).toMatchObject({ amount: 3 })
      await expect(harness.repository.findOne({ entity: 'Invoice', tenantScope: 'tenant-b' }, id)).rejects.toBeInstanceOf(NotFoundError)
    })

    test('rejects malformed submissions', async () => {
      await expect(harness.service.submit({ name: 'Invoice' })).rejects.toMatchObject({
        name: 'ValidationError',
        issues: [{ path: 'fields', code: 'invalid_value', message: 'Required', field: 'fields' }],
      })
      await expect(harness.service.submit({ name: 'Invoice', fields: [{ name: 'select', kind: 'text' }] })).rejects.toMatchObject({
        issues: [{ path: 'fields[0].name', code: 'reserved_name', message: '"select" is a reserved word', field: 'select' }],
      })
      expect(await harness.service.listEntityTypes()).toEqual([])
    })

    test('a type change is rejected and leaves the stored version alone', async () => {
      await harness.service.submit({ name: 'Product', fields: [{ name: 'code', kind: 'text' }] })
      const rejected = harness.service.submit({ name: 'Product', fields: [{ name: 'code', kind: 'long' }] })

      await expect(rejected).rejects.toBeInstanceOf(DestructiveChangeRejected)
      await expect(rejected).rejects.toMatchObject({
        field: 'code',
        message: 'Destructive change to "Product.code" rejected: Type change of "code" requires allowDestructive (kind text -> long)',
      })
      expect((await harness.store.findByName('Product', null))?.version).toBe(1)
    })

    test('a stale base version is a conflict, not a retry', async () => {
      await harness.service.submit({ name: 'Product', fields: [{ name: 'code', kind: 'text' }] })
      const stale = harness.service.submit({
        name: 'Product',
        fields: [{ name: 'code', kind: 'text' }, { name: 'sku', kind: 'text' }],
        baseVersion: 0,
      })
      await expect(stale).rejects.toBeInstanceOf(ConcurrentModificationError)
      await expect(stale).rejects.toMatchObject({ expectedVersion: 0, actualVersion: 1 })

      const fresh = await harness.service.submit({
        name: 'Product',
        fields: [{ name: 'code', kind: 'text' }, { name: 'sku', kind: 'text' }],
        baseVersion: 1,
      })
      expect(fresh.descriptor.version).toBe(2)
    })

    test('concurrent full submissions keep each other\'s new fields', async () => {
      await harness.service.submit({ name: 'Invoice', fields: invoiceFields })

      await Promise.all([
        harness.service.submit({ name: 'Invoice', fields: [...invoiceFields, { name: 'note', kind: 'text', nullable: true }] }),
        harness.service.submit({ name: 'Invoice', fields: [...invoiceFields, { name: 'paid', kind: 'boolean', nullable: true }] }),
      ])

      const stored = await harness.store.findByName('Invoice', null)
      expect(stored?.version).toBe(3)
      expect(stored?.fields.map((field) => field.name).sort()).toEqual(['amount', 'dueDate', 'note', 'paid'])
      expect(await harness.knex.schema.hasColumn('de_invoice', 'note')).toBe(true)
      expect(await harness.knex.schema.hasColumn('de_invoice', 'paid')).toBe(true)
    })

    test('concurrent submissions defining the same field differently conflict', async () => {
      await harness.service.submit({ name: 'Product', fields: [{ name: 'title', kind: 'text' }] })

      const outcomes = await Promise.allSettled([
        harness.service.submit({ name: 'Product', fields: [{ name: 'title', kind: 'text' }, { name: 'code', kind: 'text' }] }),
        harness.service.submit({ name: 'Product', fields: [{ name: 'title', kind: 'text' }, { name: 'code', kind: 'long' }] }),
      ])

      expect(outcomes.map((outcome) => outcome.status).sort()).toEqual(['fulfilled', 'rejected'])
      const [failure] = outcomes.flatMap((outcome) => (outcome.status === 'rejected' ? [outcome.reason] : []))
      expect(failure).toBeInstanceOf(ConcurrentModificationError)
      expect(failure).toMatchObject({ expectedVersion: 1, actualVersion: 2 })
      const stored = await harness.store.findByName('Product', null)
      expect(stored?.version).toBe(2)
      expect(stored?.fields.map((field) => field.name)).toEqual(['title', 'code'])
    })

    test('removing a field needs the version it was read at', async () => {
      await harness.service.submit({ name: 'Invoice', fields: invoiceFields })
      const [amountField] = invoiceFields

      const implicit = harness.service.submit({ name: 'Invoice', fields: [amountField] })
      await expect(implicit).rejects.toBeInstanceOf(ValidationError)
      await expect(implicit).rejects.toMatchObject({
        issues: [{ path: 'fields', code: 'removal_requires_base_version', message: 'Removing "dueDate" requires baseVersion', field: 'dueDate' }],
      })
      expect((await harness.store.findByName('Invoice', null))?.version).toBe(1)

      const explicit = await harness.service.submit({ name: 'Invoice', fields: [amountField], baseVersion: 1 })
      expect(explicit.descriptor.version).toBe(2)
      expect(explicit.descriptor.fields.map((field) => field.name)).toEqual(['amount'])
    })

    test('names that map to the same table are rejected', async () => {
      await harness.service.submit({ name: 'InvoiceItem', fields: [{ name: 'qty', kind: 'long' }] })

      const clash = harness.service.submit({ name: 'invoice_item', fields: [{ name: 'sku', kind: 'text' }] })
      await expect(clash).rejects.toBeInstanceOf(ValidationError)
      await expect(clash).rejects.toMatchObject({
        issues: [{
          path: 'name',
          code: 'table_name_collision',
          message: '"invoice_item" maps to table "de_invoice_item", which "InvoiceItem" already uses',
        }],
      })
      expect((await harness.service.listEntityTypes()).map((type) => type.name)).toEqual(['InvoiceItem'])
    })
  })

  describe('mutate', () => {
    test('concurrent field additions both land', async () => {
      await harness.service.submit({ name: 'Invoice', fields: invoiceFields })

      await Promise.all([
        harness.service.addFields('Invoice', null, [{ name: 'note', kind: 'text', nullable: true }]),
        harness.service.addFields('Invoice', null, [{ name: 'paid', kind: 'boolean', nullable: true }]),
      ])

      const stored = await harness.store.findByName('Invoice', null)
      expect(stored?.version).toBe(3)
      expect(stored?.fields.map((field) => field.name).sort()).toEqual(['amount', 'dueDate', 'note', 'paid'])
      expect(await harness.knex.schema.hasColumn('de_invoice', 'note')).toBe(true)
      expect(await harness.knex.schema.hasColumn('de_invoice', 'paid')).toBe(true)
      expect(await harness.service.status()).toMatchObject([{ descriptorVersion: 3, appliedVersion: 3, inSync: true }])
    })

    test('unknown entities cannot be mutated', async () => {
      await expect(harness.service.addFields('Ghost', null, [])).rejects.toMatchObject({
        name: 'NotFoundError',
        message: 'Entity "Ghost" is not defined',
      })
    })
  })

  describe('drop', () => {
    beforeEach(async () => {
      await harness.service.submit({ name: 'Customer', fields: [{ name: 'email', kind: 'text', nullable: false }] })
      await harness.service.submit({
        name: 'Invoice',
        fields: [...invoiceFields, { name: 'customer', kind: 'reference', target: 'Customer' }],
      })
    })

    test('refuses to drop a referenced entity', async () => {
      await expect(harness.service.drop({ name: 'Customer' })).rejects.toMatchObject({
        name: 'DestructiveChangeRejected',
        message: 'Destructive change to "Customer" rejected: referenced by Invoice',
      })
    })

    test('needs force while records exist', async () => {
      await harness.repository.save({ entity: 'Invoice' }, { amount: 1 })
      await expect(harness.service.drop({ name: 'Invoice' })).rejects.toMatchObject({
        message: 'Destructive change to "Invoice" rejected: 1 record(s) exist; pass force to drop them',
      })

      const result = await harness.service.drop({ name: 'Invoice', force: true })
      expect(result).toEqual({ entityName: 'Invoice', tableName: 'de_invoice', droppedRows: 1 })
      expect(await harness.knex.schema.hasTable('de_invoice')).toBe(false)
      expect(await harness.store.findByName('Invoice', null)).toBeNull()
      expect(harness.builder.state(INVOICE_KEY)).toBe('UNREGISTERED')

      expect(await harness.service.drop({ name: 'Customer' })).toEqual({ entityName: 'Customer', tableName: 'de_customer', droppedRows: 0 })
      await expect(harness.service.drop({ name: 'Customer' })).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('status and warm-up', () => {
    test('lists entity types with their field counts', async () => {
      await harness.service.submit({ name: 'Invoice', fields: invoiceFields })
      await harness.service.submit({ name: 'Customer', label: 'Client', fields: [{ name: 'email', kind: 'text' }] })
      expect(await harness.service.listEntityTypes()).toEqual([
        { name: 'Customer', tenantScope: null, label: 'Client', description: null, version: 1, fieldCount: 1 },
        { name: 'Invoice', tenantScope: null, label: null, description: null, version: 1, fieldCount: 2 },
      ])
    })

    test('reports a failed migration until a later attempt succeeds', async () => {
      await harness.knex.schema.createTable('de_invoice', (table) => {
        table.text('leftover')
      })

      await expect(harness.service.submit({ name: 'Invoice', fields: invoiceFields })).rejects.toMatchObject({
        name: 'MigrationError',
        kind: 'structural',
      })
      const [failed] = await harness.service.status()
      expect(failed).toMatchObject({
        entityName: 'Invoice',
        tableName: 'de_invoice',
        descriptorVersion: 1,
        appliedVersion: 0,
        inSync: false,
        lastMigrationAt: null,
        mappingState: 'UNREGISTERED',
      })
      expect(failed?.lastMigrationError).toContain('already exists')
      expect(failed?.lastMigrationErrorAt).toBeInstanceOf(Date)

      expect(await harness.service.warmUp()).toEqual({ ready: 0, failed: [INVOICE_KEY] })
      await expect(harness.repository.count({ entity: 'Invoice' })).rejects.toBeInstanceOf(MigrationError)

      await harness.knex.schema.dropTable('de_invoice')
      expect(await harness.service.warmUp()).toEqual({ ready: 1, failed: [] })
      const [recovered] = await harness.service.status()
      expect(recovered).toMatchObject({ appliedVersion: 1, inSync: true, lastMigrationError: null, mappingState: 'ACTIVE' })
      expect(recovered?.lastMigrationAt).toBeInstanceOf(Date)
    })

    test('describe exposes the generated JSON schema', async () => {
      await harness.service.submit({ name: 'Invoice', fields: invoiceFields })
      const description = await harness.service.describe('invoice', null)
      expect(description.entity).toBe('Invoice')
      expect(description.jsonSchema).toMatchObject({
        definitions: { Invoice: { properties: { amount: { type: 'number' } }, additionalProperties: false } },
      })
    })
  })

  describe('across instances', () => {
    test('a schema change on one instance marks the mapping stale on the others', async () => {
      await harness.close()
      const hub = createHub()
      harness = await createHarness({ transport: hub() })

      const busB = createEventBus({ resolve: unusedResolve, transport: hub() })
      const notifierB = new ClusterNotifier(busB)
      const builderB = new RuntimeTypeBuilder({ dialect: harness.dialect, readyTimeoutMs: 1_000 })
      const executorB = new MigrationExecutor({ knex: harness.knex, dialect: harness.dialect, timeoutMs: 5_000, maxAttempts: 1, retryDelayMs: 0 })
      const synchronizerB = new SchemaSynchronizer({ knex: harness.knex, executor: executorB, notifier: notifierB, builder: builderB })
      const repositoryB = new DynamicRepository({ knex: harness.knex, dialect: harness.dialect, store: harness.store, synchronizer: synchronizerB, builder: builderB })
      const received: number[] = []
      notifierB.onReceive((change) => {
        received.push(change.version)
        builderB.markStale(entityKey(change.entityName, change.tenantScope), change.version)
      })

      try {
        await harness.service.submit({ name: 'Invoice', fields: invoiceFields })
        const id = await repositoryB.save({ entity: 'Invoice' }, { amount: 7 })
        expect(builderB.state(INVOICE_KEY)).toBe('ACTIVE')

        await harness.service.addFields('Invoice', null, [{ name: 'status', kind: 'text', nullable: false, defaultValue: 'OPEN' }])
        await new Promise((resolve) => setImmediate(resolve))

        expect(received).toEqual([1, 2])
        expect(builderB.state(INVOICE_KEY)).toBe('STALE')
        expect(await repositoryB.findOne({ entity: 'Invoice' }, id)).toMatchObject({ amount: 7, status: 'OPEN' })
        expect(builderB.state(INVOICE_KEY)).toBe('ACTIVE')
        expect(builderB.peek(INVOICE_KEY)?.version).toBe(2)
      } finally {
        await busB.close()
      }
    })

    test('an instance that missed a drop does not reuse the old mapping for the re-created entity', async () => {
      const ticketKey = entityKey('Ticket', null)
      const busB = createEventBus({ resolve: unusedResolve, transport: createLocalTransport() })
      const notifierB = new ClusterNotifier(busB)
      const builderB = new RuntimeTypeBuilder({ dialect: harness.dialect, readyTimeoutMs: 1_000 })
      const executorB = new MigrationExecutor({ knex: harness.knex, dialect: harness.dialect, timeoutMs: 5_000, maxAttempts: 1, retryDelayMs: 0 })
      const synchronizerB = new SchemaSynchronizer({ knex: harness.knex, executor: executorB, notifier: notifierB, builder: builderB })
      const repositoryB = new DynamicRepository({ knex: harness.knex, dialect: harness.dialect, store: harness.store, synchronizer: synchronizerB, builder: builderB })

      try {
        await harness.service.submit({ name: 'Ticket', fields: [{ name: 'title', kind: 'text', nullable: false }] })
        await repositoryB.save({ entity: 'Ticket' }, { title: 'first' })
        const oldMapping = builderB.peek(ticketKey)

        await harness.service.drop({ name: 'Ticket', force: true })
        await harness.service.submit({ name: 'Ticket', fields: [{ name: 'priority', kind: 'long' }] })

        const id = await repositoryB.save({ entity: 'Ticket' }, { priority: 3 })
        const mapping = builderB.peek(ticketKey)
        expect(mapping?.version).toBe(1)
        expect(mapping?.descriptorId).not.toBe(oldMapping?.descriptorId)
        expect(mapping?.fields.map((field) => field.field)).toEqual(['priority'])
        expect(await harness.repository.findOne({ entity: 'Ticket' }, id)).toMatchObject({ priority: 3 })
      } finally {
        await busB.close()
      }
    })
  })
})
