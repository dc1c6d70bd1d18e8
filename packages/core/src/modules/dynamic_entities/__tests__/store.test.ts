import { ConcurrentModificationError } from '../lib/errors'
import { fieldSignature } from '../lib/store'
import type { DescriptorDraft, FieldDescriptor } from '../lib/types'
import { createHarness, type Harness } from './harness'

const amount: FieldDescriptor = { name: 'amount', kind: 'decimal', nullable: false, constraints: { precision: 12, scale: 2 } }
const dueDate: FieldDescriptor = { name: 'dueDate', kind: 'timestamp', nullable: true }

function invoice(fields: FieldDescriptor[] = [amount, dueDate], tenantScope: string | null = null): DescriptorDraft {
  return { name: 'Invoice', tenantScope, label: 'Invoice', fields }
}

describe('fieldSignature', () => {
  test('ignores labels and field order', () => {
    expect(fieldSignature([{ ...amount, label: 'Amount' }, dueDate])).toBe(fieldSignature([dueDate, amount]))
  })

  test('changes with constraints', () => {
    expect(fieldSignature([amount])).not.toBe(fieldSignature([{ ...amount, constraints: { precision: 14, scale: 2 } }]))
  })
})

describe('DescriptorStore', () => {
  let harness: Harness

  beforeEach(async () => {
    harness = await createHarness()
  })

  afterEach(async () => {
    await harness.close()
  })

  test('creates version 1 with a derived table name', async () => {
    const result = await harness.store.save(invoice(), { expectedVersion: 0 })
    expect(result.created).toBe(true)
    expect(result.changed).toBe(true)
    expect(result.descriptor).toMatchObject({ name: 'Invoice', tenantScope: null, version: 1, tableName: 'de_invoice', label: 'Invoice' })

    const found = await harness.store.findByName('INVOICE', null)
    expect(found?.id).toBe(result.descriptor.id)
    expect(found?.fields).toEqual([amount, dueDate])
  })

  test('bumps the version only when fields change', async () => {
    await harness.store.save(invoice())
    const relabeled = await harness.store.save({ ...invoice([{ ...amount, label: 'Total' }, dueDate]), label: 'Bill' })
    expect(relabeled.changed).toBe(false)
    expect(relabeled.descriptor.version).toBe(1)
    expect(relabeled.descriptor.label).toBe('Bill')

    const extended = await harness.store.save(invoice([amount, dueDate, { name: 'note', kind: 'text', nullable: true }]), { expectedVersion: 1 })
    expect(extended.changed).toBe(true)
    expect(extended.descriptor.version).toBe(2)
  })

  test('rejects a save based on an outdated version', async () => {
    await harness.store.save(invoice())
    await expect(harness.store.save(invoice(), { expectedVersion: 0 })).rejects.toMatchObject({
      name: 'ConcurrentModificationError',
      expectedVersion: 0,
      actualVersion: 1,
    })
  })

  test('exactly one of two concurrent writers on the same version wins', async () => {
    await harness.store.save(invoice())
    const results = await Promise.allSettled([
      harness.store.save(invoice([amount, dueDate, { name: 'note', kind: 'text', nullable: true }]), { expectedVersion: 1 }),
      harness.store.save(invoice([amount, dueDate, { name: 'paid', kind: 'boolean', nullable: true }]), { expectedVersion: 1 }),
    ])
    const fulfilled = results.filter((result) => result.status === 'fulfilled')
    const rejected = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []))
    expect(fulfilled).toHaveLength(1)
    expect(rejected).toHaveLength(1)
    expect(rejected[0]).toBeInstanceOf(ConcurrentModificationError)

    const stored = await harness.store.findByName('Invoice', null)
    expect(stored?.version).toBe(2)
  })

  test('two names cannot share a table', async () => {
    await harness.store.save({ name: 'InvoiceItem', tenantScope: null, fields: [amount] })
    await expect(harness.store.save({ name: 'invoice_item', tenantScope: null, fields: [amount] })).rejects.toMatchObject({
      name: 'ConcurrentModificationError',
      expectedVersion: null,
      actualVersion: null,
    })
    expect((await harness.store.listAll()).map((descriptor) => descriptor.name)).toEqual(['InvoiceItem'])
  })

  test('keeps tenant entities apart and falls back to global ones', async () => {
    await harness.store.save(invoice())
    const scoped = await harness.store.save(invoice([amount], 'tenant-a'))
    expect(scoped.descriptor.tableName).toBe('de_invoice_956ed313')

    expect((await harness.store.resolve('Invoice', 'tenant-a'))?.tenantScope).toBe('tenant-a')
    expect((await harness.store.resolve('Invoice', 'tenant-b'))?.tenantScope).toBeNull()

    expect((await harness.store.listAll(null)).map((d) => d.tenantScope)).toEqual([null])
    expect((await harness.store.listAll('tenant-a')).map((d) => d.tenantScope).sort()).toEqual([null, 'tenant-a'].sort())
    expect(await harness.store.listAll()).toHaveLength(2)
  })

  test('remove deletes the descriptor', async () => {
    await harness.store.save(invoice())
    expect(await harness.store.remove('invoice', null)).toBe(true)
    expect(await harness.store.findByName('Invoice', null)).toBeNull()
    expect(await harness.store.remove('invoice', null)).toBe(false)
  })
})
