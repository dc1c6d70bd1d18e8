import { classifyFieldChange, validateDescriptor } from '../lib/validator'
import type { DescriptorDraft, FieldDescriptor } from '../lib/types'

const amount: FieldDescriptor = { name: 'amount', kind: 'decimal', nullable: false, constraints: { precision: 12, scale: 2 } }
const dueDate: FieldDescriptor = { name: 'dueDate', kind: 'timestamp', nullable: true }

function draft(fields: FieldDescriptor[], name = 'Invoice'): DescriptorDraft {
  return { name, tenantScope: null, fields }
}

describe('validateDescriptor', () => {
  test('accepts a new entity without reporting changes', () => {
    expect(validateDescriptor(draft([amount, dueDate]), null)).toEqual({ ok: true, changes: [], fieldsChanged: false })
  })

  test('rejects reserved words and system column collisions', () => {
    const result = validateDescriptor(draft([
      amount,
      { name: 'select', kind: 'text', nullable: true },
      { name: 'createdAt', kind: 'timestamp', nullable: true },
    ]), null)
    expect(result.ok).toBe(false)
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues).toEqual([
      { path: 'fields[1].name', code: 'reserved_name', message: '"select" is a reserved word', field: 'select' },
      { path: 'fields[2].name', code: 'reserved_name', message: '"createdAt" collides with system column "created_at"', field: 'createdAt' },
    ])
  })

  test('rejects reserved entity names', () => {
    const result = validateDescriptor(draft([amount], 'Order'), null)
    expect(result.ok).toBe(false)
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues.map((issue) => issue.code)).toEqual(['reserved_name'])
  })

  test('reports case-insensitive duplicates and column collisions', () => {
    const result = validateDescriptor(draft([
      amount,
      { name: 'Amount', kind: 'decimal', nullable: true },
      dueDate,
      { name: 'due_date', kind: 'timestamp', nullable: true },
    ]), null)
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues).toEqual([
      { path: 'fields[1].name', code: 'duplicate_field', message: '"Amount" duplicates "amount"', field: 'Amount' },
      { path: 'fields[3].name', code: 'column_collision', message: '"due_date" and "dueDate" both map to column "due_date"', field: 'due_date' },
    ])
  })

  test('checks constraints, options and defaults per kind', () => {
    const result = validateDescriptor(draft([
      { name: 'qty', kind: 'long', nullable: true, constraints: { min: 10, max: 1 } },
      { name: 'state', kind: 'enum', nullable: true, options: [] },
      { name: 'flag', kind: 'boolean', nullable: true, constraints: { maxLength: 3 } },
      { name: 'title', kind: 'text', nullable: true, constraints: { maxLength: 5 }, defaultValue: 'too long' },
    ]), null)
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues.map((issue) => [issue.field, issue.code])).toEqual([
      ['qty', 'invalid_constraint'],
      ['state', 'invalid_options'],
      ['flag', 'invalid_constraint'],
      ['title', 'invalid_default'],
    ])
  })

  test('decimal precision is capped at what a number can carry', () => {
    const result = validateDescriptor(draft([
      { name: 'total', kind: 'decimal', nullable: true, constraints: { precision: 16, scale: 2 } },
    ]), null)
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues).toEqual([
      { path: 'fields[0]', code: 'invalid_constraint', message: 'precision must be an integer between 1 and 15', field: 'total' },
    ])
    expect(validateDescriptor(draft([{ name: 'total', kind: 'decimal', nullable: true, constraints: { precision: 15, scale: 2 } }]), null).ok).toBe(true)
  })

  test('timestamp defaults must be dates', () => {
    const result = validateDescriptor(draft([
      { name: 'closedAt', kind: 'timestamp', nullable: true, defaultValue: true },
      { name: 'openedAt', kind: 'timestamp', nullable: true, defaultValue: '2025-01-01' },
    ]), null)
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues).toEqual([
      { path: 'fields[0].defaultValue', code: 'invalid_default', message: 'Expected a date or a date string', field: 'closedAt' },
    ])
  })

  test('rejects a name whose table another entity already owns', () => {
    const result = validateDescriptor(draft([amount], 'invoice_item'), null, {
      tableOwners: new Map([['de_invoice_item', 'InvoiceItem']]),
    })
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues).toEqual([
      { path: 'name', code: 'table_name_collision', message: '"invoice_item" maps to table "de_invoice_item", which "InvoiceItem" already uses' },
    ])
    expect(validateDescriptor(draft([amount], 'invoice_item'), null, {
      tableOwners: new Map([['de_invoice', 'Invoice']]),
    }).ok).toBe(true)
  })

  test('references must target a known entity', () => {
    const customer: FieldDescriptor = { name: 'customer', kind: 'reference', nullable: true, target: 'Customer' }
    const unknown = validateDescriptor(draft([customer]), null)
    if (unknown.ok) throw new Error('Expected rejection')
    expect(unknown.issues).toEqual([
      { path: 'fields[0]', code: 'unknown_reference', message: 'Target entity "Customer" is not defined', field: 'customer' },
    ])
    expect(validateDescriptor(draft([customer]), null, { knownEntities: ['customer'] }).ok).toBe(true)
  })

  test('limits the number of fields', () => {
    const result = validateDescriptor(draft([amount, dueDate]), null, { maxFields: 1 })
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues).toEqual([{ path: 'fields', code: 'too_many_fields', message: 'At most 1 fields are allowed' }])
  })

  test('new non-nullable fields on an existing entity need a default', () => {
    const previous = { fields: [amount] }
    const missing = validateDescriptor(draft([amount, { name: 'status', kind: 'text', nullable: false }]), previous)
    if (missing.ok) throw new Error('Expected rejection')
    expect(missing.issues).toEqual([
      { path: 'fields[1]', code: 'missing_default', message: 'New non-nullable field "status" needs a default value', field: 'status' },
    ])

    const defaulted = validateDescriptor(draft([amount, { name: 'status', kind: 'text', nullable: false, defaultValue: 'OPEN' }]), previous)
    expect(defaulted).toEqual({
      ok: true,
      changes: [{ field: 'status', column: 'status', type: 'ADD', reasons: [] }],
      fieldsChanged: true,
    })
  })

  test('rejects a type change unless destructive changes are allowed', () => {
    const previous = { fields: [{ name: 'code', kind: 'text', nullable: true } satisfies FieldDescriptor] }
    const candidate = draft([{ name: 'code', kind: 'long', nullable: true }])

    const rejected = validateDescriptor(candidate, previous)
    if (rejected.ok) throw new Error('Expected rejection')
    expect(rejected.issues).toEqual([{
      path: 'fields',
      code: 'destructive_change_rejected',
      message: 'Type change of "code" requires allowDestructive (kind text -> long)',
      field: 'code',
    }])

    expect(validateDescriptor(candidate, previous, { allowDestructive: true })).toEqual({
      ok: true,
      changes: [{ field: 'code', column: 'code', type: 'RETYPE', reasons: ['kind text -> long'] }],
      fieldsChanged: true,
    })
  })

  test('removing an option narrows the field', () => {
    const previous = { fields: [{ name: 'status', kind: 'enum', nullable: true, options: ['A', 'B'] } satisfies FieldDescriptor] }
    const result = validateDescriptor(draft([{ name: 'status', kind: 'enum', nullable: true, options: ['A'] }]), previous)
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues[0]?.message).toBe('Narrowing of "status" requires allowDestructive (options removed: B)')
  })

  test('removing a field is reported but allowed', () => {
    const result = validateDescriptor(draft([amount]), { fields: [amount, dueDate] })
    expect(result).toEqual({
      ok: true,
      changes: [{ field: 'dueDate', column: 'due_date', type: 'REMOVE', reasons: [] }],
      fieldsChanged: true,
    })
  })

  test('a case-only rename is rejected', () => {
    const result = validateDescriptor(draft([amount, { ...dueDate, name: 'DueDate' }]), { fields: [amount, dueDate] })
    if (result.ok) throw new Error('Expected rejection')
    expect(result.issues).toEqual([
      { path: 'fields[1].name', code: 'case_only_rename', message: '"dueDate" cannot be renamed to "DueDate"', field: 'DueDate' },
    ])
  })

  test('label-only edits are not changes', () => {
    const result = validateDescriptor(draft([{ ...amount, label: 'Amount due' }, dueDate]), { fields: [amount, dueDate] })
    expect(result).toEqual({ ok: true, changes: [], fieldsChanged: false })
  })
})

describe('classifyFieldChange', () => {
  test('longer varchar widens', () => {
    expect(classifyFieldChange(
      { name: 'title', kind: 'text', nullable: true, constraints: { maxLength: 50 } },
      { name: 'title', kind: 'text', nullable: true, constraints: { maxLength: 100 } },
    )).toEqual({ field: 'title', column: 'title', type: 'WIDEN', reasons: ['column widen'] })
  })

  test('long to unbounded decimal widens', () => {
    expect(classifyFieldChange(
      { name: 'total', kind: 'long', nullable: true },
      { name: 'total', kind: 'decimal', nullable: true },
    )).toEqual({ field: 'total', column: 'total', type: 'WIDEN', reasons: ['kind long -> decimal', 'column widen'] })
  })

  test('shorter varchar narrows', () => {
    expect(classifyFieldChange(
      { name: 'title', kind: 'text', nullable: true, constraints: { maxLength: 100 } },
      { name: 'title', kind: 'text', nullable: true, constraints: { maxLength: 50 } },
    )?.type).toBe('NARROW')
  })

  test('making a field required narrows', () => {
    expect(classifyFieldChange(
      { name: 'title', kind: 'text', nullable: true },
      { name: 'title', kind: 'text', nullable: false, defaultValue: 'x' },
    )?.type).toBe('NARROW')
  })

  test('changing a reference target is a retype', () => {
    expect(classifyFieldChange(
      { name: 'owner', kind: 'reference', nullable: true, target: 'User' },
      { name: 'owner', kind: 'reference', nullable: true, target: 'Team' },
    )).toEqual({ field: 'owner', column: 'owner', type: 'RETYPE', reasons: ['target User -> Team'] })
  })
})
