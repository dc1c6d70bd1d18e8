import type { DefaultValue, FieldDescriptor } from './types'
import type { FieldKind } from './kinds'
import { columnName } from './naming'

export type SqlColumnType = 'varchar' | 'text' | 'bigint' | 'numeric' | 'boolean' | 'timestamptz' | 'uuid'

export type ColumnSpec = {
  name: string
  kind: FieldKind
  sqlType: SqlColumnType
  length: number | null
  precision: number | null
  scale: number | null
  nullable: boolean
  defaultValue: DefaultValue | null
  multi: boolean
}

export type PhysicalChange = 'same' | 'widen' | 'narrow' | 'retype'

export const ENUM_COLUMN_LENGTH = 255
export const MAX_VARCHAR_LENGTH = 10_485_760
const BIGINT_DIGITS = 19

const CHANGE_RANK: Record<PhysicalChange, number> = { same: 0, widen: 1, narrow: 2, retype: 3 }

export function columnSpecFor(field: FieldDescriptor): ColumnSpec {
  const base = {
    name: columnName(field.name),
    kind: field.kind,
    length: null,
    precision: null,
    scale: null,
    nullable: field.nullable,
    defaultValue: field.defaultValue ?? null,
    multi: false,
  }
  switch (field.kind) {
    case 'text': {
      const maxLength = field.constraints?.maxLength
      return maxLength === undefined
        ? { ...base, sqlType: 'text' }
        : { ...base, sqlType: 'varchar', length: maxLength }
    }
    case 'long':
      return { ...base, sqlType: 'bigint' }
    case 'decimal': {
      const precision = field.constraints?.precision ?? null
      return {
        ...base,
        sqlType: 'numeric',
        precision,
        scale: precision === null ? null : field.constraints?.scale ?? 0,
      }
    }
    case 'boolean':
      return { ...base, sqlType: 'boolean' }
    case 'timestamp':
      return { ...base, sqlType: 'timestamptz' }
    case 'enum':
      return field.multi
        ? { ...base, sqlType: 'text', multi: true }
        : { ...base, sqlType: 'varchar', length: ENUM_COLUMN_LENGTH }
    case 'reference':
      return { ...base, sqlType: 'uuid' }
  }
}

function compareNumeric(from: ColumnSpec, to: ColumnSpec): PhysicalChange {
  if (from.precision === to.precision && from.scale === to.scale) return 'same'
  if (to.precision === null) return 'widen'
  if (from.precision === null) return 'narrow'
  const fromScale = from.scale ?? 0
  const toScale = to.scale ?? 0
  const fromIntegerDigits = from.precision - fromScale
  const toIntegerDigits = to.precision - toScale
  return toIntegerDigits >= fromIntegerDigits && toScale >= fromScale ? 'widen' : 'narrow'
}

function compareType(from: ColumnSpec, to: ColumnSpec): PhysicalChange {
  if (from.sqlType === to.sqlType) {
    if (from.sqlType === 'varchar') {
      const fromLength = from.length ?? 0
      const toLength = to.length ?? 0
      if (fromLength === toLength) return 'same'
      return toLength > fromLength ? 'widen' : 'narrow'
    }
    if (from.sqlType === 'numeric') return compareNumeric(from, to)
    return 'same'
  }
  if (from.sqlType === 'varchar' && to.sqlType === 'text') return 'widen'
  if (from.sqlType === 'text' && to.sqlType === 'varchar') return 'narrow'
  if (from.sqlType === 'bigint' && to.sqlType === 'numeric') {
    if (to.precision === null) return 'widen'
    return to.precision - (to.scale ?? 0) >= BIGINT_DIGITS ? 'widen' : 'narrow'
  }
  if (from.sqlType === 'numeric' && to.sqlType === 'bigint') return 'narrow'
  return 'retype'
}

export function maxChange(...changes: PhysicalChange[]): PhysicalChange {
  return changes.reduce<PhysicalChange>((acc, change) => (CHANGE_RANK[change] > CHANGE_RANK[acc] ? change : acc), 'same')
}

export function sameDefault(a: DefaultValue | null, b: DefaultValue | null): boolean {
  return JSON.stringify(a) === JSON.stringify(b)
}

/**
 * Classifies how the physical column changes between two specs. Type changes
 * outside one family are `retype`; NOT NULL → NULL and default changes widen.
 */
export function comparePhysical(from: ColumnSpec, to: ColumnSpec): PhysicalChange {
  const typeChange = compareType(from, to)
  if (typeChange === 'retype') return 'retype'
  const nullability: PhysicalChange = from.nullable === to.nullable ? 'same' : to.nullable ? 'widen' : 'narrow'
  const defaults: PhysicalChange = sameDefault(from.defaultValue, to.defaultValue) ? 'same' : 'widen'
  const encoding: PhysicalChange = from.multi === to.multi ? 'same' : to.multi ? 'widen' : 'narrow'
  return maxChange(typeChange, nullability, defaults, encoding)
}
