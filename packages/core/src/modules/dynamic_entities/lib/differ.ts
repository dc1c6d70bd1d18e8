import { columnSpecFor, comparePhysical, type ColumnSpec } from './columns'
import type { AppliedDescriptor } from './types'

export type DdlOperation =
  | { type: 'CREATE_TABLE'; table: string; columns: ColumnSpec[] }
  | { type: 'ADD_COLUMN'; table: string; column: ColumnSpec }
  | { type: 'ALTER_COLUMN'; table: string; from: ColumnSpec; to: ColumnSpec; destructive: boolean }
  | { type: 'REPLACE_COLUMN'; table: string; from: ColumnSpec; to: ColumnSpec }
  | { type: 'DROP_COLUMN'; table: string; column: ColumnSpec }
  | { type: 'DROP_TABLE'; table: string }

export type DdlOperationType = DdlOperation['type']

const ORDER: Record<DdlOperationType, number> = {
  CREATE_TABLE: 0,
  ADD_COLUMN: 1,
  ALTER_COLUMN: 2,
  REPLACE_COLUMN: 3,
  DROP_COLUMN: 4,
  DROP_TABLE: 5,
}

export function describeOperation(op: DdlOperation): string {
  switch (op.type) {
    case 'CREATE_TABLE':
      return `create table ${op.table} (${op.columns.map((column) => column.name).join(', ')})`
    case 'ADD_COLUMN':
      return `add column ${op.table}.${op.column.name}`
    case 'ALTER_COLUMN':
      return `alter column ${op.table}.${op.to.name}${op.destructive ? ' (destructive)' : ''}`
    case 'REPLACE_COLUMN':
      return `replace column ${op.table}.${op.to.name}`
    case 'DROP_COLUMN':
      return `drop column ${op.table}.${op.column.name}`
    case 'DROP_TABLE':
      return `drop table ${op.table}`
  }
}

/**
 * Computes the DDL that takes the physical table from `previous` (the last
 * applied snapshot, or null when nothing was ever applied) to `target`.
 * Columns are matched by name; the result is ordered CREATE, ADD, ALTER,
 * REPLACE, DROP and is empty when both sides already agree.
 */
export function diffSchemas(previous: AppliedDescriptor | null, target: AppliedDescriptor): DdlOperation[] {
  const table = target.tableName
  const targetColumns = target.fields.map(columnSpecFor)
  if (!previous) {
    return [{ type: 'CREATE_TABLE', table, columns: targetColumns }]
  }

  const previousColumns = new Map(previous.fields.map((field) => {
    const spec = columnSpecFor(field)
    return [spec.name, spec] as const
  }))
  const targetNames = new Set(targetColumns.map((column) => column.name))
  const operations: DdlOperation[] = []

  for (const column of targetColumns) {
    const before = previousColumns.get(column.name)
    if (!before) {
      operations.push({ type: 'ADD_COLUMN', table, column })
      continue
    }
    const change = comparePhysical(before, column)
    if (change === 'same') continue
    if (change === 'retype') {
      operations.push({ type: 'REPLACE_COLUMN', table, from: before, to: column })
      continue
    }
    operations.push({ type: 'ALTER_COLUMN', table, from: before, to: column, destructive: change === 'narrow' })
  }
  for (const [name, column] of previousColumns) {
    if (!targetNames.has(name)) operations.push({ type: 'DROP_COLUMN', table, column })
  }

  return operations
    .map((op, index) => ({ op, index }))
    .sort((a, b) => ORDER[a.op.type] - ORDER[b.op.type] || a.index - b.index)
    .map(({ op }) => op)
}

export function hasDestructiveOperation(operations: DdlOperation[]): boolean {
  return operations.some((op) =>
    op.type === 'DROP_COLUMN'
    || op.type === 'DROP_TABLE'
    || op.type === 'REPLACE_COLUMN'
    || (op.type === 'ALTER_COLUMN' && op.destructive))
}
