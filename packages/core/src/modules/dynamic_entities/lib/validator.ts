import { CONSTRAINTS_BY_KIND } from './kinds'
import { columnSpecFor, comparePhysical, ENUM_COLUMN_LENGTH, MAX_VARCHAR_LENGTH, maxChange, type PhysicalChange } from './columns'
import { buildValueSchema } from './field-schema'
import {
  IDENTIFIER_PATTERN,
  MAX_ENTITY_NAME_LENGTH,
  MAX_FIELD_NAME_LENGTH,
  MAX_IDENTIFIER_LENGTH,
  columnName,
  deriveTableName,
  isReservedWord,
  isSystemColumn,
  nameKey,
  toSnakeCase,
} from './naming'
import type { ValidationIssue } from './errors'
import type { DescriptorDraft, FieldDescriptor } from './types'

export type FieldChangeType = 'ADD' | 'REMOVE' | 'WIDEN' | 'NARROW' | 'RETYPE'

export type FieldChange = {
  field: string
  column: string
  type: FieldChangeType
  reasons: string[]
}

export type ValidateOptions = {
  allowDestructive?: boolean
  /** Entity names visible from the candidate's scope; references must point at one of them or at itself. */
  knownEntities?: Iterable<string>
  maxFields?: number
  /** Physical tables owned by other entities, keyed by table name, valued by owner name. */
  tableOwners?: ReadonlyMap<string, string>
}

export type ValidationResult =
  | { ok: true; changes: FieldChange[]; fieldsChanged: boolean }
  | { ok: false; issues: ValidationIssue[]; changes: FieldChange[] }

export const DEFAULT_MAX_FIELDS = 200
/** Decimal values travel as JS numbers; beyond 15 digits they no longer round-trip. */
export const MAX_DECIMAL_PRECISION = 15

const isDestructive = (type: FieldChangeType): boolean => type === 'NARROW' || type === 'RETYPE'

function checkIdentifier(
  issues: ValidationIssue[],
  path: string,
  name: string,
  maxLength: number,
  field?: string,
): void {
  if (!IDENTIFIER_PATTERN.test(name)) {
    issues.push({ path, code: 'invalid_name', message: `"${name}" must start with a letter and contain only letters, digits and underscores`, field })
    return
  }
  if (name.length > maxLength) {
    issues.push({ path, code: 'name_too_long', message: `"${name}" exceeds ${maxLength} characters`, field })
  }
  if (isReservedWord(name) || isReservedWord(toSnakeCase(name))) {
    issues.push({ path, code: 'reserved_name', message: `"${name}" is a reserved word`, field })
  }
}

function isInteger(value: number | undefined): boolean {
  return value === undefined || Number.isInteger(value)
}

function checkKindSettings(
  issues: ValidationIssue[],
  path: string,
  field: FieldDescriptor,
  knownEntities: Set<string>,
): boolean {
  const before = issues.length
  const push = (code: ValidationIssue['code'], message: string) => issues.push({ path, code, message, field: field.name })
  const constraints = field.constraints ?? {}
  const allowed = CONSTRAINTS_BY_KIND[field.kind]

  for (const key of Object.keys(constraints)) {
    if (!allowed.some((candidate) => candidate === key)) {
      push('invalid_constraint', `Constraint "${key}" does not apply to ${field.kind} fields`)
    }
  }
  const { maxLength, min, max, regex, precision, scale } = constraints
  if (maxLength !== undefined && (!Number.isInteger(maxLength) || maxLength < 1 || maxLength > MAX_VARCHAR_LENGTH)) {
    push('invalid_constraint', `maxLength must be an integer between 1 and ${MAX_VARCHAR_LENGTH}`)
  }
  if (field.kind === 'long' && (!isInteger(min) || !isInteger(max))) {
    push('invalid_constraint', 'min and max must be integers for long fields')
  }
  if (min !== undefined && max !== undefined && min > max) {
    push('invalid_constraint', 'min must not exceed max')
  }
  if (regex !== undefined) {
    try {
      new RegExp(regex)
    } catch {
      push('invalid_constraint', `regex "${regex}" does not compile`)
    }
  }
  if (precision !== undefined && (!Number.isInteger(precision) || precision < 1 || precision > MAX_DECIMAL_PRECISION)) {
    push('invalid_constraint', `precision must be an integer between 1 and ${MAX_DECIMAL_PRECISION}`)
  }
  if (scale !== undefined) {
    if (precision === undefined) push('invalid_constraint', 'scale requires precision')
    else if (!Number.isInteger(scale) || scale < 0 || scale > precision) push('invalid_constraint', 'scale must be an integer between 0 and precision')
  }

  if (field.kind === 'enum') {
    const options = field.options ?? []
    if (options.length === 0) push('invalid_options', 'enum fields need at least one option')
    if (new Set(options).size !== options.length) push('invalid_options', 'enum options must be unique')
    if (options.some((option) => option.length === 0 || option.length > ENUM_COLUMN_LENGTH)) {
      push('invalid_options', `enum options must be 1 to ${ENUM_COLUMN_LENGTH} characters`)
    }
  } else {
    if (field.options !== undefined) push('invalid_options', 'options only apply to enum fields')
    if (field.multi) push('invalid_options', 'multi only applies to enum fields')
  }

  if (field.kind === 'reference') {
    if (!field.target) push('unknown_reference', 'reference fields need a target entity')
    else if (!knownEntities.has(nameKey(field.target))) push('unknown_reference', `Target entity "${field.target}" is not defined`)
  } else if (field.target !== undefined) {
    push('invalid_constraint', 'target only applies to reference fields')
  }

  return issues.length === before
}

function checkDefault(issues: ValidationIssue[], path: string, field: FieldDescriptor): void {
  if (field.defaultValue === undefined || field.defaultValue === null) return
  const parsed = buildValueSchema(field).safeParse(field.defaultValue)
  if (!parsed.success) {
    issues.push({
      path: `${path}.defaultValue`,
      code: 'invalid_default',
      message: parsed.error.issues[0]?.message ?? 'Invalid default value',
      field: field.name,
    })
  }
}

function compareBound(
  previous: number | undefined,
  next: number | undefined,
  direction: 'lower' | 'upper',
): PhysicalChange {
  if (previous === next) return 'same'
  if (next === undefined) return 'widen'
  if (previous === undefined) return 'narrow'
  const loosened = direction === 'lower' ? next < previous : next > previous
  return loosened ? 'widen' : 'narrow'
}

/** null when only cosmetic attributes (label) differ. */
export function classifyFieldChange(previous: FieldDescriptor, next: FieldDescriptor): FieldChange | null {
  const column = columnName(next.name)
  const reasons: string[] = []
  const result = (change: PhysicalChange): FieldChange | null => {
    if (change === 'same') return null
    const type: FieldChangeType = change === 'widen' ? 'WIDEN' : change === 'narrow' ? 'NARROW' : 'RETYPE'
    return { field: next.name, column, type, reasons }
  }

  if (previous.kind !== next.kind) {
    reasons.push(`kind ${previous.kind} -> ${next.kind}`)
    const widening = (previous.kind === 'long' && next.kind === 'decimal')
      || (previous.kind === 'enum' && !previous.multi && next.kind === 'text')
    if (!widening) return result('retype')
  }

  const physical = comparePhysical(columnSpecFor(previous), columnSpecFor(next))
  if (physical !== 'same') reasons.push(`column ${physical}`)
  if (physical === 'retype') return result('retype')

  const semantic: PhysicalChange[] = [physical]
  if (next.kind === 'reference' && previous.kind === 'reference' && nameKey(previous.target ?? '') !== nameKey(next.target ?? '')) {
    reasons.push(`target ${previous.target ?? ''} -> ${next.target ?? ''}`)
    return result('retype')
  }
  if (next.kind === 'enum' && previous.kind === 'enum') {
    const before = new Set(previous.options ?? [])
    const after = new Set(next.options ?? [])
    const removed = [...before].filter((option) => !after.has(option))
    const added = [...after].filter((option) => !before.has(option))
    if (removed.length) {
      reasons.push(`options removed: ${removed.join(', ')}`)
      semantic.push('narrow')
    }
    if (added.length) {
      reasons.push(`options added: ${added.join(', ')}`)
      semantic.push('widen')
    }
  }
  if (next.kind === 'text') {
    const previousRegex = previous.kind === 'text' ? previous.constraints?.regex : undefined
    const nextRegex = next.constraints?.regex
    if (previousRegex !== nextRegex) {
      reasons.push(nextRegex === undefined ? 'regex removed' : 'regex changed')
      semantic.push(nextRegex === undefined ? 'widen' : 'narrow')
    }
  }
  if (next.kind === 'long' || next.kind === 'decimal') {
    const lower = compareBound(previous.constraints?.min, next.constraints?.min, 'lower')
    const upper = compareBound(previous.constraints?.max, next.constraints?.max, 'upper')
    if (lower !== 'same') reasons.push(`min ${lower}`)
    if (upper !== 'same') reasons.push(`max ${upper}`)
    semantic.push(lower, upper)
  }
  return result(maxChange(...semantic))
}

/**
 * Checks a candidate descriptor and, given the stored one, classifies every
 * field change. Pure: problems come back as issues, never as exceptions.
 */
export function validateDescriptor(
  candidate: DescriptorDraft,
  previous: { fields: FieldDescriptor[] } | null,
  options: ValidateOptions = {},
): ValidationResult {
  const issues: ValidationIssue[] = []
  const changes: FieldChange[] = []
  const knownEntities = new Set<string>([...(options.knownEntities ?? [])].map(nameKey))
  knownEntities.add(nameKey(candidate.name))
  const maxFields = options.maxFields ?? DEFAULT_MAX_FIELDS

  checkIdentifier(issues, 'name', candidate.name, MAX_ENTITY_NAME_LENGTH)
  const tableName = deriveTableName(candidate.name, candidate.tenantScope)
  if (tableName.length > MAX_IDENTIFIER_LENGTH) {
    issues.push({ path: 'name', code: 'name_too_long', message: `Table name for "${candidate.name}" exceeds ${MAX_IDENTIFIER_LENGTH} characters` })
  }
  const owner = options.tableOwners?.get(tableName)
  if (owner !== undefined) {
    issues.push({ path: 'name', code: 'table_name_collision', message: `"${candidate.name}" maps to table "${tableName}", which "${owner}" already uses` })
  }
  if (candidate.fields.length > maxFields) {
    issues.push({ path: 'fields', code: 'too_many_fields', message: `At most ${maxFields} fields are allowed` })
  }

  const seenNames = new Map<string, string>()
  const seenColumns = new Map<string, string>()
  candidate.fields.forEach((field, index) => {
    const path = `fields[${index}]`
    checkIdentifier(issues, `${path}.name`, field.name, MAX_FIELD_NAME_LENGTH, field.name)
    const column = columnName(field.name)
    if (isSystemColumn(column)) {
      issues.push({ path: `${path}.name`, code: 'reserved_name', message: `"${field.name}" collides with system column "${column}"`, field: field.name })
    }
    if (column.length > MAX_IDENTIFIER_LENGTH) {
      issues.push({ path: `${path}.name`, code: 'name_too_long', message: `Column "${column}" exceeds ${MAX_IDENTIFIER_LENGTH} characters`, field: field.name })
    }
    const key = nameKey(field.name)
    const sameName = seenNames.get(key)
    const sameColumn = seenColumns.get(column)
    if (sameName !== undefined) {
      issues.push({ path: `${path}.name`, code: 'duplicate_field', message: `"${field.name}" duplicates "${sameName}"`, field: field.name })
    } else if (sameColumn !== undefined) {
      issues.push({ path: `${path}.name`, code: 'column_collision', message: `"${field.name}" and "${sameColumn}" both map to column "${column}"`, field: field.name })
    }
    seenNames.set(key, field.name)
    seenColumns.set(column, field.name)
    if (checkKindSettings(issues, path, field, knownEntities)) checkDefault(issues, path, field)
  })

  if (previous) {
    const previousByColumn = new Map(previous.fields.map((field): [string, FieldDescriptor] => [columnName(field.name), field]))
    const candidateColumns = new Set<string>()
    candidate.fields.forEach((field, index) => {
      const path = `fields[${index}]`
      const column = columnName(field.name)
      candidateColumns.add(column)
      const before = previousByColumn.get(column)
      if (!before) {
        changes.push({ field: field.name, column, type: 'ADD', reasons: [] })
        if (!field.nullable && (field.defaultValue === undefined || field.defaultValue === null)) {
          issues.push({ path, code: 'missing_default', message: `New non-nullable field "${field.name}" needs a default value`, field: field.name })
        }
        return
      }
      if (before.name !== field.name) {
        issues.push({ path: `${path}.name`, code: 'case_only_rename', message: `"${before.name}" cannot be renamed to "${field.name}"`, field: field.name })
        return
      }
      const change = classifyFieldChange(before, field)
      if (!change) return
      changes.push(change)
      if (change.type === 'RETYPE' && !field.nullable && (field.defaultValue === undefined || field.defaultValue === null)) {
        issues.push({ path, code: 'missing_default', message: `Recreated non-nullable field "${field.name}" needs a default value`, field: field.name })
      }
    })
    for (const [column, field] of previousByColumn) {
      if (!candidateColumns.has(column)) changes.push({ field: field.name, column, type: 'REMOVE', reasons: [] })
    }
  }

  if (!options.allowDestructive) {
    for (const change of changes) {
      if (!isDestructive(change.type)) continue
      issues.push({
        path: 'fields',
        code: 'destructive_change_rejected',
        message: `${change.type === 'RETYPE' ? 'Type change' : 'Narrowing'} of "${change.field}" requires allowDestructive (${change.reasons.join('; ')})`,
        field: change.field,
      })
    }
  }

  if (issues.length) return { ok: false, issues, changes }
  return { ok: true, changes, fieldsChanged: changes.length > 0 }
}
