export const FIELD_KINDS = [
  'text',
  'long',
  'decimal',
  'boolean',
  'timestamp',
  'enum',
  'reference',
] as const

export type FieldKind = (typeof FIELD_KINDS)[number]

/** Value shape a record carries for each kind. */
export type FieldValueByKind = {
  text: string
  long: number
  decimal: number
  boolean: boolean
  timestamp: Date
  enum: string | string[]
  reference: string
}

export type FieldValue = FieldValueByKind[FieldKind]

/** Kinds whose values feed the free-text search column. */
export const SEARCHABLE_KINDS: ReadonlySet<FieldKind> = new Set<FieldKind>(['text', 'enum'])

export const CONSTRAINTS_BY_KIND: Record<FieldKind, ReadonlyArray<'maxLength' | 'regex' | 'min' | 'max' | 'precision' | 'scale'>> = {
  text: ['maxLength', 'regex'],
  long: ['min', 'max'],
  decimal: ['min', 'max', 'precision', 'scale'],
  boolean: [],
  timestamp: [],
  enum: [],
  reference: [],
}
