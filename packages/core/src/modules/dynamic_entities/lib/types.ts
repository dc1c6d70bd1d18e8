import type { FieldKind } from './kinds'

export type DefaultValue = string | number | boolean | string[]

export type FieldConstraints = {
  maxLength?: number
  regex?: string
  min?: number
  max?: number
  precision?: number
  scale?: number
}

export type FieldDescriptor = {
  name: string
  kind: FieldKind
  nullable: boolean
  defaultValue?: DefaultValue | null
  constraints?: FieldConstraints
  /** enum only */
  options?: string[]
  /** enum only: the field holds a set of options */
  multi?: boolean
  /** reference only: name of the referenced entity */
  target?: string
  label?: string
}

/** What callers submit; the store assigns identity and version. */
export type DescriptorDraft = {
  name: string
  tenantScope: string | null
  label?: string | null
  description?: string | null
  fields: FieldDescriptor[]
}

export type EntityDescriptor = {
  id: string
  name: string
  tenantScope: string | null
  label: string | null
  description: string | null
  fields: FieldDescriptor[]
  version: number
  tableName: string
  createdAt: Date
  updatedAt: Date
}

/** Snapshot of a descriptor as last applied to the physical schema. */
export type AppliedDescriptor = {
  name: string
  tenantScope: string | null
  tableName: string
  version: number
  fields: FieldDescriptor[]
}

export type EntityRef = {
  entity: string
  tenantScope?: string | null
  organizationId?: string | null
}

export function toAppliedDescriptor(descriptor: EntityDescriptor): AppliedDescriptor {
  return {
    name: descriptor.name,
    tenantScope: descriptor.tenantScope,
    tableName: descriptor.tableName,
    version: descriptor.version,
    fields: descriptor.fields.map((field) => ({ ...field })),
  }
}
