import { z } from 'zod'
import { FIELD_KINDS } from '../lib/kinds'
import { FILTER_OPS, SortDir } from '../lib/query'

const defaultValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])

export const fieldConstraintsSchema = z
  .object({
    maxLength: z.number().int().positive().optional(),
    regex: z.string().min(1).max(500).optional(),
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
    precision: z.number().int().positive().optional(),
    scale: z.number().int().nonnegative().optional(),
  })
  .strict()

export const fieldDescriptorSchema = z
  .object({
    name: z.string().min(1).max(200),
    kind: z.enum(FIELD_KINDS),
    nullable: z.boolean().default(true),
    defaultValue: defaultValueSchema.nullable().optional(),
    constraints: fieldConstraintsSchema.optional(),
    options: z.array(z.string().min(1).max(255)).optional(),
    multi: z.boolean().optional(),
    target: z.string().min(1).max(200).optional(),
    label: z.string().max(200).optional(),
  })
  .strict()

export const descriptorSubmissionSchema = z
  .object({
    name: z.string().min(1).max(200),
    tenantScope: z.string().min(1).max(191).nullable().default(null),
    label: z.string().max(200).nullable().optional(),
    description: z.string().max(4000).nullable().optional(),
    fields: z.array(fieldDescriptorSchema),
    /** Version the change was made against; 0 when creating. Omit to take the latest. */
    baseVersion: z.number().int().nonnegative().optional(),
    allowDestructive: z.boolean().default(false),
  })
  .strict()

export type DescriptorSubmission = z.input<typeof descriptorSubmissionSchema>
export type ParsedDescriptorSubmission = z.output<typeof descriptorSubmissionSchema>

export const dropEntitySchema = z
  .object({
    name: z.string().min(1),
    tenantScope: z.string().min(1).nullable().default(null),
    force: z.boolean().default(false),
  })
  .strict()

const filterSchema = z.object({
  field: z.string().min(1),
  op: z.enum(FILTER_OPS),
  value: z.unknown().optional(),
})

export const recordQuerySchema = z.object({
  filters: z.union([z.array(filterSchema), z.record(z.unknown())]).optional(),
  sort: z.array(z.object({ field: z.string().min(1), dir: z.nativeEnum(SortDir).optional() })).optional(),
  page: z.coerce.number().int().positive().optional(),
  pageSize: z.coerce.number().int().positive().optional(),
  search: z.string().max(200).optional(),
})
