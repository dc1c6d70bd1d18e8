import { z } from 'zod'
import type { FieldDescriptor } from './types'

function enumTuple(options: string[] | undefined): [string, ...string[]] {
  const [first, ...rest] = options ?? []
  if (first === undefined) throw new Error('enum field requires at least one option')
  return [first, ...rest]
}

function withBounds(schema: z.ZodNumber, field: FieldDescriptor): z.ZodNumber {
  let bounded = schema
  if (field.constraints?.min !== undefined) bounded = bounded.min(field.constraints.min)
  if (field.constraints?.max !== undefined) bounded = bounded.max(field.constraints.max)
  return bounded
}

const isoDateTime = z.string().datetime({ offset: true })
const isoDate = z.string().date()

/** A Date, or an ISO 8601 date or date-time string. */
const timestampSchema = z
  .union([z.date(), z.string()], { errorMap: () => ({ message: 'Expected a date or a date string' }) })
  .transform((value, ctx) => {
    if (value instanceof Date) return value
    if (!isoDateTime.safeParse(value).success && !isoDate.safeParse(value).success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected an ISO 8601 date or date-time' })
      return z.NEVER
    }
    return new Date(value)
  })

/** Non-null value schema for one field, honoring its constraints. */
export function buildValueSchema(field: FieldDescriptor): z.ZodTypeAny {
  switch (field.kind) {
    case 'text': {
      let schema = z.string()
      if (field.constraints?.maxLength !== undefined) schema = schema.max(field.constraints.maxLength)
      if (field.constraints?.regex !== undefined) schema = schema.regex(new RegExp(field.constraints.regex))
      return schema
    }
    case 'long':
      return withBounds(z.number().int().safe(), field)
    case 'decimal': {
      const scale = field.constraints?.scale
      const precision = field.constraints?.precision
      let schema: z.ZodType<number> = withBounds(z.number().finite(), field)
      if (scale !== undefined) {
        schema = schema.refine(
          (value) => Number(value.toFixed(scale)) === value,
          { message: `At most ${scale} decimal places allowed` },
        )
      }
      if (precision !== undefined) {
        const digits = precision - (scale ?? 0)
        schema = schema.refine(
          (value) => Math.abs(value) < 10 ** digits,
          { message: `At most ${digits} integer digits allowed` },
        )
      }
      return schema
    }
    case 'boolean':
      return z.boolean()
    case 'timestamp':
      return timestampSchema
    case 'enum': {
      const values = z.enum(enumTuple(field.options))
      return field.multi ? z.array(values) : values
    }
    case 'reference':
      return z.string().uuid()
  }
}

/** Value schema including null when the field is nullable. */
export function buildFieldSchema(field: FieldDescriptor): z.ZodTypeAny {
  const schema = buildValueSchema(field)
  return field.nullable ? schema.nullable() : schema
}
