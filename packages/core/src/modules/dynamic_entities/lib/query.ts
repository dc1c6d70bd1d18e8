import { ValidationError } from './errors'

export const FILTER_OPS = ['eq', 'ne', 'gt', 'gte', 'lt', 'lte', 'in', 'nin', 'like', 'ilike', 'exists'] as const

export type FilterOp = (typeof FILTER_OPS)[number]

export enum SortDir {
  Asc = 'asc',
  Desc = 'desc',
}

/** Field name of the entity, or one of `id`, `organizationId`, `createdAt`, `updatedAt`. */
export type FieldSelector = string

export type Filter = {
  field: FieldSelector
  op: FilterOp
  value?: unknown
}

export type Sort = { field: FieldSelector; dir?: SortDir }

// Mongo-style: a field maps to a direct value (equals) or to `{ $gt: 1, $in: [...] }`
export type Where = Record<FieldSelector, unknown>

export type RecordQuery = {
  // Accept classic array syntax or Mongo-style object syntax
  filters?: Filter[] | Where
  sort?: Sort[]
  page?: number
  pageSize?: number
  /** Case-insensitive substring match over text and enum values */
  search?: string
}

export type QueryResult<T> = {
  items: T[]
  page: number
  pageSize: number
  total: number
}

export const MAX_PAGE_SIZE = 100
export const DEFAULT_PAGE_SIZE = 50

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

function isFilterOp(value: string): value is FilterOp {
  return FILTER_OPS.some((op) => op === value)
}

/** Flattens either filter syntax into a list of `{ field, op, value }`. */
export function normalizeFilters(filters: Filter[] | Where | undefined): Filter[] {
  if (!filters) return []
  if (Array.isArray(filters)) return filters
  const out: Filter[] = []
  for (const [field, condition] of Object.entries(filters)) {
    if (!isPlainObject(condition)) {
      out.push({ field, op: condition === null ? 'exists' : 'eq', value: condition === null ? false : condition })
      continue
    }
    for (const [key, value] of Object.entries(condition)) {
      const op = key.startsWith('$') ? key.slice(1) : key
      if (!isFilterOp(op)) {
        throw new ValidationError([
          { path: `filters.${field}`, code: 'invalid_value', message: `Unsupported filter operator "${key}"`, field },
        ])
      }
      out.push({ field, op, value })
    }
  }
  return out
}

export function normalizePaging(query: Pick<RecordQuery, 'page' | 'pageSize'>): { page: number; pageSize: number } {
  const page = Number.isInteger(query.page) && (query.page ?? 0) > 0 ? query.page ?? 1 : 1
  const requested = Number.isInteger(query.pageSize) && (query.pageSize ?? 0) > 0 ? query.pageSize ?? DEFAULT_PAGE_SIZE : DEFAULT_PAGE_SIZE
  return { page, pageSize: Math.min(requested, MAX_PAGE_SIZE) }
}
