import type { SqlDialect } from './dialect'
import type { FieldKind, FieldValue } from './kinds'

export type DbValue = string | number | boolean | Date | null

export type ColumnCodec = {
  encode(value: unknown): DbValue
  decode(raw: unknown): FieldValue | null
}

export class CodecError extends Error {
  constructor(readonly kind: FieldKind, readonly value: unknown) {
    super(`Cannot store ${typeof value} value in a ${kind} column`)
    this.name = 'CodecError'
  }
}

export function toDate(raw: unknown): Date | null {
  if (raw === null || raw === undefined) return null
  if (raw instanceof Date) return raw
  if (typeof raw === 'number') return new Date(raw)
  if (typeof raw === 'string') {
    if (/^\d+$/.test(raw)) return new Date(Number(raw))
    return new Date(raw)
  }
  return null
}

function toNumber(raw: unknown): number | null {
  if (raw === null || raw === undefined) return null
  if (typeof raw === 'number') return raw
  if (typeof raw === 'bigint' || typeof raw === 'string') {
    const parsed = Number(raw)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

function toBoolean(raw: unknown): boolean | null {
  if (raw === null || raw === undefined) return null
  if (typeof raw === 'boolean') return raw
  if (typeof raw === 'number') return raw !== 0
  if (typeof raw === 'string') return raw === '1' || raw === 't' || raw === 'true'
  return null
}

/** Parses JSON stored in a text column; drivers that decode json columns hand back objects already. */
export function parseJsonColumn(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw ?? null
  try {
    return JSON.parse(raw)
  } catch {
    return null
  }
}

function decodeOptionSet(raw: unknown): string[] | null {
  if (raw === null || raw === undefined) return null
  const parsed = typeof raw === 'string' && raw.startsWith('[') ? parseJsonColumn(raw) : raw
  if (Array.isArray(parsed)) return parsed.filter((item): item is string => typeof item === 'string')
  if (typeof parsed === 'string') return [parsed]
  return null
}

function encodeDate(value: Date, dialect: SqlDialect): DbValue {
  return dialect === 'sqlite' ? value.getTime() : value
}

/**
 * Encode/decode pair for one column. SQLite keeps booleans as 0/1 and
 * timestamps as epoch milliseconds; PostgreSQL takes both natively but
 * returns bigint and numeric as strings.
 */
export function codecFor(kind: FieldKind, multi: boolean, dialect: SqlDialect): ColumnCodec {
  switch (kind) {
    case 'text':
    case 'reference':
      return {
        encode(value) {
          if (value === null || value === undefined) return null
          if (typeof value !== 'string') throw new CodecError(kind, value)
          return value
        },
        decode: (raw) => (raw === null || raw === undefined ? null : String(raw)),
      }
    case 'long':
    case 'decimal':
      return {
        encode(value) {
          if (value === null || value === undefined) return null
          if (typeof value !== 'number' || !Number.isFinite(value)) throw new CodecError(kind, value)
          return value
        },
        decode: toNumber,
      }
    case 'boolean':
      return {
        encode(value) {
          if (value === null || value === undefined) return null
          if (typeof value !== 'boolean') throw new CodecError(kind, value)
          return dialect === 'sqlite' ? (value ? 1 : 0) : value
        },
        decode: toBoolean,
      }
    case 'timestamp':
      return {
        encode(value) {
          if (value === null || value === undefined) return null
          const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null
          if (!date || Number.isNaN(date.getTime())) throw new CodecError(kind, value)
          return encodeDate(date, dialect)
        },
        decode: toDate,
      }
    case 'enum':
      if (!multi) {
        return {
          encode(value) {
            if (value === null || value === undefined) return null
            if (typeof value !== 'string') throw new CodecError(kind, value)
            return value
          },
          decode: (raw) => (raw === null || raw === undefined ? null : String(raw)),
        }
      }
      return {
        encode(value) {
          if (value === null || value === undefined) return null
          if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
            throw new CodecError(kind, value)
          }
          return JSON.stringify(value)
        },
        decode: decodeOptionSet,
      }
  }
}

/** Codec for the created_at / updated_at system columns. */
export function timestampCodec(dialect: SqlDialect): ColumnCodec {
  return codecFor('timestamp', false, dialect)
}
