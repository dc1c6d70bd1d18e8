const TRUE_VALUES = new Set(['1', 'true', 'yes', 'y', 'on', 'enable', 'enabled'])
const FALSE_VALUES = new Set(['0', 'false', 'no', 'n', 'off', 'disable', 'disabled'])

export type EnvSource = Record<string, string | undefined>

export function parseBooleanToken(raw: string | null | undefined): boolean | null {
  if (typeof raw !== 'string') return null
  const normalized = raw.trim().toLowerCase()
  if (!normalized) return null
  if (TRUE_VALUES.has(normalized)) return true
  if (FALSE_VALUES.has(normalized)) return false
  return null
}

export function parseBooleanWithDefault(raw: string | null | undefined, fallback: boolean): boolean {
  const parsed = parseBooleanToken(raw)
  return parsed === null ? fallback : parsed
}

/**
 * Parses a strictly positive integer. Empty, non-numeric, fractional and
 * non-positive values yield `undefined` so callers can fall back to a default.
 */
export function parsePositiveInt(raw: string | null | undefined): number | undefined {
  if (raw === undefined || raw === null || raw.trim() === '') return undefined
  const parsed = Number(raw)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined
}

export function parseNumberWithDefault(raw: string | null | undefined, fallback: number): number {
  if (raw === undefined || raw === null || raw.trim() === '') return fallback
  const parsed = Number(raw)
  return Number.isFinite(parsed) ? parsed : fallback
}

export function parseEnumValue<T extends string>(
  name: string,
  raw: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  const value = raw?.trim()
  if (!value) return fallback
  const match = allowed.find((candidate) => candidate === value)
  if (!match) {
    throw new Error(`Invalid ${name} "${value}". Must be one of: ${allowed.join(', ')}`)
  }
  return match
}
