import { parseBooleanWithDefault, parseEnumValue, parseNumberWithDefault, parsePositiveInt } from '../env'

describe('env parsing', () => {
  test('booleans accept common tokens and fall back otherwise', () => {
    expect(parseBooleanWithDefault('yes', false)).toBe(true)
    expect(parseBooleanWithDefault(' OFF ', true)).toBe(false)
    expect(parseBooleanWithDefault('maybe', true)).toBe(true)
    expect(parseBooleanWithDefault(undefined, false)).toBe(false)
  })

  test('positive ints reject zero, fractions and garbage', () => {
    expect(parsePositiveInt('30000')).toBe(30000)
    expect(parsePositiveInt('0')).toBeUndefined()
    expect(parsePositiveInt('1.5')).toBeUndefined()
    expect(parsePositiveInt('abc')).toBeUndefined()
    expect(parsePositiveInt('')).toBeUndefined()
  })

  test('numbers fall back on non-finite input', () => {
    expect(parseNumberWithDefault('-5', 1)).toBe(-5)
    expect(parseNumberWithDefault('x', 7)).toBe(7)
  })

  test('enum values throw on unknown input', () => {
    expect(parseEnumValue('EVENTS_STRATEGY', undefined, ['local', 'redis'] as const, 'local')).toBe('local')
    expect(parseEnumValue('EVENTS_STRATEGY', 'redis', ['local', 'redis'] as const, 'local')).toBe('redis')
    expect(() => parseEnumValue('EVENTS_STRATEGY', 'kafka', ['local', 'redis'] as const, 'local')).toThrow(
      'Invalid EVENTS_STRATEGY "kafka". Must be one of: local, redis',
    )
  })
})
