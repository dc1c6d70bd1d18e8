/** Escapes `%`, `_` and the escape character itself for use with `LIKE ... ESCAPE '\'`. */
export const escapeLikePattern = (value: string): string =>
  value.replace(/\\/g, '\\\\').replace(/[%_]/g, '\\$&')

export const containsPattern = (value: string): string => `%${escapeLikePattern(value)}%`
