const TRUE_LITERALS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True'])
const FALSE_LITERALS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False'])

/**
 * Parse a boolean literal as stored in the key-value store or returned by the
 * spam classifier. Returns null for anything that is not a literal.
 */
export function parseBoolLiteral(value: string): boolean | null {
  if (TRUE_LITERALS.has(value)) return true
  if (FALSE_LITERALS.has(value)) return false
  return null
}
