// =============================================================================
// Traversal Translator - Literal Helpers
// Shared by the bundled dialects
// =============================================================================

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name)
}

/**
 * Quote a string for C-family escape syntax. Backslashes, the quote character
 * and control characters are escaped; everything else is kept as-is.
 */
export function quoteString(value: string, quote: '"' | "'"): string {
  let escaped = ''
  for (const char of value) {
    escaped += escapeChar(char, quote)
  }
  return `${quote}${escaped}${quote}`
}

function escapeChar(char: string, quote: string): string {
  switch (char) {
    case '\\': return '\\\\'
    case '\n': return '\\n'
    case '\r': return '\\r'
    case '\t': return '\\t'
    case '\b': return '\\b'
    case '\f': return '\\f'
  }
  if (char === quote) return `\\${quote}`

  const code = char.codePointAt(0) ?? 0
  if (code < 0x20 || code === 0x7f) {
    return `\\u${code.toString(16).padStart(4, '0')}`
  }
  return char
}

/** camelCase to snake_case; all-caps names such as `V` or `OUT` are left alone */
export function toSnakeCase(name: string): string {
  if (/^[A-Z]+$/.test(name)) return name
  return name.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase()
}
