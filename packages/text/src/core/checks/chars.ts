const LEADING_WHITESPACE = /^\p{White_Space}+/u
const TRAILING_WHITESPACE = /\p{White_Space}+$/u
const ONLY_WHITESPACE = /^\p{White_Space}+$/u

export const hasLeadingWhitespace = (value: string): boolean =>
  LEADING_WHITESPACE.test(value)

export const hasTrailingWhitespace = (value: string): boolean =>
  TRAILING_WHITESPACE.test(value)

export const isOnlyWhitespace = (value: string): boolean => ONLY_WHITESPACE.test(value)

/**
 * Strip leading and trailing Unicode whitespace.
 *
 * Differs from `String.prototype.trim`, which also strips U+FEFF and keeps
 * U+0085.
 */
export function trimWhitespace(value: string): string {
  return value.replace(LEADING_WHITESPACE, "").replace(TRAILING_WHITESPACE, "")
}

const ESCAPES: Readonly<Record<string, string>> = {
  "\t": "\\t",
  "\r": "\\r",
  "\n": "\\n",
  "'": "\\'",
  '"': '\\"',
  "\\": "\\\\",
}

/**
 * Render a single character for an error message. Printable ASCII is kept,
 * common escapes use their backslash form, anything else becomes `\u{hex}`.
 */
export function escapeChar(char: string): string {
  const escaped = ESCAPES[char]
  if (escaped !== undefined) return escaped

  const code = char.codePointAt(0) ?? 0
  if (code >= 0x20 && code <= 0x7e) return char

  return `\\u{${code.toString(16)}}`
}
