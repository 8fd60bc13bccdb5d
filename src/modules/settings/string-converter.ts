/**
 * Conversions from raw setting text to typed values.
 */

const TRUE_WORDS: ReadonlySet<string> = new Set([
  '1',
  'true',
  'yes',
  'yeah',
  'yep',
  'yup',
  'y',
  'on',
  'sure',
  'definitely',
  'always',
  'ok',
])

const FALSE_WORDS: ReadonlySet<string> = new Set([
  '0',
  'false',
  'no',
  'nope',
  'nah',
  'n',
  'off',
  'never',
  'none',
])

/** Characters that separate entries of a list-valued setting */
export const LIST_DELIMITERS = /[,;]/

/**
 * Parse a boolean-like string.
 * @returns the boolean, or undefined when the text is outside the vocabulary
 */
export function parseBoolean(raw: string): boolean | undefined {
  const normalized = raw.trim().toLowerCase()
  if (TRUE_WORDS.has(normalized)) return true
  if (FALSE_WORDS.has(normalized)) return false
  return undefined
}

/**
 * Split a delimiter-separated string into trimmed, non-empty entries.
 */
export function splitList(raw: string): string[] {
  return raw
    .split(LIST_DELIMITERS)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '')
}

/**
 * Normalize a setting key or section name: trimmed and lower-cased.
 */
export function normalizeName(raw: string): string {
  return raw.trim().toLowerCase()
}
