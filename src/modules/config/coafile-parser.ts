/**
 * Coafile parser — reads section-delimited `key = value` text into a
 * SectionDict.
 *
 * Syntax:
 *   [section]          starts a section (lines before any header go to `default`)
 *   key = value        assigns a setting
 *   a, b = value       assigns the same value to several keys
 *   # comment          comments run to end of line; `\#` is a literal hash
 */

import { readFile } from 'fs/promises'
import { CoafileNotFoundError, ConfigError, ConfigParseError } from '../../core/errors.js'
import { Section } from '../settings/section.js'
import { createSectionDict, getDefaultSection, type SectionDict } from '../settings/section-dict.js'
import { fileOrigin } from '../settings/setting.js'
import { normalizeName } from '../settings/string-converter.js'

/**
 * Drop the comment part of a line and resolve `\#` and `\\` escapes.
 * Other backslash sequences are kept as written.
 */
function stripComment(line: string): string {
  let out = ''
  for (let i = 0; i < line.length; i++) {
    const char = line[i]
    if (char === '\\') {
      const next = line[i + 1]
      if (next === '#' || next === '\\') {
        out += next
        i++
        continue
      }
      out += char
      continue
    }
    if (char === '#') break
    out += char
  }
  return out
}

/**
 * Parse coafile text. Settings carry `filePath` as their origin.
 * @throws {ConfigParseError} on malformed lines
 */
export function parseCoafile(text: string, filePath: string): SectionDict {
  const origin = fileOrigin(filePath)
  const sections = createSectionDict()
  let current = getDefaultSection(sections)

  // A leading byte order mark is not part of the first line.
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/)
  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1
    const line = stripComment(rawLine).trim()
    if (line === '') return

    if (line.startsWith('[')) {
      if (!line.endsWith(']')) {
        throw new ConfigParseError('Unterminated section header', filePath, lineNumber)
      }
      const name = normalizeName(line.slice(1, -1))
      if (name === '') {
        throw new ConfigParseError('Empty section name', filePath, lineNumber)
      }
      const existing = sections.get(name)
      if (existing !== undefined) {
        current = existing
      } else {
        current = new Section(name)
        sections.set(name, current)
      }
      return
    }

    const eq = line.indexOf('=')
    if (eq === -1) {
      throw new ConfigParseError(`Expected "key = value", got "${line}"`, filePath, lineNumber)
    }

    const keys = line.slice(0, eq).split(',').map(normalizeName)
    if (keys.some((key) => key === '')) {
      throw new ConfigParseError('Empty setting key', filePath, lineNumber)
    }
    const value = line.slice(eq + 1).trim()
    for (const key of keys) {
      current.set(key, value, origin)
    }
  })

  return sections
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

/**
 * Read and parse a coafile from disk.
 * @throws {CoafileNotFoundError} if nothing exists at `filePath`
 * @throws {ConfigParseError} on malformed content
 * @throws {ConfigError} if the file exists but cannot be read
 */
export async function readCoafile(filePath: string): Promise<SectionDict> {
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      throw new CoafileNotFoundError(filePath)
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Failed to read coafile at ${filePath}: ${message}`, { filePath })
  }
  return parseCoafile(text, filePath)
}
