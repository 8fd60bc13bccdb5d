/**
 * Coafile writer — serializes sections back to coafile text.
 *
 * Only settings held by a section itself are written; values that exist
 * only through the defaults link or a lookup fallback are not persisted.
 * `\` and `#` are escaped wherever they appear. Text the parser cannot read
 * back (line breaks anywhere, `,` or `=` in a key) is refused.
 */

import { mkdir, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { ConfigError } from '../../core/errors.js'
import type { Section } from '../settings/section.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('coafile-writer')

const LINE_BREAK = /[\r\n]/

function escapeText(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/#/g, '\\#')
}

// ---------------------------------------------------------------------------
// Writability checks
// ---------------------------------------------------------------------------

/**
 * @returns why `name` cannot be written as a section header, or undefined
 */
export function unwritableSectionName(name: string): string | undefined {
  if (name.trim() === '') return 'section names must not be empty'
  if (LINE_BREAK.test(name)) return 'section names must not contain line breaks'
  return undefined
}

/**
 * @returns why `key` cannot be written as a setting key, or undefined
 */
export function unwritableKey(key: string): string | undefined {
  if (key.trim() === '') return 'setting keys must not be empty'
  if (LINE_BREAK.test(key)) return 'setting keys must not contain line breaks'
  if (/[,=]/.test(key)) return 'setting keys must not contain "," or "="'
  if (key.trim().startsWith('[')) return 'setting keys must not start with "["'
  return undefined
}

/**
 * @returns why `value` cannot be written as a setting value, or undefined
 */
export function unwritableValue(value: string): string | undefined {
  if (LINE_BREAK.test(value)) return 'setting values must not contain line breaks'
  return undefined
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

/**
 * Render sections in iteration order, one `[name]` block each.
 * @throws {ConfigError} if a section name, key or value cannot be read back
 */
export function serializeSections(sections: Iterable<Section>): string {
  const blocks: string[] = []
  for (const section of sections) {
    const nameProblem = unwritableSectionName(section.name)
    if (nameProblem !== undefined) {
      throw new ConfigError(`Cannot write section "${section.name}": ${nameProblem}`, {
        section: section.name,
      })
    }

    const lines = [`[${escapeText(section.name)}]`]
    for (const setting of section) {
      if (!setting.explicit) continue
      const problem = unwritableKey(setting.key) ?? unwritableValue(setting.value)
      if (problem !== undefined) {
        throw new ConfigError(`Cannot write setting "${setting.key}": ${problem}`, {
          section: section.name,
          key: setting.key,
        })
      }
      lines.push(`${escapeText(setting.key)} = ${escapeText(setting.value.trim())}`)
    }
    blocks.push(lines.join('\n'))
  }
  return blocks.join('\n\n') + '\n'
}

/**
 * Write sections to `filePath`, creating parent directories as needed.
 * Nothing is written when the sections cannot be serialized.
 */
export async function writeCoafile(filePath: string, sections: Iterable<Section>): Promise<void> {
  const text = serializeSections(sections)
  await mkdir(dirname(filePath), { recursive: true })
  await writeFile(filePath, text, 'utf-8')
  logger.debug({ filePath }, 'Coafile written')
}
