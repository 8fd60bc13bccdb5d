/**
 * CLI parser — turns an argument list into the highest-priority
 * configuration layer.
 *
 * Known options map onto settings of the `default` section. Unknown flags
 * are not rejected: `--name=value` becomes setting `name`, and a bare
 * `--name` becomes `name = true`. `-S section.key=value` targets any
 * section.
 */

import { Command, CommanderError, Option } from 'commander'
import { CliUsageError } from '../../core/errors.js'
import { DEFAULT_SECTION_NAME, Section } from '../settings/section.js'
import { createSectionDict, getDefaultSection, type SectionDict } from '../settings/section-dict.js'
import { CLI_ORIGIN } from '../settings/setting.js'
import { normalizeName } from '../settings/string-converter.js'
import { unwritableKey, unwritableSectionName, unwritableValue } from './coafile-writer.js'

// ---------------------------------------------------------------------------
// Option table
// ---------------------------------------------------------------------------

interface CliSettingOption {
  flags: string
  description: string
  /** Setting key the option is stored under */
  key: string
}

export const CLI_SETTING_OPTIONS: readonly CliSettingOption[] = [
  {
    flags: '-c, --config <file>',
    description: 'project coafile to load (default: .coafile)',
    key: 'config',
  },
  {
    flags: '-s, --save [file]',
    description: 'write the resolved configuration back, optionally to <file>',
    key: 'save',
  },
  {
    flags: '-d, --bear-dirs <dirs...>',
    description: 'additional directories (or globs) to search for bears',
    key: 'bear_dirs',
  },
  {
    flags: '-b, --bears <names...>',
    description: 'names of the bears to use (default: all)',
    key: 'bears',
  },
  {
    flags: '-l, --log-type <type>',
    description: 'log sink: console, none, or a file path',
    key: 'log_type',
  },
  {
    flags: '-L, --log-level <level>',
    description: 'DEBUG, INFO, WARNING or ERROR',
    key: 'log_level',
  },
  {
    flags: '-o, --output <type>',
    description: 'interaction channel: console or none',
    key: 'output',
  },
]

/** Setting under which positional targets are stored before extraction */
export const TARGETS_KEY = 'targets'

export interface CliParseResult {
  sections: SectionDict
  /** True when -h/--help was given */
  help: boolean
}

// ---------------------------------------------------------------------------
// Command definition
// ---------------------------------------------------------------------------

/**
 * Build the commander definition of the settings CLI. Also used to render
 * help text.
 */
export function createCliCommand(): Command {
  const command = new Command('bearconf')
    .description('Resolve layered coafile settings and discover the bears of each section')
    .argument('[targets...]', 'sections to run (default: all)')
    .helpOption(false)
    .option('-h, --help', 'display help for command')
    .option(
      '-S, --settings <entries...>',
      'arbitrary settings as [section.]key=value'
    )
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()
    .configureOutput({
      outputError: () => undefined,
    })

  for (const spec of CLI_SETTING_OPTIONS) {
    command.addOption(new Option(spec.flags, spec.description))
  }

  return command
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toSettingValue(value: unknown): string | undefined {
  if (value === undefined || value === false) return undefined
  if (value === true) return 'true'
  if (Array.isArray(value)) return value.map(String).join(',')
  return String(value)
}

function sectionFor(sections: SectionDict, name: string): Section {
  const normalized = normalizeName(name)
  const existing = sections.get(normalized)
  if (existing !== undefined) return existing
  const created = new Section(normalized)
  sections.set(normalized, created)
  return created
}

/**
 * Parse an unknown `--name[=value]` flag into a key and value.
 */
function parseUnknownFlag(flag: string): [string, string] {
  const body = flag.replace(/^-+/, '')
  const eq = body.indexOf('=')
  const rawName = eq === -1 ? body : body.slice(0, eq)
  const value = eq === -1 ? 'true' : body.slice(eq + 1)
  const key = normalizeName(rawName).replace(/-/g, '_')
  if (key === '') {
    throw new CliUsageError(`Cannot read a setting name from "${flag}"`, { flag })
  }
  return [key, value]
}

/**
 * Parse one `[section.]key=value` entry of --settings.
 */
function parseSettingEntry(entry: string): { section: string; key: string; value: string } {
  const eq = entry.indexOf('=')
  if (eq === -1) {
    throw new CliUsageError(`Setting "${entry}" must have the form [section.]key=value`, { entry })
  }
  const target = entry.slice(0, eq)
  const dot = target.indexOf('.')
  const section = dot === -1 ? DEFAULT_SECTION_NAME : target.slice(0, dot)
  const key = dot === -1 ? target : target.slice(dot + 1)
  if (normalizeName(section) === '' || normalizeName(key) === '') {
    throw new CliUsageError(`Setting "${entry}" has an empty section or key`, { entry })
  }
  return { section, key, value: entry.slice(eq + 1).trim() }
}

/**
 * Every CLI setting may end up in a saved coafile, so settings the coafile
 * syntax cannot hold are refused here rather than when the file is reread.
 */
function assertWritable(sections: SectionDict): void {
  for (const section of sections.values()) {
    const nameProblem = unwritableSectionName(section.name)
    if (nameProblem !== undefined) {
      throw new CliUsageError(`Invalid section "${section.name}": ${nameProblem}`, {
        section: section.name,
      })
    }
    for (const setting of section) {
      const problem = unwritableKey(setting.key) ?? unwritableValue(setting.value)
      if (problem !== undefined) {
        throw new CliUsageError(`Invalid setting "${setting.key}": ${problem}`, {
          section: section.name,
          key: setting.key,
        })
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse `argv` (program name already removed) into a SectionDict whose
 * settings all have the `cli` origin.
 *
 * @throws {CliUsageError} on malformed arguments, or settings a coafile
 *   cannot hold
 */
export function parseCliArgs(argv: readonly string[]): CliParseResult {
  const command = createCliCommand()
  const sections = createSectionDict()
  const defaults = getDefaultSection(sections)
  const operands: string[] = []
  const extras: Array<[string, string]> = []

  // commander stops at the first unknown flag and hands back everything
  // after it, so parsing resumes past each unknown flag.
  let pending = [...argv]
  try {
    while (pending.length > 0) {
      const { operands: found, unknown } = command.parseOptions(pending)
      operands.push(...found)
      const [flag, ...rest] = unknown
      if (flag === undefined) break
      extras.push(parseUnknownFlag(flag))
      pending = rest
    }
  } catch (err) {
    if (err instanceof CommanderError) {
      throw new CliUsageError(err.message, { code: err.code })
    }
    throw err
  }

  const opts = command.opts<Record<string, unknown>>()

  if (operands.length > 0) {
    defaults.set(TARGETS_KEY, operands.join(','), CLI_ORIGIN)
  }

  for (const spec of CLI_SETTING_OPTIONS) {
    const attribute = new Option(spec.flags).attributeName()
    const value = toSettingValue(opts[attribute])
    if (value !== undefined) {
      defaults.set(spec.key, value, CLI_ORIGIN)
    }
  }

  const entries = opts['settings']
  if (Array.isArray(entries)) {
    for (const entry of entries) {
      const parsed = parseSettingEntry(String(entry))
      sectionFor(sections, parsed.section).set(parsed.key, parsed.value, CLI_ORIGIN)
    }
  }

  for (const [key, value] of extras) {
    defaults.set(key, value, CLI_ORIGIN)
  }

  assertWritable(sections)
  return { sections, help: opts['help'] === true }
}

/**
 * Remove the `targets` setting from the `default` section and return its
 * entries lower-cased. Targets select sections for a run; they are never
 * persisted.
 */
export function extractTargets(sections: SectionDict): string[] {
  const removed = getDefaultSection(sections).delete(TARGETS_KEY)
  if (removed === undefined) return []
  return removed.asList().map((target) => target.toLowerCase())
}
