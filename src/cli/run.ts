/**
 * bearconf command — resolves every configuration layer and prints what
 * each section ended up with.
 *
 * Usage:
 *   bearconf                       # all sections
 *   bearconf python docs -L INFO   # only the named sections
 *   bearconf --save                # also write the result back to the coafile
 */

import yaml from 'js-yaml'
import { BearconfError, CliUsageError } from '../core/errors.js'
import type { BearDescriptor } from '../modules/bears/types.js'
import { createCliCommand, parseCliArgs } from '../modules/config/cli-parser.js'
import { releaseOutput } from '../modules/output/output-selector.js'
import { createSectionManager } from '../modules/section-manager/section-manager-impl.js'
import type {
  SectionManagerOptions,
  SectionManagerResult,
} from '../modules/section-manager/section-manager.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CLI_EXIT_SUCCESS = 0
export const CLI_EXIT_ERROR = 1
export const CLI_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export interface SectionSummary {
  settings: Record<string, string>
  local_bears: string[]
  global_bears: string[]
}

function bearNames(bears: readonly BearDescriptor[] | undefined): string[] {
  return (bears ?? []).map((bear) => bear.name)
}

/**
 * Build the printable summary of a run. With targets, only the sections
 * they name (and that exist) are included.
 */
export function summarizeRun(
  result: Pick<SectionManagerResult, 'sections' | 'localBears' | 'globalBears' | 'targets'>
): Record<string, SectionSummary> {
  const summary: Record<string, SectionSummary> = {}
  const selected =
    result.targets.length > 0
      ? result.targets.filter((target) => result.sections.has(target))
      : result.sections.names()

  for (const name of selected) {
    const section = result.sections.get(name)
    if (section === undefined) continue
    summary[section.name] = {
      settings: section.toRecord(),
      local_bears: bearNames(result.localBears.get(section.name)),
      global_bears: bearNames(result.globalBears.get(section.name)),
    }
  }
  return summary
}

// ---------------------------------------------------------------------------
// runCli
// ---------------------------------------------------------------------------

export interface RunCliOptions extends SectionManagerOptions {
  stdout?: NodeJS.WritableStream
  stderr?: NodeJS.WritableStream
}

/**
 * Run the bearconf command on `argv` (program name already removed).
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], options: RunCliOptions = {}): Promise<number> {
  const { stdout = process.stdout, stderr = process.stderr, ...managerOptions } = options

  try {
    if (parseCliArgs(argv).help) {
      stdout.write(createCliCommand().helpInformation())
      return CLI_EXIT_SUCCESS
    }
  } catch (err) {
    if (err instanceof CliUsageError) {
      stderr.write(`Error: ${err.message}\n`)
      return CLI_EXIT_INVALID
    }
    throw err
  }

  let result: SectionManagerResult
  try {
    result = await createSectionManager(managerOptions).run(argv)
  } catch (err) {
    if (err instanceof BearconfError) {
      stderr.write(`Error: ${err.message}\n`)
      return CLI_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Settings resolution failed')
    stderr.write(`Error: ${message}\n`)
    return CLI_EXIT_ERROR
  }

  try {
    stdout.write(yaml.dump(summarizeRun(result), { lineWidth: 120, sortKeys: false }))
  } finally {
    releaseOutput({ logSink: result.logSink, interactor: result.interactor })
  }
  return CLI_EXIT_SUCCESS
}
