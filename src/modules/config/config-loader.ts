/**
 * Configuration loader — reads one layer of configuration into a SectionDict.
 *
 * A missing coafile is not an error: the layer is replaced by an empty
 * `default` section and a warning goes to the active log sink. Files that
 * exist but cannot be parsed fail the load.
 */

import { resolve } from 'path'
import type { Logger } from 'pino'
import { CoafileNotFoundError } from '../../core/errors.js'
import { createSectionDict, type SectionDict } from '../settings/section-dict.js'
import { readCoafile } from './coafile-parser.js'

export interface LoadConfigFileOptions {
  /** Skip the warning when the file does not exist */
  silent?: boolean
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string
}

/**
 * Load sections from a coafile.
 *
 * @param filePath - path to the coafile, resolved against `cwd`
 * @param log - sink for the missing-file warning
 * @throws {ConfigParseError} if the file exists but is malformed
 */
export async function loadConfigFile(
  filePath: string,
  log: Logger,
  options: LoadConfigFileOptions = {}
): Promise<SectionDict> {
  const absolute = resolve(options.cwd ?? process.cwd(), filePath)

  try {
    return await readCoafile(absolute)
  } catch (err) {
    if (!(err instanceof CoafileNotFoundError)) throw err

    if (options.silent !== true) {
      log.warn(
        { filePath: absolute },
        `The requested coafile '${absolute}' does not exist. Thus it will not be used.`
      )
    }
    return createSectionDict()
  }
}
