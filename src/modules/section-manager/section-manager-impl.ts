/**
 * SectionManager implementation.
 *
 * Pipeline (strictly sequential):
 *   1. parse CLI arguments; select logging from them; capture targets
 *   2. load shipped, user and project coafiles
 *   3. merge shipped → user → project → CLI, then wire defaults links
 *   4. re-select logging from the merged `default` section
 *   5. per section: discover LOCAL and GLOBAL bears, fill missing settings
 *   6. save the sections if `save` asks for it
 *   7. warn about targets that name no section
 */

import { resolve } from 'path'
import type { Logger } from 'pino'
import { ConfigError } from '../../core/errors.js'
import { collectBears } from '../bears/bear-collector.js'
import type { BearDescriptor } from '../bears/types.js'
import { extractTargets, parseCliArgs } from '../config/cli-parser.js'
import { writeCoafile } from '../config/coafile-writer.js'
import { loadConfigFile } from '../config/config-loader.js'
import {
  DEFAULT_PROJECT_COAFILE,
  resolveRuntimePaths,
  type RuntimePaths,
} from '../config/runtime-paths.js'
import {
  outputSignature,
  releaseOutput,
  selectOutput,
  type OutputSelection,
  type OutputSelectorOptions,
} from '../output/output-selector.js'
import { fillSection } from '../section-filler/section-filler.js'
import type { Section } from '../settings/section.js'
import {
  getDefaultSection,
  mergeSectionDicts,
  resolveSections,
  type ResolvedSections,
} from '../settings/section-dict.js'
import { parseBoolean } from '../settings/string-converter.js'
import { createLogger } from '../../utils/logger.js'
import type {
  SectionManager,
  SectionManagerOptions,
  SectionManagerResult,
} from './section-manager.js'

const logger = createLogger('section-manager')

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

/**
 * Write `sections` back if the `default` section's `save` setting asks for
 * it. A boolean-like `save` writes to the `config` path (default
 * `.coafile`); any other text is taken as the output path itself.
 *
 * @returns the absolute path written, or null when nothing was saved
 * @throws {ConfigError} if the path to save to is empty
 */
export async function saveSections(
  sections: ResolvedSections,
  cwd: string = process.cwd()
): Promise<string | null> {
  const defaults = sections.default
  const save = defaults.get('save', 'false')
  const wantsSave = parseBoolean(save.value)

  if (wantsSave === false) return null

  const target =
    wantsSave === true
      ? defaults.get('config', DEFAULT_PROJECT_COAFILE).asString()
      : save.asString()
  if (target === '') {
    const key = wantsSave === true ? 'config' : 'save'
    throw new ConfigError(`Setting "${key}" is empty, so there is no file to save to`, { key })
  }

  const filePath = resolve(cwd, target)
  await writeCoafile(filePath, sections)
  return filePath
}

// ---------------------------------------------------------------------------
// Target validation
// ---------------------------------------------------------------------------

/**
 * Warn once for every target that names no section.
 */
export function warnNonexistentTargets(
  targets: readonly string[],
  sections: ResolvedSections,
  log: Logger
): void {
  for (const target of targets) {
    if (!sections.has(target)) {
      log.warn(
        { section: target },
        `The requested section '${target}' is not existent. Thus it cannot be executed.`
      )
    }
  }
}

// ---------------------------------------------------------------------------
// SectionManagerImpl
// ---------------------------------------------------------------------------

interface LoadedConfiguration {
  sections: ResolvedSections
  targets: string[]
}

interface CollectedBears {
  localBears: Map<string, readonly BearDescriptor[]>
  globalBears: Map<string, readonly BearDescriptor[]>
}

export class SectionManagerImpl implements SectionManager {
  private readonly _paths: RuntimePaths
  private readonly _cwd: string
  private readonly _outputOptions: OutputSelectorOptions
  private _output: OutputSelection | null = null
  private _outputSignature: string | null = null

  constructor(options: SectionManagerOptions = {}) {
    this._paths = resolveRuntimePaths(options.paths)
    this._cwd = resolve(options.cwd ?? process.cwd())
    this._outputOptions = {
      consoleStream: options.consoleStream,
      input: options.input,
      output: options.output,
      cwd: this._cwd,
      failedLogTypes: new Set<string>(),
    }
  }

  async run(argv: readonly string[] = process.argv.slice(2)): Promise<SectionManagerResult> {
    this._outputOptions.failedLogTypes?.clear()
    try {
      const { sections, targets } = await this._loadConfiguration(argv)
      this._retrieveLoggingObjects(sections.default)
      const { localBears, globalBears } = await this._fillSettings(sections)

      const savedTo = await saveSections(sections, this._cwd)
      if (savedTo !== null) logger.debug({ savedTo }, 'Sections saved')

      const output = this._currentOutput()
      warnNonexistentTargets(targets, sections, output.logSink.logger)

      // Ownership of the sink and interactor passes to the caller.
      this._output = null
      this._outputSignature = null
      return {
        sections,
        localBears,
        globalBears,
        targets,
        interactor: output.interactor,
        logSink: output.logSink,
      }
    } catch (err) {
      if (this._output !== null) {
        releaseOutput(this._output)
        this._output = null
        this._outputSignature = null
      }
      throw err
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadConfiguration(argv: readonly string[]): Promise<LoadedConfiguration> {
    const cliSections = parseCliArgs(argv).sections
    const cliDefaults = getDefaultSection(cliSections)
    this._retrieveLoggingObjects(cliDefaults)
    const targets = extractTargets(cliSections)

    const log = this._currentOutput().logSink.logger
    const loadOptions = { cwd: this._cwd }

    const systemSections = await loadConfigFile(this._paths.systemCoafile, log, loadOptions)
    const userSections = await loadConfigFile(this._paths.userCoafile, log, {
      ...loadOptions,
      silent: true,
    })

    const systemConfig = getDefaultSection(systemSections).get('config', DEFAULT_PROJECT_COAFILE)
    const userConfig = getDefaultSection(userSections).get('config') ?? systemConfig
    const config = cliDefaults.get('config') ?? userConfig
    const projectSections = await loadConfigFile(config.asString(), log, loadOptions)

    let merged = mergeSectionDicts(systemSections, userSections)
    merged = mergeSectionDicts(merged, projectSections)
    merged = mergeSectionDicts(merged, cliSections)

    return { sections: resolveSections(merged), targets }
  }

  /**
   * Replace the current sink and interactor with the ones `section`
   * describes, releasing the previous pair first. Nothing is replaced when
   * the output settings are unchanged.
   */
  private _retrieveLoggingObjects(section: Section): void {
    const signature = outputSignature(section)
    if (this._output !== null && signature === this._outputSignature) return

    if (this._output !== null) {
      releaseOutput(this._output)
      this._output = null
    }
    this._output = selectOutput(section, this._outputOptions)
    this._outputSignature = signature
  }

  private _currentOutput(): OutputSelection {
    if (this._output === null) {
      throw new ConfigError('Output has not been selected. Parse the CLI arguments first.', {})
    }
    return this._output
  }

  private async _fillSettings(sections: ResolvedSections): Promise<CollectedBears> {
    const localBears = new Map<string, readonly BearDescriptor[]>()
    const globalBears = new Map<string, readonly BearDescriptor[]>()
    const { logSink, interactor } = this._currentOutput()

    for (const section of sections) {
      const bearDirs = [
        ...section.get('bear_dirs', '').asPathList(this._cwd),
        this._paths.bearsRoot,
      ]
      const bearNames = section.get('bears', '').asList()

      const local = await collectBears(bearDirs, bearNames, ['LOCAL'], logSink.logger)
      const global = await collectBears(bearDirs, bearNames, ['GLOBAL'], logSink.logger)
      await fillSection(section, [...local, ...global], interactor)

      localBears.set(section.name, local)
      globalBears.set(section.name, global)
    }

    return { localBears, globalBears }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new SectionManager instance.
 *
 * @example
 * const manager = createSectionManager()
 * const { sections, localBears, logSink, interactor } = await manager.run()
 * // ... run the bears ...
 * releaseOutput({ logSink, interactor })
 */
export function createSectionManager(options: SectionManagerOptions = {}): SectionManager {
  return new SectionManagerImpl(options)
}
