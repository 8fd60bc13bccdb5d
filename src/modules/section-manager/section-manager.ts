/**
 * SectionManager interface — public contract of the settings pipeline.
 *
 * Create an instance via `createSectionManager()` from section-manager-impl.ts.
 */

import type pino from 'pino'
import type { BearDescriptor } from '../bears/types.js'
import type { RuntimePaths } from '../config/runtime-paths.js'
import type { Interactor } from '../output/interactor.js'
import type { LogSink } from '../output/log-sink.js'
import type { ResolvedSections } from '../settings/section-dict.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface SectionManagerOptions {
  /** Overrides for the shipped coafile, user coafile and bears root */
  paths?: Partial<RuntimePaths>
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string
  /** Stream console log sinks write to (default: stderr) */
  consoleStream?: pino.DestinationStream
  /** Streams of the console interactor (default: stdin/stdout) */
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

/**
 * Everything a run resolved. The caller owns `logSink` and `interactor` and
 * must release them (see `releaseOutput()`) when the run completes.
 */
export interface SectionManagerResult {
  sections: ResolvedSections
  /** Section name → LOCAL bears discovered for it */
  localBears: Map<string, readonly BearDescriptor[]>
  /** Section name → GLOBAL bears discovered for it */
  globalBears: Map<string, readonly BearDescriptor[]>
  /** Lower-cased section names requested on the command line */
  targets: string[]
  interactor: Interactor
  logSink: LogSink
}

// ---------------------------------------------------------------------------
// SectionManager interface
// ---------------------------------------------------------------------------

/**
 * Resolves configuration from all layers, lowest → highest priority:
 *   shipped default_coafile < user coafile < project coafile < CLI arguments
 * then discovers the bears of every section and fills the settings they
 * still require.
 */
export interface SectionManager {
  /**
   * Run the whole pipeline.
   * @param argv - CLI arguments without the program name (default: process.argv.slice(2))
   * @throws {ConfigParseError} if a coafile is malformed
   * @throws {CliUsageError} if the arguments are malformed
   */
  run(argv?: readonly string[]): Promise<SectionManagerResult>
}
