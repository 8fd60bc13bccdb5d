/**
 * Output selection — picks the log sink and interaction channel described
 * by a section's `log_type`, `log_level` and `output` settings.
 */

import type pino from 'pino'
import type { Section } from '../settings/section.js'
import { isCloseable } from './closeable.js'
import { ConsoleInteractor, NullInteractor, type Interactor } from './interactor.js'
import {
  createConsoleSink,
  createNullSink,
  tryCreateFileSink,
  type LogSink,
} from './log-sink.js'

export interface OutputSelection {
  readonly logSink: LogSink
  readonly interactor: Interactor
}

export interface OutputSelectorOptions {
  /** Stream console sinks write to (default: stderr) */
  consoleStream?: pino.DestinationStream
  /** Streams of the console interactor (default: stdin/stdout) */
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
  /** Base for a relative log file path (default: process.cwd()) */
  cwd?: string
  /**
   * File log types that already failed. They fall back to the console
   * without another attempt or warning; new failures are added.
   */
  failedLogTypes?: Set<string>
}

const LOG_LEVELS: Readonly<Record<string, pino.Level>> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  WARNING: 'warn',
  ERROR: 'error',
}

/**
 * Map a log level name to a pino level. Unknown names mean WARNING.
 */
export function resolveLogLevel(name: string): pino.Level {
  return LOG_LEVELS[name.trim().toUpperCase()] ?? 'warn'
}

function selectLogSink(
  logType: string,
  level: pino.Level,
  options: OutputSelectorOptions
): LogSink {
  const normalized = logType.toLowerCase()
  if (normalized === 'console') return createConsoleSink(level, options.consoleStream)
  if (normalized === 'none') return createNullSink()

  const failed = options.failedLogTypes
  if (failed?.has(logType) === true) return createConsoleSink(level, options.consoleStream)

  const attempt = tryCreateFileSink(logType, level, options.cwd)
  if (attempt.ok) return attempt.sink

  failed?.add(logType)
  const fallback = createConsoleSink(level, options.consoleStream)
  fallback.logger.warn(
    { logType, err: attempt.error.message },
    `Failed to instantiate the logging method '${logType}'. Falling back to console output.`
  )
  return fallback
}

/**
 * The output settings of `section` as one comparable string. Two sections
 * with the same signature select equivalent outputs.
 */
export function outputSignature(section: Section): string {
  return JSON.stringify([
    section.get('log_type', 'console').asString(),
    section.get('output', 'console').asString().toLowerCase(),
    resolveLogLevel(section.get('log_level', 'WARNING').asString()),
  ])
}

/**
 * Build a fresh log sink and interactor from `section`.
 */
export function selectOutput(
  section: Section,
  options: OutputSelectorOptions = {}
): OutputSelection {
  const logType = section.get('log_type', 'console').asString()
  const outputType = section.get('output', 'console').asString().toLowerCase()
  const level = resolveLogLevel(section.get('log_level', 'WARNING').asString())

  const logSink = selectLogSink(logType, level, options)
  const interactor: Interactor =
    outputType === 'none'
      ? new NullInteractor()
      : new ConsoleInteractor(logSink.logger, { input: options.input, output: options.output })

  return { logSink, interactor }
}

/**
 * Close the interactor and log sink of a selection where they hold resources.
 */
export function releaseOutput(selection: OutputSelection): void {
  if (isCloseable(selection.interactor)) selection.interactor.close()
  if (isCloseable(selection.logSink)) selection.logSink.close()
}
