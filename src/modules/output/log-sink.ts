/**
 * Log sinks — the closed set of places pipeline warnings can go.
 *
 *   console  writes JSON lines to a stream (stderr by default); never fails
 *   file     appends JSON lines to a file; construction may fail
 *   null     discards everything
 */

import { resolve } from 'path'
import pino from 'pino'
import type { Logger } from 'pino'
import { createLogger } from '../../utils/logger.js'
import type { Closeable } from './closeable.js'

export interface ConsoleLogSink {
  readonly kind: 'console'
  readonly logger: Logger
}

export interface FileLogSink extends Closeable {
  readonly kind: 'file'
  readonly logger: Logger
  readonly filePath: string
}

export interface NullLogSink {
  readonly kind: 'null'
  readonly logger: Logger
}

export type LogSink = ConsoleLogSink | FileLogSink | NullLogSink

/** Outcome of trying to open a file sink */
export type FileSinkResult =
  | { readonly ok: true; readonly sink: FileLogSink }
  | { readonly ok: false; readonly error: Error }

const SINK_LOGGER_NAME = 'bearconf'

export function createConsoleSink(
  level: string,
  stream: pino.DestinationStream = pino.destination(2)
): ConsoleLogSink {
  return {
    kind: 'console',
    logger: createLogger(SINK_LOGGER_NAME, { level, destination: stream }),
  }
}

export function createNullSink(): NullLogSink {
  return {
    kind: 'null',
    logger: createLogger(SINK_LOGGER_NAME, {
      level: 'silent',
      destination: { write: () => undefined },
    }),
  }
}

/**
 * Open a file sink appending to `filePath` (resolved against `cwd`).
 * The file is opened synchronously, so an unwritable path is reported
 * here rather than on the first log line.
 */
export function tryCreateFileSink(
  filePath: string,
  level: string,
  cwd: string = process.cwd()
): FileSinkResult {
  const absolute = resolve(cwd, filePath)
  let destination: ReturnType<typeof pino.destination>
  try {
    destination = pino.destination({ dest: absolute, sync: true, append: true, mkdir: false })
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) }
  }

  return {
    ok: true,
    sink: {
      kind: 'file',
      filePath: absolute,
      logger: createLogger(SINK_LOGGER_NAME, { level, destination }),
      close: () => {
        destination.end()
      },
    },
  }
}
