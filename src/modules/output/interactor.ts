/**
 * Interaction channels — how missing settings are obtained from a person.
 */

import { createInterface, type Interface } from 'node:readline'
import type { Logger } from 'pino'
import type { Closeable } from './closeable.js'

/** A setting some bears need but no layer provided */
export interface NeededSetting {
  readonly name: string
  readonly help: string
  /** Names of the bears that declared the setting, in discovery order */
  readonly bears: readonly string[]
}

export interface Interactor {
  readonly kind: 'console' | 'null'
  /**
   * Obtain values for the given settings.
   * @returns setting name → value for every setting that got an answer
   */
  acquireSettings(needed: readonly NeededSetting[]): Promise<Map<string, string>>
}

// ---------------------------------------------------------------------------
// NullInteractor
// ---------------------------------------------------------------------------

/**
 * Interactor for non-interactive runs: never prompts, never blocks.
 */
export class NullInteractor implements Interactor {
  readonly kind = 'null' as const

  async acquireSettings(_needed: readonly NeededSetting[]): Promise<Map<string, string>> {
    return new Map()
  }
}

// ---------------------------------------------------------------------------
// ConsoleInteractor
// ---------------------------------------------------------------------------

export interface ConsoleInteractorStreams {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

export function formatSettingQuestion(setting: NeededSetting): string {
  const help = setting.help !== '' ? ` (${setting.help})` : ''
  return `Please enter a value for the setting "${setting.name}"${help} needed by ${setting.bears.join(', ')}: `
}

/**
 * Asks for each setting on the output stream and reads one line per answer.
 * Empty answers leave the setting unset. The readline interface is opened on
 * first use and released by close().
 */
export class ConsoleInteractor implements Interactor, Closeable {
  readonly kind = 'console' as const
  private readonly _input: NodeJS.ReadableStream
  private readonly _output: NodeJS.WritableStream
  private readonly _log: Logger
  private _rl: Interface | null = null
  private readonly _lines: string[] = []
  private _waiting: ((line: string | undefined) => void) | null = null
  private _ended = false

  constructor(log: Logger, streams: ConsoleInteractorStreams = {}) {
    this._log = log
    this._input = streams.input ?? process.stdin
    this._output = streams.output ?? process.stdout
  }

  async acquireSettings(needed: readonly NeededSetting[]): Promise<Map<string, string>> {
    const answers = new Map<string, string>()
    for (const setting of needed) {
      this._output.write(formatSettingQuestion(setting))
      const line = await this._nextLine()
      if (line === undefined) {
        this._log.debug({ setting: setting.name }, 'Input closed before the setting was answered')
        break
      }
      const answer = line.trim()
      if (answer !== '') answers.set(setting.name, answer)
    }
    return answers
  }

  close(): void {
    if (this._rl !== null) {
      this._rl.close()
      this._rl = null
    }
  }

  private _open(): void {
    if (this._rl !== null || this._ended) return
    const rl = createInterface({ input: this._input, terminal: false })
    // Lines can arrive before the next question is asked, so they queue.
    rl.on('line', (line: string) => {
      const waiting = this._waiting
      if (waiting !== null) {
        this._waiting = null
        waiting(line)
      } else {
        this._lines.push(line)
      }
    })
    rl.on('close', () => {
      this._ended = true
      this._rl = null
      const waiting = this._waiting
      this._waiting = null
      waiting?.(undefined)
    })
    this._rl = rl
  }

  private _nextLine(): Promise<string | undefined> {
    this._open()
    const queued = this._lines.shift()
    if (queued !== undefined) return Promise.resolve(queued)
    if (this._ended) return Promise.resolve(undefined)
    return new Promise((resolve) => {
      this._waiting = resolve
    })
  }
}
