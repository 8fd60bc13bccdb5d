/**
 * Setting — one named configuration value with typed accessors.
 *
 * The raw text is kept as written; conversions happen on access so that a
 * value can be read as a list in one place and as a path in another.
 */

import { dirname, isAbsolute, resolve } from 'path'
import { SettingConversionError } from '../../core/errors.js'
import { normalizeName, parseBoolean, splitList } from './string-converter.js'

// ---------------------------------------------------------------------------
// Origin
// ---------------------------------------------------------------------------

/**
 * Where a setting came from. Every origin except `default` marks the value
 * as explicitly set.
 */
export type SettingOrigin =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'cli' }
  | { readonly kind: 'interactive' }
  | { readonly kind: 'default' }

export const CLI_ORIGIN: SettingOrigin = { kind: 'cli' }
export const INTERACTIVE_ORIGIN: SettingOrigin = { kind: 'interactive' }
export const DEFAULT_ORIGIN: SettingOrigin = { kind: 'default' }

export function fileOrigin(path: string): SettingOrigin {
  return { kind: 'file', path }
}

// ---------------------------------------------------------------------------
// Setting
// ---------------------------------------------------------------------------

export class Setting {
  readonly key: string
  readonly value: string
  readonly origin: SettingOrigin

  constructor(key: string, value: string, origin: SettingOrigin) {
    this.key = normalizeName(key)
    this.value = value
    this.origin = origin
  }

  /** False only for values synthesized from a lookup fallback */
  get explicit(): boolean {
    return this.origin.kind !== 'default'
  }

  asString(): string {
    return this.value.trim()
  }

  /**
   * @throws {SettingConversionError} if the value is not a recognized boolean word
   */
  asBoolean(): boolean {
    const parsed = parseBoolean(this.value)
    if (parsed === undefined) {
      throw new SettingConversionError(this.key, this.value, 'a boolean')
    }
    return parsed
  }

  asInt(): number {
    const trimmed = this.value.trim()
    if (!/^[+-]?\d+$/.test(trimmed)) {
      throw new SettingConversionError(this.key, this.value, 'an integer')
    }
    return parseInt(trimmed, 10)
  }

  asFloat(): number {
    const trimmed = this.value.trim()
    const parsed = Number(trimmed)
    if (trimmed === '' || Number.isNaN(parsed)) {
      throw new SettingConversionError(this.key, this.value, 'a number')
    }
    return parsed
  }

  asList(): string[] {
    return splitList(this.value)
  }

  /**
   * Resolve the value as a path. Relative values from a coafile are taken
   * relative to that file's directory, all others relative to `baseDir`.
   */
  asPath(baseDir: string = process.cwd()): string {
    return this._resolvePath(this.asString(), baseDir)
  }

  asPathList(baseDir: string = process.cwd()): string[] {
    return this.asList().map((entry) => this._resolvePath(entry, baseDir))
  }

  /**
   * Match the value case-insensitively against `allowed`.
   * @returns the canonical member of `allowed`
   */
  asEnum<T extends string>(allowed: readonly T[]): T {
    const normalized = this.asString().toLowerCase()
    const match = allowed.find((candidate) => candidate.toLowerCase() === normalized)
    if (match === undefined) {
      throw new SettingConversionError(this.key, this.value, `one of ${allowed.join(', ')}`)
    }
    return match
  }

  toString(): string {
    return this.value
  }

  private _resolvePath(entry: string, baseDir: string): string {
    if (isAbsolute(entry)) return entry
    const origin = this.origin
    const base = origin.kind === 'file' ? dirname(resolve(baseDir, origin.path)) : baseDir
    return resolve(base, entry)
  }
}
