/**
 * Section — an ordered, named group of settings with an optional link to a
 * `defaults` section used for fallback lookups.
 */

import { ConfigError } from '../../core/errors.js'
import { DEFAULT_ORIGIN, Setting, type SettingOrigin } from './setting.js'
import { normalizeName } from './string-converter.js'

/** Name of the section every other section falls back to */
export const DEFAULT_SECTION_NAME = 'default'

export class Section implements Iterable<Setting> {
  readonly name: string
  private readonly _contents = new Map<string, Setting>()
  private _defaults: Section | null = null

  constructor(name: string) {
    this.name = normalizeName(name)
  }

  /** The fallback section, or null until sections are resolved */
  get defaults(): Section | null {
    return this._defaults
  }

  /** Number of settings held by this section itself */
  get size(): number {
    return this._contents.size
  }

  /**
   * Link this section to its fallback section.
   * @throws {ConfigError} when linking `default`, or a section to itself
   */
  attachDefaults(defaults: Section): void {
    if (this.name === DEFAULT_SECTION_NAME || defaults === this) {
      throw new ConfigError(`Section "${this.name}" cannot fall back to "${defaults.name}"`, {
        section: this.name,
        defaults: defaults.name,
      })
    }
    this._defaults = defaults
  }

  /**
   * Store a setting, replacing any setting with the same key. A replaced key
   * keeps its original position.
   */
  append(setting: Setting): void {
    this._contents.set(setting.key, setting)
  }

  set(key: string, value: string, origin: SettingOrigin): Setting {
    const setting = new Setting(key, value, origin)
    this.append(setting)
    return setting
  }

  /**
   * Look up a setting here, then in the defaults section. With a fallback,
   * a missing key yields a defaulted setting holding the fallback text.
   */
  get(key: string): Setting | undefined
  get(key: string, fallback: string): Setting
  get(key: string, fallback?: string): Setting | undefined {
    const normalized = normalizeName(key)
    const found = this._contents.get(normalized) ?? this._defaults?.get(normalized)
    if (found !== undefined) return found
    if (fallback === undefined) return undefined
    return new Setting(normalized, fallback, DEFAULT_ORIGIN)
  }

  has(key: string): boolean {
    return this.get(key) !== undefined
  }

  hasOwn(key: string): boolean {
    return this._contents.has(normalizeName(key))
  }

  /**
   * Remove a setting held by this section itself.
   * @returns the removed setting, if there was one
   */
  delete(key: string): Setting | undefined {
    const normalized = normalizeName(key)
    const existing = this._contents.get(normalized)
    this._contents.delete(normalized)
    return existing
  }

  keys(): string[] {
    return Array.from(this._contents.keys())
  }

  entries(): Array<[string, Setting]> {
    return Array.from(this._contents.entries())
  }

  [Symbol.iterator](): Iterator<Setting> {
    return this._contents.values()
  }

  /**
   * Overlay `other` onto this section. Explicit settings of `other` replace
   * ours; defaulted ones only fill keys we do not hold.
   */
  update(other: Section): this {
    for (const setting of Array.from(other._contents.values())) {
      if (setting.explicit || !this._contents.has(setting.key)) {
        this.append(setting)
      }
    }
    return this
  }

  copy(): Section {
    const clone = new Section(this.name)
    clone.update(this)
    clone._defaults = this._defaults
    return clone
  }

  /** Own settings as a plain key → raw value record */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {}
    for (const [key, setting] of this._contents) {
      record[key] = setting.value
    }
    return record
  }
}
