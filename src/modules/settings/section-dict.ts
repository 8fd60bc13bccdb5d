/**
 * Section dictionaries and the precedence merge between configuration layers.
 *
 * Layers, lowest → highest priority:
 *   system coafile → user coafile → project coafile → CLI arguments
 *
 * Resolution is two-phase. Loaders and the merge work on plain
 * `SectionDict`s whose sections have no defaults link. `resolveSections()`
 * then consumes the merged dict and wires every non-default section to
 * `default`; only the resulting `ResolvedSections` reaches discovery and
 * completion.
 */

import { ConfigError } from '../../core/errors.js'
import { DEFAULT_SECTION_NAME, Section } from './section.js'

/** Section name → section, in discovery order */
export type SectionDict = Map<string, Section>

/**
 * Create a dict holding only an empty `default` section.
 */
export function createSectionDict(): SectionDict {
  return new Map([[DEFAULT_SECTION_NAME, new Section(DEFAULT_SECTION_NAME)]])
}

/**
 * Add an empty `default` section when `dict` has none.
 */
export function ensureDefaultSection(dict: SectionDict): SectionDict {
  if (!dict.has(DEFAULT_SECTION_NAME)) {
    dict.set(DEFAULT_SECTION_NAME, new Section(DEFAULT_SECTION_NAME))
  }
  return dict
}

/**
 * Return the `default` section of a dict.
 * @throws {ConfigError} if the dict has no `default` section
 */
export function getDefaultSection(dict: SectionDict): Section {
  const section = dict.get(DEFAULT_SECTION_NAME)
  if (section === undefined) {
    throw new ConfigError('Section dict has no "default" section', {
      sections: Array.from(dict.keys()),
    })
  }
  return section
}

/**
 * Merge `higher` into `lower` and return `lower`.
 *
 * Consumes both arguments: sections of `lower` are updated in place, and
 * sections found only in `higher` are moved over without copying. Callers
 * must not use `higher` afterwards.
 */
export function mergeSectionDicts(lower: SectionDict, higher: SectionDict): SectionDict {
  for (const [name, section] of higher) {
    const existing = lower.get(name)
    if (existing !== undefined) {
      existing.update(section)
    } else {
      lower.set(name, section)
    }
  }
  return lower
}

// ---------------------------------------------------------------------------
// Resolved sections
// ---------------------------------------------------------------------------

/**
 * Read-only view over merged sections whose defaults links are wired.
 */
export class ResolvedSections implements Iterable<Section> {
  private readonly _sections: SectionDict

  /** @internal use resolveSections() */
  constructor(sections: SectionDict) {
    this._sections = sections
  }

  get default(): Section {
    return getDefaultSection(this._sections)
  }

  get size(): number {
    return this._sections.size
  }

  get(name: string): Section | undefined {
    return this._sections.get(name.trim().toLowerCase())
  }

  has(name: string): boolean {
    return this.get(name) !== undefined
  }

  names(): string[] {
    return Array.from(this._sections.keys())
  }

  [Symbol.iterator](): Iterator<Section> {
    return this._sections.values()
  }
}

/**
 * Second phase of resolution: link every section except `default` to
 * `default` for fallback lookups. Consumes `merged`.
 */
export function resolveSections(merged: SectionDict): ResolvedSections {
  const defaults = getDefaultSection(ensureDefaultSection(merged))
  for (const section of merged.values()) {
    if (section !== defaults) {
      section.attachDefaults(defaults)
    }
  }
  return new ResolvedSections(merged)
}
