/**
 * Barrel exports for the settings module.
 */

export {
  Setting,
  CLI_ORIGIN,
  INTERACTIVE_ORIGIN,
  DEFAULT_ORIGIN,
  fileOrigin,
} from './setting.js'
export type { SettingOrigin } from './setting.js'
export { Section, DEFAULT_SECTION_NAME } from './section.js'
export {
  createSectionDict,
  ensureDefaultSection,
  getDefaultSection,
  mergeSectionDicts,
  resolveSections,
  ResolvedSections,
} from './section-dict.js'
export type { SectionDict } from './section-dict.js'
export { parseBoolean, splitList, normalizeName, LIST_DELIMITERS } from './string-converter.js'
