/**
 * Barrel exports for the section-manager module.
 */

export {
  createSectionManager,
  SectionManagerImpl,
  saveSections,
  warnNonexistentTargets,
} from './section-manager-impl.js'
export type {
  SectionManager,
  SectionManagerOptions,
  SectionManagerResult,
} from './section-manager.js'
