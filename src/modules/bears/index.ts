/**
 * Barrel exports for the bears module.
 */

export {
  collectBears,
  findBearManifests,
  loadBearManifest,
  BEAR_MANIFEST_SUFFIXES,
} from './bear-collector.js'
export { BearManifestSchema, BearKindSchema, BearSettingsSchema } from './schemas.js'
export type { BearManifest } from './schemas.js'
export { BEAR_KINDS } from './types.js'
export type { BearKind, BearDescriptor, BearSettingSpec } from './types.js'
