/**
 * Types for discovered bears.
 *
 * A bear is a capability-tagged unit of analysis logic. Discovery only
 * reads its descriptor: the name, the kind, and the settings it needs.
 */

/** Kinds of bears */
export const BEAR_KINDS = ['LOCAL', 'GLOBAL'] as const

/**
 * LOCAL bears run on a single unit of work (one file); GLOBAL bears run
 * once across the whole run.
 */
export type BearKind = (typeof BEAR_KINDS)[number]

/** One setting a bear declares */
export interface BearSettingSpec {
  readonly name: string
  readonly help: string
}

/**
 * Immutable descriptor of a discovered bear. Descriptors are recreated on
 * every discovery call and may be shared freely between sections.
 */
export interface BearDescriptor {
  readonly name: string
  readonly kind: BearKind
  readonly description: string
  /** Settings the bear cannot run without, in declaration order */
  readonly requiredSettings: readonly BearSettingSpec[]
  readonly optionalSettings: readonly BearSettingSpec[]
  /** Absolute path of the manifest the bear was read from */
  readonly source: string
}
