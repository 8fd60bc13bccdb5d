/**
 * Zod schemas for bear manifests (`*.bear.yaml`).
 */

import { z } from 'zod'
import { BEAR_KINDS } from './types.js'

export const BearKindSchema = z
  .string()
  .transform((kind) => kind.trim().toUpperCase())
  .pipe(z.enum(BEAR_KINDS))

/** Setting name → help text. An empty YAML value means no help text. */
export const BearSettingsSchema = z.record(
  z.string().min(1),
  z
    .string()
    .nullable()
    .transform((help) => help ?? '')
)

export const BearManifestSchema = z
  .object({
    name: z.string().min(1),
    kind: BearKindSchema,
    description: z.string().default(''),
    required_settings: BearSettingsSchema.default({}),
    optional_settings: BearSettingsSchema.default({}),
  })
  .strict()

export type BearManifest = z.infer<typeof BearManifestSchema>
