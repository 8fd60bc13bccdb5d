/**
 * Bear discovery — scans search directories for bear manifests and returns
 * the descriptors matching the requested names and kinds.
 *
 * Usage:
 *   const local = await collectBears(['/project/bears', bearsRoot], ['StyleBear'], ['LOCAL'], log)
 */

import { readFile, stat } from 'fs/promises'
import { join, resolve, sep } from 'path'
import { escape, glob, hasMagic } from 'glob'
import yaml from 'js-yaml'
import type { Logger } from 'pino'
import { BearManifestError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { BearManifestSchema } from './schemas.js'
import type { BearDescriptor, BearKind, BearSettingSpec } from './types.js'

const logger = createLogger('bear-collector')

/** File name suffixes recognized as bear manifests */
export const BEAR_MANIFEST_SUFFIXES = ['.bear.yaml', '.bear.yml'] as const

function isManifestFile(filePath: string): boolean {
  return BEAR_MANIFEST_SUFFIXES.some((suffix) => filePath.endsWith(suffix))
}

function toSettingSpecs(settings: Record<string, string>): readonly BearSettingSpec[] {
  return Object.freeze(
    Object.entries(settings).map(([name, help]) => Object.freeze({ name: name.toLowerCase(), help }))
  )
}

// ---------------------------------------------------------------------------
// Manifest loading
// ---------------------------------------------------------------------------

/**
 * Read one bear manifest into a frozen descriptor.
 * @throws {BearManifestError} if the manifest is unreadable, not YAML, or invalid
 */
export async function loadBearManifest(manifestPath: string): Promise<BearDescriptor> {
  let parsed: unknown
  try {
    parsed = yaml.load(await readFile(manifestPath, 'utf-8'))
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    throw new BearManifestError(`Cannot read bear manifest at "${manifestPath}": ${msg}`, {
      manifestPath,
    })
  }

  const result = BearManifestSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  • ${i.path.join('.')}: ${i.message}`)
      .join('\n')
    throw new BearManifestError(
      `Bear manifest at "${manifestPath}" failed validation:\n${issues}`,
      { manifestPath, issues: result.error.issues }
    )
  }

  const manifest = result.data
  return Object.freeze({
    name: manifest.name,
    kind: manifest.kind,
    description: manifest.description,
    requiredSettings: toSettingSpecs(manifest.required_settings),
    optionalSettings: toSettingSpecs(manifest.optional_settings),
    source: manifestPath,
  })
}

// ---------------------------------------------------------------------------
// Directory scanning
// ---------------------------------------------------------------------------

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

/**
 * List the manifest files reachable from one search entry, sorted by path.
 * A directory is searched recursively, even when its path contains glob
 * characters; any other entry containing glob characters is used as the
 * pattern itself.
 */
export async function findBearManifests(searchDir: string): Promise<string[]> {
  const pattern =
    hasMagic(searchDir) && !(await isDirectory(searchDir))
      ? searchDir
      : join(escape(searchDir), '**', '*')
  const matches = await glob(pattern.split(sep).join('/'), { nodir: true, absolute: true })
  return matches.filter(isManifestFile).sort()
}

/**
 * Collect the bears of the given kinds reachable from `searchDirs`.
 *
 * A bear is included when its kind is in `kinds` and either `bearNames` is
 * empty or contains its name (case-insensitive). Bears reachable through
 * several search dirs are returned once, the first occurrence winning.
 * Missing directories yield nothing. Invalid manifests are reported to
 * `log` and skipped.
 */
export async function collectBears(
  searchDirs: readonly string[],
  bearNames: readonly string[],
  kinds: readonly BearKind[],
  log: Logger
): Promise<BearDescriptor[]> {
  const wanted = new Set(bearNames.map((name) => name.toLowerCase()))
  const visitedFiles = new Set<string>()
  const seenNames = new Set<string>()
  const bears: BearDescriptor[] = []

  for (const searchDir of searchDirs) {
    for (const manifestPath of await findBearManifests(searchDir)) {
      const absolute = resolve(manifestPath)
      if (visitedFiles.has(absolute)) continue
      visitedFiles.add(absolute)

      let bear: BearDescriptor
      try {
        bear = await loadBearManifest(absolute)
      } catch (err) {
        if (!(err instanceof BearManifestError)) throw err
        log.warn({ manifestPath: absolute }, `Unable to collect bears from '${absolute}': ${err.message}`)
        continue
      }

      const key = bear.name.toLowerCase()
      if (!kinds.includes(bear.kind)) continue
      if (wanted.size > 0 && !wanted.has(key)) continue
      if (seenNames.has(key)) continue

      seenNames.add(key)
      bears.push(bear)
    }
  }

  logger.debug(
    { searchDirs, kinds, found: bears.map((bear) => bear.name) },
    'Bear collection finished'
  )
  return bears
}
