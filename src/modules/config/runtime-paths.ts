/**
 * Locations of the shipped and per-user configuration, injected into the
 * loader and discovery at startup.
 */

import { homedir } from 'os'
import { dirname, join, resolve } from 'path'
import { fileURLToPath } from 'url'

export interface RuntimePaths {
  /** Lowest-priority coafile shipped with the package */
  systemCoafile: string
  /** Optional per-user coafile */
  userCoafile: string
  /** Directory of the built-in bears; always searched last */
  bearsRoot: string
}

/** Name of the project coafile when no `config` setting names another */
export const DEFAULT_PROJECT_COAFILE = '.coafile'

/** File name of the user coafile inside the home directory */
export const USER_COAFILE_NAME = '.bearconfrc'

/**
 * Package root: this file sits at <root>/src/modules/config in the sources
 * and at <root>/dist/modules/config once built.
 */
function packageRoot(): string {
  const here = dirname(fileURLToPath(import.meta.url))
  return resolve(here, '..', '..', '..')
}

/**
 * Build the runtime paths, filling anything not overridden with the shipped
 * defaults.
 */
export function resolveRuntimePaths(overrides: Partial<RuntimePaths> = {}): RuntimePaths {
  const root = packageRoot()
  return {
    systemCoafile: resolve(overrides.systemCoafile ?? join(root, 'default_coafile')),
    userCoafile: resolve(overrides.userCoafile ?? join(homedir(), USER_COAFILE_NAME)),
    bearsRoot: resolve(overrides.bearsRoot ?? join(root, 'bears')),
  }
}
