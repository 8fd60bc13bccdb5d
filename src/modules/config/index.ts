/**
 * Barrel exports for the config module.
 */

export { parseCoafile, readCoafile } from './coafile-parser.js'
export {
  serializeSections,
  writeCoafile,
  unwritableKey,
  unwritableSectionName,
  unwritableValue,
} from './coafile-writer.js'
export { loadConfigFile } from './config-loader.js'
export type { LoadConfigFileOptions } from './config-loader.js'
export {
  parseCliArgs,
  extractTargets,
  createCliCommand,
  CLI_SETTING_OPTIONS,
  TARGETS_KEY,
} from './cli-parser.js'
export type { CliParseResult } from './cli-parser.js'
export {
  resolveRuntimePaths,
  DEFAULT_PROJECT_COAFILE,
  USER_COAFILE_NAME,
} from './runtime-paths.js'
export type { RuntimePaths } from './runtime-paths.js'
