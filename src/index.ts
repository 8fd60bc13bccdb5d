/**
 * bearconf - Main module exports
 * Public API surface of the settings pipeline
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'

// Settings model
export * from './modules/settings/index.js'

// Coafiles and CLI layer
export * from './modules/config/index.js'

// Bear discovery
export * from './modules/bears/index.js'

// Log sinks and interaction channels
export * from './modules/output/index.js'

// Interactive completion
export * from './modules/section-filler/index.js'

// Pipeline
export * from './modules/section-manager/index.js'

// CLI
export { runCli, summarizeRun } from './cli/run.js'
export type { RunCliOptions, SectionSummary } from './cli/run.js'
