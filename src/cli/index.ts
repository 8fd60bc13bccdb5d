#!/usr/bin/env node
/**
 * bearconf CLI - Main entry point
 */

import { createLogger } from '../utils/logger.js'
import { runCli } from './run.js'

const logger = createLogger('cli')

/** Main entry point */
async function main(): Promise<void> {
  try {
    process.exitCode = await runCli(process.argv.slice(2))
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
