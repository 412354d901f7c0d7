#!/usr/bin/env node

import { debugLog, warn } from '../logging/debugLog'
import { USAGE, parseArgs, run } from './run'
import type { CliOptions } from './run'

// Only run if this is the main module
if (require.main === module) {
  ;(async () => {
    let options: CliOptions
    try {
      options = parseArgs(process.argv.slice(2))
    } catch (error) {
      console.error(`projsnap: ${error instanceof Error ? error.message : String(error)}`)
      console.error(USAGE)
      process.exit(2)
    }

    if (options.help) {
      console.log(USAGE)
      return
    }

    try {
      await run(options)
    } catch (error) {
      console.error(`Failed to create snapshot: ${error instanceof Error ? error.message : String(error)}`)
      debugLog({ event: 'snapshot_failed', error: String(error) })
      process.exitCode = 1
    }
  })().catch((error: unknown) => {
    warn(`Unexpected failure: ${String(error)}`)
    process.exitCode = 1
  })
}
