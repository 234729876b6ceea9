#!/usr/bin/env node

import { run } from './run'
import { debugLog, errorMessage } from '../logging/debugLog'

;(async () => {
  const args = process.argv.slice(2)
  if (args.length > 1) {
    console.error('Usage: langdiff [path/to/ru.lang]')
    process.exit(1)
  }

  try {
    await run(args[0])
  } catch (error) {
    debugLog({ event: 'run_failed', error: errorMessage(error) })
    console.error(`langdiff: ${errorMessage(error)}`)
    process.exitCode = 1
  }
})()
