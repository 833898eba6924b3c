#!/usr/bin/env node
import { processCleanup } from './lib/cleanup.js'
import { createProgram } from './program.js'

processCleanup.bindToProcess()

try {
  await createProgram().parseAsync()
} catch (err) {
  await processCleanup.runAll()
  console.error(`Error: ${err instanceof Error ? err.message : 'An unexpected error occurred'}`)
  process.exit(1)
}
