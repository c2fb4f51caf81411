#!/usr/bin/env tsx
import '../env.js'
import { createDefaultContext } from './context.js'
import { main } from './main.js'

main(process.argv.slice(2), createDefaultContext())
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error)
    process.exitCode = 1
  })
