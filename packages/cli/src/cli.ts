#!/usr/bin/env node
import { hideBin } from 'yargs/helpers'
import { createCli } from './index.js'

createCli(hideBin(process.argv))
  .parseAsync()
  .catch((error: unknown) => {
    console.error(`specloom: ${error instanceof Error ? error.message : String(error)}`)
    process.exitCode = 1
  })
