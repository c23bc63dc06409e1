#!/usr/bin/env node
import { main } from './cli'
import { getErrorMessage } from './services/utils/errorUtils'

main().then(
  (exitCode) => {
    process.exitCode = exitCode
  },
  (error: unknown) => {
    process.stderr.write(`music-library-indexer: ${getErrorMessage(error)}\n`)
    process.exitCode = 2
  }
)
