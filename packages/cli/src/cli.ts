#!/usr/bin/env node
import { createStderrLogger } from '@gmlkit/utils/logger'
import { createProgram } from './program'

const log = createStderrLogger('CLI')

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    log.error(error instanceof Error ? error.message : String(error))
    process.exit(1)
  })
