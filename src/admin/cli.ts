#!/usr/bin/env node
import { createStderrLogger } from '../stdio.ts'
import { runAdmin } from './commands.ts'

const logger = createStderrLogger(process.env.MCP_LOG_LEVEL ?? 'warn')

runAdmin(process.argv.slice(2), { logger })
  .then(code => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, 'admin client crashed')
    process.exitCode = 1
  })
