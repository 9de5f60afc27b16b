#!/usr/bin/env node
import { loadConfig } from './config/index.js'
import { buildProgram } from './cli/program.js'
import { StackpackError, describeError } from './errors.js'
import { cliLogger, setLogLevel } from './utils/logger.js'

async function main(): Promise<void> {
  const config = loadConfig()
  setLogLevel(config.logLevel)
  await buildProgram(config).parseAsync(process.argv)
}

main().catch((error: unknown) => {
  const code = error instanceof StackpackError ? error.code : undefined
  cliLogger.error(describeError(error), code ? { code } : undefined)
  process.exitCode = 1
})
