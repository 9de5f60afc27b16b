import dotenv from 'dotenv'
import { z } from 'zod'
import { ConfigError } from '../errors.js'
import { LogLevel } from '../utils/logger.js'

const configSchema = z.object({
  STACKPACK_LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  STACKPACK_PROJECT: z.string().min(1).optional(),
  STACKPACK_SSM_PREFIX: z
    .string()
    .startsWith('/', 'must start with "/"')
    .default('/stackpack')
    .transform(prefix => prefix.replace(/\/+$/, '')),
})

export interface AppConfig {
  logLevel: LogLevel
  /** Project to package for when no --project flag is given */
  project?: string
  /** Root of the SSM parameter tree holding environment records */
  ssmPrefix: string
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = configSchema.safeParse(env)
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${problems}`)
  }

  const parsed = result.data
  return {
    logLevel: parsed.STACKPACK_LOG_LEVEL,
    project: parsed.STACKPACK_PROJECT,
    ssmPrefix: parsed.STACKPACK_SSM_PREFIX,
  }
}

/**
 * Load `.env` from the working directory (if any) and parse the process environment.
 */
export function loadConfig(): AppConfig {
  dotenv.config()
  return parseConfig(process.env)
}
