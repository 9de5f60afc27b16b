/**
 * Structured Logger
 *
 * Consistent, structured logging with context and metadata support.
 * Everything goes to stderr: stdout is reserved for rendered templates.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export interface LogContext {
  service?: string
  operation?: string
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  context?: LogContext
  error?: {
    name: string
    message: string
    stack?: string
    code?: string
  }
}

export type LogWriter = (line: string) => void

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR]

const writeToStderr: LogWriter = line => {
  process.stderr.write(`${line}\n`)
}

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code')
  return typeof code === 'string' ? code : undefined
}

export class Logger {
  private minLevel: LogLevel

  constructor(
    private readonly service: string,
    minLevel: LogLevel = LogLevel.INFO,
    private readonly write: LogWriter = writeToStderr
  ) {
    this.minLevel = minLevel
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel)
  }

  private formatLog(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        service: this.service,
        ...context,
      },
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
        code: errorCode(error),
      }
    }

    return entry
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return
    }

    const entry = this.formatLog(level, message, context, error)

    // JSON lines for log aggregation in production, a readable line otherwise
    if (process.env.NODE_ENV === 'production') {
      this.write(JSON.stringify(entry))
      return
    }

    const { service, ...rest }: LogContext = entry.context ?? {}
    const prefix = `[${entry.level.toUpperCase()}] [${service}]`
    const ctx = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : ''
    const err = entry.error ? `\n${entry.error.stack || entry.error.message}` : ''
    this.write(`${prefix} ${entry.message}${ctx}${err}`)
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context)
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context)
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error)
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error)
  }
}

// Singleton instances per area of the CLI
export const cliLogger = new Logger('cli')
export const workspaceLogger = new Logger('workspace')
export const environmentLogger = new Logger('environments')

export function setLogLevel(level: LogLevel): void {
  for (const logger of [cliLogger, workspaceLogger, environmentLogger]) {
    logger.setLevel(level)
  }
}
