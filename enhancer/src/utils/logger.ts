export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  entries(): string[]
}

export interface LoggerOptions {
  verbose?: boolean
  silent?: boolean
}

const consoleWriters: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false, silent = false } = options
  const logEntries: string[] = []

  const write = (level: LogLevel, message: string) => {
    const timestamp = new Date().toISOString()
    const logEntry = `[${timestamp}] [${level.toUpperCase()}] ${message}`
    logEntries.push(logEntry)

    if (silent || (level === 'debug' && !verbose)) {
      return
    }
    consoleWriters[level](logEntry)
  }

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    entries: () => [...logEntries],
  }
}

export const defaultLogger = createLogger({
  verbose: process.env.ENHANCE_DEBUG === 'true',
})
