import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { DaemonLogger, DaemonVerbosity } from './types'

export interface LoggerOptions {
  /** Write lines to the console (default true) */
  console?: boolean
  /** Append lines to this activity log file */
  logPath?: string | null
}

export function createLogger(
  verbosity: DaemonVerbosity,
  options: LoggerOptions = {},
): DaemonLogger {
  const toConsole = options.console ?? true
  const logPath = options.logPath ?? null

  const shouldLog = {
    info: verbosity !== 'quiet',
    debug: verbosity === 'verbose',
    warn: true,
    error: true,
  }

  if (logPath) {
    mkdirSync(dirname(logPath), { recursive: true })
  }

  const timestamp = () => new Date().toISOString()

  const appendToFile = (line: string) => {
    if (!logPath) return
    try {
      appendFileSync(logPath, `${line}\n`)
    } catch (err) {
      console.error(`Failed to write activity log ${logPath}: ${err}`)
    }
  }

  const write = (
    level: keyof typeof shouldLog,
    message: string,
    sink: (line: string) => void,
  ) => {
    if (!shouldLog[level]) return
    const line = `[${timestamp()}] [${level.toUpperCase()}] ${message}`
    if (toConsole) sink(line)
    appendToFile(line)
  }

  return {
    info(message: string) {
      write('info', message, console.log)
    },
    debug(message: string) {
      write('debug', message, console.log)
    },
    warn(message: string) {
      write('warn', message, console.warn)
    },
    error(message: string) {
      write('error', message, console.error)
    },
  }
}
