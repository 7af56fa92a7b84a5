/**
 * Output utilities for consistent CLI output
 */
import type { ErrorCode, Output, OutputFormat } from '../types'

/** Current output format (can be overridden per-command) */
let currentFormat: OutputFormat = 'pretty'

/**
 * Output writer interface for dependency injection (testing)
 */
export interface OutputWriter {
  log(message: string): void
  error(message: string): void
}

/**
 * Default output writer using console
 */
export const defaultWriter: OutputWriter = {
  log: (message: string) => console.log(message),
  error: (message: string) => console.error(message),
}

/** Current output writer */
let writer: OutputWriter = defaultWriter

/**
 * Error raised by `error()` in test mode instead of exiting
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'CliError'
  }
}

function isTestEnv(): boolean {
  return process.env.NODE_ENV === 'test'
}

/**
 * Set the output writer (for testing)
 */
export function setOutputWriter(newWriter: OutputWriter): void {
  writer = newWriter
}

/**
 * Reset output writer to default
 */
export function resetOutputWriter(): void {
  writer = defaultWriter
}

export function setOutputFormat(format: OutputFormat): void {
  currentFormat = format
}

export function getOutputFormat(): OutputFormat {
  return currentFormat
}

export function resetOutputFormat(): void {
  currentFormat = 'pretty'
}

/**
 * Output success result
 * In pretty mode the summary line is printed instead of the data when given.
 * Outside tests the process exits so a detached child never keeps the CLI alive.
 */
export function success<T>(data: T, summary?: string): void {
  const result: Output<T> = { success: true, data }

  switch (currentFormat) {
    case 'json':
      writer.log(JSON.stringify(result, null, 2))
      break
    case 'pretty':
      writer.log(summary ?? JSON.stringify(data, null, 2))
      break
    case 'quiet':
      break
  }

  if (!isTestEnv()) {
    process.exit(0)
  }
}

/**
 * Output error result
 * Note: In test mode, this throws instead of calling process.exit
 */
export function error(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): never {
  const result: Output<never> = {
    success: false,
    error: { code, message, details },
  }

  if (currentFormat === 'json') {
    writer.error(JSON.stringify(result, null, 2))
  } else if (currentFormat === 'pretty') {
    writer.error(`Error: ${message}`)
  }

  if (isTestEnv()) {
    throw new CliError(message, code, details)
  }

  process.exit(1)
}

/**
 * Log info message (not in quiet or json mode)
 */
export function info(message: string): void {
  if (currentFormat === 'pretty') {
    writer.log(message)
  }
}
