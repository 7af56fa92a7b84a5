/**
 * Type definitions shared by the CLI surface
 */

/** Output format options */
export type OutputFormat = 'json' | 'pretty' | 'quiet'

/** Result wrapper for consistent output */
export interface Result<T> {
  success: true
  data: T
}

/** Error wrapper for consistent output */
export interface ErrorResult {
  success: false
  error: {
    code: string
    message: string
    details?: Record<string, unknown>
  }
}

/** CLI output type */
export type Output<T> = Result<T> | ErrorResult

/** Error codes */
export const ErrorCodes = {
  GENERAL_ERROR: 'GENERAL_ERROR',
  INVALID_ARGS: 'INVALID_ARGS',
  INVALID_CONFIG: 'INVALID_CONFIG',
  // Daemon error codes
  DAEMON_NOT_RUNNING: 'DAEMON_NOT_RUNNING',
  DAEMON_ALREADY_RUNNING: 'DAEMON_ALREADY_RUNNING',
  DAEMON_START_FAILED: 'DAEMON_START_FAILED',
  DAEMON_FORCE_KILL_FAILED: 'DAEMON_FORCE_KILL_FAILED',
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]
