/**
 * Daemon types and interfaces
 */

/**
 * Daemon exit codes
 */
export enum DaemonExitCode {
  /** Clean shutdown */
  Success = 0,
  /** General error, including refusal to start a second instance */
  Error = 1,
}

/**
 * Daemon verbosity level
 */
export type DaemonVerbosity = 'quiet' | 'normal' | 'verbose'

/**
 * Logger interface for daemon components
 */
export interface DaemonLogger {
  info(message: string): void
  debug(message: string): void
  warn(message: string): void
  error(message: string): void
}

/**
 * One synchronized service: its remote and local log and data roots
 */
export interface TargetDescriptor {
  readonly label: string
  readonly remoteLogRoot: string
  readonly remoteDataRoot: string
  readonly localLogRoot: string
  readonly localDataRoot: string
}

/**
 * Outcome of syncing one subtree (logs or data) of one target.
 * `skipped` is used when the remote data root does not exist yet and is not a failure.
 */
export type SyncResult =
  | { status: 'success' }
  | { status: 'failed'; error: string }
  | { status: 'skipped'; reason: string }

export type TargetOutcome = 'ok' | 'partial' | 'failed'

export type PassOutcome = 'all-ok' | 'some-degraded' | 'all-failed'

export interface TargetReport {
  label: string
  logs: SyncResult
  data: SyncResult
  outcome: TargetOutcome
}

export interface PassReport {
  outcome: PassOutcome
  targets: TargetReport[]
  /** Pass start timestamp */
  startedAt: number
  durationMs: number
}

/**
 * Retry policy configuration
 */
export interface RetryConfig {
  /** Delay between passes in milliseconds */
  intervalMs: number
  /** Consecutive all-failed passes before the cooldown kicks in */
  failureCeiling: number
  /** Delay inserted instead of the interval once the ceiling is reached */
  cooldownMs: number
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  intervalMs: 30_000, // 30 seconds
  failureCeiling: 10,
  cooldownMs: 300_000, // 5 minutes
}

/**
 * Daemon state, created when the PID file is acquired
 */
export interface DaemonState {
  /** Whether the loop is running */
  running: boolean
  pid: number
  /** Start timestamp */
  startedAt: number
  consecutiveFailures: number
  lastPassOutcome: PassOutcome | null
  lastPassAt: number | null
}

/** Grace period between SIGTERM and SIGKILL when stopping */
export const DEFAULT_STOP_GRACE_MS = 2000

/** Pause between stop and start on restart, and before checking a freshly spawned daemon */
export const DEFAULT_SETTLE_MS = 1000

/** File name of the activity log, excluded from every log mirror */
export const ACTIVITY_LOG_NAME = '.sync-daemon.log'
