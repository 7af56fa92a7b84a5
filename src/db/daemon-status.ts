/**
 * Daemon status service
 * Key-value store for daemon state tracking, plus the last result of every target
 */
import { isPassOutcome, isTargetOutcome } from '../daemon/outcome'
import type {
  DaemonState,
  PassOutcome,
  PassReport,
  SyncResult,
  TargetOutcome,
} from '../daemon/types'
import type { StatusDatabase, StatusRow } from './index'
import type { TargetStatusRow } from './schema'

/**
 * Daemon info structure
 */
export interface DaemonInfo {
  status: 'running' | 'stopped'
  pid: number | null
  startedAt: number | null
  lastPassAt: number | null
  lastPassOutcome: PassOutcome | null
  consecutiveFailures: number
  passes: number
}

export interface TargetStatus {
  label: string
  outcome: TargetOutcome
  logs: SyncResult | null
  data: SyncResult | null
  syncedAt: number
}

/**
 * Daemon status service interface
 */
export interface DaemonStatusService {
  /** Get a value by key */
  get(key: string): string | null
  /** Set a value */
  set(key: string, value: string): void
  /** Delete a key */
  delete(key: string): void

  // Convenience methods
  /** Mark daemon as running with given PID */
  setDaemonRunning(pid: number, startedAt?: number): void
  /** Mark daemon as stopped */
  setDaemonStopped(): void
  /** Store a finished pass and the daemon state after it */
  recordPass(report: PassReport, state: DaemonState): void
  /** Store a pass that threw before producing a report; target rows are left as they were */
  recordFailedPass(state: DaemonState): void
  /** Get all daemon info */
  getDaemonInfo(): DaemonInfo
  /** Last stored result per target, ordered by label */
  getTargetStatuses(): TargetStatus[]
}

function parseIntOrNull(value: string | null): number | null {
  if (value === null) return null
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? null : parsed
}

/**
 * Parse a stored SyncResult, null when the text is not one
 */
export function parseSyncResult(text: string): SyncResult | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return null
  }
  if (typeof parsed !== 'object' || parsed === null || !('status' in parsed)) {
    return null
  }

  if (parsed.status === 'success') {
    return { status: 'success' }
  }
  if (parsed.status === 'failed' && 'error' in parsed && typeof parsed.error === 'string') {
    return { status: 'failed', error: parsed.error }
  }
  if (parsed.status === 'skipped' && 'reason' in parsed && typeof parsed.reason === 'string') {
    return { status: 'skipped', reason: parsed.reason }
  }
  return null
}

function textColumn(row: StatusRow | null, column: string): string | null {
  const value = row?.[column]
  return typeof value === 'string' ? value : null
}

function integerColumn(row: StatusRow, column: string): number | null {
  const value = row[column]
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  return null
}

function toTargetRow(row: StatusRow): TargetStatusRow | null {
  const label = textColumn(row, 'label')
  const outcome = textColumn(row, 'outcome')
  const logsResult = textColumn(row, 'logs_result')
  const dataResult = textColumn(row, 'data_result')
  const syncedAt = integerColumn(row, 'synced_at')
  if (
    label === null ||
    outcome === null ||
    logsResult === null ||
    dataResult === null ||
    syncedAt === null
  ) {
    return null
  }
  return {
    label,
    outcome,
    logs_result: logsResult,
    data_result: dataResult,
    synced_at: syncedAt,
  }
}

/**
 * Create a daemon status service
 */
export function createDaemonStatusService(db: StatusDatabase): DaemonStatusService {
  const transaction = (work: () => void): void => {
    db.exec('BEGIN')
    try {
      work()
      db.exec('COMMIT')
    } catch (err) {
      db.exec('ROLLBACK')
      throw err
    }
  }

  const writePassSummary = (finishedAt: number, outcome: PassOutcome, state: DaemonState) => {
    const passes = parseIntOrNull(service.get('passes')) ?? 0
    service.set('last_pass_at', finishedAt.toString())
    service.set('last_pass_outcome', outcome)
    service.set('consecutive_failures', state.consecutiveFailures.toString())
    service.set('passes', (passes + 1).toString())
  }

  const service: DaemonStatusService = {
    get(key: string): string | null {
      return textColumn(db.get('SELECT value FROM daemon_status WHERE key = ?', [key]), 'value')
    },

    set(key: string, value: string): void {
      db.run(
        'INSERT OR REPLACE INTO daemon_status (key, value, updated_at) VALUES (?, ?, ?)',
        [key, value, Date.now()],
      )
    },

    delete(key: string): void {
      db.run('DELETE FROM daemon_status WHERE key = ?', [key])
    },

    setDaemonRunning(pid: number, startedAt = Date.now()): void {
      service.set('daemon_pid', pid.toString())
      service.set('daemon_started_at', startedAt.toString())
      service.set('daemon_status', 'running')
      service.set('consecutive_failures', '0')
      service.set('passes', '0')
    },

    setDaemonStopped(): void {
      service.delete('daemon_pid')
      service.delete('daemon_started_at')
      service.set('daemon_status', 'stopped')
    },

    recordPass(report: PassReport, state: DaemonState): void {
      const finishedAt = report.startedAt + report.durationMs

      transaction(() => {
        writePassSummary(finishedAt, report.outcome, state)
        for (const target of report.targets) {
          const row: TargetStatusRow = {
            label: target.label,
            outcome: target.outcome,
            logs_result: JSON.stringify(target.logs),
            data_result: JSON.stringify(target.data),
            synced_at: finishedAt,
          }
          db.run(
            `INSERT OR REPLACE INTO target_status (label, outcome, logs_result, data_result, synced_at)
             VALUES (?, ?, ?, ?, ?)`,
            [row.label, row.outcome, row.logs_result, row.data_result, row.synced_at],
          )
        }
      })
    },

    recordFailedPass(state: DaemonState): void {
      transaction(() => {
        writePassSummary(
          state.lastPassAt ?? Date.now(),
          state.lastPassOutcome ?? 'all-failed',
          state,
        )
      })
    },

    getDaemonInfo(): DaemonInfo {
      const outcome = service.get('last_pass_outcome')

      return {
        status: service.get('daemon_status') === 'running' ? 'running' : 'stopped',
        pid: parseIntOrNull(service.get('daemon_pid')),
        startedAt: parseIntOrNull(service.get('daemon_started_at')),
        lastPassAt: parseIntOrNull(service.get('last_pass_at')),
        lastPassOutcome: isPassOutcome(outcome) ? outcome : null,
        consecutiveFailures: parseIntOrNull(service.get('consecutive_failures')) ?? 0,
        passes: parseIntOrNull(service.get('passes')) ?? 0,
      }
    },

    getTargetStatuses(): TargetStatus[] {
      const statuses: TargetStatus[] = []
      const rows = db.all(
        `SELECT label, outcome, logs_result, data_result, synced_at
         FROM target_status
         ORDER BY label`,
      )
      for (const raw of rows) {
        const row = toTargetRow(raw)
        if (row === null || !isTargetOutcome(row.outcome)) continue
        statuses.push({
          label: row.label,
          outcome: row.outcome,
          logs: parseSyncResult(row.logs_result),
          data: parseSyncResult(row.data_result),
          syncedAt: row.synced_at,
        })
      }
      return statuses
    },
  }

  return service
}
