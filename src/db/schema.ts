/**
 * Status store schema
 *
 * Tables:
 * - daemon_status: Daemon status key-value store
 * - target_status: Last pass result per target label
 */
import type { StatusDatabase } from './index'

export function initStatusSchema(db: StatusDatabase): void {
  // Daemon status table - key-value store for daemon state
  db.exec(`
    CREATE TABLE IF NOT EXISTS daemon_status (
      key         TEXT PRIMARY KEY,
      value       TEXT,
      updated_at  INTEGER NOT NULL DEFAULT (strftime('%s', 'now') * 1000)
    )
  `)

  // One row per target, overwritten after every pass
  db.exec(`
    CREATE TABLE IF NOT EXISTS target_status (
      label        TEXT PRIMARY KEY,
      outcome      TEXT NOT NULL,
      logs_result  TEXT NOT NULL,
      data_result  TEXT NOT NULL,
      synced_at    INTEGER NOT NULL
    )
  `)
}

/** target_status row */
export interface TargetStatusRow {
  label: string
  outcome: string
  logs_result: string
  data_result: string
  synced_at: number
}
