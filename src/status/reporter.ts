/**
 * Structured answer to "is it running and what has it synced"
 */
import type { Dirent } from 'node:fs'
import { readdir, stat } from 'node:fs/promises'
import { join } from 'node:path'
import type { ResolvedConfig } from '../config'
import { isErrnoException } from '../daemon/daemon-utils'
import type { PidFile } from '../daemon/pid-file'
import type { PassOutcome, SyncResult, TargetOutcome } from '../daemon/types'
import type { DaemonStatusService, TargetStatus } from '../db/daemon-status'

const DATE_FOLDER_PATTERN = /^\d{4}-\d{2}-\d{2}$/
const RECENT_FOLDER_LIMIT = 5

export interface LogFolderSummary {
  name: string
  logFiles: number
  bytes: number
}

export interface DirectorySummary {
  exists: boolean
  files: number
  jsonFiles: number
  bytes: number
}

export interface TargetStatusReport {
  label: string
  lastOutcome: TargetOutcome | null
  lastSyncedAt: string | null
  logs: SyncResult | null
  data: SyncResult | null
  localLogRoot: string
  recentLogFolders: LogFolderSummary[]
  localDataRoot: string
  localData: DirectorySummary
}

export interface StatusReport {
  daemon: {
    status: 'running' | 'stopped'
    pid: number | null
    staleRemoved: boolean
    uptime_seconds: number | null
    started_at: string | null
    interval_seconds: number
    failure_ceiling: number
    cooldown_seconds: number
    last_pass_outcome: PassOutcome | null
    last_pass_at: string | null
    consecutive_failures: number
    passes: number
  }
  targets: TargetStatusReport[]
  activity_log: string
  timestamp: string
}

async function readEntries(dir: string): Promise<Dirent[] | null> {
  try {
    return await readdir(dir, { withFileTypes: true })
  } catch {
    return null
  }
}

/** Size of a file, or null when it vanished after being listed (rsync temp files do) */
async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null
    throw err
  }
}

/**
 * Count files and bytes under `dir`, recursively
 */
export async function summarizeDirectory(dir: string): Promise<DirectorySummary> {
  const entries = await readEntries(dir)
  if (entries === null) {
    return { exists: false, files: 0, jsonFiles: 0, bytes: 0 }
  }

  const summary: DirectorySummary = { exists: true, files: 0, jsonFiles: 0, bytes: 0 }
  for (const entry of entries) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      const nested = await summarizeDirectory(path)
      summary.files += nested.files
      summary.jsonFiles += nested.jsonFiles
      summary.bytes += nested.bytes
    } else if (entry.isFile()) {
      const size = await fileSize(path)
      if (size === null) continue
      summary.files++
      if (entry.name.endsWith('.json')) summary.jsonFiles++
      summary.bytes += size
    }
  }
  return summary
}

/**
 * The most recent dated log folders under `root`, oldest first
 */
export async function recentLogFolders(
  root: string,
  limit = RECENT_FOLDER_LIMIT,
): Promise<LogFolderSummary[]> {
  const entries = await readEntries(root)
  if (entries === null) return []

  const names = entries
    .filter((e) => e.isDirectory() && DATE_FOLDER_PATTERN.test(e.name))
    .map((e) => e.name)
    .sort()
    .slice(-limit)

  const folders: LogFolderSummary[] = []
  for (const name of names) {
    const dir = join(root, name)
    const files = (await readEntries(dir)) ?? []
    let logFiles = 0
    for (const file of files) {
      if (file.isFile() && file.name.endsWith('.log')) logFiles++
    }
    const { bytes } = await summarizeDirectory(dir)
    folders.push({ name, logFiles, bytes })
  }
  return folders
}

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString()
}

/**
 * Collect all status information.
 * A PID file naming a dead process is removed along the way.
 */
export async function collectStatus(
  config: ResolvedConfig,
  pidFile: PidFile,
  statusService: DaemonStatusService | null,
  now = Date.now(),
): Promise<StatusReport> {
  const pid = pidFile.read()
  const isRunning = pid !== null

  const staleRemoved = !isRunning && pidFile.exists()
  if (staleRemoved) {
    pidFile.release()
  }

  const info = statusService?.getDaemonInfo() ?? null
  const stored = new Map<string, TargetStatus>()
  for (const target of statusService?.getTargetStatuses() ?? []) {
    stored.set(target.label, target)
  }

  const startedAt = isRunning ? (info?.startedAt ?? null) : null

  const targets: TargetStatusReport[] = []
  for (const target of config.targets) {
    const last = stored.get(target.label)
    targets.push({
      label: target.label,
      lastOutcome: last?.outcome ?? null,
      lastSyncedAt: toIso(last?.syncedAt ?? null),
      logs: last?.logs ?? null,
      data: last?.data ?? null,
      localLogRoot: target.localLogRoot,
      recentLogFolders: await recentLogFolders(target.localLogRoot),
      localDataRoot: target.localDataRoot,
      localData: await summarizeDirectory(target.localDataRoot),
    })
  }

  return {
    daemon: {
      status: isRunning ? 'running' : 'stopped',
      pid,
      staleRemoved,
      uptime_seconds: startedAt === null ? null : Math.floor((now - startedAt) / 1000),
      started_at: toIso(startedAt),
      interval_seconds: Math.round(config.retry.intervalMs / 1000),
      failure_ceiling: config.retry.failureCeiling,
      cooldown_seconds: Math.round(config.retry.cooldownMs / 1000),
      last_pass_outcome: info?.lastPassOutcome ?? null,
      last_pass_at: toIso(info?.lastPassAt ?? null),
      consecutive_failures: info?.consecutiveFailures ?? 0,
      passes: info?.passes ?? 0,
    },
    targets,
    activity_log: config.logPath,
    timestamp: new Date(now).toISOString(),
  }
}
