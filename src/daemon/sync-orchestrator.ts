/**
 * One synchronization pass over every configured target
 */
import { mkdir } from 'node:fs/promises'
import { join, posix } from 'node:path'
import type { RemoteCopyClient } from '../transfer/types'
import { DAY, formatDateFolder, formatDuration } from '../utils/time'
import { getErrorMessage, mapWithConcurrency } from './daemon-utils'
import {
  aggregatePass,
  classifyTarget,
  countOutcomes,
  formatPassOutcome,
  formatTargetLine,
} from './outcome'
import {
  ACTIVITY_LOG_NAME,
  type DaemonLogger,
  type PassReport,
  type SyncResult,
  type TargetDescriptor,
  type TargetReport,
} from './types'

export const NO_REMOTE_DATA_ROOT = 'no remote data root'

export interface SyncOrchestratorOptions {
  client: RemoteCopyClient
  logger: DaemonLogger
  /** Number of dated log folders to mirror, counting back from today */
  recentDays: number
  logExcludes: readonly string[]
  dataExcludes: readonly string[]
  /** Targets synced at the same time */
  concurrency: number
}

export interface SyncOrchestrator {
  runPass(targets: readonly TargetDescriptor[], today: Date): Promise<PassReport>
}

/**
 * Dated folder names for the recency window, newest first
 */
export function recentDateFolders(today: Date, days: number): string[] {
  const folders: string[] = []
  for (let offset = 0; offset < days; offset++) {
    // Noon avoids DST shifts moving the date
    const date = new Date(
      today.getFullYear(),
      today.getMonth(),
      today.getDate(),
      12,
    )
    date.setTime(date.getTime() - offset * DAY)
    folders.push(formatDateFolder(date))
  }
  return folders
}

export function createSyncOrchestrator(
  options: SyncOrchestratorOptions,
): SyncOrchestrator {
  const { client, logger } = options
  const logExcludes = options.logExcludes.includes(ACTIVITY_LOG_NAME)
    ? [...options.logExcludes]
    : [...options.logExcludes, ACTIVITY_LOG_NAME]

  async function syncLogs(target: TargetDescriptor, today: Date): Promise<SyncResult> {
    const errors: string[] = []

    for (const folder of recentDateFolders(today, options.recentDays)) {
      const remotePath = posix.join(target.remoteLogRoot, folder)
      const probe = await client.exists(remotePath)

      if (probe.status === 'absent') {
        logger.debug(`[${target.label}] No remote log folder ${folder} yet`)
        continue
      }
      if (probe.status === 'error') {
        errors.push(probe.error)
        continue
      }

      const localPath = join(target.localLogRoot, folder)
      await mkdir(localPath, { recursive: true })
      const result = await client.mirror({
        remotePath,
        localPath,
        excludes: logExcludes,
        deleteExtraneous: true,
      })
      if (!result.ok) {
        errors.push(result.error)
      }
    }

    if (errors.length > 0) {
      return { status: 'failed', error: errors.join('; ') }
    }
    return { status: 'success' }
  }

  async function syncData(target: TargetDescriptor): Promise<SyncResult> {
    const probe = await client.exists(target.remoteDataRoot)

    if (probe.status === 'absent') {
      logger.info(
        `[${target.label}] Remote data root ${target.remoteDataRoot} does not exist, skipping data sync`,
      )
      return { status: 'skipped', reason: NO_REMOTE_DATA_ROOT }
    }
    if (probe.status === 'error') {
      return { status: 'failed', error: probe.error }
    }

    await mkdir(target.localDataRoot, { recursive: true })
    const result = await client.mirror({
      remotePath: target.remoteDataRoot,
      localPath: target.localDataRoot,
      excludes: options.dataExcludes,
    })
    return result.ok ? { status: 'success' } : { status: 'failed', error: result.error }
  }

  async function guarded(
    target: TargetDescriptor,
    subtree: 'logs' | 'data',
    task: () => Promise<SyncResult>,
  ): Promise<SyncResult> {
    try {
      return await task()
    } catch (err) {
      const message = getErrorMessage(err)
      logger.error(`[${target.label}] Unexpected error during ${subtree} sync: ${message}`)
      return { status: 'failed', error: message }
    }
  }

  async function runTarget(target: TargetDescriptor, today: Date): Promise<TargetReport> {
    const logs = await guarded(target, 'logs', () => syncLogs(target, today))
    const data = await guarded(target, 'data', () => syncData(target))
    const report: TargetReport = {
      label: target.label,
      logs,
      data,
      outcome: classifyTarget(logs, data),
    }

    const line = formatTargetLine(report)
    if (report.outcome === 'ok') {
      logger.info(line)
    } else {
      logger.warn(line)
      for (const [subtree, result] of [['logs', logs], ['data', data]] as const) {
        if (result.status === 'failed') {
          logger.debug(`[${target.label}] ${subtree}: ${result.error}`)
        }
      }
    }
    return report
  }

  return {
    async runPass(targets, today) {
      const startedAt = Date.now()
      const reports = await mapWithConcurrency(
        targets,
        options.concurrency,
        (target) => runTarget(target, today),
      )
      const outcome = aggregatePass(reports.map((r) => r.outcome))
      const durationMs = Date.now() - startedAt

      const counts = countOutcomes(reports)
      const summary = `Pass complete: ${formatPassOutcome(outcome)} (${counts.ok} ok, ${counts.partial} partial, ${counts.failed} failed) in ${formatDuration(durationMs)}`
      if (outcome === 'all-ok') {
        logger.info(summary)
      } else {
        logger.warn(summary)
      }

      return { outcome, targets: reports, startedAt, durationMs }
    },
  }
}
