/**
 * Print status in a pretty, colored format
 */
import { describeResult } from '../../daemon/outcome'
import type { SyncResult } from '../../daemon/types'
import type { StatusReport, TargetStatusReport } from '../../status/reporter'
import { formatBytes, formatDuration, formatRelativeTime } from '../../utils/time'
import {
  c,
  icons,
  passOutcomeBadge,
  printHeader,
  printRow,
  targetOutcomeBadge,
} from './formatters'

function formatResult(result: SyncResult | null): string {
  if (result === null) return c.dim('-')
  const text = describeResult(result)
  switch (result.status) {
    case 'success':
      return c.green(text)
    case 'skipped':
      return c.dim(text)
    case 'failed':
      return c.red(text)
  }
}

function printDaemonSection(status: StatusReport): void {
  printHeader('Daemon')
  const { daemon } = status

  const running = daemon.status === 'running'
  const daemonIcon = running ? icons.running : icons.stopped
  const daemonColor = running ? c.success : c.error
  printRow('Status', daemonColor(`${daemonIcon} ${daemon.status.toUpperCase()}`))

  if (daemon.pid) {
    printRow('PID', c.number(daemon.pid))
  }
  if (daemon.staleRemoved) {
    printRow('PID file', c.yellow('stale PID file removed'))
  }
  if (daemon.uptime_seconds !== null) {
    printRow('Uptime', c.value(formatDuration(daemon.uptime_seconds * 1000)))
  }

  printRow('Interval', c.value(formatDuration(daemon.interval_seconds * 1000)))
  printRow(
    'Cooldown',
    `${c.value(formatDuration(daemon.cooldown_seconds * 1000))} ${c.dim(`after ${daemon.failure_ceiling} failed passes`)}`,
  )
  printRow('Last Pass', passOutcomeBadge(daemon.last_pass_outcome))

  if (daemon.last_pass_at) {
    printRow('Last Pass At', c.dim(formatRelativeTime(new Date(daemon.last_pass_at).getTime())))
  }
  if (daemon.consecutive_failures > 0) {
    printRow('Failed Passes', c.warning(String(daemon.consecutive_failures)))
  }
}

function printTargetSection(target: TargetStatusReport): void {
  printHeader(target.label)
  printRow('Last Result', targetOutcomeBadge(target.lastOutcome))
  if (target.lastSyncedAt) {
    printRow('Synced', c.dim(formatRelativeTime(new Date(target.lastSyncedAt).getTime())))
  }
  printRow('Logs', formatResult(target.logs))
  printRow('Data', formatResult(target.data))

  printRow('Log Dir', c.value(target.localLogRoot))
  if (target.recentLogFolders.length === 0) {
    printRow('', c.dim('(no dated log folders yet)'))
  }
  for (const folder of target.recentLogFolders) {
    printRow(
      '',
      `${c.value(`${folder.name}/`)} ${c.dim(`(${folder.logFiles} logs, ${formatBytes(folder.bytes)})`)}`,
    )
  }

  printRow('Data Dir', c.value(target.localDataRoot))
  if (target.localData.exists) {
    printRow(
      '',
      c.dim(
        `${target.localData.files} files, ${target.localData.jsonFiles} JSON, ${formatBytes(target.localData.bytes)}`,
      ),
    )
  } else {
    printRow('', c.dim('(not synced yet)'))
  }
}

export function printPrettyStatus(status: StatusReport): void {
  console.log()
  console.log(c.bold('  Log Sync Status'))
  console.log(c.dim(`  ${status.timestamp}`))

  printDaemonSection(status)
  for (const target of status.targets) {
    printTargetSection(target)
  }

  console.log()
  console.log(c.dim(`  Activity log: ${status.activity_log}`))
  console.log()
}
