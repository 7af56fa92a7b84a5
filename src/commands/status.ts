/**
 * Status command - daemon state, last pass, and per-target local summaries
 *
 * Exits 1 when the daemon is not running, after printing what is known.
 */
import { existsSync } from 'node:fs'
import { defineCommand } from 'citty'
import { createPidFile } from '../daemon'
import { openStatusDb } from '../db'
import { createDaemonStatusService, type DaemonStatusService } from '../db/daemon-status'
import { collectStatus } from '../status/reporter'
import { ErrorCodes } from '../types'
import { error, getOutputFormat, setOutputFormat, success } from '../utils/output'
import { loadCliConfig } from './shared'
import { printPrettyStatus } from './status/pretty'

function openStatusService(path: string): DaemonStatusService | null {
  // A daemon that never ran has no store yet
  if (!existsSync(path)) return null
  return createDaemonStatusService(openStatusDb(path))
}

export const statusCommand = defineCommand({
  meta: {
    name: 'status',
    description: 'Show daemon status and what has been synced',
  },
  args: {
    json: {
      type: 'boolean',
      description: 'Force JSON output',
      alias: 'j',
      default: false,
    },
  },
  async run({ args }) {
    if (args.json) {
      setOutputFormat('json')
    }
    const config = loadCliConfig()
    const pidFile = createPidFile(config.pidPath)
    const statusData = await collectStatus(
      config,
      pidFile,
      openStatusService(config.statusDbPath),
    )

    const running = statusData.daemon.status === 'running'

    if (getOutputFormat() === 'json') {
      if (!running) {
        return error(ErrorCodes.DAEMON_NOT_RUNNING, 'Daemon is not running', {
          status: statusData,
        })
      }
      return success(statusData)
    }

    if (getOutputFormat() === 'pretty') {
      printPrettyStatus(statusData)
    }
    if (!running) {
      return error(ErrorCodes.DAEMON_NOT_RUNNING, 'Daemon is not running')
    }
    return success(statusData, `Daemon running (PID: ${statusData.daemon.pid})`)
  },
})
