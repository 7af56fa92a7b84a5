/**
 * Stop command - SIGTERM, then SIGKILL after the grace period
 */
import { defineCommand } from 'citty'
import { ErrorCodes } from '../types'
import { error, success } from '../utils/output'
import { createCliLogger, createCliSupervisor, loadCliConfig } from './shared'

/**
 * Parse the --timeout argument (seconds) into milliseconds
 */
export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value)
  if (!Number.isFinite(seconds) || seconds < 0) {
    return error(
      ErrorCodes.INVALID_ARGS,
      `Invalid --timeout: "${value}" (expected a number of seconds)`,
    )
  }
  return Math.round(seconds * 1000)
}

export const stopCommand = defineCommand({
  meta: {
    name: 'stop',
    description: 'Stop the running daemon',
  },
  args: {
    timeout: {
      type: 'string',
      description: 'Seconds to wait for graceful shutdown before SIGKILL',
      default: '2',
    },
  },
  async run({ args }) {
    const graceMs = parseTimeoutSeconds(args.timeout)
    const config = loadCliConfig()
    const logger = createCliLogger(config)
    const supervisor = createCliSupervisor(config, logger, { graceMs })

    const result = await supervisor.stop()
    switch (result.status) {
      case 'not-running':
        return success(
          { status: 'not-running', stale_pid_removed: result.staleRemoved },
          result.staleRemoved
            ? 'Daemon is not running (removed stale PID file)'
            : 'Daemon is not running',
        )
      case 'kill-failed':
        return error(
          ErrorCodes.DAEMON_FORCE_KILL_FAILED,
          `Failed to stop daemon (PID: ${result.pid})`,
          { pid: result.pid },
        )
      case 'stopped':
        return success(
          { status: 'stopped', pid: result.pid, forced: result.forced },
          result.forced
            ? `Daemon (PID: ${result.pid}) killed after ${args.timeout}s`
            : `Daemon (PID: ${result.pid}) stopped`,
        )
    }
  },
})
