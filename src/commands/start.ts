/**
 * Start command - run one pass in the foreground, then detach the daemon
 */
import { defineCommand } from 'citty'
import { formatPassOutcome } from '../daemon/outcome'
import { ErrorCodes } from '../types'
import { error, success } from '../utils/output'
import { createCliLogger, createCliSupervisor, loadCliConfig } from './shared'

export const startCommand = defineCommand({
  meta: {
    name: 'start',
    description: 'Run an initial sync pass, then start the background daemon',
  },
  args: {},
  async run() {
    const config = loadCliConfig()
    const logger = createCliLogger(config)
    const supervisor = createCliSupervisor(config, logger)

    const result = await supervisor.start()
    switch (result.status) {
      case 'already-running':
        return error(
          ErrorCodes.DAEMON_ALREADY_RUNNING,
          `Daemon already running (PID: ${result.pid})`,
          { pid: result.pid },
        )
      case 'failed':
        return error(ErrorCodes.DAEMON_START_FAILED, result.error)
      case 'started': {
        const initial = result.initialPass
        return success(
          {
            pid: result.pid,
            stale_pid_removed: result.staleRemoved,
            initial_pass: initial
              ? {
                  outcome: initial.outcome,
                  duration_ms: initial.durationMs,
                  targets: initial.targets,
                }
              : null,
            activity_log: config.logPath,
          },
          `Daemon started (PID: ${result.pid})` +
            (initial ? `, initial pass: ${formatPassOutcome(initial.outcome)}` : ''),
        )
      }
    }
  },
})
