import { defineCommand } from 'citty'
import { ErrorCodes } from '../types'
import { error, success } from '../utils/output'
import { createCliLogger, createCliSupervisor, loadCliConfig } from './shared'
import { parseTimeoutSeconds } from './stop'

export const restartCommand = defineCommand({
  meta: {
    name: 'restart',
    description: 'Stop the daemon if running, then start it again',
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

    const result = await supervisor.restart()
    switch (result.status) {
      case 'kill-failed':
        return error(
          ErrorCodes.DAEMON_FORCE_KILL_FAILED,
          `Failed to stop daemon (PID: ${result.pid})`,
          { pid: result.pid },
        )
      case 'already-running':
        return error(
          ErrorCodes.DAEMON_ALREADY_RUNNING,
          `Daemon already running (PID: ${result.pid})`,
          { pid: result.pid },
        )
      case 'failed':
        return error(ErrorCodes.DAEMON_START_FAILED, result.error)
      case 'started':
        return success(
          { pid: result.pid, initial_pass: result.initialPass?.outcome ?? null },
          `Daemon restarted (PID: ${result.pid})`,
        )
    }
  },
})
