/**
 * Operator-side lifecycle: start (initial pass, then detach), stop, restart
 */
import type { DaemonLauncher } from './launcher'
import { formatError, getErrorMessage, waitFor } from './daemon-utils'
import type { PidFile, ProcessTable } from './pid-file'
import {
  DEFAULT_SETTLE_MS,
  DEFAULT_STOP_GRACE_MS,
  type DaemonLogger,
  type PassReport,
} from './types'

export type StartResult =
  | { status: 'started'; pid: number; initialPass: PassReport | null; staleRemoved: boolean }
  | { status: 'already-running'; pid: number }
  | { status: 'failed'; error: string }

export type StopResult =
  | { status: 'stopped'; pid: number; forced: boolean }
  | { status: 'not-running'; staleRemoved: boolean }
  | { status: 'kill-failed'; pid: number }

export type RestartResult = StartResult | Extract<StopResult, { status: 'kill-failed' }>

export interface SupervisorDeps {
  pidFile: PidFile
  processes: ProcessTable
  logger: DaemonLogger
  launcher: DaemonLauncher
  /** The synchronous pass run before detaching */
  runInitialPass: () => Promise<PassReport>
  sleep?: (ms: number) => Promise<unknown>
}

export interface SupervisorOptions {
  /** Wait after SIGTERM before escalating to SIGKILL */
  graceMs?: number
  /** Pause between stop and start, and before checking a new daemon is alive */
  settleMs?: number
  /** Interval for polling process exit */
  pollMs?: number
}

export interface Supervisor {
  start(): Promise<StartResult>
  stop(): Promise<StopResult>
  restart(): Promise<RestartResult>
}

export function createSupervisor(
  deps: SupervisorDeps,
  options: SupervisorOptions = {},
): Supervisor {
  const { pidFile, processes, logger, launcher } = deps
  const graceMs = options.graceMs ?? DEFAULT_STOP_GRACE_MS
  const settleMs = options.settleMs ?? DEFAULT_SETTLE_MS
  const pollMs = options.pollMs ?? 100
  const sleep = deps.sleep ?? ((ms: number) => waitFor(ms))

  /** Poll until `pid` is gone or `timeoutMs` has been spent waiting */
  async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
    let waited = 0
    while (processes.exists(pid)) {
      if (waited >= timeoutMs) return false
      await sleep(pollMs)
      waited += pollMs
    }
    return true
  }

  async function start(): Promise<StartResult> {
    const running = pidFile.read()
    if (running !== null) {
      logger.error(`Daemon already running (PID: ${running})`)
      return { status: 'already-running', pid: running }
    }

    const staleRemoved = pidFile.exists()
    if (staleRemoved) {
      logger.info(`Removing stale PID file (PID: ${pidFile.recorded() ?? 'unreadable'})`)
      pidFile.release()
    }

    logger.info('Performing initial sync...')
    let initialPass: PassReport | null = null
    try {
      initialPass = await deps.runInitialPass()
    } catch (err) {
      logger.error(`Initial sync failed, continuing: ${formatError(err)}`)
    }

    let pid: number
    try {
      pid = launcher.launch()
      pidFile.acquire(pid)
    } catch (err) {
      logger.error(`Failed to start daemon: ${formatError(err)}`)
      return { status: 'failed', error: getErrorMessage(err) }
    }

    await sleep(settleMs)
    if (!processes.exists(pid)) {
      pidFile.release()
      logger.error(`Daemon (PID: ${pid}) exited during startup`)
      return {
        status: 'failed',
        error: `Daemon exited during startup (PID ${pid}); see the activity log`,
      }
    }

    logger.info(`Daemon started (PID: ${pid})`)
    return { status: 'started', pid, initialPass, staleRemoved }
  }

  async function stop(): Promise<StopResult> {
    const pid = pidFile.read()
    if (pid === null) {
      const staleRemoved = pidFile.exists()
      pidFile.release()
      return { status: 'not-running', staleRemoved }
    }

    logger.info(`Stopping daemon (PID: ${pid})...`)
    processes.kill(pid, 'SIGTERM')

    let forced = false
    if (!(await waitForExit(pid, graceMs))) {
      logger.warn(
        `Daemon (PID: ${pid}) did not exit within ${graceMs}ms, sending SIGKILL`,
      )
      forced = true
      processes.kill(pid, 'SIGKILL')
      if (!(await waitForExit(pid, graceMs))) {
        logger.error(`Failed to kill daemon (PID: ${pid})`)
        return { status: 'kill-failed', pid }
      }
    }

    pidFile.release()
    logger.info('Daemon stopped')
    return { status: 'stopped', pid, forced }
  }

  return {
    start,
    stop,
    async restart(): Promise<RestartResult> {
      const stopped = await stop()
      if (stopped.status === 'kill-failed') {
        return stopped
      }
      await sleep(settleMs)
      return start()
    },
  }
}
