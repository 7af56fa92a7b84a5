/**
 * Main daemon implementation
 * Owns the PID file, runs the sync loop until a termination signal arrives
 */
import type { ResolvedConfig } from '../config'
import { openStatusDb } from '../db'
import { createDaemonStatusService, type DaemonStatusService } from '../db/daemon-status'
import { createRsyncClient } from '../transfer/rsync-client'
import type { RemoteCopyClient } from '../transfer/types'
import { createDaemonRuntime, type DaemonContext } from './daemon-context'
import { createLogger } from './daemon-logger'
import { mainLoop } from './daemon-loop'
import { formatError } from './daemon-utils'
import { createPidFile, type ProcessTable, systemProcesses } from './pid-file'
import { createRetryPolicy } from './retry-policy'
import { createSyncOrchestrator } from './sync-orchestrator'
import {
  DaemonExitCode,
  type DaemonLogger,
  type DaemonState,
  type DaemonVerbosity,
} from './types'

/**
 * Daemon interface
 */
export interface Daemon {
  /** Run the loop until shutdown is requested */
  run(): Promise<DaemonExitCode>
  /** Request graceful shutdown */
  stop(): void
  /** Snapshot of the current state */
  getState(): DaemonState
}

export interface DaemonDeps {
  logger?: DaemonLogger
  client?: RemoteCopyClient
  processes?: ProcessTable
  /** Status store; defaults to the SQLite file from the config, null disables it */
  statusService?: DaemonStatusService | null
  today?: () => Date
  /** Install SIGTERM/SIGINT handlers (default true) */
  handleSignals?: boolean
}

export function createRemoteClient(config: ResolvedConfig): RemoteCopyClient {
  return createRsyncClient({
    remote: config.remote,
    transferTimeoutMs: config.transferTimeoutMs,
  })
}

export function createOrchestratorForConfig(
  config: ResolvedConfig,
  logger: DaemonLogger,
  client: RemoteCopyClient = createRemoteClient(config),
) {
  return createSyncOrchestrator({
    client,
    logger,
    recentDays: config.recentDays,
    logExcludes: config.logExcludes,
    dataExcludes: config.dataExcludes,
    concurrency: config.concurrency,
  })
}

function openStatusService(
  config: ResolvedConfig,
  logger: DaemonLogger,
): DaemonStatusService | null {
  try {
    return createDaemonStatusService(openStatusDb(config.statusDbPath))
  } catch (err) {
    logger.warn(`Status store unavailable, continuing without it: ${formatError(err)}`)
    return null
  }
}

function createContext(
  config: ResolvedConfig,
  deps: DaemonDeps,
  verbosity: DaemonVerbosity,
): DaemonContext {
  const logger =
    deps.logger ?? createLogger(verbosity, { console: false, logPath: config.logPath })
  const statusService =
    deps.statusService === undefined
      ? openStatusService(config, logger)
      : deps.statusService

  return {
    targets: config.targets,
    logger,
    pidFile: createPidFile(config.pidPath, deps.processes ?? systemProcesses),
    orchestrator: createOrchestratorForConfig(config, logger, deps.client),
    retry: createRetryPolicy(config.retry, logger),
    state: {
      running: false,
      pid: process.pid,
      startedAt: Date.now(),
      consecutiveFailures: 0,
      lastPassOutcome: null,
      lastPassAt: null,
    },
    runtime: createDaemonRuntime(statusService),
    today: deps.today ?? (() => new Date()),
  }
}

function setupSignalHandlers(ctx: DaemonContext): void {
  if (ctx.runtime.signalHandlers.length > 0) return

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    const handler = () => {
      ctx.logger.info(`Received ${signal}, initiating graceful shutdown...`)
      ctx.runtime.shutdown.abort()
    }
    process.on(signal, handler)
    ctx.runtime.signalHandlers.push({ signal, handler })
  }
}

function removeSignalHandlers(ctx: DaemonContext): void {
  for (const { signal, handler } of ctx.runtime.signalHandlers) {
    process.off(signal, handler)
  }
  ctx.runtime.signalHandlers = []
}

function performCleanup(ctx: DaemonContext): void {
  try {
    ctx.runtime.statusService?.setDaemonStopped()
  } catch (err) {
    ctx.logger.warn(`Failed to update daemon status on shutdown: ${formatError(err)}`)
  }

  ctx.pidFile.release()
  ctx.state.running = false
  removeSignalHandlers(ctx)
}

async function runDaemon(
  ctx: DaemonContext,
  handleSignals: boolean,
): Promise<DaemonExitCode> {
  try {
    ctx.pidFile.acquire(ctx.state.pid)
    ctx.logger.debug(`PID file acquired: ${ctx.pidFile.getPath()}`)
  } catch (err) {
    ctx.logger.error(`Failed to acquire PID file: ${formatError(err)}`)
    return DaemonExitCode.Error
  }

  if (handleSignals) {
    setupSignalHandlers(ctx)
  }

  ctx.state.running = true
  ctx.state.startedAt = Date.now()
  try {
    ctx.runtime.statusService?.setDaemonRunning(ctx.state.pid, ctx.state.startedAt)
  } catch (err) {
    ctx.logger.warn(`Failed to update daemon status: ${formatError(err)}`)
  }

  ctx.logger.info(
    `Daemon started (PID: ${ctx.state.pid}, ${ctx.targets.length} target(s))`,
  )

  try {
    await mainLoop(ctx)
  } catch (err) {
    ctx.logger.error(`Main loop error: ${formatError(err)}`)
  }

  ctx.logger.info('Daemon stopped')
  performCleanup(ctx)
  return DaemonExitCode.Success
}

/**
 * Create daemon instance
 */
export function createDaemon(
  config: ResolvedConfig,
  deps: DaemonDeps = {},
  verbosity: DaemonVerbosity = 'normal',
): Daemon {
  const ctx = createContext(config, deps, verbosity)

  return {
    async run(): Promise<DaemonExitCode> {
      return runDaemon(ctx, deps.handleSignals ?? true)
    },
    stop(): void {
      ctx.runtime.shutdown.abort()
    },
    getState(): DaemonState {
      return { ...ctx.state }
    },
  }
}
