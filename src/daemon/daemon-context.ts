import type { DaemonStatusService } from '../db/daemon-status'
import type { PidFile } from './pid-file'
import type { RetryPolicy } from './retry-policy'
import type { SyncOrchestrator } from './sync-orchestrator'
import type { DaemonLogger, DaemonState, TargetDescriptor } from './types'

export interface DaemonRuntime {
  /** Aborted on SIGTERM/SIGINT or `stop()`; cuts the inter-pass wait short */
  shutdown: AbortController
  signalHandlers: Array<{ signal: NodeJS.Signals; handler: () => void }>
  statusService: DaemonStatusService | null
}

export interface DaemonContext {
  targets: readonly TargetDescriptor[]
  logger: DaemonLogger
  pidFile: PidFile
  orchestrator: SyncOrchestrator
  retry: RetryPolicy
  state: DaemonState
  runtime: DaemonRuntime
  /** Clock for the log recency window */
  today: () => Date
}

export function createDaemonRuntime(
  statusService: DaemonStatusService | null = null,
): DaemonRuntime {
  return {
    shutdown: new AbortController(),
    signalHandlers: [],
    statusService,
  }
}
