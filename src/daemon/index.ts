/**
 * Daemon module - long-running process that mirrors remote log and data folders
 *
 * Key principles:
 * - One-way: remote trees are mirrored locally, never written to
 * - Singleton: the PID file admits one live instance per data directory
 * - Resilient: unreachable targets are outcomes, not crashes
 */

export {
  createDaemon,
  createOrchestratorForConfig,
  type Daemon,
} from './daemon'
export { createLogger } from './daemon-logger'
export { createDetachedLauncher, type DaemonLauncher } from './launcher'
export {
  createPidFile,
  type PidFile,
  PidFileError,
  type ProcessTable,
  systemProcesses,
} from './pid-file'
export {
  createSupervisor,
  type RestartResult,
  type StartResult,
  type StopResult,
  type Supervisor,
} from './supervisor'
export {
  DaemonExitCode,
  type DaemonState,
  type PassOutcome,
  type PassReport,
  type TargetDescriptor,
  type TargetOutcome,
} from './types'
