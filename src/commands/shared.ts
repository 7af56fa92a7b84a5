/**
 * Helpers shared by the lifecycle commands
 */
import { ConfigError, loadConfig, type ResolvedConfig } from '../config'
import {
  createDetachedLauncher,
  createLogger,
  createOrchestratorForConfig,
  createPidFile,
  createSupervisor,
  type Supervisor,
  systemProcesses,
} from '../daemon'
import type { DaemonLogger, DaemonVerbosity } from '../daemon/types'
import { ErrorCodes } from '../types'
import { error, getOutputFormat } from '../utils/output'

/** Internal subcommand that enters the long-running loop */
export const RUN_DAEMON_COMMAND = 'run-daemon'

export function getVerbosity(): DaemonVerbosity {
  if (getOutputFormat() === 'quiet') return 'quiet'
  return process.env.VERBOSE === '1' ? 'verbose' : 'normal'
}

/**
 * Load the config or exit with INVALID_CONFIG
 */
export function loadCliConfig(): ResolvedConfig {
  try {
    return loadConfig()
  } catch (err) {
    if (err instanceof ConfigError) {
      return error(ErrorCodes.INVALID_CONFIG, err.message, { issues: err.issues })
    }
    throw err
  }
}

/**
 * Logger for operator commands: console in pretty mode, always the activity log
 */
export function createCliLogger(config: ResolvedConfig): DaemonLogger {
  return createLogger(getVerbosity(), {
    console: getOutputFormat() === 'pretty',
    logPath: config.logPath,
  })
}

export function createCliSupervisor(
  config: ResolvedConfig,
  logger: DaemonLogger,
  options: { graceMs?: number } = {},
): Supervisor {
  const entry = process.argv[1]
  if (!entry) {
    throw new Error('Cannot determine the CLI entry script to launch the daemon')
  }

  const orchestrator = createOrchestratorForConfig(config, logger)
  const launcher = createDetachedLauncher({
    entry,
    args: [RUN_DAEMON_COMMAND],
    env: {
      ...process.env,
      LOGSYNC_DATA_DIR: config.dataDir,
      LOGSYNC_CONFIG: config.configPath,
      ...(process.env.VERBOSE === '1' ? { VERBOSE: '1' } : {}),
    },
  })

  return createSupervisor(
    {
      pidFile: createPidFile(config.pidPath),
      processes: systemProcesses,
      logger,
      launcher,
      runInitialPass: () => orchestrator.runPass(config.targets, new Date()),
    },
    options,
  )
}
