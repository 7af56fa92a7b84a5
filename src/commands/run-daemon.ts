/**
 * Internal entry for the detached daemon process
 *
 * Started by `start`; stdio is ignored, so everything goes to the activity log.
 */
import { join } from 'node:path'
import { defineCommand } from 'citty'
import { ConfigError, loadConfig, type ResolvedConfig, resolveDataDir } from '../config'
import { createDaemon, createLogger, DaemonExitCode } from '../daemon'
import { ACTIVITY_LOG_NAME } from '../daemon/types'
import { getVerbosity, RUN_DAEMON_COMMAND } from './shared'

function loadDaemonConfig(): ResolvedConfig {
  try {
    return loadConfig()
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err
    const logger = createLogger('normal', {
      console: false,
      logPath: join(resolveDataDir(), ACTIVITY_LOG_NAME),
    })
    logger.error(`Daemon cannot start: ${err.message}`)
    for (const issue of err.issues) {
      logger.error(`  ${issue.path}: ${issue.message}`)
    }
    return process.exit(DaemonExitCode.Error)
  }
}

export const runDaemonCommand = defineCommand({
  meta: {
    name: RUN_DAEMON_COMMAND,
    description: 'Run the sync loop in this process (used internally by start)',
  },
  async run() {
    const config = loadDaemonConfig()
    const daemon = createDaemon(config, {}, getVerbosity())
    const exitCode = await daemon.run()
    process.exit(exitCode)
  },
})
