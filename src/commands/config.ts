import { defineCommand } from 'citty'

import { getConfigPath } from '../config'
import { success } from '../utils/output'
import { loadCliConfig } from './shared'

export const configPathCommand = defineCommand({
  meta: {
    name: 'path',
    description: 'Show the config file path',
  },
  async run() {
    const path = getConfigPath()
    success({ path }, path)
  },
})

export const configShowCommand = defineCommand({
  meta: {
    name: 'show',
    description: 'Validate the config file and print the resolved settings',
  },
  async run() {
    const config = loadCliConfig()
    success({
      config_path: config.configPath,
      data_dir: config.dataDir,
      pid_file: config.pidPath,
      activity_log: config.logPath,
      status_db: config.statusDbPath,
      remote: config.remote,
      interval_seconds: config.retry.intervalMs / 1000,
      failure_ceiling: config.retry.failureCeiling,
      cooldown_seconds: config.retry.cooldownMs / 1000,
      transfer_timeout_seconds: config.transferTimeoutMs / 1000,
      concurrency: config.concurrency,
      recent_days: config.recentDays,
      log_excludes: config.logExcludes,
      data_excludes: config.dataExcludes,
      targets: config.targets,
    })
  },
})

export const configCommand = defineCommand({
  meta: {
    name: 'config',
    description: 'Inspect configuration',
  },
  subCommands: {
    path: configPathCommand,
    show: configShowCommand,
  },
})
