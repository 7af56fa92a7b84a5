#!/usr/bin/env node
/**
 * logsync - Main Entry Point
 *
 * Mirrors dated log folders and data directories from a remote host,
 * in the foreground once and then from a detached background daemon.
 */
import { resolve } from 'node:path'
import { defineCommand, runMain } from 'citty'
import { configCommand } from './commands/config'
import { logsCommand } from './commands/logs'
import { restartCommand } from './commands/restart'
import { runDaemonCommand } from './commands/run-daemon'
import { RUN_DAEMON_COMMAND } from './commands/shared'
import { startCommand } from './commands/start'
import { statusCommand } from './commands/status'
import { stopCommand } from './commands/stop'
import type { OutputFormat } from './types'
import { setOutputFormat } from './utils/output'

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'pretty' || value === 'quiet'
}

const main = defineCommand({
  meta: {
    name: 'logsync',
    version: '0.1.0',
    description: 'Mirror remote log and data folders with a background daemon',
  },
  args: {
    format: {
      type: 'enum',
      alias: 'f',
      description: 'Output format: json, pretty, or quiet',
      options: ['json', 'pretty', 'quiet'],
      default: 'pretty',
    },
    verbose: {
      type: 'boolean',
      alias: 'v',
      description: 'Enable verbose output',
      default: false,
    },
    quiet: {
      type: 'boolean',
      alias: 'q',
      description: 'Minimal output (errors only)',
      default: false,
    },
    config: {
      type: 'string',
      alias: 'c',
      description: 'Path to the config file (overrides LOGSYNC_CONFIG)',
    },
  },
  setup({ args }) {
    if (isOutputFormat(args.format)) {
      setOutputFormat(args.format)
    }
    if (args.quiet) {
      setOutputFormat('quiet')
    }
    if (args.verbose) {
      process.env.VERBOSE = '1'
    }
    if (args.config) {
      process.env.LOGSYNC_CONFIG = resolve(args.config)
    }
  },
  subCommands: {
    start: startCommand,
    stop: stopCommand,
    restart: restartCommand,
    status: statusCommand,
    logs: logsCommand,
    config: configCommand,
    [RUN_DAEMON_COMMAND]: runDaemonCommand,
  },
})

runMain(main)
