/**
 * Tests for the CLI commands that need no running daemon
 */
import { writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { runCommand } from 'citty'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { configCommand } from '../commands/config'
import { logsCommand } from '../commands/logs'
import { statusCommand } from '../commands/status'
import { stopCommand } from '../commands/stop'
import {
  CliError,
  resetOutputFormat,
  resetOutputWriter,
  setOutputFormat,
  setOutputWriter,
} from '../utils/output'
import { createTempDir, removeTempDir } from './helpers/fakes'

const validConfig = {
  remote: { host: 'deploy@example.invalid' },
  targets: [
    {
      label: 'web',
      remoteLogRoot: '/srv/web/logs',
      remoteDataRoot: '/srv/web/data',
      localLogRoot: 'web/logs',
      localDataRoot: 'web/data',
    },
  ],
}

async function rejection(promise: Promise<unknown>): Promise<CliError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof CliError) return err
    throw err
  }
  throw new Error('expected a CliError')
}

describe('commands', () => {
  let dataDir: string
  let previousDataDir: string | undefined
  let logs: string[]
  let errors: string[]

  beforeEach(() => {
    dataDir = createTempDir()
    previousDataDir = process.env.LOGSYNC_DATA_DIR
    process.env.LOGSYNC_DATA_DIR = dataDir
    logs = []
    errors = []
    setOutputWriter({
      log: (msg) => logs.push(msg),
      error: (msg) => errors.push(msg),
    })
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    process.env.LOGSYNC_DATA_DIR = previousDataDir
    resetOutputWriter()
    resetOutputFormat()
    vi.restoreAllMocks()
    removeTempDir(dataDir)
  })

  function writeConfig(value: unknown) {
    writeFileSync(join(dataDir, 'config.json'), JSON.stringify(value))
  }

  describe('config', () => {
    it('prints the config path', async () => {
      await runCommand(configCommand, { rawArgs: ['path'] })

      expect(logs).toEqual([join(dataDir, 'config.json')])
    })

    it('shows the resolved config', async () => {
      writeConfig(validConfig)

      await runCommand(configCommand, { rawArgs: ['show'] })

      const shown = JSON.parse(logs[0] ?? '')
      expect(shown).toMatchObject({
        data_dir: dataDir,
        interval_seconds: 30,
        failure_ceiling: 10,
        cooldown_seconds: 300,
        data_excludes: ['temp_media', 'cache'],
      })
      expect(shown.targets[0].localLogRoot).toBe(join(dataDir, 'web', 'logs'))
    })

    it('fails with INVALID_CONFIG and the issues', async () => {
      writeConfig({ targets: [] })

      const err = await rejection(runCommand(configCommand, { rawArgs: ['show'] }))

      expect(err.code).toBe('INVALID_CONFIG')
      expect(err.details).toEqual({
        issues: [
          { path: 'remote.host', message: 'Remote host is required' },
          { path: 'targets', message: 'Expected a non-empty array of targets' },
        ],
      })
    })
  })

  describe('stop', () => {
    it('succeeds when nothing is running', async () => {
      writeConfig(validConfig)

      await runCommand(stopCommand, { rawArgs: [] })

      expect(logs).toEqual(['Daemon is not running'])
    })

    it('removes a stale PID file', async () => {
      writeConfig(validConfig)
      // PID numbers this large are never handed out
      writeFileSync(join(dataDir, 'daemon.pid'), '999999999')

      await runCommand(stopCommand, { rawArgs: [] })

      expect(logs).toEqual(['Daemon is not running (removed stale PID file)'])
    })

    it('rejects a bad --timeout', async () => {
      const err = await rejection(runCommand(stopCommand, { rawArgs: ['--timeout', 'soon'] }))

      expect(err.code).toBe('INVALID_ARGS')
    })
  })

  describe('status', () => {
    it('exits with DAEMON_NOT_RUNNING when stopped', async () => {
      writeConfig(validConfig)

      const err = await rejection(runCommand(statusCommand, { rawArgs: [] }))

      expect(err.code).toBe('DAEMON_NOT_RUNNING')
      expect(errors).toEqual(['Error: Daemon is not running'])
    })

    it('includes the report in the JSON error', async () => {
      writeConfig(validConfig)
      setOutputFormat('json')

      await rejection(runCommand(statusCommand, { rawArgs: [] }))

      const output = JSON.parse(errors[0] ?? '')
      expect(output.success).toBe(false)
      expect(output.error.code).toBe('DAEMON_NOT_RUNNING')
      expect(output.error.details.status.daemon.status).toBe('stopped')
      expect(output.error.details.status.targets[0].label).toBe('web')
    })
  })

  describe('logs', () => {
    it('prints a notice when there is no activity log yet', async () => {
      writeConfig(validConfig)

      await runCommand(logsCommand, { rawArgs: [] })

      expect(logs).toEqual([
        `No activity log yet at ${join(dataDir, '.sync-daemon.log')}; start the daemon first`,
      ])
    })

    it('returns the last lines as JSON without following', async () => {
      writeConfig(validConfig)
      writeFileSync(join(dataDir, '.sync-daemon.log'), 'a\nb\nc\n')
      setOutputFormat('json')

      await runCommand(logsCommand, { rawArgs: ['--lines', '2'] })

      expect(JSON.parse(logs[0] ?? '')).toEqual({
        success: true,
        data: { path: join(dataDir, '.sync-daemon.log'), lines: ['b', 'c'] },
      })
    })
  })
})
