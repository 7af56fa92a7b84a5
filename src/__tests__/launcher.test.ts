/**
 * Tests for the detached launcher and the command runner, with spawn mocked out
 */
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const { spawn } = vi.hoisted(() => ({ spawn: vi.fn() }))

vi.mock('node:child_process', () => ({ spawn }))

import { createDetachedLauncher } from '../daemon/launcher'
import { KILL_GRACE_MS, spawnCommand } from '../transfer/command-runner'

class FakeChild extends EventEmitter {
  pid: number | undefined = 7001
  stderr = new PassThrough()
  unref = vi.fn()
  kill = vi.fn((signal: NodeJS.Signals) => {
    this.emit('close', null, signal)
    return true
  })
}

beforeEach(() => {
  spawn.mockReset()
})

afterEach(() => {
  vi.useRealTimers()
  vi.restoreAllMocks()
})

describe('createDetachedLauncher', () => {
  it('re-runs the entry script detached and returns the child PID', () => {
    const child = new FakeChild()
    spawn.mockReturnValue(child)
    const env = { LOGSYNC_DATA_DIR: '/var/lib/logsync' }

    const pid = createDetachedLauncher({
      entry: '/opt/logsync/dist/src/index.js',
      args: ['run-daemon'],
      env,
    }).launch()

    expect(pid).toBe(7001)
    expect(spawn).toHaveBeenCalledWith(
      process.execPath,
      [...process.execArgv, '/opt/logsync/dist/src/index.js', 'run-daemon'],
      { detached: true, stdio: 'ignore', env },
    )
    expect(child.unref).toHaveBeenCalledTimes(1)
  })

  it('throws when no PID was assigned', () => {
    const child = new FakeChild()
    child.pid = undefined
    spawn.mockReturnValue(child)

    expect(() =>
      createDetachedLauncher({ entry: 'index.js', args: ['run-daemon'] }).launch(),
    ).toThrow('Failed to spawn daemon process')
  })
})

describe('spawnCommand', () => {
  it('resolves with the exit code and trimmed stderr', async () => {
    const child = new FakeChild()
    spawn.mockReturnValue(child)

    const result = spawnCommand('rsync', ['-az'], { timeoutMs: 1000 })
    child.stderr.emit('data', Buffer.from('warning: something\n'))
    child.emit('close', 23)

    await expect(result).resolves.toEqual({
      exitCode: 23,
      stderr: 'warning: something',
      timedOut: false,
    })
    expect(spawn).toHaveBeenCalledWith('rsync', ['-az'], {
      stdio: ['ignore', 'ignore', 'pipe'],
      detached: true,
    })
  })

  it('reports a spawn failure', async () => {
    const child = new FakeChild()
    spawn.mockReturnValue(child)

    const result = spawnCommand('rsync', [], { timeoutMs: 1000 })
    child.emit('error', new Error('spawn rsync ENOENT'))

    await expect(result).resolves.toEqual({
      exitCode: null,
      stderr: '',
      timedOut: false,
      spawnError: 'spawn rsync ENOENT',
    })
  })

  it('kills the process group once the timeout passes', async () => {
    vi.useFakeTimers()
    const kill = vi.spyOn(process, 'kill').mockImplementation(() => true)
    const child = new FakeChild()
    spawn.mockReturnValue(child)

    const result = spawnCommand('ssh', ['host'], { timeoutMs: 30_000 })
    vi.advanceTimersByTime(30_000)
    expect(kill).toHaveBeenCalledWith(-7001, 'SIGTERM')

    child.emit('exit', null, 'SIGTERM')
    await expect(result).resolves.toEqual({ exitCode: null, stderr: '', timedOut: true })
  })

  it('resolves on exit after a timeout while a grandchild still holds stderr', async () => {
    vi.useFakeTimers()
    const kill = vi.spyOn(process, 'kill').mockImplementation(() => true)
    const child = new FakeChild()
    spawn.mockReturnValue(child)

    const result = spawnCommand('rsync', ['-az'], { timeoutMs: 1000 })
    child.stderr.emit('data', Buffer.from('ssh: connect to host stalled\n'))
    vi.advanceTimersByTime(1000)
    // rsync is gone but its ssh child keeps the pipe open, so 'close' never comes
    child.emit('exit', null, 'SIGTERM')

    await expect(result).resolves.toEqual({
      exitCode: null,
      stderr: 'ssh: connect to host stalled',
      timedOut: true,
    })
    expect(child.stderr.destroyed).toBe(true)

    vi.advanceTimersByTime(KILL_GRACE_MS)
    expect(kill.mock.calls).toEqual([
      [-7001, 'SIGTERM'],
      [-7001, 'SIGKILL'],
    ])
  })

  it('skips SIGKILL when the command exits before the timeout', async () => {
    vi.useFakeTimers()
    const kill = vi.spyOn(process, 'kill').mockImplementation(() => true)
    const child = new FakeChild()
    spawn.mockReturnValue(child)

    const result = spawnCommand('rsync', ['-az'], { timeoutMs: 1000 })
    child.emit('exit', 0, null)
    child.emit('close', 0, null)
    await expect(result).resolves.toEqual({ exitCode: 0, stderr: '', timedOut: false })

    vi.advanceTimersByTime(1000 + KILL_GRACE_MS)
    expect(kill).not.toHaveBeenCalled()
  })

  it('falls back to the child when the group cannot be signalled', async () => {
    vi.useFakeTimers()
    vi.spyOn(process, 'kill').mockImplementation(() => {
      throw Object.assign(new Error('kill EPERM'), { code: 'EPERM' })
    })
    const child = new FakeChild()
    spawn.mockReturnValue(child)

    const result = spawnCommand('ssh', ['host'], { timeoutMs: 500 })
    vi.advanceTimersByTime(500)

    await expect(result).resolves.toEqual({ exitCode: null, stderr: '', timedOut: true })
    expect(child.kill).toHaveBeenCalledWith('SIGTERM')
  })
})
