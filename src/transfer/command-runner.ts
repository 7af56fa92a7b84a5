import { spawn } from 'node:child_process'
import { isErrnoException } from '../daemon/daemon-utils'

export interface CommandResult {
  /** Exit code, null when the process was killed or never started */
  exitCode: number | null
  stderr: string
  timedOut: boolean
  /** Spawn failure, e.g. the binary is not installed */
  spawnError?: string
}

export interface CommandOptions {
  timeoutMs: number
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>

const MAX_STDERR_BYTES = 4096

/** Time between SIGTERM and SIGKILL once a command has timed out */
export const KILL_GRACE_MS = 2000

/**
 * Run a command to completion, killing its process group once the timeout passes.
 * Stdout is discarded; stderr is kept (truncated) for error reporting.
 *
 * The command leads its own process group, so the ssh that rsync starts is
 * killed along with it. After a timeout the result resolves on `exit` rather
 * than `close`: a surviving grandchild can hold stderr open.
 */
export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve) => {
    let stderr = ''
    let timedOut = false
    let settled = false
    let killTimer: NodeJS.Timeout | undefined

    const proc = spawn(command, [...args], {
      stdio: ['ignore', 'ignore', 'pipe'],
      detached: true,
    })

    const killGroup = (signal: NodeJS.Signals) => {
      if (proc.pid === undefined) return
      try {
        process.kill(-proc.pid, signal)
      } catch (err) {
        // ESRCH: the whole group is already gone
        if (!isErrnoException(err) || err.code !== 'ESRCH') {
          proc.kill(signal)
        }
      }
    }

    const timer = setTimeout(() => {
      timedOut = true
      killGroup('SIGTERM')
      killTimer = setTimeout(() => killGroup('SIGKILL'), KILL_GRACE_MS)
      killTimer.unref()
    }, options.timeoutMs)

    const finish = (result: CommandResult) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      if (timedOut) {
        proc.stderr?.destroy()
      } else {
        clearTimeout(killTimer)
      }
      resolve(result)
    }

    proc.stderr?.on('data', (chunk: Buffer) => {
      if (stderr.length < MAX_STDERR_BYTES) {
        stderr += chunk.toString()
      }
    })

    proc.on('error', (err) => {
      finish({ exitCode: null, stderr, timedOut, spawnError: err.message })
    })

    proc.on('exit', (code) => {
      if (!timedOut) return
      finish({
        exitCode: code,
        stderr: stderr.slice(0, MAX_STDERR_BYTES).trim(),
        timedOut,
      })
    })

    proc.on('close', (code) => {
      finish({
        exitCode: code,
        stderr: stderr.slice(0, MAX_STDERR_BYTES).trim(),
        timedOut,
      })
    })
  })
