import { spawn } from 'node:child_process'

/**
 * Starts the long-running loop in a background process
 */
export interface DaemonLauncher {
  /** Spawn the daemon and return its PID */
  launch(): number
}

export interface DetachedLauncherOptions {
  /** Script that understands the internal run subcommand */
  entry: string
  /** Arguments that enter the loop, e.g. ['run-daemon'] */
  args: readonly string[]
  env?: NodeJS.ProcessEnv
}

/**
 * Re-run this CLI detached from the terminal, with the same node binary and loader flags
 */
export function createDetachedLauncher(options: DetachedLauncherOptions): DaemonLauncher {
  return {
    launch(): number {
      const child = spawn(
        process.execPath,
        [...process.execArgv, options.entry, ...options.args],
        {
          detached: true,
          stdio: 'ignore',
          env: options.env ?? process.env,
        },
      )
      child.unref()

      if (child.pid === undefined) {
        throw new Error('Failed to spawn daemon process')
      }
      return child.pid
    },
  }
}
