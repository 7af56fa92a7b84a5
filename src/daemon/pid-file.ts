/**
 * PID file management for daemon
 * Prevents multiple daemon instances and enables lifecycle management
 */
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { isErrnoException } from './daemon-utils'

/**
 * Error thrown when PID file operations fail
 */
export class PidFileError extends Error {
  constructor(
    message: string,
    public readonly code: 'ALREADY_RUNNING' | 'NOT_RUNNING' | 'IO_ERROR',
    public readonly pid?: number,
  ) {
    super(message)
    this.name = 'PidFileError'
  }
}

/**
 * Process existence and signalling, injectable for tests
 */
export interface ProcessTable {
  exists(pid: number): boolean
  kill(pid: number, signal: number | NodeJS.Signals): boolean
}

export const systemProcesses: ProcessTable = {
  exists(pid: number): boolean {
    try {
      // Signal 0 doesn't actually send a signal, just checks if process exists
      process.kill(pid, 0)
      return true
    } catch (err) {
      // EPERM: the process exists but belongs to someone else
      return isErrnoException(err) && err.code === 'EPERM'
    }
  },
  kill(pid: number, signal: number | NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal)
      return true
    } catch {
      return false
    }
  },
}

/**
 * PID file interface
 */
export interface PidFile {
  /** Acquire PID file for `pid` (fails if another live process holds it) */
  acquire(pid?: number): void
  /** Release PID file */
  release(): void
  /** Read PID from file (null if missing, unparsable or dead) */
  read(): number | null
  /** Read the recorded PID without checking that it is alive */
  recorded(): number | null
  /** Whether a PID file exists on disk at all */
  exists(): boolean
  /** Get PID file path */
  getPath(): string
}

function readPidFromFile(path: string): number | null {
  if (!existsSync(path)) {
    return null
  }

  try {
    const content = readFileSync(path, 'utf-8').trim()
    if (!/^\d+$/.test(content)) {
      return null
    }
    const pid = Number.parseInt(content, 10)
    return pid > 0 ? pid : null
  } catch {
    return null
  }
}

function removePidFile(path: string): void {
  if (existsSync(path)) {
    rmSync(path, { force: true })
  }
}

function writePidFile(path: string, pid: number): void {
  try {
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(path, pid.toString(), { mode: 0o600 })
  } catch (err) {
    throw new PidFileError(`Failed to write PID file: ${err}`, 'IO_ERROR')
  }
}

class PidFileManager implements PidFile {
  constructor(
    private readonly path: string,
    private readonly processes: ProcessTable,
  ) {}

  acquire(pid: number = process.pid): void {
    const existingPid = readPidFromFile(this.path)
    if (existingPid === pid) {
      return
    }
    if (existingPid && this.processes.exists(existingPid)) {
      throw new PidFileError(
        `Daemon already running with PID ${existingPid}`,
        'ALREADY_RUNNING',
        existingPid,
      )
    }

    removePidFile(this.path)
    writePidFile(this.path, pid)
  }

  release(): void {
    removePidFile(this.path)
  }

  read(): number | null {
    const pid = readPidFromFile(this.path)
    if (!pid) {
      return null
    }
    if (!this.processes.exists(pid)) {
      return null
    }
    return pid
  }

  recorded(): number | null {
    return readPidFromFile(this.path)
  }

  exists(): boolean {
    return existsSync(this.path)
  }

  getPath(): string {
    return this.path
  }
}

/**
 * Create a PID file manager
 */
export function createPidFile(
  path: string,
  processes: ProcessTable = systemProcesses,
): PidFile {
  return new PidFileManager(path, processes)
}
