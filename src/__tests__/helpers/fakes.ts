/**
 * In-process stand-ins for the remote host, the process table and the logger
 */
import { mkdirSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { ProcessTable } from '../../daemon/pid-file'
import type { DaemonLogger, TargetDescriptor } from '../../daemon/types'
import type {
  MirrorRequest,
  ProbeResult,
  RemoteCopyClient,
  TransferResult,
} from '../../transfer/types'

export type LogLevel = 'info' | 'debug' | 'warn' | 'error'

export interface MemoryLogger extends DaemonLogger {
  entries: Array<{ level: LogLevel; message: string }>
  messages(level?: LogLevel): string[]
}

export function createMemoryLogger(): MemoryLogger {
  const entries: Array<{ level: LogLevel; message: string }> = []
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message })
  }
  return {
    entries,
    messages(level) {
      return entries.filter((e) => !level || e.level === level).map((e) => e.message)
    },
    info: push('info'),
    debug: push('debug'),
    warn: push('warn'),
    error: push('error'),
  }
}

export interface FakeRemoteOptions {
  /** Remote directories that exist */
  present?: string[]
  /** Remote paths whose probe fails with this message */
  probeErrors?: Record<string, string>
  /** Remote paths whose mirror fails with this message */
  mirrorErrors?: Record<string, string>
}

export interface FakeRemote extends RemoteCopyClient {
  probes: string[]
  mirrors: MirrorRequest[]
}

export function createFakeRemote(options: FakeRemoteOptions = {}): FakeRemote {
  const present = new Set(options.present ?? [])
  const probes: string[] = []
  const mirrors: MirrorRequest[] = []

  return {
    probes,
    mirrors,
    async exists(remotePath: string): Promise<ProbeResult> {
      probes.push(remotePath)
      const failure = options.probeErrors?.[remotePath]
      if (failure !== undefined) return { status: 'error', error: failure }
      return present.has(remotePath) ? { status: 'present' } : { status: 'absent' }
    },
    async mirror(request: MirrorRequest): Promise<TransferResult> {
      mirrors.push(request)
      const failure = options.mirrorErrors?.[request.remotePath]
      if (failure !== undefined) return { ok: false, error: failure }
      return { ok: true }
    },
  }
}

/**
 * Process table where SIGTERM and SIGKILL end a process unless it ignores them
 */
export class FakeProcessTable implements ProcessTable {
  readonly alive = new Set<number>()
  readonly ignored = new Set<number | NodeJS.Signals>()
  readonly signals: Array<{ pid: number; signal: number | NodeJS.Signals }> = []

  constructor(alive: number[] = []) {
    for (const pid of alive) this.alive.add(pid)
  }

  exists(pid: number): boolean {
    return this.alive.has(pid)
  }

  kill(pid: number, signal: number | NodeJS.Signals): boolean {
    this.signals.push({ pid, signal })
    if (!this.alive.has(pid)) return false
    if (!this.ignored.has(signal) && (signal === 'SIGTERM' || signal === 'SIGKILL')) {
      this.alive.delete(pid)
    }
    return true
  }
}

export function createTempDir(prefix = 'logsync-test-'): string {
  const base = join(tmpdir(), 'logsync-tests')
  mkdirSync(base, { recursive: true })
  return mkdtempSync(join(base, prefix))
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true })
}

export function makeTarget(label: string, localBase: string): TargetDescriptor {
  return {
    label,
    remoteLogRoot: `/srv/${label}/logs`,
    remoteDataRoot: `/srv/${label}/data`,
    localLogRoot: join(localBase, label, 'logs'),
    localDataRoot: join(localBase, label, 'data'),
  }
}
