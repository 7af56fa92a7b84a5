/**
 * rsync over ssh implementation of the remote copy client
 */
import { type CommandResult, type CommandRunner, spawnCommand } from './command-runner'
import type {
  MirrorRequest,
  ProbeResult,
  RemoteConfig,
  RemoteCopyClient,
  TransferResult,
} from './types'

export interface RsyncClientOptions {
  remote: RemoteConfig
  /** Upper bound for one mirror call */
  transferTimeoutMs: number
  /** Upper bound for one existence probe */
  probeTimeoutMs?: number
  rsyncPath?: string
  sshPath?: string
}

/** rsync exit code for "some source files vanished before they could be transferred" */
const RSYNC_VANISHED_SOURCE_FILES = 24

/** ssh exits with 255 when the connection itself failed */
const SSH_CONNECTION_FAILED = 255

const DEFAULT_PROBE_TIMEOUT_MS = 30_000

/**
 * Quote a value for the remote POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

function withTrailingSlash(path: string): string {
  return path.endsWith('/') ? path : `${path}/`
}

/**
 * ssh options shared by probes and the rsync transport
 */
export function buildSshOptions(remote: RemoteConfig): string[] {
  const args: string[] = []
  if (remote.port) {
    args.push('-p', String(remote.port))
  }
  if (remote.identityFile) {
    args.push('-i', remote.identityFile)
  }
  args.push('-o', `ConnectTimeout=${remote.connectTimeoutSeconds}`)
  args.push('-o', 'StrictHostKeyChecking=accept-new')
  args.push('-o', 'BatchMode=yes')
  return args
}

/**
 * The `-e` value handed to rsync; rsync splits it on whitespace and honours double quotes
 */
export function buildRsyncShell(remote: RemoteConfig, sshPath = 'ssh'): string {
  const parts = [sshPath]
  for (const arg of buildSshOptions(remote)) {
    parts.push(/\s/.test(arg) ? `"${arg}"` : arg)
  }
  return parts.join(' ')
}

export function buildMirrorArgs(
  remote: RemoteConfig,
  request: MirrorRequest,
  sshPath = 'ssh',
): string[] {
  const args = ['-az']
  if (request.deleteExtraneous) {
    args.push('--delete')
  }
  for (const pattern of request.excludes) {
    args.push(`--exclude=${pattern}`)
  }
  args.push('-e', buildRsyncShell(remote, sshPath))
  args.push(`${remote.host}:${withTrailingSlash(request.remotePath)}`)
  args.push(withTrailingSlash(request.localPath))
  return args
}

export function buildProbeArgs(remote: RemoteConfig, remotePath: string): string[] {
  return [...buildSshOptions(remote), remote.host, `test -d ${shellQuote(remotePath)}`]
}

function describeFailure(tool: string, result: CommandResult, timeoutMs: number): string {
  if (result.spawnError) {
    return `${tool} could not be started: ${result.spawnError}`
  }
  if (result.timedOut) {
    return `${tool} timed out after ${Math.round(timeoutMs / 1000)}s`
  }
  const detail = result.stderr ? `: ${result.stderr}` : ''
  return `${tool} exited with code ${result.exitCode}${detail}`
}

export function createRsyncClient(
  options: RsyncClientOptions,
  run: CommandRunner = spawnCommand,
): RemoteCopyClient {
  const rsyncPath = options.rsyncPath ?? 'rsync'
  const sshPath = options.sshPath ?? 'ssh'
  const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS

  return {
    async mirror(request: MirrorRequest): Promise<TransferResult> {
      const args = buildMirrorArgs(options.remote, request, sshPath)
      const result = await run(rsyncPath, args, {
        timeoutMs: options.transferTimeoutMs,
      })

      if (
        !result.timedOut &&
        (result.exitCode === 0 || result.exitCode === RSYNC_VANISHED_SOURCE_FILES)
      ) {
        return { ok: true }
      }
      return {
        ok: false,
        error: describeFailure('rsync', result, options.transferTimeoutMs),
      }
    },

    async exists(remotePath: string): Promise<ProbeResult> {
      const args = buildProbeArgs(options.remote, remotePath)
      const result = await run(sshPath, args, { timeoutMs: probeTimeoutMs })

      if (!result.timedOut && result.exitCode === 0) {
        return { status: 'present' }
      }
      if (!result.timedOut && result.exitCode === 1) {
        return { status: 'absent' }
      }
      const error =
        result.exitCode === SSH_CONNECTION_FAILED
          ? `ssh connection to ${options.remote.host} failed${result.stderr ? `: ${result.stderr}` : ''}`
          : describeFailure('ssh', result, probeTimeoutMs)
      return { status: 'error', error }
    },
  }
}
