/**
 * Contract for the remote copy tool.
 * Implementations report expected failures as values and never throw for them.
 */

export interface MirrorRequest {
  /** Remote directory, mirrored by content */
  remotePath: string
  /** Local destination directory */
  localPath: string
  /** rsync-style exclude patterns */
  excludes: readonly string[]
  /** Delete local files that no longer exist remotely */
  deleteExtraneous?: boolean
}

export type TransferResult = { ok: true } | { ok: false; error: string }

export type ProbeResult =
  | { status: 'present' }
  | { status: 'absent' }
  | { status: 'error'; error: string }

export interface RemoteCopyClient {
  /** One-way, idempotent mirror of a remote directory onto a local one */
  mirror(request: MirrorRequest): Promise<TransferResult>
  /** Whether a remote directory exists */
  exists(remotePath: string): Promise<ProbeResult>
}

export interface RemoteConfig {
  /** SSH destination, e.g. `deploy@example.com` */
  host: string
  /** Private key passed to ssh with -i */
  identityFile: string | null
  port: number | null
  /** SSH ConnectTimeout in seconds */
  connectTimeoutSeconds: number
}
