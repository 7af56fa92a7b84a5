import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { isAbsolute, join, resolve } from 'node:path'
import {
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type TargetDescriptor,
} from '../daemon/types'
import type { RemoteConfig } from '../transfer/types'
import { isValidDuration, parseDuration } from '../utils/time'

export interface ConfigIssue {
  path: string
  message: string
}

export class ConfigError extends Error {
  issues: ConfigIssue[]

  constructor(message: string, issues: ConfigIssue[]) {
    super(message)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

/**
 * Fully resolved configuration, loaded once at startup
 */
export interface ResolvedConfig {
  dataDir: string
  configPath: string
  pidPath: string
  /** Append-only activity log */
  logPath: string
  statusDbPath: string
  remote: RemoteConfig
  retry: RetryConfig
  /** Targets synced at the same time */
  concurrency: number
  /** Dated log folders mirrored per pass, counting back from today */
  recentDays: number
  transferTimeoutMs: number
  logExcludes: string[]
  dataExcludes: string[]
  targets: TargetDescriptor[]
}

export const DEFAULT_DATA_EXCLUDES = ['temp_media', 'cache']
const DEFAULT_CONNECT_TIMEOUT_SECONDS = 10
const DEFAULT_RECENT_DAYS = 2
const DEFAULT_TRANSFER_TIMEOUT = '10m'
const ROOT_KEYS = [
  'remoteLogRoot',
  'remoteDataRoot',
  'localLogRoot',
  'localDataRoot',
] as const

type Env = Record<string, string | undefined>

export function resolveDataDir(dataDir?: string, env: Env = process.env): string {
  return dataDir ?? env.LOGSYNC_DATA_DIR ?? join(homedir(), '.logsync')
}

export function getConfigPath(dataDir?: string, env: Env = process.env): string {
  return env.LOGSYNC_CONFIG ?? join(resolveDataDir(dataDir, env), 'config.json')
}

export function expandHome(path: string): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return path
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Accumulates issues while reading typed values out of the raw JSON
 */
class ConfigReader {
  readonly issues: ConfigIssue[] = []

  fail(path: string, message: string): void {
    this.issues.push({ path, message })
  }

  string(value: unknown, path: string): string | undefined
  string(value: unknown, path: string, fallback: string): string
  string(value: unknown, path: string, fallback?: string): string | undefined {
    if (value === undefined) return fallback
    if (typeof value !== 'string' || value.trim() === '') {
      this.fail(path, 'Expected a non-empty string')
      return fallback
    }
    return value.trim()
  }

  positiveInt(value: unknown, path: string, fallback: number): number {
    if (value === undefined) return fallback
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      this.fail(path, 'Expected a positive integer')
      return fallback
    }
    return value
  }

  /** Durations are strings like 30s or 5m; a bare integer means seconds */
  duration(value: unknown, path: string, fallbackMs: number): number {
    if (value === undefined) return fallbackMs
    const text =
      typeof value === 'number' || (typeof value === 'string' && /^\d+$/.test(value.trim()))
        ? `${String(value).trim()}s`
        : value
    if (typeof text !== 'string' || !isValidDuration(text)) {
      this.fail(path, 'Expected duration like 30s, 5m, 1h')
      return fallbackMs
    }
    const ms = parseDuration(text)
    if (ms <= 0) {
      this.fail(path, 'Expected a duration greater than zero')
      return fallbackMs
    }
    return ms
  }

  stringList(value: unknown, path: string, fallback: string[]): string[] {
    if (value === undefined) return fallback
    if (!Array.isArray(value) || !value.every((v) => typeof v === 'string')) {
      this.fail(path, 'Expected an array of strings')
      return fallback
    }
    return value.filter((v): v is string => typeof v === 'string')
  }

  path(value: unknown, path: string, baseDir: string): string | undefined {
    const raw = this.string(value, path)
    if (raw === undefined) return undefined
    const expanded = expandHome(raw)
    return isAbsolute(expanded) ? expanded : resolve(baseDir, expanded)
  }
}

function readRemote(
  raw: unknown,
  reader: ConfigReader,
  env: Env,
): RemoteConfig {
  const remote = isPlainObject(raw) ? raw : {}
  if (raw !== undefined && !isPlainObject(raw)) {
    reader.fail('remote', 'Expected an object')
  }

  const host = env.LOGSYNC_REMOTE_HOST ?? reader.string(remote.host, 'remote.host')
  if (host === undefined && remote.host === undefined) {
    reader.fail('remote.host', 'Remote host is required')
  }
  const identityFile =
    env.LOGSYNC_SSH_KEY ?? reader.string(remote.identityFile, 'remote.identityFile')

  const port =
    remote.port === undefined ? null : reader.positiveInt(remote.port, 'remote.port', 22)
  const connectTimeoutMs = reader.duration(
    remote.connectTimeout,
    'remote.connectTimeout',
    DEFAULT_CONNECT_TIMEOUT_SECONDS * 1000,
  )

  return {
    host: host ?? '',
    identityFile: identityFile ? expandHome(identityFile) : null,
    port,
    connectTimeoutSeconds: Math.max(1, Math.round(connectTimeoutMs / 1000)),
  }
}

function readTargets(
  raw: unknown,
  reader: ConfigReader,
  baseDir: string,
): TargetDescriptor[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    reader.fail('targets', 'Expected a non-empty array of targets')
    return []
  }

  const targets: TargetDescriptor[] = []
  const seen = new Set<string>()

  raw.forEach((entry: unknown, index) => {
    const at = `targets[${index}]`
    if (!isPlainObject(entry)) {
      reader.fail(at, 'Expected an object')
      return
    }

    const label = reader.string(entry.label, `${at}.label`)
    const remoteLogRoot = reader.string(entry.remoteLogRoot, `${at}.remoteLogRoot`)
    const remoteDataRoot = reader.string(entry.remoteDataRoot, `${at}.remoteDataRoot`)
    const localLogRoot = reader.path(entry.localLogRoot, `${at}.localLogRoot`, baseDir)
    const localDataRoot = reader.path(entry.localDataRoot, `${at}.localDataRoot`, baseDir)

    if (entry.label === undefined) {
      reader.fail(`${at}.label`, 'Label is required')
    } else if (label !== undefined && seen.has(label)) {
      reader.fail(`${at}.label`, `Duplicate label "${label}"`)
    }
    for (const key of ROOT_KEYS) {
      if (entry[key] === undefined) {
        reader.fail(`${at}.${key}`, 'Path is required')
      }
    }

    if (
      label === undefined ||
      seen.has(label) ||
      remoteLogRoot === undefined ||
      remoteDataRoot === undefined ||
      localLogRoot === undefined ||
      localDataRoot === undefined
    ) {
      return
    }

    seen.add(label)
    targets.push(
      Object.freeze({ label, remoteLogRoot, remoteDataRoot, localLogRoot, localDataRoot }),
    )
  })

  return targets
}

/**
 * Validate a parsed config object and resolve it against defaults and the environment
 */
export function resolveConfig(
  raw: Record<string, unknown>,
  paths: { dataDir: string; configPath: string },
  env: Env = process.env,
): ResolvedConfig {
  const reader = new ConfigReader()
  const { dataDir, configPath } = paths

  const remote = readRemote(raw.remote, reader, env)
  const intervalMs = reader.duration(
    env.LOGSYNC_INTERVAL ?? raw.interval,
    'interval',
    DEFAULT_RETRY_CONFIG.intervalMs,
  )
  const failureCeiling = reader.positiveInt(
    raw.failureCeiling,
    'failureCeiling',
    DEFAULT_RETRY_CONFIG.failureCeiling,
  )
  const cooldownMs = reader.duration(
    raw.cooldown,
    'cooldown',
    DEFAULT_RETRY_CONFIG.cooldownMs,
  )
  const transferTimeoutMs = reader.duration(
    raw.transferTimeout,
    'transferTimeout',
    parseDuration(DEFAULT_TRANSFER_TIMEOUT),
  )
  const concurrency = reader.positiveInt(raw.concurrency, 'concurrency', 1)
  const recentDays = reader.positiveInt(raw.recentDays, 'recentDays', DEFAULT_RECENT_DAYS)
  const logExcludes = reader.stringList(raw.logExcludes, 'logExcludes', [])
  const dataExcludes = reader.stringList(
    raw.dataExcludes,
    'dataExcludes',
    DEFAULT_DATA_EXCLUDES,
  )
  const targets = readTargets(raw.targets, reader, dataDir)

  const pidPath = reader.path(raw.pidFile, 'pidFile', dataDir) ?? join(dataDir, 'daemon.pid')
  const logPath =
    reader.path(raw.activityLog, 'activityLog', dataDir) ??
    join(dataDir, '.sync-daemon.log')

  if (reader.issues.length > 0) {
    throw new ConfigError('Config file has invalid values', reader.issues)
  }

  return {
    dataDir,
    configPath,
    pidPath,
    logPath,
    statusDbPath: join(dataDir, 'status.db'),
    remote,
    retry: { intervalMs, failureCeiling, cooldownMs },
    concurrency,
    recentDays,
    transferTimeoutMs,
    logExcludes,
    dataExcludes,
    targets,
  }
}

function readConfigJson(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`, [
      { path: '(root)', message: 'Missing config file' },
    ])
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError('Invalid JSON in config file', [
      { path: '(root)', message: err instanceof Error ? err.message : String(err) },
    ])
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError('Config file must contain a JSON object', [
      { path: '(root)', message: 'Expected an object' },
    ])
  }

  return parsed
}

export function loadConfig(
  options: { dataDir?: string; env?: Env } = {},
): ResolvedConfig {
  const env = options.env ?? process.env
  const dataDir = resolveDataDir(options.dataDir, env)
  const configPath = getConfigPath(options.dataDir, env)
  const raw = readConfigJson(configPath)
  return resolveConfig(raw, { dataDir, configPath }, env)
}
