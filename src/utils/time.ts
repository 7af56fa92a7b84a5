// Duration constants in milliseconds
export const SECOND = 1000
export const MINUTE = 60 * SECOND
export const HOUR = 60 * MINUTE
export const DAY = 24 * HOUR
export const WEEK = 7 * DAY

/**
 * Duration units for human-readable config values
 */
export type DurationUnit = 's' | 'm' | 'h' | 'd' | 'w'

const DURATION_PATTERN = /^(\d+)(s|m|h|d|w)$/

function isDurationUnit(value: string): value is DurationUnit {
  return ['s', 'm', 'h', 'd', 'w'].includes(value)
}

/**
 * Parse a human-readable duration string to milliseconds
 */
export function parseDuration(duration: string): number {
  const match = duration.trim().toLowerCase().match(DURATION_PATTERN)
  const value = match?.[1]
  const unit = match?.[2]

  if (!value || !unit || !isDurationUnit(unit)) {
    throw new Error(`Invalid duration: ${duration}`)
  }
  const multipliers: Record<DurationUnit, number> = {
    s: SECOND,
    m: MINUTE,
    h: HOUR,
    d: DAY,
    w: WEEK,
  }

  return Number.parseInt(value, 10) * multipliers[unit]
}

export function isValidDuration(value: string): boolean {
  return DURATION_PATTERN.test(value.trim().toLowerCase())
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000)
  const minutes = Math.floor(seconds / 60)
  const hours = Math.floor(minutes / 60)
  const days = Math.floor(hours / 24)

  if (days > 0) {
    return `${days}d ${hours % 24}h ${minutes % 60}m`
  }
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`
  }
  return `${seconds}s`
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  let value = bytes
  let unitIndex = 0
  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024
    unitIndex++
  }
  const digits = unitIndex === 0 ? 0 : 1
  return `${value.toFixed(digits)} ${units[unitIndex]}`
}

export function formatRelativeTime(timestampMs: number, now = Date.now()): string {
  const diff = Math.max(0, now - timestampMs)
  if (diff < MINUTE) return `${Math.floor(diff / SECOND)}s ago`
  if (diff < HOUR) return `${Math.floor(diff / MINUTE)}m ago`
  if (diff < DAY) return `${Math.floor(diff / HOUR)}h ago`
  return `${Math.floor(diff / DAY)}d ago`
}

/**
 * Local calendar date as YYYY-MM-DD, the layout used for dated log folders
 */
export function formatDateFolder(date: Date): string {
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}
