/**
 * Classification of subtree results into target and pass outcomes
 */
import type {
  PassOutcome,
  SyncResult,
  TargetOutcome,
  TargetReport,
} from './types'

/**
 * Derive a target's outcome from its log and data results.
 * Skipped subtrees do not count: a target whose only applicable subtree
 * failed is `failed`, one with a single failure among two applicable
 * subtrees is `partial`.
 */
export function classifyTarget(logs: SyncResult, data: SyncResult): TargetOutcome {
  const applicable = [logs, data].filter((r) => r.status !== 'skipped')
  const failures = applicable.filter((r) => r.status === 'failed').length

  if (failures === 0) return 'ok'
  if (failures === applicable.length) return 'failed'
  return 'partial'
}

export function aggregatePass(outcomes: readonly TargetOutcome[]): PassOutcome {
  if (outcomes.every((o) => o === 'ok')) return 'all-ok'
  if (outcomes.every((o) => o === 'failed')) return 'all-failed'
  return 'some-degraded'
}

export function describeResult(result: SyncResult): string {
  switch (result.status) {
    case 'success':
      return 'success'
    case 'failed':
      return 'failed'
    case 'skipped':
      return `skipped: ${result.reason}`
  }
}

const TARGET_OUTCOME_LABELS: Record<TargetOutcome, string> = {
  ok: 'OK',
  partial: 'PARTIAL',
  failed: 'FAILED',
}

const PASS_OUTCOME_LABELS: Record<PassOutcome, string> = {
  'all-ok': 'ALL OK',
  'some-degraded': 'DEGRADED',
  'all-failed': 'ALL FAILED',
}

export function formatTargetLine(report: TargetReport): string {
  return `[${report.label}] ${TARGET_OUTCOME_LABELS[report.outcome]} (logs=${describeResult(report.logs)}, data=${describeResult(report.data)})`
}

export function formatPassOutcome(outcome: PassOutcome): string {
  return PASS_OUTCOME_LABELS[outcome]
}

export function countOutcomes(
  reports: readonly TargetReport[],
): Record<TargetOutcome, number> {
  const counts: Record<TargetOutcome, number> = { ok: 0, partial: 0, failed: 0 }
  for (const report of reports) {
    counts[report.outcome]++
  }
  return counts
}

export function isPassOutcome(value: unknown): value is PassOutcome {
  return value === 'all-ok' || value === 'some-degraded' || value === 'all-failed'
}

export function isTargetOutcome(value: unknown): value is TargetOutcome {
  return value === 'ok' || value === 'partial' || value === 'failed'
}
