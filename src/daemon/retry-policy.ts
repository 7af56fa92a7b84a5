/**
 * Backoff between passes.
 *
 * Any pass that is not `all-failed` resets the failure counter and waits the
 * regular interval. Consecutive `all-failed` passes are counted; when the
 * count reaches the ceiling the next wait is the cooldown and counting
 * restarts from zero. No jitter, no coordination between instances.
 */
import { formatDuration } from '../utils/time'
import type { DaemonLogger, PassOutcome, RetryConfig } from './types'

export interface RetryState {
  consecutiveFailures: number
}

export interface RetryDecision {
  /** State after observing the pass */
  state: RetryState
  /** Delay before the next pass */
  delayMs: number
  /** Whether the delay is the extended cooldown */
  cooldown: boolean
}

export const INITIAL_RETRY_STATE: RetryState = { consecutiveFailures: 0 }

export function evaluateRetry(
  state: RetryState,
  outcome: PassOutcome,
  config: RetryConfig,
): RetryDecision {
  if (outcome !== 'all-failed') {
    return {
      state: { consecutiveFailures: 0 },
      delayMs: config.intervalMs,
      cooldown: false,
    }
  }

  const failures = state.consecutiveFailures + 1
  if (failures >= config.failureCeiling) {
    return {
      state: { consecutiveFailures: 0 },
      delayMs: config.cooldownMs,
      cooldown: true,
    }
  }

  return {
    state: { consecutiveFailures: failures },
    delayMs: config.intervalMs,
    cooldown: false,
  }
}

/** Delay to wait after a pass with `outcome`, given the state before it */
export function nextDelay(
  state: RetryState,
  outcome: PassOutcome,
  config: RetryConfig,
): number {
  return evaluateRetry(state, outcome, config).delayMs
}

/** State after a pass with `outcome`, given the state before it */
export function updateRetryState(
  state: RetryState,
  outcome: PassOutcome,
  config: RetryConfig,
): RetryState {
  return evaluateRetry(state, outcome, config).state
}

export interface RetryPolicy {
  /** Observe a pass outcome and decide the next delay */
  record(outcome: PassOutcome): RetryDecision
  getState(): RetryState
}

export function createRetryPolicy(
  config: RetryConfig,
  logger: DaemonLogger,
  initial: RetryState = INITIAL_RETRY_STATE,
): RetryPolicy {
  let state: RetryState = { ...initial }

  return {
    record(outcome: PassOutcome): RetryDecision {
      const attempt = state.consecutiveFailures + 1
      const decision = evaluateRetry(state, outcome, config)
      state = decision.state

      if (decision.cooldown) {
        logger.warn(
          `Too many consecutive failures (${attempt}/${config.failureCeiling}), waiting ${formatDuration(decision.delayMs)} before retry`,
        )
      } else if (outcome === 'all-failed') {
        logger.warn(
          `Sync failed (attempt ${state.consecutiveFailures}/${config.failureCeiling})`,
        )
      }

      return decision
    },
    getState(): RetryState {
      return { ...state }
    },
  }
}
