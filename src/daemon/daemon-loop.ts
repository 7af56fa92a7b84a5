import type { DaemonContext } from './daemon-context'
import { formatError, waitFor } from './daemon-utils'
import type { PassOutcome, PassReport } from './types'

async function runPass(ctx: DaemonContext): Promise<PassReport | null> {
  try {
    return await ctx.orchestrator.runPass(ctx.targets, ctx.today())
  } catch (err) {
    ctx.logger.error(`Sync pass failed unexpectedly: ${formatError(err)}`)
    return null
  }
}

function persistPass(ctx: DaemonContext, report: PassReport | null): void {
  const statusService = ctx.runtime.statusService
  if (!statusService) return
  try {
    if (report) {
      statusService.recordPass(report, ctx.state)
    } else {
      statusService.recordFailedPass(ctx.state)
    }
  } catch (err) {
    ctx.logger.warn(`Failed to update daemon status: ${formatError(err)}`)
  }
}

/**
 * Run one pass and fold its outcome into the retry state.
 * Returns the delay before the next pass.
 */
export async function runIteration(ctx: DaemonContext): Promise<number> {
  const report = await runPass(ctx)
  // A pass that threw counts as total failure
  const outcome: PassOutcome = report?.outcome ?? 'all-failed'

  const decision = ctx.retry.record(outcome)
  ctx.state.consecutiveFailures = decision.state.consecutiveFailures
  ctx.state.lastPassOutcome = outcome
  ctx.state.lastPassAt = Date.now()

  persistPass(ctx, report)
  return decision.delayMs
}

export async function mainLoop(ctx: DaemonContext): Promise<void> {
  ctx.logger.debug('Starting main loop...')
  const signal = ctx.runtime.shutdown.signal

  while (!signal.aborted) {
    const delayMs = await runIteration(ctx)
    if (signal.aborted) break

    ctx.logger.debug(`Next pass in ${Math.round(delayMs / 1000)}s`)
    await waitFor(delayMs, signal)
  }

  ctx.logger.debug('Main loop exiting...')
}
