/**
 * Tests for the daemon main loop
 */
import { describe, expect, it } from 'vitest'
import { createDaemonRuntime, type DaemonContext } from '../daemon/daemon-context'
import { mainLoop, runIteration } from '../daemon/daemon-loop'
import { createPidFile } from '../daemon/pid-file'
import { createRetryPolicy } from '../daemon/retry-policy'
import type { SyncOrchestrator } from '../daemon/sync-orchestrator'
import type { PassOutcome, PassReport } from '../daemon/types'
import { createTestDatabase } from '../db'
import { createDaemonStatusService, type DaemonStatusService } from '../db/daemon-status'
import { createMemoryLogger, FakeProcessTable, type MemoryLogger } from './helpers/fakes'

function passWith(outcome: PassOutcome): PassReport {
  return {
    outcome,
    startedAt: 1_700_000_000_000,
    durationMs: 10,
    targets: [
      {
        label: 'svc',
        logs: outcome === 'all-ok' ? { status: 'success' } : { status: 'failed', error: 'x' },
        data: { status: 'success' },
        outcome: outcome === 'all-ok' ? 'ok' : 'partial',
      },
    ],
  }
}

function createContext(
  orchestrator: SyncOrchestrator,
  options: { logger?: MemoryLogger; statusService?: DaemonStatusService | null } = {},
): DaemonContext {
  const logger = options.logger ?? createMemoryLogger()
  return {
    targets: [],
    logger,
    pidFile: createPidFile('/nonexistent/daemon.pid', new FakeProcessTable()),
    orchestrator,
    retry: createRetryPolicy({ intervalMs: 30_000, failureCeiling: 3, cooldownMs: 300_000 }, logger),
    state: {
      running: true,
      pid: 4242,
      startedAt: 1_700_000_000_000,
      consecutiveFailures: 0,
      lastPassOutcome: null,
      lastPassAt: null,
    },
    runtime: createDaemonRuntime(options.statusService ?? null),
    today: () => new Date(2024, 2, 15),
  }
}

function scriptedOrchestrator(outcomes: Array<PassOutcome | Error>): SyncOrchestrator {
  let index = 0
  return {
    async runPass() {
      const next = outcomes[Math.min(index++, outcomes.length - 1)]
      if (next === undefined) throw new Error('no scripted outcome')
      if (next instanceof Error) throw next
      return passWith(next)
    },
  }
}

describe('runIteration', () => {
  it('returns the interval after a good pass and records the state', async () => {
    const ctx = createContext(scriptedOrchestrator(['all-ok']))

    const delay = await runIteration(ctx)

    expect(delay).toBe(30_000)
    expect(ctx.state.lastPassOutcome).toBe('all-ok')
    expect(ctx.state.consecutiveFailures).toBe(0)
    expect(ctx.state.lastPassAt).not.toBeNull()
  })

  it('treats a thrown pass as all-failed and keeps going', async () => {
    const logger = createMemoryLogger()
    const ctx = createContext(scriptedOrchestrator([new Error('kaboom')]), { logger })

    const delay = await runIteration(ctx)

    expect(delay).toBe(30_000)
    expect(ctx.state.lastPassOutcome).toBe('all-failed')
    expect(ctx.state.consecutiveFailures).toBe(1)
    expect(logger.messages('error')[0]).toMatch(/^Sync pass failed unexpectedly: Error: kaboom/)
  })

  it('switches to the cooldown after the failure ceiling', async () => {
    const ctx = createContext(scriptedOrchestrator(['all-failed']))

    const delays = [await runIteration(ctx), await runIteration(ctx), await runIteration(ctx)]

    expect(delays).toEqual([30_000, 30_000, 300_000])
    expect(ctx.state.consecutiveFailures).toBe(0)
  })

  it('persists the pass to the status store', async () => {
    const db = createTestDatabase()
    const statusService = createDaemonStatusService(db)
    const ctx = createContext(scriptedOrchestrator(['some-degraded']), { statusService })

    await runIteration(ctx)

    expect(statusService.getDaemonInfo()).toMatchObject({
      lastPassOutcome: 'some-degraded',
      passes: 1,
    })
    expect(statusService.getTargetStatuses().map((t) => t.label)).toEqual(['svc'])
    db.close()
  })

  it('persists a thrown pass as all-failed without touching target rows', async () => {
    const db = createTestDatabase()
    const statusService = createDaemonStatusService(db)
    const ctx = createContext(scriptedOrchestrator(['all-ok', new Error('kaboom')]), {
      statusService,
    })

    await runIteration(ctx)
    await runIteration(ctx)

    expect(statusService.getDaemonInfo()).toMatchObject({
      lastPassOutcome: 'all-failed',
      lastPassAt: ctx.state.lastPassAt,
      consecutiveFailures: 1,
      passes: 2,
    })
    expect(statusService.getTargetStatuses()).toEqual([
      expect.objectContaining({ label: 'svc', outcome: 'ok' }),
    ])
    db.close()
  })

  it('logs and continues when the status store fails', async () => {
    const logger = createMemoryLogger()
    const db = createTestDatabase()
    const statusService = createDaemonStatusService(db)
    db.close()
    const ctx = createContext(scriptedOrchestrator(['all-ok']), { logger, statusService })

    await expect(runIteration(ctx)).resolves.toBe(30_000)
    expect(logger.messages('warn')[0]).toMatch(/^Failed to update daemon status: /)
  })
})

describe('mainLoop', () => {
  it('runs passes until shutdown is requested', async () => {
    let passes = 0
    let ctx: DaemonContext | null = null
    const orchestrator: SyncOrchestrator = {
      async runPass() {
        passes++
        if (passes === 3) ctx?.runtime.shutdown.abort()
        return passWith('all-ok')
      },
    }
    ctx = createContext(orchestrator)
    ctx.retry = createRetryPolicy(
      { intervalMs: 1, failureCeiling: 3, cooldownMs: 1 },
      ctx.logger,
    )

    await mainLoop(ctx)

    expect(passes).toBe(3)
  })

  it('cuts the wait short when aborted', async () => {
    const ctx = createContext(scriptedOrchestrator(['all-ok']))
    const started = Date.now()

    const loop = mainLoop(ctx)
    setTimeout(() => ctx.runtime.shutdown.abort(), 20)
    await loop

    // The regular interval is 30s
    expect(Date.now() - started).toBeLessThan(5000)
  })
})
