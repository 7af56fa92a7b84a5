/**
 * Tests for daemon utility helpers
 */
import { describe, expect, it } from 'vitest'
import {
  formatError,
  getErrorMessage,
  mapWithConcurrency,
  waitFor,
} from '../daemon/daemon-utils'

class CircularRef {
  self: CircularRef

  constructor() {
    this.self = this
  }
}

describe('formatError / getErrorMessage', () => {
  it('formatError includes the message of Error instances', () => {
    expect(formatError(new Error('boom'))).toContain('boom')
  })

  it('formatError handles strings and objects', () => {
    expect(formatError('plain')).toBe('plain')
    expect(formatError({ ok: true })).toBe('{"ok":true}')
  })

  it('formatError falls back for circular objects', () => {
    expect(formatError(new CircularRef())).toBe('[object Object]')
  })

  it('getErrorMessage normalizes error inputs', () => {
    expect(getErrorMessage(new Error('nope'))).toBe('nope')
    expect(getErrorMessage('simple')).toBe('simple')
    expect(getErrorMessage(123)).toBe('123')
  })
})

describe('waitFor', () => {
  it('resolves true after the full delay', async () => {
    await expect(waitFor(5)).resolves.toBe(true)
  })

  it('resolves false immediately for an aborted signal', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(waitFor(60_000, controller.signal)).resolves.toBe(false)
  })

  it('resolves false when aborted mid-wait', async () => {
    const controller = new AbortController()
    const wait = waitFor(60_000, controller.signal)
    controller.abort()
    await expect(wait).resolves.toBe(false)
  })
})

describe('mapWithConcurrency', () => {
  it('keeps input order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await waitFor(ms)
      return `${index}:${ms}`
    })
    expect(results).toEqual(['0:30', '1:10', '2:20'])
  })

  it('never exceeds the limit', async () => {
    let active = 0
    let peak = 0
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++
      peak = Math.max(peak, active)
      await waitFor(5)
      active--
    })
    expect(peak).toBe(2)
  })

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([])
  })
})
