/**
 * Unit tests for the trailing-edge debounce scheduler and its per-parameter registry
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { DebounceRegistry, DebounceScheduler } from '../src/services/debounce-scheduler'

describe('DebounceScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('fires once with the last arguments after the burst goes quiet', () => {
    const action = vi.fn()
    const scheduler = new DebounceScheduler<[number]>(200, action)

    scheduler.call(2_400_100_000)
    vi.advanceTimersByTime(150)
    scheduler.call(2_400_200_000)
    vi.advanceTimersByTime(150)
    scheduler.call(2_400_300_000)

    expect(action).not.toHaveBeenCalled()
    vi.advanceTimersByTime(199)
    expect(action).not.toHaveBeenCalled()
    vi.advanceTimersByTime(1)

    expect(action).toHaveBeenCalledTimes(1)
    expect(action).toHaveBeenCalledWith(2_400_300_000)
    expect(scheduler.isPending()).toBe(false)
  })

  it('drops the pending call on cancel', () => {
    const action = vi.fn()
    const scheduler = new DebounceScheduler<[number]>(200, action)

    scheduler.call(1)
    scheduler.cancel()
    vi.advanceTimersByTime(1000)

    expect(action).not.toHaveBeenCalled()
    expect(scheduler.isPending()).toBe(false)
  })

  it('keeps working after the action throws', () => {
    const action = vi.fn().mockImplementationOnce(() => {
      throw new Error('boom')
    })
    const scheduler = new DebounceScheduler<[number]>(100, action)

    scheduler.call(1)
    vi.advanceTimersByTime(100)
    scheduler.call(2)
    vi.advanceTimersByTime(100)

    expect(action).toHaveBeenCalledTimes(2)
    expect(action).toHaveBeenLastCalledWith(2)
  })

  it('does not leak a rejected action', async () => {
    const action = vi.fn().mockRejectedValue(new Error('send failed'))
    const scheduler = new DebounceScheduler<[]>(100, action)

    scheduler.call()
    await vi.advanceTimersByTimeAsync(100)

    expect(action).toHaveBeenCalledTimes(1)
  })
})

describe('DebounceRegistry', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('debounces each id independently', () => {
    const action = vi.fn()
    const registry = new DebounceRegistry<string, [number]>(150, action)

    registry.call('bp_lo', 100)
    registry.call('bp_hi', 3000)
    registry.call('bp_lo', 120)
    vi.advanceTimersByTime(150)

    expect(action).toHaveBeenCalledTimes(2)
    expect(action).toHaveBeenCalledWith('bp_lo', 120)
    expect(action).toHaveBeenCalledWith('bp_hi', 3000)
    expect(registry.size).toBe(2)
  })

  it('does not let one id reset another id\'s timer', () => {
    const action = vi.fn()
    const registry = new DebounceRegistry<string, [number]>(150, action)

    registry.call('comp_thr', -10)
    vi.advanceTimersByTime(100)
    registry.call('comp_ratio', 4)
    vi.advanceTimersByTime(50)

    expect(action).toHaveBeenCalledTimes(1)
    expect(action).toHaveBeenCalledWith('comp_thr', -10)
    expect(registry.isPending('comp_ratio')).toBe(true)
    expect(registry.isPending('comp_thr')).toBe(false)
  })

  it('cancels every slot and keeps them usable', () => {
    const action = vi.fn()
    const registry = new DebounceRegistry<string, [number]>(150, action)

    registry.call('eq_low_db', 3)
    registry.call('eq_high_db', 6)
    registry.cancelAll()
    vi.advanceTimersByTime(500)
    expect(action).not.toHaveBeenCalled()

    registry.call('amp_gain', 1.5)
    vi.advanceTimersByTime(150)
    expect(action).toHaveBeenCalledTimes(1)
    expect(action).toHaveBeenCalledWith('amp_gain', 1.5)
    expect(registry.isPending('unknown')).toBe(false)
  })
})
