/**
 * Trailing-edge debounce for high-frequency parameter changes (slider drags).
 *
 * A burst of `call()`s within the delay window produces one action invocation, with the
 * arguments of the last call, once the burst has been quiet for `delayMs`. Scheduling,
 * cancelling and firing all happen on the control path, so a slot never holds more than
 * one timer.
 */

import { createLogger } from './log'

const logger = createLogger('Debounce')

export type DebouncedAction<A extends unknown[]> = (...args: A) => unknown

/**
 *
 */
export class DebounceScheduler<A extends unknown[]> {
  private timer: NodeJS.Timeout | null = null
  private latestArgs: A | null = null

  /**
   * @param delayMs - Quiet period before the action fires
   * @param action - Target; errors and rejections are logged, never re-thrown into the timer
   * @param label - Name used in log messages
   */
  constructor(
    private readonly delayMs: number,
    private readonly action: DebouncedAction<A>,
    private readonly label = 'debounced'
  ) {}

  /**
   * Record `args` as the latest and restart the delay.
   */
  call(...args: A): void {
    this.latestArgs = args
    if (this.timer) {
      clearTimeout(this.timer)
    }
    this.timer = setTimeout(() => this.fire(), this.delayMs)
  }

  /**
   * Drop the pending invocation, if any.
   */
  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
    this.latestArgs = null
  }

  isPending(): boolean {
    return this.timer !== null
  }

  /**
   *
   */
  private fire(): void {
    this.timer = null
    const args = this.latestArgs
    this.latestArgs = null
    if (!args) {
      return
    }

    try {
      const result = this.action(...args)
      if (result instanceof Promise) {
        result.catch((error: unknown) => logger.error(`${this.label} action rejected:`, error))
      }
    } catch (error) {
      logger.error(`${this.label} action threw:`, error)
    }
  }
}

/**
 * One scheduler per logical parameter id, created on first use and kept for the
 * registry's lifetime. All slots share the same delay and action; the id is passed to
 * the action as its first argument.
 */
export class DebounceRegistry<K extends string, A extends unknown[]> {
  private readonly slots = new Map<K, DebounceScheduler<A>>()

  /**
   * @param delayMs
   * @param action
   */
  constructor(
    private readonly delayMs: number,
    private readonly action: (id: K, ...args: A) => unknown
  ) {}

  /**
   * Debounced call for one parameter; other parameters' slots are unaffected.
   */
  call(id: K, ...args: A): void {
    this.slot(id).call(...args)
  }

  /**
   * Drop every pending invocation (disconnect).
   */
  cancelAll(): void {
    for (const slot of this.slots.values()) {
      slot.cancel()
    }
  }

  isPending(id: K): boolean {
    return this.slots.get(id)?.isPending() ?? false
  }

  get size(): number {
    return this.slots.size
  }

  /**
   *
   * @param id
   */
  private slot(id: K): DebounceScheduler<A> {
    let slot = this.slots.get(id)
    if (!slot) {
      slot = new DebounceScheduler<A>(this.delayMs, (...args: A) => this.action(id, ...args), id)
      this.slots.set(id, slot)
    }
    return slot
  }
}
