/**
 * Inbox between the reader task and the display layer.
 *
 * The reader task only pushes; the control loop drains on a fixed interval. The queue
 * is unbounded so a push never waits, and arrival order is preserved.
 */

import { INBOX_POLL_INTERVAL_MS } from './transmitter-protocol'
import { createLogger } from './log'

const logger = createLogger('Inbox')

/**
 *
 */
export class InboxQueue {
  private lines: string[] = []

  /**
   * Append one decoded line.
   */
  push(line: string): void {
    this.lines.push(line)
  }

  /**
   * Remove and return everything queued, oldest first. Never waits.
   */
  drain(): string[] {
    if (this.lines.length === 0) {
      return []
    }
    const drained = this.lines
    this.lines = []
    return drained
  }

  get size(): number {
    return this.lines.length
  }
}

export type InboxConsumer = (line: string) => void

/**
 * Periodic drain-all-then-return loop on the control path.
 */
export class InboxPoller {
  private interval: NodeJS.Timeout | null = null

  /**
   * @param inbox
   * @param consumer - Receives each line in order (display layer)
   * @param intervalMs
   */
  constructor(
    private readonly inbox: InboxQueue,
    private readonly consumer: InboxConsumer,
    private readonly intervalMs: number = INBOX_POLL_INTERVAL_MS
  ) {}

  start(): void {
    if (this.interval) {
      return
    }
    this.interval = setInterval(() => this.pollOnce(), this.intervalMs)
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
    }
  }

  /**
   * Drain once and deliver. A consumer error is logged and the remaining lines are
   * still delivered.
   * @returns Number of lines delivered
   */
  pollOnce(): number {
    const lines = this.inbox.drain()
    for (const line of lines) {
      try {
        this.consumer(line)
      } catch (error) {
        logger.error('Inbox consumer failed:', error)
      }
    }
    return lines.length
  }
}
