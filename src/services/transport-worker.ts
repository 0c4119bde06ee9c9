// * Transport Worker
// * Owns the serial handle for the transmitter console: connect, disconnect, send, and one
// * background reader task per connection.
// * ARCHITECTURE:
// * - One lock serialises every await-spanning section that touches the handle (open, write + drain, detach)
// * - The reader task pulls chunks with a short timeout, frames lines and pushes them to the inbox
// * - Disconnect stops the reader, detaches and closes the handle and sets the state in one locked section; it does not wait for the reader
// * - A reader failure pushes one '[SERIAL ERROR]' line, releases the handle and moves to FAILED

import EventEmitter from 'events'
import { v4 as uuidv4 } from 'uuid'

import { ConnectionState } from '../types/transmitter'
import type { InboxQueue } from './inbox-queue'
import { LineFramer } from './line-framer'
import { describeError, type SerialLink, SerialModuleUnavailableError, SerialPortLink } from './link/serial'
import { createLogger } from './log'
import {
  DEFAULT_BAUD_RATE,
  LINE_TERMINATOR,
  READ_CHUNK_SIZE,
  READ_TIMEOUT_MS,
  READER_IDLE_SLEEP_MS,
  SERIAL_ERROR_TAG,
  WRITE_TIMEOUT_MS,
} from './transmitter-protocol'

const logger = createLogger('TransportWorker')

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Opening the port failed, or the serial module is unavailable.
 */
export class ConnectionError extends Error {
  /**
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ConnectionError'
  }
}

/**
 * Send attempted without an open handle.
 */
export class NotConnectedError extends Error {
  /**
   * @param message
   */
  constructor(message = 'Not connected') {
    super(message)
    this.name = 'NotConnectedError'
  }
}

// ============================================================================
// Connection Lock
// ============================================================================

/**
 * Promise-chained mutex. Sections run one at a time in call order; a failing section
 * does not poison the chain.
 */
class ConnectionLock {
  private tail: Promise<void> = Promise.resolve()

  /**
   *
   * @param section
   */
  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(section)
    this.tail = result.then(
      () => undefined,
      () => undefined
    )
    return result
  }
}

// ============================================================================
// TransportWorker Class
// ============================================================================

// * EVENT EMISSION: 'state-change' (ConnectionState).
/**
 *
 */
export class TransportWorker extends EventEmitter {
  private link: SerialLink | null = null
  private state: ConnectionState = ConnectionState.DISCONNECTED
  private readonly lock = new ConnectionLock()
  private stopController: AbortController | null = null
  private readerTask: Promise<void> = Promise.resolve()

  private sessionId: string | null = null
  private port: string | null = null

  /**
   * @param inbox - Receives every framed line and reader error lines
   */
  constructor(private readonly inbox: InboxQueue) {
    super()
  }

  // ========================================================================
  // Factory Methods (for test injection)
  // ========================================================================

  /**
   *
   * @param port
   * @param baudRate
   */
  protected createSerialLink(port: string, baudRate: number): SerialLink {
    return new SerialPortLink(port, baudRate)
  }

  /**
   *
   * @param ms
   */
  protected sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
  }

  // ========================================================================
  // Connection Management
  // ========================================================================

  /**
   * Open the port and start the reader task. Returns once the port is open, without
   * waiting for any data. No-op when already connected.
   * @throws ConnectionError if the open fails or the serial module cannot be loaded
   */
  async connect(port: string, baudRate: number = DEFAULT_BAUD_RATE): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.isConnected()) {
        logger.debug(`connect(${port}) ignored: already connected to ${this.port}`)
        return
      }

      logger.info(`Opening ${port} at ${baudRate} baud`)
      let link: SerialLink
      try {
        link = this.createSerialLink(port, baudRate)
        await link.open()
      } catch (error) {
        this.setState(ConnectionState.FAILED)
        if (error instanceof SerialModuleUnavailableError) {
          throw new ConnectionError(error.message)
        }
        throw new ConnectionError(`Failed to open port ${port}: ${describeError(error)}`)
      }

      const stopController = new AbortController()
      this.stopController = stopController
      this.link = link
      this.port = port
      this.sessionId = uuidv4()
      this.setState(ConnectionState.CONNECTED)
      logger.info(`Connected to ${port} (session ${this.sessionId})`)

      this.readerTask = this.runReader(link, stopController.signal, this.sessionId).catch((error: unknown) => {
        logger.error('Reader task crashed:', error)
      })
    })
  }

  /**
   * Stop the reader, detach the handle and close it. Safe to call at any time, any
   * number of times. Close errors are logged, not thrown.
   * A `connect()` issued right after runs once the old handle is closed.
   */
  async disconnect(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.stopController?.abort()
      this.stopController = null

      const link = this.detach()
      if (link) {
        logger.info(`Disconnecting from ${this.port} (session ${this.sessionId})`)
        await this.closeQuietly(link)
      }
      this.setState(ConnectionState.DISCONNECTED)
    })
  }

  // ========================================================================
  // Sending
  // ========================================================================

  /**
   * Trim, append CRLF, write and drain while holding the lock. Blank input is ignored.
   * @throws NotConnectedError if no handle is open
   */
  async sendLine(text: string): Promise<void> {
    const line = text.trim()
    if (!line) {
      return
    }

    const data = Buffer.from(line + LINE_TERMINATOR, 'utf8')
    await this.lock.runExclusive(async () => {
      const link = this.link
      if (!link || !link.isOpen) {
        throw new NotConnectedError()
      }
      await link.write(data, WRITE_TIMEOUT_MS)
    })
  }

  // ========================================================================
  // Status
  // ========================================================================

  isConnected(): boolean {
    return this.link !== null && this.link.isOpen && this.state === ConnectionState.CONNECTED
  }

  getState(): ConnectionState {
    return this.state
  }

  /** Session id of the current or last connection */
  getSessionId(): string | null {
    return this.sessionId
  }

  /** Port of the current or last connection */
  getPort(): string | null {
    return this.port
  }

  /**
   * Resolves once the current reader task has exited. The control path never waits on
   * this; shutdown and tests do.
   */
  whenReaderStopped(): Promise<void> {
    return this.readerTask
  }

  // ========================================================================
  // Internal Helpers
  // ========================================================================

  /**
   *
   * @param link
   * @param signal
   * @param sessionId
   */
  private async runReader(link: SerialLink, signal: AbortSignal, sessionId: string): Promise<void> {
    const framer = new LineFramer()
    logger.debug(`Reader started (session ${sessionId})`)

    while (!signal.aborted && this.link === link) {
      let chunk: Buffer
      try {
        chunk = await link.read(READ_CHUNK_SIZE, READ_TIMEOUT_MS)
      } catch (error) {
        if (signal.aborted) {
          // Port closed by disconnect() while a read was pending
          break
        }
        logger.error(`Serial read failed (session ${sessionId}): ${describeError(error)}`)
        this.inbox.push(`${SERIAL_ERROR_TAG} ${describeError(error)}`)
        await this.handleReaderFailure(link)
        return
      }

      if (chunk.length === 0) {
        await this.sleep(READER_IDLE_SLEEP_MS)
        continue
      }

      for (const line of framer.feed(chunk)) {
        this.inbox.push(line)
      }
    }

    const dropped = framer.getBufferedByteCount()
    logger.debug(`Reader stopped (session ${sessionId})${dropped > 0 ? `, ${dropped} unterminated bytes dropped` : ''}`)
  }

  /**
   * Release the handle after the reader died, unless a disconnect or a newer
   * connection already replaced it.
   */
  private async handleReaderFailure(link: SerialLink): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.link !== link) {
        return
      }
      this.stopController?.abort()
      this.stopController = null
      this.detach()
      await this.closeQuietly(link)
      this.setState(ConnectionState.FAILED)
    })
  }

  /**
   * Clear the shared handle. Only called inside the lock.
   */
  private detach(): SerialLink | null {
    const link = this.link
    this.link = null
    return link
  }

  /**
   *
   * @param link
   */
  private async closeQuietly(link: SerialLink): Promise<void> {
    try {
      await link.close()
    } catch (error) {
      logger.warn(`Error closing port ${this.port}: ${describeError(error)}`)
    }
  }

  /**
   *
   * @param state
   */
  private setState(state: ConnectionState): void {
    if (this.state === state) {
      return
    }
    this.state = state
    this.emit('state-change', state)
  }
}
