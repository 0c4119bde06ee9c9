/**
 * Serial link backed by the `serialport` package.
 *
 * The transport worker owns exactly one link per connection. The link exposes a pull
 * interface (`read` with a timeout) so the reader task can observe its stop signal
 * between reads instead of being driven by 'data' events.
 */

import type { SerialPort } from 'serialport'

import { createLogger } from '../log'

const logger = createLogger('SerialLink')

/**
 * Handle abstraction the transport worker talks to. Tests provide an in-process mock.
 */
export interface SerialLink {
  readonly isOpen: boolean
  open(): Promise<void>
  close(): Promise<void>
  /**
   * Read up to `maxBytes`. Resolves with an empty buffer when nothing arrives within
   * `timeoutMs`; rejects with TransportReadError on an I/O failure.
   */
  read(maxBytes: number, timeoutMs: number): Promise<Buffer>
  /**
   * Write and drain, failing if both have not completed within `timeoutMs`.
   */
  write(data: Buffer, timeoutMs: number): Promise<void>
}

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * I/O failure while reading from an open link.
 */
export class TransportReadError extends Error {
  /**
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'TransportReadError'
  }
}

/**
 * The `serialport` native module could not be loaded.
 */
export class SerialModuleUnavailableError extends Error {
  /**
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'SerialModuleUnavailableError'
  }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// SerialPortLink
// ============================================================================

type SerialPortConstructor = typeof SerialPort

let serialPortClass: SerialPortConstructor | null = null

/**
 * Load `serialport` on first use; its native binding may be missing on some hosts.
 */
async function loadSerialPort(): Promise<SerialPortConstructor> {
  if (!serialPortClass) {
    try {
      const serialportModule = await import('serialport')
      serialPortClass = serialportModule.SerialPort
      logger.debug('Loaded serialport native module')
    } catch (error) {
      logger.error('Failed to load serialport native module:', error)
      throw new SerialModuleUnavailableError(`serialport is not available: ${describeError(error)}`)
    }
  }
  return serialPortClass
}

/**
 *
 */
export class SerialPortLink implements SerialLink {
  private port: SerialPort | null = null
  private closing = false
  private failure: Error | null = null

  /**
   * @param path - Device path, e.g. /dev/ttyACM0 or COM5
   * @param baudRate
   */
  constructor(
    readonly path: string,
    readonly baudRate: number
  ) {}

  get isOpen(): boolean {
    return this.port !== null && this.port.isOpen
  }

  async open(): Promise<void> {
    const SerialPortClass = await loadSerialPort()
    const port = new SerialPortClass({ path: this.path, baudRate: this.baudRate, autoOpen: false })

    // Stream errors surface on the next read
    port.on('error', (error: Error) => {
      logger.warn(`Port ${this.path} error: ${error.message}`)
      this.failure = error
    })

    await new Promise<void>((resolve, reject) => {
      port.open((error) => (error ? reject(error) : resolve()))
    })

    this.closing = false
    this.failure = null
    this.port = port
  }

  async close(): Promise<void> {
    const port = this.port
    if (!port) {
      return
    }

    this.closing = true
    this.port = null
    if (!port.isOpen) {
      return
    }

    await new Promise<void>((resolve, reject) => {
      port.close((error) => (error ? reject(error) : resolve()))
    })
  }

  read(maxBytes: number, timeoutMs: number): Promise<Buffer> {
    const port = this.port
    if (this.failure) {
      return Promise.reject(new TransportReadError(this.failure.message))
    }
    if (!port || !port.isOpen) {
      return Promise.reject(new TransportReadError('Port not open'))
    }

    const immediate = this.take(port, maxBytes)
    if (immediate) {
      return Promise.resolve(immediate)
    }

    return new Promise<Buffer>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer)
        port.off('readable', onReadable)
        port.off('error', onError)
        port.off('close', onClose)
      }
      const onReadable = (): void => {
        const chunk = this.take(port, maxBytes)
        if (chunk) {
          cleanup()
          resolve(chunk)
        }
      }
      const onError = (error: Error): void => {
        cleanup()
        reject(new TransportReadError(error.message))
      }
      const onClose = (): void => {
        cleanup()
        if (this.closing) {
          resolve(Buffer.alloc(0))
        } else {
          reject(new TransportReadError('Port closed unexpectedly'))
        }
      }
      const timer = setTimeout(() => {
        cleanup()
        resolve(Buffer.alloc(0))
      }, timeoutMs)

      port.on('readable', onReadable)
      port.on('error', onError)
      port.on('close', onClose)
    })
  }

  async write(data: Buffer, timeoutMs: number): Promise<void> {
    const port = this.port
    if (!port || !port.isOpen) {
      throw new Error('Port not open')
    }

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new Error(`Write timed out after ${timeoutMs} ms`)), timeoutMs)
    })
    const written = new Promise<void>((resolve, reject) => {
      port.write(data, (error) => {
        if (error) {
          reject(error)
        }
      })
      port.drain((error) => (error ? reject(error) : resolve()))
    })
    written.catch((error: unknown) => logger.debug(`Write on ${this.path} failed: ${describeError(error)}`))

    try {
      await Promise.race([written, timeout])
    } finally {
      clearTimeout(timer)
    }
  }

  /**
   * Pull at most `maxBytes` from the stream buffer, pushing any excess back.
   */
  private take(port: SerialPort, maxBytes: number): Buffer | null {
    const chunk: unknown = port.read()
    if (!Buffer.isBuffer(chunk) || chunk.length === 0) {
      return null
    }
    if (chunk.length > maxBytes) {
      port.unshift(chunk.subarray(maxBytes))
      return chunk.subarray(0, maxBytes)
    }
    return chunk
  }
}
