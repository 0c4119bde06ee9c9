// * Transmitter Console
// * Headless controller behind the operator UI: wires the transport worker, dispatcher, debouncers,
// * inbox poller and the Pinia store, and exposes one method per control.
// * CONTROLS:
// * - Immediate: frequency entry/scroll, ppm, TX power, TX toggle, jitter, stage enables, queries, manual lines
// * - Debounced: frequency slider (200 ms), every `set` slider (150 ms, one slot per parameter)
// ! Call from the control path only; the reader task talks to it through the inbox.

import { DebounceRegistry, DebounceScheduler } from './debounce-scheduler'
import { CommandDispatcher } from './command-dispatcher'
import { InboxPoller, InboxQueue } from './inbox-queue'
import { describeError } from './link/serial'
import { createLogger } from './log'
import {
  clampFrequency,
  DEFAULT_BAUD_RATE,
  downlinkHz,
  DSP_STAGES,
  FREQ_DEBOUNCE_MS,
  FREQ_SCROLL_STEP_HZ,
  GET_AFTER_CONNECT_MS,
  INBOX_POLL_INTERVAL_MS,
  PARAM_DEBOUNCE_MS,
  parseNumericInput,
  type ProtocolVariant,
  SERIAL_ERROR_TAG,
  SET_PARAMS,
  stageKey,
} from './transmitter-protocol'
import { TransportWorker } from './transport-worker'
import type { TransmitterStore } from '../stores/transmitter'
import {
  ConnectionState,
  type DeviceConfigSnapshot,
  type DispatchOutcome,
  type DspStage,
  type ProtocolVariantId,
  type QueryCommand,
  type SetParamName,
} from '../types/transmitter'

const logger = createLogger('Console')

export interface TransmitterConsoleOptions {
  baudRate?: number
  pollIntervalMs?: number
  /** Worker factory (tests inject a worker with a mock link) */
  createWorker?: (inbox: InboxQueue) => TransportWorker
}

export interface ConsoleConnectResult {
  success: boolean
  error?: string
}

/**
 *
 */
export class TransmitterConsole {
  readonly inbox = new InboxQueue()
  readonly worker: TransportWorker
  readonly dispatcher: CommandDispatcher

  private readonly poller: InboxPoller
  private readonly baudRate: number
  private readonly freqDebouncer: DebounceScheduler<[number]>
  private readonly paramDebouncers: DebounceRegistry<SetParamName, [number]>
  private readonly getAfterConnect: DebounceScheduler<[]>

  /**
   * @param store
   * @param options
   */
  constructor(
    private readonly store: TransmitterStore,
    options: TransmitterConsoleOptions = {}
  ) {
    this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE
    this.worker = options.createWorker ? options.createWorker(this.inbox) : new TransportWorker(this.inbox)
    this.dispatcher = new CommandDispatcher(this.worker, store, () => this.variant)
    this.poller = new InboxPoller(this.inbox, (line) => this.receive(line), options.pollIntervalMs ?? INBOX_POLL_INTERVAL_MS)

    this.freqDebouncer = new DebounceScheduler(FREQ_DEBOUNCE_MS, (hz: number) => this.dispatcher.setFrequency(hz), 'freq')
    this.paramDebouncers = new DebounceRegistry(PARAM_DEBOUNCE_MS, (name: SetParamName, value: number) =>
      this.dispatcher.setParam(name, value)
    )
    this.getAfterConnect = new DebounceScheduler(GET_AFTER_CONNECT_MS, () => this.dispatcher.query('get'), 'get')

    this.worker.on('state-change', (state: ConnectionState) => {
      this.store.setConnection(state, this.worker.getPort(), this.worker.getSessionId())
      if (state === ConnectionState.FAILED) {
        this.cancelPending()
      }
    })
  }

  get variant(): ProtocolVariant {
    return this.store.variant
  }

  // ========================================================================
  // Lifecycle
  // ========================================================================

  /**
   * Start polling the inbox.
   */
  start(): void {
    this.poller.start()
  }

  /**
   * Stop polling, drop pending sends, disconnect and deliver whatever is still queued.
   */
  async shutdown(): Promise<void> {
    this.cancelPending()
    await this.worker.disconnect()
    this.poller.stop()
    this.poller.pollOnce()
  }

  // ========================================================================
  // Connection
  // ========================================================================

  /**
   * Connect and, after a short settle time, request the device configuration.
   * Failures are reported through the result and the log, not thrown.
   */
  async connect(port: string, variantId: ProtocolVariantId = this.store.variantId): Promise<ConsoleConnectResult> {
    if (this.worker.isConnected()) {
      this.store.appendLog('info', `Already connected to ${this.worker.getPort()}`)
      return { success: true }
    }

    this.store.applyVariant(variantId)
    try {
      await this.worker.connect(port, this.baudRate)
    } catch (error) {
      const message = describeError(error)
      logger.error(`Connection to ${port} failed: ${message}`)
      this.store.appendLog('error', `[CONNECT ERROR] ${message}`)
      return { success: false, error: message }
    }

    this.store.appendLog('info', `Connected to ${port}`)
    this.getAfterConnect.call()
    return { success: true }
  }

  async disconnect(): Promise<void> {
    this.cancelPending()
    await this.worker.disconnect()
    this.store.appendLog('info', 'Disconnected')
  }

  // ========================================================================
  // RF
  // ========================================================================

  /**
   * Frequency entry or scroll: clamped per variant and sent immediately.
   */
  setFrequency(hz: number): Promise<DispatchOutcome> {
    const clamped = clampFrequency(hz, this.variant.frequency)
    this.store.patchSnapshot({ freqHz: clamped })
    return this.dispatcher.setFrequency(clamped)
  }

  /**
   * Frequency typed by the operator, in Hz.
   * @throws ValidationError if the text is not a number
   */
  enterFrequency(text: string): Promise<DispatchOutcome> {
    return this.setFrequency(parseNumericInput(text, 'Frequency'))
  }

  /**
   * Scroll-wheel tuning, 50 Hz per notch (negative notches tune down).
   */
  nudgeFrequency(notches: number): Promise<DispatchOutcome> {
    return this.setFrequency(this.store.snapshot.freqHz + notches * FREQ_SCROLL_STEP_HZ)
  }

  /**
   * Frequency slider drag: the snapshot follows immediately, the device after 200 ms
   * of quiet.
   */
  dragFrequency(hz: number): void {
    const clamped = clampFrequency(hz, this.variant.frequency)
    this.store.patchSnapshot({ freqHz: clamped })
    this.freqDebouncer.call(clamped)
  }

  setPpm(ppm: number): Promise<DispatchOutcome> {
    this.store.patchSnapshot({ ppm })
    return this.dispatcher.setPpm(ppm)
  }

  setTxPower(dbm: number): Promise<DispatchOutcome> {
    this.store.patchSnapshot({ txPowerDbm: dbm })
    return this.dispatcher.setTxPower(dbm)
  }

  /**
   * Flip the transmitter enable (only on variants that have one).
   */
  toggleTx(): Promise<DispatchOutcome> {
    const enabled = !(this.store.snapshot.txEnabled ?? false)
    if (this.variant.supportsTxEnable) {
      this.store.patchSnapshot({ txEnabled: enabled })
    }
    return this.dispatcher.setTxEnabled(enabled)
  }

  setJitter(us: number): Promise<DispatchOutcome> {
    if (this.variant.supportsJitter) {
      this.store.patchSnapshot({ jitterUs: us })
    }
    return this.dispatcher.setJitter(us)
  }

  /**
   * Downlink frequency for the current uplink.
   */
  getDownlinkHz(): number {
    return downlinkHz(this.store.snapshot.freqHz)
  }

  // ========================================================================
  // DSP
  // ========================================================================

  enableStage(stage: DspStage, enabled: boolean): Promise<DispatchOutcome> {
    const patch: Partial<DeviceConfigSnapshot> = {}
    patch[stageKey(stage)] = enabled
    this.store.patchSnapshot(patch)
    return this.dispatcher.enableStage(stage, enabled)
  }

  /**
   * `set` parameter sent immediately (entry fields, buttons).
   */
  setParam(name: SetParamName, value: number): Promise<DispatchOutcome> {
    this.recordParam(name, value)
    return this.dispatcher.setParam(name, value)
  }

  /**
   * `set` parameter slider drag, debounced per parameter.
   */
  dragParam(name: SetParamName, value: number): void {
    this.recordParam(name, value)
    this.paramDebouncers.call(name, value)
  }

  // ========================================================================
  // Commands
  // ========================================================================

  query(command: QueryCommand): Promise<DispatchOutcome> {
    return this.dispatcher.query(command)
  }

  /**
   * Manual command line, sent verbatim. Blank input sends nothing.
   */
  sendManual(text: string): Promise<DispatchOutcome | null> {
    return this.dispatcher.sendRaw(text)
  }

  /**
   * Push the whole snapshot to the device: RF, variant extras, enables, then every `set`
   * parameter in table order.
   * @returns One outcome per command, empty when not connected
   */
  async sendAll(): Promise<DispatchOutcome[]> {
    if (!this.worker.isConnected()) {
      this.store.appendLog('error', '[NOT CONNECTED] send all settings')
      return []
    }

    const snapshot = { ...this.store.snapshot }
    const variant = this.variant
    const outcomes: DispatchOutcome[] = []

    outcomes.push(await this.dispatcher.setFrequency(snapshot.freqHz))
    outcomes.push(await this.dispatcher.setPpm(snapshot.ppm))
    outcomes.push(await this.dispatcher.setTxPower(snapshot.txPowerDbm))
    if (variant.supportsTxEnable && snapshot.txEnabled !== undefined) {
      outcomes.push(await this.dispatcher.setTxEnabled(snapshot.txEnabled))
    }
    if (variant.supportsJitter && snapshot.jitterUs !== undefined) {
      outcomes.push(await this.dispatcher.setJitter(snapshot.jitterUs))
    }

    for (const stage of DSP_STAGES) {
      outcomes.push(await this.dispatcher.enableStage(stage, snapshot[stageKey(stage)]))
    }

    for (const name of variant.setParams) {
      const value = snapshot[SET_PARAMS[name].key]
      if (value !== undefined) {
        outcomes.push(await this.dispatcher.setParam(name, value))
      }
    }

    this.store.appendLog('info', 'All settings sent')
    return outcomes
  }

  // ========================================================================
  // Internal Helpers
  // ========================================================================

  /**
   *
   * @param line
   */
  private receive(line: string): void {
    this.store.appendLog(line.startsWith(SERIAL_ERROR_TAG) ? 'error' : 'recv', line)
  }

  /**
   *
   * @param name
   * @param value
   */
  private recordParam(name: SetParamName, value: number): void {
    if (this.variant.setParams.includes(name)) {
      const patch: Partial<DeviceConfigSnapshot> = {}
      patch[SET_PARAMS[name].key] = value
      this.store.patchSnapshot(patch)
    }
  }

  /**
   *
   */
  private cancelPending(): void {
    this.getAfterConnect.cancel()
    this.freqDebouncer.cancel()
    this.paramDebouncers.cancelAll()
  }
}
