/**
 * Command dispatcher.
 *
 * Turns a semantic parameter change into a protocol line and hands it to the transport.
 * Transport and builder failures stop here: they become log entries and an outcome, and
 * never reach the caller (UI handlers, debounce timers).
 */

import type { DispatchOutcome, DspStage, LogKind, ParameterCommand, QueryCommand, SetParamName } from '../types/transmitter'
import { describeError } from './link/serial'
import { createLogger } from './log'
import {
  buildEnableCommand,
  buildFrequencyCommand,
  buildJitterCommand,
  buildPpmCommand,
  buildQueryCommand,
  buildRawCommand,
  buildSetCommand,
  buildTxEnableCommand,
  buildTxPowerCommand,
  type ProtocolVariant,
} from './transmitter-protocol'

const logger = createLogger('Dispatcher')

/**
 * The part of the transport worker the dispatcher needs.
 */
export interface CommandTransport {
  isConnected(): boolean
  sendLine(text: string): Promise<void>
}

/**
 * Where dispatch log entries go (the transmitter store in the app).
 */
export interface DispatchLog {
  appendLog(kind: LogKind, text: string): void
}

/**
 *
 */
export class CommandDispatcher {
  /**
   * @param transport
   * @param log
   * @param getVariant - Firmware variant of the current connection
   */
  constructor(
    private readonly transport: CommandTransport,
    private readonly log: DispatchLog,
    private readonly getVariant: () => ProtocolVariant
  ) {}

  /**
   * Send one command if connected. Never throws.
   */
  async dispatch(command: ParameterCommand): Promise<DispatchOutcome> {
    if (!this.transport.isConnected()) {
      this.log.appendLog('error', `[NOT CONNECTED] ${command.line}`)
      return 'not-connected'
    }

    try {
      await this.transport.sendLine(command.line)
    } catch (error) {
      logger.warn(`Send of '${command.line}' failed: ${describeError(error)}`)
      this.log.appendLog('error', `[SEND ERROR] ${describeError(error)}`)
      return 'failed'
    }

    logger.debug(`Sent ${command.name}: ${command.line}`)
    this.log.appendLog('sent', `> ${command.line}`)
    return 'sent'
  }

  /**
   * Operator-typed command. Blank input sends nothing.
   */
  async sendRaw(text: string): Promise<DispatchOutcome | null> {
    const command = buildRawCommand(text)
    return command ? this.dispatch(command) : null
  }

  setFrequency(hz: number): Promise<DispatchOutcome> {
    return this.dispatchBuilt(() => buildFrequencyCommand(hz, this.getVariant()))
  }

  setPpm(ppm: number): Promise<DispatchOutcome> {
    return this.dispatchBuilt(() => buildPpmCommand(ppm))
  }

  setTxPower(dbm: number): Promise<DispatchOutcome> {
    return this.dispatchBuilt(() => buildTxPowerCommand(dbm))
  }

  setTxEnabled(enabled: boolean): Promise<DispatchOutcome> {
    return this.dispatchBuilt(() => buildTxEnableCommand(enabled, this.getVariant()))
  }

  setJitter(us: number): Promise<DispatchOutcome> {
    return this.dispatchBuilt(() => buildJitterCommand(us, this.getVariant()))
  }

  setParam(name: SetParamName, value: number): Promise<DispatchOutcome> {
    return this.dispatchBuilt(() => buildSetCommand(name, value, this.getVariant()))
  }

  enableStage(stage: DspStage, enabled: boolean): Promise<DispatchOutcome> {
    return this.dispatchBuilt(() => buildEnableCommand(stage, enabled))
  }

  query(command: QueryCommand): Promise<DispatchOutcome> {
    return this.dispatchBuilt(() => buildQueryCommand(command))
  }

  /**
   * Build then dispatch; a builder rejection (unsupported command, NaN) is logged like a
   * send failure.
   */
  private async dispatchBuilt(build: () => ParameterCommand): Promise<DispatchOutcome> {
    let command: ParameterCommand
    try {
      command = build()
    } catch (error) {
      logger.warn(`Command rejected: ${describeError(error)}`)
      this.log.appendLog('error', `[SEND ERROR] ${describeError(error)}`)
      return 'failed'
    }
    return this.dispatch(command)
  }
}
