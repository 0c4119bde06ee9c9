/**
 * Shared transmitter console type definitions.
 *
 * Used by the transport services, the console facade and the Pinia store.
 */

/**
 * Connection lifecycle of the transport worker.
 * - 'disconnected': no handle, no reader task
 * - 'connected': handle open, exactly one reader task running
 * - 'failed': last open attempt or the reader task failed; handle already released
 */
export enum ConnectionState {
  DISCONNECTED = 'disconnected',
  CONNECTED = 'connected',
  FAILED = 'failed',
}

/**
 * Firmware schema the console talks to.
 * - 'sx1280-tx': transmitter enable, continuous frequency
 * - 'sx1280-jitter': timing jitter and EQ slope, frequency stepped to 100 Hz
 */
export type ProtocolVariantId = 'sx1280-tx' | 'sx1280-jitter'

/** DSP stage identifiers accepted by `enable`. */
export type DspStage = 'bp' | 'eq' | 'comp'

/** Zero-argument query and test commands. */
export type QueryCommand = 'get' | 'diag' | 'help' | 'cw' | 'stop'

/** Names accepted by the generic `set <param> <value>` command. */
export type SetParamName =
  | 'bp_lo'
  | 'bp_hi'
  | 'bp_stages'
  | 'eq_low_hz'
  | 'eq_low_db'
  | 'eq_high_hz'
  | 'eq_high_db'
  | 'eq_slope'
  | 'comp_thr'
  | 'comp_ratio'
  | 'comp_att'
  | 'comp_rel'
  | 'comp_makeup'
  | 'comp_knee'
  | 'comp_outlim'
  | 'amp_gain'
  | 'amp_min_a'

/**
 * One protocol line ready for the wire (without terminator).
 */
export interface ParameterCommand {
  /** Logical parameter or command name, e.g. 'freq' or 'set bp_lo' */
  readonly name: string
  /** Formatted protocol line, e.g. 'freq 2400400000.0' */
  readonly line: string
}

/**
 * Optimistic local mirror of the device configuration.
 * Not authoritative: reconciled only by re-issuing `get`.
 */
export interface DeviceConfigSnapshot {
  freqHz: number
  ppm: number
  txPowerDbm: number
  /** Present on the 'sx1280-tx' variant only */
  txEnabled?: boolean
  /** Present on the 'sx1280-jitter' variant only */
  jitterUs?: number

  enableBp: boolean
  enableEq: boolean
  enableComp: boolean

  bpLoHz: number
  bpHiHz: number
  bpStages: number

  eqLowHz: number
  eqLowDb: number
  eqHighHz: number
  eqHighDb: number
  /** Present on the 'sx1280-jitter' variant only */
  eqSlope?: number

  compThrDb: number
  compRatio: number
  compAttackMs: number
  compReleaseMs: number
  compMakeupDb: number
  compKneeDb: number
  compOutLimit: number

  ampGain: number
  ampMinA: number
}

/** Log entry category, mirrors how the console colours lines. */
export type LogKind = 'recv' | 'sent' | 'error' | 'info'

export interface LogEntry {
  /** Monotonic entry number */
  id: number
  kind: LogKind
  text: string
  /** ISO 8601 wall clock */
  timestamp: string
}

/** Result of a dispatch attempt. */
export type DispatchOutcome = 'sent' | 'not-connected' | 'failed'

/** Snapshot fields holding numbers (targets of `set` parameters). */
export type NumericSnapshotKey = {
  [K in keyof DeviceConfigSnapshot]-?: NonNullable<DeviceConfigSnapshot[K]> extends number ? K : never
}[keyof DeviceConfigSnapshot]
