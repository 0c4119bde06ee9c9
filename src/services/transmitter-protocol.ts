/**
 * SX1280 transmitter CDC protocol.
 *
 * ARCHITECTURE:
 * - Line protocol constants and timing
 * - The two firmware schemas (protocol variants) and their defaults
 * - Frequency clamp/quantizer
 * - Command builders producing immutable ParameterCommand values
 *
 * PROTOCOL REFERENCE:
 * One command per line, CRLF terminated in both directions. The firmware answers with
 * free-form text ('OK ...', 'ERR: ...', a multi-line 'CFG:' dump for `get`).
 */

import type {
  DeviceConfigSnapshot,
  DspStage,
  NumericSnapshotKey,
  ParameterCommand,
  ProtocolVariantId,
  QueryCommand,
  SetParamName,
} from '../types/transmitter'

// ============================================================================
// Protocol Constants
// ============================================================================

/** Line terminator sent after every command */
export const LINE_TERMINATOR = '\r\n'

export const DEFAULT_BAUD_RATE = 115200

/** Inbound lines containing any of these go to the status display as well */
export const STATUS_MARKERS = ['CFG:', '===', 'Status:'] as const

/** Prefix of the synthetic inbox line pushed when the reader task fails */
export const SERIAL_ERROR_TAG = '[SERIAL ERROR]'

// ============================================================================
// Timing Constants (milliseconds)
// ============================================================================

export const READ_TIMEOUT_MS = 100 // Serial read timeout per reader iteration
export const WRITE_TIMEOUT_MS = 500 // Upper bound on write + drain
export const READ_CHUNK_SIZE = 256 // Max bytes per read
export const READER_IDLE_SLEEP_MS = 10 // Sleep after an empty read
export const INBOX_POLL_INTERVAL_MS = 50
export const FREQ_DEBOUNCE_MS = 200
export const PARAM_DEBOUNCE_MS = 150
export const GET_AFTER_CONNECT_MS = 500

// ============================================================================
// Frequency
// ============================================================================

export const FREQ_MIN_HZ = 2_400_000_000
export const FREQ_MAX_HZ = 2_400_500_000
export const FREQ_STEP_HZ = 100

/** Scroll-wheel tuning increment */
export const FREQ_SCROLL_STEP_HZ = 50

/** QO-100 narrowband transponder: 2400.xxx MHz up, 10489.xxx MHz down */
export const QO100_DOWNLINK_OFFSET_HZ = 8_089_500_000

export type FrequencyPolicy =
  | {
      kind: 'continuous'
      minHz: number
      maxHz: number
    }
  | {
      kind: 'stepped'
      minHz: number
      maxHz: number
      stepHz: number
    }

/**
 * Bound a frequency to the policy's range and, for stepped policies, snap it down to
 * `minHz + k * stepHz`. Total over numbers: NaN maps to `minHz`, infinities to the
 * nearest bound. Idempotent.
 */
export function clampFrequency(hz: number, policy: FrequencyPolicy): number {
  const bounded = Number.isNaN(hz) ? policy.minHz : Math.min(policy.maxHz, Math.max(policy.minHz, hz))

  if (policy.kind === 'continuous') {
    return bounded
  }

  return policy.minHz + Math.floor((bounded - policy.minHz) / policy.stepHz) * policy.stepHz
}

/**
 * Downlink frequency shown next to the uplink.
 */
export function downlinkHz(uplinkHz: number): number {
  return uplinkHz + QO100_DOWNLINK_OFFSET_HZ
}

// ============================================================================
// Parameter Table
// ============================================================================

/** Wire format: fixed decimals, integer, or shortest round-trip form */
type ParamFormat = { decimals: number } | 'integer' | 'shortest'

interface SetParamDef {
  key: NumericSnapshotKey
  format: ParamFormat
  min: number
  max: number
}

export const SET_PARAMS: Readonly<Record<SetParamName, SetParamDef>> = {
  bp_lo: { key: 'bpLoHz', format: { decimals: 0 }, min: 50, max: 1500 },
  bp_hi: { key: 'bpHiHz', format: { decimals: 0 }, min: 500, max: 3600 },
  bp_stages: { key: 'bpStages', format: 'integer', min: 1, max: 10 },
  eq_low_hz: { key: 'eqLowHz', format: { decimals: 0 }, min: 50, max: 1000 },
  eq_low_db: { key: 'eqLowDb', format: { decimals: 1 }, min: -24, max: 24 },
  eq_high_hz: { key: 'eqHighHz', format: { decimals: 0 }, min: 500, max: 3500 },
  eq_high_db: { key: 'eqHighDb', format: { decimals: 1 }, min: -24, max: 24 },
  eq_slope: { key: 'eqSlope', format: { decimals: 2 }, min: 0.3, max: 2.0 },
  comp_thr: { key: 'compThrDb', format: { decimals: 1 }, min: -60, max: 0 },
  comp_ratio: { key: 'compRatio', format: { decimals: 1 }, min: 1, max: 20 },
  comp_att: { key: 'compAttackMs', format: { decimals: 1 }, min: 0.1, max: 200 },
  comp_rel: { key: 'compReleaseMs', format: { decimals: 0 }, min: 10, max: 2000 },
  comp_makeup: { key: 'compMakeupDb', format: { decimals: 1 }, min: 0, max: 40 },
  comp_knee: { key: 'compKneeDb', format: { decimals: 1 }, min: 0, max: 24 },
  comp_outlim: { key: 'compOutLimit', format: { decimals: 3 }, min: 0.01, max: 0.999 },
  amp_gain: { key: 'ampGain', format: { decimals: 3 }, min: 0.01, max: 5 },
  amp_min_a: { key: 'ampMinA', format: 'shortest', min: 1e-9, max: 1 },
}

export const PPM_MIN = -100
export const PPM_MAX = 100
export const TXPWR_MIN_DBM = -18
export const TXPWR_MAX_DBM = 13
export const JITTER_MIN_US = 0
export const JITTER_MAX_US = 30

export const DSP_STAGES: readonly DspStage[] = ['bp', 'eq', 'comp']

const STAGE_KEYS: Readonly<Record<DspStage, 'enableBp' | 'enableEq' | 'enableComp'>> = {
  bp: 'enableBp',
  eq: 'enableEq',
  comp: 'enableComp',
}

/**
 * Snapshot field backing a DSP stage enable.
 */
export function stageKey(stage: DspStage): 'enableBp' | 'enableEq' | 'enableComp' {
  return STAGE_KEYS[stage]
}

// ============================================================================
// Protocol Variants
// ============================================================================

export interface ProtocolVariant {
  id: ProtocolVariantId
  label: string
  frequency: FrequencyPolicy
  supportsTxEnable: boolean
  supportsJitter: boolean
  /** `set` parameters in the order `sendAll` emits them */
  setParams: readonly SetParamName[]
  defaults: Readonly<DeviceConfigSnapshot>
}

const COMMON_DEFAULTS: DeviceConfigSnapshot = {
  freqHz: 2_400_400_000,
  ppm: 0,
  txPowerDbm: 13,

  enableBp: true,
  enableEq: true,
  enableComp: true,

  bpLoHz: 50,
  bpHiHz: 2700,
  bpStages: 7,

  eqLowHz: 190,
  eqLowDb: -2,
  eqHighHz: 1700,
  eqHighDb: 13.5,

  compThrDb: -2.5,
  compRatio: 6.1,
  compAttackMs: 41.1,
  compReleaseMs: 1595,
  compMakeupDb: 0,
  compKneeDb: 16.5,
  compOutLimit: 0.94,

  ampGain: 2.9,
  ampMinA: 0.000002,
}

const BASE_SET_PARAMS: readonly SetParamName[] = [
  'bp_lo',
  'bp_hi',
  'bp_stages',
  'eq_low_hz',
  'eq_low_db',
  'eq_high_hz',
  'eq_high_db',
  'comp_thr',
  'comp_ratio',
  'comp_att',
  'comp_rel',
  'comp_makeup',
  'comp_knee',
  'comp_outlim',
  'amp_gain',
  'amp_min_a',
]

export const PROTOCOL_VARIANTS: Readonly<Record<ProtocolVariantId, ProtocolVariant>> = {
  'sx1280-tx': {
    id: 'sx1280-tx',
    label: 'SX1280 SSB TX (TX enable, sub-Hz tuning)',
    frequency: { kind: 'continuous', minHz: FREQ_MIN_HZ, maxHz: FREQ_MAX_HZ },
    supportsTxEnable: true,
    supportsJitter: false,
    setParams: BASE_SET_PARAMS,
    defaults: { ...COMMON_DEFAULTS, txEnabled: true },
  },
  'sx1280-jitter': {
    id: 'sx1280-jitter',
    label: 'SX1280 SSB TX (timing jitter, EQ slope, 100 Hz steps)',
    frequency: { kind: 'stepped', minHz: FREQ_MIN_HZ, maxHz: FREQ_MAX_HZ, stepHz: FREQ_STEP_HZ },
    supportsTxEnable: false,
    supportsJitter: true,
    setParams: [...BASE_SET_PARAMS.slice(0, 7), 'eq_slope', ...BASE_SET_PARAMS.slice(7)],
    defaults: { ...COMMON_DEFAULTS, jitterUs: 0, eqSlope: 2.0 },
  },
}

export const DEFAULT_VARIANT_ID: ProtocolVariantId = 'sx1280-tx'

/**
 * Narrow an arbitrary string to a known variant id.
 */
export function isProtocolVariantId(value: string): value is ProtocolVariantId {
  return Object.prototype.hasOwnProperty.call(PROTOCOL_VARIANTS, value)
}

/**
 * Narrow an arbitrary string to a `set` parameter name.
 */
export function isSetParamName(value: string): value is SetParamName {
  return Object.prototype.hasOwnProperty.call(SET_PARAMS, value)
}

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Malformed numeric input from the operator.
 */
export class ValidationError extends Error {
  /**
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Command not understood by the selected firmware variant.
 */
export class UnsupportedCommandError extends Error {
  /**
   * @param message
   */
  constructor(message: string) {
    super(message)
    this.name = 'UnsupportedCommandError'
  }
}

// ============================================================================
// Input Parsing
// ============================================================================

/**
 * Parse a numeric entry field. Accepts a comma as decimal separator.
 * @param text - Raw field text
 * @param field - Field name used in the error message
 * @throws ValidationError if the text is empty or not a finite number
 */
export function parseNumericInput(text: string, field: string): number {
  const normalized = text.trim().replace(',', '.')
  if (!normalized) {
    throw new ValidationError(`${field} must be a number, got an empty value`)
  }

  const value = Number(normalized)
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a number, got '${text}'`)
  }

  return value
}

// ============================================================================
// Command Builders
// ============================================================================

/**
 *
 * @param name
 * @param line
 */
function makeCommand(name: string, line: string): ParameterCommand {
  return Object.freeze({ name, line })
}

/**
 * Clamp a numeric argument; NaN has no sensible clamp so it is rejected.
 */
function clampArgument(value: number, min: number, max: number, field: string): number {
  if (Number.isNaN(value)) {
    throw new ValidationError(`${field} must be a number`)
  }
  return Math.min(max, Math.max(min, value))
}

/**
 *
 * @param value
 * @param format
 */
function formatValue(value: number, format: ParamFormat): string {
  if (format === 'integer') {
    return String(Math.trunc(value))
  }
  if (format === 'shortest') {
    return String(value)
  }
  return value.toFixed(format.decimals)
}

/**
 * `freq <hz>`: clamped by the variant's policy, one decimal on continuous variants,
 * integer on stepped ones.
 */
export function buildFrequencyCommand(hz: number, variant: ProtocolVariant): ParameterCommand {
  const clamped = clampFrequency(hz, variant.frequency)
  const text = variant.frequency.kind === 'continuous' ? clamped.toFixed(1) : clamped.toFixed(0)
  return makeCommand('freq', `freq ${text}`)
}

/**
 * `ppm <value>` with four decimals, clamped to [-100, 100].
 */
export function buildPpmCommand(ppm: number): ParameterCommand {
  const value = clampArgument(ppm, PPM_MIN, PPM_MAX, 'ppm')
  return makeCommand('ppm', `ppm ${value.toFixed(4)}`)
}

/**
 * `txpwr <dbm>`, rounded and clamped to [-18, 13].
 */
export function buildTxPowerCommand(dbm: number): ParameterCommand {
  const value = Math.round(clampArgument(dbm, TXPWR_MIN_DBM, TXPWR_MAX_DBM, 'txpwr'))
  return makeCommand('txpwr', `txpwr ${value}`)
}

/**
 * `tx <0|1>`
 * @throws UnsupportedCommandError on variants without a TX enable
 */
export function buildTxEnableCommand(enabled: boolean, variant: ProtocolVariant): ParameterCommand {
  if (!variant.supportsTxEnable) {
    throw new UnsupportedCommandError(`'tx' is not supported by ${variant.id}`)
  }
  return makeCommand('tx', `tx ${enabled ? '1' : '0'}`)
}

/**
 * `jitter <us>`, rounded and clamped to [0, 30].
 * @throws UnsupportedCommandError on variants without timing jitter
 */
export function buildJitterCommand(us: number, variant: ProtocolVariant): ParameterCommand {
  if (!variant.supportsJitter) {
    throw new UnsupportedCommandError(`'jitter' is not supported by ${variant.id}`)
  }
  const value = Math.round(clampArgument(us, JITTER_MIN_US, JITTER_MAX_US, 'jitter'))
  return makeCommand('jitter', `jitter ${value}`)
}

/**
 * `enable <bp|eq|comp> <0|1>`
 */
export function buildEnableCommand(stage: DspStage, enabled: boolean): ParameterCommand {
  return makeCommand(`enable ${stage}`, `enable ${stage} ${enabled ? '1' : '0'}`)
}

/**
 * `set <param> <value>`, clamped to the parameter's range and formatted per the table.
 * @throws UnsupportedCommandError if the variant has no such parameter
 */
export function buildSetCommand(name: SetParamName, value: number, variant: ProtocolVariant): ParameterCommand {
  if (!variant.setParams.includes(name)) {
    throw new UnsupportedCommandError(`'set ${name}' is not supported by ${variant.id}`)
  }
  const param = SET_PARAMS[name]
  const clamped = clampArgument(value, param.min, param.max, name)
  return makeCommand(`set ${name}`, `set ${name} ${formatValue(clamped, param.format)}`)
}

/**
 * Zero-argument query/test command.
 */
export function buildQueryCommand(query: QueryCommand): ParameterCommand {
  return makeCommand(query, query)
}

/**
 * Operator-typed line, sent verbatim after trimming. Returns null for blank input.
 */
export function buildRawCommand(text: string): ParameterCommand | null {
  const line = text.trim()
  if (!line) {
    return null
  }
  const [name] = line.split(/\s+/)
  return makeCommand(name, line)
}

// ============================================================================
// Inbound
// ============================================================================

/**
 * True for lines the status display should show ('CFG:' dumps, '===' banners, 'Status:').
 */
export function isStatusLine(line: string): boolean {
  return STATUS_MARKERS.some((marker) => line.includes(marker))
}
