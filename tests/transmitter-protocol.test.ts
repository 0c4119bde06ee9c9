/**
 * Unit tests for the SX1280 transmitter protocol
 *
 * Covers the frequency clamp, the per-variant command builders and input parsing.
 */

import { describe, expect, it } from 'vitest'

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
  clampFrequency,
  downlinkHz,
  FREQ_MAX_HZ,
  FREQ_MIN_HZ,
  FREQ_STEP_HZ,
  type FrequencyPolicy,
  isProtocolVariantId,
  isSetParamName,
  isStatusLine,
  parseNumericInput,
  PROTOCOL_VARIANTS,
  UnsupportedCommandError,
  ValidationError,
} from '../src/services/transmitter-protocol'

const TX = PROTOCOL_VARIANTS['sx1280-tx']
const JITTER = PROTOCOL_VARIANTS['sx1280-jitter']

const continuous: FrequencyPolicy = { kind: 'continuous', minHz: FREQ_MIN_HZ, maxHz: FREQ_MAX_HZ }
const stepped: FrequencyPolicy = { kind: 'stepped', minHz: FREQ_MIN_HZ, maxHz: FREQ_MAX_HZ, stepHz: 100 }

// ============================================================================
// Frequency
// ============================================================================

describe('clampFrequency', () => {
  it('bounds values to the band', () => {
    expect(clampFrequency(2_300_000_000, continuous)).toBe(FREQ_MIN_HZ)
    expect(clampFrequency(2_500_000_000, continuous)).toBe(FREQ_MAX_HZ)
    expect(clampFrequency(2_400_123_456.7, continuous)).toBe(2_400_123_456.7)
  })

  it('maps NaN to the lower bound and infinities to the nearest bound', () => {
    expect(clampFrequency(Number.NaN, continuous)).toBe(FREQ_MIN_HZ)
    expect(clampFrequency(Number.NaN, stepped)).toBe(FREQ_MIN_HZ)
    expect(clampFrequency(Number.POSITIVE_INFINITY, stepped)).toBe(FREQ_MAX_HZ)
    expect(clampFrequency(Number.NEGATIVE_INFINITY, continuous)).toBe(FREQ_MIN_HZ)
  })

  it('snaps stepped values down to the grid', () => {
    expect(clampFrequency(2_400_400_055, stepped)).toBe(2_400_400_000)
    expect(clampFrequency(2_400_400_199.9, stepped)).toBe(2_400_400_100)
    expect(clampFrequency(2_400_600_000, stepped)).toBe(FREQ_MAX_HZ)
  })

  it('is idempotent', () => {
    for (const hz of [0, 2_400_000_050, 2_400_250_123.4, 9e9, Number.NaN]) {
      for (const policy of [continuous, stepped]) {
        const once = clampFrequency(hz, policy)
        expect(clampFrequency(once, policy)).toBe(once)
        expect(once).toBeGreaterThanOrEqual(FREQ_MIN_HZ)
        expect(once).toBeLessThanOrEqual(FREQ_MAX_HZ)
        if (policy.kind === 'stepped') {
          expect((once - FREQ_MIN_HZ) % FREQ_STEP_HZ).toBe(0)
        }
      }
    }
  })

  it('keeps stepped results on the 100 Hz grid above the lower bound', () => {
    for (const hz of [Number.NaN, -1, 2_400_000_001, 2_400_000_099.99, 2_400_123_456.7, 2_400_499_999, 2_400_500_000, 3e9]) {
      const once = clampFrequency(hz, stepped)
      expect((once - FREQ_MIN_HZ) % FREQ_STEP_HZ).toBe(0)
      expect(once).toBeGreaterThanOrEqual(FREQ_MIN_HZ)
    }
  })

  it('computes the downlink frequency', () => {
    expect(downlinkHz(2_400_400_000)).toBe(10_489_900_000)
  })
})

// ============================================================================
// Command Builders
// ============================================================================

describe('command builders', () => {
  it('formats frequency per variant', () => {
    expect(buildFrequencyCommand(2_400_400_000.5, TX).line).toBe('freq 2400400000.5')
    expect(buildFrequencyCommand(2_400_400_000, TX).line).toBe('freq 2400400000.0')
    expect(buildFrequencyCommand(2_400_400_055, JITTER).line).toBe('freq 2400400000')
    expect(buildFrequencyCommand(1, JITTER).line).toBe('freq 2400000000')
  })

  it('formats and clamps ppm and TX power', () => {
    expect(buildPpmCommand(1.5).line).toBe('ppm 1.5000')
    expect(buildPpmCommand(-0.25).line).toBe('ppm -0.2500')
    expect(buildPpmCommand(250).line).toBe('ppm 100.0000')
    expect(buildTxPowerCommand(7.6).line).toBe('txpwr 8')
    expect(buildTxPowerCommand(-20).line).toBe('txpwr -18')
  })

  it('builds tx only on the TX-enable variant', () => {
    expect(buildTxEnableCommand(true, TX)).toEqual({ name: 'tx', line: 'tx 1' })
    expect(buildTxEnableCommand(false, TX).line).toBe('tx 0')
    expect(() => buildTxEnableCommand(true, JITTER)).toThrow(UnsupportedCommandError)
  })

  it('builds jitter only on the jitter variant', () => {
    expect(buildJitterCommand(12.4, JITTER).line).toBe('jitter 12')
    expect(buildJitterCommand(45, JITTER).line).toBe('jitter 30')
    expect(() => buildJitterCommand(5, TX)).toThrow(UnsupportedCommandError)
  })

  it('builds stage enables', () => {
    expect(buildEnableCommand('comp', false)).toEqual({ name: 'enable comp', line: 'enable comp 0' })
    expect(buildEnableCommand('bp', true).line).toBe('enable bp 1')
  })

  it('formats set parameters from the table', () => {
    expect(buildSetCommand('bp_lo', 300, TX)).toEqual({ name: 'set bp_lo', line: 'set bp_lo 300' })
    expect(buildSetCommand('eq_low_db', -2, TX).line).toBe('set eq_low_db -2.0')
    expect(buildSetCommand('bp_stages', 7.9, TX).line).toBe('set bp_stages 7')
    expect(buildSetCommand('comp_outlim', 0.94, TX).line).toBe('set comp_outlim 0.940')
    expect(buildSetCommand('amp_min_a', 0.000002, TX).line).toBe('set amp_min_a 0.000002')
    expect(buildSetCommand('comp_thr', 5, TX).line).toBe('set comp_thr 0.0')
  })

  it('accepts eq_slope only on the jitter variant', () => {
    expect(buildSetCommand('eq_slope', 1.5, JITTER).line).toBe('set eq_slope 1.50')
    expect(() => buildSetCommand('eq_slope', 1.5, TX)).toThrow(UnsupportedCommandError)
  })

  it('rejects NaN arguments', () => {
    expect(() => buildSetCommand('bp_hi', Number.NaN, TX)).toThrow(ValidationError)
    expect(() => buildPpmCommand(Number.NaN)).toThrow(ValidationError)
  })

  it('returns frozen commands', () => {
    const command = buildQueryCommand('get')
    expect(command).toEqual({ name: 'get', line: 'get' })
    expect(Object.isFrozen(command)).toBe(true)
  })

  it('trims raw commands and ignores blank ones', () => {
    expect(buildRawCommand('  diag  ')).toEqual({ name: 'diag', line: 'diag' })
    expect(buildRawCommand('set bp_lo 300')).toEqual({ name: 'set', line: 'set bp_lo 300' })
    expect(buildRawCommand(' \t ')).toBeNull()
  })
})

// ============================================================================
// Variants and Parsing
// ============================================================================

describe('protocol variants', () => {
  it('inserts eq_slope after eq_high_db on the jitter variant', () => {
    expect(TX.setParams).toHaveLength(16)
    expect(JITTER.setParams).toHaveLength(17)
    expect(JITTER.setParams.indexOf('eq_slope')).toBe(JITTER.setParams.indexOf('eq_high_db') + 1)
  })

  it('keeps variant-specific defaults', () => {
    expect(TX.defaults.txEnabled).toBe(true)
    expect(TX.defaults.jitterUs).toBeUndefined()
    expect(JITTER.defaults.jitterUs).toBe(0)
    expect(JITTER.defaults.eqSlope).toBe(2)
  })

  it('narrows ids and parameter names', () => {
    expect(isProtocolVariantId('sx1280-jitter')).toBe(true)
    expect(isProtocolVariantId('toString')).toBe(false)
    expect(isSetParamName('comp_knee')).toBe(true)
    expect(isSetParamName('freq')).toBe(false)
  })
})

describe('parseNumericInput', () => {
  it('accepts a comma as decimal separator', () => {
    expect(parseNumericInput(' 2400,5 ', 'Frequency')).toBe(2400.5)
  })

  it('rejects empty and non-numeric text', () => {
    expect(() => parseNumericInput('', 'Frequency')).toThrow('Frequency must be a number, got an empty value')
    expect(() => parseNumericInput('abc', 'PPM')).toThrow("PPM must be a number, got 'abc'")
  })
})

describe('isStatusLine', () => {
  it('recognises status markers anywhere in the line', () => {
    expect(isStatusLine('CFG: freq=2400400000')).toBe(true)
    expect(isStatusLine('=== DSP ===')).toBe(true)
    expect(isStatusLine('TX Status: on')).toBe(true)
    expect(isStatusLine('OK freq')).toBe(false)
  })
})
