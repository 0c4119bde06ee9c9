/**
 * Unit tests for the CDC line framer
 */

import { describe, expect, it } from 'vitest'

import { LineFramer } from '../src/services/line-framer'

describe('LineFramer', () => {
  it('returns nothing until a terminator arrives', () => {
    const framer = new LineFramer()
    expect(framer.feed(Buffer.from('OK fr'))).toEqual([])
    expect(framer.getBufferedByteCount()).toBe(5)
  })

  it('splits a chunk holding several lines and keeps the remainder', () => {
    const framer = new LineFramer()
    expect(framer.feed(Buffer.from('a\r\nb\r\nc'))).toEqual(['a', 'b'])
    expect(framer.getBufferedByteCount()).toBe(1)
    expect(framer.feed(Buffer.from('\n'))).toEqual(['c'])
    expect(framer.getBufferedByteCount()).toBe(0)
  })

  it('joins a line split across several reads', () => {
    const framer = new LineFramer()
    expect(framer.feed(Buffer.from('CFG: fr'))).toEqual([])
    expect(framer.feed(Buffer.from('eq=2400400000'))).toEqual([])
    expect(framer.feed(Buffer.from('\r'))).toEqual([])
    expect(framer.feed(Buffer.from('\nOK\r\n'))).toEqual(['CFG: freq=2400400000', 'OK'])
  })

  it('accepts bare LF terminators and strips only one CR', () => {
    const framer = new LineFramer()
    expect(framer.feed(Buffer.from('x\ny\r\r\n'))).toEqual(['x', 'y\r'])
  })

  it('delivers empty lines as empty strings', () => {
    const framer = new LineFramer()
    expect(framer.feed(Buffer.from('\r\n\r\n=== Status ===\r\n'))).toEqual(['', '', '=== Status ==='])
  })

  it('decodes a multi-byte character split across reads', () => {
    const framer = new LineFramer()
    const bytes = Buffer.from('T=25°C\r\n', 'utf8')
    const splitAt = bytes.indexOf(0xb0)
    expect(framer.feed(bytes.subarray(0, splitAt))).toEqual([])
    expect(framer.feed(bytes.subarray(splitAt))).toEqual(['T=25°C'])
  })

  it('replaces invalid byte sequences instead of failing', () => {
    const framer = new LineFramer()
    expect(framer.feed(Buffer.from([0x41, 0xff, 0x42, 0x0a]))).toEqual(['A�B'])
  })
})
