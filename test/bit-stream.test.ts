import { describe, it, expect } from 'vitest'
import { BitWriter } from '../src/encode/bit-writer'
import { BitReader, END_OF_STREAM } from '../src/decode/bit-reader'
import { ByteSink, ByteSource } from '../src/streams'
import { isHuffmanError } from '../src/errors'

describe('BitWriter', () => {
  it('packs bits MSB-first and reports padding', () => {
    const sink = new ByteSink()
    const writer = new BitWriter(sink)
    writer.writeBit(1)
    writer.writeBit(0)
    writer.writeBit(1)
    expect(writer.pendingBits).toBe(3)
    expect(writer.flush()).toBe(5)
    expect(Array.from(sink.finish())).toEqual([0xA0])
  })

  it('emits nothing on flush when byte-aligned', () => {
    const sink = new ByteSink()
    const writer = new BitWriter(sink)
    writer.writeCode('10110011')
    expect(sink.length).toBe(1)
    expect(writer.flush()).toBe(0)
    expect(Array.from(sink.finish())).toEqual([0xB3])
    expect(writer.bitsWritten).toBe(8)
  })

  it('writes codes across byte boundaries', () => {
    const sink = new ByteSink()
    const writer = new BitWriter(sink)
    writer.writeCode('111111')
    writer.writeCode('0001')
    expect(writer.flush()).toBe(6)
    expect(Array.from(sink.finish())).toEqual([0xFC, 0x40])
  })

  it('flushes nothing when no bits were written', () => {
    const sink = new ByteSink()
    expect(new BitWriter(sink).flush()).toBe(0)
    expect(sink.length).toBe(0)
  })
})

describe('BitReader', () => {
  it('reads bits MSB-first then signals end of stream', () => {
    const reader = new BitReader(new Uint8Array([0xA5]))
    const bits: number[] = []
    for (let i = 0; i < 8; i++) bits.push(reader.readBit())
    expect(bits).toEqual([1, 0, 1, 0, 0, 1, 0, 1])
    expect(reader.readBit()).toBe(END_OF_STREAM)
  })

  it('starts at the given byte offset', () => {
    const reader = new BitReader(new Uint8Array([0x00, 0x80]), 1)
    expect(reader.readBit()).toBe(1)
    expect(reader.bytePos).toBe(1)
    expect(reader.bitOffset).toBe(1)
  })

  it('reads back what BitWriter wrote', () => {
    const sink = new ByteSink()
    const writer = new BitWriter(sink)
    const pattern = '1101001110001011101'
    writer.writeCode(pattern)
    const padding = writer.flush()
    const reader = new BitReader(sink.finish())
    let read = ''
    for (let i = 0; i < pattern.length; i++) read += String(reader.readBit())
    expect(read).toBe(pattern)
    expect(padding).toBe(5)
  })
})

describe('ByteSink', () => {
  it('writes big-endian integers and grows past its initial size', () => {
    const sink = new ByteSink(16)
    for (let i = 0; i < 5; i++) sink.writeUint32(0x01020304)
    const out = sink.finish()
    expect(out.length).toBe(20)
    expect(Array.from(out.subarray(16))).toEqual([1, 2, 3, 4])
  })

  it('patches written bytes only', () => {
    const sink = new ByteSink()
    sink.writeUint8(0)
    sink.writeUint8(0)
    sink.patchUint8(1, 7)
    expect(Array.from(sink.finish())).toEqual([0, 7])
    expect(() => sink.patchUint8(2, 1)).toThrow(RangeError)
  })
})

describe('ByteSource', () => {
  it('reads unsigned 32-bit values', () => {
    const src = new ByteSource(new Uint8Array([0xFF, 0xFF, 0xFF, 0xFE]))
    expect(src.readUint32()).toBe(0xFFFFFFFE)
    expect(src.remaining).toBe(0)
  })

  it('throws TRUNCATED_CONTAINER past the end', () => {
    const src = new ByteSource(new Uint8Array([1, 2]))
    let caught: unknown
    try {
      src.readUint32('magic')
    } catch (err) {
      caught = err
    }
    expect(isHuffmanError(caught, 'TRUNCATED_CONTAINER')).toBe(true)
    expect(caught instanceof Error && caught.message).toBe(
      'Unexpected end of container reading magic at offset 0'
    )
  })
})
