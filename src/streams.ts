// Byte-level input/output buffers for the container codec

import { HuffmanError } from './errors'

// Growable output buffer. Bytes already written can be patched in place,
// which is how the padding count lands in the header after the body is flushed.
export class ByteSink {
  private buffer: Uint8Array
  private pos: number

  constructor(initialSize: number = 4096) {
    this.buffer = new Uint8Array(Math.max(initialSize, 16))
    this.pos = 0
  }

  private ensureCapacity(bytes: number): void {
    const needed = this.pos + bytes
    if (needed > this.buffer.length) {
      const newSize = Math.max(this.buffer.length * 2, needed)
      const newBuffer = new Uint8Array(newSize)
      newBuffer.set(this.buffer.subarray(0, this.pos))
      this.buffer = newBuffer
    }
  }

  get length(): number {
    return this.pos
  }

  writeUint8(value: number): void {
    this.ensureCapacity(1)
    this.buffer[this.pos++] = value & 0xFF
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4)
    this.buffer[this.pos++] = (value >>> 24) & 0xFF
    this.buffer[this.pos++] = (value >>> 16) & 0xFF
    this.buffer[this.pos++] = (value >>> 8) & 0xFF
    this.buffer[this.pos++] = value & 0xFF
  }

  // Overwrite a byte that has already been written
  patchUint8(offset: number, value: number): void {
    if (offset < 0 || offset >= this.pos) {
      throw new RangeError(`Patch offset ${offset} outside written range 0..${this.pos}`)
    }
    this.buffer[offset] = value & 0xFF
  }

  finish(): Uint8Array {
    return this.buffer.slice(0, this.pos)
  }
}

// Bounds-checked big-endian reader over a fixed buffer
export class ByteSource {
  readonly buffer: Uint8Array
  pos: number

  constructor(buffer: Uint8Array, pos: number = 0) {
    this.buffer = buffer
    this.pos = pos
  }

  get remaining(): number {
    return this.buffer.length - this.pos
  }

  private require(count: number, what: string): void {
    if (count > this.remaining) {
      throw new HuffmanError(
        'TRUNCATED_CONTAINER',
        `Unexpected end of container reading ${what} at offset ${this.pos}`
      )
    }
  }

  readUint8(what: string = 'byte'): number {
    this.require(1, what)
    return this.buffer[this.pos++]
  }

  readUint32(what: string = 'uint32'): number {
    this.require(4, what)
    const b = this.buffer
    const p = this.pos
    this.pos += 4
    return ((b[p] << 24) | (b[p + 1] << 16) | (b[p + 2] << 8) | b[p + 3]) >>> 0
  }
}
