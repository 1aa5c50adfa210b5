// Bit reading for the Huffman body, MSB-first to mirror BitWriter

export const END_OF_STREAM = -1

export class BitReader {
  private readonly buffer: Uint8Array
  private byteIndex: number
  private bitIndex: number = 0

  constructor(buffer: Uint8Array, offset: number = 0) {
    this.buffer = buffer
    this.byteIndex = offset
  }

  // Returns 0 or 1, or END_OF_STREAM once the buffer is exhausted
  readBit(): number {
    if (this.byteIndex >= this.buffer.length) {
      return END_OF_STREAM
    }
    const bit = (this.buffer[this.byteIndex] >>> (7 - this.bitIndex)) & 1
    this.bitIndex++
    if (this.bitIndex === 8) {
      this.bitIndex = 0
      this.byteIndex++
    }
    return bit
  }

  get bytePos(): number {
    return this.byteIndex
  }

  get bitOffset(): number {
    return this.bitIndex
  }
}
