// Bit writing for the Huffman body
//
// Packs bits MSB-first: the first bit written lands in bit 7 of the byte.
// Example: bits 1,0,1 written then flushed -> 1010 0000, padding 5
// Inverse of BitReader.

import { ByteSink } from '../streams'

export class BitWriter {
  private readonly sink: ByteSink
  private currentByte: number = 0
  private bitsFilled: number = 0
  private totalBits: number = 0

  constructor(sink: ByteSink) {
    this.sink = sink
  }

  writeBit(bit: number): void {
    if (bit & 1) {
      this.currentByte |= 1 << (7 - this.bitsFilled)
    }
    this.bitsFilled++
    this.totalBits++

    if (this.bitsFilled === 8) {
      this.sink.writeUint8(this.currentByte)
      this.currentByte = 0
      this.bitsFilled = 0
    }
  }

  // Code is a string of '0'/'1', first character written first
  writeCode(code: string): void {
    for (let i = 0; i < code.length; i++) {
      this.writeBit(code.charCodeAt(i) === 0x31 ? 1 : 0)
    }
  }

  // Emits the pending partial byte, returns number of padding bits added
  flush(): number {
    if (this.bitsFilled === 0) {
      return 0
    }
    const padding = 8 - this.bitsFilled
    this.sink.writeUint8(this.currentByte)
    this.currentByte = 0
    this.bitsFilled = 0
    return padding
  }

  get bitsWritten(): number {
    return this.totalBits
  }

  get pendingBits(): number {
    return this.bitsFilled
  }
}
