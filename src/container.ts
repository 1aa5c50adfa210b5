// Container header codec
//
// Layout (big-endian):
//   0   4    magic "HUFF"
//   4   4    distinct symbol count N
//   8   1    padding bit count in the last body byte (0-7)
//   9   N*5  symbol byte + 4-byte frequency, ascending symbol order
//   9+5N     bit-packed body

import {
  ALPHABET_SIZE,
  ENTRY_SIZE,
  FIXED_HEADER_SIZE,
  MAGIC,
  MAX_PADDING_BITS,
  PADDING_OFFSET,
} from './constants'
import { HuffmanError } from './errors'
import { ByteSink, ByteSource } from './streams'
import {
  createFrequencyTable,
  countDistinctSymbols,
  totalFrequency,
  type FrequencyTable,
} from './encode/histogram'

export interface ContainerHeader {
  symbolCount: number
  paddingBits: number
  frequencies: FrequencyTable
  headerSize: number
}

export interface ContainerInfo extends ContainerHeader {
  bodyLength: number
  // Meaningful code bits in the body, padding excluded
  bodyBits: number
  decodedSize: number
}

export function headerSize(symbolCount: number): number {
  return FIXED_HEADER_SIZE + symbolCount * ENTRY_SIZE
}

// Writes the header with a placeholder padding count; see patchPaddingBits
export function writeHeader(sink: ByteSink, frequencies: FrequencyTable): void {
  sink.writeUint32(MAGIC)
  sink.writeUint32(countDistinctSymbols(frequencies))
  sink.writeUint8(0)
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    if (frequencies[symbol] > 0) {
      sink.writeUint8(symbol)
      sink.writeUint32(frequencies[symbol])
    }
  }
}

export function patchPaddingBits(sink: ByteSink, paddingBits: number): void {
  if (paddingBits < 0 || paddingBits > MAX_PADDING_BITS) {
    throw new RangeError(`Padding bit count ${paddingBits} out of range 0..${MAX_PADDING_BITS}`)
  }
  sink.patchUint8(PADDING_OFFSET, paddingBits)
}

export function readHeader(buffer: Uint8Array): ContainerHeader {
  const src = new ByteSource(buffer)

  const magic = src.readUint32('magic')
  if (magic !== MAGIC) {
    throw new HuffmanError(
      'MALFORMED_CONTAINER',
      `Invalid magic 0x${magic.toString(16).padStart(8, '0')}, not a HUFF container`
    )
  }

  const symbolCount = src.readUint32('symbol count')
  if (symbolCount > ALPHABET_SIZE) {
    throw new HuffmanError(
      'MALFORMED_CONTAINER',
      `Symbol count ${symbolCount} exceeds alphabet size ${ALPHABET_SIZE}`
    )
  }

  const paddingBits = src.readUint8('padding count')
  if (paddingBits > MAX_PADDING_BITS) {
    throw new HuffmanError('MALFORMED_CONTAINER', `Invalid padding bit count ${paddingBits}`)
  }

  // Checked up front so a lying count fails before any entry is read
  if (src.remaining < symbolCount * ENTRY_SIZE) {
    throw new HuffmanError(
      'TRUNCATED_CONTAINER',
      `Header lists ${symbolCount} symbols but only ${src.remaining} bytes follow`
    )
  }

  const frequencies = createFrequencyTable()
  for (let i = 0; i < symbolCount; i++) {
    const symbol = src.readUint8('symbol')
    const frequency = src.readUint32('frequency')
    if (frequency === 0) {
      throw new HuffmanError('MALFORMED_CONTAINER', `Symbol ${symbol} listed with zero frequency`)
    }
    if (frequencies[symbol] !== 0) {
      throw new HuffmanError('MALFORMED_CONTAINER', `Symbol ${symbol} listed twice`)
    }
    frequencies[symbol] = frequency
  }

  return {
    symbolCount,
    paddingBits,
    frequencies,
    headerSize: src.pos,
  }
}

// Parses the header and sizes the body without decoding it
export function readContainerInfo(buffer: Uint8Array): ContainerInfo {
  const header = readHeader(buffer)
  const bodyLength = buffer.length - header.headerSize
  const bodyBits = bodyLength * 8 - header.paddingBits
  if (bodyBits < 0) {
    throw new HuffmanError(
      'TRUNCATED_CONTAINER',
      `Header declares ${header.paddingBits} padding bits but the body is empty`
    )
  }
  // Every symbol costs at least one bit, so a larger claim cannot be backed by the body
  const decodedSize = totalFrequency(header.frequencies)
  if (decodedSize > bodyBits) {
    throw new HuffmanError(
      'TRUNCATED_CONTAINER',
      `Header declares ${decodedSize} symbols but the body holds only ${bodyBits} bits`
    )
  }
  return {
    ...header,
    bodyLength,
    bodyBits,
    decodedSize,
  }
}
