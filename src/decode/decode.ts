// Huffman decoding

import { BitReader, END_OF_STREAM } from './bit-reader'
import { readContainerInfo, type ContainerInfo } from '../container'
import { HuffmanError } from '../errors'
import { buildHuffmanTree, isLeaf, type HuffmanNode } from '../huffman-tree'

export interface HuffmanDecodeOptions {
  maxOutputSize?: number
}

// Reads the decoded size from the header, no body decoding
export function huffmanDecodedSize(buffer: Uint8Array): number {
  return readContainerInfo(buffer).decodedSize
}

export function allocateOutput(size: number): Uint8Array {
  try {
    return new Uint8Array(size)
  } catch (err) {
    if (err instanceof RangeError) {
      throw new HuffmanError(
        'ALLOCATION_FAILED',
        `Cannot allocate ${size} bytes for decoded output`,
        { cause: err }
      )
    }
    throw err
  }
}

function decodeBody(buffer: Uint8Array, info: ContainerInfo, root: HuffmanNode, output: Uint8Array): void {
  const reader = new BitReader(buffer, info.headerSize)
  let node = root
  let written = 0

  // Bounded by the bit count so padding is never walked as code bits
  for (let bitsRead = 0; bitsRead < info.bodyBits; bitsRead++) {
    const bit = reader.readBit()
    if (bit === END_OF_STREAM) {
      throw new HuffmanError('TRUNCATED_CONTAINER', 'Body ended before the declared bit count')
    }

    // A lone-leaf tree spends one bit per symbol
    if (node.kind === 'internal') {
      node = bit === 0 ? node.left : node.right
    }

    if (isLeaf(node)) {
      if (written >= output.length) {
        throw new HuffmanError(
          'MALFORMED_CONTAINER',
          `Body encodes more than the ${output.length} symbols declared in the header`
        )
      }
      output[written++] = node.symbol
      node = root
    }
  }

  if (written < output.length) {
    throw new HuffmanError(
      'TRUNCATED_CONTAINER',
      `Body decoded to ${written} of ${output.length} declared bytes`
    )
  }

  // All symbols decoded but surplus bits remain
  if (node !== root) {
    throw new HuffmanError('MALFORMED_CONTAINER', 'Body ends partway through a code')
  }
}

export function huffmanDecode(buffer: Uint8Array, options: HuffmanDecodeOptions = {}): Uint8Array {
  const info = readContainerInfo(buffer)

  if (info.symbolCount === 0) {
    throw new HuffmanError('MALFORMED_CONTAINER', 'Container declares no symbols')
  }

  const { maxOutputSize } = options
  if (maxOutputSize !== undefined && info.decodedSize > maxOutputSize) {
    throw new HuffmanError(
      'OUTPUT_LIMIT_EXCEEDED',
      `Decompressed size ${info.decodedSize} exceeds limit ${maxOutputSize}`
    )
  }

  // Rebuilt from frequencies alone, the tree is never stored
  const root = buildHuffmanTree(info.frequencies)
  const output = allocateOutput(info.decodedSize)
  decodeBody(buffer, info, root, output)
  return output
}
