// Main Huffman encoder API

import { BitWriter } from './bit-writer'
import { buildCodeTable, type CodeTable } from './code-table'
import { buildFrequencyTable, countDistinctSymbols, type FrequencyTable } from './histogram'
import { headerSize, patchPaddingBits, writeHeader } from '../container'
import { HuffmanError } from '../errors'
import { buildHuffmanTree, type HuffmanNode } from '../huffman-tree'
import { ByteSink } from '../streams'

export interface HuffmanEncodeResult {
  output: Uint8Array
  frequencies: FrequencyTable
  tree: HuffmanNode
  codeTable: CodeTable
  paddingBits: number
  // Code bits in the body, padding excluded
  bodyBits: number
}

// Compress data into a HUFF container
export function huffmanEncode(input: Uint8Array): Uint8Array {
  return huffmanEncodeDetailed(input).output
}

// Same as huffmanEncode, also returning the intermediate tables
export function huffmanEncodeDetailed(input: Uint8Array): HuffmanEncodeResult {
  if (input.length === 0) {
    throw new HuffmanError('EMPTY_INPUT', 'Cannot encode empty input')
  }

  const frequencies = buildFrequencyTable(input)
  const tree = buildHuffmanTree(frequencies)
  const codeTable = buildCodeTable(tree)

  // Rough size hint: header plus input length, the sink grows if needed
  const sink = new ByteSink(headerSize(countDistinctSymbols(frequencies)) + input.length)
  writeHeader(sink, frequencies)

  // Second pass reuses the buffered input
  const writer = new BitWriter(sink)
  // The table was built from this input, so every byte read here has a code
  const codes = codeTable.map((code) => code ?? '')
  for (let i = 0; i < input.length; i++) {
    writer.writeCode(codes[input[i]])
  }

  const paddingBits = writer.flush()
  patchPaddingBits(sink, paddingBits)

  return {
    output: sink.finish(),
    frequencies,
    tree,
    codeTable,
    paddingBits,
    bodyBits: writer.bitsWritten,
  }
}
