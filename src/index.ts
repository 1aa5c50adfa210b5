// Decode
export { huffmanDecode, huffmanDecodedSize } from './decode/decode'
export type { HuffmanDecodeOptions } from './decode/decode'

// Encode
export { huffmanEncode, huffmanEncodeDetailed } from './encode/encode'
export type { HuffmanEncodeResult } from './encode/encode'
export { buildFrequencyTable } from './encode/histogram'
export type { FrequencyTable } from './encode/histogram'
export { buildCodeTable, codeTableEntries, formatCodeTable } from './encode/code-table'
export type { CodeTable, CodeTableEntry } from './encode/code-table'

// Shared
export { buildHuffmanTree } from './huffman-tree'
export type { HuffmanNode, HuffmanLeaf, HuffmanInternal } from './huffman-tree'
export { readHeader, readContainerInfo } from './container'
export type { ContainerHeader, ContainerInfo } from './container'
export { HuffmanError, isHuffmanError } from './errors'
export type { HuffmanErrorCode } from './errors'
