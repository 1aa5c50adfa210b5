// Code table derivation: walks the Huffman tree, '0' for left and '1' for right

import { ALPHABET_SIZE } from '../constants'
import type { HuffmanNode } from '../huffman-tree'

// Indexed by symbol; undefined marks a symbol absent from the input
export type CodeTable = Array<string | undefined>

export interface CodeTableEntry {
  symbol: number
  code: string
}

export function buildCodeTable(root: HuffmanNode): CodeTable {
  const table: CodeTable = new Array<string | undefined>(ALPHABET_SIZE).fill(undefined)

  // A lone leaf has no edge to label, so it gets a one-bit code
  if (root.kind === 'leaf') {
    table[root.symbol] = '0'
    return table
  }

  // Explicit stack, pre-order: right is pushed first so left is visited first.
  // Depth reaches 255 for Fibonacci-like frequencies.
  const stack: Array<{ node: HuffmanNode; path: string }> = [{ node: root, path: '' }]
  while (stack.length > 0) {
    const entry = stack.pop()
    if (entry === undefined) break
    const { node, path } = entry
    if (node.kind === 'leaf') {
      table[node.symbol] = path
      continue
    }
    stack.push({ node: node.right, path: path + '1' })
    stack.push({ node: node.left, path: path + '0' })
  }

  return table
}

export function codeTableEntries(table: CodeTable): CodeTableEntry[] {
  const entries: CodeTableEntry[] = []
  for (let symbol = 0; symbol < table.length; symbol++) {
    const code = table[symbol]
    if (code !== undefined) {
      entries.push({ symbol, code })
    }
  }
  return entries
}

function symbolLabel(symbol: number): string {
  if (symbol >= 0x21 && symbol <= 0x7E) {
    return `'${String.fromCharCode(symbol)}'`
  }
  return `0x${symbol.toString(16).padStart(2, '0')}`
}

// One line per symbol, e.g. "'a' -> 10 (2 bits)"
export function formatCodeTable(table: CodeTable): string[] {
  return codeTableEntries(table).map(({ symbol, code }) =>
    `${symbolLabel(symbol)} -> ${code} (${code.length} bit${code.length === 1 ? '' : 's'})`
  )
}
