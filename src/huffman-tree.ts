// Huffman tree construction by greedy weight merging.
// Both the encoder and the decoder build the tree from the same frequency
// table, so the result must depend on the frequencies alone.

import type { FrequencyTable } from './encode/histogram'
import { HuffmanError } from './errors'

export interface HuffmanLeaf {
  kind: 'leaf'
  symbol: number
  weight: number
}

export interface HuffmanInternal {
  kind: 'internal'
  weight: number
  left: HuffmanNode
  right: HuffmanNode
}

export type HuffmanNode = HuffmanLeaf | HuffmanInternal

export function createLeaf(symbol: number, weight: number): HuffmanLeaf {
  return { kind: 'leaf', symbol, weight }
}

export function createInternal(left: HuffmanNode, right: HuffmanNode): HuffmanInternal {
  return { kind: 'internal', weight: left.weight + right.weight, left, right }
}

export function buildHuffmanTree(frequencies: FrequencyTable): HuffmanNode {
  // Leaves in ascending symbol order
  const nodes: HuffmanNode[] = []
  for (let symbol = 0; symbol < frequencies.length; symbol++) {
    if (frequencies[symbol] > 0) {
      nodes.push(createLeaf(symbol, frequencies[symbol]))
    }
  }

  if (nodes.length === 0) {
    throw new HuffmanError('EMPTY_INPUT', 'Cannot build a Huffman tree without symbols')
  }

  while (nodes.length > 1) {
    // Array.prototype.sort is stable: equal weights keep their list position
    nodes.sort((a, b) => a.weight - b.weight)
    const left = nodes[0]
    const right = nodes[1]
    nodes.splice(0, 2, createInternal(left, right))
  }

  return nodes[0]
}

export function isLeaf(node: HuffmanNode): node is HuffmanLeaf {
  return node.kind === 'leaf'
}

export function treeDepth(root: HuffmanNode): number {
  let maxDepth = 0
  const stack: Array<{ node: HuffmanNode; depth: number }> = [{ node: root, depth: 0 }]
  while (stack.length > 0) {
    const entry = stack.pop()
    if (entry === undefined) break
    const { node, depth } = entry
    if (node.kind === 'leaf') {
      if (depth > maxDepth) maxDepth = depth
    } else {
      stack.push({ node: node.left, depth: depth + 1 })
      stack.push({ node: node.right, depth: depth + 1 })
    }
  }
  return maxDepth
}
