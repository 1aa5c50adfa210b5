import { bench, describe } from 'vitest'
import * as zlib from 'zlib'
import { huffmanEncode } from '../src/encode/encode'

function makeXorshift32(seed: number): () => number {
  let x = seed | 0
  return () => {
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    return x >>> 0
  }
}

// Bytes drawn from a weighted alphabet; heavier skew means shorter codes
function drawBytes(len: number, alphabet: string, seed: number): Uint8Array {
  const symbols = new TextEncoder().encode(alphabet)
  const next = makeXorshift32(seed)
  const out = new Uint8Array(len)
  for (let i = 0; i < len; i++) out[i] = symbols[next() % symbols.length]
  return out
}

function uniformBytes(len: number, seed: number): Uint8Array {
  const next = makeXorshift32(seed)
  const out = new Uint8Array(len)
  for (let i = 0; i < len; i++) out[i] = next() & 0xFF
  return out
}

const inputs = [
  { name: 'two symbols (16 KB)', data: drawBytes(16 * 1024, 'aaaaaaab', 0x1001) },
  { name: 'letter skew (64 KB)', data: drawBytes(64 * 1024, 'eeeeeeetttttaaaaooooiiinnnsssrrhhlldcumfpgwybvkxjqz      ', 0x5EED) },
  { name: 'uniform bytes (64 KB)', data: uniformBytes(64 * 1024, 0xBADA55) },
]

// Sizes against deflate's Huffman-only strategy
console.log('\nCompressed sizes:')
for (const { name, data } of inputs) {
  const ours = huffmanEncode(data)
  const native = zlib.deflateRawSync(data, { strategy: zlib.constants.Z_HUFFMAN_ONLY })
  console.log(`${name}: huffpack=${ours.length} deflate-huffman=${native.length}`)
}
console.log('')

describe('encode', () => {
  for (const { name, data } of inputs) {
    bench(`huffpack ${name}`, () => {
      huffmanEncode(data)
    })

    bench(`node:zlib huffman-only ${name}`, () => {
      zlib.deflateRawSync(data, { strategy: zlib.constants.Z_HUFFMAN_ONLY })
    })
  }
})
