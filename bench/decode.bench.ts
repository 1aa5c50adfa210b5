import { bench, describe } from 'vitest'
import * as zlib from 'zlib'
import { huffmanDecode } from '../src/decode/decode'
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

// English-like letter skew
function skewedBytes(len: number): Uint8Array {
  const alphabet = new TextEncoder().encode('eeeeeeetttttaaaaooooiiinnnsssrrhhlldcumfpgwybvkxjqz      ')
  const next = makeXorshift32(0x5EED)
  const out = new Uint8Array(len)
  for (let i = 0; i < len; i++) out[i] = alphabet[next() % alphabet.length]
  return out
}

const inputs = [
  { name: 'text (4.5 KB)', data: new TextEncoder().encode('The quick brown fox jumps over the lazy dog. '.repeat(100)) },
  { name: 'skewed (64 KB)', data: skewedBytes(64 * 1024) },
  { name: 'skewed (1 MB)', data: skewedBytes(1024 * 1024) },
]

describe('decode', () => {
  for (const { name, data } of inputs) {
    const ours = huffmanEncode(data)
    const native = zlib.deflateRawSync(data, { strategy: zlib.constants.Z_HUFFMAN_ONLY })

    bench(`huffpack ${name}`, () => {
      huffmanDecode(ours)
    })

    bench(`node:zlib huffman-only ${name}`, () => {
      zlib.inflateRawSync(native)
    })
  }
})
