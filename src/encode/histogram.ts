// Symbol frequency counting over the byte alphabet

import { ALPHABET_SIZE, MAX_FREQUENCY } from '../constants'
import { HuffmanError } from '../errors'

export type FrequencyTable = Uint32Array

export function createFrequencyTable(): FrequencyTable {
  return new Uint32Array(ALPHABET_SIZE)
}

// A single symbol could overflow its 4-byte field past this length
export function checkInputLength(length: number): void {
  if (length > MAX_FREQUENCY) {
    throw new HuffmanError(
      'INPUT_TOO_LARGE',
      `Input of ${length} bytes exceeds the ${MAX_FREQUENCY} byte limit`
    )
  }
}

export function buildFrequencyTable(input: Uint8Array): FrequencyTable {
  checkInputLength(input.length)
  const table = createFrequencyTable()
  for (let i = 0; i < input.length; i++) {
    table[input[i]]++
  }
  return table
}

export function countDistinctSymbols(table: FrequencyTable): number {
  let count = 0
  for (let i = 0; i < table.length; i++) {
    if (table[i] > 0) count++
  }
  return count
}

export function totalFrequency(table: FrequencyTable): number {
  let total = 0
  for (let i = 0; i < table.length; i++) {
    total += table[i]
  }
  return total
}
