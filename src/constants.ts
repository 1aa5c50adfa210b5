// Container format constants

// "HUFF" in ASCII, stored big-endian
export const MAGIC = 0x48554646

export const ALPHABET_SIZE = 256

// Frequencies are stored as 4-byte unsigned integers
export const MAX_FREQUENCY = 0xFFFFFFFF

export const PADDING_OFFSET = 8
export const FIXED_HEADER_SIZE = 9

// 1 byte symbol + 4 byte frequency
export const ENTRY_SIZE = 5

export const MAX_PADDING_BITS = 7
