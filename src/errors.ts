// Error type shared by the encoder, decoder and CLI

export type HuffmanErrorCode =
  | 'INPUT_UNREADABLE'
  | 'OUTPUT_UNWRITABLE'
  | 'EMPTY_INPUT'
  | 'INPUT_TOO_LARGE'
  | 'MALFORMED_CONTAINER'
  | 'TRUNCATED_CONTAINER'
  | 'OUTPUT_LIMIT_EXCEEDED'
  | 'ALLOCATION_FAILED'

export class HuffmanError extends Error {
  readonly code: HuffmanErrorCode

  constructor(code: HuffmanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HuffmanError'
    this.code = code
  }
}

export function isHuffmanError(value: unknown, code?: HuffmanErrorCode): value is HuffmanError {
  if (!(value instanceof HuffmanError)) {
    return false
  }
  return code === undefined || value.code === code
}
