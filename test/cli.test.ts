import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { parseArgs, runCli, usage, type CliIO } from '../src/cli'

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = []
  const err: string[] = []
  return {
    out,
    err,
    log: (line) => out.push(line),
    error: (line) => err.push(line),
  }
}

describe('parseArgs', () => {
  it('parses command, input, output and verbose flag', () => {
    expect(parseArgs(['encode', 'in.txt', '-o', 'out.huf', '-v'])).toEqual({
      command: 'encode',
      inputPath: 'in.txt',
      outputPath: 'out.huf',
      verbose: true,
    })
  })

  it('derives the output path from the command', () => {
    expect(parseArgs(['encode', 'a.txt'])).toMatchObject({ outputPath: 'a.txt.encoded' })
    expect(parseArgs(['decode', 'a.huf', '--output', 'a.txt'])).toMatchObject({ outputPath: 'a.txt' })
    expect(parseArgs(['decode', 'a.huf'])).toMatchObject({ outputPath: 'a.huf.decoded' })
  })

  it('reports usage errors', () => {
    expect(parseArgs(['zip', 'a.txt'])).toEqual({ error: "Unknown command 'zip'" })
    expect(parseArgs(['encode'])).toEqual({ error: 'Missing input file' })
    expect(parseArgs(['encode', 'a.txt', '-o'])).toEqual({ error: 'Missing value for -o' })
    expect(parseArgs(['encode', 'a.txt', '--fast'])).toEqual({ error: "Unknown option '--fast'" })
  })
})

describe('runCli', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'huffpack-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('prints usage with no arguments', () => {
    const io = captureIO()
    expect(runCli([], io)).toBe(0)
    expect(io.out).toEqual([usage()])
  })

  it('exits 1 on an unknown command', () => {
    const io = captureIO()
    expect(runCli(['zip', 'a.txt'], io)).toBe(1)
    expect(io.err[0]).toBe("Error: Unknown command 'zip'")
  })

  it('encodes and decodes files', () => {
    const input = join(dir, 'input.txt')
    const encoded = join(dir, 'input.huf')
    const restored = join(dir, 'restored.txt')
    writeFileSync(input, 'she sells sea shells by the sea shore\n')

    const io = captureIO()
    expect(runCli(['encode', input, '-o', encoded], io)).toBe(0)
    expect(runCli(['decode', encoded, '-o', restored], io)).toBe(0)
    expect(readFileSync(restored, 'utf8')).toBe('she sells sea shells by the sea shore\n')
    expect(io.err).toEqual([])
  })

  it('writes to <input>.encoded by default', () => {
    const input = join(dir, 'data.bin')
    writeFileSync(input, Buffer.from([0, 1, 2, 255, 255]))
    expect(runCli(['encode', input], captureIO())).toBe(0)
    expect(existsSync(`${input}.encoded`)).toBe(true)
  })

  it('prints the code table in verbose mode', () => {
    const input = join(dir, 'aaab.txt')
    const output = join(dir, 'aaab.huf')
    writeFileSync(input, 'aaab')

    const io = captureIO()
    expect(runCli(['encode', input, '-o', output, '-v'], io)).toBe(0)
    expect(io.out).toEqual([
      `Processing ${input} (4 bytes)`,
      "  'a' -> 1 (1 bit)",
      "  'b' -> 0 (1 bit)",
      'Tree depth: 1',
      'Padding bits: 4',
      `Encoded 4 bytes into 20 bytes -> ${output}`,
    ])
  })

  it('prints the header summary in verbose decode', () => {
    const input = join(dir, 'aaab.txt')
    const encoded = join(dir, 'aaab.huf')
    const restored = join(dir, 'aaab.out')
    writeFileSync(input, 'aaab')
    runCli(['encode', input, '-o', encoded], captureIO())

    const io = captureIO()
    expect(runCli(['decode', encoded, '-o', restored, '--verbose'], io)).toBe(0)
    expect(io.out).toEqual([
      'Header - entries: 2, padding: 4',
      'Decoding 4 bytes from 1 bytes (4 bits)',
      `Decoded 4 bytes -> ${restored}`,
    ])
  })

  it('leaves no output when decoding a non-container', () => {
    const input = join(dir, 'plain.txt')
    const output = join(dir, 'plain.out')
    writeFileSync(input, 'not a container at all')

    const io = captureIO()
    expect(runCli(['decode', input, '-o', output], io)).toBe(1)
    expect(io.err).toEqual(['Error: Invalid magic 0x6e6f7420, not a HUFF container'])
    expect(existsSync(output)).toBe(false)
  })

  it('leaves no output when encoding an empty file', () => {
    const input = join(dir, 'empty.txt')
    const output = join(dir, 'empty.huf')
    writeFileSync(input, '')

    const io = captureIO()
    expect(runCli(['encode', input, '-o', output], io)).toBe(1)
    expect(io.err).toEqual(['Error: Cannot encode empty input'])
    expect(existsSync(output)).toBe(false)
  })

  it('reports an output path that cannot be written', () => {
    const input = join(dir, 'input.txt')
    const output = join(dir, 'no-such-dir', 'out.huf')
    writeFileSync(input, 'aaab')

    const io = captureIO()
    expect(runCli(['encode', input, '-o', output], io)).toBe(1)
    expect(io.err).toEqual([`Error: Could not write file '${output}'`])
    expect(existsSync(output)).toBe(false)
  })

  it('reports an unreadable input', () => {
    const missing = join(dir, 'missing.txt')
    const io = captureIO()
    expect(runCli(['encode', missing], io)).toBe(1)
    expect(io.err).toEqual([`Error: Could not read file '${missing}'`])
  })
})
