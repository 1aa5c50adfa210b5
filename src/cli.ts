// Command-line front end: argument routing and file I/O around the codec.
// No framework, just the argv array.

import { readFileSync, writeFileSync } from 'node:fs'
import { readContainerInfo } from './container'
import { huffmanDecode } from './decode/decode'
import { formatCodeTable } from './encode/code-table'
import { huffmanEncodeDetailed } from './encode/encode'
import { HuffmanError, isHuffmanError } from './errors'
import { treeDepth } from './huffman-tree'

export type CliCommand = 'encode' | 'decode'

export interface CliOptions {
  command: CliCommand
  inputPath: string
  outputPath: string
  verbose: boolean
}

export interface CliIO {
  log: (line: string) => void
  error: (line: string) => void
}

const consoleIO: CliIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
}

export function usage(programName: string = 'huffpack'): string {
  return [
    `Usage: ${programName} <command> <input_file> [options]`,
    '',
    'Commands:',
    '  encode    Encode a file using Huffman compression',
    '  decode    Decode a Huffman-encoded file',
    '',
    'Options:',
    '  -o, --output FILE    Output file (default: <input>.encoded/.decoded)',
    '  -h, --help           Show this help message',
    '  -v, --verbose        Verbose output',
    '',
    'Examples:',
    `  ${programName} encode test.txt`,
    `  ${programName} encode test.txt -o compressed.huf`,
    `  ${programName} decode test.txt.encoded -o restored.txt`,
  ].join('\n')
}

function isCommand(value: string): value is CliCommand {
  return value === 'encode' || value === 'decode'
}

// Returns parsed options, or a usage error message
export function parseArgs(args: string[]): CliOptions | { error: string } {
  const [command, inputPath, ...rest] = args
  if (command === undefined || !isCommand(command)) {
    return { error: command === undefined ? 'Missing command' : `Unknown command '${command}'` }
  }
  if (inputPath === undefined || inputPath.startsWith('-')) {
    return { error: 'Missing input file' }
  }

  let outputPath: string | undefined
  let verbose = false
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i]
    switch (arg) {
      case '-o':
      case '--output': {
        const value = rest[i + 1]
        if (value === undefined) {
          return { error: `Missing value for ${arg}` }
        }
        outputPath = value
        i++
        break
      }
      case '-v':
      case '--verbose':
        verbose = true
        break
      default:
        return { error: `Unknown option '${arg}'` }
    }
  }

  return {
    command,
    inputPath,
    outputPath: outputPath ?? `${inputPath}.${command === 'encode' ? 'encoded' : 'decoded'}`,
    verbose,
  }
}

function readInput(path: string): Uint8Array {
  try {
    return new Uint8Array(readFileSync(path))
  } catch (err) {
    throw new HuffmanError('INPUT_UNREADABLE', `Could not read file '${path}'`, { cause: err })
  }
}

function writeOutput(path: string, data: Uint8Array): void {
  try {
    writeFileSync(path, data)
  } catch (err) {
    throw new HuffmanError('OUTPUT_UNWRITABLE', `Could not write file '${path}'`, { cause: err })
  }
}

function runEncode(opts: CliOptions, io: CliIO): void {
  const input = readInput(opts.inputPath)
  const result = huffmanEncodeDetailed(input)
  if (opts.verbose) {
    io.log(`Processing ${opts.inputPath} (${input.length} bytes)`)
    for (const line of formatCodeTable(result.codeTable)) {
      io.log(`  ${line}`)
    }
    io.log(`Tree depth: ${treeDepth(result.tree)}`)
    io.log(`Padding bits: ${result.paddingBits}`)
  }
  // Only reached once encoding fully succeeded
  writeOutput(opts.outputPath, result.output)
  io.log(`Encoded ${input.length} bytes into ${result.output.length} bytes -> ${opts.outputPath}`)
}

function runDecode(opts: CliOptions, io: CliIO): void {
  const container = readInput(opts.inputPath)
  if (opts.verbose) {
    const info = readContainerInfo(container)
    io.log(`Header - entries: ${info.symbolCount}, padding: ${info.paddingBits}`)
    io.log(`Decoding ${info.decodedSize} bytes from ${info.bodyLength} bytes (${info.bodyBits} bits)`)
  }
  const output = huffmanDecode(container)
  writeOutput(opts.outputPath, output)
  io.log(`Decoded ${output.length} bytes -> ${opts.outputPath}`)
}

// Returns the process exit code
export function runCli(args: string[], io: CliIO = consoleIO): number {
  if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
    io.log(usage())
    return 0
  }

  const parsed = parseArgs(args)
  if ('error' in parsed) {
    io.error(`Error: ${parsed.error}`)
    io.error(usage())
    return 1
  }

  try {
    if (parsed.command === 'encode') {
      runEncode(parsed, io)
    } else {
      runDecode(parsed, io)
    }
    return 0
  } catch (err) {
    if (isHuffmanError(err)) {
      io.error(`Error: ${err.message}`)
      return 1
    }
    throw err
  }
}
