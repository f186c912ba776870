/**
 * Command-line front end: `base58 [-d] [-a <alphabet>]`
 *
 * Encode mode reads raw bytes from stdin and prints the encoded text with a
 * trailing newline. Decode mode reads UTF-8 text, trims surrounding
 * whitespace and writes the raw bytes.
 */

import color from 'picocolors'
import yargs from 'yargs'
import { DEFAULT_ALPHABET, type AlphabetName } from '../encoding/alphabet.js'
import { decodeWithAlphabet, encodeWithAlphabet } from '../encoding/base58.js'
import { UsageError } from '../errors.js'
import { resolveAlphabet } from './config.js'
import { getLogger, type Logger } from './logger.js'

export interface CliOptions {
  decode: boolean
  alphabet: AlphabetName
  help: boolean
}

export interface CliIO {
  readStdin: () => Promise<Buffer>
  writeStdout: (data: Uint8Array | string) => void
  logger?: Logger
  env?: NodeJS.ProcessEnv
  /** Colour the error label; defaults to what the terminal supports */
  color?: boolean
}

export const USAGE = `base58 - Base58 encoding and decoding utility

USAGE:
    base58 [OPTIONS]

OPTIONS:
    -d, --decode                 Decode Base58 input (default: encode)
    -a, --alphabet <ALPHABET>    Specify alphabet (bitcoin, ripple, flickr) [default: bitcoin]
    -h, --help                   Show this help message

ENVIRONMENT:
    BASE58_ALPHABET              Alphabet to use when --alphabet is not given

EXAMPLES:
    printf 'Hello, World!' | base58
    printf '72k1xXWG59fYdzSNoA' | base58 -d
    base58 --alphabet ripple < input.txt
    base58 -d --alphabet bitcoin < encoded.txt`

/**
 * Parse command-line arguments (without the node and script entries)
 *
 * @throws UsageError for unknown options, stray arguments or a missing value
 * @throws Base58Error.UnknownAlphabet for an unknown alphabet name
 */
export function parseOptions(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): CliOptions {
  // built-in help and version must be off before `help` is declared, or
  // yargs drops the option again
  const args = yargs(argv)
    .scriptName('base58')
    .help(false)
    .version(false)
    .parserConfiguration({
      'duplicate-arguments-array': false,
      'dot-notation': false,
    })
    .option('decode', { alias: 'd', type: 'boolean', default: false })
    .option('alphabet', { alias: 'a', type: 'string', requiresArg: true })
    .option('help', { alias: 'h', type: 'boolean', default: false })
    .strictOptions()
    .exitProcess(false)
    .fail((msg, err) => {
      throw new UsageError(msg || (err ? err.message : 'Invalid arguments'))
    })
    .parseSync()

  if (args._.length > 0) {
    throw new UsageError(`Unexpected argument: ${args._[0]}`, false)
  }
  if (args.help) {
    return { decode: args.decode, alphabet: DEFAULT_ALPHABET, help: true }
  }
  return {
    decode: args.decode,
    alphabet: resolveAlphabet(args.alphabet, env),
    help: false,
  }
}

// Unicode White_Space; unlike String#trim this keeps U+FEFF
const WHITE_SPACE =
  '\\t\\n\\v\\f\\r \\u0085\\u00a0\\u1680\\u2000-\\u200a' +
  '\\u2028\\u2029\\u202f\\u205f\\u3000'
const LEADING_SPACE = new RegExp(`^[${WHITE_SPACE}]+`)
const TRAILING_SPACE = new RegExp(`[${WHITE_SPACE}]+$`)

function trimWhitespace(text: string): string {
  return text.replace(LEADING_SPACE, '').replace(TRAILING_SPACE, '')
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Run the tool once and return the process exit code
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  const logger = io.logger ?? getLogger()
  const colors = color.createColors(io.color ?? color.isColorSupported)
  const reportError = (message: string) =>
    logger.error(`${colors.red(colors.bold('Error'))}: ${message}`)

  let options: CliOptions
  try {
    options = parseOptions(argv, io.env)
  } catch (err) {
    reportError(messageOf(err))
    if (err instanceof UsageError && err.showUsage) {
      logger.error(USAGE)
    }
    return 1
  }

  if (options.help) {
    logger.error(USAGE)
    return 0
  }

  let input: Buffer
  try {
    input = await io.readStdin()
  } catch (err) {
    reportError(`Failed to read input: ${messageOf(err)}`)
    return 1
  }

  if (!options.decode) {
    io.writeStdout(encodeWithAlphabet(input, options.alphabet) + '\n')
    return 0
  }

  let text: string
  try {
    // a byte order mark is kept and rejected by the decoder
    const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })
    text = trimWhitespace(decoder.decode(input))
  } catch (err) {
    reportError(`Input is not valid UTF-8: ${messageOf(err)}`)
    return 1
  }

  const result = decodeWithAlphabet(text, options.alphabet)
  if (!result.ok) {
    reportError(result.error.message)
    return 1
  }
  io.writeStdout(result.value)
  return 0
}
