/**
 * Copyright 2025 The Lotusia Stewardship
 * Github: https://github.com/LotusiaStewardship
 * License: MIT
 */
export {
  ALPHABETS,
  ALPHABET_ALIASES,
  DEFAULT_ALPHABET,
  INVALID_DIGIT,
  getAlphabet,
  isAlphabetName,
  parseAlphabet,
  type AlphabetName,
  type AlphabetTable,
} from './lib/encoding/alphabet.js'
export { BigIntBuffer } from './lib/encoding/bigint.js'
export {
  Base58,
  decode,
  decodeOrThrow,
  decodeWithAlphabet,
  encode,
  encodeWithAlphabet,
  type Base58Data,
  type DecodeResult,
} from './lib/encoding/base58.js'
export { Base58Error, UsageError, type Base58ErrorCode } from './lib/errors.js'
export { BufferUtil, EMPTY_BUFFER } from './lib/util/buffer.js'
export { Preconditions } from './lib/util/preconditions.js'
export {
  parseOptions,
  run,
  USAGE,
  type CliIO,
  type CliOptions,
} from './lib/cli/index.js'
