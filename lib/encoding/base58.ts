/**
 * Base58 encoding/decoding module
 */

import { Base58Error } from '../errors.js'
import { BufferUtil, EMPTY_BUFFER } from '../util/buffer.js'
import { Preconditions } from '../util/preconditions.js'
import {
  DEFAULT_ALPHABET,
  INVALID_DIGIT,
  getAlphabet,
  type AlphabetName,
} from './alphabet.js'
import { BigIntBuffer } from './bigint.js'

const BASE = 58

export type DecodeResult =
  | { ok: true; value: Buffer }
  | { ok: false; error: Base58Error }

/**
 * Encode bytes with the Bitcoin alphabet
 *
 * @example
 * encode(Buffer.from('Hello')) // '9Ajdvzr'
 */
export function encode(input: Uint8Array): string {
  return encodeWithAlphabet(input, DEFAULT_ALPHABET)
}

/**
 * Encode bytes with the given alphabet. Every leading zero byte becomes one
 * zero symbol, so `[0, 0, 0]` encodes to three zero symbols.
 */
export function encodeWithAlphabet(
  input: Uint8Array,
  alphabet: AlphabetName,
): string {
  Preconditions.checkArgumentType(input, 'Uint8Array', 'input')
  if (input.length === 0) {
    return ''
  }
  const { symbols, zero } = getAlphabet(alphabet)

  let leadingZeros = 0
  while (leadingZeros < input.length && input[leadingZeros] === 0) {
    leadingZeros++
  }
  if (leadingZeros === input.length) {
    return zero.repeat(leadingZeros)
  }

  const num = BigIntBuffer.fromBuffer(input.subarray(leadingZeros))
  // least significant digit first
  const digits: string[] = []
  while (!num.isZero()) {
    digits.push(symbols[num.divmod(BASE)])
  }
  return zero.repeat(leadingZeros) + digits.reverse().join('')
}

/**
 * Decode a string with the Bitcoin alphabet
 */
export function decode(input: string): DecodeResult {
  return decodeWithAlphabet(input, DEFAULT_ALPHABET)
}

/**
 * Decode a string with the given alphabet. Fails on the first symbol outside
 * the alphabet and returns no partial output.
 */
export function decodeWithAlphabet(
  input: string,
  alphabet: AlphabetName,
): DecodeResult {
  Preconditions.checkArgumentType(input, 'string', 'input')
  if (input.length === 0) {
    return { ok: true, value: Buffer.alloc(0) }
  }
  const { zero, decodeTable } = getAlphabet(alphabet)

  // the zero symbol is ASCII, so code unit indexing is safe here
  let leadingZeros = 0
  while (leadingZeros < input.length && input[leadingZeros] === zero) {
    leadingZeros++
  }
  if (leadingZeros === input.length) {
    return { ok: true, value: BufferUtil.emptyBuffer(leadingZeros) }
  }

  const significant = input.slice(leadingZeros)
  // log(58) / log(256) ~= 0.733 bytes per symbol
  const num = new BigIntBuffer(Math.ceil((significant.length * 733) / 1000))
  for (const char of significant) {
    const code = char.codePointAt(0)
    if (code === undefined || code > 255) {
      return { ok: false, error: new Base58Error.InvalidCharacter(char) }
    }
    const digit = decodeTable[code]
    if (digit === INVALID_DIGIT) {
      return { ok: false, error: new Base58Error.InvalidCharacter(char) }
    }
    num.multiply(BASE).add(digit)
  }

  return {
    ok: true,
    value: BufferUtil.concat([
      leadingZeros > 0 ? BufferUtil.emptyBuffer(leadingZeros) : EMPTY_BUFFER,
      num.toBuffer(),
    ]),
  }
}

/**
 * Like `decodeWithAlphabet`, but throws the failure
 *
 * @throws Base58Error.InvalidCharacter
 */
export function decodeOrThrow(
  input: string,
  alphabet: AlphabetName = DEFAULT_ALPHABET,
): Buffer {
  const result = decodeWithAlphabet(input, alphabet)
  if (!result.ok) {
    throw result.error
  }
  return result.value
}

export interface Base58Data {
  buf?: Buffer
  alphabet?: AlphabetName
}

export class Base58 {
  buf?: Buffer
  alphabet: AlphabetName = DEFAULT_ALPHABET

  constructor(obj?: Buffer | string | Base58Data, alphabet?: AlphabetName) {
    if (alphabet) {
      this.alphabet = alphabet
    }
    if (Buffer.isBuffer(obj)) {
      this.fromBuffer(obj)
    } else if (typeof obj === 'string') {
      this.fromString(obj)
    } else if (obj) {
      this.set(obj)
    }
  }

  /**
   * Whether every character of `chars` is a symbol of the alphabet
   */
  static validCharacters(
    chars: string | Buffer,
    alphabet: AlphabetName = DEFAULT_ALPHABET,
  ): boolean {
    if (Buffer.isBuffer(chars)) {
      chars = chars.toString()
    }
    const { symbols } = getAlphabet(alphabet)
    return Array.from(chars).every(char => symbols.includes(char))
  }

  static encode(buf: Uint8Array, alphabet?: AlphabetName): string {
    return encodeWithAlphabet(buf, alphabet ?? DEFAULT_ALPHABET)
  }

  static decode(str: string, alphabet?: AlphabetName): Buffer {
    return decodeOrThrow(str, alphabet)
  }

  set(obj: Base58Data): Base58 {
    this.buf = obj.buf || this.buf || undefined
    this.alphabet = obj.alphabet || this.alphabet
    return this
  }

  fromBuffer(buf: Buffer): Base58 {
    this.buf = buf
    return this
  }

  fromString(str: string): Base58 {
    this.buf = Base58.decode(str, this.alphabet)
    return this
  }

  toBuffer(): Buffer {
    if (this.buf === undefined) {
      throw new Base58Error.Precondition.InvalidState('No buffer set')
    }
    return this.buf
  }

  toString(): string {
    return Base58.encode(this.toBuffer(), this.alphabet)
  }
}
