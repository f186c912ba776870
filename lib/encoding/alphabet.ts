/**
 * Base58 alphabet tables
 *
 * Each alphabet is 58 distinct printable ASCII symbols. The symbol at index 0
 * is the zero symbol, which stands for one leading zero byte.
 */

import { Base58Error } from '../errors.js'
import { Preconditions } from '../util/preconditions.js'

export type AlphabetName = 'bitcoin' | 'ripple' | 'flickr'

export const ALPHABETS: Readonly<Record<AlphabetName, string>> = Object.freeze(
  {
    bitcoin: '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz',
    ripple: 'rpshnaf39wBUDNEGHJKLM4PQRST7VWXYZ2bcdeCg65jkm8oFqi1tuvAxyz',
    flickr: '123456789abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ',
  },
)

export const DEFAULT_ALPHABET: AlphabetName = 'bitcoin'

/** Decode table entry for a code that is not part of the alphabet */
export const INVALID_DIGIT = 255

/** Accepted selector names, lowercase */
export const ALPHABET_ALIASES: Readonly<Record<string, AlphabetName>> =
  Object.freeze({
    bitcoin: 'bitcoin',
    btc: 'bitcoin',
    ripple: 'ripple',
    xrp: 'ripple',
    flickr: 'flickr',
  })

export interface AlphabetTable {
  readonly name: AlphabetName
  /** Ordered symbols; `symbols[digit]` is the symbol for that digit */
  readonly symbols: string
  /** The symbol at index 0 */
  readonly zero: string
  /** Maps a code in [0, 255] to its digit, or to INVALID_DIGIT */
  readonly decodeTable: Readonly<Uint8Array>
}

const tables = new Map<AlphabetName, AlphabetTable>()

function buildDecodeTable(symbols: string): Uint8Array {
  const table = new Uint8Array(256).fill(INVALID_DIGIT)
  for (let i = 0; i < symbols.length; i++) {
    table[symbols.charCodeAt(i)] = i
  }
  return table
}

/**
 * Get the table for an alphabet. Tables are built on first use and cached
 * for the life of the process.
 */
export function getAlphabet(
  name: AlphabetName = DEFAULT_ALPHABET,
): AlphabetTable {
  let table = tables.get(name)
  if (!table) {
    Preconditions.checkArgument(
      isAlphabetName(name),
      'name',
      `Expected one of ${Object.keys(ALPHABETS).join(', ')}`,
    )
    const symbols = ALPHABETS[name]
    table = Object.freeze({
      name,
      symbols,
      zero: symbols[0],
      decodeTable: buildDecodeTable(symbols),
    })
    tables.set(name, table)
  }
  return table
}

export function isAlphabetName(value: unknown): value is AlphabetName {
  return typeof value === 'string' && Object.hasOwn(ALPHABETS, value)
}

/**
 * Resolve a selector such as `btc` or `Ripple` to an alphabet name
 *
 * @throws Base58Error.UnknownAlphabet
 */
export function parseAlphabet(name: string): AlphabetName {
  const key = name.toLowerCase()
  if (Object.hasOwn(ALPHABET_ALIASES, key)) {
    return ALPHABET_ALIASES[key]
  }
  throw new Base58Error.UnknownAlphabet(name, Object.keys(ALPHABETS))
}
