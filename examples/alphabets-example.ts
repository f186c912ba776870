/**
 * Base58 Alphabets Example
 *
 * Demonstrates:
 * - Encoding the same bytes with each alphabet
 * - Leading zero bytes surviving a round trip
 * - Handling a decoding failure through the result tag
 */

import {
  ALPHABETS,
  Base58,
  Base58Error,
  decodeWithAlphabet,
  encodeWithAlphabet,
  isAlphabetName,
} from '../index.js'

console.log('='.repeat(60))
console.log('Base58 Alphabets Example')
console.log('='.repeat(60))
console.log()

// ============================================================================
// Example 1: One input, three alphabets
// ============================================================================

console.log('Example 1: One input, three alphabets')
console.log('-'.repeat(60))

const data = Buffer.from('Hello, World!')
for (const name of Object.keys(ALPHABETS)) {
  if (!isAlphabetName(name)) continue
  const encoded = encodeWithAlphabet(data, name)
  const result = decodeWithAlphabet(encoded, name)
  console.log(
    name.padEnd(8),
    encoded,
    result.ok && result.value.equals(data)
      ? '(round trip ok)'
      : '(mismatch)',
  )
}
console.log()

// ============================================================================
// Example 2: Leading zeros
// ============================================================================

console.log('Example 2: Leading zeros')
console.log('-'.repeat(60))

const padded = Buffer.from([0, 0, 1, 2, 3])
const text = new Base58(padded).toString()
console.log('Bytes:', padded.toString('hex'))
console.log('Encoded:', text)
console.log('Decoded:', Base58.decode(text).toString('hex'))
console.log()

// ============================================================================
// Example 3: Invalid input
// ============================================================================

console.log('Example 3: Invalid input')
console.log('-'.repeat(60))

const bad = decodeWithAlphabet('9Ajdvzr0', 'bitcoin')
if (!bad.ok) {
  console.log('Rejected:', bad.error.code, bad.error.message)
  if (bad.error instanceof Base58Error.InvalidCharacter) {
    console.log('Offending character:', bad.error.character)
  }
}
