/**
 * Arbitrary precision unsigned integer over bytes
 *
 * Digits are kept little-endian in a pre-sized array, so growing the number
 * appends at the end instead of shifting every byte. `fromBuffer` and
 * `toBuffer` convert to and from big-endian at the boundary.
 */

import { Preconditions } from '../util/preconditions.js'

export class BigIntBuffer {
  /** Little-endian base-256 digits; only the first `size` are in use */
  private digits: Uint8Array
  private size: number = 1

  constructor(capacity: number = 1) {
    this.digits = new Uint8Array(Math.max(1, capacity))
  }

  /**
   * Read a big-endian byte sequence. The input is copied and leading zero
   * bytes are kept until the next arithmetic step or `toBuffer`.
   */
  static fromBuffer(buf: Uint8Array): BigIntBuffer {
    Preconditions.checkArgumentType(buf, 'Uint8Array', 'buf')
    const num = new BigIntBuffer(buf.length)
    const last = buf.length - 1
    for (let i = 0; i <= last; i++) {
      num.digits[i] = buf[last - i]
    }
    num.size = Math.max(1, buf.length)
    return num
  }

  /** Number of bytes in use, including any not yet trimmed zero bytes */
  get byteLength(): number {
    return this.size
  }

  isZero(): boolean {
    for (let i = 0; i < this.size; i++) {
      if (this.digits[i] !== 0) {
        return false
      }
    }
    return true
  }

  /**
   * Long division in place, most significant byte first. The quotient
   * replaces the current value and the remainder is returned.
   */
  divmod(divisor: number): number {
    Preconditions.checkArgument(
      Number.isInteger(divisor) && divisor >= 1 && divisor <= 256,
      'divisor',
      `Must be an integer between 1 and 256, got ${divisor}`,
    )
    let remainder = 0
    for (let i = this.size - 1; i >= 0; i--) {
      const temp = remainder * 256 + this.digits[i]
      this.digits[i] = Math.floor(temp / divisor)
      remainder = temp % divisor
    }
    this.trim()
    return remainder
  }

  /**
   * Multiply in place, least significant byte first, carrying into new most
   * significant bytes while the carry is non-zero.
   */
  multiply(factor: number): this {
    Preconditions.checkArgument(
      Number.isInteger(factor) && factor >= 0 && factor <= 256,
      'factor',
      `Must be an integer between 0 and 256, got ${factor}`,
    )
    let carry = 0
    for (let i = 0; i < this.size; i++) {
      const temp = this.digits[i] * factor + carry
      this.digits[i] = temp & 0xff
      carry = temp >> 8
    }
    this.pushCarry(carry)
    return this
  }

  /**
   * Add a small value in place. Stops walking the digits as soon as the
   * carry runs out.
   */
  add(value: number): this {
    Preconditions.checkArgument(
      Number.isInteger(value) && value >= 0 && value <= 255,
      'value',
      `Must be an integer between 0 and 255, got ${value}`,
    )
    let carry = value
    for (let i = 0; i < this.size && carry > 0; i++) {
      const temp = this.digits[i] + carry
      this.digits[i] = temp & 0xff
      carry = temp >> 8
    }
    this.pushCarry(carry)
    return this
  }

  /**
   * Big-endian bytes in canonical form: no leading zero byte, except the
   * single byte for zero.
   */
  toBuffer(): Buffer {
    this.trim()
    const buf = Buffer.alloc(this.size)
    const last = this.size - 1
    for (let i = 0; i <= last; i++) {
      buf[i] = this.digits[last - i]
    }
    return buf
  }

  private trim(): void {
    while (this.size > 1 && this.digits[this.size - 1] === 0) {
      this.size--
    }
  }

  private pushCarry(carry: number): void {
    while (carry > 0) {
      if (this.size === this.digits.length) {
        const grown = new Uint8Array(this.digits.length * 2)
        grown.set(this.digits)
        this.digits = grown
      }
      this.digits[this.size++] = carry & 0xff
      carry >>= 8
    }
  }
}
