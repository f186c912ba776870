/**
 * Buffer utility module
 */

import { Preconditions } from './preconditions.js'

export class BufferUtil {
  /**
   * Returns a zero-filled byte array
   *
   * @param bytes Number of bytes
   */
  static emptyBuffer(bytes: number): Buffer {
    Preconditions.checkArgumentType(bytes, 'number', 'bytes')
    Preconditions.checkArgument(
      Number.isInteger(bytes) && bytes >= 0,
      'bytes',
      'Must be a non-negative integer',
    )
    return Buffer.alloc(bytes)
  }

  /**
   * Concatenates buffers
   *
   * Shortcut for Buffer.concat
   */
  static concat(
    list: ReadonlyArray<Uint8Array>,
    totalLength?: number,
  ): Buffer {
    return Buffer.concat(list, totalLength)
  }
}

export const EMPTY_BUFFER = Buffer.alloc(0)
