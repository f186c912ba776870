/**
 * Preconditions utility module
 */

import { Base58Error } from '../errors.js'

export class Preconditions {
  static checkArgument(
    condition: boolean,
    argumentName: string,
    message?: string,
  ): void {
    if (!condition) {
      throw new Base58Error.Precondition.InvalidArgument(argumentName, message)
    }
  }

  /**
   * `type` is a `typeof` name, or the special name `'Uint8Array'`, which
   * also accepts a Node Buffer.
   */
  static checkArgumentType(
    argument: unknown,
    type: string,
    argumentName?: string,
  ): void {
    argumentName = argumentName || '(unknown name)'
    const matches =
      type === 'Uint8Array'
        ? argument instanceof Uint8Array
        : typeof argument === type
    if (!matches) {
      throw new Base58Error.Precondition.InvalidArgumentType(
        argument,
        type,
        argumentName,
      )
    }
  }
}
