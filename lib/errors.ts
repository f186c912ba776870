/**
 * Error handling module
 *
 * Every failure raised by the codec is a `Base58Error`. The `code` property
 * tags the variant so callers can branch without `instanceof` chains.
 */

function format(message: string, args: unknown[]): string {
  return message
    .replace('{0}', () => String(args[0] ?? ''))
    .replace('{1}', () => String(args[1] ?? ''))
    .replace('{2}', () => String(args[2] ?? ''))
}

export type Base58ErrorCode =
  | 'INTERNAL'
  | 'INVALID_CHARACTER'
  | 'EMPTY_INPUT'
  | 'OVERFLOW'
  | 'UNKNOWN_ALPHABET'
  | 'INVALID_STATE'
  | 'INVALID_ARGUMENT'
  | 'INVALID_ARGUMENT_TYPE'

const errorSpec: Record<Exclude<Base58ErrorCode, 'INTERNAL'>, string> = {
  INVALID_CHARACTER: "Invalid character '{0}' in Base58 input",
  EMPTY_INPUT: 'Input string is empty',
  OVERFLOW: 'Numeric overflow during decoding',
  UNKNOWN_ALPHABET: 'Unknown alphabet: {0}. Valid options: {1}',
  INVALID_STATE: 'Invalid state: {0}',
  INVALID_ARGUMENT: 'Invalid Argument{0}',
  INVALID_ARGUMENT_TYPE: 'Invalid Argument for {2}, expected {1} but got {0}',
}

export class Base58Error extends Error {
  readonly code: Base58ErrorCode

  constructor(code: Base58ErrorCode = 'INTERNAL', message?: string) {
    super(message || 'Internal error')
    this.name = 'Base58Error'
    this.code = code
  }

  // Assigned below, once the subclasses exist
  static InvalidCharacter: typeof InvalidCharacterError
  static EmptyInput: typeof EmptyInputError
  static Overflow: typeof OverflowError
  static UnknownAlphabet: typeof UnknownAlphabetError
  static Precondition: {
    InvalidState: typeof InvalidStateError
    InvalidArgument: typeof InvalidArgumentError
    InvalidArgumentType: typeof InvalidArgumentTypeError
  }
}

/**
 * A symbol outside the selected alphabet, or outside the single-byte code
 * range, was met while decoding.
 */
export class InvalidCharacterError extends Base58Error {
  readonly character: string

  constructor(character: string) {
    super(
      'INVALID_CHARACTER',
      format(errorSpec.INVALID_CHARACTER, [character]),
    )
    this.name = 'Base58Error.InvalidCharacter'
    this.character = character
  }
}

/** Reserved: empty input decodes to an empty buffer and never raises this. */
export class EmptyInputError extends Base58Error {
  constructor() {
    super('EMPTY_INPUT', errorSpec.EMPTY_INPUT)
    this.name = 'Base58Error.EmptyInput'
  }
}

/** Reserved: the integer buffer grows without bound and never raises this. */
export class OverflowError extends Base58Error {
  constructor() {
    super('OVERFLOW', errorSpec.OVERFLOW)
    this.name = 'Base58Error.Overflow'
  }
}

export class UnknownAlphabetError extends Base58Error {
  readonly alphabet: string

  constructor(alphabet: string, validOptions: readonly string[]) {
    super(
      'UNKNOWN_ALPHABET',
      format(errorSpec.UNKNOWN_ALPHABET, [alphabet, validOptions.join(', ')]),
    )
    this.name = 'Base58Error.UnknownAlphabet'
    this.alphabet = alphabet
  }
}

export class InvalidStateError extends Base58Error {
  constructor(message: string) {
    super('INVALID_STATE', format(errorSpec.INVALID_STATE, [message]))
    this.name = 'Base58Error.Precondition.InvalidState'
  }
}

export class InvalidArgumentError extends Base58Error {
  constructor(argumentName: string, message?: string) {
    const detail = message ? `${argumentName}: ${message}` : argumentName
    super(
      'INVALID_ARGUMENT',
      format(errorSpec.INVALID_ARGUMENT, [detail ? ': ' + detail : '']),
    )
    this.name = 'Base58Error.Precondition.InvalidArgument'
  }
}

export class InvalidArgumentTypeError extends Base58Error {
  constructor(argument: unknown, type: string, argumentName?: string) {
    super(
      'INVALID_ARGUMENT_TYPE',
      format(errorSpec.INVALID_ARGUMENT_TYPE, [
        typeof argument,
        type,
        argumentName || '(unknown name)',
      ]),
    )
    this.name = 'Base58Error.Precondition.InvalidArgumentType'
  }
}

Base58Error.InvalidCharacter = InvalidCharacterError
Base58Error.EmptyInput = EmptyInputError
Base58Error.Overflow = OverflowError
Base58Error.UnknownAlphabet = UnknownAlphabetError
Base58Error.Precondition = {
  InvalidState: InvalidStateError,
  InvalidArgument: InvalidArgumentError,
  InvalidArgumentType: InvalidArgumentTypeError,
}

/**
 * Raised by the command-line front end for malformed flags or arguments.
 * `showUsage` tells the front end whether to print the usage text after the
 * message.
 */
export class UsageError extends Error {
  readonly showUsage: boolean

  constructor(message: string, showUsage = true) {
    super(message)
    this.name = 'UsageError'
    this.showUsage = showUsage
  }
}
