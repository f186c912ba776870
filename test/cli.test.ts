/**
 * Command-line front end tests
 *
 * The tool runs in process with an in-memory stdin, stdout and logger.
 */

import { describe, it } from 'node:test'
import assert from 'node:assert'
import color from 'picocolors'
import { USAGE, parseOptions, run } from '../lib/cli/index.js'
import { ALPHABET_ENV, resolve, resolveAlphabet } from '../lib/cli/config.js'
import { getLogger, type Logger } from '../lib/cli/logger.js'
import { Base58Error, UsageError } from '../lib/errors.js'

interface Harness {
  stdout: Array<Uint8Array | string>
  errors: string[]
  exec: (argv: string[]) => Promise<number>
}

function harness(
  stdin: Buffer | string | Error,
  env: NodeJS.ProcessEnv = {},
  useColor = false,
): Harness {
  const stdout: Array<Uint8Array | string> = []
  const errors: string[] = []
  const logger: Logger = {
    log: () => {},
    info: () => {},
    warn: () => {},
    error: (...args: unknown[]) => {
      errors.push(args.map(String).join(' '))
    },
  }
  return {
    stdout,
    errors,
    exec: argv =>
      run(argv, {
        readStdin: async () => {
          if (stdin instanceof Error) {
            throw stdin
          }
          return typeof stdin === 'string' ? Buffer.from(stdin) : stdin
        },
        writeStdout: data => {
          stdout.push(data)
        },
        logger,
        env,
        color: useColor,
      }),
  }
}

describe('CLI', () => {
  describe('encode mode', () => {
    it('prints the encoded input with a newline', async () => {
      const h = harness('Hello')
      assert.strictEqual(await h.exec([]), 0)
      assert.deepStrictEqual(h.stdout, ['9Ajdvzr\n'])
      assert.deepStrictEqual(h.errors, [])
    })

    it('prints only a newline for empty input', async () => {
      const h = harness('')
      assert.strictEqual(await h.exec([]), 0)
      assert.deepStrictEqual(h.stdout, ['\n'])
    })

    it('encodes raw bytes, including leading zeros', async () => {
      const h = harness(Buffer.from([0, 0, 1, 2, 3]))
      assert.strictEqual(await h.exec([]), 0)
      assert.deepStrictEqual(h.stdout, ['11Ldp\n'])
    })

    it('selects the alphabet by name or alias', async () => {
      for (const argv of [
        ['-a', 'ripple'],
        ['--alphabet', 'xrp'],
        ['--alphabet=RIPPLE'],
      ]) {
        const h = harness('Hello')
        assert.strictEqual(await h.exec(argv), 0)
        assert.deepStrictEqual(h.stdout, ['9wjdvzi\n'], argv.join(' '))
      }
    })

    it('reads the alphabet from the environment', async () => {
      const h = harness('Hello', { [ALPHABET_ENV]: 'flickr' })
      assert.strictEqual(await h.exec([]), 0)
      assert.deepStrictEqual(h.stdout, ['9aJCVZR\n'])
    })

    it('prefers the flag over the environment', async () => {
      const h = harness('Hello', { [ALPHABET_ENV]: 'flickr' })
      assert.strictEqual(await h.exec(['-a', 'btc']), 0)
      assert.deepStrictEqual(h.stdout, ['9Ajdvzr\n'])
    })

    it('takes the last of a repeated --alphabet', async () => {
      const h = harness('Hello')
      assert.strictEqual(await h.exec(['-a', 'ripple', '-a', 'flickr']), 0)
      assert.deepStrictEqual(h.stdout, ['9aJCVZR\n'])
      assert.deepStrictEqual(h.errors, [])
    })
  })

  describe('decode mode', () => {
    it('writes the decoded bytes', async () => {
      const h = harness('9Ajdvzr')
      assert.strictEqual(await h.exec(['-d']), 0)
      assert.deepStrictEqual(h.stdout, [Buffer.from('Hello')])
    })

    it('trims surrounding whitespace', async () => {
      const h = harness('  \t72k1xXWG59fYdzSNoA\n')
      assert.strictEqual(await h.exec(['--decode']), 0)
      assert.deepStrictEqual(h.stdout, [Buffer.from('Hello, World!')])
    })

    it('decodes with the selected alphabet', async () => {
      const h = harness('rrLdF\n')
      assert.strictEqual(await h.exec(['-d', '-a', 'ripple']), 0)
      assert.deepStrictEqual(h.stdout, [Buffer.from([0, 0, 1, 2, 3])])
    })

    it('trims Unicode whitespace beyond ASCII', async () => {
      const h = harness('\u00a09Ajdvzr\u0085\u2028')
      assert.strictEqual(await h.exec(['-d']), 0)
      assert.deepStrictEqual(h.stdout, [Buffer.from('Hello')])
    })

    it('rejects a leading byte order mark', async () => {
      const h = harness('\ufeff9Ajdvzr\n')
      assert.strictEqual(await h.exec(['-d']), 1)
      assert.deepStrictEqual(h.stdout, [])
      assert.deepStrictEqual(h.errors, [
        "Error: Invalid character '\ufeff' in Base58 input",
      ])
    })

    it('writes nothing for blank input', async () => {
      const h = harness('\n')
      assert.strictEqual(await h.exec(['-d']), 0)
      assert.deepStrictEqual(h.stdout, [Buffer.alloc(0)])
    })

    it('fails on an invalid character', async () => {
      const h = harness('9Ajdvzr0\n')
      assert.strictEqual(await h.exec(['-d']), 1)
      assert.deepStrictEqual(h.stdout, [])
      assert.deepStrictEqual(h.errors, [
        "Error: Invalid character '0' in Base58 input",
      ])
    })

    it('fails on input that is not UTF-8', async () => {
      const h = harness(Buffer.from([0x39, 0xff, 0xfe]))
      assert.strictEqual(await h.exec(['-d']), 1)
      assert.deepStrictEqual(h.stdout, [])
      assert.strictEqual(h.errors.length, 1)
      assert.ok(h.errors[0].startsWith('Error: Input is not valid UTF-8: '))
    })
  })

  describe('arguments', () => {
    it('prints usage for -h and --help without reading stdin', async () => {
      for (const argv of [['-h'], ['--help'], ['-d', '--help']]) {
        const h = harness(new Error('stdin should not be read'))
        assert.strictEqual(await h.exec(argv), 0, argv.join(' '))
        assert.deepStrictEqual(h.errors, [USAGE], argv.join(' '))
        assert.deepStrictEqual(h.stdout, [], argv.join(' '))
      }
    })

    it('rejects an unknown alphabet', async () => {
      const h = harness('Hello')
      assert.strictEqual(await h.exec(['-a', 'base64']), 1)
      assert.deepStrictEqual(h.errors, [
        'Error: Unknown alphabet: base64. Valid options: bitcoin, ripple, flickr',
      ])
      assert.deepStrictEqual(h.stdout, [])
    })

    it('rejects an unknown alphabet from the environment', async () => {
      const h = harness('Hello', { [ALPHABET_ENV]: 'base64' })
      assert.strictEqual(await h.exec([]), 1)
      assert.deepStrictEqual(h.errors, [
        'Error: Unknown alphabet: base64. Valid options: bitcoin, ripple, flickr',
      ])
    })

    it('rejects a stray argument without printing usage', async () => {
      const h = harness('Hello')
      assert.strictEqual(await h.exec(['extra']), 1)
      assert.deepStrictEqual(h.errors, ['Error: Unexpected argument: extra'])
      assert.deepStrictEqual(h.stdout, [])
    })

    it('rejects a dotted --alphabet key as an unknown option', async () => {
      const h = harness('Hello')
      assert.strictEqual(await h.exec(['--alphabet.x', 'ripple']), 1)
      assert.strictEqual(h.errors.length, 2)
      assert.ok(h.errors[0].startsWith('Error: Unknown argument'))
      assert.strictEqual(h.errors[1], USAGE)
      assert.deepStrictEqual(h.stdout, [])
    })

    it('rejects an unknown option and prints usage', async () => {
      const h = harness('Hello')
      assert.strictEqual(await h.exec(['--bogus']), 1)
      assert.strictEqual(h.errors.length, 2)
      assert.ok(h.errors[0].startsWith('Error: '))
      assert.strictEqual(h.errors[1], USAGE)
    })

    it('reports a failure to read stdin', async () => {
      const h = harness(new Error('boom'))
      assert.strictEqual(await h.exec([]), 1)
      assert.deepStrictEqual(h.errors, ['Error: Failed to read input: boom'])
    })

    it('colours the error label when asked to', async () => {
      const h = harness('9Ajdvzr0', {}, true)
      assert.strictEqual(await h.exec(['-d']), 1)
      const colors = color.createColors(true)
      const label = colors.red(colors.bold('Error'))
      assert.deepStrictEqual(h.errors, [
        `${label}: Invalid character '0' in Base58 input`,
      ])
    })
  })

  describe('parseOptions', () => {
    it('defaults to encoding with bitcoin', () => {
      assert.deepStrictEqual(parseOptions([], {}), {
        decode: false,
        alphabet: 'bitcoin',
        help: false,
      })
    })

    it('reads short and long flags', () => {
      assert.deepStrictEqual(parseOptions(['-d', '-a', 'xrp'], {}), {
        decode: true,
        alphabet: 'ripple',
        help: false,
      })
      assert.deepStrictEqual(
        parseOptions(['--decode', '--alphabet', 'flickr'], {}),
        { decode: true, alphabet: 'flickr', help: false },
      )
    })

    it('reads --help', () => {
      assert.deepStrictEqual(parseOptions(['--help'], {}), {
        decode: false,
        alphabet: 'bitcoin',
        help: true,
      })
    })

    it('keeps the last value of a repeated --alphabet', () => {
      assert.strictEqual(
        parseOptions(['--alphabet', 'xrp', '-a', 'btc'], {}).alphabet,
        'bitcoin',
      )
    })

    it('requires a value for --alphabet', () => {
      assert.throws(() => parseOptions(['-a'], {}), UsageError)
    })

    it('throws a codec error for an unknown alphabet', () => {
      assert.throws(
        () => parseOptions(['-a', 'nope'], {}),
        Base58Error.UnknownAlphabet,
      )
    })
  })
})

describe('config', () => {
  it('resolves flag, then env, then nothing', () => {
    assert.strictEqual(resolve('a', 'X', { X: 'b' }), 'a')
    assert.strictEqual(resolve(undefined, 'X', { X: 'b' }), 'b')
    assert.strictEqual(resolve(undefined, 'X', { X: '' }), undefined)
    assert.strictEqual(resolve(undefined, 'X', {}), undefined)
  })

  it('falls back to the default alphabet', () => {
    assert.strictEqual(resolveAlphabet(undefined, {}), 'bitcoin')
    assert.strictEqual(
      resolveAlphabet(undefined, { [ALPHABET_ENV]: '' }),
      'bitcoin',
    )
    assert.strictEqual(
      resolveAlphabet(undefined, { [ALPHABET_ENV]: 'XRP' }),
      'ripple',
    )
  })
})

describe('logger', () => {
  it('writes text through the console', () => {
    const logger = getLogger()
    assert.strictEqual(logger.error, console.error)
    assert.strictEqual(logger.log, console.log)
  })
})
