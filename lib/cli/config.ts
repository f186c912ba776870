import {
  DEFAULT_ALPHABET,
  parseAlphabet,
  type AlphabetName,
} from '../encoding/alphabet.js'

/** Environment variable naming the alphabet when no flag is given */
export const ALPHABET_ENV = 'BASE58_ALPHABET'

/**
 * Resolve a parameter with precedence: flag > env > fallback.
 * An empty environment value counts as unset.
 */
export function resolve(
  flagValue: string | undefined,
  envVar: string,
  env: NodeJS.ProcessEnv,
): string | undefined {
  if (flagValue !== undefined) return flagValue
  const val = env[envVar]
  if (val !== undefined && val !== '') return val
  return undefined
}

/**
 * @throws Base58Error.UnknownAlphabet when the flag or env value names no
 * known alphabet
 */
export function resolveAlphabet(
  flagValue: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): AlphabetName {
  const name = resolve(flagValue, ALPHABET_ENV, env)
  return name === undefined ? DEFAULT_ALPHABET : parseAlphabet(name)
}
