import { createHash, getHashes, randomInt, webcrypto } from 'node:crypto'

/**
 * Token length used when the configured one is unusable
 */
export const DEFAULT_TOKEN_LENGTH = 32

/**
 * Upper bound on token length: a SHA-512 hex digest
 */
export const MAX_TOKEN_LENGTH = 128

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789'

export type TokenAlgorithm = 'sha512' | 'alphanumeric'

/**
 * Resolve a configured token length to an integer in 1..128.
 * Non-numeric and non-positive values fall back to 32; longer ones are capped.
 */
export function resolveTokenLength(value: unknown): number {
  let length = NaN

  if (typeof value === 'number') {
    length = Math.trunc(value)
  } else if (typeof value === 'string') {
    length = parseInt(value, 10)
  }

  if (!Number.isFinite(length) || length <= 0) {
    return DEFAULT_TOKEN_LENGTH
  }
  return Math.min(length, MAX_TOKEN_LENGTH)
}

function hasSha512(): boolean {
  return getHashes().includes('sha512')
}

function sha512Source(): string {
  const seed = new Uint8Array(64)
  webcrypto.getRandomValues(seed)
  return createHash('sha512').update(seed).digest('hex')
}

function alphanumericSource(): string {
  let out = ''
  for (let i = 0; i < MAX_TOKEN_LENGTH; i++) {
    out += ALPHABET[randomInt(ALPHABET.length)]
  }
  return out
}

/**
 * Generate a CSRF token over [a-z0-9].
 *
 * The token is a prefix of either a SHA-512 digest of a random seed or a
 * 128-character uniform sample of the alphabet, so it is never longer than
 * 128 characters.
 *
 * @example
 * ```typescript
 * generateAuthToken(10)  // 'a3f09c1e7b'
 * generateAuthToken(0)   // 32 characters
 * ```
 */
export function generateAuthToken(
  length: unknown = DEFAULT_TOKEN_LENGTH,
  options: { algorithm?: TokenAlgorithm } = {}
): string {
  const resolved = resolveTokenLength(length)
  const algorithm = options.algorithm ?? (hasSha512() ? 'sha512' : 'alphanumeric')

  const source = algorithm === 'sha512' ? sha512Source() : alphanumericSource()
  return source.slice(0, resolved)
}

/**
 * Constant-time string comparison to prevent timing attacks
 */
function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false

  let result = 0
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i)
  }
  return result === 0
}

/**
 * Compare two tokens (exact, case-sensitive, constant-time)
 */
export function tokensMatch(a: string | null | undefined, b: string | null | undefined): boolean {
  if (!a || !b) return false
  return safeCompare(a, b)
}
