import type { NextRequest } from 'next/server'
import { TOKEN_COOKIE_NAME } from './types'
import type { CSRFCookieOptions } from './types'

/**
 * Read/replace access to the client's token cookie
 */
export interface CookieStore {
  /** Token the client sent, if any */
  get(): string | undefined

  /** Replace the client's token */
  set(token: string, expiresAt: Date): void
}

// Not HttpOnly: the client script copies the cookie into forms
export const DEFAULT_COOKIE: CSRFCookieOptions = {
  path: '/',
  secure: process.env.NODE_ENV === 'production',
  sameSite: 'lax',
}

export function buildCookieString(
  name: string,
  value: string,
  expiresAt: Date,
  opts: CSRFCookieOptions = DEFAULT_COOKIE,
  now: number = Date.now()
): string {
  let cookie = `${name}=${value}`

  if (opts.path) cookie += `; Path=${opts.path}`
  if (opts.domain) cookie += `; Domain=${opts.domain}`
  cookie += `; Expires=${expiresAt.toUTCString()}`
  cookie += `; Max-Age=${Math.max(0, Math.round((expiresAt.getTime() - now) / 1000))}`
  if (opts.secure) cookie += '; Secure'
  if (opts.sameSite) cookie += `; SameSite=${opts.sameSite}`

  return cookie
}

/**
 * Cookie store for one request: reads the incoming cookie and collects the
 * replacement as a `Set-Cookie` header to apply to whichever response is sent.
 */
export class ResponseCookieJar implements CookieStore {
  private readonly incoming: string | undefined
  private readonly options: CSRFCookieOptions
  private pending: string | null = null

  constructor(req: NextRequest, options: CSRFCookieOptions = {}) {
    this.incoming = req.cookies.get(TOKEN_COOKIE_NAME)?.value
    this.options = { ...DEFAULT_COOKIE, ...options }
  }

  get(): string | undefined {
    return this.incoming
  }

  set(token: string, expiresAt: Date): void {
    this.pending = buildCookieString(TOKEN_COOKIE_NAME, token, expiresAt, this.options)
  }

  /**
   * The `Set-Cookie` value collected for this request
   */
  getSetCookieHeader(): string | null {
    return this.pending
  }

  /**
   * Append the collected cookie to a response's headers
   */
  applyTo(headers: Headers): void {
    if (this.pending) {
      headers.append('Set-Cookie', this.pending)
    }
  }
}
