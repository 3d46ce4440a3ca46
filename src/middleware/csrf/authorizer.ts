import { parseDuration } from '../../utils/time'
import type { Duration } from '../../core/types'
import type { CookieStore } from './cookie'
import type { FailureActionDispatcher } from './actions'
import { generateAuthToken, tokensMatch } from './token'
import type {
  AuthorizationResult,
  ProtectorConfig,
  RequestContext,
  TokenGenerator,
  Verdict,
} from './types'

export const DEFAULT_COOKIE_EXPIRY: Duration = '5m'

export interface RequestAuthorizerOptions {
  config: ProtectorConfig
  cookies: CookieStore
  dispatcher: FailureActionDispatcher
  generateToken?: TokenGenerator
  cookieExpiry?: Duration
}

/**
 * Whether a request of this kind must carry a valid token
 */
export function requiresValidation(
  ctx: RequestContext,
  config: Pick<ProtectorConfig, 'getRequestsProtected'>
): boolean {
  return ctx.requestType === 'POST' || config.getRequestsProtected
}

/**
 * Decide a request without side effects
 */
export function evaluateRequest(
  ctx: RequestContext,
  config: Pick<ProtectorConfig, 'getRequestsProtected'>
): Verdict {
  if (!requiresValidation(ctx, config)) {
    return { allowed: true }
  }

  if (!ctx.submittedToken) {
    return { allowed: false, reason: 'missing_token' }
  }

  if (!ctx.cookieToken) {
    return { allowed: false, reason: 'missing_cookie' }
  }

  if (!tokensMatch(ctx.submittedToken, ctx.cookieToken)) {
    return { allowed: false, reason: 'token_mismatch' }
  }

  return { allowed: true }
}

/**
 * Authorizes one request and rotates the token cookie.
 *
 * The cookie is replaced exactly once per request: before the failure action
 * when the request is denied, after the decision when it is allowed.
 */
export class RequestAuthorizer {
  private readonly config: ProtectorConfig
  private readonly cookies: CookieStore
  private readonly dispatcher: FailureActionDispatcher
  private readonly generateToken: TokenGenerator
  private readonly cookieExpiryMs: number

  constructor(options: RequestAuthorizerOptions) {
    this.config = options.config
    this.cookies = options.cookies
    this.dispatcher = options.dispatcher
    this.generateToken = options.generateToken ?? generateAuthToken
    this.cookieExpiryMs = parseDuration(options.cookieExpiry ?? DEFAULT_COOKIE_EXPIRY)
  }

  evaluate(ctx: RequestContext): Verdict {
    return evaluateRequest(ctx, this.config)
  }

  async authorize(ctx: RequestContext): Promise<AuthorizationResult> {
    const verdict = this.evaluate(ctx)

    if (!verdict.allowed) {
      this.refreshCookie()
      const outcome = await this.dispatcher.dispatch(ctx)
      return { verdict: 'denied', reason: verdict.reason, outcome }
    }

    this.refreshCookie()
    return { verdict: 'allowed' }
  }

  /**
   * Issue a fresh token to the client
   */
  refreshCookie(): string {
    const token = this.generateToken(this.config.tokenLength)
    this.cookies.set(token, new Date(Date.now() + this.cookieExpiryMs))
    return token
  }
}
