import type { NextRequest } from 'next/server'
import { CsrfError, toProtectorError } from '../../core/errors'
import type { ProtectorError } from '../../core/errors'
import type { Duration, RouteHandler } from '../../core/types'
import { parseDuration } from '../../utils/time'
import { FileLogSink } from '../audit/stores/file'
import type { AttackLogSink } from '../audit/types'
import { FailureActionDispatcher } from './actions'
import { DEFAULT_COOKIE_EXPIRY, RequestAuthorizer, evaluateRequest } from './authorizer'
import { assertLogDirectory, loadConfig } from './config'
import { DEFAULT_COOKIE, ResponseCookieJar, buildCookieString } from './cookie'
import { buildRequestContext, stripRequestParams } from './request'
import { HtmlRewriter, rewriteHtmlResponse } from './rewriter'
import { DEFAULT_TOKEN_LENGTH, generateAuthToken } from './token'
import { TOKEN_COOKIE_NAME } from './types'
import type {
  AuthorizationResult,
  CSRFCookieOptions,
  CSRFProtectorOptions,
  DenialReason,
  ProtectorConfig,
  RequestContext,
  TokenGenerator,
} from './types'

/**
 * Outcome of authorizing one request
 */
export interface GuardedRequest {
  result: AuthorizationResult
  context: RequestContext
  /** Request to hand to the application (parameters stripped by action 1) */
  request: NextRequest
  cookies: ResponseCookieJar
}

function defaultErrorResponse(error: ProtectorError): Response {
  console.error(`[CSRFProtector] ${error.name}: ${error.message}`)
  return error.toResponse()
}

function withCookies(response: Response, cookies: ResponseCookieJar): Response {
  if (!cookies.getSetCookieHeader()) return response

  const headers = new Headers(response.headers)
  cookies.applyTo(headers)
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  })
}

/**
 * Configured protector. Create one with {@link createCSRFProtector}.
 */
export class CSRFProtector {
  readonly config: ProtectorConfig
  private readonly dispatcher: FailureActionDispatcher
  private readonly cookieOptions: CSRFCookieOptions
  private readonly cookieExpiry: Duration
  private readonly generateToken: TokenGenerator | undefined
  private readonly onError: NonNullable<CSRFProtectorOptions['onError']> | undefined

  constructor(
    config: ProtectorConfig,
    options: {
      sink: AttackLogSink
      cookie?: CSRFCookieOptions
      cookieExpiry?: Duration
      generateToken?: TokenGenerator
      onError?: CSRFProtectorOptions['onError']
    }
  ) {
    this.config = config
    this.dispatcher = new FailureActionDispatcher({ config, sink: options.sink })
    this.cookieOptions = options.cookie ?? {}
    this.cookieExpiry = options.cookieExpiry ?? DEFAULT_COOKIE_EXPIRY
    this.generateToken = options.generateToken
    this.onError = options.onError
  }

  /**
   * Rewriter for one outgoing response
   */
  createRewriter(): HtmlRewriter {
    return new HtmlRewriter({
      jsResourceUrl: this.config.jsResourceUrl,
      disabledJsMessage: this.config.disabledJsMessage,
    })
  }

  /**
   * Authorize a request, rotate its token and run the failure action if denied
   *
   * @throws LogSinkError when a denial cannot be logged
   */
  async authorize(
    req: NextRequest,
    cookies: ResponseCookieJar = new ResponseCookieJar(req, this.cookieOptions)
  ): Promise<GuardedRequest> {
    const context = await buildRequestContext(req, cookies.get())

    const authorizer = new RequestAuthorizer({
      config: this.config,
      cookies,
      dispatcher: this.dispatcher,
      generateToken: this.generateToken,
      cookieExpiry: this.cookieExpiry,
    })

    const result = await authorizer.authorize(context)

    const request =
      result.verdict === 'denied' && result.outcome.kind === 'continue'
        ? stripRequestParams(req, result.outcome.stripped)
        : req

    return { result, context, request, cookies }
  }

  /**
   * Wrap a route handler
   *
   * @example
   * ```typescript
   * const protector = await createCSRFProtector({ config: './csrfprotector.config.json' })
   *
   * export const POST = protector.protect(async (req) => {
   *   return Response.json({ ok: true })
   * })
   * ```
   */
  protect(handler: RouteHandler): RouteHandler {
    return async (req: NextRequest): Promise<Response> => {
      const cookies = new ResponseCookieJar(req, this.cookieOptions)

      let guarded: GuardedRequest
      try {
        guarded = await this.authorize(req, cookies)
      } catch (error) {
        // The token may already be rotated when logging fails
        const response = await this.handleError(toProtectorError(error), req)
        return withCookies(response, cookies)
      }

      const { result, request } = guarded

      const response =
        result.verdict === 'denied' && result.outcome.kind === 'terminate'
          ? result.outcome.response
          : await handler(request)

      const rewritten = rewriteHtmlResponse(response, this.createRewriter())
      cookies.applyTo(rewritten.headers)
      return rewritten
    }
  }

  handleError(error: ProtectorError, req: NextRequest): Response | Promise<Response> {
    return this.onError ? this.onError(error, req) : defaultErrorResponse(error)
  }
}

/**
 * Load configuration, apply overrides and build a protector.
 *
 * When no `sink` is given, attack records go to monthly files under
 * `logDirectory`, which must already exist.
 *
 * @throws ConfigurationError
 */
export async function createCSRFProtector(options: CSRFProtectorOptions = {}): Promise<CSRFProtector> {
  const config = await loadConfig(options.config, {
    getRequestsProtected: options.getRequestsProtected,
    tokenLength: options.tokenLength,
    failedAuthAction: options.failedAuthAction,
  })

  let sink = options.sink
  if (!sink) {
    await assertLogDirectory(config.logDirectory)
    sink = new FileLogSink({ directory: config.logDirectory })
  }

  return new CSRFProtector(config, {
    sink,
    cookie: options.cookie,
    cookieExpiry: options.cookieExpiry,
    generateToken: options.generateToken,
    onError: options.onError,
  })
}

/**
 * CSRF protection middleware
 *
 * Initializes on the first request. If initialization fails every request
 * gets the error response and initialization is retried on the next one.
 *
 * @example
 * ```typescript
 * export const POST = withCSRFProtector(async (req) => {
 *   return Response.json({ success: true })
 * }, { config: { logDirectory: './log', jsResourceUrl: '/js/csrfprotector.js' } })
 * ```
 */
export function withCSRFProtector(handler: RouteHandler, options: CSRFProtectorOptions = {}): RouteHandler {
  let ready: Promise<RouteHandler> | null = null

  return async (req: NextRequest): Promise<Response> => {
    if (!ready) {
      ready = createCSRFProtector(options).then(protector => protector.protect(handler))
    }

    let wrapped: RouteHandler
    try {
      wrapped = await ready
    } catch (error) {
      ready = null
      const protectorError = toProtectorError(error)
      return options.onError ? options.onError(protectorError, req) : defaultErrorResponse(protectorError)
    }

    return wrapped(req)
  }
}

/**
 * Generate a new token and its `Set-Cookie` header.
 * Use this in routes that hand the token to API clients directly.
 */
export function generateCSRF(options: {
  tokenLength?: number
  cookieExpiry?: Duration
  cookie?: CSRFCookieOptions
} = {}): { token: string; cookieHeader: string } {
  const now = Date.now()
  const token = generateAuthToken(options.tokenLength ?? DEFAULT_TOKEN_LENGTH)
  const expiresAt = new Date(now + parseDuration(options.cookieExpiry ?? DEFAULT_COOKIE_EXPIRY))
  const cookieHeader = buildCookieString(
    TOKEN_COOKIE_NAME,
    token,
    expiresAt,
    { ...DEFAULT_COOKIE, ...options.cookie },
    now
  )

  return { token, cookieHeader }
}

/**
 * Validate a request without rotating the token, logging or acting.
 * Useful for custom validation flows
 */
export async function validateCSRF(
  req: NextRequest,
  options: { getRequestsProtected?: boolean } = {}
): Promise<{ valid: boolean; reason?: DenialReason }> {
  const cookieToken = req.cookies.get(TOKEN_COOKIE_NAME)?.value
  const context = await buildRequestContext(req, cookieToken)
  const verdict = evaluateRequest(context, {
    getRequestsProtected: options.getRequestsProtected ?? false,
  })

  return verdict.allowed ? { valid: true } : { valid: false, reason: verdict.reason }
}

/**
 * Like {@link validateCSRF}, but throws
 *
 * @throws CsrfError carrying the denial reason in `details.reason`
 */
export async function assertCSRF(
  req: NextRequest,
  options: { getRequestsProtected?: boolean } = {}
): Promise<void> {
  const { valid, reason } = await validateCSRF(req, options)
  if (!valid) {
    throw new CsrfError(undefined, { details: { reason } })
  }
}
