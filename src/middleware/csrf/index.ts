/**
 * CSRF Protection Middleware
 *
 * @example
 * ```typescript
 * import { withCSRFProtector } from 'next-csrf-protector/csrf'
 *
 * const options = { config: './csrfprotector.config.json' }
 *
 * // GET: page render, rotates the token cookie and injects the client script
 * export const GET = withCSRFProtector(async () => {
 *   return new Response('<html><body><form method="post">...</form></body></html>', {
 *     headers: { 'Content-Type': 'text/html' },
 *   })
 * }, options)
 *
 * // POST: rejected unless CSRFPROTECTOR_AUTH_TOKEN matches the cookie
 * export const POST = withCSRFProtector(async (req) => {
 *   return Response.json({ success: true })
 * }, options)
 * ```
 *
 * @packageDocumentation
 */

export {
  CSRFProtector,
  createCSRFProtector,
  withCSRFProtector,
  generateCSRF,
  validateCSRF,
  assertCSRF,
} from './middleware'
export type { GuardedRequest } from './middleware'
export { RequestAuthorizer, evaluateRequest, requiresValidation, DEFAULT_COOKIE_EXPIRY } from './authorizer'
export type { RequestAuthorizerOptions } from './authorizer'
export { FailureActionDispatcher, createAttackRecord, FORBIDDEN_BODY, INTERNAL_ERROR_BODY } from './actions'
export {
  HtmlRewriter,
  createHtmlRewriteStream,
  rewriteHtmlResponse,
  isRewritableResponse,
  buildScriptTag,
  buildNoscriptBlock,
} from './rewriter'
export type { HtmlRewriterOptions } from './rewriter'
export {
  generateAuthToken,
  resolveTokenLength,
  tokensMatch,
  DEFAULT_TOKEN_LENGTH,
  MAX_TOKEN_LENGTH,
} from './token'
export type { TokenAlgorithm } from './token'
export { ResponseCookieJar, buildCookieString } from './cookie'
export type { CookieStore } from './cookie'
export { buildRequestContext, stripRequestParams, getRequestType } from './request'
export {
  resolveConfig,
  loadConfig,
  loadConfigFile,
  assertLogDirectory,
  DEFAULT_CONFIG_FILE,
  DEFAULT_DISABLED_JS_MESSAGE,
} from './config'
export { TOKEN_COOKIE_NAME, TOKEN_FIELD_NAME, FailedAuthAction } from './types'
export type {
  ProtectorConfig,
  ProtectorConfigInput,
  FailedAuthActionMap,
  CSRFCookieOptions,
  CSRFProtectorOptions,
  TokenGenerator,
  RequestContext,
  DenialReason,
  Verdict,
  FailureOutcome,
  AuthorizationResult,
} from './types'
