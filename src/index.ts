/**
 * next-csrf-protector
 *
 * Cookie-bound CSRF tokens for Next.js App Router route handlers, with
 * automatic client script injection into HTML responses.
 *
 * @example
 * ```typescript
 * import { createCSRFProtector } from 'next-csrf-protector'
 *
 * const protector = await createCSRFProtector({
 *   config: {
 *     logDirectory: './log',
 *     jsResourceUrl: '/js/csrfprotector.js',
 *     failedAuthAction: { GET: 1, POST: 0 },
 *   },
 * })
 *
 * export const POST = protector.protect(async (req) => {
 *   return Response.json({ ok: true })
 * })
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Core
// =============================================================================

export type { RouteHandler, Duration, RequestType } from './core/types'

export {
  ProtectorError,
  CsrfError,
  ConfigurationError,
  LogSinkError,
  isProtectorError,
  toProtectorError,
} from './core/errors'

// =============================================================================
// CSRF Protection
// =============================================================================

export {
  CSRFProtector,
  createCSRFProtector,
  withCSRFProtector,
  generateCSRF,
  validateCSRF,
  assertCSRF,
  RequestAuthorizer,
  evaluateRequest,
  FailureActionDispatcher,
  HtmlRewriter,
  createHtmlRewriteStream,
  rewriteHtmlResponse,
  generateAuthToken,
  resolveTokenLength,
  tokensMatch,
  ResponseCookieJar,
  resolveConfig,
  loadConfig,
  TOKEN_COOKIE_NAME,
  TOKEN_FIELD_NAME,
  FailedAuthAction,
} from './middleware/csrf'

export type {
  GuardedRequest,
  CookieStore,
  HtmlRewriterOptions,
  ProtectorConfig,
  ProtectorConfigInput,
  CSRFCookieOptions,
  CSRFProtectorOptions,
  TokenGenerator,
  RequestContext,
  DenialReason,
  Verdict,
  FailureOutcome,
  AuthorizationResult,
} from './middleware/csrf'

// =============================================================================
// Attack Logging
// =============================================================================

export {
  FileLogSink,
  createFileLogSink,
  getLogFileName,
  MemoryLogSink,
  createMemoryLogSink,
  ConsoleLogSink,
  createConsoleLogSink,
  MultiLogSink,
  createMultiLogSink,
} from './middleware/audit'

export type {
  AttackLogRecord,
  AttackLogSink,
  LogRotation,
  FileLogSinkOptions,
  MemoryLogSinkOptions,
  ConsoleLogSinkOptions,
} from './middleware/audit'

// =============================================================================
// Utilities
// =============================================================================

export { parseDuration, nowInSeconds } from './utils/time'

// =============================================================================
// Version
// =============================================================================

/**
 * Package version
 */
export const VERSION = '0.1.0'
