import type { NextRequest } from 'next/server'
import type { Duration, RequestType } from '../../core/types'
import type { ProtectorError } from '../../core/errors'
import type { AttackLogSink } from '../audit/types'

/**
 * Name of the cookie carrying the token. Fixed: the client script reads it.
 */
export const TOKEN_COOKIE_NAME = 'CSRF_AUTH_TOKEN'

/**
 * Name of the body/query field the client submits the token in
 */
export const TOKEN_FIELD_NAME = 'CSRFPROTECTOR_AUTH_TOKEN'

/**
 * Failure action codes
 */
export const FailedAuthAction = {
  /** 403 Forbidden */
  Forbidden: 0,
  /** Drop the request parameters and forward */
  StripParams: 1,
  /** Redirect to `errorRedirectionPage` */
  Redirect: 2,
  /** Send `customErrorMessage` */
  CustomMessage: 3,
  /** 500 Internal Server Error */
  InternalError: 4,
} as const

/**
 * Per-method failure action codes
 */
export interface FailedAuthActionMap {
  GET: number
  POST: number
}

/**
 * Resolved protector configuration. Frozen once built.
 */
export interface ProtectorConfig {
  /** Validate GET requests as well as POST */
  readonly getRequestsProtected: boolean

  /** Directory attack logs are written to */
  readonly logDirectory: string

  /** Action codes applied on failed validation */
  readonly failedAuthAction: Readonly<FailedAuthActionMap>

  /** Target of the redirect action */
  readonly errorRedirectionPage: string

  /** Body of the custom-message action */
  readonly customErrorMessage: string

  /** URL of the client-side script injected into HTML pages */
  readonly jsResourceUrl: string

  /** Token length in characters (1-128) */
  readonly tokenLength: number

  /** Notice shown to clients with JavaScript disabled */
  readonly disabledJsMessage: string
}

/**
 * Configuration as written in the config file or passed inline
 */
export interface ProtectorConfigInput {
  getRequestsProtected?: boolean
  logDirectory: string
  failedAuthAction?: number | Partial<FailedAuthActionMap>
  errorRedirectionPage?: string
  customErrorMessage?: string
  jsResourceUrl: string
  tokenLength?: number | string
  disabledJsMessage?: string
}

export interface CSRFCookieOptions {
  path?: string
  domain?: string
  secure?: boolean
  sameSite?: 'strict' | 'lax' | 'none'
}

/**
 * Options accepted by the initialization entry point
 */
export interface CSRFProtectorOptions {
  /** Inline configuration or path to a JSON config file */
  config?: ProtectorConfigInput | string

  /** Enable GET validation for this protector (only `true` overrides) */
  getRequestsProtected?: boolean

  /** Override the configured token length */
  tokenLength?: number

  /** Override the failure action for both GET and POST */
  failedAuthAction?: number

  /** Token cookie lifetime (default: '5m') */
  cookieExpiry?: Duration

  /** Cookie attributes */
  cookie?: CSRFCookieOptions

  /** Attack log sink (default: monthly files under `logDirectory`) */
  sink?: AttackLogSink

  /** Token generator (default: SHA-512 derived) */
  generateToken?: TokenGenerator

  /** Called when the protector itself fails (bad config, log sink down) */
  onError?: (error: ProtectorError, req: NextRequest) => Response | Promise<Response>
}

/**
 * Produces a token of the requested length
 */
export type TokenGenerator = (length: number) => string

/**
 * Everything the authorizer needs to know about one request
 */
export interface RequestContext {
  method: string
  requestType: RequestType
  submittedToken?: string
  cookieToken?: string
  host: string
  requestUri: string
  /** Query parameters (GET) or parsed body (POST) */
  params: Record<string, unknown>
  cookies: Record<string, string>
}

export type DenialReason = 'missing_token' | 'missing_cookie' | 'token_mismatch'

export type Verdict =
  | { allowed: true }
  | { allowed: false; reason: DenialReason }

/**
 * Signal returned by the failure dispatcher to the host layer
 */
export type FailureOutcome =
  | { kind: 'terminate'; code: number; response: Response }
  | { kind: 'continue'; code: number; stripped: RequestType }

export type AuthorizationResult =
  | { verdict: 'allowed' }
  | { verdict: 'denied'; reason: DenialReason; outcome: FailureOutcome }
