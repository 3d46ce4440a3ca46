import { LogSinkError } from '../../core/errors'
import { nowInSeconds } from '../../utils/time'
import type { AttackLogRecord, AttackLogSink } from '../audit/types'
import { FailedAuthAction } from './types'
import type { FailureOutcome, ProtectorConfig, RequestContext } from './types'

export const FORBIDDEN_BODY = '<h2>403 Access Forbidden by CSRFProtector!</h2>'
export const INTERNAL_ERROR_BODY = '<h2>500 Internal Server Error!</h2>'

function htmlResponse(body: string, status: number): Response {
  return new Response(body, {
    status,
    headers: { 'Content-Type': 'text/html; charset=utf-8' },
  })
}

/**
 * Build the attack record for a denied request
 */
export function createAttackRecord(ctx: RequestContext, timestamp: number = nowInSeconds()): AttackLogRecord {
  return {
    timestamp,
    host: ctx.host,
    request_uri: ctx.requestUri,
    request_type: ctx.requestType,
    query: { ...ctx.params },
    cookie: { ...ctx.cookies },
  }
}

/**
 * Logs a denied request, then applies the configured failure action.
 *
 * | Code | Outcome |
 * |------|---------|
 * | 0    | 403 Forbidden |
 * | 1    | parameters cleared, request continues |
 * | 2    | redirect to `errorRedirectionPage` |
 * | 3    | `customErrorMessage` as the body |
 * | 4    | 500 Internal Server Error |
 * | any other | same as 1 |
 */
export class FailureActionDispatcher {
  private readonly config: ProtectorConfig
  private readonly sink: AttackLogSink
  private readonly now: () => number

  /**
   * @param options.now - Record timestamp in Unix seconds (default: wall clock)
   */
  constructor(options: { config: ProtectorConfig; sink: AttackLogSink; now?: () => number }) {
    this.config = options.config
    this.sink = options.sink
    this.now = options.now ?? nowInSeconds
  }

  /**
   * Action code for a request type
   */
  actionFor(ctx: RequestContext): number {
    return this.config.failedAuthAction[ctx.requestType]
  }

  /**
   * @throws LogSinkError when the attack record cannot be written; no action runs
   */
  async dispatch(ctx: RequestContext): Promise<FailureOutcome> {
    try {
      await this.sink.write(createAttackRecord(ctx, this.now()))
    } catch (error) {
      if (error instanceof LogSinkError) throw error
      throw new LogSinkError('Unable to write to the log file', { cause: error })
    }

    const code = this.actionFor(ctx)

    switch (code) {
      case FailedAuthAction.Forbidden:
        return { kind: 'terminate', code, response: htmlResponse(FORBIDDEN_BODY, 403) }

      case FailedAuthAction.Redirect:
        return {
          kind: 'terminate',
          code,
          response: new Response(null, {
            status: 302,
            headers: { Location: this.config.errorRedirectionPage },
          }),
        }

      case FailedAuthAction.CustomMessage:
        return { kind: 'terminate', code, response: htmlResponse(this.config.customErrorMessage, 200) }

      case FailedAuthAction.InternalError:
        return { kind: 'terminate', code, response: htmlResponse(INTERNAL_ERROR_BODY, 500) }

      case FailedAuthAction.StripParams:
      default:
        ctx.params = {}
        ctx.submittedToken = undefined
        return { kind: 'continue', code, stripped: ctx.requestType }
    }
  }
}
