import { describe, it, expect } from 'vitest'
import {
  ProtectorError,
  CsrfError,
  ConfigurationError,
  LogSinkError,
  isProtectorError,
  toProtectorError,
} from '../../src/core/errors'

describe('ProtectorError', () => {
  it('defaults to 500', () => {
    const error = new ProtectorError('boom')
    expect(error.statusCode).toBe(500)
    expect(error.code).toBe('PROTECTOR_ERROR')
    expect(error.toJSON()).toEqual({ error: 'ProtectorError', message: 'boom', code: 'PROTECTOR_ERROR' })
  })

  it('builds a JSON response', async () => {
    const error = new ConfigurationError('Log Directory Not Found!', {
      details: { logDirectory: '/tmp/x' },
    })

    const res = error.toResponse({ 'X-Request-Id': 'r1' })

    expect(res.status).toBe(500)
    expect(res.headers.get('content-type')).toBe('application/json')
    expect(res.headers.get('x-request-id')).toBe('r1')
    expect(await res.json()).toEqual({
      error: 'ConfigurationError',
      message: 'Log Directory Not Found!',
      code: 'CONFIGURATION_ERROR',
      details: { logDirectory: '/tmp/x' },
    })
  })
})

describe('subclasses', () => {
  it('carry their status and code', () => {
    expect(new CsrfError()).toMatchObject({
      statusCode: 403,
      code: 'CSRF_TOKEN_INVALID',
      message: 'Invalid or missing CSRF token',
    })
    expect(new LogSinkError()).toMatchObject({
      statusCode: 500,
      code: 'LOG_SINK_UNAVAILABLE',
      message: 'Unable to write to the log file',
    })
  })

  it('keep the cause', () => {
    const cause = new Error('ENOENT')
    expect(new LogSinkError(undefined, { cause }).cause).toBe(cause)
  })
})

describe('toProtectorError', () => {
  it('passes protector errors through', () => {
    const error = new CsrfError()
    expect(toProtectorError(error)).toBe(error)
  })

  it('wraps other values', () => {
    const wrapped = toProtectorError(new TypeError('bad'))
    expect(isProtectorError(wrapped)).toBe(true)
    expect(wrapped.message).toBe('bad')
    expect(toProtectorError('oops').message).toBe('oops')
  })
})
