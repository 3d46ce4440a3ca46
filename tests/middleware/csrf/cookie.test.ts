import { describe, it, expect } from 'vitest'
import { NextRequest } from 'next/server'
import { ResponseCookieJar, buildCookieString } from '../../../src/middleware/csrf/cookie'

const EXPIRES = new Date(Date.UTC(2026, 0, 1, 0, 5, 0))
const NOW = Date.UTC(2026, 0, 1, 0, 0, 0)

describe('buildCookieString', () => {
  it('writes the default attributes', () => {
    expect(buildCookieString('CSRF_AUTH_TOKEN', 'abc', EXPIRES, { path: '/', sameSite: 'lax' }, NOW)).toBe(
      'CSRF_AUTH_TOKEN=abc; Path=/; Expires=Thu, 01 Jan 2026 00:05:00 GMT; Max-Age=300; SameSite=lax'
    )
  })

  it('adds domain and secure', () => {
    expect(
      buildCookieString('CSRF_AUTH_TOKEN', 'abc', EXPIRES, { domain: 'example.com', secure: true }, NOW)
    ).toBe('CSRF_AUTH_TOKEN=abc; Domain=example.com; Expires=Thu, 01 Jan 2026 00:05:00 GMT; Max-Age=300; Secure')
  })

  it('never writes a negative Max-Age', () => {
    expect(buildCookieString('CSRF_AUTH_TOKEN', 'abc', EXPIRES, {}, NOW + 600_000)).toContain('; Max-Age=0')
  })
})

describe('ResponseCookieJar', () => {
  it('reads the incoming token', () => {
    const req = new NextRequest('http://localhost:3000/', {
      headers: { cookie: 'CSRF_AUTH_TOKEN=abc; other=1' },
    })

    expect(new ResponseCookieJar(req).get()).toBe('abc')
    expect(new ResponseCookieJar(new NextRequest('http://localhost:3000/')).get()).toBeUndefined()
  })

  it('collects nothing until a token is set', () => {
    const jar = new ResponseCookieJar(new NextRequest('http://localhost:3000/'))
    const headers = new Headers()

    jar.applyTo(headers)

    expect(jar.getSetCookieHeader()).toBeNull()
    expect(headers.get('set-cookie')).toBeNull()
  })

  it('applies the collected cookie to response headers', () => {
    const jar = new ResponseCookieJar(new NextRequest('http://localhost:3000/'), { secure: false })
    const headers = new Headers()

    jar.set('fresh', new Date(Date.now() + 300_000))
    jar.applyTo(headers)

    expect(jar.getSetCookieHeader()).toMatch(/^CSRF_AUTH_TOKEN=fresh; Path=\/; Expires=.+; SameSite=lax$/)
    expect(headers.get('set-cookie')).toBe(jar.getSetCookieHeader())
  })
})
