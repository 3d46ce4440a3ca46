import { NextRequest } from 'next/server'
import type { RequestType } from '../../core/types'
import { TOKEN_FIELD_NAME } from './types'
import type { RequestContext } from './types'

export function getRequestType(method: string): RequestType {
  return method.toUpperCase() === 'POST' ? 'POST' : 'GET'
}

/**
 * Parse the request body without consuming it
 */
async function readBodyParams(req: NextRequest): Promise<Record<string, unknown>> {
  const contentType = req.headers.get('content-type') || ''

  try {
    if (contentType.includes('application/x-www-form-urlencoded')) {
      const text = await req.clone().text()
      return Object.fromEntries(new URLSearchParams(text))
    }

    if (contentType.includes('multipart/form-data')) {
      const formData = await req.clone().formData()
      const obj: Record<string, unknown> = {}
      formData.forEach((value, key) => {
        // Files are not logged, only their field names
        obj[key] = typeof value === 'string' ? value : '[file]'
      })
      return obj
    }

    if (contentType.includes('application/json')) {
      const body: unknown = await req.clone().json()
      if (body && typeof body === 'object' && !Array.isArray(body)) {
        return Object.fromEntries(Object.entries(body))
      }
    }
  } catch {
    // unreadable body: no submitted token
    return {}
  }

  return {}
}

function readQueryParams(req: NextRequest): Record<string, unknown> {
  return Object.fromEntries(req.nextUrl.searchParams)
}

function readCookies(req: NextRequest): Record<string, string> {
  const cookies: Record<string, string> = {}
  for (const cookie of req.cookies.getAll()) {
    cookies[cookie.name] = cookie.value
  }
  return cookies
}

/**
 * Build the per-request context the authorizer works on
 */
export async function buildRequestContext(
  req: NextRequest,
  cookieToken: string | undefined
): Promise<RequestContext> {
  const requestType = getRequestType(req.method)
  const params = requestType === 'POST' ? await readBodyParams(req) : readQueryParams(req)
  const submitted = params[TOKEN_FIELD_NAME]

  return {
    method: req.method.toUpperCase(),
    requestType,
    submittedToken: typeof submitted === 'string' ? submitted : undefined,
    cookieToken,
    host: req.headers.get('host') || req.nextUrl.host,
    requestUri: req.nextUrl.pathname + req.nextUrl.search,
    params,
    cookies: readCookies(req),
  }
}

/**
 * Copy of the request without its query string (GET) or body (POST)
 */
export function stripRequestParams(req: NextRequest, requestType: RequestType): NextRequest {
  const url = new URL(req.url)
  const headers = new Headers(req.headers)

  if (requestType === 'GET') {
    url.search = ''
  } else {
    headers.delete('content-type')
    headers.delete('content-length')
  }

  return new NextRequest(url, {
    method: req.method,
    headers,
  })
}
