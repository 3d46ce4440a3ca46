/**
 * Core types for next-csrf-protector
 */

import type { NextRequest } from 'next/server'

/**
 * Route handler as exported from a Next.js App Router `route.ts`
 */
export type RouteHandler = (req: NextRequest) => Response | Promise<Response>

/**
 * Duration string format (e.g., '5m', '1h', '300s') or number in milliseconds
 */
export type Duration = `${number}${'s' | 'm' | 'h' | 'd'}` | number

/**
 * Request type tag: POST for POST requests, GET for everything else
 */
export type RequestType = 'GET' | 'POST'
