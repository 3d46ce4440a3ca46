/**
 * Injects the protector's client script and a `<noscript>` notice into
 * outgoing HTML.
 */

const HTML_OPEN = /<html/i
const BODY_OPEN = /<body\b[^>]*>/i
const BODY_CLOSE = /<\/body>/i

/**
 * Longest trailing fragment held back between chunks while waiting for `>`
 */
const MAX_HELD_TAG = 256

export interface HtmlRewriterOptions {
  jsResourceUrl: string
  disabledJsMessage: string
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
}

export function buildScriptTag(jsResourceUrl: string): string {
  return `<script type="text/javascript" src="${escapeAttribute(jsResourceUrl)}"></script>`
}

export function buildNoscriptBlock(message: string): string {
  return `<noscript>${message}</noscript>`
}

/**
 * Rewriter state for a single response.
 *
 * Nothing is touched until `<html` has been seen. After that the notice goes
 * right after the first `<body ...>` tag and the script right before the first
 * `</body>`, or at the end of the final buffer when there is none. Each is
 * injected at most once per instance, however many times `rewrite` runs.
 *
 * @example
 * ```typescript
 * const rewriter = new HtmlRewriter({ jsResourceUrl: '/x.js', disabledJsMessage: 'M' })
 * rewriter.rewrite('<html><body>hi</body></html>')
 * // '<html><body><noscript>M</noscript>hi<script type="text/javascript" src="/x.js"></script></body></html>'
 * ```
 */
export class HtmlRewriter {
  private readonly script: string
  private readonly noscript: string
  private isValidHtml = false
  private noscriptInjected = false
  private scriptInjected = false

  constructor(options: HtmlRewriterOptions) {
    this.script = buildScriptTag(options.jsResourceUrl)
    this.noscript = buildNoscriptBlock(options.disabledJsMessage)
  }

  /**
   * True once the script has been injected; later buffers pass through
   */
  get done(): boolean {
    return this.scriptInjected
  }

  get htmlDetected(): boolean {
    return this.isValidHtml
  }

  /**
   * Rewrite one buffer of output.
   *
   * Pass `final: false` for buffers that more output will follow; the script is
   * then only appended when a later final buffer still has no `</body>`.
   */
  rewrite(buffer: string, options: { final?: boolean } = {}): string {
    const { final = true } = options

    if (!this.isValidHtml) {
      if (!HTML_OPEN.test(buffer)) {
        return buffer
      }
      this.isValidHtml = true
    }

    let output = buffer

    if (!this.noscriptInjected && !this.scriptInjected) {
      const match = BODY_OPEN.exec(output)
      if (match) {
        const end = match.index + match[0].length
        output = output.slice(0, end) + this.noscript + output.slice(end)
        this.noscriptInjected = true
      }
    }

    if (!this.scriptInjected) {
      const match = BODY_CLOSE.exec(output)
      if (match) {
        output = output.slice(0, match.index) + this.script + output.slice(match.index)
        this.scriptInjected = true
      } else if (final) {
        output += this.script
        this.scriptInjected = true
      }
    }

    return output
  }
}

/**
 * Split off a trailing unterminated tag so markers cut across chunks are
 * matched once the rest arrives
 */
function splitHeldTag(text: string): [string, string] {
  const lastOpen = text.lastIndexOf('<')
  if (lastOpen === -1 || text.indexOf('>', lastOpen) !== -1) {
    return [text, '']
  }
  if (text.length - lastOpen > MAX_HELD_TAG) {
    return [text, '']
  }
  return [text.slice(0, lastOpen), text.slice(lastOpen)]
}

/**
 * Stream adapter: rewrites decoded text chunks with one rewriter
 */
export function createHtmlRewriteStream(rewriter: HtmlRewriter): TransformStream<string, string> {
  let held = ''

  return new TransformStream<string, string>({
    transform(chunk, controller) {
      const text = held + chunk
      held = ''

      if (rewriter.done) {
        controller.enqueue(text)
        return
      }

      const [ready, rest] = splitHeldTag(text)
      held = rest

      const output = rewriter.rewrite(ready, { final: false })
      if (output) controller.enqueue(output)
    },

    flush(controller) {
      const output = rewriter.done ? held : rewriter.rewrite(held, { final: true })
      if (output) controller.enqueue(output)
    },
  })
}

const HTML_TYPES = ['text/html', 'application/xhtml+xml']

/**
 * Whether a response body is UTF-8 HTML the rewriter may look at.
 * Encoded, untyped and non-UTF-8 bodies are never decoded.
 */
export function isRewritableResponse(response: Response): boolean {
  if (!response.body) return false

  const encoding = (response.headers.get('content-encoding') || '').trim().toLowerCase()
  if (encoding && encoding !== 'identity') return false

  const [mediaType, ...params] = (response.headers.get('content-type') || '')
    .toLowerCase()
    .split(';')
    .map(part => part.trim())
  if (!HTML_TYPES.includes(mediaType)) return false

  const charset = params.find(param => param.startsWith('charset='))
  if (!charset) return true

  const value = charset.slice('charset='.length).replace(/"/g, '')
  return value === 'utf-8' || value === 'utf8'
}

/**
 * Response whose body is streamed through the rewriter.
 * Other bodies are returned as a copy with the same headers and bytes.
 */
export function rewriteHtmlResponse(response: Response, rewriter: HtmlRewriter): Response {
  const headers = new Headers(response.headers)
  const init = { status: response.status, statusText: response.statusText, headers }

  if (!response.body || !isRewritableResponse(response)) {
    return new Response(response.body, init)
  }

  headers.delete('content-length')

  // ignoreBOM keeps a leading BOM in the decoded text so it is re-encoded
  const body = response.body
    .pipeThrough(new TextDecoderStream('utf-8', { ignoreBOM: true }))
    .pipeThrough(createHtmlRewriteStream(rewriter))
    .pipeThrough(new TextEncoderStream())

  return new Response(body, init)
}
