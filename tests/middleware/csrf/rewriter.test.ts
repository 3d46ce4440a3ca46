import { describe, it, expect } from 'vitest'
import {
  HtmlRewriter,
  createHtmlRewriteStream,
  rewriteHtmlResponse,
  isRewritableResponse,
  buildScriptTag,
} from '../../../src/middleware/csrf/rewriter'

const SCRIPT = '<script type="text/javascript" src="/x.js"></script>'
const NOSCRIPT = '<noscript>M</noscript>'

function createRewriter(): HtmlRewriter {
  return new HtmlRewriter({ jsResourceUrl: '/x.js', disabledJsMessage: 'M' })
}

async function runStream(chunks: string[], rewriter: HtmlRewriter): Promise<string> {
  const source = new ReadableStream<string>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(chunk)
      controller.close()
    },
  })

  const reader = source.pipeThrough(createHtmlRewriteStream(rewriter)).getReader()
  let output = ''
  for (;;) {
    const { done, value } = await reader.read()
    if (done) break
    output += value
  }
  return output
}

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1
}

describe('HtmlRewriter', () => {
  it('returns non-HTML buffers unchanged', () => {
    const rewriter = createRewriter()
    const json = '{"body":"<body>","end":"</body>"}'

    expect(rewriter.rewrite(json)).toBe(json)
    expect(rewriter.htmlDetected).toBe(false)
  })

  it('injects the notice after <body> and the script before </body>', () => {
    const rewriter = createRewriter()

    expect(rewriter.rewrite('<html><body>hi</body></html>')).toBe(
      `<html><body>${NOSCRIPT}hi${SCRIPT}</body></html>`
    )
  })

  it('injects once even when invoked twice on the same buffer', () => {
    const rewriter = createRewriter()

    const first = rewriter.rewrite('<html><body>hi</body></html>')
    const second = rewriter.rewrite(first)

    expect(second).toBe(first)
    expect(count(second, NOSCRIPT)).toBe(1)
    expect(count(second, SCRIPT)).toBe(1)
  })

  it('appends the script when there is no closing body tag', () => {
    const rewriter = createRewriter()

    const output = rewriter.rewrite('<html><body>hi')

    expect(output).toBe(`<html><body>${NOSCRIPT}hi${SCRIPT}`)
    expect(count(output, SCRIPT)).toBe(1)
  })

  it('matches tags case-insensitively and keeps body attributes', () => {
    const rewriter = createRewriter()

    expect(rewriter.rewrite('<HTML><BODY class="page" onload="init()">x</BODY></HTML>')).toBe(
      `<HTML><BODY class="page" onload="init()">${NOSCRIPT}x${SCRIPT}</BODY></HTML>`
    )
  })

  it('does not treat <bodyguard> as a body tag', () => {
    const rewriter = createRewriter()

    expect(rewriter.rewrite('<html><bodyguard>x</bodyguard>', { final: false })).toBe(
      '<html><bodyguard>x</bodyguard>'
    )
  })

  it('waits for <html before rewriting later buffers', () => {
    const rewriter = createRewriter()

    expect(rewriter.rewrite('<!DOCTYPE html>\n', { final: false })).toBe('<!DOCTYPE html>\n')
    expect(rewriter.rewrite('<html><body>', { final: false })).toBe(`<html><body>${NOSCRIPT}`)
    expect(rewriter.rewrite('hi</body></html>', { final: false })).toBe(`hi${SCRIPT}</body></html>`)
    expect(rewriter.done).toBe(true)
    expect(rewriter.rewrite('<body></body>')).toBe('<body></body>')
  })

  it('defers the appended script until the final buffer', () => {
    const rewriter = createRewriter()

    expect(rewriter.rewrite('<html><body>a', { final: false })).toBe(`<html><body>${NOSCRIPT}a`)
    expect(rewriter.rewrite('b', { final: false })).toBe('b')
    expect(rewriter.rewrite('')).toBe(SCRIPT)
  })

  it('inserts the message as HTML and escapes the script URL', () => {
    const rewriter = new HtmlRewriter({
      jsResourceUrl: '/x.js?v=1&t="2"',
      disabledJsMessage: 'Enable <b>JavaScript</b>',
    })

    expect(rewriter.rewrite('<html><body></body></html>')).toBe(
      '<html><body><noscript>Enable <b>JavaScript</b></noscript>' +
      '<script type="text/javascript" src="/x.js?v=1&amp;t=&quot;2&quot;"></script></body></html>'
    )
  })

  it('keeps state per instance', () => {
    const a = createRewriter()
    const b = createRewriter()

    a.rewrite('<html><body></body></html>')

    expect(b.htmlDetected).toBe(false)
    expect(b.rewrite('plain text')).toBe('plain text')
  })
})

describe('buildScriptTag', () => {
  it('builds the include tag', () => {
    expect(buildScriptTag('/x.js')).toBe(SCRIPT)
  })
})

describe('createHtmlRewriteStream', () => {
  it('finds markers split across chunks', async () => {
    const output = await runStream(['<html><bo', 'dy>hi</bo', 'dy></html>'], createRewriter())

    expect(output).toBe(`<html><body>${NOSCRIPT}hi${SCRIPT}</body></html>`)
  })

  it('finds <html split across chunks', async () => {
    const output = await runStream(['<!DOCTYPE html><ht', 'ml><body>x</body></html>'], createRewriter())

    expect(output).toBe(`<!DOCTYPE html><html><body>${NOSCRIPT}x${SCRIPT}</body></html>`)
  })

  it('appends the script at end of stream without </body>', async () => {
    const output = await runStream(['<html><body>', 'hi'], createRewriter())

    expect(output).toBe(`<html><body>${NOSCRIPT}hi${SCRIPT}`)
  })

  it('passes non-HTML streams through unchanged', async () => {
    const output = await runStream(['{"a":', '1, "b": "<"', '}'], createRewriter())

    expect(output).toBe('{"a":1, "b": "<"}')
  })

  it('injects each block once over many chunks', async () => {
    const chunks = ['<html>', '<body>', '<p>1</p>', '</body>', '</html>', '<body></body>']
    const output = await runStream(chunks, createRewriter())

    expect(count(output, NOSCRIPT)).toBe(1)
    expect(count(output, SCRIPT)).toBe(1)
    expect(output).toBe(`<html><body>${NOSCRIPT}<p>1</p>${SCRIPT}</body></html><body></body>`)
  })
})

describe('rewriteHtmlResponse', () => {
  it('rewrites HTML responses and drops Content-Length', async () => {
    const html = '<html><body>hi</body></html>'
    const response = new Response(html, {
      status: 201,
      headers: { 'Content-Type': 'text/html; charset=utf-8', 'Content-Length': String(html.length) },
    })

    const rewritten = rewriteHtmlResponse(response, createRewriter())

    expect(rewritten.status).toBe(201)
    expect(rewritten.headers.get('content-length')).toBeNull()
    expect(await rewritten.text()).toBe(`<html><body>${NOSCRIPT}hi${SCRIPT}</body></html>`)
  })

  it('leaves JSON responses untouched', async () => {
    const body = JSON.stringify({ html: '<html><body></body></html>' })
    const response = new Response(body, { headers: { 'Content-Type': 'application/json' } })

    const rewritten = rewriteHtmlResponse(response, createRewriter())

    expect(await rewritten.text()).toBe(body)
  })

  it('handles responses without a body', async () => {
    const response = new Response(null, { status: 302, headers: { Location: '/' } })

    const rewritten = rewriteHtmlResponse(response, createRewriter())

    expect(rewritten.status).toBe(302)
    expect(rewritten.headers.get('location')).toBe('/')
  })
})

describe('isRewritableResponse', () => {
  it('accepts UTF-8 HTML and XHTML', () => {
    expect(isRewritableResponse(new Response('x', { headers: { 'Content-Type': 'text/html' } }))).toBe(true)
    expect(isRewritableResponse(new Response('x', { headers: { 'Content-Type': 'text/html; charset=UTF-8' } }))).toBe(true)
    expect(isRewritableResponse(new Response('x', { headers: { 'Content-Type': 'application/xhtml+xml' } }))).toBe(true)
  })

  it('rejects untyped, non-HTML and empty responses', () => {
    expect(isRewritableResponse(new Response(new Uint8Array([1, 2, 3])))).toBe(false)
    expect(isRewritableResponse(new Response('x', { headers: { 'Content-Type': 'text/plain' } }))).toBe(false)
    expect(isRewritableResponse(new Response('x', { headers: { 'Content-Type': 'image/png' } }))).toBe(false)
    expect(isRewritableResponse(new Response(null))).toBe(false)
  })

  it('rejects other charsets and encoded bodies', () => {
    expect(
      isRewritableResponse(new Response('x', { headers: { 'Content-Type': 'text/html; charset=iso-8859-1' } }))
    ).toBe(false)
    expect(
      isRewritableResponse(
        new Response('x', { headers: { 'Content-Type': 'text/html', 'Content-Encoding': 'gzip' } })
      )
    ).toBe(false)
  })
})

describe('rewriteHtmlResponse byte handling', () => {
  async function bytesOf(response: Response): Promise<number[]> {
    return Array.from(new Uint8Array(await response.arrayBuffer()))
  }

  it('passes untyped binary bodies through byte for byte', async () => {
    const bytes = [0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x00, 0x80]

    const rewritten = rewriteHtmlResponse(new Response(new Uint8Array(bytes)), createRewriter())

    expect(await bytesOf(rewritten)).toEqual(bytes)
  })

  it('passes latin-1 text through byte for byte', async () => {
    const bytes = [0x63, 0x61, 0x66, 0xe9]
    const response = new Response(new Uint8Array(bytes), {
      headers: { 'Content-Type': 'text/plain; charset=iso-8859-1' },
    })

    expect(await bytesOf(rewriteHtmlResponse(response, createRewriter()))).toEqual(bytes)
  })

  it('keeps a UTF-8 BOM on rewritten HTML', async () => {
    const response = new Response(new Uint8Array([0xef, 0xbb, 0xbf, 0x61]), {
      headers: { 'Content-Type': 'text/html' },
    })

    expect(await bytesOf(rewriteHtmlResponse(response, createRewriter()))).toEqual([0xef, 0xbb, 0xbf, 0x61])
  })

  it('leaves gzip-encoded HTML untouched', async () => {
    const bytes = [0x1f, 0x8b, 0x08, 0x00, 0xff]
    const response = new Response(new Uint8Array(bytes), {
      headers: { 'Content-Type': 'text/html', 'Content-Encoding': 'gzip', 'Content-Length': '5' },
    })

    const rewritten = rewriteHtmlResponse(response, createRewriter())

    expect(rewritten.headers.get('content-length')).toBe('5')
    expect(await bytesOf(rewritten)).toEqual(bytes)
  })
})
