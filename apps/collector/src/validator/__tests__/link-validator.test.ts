import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { LinkValidator } from '../link-validator'

const TRUSTED = ['github.com', 'dev.to', 'news.ycombinator.com']

function abortable(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () =>
      reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }))
    )
  })
}

describe('LinkValidator', () => {
  const fetchMock = vi.fn<typeof fetch>()

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  function validator(lenient = true, timeoutMs = 1000) {
    return new LinkValidator({ trustedDomains: TRUSTED, timeoutMs, lenient })
  }

  describe('isTrustedHost', () => {
    it('matches exact, www and subdomain hosts', () => {
      const v = validator()
      expect(v.isTrustedHost('github.com')).toBe(true)
      expect(v.isTrustedHost('www.github.com')).toBe(true)
      expect(v.isTrustedHost('gist.github.com')).toBe(true)
      expect(v.isTrustedHost('GitHub.com')).toBe(true)
    })

    it('does not match lookalike hosts', () => {
      const v = validator()
      expect(v.isTrustedHost('notgithub.com')).toBe(false)
      expect(v.isTrustedHost('github.com.example.org')).toBe(false)
      expect(v.isTrustedHost('ycombinator.com')).toBe(false)
    })
  })

  it('accepts trusted domains without a request', async () => {
    const v = validator(false)

    expect(await v.check('https://github.com/microsoft/TypeScript')).toBe('trusted')
    expect(await v.isAcceptable('https://news.ycombinator.com/item?id=1')).toBe(true)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('accepts a reachable URL', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 200 }))

    expect(await validator().check('https://example.com/post')).toBe('reachable')
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(fetchMock.mock.calls[0][0]).toBe('https://example.com/post')
    expect(fetchMock.mock.calls[0][1]?.method).toBe('HEAD')
  })

  it('rejects an error status', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 404 }))

    expect(await validator().isAcceptable('https://example.com/missing')).toBe(false)
  })

  it('retries with GET when HEAD is not allowed', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(null, { status: 405 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }))

    expect(await validator().check('https://example.com/post')).toBe('reachable')
    expect(fetchMock.mock.calls.map((call) => call[1]?.method)).toEqual(['HEAD', 'GET'])
  })

  it('accepts a timeout when lenient', async () => {
    fetchMock.mockImplementationOnce(abortable)

    const v = validator(true, 20)
    expect(await v.check('https://slow.example.com/')).toBe('timeout_lenient')
  })

  it('rejects a timeout when strict', async () => {
    fetchMock.mockImplementation(abortable)

    const v = validator(false, 20)
    expect(await v.check('https://slow.example.com/')).toBe('timeout_strict')
    expect(await v.isAcceptable('https://slow.example.com/')).toBe(false)
  })

  it('maps network errors through the lenient policy', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'))

    expect(await validator(true).check('https://down.example.com/')).toBe('error_lenient')
    expect(await validator(true).isAcceptable('https://down.example.com/')).toBe(true)
    expect(await validator(false).check('https://down.example.com/')).toBe('error_strict')
  })

  it('reports unparseable and non-http URLs as invalid', async () => {
    const v = validator()

    expect(await v.check('not a url')).toBe('invalid')
    expect(await v.check('ftp://files.example.com/a')).toBe('invalid')
    expect(await v.isAcceptable('not a url')).toBe(false)
    expect(fetchMock).not.toHaveBeenCalled()
  })
})
