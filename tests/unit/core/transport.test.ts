import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { AbortOperationError, ResponseDecodeError } from '../../../src/core/errors.ts'
import type { TInterceptor } from '../../../src/core/interceptors.ts'
import { failure } from '../../../src/core/result.ts'
import { USER_AGENT } from '../../../src/core/sdk-info.ts'
import { Transport } from '../../../src/core/transport.ts'
import type { TRequestDescription } from '../../../src/core/types.ts'
import { decodePost } from '../../../src/domains/posts/posts.codec.ts'
import { createFetchMock, TEST_CONFIG, type TFetchMock } from '../../helpers/index.ts'

const makeRequest = (overrides?: Partial<TRequestDescription>): TRequestDescription => ({
  method: 'GET',
  url: new URL(`${TEST_CONFIG.baseUrl}/posts/1`),
  headers: {},
  ...overrides,
})

describe('Transport', () => {
  let fetchMock: TFetchMock

  beforeEach(() => {
    fetchMock = createFetchMock()
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('successful responses', () => {
    it('decodes a 2xx body into a success result', async () => {
      fetchMock.pushJson({ userId: 1, id: 1, title: 'first', body: 'hello' })
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      const result = await transport.call(makeRequest(), decodePost)

      expect(result.kind).toBe('success')
      if (result.kind !== 'success') return
      expect(result.statusCode).toBe(200)
      expect(result.headers['content-type']).toBe('application/json')
      expect(result.body).toEqual({ userId: 1, id: 1, title: 'first', body: 'hello' })
    })

    it('treats 299 as success', async () => {
      fetchMock.pushJson({ userId: 1, id: 1, title: '', body: '' }, { status: 299 })
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      const result = await transport.call(makeRequest(), decodePost)

      expect(result.kind).toBe('success')
    })

    it('sends method, url, headers and body to fetch', async () => {
      fetchMock.pushJson({ userId: 1, id: 1, title: 't', body: 'b' }, { status: 201 })
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      await transport.call(
        makeRequest({
          method: 'POST',
          url: new URL(`${TEST_CONFIG.baseUrl}/posts`),
          headers: { 'content-type': 'application/json' },
          body: '{"userId":1}',
        }),
        decodePost,
      )

      expect(fetchMock.calls).toHaveLength(1)
      expect(fetchMock.calls[0]).toMatchObject({
        url: 'https://posts.test.local/posts',
        method: 'POST',
        headers: { 'user-agent': USER_AGENT, 'content-type': 'application/json' },
        body: '{"userId":1}',
      })
    })
  })

  describe('non-2xx responses', () => {
    it('yields a bodiless failure carrying the status code', async () => {
      fetchMock.pushStatus(404)
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      const result = await transport.call(makeRequest(), decodePost)

      expect(result).toEqual(failure(404))
    })

    it('does not decode the body of a failure', async () => {
      fetchMock.pushJson({ message: 'boom' }, { status: 500 })
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })
      const decode = vi.fn(decodePost)

      const result = await transport.call(makeRequest(), decode)

      expect(result.kind).toBe('failure')
      expect(decode).not.toHaveBeenCalled()
    })

    it('cancels the unread body of a failure', async () => {
      const response = new Response(JSON.stringify({ message: 'boom' }), { status: 500 })
      fetchMock.push(response)
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      const result = await transport.call(makeRequest(), decodePost)

      expect(result).toEqual(failure(500))
      expect(response.bodyUsed).toBe(true)
    })

    it('does not retry', async () => {
      fetchMock.pushStatus(503)
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      await transport.call(makeRequest(), decodePost)

      expect(fetchMock.calls).toHaveLength(1)
    })
  })

  describe('transport faults', () => {
    it('turns a rejected fetch into a transport-error result', async () => {
      const fault = new TypeError('fetch failed')
      fetchMock.push(fault)
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      const result = await transport.call(makeRequest(), decodePost)

      expect(result).toEqual({ kind: 'transport-error', cause: fault })
      expect(console.warn).toHaveBeenCalledWith(
        '[posts-api]',
        'Transport fault on GET /posts/1:',
        'fetch failed',
      )
    })

    it('lets execute propagate the fault unchanged', async () => {
      const fault = new TypeError('fetch failed')
      fetchMock.push(fault)
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      await expect(transport.execute(makeRequest())).rejects.toBe(fault)
    })

    it('reports an aborted call as AbortOperationError', async () => {
      const controller = new AbortController()
      controller.abort()
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      const result = await transport.call(makeRequest({ signal: controller.signal }), decodePost)

      expect(result.kind).toBe('transport-error')
      if (result.kind !== 'transport-error') return
      expect(result.cause).toBeInstanceOf(AbortOperationError)
    })

    it('reports malformed JSON as a decode fault', async () => {
      fetchMock.push(new Response('not json', { status: 200 }))
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      const result = await transport.call(makeRequest(), decodePost)

      expect(result.kind).toBe('transport-error')
      if (result.kind !== 'transport-error') return
      expect(result.cause).toBeInstanceOf(ResponseDecodeError)
      expect(result.cause.message).toMatch(/^Malformed JSON body: /)
    })

    it('reports a body of the wrong shape as a decode fault', async () => {
      fetchMock.pushJson({ userId: 1, id: 'one', title: 't', body: 'b' })
      const transport = new Transport({ fetchImplementation: fetchMock.fetch })

      const result = await transport.call(makeRequest(), decodePost)

      expect(result).toEqual({
        kind: 'transport-error',
        cause: new ResponseDecodeError('Post field "id" must be an integer'),
      })
    })
  })

  describe('interceptors', () => {
    it('runs interceptors before fetch, in registration order', async () => {
      fetchMock.pushJson({ userId: 1, id: 1, title: 't', body: 'b' })
      const order: string[] = []
      const stamp =
        (name: string): TInterceptor =>
        (request, next) => {
          order.push(name)
          return next({ ...request, headers: { ...request.headers, [`x-${name}`]: '1' } })
        }
      const transport = new Transport({
        fetchImplementation: fetchMock.fetch,
        interceptors: [stamp('outer'), stamp('inner')],
      })

      await transport.call(makeRequest(), decodePost)

      expect(order).toEqual(['outer', 'inner'])
      expect(fetchMock.calls[0].headers).toEqual({
        'user-agent': USER_AGENT,
        'x-outer': '1',
        'x-inner': '1',
      })
    })
  })
})
