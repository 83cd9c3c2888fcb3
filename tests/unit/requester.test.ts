/**
 * FetchRequester Tests
 *
 * fetch is injected, so nothing leaves the process.
 */

import { describe, it, expect, vi } from 'vitest'
import { NetworkError } from '../../src/errors'
import { FetchRequester } from '../../src/requests/requester'
import { Route } from '../../src/requests/route'

type FetchArgs = Parameters<typeof fetch>

function fakeFetch(reply: () => Promise<globalThis.Response>) {
  return vi.fn<FetchArgs, Promise<globalThis.Response>>(() => reply())
}

function callAt(fetchMock: ReturnType<typeof fakeFetch>, index: number): FetchArgs {
  const call = fetchMock.mock.calls[index]
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} times`)
  }
  return call
}

const DELETE_ROUTE = Route.Emotes.DELETE_EMOTE.compile('3000', '4000')
const MODIFY_ROUTE = Route.Emotes.MODIFY_EMOTE.compile('3000', '4000')

describe('FetchRequester', () => {
  it('should send method, headers and JSON body to the route URL', async () => {
    const fetchMock = fakeFetch(async () =>
      new globalThis.Response('{"id":"4000","name":"party_parrot"}', {
        status: 200,
        headers: { 'content-type': 'application/json' },
      })
    )
    const requester = new FetchRequester({
      baseUrl: 'https://api.test/v10/',
      headers: { Authorization: 'Bot test-token' },
      fetch: fetchMock,
    })

    const response = await requester.execute(MODIFY_ROUTE, { name: 'party_parrot' })

    expect(response.code).toBe(200)
    expect(response.body).toEqual({ id: '4000', name: 'party_parrot' })
    expect(response.headers['content-type']).toBe('application/json')

    expect(fetchMock).toHaveBeenCalledTimes(1)
    const [url, init] = callAt(fetchMock, 0)
    expect(url).toBe('https://api.test/v10/guilds/3000/emojis/4000')
    expect(init?.method).toBe('PATCH')
    expect(init?.headers).toEqual({ Authorization: 'Bot test-token', 'Content-Type': 'application/json' })
    expect(init?.body).toBe('{"name":"party_parrot"}')
  })

  it('should omit body and content type when there is no body', async () => {
    const fetchMock = fakeFetch(async () => new globalThis.Response(null, { status: 204 }))
    const requester = new FetchRequester({ baseUrl: 'https://api.test/v10', fetch: fetchMock })

    const response = await requester.execute(DELETE_ROUTE)

    expect(response.code).toBe(204)
    expect(response.body).toBeUndefined()
    const [, init] = callAt(fetchMock, 0)
    expect(init?.method).toBe('DELETE')
    expect(init?.headers).toEqual({})
    expect(init?.body).toBeUndefined()
  })

  it('should resolve error statuses with the decoded body', async () => {
    const fetchMock = fakeFetch(async () =>
      new globalThis.Response('{"code":10014,"message":"Unknown Emoji"}', { status: 404 })
    )
    const requester = new FetchRequester({ baseUrl: 'https://api.test/v10', fetch: fetchMock })

    const response = await requester.execute(DELETE_ROUTE)

    expect(response.code).toBe(404)
    expect(response.isOk).toBe(false)
    expect(response.body).toEqual({ code: 10014, message: 'Unknown Emoji' })
  })

  it('should surface non-JSON bodies as text', async () => {
    const fetchMock = fakeFetch(async () => new globalThis.Response('Bad Gateway', { status: 502 }))
    const requester = new FetchRequester({ baseUrl: 'https://api.test/v10', fetch: fetchMock })

    const response = await requester.execute(DELETE_ROUTE)

    expect(response.code).toBe(502)
    expect(response.body).toBe('Bad Gateway')
  })

  it('should reject with a NetworkError when fetch fails', async () => {
    const cause = new Error('connect ECONNREFUSED')
    const fetchMock = fakeFetch(async () => {
      throw cause
    })
    const requester = new FetchRequester({ baseUrl: 'https://api.test/v10', fetch: fetchMock })

    const error = await requester.execute(DELETE_ROUTE).then(
      () => undefined,
      (e: unknown) => e
    )

    expect(error).toBeInstanceOf(NetworkError)
    if (error instanceof NetworkError) {
      expect(error.message).toBe('Request DELETE guilds/3000/emojis/4000 failed: connect ECONNREFUSED')
      expect(error.cause).toBe(cause)
      expect(error.context).toEqual({ method: 'DELETE', path: 'guilds/3000/emojis/4000' })
    }
  })
})
