/**
 * RestAction Tests
 *
 * Deferred execution and exactly-once settlement of requests.
 */

import { describe, it, expect, vi } from 'vitest'
import { ErrorResponseError, SnowcordError } from '../../src/errors'
import { okResponseHandler, Request, RestAction, type ResponseHandler } from '../../src/requests/rest-action'
import { Response } from '../../src/requests/response'
import { Route } from '../../src/requests/route'
import { setLogger } from '../../src/utils/logger'
import { createCapturingLogger } from '../mocks/logger'
import { MockRequester } from '../mocks/requester'

const ROUTE = Route.Emotes.GET_EMOTE.compile('3000', '4000')

function action<T>(handler: ResponseHandler<T>, body?: unknown) {
  const requester = new MockRequester()
  return { requester, action: new RestAction({ requester }, ROUTE, handler, body) }
}

describe('RestAction', () => {
  it('should not send anything until queued', () => {
    const { requester } = action(okResponseHandler(() => 'ok'))

    expect(requester.execute).not.toHaveBeenCalled()
  })

  it('should pass route and body to the requester', async () => {
    const { requester, action: restAction } = action(okResponseHandler(() => undefined), { name: 'x' })

    await restAction.complete()

    expect(requester.execute).toHaveBeenCalledWith(ROUTE, { name: 'x' })
  })

  it('should resolve with the mapped response', async () => {
    const { requester, action: restAction } = action(okResponseHandler((response) => response.body))
    requester.reply(new Response(200, { id: '4000' }))

    await expect(restAction.complete()).resolves.toEqual({ id: '4000' })
  })

  it('should fail with an ErrorResponseError for non-2xx', async () => {
    const { requester, action: restAction } = action(okResponseHandler(() => 'ok'))
    requester.reply(new Response(500))

    await expect(restAction.complete()).rejects.toBeInstanceOf(ErrorResponseError)
  })

  it('should fail when the handler throws', async () => {
    const { action: restAction } = action<string>(() => {
      throw new Error('cannot decode')
    })

    const error = await restAction.complete().then(
      () => undefined,
      (e: unknown) => e
    )

    expect(error).toBeInstanceOf(SnowcordError)
    expect(error).toMatchObject({ message: 'cannot decode', context: { route: 'GET guilds/3000/emojis/4000' } })
  })

  it('should fail when the handler settles nothing', async () => {
    const { action: restAction } = action<string>(() => {})

    await expect(restAction.complete()).rejects.toThrow(
      'Response handler did not settle GET guilds/3000/emojis/4000'
    )
  })

  it('should ignore and log a second settlement', async () => {
    const log = createCapturingLogger()
    setLogger(log)
    const success = vi.fn()
    const failure = vi.fn()
    const { action: restAction } = action<string>((response, request) => {
      request.onSuccess('first')
      request.onSuccess('second')
      request.onFailure(response)
    })

    restAction.queue(success, failure)

    await vi.waitFor(() => expect(success).toHaveBeenCalledTimes(1))
    expect(success).toHaveBeenCalledWith('first')
    expect(failure).not.toHaveBeenCalled()
    expect(log.at('warn')).toEqual([
      '[RestAction] Ignoring success for already settled request GET guilds/3000/emojis/4000',
      '[RestAction] Ignoring failure for already settled request GET guilds/3000/emojis/4000',
    ])
  })

  it('should log a rejecting async callback', async () => {
    const log = createCapturingLogger()
    setLogger(log)
    const { action: restAction } = action(okResponseHandler(() => 'ok'))

    restAction.queue(async () => {
      throw new Error('async boom')
    })

    await vi.waitFor(() => expect(log.at('error')).toHaveLength(1))
    expect(log.at('error')[0]).toBe(
      '[RestAction] Callback error (context: route=GET guilds/3000/emojis/4000): async boom'
    )
  })

  it('should describe itself by route', () => {
    const { action: restAction } = action(okResponseHandler(() => 'ok'))

    expect(restAction.toString()).toBe('RestAction(GET guilds/3000/emojis/4000)')
  })
})

describe('Request', () => {
  it('should report settlement', () => {
    const request = new Request<number>(ROUTE, () => {}, () => {})

    expect(request.isSettled).toBe(false)
    request.onSuccess(1)
    expect(request.isSettled).toBe(true)
  })

  it('should decode the error body of a failed response', () => {
    const failure = vi.fn()
    const request = new Request<number>(ROUTE, () => {}, failure)

    request.onFailure(new Response(404, { code: 10014, message: 'Unknown Emoji' }))

    const error: unknown = failure.mock.calls[0]?.[0]
    expect(error).toBeInstanceOf(ErrorResponseError)
    if (error instanceof ErrorResponseError) {
      expect(error.errorResponse?.code).toBe(10014)
      expect(error.status).toBe(404)
    }
  })

  it('should describe an unknown error code by the body message', () => {
    const failure = vi.fn()
    const request = new Request<number>(ROUTE, () => {}, failure)

    request.onFailure(new Response(500, { code: 0, message: 'Internal Server Error' }))

    const error: unknown = failure.mock.calls[0]?.[0]
    expect(error).toBeInstanceOf(ErrorResponseError)
    if (error instanceof ErrorResponseError) {
      expect(error.errorResponse).toBeUndefined()
      expect(error.message).toBe('HTTP 500 Internal Server Error')
    }
  })
})
