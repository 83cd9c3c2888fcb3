/**
 * RestAction - deferred REST request
 *
 * Building a RestAction performs no I/O. The request is sent when the caller
 * invokes `queue()` (callback style) or `complete()` (promise style). Every
 * execution settles its Request exactly once, with exactly one of success or
 * failure; the response handler decides which.
 *
 * @example
 * ```typescript
 * emote.delete().queue(
 *   (deleted) => logger.info(deleted ? 'deleted' : 'was already gone'),
 *   (error) => logger.error('delete failed', error)
 * )
 *
 * const deleted = await emote.delete().complete()
 * ```
 *
 * @module requests/rest-action
 */

import { ErrorResponseError, NetworkError, wrapError } from '../errors'
import { scopedLogger } from '../utils/logger'
import { safeCallback } from '../utils/safe-callback'
import { errorMessageFromJSON, errorResponseFromJSON } from './error-response'
import type { Requester } from './requester'
import { Response } from './response'
import { formatCompiledRoute, type CompiledRoute } from './route'

const log = scopedLogger('RestAction')

// =============================================================================
// Types
// =============================================================================

export type SuccessCallback<T> = (value: T) => void | Promise<void>
export type FailureCallback = (error: Error) => void | Promise<void>

/**
 * Classifies a response by settling the request with either a value or a
 * failure.
 */
export type ResponseHandler<T> = (response: Response, request: Request<T>) => void

/**
 * What a RestAction needs from the client that created it
 */
export interface RestContext {
  readonly requester: Requester
}

// =============================================================================
// Request
// =============================================================================

/**
 * One execution of a RestAction. Settles at most once; later attempts are
 * ignored and logged.
 */
export class Request<T> {
  readonly route: CompiledRoute
  private settled = false
  private readonly successCallback: SuccessCallback<T>
  private readonly failureCallback: FailureCallback

  constructor(route: CompiledRoute, onSuccess: SuccessCallback<T>, onFailure: FailureCallback) {
    this.route = route
    this.successCallback = onSuccess
    this.failureCallback = onFailure
  }

  get isSettled(): boolean {
    return this.settled
  }

  onSuccess(value: T): void {
    if (!this.settle('success')) return
    safeCallback(this.successCallback, this.callbackOptions(), value)
  }

  /**
   * Fail the request. A Response is turned into an ErrorResponseError
   * carrying the response and its decoded error code.
   */
  onFailure(reason: Response | Error): void {
    if (!this.settle('failure')) return
    const error = reason instanceof Response
      ? new ErrorResponseError(reason, errorResponseFromJSON(reason.body), errorMessageFromJSON(reason.body))
      : reason
    safeCallback(this.failureCallback, this.callbackOptions(), error)
  }

  private settle(outcome: 'success' | 'failure'): boolean {
    if (this.settled) {
      log.warn(`Ignoring ${outcome} for already settled request ${formatCompiledRoute(this.route)}`)
      return false
    }
    this.settled = true
    return true
  }

  private callbackOptions() {
    return {
      logPrefix: '[RestAction]',
      context: { route: formatCompiledRoute(this.route) },
    }
  }
}

// =============================================================================
// RestAction
// =============================================================================

const noopSuccess: SuccessCallback<unknown> = () => {}

const logFailure: FailureCallback = (error) => {
  log.error(`RestAction queue returned failure: [${error.name}] ${error.message}`, error)
}

export class RestAction<T> {
  readonly route: CompiledRoute
  private readonly context: RestContext
  private readonly handler: ResponseHandler<T>
  private readonly body: unknown

  constructor(context: RestContext, route: CompiledRoute, handler: ResponseHandler<T>, body?: unknown) {
    this.context = context
    this.route = route
    this.handler = handler
    this.body = body
  }

  /**
   * Submit the request. Exactly one of the callbacks runs, once.
   * Without a failure callback, failures are logged at error level.
   */
  queue(success?: SuccessCallback<T>, failure?: FailureCallback): void {
    const request = new Request<T>(this.route, success ?? noopSuccess, failure ?? logFailure)
    // execute() settles the request itself and never rejects
    void this.execute(request)
  }

  /**
   * Submit the request and wait for its outcome.
   */
  complete(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue(resolve, reject)
    })
  }

  toString(): string {
    return `RestAction(${formatCompiledRoute(this.route)})`
  }

  private async execute(request: Request<T>): Promise<void> {
    let response: Response
    try {
      response = await this.context.requester.execute(this.route, this.body)
    } catch (error) {
      request.onFailure(
        error instanceof Error
          ? error
          : new NetworkError(String(error), { method: this.route.method, path: this.route.path })
      )
      return
    }

    try {
      this.handler(response, request)
    } catch (error) {
      request.onFailure(wrapError(error, { route: formatCompiledRoute(this.route) }))
      return
    }

    if (!request.isSettled) {
      request.onFailure(wrapError(new Error(`Response handler did not settle ${formatCompiledRoute(this.route)}`)))
    }
  }
}

// =============================================================================
// Common handlers
// =============================================================================

/**
 * Succeed with `map(response)` on 2xx, fail with the response otherwise.
 */
export function okResponseHandler<T>(map: (response: Response) => T): ResponseHandler<T> {
  return (response, request) => {
    if (response.isOk) {
      request.onSuccess(map(response))
    } else {
      request.onFailure(response)
    }
  }
}
