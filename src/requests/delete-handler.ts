/**
 * Delete response classification
 *
 * A delete has three outcomes, not two:
 * - 2xx: the entity was deleted
 * - 404 whose body names the entity as unknown: it was already gone, which
 *   is what the caller wanted, so this is a success too
 * - anything else: failure, with the raw response attached
 *
 * @module requests/delete-handler
 */

import { errorResponseFromJSON, type ErrorResponse } from './error-response'
import type { Response } from './response'
import type { ResponseHandler } from './rest-action'

export type DeleteOutcome =
  | { kind: 'deleted' }
  | { kind: 'already-gone' }
  | { kind: 'failed'; response: Response }

export function classifyDeleteResponse(response: Response, unknownEntity: ErrorResponse): DeleteOutcome {
  if (response.isOk) {
    return { kind: 'deleted' }
  }
  if (response.code === 404 && errorResponseFromJSON(response.body)?.code === unknownEntity.code) {
    return { kind: 'already-gone' }
  }
  return { kind: 'failed', response }
}

/**
 * Handler resolving true when deleted, false when already gone, and failing
 * with the response otherwise.
 */
export function deleteResponseHandler(unknownEntity: ErrorResponse): ResponseHandler<boolean> {
  return (response, request) => {
    const outcome = classifyDeleteResponse(response, unknownEntity)
    switch (outcome.kind) {
      case 'deleted':
        request.onSuccess(true)
        break
      case 'already-gone':
        request.onSuccess(false)
        break
      case 'failed':
        request.onFailure(outcome.response)
        break
    }
  }
}
