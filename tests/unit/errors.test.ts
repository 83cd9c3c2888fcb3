/**
 * Error hierarchy Tests
 */

import { describe, it, expect } from 'vitest'
import { Permission } from '../../src/entities/permission'
import {
  ErrorCode,
  ErrorResponseError,
  IllegalStateError,
  InsufficientPermissionError,
  isErrorResponseError,
  isIllegalStateError,
  isInsufficientPermissionError,
  isSnowcordError,
  isUnsupportedOperationError,
  isValidationError,
  SnowcordError,
  UnsupportedOperationError,
  ValidationError,
  wrapError,
} from '../../src/errors'
import { ErrorResponse } from '../../src/requests/error-response'
import { Response } from '../../src/requests/response'

describe('SnowcordError', () => {
  it('should keep the subclass identity', () => {
    const error = new IllegalStateError('fake emote', { emoteId: '4000' })

    expect(error).toBeInstanceOf(IllegalStateError)
    expect(error).toBeInstanceOf(SnowcordError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('IllegalStateError')
    expect(error.is(ErrorCode.ILLEGAL_STATE)).toBe(true)
  })

  it('should serialize with context and cause', () => {
    const cause = new ValidationError('bad id', { field: 'id' })
    const error = new SnowcordError('outer', ErrorCode.INTERNAL, { step: 'parse' }, cause)

    expect(error.toJSON()).toEqual({
      name: 'SnowcordError',
      code: ErrorCode.INTERNAL,
      message: 'outer',
      context: { step: 'parse' },
      cause: {
        name: 'ValidationError',
        code: ErrorCode.VALIDATION_FAILED,
        message: 'bad id',
        context: { field: 'id' },
        cause: undefined,
      },
    })
  })

  it('should omit empty context when serialized', () => {
    expect(new UnsupportedOperationError('managed').toJSON().context).toBeUndefined()
  })
})

describe('InsufficientPermissionError', () => {
  it('should name the missing permission and guild', () => {
    const error = new InsufficientPermissionError('3000', Permission.MANAGE_EMOTES, 'emote delete')

    expect(error.message).toBe(
      'Cannot perform action due to a lack of Permission. Missing permission: MANAGE_EMOTES: emote delete'
    )
    expect(error.guildId).toBe('3000')
    expect(error.permission).toBe(Permission.MANAGE_EMOTES)
    expect(error.code).toBe(ErrorCode.MISSING_PERMISSION)
  })
})

describe('ErrorResponseError', () => {
  it('should describe known and unknown error bodies', () => {
    const known = new ErrorResponseError(new Response(404), ErrorResponse.UNKNOWN_EMOJI)
    const unknown = new ErrorResponseError(new Response(502), undefined, 'Bad Gateway')

    expect(known.message).toBe('HTTP 404 10014: Unknown Emoji')
    expect(known.context).toEqual({ status: 404, errorCode: 10014 })
    expect(unknown.message).toBe('HTTP 502 Bad Gateway')
    expect(unknown.status).toBe(502)
  })
})

describe('type guards', () => {
  it('should narrow by class', () => {
    const permission = new InsufficientPermissionError('3000', Permission.MANAGE_EMOTES)

    expect(isSnowcordError(permission)).toBe(true)
    expect(isInsufficientPermissionError(permission)).toBe(true)
    expect(isIllegalStateError(permission)).toBe(false)
    expect(isUnsupportedOperationError(new UnsupportedOperationError('x'))).toBe(true)
    expect(isValidationError(new ValidationError('x'))).toBe(true)
    expect(isErrorResponseError(new ErrorResponseError(new Response(500), undefined))).toBe(true)
    expect(isSnowcordError(new Error('plain'))).toBe(false)
  })
})

describe('wrapError', () => {
  it('should pass SnowcordErrors through', () => {
    const error = new IllegalStateError('x')

    expect(wrapError(error)).toBe(error)
  })

  it('should wrap plain errors as internal with the cause', () => {
    const cause = new TypeError('nope')

    const wrapped = wrapError(cause, { route: 'GET guilds/1' })

    expect(wrapped.code).toBe(ErrorCode.INTERNAL)
    expect(wrapped.message).toBe('nope')
    expect(wrapped.cause).toBe(cause)
    expect(wrapped.context).toEqual({ route: 'GET guilds/1' })
  })

  it('should stringify non-errors', () => {
    const wrapped = wrapError(42)

    expect(wrapped.code).toBe(ErrorCode.UNKNOWN)
    expect(wrapped.message).toBe('42')
  })
})
