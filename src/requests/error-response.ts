/**
 * Known structured error codes returned in error response bodies, e.g.
 * `{ "code": 10014, "message": "Unknown Emoji" }`.
 *
 * @module requests/error-response
 */

import { z } from 'zod'

export interface ErrorResponse {
  readonly code: number
  readonly meaning: string
}

export const ErrorResponse = {
  UNKNOWN_CHANNEL: { code: 10003, meaning: 'Unknown Channel' },
  UNKNOWN_GUILD: { code: 10004, meaning: 'Unknown Guild' },
  UNKNOWN_MEMBER: { code: 10007, meaning: 'Unknown Member' },
  UNKNOWN_ROLE: { code: 10011, meaning: 'Unknown Role' },
  UNKNOWN_USER: { code: 10013, meaning: 'Unknown User' },
  UNKNOWN_EMOJI: { code: 10014, meaning: 'Unknown Emoji' },
  MISSING_ACCESS: { code: 50001, meaning: 'Missing Access' },
  MISSING_PERMISSIONS: { code: 50013, meaning: 'Missing Permissions' },
  INVALID_FORM_BODY: { code: 50035, meaning: 'Invalid Form Body' },
  MAX_EMOTES: { code: 30008, meaning: 'Maximum number of Emotes reached' },
} as const satisfies Record<string, ErrorResponse>

export type KnownErrorResponse = (typeof ErrorResponse)[keyof typeof ErrorResponse]

const KNOWN_BY_CODE: ReadonlyMap<number, KnownErrorResponse> = new Map(
  Object.values(ErrorResponse).map((known) => [known.code, known])
)

const errorBodySchema = z.object({
  code: z.number().int(),
  message: z.string().optional(),
})

export type ErrorBody = z.infer<typeof errorBodySchema>

export function errorResponseFromCode(code: number): KnownErrorResponse | undefined {
  return KNOWN_BY_CODE.get(code)
}

/**
 * Decode a structured error body into a known error.
 *
 * Returns undefined when the body is absent, malformed, or carries a code
 * this client does not know.
 */
export function errorResponseFromJSON(body: unknown): KnownErrorResponse | undefined {
  const parsed = errorBodySchema.safeParse(body)
  if (!parsed.success) {
    return undefined
  }
  return errorResponseFromCode(parsed.data.code)
}

/** The `message` of a structured error body, if it has one */
export function errorMessageFromJSON(body: unknown): string | undefined {
  const parsed = errorBodySchema.safeParse(body)
  return parsed.success ? parsed.data.message : undefined
}
