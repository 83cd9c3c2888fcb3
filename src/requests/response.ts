/**
 * A response as delivered by the transport: status code plus the decoded
 * JSON body, if there was one.
 *
 * @module requests/response
 */

export class Response {
  readonly code: number
  readonly body: unknown
  readonly headers: Readonly<Record<string, string>>

  constructor(code: number, body?: unknown, headers: Record<string, string> = {}) {
    this.code = code
    this.body = body
    this.headers = headers
  }

  /** 2xx */
  get isOk(): boolean {
    return this.code >= 200 && this.code < 300
  }

  get isError(): boolean {
    return !this.isOk
  }

  toString(): string {
    return `HTTPResponse[${this.code}]`
  }
}
