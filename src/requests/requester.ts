/**
 * Transport contract and the fetch-based implementation.
 *
 * A Requester turns a compiled route (plus an optional JSON body) into a
 * Response. It resolves for every HTTP status, error statuses included, and
 * rejects only when no response could be obtained at all.
 *
 * @module requests/requester
 */

import { NetworkError } from '../errors'
import { scopedLogger } from '../utils/logger'
import { Response } from './response'
import { formatCompiledRoute, type CompiledRoute } from './route'

const log = scopedLogger('requester')

export interface Requester {
  execute(route: CompiledRoute, body?: unknown): Promise<Response>
}

export interface FetchRequesterOptions {
  /** Base URL every route path is appended to, e.g. https://discord.com/api/v10 */
  baseUrl: string
  /** Extra headers sent with every request */
  headers?: Record<string, string> | undefined
  /** Request timeout in milliseconds */
  timeoutMs?: number | undefined
  /** Injected fetch, defaults to the global one */
  fetch?: typeof fetch | undefined
}

export class FetchRequester implements Requester {
  private readonly baseUrl: string
  private readonly headers: Record<string, string>
  private readonly timeoutMs: number | undefined
  private readonly fetchFn: typeof fetch

  constructor(options: FetchRequesterOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.headers = options.headers ?? {}
    this.timeoutMs = options.timeoutMs
    this.fetchFn = options.fetch ?? globalThis.fetch
  }

  async execute(route: CompiledRoute, body?: unknown): Promise<Response> {
    const url = `${this.baseUrl}/${route.path}`
    const headers: Record<string, string> = { ...this.headers }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    log.debug(`-> ${formatCompiledRoute(route)}`)

    let raw: globalThis.Response
    try {
      raw = await this.fetchFn(url, {
        method: route.method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
      })
    } catch (error) {
      throw new NetworkError(
        `Request ${formatCompiledRoute(route)} failed: ${error instanceof Error ? error.message : String(error)}`,
        { method: route.method, path: route.path },
        error instanceof Error ? error : undefined
      )
    }

    const responseHeaders: Record<string, string> = {}
    raw.headers.forEach((value, key) => {
      responseHeaders[key] = value
    })

    log.debug(`<- ${formatCompiledRoute(route)} ${raw.status}`)
    return new Response(raw.status, await readBody(raw), responseHeaders)
  }
}

async function readBody(raw: globalThis.Response): Promise<unknown> {
  const text = await raw.text()
  if (text.length === 0) {
    return undefined
  }
  try {
    const parsed: unknown = JSON.parse(text)
    return parsed
  } catch {
    // Non-JSON bodies (proxies, HTML error pages) are surfaced as text
    return text
  }
}
