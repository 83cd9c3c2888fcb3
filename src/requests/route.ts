/**
 * REST routes
 *
 * A Route is a method plus a path template such as
 * `guilds/{guild_id}/emojis/{emoji_id}`. Compiling it with concrete
 * parameters yields the CompiledRoute a Requester executes.
 *
 * @module requests/route
 */

import { ValidationError } from '../errors'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

const PARAMETER_PATTERN = /\{([a-z_]+)\}/g

export interface CompiledRoute {
  readonly method: HttpMethod
  /** Path with every parameter substituted, without a leading slash */
  readonly path: string
  readonly baseRoute: Route
}

export class Route {
  static readonly Guilds = {
    GET_GUILD: Route.of('GET', 'guilds/{guild_id}'),
  }

  static readonly Emotes = {
    GET_EMOTES: Route.of('GET', 'guilds/{guild_id}/emojis'),
    GET_EMOTE: Route.of('GET', 'guilds/{guild_id}/emojis/{emoji_id}'),
    MODIFY_EMOTE: Route.of('PATCH', 'guilds/{guild_id}/emojis/{emoji_id}'),
    DELETE_EMOTE: Route.of('DELETE', 'guilds/{guild_id}/emojis/{emoji_id}'),
  }

  readonly method: HttpMethod
  readonly template: string
  readonly parameters: readonly string[]

  private constructor(method: HttpMethod, template: string) {
    this.method = method
    this.template = template
    this.parameters = Array.from(template.matchAll(PARAMETER_PATTERN), (match) => match[1] ?? '')
  }

  static of(method: HttpMethod, template: string): Route {
    return new Route(method, template)
  }

  /**
   * Substitute parameters in template order.
   *
   * @throws ValidationError if the number of values does not match the template
   */
  compile(...values: string[]): CompiledRoute {
    if (values.length !== this.parameters.length) {
      throw new ValidationError(
        `Route ${this.toString()} expects ${this.parameters.length} parameters, got ${values.length}`,
        { field: 'parameters', value: values }
      )
    }

    let index = 0
    const path = this.template.replace(PARAMETER_PATTERN, () => encodeURIComponent(values[index++] ?? ''))

    return { method: this.method, path, baseRoute: this }
  }

  toString(): string {
    return `${this.method} ${this.template}`
  }
}

export function formatCompiledRoute(route: CompiledRoute): string {
  return `${route.method} ${route.path}`
}
