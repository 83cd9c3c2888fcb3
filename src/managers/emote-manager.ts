/**
 * Emote manager
 *
 * Collects pending changes to one emote and submits them as a single
 * modify request. The emote itself is not changed locally; the update event
 * that follows a successful request does that.
 *
 * @example
 * ```typescript
 * emote.manager
 *   .setName('party_parrot')
 *   .setRoles([moderators])
 *   .update()
 *   .queue()
 * ```
 *
 * @module managers/emote-manager
 */

import { IllegalStateError, ValidationError } from '../errors'
import type { EmoteImpl } from '../entities/emote'
import type { EmoteManager, EmoteManagerField, Role } from '../entities/types'
import { okResponseHandler, RestAction } from '../requests/rest-action'
import { Route } from '../requests/route'
import { unwrap } from '../types/result'

const EMOTE_NAME_PATTERN = /^\w{2,32}$/

export interface ModifyEmoteBody {
  name?: string
  roles?: string[]
}

export class EmoteManagerImpl implements EmoteManager {
  readonly emote: EmoteImpl
  private name: string | undefined
  private roles: Role[] | undefined
  private readonly pending = new Set<EmoteManagerField>()

  constructor(emote: EmoteImpl) {
    this.emote = emote
  }

  /**
   * @throws ValidationError unless 2-32 characters of letters, digits and underscores
   */
  setName(name: string): this {
    if (!EMOTE_NAME_PATTERN.test(name)) {
      throw new ValidationError(
        'Emote name must be 2 to 32 characters and contain only alphanumeric characters and underscores',
        { field: 'name', value: name }
      )
    }
    this.name = name
    this.pending.add('name')
    return this
  }

  /**
   * @throws IllegalStateError if the emote cannot provide roles
   * @throws ValidationError if a role belongs to another guild
   */
  setRoles(roles: Iterable<Role> | undefined): this {
    if (roles === undefined) {
      this.roles = []
      this.pending.add('roles')
      return this
    }

    if (!this.emote.canProvideRoles) {
      throw new IllegalStateError('Cannot restrict the roles of a fake emote', { emoteId: this.emote.id })
    }
    const guild = this.emote.guild
    const list = Array.from(roles)
    for (const role of list) {
      if (role.guild === undefined || role.guild.id !== guild?.id) {
        throw new ValidationError('Roles must all be from the same guild', { field: 'roles', value: role.id })
      }
    }
    this.roles = list
    this.pending.add('roles')
    return this
  }

  /**
   * Drop pending changes to the given fields, or to all of them
   */
  reset(...fields: EmoteManagerField[]): this {
    const targets = fields.length > 0 ? fields : Array.from(this.pending)
    for (const field of targets) {
      this.pending.delete(field)
      if (field === 'name') this.name = undefined
      if (field === 'roles') this.roles = undefined
    }
    return this
  }

  isSet(field: EmoteManagerField): boolean {
    return this.pending.has(field)
  }

  /**
   * Request applying the pending changes. Pending state is cleared once the
   * request succeeds.
   *
   * @throws IllegalStateError if the emote is fake or its guild left the cache
   * @throws UnsupportedOperationError if the emote is managed
   * @throws InsufficientPermissionError without MANAGE_EMOTES
   */
  update(): RestAction<void> {
    const guild = unwrap(this.emote.checkModifiable('modify'))
    const route = Route.Emotes.MODIFY_EMOTE.compile(guild.id, this.emote.id)
    const submitted = new Set(this.pending)

    return new RestAction<void>(
      this.emote.client,
      route,
      okResponseHandler(() => {
        for (const field of submitted) {
          this.reset(field)
        }
      }),
      this.buildBody()
    )
  }

  buildBody(): ModifyEmoteBody {
    const body: ModifyEmoteBody = {}
    if (this.pending.has('name') && this.name !== undefined) {
      body.name = this.name
    }
    if (this.pending.has('roles') && this.roles !== undefined) {
      body.roles = this.roles.map((role) => role.id)
    }
    return body
  }
}
