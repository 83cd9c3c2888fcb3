import { snowflakeTimestamp, type Snowflake } from '../utils/snowflake'
import type { User } from './types'

export class UserImpl implements User {
  readonly id: Snowflake
  name = ''
  discriminator = '0000'
  isBot = false

  constructor(id: Snowflake) {
    this.id = id
  }

  get timeCreated(): Date {
    return new Date(snowflakeTimestamp(this.id))
  }

  get asTag(): string {
    return `${this.name}#${this.discriminator}`
  }

  get asMention(): string {
    return `<@${this.id}>`
  }

  setName(name: string): this {
    this.name = name
    return this
  }

  setDiscriminator(discriminator: string): this {
    this.discriminator = discriminator
    return this
  }

  setBot(isBot: boolean): this {
    this.isBot = isBot
    return this
  }

  toString(): string {
    return `U:${this.name}(${this.id})`
  }
}
