/**
 * Where the detail screen resolves a user from its id.
 *
 * Screens depend only on the UserRepository interface; the in-memory
 * implementation stands in for a database or API and simulates latency.
 */

import { config } from './config'
import type { User, UserId } from './types'

export interface UserRepository {
  /** Resolve a user by exact id. Resolves null when no user has that id. */
  loadUser(id: UserId): Promise<User | null>
}

export const DEFAULT_USERS: readonly User[] = [
  { id: 101, name: 'Anya Smith', email: 'anya@example.com' },
  { id: 202, name: 'Ben Miller', email: 'ben@example.com' },
  { id: 303, name: 'Cathy Lee', email: 'cathy@example.com' },
]

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class InMemoryUserRepository implements UserRepository {
  private users: ReadonlyMap<UserId, User>
  private delayMs: number

  constructor(users: readonly User[] = DEFAULT_USERS, delayMs: number = config.userLookupDelayMs) {
    this.users = new Map(users.map((u) => [u.id, Object.freeze({ ...u })]))
    this.delayMs = delayMs
  }

  async loadUser(id: UserId): Promise<User | null> {
    if (this.delayMs > 0) await delay(this.delayMs)
    return this.users.get(id) ?? null
  }
}
