/**
 * Hand a value from a later screen back to an earlier one.
 *
 * The producer writes into the saved state of the entry below it on the
 * back stack; the consumer observes its own entry's store, handles the
 * value once and removes it so it is not delivered again.
 *
 * A ResultKey pairs the slot name with a guard, so only values of the
 * key's type can be written and anything else found in the slot reads as
 * absent.
 */

import type { NavigationEntry } from './backStack'
import type { SavedStateStore } from './savedStateStore'
import { logger } from './logger'

const log = logger.child({ module: 'result-channel' })

export interface ResultKey<T> {
  readonly name: string
  readonly guard: (value: unknown) => value is T
}

export function createResultKey<T>(
  name: string,
  guard: (value: unknown) => value is T,
): ResultKey<T> {
  return Object.freeze({ name, guard })
}

/**
 * Store `value` on `entry`. A missing entry (the producer was opened with
 * nothing below it) makes this a no-op. Returns whether the write happened.
 */
export function setResult<T>(
  entry: NavigationEntry | undefined,
  key: ResultKey<T>,
  value: T,
): boolean {
  if (!entry || entry.savedState.isClosed) {
    log.debug({ key: key.name }, 'No entry to receive result')
    return false
  }
  entry.savedState.set(key.name, value)
  log.debug({ key: key.name, entry: entry.key }, 'Result set')
  return true
}

export function peekResult<T>(store: SavedStateStore, key: ResultKey<T>): T | undefined {
  const value = store.get(key.name)
  return key.guard(value) ? value : undefined
}

/** Listen for changes to the slot. The listener gets the current value or undefined. */
export function observeResult<T>(
  store: SavedStateStore,
  key: ResultKey<T>,
  listener: (value: T | undefined) => void,
): () => void {
  return store.subscribe(key.name, () => listener(peekResult(store, key)))
}

/** Read and clear the slot in one step. */
export function consumeResult<T>(store: SavedStateStore, key: ResultKey<T>): T | undefined {
  const value = peekResult(store, key)
  if (store.has(key.name)) {
    store.remove(key.name)
    log.debug({ key: key.name }, 'Result consumed')
  }
  return value
}
