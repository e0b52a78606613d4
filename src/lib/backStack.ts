/**
 * BackStack — ordered navigation entries mirroring router history.
 *
 * Each entry is identified by the router's history key and owns a
 * SavedStateStore for its lifetime. Entries removed from the stack are
 * destroyed, which closes their store.
 */

import { SavedStateStore } from './savedStateStore'
import { logger } from './logger'

const log = logger.child({ module: 'navigation' })

export interface NavigationEntry {
  /** Router history key, unique per history entry */
  key: string
  /** Path the entry was created for, kept for logging */
  pathname: string
  savedState: SavedStateStore
}

export class BackStack {
  private entries: NavigationEntry[] = []
  // Entries rendered before the router change has been committed to the stack
  private pending = new Map<string, NavigationEntry>()

  get size(): number {
    return this.entries.length
  }

  keys(): string[] {
    return this.entries.map((e) => e.key)
  }

  get(key: string): NavigationEntry | undefined {
    return this.entries.find((e) => e.key === key) ?? this.pending.get(key)
  }

  /**
   * Return the entry for `key`, creating a detached one if it is not on the
   * stack yet. A screen renders before the provider's effect records the
   * navigation, so its store has to exist first.
   */
  getOrCreate(key: string, pathname: string): NavigationEntry {
    const existing = this.get(key)
    if (existing) return existing
    const entry = createEntry(key, pathname)
    this.pending.set(key, entry)
    return entry
  }

  /** The entry directly below `key`, or undefined if `key` is the root or unknown. */
  previous(key: string): NavigationEntry | undefined {
    const index = this.indexOf(key)
    return index > 0 ? this.entries[index - 1] : undefined
  }

  push(key: string, pathname: string): NavigationEntry {
    const existing = this.entries.find((e) => e.key === key)
    if (existing) return existing
    const entry = this.adopt(key, pathname)
    this.entries.push(entry)
    return entry
  }

  /** Swap the top entry for a new one. The old top is destroyed. */
  replace(key: string, pathname: string): NavigationEntry {
    const top = this.entries[this.entries.length - 1]
    if (top?.key === key) return top
    if (top) {
      this.entries.pop()
      destroy(top)
    }
    return this.push(key, pathname)
  }

  /**
   * Pop every entry above `key`. Returns false (and changes nothing) when
   * `key` is not on the stack.
   */
  popTo(key: string): boolean {
    const index = this.indexOf(key)
    if (index === -1) return false
    const removed = this.entries.splice(index + 1)
    for (const entry of removed.reverse()) destroy(entry)
    return true
  }

  clear() {
    for (const entry of this.entries.splice(0).reverse()) destroy(entry)
    for (const entry of this.pending.values()) destroy(entry)
    this.pending.clear()
  }

  private indexOf(key: string): number {
    return this.entries.findIndex((e) => e.key === key)
  }

  private adopt(key: string, pathname: string): NavigationEntry {
    const pending = this.pending.get(key)
    if (pending) {
      this.pending.delete(key)
      return pending
    }
    return createEntry(key, pathname)
  }
}

function createEntry(key: string, pathname: string): NavigationEntry {
  log.debug({ key, pathname }, 'Navigation entry created')
  return { key, pathname, savedState: new SavedStateStore() }
}

function destroy(entry: NavigationEntry) {
  entry.savedState.close()
  log.debug({ key: entry.key, pathname: entry.pathname }, 'Navigation entry destroyed')
}
