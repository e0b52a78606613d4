/**
 * SavedStateStore — key/value store owned by a single navigation entry.
 *
 * Listeners are keyed, so a screen observing one slot is not woken by
 * writes to another. Notifications are synchronous.
 */

export type StoreListener = () => void

export class SavedStateStore {
  private values = new Map<string, unknown>()
  private listeners = new Map<string, Set<StoreListener>>()
  private closed = false

  get(key: string): unknown {
    return this.values.get(key)
  }

  has(key: string): boolean {
    return this.values.has(key)
  }

  set(key: string, value: unknown) {
    if (this.closed) return
    this.values.set(key, value)
    this.notify(key)
  }

  /** Remove a key. Returns the value it held, if any. */
  remove(key: string): unknown {
    if (!this.values.has(key)) return undefined
    const value = this.values.get(key)
    this.values.delete(key)
    this.notify(key)
    return value
  }

  keys(): string[] {
    return [...this.values.keys()]
  }

  subscribe(key: string, listener: StoreListener): () => void {
    if (this.closed) return () => {}
    let set = this.listeners.get(key)
    if (!set) {
      set = new Set()
      this.listeners.set(key, set)
    }
    set.add(listener)

    return () => {
      const current = this.listeners.get(key)
      if (!current) return
      current.delete(listener)
      if (current.size === 0) this.listeners.delete(key)
    }
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Drop all values and listeners. Writes after close are ignored. */
  close() {
    this.closed = true
    this.values.clear()
    this.listeners.clear()
  }

  private notify(key: string) {
    const set = this.listeners.get(key)
    if (!set) return
    // Copy so a listener may unsubscribe itself mid-dispatch
    for (const listener of [...set]) listener()
  }
}
