import { describe, expect, it, vi } from 'vitest'
import { SavedStateStore } from './savedStateStore'

describe('SavedStateStore', () => {
  it('stores and removes values by key', () => {
    const store = new SavedStateStore()
    store.set('a', 1)

    expect(store.get('a')).toBe(1)
    expect(store.has('a')).toBe(true)
    expect(store.remove('a')).toBe(1)
    expect(store.has('a')).toBe(false)
    expect(store.get('a')).toBeUndefined()
  })

  it('notifies only listeners of the written key', () => {
    const store = new SavedStateStore()
    const onA = vi.fn()
    const onB = vi.fn()
    store.subscribe('a', onA)
    store.subscribe('b', onB)

    store.set('a', 'x')

    expect(onA).toHaveBeenCalledTimes(1)
    expect(onB).not.toHaveBeenCalled()
  })

  it('does not notify when removing a missing key', () => {
    const store = new SavedStateStore()
    const listener = vi.fn()
    store.subscribe('a', listener)

    expect(store.remove('a')).toBeUndefined()
    expect(listener).not.toHaveBeenCalled()
  })

  it('stops notifying after unsubscribe', () => {
    const store = new SavedStateStore()
    const listener = vi.fn()
    const unsubscribe = store.subscribe('a', listener)

    store.set('a', 1)
    unsubscribe()
    store.set('a', 2)

    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('lets a listener unsubscribe itself during dispatch', () => {
    const store = new SavedStateStore()
    const second = vi.fn()
    const unsubscribe = store.subscribe('a', () => unsubscribe())
    store.subscribe('a', second)

    store.set('a', 1)
    store.set('a', 2)

    expect(second).toHaveBeenCalledTimes(2)
  })

  it('drops values and ignores writes once closed', () => {
    const store = new SavedStateStore()
    const listener = vi.fn()
    store.set('a', 1)
    store.subscribe('a', listener)

    store.close()
    store.set('a', 2)

    expect(store.isClosed).toBe(true)
    expect(store.keys()).toEqual([])
    expect(listener).not.toHaveBeenCalled()
  })
})
