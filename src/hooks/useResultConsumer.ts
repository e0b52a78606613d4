/**
 * useResultConsumer — handle a result delivered to the current entry once.
 *
 * Subscribes to the entry's saved state for `key`. When a value arrives,
 * `onResult` runs and the slot is cleared, so returning to the screen
 * later does not deliver it again.
 */

import { useCallback, useEffect, useRef, useSyncExternalStore } from 'react'
import { useCurrentEntry } from './useNavigationEntry'
import { consumeResult, observeResult, peekResult, type ResultKey } from '@/lib/resultChannel'

export function useResultConsumer<T>(key: ResultKey<T>, onResult: (value: T) => void) {
  const { savedState } = useCurrentEntry()

  // Latest callback without resubscribing on every render
  const onResultRef = useRef(onResult)
  useEffect(() => {
    onResultRef.current = onResult
  })

  const subscribe = useCallback(
    (notify: () => void) => observeResult(savedState, key, notify),
    [savedState, key],
  )
  const getSnapshot = useCallback(() => peekResult(savedState, key), [savedState, key])
  const value = useSyncExternalStore(subscribe, getSnapshot)

  useEffect(() => {
    if (value === undefined) return
    onResultRef.current(value)
    consumeResult(savedState, key)
  }, [value, savedState, key])
}
