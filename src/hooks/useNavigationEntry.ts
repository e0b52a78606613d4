/**
 * Hooks for the current screen's back-stack entry and the one below it.
 */

import { createContext, useCallback, useContext } from 'react'
import { useLocation } from 'react-router-dom'
import type { BackStack, NavigationEntry } from '@/lib/backStack'

export const BackStackContext = createContext<BackStack | undefined>(undefined)

export function useBackStack(): BackStack {
  const stack = useContext(BackStackContext)
  if (stack === undefined) {
    throw new Error('useBackStack must be used within a NavigationEntryProvider')
  }
  return stack
}

/** Entry for the current location. Created on first render if needed. */
export function useCurrentEntry(): NavigationEntry {
  const stack = useBackStack()
  const { key, pathname } = useLocation()
  return stack.getOrCreate(key, pathname)
}

/**
 * Lookup for the entry directly below the current one. Resolved when
 * called: on the first render the current entry is not on the stack yet.
 */
export function usePreviousEntry(): () => NavigationEntry | undefined {
  const stack = useBackStack()
  const { key } = useLocation()
  return useCallback(() => stack.previous(key), [stack, key])
}
