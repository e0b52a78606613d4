/**
 * NavigationEntryProvider — mirrors router history into a BackStack.
 *
 * PUSH adds an entry, REPLACE swaps the top one, POP unwinds to the entry
 * being returned to. A POP to a key that is not on the stack (first load,
 * browser forward) pushes it.
 */

import { useEffect, useState, type ReactNode } from 'react'
import { useLocation, useNavigationType } from 'react-router-dom'
import { BackStack } from '@/lib/backStack'
import { BackStackContext } from '@/hooks/useNavigationEntry'

interface NavigationEntryProviderProps {
  children: ReactNode
  /** Supply a stack to inspect it from outside (tests) */
  stack?: BackStack
}

export function NavigationEntryProvider({ children, stack }: NavigationEntryProviderProps) {
  const [ownStack] = useState(() => new BackStack())
  const backStack = stack ?? ownStack

  const { key, pathname } = useLocation()
  const navigationType = useNavigationType()

  useEffect(() => {
    if (navigationType === 'PUSH') {
      backStack.push(key, pathname)
    } else if (navigationType === 'REPLACE') {
      backStack.replace(key, pathname)
    } else if (!backStack.popTo(key)) {
      backStack.push(key, pathname)
    }
  }, [backStack, key, pathname, navigationType])

  return <BackStackContext.Provider value={backStack}>{children}</BackStackContext.Provider>
}
