/**
 * Derive the detail screen's state from the route id and the lookup query.
 */

import type { User, UserDetailState, UserId } from './types'

/** The slice of a react-query result the state machine reads */
export interface UserQuerySnapshot {
  status: 'pending' | 'error' | 'success'
  data: User | null | undefined
}

const LOADING: UserDetailState = { status: 'loading' }
const NOT_FOUND: UserDetailState = { status: 'not-found' }

export function toUserDetailState(
  id: UserId | undefined,
  query: UserQuerySnapshot,
): UserDetailState {
  // No id means nothing to fetch, so never report loading
  if (id === undefined) return NOT_FOUND

  switch (query.status) {
    case 'pending':
      return LOADING
    case 'error':
      return NOT_FOUND
    case 'success':
      return query.data ? { status: 'found', user: query.data } : NOT_FOUND
  }
}
