/**
 * useUserDetail — view-model for the user detail screen.
 *
 * Reads the id forwarded in the route, resolves the user through the
 * injected repository and exposes a single UserDetailState.
 */

import { useEffect, useMemo } from 'react'
import { useParams } from 'react-router-dom'
import { useQuery } from '@tanstack/react-query'
import { useUserRepository } from './useUserRepository'
import { USER_ID_ARG } from '@/lib/routeConfig'
import { parseUserId } from '@/lib/routeArgs'
import { toUserDetailState } from '@/lib/userDetailState'
import { logger } from '@/lib/logger'
import type { UserDetailState, UserId } from '@/lib/types'

export const userDetailLog = logger.child({ module: 'user-detail' })

/** Parse the forwarded id from the current route params. */
export function useUserIdArg(): UserId | undefined {
  const params = useParams<typeof USER_ID_ARG>()
  const raw = params[USER_ID_ARG]
  const id = useMemo(() => parseUserId(raw), [raw])

  useEffect(() => {
    if (raw !== undefined && id === undefined) {
      userDetailLog.warn({ [USER_ID_ARG]: raw }, 'Ignoring malformed user id route argument')
    }
  }, [raw, id])

  return id
}

export function useUser(id: UserId | undefined) {
  const repository = useUserRepository()
  return useQuery({
    queryKey: ['user', id],
    queryFn: () => {
      if (id === undefined) return null
      return repository.loadUser(id)
    },
    enabled: id !== undefined,
    // Each visit resolves fresh data; nothing outlives the screen
    gcTime: 0,
    staleTime: 0,
    retry: false,
  })
}

export function useUserDetail(): UserDetailState {
  const id = useUserIdArg()
  const query = useUser(id)

  useEffect(() => {
    if (query.error) {
      userDetailLog.error({ err: query.error, id }, 'User lookup failed')
    }
  }, [query.error, id])

  return toUserDetailState(id, { status: query.status, data: query.data })
}
