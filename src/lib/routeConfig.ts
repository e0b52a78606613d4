/**
 * Static route definitions for both flows.
 */

import type { UserId } from './types'

/** Route parameter carrying the user id into the detail screen */
export const USER_ID_ARG = 'itemId'

export const routes = {
  home: '/home',
  colorPicker: '/color_picker',
  userList: '/user_list',
  userDetail: `/user_detail/:${USER_ID_ARG}`,
} as const

export function createUserDetailRoute(userId: UserId): string {
  return `/user_detail/${userId}`
}

export interface FlowLink {
  /** Start destination of the flow */
  path: string
  label: string
}

export const flowLinks: FlowLink[] = [
  { path: routes.home, label: 'Returning a result' },
  { path: routes.userList, label: 'Forwarding an ID' },
]

export interface UserShortcut {
  id: UserId
  label: string
}

/** Entries on the user list. Only the id is forwarded; labels are display text. */
export const userShortcuts: UserShortcut[] = [
  { id: 101, label: 'View Anya Smith (ID 101)' },
  { id: 202, label: 'View Ben Miller (ID 202)' },
  { id: 303, label: 'View Cathy Lee (ID 303)' },
  { id: 404, label: 'View Unknown User (ID 404)' },
]
