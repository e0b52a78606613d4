/**
 * Shared domain types for both demo flows.
 */

/** `#RRGGBB` color string */
export type HexColor = `#${string}`

export interface ColorOption {
  name: string
  hex: HexColor
}

export type UserId = number

export interface User {
  readonly id: UserId
  readonly name: string
  readonly email: string
}

/** Exposed state of the user detail screen. Exactly one variant at a time. */
export type UserDetailState =
  | { status: 'loading' }
  | { status: 'found'; user: User }
  | { status: 'not-found' }
