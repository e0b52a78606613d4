/**
 * Route argument parsing. A malformed argument is treated as absent.
 */

import { z } from 'zod'
import type { UserId } from './types'

const userIdSchema = z
  .string()
  .regex(/^[+-]?\d+$/)
  // '-0' parses to -0; normalize it to 0
  .transform((value) => Number(value) || 0)
  .pipe(z.number().int().safe())

/**
 * Parse the `itemId` route parameter. Returns undefined when it is missing
 * or not a plain decimal integer (an optional sign is allowed).
 */
export function parseUserId(raw: string | undefined): UserId | undefined {
  if (raw === undefined) return undefined
  const parsed = userIdSchema.safeParse(raw)
  return parsed.success ? parsed.data : undefined
}
