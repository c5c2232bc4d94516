/**
 * Player Commands
 *
 * The values the producer submits to the command channel. A command is
 * frozen at creation: whichever consumer takes it sees exactly what the
 * producer created.
 */

import { z } from 'zod'

export const actionTypeKeywords = {
  flap: 'flap',
  none: 'none',
} as const

export type ActionType =
  (typeof actionTypeKeywords)[keyof typeof actionTypeKeywords]

export const playerCommandSchema = z.object({
  playerId: z.number().int().nonnegative(),
  type: z.enum([actionTypeKeywords.flap, actionTypeKeywords.none]),
  /** performance.now() at creation, in milliseconds */
  timestamp: z.number(),
})

export type PlayerCommand = Readonly<z.infer<typeof playerCommandSchema>>

export type CreatePlayerCommandOptions = {
  playerId?: number
  /** Millisecond clock; performance.now() by default */
  now?: () => number
}

export function createPlayerCommand(
  type: ActionType,
  options: CreatePlayerCommandOptions = {},
): PlayerCommand {
  const { playerId = 0, now = () => performance.now() } = options

  return Object.freeze({ playerId, type, timestamp: now() })
}
