import type { GameSnapshot } from '../game/gameState'

/**
 * Decides, once per tick, whether the player flaps.
 * `elapsedMs` counts from the first tick of the session.
 */
export type InputSource = (snapshot: GameSnapshot, elapsedMs: number) => boolean

export const inputKindKeywords = {
  autopilot: 'autopilot',
  scripted: 'scripted',
  idle: 'idle',
} as const

export type InputConfig =
  | { kind: typeof inputKindKeywords.autopilot }
  | { kind: typeof inputKindKeywords.idle }
  | { kind: typeof inputKindKeywords.scripted; flapTimesMs: Array<number> }
