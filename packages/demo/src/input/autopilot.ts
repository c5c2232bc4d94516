import { BIRD_RADIUS, PIPE_WIDTH, WORLD_HEIGHT } from '../game/constants'
import type { PipeState } from '../game/gameState'
import type { InputSource } from './types'

export type AutopilotOptions = {
  /** Height to hold when no pipe is ahead (default: mid-world) */
  targetY?: number
  /** How far ahead to project the bird's fall, in seconds */
  lookaheadS?: number
  /** Flap when the projected height is this far below the target */
  margin?: number
  /** Minimum time between two flaps */
  cooldownMs?: number
}

const nextPipe = (pipes: Array<PipeState>, birdX: number) =>
  pipes
    .filter((pipe) => pipe.x + PIPE_WIDTH >= birdX - BIRD_RADIUS)
    .reduce<PipeState | null>(
      (closest, pipe) => (closest === null || pipe.x < closest.x ? pipe : closest),
      null,
    )

/**
 * Steer the bird towards the center of the next gap
 */
export function createAutopilotInput(options: AutopilotOptions = {}): InputSource {
  const {
    targetY = WORLD_HEIGHT / 2,
    lookaheadS = 0.1,
    margin = 1,
    cooldownMs = 150,
  } = options

  let lastFlapMs = Number.NEGATIVE_INFINITY

  return ({ bird, pipes }, elapsedMs) => {
    if (!bird.isAlive) return false
    if (elapsedMs - lastFlapMs < cooldownMs) return false

    const target = nextPipe(pipes, bird.x)?.gapY ?? targetY
    const projectedY = bird.y + bird.yVel * lookaheadS

    if (projectedY < target - margin) {
      lastFlapMs = elapsedMs
      return true
    }
    return false
  }
}
