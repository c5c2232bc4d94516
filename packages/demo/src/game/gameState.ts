/**
 * Game State
 *
 * The shared world the worker pool's consumers write into. Commands arrive
 * from consumers through processCommand; the producer's tick advances the
 * world through updatePhysics.
 *
 * Lifetime is owned by whoever created it. After destroy() every operation
 * throws: the pipeline's shutdown order (channel.stop → pool.join →
 * destroy) is what keeps consumers from ever hitting that.
 */

import { createSubscription } from '@tickline/system'
import type { Unsubscribe } from '@tickline/system'
import { consoleLogger } from '@tickline/pipeline'
import type { PipelineLogger } from '@tickline/pipeline'
import {
  BIRD_RADIUS,
  BIRD_START_Y,
  BIRD_X,
  FLAP_VELOCITY,
  GRAVITY,
  LATENCY_WARNING_US,
  MAX_FALL_SPEED,
  PIPE_DESPAWN_X,
  PIPE_GAP_MAX_Y,
  PIPE_GAP_MIN_Y,
  PIPE_GAP_SIZE,
  PIPE_SPAWN_INTERVAL_S,
  PIPE_SPEED,
  PIPE_WIDTH,
  WORLD_HEIGHT,
  WORLD_WIDTH,
} from './constants'
import { actionTypeKeywords } from './playerCommand'
import type { PlayerCommand } from './playerCommand'

// ============================================================================
// Types
// ============================================================================

export type BirdState = {
  x: number
  y: number
  yVel: number
  isAlive: boolean
  score: number
}

export type PipeState = {
  /** Left edge */
  x: number
  /** Center of the gap */
  gapY: number
  gapSize: number
  /** Already counted towards the score */
  passed: boolean
}

export type GameSnapshot = {
  bird: BirdState
  pipes: Array<PipeState>
  /** Simulated seconds while the bird was alive */
  elapsedS: number
  commandsProcessed: number
}

export const gameEventKeywords = {
  scored: 'scored',
  died: 'died',
} as const

export type GameEvent =
  | { type: typeof gameEventKeywords.scored; score: number }
  | { type: typeof gameEventKeywords.died; score: number; elapsedS: number }

export type GameStateOptions = {
  /** Uniform in [0, 1). Math.random by default */
  random?: () => number
  /** Millisecond clock with the same time base as command timestamps */
  clock?: () => number
  logger?: PipelineLogger
}

export type GameState = {
  /** Apply one command. Returns the command's latency in microseconds. */
  processCommand: (command: PlayerCommand) => number
  /** Advance the world by dtS seconds */
  updatePhysics: (dtS: number) => void
  getBirdState: () => BirdState
  getPipeState: () => Array<PipeState>
  snapshot: () => GameSnapshot
  subscribe: (listener: (event: GameEvent) => void) => Unsubscribe
  isDestroyed: () => boolean
  /** Release the world. Idempotent; every other operation throws afterwards. */
  destroy: () => void
}

// ============================================================================
// Implementation
// ============================================================================

export function createGameState(options: GameStateOptions = {}): GameState {
  const {
    random = Math.random,
    clock = () => performance.now(),
    logger = consoleLogger,
  } = options

  const bird: BirdState = {
    x: BIRD_X,
    y: BIRD_START_Y,
    yVel: 0,
    isAlive: true,
    score: 0,
  }
  let pipes: Array<PipeState> = []
  let spawnTimerS = 0
  let elapsedS = 0
  let commandsProcessed = 0
  let destroyed = false

  const events = createSubscription<GameEvent>()

  const assertLive = (operation: string) => {
    if (destroyed) {
      throw new Error(`[GameState] ${operation}() called after destroy()`)
    }
  }

  const spawnPipe = (dtS: number) => {
    spawnTimerS += dtS
    if (spawnTimerS < PIPE_SPAWN_INTERVAL_S) return

    pipes.push({
      x: WORLD_WIDTH,
      gapY: PIPE_GAP_MIN_Y + random() * (PIPE_GAP_MAX_Y - PIPE_GAP_MIN_Y),
      gapSize: PIPE_GAP_SIZE,
      passed: false,
    })
    spawnTimerS = 0
  }

  const collides = (): boolean => {
    // Ground and ceiling
    if (bird.y <= BIRD_RADIUS || bird.y >= WORLD_HEIGHT - BIRD_RADIUS) {
      return true
    }

    return pipes.some((pipe) => {
      const overlapsX =
        bird.x + BIRD_RADIUS > pipe.x && bird.x - BIRD_RADIUS < pipe.x + PIPE_WIDTH
      if (!overlapsX) return false

      const halfGap = pipe.gapSize / 2
      return (
        bird.y + BIRD_RADIUS > pipe.gapY + halfGap ||
        bird.y - BIRD_RADIUS < pipe.gapY - halfGap
      )
    })
  }

  const processCommand = (command: PlayerCommand): number => {
    assertLive('processCommand')

    if (command.type === actionTypeKeywords.flap && bird.isAlive) {
      bird.yVel = FLAP_VELOCITY
    }
    commandsProcessed++

    const latencyUs = Math.max(0, Math.floor((clock() - command.timestamp) * 1000))
    if (latencyUs > LATENCY_WARNING_US) {
      logger.warn(`[GameState] ${command.type} command latency: ${latencyUs}us`)
    }

    return latencyUs
  }

  const updatePhysics = (dtS: number) => {
    assertLive('updatePhysics')
    if (!bird.isAlive) return

    elapsedS += dtS

    // 1. Bird
    bird.yVel = Math.max(bird.yVel + GRAVITY * dtS, MAX_FALL_SPEED)
    bird.y += bird.yVel * dtS

    // 2. Pipes + scoring
    pipes.forEach((pipe) => {
      pipe.x += PIPE_SPEED * dtS

      if (!pipe.passed && pipe.x < bird.x) {
        pipe.passed = true
        bird.score++
        events.notify({ type: gameEventKeywords.scored, score: bird.score })
      }
    })

    // 3. Spawn + despawn
    spawnPipe(dtS)
    pipes = pipes.filter((pipe) => pipe.x >= PIPE_DESPAWN_X)

    // 4. Collision
    if (collides()) {
      bird.isAlive = false
      events.notify({ type: gameEventKeywords.died, score: bird.score, elapsedS })
    }
  }

  const getBirdState = (): BirdState => {
    assertLive('getBirdState')
    return { ...bird }
  }

  const getPipeState = (): Array<PipeState> => {
    assertLive('getPipeState')
    return pipes.map((pipe) => ({ ...pipe }))
  }

  const snapshot = (): GameSnapshot => {
    assertLive('snapshot')
    return {
      bird: { ...bird },
      pipes: pipes.map((pipe) => ({ ...pipe })),
      elapsedS,
      commandsProcessed,
    }
  }

  return {
    processCommand,
    updatePhysics,
    getBirdState,
    getPipeState,
    snapshot,
    subscribe: (listener) => {
      assertLive('subscribe')
      return events.subscribe(listener)
    },
    isDestroyed: () => destroyed,
    destroy: () => {
      destroyed = true
      events.clear()
    },
  }
}
