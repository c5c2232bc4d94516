/**
 * Demo System
 *
 * Braided system wiring the flap game onto the pipeline.
 * Resources start in dependency order and halt in reverse:
 *
 *   gameState, metrics, channel (no deps)
 *       ↓
 *   pool ← channel, gameState, metrics      (consumers apply commands)
 *       ↓
 *   producer ← gameState, channel, pool     (tick loop: input → submit, physics)
 *
 * Halting therefore stops the producer, then stops the channel and joins the
 * pool, and only then destroys the game state.
 */

import { defineResource, haltSystem, startSystem } from 'braided'
import type { StartedSystem } from 'braided'
import {
  consoleLogger,
  createCommandChannelResource,
  createConsumer,
  createWorkerPoolResource,
} from '@tickline/pipeline'
import type {
  CommandChannel,
  PipelineLogger,
  WorkerPoolResource,
} from '@tickline/pipeline'
import { createTickLoop, timerScheduler } from '@tickline/system'
import type { TickScheduler } from '@tickline/system'
import type { DemoConfig } from './config'
import { createGameState, gameEventKeywords } from './game/gameState'
import type { GameState } from './game/gameState'
import { actionTypeKeywords, createPlayerCommand } from './game/playerCommand'
import type { PlayerCommand } from './game/playerCommand'
import { createSeededRandom } from './game/random'
import { createInputSource } from './input'
import { createMetrics, sessionEndKeywords } from './metrics'
import type { SessionEndReason, SessionMetrics, SessionReport } from './metrics'

export type SessionDependencies = {
  /** Drives both the tick loop and the session time limit */
  scheduler?: TickScheduler
  logger?: PipelineLogger
}

// ============================================================================
// System Configuration
// ============================================================================

export const createDemoSystemConfig = (
  config: DemoConfig,
  dependencies: SessionDependencies = {},
) => {
  const { scheduler = timerScheduler, logger = consoleLogger } = dependencies

  const gameState = defineResource({
    start: () =>
      createGameState({
        random:
          config.seed === undefined ? Math.random : createSeededRandom(config.seed),
        clock: scheduler.now,
        logger,
      }),
    halt: (state: GameState) => {
      state.destroy()
    },
  })

  const metrics = defineResource({
    start: () => createMetrics(),
    halt: () => {},
  })

  const channel = createCommandChannelResource<PlayerCommand>({
    capacity: config.capacity,
  })

  const pool = createWorkerPoolResource({
    dependencies: ['channel', 'gameState', 'metrics'],
    threadCount: config.workers,
    createConsumer: (deps: {
      channel: CommandChannel<PlayerCommand>
      gameState: GameState
      metrics: SessionMetrics
    }) =>
      createConsumer<PlayerCommand>((command, { workerId }) => {
        deps.metrics.record(deps.gameState.processCommand(command), workerId)
      }),
    logger,
  })

  const producer = defineResource({
    dependencies: ['gameState', 'channel', 'pool'] as const,
    start: ({
      gameState: state,
      channel: commands,
    }: {
      gameState: GameState
      channel: CommandChannel<PlayerCommand>
      pool: WorkerPoolResource
    }) => {
      const input = createInputSource(config.input)
      let elapsedMs = 0
      let submitted = 0

      const loop = createTickLoop({
        createContext: () => ({ state, commands }),
        beforeTick: (context, _timestamp, deltaMs) => {
          elapsedMs += deltaMs
          const snapshot = context.state.snapshot()
          if (!snapshot.bird.isAlive) return

          if (input(snapshot, elapsedMs)) {
            context.commands.submit(
              createPlayerCommand(actionTypeKeywords.flap, { now: scheduler.now }),
            )
            submitted++
          }
        },
        afterTick: (context, _timestamp, deltaMs) => {
          context.state.updatePhysics(deltaMs / 1000)
        },
        onError: (error) => {
          logger.error('[Demo] Producer tick failed:', error)
        },
        targetHz: config.tickHz,
        scheduler,
      })

      loop.start()

      return {
        stop: () => loop.stop(),
        ticks: () => loop.tickCount(),
        submitted: () => submitted,
      }
    },
    halt: (producerApi: { stop: () => void }) => {
      producerApi.stop()
    },
  })

  return { gameState, metrics, channel, pool, producer }
}

export type DemoSystemConfig = ReturnType<typeof createDemoSystemConfig>
export type DemoSystem = StartedSystem<DemoSystemConfig>

// ============================================================================
// Session
// ============================================================================

/**
 * Wait for the time limit or the bird's death, whichever comes first
 */
const waitForEnd = (
  system: DemoSystem,
  durationMs: number,
  scheduler: TickScheduler,
): Promise<SessionEndReason> =>
  new Promise((resolve) => {
    const cancelTimer = scheduler.schedule(() => {
      unsubscribe()
      resolve(sessionEndKeywords.duration)
    }, durationMs)

    const unsubscribe = system.gameState.subscribe((event) => {
      if (event.type !== gameEventKeywords.died) return
      cancelTimer()
      unsubscribe()
      resolve(sessionEndKeywords.died)
    })
  })

/**
 * Run one game session end to end and report on it.
 * The game state is destroyed by the time this resolves.
 */
export async function runSession(
  config: DemoConfig,
  dependencies: SessionDependencies = {},
): Promise<SessionReport> {
  const { scheduler = timerScheduler } = dependencies
  const systemConfig = createDemoSystemConfig(config, dependencies)

  const { system, errors } = await startSystem(systemConfig)

  if (errors.size > 0) {
    await haltSystem(systemConfig, system)
    throw new Error(
      `[Demo] System start failed: ${Array.from(errors.entries())
        .map(([key, error]) => `${key}: ${error.message}`)
        .join(', ')}`,
    )
  }

  const reason = await waitForEnd(system, config.durationMs, scheduler)

  // Same order the halt below would take, made explicit to collect results
  system.producer.stop()
  const join = await system.pool.shutdown()
  const snapshot = system.gameState.snapshot()

  const report: SessionReport = {
    reason,
    input: config.input,
    workers: config.workers,
    ticks: system.producer.ticks(),
    elapsedS: snapshot.elapsedS,
    score: snapshot.bird.score,
    alive: snapshot.bird.isAlive,
    commandsSubmitted: system.producer.submitted(),
    commandsProcessed: snapshot.commandsProcessed,
    channel: system.channel.stats(),
    latency: system.metrics.latency(),
    perWorker: system.metrics.perWorker(),
    join,
  }

  await haltSystem(systemConfig, system)

  return report
}
