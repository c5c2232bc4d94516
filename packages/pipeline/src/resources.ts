/**
 * Pipeline Resources
 *
 * Braided resources for the channel and the pool.
 *
 * Braided halts resources in reverse dependency order, so a system where
 *   producer → channel, pool → channel + shared state
 * halts the producer first, then stops the channel and joins the pool, and
 * only then releases the shared state the consumers were touching.
 */

import { defineResource } from 'braided'
import { createCommandChannel } from './commandChannel'
import type { CommandChannel, CommandChannelOptions } from './commandChannel'
import type { ChannelConsumer } from './consumer'
import type { PipelineLogger } from './diagnostics'
import { createWorkerPool } from './workerPool'
import type { JoinReport, WorkerPool } from './workerPool'

/**
 * Run the required shutdown sequence: stop the channel, then wait for every
 * execution context. Shared state may be released once this resolves.
 */
export const shutdownPipeline = (
  channel: { stop: () => void },
  pool: WorkerPool,
): Promise<JoinReport> => {
  channel.stop()
  return pool.join()
}

/**
 * Create a Braided resource for a command channel.
 * Halting stops the channel (idempotent).
 */
export function createCommandChannelResource<T>(
  options: CommandChannelOptions = {},
) {
  return defineResource({
    start: () => createCommandChannel<T>(options),
    halt: (channel: CommandChannel<T>) => {
      channel.stop()
    },
  })
}

export type WorkerPoolResourceOptions<T, TDeps extends { channel: CommandChannel<T> }> = {
  /** Resource ids this pool depends on. Must include `channel`. */
  dependencies: Array<keyof TDeps & string>
  threadCount: number
  /** Build the consumer from the started dependencies (shared state lives there) */
  createConsumer: (deps: TDeps) => ChannelConsumer<T>
  logger?: PipelineLogger
}

export type WorkerPoolResource = WorkerPool & {
  /** stop → join, see shutdownPipeline */
  shutdown: () => Promise<JoinReport>
}

/**
 * Create a Braided resource for a worker pool.
 * Starting launches every execution context; halting runs stop → join.
 *
 * @example
 * ```ts
 * const pool = createWorkerPoolResource({
 *   dependencies: ['channel', 'gameState'],
 *   threadCount: 4,
 *   createConsumer: ({ gameState }: { channel: CommandChannel<PlayerCommand>; gameState: GameState }) =>
 *     createConsumer((command) => {
 *       gameState.processCommand(command)
 *     }),
 * })
 * ```
 */
export function createWorkerPoolResource<
  T,
  TDeps extends { channel: CommandChannel<T> },
>(options: WorkerPoolResourceOptions<T, TDeps>) {
  const { dependencies, threadCount, createConsumer, logger } = options

  return defineResource({
    dependencies,
    start: (deps: TDeps): WorkerPoolResource => {
      const pool = createWorkerPool({
        threadCount,
        channel: deps.channel,
        consumer: createConsumer(deps),
        logger,
      })
      pool.start()

      return {
        ...pool,
        shutdown: () => shutdownPipeline(deps.channel, pool),
      }
    },
    halt: async (pool: WorkerPoolResource) => {
      await pool.shutdown()
    },
  })
}
