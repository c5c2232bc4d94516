/**
 * Consumer contract
 *
 * A consumer drains a channel to completion from inside one execution
 * context. It owns whatever shared state it applies values to; the pool
 * only knows this interface.
 */

import type { TakeChannel } from './commandChannel'

export type WorkerContext = {
  /** 0-based index of the execution context */
  workerId: number
  threadCount: number
}

export type ChannelConsumer<T> = {
  /**
   * Take values until `more = false`, applying each one.
   * Must not wait on anything unrelated to the channel, or join never returns.
   */
  consume: (channel: TakeChannel<T>, context: WorkerContext) => Promise<void>
}

export type ApplyFn<T> = (value: T, context: WorkerContext) => void | Promise<void>

/**
 * Build the canonical consumer: take, apply, repeat until the channel is
 * stopped and drained.
 *
 * @example
 * ```ts
 * const consumer = createConsumer<PlayerCommand>((command) => {
 *   gameState.processCommand(command)
 * })
 * ```
 */
export function createConsumer<T>(apply: ApplyFn<T>): ChannelConsumer<T> {
  return {
    consume: async (channel, context) => {
      while (true) {
        const result = await channel.take()
        if (!result.more) return
        await apply(result.value, context)
      }
    },
  }
}
