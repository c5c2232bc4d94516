/**
 * Command Channel
 *
 * Ordered handoff of opaque command values from producers to consumers.
 *
 * - `submit` never waits: it appends, or hands the value straight to the
 *   oldest waiting taker.
 * - `take` resolves with the FIFO head, or waits until a value arrives or
 *   the channel is stopped and drained.
 * - `stop` is one-shot. Every value accepted before it is still delivered;
 *   every waiting taker is released with `{ more: false }`.
 *
 * Waiting takers exist only while the pending sequence is empty, so a
 * resumed taker never has to re-check its condition: it was resumed either
 * with a value or by stop.
 *
 * A take can be aborted through an AbortSignal. The aborted taker leaves the
 * queue without consuming anything, so the next value goes to a live taker.
 */

import { z } from 'zod'
import { parseOptions } from './diagnostics'

// ============================================================================
// Types
// ============================================================================

export type TakeResult<T> = { more: true; value: T } | { more: false }

export const overflowPolicyKeywords = {
  dropOldest: 'drop-oldest',
  dropNewest: 'drop-newest',
} as const

export type OverflowPolicy =
  (typeof overflowPolicyKeywords)[keyof typeof overflowPolicyKeywords]

const channelOptionsSchema = z.object({
  /** Maximum pending values. Unbounded when omitted. */
  capacity: z.number().int().positive().optional(),
  /** Which value to discard when a bounded channel is full */
  overflow: z
    .enum([overflowPolicyKeywords.dropOldest, overflowPolicyKeywords.dropNewest])
    .default(overflowPolicyKeywords.dropOldest),
})

export type CommandChannelOptions = z.input<typeof channelOptionsSchema>

export type ChannelLifecycle =
  | { phase: 'open' }
  | { phase: 'stopped'; stoppedAt: number }

export type ChannelStats = {
  /** Values accepted by submit */
  submitted: number
  /** Values handed to a taker */
  delivered: number
  /** Submissions ignored because the channel was stopped */
  rejected: number
  /** Values discarded by the overflow policy */
  dropped: number
  pending: number
  waiting: number
}

export type TakeOptions = {
  /** Abort the wait. An aborted take resolves `{ more: false }` and consumes nothing. */
  signal?: AbortSignal
}

/**
 * The consuming side of a channel.
 * Consumers only ever see this, never submit or stop.
 */
export type TakeChannel<T> = {
  take: () => Promise<TakeResult<T>>
}

export type CommandChannel<T> = AsyncIterable<T> & {
  take: (options?: TakeOptions) => Promise<TakeResult<T>>
  submit: (value: T) => void
  /**
   * Give back a value that was taken but never applied. It goes ahead of
   * every pending value and is accepted even after stop.
   */
  requeue: (value: T) => void
  stop: () => void
  isStopped: () => boolean
  lifecycle: () => ChannelLifecycle
  /** Values waiting to be taken */
  size: () => number
  /** Takers waiting for a value */
  waiting: () => number
  stats: () => ChannelStats
}

// ============================================================================
// Implementation
// ============================================================================

const STOPPED: TakeResult<never> = Object.freeze({ more: false })

/**
 * Create a command channel
 *
 * @example
 * ```ts
 * const channel = createCommandChannel<PlayerCommand>()
 *
 * // producer
 * channel.submit(createPlayerCommand('flap'))
 *
 * // consumer
 * for await (const command of channel) {
 *   gameState.processCommand(command)
 * }
 *
 * // shutdown
 * channel.stop()
 * ```
 */
export function createCommandChannel<T>(
  options: CommandChannelOptions = {},
): CommandChannel<T> {
  const { capacity, overflow } = parseOptions(
    'CommandChannel',
    channelOptionsSchema,
    options,
  )

  const pending: Array<T> = []
  const waiters: Array<(result: TakeResult<T>) => void> = []
  let state: ChannelLifecycle = { phase: 'open' }
  const counters = { submitted: 0, delivered: 0, rejected: 0, dropped: 0 }

  const submit = (value: T) => {
    if (state.phase === 'stopped') {
      counters.rejected++
      return
    }

    counters.submitted++

    const waiter = waiters.shift()
    if (waiter) {
      counters.delivered++
      waiter({ more: true, value })
      return
    }

    if (capacity !== undefined && pending.length >= capacity) {
      counters.dropped++
      if (overflow === overflowPolicyKeywords.dropNewest) return
      pending.shift()
    }

    pending.push(value)
  }

  const requeue = (value: T) => {
    counters.delivered--

    const waiter = waiters.shift()
    if (waiter) {
      counters.delivered++
      waiter({ more: true, value })
      return
    }

    pending.unshift(value)
  }

  const take = (options: TakeOptions = {}): Promise<TakeResult<T>> => {
    const { signal } = options
    if (signal?.aborted) {
      return Promise.resolve(STOPPED)
    }

    if (pending.length > 0) {
      const result: TakeResult<T> = { more: true, value: pending[0] }
      pending.shift()
      counters.delivered++
      return Promise.resolve(result)
    }

    if (state.phase === 'stopped') {
      return Promise.resolve(STOPPED)
    }

    if (!signal) {
      return new Promise((resolve) => {
        waiters.push(resolve)
      })
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        const index = waiters.indexOf(waiter)
        if (index === -1) return
        waiters.splice(index, 1)
        resolve(STOPPED)
      }

      const waiter = (result: TakeResult<T>) => {
        signal.removeEventListener('abort', onAbort)
        resolve(result)
      }

      waiters.push(waiter)
      signal.addEventListener('abort', onAbort, { once: true })
    })
  }

  const stop = () => {
    if (state.phase === 'stopped') return

    state = { phase: 'stopped', stoppedAt: Date.now() }

    // Waiters only exist while nothing is pending: release all of them
    const released = waiters.splice(0, waiters.length)
    released.forEach((resolve) => resolve(STOPPED))
  }

  return {
    submit,
    requeue,
    take,
    stop,
    isStopped: () => state.phase === 'stopped',
    lifecycle: () => state,
    size: () => pending.length,
    waiting: () => waiters.length,
    stats: () => ({
      ...counters,
      pending: pending.length,
      waiting: waiters.length,
    }),
    async *[Symbol.asyncIterator]() {
      while (true) {
        const result = await take()
        if (!result.more) return
        yield result.value
      }
    },
  }
}
