/**
 * Worker Pool
 *
 * Owns a fixed set of execution contexts that each run one consumer against
 * one channel, exactly once, for their whole lifetime.
 *
 * Lifecycle: idle → running → joined | detached
 *
 * Shutdown sequence the owner must follow:
 *   channel.stop() → await pool.join() → release the channel → release shared state
 *
 * After join resolves, no context launched by this pool is still running.
 * Teardown without join is a misuse: still-running contexts are detached and
 * left to finish on their own, untracked, and a warning is logged.
 */

import { z } from 'zod'
import type { CommandChannel } from './commandChannel'
import type { ChannelConsumer, WorkerContext } from './consumer'
import { consoleLogger, parseOptions, toError } from './diagnostics'
import type { PipelineLogger } from './diagnostics'

// ============================================================================
// Types
// ============================================================================

export const poolStatusKeywords = {
  idle: 'idle',
  running: 'running',
  joined: 'joined',
  detached: 'detached',
} as const

export type PoolStatus =
  (typeof poolStatusKeywords)[keyof typeof poolStatusKeywords]

export type WorkerFailure = {
  workerId: number
  error: Error
}

export type JoinReport =
  | {
      status: 'joined'
      /** Contexts that returned normally */
      joined: number
      /** Contexts whose consumer rejected. Logged, never rethrown. */
      failures: Array<WorkerFailure>
    }
  | { status: 'already-joined' }

export type TeardownOutcome =
  | { status: 'idle' }
  | { status: 'joined' }
  | { status: 'detached'; detached: number }

export type WorkerPoolOptions<T> = {
  threadCount: number
  channel: CommandChannel<T>
  consumer: ChannelConsumer<T>
  logger?: PipelineLogger
}

export type WorkerPool = {
  /** Launch every execution context. Only the first call has an effect. */
  start: () => void
  /** Resolve once every context has returned. Later calls resolve immediately. */
  join: () => Promise<JoinReport>
  /** Teardown. Never waits, never throws. */
  dispose: () => TeardownOutcome
  status: () => PoolStatus
  threadCount: () => number
  /** Tracked contexts that have not returned yet (detached ones are untracked) */
  activeCount: () => number
}

/**
 * One launched execution context, as the pool tracks it.
 * Backends (async tasks, OS threads) differ only in how they produce these.
 */
export type ExecutionContext = {
  workerId: number
  /** Never rejects: a failing context resolves with its failure */
  done: Promise<WorkerFailure | null>
  isSettled: () => boolean
  /** Stop tracking: the context runs on without holding the process */
  detach?: () => void
}

export type ExecutionPoolOptions = {
  /** Log prefix and error label */
  component: string
  threadCount: number
  launch: (context: WorkerContext) => ExecutionContext
  logger?: PipelineLogger
}

const poolOptionsSchema = z.object({
  threadCount: z.number().int().positive(),
})

// ============================================================================
// Implementation
// ============================================================================

/**
 * Pool lifecycle shared by every backend: start / join / dispose over a
 * fixed number of execution contexts produced by `launch`.
 */
export function createExecutionPool(options: ExecutionPoolOptions): WorkerPool {
  const { component, launch, logger = consoleLogger } = options
  const { threadCount } = parseOptions(component, poolOptionsSchema, {
    threadCount: options.threadCount,
  })

  let status: PoolStatus = poolStatusKeywords.idle
  let contexts: Array<ExecutionContext> = []
  let joinRequested = false
  let teardown: TeardownOutcome | null = null

  const start = () => {
    if (status !== poolStatusKeywords.idle || joinRequested) {
      logger.warn(`[${component}] start() ignored: pool is ${status}`)
      return
    }

    status = poolStatusKeywords.running
    for (let workerId = 0; workerId < threadCount; workerId++) {
      contexts.push(launch({ workerId, threadCount }))
    }
  }

  const join = async (): Promise<JoinReport> => {
    // Flag flips before the first await: concurrent callers return at once
    if (joinRequested) return { status: 'already-joined' }
    joinRequested = true

    const outcomes = await Promise.all(contexts.map((entry) => entry.done))
    const failures = outcomes.filter(
      (outcome): outcome is WorkerFailure => outcome !== null,
    )

    failures.forEach(({ workerId, error }) => {
      logger.error(`[${component}] Worker ${workerId} failed:`, error)
    })

    // A dispose() racing this join already detached the contexts
    if (status !== poolStatusKeywords.detached) {
      status = poolStatusKeywords.joined
      contexts = []
    }

    return {
      status: 'joined',
      joined: outcomes.length - failures.length,
      failures,
    }
  }

  const dispose = (): TeardownOutcome => {
    if (teardown) return teardown

    if (status === poolStatusKeywords.joined) {
      teardown = { status: 'joined' }
      return teardown
    }

    if (status === poolStatusKeywords.idle) {
      teardown = { status: 'idle' }
      return teardown
    }

    const live = contexts.filter((entry) => !entry.isSettled())
    status = poolStatusKeywords.detached
    contexts = []

    logger.warn(
      `[${component}] Disposed without join(); detaching ${live.length} running worker(s)`,
    )

    // Detached contexts run to completion untracked; failures still surface
    live.forEach((entry) => {
      entry.detach?.()
      void entry.done.then((failure) => {
        if (failure) {
          logger.error(
            `[${component}] Detached worker ${failure.workerId} failed:`,
            failure.error,
          )
        }
      })
    })

    teardown = { status: 'detached', detached: live.length }
    return teardown
  }

  return {
    start,
    join,
    dispose,
    status: () => status,
    threadCount: () => threadCount,
    activeCount: () => contexts.filter((entry) => !entry.isSettled()).length,
  }
}

/**
 * Create a worker pool bound to one channel and one consumer.
 * Each execution context is an async task on the current thread.
 * Nothing runs until start().
 *
 * @example
 * ```ts
 * const channel = createCommandChannel<PlayerCommand>()
 * const pool = createWorkerPool({
 *   threadCount: 4,
 *   channel,
 *   consumer: createConsumer((command) => {
 *     gameState.processCommand(command)
 *   }),
 * })
 *
 * pool.start()
 * // ... producer submits ...
 * channel.stop()
 * await pool.join()
 * gameState.destroy()
 * ```
 */
export function createWorkerPool<T>(options: WorkerPoolOptions<T>): WorkerPool {
  const { threadCount, channel, consumer, logger } = options

  return createExecutionPool({
    component: 'WorkerPool',
    threadCount,
    logger,
    launch: (context) => {
      let settled = false

      // Deferred to a microtask so a consumer that throws synchronously
      // fails the same way as one that rejects
      const done = Promise.resolve()
        .then(() => consumer.consume(channel, context))
        .then(
          () => null,
          (error: unknown): WorkerFailure => ({
            workerId: context.workerId,
            error: toError(error),
          }),
        )
        .finally(() => {
          settled = true
        })

      return { workerId: context.workerId, done, isSettled: () => settled }
    },
  })
}
