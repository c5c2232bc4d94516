/**
 * Thread Pool
 *
 * A worker pool whose execution contexts are `node:worker_threads` workers.
 * The channel stays on the main thread: every worker asks for values with
 * `take/request` and the pool answers from `channel.take()`, so delivery
 * keeps the channel's single-owner FIFO and exactly-once guarantees.
 *
 * Join waits for every worker to exit. Dispose without join unrefs the
 * still-running workers so the process may exit without them.
 *
 * A worker that exits abandons its outstanding takes: they are aborted, and a
 * value already handed to the dead worker goes back to the head of the channel.
 */

import { Worker } from 'node:worker_threads'
import { consoleLogger, createExecutionPool } from '@tickline/pipeline'
import type {
  CommandChannel,
  ExecutionContext,
  PipelineLogger,
  WorkerContext,
  WorkerFailure,
  WorkerPool,
} from '@tickline/pipeline'
import { eventKeywords, workerEventSchema } from './protocol'
import type { ConsumerWorkerData, MainEvent } from './protocol'

// ============================================================================
// Types
// ============================================================================

/**
 * The slice of a worker thread the pool talks to.
 * Adapted from `Worker` by spawnFromScript; tests provide in-process stand-ins.
 */
export type WorkerHandle = {
  postMessage: (message: MainEvent) => void
  onMessage: (listener: (message: unknown) => void) => void
  onError: (listener: (error: Error) => void) => void
  onExit: (listener: (exitCode: number) => void) => void
  /** Let the process exit while this worker still runs */
  unref: () => void
}

export type SpawnWorker = (context: WorkerContext) => WorkerHandle

export type ThreadPoolOptions<T> = {
  threadCount: number
  channel: CommandChannel<T>
  spawn: SpawnWorker
  logger?: PipelineLogger
}

export type SpawnFromScriptOptions = {
  /** Node flags for each thread, e.g. a TypeScript loader */
  execArgv?: Array<string>
}

// ============================================================================
// Spawning
// ============================================================================

/**
 * Build a spawner that starts `scriptUrl` once per execution context.
 * The script receives `{ workerId, threadCount }` as `workerData` and is
 * expected to call runInWorkerThread.
 *
 * @example
 * ```ts
 * const spawn = spawnFromScript(new URL('./auditWorker.ts', import.meta.url), {
 *   execArgv: ['--import', 'tsx'],
 * })
 * ```
 */
export const spawnFromScript =
  (scriptUrl: URL | string, options: SpawnFromScriptOptions = {}): SpawnWorker =>
  ({ workerId, threadCount }) => {
    const workerData: ConsumerWorkerData = { workerId, threadCount }
    const worker = new Worker(scriptUrl, {
      workerData,
      execArgv: options.execArgv,
    })

    return {
      postMessage: (message) => worker.postMessage(message),
      onMessage: (listener) => {
        worker.on('message', listener)
      },
      onError: (listener) => {
        worker.on('error', listener)
      },
      onExit: (listener) => {
        worker.on('exit', listener)
      },
      unref: () => worker.unref(),
    }
  }

// ============================================================================
// Implementation
// ============================================================================

/**
 * Create a pool of worker threads draining one main-thread channel.
 * Same start / join / dispose contract as createWorkerPool.
 */
export function createThreadPool<T>(options: ThreadPoolOptions<T>): WorkerPool {
  const { threadCount, channel, spawn, logger = consoleLogger } = options

  const launch = ({ workerId, threadCount }: WorkerContext): ExecutionContext => {
    const handle = spawn({ workerId, threadCount })
    let settled = false
    let failure: Error | null = null
    const takes = new AbortController()

    const answerTake = (requestId: number) => {
      void channel.take({ signal: takes.signal }).then((result) => {
        if (settled) {
          if (result.more) {
            logger.warn(
              `[ThreadPool] Worker ${workerId} exited before receiving a value; value requeued`,
            )
            channel.requeue(result.value)
          }
          return
        }

        handle.postMessage(
          result.more
            ? { type: eventKeywords.takeValue, requestId, value: result.value }
            : { type: eventKeywords.takeStopped, requestId },
        )
      })
    }

    handle.onMessage((message) => {
      const parsed = workerEventSchema.safeParse(message)
      if (!parsed.success) {
        logger.warn(
          `[ThreadPool] Ignoring invalid message from worker ${workerId}:`,
          parsed.error.message,
        )
        return
      }

      const event = parsed.data
      switch (event.type) {
        case eventKeywords.takeRequest:
          answerTake(event.requestId)
          return
        case eventKeywords.consumerError:
          failure = new Error(event.error)
          return
        case eventKeywords.consumerReady:
        case eventKeywords.consumerDone:
          return
      }
    })

    handle.onError((error) => {
      failure = error
      logger.error(`[ThreadPool] Worker ${workerId} error:`, error)
    })

    const done = new Promise<WorkerFailure | null>((resolve) => {
      handle.onExit((exitCode) => {
        settled = true
        takes.abort()

        if (failure) {
          resolve({ workerId, error: failure })
        } else if (exitCode !== 0) {
          resolve({
            workerId,
            error: new Error(`Worker ${workerId} exited with code ${exitCode}`),
          })
        } else {
          resolve(null)
        }
      })
    })

    return {
      workerId,
      done,
      isSettled: () => settled,
      detach: () => handle.unref(),
    }
  }

  return createExecutionPool({
    component: 'ThreadPool',
    threadCount,
    logger,
    launch,
  })
}
