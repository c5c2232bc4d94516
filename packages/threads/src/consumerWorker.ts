/**
 * Consumer Worker
 *
 * Worker-thread side of the thread pool. Builds a TakeChannel whose takes
 * are served by the main thread, runs one consumer over it, reports how the
 * consumer ended, then stops listening so the thread can exit.
 */

import { parentPort, workerData } from 'node:worker_threads'
import { z } from 'zod'
import { consoleLogger, toError } from '@tickline/pipeline'
import type {
  ChannelConsumer,
  PipelineLogger,
  TakeChannel,
  TakeResult,
} from '@tickline/pipeline'
import { eventKeywords, mainEventSchema, workerDataSchema } from './protocol'
import type { WorkerEvent } from './protocol'

/**
 * The message port a consumer talks through.
 * `parentPort` satisfies it inside a worker thread.
 */
export type ConsumerPort = {
  postMessage: (message: WorkerEvent) => void
  on: (event: 'message', listener: (message: unknown) => void) => unknown
  off: (event: 'message', listener: (message: unknown) => void) => unknown
}

export type RunChannelConsumerOptions<T> = {
  port: ConsumerPort
  workerId: number
  threadCount: number
  /** Values are validated on arrival; invalid ones are skipped */
  valueSchema: z.ZodType<T>
  logger?: PipelineLogger
}

/**
 * Run a consumer against the main thread's channel.
 * Never rejects: a failing consumer is reported with `consumer/error`.
 */
export async function runChannelConsumer<T>(
  consumer: ChannelConsumer<T>,
  options: RunChannelConsumerOptions<T>,
): Promise<void> {
  const { port, workerId, threadCount, valueSchema, logger = consoleLogger } = options

  const requests = new Map<number, (result: TakeResult<T>) => void>()
  let nextRequestId = 0
  let stopped = false

  const request = (resolve: (result: TakeResult<T>) => void) => {
    const requestId = nextRequestId++
    requests.set(requestId, resolve)
    port.postMessage({ type: eventKeywords.takeRequest, requestId })
  }

  const handleMessage = (message: unknown) => {
    const parsed = mainEventSchema.safeParse(message)
    if (!parsed.success) {
      logger.warn(
        `[ConsumerWorker ${workerId}] Ignoring invalid message:`,
        parsed.error.message,
      )
      return
    }

    const event = parsed.data
    const resolve = requests.get(event.requestId)
    if (!resolve) {
      logger.warn(
        `[ConsumerWorker ${workerId}] No take waiting for request ${event.requestId}`,
      )
      return
    }
    requests.delete(event.requestId)

    if (event.type === eventKeywords.takeStopped) {
      stopped = true
      resolve({ more: false })
      return
    }

    const value = valueSchema.safeParse(event.value)
    if (!value.success) {
      logger.warn(
        `[ConsumerWorker ${workerId}] Skipping invalid value:`,
        value.error.message,
      )
      request(resolve)
      return
    }

    resolve({ more: true, value: value.data })
  }

  const channel: TakeChannel<T> = {
    take: () =>
      stopped
        ? Promise.resolve<TakeResult<T>>({ more: false })
        : new Promise<TakeResult<T>>((resolve) => request(resolve)),
  }

  port.on('message', handleMessage)
  port.postMessage({
    type: eventKeywords.consumerReady,
    workerId,
    timestamp: Date.now(),
  })

  try {
    await consumer.consume(channel, { workerId, threadCount })
    port.postMessage({ type: eventKeywords.consumerDone })
  } catch (error) {
    port.postMessage({
      type: eventKeywords.consumerError,
      error: toError(error).message,
    })
  } finally {
    port.off('message', handleMessage)
  }
}

/**
 * Entry point for a script started by spawnFromScript.
 *
 * @example
 * ```ts
 * // auditWorker.ts
 * await runInWorkerThread(
 *   createConsumer((command) => audit(command)),
 *   playerCommandSchema,
 * )
 * ```
 */
export function runInWorkerThread<T>(
  consumer: ChannelConsumer<T>,
  valueSchema: z.ZodType<T>,
): Promise<void> {
  if (!parentPort) {
    throw new Error('[ConsumerWorker] runInWorkerThread() called outside a worker thread')
  }

  const { workerId, threadCount } = workerDataSchema.parse(workerData)

  return runChannelConsumer(consumer, {
    port: parentPort,
    workerId,
    threadCount,
    valueSchema,
  })
}
