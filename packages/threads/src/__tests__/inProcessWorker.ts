/**
 * In-process stand-in for worker threads.
 *
 * Each "thread" runs runChannelConsumer on the test's own event loop. Messages
 * hop through setImmediate as structured clones, the way a real port delivers
 * them, and the stand-in exits with code 0 once its consumer has reported.
 */

import { EventEmitter } from 'node:events'
import { vi } from 'vitest'
import type { Mock } from 'vitest'
import type { z } from 'zod'
import type { ChannelConsumer, PipelineLogger } from '@tickline/pipeline'
import { runChannelConsumer } from '@tickline/threads'
import type { ConsumerPort, SpawnWorker } from '@tickline/threads'

export type InProcessWorker = {
  workerId: number
  /** worker → main */
  toMain: EventEmitter
  /** error / exit */
  lifecycle: EventEmitter
  unref: Mock
}

const deliver = (target: EventEmitter, message: unknown) => {
  setImmediate(() => {
    target.emit('message', structuredClone(message))
  })
}

export const createInProcessSpawner = <T>(
  consumer: ChannelConsumer<T>,
  valueSchema: z.ZodType<T>,
  logger?: PipelineLogger,
) => {
  const workers: Array<InProcessWorker> = []

  const spawn: SpawnWorker = ({ workerId, threadCount }) => {
    const toMain = new EventEmitter()
    const toWorker = new EventEmitter()
    const lifecycle = new EventEmitter()
    const unref = vi.fn()

    const port: ConsumerPort = {
      postMessage: (message) => deliver(toMain, message),
      on: (event, listener) => toWorker.on(event, listener),
      off: (event, listener) => toWorker.off(event, listener),
    }

    void runChannelConsumer(consumer, {
      port,
      workerId,
      threadCount,
      valueSchema,
      logger,
    }).then(() => {
      setImmediate(() => {
        lifecycle.emit('exit', 0)
      })
    })

    workers.push({ workerId, toMain, lifecycle, unref })

    return {
      postMessage: (message) => deliver(toWorker, message),
      onMessage: (listener) => {
        toMain.on('message', listener)
      },
      onError: (listener) => {
        lifecycle.on('error', listener)
      },
      onExit: (listener) => {
        lifecycle.on('exit', listener)
      },
      unref,
    }
  }

  return { spawn, workers }
}

// Run every pending immediate (and the microtasks between them)
export const settle = async (rounds = 10) => {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve))
  }
}
