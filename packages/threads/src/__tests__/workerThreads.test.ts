/**
 * node:worker_threads Adapter Tests
 *
 * The module is mocked: these tests check how spawnFromScript and
 * runInWorkerThread wire into Worker, parentPort and workerData.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { createConsumer } from '@tickline/pipeline'
import { runInWorkerThread, spawnFromScript } from '@tickline/threads'
import { settle } from './inProcessWorker'

type Listener = (payload: unknown) => void

const fakes = vi.hoisted(() => {
  const createEmitter = () => {
    const listeners = new Map<string, Array<Listener>>()
    return {
      on: (event: string, listener: Listener) => {
        listeners.set(event, [...(listeners.get(event) ?? []), listener])
      },
      off: (event: string, listener: Listener) => {
        listeners.set(
          event,
          (listeners.get(event) ?? []).filter((entry) => entry !== listener),
        )
      },
      emit: (event: string, payload: unknown) => {
        for (const listener of listeners.get(event) ?? []) listener(payload)
      },
      listenerCount: (event: string) => (listeners.get(event) ?? []).length,
    }
  }

  const createFakeWorker = () => ({
    ...createEmitter(),
    postMessage: vi.fn(),
    unref: vi.fn(),
  })

  const workers: Array<ReturnType<typeof createFakeWorker>> = []

  return {
    workers,
    Worker: vi.fn(function () {
      const worker = createFakeWorker()
      workers.push(worker)
      return worker
    }),
    parentPort: { ...createEmitter(), postMessage: vi.fn() },
    workerData: { workerId: 1, threadCount: 2 },
  }
})

vi.mock('node:worker_threads', () => ({
  Worker: fakes.Worker,
  parentPort: fakes.parentPort,
  workerData: fakes.workerData,
}))

describe('spawnFromScript', () => {
  beforeEach(() => {
    fakes.workers.length = 0
    fakes.Worker.mockClear()
  })

  it('should start the script with the worker context as workerData', () => {
    const spawn = spawnFromScript('/opt/tickline/auditWorker.js', {
      execArgv: ['--import', 'tsx'],
    })

    spawn({ workerId: 3, threadCount: 4 })

    expect(fakes.Worker).toHaveBeenCalledWith('/opt/tickline/auditWorker.js', {
      workerData: { workerId: 3, threadCount: 4 },
      execArgv: ['--import', 'tsx'],
    })
  })

  it('should adapt the worker to a handle', () => {
    const handle = spawnFromScript('/opt/tickline/auditWorker.js')({
      workerId: 0,
      threadCount: 1,
    })
    const worker = fakes.workers[0]
    if (!worker) throw new Error('worker was not constructed')

    const onMessage = vi.fn()
    const onError = vi.fn()
    const onExit = vi.fn()
    handle.onMessage(onMessage)
    handle.onError(onError)
    handle.onExit(onExit)

    handle.postMessage({ type: 'take/stopped', requestId: 4 })
    expect(worker.postMessage).toHaveBeenCalledWith({ type: 'take/stopped', requestId: 4 })

    worker.emit('message', { type: 'consumer/done' })
    worker.emit('exit', 0)
    expect(onMessage).toHaveBeenCalledWith({ type: 'consumer/done' })
    expect(onError).not.toHaveBeenCalled()
    expect(onExit).toHaveBeenCalledWith(0)

    handle.unref()
    expect(worker.unref).toHaveBeenCalledTimes(1)
  })
})

describe('runInWorkerThread', () => {
  it('should consume through parentPort using workerData', async () => {
    const seen: Array<number> = []

    const running = runInWorkerThread(
      createConsumer<number>((value) => {
        seen.push(value)
      }),
      z.number(),
    )

    expect(fakes.parentPort.postMessage).toHaveBeenNthCalledWith(1, {
      type: 'consumer/ready',
      workerId: 1,
      timestamp: expect.any(Number),
    })
    expect(fakes.parentPort.postMessage).toHaveBeenNthCalledWith(2, {
      type: 'take/request',
      requestId: 0,
    })

    fakes.parentPort.emit('message', { type: 'take/value', requestId: 0, value: 8 })
    await settle(1)
    fakes.parentPort.emit('message', { type: 'take/stopped', requestId: 1 })
    await running

    expect(seen).toEqual([8])
    expect(fakes.parentPort.postMessage).toHaveBeenLastCalledWith({ type: 'consumer/done' })
    expect(fakes.parentPort.listenerCount('message')).toBe(0)
  })
})
