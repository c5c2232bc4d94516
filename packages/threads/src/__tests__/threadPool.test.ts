/**
 * Thread Pool Tests
 *
 * Worker threads are replaced by in-process stand-ins speaking the same
 * message protocol.
 */

import { describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { createCommandChannel, createConsumer } from '@tickline/pipeline'
import type { ChannelConsumer, PipelineLogger } from '@tickline/pipeline'
import { createThreadPool } from '@tickline/threads'
import { createInProcessSpawner, settle } from './inProcessWorker'

const createTestLogger = () => {
  const logger = { warn: vi.fn(), error: vi.fn() } satisfies PipelineLogger
  return logger
}

describe('createThreadPool', () => {
  it('should deliver every value to exactly one thread', async () => {
    const channel = createCommandChannel<number>()
    const seen: Array<number> = []
    const perWorker = new Map<number, number>()

    const { spawn } = createInProcessSpawner(
      createConsumer<number>((value, { workerId }) => {
        seen.push(value)
        perWorker.set(workerId, (perWorker.get(workerId) ?? 0) + 1)
      }),
      z.number(),
    )

    const pool = createThreadPool({ threadCount: 4, channel, spawn })
    pool.start()

    for (let i = 0; i < 200; i++) channel.submit(i)
    channel.stop()

    const report = await pool.join()

    expect(report).toEqual({ status: 'joined', joined: 4, failures: [] })
    expect(seen).toHaveLength(200)
    expect([...seen].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 200 }, (_, i) => i),
    )
    expect(perWorker.size).toBe(4)
    expect(pool.status()).toBe('joined')
  })

  it('should join promptly when the channel was stopped before start', async () => {
    const channel = createCommandChannel<number>()
    channel.stop()

    const { spawn } = createInProcessSpawner(
      createConsumer<number>(() => {}),
      z.number(),
    )
    const pool = createThreadPool({ threadCount: 3, channel, spawn })

    pool.start()

    expect(await pool.join()).toEqual({ status: 'joined', joined: 3, failures: [] })
  })

  it('should report a consumer error sent by a thread', async () => {
    const logger = createTestLogger()
    const channel = createCommandChannel<number>()

    const { spawn } = createInProcessSpawner(
      createConsumer<number>((_value, { workerId }) => {
        if (workerId === 0) throw new Error('bad command')
      }),
      z.number(),
    )
    const pool = createThreadPool({ threadCount: 2, channel, spawn, logger })

    pool.start()
    for (let i = 0; i < 4; i++) channel.submit(i)
    channel.stop()

    const report = await pool.join()

    expect(report.status).toBe('joined')
    if (report.status !== 'joined') return
    expect(report.joined).toBe(1)
    expect(report.failures.map(({ workerId, error }) => [workerId, error.message])).toEqual([
      [0, 'bad command'],
    ])
    expect(logger.error).toHaveBeenCalledWith(
      '[ThreadPool] Worker 0 failed:',
      report.failures[0]?.error,
    )
  })

  it('should report a thread that crashes', async () => {
    const logger = createTestLogger()
    const channel = createCommandChannel<number>()
    const crash = new Error('thread crashed')

    const consumer: ChannelConsumer<number> = {
      consume: async (source, { workerId }) => {
        // Thread 0 never finishes on its own
        if (workerId === 0) await new Promise<void>(() => {})
        while ((await source.take()).more) {
          // drain
        }
      },
    }

    const { spawn, workers } = createInProcessSpawner(consumer, z.number(), logger)
    const pool = createThreadPool({ threadCount: 2, channel, spawn, logger })

    pool.start()
    workers[0]?.lifecycle.emit('error', crash)
    workers[0]?.lifecycle.emit('exit', 1)
    channel.stop()

    expect(await pool.join()).toEqual({
      status: 'joined',
      joined: 1,
      failures: [{ workerId: 0, error: crash }],
    })
    expect(logger.error).toHaveBeenCalledWith('[ThreadPool] Worker 0 error:', crash)
  })

  it('should route values past a thread that exits while waiting', async () => {
    const logger = createTestLogger()
    const channel = createCommandChannel<number>()
    const crash = new Error('thread crashed')
    const seen: Array<[number, number]> = []

    const { spawn, workers } = createInProcessSpawner(
      createConsumer<number>((value, { workerId }) => {
        seen.push([workerId, value])
      }),
      z.number(),
    )
    const pool = createThreadPool({ threadCount: 2, channel, spawn, logger })

    pool.start()
    await settle()
    expect(channel.waiting()).toBe(2)

    workers[0]?.lifecycle.emit('error', crash)
    workers[0]?.lifecycle.emit('exit', 1)
    expect(channel.waiting()).toBe(1)

    channel.submit(1)
    channel.submit(2)
    channel.stop()

    expect(await pool.join()).toEqual({
      status: 'joined',
      joined: 1,
      failures: [{ workerId: 0, error: crash }],
    })
    expect(seen).toEqual([
      [1, 1],
      [1, 2],
    ])
  })

  it('should requeue a value handed to a thread that just exited', async () => {
    const logger = createTestLogger()
    const channel = createCommandChannel<number>()
    const seen: Array<[number, number]> = []

    const { spawn, workers } = createInProcessSpawner(
      createConsumer<number>((value, { workerId }) => {
        seen.push([workerId, value])
      }),
      z.number(),
    )
    const pool = createThreadPool({ threadCount: 2, channel, spawn, logger })

    pool.start()
    await settle()

    // Thread 0 asked first, so it receives the value, then exits before
    // the reply can be posted
    channel.submit(1)
    workers[0]?.lifecycle.emit('exit', 1)
    await settle()
    expect(channel.size()).toBe(0)
    channel.stop()

    const report = await pool.join()

    expect(seen).toEqual([[1, 1]])
    expect(logger.warn).toHaveBeenCalledWith(
      '[ThreadPool] Worker 0 exited before receiving a value; value requeued',
    )
    expect(report.status).toBe('joined')
    if (report.status !== 'joined') return
    expect(report.joined).toBe(1)
    expect(report.failures.map(({ workerId, error }) => [workerId, error.message])).toEqual([
      [0, 'Worker 0 exited with code 1'],
    ])
  })

  it('should report a non-zero exit code', async () => {
    const channel = createCommandChannel<number>()
    const consumer: ChannelConsumer<number> = {
      consume: () => new Promise<void>(() => {}),
    }

    const { spawn, workers } = createInProcessSpawner(consumer, z.number())
    const pool = createThreadPool({
      threadCount: 1,
      channel,
      spawn,
      logger: createTestLogger(),
    })

    pool.start()
    workers[0]?.lifecycle.emit('exit', 3)

    const report = await pool.join()

    expect(report.status).toBe('joined')
    if (report.status !== 'joined') return
    expect(report.failures[0]?.error.message).toBe('Worker 0 exited with code 3')
  })

  it('should ignore invalid messages from a thread', async () => {
    const logger = createTestLogger()
    const channel = createCommandChannel<number>()
    const { spawn, workers } = createInProcessSpawner(
      createConsumer<number>(() => {}),
      z.number(),
    )
    const pool = createThreadPool({ threadCount: 1, channel, spawn, logger })

    pool.start()
    workers[0]?.toMain.emit('message', { type: 'take/request', requestId: -1 })
    channel.stop()

    expect(await pool.join()).toEqual({ status: 'joined', joined: 1, failures: [] })
    expect(logger.warn).toHaveBeenCalledWith(
      '[ThreadPool] Ignoring invalid message from worker 0:',
      expect.any(String),
    )
  })

  it('should skip values that fail the thread-side schema', async () => {
    const logger = createTestLogger()
    const channel = createCommandChannel<unknown>()
    const seen: Array<number> = []

    const { spawn } = createInProcessSpawner(
      createConsumer<number>((value) => {
        seen.push(value)
      }),
      z.number(),
      logger,
    )
    const pool = createThreadPool({ threadCount: 1, channel, spawn, logger })

    pool.start()
    channel.submit('not a number')
    channel.submit(7)
    channel.stop()
    await pool.join()

    expect(seen).toEqual([7])
    expect(logger.warn).toHaveBeenCalledWith(
      '[ConsumerWorker 0] Skipping invalid value:',
      expect.any(String),
    )
  })

  it('should unref running threads when disposed without join', async () => {
    const logger = createTestLogger()
    const channel = createCommandChannel<number>()
    const { spawn, workers } = createInProcessSpawner(
      createConsumer<number>(() => {}),
      z.number(),
    )
    const pool = createThreadPool({ threadCount: 2, channel, spawn, logger })

    pool.start()
    await settle()
    expect(channel.waiting()).toBe(2)

    expect(pool.dispose()).toEqual({ status: 'detached', detached: 2 })
    expect(workers.map(({ unref }) => unref.mock.calls.length)).toEqual([1, 1])
    expect(logger.warn).toHaveBeenCalledWith(
      '[ThreadPool] Disposed without join(); detaching 2 running worker(s)',
    )

    // Detached threads still wind down once the channel stops
    channel.stop()
    await settle()
    expect(channel.waiting()).toBe(0)
  })
})
