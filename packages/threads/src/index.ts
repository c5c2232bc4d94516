/**
 * @tickline/threads
 *
 * Runs the worker pool's execution contexts on `node:worker_threads`.
 * The command channel stays on the main thread and serves every worker's
 * takes over a validated message protocol.
 *
 * Main thread:
 * ```ts
 * const pool = createThreadPool({
 *   threadCount: 4,
 *   channel,
 *   spawn: spawnFromScript(new URL('./auditWorker.ts', import.meta.url)),
 * })
 * ```
 *
 * Worker script:
 * ```ts
 * await runInWorkerThread(createConsumer(audit), playerCommandSchema)
 * ```
 */

export * from './protocol'
export * from './threadPool'
export * from './consumerWorker'
