/**
 * @tickline/pipeline
 *
 * Ordered, exactly-once handoff of opaque command values from one producer
 * to a fixed set of consumers, with a shutdown protocol that guarantees no
 * consumer is still running once join resolves.
 *
 * @example
 * ```ts
 * import { createCommandChannel, createConsumer, createWorkerPool } from '@tickline/pipeline'
 *
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
 * channel.submit(createPlayerCommand('flap'))
 *
 * channel.stop()
 * await pool.join()
 * gameState.destroy()
 * ```
 */

// ============================================================================
// Command Channel
// ============================================================================

export * from './commandChannel'

// ============================================================================
// Worker Pool
// ============================================================================

export * from './consumer'
export * from './workerPool'

// ============================================================================
// Resources
// ============================================================================

export * from './resources'

// ============================================================================
// Diagnostics
// ============================================================================

export * from './diagnostics'
