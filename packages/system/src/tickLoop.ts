/**
 * Fixed-Rate Tick Loop
 *
 * A reusable abstraction for any frame-based producer (game loop, input poller,
 * simulation step) running under Node.
 * Ticks at a target rate with pause/resume and error handling.
 *
 * Philosophy:
 * - Generic context type for maximum flexibility
 * - Lifecycle hooks (beforeTick, afterTick) for custom logic
 * - Deadline-based scheduling, no drift accumulation
 * - Clean state management (running, paused)
 * - Error handling with recovery
 */

/**
 * Time source and timer used by the loop.
 * Swappable so tests can drive ticks by hand.
 * `schedule` returns a function that cancels the pending callback.
 */
export type TickScheduler = {
  now: () => number
  schedule: (callback: () => void, delayMs: number) => () => void
}

export const timerScheduler: TickScheduler = {
  now: () => performance.now(),
  schedule: (callback, delayMs) => {
    const timer = setTimeout(callback, delayMs)
    return () => clearTimeout(timer)
  },
}

export type TickLoopOptions<TContext> = {
  /**
   * Factory function to create the tick context
   * Called once when the loop first starts
   */
  createContext: () => TContext

  /**
   * Optional hook called before each tick
   * Use for input sampling, command production, etc.
   */
  beforeTick?: (context: TContext, timestamp: number, deltaMs: number) => void

  /**
   * Optional hook called after each tick
   * Use for simulation steps, reporting, etc.
   */
  afterTick?: (context: TContext, timestamp: number, deltaMs: number) => void

  /**
   * Optional error handler
   * Called when beforeTick or afterTick throws
   */
  onError?: (error: Error) => void

  /**
   * Target tick rate in Hz (default 60)
   */
  targetHz?: number

  scheduler?: TickScheduler
}

export type TickLoopAPI<TContext = unknown> = {
  /**
   * Start the loop
   * Safe to call multiple times (idempotent)
   */
  start: () => void

  /**
   * Stop the loop
   * Cancels the pending tick and resets state
   */
  stop: () => void

  /**
   * Pause the loop
   * Cancels the pending tick but keeps the context
   */
  pause: () => void

  /**
   * Resume from paused state
   */
  resume: () => void

  isRunning: () => boolean

  isPaused: () => boolean

  /**
   * Number of ticks executed since creation
   */
  tickCount: () => number

  /**
   * Get the current context
   * Returns null if loop hasn't started yet
   */
  getContext: () => TContext | null
}

/**
 * Create a fixed-rate tick loop
 *
 * @example
 * ```typescript
 * const loop = createTickLoop({
 *   createContext: () => ({ gameState, channel }),
 *   beforeTick: (context) => {
 *     if (input.poll()) context.channel.submit(createPlayerCommand('flap'))
 *   },
 *   afterTick: (context, _timestamp, deltaMs) => {
 *     context.gameState.updatePhysics(deltaMs / 1000)
 *   },
 *   targetHz: 120,
 * })
 *
 * loop.start()
 * ```
 */
export function createTickLoop<TContext>(
  options: TickLoopOptions<TContext>,
): TickLoopAPI<TContext> {
  const {
    createContext,
    beforeTick,
    afterTick,
    onError,
    targetHz = 60,
    scheduler = timerScheduler,
  } = options

  if (!(targetHz > 0)) {
    throw new RangeError(`[TickLoop] targetHz must be positive, got ${targetHz}`)
  }

  const intervalMs = 1000 / targetHz

  // State
  let running = false
  let paused = false
  let cancelTick: (() => void) | null = null
  let context: TContext | null = null
  let lastTimestamp: number | null = null
  let nextDeadline = 0
  let ticks = 0

  const scheduleNext = () => {
    const now = scheduler.now()
    nextDeadline += intervalMs

    // Fell more than a tick behind: skip the backlog instead of bursting
    if (nextDeadline < now - intervalMs) {
      nextDeadline = now + intervalMs
    }

    cancelTick = scheduler.schedule(tick, Math.max(0, nextDeadline - now))
  }

  /**
   * Main loop tick
   */
  const tick = () => {
    cancelTick = null
    if (!running || paused) return

    const timestamp = scheduler.now()
    const deltaMs = lastTimestamp === null ? 0 : timestamp - lastTimestamp
    lastTimestamp = timestamp
    ticks++

    try {
      if (context) {
        beforeTick?.(context, timestamp, deltaMs)
        afterTick?.(context, timestamp, deltaMs)
      }
    } catch (error) {
      if (onError) {
        onError(error instanceof Error ? error : new Error(String(error)))
      } else {
        console.error('[TickLoop] Error in tick loop:', error)
      }
    }

    // A hook may have stopped or paused the loop
    if (running && !paused) scheduleNext()
  }

  const cancelPending = () => {
    if (cancelTick !== null) {
      cancelTick()
      cancelTick = null
    }
  }

  const begin = () => {
    lastTimestamp = null
    nextDeadline = scheduler.now()
    cancelTick = scheduler.schedule(tick, 0)
  }

  const start = () => {
    if (running) return

    if (!context) {
      context = createContext()
    }

    running = true
    paused = false
    begin()
  }

  const stop = () => {
    running = false
    paused = false
    cancelPending()
    lastTimestamp = null
  }

  const pause = () => {
    if (!running || paused) return

    paused = true
    cancelPending()
  }

  const resume = () => {
    if (!running || !paused) return

    paused = false
    begin()
  }

  return {
    start,
    stop,
    pause,
    resume,
    isRunning: () => running,
    isPaused: () => paused,
    tickCount: () => ticks,
    getContext: () => context,
  }
}
