/**
 * @tickline/system
 *
 * Generic primitives shared by the tickline packages.
 * Framework-agnostic, no I/O.
 *
 * @example
 * ```ts
 * import { createAtom, createTickLoop } from '@tickline/system'
 *
 * const frames = createAtom(0)
 * const loop = createTickLoop({
 *   createContext: () => ({ frames }),
 *   afterTick: (ctx) => ctx.frames.update((n) => n + 1),
 *   targetHz: 120,
 * })
 * loop.start()
 * ```
 */

// ============================================================================
// State Management
// ============================================================================

export * from './state'

// ============================================================================
// Tick Loop
// ============================================================================

export * from './tickLoop'
