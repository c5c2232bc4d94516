/**
 * @tickline/demo
 *
 * Headless flap game driven through the command pipeline: a fixed-rate
 * producer turns input into flap commands, a worker pool applies them to the
 * shared game state, and the session reports command latency.
 */

export * from './game/constants'
export * from './game/playerCommand'
export * from './game/gameState'
export * from './game/random'
export * from './input'
export * from './metrics'
export * from './config'
export * from './system'
