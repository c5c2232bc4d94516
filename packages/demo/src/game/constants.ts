/**
 * World and physics constants.
 *
 * World units: x grows to the right, y from 0 (ground) to WORLD_HEIGHT
 * (ceiling). Velocities are units per second.
 */

// ============================================================================
// World
// ============================================================================

export const WORLD_WIDTH = 80
export const WORLD_HEIGHT = 20

// ============================================================================
// Bird
// ============================================================================

export const BIRD_X = 20
export const BIRD_START_Y = 10
export const BIRD_RADIUS = 1

export const GRAVITY = -40
export const FLAP_VELOCITY = 15
export const MAX_FALL_SPEED = -50

// ============================================================================
// Pipes
// ============================================================================

export const PIPE_SPEED = -15
export const PIPE_WIDTH = 4
export const PIPE_GAP_SIZE = 6
/** Gap centers are drawn uniformly from [PIPE_GAP_MIN_Y, PIPE_GAP_MAX_Y) */
export const PIPE_GAP_MIN_Y = 5
export const PIPE_GAP_MAX_Y = 15
export const PIPE_SPAWN_INTERVAL_S = 1.8
export const PIPE_DESPAWN_X = -10

// ============================================================================
// Latency
// ============================================================================

/** Commands applied later than this after creation are logged */
export const LATENCY_WARNING_US = 1000
