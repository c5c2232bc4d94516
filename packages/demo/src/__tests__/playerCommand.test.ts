/**
 * Player Command Tests
 */

import { describe, expect, it } from 'vitest'
import { createPlayerCommand, createSeededRandom, playerCommandSchema } from '@tickline/demo'

describe('createPlayerCommand', () => {
  it('should stamp the command with the clock', () => {
    const command = createPlayerCommand('flap', { playerId: 2, now: () => 42.25 })

    expect(command).toEqual({ playerId: 2, type: 'flap', timestamp: 42.25 })
  })

  it('should default to player 0', () => {
    expect(createPlayerCommand('none').playerId).toBe(0)
  })

  it('should freeze the command', () => {
    const command = createPlayerCommand('flap')

    expect(Object.isFrozen(command)).toBe(true)
  })

  it('should validate against the schema', () => {
    expect(playerCommandSchema.safeParse(createPlayerCommand('flap')).success).toBe(true)
    expect(
      playerCommandSchema.safeParse({ playerId: 0, type: 'jump', timestamp: 1 }).success,
    ).toBe(false)
  })
})

describe('createSeededRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const first = createSeededRandom(7)
    const second = createSeededRandom(7)

    const a = [first(), first(), first()]
    const b = [second(), second(), second()]

    expect(a).toEqual(b)
    a.forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    })
  })

  it('should differ between seeds', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)())
  })
})
