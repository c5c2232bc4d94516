import type { InputSource } from './types'

/**
 * Flap at fixed session times.
 * Times that fall between two ticks fire on the later tick; several due at
 * once collapse into a single flap.
 */
export function createScriptedInput(flapTimesMs: Array<number>): InputSource {
  const schedule = [...flapTimesMs].sort((a, b) => a - b)
  let next = 0

  return (_snapshot, elapsedMs) => {
    let due = false
    while (next < schedule.length && schedule[next] <= elapsedMs) {
      due = true
      next++
    }
    return due
  }
}
