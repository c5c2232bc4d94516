/**
 * Demo Configuration
 *
 * Read from the environment and validated with zod.
 *
 *   TICKLINE_WORKERS      consumer execution contexts (default 4)
 *   TICKLINE_TICK_HZ      producer tick rate (default 120)
 *   TICKLINE_DURATION_MS  session time limit (default 10000)
 *   TICKLINE_INPUT        "autopilot" | "idle" | comma-separated flap times in ms
 *   TICKLINE_SEED         integer seed for pipe placement (random when unset)
 *   TICKLINE_CAPACITY     bound the command channel (unbounded when unset)
 */

import { z } from 'zod'
import { inputKindKeywords } from './input'
import type { InputConfig } from './input'

export class ConfigError extends Error {
  readonly issues: Array<string>

  constructor(issues: Array<string>) {
    super(`[Config] Invalid environment: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

const inputSchema = z
  .string()
  .trim()
  .transform((value, ctx): InputConfig => {
    if (value === inputKindKeywords.autopilot || value === inputKindKeywords.idle) {
      return { kind: value }
    }

    const flapTimesMs = value.split(',').map((part) => Number(part.trim()))
    const valid =
      value !== '' && flapTimesMs.every((time) => Number.isFinite(time) && time >= 0)

    if (!valid) {
      ctx.addIssue({
        code: 'custom',
        message: `expected "autopilot", "idle" or flap times in ms like "250,600", got "${value}"`,
      })
      return z.NEVER
    }

    return { kind: inputKindKeywords.scripted, flapTimesMs }
  })

const envSchema = z.object({
  TICKLINE_WORKERS: z.coerce.number().int().positive().max(64).default(4),
  TICKLINE_TICK_HZ: z.coerce.number().positive().max(1000).default(120),
  TICKLINE_DURATION_MS: z.coerce.number().int().positive().default(10_000),
  TICKLINE_INPUT: inputSchema.default({ kind: inputKindKeywords.autopilot }),
  TICKLINE_SEED: z.coerce.number().int().optional(),
  TICKLINE_CAPACITY: z.coerce.number().int().positive().optional(),
})

export type DemoConfig = {
  workers: number
  tickHz: number
  durationMs: number
  input: InputConfig
  seed?: number
  capacity?: number
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): DemoConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`,
      ),
    )
  }

  const data = result.data
  return {
    workers: data.TICKLINE_WORKERS,
    tickHz: data.TICKLINE_TICK_HZ,
    durationMs: data.TICKLINE_DURATION_MS,
    input: data.TICKLINE_INPUT,
    seed: data.TICKLINE_SEED,
    capacity: data.TICKLINE_CAPACITY,
  }
}
