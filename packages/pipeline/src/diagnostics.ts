/**
 * Diagnostics shared by the pipeline components.
 *
 * Output here is an observability aid, not part of any contract.
 * Every component defaults to `console` and accepts a replacement.
 */

import { z } from 'zod'

export type PipelineLogger = {
  warn: (message: string, ...details: Array<unknown>) => void
  error: (message: string, ...details: Array<unknown>) => void
}

export const consoleLogger: PipelineLogger = {
  warn: (message, ...details) => console.warn(message, ...details),
  error: (message, ...details) => console.error(message, ...details),
}

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error))

/**
 * Thrown at construction time when options fail validation.
 * The only error the pipeline raises to its caller.
 */
export class PipelineConfigError extends Error {
  readonly issues: Array<string>

  constructor(component: string, issues: Array<string>) {
    super(`[${component}] Invalid options: ${issues.join('; ')}`)
    this.name = 'PipelineConfigError'
    this.issues = issues
  }
}

/**
 * Parse options against a schema, raising PipelineConfigError on failure
 */
export function parseOptions<TSchema extends z.ZodType>(
  component: string,
  schema: TSchema,
  input: unknown,
): z.infer<TSchema> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new PipelineConfigError(
      component,
      result.error.issues.map(
        (issue) => `${issue.path.map(String).join('.') || 'options'}: ${issue.message}`,
      ),
    )
  }
  return result.data
}
