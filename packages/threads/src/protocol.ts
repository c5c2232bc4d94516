/**
 * Thread Channel Protocol
 *
 * Messages between the main thread, which owns the command channel, and the
 * worker threads consuming it. Each `take/request` is answered by exactly one
 * `take/value` or `take/stopped` carrying the same requestId.
 *
 * Worker → Main: consumer/ready, take/request, consumer/done, consumer/error
 * Main → Worker: take/value, take/stopped
 *
 * Values cross the boundary by structured clone.
 */

import { z } from 'zod'

/**
 * Event type keywords
 * Use these instead of raw strings
 */
export const eventKeywords = {
  consumerReady: 'consumer/ready',
  takeRequest: 'take/request',
  consumerDone: 'consumer/done',
  consumerError: 'consumer/error',
  takeValue: 'take/value',
  takeStopped: 'take/stopped',
} as const

const requestIdSchema = z.number().int().nonnegative()

const schemas = {
  /** Consumer is listening (Worker → Main) */
  [eventKeywords.consumerReady]: z.object({
    type: z.literal(eventKeywords.consumerReady),
    workerId: z.number().int().nonnegative(),
    timestamp: z.number(),
  }),
  /** Consumer wants the next value (Worker → Main) */
  [eventKeywords.takeRequest]: z.object({
    type: z.literal(eventKeywords.takeRequest),
    requestId: requestIdSchema,
  }),
  /** Consumer returned normally (Worker → Main) */
  [eventKeywords.consumerDone]: z.object({
    type: z.literal(eventKeywords.consumerDone),
  }),
  /** Consumer threw (Worker → Main) */
  [eventKeywords.consumerError]: z.object({
    type: z.literal(eventKeywords.consumerError),
    error: z.string(),
  }),
  /** Next value for a take request (Main → Worker) */
  [eventKeywords.takeValue]: z.object({
    type: z.literal(eventKeywords.takeValue),
    requestId: requestIdSchema,
    value: z.unknown(), // Validated by the consumer's value schema
  }),
  /** Channel stopped and drained (Main → Worker) */
  [eventKeywords.takeStopped]: z.object({
    type: z.literal(eventKeywords.takeStopped),
    requestId: requestIdSchema,
  }),
}

export const workerEventSchema = z.discriminatedUnion('type', [
  schemas[eventKeywords.consumerReady],
  schemas[eventKeywords.takeRequest],
  schemas[eventKeywords.consumerDone],
  schemas[eventKeywords.consumerError],
])

export const mainEventSchema = z.discriminatedUnion('type', [
  schemas[eventKeywords.takeValue],
  schemas[eventKeywords.takeStopped],
])

/**
 * All worker events (sent to the main thread)
 */
export type WorkerEvent = z.infer<typeof workerEventSchema>

/**
 * All main thread events (sent to a worker)
 */
export type MainEvent = z.infer<typeof mainEventSchema>

/**
 * `workerData` handed to every spawned thread
 */
export const workerDataSchema = z.object({
  workerId: z.number().int().nonnegative(),
  threadCount: z.number().int().positive(),
})

export type ConsumerWorkerData = z.infer<typeof workerDataSchema>
