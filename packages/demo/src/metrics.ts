/**
 * Session Metrics
 *
 * Command latency samples (creation → applied) and per-worker throughput.
 */

import type { ChannelStats, JoinReport } from '@tickline/pipeline'
import { LATENCY_WARNING_US } from './game/constants'
import type { InputConfig } from './input'
import { describeInput } from './input'

// ============================================================================
// Types
// ============================================================================

export type LatencyReport = {
  count: number
  minUs: number
  maxUs: number
  meanUs: number
  /** Nearest-rank 99th percentile */
  p99Us: number
  /** Warning threshold the samples were counted against */
  thresholdUs: number
  /** Samples above thresholdUs */
  overThreshold: number
}

export type WorkerThroughput = {
  workerId: number
  processed: number
}

export type SessionMetrics = {
  record: (latencyUs: number, workerId: number) => void
  latency: () => LatencyReport
  perWorker: () => Array<WorkerThroughput>
}

export const sessionEndKeywords = {
  duration: 'duration',
  died: 'died',
} as const

export type SessionEndReason =
  (typeof sessionEndKeywords)[keyof typeof sessionEndKeywords]

export type SessionReport = {
  reason: SessionEndReason
  input: InputConfig
  workers: number
  ticks: number
  /** Simulated seconds while the bird was alive */
  elapsedS: number
  score: number
  alive: boolean
  commandsSubmitted: number
  commandsProcessed: number
  channel: ChannelStats
  latency: LatencyReport
  perWorker: Array<WorkerThroughput>
  join: JoinReport
}

// ============================================================================
// Implementation
// ============================================================================

export function summarizeLatency(
  samplesUs: Array<number>,
  thresholdUs = LATENCY_WARNING_US,
): LatencyReport {
  if (samplesUs.length === 0) {
    return {
      count: 0,
      minUs: 0,
      maxUs: 0,
      meanUs: 0,
      p99Us: 0,
      thresholdUs,
      overThreshold: 0,
    }
  }

  const sorted = [...samplesUs].sort((a, b) => a - b)
  const total = sorted.reduce((sum, sample) => sum + sample, 0)
  const rank = Math.ceil(sorted.length * 0.99) - 1

  return {
    count: sorted.length,
    minUs: sorted[0],
    maxUs: sorted[sorted.length - 1],
    meanUs: total / sorted.length,
    p99Us: sorted[rank],
    thresholdUs,
    overThreshold: sorted.filter((sample) => sample > thresholdUs).length,
  }
}

export function createMetrics(thresholdUs = LATENCY_WARNING_US): SessionMetrics {
  const samples: Array<number> = []
  const processed = new Map<number, number>()

  return {
    record: (latencyUs, workerId) => {
      samples.push(latencyUs)
      processed.set(workerId, (processed.get(workerId) ?? 0) + 1)
    },
    latency: () => summarizeLatency(samples, thresholdUs),
    perWorker: () =>
      Array.from(processed, ([workerId, count]) => ({ workerId, processed: count })).sort(
        (a, b) => a.workerId - b.workerId,
      ),
  }
}

/**
 * Render a report as console lines
 */
export function formatReport(report: SessionReport): Array<string> {
  const { latency } = report
  const ending =
    report.reason === sessionEndKeywords.died
      ? `bird died after ${report.elapsedS.toFixed(2)}s`
      : `time limit reached after ${report.elapsedS.toFixed(2)}s`
  const failures = report.join.status === 'joined' ? report.join.failures.length : 0
  const workers = report.perWorker.length
    ? report.perWorker.map(({ workerId, processed }) => `#${workerId} ${processed}`).join(', ')
    : 'none'

  return [
    `[Demo] Session ended: ${ending}`,
    `[Demo] Input: ${describeInput(report.input)} | score: ${report.score} | ticks: ${report.ticks}`,
    `[Demo] Commands: submitted ${report.commandsSubmitted}, processed ${report.commandsProcessed}, dropped ${report.channel.dropped}`,
    `[Demo] Latency (us): min ${latency.minUs}, mean ${latency.meanUs.toFixed(1)}, p99 ${latency.p99Us}, max ${latency.maxUs}, over ${latency.thresholdUs}us: ${latency.overThreshold}`,
    `[Demo] Workers (${report.workers}): ${workers} | failures: ${failures}`,
  ]
}
