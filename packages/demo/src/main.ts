/**
 * Demo CLI
 *
 * Runs one headless flap session with the configuration from the
 * environment and prints the report.
 *
 *   TICKLINE_WORKERS=8 TICKLINE_INPUT=autopilot npm run demo
 */

import { loadConfig } from './config'
import { describeInput } from './input'
import { formatReport } from './metrics'
import { runSession } from './system'

const main = async () => {
  const config = loadConfig()

  console.log(
    `[Demo] Starting session: ${config.workers} worker(s), ${config.tickHz} Hz, ` +
      `${config.durationMs} ms limit, input ${describeInput(config.input)}`,
  )

  const report = await runSession(config)
  formatReport(report).forEach((line) => console.log(line))
}

main().catch((error: unknown) => {
  console.error('[Demo] Session failed:', error instanceof Error ? error.message : error)
  process.exitCode = 1
})
