/**
 * Metric emission sinks: structured console output and optional JSONL file.
 *
 * `emitMetric` writes to console.warn with a `[fluvial:metrics]` prefix.
 * `appendMetricsFile` appends one JSON line per event to a file.
 */

import { promises as fs } from 'node:fs'
import { dirname } from 'node:path'
import type { MetricEvent } from './types.js'

/** Emits a metric event to stderr via console.warn. */
export function emitMetric(event: MetricEvent): void {
  console.warn(`[fluvial:metrics] ${JSON.stringify(event)}`)
}

/**
 * Appends a metric event as a JSONL line to `filePath`, creating parent
 * directories as needed.
 *
 * Never throws; errors are logged.
 */
export async function appendMetricsFile(filePath: string, event: MetricEvent): Promise<void> {
  try {
    await fs.mkdir(dirname(filePath), { recursive: true })
    await fs.appendFile(filePath, JSON.stringify(event) + '\n', 'utf-8')
  } catch (err) {
    console.error(
      `[fluvial] metrics: failed to append to ${filePath}:`,
      err instanceof Error ? err.message : String(err),
    )
  }
}
