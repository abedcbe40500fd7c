/**
 * Structured metric types emitted by the connectivity engine.
 * All types are immutable and serializable to JSON.
 */

/** Emitted after each index computation. */
export interface IndexMetrics {
  readonly stage: 'index'
  readonly scale: 'catchment' | 'reach'
  readonly reachCount: number
  readonly structural: boolean
  readonly functional: boolean
  readonly durationMs: number
}

/** Emitted at the end of a barrier prioritization batch. */
export interface PrioritizationMetrics {
  readonly stage: 'prioritization'
  readonly mode: 'leave-one-out' | 'add-one'
  readonly scenarioCount: number
  readonly failedCount: number
  readonly concurrency: number
  readonly durationMs: number
}

/** Union of all metric payload types. */
export type MetricData = IndexMetrics | PrioritizationMetrics

/** A timestamped metric event carrying one of the metric payloads. */
export interface MetricEvent {
  readonly stage: MetricData['stage']
  readonly timestamp: string
  readonly data: MetricData
}

export function createMetricEvent(data: MetricData): MetricEvent {
  return { stage: data.stage, timestamp: new Date().toISOString(), data }
}
