export type {
  IndexMetrics,
  PrioritizationMetrics,
  MetricData,
  MetricEvent,
} from './types.js'
export { createMetricEvent } from './types.js'
export { emitMetric, appendMetricsFile } from './sink.js'
