/**
 * engine.ts — Barrier prioritization.
 *
 * Computes the baseline index once, then re-runs the passability-dependent
 * half of the pipeline once per scenario. Routing, B_ij, the rooted tree and
 * the weights do not depend on passability and are shared read-only by every
 * scenario; each scenario only carries its own override map.
 *
 * Two analyses:
 *   leave-one-out  baseline is the stored network; each scenario applies
 *                  its own barrier's passabilities.
 *   add-one        baseline applies every scenario at once; each scenario
 *                  puts its own barrier back to the stored passabilities.
 *
 * Every scenario produces exactly one row, in input order, whatever the
 * concurrency. A scenario that cannot be computed yields a `failed` row
 * instead of aborting the batch.
 */

import { setImmediate as nextTurn } from 'node:timers/promises'
import { barrierIndex, reachIndex } from '../aggregation/aggregator.js'
import {
  dispersalMatrix,
  prepareIndexPipeline,
  runIndexPipeline,
} from '../aggregation/index-calculation.js'
import type {
  EngineOptions,
  IndexRequest,
  PreparedIndexPipeline,
} from '../aggregation/index-calculation.js'
import { DEFAULT_CONFIG } from '../config.js'
import { describeError } from '../error-utils.js'
import { InvalidParameterError, isConnectivityError } from '../errors.js'
import type { ConnectivityErrorKind } from '../errors.js'
import { appendMetricsFile, createMetricEvent, emitMetric } from '../metrics/index.js'
import type {
  BarrierIndexValue,
  BarrierScenario,
  IndexResult,
  Passability,
  ReachIndexRow,
  ReachMode,
  RiverNetwork,
} from '../types.js'
import { runWithConcurrency } from './concurrency.js'
import type { ParallelMap } from './concurrency.js'
import { addOneOverrides, collectBarrierIds, combinedOverrides, scenarioOverrides } from './scenarios.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const PRIORITIZATION_MODES = ['leave-one-out', 'add-one'] as const
export type PrioritizationMode = (typeof PRIORITIZATION_MODES)[number]

export interface PrioritizationOptions extends EngineOptions {
  /** @default 'leave-one-out' */
  readonly mode?: PrioritizationMode
  /**
   * Scenarios in flight at once. The default pool is cooperative: it
   * interleaves scenarios on the calling thread. Pass a `parallelMap`
   * backed by worker threads, calling {@link evaluateScenario}, for real
   * parallelism.
   * @default config.prioritization.concurrency
   */
  readonly concurrency?: number
  /** @default runWithConcurrency */
  readonly parallelMap?: ParallelMap
}

interface ScenarioRowBase {
  readonly barrierId: string
  readonly passUpstream: number
  readonly passDownstream: number
}

export interface CatchmentScenarioRow extends ScenarioRowBase, BarrierIndexValue {
  readonly status: 'ok'
  readonly scale: 'catchment'
  /**
   * 100 · (scenario − baseline) / baseline. This is the negation of
   * 100 · (baseline − scenario) / baseline, chosen so that restoring a
   * barrier in leave-one-out mode scores ≥ 0. In add-one mode putting a
   * barrier back scores ≤ 0.
   */
  readonly deltaIndex: number
}

export interface ReachDeltaRow extends ReachIndexRow {
  /** Same sign convention as the catchment `deltaIndex`; null when the reach's baseline index is 0. */
  readonly deltaIndex: number | null
}

export interface ReachScenarioRow extends ScenarioRowBase {
  readonly status: 'ok'
  readonly scale: 'reach'
  readonly mode: ReachMode
  readonly reaches: readonly ReachDeltaRow[]
}

export interface FailedScenarioRow extends ScenarioRowBase {
  readonly status: 'failed'
  readonly reason: string
  readonly errorKind: ConnectivityErrorKind | 'unexpected'
}

export type ScenarioRow = CatchmentScenarioRow | ReachScenarioRow | FailedScenarioRow

export interface PrioritizationResult {
  readonly mode: PrioritizationMode
  readonly baseline: IndexResult
  readonly rows: readonly ScenarioRow[]
}

/**
 * Everything a scenario needs, computed once per batch. Holds plain data
 * only, so it can be handed to a worker alongside one scenario.
 */
export interface PrioritizationContext {
  readonly mode: PrioritizationMode
  readonly prepared: PreparedIndexPipeline
  readonly baseline: IndexResult
  readonly barrierIds: ReadonlySet<string>
  /** Overrides the baseline was computed under; empty in leave-one-out mode. */
  readonly baselineOverrides: ReadonlyMap<string, Passability>
}

// ---------------------------------------------------------------------------
// Scenario evaluation
// ---------------------------------------------------------------------------

export function percentChange(baseline: number, scenario: number): number {
  return (100 * (scenario - baseline)) / baseline
}

/**
 * Computes one scenario's row against the batch baseline.
 *
 * @throws {ScenarioFailureError} when the scenario is invalid for the network.
 */
export function evaluateScenario(
  context: PrioritizationContext,
  scenario: BarrierScenario
): CatchmentScenarioRow | ReachScenarioRow {
  const { prepared, baseline, barrierIds } = context
  const overrides =
    context.mode === 'add-one'
      ? addOneOverrides(scenario, barrierIds, context.baselineOverrides)
      : scenarioOverrides(scenario, barrierIds)
  const connectivity = dispersalMatrix(prepared, overrides)
  const base: ScenarioRowBase = {
    barrierId: scenario.barrierId,
    passUpstream: scenario.passUpstream,
    passDownstream: scenario.passDownstream,
  }

  if (baseline.scale === 'catchment') {
    const value = barrierIndex(connectivity, prepared.weights, scenario.barrierId)
    return {
      ...base,
      ...value,
      status: 'ok',
      scale: 'catchment',
      deltaIndex: percentChange(baseline.value.index, value.index),
    }
  }

  const rows = reachIndex(connectivity, prepared.weights, baseline.mode)
  return {
    ...base,
    status: 'ok',
    scale: 'reach',
    mode: baseline.mode,
    reaches: rows.map((row, i) => {
      const before = baseline.rows[i].index
      return { ...row, deltaIndex: before === 0 ? null : percentChange(before, row.index) }
    }),
  }
}

function failedRow(scenario: BarrierScenario, reason: unknown): FailedScenarioRow {
  return {
    barrierId: scenario.barrierId,
    passUpstream: scenario.passUpstream,
    passDownstream: scenario.passDownstream,
    status: 'failed',
    reason: describeError(reason),
    errorKind: isConnectivityError(reason) ? reason.kind : 'unexpected',
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Validates the request and computes the baseline of a prioritization batch. */
export function preparePrioritization(
  network: RiverNetwork,
  scenarios: readonly BarrierScenario[],
  request: IndexRequest,
  options: EngineOptions & { readonly mode?: PrioritizationMode } = {}
): PrioritizationContext {
  const mode = options.mode ?? 'leave-one-out'
  const prepared = prepareIndexPipeline(network, request, options)
  const barrierIds = collectBarrierIds(network)
  const baselineOverrides: ReadonlyMap<string, Passability> =
    mode === 'add-one' ? combinedOverrides(scenarios, barrierIds) : new Map()
  const baseline = runIndexPipeline(prepared, baselineOverrides)
  return { mode, prepared, baseline, barrierIds, baselineOverrides }
}

/**
 * Ranks barriers by the change in connectivity their scenario produces.
 *
 * The request is validated and the baseline computed before any scenario
 * runs; problems there throw. Problems inside a scenario only fail its row.
 *
 * @throws {InvalidParameterError} if `concurrency` is not a positive integer.
 */
export async function prioritizeBarriers(
  network: RiverNetwork,
  scenarios: readonly BarrierScenario[],
  request: IndexRequest,
  options: PrioritizationOptions = {}
): Promise<PrioritizationResult> {
  const started = Date.now()
  const config = options.config ?? DEFAULT_CONFIG
  const concurrency = options.concurrency ?? config.prioritization.concurrency
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidParameterError('concurrency', `"concurrency" must be a positive integer (got ${concurrency})`)
  }

  const context = preparePrioritization(network, scenarios, request, options)

  const tasks = scenarios.map((scenario) => async () => {
    await nextTurn()
    return evaluateScenario(context, scenario)
  })
  const parallelMap = options.parallelMap ?? runWithConcurrency
  const settled = await parallelMap(tasks, concurrency)

  const rows: ScenarioRow[] = scenarios.map((scenario, i) => {
    const outcome = settled[i]
    if (outcome === undefined) {
      return failedRow(scenario, new Error('scenario produced no result'))
    }
    if (outcome.status === 'fulfilled') return outcome.value
    console.warn(
      `[fluvial] prioritization: scenario for barrier "${scenario.barrierId}" failed:`,
      describeError(outcome.reason)
    )
    return failedRow(scenario, outcome.reason)
  })

  const { metrics } = context.prepared.config
  if (metrics.enabled) {
    const event = createMetricEvent({
      stage: 'prioritization',
      mode: context.mode,
      scenarioCount: scenarios.length,
      failedCount: rows.filter((r) => r.status === 'failed').length,
      concurrency,
      durationMs: Date.now() - started,
    })
    emitMetric(event)
    if (metrics.filePath !== undefined) await appendMetricsFile(metrics.filePath, event)
  }

  return { mode: context.mode, baseline: context.baseline, rows }
}
