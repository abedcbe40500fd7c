/**
 * index-calculation.ts — Entry points of the connectivity engine.
 *
 * The pipeline is split in two so the prioritization engine can reuse the
 * expensive, passability-independent parts:
 *
 *   prepareIndexPipeline  validates every option, routes the network, builds
 *                         B_ij and the rooted tree
 *   runIndexPipeline      builds c_ij (optionally under barrier overrides),
 *                         combines and aggregates
 */

import { DEFAULT_CONFIG } from '../config.js'
import type { ConnectivityConfig } from '../config.js'
import {
  computeFunctionalMatrixWith,
  functionalMatrixFromDistances,
  routeDistances,
} from '../connectivity/functional.js'
import { resolveKernel } from '../connectivity/kernels.js'
import type { DispersalKernel, KernelSettings } from '../connectivity/kernels.js'
import { resolveLinkFactors, structuralMatrix } from '../connectivity/structural.js'
import type { StructuralOptions } from '../connectivity/structural.js'
import { InvalidConfigurationError, InvalidParameterError } from '../errors.js'
import { createMetricEvent, emitMetric } from '../metrics/index.js'
import { cytoscapeRouter } from '../network/routing.js'
import type { Router } from '../network/routing.js'
import { buildRiverTree } from '../network/tree.js'
import type { RiverTree } from '../network/tree.js'
import type {
  ConnectivityMatrix,
  DirectionalityMode,
  IndexResult,
  IndexScale,
  Passability,
  ReachMode,
  RiverNetwork,
} from '../types.js'
import { catchmentIndex, combineContributions, readWeights, reachIndex } from './aggregator.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Collaborators and configuration shared by every entry point. */
export interface EngineOptions {
  /** @default DEFAULT_CONFIG */
  readonly config?: ConnectivityConfig
  /** @default cytoscapeRouter */
  readonly router?: Router
}

export interface StructuralRequest {
  /** @default true */
  readonly enabled?: boolean
  /** @default 'symmetric' */
  readonly direction?: DirectionalityMode
  /** Overrides `config.structural.passConfluence` for this request. */
  readonly passConfluence?: number
}

export interface FunctionalRequest {
  /** @default true */
  readonly enabled?: boolean
  /** Required while the functional contribution is enabled. */
  readonly kernel?: KernelSettings
}

export interface IndexRequest {
  readonly scale: IndexScale
  /** Only used at reach scale. @default 'to' */
  readonly reachMode?: ReachMode
  readonly structural?: StructuralRequest
  readonly functional?: FunctionalRequest
}

/** Everything `runIndexPipeline` needs, validated and precomputed. */
export interface PreparedIndexPipeline {
  readonly network: RiverNetwork
  readonly scale: IndexScale
  readonly reachMode: ReachMode
  readonly weights: readonly number[]
  /** B_ij, or null when the functional contribution is disabled. */
  readonly functional: ConnectivityMatrix | null
  /** Tree and options for c_ij, or null when the structural contribution is disabled. */
  readonly structural: { readonly tree: RiverTree; readonly options: StructuralOptions } | null
  readonly config: ConnectivityConfig
}

export type MatrixRequest =
  | { readonly kind: 'functional'; readonly kernel: KernelSettings }
  | {
      readonly kind: 'structural'
      readonly direction?: DirectionalityMode
      readonly passConfluence?: number
    }

// ---------------------------------------------------------------------------
// Matrix entry points
// ---------------------------------------------------------------------------

function structuralOptionsFor(
  config: ConnectivityConfig,
  direction: DirectionalityMode,
  passConfluence: number | undefined
): StructuralOptions {
  return {
    direction,
    passConfluence: passConfluence ?? config.structural.passConfluence,
    confluenceRule: config.structural.confluenceRule,
    passUpstreamField: config.fields.passUpstream,
    passDownstreamField: config.fields.passDownstream,
  }
}

/** Computes B_ij for `network` under `kernel`. */
export function computeFunctionalMatrix(
  network: RiverNetwork,
  kernel: KernelSettings,
  options: EngineOptions = {}
): ConnectivityMatrix {
  const config = options.config ?? DEFAULT_CONFIG
  return computeFunctionalMatrixWith(network, kernel, {
    distanceField: config.fields.distance,
    router: options.router ?? cytoscapeRouter,
  })
}

/** Computes c_ij for `network`. */
export function computeStructuralMatrix(
  network: RiverNetwork,
  request: { readonly direction?: DirectionalityMode; readonly passConfluence?: number } = {},
  options: EngineOptions = {}
): ConnectivityMatrix {
  const config = options.config ?? DEFAULT_CONFIG
  const direction = request.direction ?? 'symmetric'
  const structuralOptions = structuralOptionsFor(config, direction, request.passConfluence)
  return structuralMatrix(network, buildRiverTree(network, direction), structuralOptions)
}

/** Returns B_ij or c_ij depending on `request.kind`. */
export function computeMatrix(
  network: RiverNetwork,
  request: MatrixRequest,
  options: EngineOptions = {}
): ConnectivityMatrix {
  switch (request.kind) {
    case 'functional':
      return computeFunctionalMatrix(network, request.kernel, options)
    case 'structural':
      return computeStructuralMatrix(network, request, options)
  }
}

// ---------------------------------------------------------------------------
// Index pipeline
// ---------------------------------------------------------------------------

/**
 * Validates `request` and precomputes every passability-independent part of
 * the index. All validation happens here, before any matrix is built.
 *
 * @throws {InvalidConfigurationError} when both contributions are disabled.
 * @throws {InvalidParameterError} for kernel or passability problems.
 * @throws {InvalidAttributeError} for missing or unusable attributes.
 */
export function prepareIndexPipeline(
  network: RiverNetwork,
  request: IndexRequest,
  options: EngineOptions = {}
): PreparedIndexPipeline {
  const config = options.config ?? DEFAULT_CONFIG
  const structuralEnabled = request.structural?.enabled ?? true
  const functionalEnabled = request.functional?.enabled ?? true
  if (!structuralEnabled && !functionalEnabled) {
    throw new InvalidConfigurationError(
      'structural and functional contributions are both disabled; the index would be undefined'
    )
  }

  let kernel: DispersalKernel | null = null
  if (functionalEnabled) {
    const settings = request.functional?.kernel
    if (settings === undefined) {
      throw new InvalidParameterError('kernel', 'a dispersal kernel is required while the functional contribution is enabled')
    }
    kernel = resolveKernel(settings)
  }

  const weights = readWeights(network, config.fields.weight)

  let structural: PreparedIndexPipeline['structural'] = null
  if (structuralEnabled) {
    const direction = request.structural?.direction ?? 'symmetric'
    const structuralOptions = structuralOptionsFor(config, direction, request.structural?.passConfluence)
    resolveLinkFactors(network, structuralOptions)
    structural = { tree: buildRiverTree(network, direction), options: structuralOptions }
  }

  let functional: ConnectivityMatrix | null = null
  if (kernel !== null) {
    const router = options.router ?? cytoscapeRouter
    const distances = routeDistances(network, config.fields.distance, kernel, router)
    functional = functionalMatrixFromDistances(network.reaches.map((r) => r.id), kernel, distances)
  }

  return {
    network,
    scale: request.scale,
    reachMode: request.reachMode ?? 'to',
    weights,
    functional,
    structural,
    config,
  }
}

/** Builds I_ij for a prepared pipeline, with optional barrier overrides. */
export function dispersalMatrix(
  prepared: PreparedIndexPipeline,
  overrides?: ReadonlyMap<string, Passability>
): ConnectivityMatrix {
  const structural =
    prepared.structural !== null
      ? structuralMatrix(prepared.network, prepared.structural.tree, { ...prepared.structural.options, overrides })
      : null
  return combineContributions(structural, prepared.functional)
}

/** Runs the passability-dependent half of the pipeline. */
export function runIndexPipeline(
  prepared: PreparedIndexPipeline,
  overrides?: ReadonlyMap<string, Passability>
): IndexResult {
  const connectivity = dispersalMatrix(prepared, overrides)
  if (prepared.scale === 'catchment') {
    return { scale: 'catchment', value: catchmentIndex(connectivity, prepared.weights) }
  }
  return {
    scale: 'reach',
    mode: prepared.reachMode,
    rows: reachIndex(connectivity, prepared.weights, prepared.reachMode),
  }
}

/**
 * Computes the connectivity index of `network`.
 *
 * Catchment scale returns one value; reach scale returns one row per reach.
 * Every value carries its numerator and denominator.
 */
export function computeIndex(
  network: RiverNetwork,
  request: IndexRequest,
  options: EngineOptions = {}
): IndexResult {
  const started = Date.now()
  const prepared = prepareIndexPipeline(network, request, options)
  const result = runIndexPipeline(prepared)

  if (prepared.config.metrics.enabled) {
    emitMetric(createMetricEvent({
      stage: 'index',
      scale: request.scale,
      reachCount: network.reaches.length,
      structural: prepared.structural !== null,
      functional: prepared.functional !== null,
      durationMs: Date.now() - started,
    }))
  }
  return result
}
