export {
  parseConfig,
  loadConfigFile,
  connectivityConfigSchema,
  ConfigValidationError,
  DEFAULT_CONFIG,
} from './config.js'
export type { ConnectivityConfig, ConfluenceRule, ParseConfigOptions } from './config.js'

export {
  LINK_CATEGORIES,
  DIRECTIONALITY_MODES,
  isLinkCategory,
} from './types.js'
export type {
  LinkCategory,
  DirectionalityMode,
  MovementDirection,
  Reach,
  Link,
  RiverNetwork,
  Passability,
  ConnectivityMatrix,
  IndexScale,
  ReachMode,
  IndexValue,
  ReachIndexRow,
  CatchmentIndexResult,
  ReachIndexResult,
  IndexResult,
  BarrierIndexValue,
  BarrierScenario,
} from './types.js'

export {
  ConnectivityError,
  InvalidAttributeError,
  InvalidParameterError,
  InvalidConfigurationError,
  ScenarioFailureError,
  isConnectivityError,
} from './errors.js'
export type { ConnectivityErrorKind } from './errors.js'
export { describeError } from './error-utils.js'

export { parseRiverNetwork, parseBarrierScenarios, riverNetworkSchema, barrierScenarioTableSchema } from './network/parse.js'
export { extractRoutingTables, readReachAttribute, readBarrierPassability } from './network/extractor.js'
export type { RoutingEdge, FlaggedRoutingEdge, RoutingTables } from './network/extractor.js'
export { cytoscapeRouter } from './network/routing.js'
export type { Router } from './network/routing.js'
export { buildRiverTree, lowestCommonAncestor } from './network/tree.js'
export type { RiverTree } from './network/tree.js'

export { KERNEL_TYPES, resolveKernel, evaluateKernel } from './connectivity/kernels.js'
export type { KernelType, KernelSettings, DispersalKernel, TravelledDistance } from './connectivity/kernels.js'
export { matrixValue, transpose } from './connectivity/matrix.js'

export { catchmentIndex, reachIndex, barrierIndex, combineContributions } from './aggregation/aggregator.js'
export {
  computeIndex,
  computeMatrix,
  computeFunctionalMatrix,
  computeStructuralMatrix,
  prepareIndexPipeline,
  runIndexPipeline,
} from './aggregation/index-calculation.js'
export type {
  EngineOptions,
  IndexRequest,
  StructuralRequest,
  FunctionalRequest,
  MatrixRequest,
  PreparedIndexPipeline,
} from './aggregation/index-calculation.js'

export {
  prioritizeBarriers,
  preparePrioritization,
  evaluateScenario,
  percentChange,
  PRIORITIZATION_MODES,
} from './prioritization/engine.js'
export type {
  PrioritizationMode,
  PrioritizationContext,
  PrioritizationOptions,
  PrioritizationResult,
  ScenarioRow,
  CatchmentScenarioRow,
  ReachScenarioRow,
  ReachDeltaRow,
  FailedScenarioRow,
} from './prioritization/engine.js'
export { runWithConcurrency } from './prioritization/concurrency.js'
export type { ParallelMap } from './prioritization/concurrency.js'

export type { MetricEvent, MetricData, IndexMetrics, PrioritizationMetrics } from './metrics/index.js'
