/**
 * Core types for the river connectivity engine.
 * All types are immutable (readonly where appropriate).
 */

// ---------------------------------------------------------------------------
// Enums / Unions
// ---------------------------------------------------------------------------

/**
 * All valid link categories as a const array — the single source of truth for
 * both the `LinkCategory` union and the `isLinkCategory` runtime guard.
 */
export const LINK_CATEGORIES = [
  'confluence', // Junction between reaches; constant passability
  'barrier',    // Dam, weir or culvert with directional passability
] as const

/** The kind of structure a link represents. */
export type LinkCategory = typeof LINK_CATEGORIES[number]

/** Returns true if `v` is a valid `LinkCategory` string. */
export function isLinkCategory(v: unknown): v is LinkCategory {
  return typeof v === 'string' && (LINK_CATEGORIES as readonly string[]).includes(v)
}

export const DIRECTIONALITY_MODES = ['symmetric', 'asymmetric'] as const

/**
 * How movement direction is treated.
 * - "symmetric": undirected routing, a single path per reach pair
 * - "asymmetric": directed routing; upstream and downstream legs of each path
 *   carry their own distance and passability
 */
export type DirectionalityMode = typeof DIRECTIONALITY_MODES[number]

/** Direction an organism moves when traversing a link. */
export type MovementDirection = 'u' | 'd'

// ---------------------------------------------------------------------------
// Network
// ---------------------------------------------------------------------------

/** A river segment: the vertex unit of the network. */
export interface Reach {
  /** Stable, user-chosen label. */
  readonly id: string
  /**
   * Numeric attributes (length, area, HSI, ...). Which one is used as the
   * weight and which as the routing distance is decided by configuration.
   */
  readonly attributes: Readonly<Record<string, number>>
}

/**
 * A connection between two reaches. In networks used with asymmetric mode
 * links are oriented downstream: `from` is the upstream reach, `to` the
 * downstream one.
 */
export interface Link {
  readonly id: string
  readonly from: string
  readonly to: string
  readonly category: LinkCategory
  /** Barrier identifier shared by every link belonging to the same structure. */
  readonly barrierId?: string
  /** Numeric attributes; barriers carry their passabilities here. */
  readonly attributes: Readonly<Record<string, number>>
}

/** A pre-validated, acyclic river network. */
export interface RiverNetwork {
  readonly reaches: readonly Reach[]
  readonly links: readonly Link[]
}

/** Upstream/downstream passability pair of a barrier link. */
export interface Passability {
  readonly upstream: number
  readonly downstream: number
}

// ---------------------------------------------------------------------------
// Matrices
// ---------------------------------------------------------------------------

/**
 * Square reach-by-reach matrix. `values[i][j]` describes movement from
 * `reachIds[i]` to `reachIds[j]`.
 */
export interface ConnectivityMatrix {
  readonly reachIds: readonly string[]
  readonly values: readonly (readonly number[])[]
}

// ---------------------------------------------------------------------------
// Indices
// ---------------------------------------------------------------------------

export type IndexScale = 'catchment' | 'reach'

/**
 * Summation direction for reach-scale indices.
 * - "to": inbound connections, from every reach towards the scored one
 * - "from": outbound connections, from the scored reach towards every other
 */
export type ReachMode = 'to' | 'from'

/**
 * A normalised index value. Numerator and denominator are kept because the
 * ratio alone cannot be re-aggregated across scales.
 */
export interface IndexValue {
  readonly numerator: number
  readonly denominator: number
  readonly index: number
}

export interface ReachIndexRow extends IndexValue {
  readonly reachId: string
}

export interface CatchmentIndexResult {
  readonly scale: 'catchment'
  readonly value: IndexValue
}

export interface ReachIndexResult {
  readonly scale: 'reach'
  readonly mode: ReachMode
  readonly rows: readonly ReachIndexRow[]
}

export type IndexResult = CatchmentIndexResult | ReachIndexResult

/** Catchment index of a scenario, tagged with the barrier that was perturbed. */
export interface BarrierIndexValue extends IndexValue {
  readonly barrierId: string
}

// ---------------------------------------------------------------------------
// Prioritization
// ---------------------------------------------------------------------------

/** Updated passabilities for one barrier: one row of the scenario table. */
export interface BarrierScenario {
  readonly barrierId: string
  readonly passUpstream: number
  readonly passDownstream: number
}
