/**
 * extractor.ts — Reads reach/link attributes and produces routing-ready edge
 * tables.
 *
 * Routing distances are midpoint-to-midpoint: an edge between reaches a and
 * b costs (a + b) / 2 of the chosen distance attribute.
 */

import { InvalidAttributeError, InvalidParameterError } from '../errors.js'
import type { DirectionalityMode, Link, MovementDirection, Passability, RiverNetwork } from '../types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One row of a routing table. */
export interface RoutingEdge {
  readonly from: string
  readonly to: string
  readonly distance: number
}

/** A routing edge tagged with the organism movement it corresponds to. */
export interface FlaggedRoutingEdge extends RoutingEdge {
  readonly direction: MovementDirection
}

export interface SymmetricRoutingTables {
  readonly direction: 'symmetric'
  /** Each link once; routed as an undirected graph. */
  readonly edges: readonly RoutingEdge[]
}

export interface AsymmetricRoutingTables {
  readonly direction: 'asymmetric'
  /** Every link in both traversal directions with its movement flag. */
  readonly flagged: readonly FlaggedRoutingEdge[]
  /** Upstream-flagged edges plus their zero-cost reversals; routed directed. */
  readonly upstream: readonly RoutingEdge[]
  /** Downstream-flagged edges plus their zero-cost reversals; routed directed. */
  readonly downstream: readonly RoutingEdge[]
}

export type RoutingTables = SymmetricRoutingTables | AsymmetricRoutingTables

// ---------------------------------------------------------------------------
// Attribute access
// ---------------------------------------------------------------------------

/**
 * Reads `field` from every reach, in network order.
 *
 * @throws {InvalidAttributeError} if any reach lacks the attribute or holds a
 *   negative or non-finite value.
 */
export function readReachAttribute(network: RiverNetwork, field: string): readonly number[] {
  return network.reaches.map((reach) => {
    const value = reach.attributes[field]
    if (value === undefined) {
      throw new InvalidAttributeError(field, `"${field}" is not an attribute of reach "${reach.id}"`)
    }
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidAttributeError(
        field,
        `"${field}" of reach "${reach.id}" must be a finite number >= 0 (got ${value})`
      )
    }
    return value
  })
}

/**
 * Reads the upstream and downstream passability of a barrier link.
 *
 * @throws {InvalidAttributeError} if either attribute is missing.
 * @throws {InvalidParameterError} if either value lies outside [0, 1].
 */
export function readBarrierPassability(
  link: Link,
  upstreamField: string,
  downstreamField: string
): Passability {
  const upstream = link.attributes[upstreamField]
  const downstream = link.attributes[downstreamField]
  if (upstream === undefined) {
    throw new InvalidAttributeError(upstreamField, `barrier link "${link.id}" has no "${upstreamField}" attribute`)
  }
  if (downstream === undefined) {
    throw new InvalidAttributeError(downstreamField, `barrier link "${link.id}" has no "${downstreamField}" attribute`)
  }
  assertProbability(upstreamField, upstream, `barrier link "${link.id}"`)
  assertProbability(downstreamField, downstream, `barrier link "${link.id}"`)
  return { upstream, downstream }
}

/** @throws {InvalidParameterError} if `value` is not a number in [0, 1]. */
export function assertProbability(field: string, value: number, owner?: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    const where = owner !== undefined ? ` of ${owner}` : ''
    throw new InvalidParameterError(field, `"${field}"${where} must lie in [0, 1] (got ${value})`)
  }
}

// ---------------------------------------------------------------------------
// Routing tables
// ---------------------------------------------------------------------------

/**
 * Builds the routing tables for `direction`.
 *
 * For asymmetric mode links must be oriented downstream. Traversing a link
 * `from → to` is downstream movement (`d`), `to → from` upstream movement
 * (`u`). Routing the upstream table yields, for every pair, the distance the
 * organism travels upstream: downstream legs are free. The downstream table
 * works the other way round.
 */
export function extractRoutingTables(
  network: RiverNetwork,
  field: string,
  direction: DirectionalityMode
): RoutingTables {
  const values = readReachAttribute(network, field)
  const byId = new Map<string, number>()
  network.reaches.forEach((reach, i) => byId.set(reach.id, values[i]))

  const midpoint = (link: Link): number => ((byId.get(link.from) ?? 0) + (byId.get(link.to) ?? 0)) / 2

  if (direction === 'symmetric') {
    return {
      direction,
      edges: network.links.map((link) => ({ from: link.from, to: link.to, distance: midpoint(link) })),
    }
  }

  const flagged: FlaggedRoutingEdge[] = []
  for (const link of network.links) {
    const distance = midpoint(link)
    flagged.push({ from: link.from, to: link.to, distance, direction: 'd' })
    flagged.push({ from: link.to, to: link.from, distance, direction: 'u' })
  }

  return {
    direction,
    flagged,
    upstream: withZeroCostReversals(flagged.filter((e) => e.direction === 'u')),
    downstream: withZeroCostReversals(flagged.filter((e) => e.direction === 'd')),
  }
}

function withZeroCostReversals(edges: readonly RoutingEdge[]): readonly RoutingEdge[] {
  return [
    ...edges.map(({ from, to, distance }) => ({ from, to, distance })),
    ...edges.map(({ from, to }) => ({ from: to, to: from, distance: 0 })),
  ]
}
