/**
 * functional.ts — Builds B_ij, the distance-limited dispersal probability
 * between every pair of reaches.
 */

import { extractRoutingTables } from '../network/extractor.js'
import type { Router } from '../network/routing.js'
import type { ConnectivityMatrix, RiverNetwork } from '../types.js'
import { evaluateKernel, resolveKernel } from './kernels.js'
import type { DispersalKernel, KernelSettings } from './kernels.js'
import { buildMatrix } from './matrix.js'

/** Routed distances between every pair, in the kernel's direction. */
export type DistanceMatrices =
  | { readonly direction: 'symmetric'; readonly total: readonly (readonly number[])[] }
  | {
      readonly direction: 'asymmetric'
      readonly upstream: readonly (readonly number[])[]
      readonly downstream: readonly (readonly number[])[]
    }

/**
 * Routes the network in `kernel.direction` and returns the pairwise
 * travelled distances.
 *
 * @throws {InvalidAttributeError} if `distanceField` is not a reach attribute.
 */
export function routeDistances(
  network: RiverNetwork,
  distanceField: string,
  kernel: DispersalKernel,
  router: Router
): DistanceMatrices {
  const reachIds = network.reaches.map((r) => r.id)
  const tables = extractRoutingTables(network, distanceField, kernel.direction)
  if (tables.direction === 'symmetric') {
    return { direction: 'symmetric', total: router.distances(tables.edges, reachIds, false) }
  }
  return {
    direction: 'asymmetric',
    upstream: router.distances(tables.upstream, reachIds, true),
    downstream: router.distances(tables.downstream, reachIds, true),
  }
}

/** Applies `kernel` to already-routed distances. */
export function functionalMatrixFromDistances(
  reachIds: readonly string[],
  kernel: DispersalKernel,
  distances: DistanceMatrices
): ConnectivityMatrix {
  if (distances.direction === 'symmetric') {
    const total = distances.total
    return buildMatrix(reachIds, (i, j) =>
      evaluateKernel(kernel, { direction: 'symmetric', total: total[i][j] })
    )
  }
  const { upstream, downstream } = distances
  return buildMatrix(reachIds, (i, j) =>
    evaluateKernel(kernel, { direction: 'asymmetric', upstream: upstream[i][j], downstream: downstream[i][j] })
  )
}

export interface FunctionalMatrixOptions {
  readonly distanceField: string
  readonly router: Router
}

/**
 * Computes B_ij for `network`.
 *
 * Kernel settings are validated before any routing starts.
 *
 * @throws {InvalidParameterError} for missing or out-of-range kernel parameters.
 * @throws {InvalidAttributeError} if the distance attribute is unusable.
 */
export function computeFunctionalMatrixWith(
  network: RiverNetwork,
  settings: KernelSettings,
  options: FunctionalMatrixOptions
): ConnectivityMatrix {
  const kernel = resolveKernel(settings)
  const distances = routeDistances(network, options.distanceField, kernel, options.router)
  return functionalMatrixFromDistances(network.reaches.map((r) => r.id), kernel, distances)
}
