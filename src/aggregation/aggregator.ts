/**
 * aggregator.ts — Combines c_ij and B_ij into I_ij and reduces it to
 * catchment-, reach- or barrier-scale indices.
 */

import { hadamard } from '../connectivity/matrix.js'
import { InvalidAttributeError, InvalidConfigurationError } from '../errors.js'
import { readReachAttribute } from '../network/extractor.js'
import type {
  BarrierIndexValue,
  ConnectivityMatrix,
  IndexValue,
  ReachIndexRow,
  ReachMode,
  RiverNetwork,
} from '../types.js'

/**
 * I = C ⊙ B. Either contribution may be null (disabled), not both.
 *
 * @throws {InvalidConfigurationError} when both contributions are disabled.
 */
export function combineContributions(
  structural: ConnectivityMatrix | null,
  functional: ConnectivityMatrix | null
): ConnectivityMatrix {
  if (structural !== null && functional !== null) return hadamard(structural, functional)
  if (structural !== null) return structural
  if (functional !== null) return functional
  throw new InvalidConfigurationError(
    'structural and functional contributions are both disabled; the index would be undefined'
  )
}

/**
 * Reads reach weights and checks their total is positive.
 *
 * @throws {InvalidAttributeError} if the attribute is unusable or sums to 0.
 */
export function readWeights(network: RiverNetwork, field: string): readonly number[] {
  const weights = readReachAttribute(network, field)
  const total = weights.reduce((acc, w) => acc + w, 0)
  if (total <= 0) {
    throw new InvalidAttributeError(field, `weights read from "${field}" sum to ${total}; a positive total is required`)
  }
  return weights
}

function sum(values: readonly number[]): number {
  let total = 0
  for (const v of values) total += v
  return total
}

/** CCI = Σ_i Σ_j I[i][j]·w_i·w_j / W². */
export function catchmentIndex(connectivity: ConnectivityMatrix, weights: readonly number[]): IndexValue {
  const total = sum(weights)
  let numerator = 0
  connectivity.values.forEach((row, i) => {
    let rowSum = 0
    row.forEach((value, j) => {
      rowSum += value * weights[j]
    })
    numerator += rowSum * weights[i]
  })
  const denominator = total * total
  return { numerator, denominator, index: numerator / denominator }
}

/**
 * RCI per reach: `to` sums inbound probabilities I[j][i]·w_j, `from` sums
 * outbound probabilities I[i][j]·w_j; both are divided by W.
 */
export function reachIndex(
  connectivity: ConnectivityMatrix,
  weights: readonly number[],
  mode: ReachMode
): readonly ReachIndexRow[] {
  const denominator = sum(weights)
  const n = connectivity.reachIds.length
  return connectivity.reachIds.map((reachId, i) => {
    let numerator = 0
    for (let j = 0; j < n; j++) {
      const value = mode === 'to' ? connectivity.values[j][i] : connectivity.values[i][j]
      numerator += value * weights[j]
    }
    return { reachId, numerator, denominator, index: numerator / denominator }
  })
}

/** Catchment index of a scenario tagged with the barrier it perturbed. */
export function barrierIndex(
  connectivity: ConnectivityMatrix,
  weights: readonly number[],
  barrierId: string
): BarrierIndexValue {
  return { barrierId, ...catchmentIndex(connectivity, weights) }
}
