/**
 * kernels.ts — Dispersal kernels mapping travelled distance to a movement
 * probability.
 *
 * Callers describe a kernel with loose {@link KernelSettings}; it is resolved
 * once, before any matrix work, into the closed {@link DispersalKernel}
 * variant. Everything downstream switches over the variant exhaustively.
 */

import { InvalidParameterError } from '../errors.js'
import type { DirectionalityMode } from '../types.js'
import { normalUpperTail } from './normal.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const KERNEL_TYPES = ['exponential', 'threshold', 'leptokurtic'] as const

export type KernelType = typeof KERNEL_TYPES[number]

/**
 * Kernel request as supplied by a caller.
 *
 * - `param` is the symmetric parameter (exponential base or threshold cutoff)
 * - `paramUpstream` / `paramDownstream` are the asymmetric ones
 * - `paramLeptokurtic` is `[sigmaStationary, sigmaMobile, stationaryShare]`
 */
export interface KernelSettings {
  readonly type: KernelType
  /** @default 'symmetric' */
  readonly direction?: DirectionalityMode
  readonly param?: number
  readonly paramUpstream?: number
  readonly paramDownstream?: number
  readonly paramLeptokurtic?: readonly number[]
}

export type DispersalKernel =
  | { readonly type: 'exponential'; readonly direction: 'symmetric'; readonly base: number }
  | {
      readonly type: 'exponential'
      readonly direction: 'asymmetric'
      readonly baseUpstream: number
      readonly baseDownstream: number
    }
  | { readonly type: 'threshold'; readonly direction: 'symmetric'; readonly cutoff: number }
  | {
      readonly type: 'threshold'
      readonly direction: 'asymmetric'
      readonly cutoffUpstream: number
      readonly cutoffDownstream: number
    }
  | {
      readonly type: 'leptokurtic'
      readonly direction: 'symmetric'
      readonly sigmaStationary: number
      readonly sigmaMobile: number
      /** Share of the population that is stationary, in [0, 1]. */
      readonly stationaryShare: number
    }

/**
 * Distances travelled between two reaches. Symmetric kernels use `total`;
 * asymmetric kernels use the upstream and downstream legs.
 */
export type TravelledDistance =
  | { readonly direction: 'symmetric'; readonly total: number }
  | { readonly direction: 'asymmetric'; readonly upstream: number; readonly downstream: number }

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function requireParam(value: number | undefined, field: string, kernel: KernelType): number {
  if (value === undefined) {
    throw new InvalidParameterError(field, `"${field}" must be defined for the ${kernel} kernel`)
  }
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(field, `"${field}" must be a finite number (got ${value})`)
  }
  return value
}

function requireBase(value: number | undefined, field: string): number {
  const base = requireParam(value, field, 'exponential')
  if (base <= 0 || base > 1) {
    throw new InvalidParameterError(field, `"${field}" must lie in (0, 1] for the exponential kernel (got ${base})`)
  }
  return base
}

function requireCutoff(value: number | undefined, field: string): number {
  const cutoff = requireParam(value, field, 'threshold')
  if (cutoff < 0) {
    throw new InvalidParameterError(field, `"${field}" must be >= 0 for the threshold kernel (got ${cutoff})`)
  }
  return cutoff
}

function resolveLeptokurtic(params: readonly number[] | undefined): DispersalKernel {
  const field = 'paramLeptokurtic'
  if (params === undefined) {
    throw new InvalidParameterError(field, `"${field}" must be defined for the leptokurtic kernel`)
  }
  if (params.length !== 3) {
    throw new InvalidParameterError(
      field,
      `"${field}" must hold exactly 3 values [sigmaStationary, sigmaMobile, stationaryShare] (got ${params.length})`
    )
  }
  const [sigmaStationary, sigmaMobile, stationaryShare] = params
  if (!Number.isFinite(sigmaStationary) || sigmaStationary <= 0) {
    throw new InvalidParameterError(`${field}[0]`, `"${field}[0]" (sigmaStationary) must be > 0 (got ${sigmaStationary})`)
  }
  if (!Number.isFinite(sigmaMobile) || sigmaMobile <= 0) {
    throw new InvalidParameterError(`${field}[1]`, `"${field}[1]" (sigmaMobile) must be > 0 (got ${sigmaMobile})`)
  }
  if (!Number.isFinite(stationaryShare) || stationaryShare < 0 || stationaryShare > 1) {
    throw new InvalidParameterError(
      `${field}[2]`,
      `"${field}[2]" (stationaryShare) must lie in [0, 1] (got ${stationaryShare})`
    )
  }
  return { type: 'leptokurtic', direction: 'symmetric', sigmaStationary, sigmaMobile, stationaryShare }
}

/**
 * Validates `settings` and returns the closed kernel variant.
 * The leptokurtic kernel is defined for symmetric dispersal only; an
 * asymmetric request resolves to symmetric.
 *
 * @throws {InvalidParameterError} naming the missing or out-of-range field.
 */
export function resolveKernel(settings: KernelSettings): DispersalKernel {
  const direction = settings.direction ?? 'symmetric'
  switch (settings.type) {
    case 'exponential':
      return direction === 'symmetric'
        ? { type: 'exponential', direction, base: requireBase(settings.param, 'param') }
        : {
            type: 'exponential',
            direction,
            baseUpstream: requireBase(settings.paramUpstream, 'paramUpstream'),
            baseDownstream: requireBase(settings.paramDownstream, 'paramDownstream'),
          }
    case 'threshold':
      return direction === 'symmetric'
        ? { type: 'threshold', direction, cutoff: requireCutoff(settings.param, 'param') }
        : {
            type: 'threshold',
            direction,
            cutoffUpstream: requireCutoff(settings.paramUpstream, 'paramUpstream'),
            cutoffDownstream: requireCutoff(settings.paramDownstream, 'paramDownstream'),
          }
    case 'leptokurtic':
      return resolveLeptokurtic(settings.paramLeptokurtic)
    default: {
      const unknownType: never = settings.type
      throw new InvalidParameterError('type', `unknown kernel type "${String(unknownType)}"`)
    }
  }
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/** `base^distance`, with unreachable pairs (infinite distance) mapped to 0. */
function decay(base: number, distance: number): number {
  if (distance === Infinity) return 0
  return Math.pow(base, distance)
}

/**
 * Dispersal probability for one reach pair.
 * The caller supplies distances routed in the kernel's own direction.
 */
export function evaluateKernel(kernel: DispersalKernel, distance: TravelledDistance): number {
  switch (kernel.type) {
    case 'exponential':
      if (kernel.direction === 'symmetric') {
        return decay(kernel.base, totalOf(distance))
      }
      {
        const legs = legsOf(distance)
        return decay(kernel.baseUpstream, legs.upstream) * decay(kernel.baseDownstream, legs.downstream)
      }
    case 'threshold':
      if (kernel.direction === 'symmetric') {
        return totalOf(distance) <= kernel.cutoff ? 1 : 0
      }
      {
        const legs = legsOf(distance)
        return legs.upstream <= kernel.cutoffUpstream && legs.downstream <= kernel.cutoffDownstream ? 1 : 0
      }
    case 'leptokurtic': {
      const d = totalOf(distance)
      const p = kernel.stationaryShare
      return 2 * (p * normalUpperTail(d, kernel.sigmaStationary) + (1 - p) * normalUpperTail(d, kernel.sigmaMobile))
    }
  }
}

function totalOf(distance: TravelledDistance): number {
  if (distance.direction !== 'symmetric') {
    throw new Error('symmetric kernel evaluated on directional distances')
  }
  return distance.total
}

function legsOf(distance: TravelledDistance): { upstream: number; downstream: number } {
  if (distance.direction !== 'asymmetric') {
    throw new Error('asymmetric kernel evaluated on a symmetric distance')
  }
  return distance
}
