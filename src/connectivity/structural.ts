/**
 * structural.ts — Builds c_ij, the probability that an organism moving from
 * reach i to reach j crosses every structure on the way.
 *
 * Passabilities are turned into log-factors and accumulated once from every
 * reach to its component root. A pair then combines the two reaches'
 * accumulations with their lowest common ancestor's; no path is ever listed.
 * Zero passabilities cannot live in log space, so they are counted apart: a
 * path crossing any of them gets exactly 0.
 *
 * Direction convention in asymmetric mode (tree rooted at the outlet):
 * the path i → j first descends from i to the common ancestor (downstream
 * movement, `pass_d`), then climbs to j (upstream movement, `pass_u`).
 */

import type { ConfluenceRule } from '../config.js'
import { InvalidConfigurationError } from '../errors.js'
import { assertProbability, readBarrierPassability } from '../network/extractor.js'
import { lowestCommonAncestor } from '../network/tree.js'
import type { RiverTree } from '../network/tree.js'
import type { ConnectivityMatrix, DirectionalityMode, Link, Passability, RiverNetwork } from '../types.js'
import { buildMatrix } from './matrix.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StructuralOptions {
  readonly direction: DirectionalityMode
  readonly passConfluence: number
  readonly confluenceRule: ConfluenceRule
  readonly passUpstreamField: string
  readonly passDownstreamField: string
  /**
   * Passabilities replacing the stored ones, keyed by barrier id. Applied to
   * every link of that barrier; the network itself is never modified.
   */
  readonly overrides?: ReadonlyMap<string, Passability>
}

/** Per-link multiplicative factors. */
interface LinkFactors {
  /** Factor when crossed in symmetric mode, whatever the direction. */
  readonly both: number
  readonly upstream: number
  readonly downstream: number
}

/** Sum of log-factors plus the number of zero factors skipped. */
interface Accumulation {
  readonly logs: Float64Array
  readonly zeros: Int32Array
}

// ---------------------------------------------------------------------------
// Link factors
// ---------------------------------------------------------------------------

/**
 * Resolves the factors of every link up front so that attribute and range
 * errors surface before any matrix work.
 *
 * @throws {InvalidParameterError} if `passConfluence` or a passability lies
 *   outside [0, 1].
 * @throws {InvalidAttributeError} if a barrier link lacks a passability.
 */
export function resolveLinkFactors(
  network: RiverNetwork,
  options: StructuralOptions
): ReadonlyMap<Link, LinkFactors> {
  assertProbability('passConfluence', options.passConfluence)
  const pc = options.passConfluence
  const confluence: LinkFactors =
    options.confluenceRule === 'as-barrier'
      ? { both: pc * pc, upstream: pc, downstream: pc }
      : { both: pc, upstream: pc, downstream: pc }

  const factors = new Map<Link, LinkFactors>()
  for (const link of network.links) {
    if (link.category === 'confluence') {
      factors.set(link, confluence)
      continue
    }
    const override = link.barrierId !== undefined ? options.overrides?.get(link.barrierId) : undefined
    const pass = override ?? readBarrierPassability(link, options.passUpstreamField, options.passDownstreamField)
    factors.set(link, {
      both: pass.upstream * pass.downstream,
      upstream: pass.upstream,
      downstream: pass.downstream,
    })
  }
  return factors
}

// ---------------------------------------------------------------------------
// Accumulation
// ---------------------------------------------------------------------------

function accumulate(
  tree: RiverTree,
  factors: ReadonlyMap<Link, LinkFactors>,
  pick: (f: LinkFactors) => number
): Accumulation {
  const n = tree.reachIds.length
  const logs = new Float64Array(n)
  const zeros = new Int32Array(n)
  for (const v of tree.order) {
    const p = tree.parent[v]
    const link = tree.parentLink[v]
    if (p === -1 || link === null) continue
    const linkFactors = factors.get(link)
    if (linkFactors === undefined) {
      throw new InvalidConfigurationError(`link "${link.id}" is not part of the network the tree was built from`)
    }
    const factor = pick(linkFactors)
    if (factor === 0) {
      logs[v] = logs[p]
      zeros[v] = zeros[p] + 1
    } else {
      logs[v] = logs[p] + Math.log(factor)
      zeros[v] = zeros[p]
    }
  }
  return { logs, zeros }
}

/** Product of the factors on the tree path from `v` up to its ancestor `a`. */
function segment(acc: Accumulation, v: number, a: number): { log: number; zeros: number } {
  return { log: acc.logs[v] - acc.logs[a], zeros: acc.zeros[v] - acc.zeros[a] }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Computes c_ij over a pre-built tree. The tree only depends on topology, so
 * callers recomputing c_ij under many passability scenarios build it once.
 *
 * @throws {InvalidConfigurationError} if asymmetric mode is requested on a
 *   tree that was not rooted at the outlets.
 */
export function structuralMatrix(
  network: RiverNetwork,
  tree: RiverTree,
  options: StructuralOptions
): ConnectivityMatrix {
  if (options.direction === 'asymmetric' && tree.direction !== 'asymmetric') {
    throw new InvalidConfigurationError('asymmetric structural connectivity needs a tree rooted at the outlet')
  }
  const factors = resolveLinkFactors(network, options)

  if (options.direction === 'symmetric') {
    const both = accumulate(tree, factors, (f) => f.both)
    return buildMatrix(tree.reachIds, (i, j) => {
      if (i === j) return 1
      const lca = lowestCommonAncestor(tree, i, j)
      if (lca === -1) return 0
      const a = segment(both, i, lca)
      const b = segment(both, j, lca)
      return a.zeros + b.zeros > 0 ? 0 : Math.exp(a.log + b.log)
    })
  }

  const down = accumulate(tree, factors, (f) => f.downstream)
  const up = accumulate(tree, factors, (f) => f.upstream)
  return buildMatrix(tree.reachIds, (i, j) => {
    if (i === j) return 1
    const lca = lowestCommonAncestor(tree, i, j)
    if (lca === -1) return 0
    const descent = segment(down, i, lca)
    const climb = segment(up, j, lca)
    return descent.zeros + climb.zeros > 0 ? 0 : Math.exp(descent.log + climb.log)
  })
}
