/**
 * tree.ts — Rooted view of an acyclic river network.
 *
 * Every connected component is rooted once: at its outlet for asymmetric
 * work, at its first reach otherwise. There is exactly one path between any
 * two reaches of a component, so per-pair quantities reduce to per-reach
 * root accumulations combined at the lowest common ancestor.
 *
 * LCA queries use binary lifting: O(n log n) preprocessing, O(log n) per query.
 */

import { InvalidConfigurationError } from '../errors.js'
import type { DirectionalityMode, Link, RiverNetwork } from '../types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RiverTree {
  /** "asymmetric" trees are rooted at their outlets. */
  readonly direction: DirectionalityMode
  /** Reach ids in network order; all index arrays below follow it. */
  readonly reachIds: readonly string[]
  readonly indexOf: ReadonlyMap<string, number>
  /** Parent index, or -1 for a component root. */
  readonly parent: readonly number[]
  /** Link joining a reach to its parent; null for roots. */
  readonly parentLink: readonly (Link | null)[]
  readonly depth: readonly number[]
  /** Component number of each reach. */
  readonly component: readonly number[]
  /** Root index of each component. */
  readonly roots: readonly number[]
  /** Every reach, parents before children. */
  readonly order: readonly number[]
  /** `ancestors[k][v]` is the 2^k-th ancestor of v, or -1. */
  readonly ancestors: readonly (readonly number[])[]
}

interface Neighbor {
  readonly index: number
  readonly link: Link
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function buildAdjacency(network: RiverNetwork, indexOf: ReadonlyMap<string, number>): Neighbor[][] {
  const adjacency: Neighbor[][] = network.reaches.map(() => [])
  for (const link of network.links) {
    const a = indexOf.get(link.from)
    const b = indexOf.get(link.to)
    if (a === undefined || b === undefined) {
      throw new InvalidConfigurationError(`link "${link.id}" references a reach that is not in the network`)
    }
    adjacency[a].push({ index: b, link })
    adjacency[b].push({ index: a, link })
  }
  return adjacency
}

/** Breadth-first walk from `start`, returning visited indices in visit order. */
function collectComponent(start: number, adjacency: readonly Neighbor[][], seen: boolean[]): number[] {
  const members = [start]
  seen[start] = true
  for (let head = 0; head < members.length; head++) {
    for (const { index } of adjacency[members[head]]) {
      if (seen[index]) continue
      seen[index] = true
      members.push(index)
    }
  }
  return members
}

/**
 * Picks the root of a component. Asymmetric work needs the outlet: the single
 * reach with no outgoing link.
 */
function chooseRoot(
  members: readonly number[],
  outDegree: readonly number[],
  reachIds: readonly string[],
  direction: DirectionalityMode
): number {
  if (direction === 'symmetric') return members[0]
  const outlets = members.filter((m) => outDegree[m] === 0)
  if (outlets.length !== 1) {
    const label = reachIds[members[0]]
    throw new InvalidConfigurationError(
      `asymmetric mode needs links oriented towards a single outlet; the component containing ` +
      `reach "${label}" has ${outlets.length} reaches without outgoing links`
    )
  }
  return outlets[0]
}

/**
 * Roots every component of `network` and prepares LCA lookups.
 *
 * @throws {InvalidConfigurationError} in asymmetric mode when a component does
 *   not drain to exactly one outlet.
 */
export function buildRiverTree(network: RiverNetwork, direction: DirectionalityMode): RiverTree {
  const n = network.reaches.length
  const reachIds = network.reaches.map((r) => r.id)
  const indexOf = new Map<string, number>()
  reachIds.forEach((id, i) => indexOf.set(id, i))

  const adjacency = buildAdjacency(network, indexOf)
  const outDegree = new Array<number>(n).fill(0)
  for (const link of network.links) {
    const from = indexOf.get(link.from)
    if (from !== undefined) outDegree[from]++
  }

  const parent = new Array<number>(n).fill(-1)
  const parentLink = new Array<Link | null>(n).fill(null)
  const depth = new Array<number>(n).fill(0)
  const component = new Array<number>(n).fill(-1)
  const roots: number[] = []
  const order: number[] = []

  const seen = new Array<boolean>(n).fill(false)
  for (let start = 0; start < n; start++) {
    if (seen[start]) continue
    const members = collectComponent(start, adjacency, seen)
    const root = chooseRoot(members, outDegree, reachIds, direction)
    const componentId = roots.length
    roots.push(root)

    component[root] = componentId
    const queue = [root]
    for (let head = 0; head < queue.length; head++) {
      const v = queue[head]
      order.push(v)
      for (const { index, link } of adjacency[v]) {
        if (component[index] !== -1) continue
        component[index] = componentId
        parent[index] = v
        parentLink[index] = link
        depth[index] = depth[v] + 1
        queue.push(index)
      }
    }
  }

  return {
    direction,
    reachIds,
    indexOf,
    parent,
    parentLink,
    depth,
    component,
    roots,
    order,
    ancestors: buildAncestorTable(parent),
  }
}

function buildAncestorTable(parent: readonly number[]): number[][] {
  const n = parent.length
  const levels = Math.max(1, Math.ceil(Math.log2(Math.max(n, 2))) + 1)
  const table: number[][] = [parent.slice()]
  for (let k = 1; k < levels; k++) {
    const prev = table[k - 1]
    table.push(prev.map((a) => (a === -1 ? -1 : prev[a])))
  }
  return table
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Lifts `v` by `steps` generations. */
function liftBy(tree: RiverTree, v: number, steps: number): number {
  let node = v
  for (let k = 0; steps >> k > 0 && node !== -1; k++) {
    if ((steps >> k) & 1) node = tree.ancestors[k][node]
  }
  return node
}

/**
 * Returns the lowest common ancestor of reaches `a` and `b` (indices), or -1
 * when they lie in different components.
 */
export function lowestCommonAncestor(tree: RiverTree, a: number, b: number): number {
  if (tree.component[a] !== tree.component[b]) return -1
  let x = a
  let y = b
  if (tree.depth[x] < tree.depth[y]) [x, y] = [y, x]
  x = liftBy(tree, x, tree.depth[x] - tree.depth[y])
  if (x === y) return x
  for (let k = tree.ancestors.length - 1; k >= 0; k--) {
    const ax = tree.ancestors[k][x]
    const ay = tree.ancestors[k][y]
    if (ax !== ay) {
      x = ax
      y = ay
    }
  }
  return tree.parent[x]
}
