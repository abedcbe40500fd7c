/**
 * routing.ts — All-pairs shortest-path oracle.
 *
 * The engine never routes by itself; it hands edge tables to a `Router`.
 * The default router builds a headless cytoscape graph and runs its
 * Floyd–Warshall search.
 */

import cytoscape from 'cytoscape'
import { InvalidConfigurationError } from '../errors.js'
import type { RoutingEdge } from './extractor.js'

/**
 * Computes shortest-path distances between every pair of `reachIds`.
 * `result[i][j]` is the distance from `reachIds[i]` to `reachIds[j]`;
 * unreachable pairs are `Infinity`.
 */
export interface Router {
  distances(
    edges: readonly RoutingEdge[],
    reachIds: readonly string[],
    directed: boolean
  ): number[][]
}

/**
 * Default {@link Router} backed by cytoscape's Floyd–Warshall implementation.
 *
 * Cytoscape ids share one namespace across nodes and edges, so reaches and
 * edges get internal ids (`n0`, `e0`, ...) and results are read back in
 * `reachIds` order.
 */
export const cytoscapeRouter: Router = {
  distances(edges, reachIds, directed) {
    const nodeIds = new Map(reachIds.map((id, i) => [id, `n${i}`]))
    const nodeId = (reachId: string): string => {
      const id = nodeIds.get(reachId)
      if (id === undefined) {
        throw new InvalidConfigurationError(`routing edge references unknown reach "${reachId}"`)
      }
      return id
    }

    const cy = cytoscape({
      headless: true,
      styleEnabled: false,
      elements: [
        ...reachIds.map((_, i) => ({ group: 'nodes' as const, data: { id: `n${i}` } })),
        ...edges.map((edge, i) => ({
          group: 'edges' as const,
          data: { id: `e${i}`, source: nodeId(edge.from), target: nodeId(edge.to), distance: edge.distance },
        })),
      ],
    })

    const search = cy.elements().floydWarshall({
      weight: (edge) => Number(edge.data('distance')),
      directed,
    })

    const nodes = reachIds.map((_, i) => cy.getElementById(`n${i}`))
    const result = nodes.map((from) => nodes.map((to) => search.distance(from, to)))
    cy.destroy()
    return result
  },
}
