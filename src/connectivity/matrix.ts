import type { ConnectivityMatrix } from '../types.js'

/** Builds an n×n matrix by evaluating `cell(i, j)` for every pair. */
export function buildMatrix(
  reachIds: readonly string[],
  cell: (i: number, j: number) => number
): ConnectivityMatrix {
  const n = reachIds.length
  const values: number[][] = []
  for (let i = 0; i < n; i++) {
    const row = new Array<number>(n)
    for (let j = 0; j < n; j++) row[j] = cell(i, j)
    values.push(row)
  }
  return { reachIds, values }
}

/** Elementwise product of two matrices over the same reaches. */
export function hadamard(a: ConnectivityMatrix, b: ConnectivityMatrix): ConnectivityMatrix {
  if (a.reachIds.length !== b.reachIds.length) {
    throw new Error(`matrix size mismatch: ${a.reachIds.length} vs ${b.reachIds.length}`)
  }
  return buildMatrix(a.reachIds, (i, j) => a.values[i][j] * b.values[i][j])
}

/** Looks a cell up by reach ids. Returns undefined for unknown ids. */
export function matrixValue(m: ConnectivityMatrix, from: string, to: string): number | undefined {
  const i = m.reachIds.indexOf(from)
  const j = m.reachIds.indexOf(to)
  if (i === -1 || j === -1) return undefined
  return m.values[i][j]
}

export function transpose(m: ConnectivityMatrix): ConnectivityMatrix {
  return buildMatrix(m.reachIds, (i, j) => m.values[j][i])
}
