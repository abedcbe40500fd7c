/**
 * Shared fixtures for unit and integration tests.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { parseRiverNetwork } from '../src/network/parse.js'
import type { Link, RiverNetwork } from '../src/types.js'

/**
 * Sixteen reaches draining to reach "16", with seven dams (barrier ids
 * "1".."7"), each passing 0.1 upstream and 0.7 downstream. Weights and
 * routing distances are the `length` attribute; total length is 61.
 */
export function loadReferenceNetwork(): RiverNetwork {
  const path = fileURLToPath(new URL('./fixtures/reference-network.json', import.meta.url))
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'))
  return parseRiverNetwork(raw)
}

export function confluence(id: string, from: string, to: string): Link {
  return { id, from, to, category: 'confluence', attributes: {} }
}

export function barrier(id: string, from: string, to: string, barrierId: string, passU: number, passD: number): Link {
  return { id, from, to, category: 'barrier', barrierId, attributes: { pass_u: passU, pass_d: passD } }
}

/**
 * a → b → c, all length 2, one dam "D" (pass_u 0.5, pass_d 0.8) on a → b.
 */
export function chainNetwork(): RiverNetwork {
  return {
    reaches: [
      { id: 'a', attributes: { length: 2 } },
      { id: 'b', attributes: { length: 2 } },
      { id: 'c', attributes: { length: 2 } },
    ],
    links: [barrier('ab', 'a', 'b', 'D', 0.5, 0.8), confluence('bc', 'b', 'c')],
  }
}
