import { describe, it, expect } from 'vitest'
import {
  assertProbability,
  extractRoutingTables,
  readBarrierPassability,
  readReachAttribute,
} from '../../src/network/extractor.js'
import { InvalidAttributeError, InvalidParameterError } from '../../src/errors.js'
import type { RiverNetwork } from '../../src/types.js'
import { barrier, chainNetwork } from '../helpers.js'

describe('readReachAttribute', () => {
  it('returns values in network order', () => {
    const network: RiverNetwork = {
      reaches: [
        { id: 'x', attributes: { area: 3 } },
        { id: 'y', attributes: { area: 0 } },
      ],
      links: [],
    }
    expect(readReachAttribute(network, 'area')).toEqual([3, 0])
  })

  it('names the reach missing the attribute', () => {
    expect(() => readReachAttribute(chainNetwork(), 'area')).toThrow(InvalidAttributeError)
    expect(() => readReachAttribute(chainNetwork(), 'area')).toThrow('"area" is not an attribute of reach "a"')
  })

  it('rejects negative values', () => {
    const network: RiverNetwork = { reaches: [{ id: 'x', attributes: { length: -1 } }], links: [] }
    expect(() => readReachAttribute(network, 'length')).toThrow(InvalidAttributeError)
  })
})

describe('readBarrierPassability', () => {
  it('reads both directions', () => {
    expect(readBarrierPassability(barrier('l', 'a', 'b', 'D', 0.2, 0.9), 'pass_u', 'pass_d')).toEqual({
      upstream: 0.2,
      downstream: 0.9,
    })
  })

  it('reports a missing attribute as an attribute error', () => {
    const link = barrier('l', 'a', 'b', 'D', 0.2, 0.9)
    expect(() => readBarrierPassability(link, 'passage_up', 'pass_d')).toThrow(InvalidAttributeError)
  })

  it('reports an out-of-range value as a parameter error', () => {
    const link = barrier('l', 'a', 'b', 'D', 1.5, 0.9)
    expect(() => readBarrierPassability(link, 'pass_u', 'pass_d')).toThrow(InvalidParameterError)
    expect(() => readBarrierPassability(link, 'pass_u', 'pass_d')).toThrow(
      '"pass_u" of barrier link "l" must lie in [0, 1] (got 1.5)'
    )
  })
})

describe('assertProbability', () => {
  it('accepts the closed unit interval', () => {
    expect(() => assertProbability('p', 0)).not.toThrow()
    expect(() => assertProbability('p', 1)).not.toThrow()
  })

  it('rejects NaN', () => {
    expect(() => assertProbability('p', Number.NaN)).toThrow('"p" must lie in [0, 1] (got NaN)')
  })
})

describe('extractRoutingTables', () => {
  it('symmetric: one midpoint edge per link', () => {
    const tables = extractRoutingTables(chainNetwork(), 'length', 'symmetric')
    expect(tables).toEqual({
      direction: 'symmetric',
      edges: [
        { from: 'a', to: 'b', distance: 2 },
        { from: 'b', to: 'c', distance: 2 },
      ],
    })
  })

  it('midpoint distance averages both reaches', () => {
    const network: RiverNetwork = {
      reaches: [
        { id: 'p', attributes: { length: 1 } },
        { id: 'q', attributes: { length: 4 } },
      ],
      links: [{ id: 'pq', from: 'p', to: 'q', category: 'confluence', attributes: {} }],
    }
    const tables = extractRoutingTables(network, 'length', 'symmetric')
    expect(tables.direction === 'symmetric' && tables.edges[0].distance).toBe(2.5)
  })

  it('asymmetric: flags both traversals and adds zero-cost reversals', () => {
    const tables = extractRoutingTables(chainNetwork(), 'length', 'asymmetric')
    if (tables.direction !== 'asymmetric') throw new Error('expected asymmetric tables')

    expect(tables.flagged).toEqual([
      { from: 'a', to: 'b', distance: 2, direction: 'd' },
      { from: 'b', to: 'a', distance: 2, direction: 'u' },
      { from: 'b', to: 'c', distance: 2, direction: 'd' },
      { from: 'c', to: 'b', distance: 2, direction: 'u' },
    ])
    expect(tables.upstream).toEqual([
      { from: 'b', to: 'a', distance: 2 },
      { from: 'c', to: 'b', distance: 2 },
      { from: 'a', to: 'b', distance: 0 },
      { from: 'b', to: 'c', distance: 0 },
    ])
    expect(tables.downstream).toEqual([
      { from: 'a', to: 'b', distance: 2 },
      { from: 'b', to: 'c', distance: 2 },
      { from: 'b', to: 'a', distance: 0 },
      { from: 'c', to: 'b', distance: 0 },
    ])
  })
})
