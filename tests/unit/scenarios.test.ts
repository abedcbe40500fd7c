import { describe, it, expect } from 'vitest'
import {
  addOneOverrides,
  collectBarrierIds,
  combinedOverrides,
  scenarioOverrides,
} from '../../src/prioritization/scenarios.js'
import { InvalidParameterError, ScenarioFailureError } from '../../src/errors.js'
import { chainNetwork, loadReferenceNetwork } from '../helpers.js'

describe('collectBarrierIds', () => {
  it('lists every barrier once', () => {
    expect([...collectBarrierIds(loadReferenceNetwork())].sort()).toEqual(['1', '2', '3', '4', '5', '6', '7'])
  })
})

describe('scenarioOverrides', () => {
  const ids = collectBarrierIds(chainNetwork())

  it('maps the barrier to its new passabilities', () => {
    const overrides = scenarioOverrides({ barrierId: 'D', passUpstream: 1, passDownstream: 0.9 }, ids)
    expect([...overrides]).toEqual([['D', { upstream: 1, downstream: 0.9 }]])
  })

  it('rejects a barrier that is not in the network', () => {
    const run = () => scenarioOverrides({ barrierId: 'X', passUpstream: 1, passDownstream: 1 }, ids)
    expect(run).toThrow(ScenarioFailureError)
    expect(run).toThrow('barrier "X" is not in the network')
  })

  it('wraps range errors and keeps them as the cause', () => {
    try {
      scenarioOverrides({ barrierId: 'D', passUpstream: 1, passDownstream: 1.2 }, ids)
    } catch (err) {
      expect(err).toBeInstanceOf(ScenarioFailureError)
      if (err instanceof ScenarioFailureError) {
        expect(err.barrierId).toBe('D')
        expect(err.message).toBe('"passDownstream" of scenario for barrier "D" must lie in [0, 1] (got 1.2)')
        expect(err.cause).toBeInstanceOf(InvalidParameterError)
      }
      return
    }
    throw new Error('expected scenarioOverrides to throw')
  })
})

describe('combinedOverrides', () => {
  const ids = collectBarrierIds(loadReferenceNetwork())

  it('applies every valid scenario, later rows winning', () => {
    const overrides = combinedOverrides(
      [
        { barrierId: '1', passUpstream: 0.5, passDownstream: 0.5 },
        { barrierId: '99', passUpstream: 1, passDownstream: 1 },
        { barrierId: '2', passUpstream: 2, passDownstream: 1 },
        { barrierId: '1', passUpstream: 1, passDownstream: 1 },
      ],
      ids
    )
    expect([...overrides]).toEqual([['1', { upstream: 1, downstream: 1 }]])
  })
})

describe('addOneOverrides', () => {
  const ids = collectBarrierIds(loadReferenceNetwork())
  const combined = new Map([
    ['1', { upstream: 1, downstream: 1 }],
    ['4', { upstream: 1, downstream: 1 }],
  ])

  it('drops the scenario\'s own barrier and keeps the rest', () => {
    const overrides = addOneOverrides({ barrierId: '4', passUpstream: 1, passDownstream: 1 }, ids, combined)
    expect([...overrides]).toEqual([['1', { upstream: 1, downstream: 1 }]])
    expect(combined.size).toBe(2)
  })

  it('still validates the scenario', () => {
    expect(() => addOneOverrides({ barrierId: '99', passUpstream: 1, passDownstream: 1 }, ids, combined)).toThrow(
      ScenarioFailureError
    )
  })
})
