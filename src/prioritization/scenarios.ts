/**
 * scenarios.ts — Turns barrier scenario rows into override maps over the
 * immutable stored network.
 */

import { ConnectivityError, ScenarioFailureError } from '../errors.js'
import { assertProbability } from '../network/extractor.js'
import type { BarrierScenario, Passability, RiverNetwork } from '../types.js'

/** Ids of every barrier present in `network`. */
export function collectBarrierIds(network: RiverNetwork): ReadonlySet<string> {
  const ids = new Set<string>()
  for (const link of network.links) {
    if (link.category === 'barrier' && link.barrierId !== undefined) ids.add(link.barrierId)
  }
  return ids
}

/**
 * Validates `scenario` against the network's barriers and returns its
 * passabilities.
 *
 * @throws {ScenarioFailureError} for an unknown barrier id or an
 *   out-of-range passability; the underlying error is kept as `cause`.
 */
export function scenarioPassability(scenario: BarrierScenario, barrierIds: ReadonlySet<string>): Passability {
  if (!barrierIds.has(scenario.barrierId)) {
    throw new ScenarioFailureError(scenario.barrierId, `barrier "${scenario.barrierId}" is not in the network`)
  }
  try {
    assertProbability('passUpstream', scenario.passUpstream, `scenario for barrier "${scenario.barrierId}"`)
    assertProbability('passDownstream', scenario.passDownstream, `scenario for barrier "${scenario.barrierId}"`)
  } catch (err) {
    if (err instanceof ConnectivityError) {
      throw new ScenarioFailureError(scenario.barrierId, err.message, { cause: err })
    }
    throw err
  }
  return { upstream: scenario.passUpstream, downstream: scenario.passDownstream }
}

/** Override map for a single scenario over the stored network. */
export function scenarioOverrides(
  scenario: BarrierScenario,
  barrierIds: ReadonlySet<string>
): ReadonlyMap<string, Passability> {
  return new Map([[scenario.barrierId, scenarioPassability(scenario, barrierIds)]])
}

/**
 * Overrides of every valid scenario at once. Invalid scenarios are left out;
 * their own rows report the failure. A later row for the same barrier wins.
 */
export function combinedOverrides(
  scenarios: readonly BarrierScenario[],
  barrierIds: ReadonlySet<string>
): ReadonlyMap<string, Passability> {
  const overrides = new Map<string, Passability>()
  for (const scenario of scenarios) {
    try {
      overrides.set(scenario.barrierId, scenarioPassability(scenario, barrierIds))
    } catch (err) {
      if (!(err instanceof ScenarioFailureError)) throw err
    }
  }
  return overrides
}

/**
 * Add-one override map: every scenario applied except `scenario`'s own
 * barrier, which falls back to its stored passabilities.
 *
 * @throws {ScenarioFailureError} when `scenario` itself is invalid.
 */
export function addOneOverrides(
  scenario: BarrierScenario,
  barrierIds: ReadonlySet<string>,
  combined: ReadonlyMap<string, Passability>
): ReadonlyMap<string, Passability> {
  scenarioPassability(scenario, barrierIds)
  const overrides = new Map(combined)
  overrides.delete(scenario.barrierId)
  return overrides
}
