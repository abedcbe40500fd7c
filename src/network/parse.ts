/**
 * parse.ts — Validates untrusted network and scenario-table input.
 *
 * Networks and scenario tables usually arrive as JSON or YAML documents.
 * These schemas check shape only; topology (acyclicity, orientation) is the
 * caller's responsibility.
 */

import { z } from 'zod'
import { formatZodErrors } from '../error-utils.js'
import { InvalidAttributeError, InvalidParameterError } from '../errors.js'
import { LINK_CATEGORIES } from '../types.js'
import type { BarrierScenario, RiverNetwork } from '../types.js'

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const attributesSchema = z.record(z.string(), z.number().finite()).default({})

const reachSchema = z
  .object({
    id: z.string().min(1, 'reach id must not be empty'),
    attributes: attributesSchema,
  })
  .strip()

const linkSchema = z
  .object({
    id: z.string().min(1, 'link id must not be empty'),
    from: z.string().min(1),
    to: z.string().min(1),
    category: z.enum(LINK_CATEGORIES),
    barrierId: z.string().min(1).optional(),
    attributes: attributesSchema,
  })
  .strip()
  .refine((l) => l.category !== 'barrier' || l.barrierId !== undefined, {
    message: 'barrier links must carry a barrierId',
    path: ['barrierId'],
  })

export const riverNetworkSchema = z
  .object({
    reaches: z.array(reachSchema).min(1, 'a network needs at least one reach'),
    links: z.array(linkSchema).default([]),
  })
  .strip()
  .superRefine((net, ctx) => {
    const ids = new Set<string>()
    net.reaches.forEach((r, i) => {
      if (ids.has(r.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['reaches', i, 'id'], message: `duplicate reach id "${r.id}"` })
      }
      ids.add(r.id)
    })
    net.links.forEach((l, i) => {
      if (!ids.has(l.from)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['links', i, 'from'], message: `unknown reach "${l.from}"` })
      }
      if (!ids.has(l.to)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['links', i, 'to'], message: `unknown reach "${l.to}"` })
      }
    })
  })

const scenarioSchema = z
  .object({
    barrierId: z.string().min(1, 'barrierId must not be empty'),
    passUpstream: z.number(),
    passDownstream: z.number(),
  })
  .strip()

export const barrierScenarioTableSchema = z.array(scenarioSchema)

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses a raw network description into a {@link RiverNetwork}.
 *
 * @throws {InvalidAttributeError} when the input does not match the schema.
 */
export function parseRiverNetwork(raw: unknown): RiverNetwork {
  const result = riverNetworkSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidAttributeError(
      'network',
      `River network is invalid:\n${formatZodErrors(result.error.errors)}`
    )
  }
  return result.data
}

/**
 * Parses a raw barrier scenario table. Range checks on the passabilities are
 * left to the prioritization engine so that one bad row fails alone instead
 * of rejecting the whole table.
 *
 * @throws {InvalidParameterError} when the input does not match the schema.
 */
export function parseBarrierScenarios(raw: unknown): readonly BarrierScenario[] {
  const result = barrierScenarioTableSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidParameterError(
      'scenarios',
      `Barrier scenario table is invalid:\n${formatZodErrors(result.error.errors)}`
    )
  }
  return result.data
}
