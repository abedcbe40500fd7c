import { readFile } from 'node:fs/promises'
import { parse as yamlParse } from 'yaml'
import { z } from 'zod'
import { formatZodErrors } from './error-utils.js'

// ---------------------------------------------------------------------------
// Shared field validators
// ---------------------------------------------------------------------------

/** Attribute names are looked up verbatim on reaches and links. */
const attributeNameField = z
  .string()
  .min(1, 'attribute names must not be empty')

/** A probability of crossing a link, in [0, 1]. */
const probabilityField = (path: string) =>
  z
    .number()
    .min(0, `${path} must be >= 0`)
    .max(1, `${path} must be <= 1`)

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

/**
 * Names of the attributes the engine reads from reaches and links.
 * Passed explicitly to every entry point; there are no module-level defaults
 * that a concurrent scenario could observe changing.
 */
const fieldsSchema = z
  .object({
    /** Reach attribute used as the weight in index aggregation. */
    weight: attributeNameField.default('length'),
    /** Reach attribute used to derive midpoint-to-midpoint routing distances. */
    distance: attributeNameField.default('length'),
    /** Link attribute holding the upstream passability of a barrier. */
    passUpstream: attributeNameField.default('pass_u'),
    /** Link attribute holding the downstream passability of a barrier. */
    passDownstream: attributeNameField.default('pass_d'),
  })
  .strip()

/**
 * Controls how confluences take part in the structural (c_ij) product.
 */
const structuralSchema = z
  .object({
    /**
     * Passability assigned to every confluence link.
     * @default 1
     */
    passConfluence: probabilityField('structural.passConfluence').default(1),
    /**
     * - "per-traversal": a confluence contributes `passConfluence` once each
     *   time a path crosses it, in both directionality modes (default)
     * - "as-barrier": a confluence is treated like a barrier whose upstream
     *   and downstream passabilities both equal `passConfluence`; in symmetric
     *   mode it then contributes `passConfluence²`
     */
    confluenceRule: z.enum(['per-traversal', 'as-barrier']).default('per-traversal'),
  })
  .strip()

/**
 * Controls the barrier prioritization batch.
 */
const prioritizationSchema = z
  .object({
    /**
     * Maximum number of scenarios in flight at once.
     * 1 runs the batch sequentially.
     * @default 1
     */
    concurrency: z
      .number()
      .int()
      .min(1, 'prioritization.concurrency must be at least 1')
      .max(64, 'prioritization.concurrency must be at most 64')
      .default(1),
  })
  .strip()

/**
 * Controls structured metric output.
 * When enabled, metrics are written to stderr with a `[fluvial:metrics]`
 * prefix and, if `filePath` is set, appended as JSONL to that file.
 */
const metricsSchema = z
  .object({
    enabled: z.boolean().default(false),
    filePath: z
      .string()
      .min(1, 'metrics.filePath must not be empty')
      .optional(),
  })
  .strip()

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

/**
 * Zod schema for the engine configuration.
 *
 * - Unknown keys are stripped, not rejected.
 * - All fields have defaults; an empty object `{}` produces a fully-valid config.
 */
export const connectivityConfigSchema = z
  .object({
    fields: fieldsSchema.default({}),
    structural: structuralSchema.default({}),
    prioritization: prioritizationSchema.default({}),
    metrics: metricsSchema.default({}),
  })
  .strip()

// ---------------------------------------------------------------------------
// Unknown-key helpers for parseConfig
// ---------------------------------------------------------------------------

const SUB_SCHEMA_SHAPES: Record<string, ReadonlySet<string>> = {
  fields: new Set(Object.keys(fieldsSchema.shape)),
  structural: new Set(Object.keys(structuralSchema.shape)),
  prioritization: new Set(Object.keys(prioritizationSchema.shape)),
  metrics: new Set(Object.keys(metricsSchema.shape)),
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v)
}

/**
 * Returns unknown key paths in `raw` at the top level and one level deep
 * inside recognised sub-objects (e.g. `"structural.passConfluense"`).
 */
function collectUnknownConfigKeys(raw: Record<string, unknown>): readonly string[] {
  const topLevelKnown = new Set(Object.keys(connectivityConfigSchema.shape))
  const result: string[] = []
  for (const key of Object.keys(raw)) {
    if (!topLevelKnown.has(key)) {
      result.push(key)
      continue
    }
    const subShape = SUB_SCHEMA_SHAPES[key]
    const nested = raw[key]
    if (subShape === undefined || !isPlainObject(nested)) continue
    for (const subKey of Object.keys(nested)) {
      if (!subShape.has(subKey)) result.push(`${key}.${subKey}`)
    }
  }
  return result
}

/** Options accepted by {@link parseConfig}. */
export interface ParseConfigOptions {
  /**
   * Called with all unknown key paths (e.g. `["typo", "fields.wieght"]`)
   * when the raw input contains keys not recognised by the schema.
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

type DeepReadonly<T> =
  T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Fully-resolved engine configuration with all defaults applied. Immutable. */
export type ConnectivityConfig = DeepReadonly<z.infer<typeof connectivityConfigSchema>>

export type ConfluenceRule = ConnectivityConfig['structural']['confluenceRule']

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/**
 * Thrown by `parseConfig` when the input contains invalid values.
 * The message lists every failing field path; the original `ZodError` is
 * preserved as `Error.cause`.
 */
export class ConfigValidationError extends Error {
  readonly issues: readonly z.ZodIssue[]

  constructor(zodError: z.ZodError) {
    super(`Connectivity configuration is invalid:\n${formatZodErrors(zodError.errors)}`, { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.errors
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Parse / load
// ---------------------------------------------------------------------------

/**
 * Parses and validates raw (unknown) config input, applying all defaults.
 *
 * @throws {ConfigValidationError} if the input contains invalid values.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): ConnectivityConfig {
  const result = connectivityConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (isPlainObject(raw) && options.onUnknownKeys !== undefined) {
    const unknownKeys = collectUnknownConfigKeys(raw)
    if (unknownKeys.length > 0) {
      try {
        options.onUnknownKeys(unknownKeys)
      } catch (err) {
        console.error('[fluvial] config: onUnknownKeys callback threw; ignored.', err)
      }
    }
  }

  return result.data
}

/** The configuration used when a caller passes none. */
export const DEFAULT_CONFIG: ConnectivityConfig = parseConfig({})

/**
 * Reads a YAML (or JSON) configuration file and parses it with
 * {@link parseConfig}. An empty file yields the defaults.
 */
export async function loadConfigFile(
  filePath: string,
  options: ParseConfigOptions = {}
): Promise<ConnectivityConfig> {
  const text = await readFile(filePath, 'utf-8')
  const raw: unknown = yamlParse(text)
  return parseConfig(raw, options)
}
