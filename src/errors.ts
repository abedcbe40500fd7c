/**
 * Typed error classes for the connectivity engine.
 *
 * Every error carries a `kind` discriminant so callers (the prioritization
 * engine, tests) can branch on the category without parsing messages.
 */

export type ConnectivityErrorKind =
  | 'invalid-attribute'
  | 'invalid-parameter'
  | 'invalid-configuration'
  | 'scenario-failure'

export abstract class ConnectivityError extends Error {
  abstract readonly kind: ConnectivityErrorKind

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** A requested reach/link field does not exist or is not a usable number. */
export class InvalidAttributeError extends ConnectivityError {
  readonly kind = 'invalid-attribute' as const
  /** Name of the offending attribute. */
  readonly field: string

  constructor(field: string, message: string) {
    super(message)
    this.name = 'InvalidAttributeError'
    this.field = field
  }
}

/** A kernel or passability parameter is missing, out of range, or of the wrong arity. */
export class InvalidParameterError extends ConnectivityError {
  readonly kind = 'invalid-parameter' as const
  /** Name of the offending parameter. */
  readonly field: string

  constructor(field: string, message: string) {
    super(message)
    this.name = 'InvalidParameterError'
    this.field = field
  }
}

/** The requested combination of options cannot produce an index. */
export class InvalidConfigurationError extends ConnectivityError {
  readonly kind = 'invalid-configuration' as const

  constructor(message: string) {
    super(message)
    this.name = 'InvalidConfigurationError'
  }
}

/** A single barrier scenario could not be computed. */
export class ScenarioFailureError extends ConnectivityError {
  readonly kind = 'scenario-failure' as const
  readonly barrierId: string

  constructor(barrierId: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ScenarioFailureError'
    this.barrierId = barrierId
  }
}

export function isConnectivityError(err: unknown): err is ConnectivityError {
  return err instanceof ConnectivityError
}
