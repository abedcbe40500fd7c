import { describe, it, expect } from 'vitest'
import { evaluateKernel, resolveKernel } from '../../src/connectivity/kernels.js'
import type { KernelSettings } from '../../src/connectivity/kernels.js'
import { InvalidParameterError } from '../../src/errors.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Asserts resolving `settings` throws an InvalidParameterError for `field`. */
function expectParamError(settings: KernelSettings, field: string): void {
  try {
    resolveKernel(settings)
  } catch (err) {
    expect(err).toBeInstanceOf(InvalidParameterError)
    if (err instanceof InvalidParameterError) expect(err.field).toBe(field)
    return
  }
  throw new Error(`expected resolveKernel to reject "${field}"`)
}

// ---------------------------------------------------------------------------
// resolveKernel
// ---------------------------------------------------------------------------

describe('resolveKernel — exponential', () => {
  it('defaults to symmetric', () => {
    expect(resolveKernel({ type: 'exponential', param: 0.9 })).toEqual({
      type: 'exponential',
      direction: 'symmetric',
      base: 0.9,
    })
  })

  it('accepts a base of exactly 1', () => {
    expect(resolveKernel({ type: 'exponential', param: 1 })).toMatchObject({ base: 1 })
  })

  it('rejects a missing base', () => {
    expectParamError({ type: 'exponential' }, 'param')
  })

  it('rejects bases outside (0, 1]', () => {
    expectParamError({ type: 'exponential', param: 0 }, 'param')
    expectParamError({ type: 'exponential', param: 1.2 }, 'param')
  })

  it('asymmetric needs both directional bases', () => {
    expectParamError({ type: 'exponential', direction: 'asymmetric', paramUpstream: 0.5 }, 'paramDownstream')
    expect(
      resolveKernel({ type: 'exponential', direction: 'asymmetric', paramUpstream: 0.5, paramDownstream: 0.25 })
    ).toEqual({ type: 'exponential', direction: 'asymmetric', baseUpstream: 0.5, baseDownstream: 0.25 })
  })
})

describe('resolveKernel — threshold', () => {
  it('accepts a cutoff of 0', () => {
    expect(resolveKernel({ type: 'threshold', param: 0 })).toEqual({
      type: 'threshold',
      direction: 'symmetric',
      cutoff: 0,
    })
  })

  it('rejects a negative cutoff', () => {
    expectParamError({ type: 'threshold', param: -1 }, 'param')
  })

  it('rejects a non-finite cutoff', () => {
    expectParamError({ type: 'threshold', param: Number.NaN }, 'param')
  })

  it('asymmetric reads paramUpstream first', () => {
    expectParamError({ type: 'threshold', direction: 'asymmetric', paramDownstream: 3 }, 'paramUpstream')
  })
})

describe('resolveKernel — leptokurtic', () => {
  it('requires exactly three parameters', () => {
    expectParamError({ type: 'leptokurtic', paramLeptokurtic: [2, 20] }, 'paramLeptokurtic')
    expectParamError({ type: 'leptokurtic' }, 'paramLeptokurtic')
  })

  it('names the offending entry', () => {
    expectParamError({ type: 'leptokurtic', paramLeptokurtic: [0, 20, 0.5] }, 'paramLeptokurtic[0]')
    expectParamError({ type: 'leptokurtic', paramLeptokurtic: [2, -1, 0.5] }, 'paramLeptokurtic[1]')
    expectParamError({ type: 'leptokurtic', paramLeptokurtic: [2, 20, 1.5] }, 'paramLeptokurtic[2]')
  })

  it('resolves an asymmetric request to symmetric', () => {
    const kernel = resolveKernel({ type: 'leptokurtic', direction: 'asymmetric', paramLeptokurtic: [2, 20, 0.5] })
    expect(kernel).toEqual({
      type: 'leptokurtic',
      direction: 'symmetric',
      sigmaStationary: 2,
      sigmaMobile: 20,
      stationaryShare: 0.5,
    })
  })
})

// ---------------------------------------------------------------------------
// evaluateKernel
// ---------------------------------------------------------------------------

describe('evaluateKernel', () => {
  it('exponential decays with distance', () => {
    const kernel = resolveKernel({ type: 'exponential', param: 0.5 })
    expect(evaluateKernel(kernel, { direction: 'symmetric', total: 0 })).toBe(1)
    expect(evaluateKernel(kernel, { direction: 'symmetric', total: 3 })).toBe(0.125)
    expect(evaluateKernel(kernel, { direction: 'symmetric', total: Infinity })).toBe(0)
  })

  it('asymmetric exponential multiplies both legs', () => {
    const kernel = resolveKernel({
      type: 'exponential',
      direction: 'asymmetric',
      paramUpstream: 0.5,
      paramDownstream: 0.25,
    })
    expect(evaluateKernel(kernel, { direction: 'asymmetric', upstream: 2, downstream: 1 })).toBe(0.0625)
  })

  it('threshold includes the cutoff itself', () => {
    const kernel = resolveKernel({ type: 'threshold', param: 10 })
    expect(evaluateKernel(kernel, { direction: 'symmetric', total: 10 })).toBe(1)
    expect(evaluateKernel(kernel, { direction: 'symmetric', total: 10.5 })).toBe(0)
    expect(evaluateKernel(kernel, { direction: 'symmetric', total: Infinity })).toBe(0)
  })

  it('asymmetric threshold needs both legs within their cutoffs', () => {
    const kernel = resolveKernel({ type: 'threshold', direction: 'asymmetric', paramUpstream: 0, paramDownstream: 5 })
    expect(evaluateKernel(kernel, { direction: 'asymmetric', upstream: 0, downstream: 5 })).toBe(1)
    expect(evaluateKernel(kernel, { direction: 'asymmetric', upstream: 0, downstream: 5.5 })).toBe(0)
    expect(evaluateKernel(kernel, { direction: 'asymmetric', upstream: 0.5, downstream: 0 })).toBe(0)
  })

  it('leptokurtic is 1 at distance 0', () => {
    const kernel = resolveKernel({ type: 'leptokurtic', paramLeptokurtic: [2, 20, 0.5] })
    expect(evaluateKernel(kernel, { direction: 'symmetric', total: 0 })).toBe(1)
  })

  it('leptokurtic mixes the two normal tails', () => {
    const kernel = resolveKernel({ type: 'leptokurtic', paramLeptokurtic: [2, 20, 0.5] })
    expect(evaluateKernel(kernel, { direction: 'symmetric', total: 9 })).toBeCloseTo(0.32635861796104476, 12)
  })

  it('rejects distances of the wrong shape', () => {
    const kernel = resolveKernel({ type: 'exponential', param: 0.5 })
    expect(() => evaluateKernel(kernel, { direction: 'asymmetric', upstream: 1, downstream: 1 })).toThrow(
      'symmetric kernel evaluated on directional distances'
    )
  })
})
