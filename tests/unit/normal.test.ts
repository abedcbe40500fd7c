import { describe, it, expect } from 'vitest'
import { erfc, normalUpperTail } from '../../src/connectivity/normal.js'

function relativeError(actual: number, expected: number): number {
  return Math.abs(actual / expected - 1)
}

describe('erfc', () => {
  it('is exactly 1 at 0', () => {
    expect(erfc(0)).toBe(1)
  })

  it('is 0 at infinity', () => {
    expect(erfc(Infinity)).toBe(0)
  })

  it('matches reference values on both sides of the series cutoff', () => {
    expect(relativeError(erfc(1), 0.15729920705028513)).toBeLessThan(1e-12)
    expect(relativeError(erfc(2.4), 0.0006885138966450789)).toBeLessThan(1e-10)
    expect(relativeError(erfc(3), 2.2090496998585438e-5)).toBeLessThan(1e-12)
    expect(relativeError(erfc(6), 2.1519736712498916e-17)).toBeLessThan(1e-12)
  })
})

describe('normalUpperTail', () => {
  it('is one half at the mean', () => {
    expect(normalUpperTail(0, 5)).toBe(0.5)
  })

  it('gives the familiar 2.5% tail at 1.96 sigma', () => {
    expect(normalUpperTail(1.96, 1)).toBeCloseTo(0.024997895148220435, 12)
  })

  it('scales with sigma', () => {
    expect(normalUpperTail(19.6, 10)).toBeCloseTo(normalUpperTail(1.96, 1), 14)
  })
})
