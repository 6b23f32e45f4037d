/**
 * Correlation & Lag Search
 *
 * Pearson correlation on date-paired values, and a brute-force search over
 * row-offset shifts for the lag with the strongest relationship.
 */

import { CONFIG } from '@/lib/config'
import { shiftSeries } from './transform'
import type { LagCorrelation, OptimalLag, SeriesPoint } from './types'

/**
 * Pearson correlation coefficient between two equal-length arrays.
 * Null when either side has zero variance or there are fewer than two pairs.
 */
export function pearsonCorrelation(x: number[], y: number[]): number | null {
  if (x.length !== y.length || x.length < 2) return null

  const n = x.length
  let sumX = 0
  let sumY = 0
  for (let i = 0; i < n; i++) {
    sumX += x[i] ?? 0
    sumY += y[i] ?? 0
  }
  const meanX = sumX / n
  const meanY = sumY / n

  // Second pass: centered sums
  let sumXY = 0
  let sumX2 = 0
  let sumY2 = 0
  for (let i = 0; i < n; i++) {
    const dx = (x[i] ?? 0) - meanX
    const dy = (y[i] ?? 0) - meanY
    sumXY += dx * dy
    sumX2 += dx * dx
    sumY2 += dy * dy
  }

  const denominator = Math.sqrt(sumX2 * sumY2)
  if (denominator === 0 || Number.isNaN(denominator)) return null
  return Math.min(1, Math.max(-1, sumXY / denominator))
}

/**
 * Inner-join two series on date, keeping only days where both have a value
 */
export function pairByDate(a: SeriesPoint[], b: SeriesPoint[]): { x: number[]; y: number[] } {
  const right = new Map<string, number>()
  for (const p of b) {
    if (p.value !== null) right.set(p.date, p.value)
  }

  const x: number[] = []
  const y: number[] = []
  for (const p of a) {
    if (p.value === null) continue
    const other = right.get(p.date)
    if (other === undefined) continue
    x.push(p.value)
    y.push(other)
  }
  return { x, y }
}

/**
 * Correlation of two series over their shared dates; null below the minimum sample
 */
export function correlation(
  a: SeriesPoint[],
  b: SeriesPoint[],
  minSamples: number = CONFIG.analysis.minSamplesForCorrelation
): number | null {
  const { x, y } = pairByDate(a, b)
  if (x.length < minSamples) return null
  return pearsonCorrelation(x, y)
}

/**
 * Shift `b` by every lag in [-maxLag, maxLag] and keep the strongest correlation.
 *
 * Lags are visited from most negative to most positive and only a strictly
 * larger magnitude replaces the current best, so ties go to the most leading lag.
 * A missing correlation counts as 0 while comparing. With no valid correlation
 * anywhere the result is lag 0, correlation 0.
 */
export function optimalLag(a: SeriesPoint[], b: SeriesPoint[], maxLag: number = CONFIG.analysis.maxLag): OptimalLag {
  const profile: LagCorrelation[] = []
  let best: { lag: number; correlation: number } | null = null
  let anyValid = false

  for (let lag = -maxLag; lag <= maxLag; lag++) {
    const corr = correlation(a, shiftSeries(b, lag))
    profile.push({ lag, correlation: corr })
    if (corr !== null) anyValid = true

    const score = corr ?? 0
    if (best === null || Math.abs(score) > Math.abs(best.correlation)) {
      best = { lag, correlation: score }
    }
  }

  if (!anyValid || best === null) return { lag: 0, correlation: 0, profile }
  return { ...best, profile }
}
