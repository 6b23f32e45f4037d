/**
 * Transform Engine
 *
 * Period-over-period change and shifting work on row position, not calendar
 * distance: on a series with gaps "MoM" compares with the row N places back,
 * whatever date that is. Saved comparisons rely on this.
 */

import type { SeriesPoint, TransformMode } from './types'

export const TRANSFORM_LABELS: Record<TransformMode, string> = {
  raw: 'Raw Data',
  indexed: 'Indexed (Base=100)',
  mom: 'MoM',
  qoq: 'QoQ',
  yoy: 'YoY',
}

/** Row offsets for the change modes (monthly cadence -> month/quarter/year) */
export const CHANGE_PERIODS = {
  mom: 1,
  qoq: 3,
  yoy: 12,
} as const satisfies Partial<Record<TransformMode, number>>

export type ChangeMode = keyof typeof CHANGE_PERIODS

export function isChangeMode(mode: TransformMode): mode is ChangeMode {
  return mode in CHANGE_PERIODS
}

/**
 * Rebase so the first non-missing value is 100.
 * A zero base leaves the series untouched.
 */
export function indexValues(values: (number | null)[]): (number | null)[] {
  const base = values.find((v): v is number => v !== null)
  if (base === undefined || base === 0) return [...values]
  return values.map((v) => (v === null ? null : (v / base) * 100))
}

/**
 * N-row percent change: (v[t] - v[t-n]) / v[t-n] * 100
 */
export function percentChange(values: (number | null)[], n: number): (number | null)[] {
  const result: (number | null)[] = []

  for (let i = 0; i < values.length; i++) {
    if (i < n) {
      result.push(null)
      continue
    }

    const current = values[i] ?? null
    const previous = values[i - n] ?? null

    if (current === null || previous === null || previous === 0) {
      result.push(null)
    } else {
      result.push(((current - previous) / previous) * 100)
    }
  }

  return result
}

export function transformValues(values: (number | null)[], mode: TransformMode): (number | null)[] {
  switch (mode) {
    case 'raw':
      return [...values]
    case 'indexed':
      return indexValues(values)
    case 'mom':
    case 'qoq':
    case 'yoy':
      return percentChange(values, CHANGE_PERIODS[mode])
  }
}

/**
 * Move values by whole rows. Positive periods delay (lag), negative advance (lead).
 * Vacated slots become null; values pushed past either end are dropped.
 */
export function shiftValues(values: (number | null)[], periods: number): (number | null)[] {
  return values.map((_, i) => {
    const from = i - periods
    return from >= 0 && from < values.length ? (values[from] ?? null) : null
  })
}

/**
 * Percent change between the last two non-missing values.
 * Null with fewer than two values or a zero earlier value.
 */
export function latestChange(values: (number | null)[]): number | null {
  const present = values.filter((v): v is number => v !== null)
  if (present.length < 2) return null
  const prev = present[present.length - 2]
  const curr = present[present.length - 1]
  if (prev === undefined || curr === undefined || prev === 0) return null
  return ((curr - prev) / Math.abs(prev)) * 100
}

// ============================================================================
// Point-series wrappers (dates are carried through unchanged)
// ============================================================================

function withValues(points: SeriesPoint[], values: (number | null)[]): SeriesPoint[] {
  return points.map((p, i) => ({ date: p.date, value: values[i] ?? null }))
}

export function transformSeries(points: SeriesPoint[], mode: TransformMode): SeriesPoint[] {
  return withValues(points, transformValues(points.map((p) => p.value), mode))
}

export function shiftSeries(points: SeriesPoint[], periods: number): SeriesPoint[] {
  if (periods === 0) return points.map((p) => ({ ...p }))
  return withValues(points, shiftValues(points.map((p) => p.value), periods))
}
