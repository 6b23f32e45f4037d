/**
 * Comparative analytics - type definitions
 *
 * Series are date-ordered and may carry gaps (null). Every operation here is a
 * pure function of its arguments.
 */

export const TRANSFORM_MODES = ['raw', 'indexed', 'mom', 'qoq', 'yoy'] as const

export type TransformMode = (typeof TRANSFORM_MODES)[number]

export interface SeriesPoint {
  date: string // ISO day, YYYY-MM-DD
  value: number | null
}

export interface DatedSeries {
  key: string
  points: SeriesPoint[]
}

export interface AlignedTable {
  /** Union of every input date, ascending */
  dates: string[]
  /** Series keys in input order */
  keys: string[]
  /** One slot per date; null where the series has no value that day */
  columns: Record<string, (number | null)[]>
}

export interface LagCorrelation {
  lag: number
  correlation: number | null
}

export interface OptimalLag {
  lag: number
  correlation: number
  /** Correlation at every lag searched, most negative first */
  profile: LagCorrelation[]
}
