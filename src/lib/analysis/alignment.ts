/**
 * Date Alignment
 *
 * Outer-joins independently transformed series onto the union of their dates.
 * Gaps stay null; nothing is forward-filled.
 */

import { compareText } from '@/lib/utils/dates'
import type { AlignedTable, DatedSeries, SeriesPoint } from './types'

export function alignSeries(seriesList: DatedSeries[]): AlignedTable {
  const dateSet = new Set<string>()
  for (const s of seriesList) {
    for (const p of s.points) dateSet.add(p.date)
  }

  const dates = [...dateSet].sort(compareText)
  const position = new Map(dates.map((d, i) => [d, i]))
  const columns: Record<string, (number | null)[]> = {}
  const keys: string[] = []

  for (const s of seriesList) {
    if (!(s.key in columns)) keys.push(s.key)
    const column: (number | null)[] = dates.map(() => null)
    for (const p of s.points) {
      const i = position.get(p.date)
      if (i !== undefined && p.value !== null) column[i] = p.value
    }
    columns[s.key] = column
  }

  return { dates, keys, columns }
}

/**
 * Non-missing points of one aligned column
 */
export function columnPoints(table: AlignedTable, key: string): SeriesPoint[] {
  const column = table.columns[key]
  if (!column) return []
  const points: SeriesPoint[] = []
  table.dates.forEach((date, i) => {
    const value = column[i] ?? null
    if (value !== null) points.push({ date, value })
  })
  return points
}

/**
 * Keep the points whose date falls in [start, end]; either bound may be open
 */
export function filterDateRange(points: SeriesPoint[], start?: string | null, end?: string | null): SeriesPoint[] {
  return points.filter((p) => (!start || p.date >= start) && (!end || p.date <= end))
}
