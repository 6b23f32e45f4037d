import { addDaysISO } from '@/lib/utils/dates'
import type { Observation } from './types'

/**
 * First day a re-fetch needs to cover for one indicator: the day after the latest
 * stored date. Null when the indicator has never been stored, in which case the
 * fetcher falls back to its own default start.
 */
export function computeWatermark(existing: readonly Observation[], indicator: string): string | null {
  let latest: string | null = null
  for (const obs of existing) {
    if (obs.indicator === indicator && (latest === null || obs.date > latest)) {
      latest = obs.date
    }
  }
  return latest === null ? null : addDaysISO(latest, 1)
}

/**
 * Watermarks for every indicator present, in one pass
 */
export function computeWatermarks(existing: readonly Observation[]): Map<string, string> {
  const latest = new Map<string, string>()
  for (const obs of existing) {
    const prev = latest.get(obs.indicator)
    if (prev === undefined || obs.date > prev) latest.set(obs.indicator, obs.date)
  }

  const watermarks = new Map<string, string>()
  for (const [indicator, date] of latest) {
    watermarks.set(indicator, addDaysISO(date, 1))
  }
  return watermarks
}
