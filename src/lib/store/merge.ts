import { compareText } from '@/lib/utils/dates'
import { isValidObservation } from '@/lib/utils/data-validation'
import type { MergeResult, Observation } from './types'

export function observationKey(obs: Pick<Observation, 'indicator' | 'date'>): string {
  return `${obs.indicator}\u0000${obs.date}`
}

export function compareObservations(a: Observation, b: Observation): number {
  return compareText(a.date, b.date) || compareText(a.indicator, b.indicator)
}

/**
 * Merge stored observations with freshly fetched ones.
 *
 * For a repeated (indicator, date) key the record appended last wins, so a
 * provider revision in `incoming` replaces the stored value. Output is sorted by
 * (date, indicator). Malformed records are dropped and counted.
 */
export function mergeObservations(existing: readonly Observation[], incoming: readonly Observation[]): MergeResult {
  const byKey = new Map<string, Observation>()
  let dropped = 0

  for (const batch of [existing, incoming]) {
    for (const obs of batch) {
      if (!isValidObservation(obs)) {
        dropped++
        continue
      }
      byKey.set(observationKey(obs), obs)
    }
  }

  if (dropped > 0) {
    console.warn(`[store] dropped ${dropped} malformed observation(s) during merge`)
  }

  const observations = [...byKey.values()].sort(compareObservations)
  return { observations, dropped }
}
