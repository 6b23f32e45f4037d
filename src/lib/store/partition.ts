import { CONFIG } from '@/lib/config'
import { getDisplayName, getIndicatorCategory, type IndicatorCatalog } from '@/lib/catalog/catalog'
import { compareText } from '@/lib/utils/dates'
import { StoreInvariantError } from '@/lib/utils/errors'
import type { Observation, PartitionResult, WideRow, WideTable } from './types'

/**
 * Pivot deduplicated observations into a date x indicator table.
 *
 * Expects merge output: a repeated (indicator, date) key here means the caller
 * skipped the merge step, which is a contract violation rather than bad data.
 */
export function buildWideTable(name: string, observations: readonly Observation[]): WideTable {
  const latest = new Map<string, Observation>()
  const dateSet = new Set<string>()

  for (const obs of observations) {
    dateSet.add(obs.date)
    const prev = latest.get(obs.indicator)
    if (!prev || obs.date >= prev.date) latest.set(obs.indicator, obs)
  }

  const columns = [...latest.keys()].sort(compareText)
  const dates = [...dateSet].sort(compareText)
  const columnIndex = new Map(columns.map((code, i) => [code, i]))
  const rowIndex = new Map(dates.map((date, i) => [date, i]))

  const rows: WideRow[] = dates.map((date) => ({ date, values: columns.map(() => null) }))

  for (const obs of observations) {
    const row = rows[rowIndex.get(obs.date) ?? -1]
    const col = columnIndex.get(obs.indicator)
    if (!row || col === undefined) {
      throw new StoreInvariantError(`No cell for ${obs.indicator} on ${obs.date} in table ${name}`)
    }
    if (row.values[col] !== null) {
      throw new StoreInvariantError(`Duplicate observation for ${obs.indicator} on ${obs.date} in table ${name}; merge before partitioning`)
    }
    row.values[col] = obs.value
  }

  const displayNames = columns.map((code) => getDisplayName(latest.get(code)?.description ?? code))
  const units = columns.map((code) => latest.get(code)?.unit || CONFIG.storage.missingUnit)

  return { name, columns, displayNames, units, rows }
}

/**
 * Split merged observations into one wide table per catalog category plus an
 * unrestricted table. Categories with nothing observed are reported, not built.
 */
export function partitionObservations(merged: readonly Observation[], catalog: IndicatorCatalog): PartitionResult {
  const byCategory = new Map<string, Observation[]>()
  for (const obs of merged) {
    const category = getIndicatorCategory(catalog, obs.indicator)
    const bucket = byCategory.get(category)
    if (bucket) {
      bucket.push(obs)
    } else {
      byCategory.set(category, [obs])
    }
  }

  const categories: WideTable[] = []
  const emptyCategories: string[] = []

  for (const category of Object.keys(catalog.categories)) {
    const subset = byCategory.get(category)
    if (!subset || subset.length === 0) {
      console.warn(`[store] ${catalog.source} ${category}: no data, table omitted`)
      emptyCategories.push(category)
      continue
    }
    categories.push(buildWideTable(category, subset))
  }

  return {
    categories,
    all: buildWideTable(CONFIG.storage.allSheetName, merged),
    emptyCategories,
  }
}
