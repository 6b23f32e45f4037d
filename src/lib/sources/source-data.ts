/**
 * Source session data
 *
 * A read-only snapshot of one source's workbook for an analysis session: the
 * long-form observations plus the name/unit metadata recovered from the sheets.
 */

import { CONFIG } from '@/lib/config'
import { CACHE_KEYS, CACHE_TTL, getCached, setCached } from '@/lib/cache/redis'
import { loadCatalog } from '@/lib/catalog/catalog'
import { collectObservations, readSourceWorkbook, workbookPath } from '@/lib/persistence/workbook'
import { SOURCE_IDS, type Observation, type SourceId } from '@/lib/store/types'
import type { SeriesPoint } from '@/lib/analysis/types'
import { getErrorMessage } from '@/lib/utils/errors'

export interface SourceData {
  source: SourceId
  /** Sorted by (date, indicator) */
  observations: Observation[]
  /** code -> display name */
  idToName: Record<string, string>
  /** code -> unit */
  units: Record<string, string>
  /** Category sheet names, without the unrestricted sheet */
  categories: string[]
}

export interface LoadOptions {
  dataDir?: string
  /** Skip the session cache and re-read the workbook */
  fresh?: boolean
}

export function emptySourceData(source: SourceId): SourceData {
  return { source, observations: [], idToName: {}, units: {}, categories: [] }
}

export function hasData(data: SourceData): boolean {
  return data.observations.length > 0
}

/**
 * Indicators that actually have observations: code -> display name
 */
export function getAvailableIndicators(data: SourceData): Record<string, string> {
  const present = new Set(data.observations.map((o) => o.indicator))
  return Object.fromEntries(Object.entries(data.idToName).filter(([code]) => present.has(code)))
}

export function getDateRange(data: SourceData): { start: string | null; end: string | null } {
  const first = data.observations[0]
  const last = data.observations[data.observations.length - 1]
  return { start: first?.date ?? null, end: last?.date ?? null }
}

/**
 * Ascending points for one indicator
 */
export function getIndicatorPoints(data: SourceData, code: string): SeriesPoint[] {
  return data.observations.filter((o) => o.indicator === code).map((o) => ({ date: o.date, value: o.value }))
}

async function readSourceData(source: SourceId, filePath: string): Promise<SourceData> {
  const parsed = await readSourceWorkbook(filePath, loadCatalog(source))
  if (!parsed) {
    console.log(`[sources] ${source}: no workbook at ${filePath}`)
    return emptySourceData(source)
  }

  const observations = collectObservations(parsed)
  const idToName: Record<string, string> = {}
  const units: Record<string, string> = {}
  for (const sheet of parsed.sheets) {
    Object.assign(idToName, sheet.displayNames)
    Object.assign(units, sheet.units)
  }
  const all = parsed.sheets.find((s) => s.name === CONFIG.storage.allSheetName)
  if (all) {
    Object.assign(idToName, all.displayNames)
    Object.assign(units, all.units)
  }

  return {
    source,
    observations,
    idToName,
    units,
    categories: parsed.sheetNames.filter((name) => name !== CONFIG.storage.allSheetName),
  }
}

/**
 * Load one source for analysis. A workbook that cannot be read yields an empty
 * snapshot so the other sources stay usable.
 */
export async function loadSourceData(source: SourceId, options: LoadOptions = {}): Promise<SourceData> {
  const filePath = workbookPath(source, options.dataDir ?? CONFIG.storage.dataDir)
  const cacheKey = CACHE_KEYS.SOURCE_DATA(source, filePath)
  const cached = options.fresh ? null : await getCached<SourceData>(cacheKey)
  if (cached) return cached

  try {
    const data = await readSourceData(source, filePath)
    if (hasData(data)) await setCached(cacheKey, data, CACHE_TTL.SOURCE_DATA)
    return data
  } catch (error) {
    console.error(`[sources] error loading ${source}: ${getErrorMessage(error)}`)
    return emptySourceData(source)
  }
}

export async function loadAllSourceData(options: LoadOptions = {}): Promise<Record<SourceId, SourceData>> {
  const loaded = await Promise.all(SOURCE_IDS.map((source) => loadSourceData(source, options)))
  const result: Partial<Record<SourceId, SourceData>> = {}
  for (const data of loaded) result[data.source] = data
  return {
    FRED: result.FRED ?? emptySourceData('FRED'),
    BLS: result.BLS ?? emptySourceData('BLS'),
    ECOS: result.ECOS ?? emptySourceData('ECOS'),
  }
}
