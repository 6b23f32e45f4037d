/**
 * Collection runs
 *
 * One run per source: read the stored workbook, fetch each catalog indicator
 * from its watermark onward, merge, partition and write the workbook back.
 */

import { CONFIG } from '@/lib/config'
import { createFetcher, type ClientOptions, type SeriesFetcher } from '@/lib/api-clients'
import { CACHE_KEYS, deleteCached } from '@/lib/cache/redis'
import { loadCatalog, type IndicatorCatalog } from '@/lib/catalog/catalog'
import { readStoredObservations, workbookPath, writeSourceWorkbook } from '@/lib/persistence/workbook'
import { computeWatermarks, mergeObservations, partitionObservations } from '@/lib/store'
import { SOURCE_IDS, type Observation, type SourceId } from '@/lib/store/types'
import { getErrorMessage, isRateLimitError, ValidationError } from '@/lib/utils/errors'

export interface CollectOptions {
  catalog?: IndicatorCatalog
  filePath?: string
}

export interface CollectSummary {
  source: SourceId
  stored: number
  fetched: number
  total: number
  /** Indicator codes whose fetch threw */
  failed: string[]
  /** Category tables written, without the unrestricted one */
  sheets: string[]
  written: boolean
}

export type SourceOutcome =
  | { source: SourceId; ok: true; summary: CollectSummary }
  | { source: SourceId; ok: false; error: string }

export async function collectSource(fetcher: SeriesFetcher, options: CollectOptions = {}): Promise<CollectSummary> {
  const source = fetcher.source
  const catalog = options.catalog ?? loadCatalog(source)
  const filePath = options.filePath ?? workbookPath(source)

  const stored = await readStoredObservations(filePath, catalog)
  const watermarks = computeWatermarks(stored)

  const fetched: Observation[] = []
  const failed: string[] = []

  const codes = Object.keys(catalog.indicators)
  console.log(`[collect] ${source}: ${codes.length} indicator(s)`)
  // Sequential: the providers rate-limit per key
  for (const [i, code] of codes.entries()) {
    const description = catalog.indicators[code] ?? code
    try {
      const batch = await fetcher.fetchObservations({ code, description, since: watermarks.get(code) ?? null })
      fetched.push(...batch)
    } catch (error) {
      if (isRateLimitError(error)) {
        const skipped = codes.slice(i)
        console.warn(`[collect] ${source}: rate limited at ${code}, skipping ${skipped.length} indicator(s)`)
        failed.push(...skipped)
        break
      }
      console.warn(`[collect] ${source} ${code}: fetch failed, keeping stored data (${getErrorMessage(error)})`)
      failed.push(code)
    }
  }

  const summary: CollectSummary = {
    source,
    stored: stored.length,
    fetched: fetched.length,
    total: 0,
    failed,
    sheets: [],
    written: false,
  }

  if (stored.length === 0 && fetched.length === 0) {
    console.log(`[collect] ${source}: nothing to save`)
    return summary
  }

  const { observations } = mergeObservations(stored, fetched)
  const partition = partitionObservations(observations, catalog)
  await writeSourceWorkbook(filePath, partition)
  await deleteCached(CACHE_KEYS.SOURCE_DATA(source, filePath))

  console.log(`[collect] ${source}: ${fetched.length} new, ${observations.length} total`)
  return {
    ...summary,
    total: observations.length,
    sheets: partition.categories.map((t) => t.name),
    written: true,
  }
}

/**
 * Collect several sources in turn. One source failing does not stop the rest.
 */
export async function collectAll(
  sources: readonly SourceId[],
  options: { dataDir?: string; client?: ClientOptions } = {}
): Promise<SourceOutcome[]> {
  const dataDir = options.dataDir ?? CONFIG.storage.dataDir
  const outcomes: SourceOutcome[] = []

  for (const source of sources) {
    try {
      const summary = await collectSource(createFetcher(source, options.client), {
        filePath: workbookPath(source, dataDir),
      })
      outcomes.push({ source, ok: true, summary })
    } catch (error) {
      console.error(`[collect] ${source} failed: ${getErrorMessage(error)}`)
      outcomes.push({ source, ok: false, error: getErrorMessage(error) })
    }
  }

  console.log('[collect] summary')
  for (const outcome of outcomes) {
    console.log(outcome.ok ? `  ${outcome.source}: ok` : `  ${outcome.source}: failed (${outcome.error})`)
  }
  return outcomes
}

/**
 * Sources named after --source / -s (case-insensitive). No flag means every source.
 */
export function parseSourceArgs(argv: readonly string[]): SourceId[] {
  const flagIdx = argv.findIndex((a) => a === '--source' || a === '-s')
  if (flagIdx < 0) return [...SOURCE_IDS]

  const requested: SourceId[] = []
  for (const arg of argv.slice(flagIdx + 1)) {
    if (arg.startsWith('-')) break
    const source = SOURCE_IDS.find((s) => s === arg.toUpperCase())
    if (!source) {
      throw new ValidationError(`Unknown source "${arg}" (expected one of ${SOURCE_IDS.join(', ').toLowerCase()})`, 'source')
    }
    if (!requested.includes(source)) requested.push(source)
  }
  if (requested.length === 0) {
    throw new ValidationError('--source needs at least one source', 'source')
  }
  return requested
}
