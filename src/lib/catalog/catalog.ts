/**
 * Indicator Catalog - static code -> description/category lookup per source
 *
 * Catalogs ship as JSON beside this module (category -> code -> description) and
 * are validated once on first use. Nothing here is mutated after load.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { CONFIG } from '@/lib/config'
import type { CatalogEntry, SourceId } from '@/lib/store/types'

const CatalogFileSchema = z.object({
  source: z.enum(['FRED', 'BLS', 'ECOS']),
  categories: z.record(z.string().min(1), z.record(z.string().min(1), z.string())),
})

export interface IndicatorCatalog {
  source: SourceId
  /** category -> code -> description, in declaration order */
  categories: Record<string, Record<string, string>>
  /** Flattened union of every category: code -> description */
  indicators: Record<string, string>
}

const CATALOG_FILES: Record<SourceId, string> = {
  FRED: 'fred.json',
  BLS: 'bls.json',
  ECOS: 'ecos.json',
}

const loaded = new Map<SourceId, IndicatorCatalog>()

export function buildCatalog(source: SourceId, categories: Record<string, Record<string, string>>): IndicatorCatalog {
  const indicators: Record<string, string> = {}
  for (const codes of Object.values(categories)) {
    Object.assign(indicators, codes)
  }
  return { source, categories, indicators }
}

/**
 * Load the bundled catalog for a source
 */
export function loadCatalog(source: SourceId): IndicatorCatalog {
  const cached = loaded.get(source)
  if (cached) return cached

  const raw = readFileSync(new URL(`./data/${CATALOG_FILES[source]}`, import.meta.url), 'utf-8')
  const parsed = CatalogFileSchema.safeParse(JSON.parse(raw))
  if (!parsed.success) {
    throw new Error(`Invalid ${source} catalog: ` + JSON.stringify(parsed.error.issues))
  }
  if (parsed.data.source !== source) {
    throw new Error(`Catalog file ${CATALOG_FILES[source]} declares source ${parsed.data.source}, expected ${source}`)
  }

  const catalog = buildCatalog(source, parsed.data.categories)
  loaded.set(source, catalog)
  return catalog
}

/**
 * Category of an indicator code; the first declaring category wins
 */
export function getIndicatorCategory(catalog: IndicatorCatalog, code: string): string {
  for (const [category, codes] of Object.entries(catalog.categories)) {
    if (code in codes) return category
  }
  return CONFIG.storage.defaultCategory
}

export function getCategoryNames(catalog: IndicatorCatalog): string[] {
  return Object.keys(catalog.categories)
}

export function getCatalogEntries(catalog: IndicatorCatalog): CatalogEntry[] {
  return Object.keys(catalog.indicators).map((code) => ({
    code,
    description: catalog.indicators[code] ?? code,
    category: getIndicatorCategory(catalog, code),
  }))
}

/**
 * Short label for a description: "Real GDP (SA) - Quarterly" -> "Real GDP (SA)"
 */
export function getDisplayName(description: string): string {
  const cut = description.lastIndexOf(' - ')
  return cut > 0 ? description.slice(0, cut).trim() : description.trim()
}

export function describeIndicator(catalog: IndicatorCatalog, code: string): string {
  return catalog.indicators[code] ?? code
}

// ============================================================================
// Filtering
// ============================================================================

/**
 * Keep only indicators that have a column in the loaded data
 */
export function filterAvailableIndicators(
  indicators: Record<string, string>,
  availableCodes: Iterable<string>
): Record<string, string> {
  const available = new Set(availableCodes)
  return Object.fromEntries(Object.entries(indicators).filter(([code]) => available.has(code)))
}

/**
 * Indicators of one category that are present in the data.
 * The synthetic all-indicators category draws on the whole catalog.
 */
export function getCategoryIndicators(
  catalog: IndicatorCatalog,
  category: string,
  availableCodes: Iterable<string>
): Record<string, string> {
  const codes =
    category === CONFIG.storage.allSheetName ? catalog.indicators : catalog.categories[category] ?? {}
  return filterAvailableIndicators(codes, availableCodes)
}
