/**
 * Incremental Store - Type Definitions
 *
 * Dates are ISO day strings (YYYY-MM-DD) throughout the store so that ordering
 * and equality are plain string operations.
 */

export type SourceId = 'FRED' | 'BLS' | 'ECOS'

export const SOURCE_IDS: readonly SourceId[] = ['FRED', 'ECOS', 'BLS']

/** One value of one indicator on one day. Natural key is (indicator, date). */
export interface Observation {
  readonly date: string
  readonly indicator: string
  readonly value: number
  readonly description: string
  readonly unit: string
}

export interface CatalogEntry {
  code: string
  description: string
  category: string
}

// ============================================================================
// Wide Layout
// ============================================================================

export interface WideRow {
  date: string
  /** One slot per table column; null where the indicator has no observation that day */
  values: (number | null)[]
}

export interface WideTable {
  /** Category name, or the synthetic all-indicators name */
  name: string
  /** Indicator codes, lexicographically sorted. The date column is implicit and first. */
  columns: string[]
  /** Metadata row 1: display name per column */
  displayNames: string[]
  /** Metadata row 2: unit per column */
  units: string[]
  /** Ascending, one row per date */
  rows: WideRow[]
}

export interface PartitionResult {
  /** Non-empty category tables, in catalog category order */
  categories: WideTable[]
  /** Unrestricted table over every indicator present */
  all: WideTable
  /** Catalog categories with no observed indicators */
  emptyCategories: string[]
}

export interface MergeResult {
  observations: Observation[]
  /** Records discarded for an unusable date or value */
  dropped: number
}
