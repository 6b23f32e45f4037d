/**
 * Incremental Store
 *
 * Pure merge/partition logic between a source's persisted observations and a
 * fresh fetch. No I/O happens here; see persistence/ for the workbook format.
 */

export type {
  SourceId,
  Observation,
  CatalogEntry,
  WideRow,
  WideTable,
  PartitionResult,
  MergeResult,
} from './types'
export { SOURCE_IDS } from './types'

export { computeWatermark, computeWatermarks } from './watermark'
export { mergeObservations, observationKey, compareObservations } from './merge'
export { buildWideTable, partitionObservations } from './partition'
