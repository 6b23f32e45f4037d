/**
 * Comparative Analytics
 *
 * Transform, align and correlate indicator series drawn from any source.
 */

export type { TransformMode, SeriesPoint, DatedSeries, AlignedTable, LagCorrelation, OptimalLag } from './types'

export { TRANSFORM_MODES } from './types'

export {
  TRANSFORM_LABELS,
  CHANGE_PERIODS,
  isChangeMode,
  indexValues,
  percentChange,
  transformValues,
  shiftValues,
  latestChange,
  transformSeries,
  shiftSeries,
} from './transform'

export { alignSeries, columnPoints, filterDateRange } from './alignment'

export { pearsonCorrelation, pairByDate, correlation, optimalLag } from './correlations'

export {
  AnalysisRequestSchema,
  parseAnalysisRequest,
  parseSelectionArg,
  selectionKey,
  seriesLabel,
  compareIndicators,
  alignedTableToCsv,
} from './compare'
export type {
  AnalysisRequest,
  AnalysisRequestInput,
  IndicatorSelection,
  SelectionArg,
  ComparedSeries,
  ComparisonResult,
  SeriesMetric,
  CorrelationRow,
} from './compare'
