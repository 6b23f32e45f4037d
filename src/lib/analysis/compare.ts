/**
 * Indicator comparison
 *
 * Turns an analysis request (which indicators, how to transform and shift each,
 * which dates) into aligned series, headline metrics and base-vs-others
 * correlation rows. Nothing here is persisted.
 */

import { z } from 'zod'
import { CONFIG } from '@/lib/config'
import { getIndicatorPoints, type SourceData } from '@/lib/sources/source-data'
import type { SourceId } from '@/lib/store/types'
import { ValidationError } from '@/lib/utils/errors'
import { formatChange, formatCorrelation, formatMetricValue, formatShift } from '@/lib/utils/format'
import { alignSeries, columnPoints, filterDateRange } from './alignment'
import { correlation, optimalLag } from './correlations'
import { isChangeMode, latestChange, shiftSeries, transformSeries } from './transform'
import {
  TRANSFORM_MODES,
  type AlignedTable,
  type DatedSeries,
  type LagCorrelation,
  type SeriesPoint,
  type TransformMode,
} from './types'

const IsoDaySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/)

const IndicatorSelectionSchema = z.object({
  source: z.enum(['FRED', 'BLS', 'ECOS']),
  code: z.string().min(1),
  transform: z.enum(TRANSFORM_MODES).default('raw'),
  shift: z.number().int().min(-CONFIG.analysis.maxShift).max(CONFIG.analysis.maxShift).default(0),
})

export const AnalysisRequestSchema = z
  .object({
    selections: z.array(IndicatorSelectionSchema).min(1),
    start: IsoDaySchema.optional(),
    end: IsoDaySchema.optional(),
    /** Series key (SOURCE:CODE) to correlate the others against; defaults to the first */
    baseKey: z.string().optional(),
    maxLag: z.number().int().min(0).max(CONFIG.analysis.maxLagLimit).default(CONFIG.analysis.maxLag),
  })
  .refine((r) => !r.start || !r.end || r.start <= r.end, { message: 'start must not be after end', path: ['end'] })
  .refine((r) => new Set(r.selections.map(selectionKey)).size === r.selections.length, {
    message: 'each indicator may be selected once',
    path: ['selections'],
  })

export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>
export type AnalysisRequestInput = z.input<typeof AnalysisRequestSchema>
export type IndicatorSelection = z.infer<typeof IndicatorSelectionSchema>

export interface ComparedSeries {
  key: string
  source: SourceId
  code: string
  name: string
  label: string
  transform: TransformMode
  shift: number
  points: SeriesPoint[]
}

export interface SeriesMetric {
  key: string
  label: string
  latest: number | null
  latestDate: string | null
  change: number | null
  unit: string
  display: string | null
  changeDisplay: string | null
}

export interface CorrelationRow {
  key: string
  label: string
  correlation: number | null
  optimalLag: number
  maxCorrelation: number
  profile: LagCorrelation[]
  display: { correlation: string; optimalLag: string; maxCorrelation: string }
}

export interface ComparisonResult {
  series: ComparedSeries[]
  aligned: AlignedTable
  metrics: SeriesMetric[]
  baseKey: string | null
  correlations: CorrelationRow[]
  /** Selections with no stored data */
  missing: string[]
}

export function selectionKey(selection: Pick<IndicatorSelection, 'source' | 'code'>): string {
  return `${selection.source}:${selection.code}`
}

export function seriesLabel(source: SourceId, name: string, shift: number): string {
  const shiftText = formatShift(shift)
  return shiftText ? `[${source}] ${name} (${shiftText})` : `[${source}] ${name}`
}

export interface SelectionArg {
  source: string
  code: string
  transform?: string
  shift?: number
}

/**
 * "SOURCE:CODE[:transform[:shift]]", e.g. "BLS:CUUR0000SA0:yoy:-3". Validation is
 * left to parseAnalysisRequest.
 */
export function parseSelectionArg(arg: string): SelectionArg {
  const [source = '', code = '', transform, shift] = arg.split(':')
  return {
    source: source.toUpperCase(),
    code,
    ...(transform ? { transform: transform.toLowerCase() } : {}),
    ...(shift !== undefined && shift !== '' ? { shift: Number(shift) } : {}),
  }
}

export function parseAnalysisRequest(input: unknown): AnalysisRequest {
  const parsed = AnalysisRequestSchema.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ValidationError(`Invalid analysis request: ${issue?.message ?? 'unknown issue'}`, issue?.path.join('.'))
  }
  return parsed.data
}

function buildSeries(selection: IndicatorSelection, data: SourceData, request: AnalysisRequest): ComparedSeries {
  const name = data.idToName[selection.code] ?? selection.code
  const raw = filterDateRange(getIndicatorPoints(data, selection.code), request.start, request.end)
  const points = shiftSeries(transformSeries(raw, selection.transform), selection.shift)
  return {
    key: selectionKey(selection),
    source: selection.source,
    code: selection.code,
    name,
    label: seriesLabel(selection.source, name, selection.shift),
    transform: selection.transform,
    shift: selection.shift,
    points,
  }
}

function buildMetric(series: ComparedSeries, aligned: AlignedTable): SeriesMetric {
  const column = aligned.columns[series.key] ?? []
  const unit = isChangeMode(series.transform) ? '%' : ''
  let latest: number | null = null
  let latestDate: string | null = null
  for (let i = column.length - 1; i >= 0; i--) {
    const v = column[i] ?? null
    if (v !== null) {
      latest = v
      latestDate = aligned.dates[i] ?? null
      break
    }
  }
  const change = latestChange(column)
  return {
    key: series.key,
    label: series.label,
    latest,
    latestDate,
    change,
    unit,
    display: latest === null ? null : formatMetricValue(latest, unit),
    changeDisplay: change === null ? null : formatChange(change),
  }
}

/**
 * Run a comparison over loaded source snapshots
 */
export function compareIndicators(input: AnalysisRequestInput, sources: Partial<Record<SourceId, SourceData>>): ComparisonResult {
  const request = parseAnalysisRequest(input)
  const series: ComparedSeries[] = []
  const missing: string[] = []

  for (const selection of request.selections) {
    const data = sources[selection.source]
    const key = selectionKey(selection)
    if (!data || !data.observations.some((o) => o.indicator === selection.code)) {
      console.warn(`[compare] no stored data for ${key}`)
      missing.push(key)
      continue
    }
    series.push(buildSeries(selection, data, request))
  }

  const aligned = alignSeries(series.map((s): DatedSeries => ({ key: s.key, points: s.points })))
  const metrics = series.map((s) => buildMetric(s, aligned))

  const correlations: CorrelationRow[] = []
  const base = series.find((s) => s.key === request.baseKey) ?? series[0] ?? null

  if (base && series.length >= 2) {
    const basePoints = columnPoints(aligned, base.key)
    for (const other of series) {
      if (other.key === base.key) continue
      const otherPoints = columnPoints(aligned, other.key)
      const current = correlation(basePoints, otherPoints)
      const best = optimalLag(basePoints, otherPoints, request.maxLag)
      correlations.push({
        key: other.key,
        label: other.label,
        correlation: current,
        optimalLag: best.lag,
        maxCorrelation: best.correlation,
        profile: best.profile,
        display: {
          correlation: formatCorrelation(current),
          optimalLag: `${best.lag} mo`,
          maxCorrelation: formatCorrelation(best.correlation),
        },
      })
    }
  }

  return { series, aligned, metrics, baseKey: base?.key ?? null, correlations, missing }
}

// ============================================================================
// Export
// ============================================================================

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

/**
 * Aligned table as CSV, newest row first, columns headed by series label
 */
export function alignedTableToCsv(aligned: AlignedTable, labels: Record<string, string> = {}): string {
  const header = ['Date', ...aligned.keys.map((k) => labels[k] ?? k)].map(csvField).join(',')
  const lines = [header]
  for (let i = aligned.dates.length - 1; i >= 0; i--) {
    const cells = [aligned.dates[i] ?? '']
    for (const key of aligned.keys) {
      const v = aligned.columns[key]?.[i] ?? null
      cells.push(v === null ? '' : String(v))
    }
    lines.push(cells.map(csvField).join(','))
  }
  return lines.join('\n') + '\n'
}
