import { CONFIG, readApiKey } from '@/lib/config'
import type { Observation } from '@/lib/store/types'
import { validateObservations, type ObservationInput } from '@/lib/utils/data-validation'
import { compareText } from '@/lib/utils/dates'
import { fetchJson } from './http'
import { BLSResponseSchema, type BLSResponse, type ClientOptions, type FetchRequest, type SeriesFetcher } from './types'

const MONTHLY_PERIOD = /^M(0[1-9]|1[0-2])$/

/**
 * ISO day for a monthly BLS period ("M07" -> YYYY-07-01). M13 (annual average)
 * and non-monthly periods yield null.
 */
export function blsPeriodToDate(year: string, period: string): string | null {
  const m = MONTHLY_PERIOD.exec(period)
  if (!m || !/^\d{4}$/.test(year)) return null
  return `${year}-${m[1]}-01`
}

export function truncateUnit(title: string, max: number = CONFIG.api.bls.maxUnitLength): string {
  return title.length > max ? `${title.slice(0, max)}...` : title
}

export class BLSClient implements SeriesFetcher {
  readonly source = 'BLS' as const
  private readonly apiKey: string | undefined
  private readonly retries: number | undefined
  private readonly retryDelayMs: number | undefined
  private readonly now: () => Date

  constructor(options: ClientOptions = {}) {
    this.apiKey = options.apiKey?.trim() || readApiKey('BLS_API_KEY')
    this.retries = options.retries
    this.retryDelayMs = options.retryDelayMs
    this.now = options.now ?? (() => new Date())
  }

  private ensureApiKey(): string {
    if (!this.apiKey) {
      throw new Error('BLS_API_KEY is required')
    }
    return this.apiKey
  }

  /**
   * Year window for a request: from `since` (or the default year) to now,
   * clamped to the API's 20-year limit
   */
  yearRange(since: string | null): { startYear: number; endYear: number } {
    const endYear = this.now().getFullYear()
    let startYear = since ? Number(since.slice(0, 4)) : CONFIG.api.bls.defaultStartYear
    if (endYear - startYear > CONFIG.api.bls.maxYears) {
      startYear = endYear - CONFIG.api.bls.maxYears
    }
    return { startYear, endYear }
  }

  async fetchSeriesBatch(seriesIds: string[], startYear: number, endYear: number): Promise<BLSResponse> {
    return fetchJson({
      provider: 'BLS',
      url: CONFIG.api.bls.baseUrl,
      schema: BLSResponseSchema,
      init: {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          seriesid: seriesIds,
          startyear: String(startYear),
          endyear: String(endYear),
          registrationkey: this.ensureApiKey(),
          catalog: true,
          annualaverage: false,
        }),
      },
      retries: this.retries,
      retryDelayMs: this.retryDelayMs,
    })
  }

  async fetchObservations({ code, description, since }: FetchRequest): Promise<Observation[]> {
    const { startYear, endYear } = this.yearRange(since)
    console.log(`[bls] ${code}: ${description} (${startYear}-${endYear})`)

    const result = await this.fetchSeriesBatch([code], startYear, endYear)
    if (result.status !== 'REQUEST_SUCCEEDED') {
      console.warn(`[bls] ${code}: API error ${JSON.stringify(result.message ?? ['unknown error'])}`)
      return []
    }

    const series = result.Results?.series[0]
    if (!series || series.data.length === 0) {
      console.warn(`[bls] ${code}: no data`)
      return []
    }

    const unit = truncateUnit(series.catalog?.series_title?.trim() || CONFIG.storage.missingUnit)
    const inputs: ObservationInput[] = []

    for (const item of series.data) {
      const date = blsPeriodToDate(item.year, item.period)
      if (!date || (since && date < since)) continue
      inputs.push({ date, indicator: code, value: item.value, description, unit })
    }

    const { observations, warnings } = validateObservations(inputs)
    warnings.forEach((w) => console.warn(`[bls] ${code}: ${w}`))

    // The API lists newest first
    observations.sort((a, b) => compareText(a.date, b.date))
    console.log(`[bls] ${code}: ${observations.length} observation(s)`)
    return observations
  }
}
