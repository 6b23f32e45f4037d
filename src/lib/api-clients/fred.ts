import { format } from 'date-fns'
import { CONFIG, readApiKey } from '@/lib/config'
import type { Observation } from '@/lib/store/types'
import { validateObservations, type ObservationInput } from '@/lib/utils/data-validation'
import { getErrorMessage } from '@/lib/utils/errors'
import { fetchJson } from './http'
import {
  FREDResponseSchema,
  FREDSeriesInfoSchema,
  type ClientOptions,
  type FetchRequest,
  type FREDSeries,
  type SeriesFetcher,
} from './types'

export class FREDClient implements SeriesFetcher {
  readonly source = 'FRED' as const
  private readonly apiKey: string | undefined
  private readonly baseUrl: string
  private readonly retries: number | undefined
  private readonly retryDelayMs: number | undefined
  private readonly now: () => Date

  constructor(options: ClientOptions = {}) {
    this.apiKey = options.apiKey?.trim() || readApiKey('FRED_API_KEY')
    this.baseUrl = CONFIG.api.fred.baseUrl
    this.retries = options.retries
    this.retryDelayMs = options.retryDelayMs
    this.now = options.now ?? (() => new Date())
  }

  private ensureApiKey(): string {
    if (!this.apiKey) {
      throw new Error('FRED_API_KEY is required')
    }
    return this.apiKey
  }

  private buildUrl(path: string, params: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}/${path}`)
    url.searchParams.set('api_key', this.ensureApiKey())
    url.searchParams.set('file_type', 'json')
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v)
    return url.toString()
  }

  async getSeriesFromStart(seriesId: string, startISO: string): Promise<FREDSeries> {
    const payload = await fetchJson({
      provider: 'FRED',
      url: this.buildUrl('series/observations', {
        series_id: seriesId,
        observation_start: startISO,
        observation_end: format(this.now(), 'yyyy-MM-dd'),
      }),
      schema: FREDResponseSchema,
      retries: this.retries,
      retryDelayMs: this.retryDelayMs,
    })
    return payload.observations
  }

  /**
   * Units from series metadata; a metadata failure is not worth losing the data for
   */
  async getUnits(seriesId: string): Promise<string> {
    try {
      const info = await fetchJson({
        provider: 'FRED',
        url: this.buildUrl('series', { series_id: seriesId }),
        schema: FREDSeriesInfoSchema,
        retries: this.retries,
        retryDelayMs: this.retryDelayMs,
      })
      return info.seriess[0]?.units?.trim() || CONFIG.storage.missingUnit
    } catch (error) {
      console.warn(`[fred] units lookup failed for ${seriesId}: ${getErrorMessage(error)}`)
      return CONFIG.storage.missingUnit
    }
  }

  async fetchObservations({ code, description, since }: FetchRequest): Promise<Observation[]> {
    const start = since ?? CONFIG.api.fred.defaultStart
    console.log(`[fred] ${code}: ${description} (from ${start})`)
    if (start > format(this.now(), 'yyyy-MM-dd')) {
      console.log(`[fred] ${code}: already up to date`)
      return []
    }

    const unit = await this.getUnits(code)
    const series = await this.getSeriesFromStart(code, start)

    const inputs: ObservationInput[] = series
      // FRED marks missing values with "."
      .filter((obs) => obs.value !== '.' && obs.date >= start)
      .map((obs) => ({ date: obs.date, indicator: code, value: obs.value, description, unit }))

    const { observations, warnings } = validateObservations(inputs)
    warnings.forEach((w) => console.warn(`[fred] ${code}: ${w}`))

    console.log(`[fred] ${code}: ${observations.length} observation(s) (unit: ${unit})`)
    return observations
  }
}
