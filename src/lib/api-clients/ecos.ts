import { format, getQuarter, parseISO } from 'date-fns'
import { CONFIG, readApiKey } from '@/lib/config'
import type { Observation } from '@/lib/store/types'
import { validateObservations, type ObservationInput } from '@/lib/utils/data-validation'
import { compareText } from '@/lib/utils/dates'
import { ValidationError } from '@/lib/utils/errors'
import { fetchJson } from './http'
import { ECOSResponseSchema, type ClientOptions, type ECOSCycle, type FetchRequest, type SeriesFetcher } from './types'

// Stat table prefixes published daily / quarterly; everything else is monthly
const DAILY_PREFIXES = ['731Y', '722Y', '817Y']
const QUARTERLY_PREFIXES = ['104Y']

/**
 * Split "STAT/ITEM" into its stat table and item codes
 */
export function parseEcosCode(code: string): { statCode: string; itemCode: string } {
  const [statCode, itemCode, ...rest] = code.split('/')
  if (!statCode || !itemCode || rest.length > 0) {
    throw new ValidationError(`Invalid ECOS code "${code}" (expected STAT/ITEM)`, 'code')
  }
  return { statCode, itemCode }
}

export function determineCycle(statCode: string): ECOSCycle {
  if (DAILY_PREFIXES.some((p) => statCode.startsWith(p))) return 'D'
  if (QUARTERLY_PREFIXES.some((p) => statCode.startsWith(p))) return 'Q'
  return 'M'
}

/**
 * Period token for a request boundary: 20240115, 202401, 2024Q1 or 2024
 */
export function formatEcosPeriod(date: Date, cycle: ECOSCycle): string {
  switch (cycle) {
    case 'D':
      return format(date, 'yyyyMMdd')
    case 'M':
      return format(date, 'yyyyMM')
    case 'Q':
      return `${format(date, 'yyyy')}Q${getQuarter(date)}`
    case 'A':
      return format(date, 'yyyy')
  }
}

/**
 * ISO day for a TIME token; periods map to their first day. Null when malformed.
 */
export function parseEcosTime(time: string, cycle: ECOSCycle): string | null {
  const t = time.trim()
  let m: RegExpExecArray | null
  switch (cycle) {
    case 'D':
      m = /^(\d{4})(\d{2})(\d{2})$/.exec(t)
      return m ? `${m[1]}-${m[2]}-${m[3]}` : null
    case 'M':
      m = /^(\d{4})(\d{2})$/.exec(t)
      return m ? `${m[1]}-${m[2]}-01` : null
    case 'Q': {
      m = /^(\d{4})Q([1-4])$/.exec(t)
      if (!m) return null
      const month = (Number(m[2]) - 1) * 3 + 1
      return `${m[1]}-${String(month).padStart(2, '0')}-01`
    }
    case 'A':
      m = /^(\d{4})$/.exec(t)
      return m ? `${m[1]}-01-01` : null
  }
}

export class ECOSClient implements SeriesFetcher {
  readonly source = 'ECOS' as const
  private readonly apiKey: string | undefined
  private readonly retries: number | undefined
  private readonly retryDelayMs: number | undefined
  private readonly now: () => Date

  constructor(options: ClientOptions = {}) {
    this.apiKey = options.apiKey?.trim() || readApiKey('ECOS_API_KEY')
    this.retries = options.retries
    this.retryDelayMs = options.retryDelayMs
    this.now = options.now ?? (() => new Date())
  }

  private ensureApiKey(): string {
    if (!this.apiKey) {
      throw new Error('ECOS_API_KEY is required')
    }
    return this.apiKey
  }

  buildUrl(code: string, since: string | null): { url: string; cycle: ECOSCycle } {
    const { statCode, itemCode } = parseEcosCode(code)
    const cycle = determineCycle(statCode)
    const start = formatEcosPeriod(parseISO(since ?? CONFIG.api.ecos.defaultStart), cycle)
    const end = formatEcosPeriod(this.now(), cycle)
    const segments = [
      CONFIG.api.ecos.baseUrl,
      encodeURIComponent(this.ensureApiKey()),
      'json',
      'kr',
      '1',
      String(CONFIG.api.ecos.pageSize),
      statCode,
      cycle,
      start,
      end,
      itemCode,
    ]
    return { url: segments.join('/'), cycle }
  }

  async fetchObservations({ code, description, since }: FetchRequest): Promise<Observation[]> {
    console.log(`[ecos] ${code}: ${description}`)
    if (since && since > format(this.now(), 'yyyy-MM-dd')) {
      console.log(`[ecos] ${code}: already up to date`)
      return []
    }
    const { url, cycle } = this.buildUrl(code, since)

    const payload = await fetchJson({
      provider: 'ECOS',
      url,
      schema: ECOSResponseSchema,
      retries: this.retries,
      retryDelayMs: this.retryDelayMs,
    })

    if (!payload.StatisticSearch) {
      // RESULT carries both errors and the "no data" notice
      console.warn(`[ecos] ${code}: ${payload.RESULT?.MESSAGE ?? 'no data'}`)
      return []
    }

    const rows = payload.StatisticSearch.row
    const unit = rows[0]?.UNIT_NAME?.trim() || CONFIG.storage.missingUnit
    const inputs: ObservationInput[] = []

    for (const row of rows) {
      const date = parseEcosTime(row.TIME, cycle)
      if (!date || (since && date < since)) continue
      // "-" marks a period without a published value
      if (!row.DATA_VALUE || row.DATA_VALUE.trim() === '-') continue
      inputs.push({ date, indicator: code, value: row.DATA_VALUE, description, unit })
    }

    const { observations, warnings } = validateObservations(inputs)
    warnings.forEach((w) => console.warn(`[ecos] ${code}: ${w}`))

    observations.sort((a, b) => compareText(a.date, b.date))
    console.log(`[ecos] ${code}: ${observations.length} observation(s) (unit: ${unit})`)
    return observations
  }
}
