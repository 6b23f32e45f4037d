import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  BLSClient,
  createFetcher,
  determineCycle,
  ECOSClient,
  formatEcosPeriod,
  FREDClient,
  parseEcosCode,
  parseEcosTime,
  truncateUnit,
  blsPeriodToDate,
} from '@/lib/api-clients'
import { APIError, ValidationError } from '@/lib/utils/errors'

type FetchCall = { url: string; init?: RequestInit }

function stubFetch(handler: (url: string, init?: RequestInit) => { status?: number; body: unknown }) {
  const calls: FetchCall[] = []
  vi.stubGlobal(
    'fetch',
    vi.fn(async (input: string | URL, init?: RequestInit) => {
      const url = String(input)
      calls.push({ url, init })
      const { status = 200, body } = handler(url, init)
      return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
    })
  )
  return calls
}

afterEach(() => {
  vi.unstubAllGlobals()
  vi.unstubAllEnvs()
})

describe('FREDClient', () => {
  const observations = [
    { date: '2020-01-01', value: '1.5' },
    { date: '2020-02-01', value: '.' },
    { date: '2020-03-01', value: '2' },
  ]

  function stubFred() {
    return stubFetch((url) =>
      url.includes('/series/observations')
        ? { body: { observations } }
        : { body: { seriess: [{ id: 'DGS10', units: 'Percent' }] } }
    )
  }

  it('fetches units and observations, skipping missing values', async () => {
    const calls = stubFred()
    const client = new FREDClient({ apiKey: 'test-secret', retries: 1, now: () => new Date(2024, 5, 30) })

    const result = await client.fetchObservations({ code: 'DGS10', description: '10Y Treasury - Daily', since: null })

    expect(result).toEqual([
      { date: '2020-01-01', indicator: 'DGS10', value: 1.5, description: '10Y Treasury - Daily', unit: 'Percent' },
      { date: '2020-03-01', indicator: 'DGS10', value: 2, description: '10Y Treasury - Daily', unit: 'Percent' },
    ])
    const obsUrl = new URL(calls[1]?.url ?? '')
    expect(obsUrl.pathname).toBe('/fred/series/observations')
    expect(obsUrl.searchParams.get('series_id')).toBe('DGS10')
    expect(obsUrl.searchParams.get('observation_start')).toBe('2000-01-01')
    expect(obsUrl.searchParams.get('observation_end')).toBe('2024-06-30')
    expect(obsUrl.searchParams.get('api_key')).toBe('test-secret')
    expect(obsUrl.searchParams.get('file_type')).toBe('json')
  })

  it('never returns dates before the watermark', async () => {
    const calls = stubFred()
    const client = new FREDClient({ apiKey: 'test-secret', retries: 1 })

    const result = await client.fetchObservations({ code: 'DGS10', description: 'd', since: '2020-02-01' })

    expect(result.map((o) => o.date)).toEqual(['2020-03-01'])
    expect(new URL(calls[1]?.url ?? '').searchParams.get('observation_start')).toBe('2020-02-01')
  })

  it('skips the request when the watermark is in the future', async () => {
    const calls = stubFred()
    const client = new FREDClient({ apiKey: 'test-secret', retries: 1, now: () => new Date(2024, 5, 30) })

    expect(await client.fetchObservations({ code: 'DGS10', description: 'd', since: '2024-07-01' })).toEqual([])
    expect(calls).toHaveLength(0)
  })

  it('falls back to N/A when the units lookup fails', async () => {
    stubFetch((url) => (url.includes('/series/observations') ? { body: { observations } } : { status: 500, body: {} }))
    const client = new FREDClient({ apiKey: 'test-secret', retries: 1 })

    const result = await client.fetchObservations({ code: 'DGS10', description: 'd', since: null })

    expect(result[0]?.unit).toBe('N/A')
  })

  it('raises an APIError for a failed observations request', async () => {
    stubFetch(() => ({ status: 503, body: { error_message: 'unavailable' } }))
    const client = new FREDClient({ apiKey: 'test-secret', retries: 1 })

    await expect(client.fetchObservations({ code: 'DGS10', description: 'd', since: null })).rejects.toBeInstanceOf(APIError)
  })

  it('requires an API key', async () => {
    vi.stubEnv('FRED_API_KEY', '')
    stubFred()
    const client = new FREDClient({ retries: 1 })

    await expect(client.fetchObservations({ code: 'DGS10', description: 'd', since: null })).rejects.toThrow(
      'FRED_API_KEY is required'
    )
  })
})

describe('BLSClient', () => {
  const title = 'All items in U.S. city average, all urban consumers, seasonally adjusted'

  it('maps monthly periods to first-of-month dates', () => {
    expect(blsPeriodToDate('2023', 'M07')).toBe('2023-07-01')
    expect(blsPeriodToDate('2023', 'M13')).toBeNull()
    expect(blsPeriodToDate('2023', 'Q01')).toBeNull()
  })

  it('truncates long series titles', () => {
    expect(truncateUnit(title)).toBe('All items in U.S. city average, all urban consumer...')
    expect(truncateUnit('Percent')).toBe('Percent')
  })

  it('clamps the year window to twenty years', () => {
    const client = new BLSClient({ apiKey: 'test-secret', now: () => new Date(2030, 5, 15) })
    expect(client.yearRange(null)).toEqual({ startYear: 2010, endYear: 2030 })
    expect(client.yearRange('2024-03-02')).toEqual({ startYear: 2024, endYear: 2030 })
  })

  it('posts the request and keeps monthly data from the watermark on', async () => {
    const calls = stubFetch(() => ({
      body: {
        status: 'REQUEST_SUCCEEDED',
        Results: {
          series: [
            {
              seriesID: 'CUSR0000SA0',
              catalog: { series_title: title },
              data: [
                { year: '2019', period: 'M13', value: '255.0' },
                { year: '2019', period: 'M08', value: '256.5' },
                { year: '2019', period: 'M07', value: '256.1' },
                { year: '2019', period: 'M06', value: '255.4' },
              ],
            },
          ],
        },
      },
    }))
    const client = new BLSClient({ apiKey: 'test-secret', retries: 1, now: () => new Date(2024, 5, 15) })

    const result = await client.fetchObservations({ code: 'CUSR0000SA0', description: 'CPI - Monthly', since: '2019-06-02' })

    expect(result.map((o) => [o.date, o.value])).toEqual([
      ['2019-07-01', 256.1],
      ['2019-08-01', 256.5],
    ])
    expect(result[0]?.unit).toBe('All items in U.S. city average, all urban consumer...')

    expect(calls[0]?.init?.method).toBe('POST')
    expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({
      seriesid: ['CUSR0000SA0'],
      startyear: '2019',
      endyear: '2024',
      registrationkey: 'test-secret',
      catalog: true,
      annualaverage: false,
    })
  })

  it('returns nothing when the API reports a failure', async () => {
    stubFetch(() => ({ body: { status: 'REQUEST_NOT_PROCESSED', message: ['daily threshold reached'] } }))
    const client = new BLSClient({ apiKey: 'test-secret', retries: 1 })

    expect(await client.fetchObservations({ code: 'X', description: 'x', since: null })).toEqual([])
  })
})

describe('ECOS helpers', () => {
  it('splits stat and item codes', () => {
    expect(parseEcosCode('722Y001/0101000')).toEqual({ statCode: '722Y001', itemCode: '0101000' })
    expect(() => parseEcosCode('722Y001')).toThrow(ValidationError)
    expect(() => parseEcosCode('a/b/c')).toThrow(ValidationError)
  })

  it('infers the cycle from the stat table', () => {
    expect(determineCycle('731Y001')).toBe('D')
    expect(determineCycle('817Y002')).toBe('D')
    expect(determineCycle('104Y014')).toBe('Q')
    expect(determineCycle('901Y009')).toBe('M')
  })

  it('formats and parses periods per cycle', () => {
    const day = new Date(2024, 4, 15)
    expect(formatEcosPeriod(day, 'D')).toBe('20240515')
    expect(formatEcosPeriod(day, 'M')).toBe('202405')
    expect(formatEcosPeriod(day, 'Q')).toBe('2024Q2')
    expect(formatEcosPeriod(day, 'A')).toBe('2024')

    expect(parseEcosTime('20240515', 'D')).toBe('2024-05-15')
    expect(parseEcosTime('202401', 'M')).toBe('2024-01-01')
    expect(parseEcosTime('2023Q3', 'Q')).toBe('2023-07-01')
    expect(parseEcosTime('2023', 'A')).toBe('2023-01-01')
    expect(parseEcosTime('2023Q5', 'Q')).toBeNull()
  })
})

describe('ECOSClient', () => {
  const now = () => new Date(2024, 0, 31)

  it('builds the positional request URL', () => {
    const client = new ECOSClient({ apiKey: 'test-secret', now })
    expect(client.buildUrl('901Y009/0', null)).toEqual({
      url: 'https://ecos.bok.or.kr/api/StatisticSearch/test-secret/json/kr/1/10000/901Y009/M/200001/202401/0',
      cycle: 'M',
    })
    expect(client.buildUrl('731Y001/0000001', '2023-12-30').url).toContain('/731Y001/D/20231230/20240131/0000001')
  })

  it('parses rows, skipping placeholders and older periods', async () => {
    stubFetch(() => ({
      body: {
        StatisticSearch: {
          list_total_count: 4,
          row: [
            { TIME: '202310', DATA_VALUE: '112.9', UNIT_NAME: '2020=100' },
            { TIME: '202312', DATA_VALUE: '113.2', UNIT_NAME: '2020=100' },
            { TIME: '202311', DATA_VALUE: '-', UNIT_NAME: '2020=100' },
            { TIME: '202401', DATA_VALUE: '1,134.5', UNIT_NAME: '2020=100' },
          ],
        },
      },
    }))
    const client = new ECOSClient({ apiKey: 'test-secret', retries: 1, now })

    const result = await client.fetchObservations({ code: '901Y009/0', description: 'CPI - Monthly', since: '2023-10-02' })

    expect(result).toEqual([
      { date: '2023-12-01', indicator: '901Y009/0', value: 113.2, description: 'CPI - Monthly', unit: '2020=100' },
      { date: '2024-01-01', indicator: '901Y009/0', value: 1134.5, description: 'CPI - Monthly', unit: '2020=100' },
    ])
  })

  it('returns nothing for a RESULT-only reply', async () => {
    stubFetch(() => ({ body: { RESULT: { CODE: 'INFO-200', MESSAGE: 'no data' } } }))
    const client = new ECOSClient({ apiKey: 'test-secret', retries: 1, now })

    expect(await client.fetchObservations({ code: '901Y009/0', description: 'CPI', since: null })).toEqual([])
  })
})

describe('createFetcher', () => {
  it('builds the client for each source', () => {
    expect(createFetcher('FRED', { apiKey: 'test-secret' })).toBeInstanceOf(FREDClient)
    expect(createFetcher('BLS', { apiKey: 'test-secret' }).source).toBe('BLS')
    expect(createFetcher('ECOS', { apiKey: 'test-secret' })).toBeInstanceOf(ECOSClient)
  })
})
