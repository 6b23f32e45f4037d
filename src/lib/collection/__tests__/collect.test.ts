import { access, mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { FetchRequest, SeriesFetcher } from '@/lib/api-clients'
import { buildCatalog } from '@/lib/catalog/catalog'
import { collectSource, parseSourceArgs } from '@/lib/collection/collect'
import { readSourceWorkbook, readStoredObservations } from '@/lib/persistence/workbook'
import type { Observation } from '@/lib/store'
import { APIError, ValidationError } from '@/lib/utils/errors'

const catalog = buildCatalog('FRED', {
  Rates: { A: 'Rate A - Monthly' },
  Prices: { B: 'Price B - Monthly' },
})

function obs(indicator: string, date: string, value: number): Observation {
  return { indicator, date, value, description: catalog.indicators[indicator] ?? indicator, unit: 'Percent' }
}

/** Serves canned batches per code; a code mapped to an Error throws */
class FakeFetcher implements SeriesFetcher {
  readonly source = 'FRED' as const
  readonly requests: FetchRequest[] = []

  constructor(private readonly batches: Record<string, Observation[] | Error>) {}

  async fetchObservations(request: FetchRequest): Promise<Observation[]> {
    this.requests.push(request)
    const batch = this.batches[request.code] ?? []
    if (batch instanceof Error) throw batch
    return batch.filter((o) => !request.since || o.date >= request.since)
  }
}

describe('collectSource', () => {
  let dir: string
  let filePath: string

  beforeEach(async () => {
    vi.stubEnv('UPSTASH_REDIS_REST_URL', '')
    vi.stubEnv('UPSTASH_REDIS_REST_TOKEN', '')
    dir = await mkdtemp(path.join(tmpdir(), 'collect-'))
    filePath = path.join(dir, 'fred_data.xlsx')
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await rm(dir, { recursive: true, force: true })
  })

  it('keeps going past a failing indicator and writes what it has', async () => {
    const fetcher = new FakeFetcher({
      A: [obs('A', '2020-01-01', 1), obs('A', '2020-02-01', 2)],
      B: new Error('HTTP 500'),
    })

    const summary = await collectSource(fetcher, { catalog, filePath })

    expect(summary).toEqual({
      source: 'FRED',
      stored: 0,
      fetched: 2,
      total: 2,
      failed: ['B'],
      sheets: ['Rates'],
      written: true,
    })
    expect(fetcher.requests.map((r) => [r.code, r.since])).toEqual([
      ['A', null],
      ['B', null],
    ])
    const parsed = await readSourceWorkbook(filePath, catalog)
    expect(parsed?.sheetNames).toEqual(['Rates', 'All'])
  })

  it('resumes each indicator from its watermark', async () => {
    await collectSource(new FakeFetcher({ A: [obs('A', '2020-01-01', 1), obs('A', '2020-02-01', 2)] }), {
      catalog,
      filePath,
    })

    const second = new FakeFetcher({
      A: [obs('A', '2020-02-01', 99), obs('A', '2020-03-01', 3)],
      B: [obs('B', '2020-03-01', 7)],
    })
    const summary = await collectSource(second, { catalog, filePath })

    expect(second.requests.map((r) => [r.code, r.since])).toEqual([
      ['A', '2020-02-02'],
      ['B', null],
    ])
    expect(summary).toMatchObject({ stored: 2, fetched: 2, total: 4, failed: [], sheets: ['Rates', 'Prices'] })

    const stored = await readStoredObservations(filePath, catalog)
    expect(stored.map((o) => [o.indicator, o.date, o.value])).toEqual([
      ['A', '2020-01-01', 1],
      ['A', '2020-02-01', 2],
      ['A', '2020-03-01', 3],
      ['B', '2020-03-01', 7],
    ])
  })

  it('stops the run once the provider rate-limits', async () => {
    const fetcher = new FakeFetcher({ A: new APIError('too many requests', 429, 'FRED'), B: [obs('B', '2020-01-01', 1)] })

    const summary = await collectSource(fetcher, { catalog, filePath })

    expect(summary.failed).toEqual(['A', 'B'])
    expect(fetcher.requests.map((r) => r.code)).toEqual(['A'])
    expect(summary.written).toBe(false)
  })

  it('writes nothing when there is nothing stored or fetched', async () => {
    const summary = await collectSource(new FakeFetcher({}), { catalog, filePath })

    expect(summary.written).toBe(false)
    expect(summary.total).toBe(0)
    await expect(access(filePath)).rejects.toThrow()
  })
})

describe('parseSourceArgs', () => {
  it('defaults to every source', () => {
    expect(parseSourceArgs([])).toEqual(['FRED', 'ECOS', 'BLS'])
  })

  it('reads the sources after the flag', () => {
    expect(parseSourceArgs(['--source', 'ecos', 'BLS'])).toEqual(['ECOS', 'BLS'])
    expect(parseSourceArgs(['-s', 'fred', 'fred', '--verbose'])).toEqual(['FRED'])
  })

  it('rejects unknown or missing sources', () => {
    expect(() => parseSourceArgs(['--source', 'imf'])).toThrow(ValidationError)
    expect(() => parseSourceArgs(['--source'])).toThrow('--source needs at least one source')
  })
})
