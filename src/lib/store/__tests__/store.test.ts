import { describe, it, expect } from 'vitest'
import { buildCatalog } from '@/lib/catalog/catalog'
import {
  buildWideTable,
  computeWatermark,
  computeWatermarks,
  mergeObservations,
  partitionObservations,
  type Observation,
} from '@/lib/store'
import { StoreInvariantError } from '@/lib/utils/errors'

function obs(indicator: string, date: string, value: number, description = indicator, unit = 'Percent'): Observation {
  return { indicator, date, value, description, unit }
}

describe('watermark', () => {
  it('is the day after the latest stored date', () => {
    const existing = [obs('A', '2020-01-31', 1), obs('A', '2020-02-29', 2), obs('B', '2021-12-31', 3)]
    expect(computeWatermark(existing, 'A')).toBe('2020-03-01')
    expect(computeWatermark(existing, 'B')).toBe('2022-01-01')
  })

  it('is null for an indicator never stored', () => {
    expect(computeWatermark([obs('A', '2020-01-01', 1)], 'Z')).toBeNull()
    expect(computeWatermark([], 'A')).toBeNull()
  })

  it('computes every indicator in one pass', () => {
    const marks = computeWatermarks([obs('A', '2020-02-01', 1), obs('A', '2020-01-01', 1), obs('B', '2019-12-31', 2)])
    expect(Object.fromEntries(marks)).toEqual({ A: '2020-02-02', B: '2020-01-01' })
  })
})

describe('mergeObservations', () => {
  it('lets incoming values replace stored ones and sorts by date then indicator', () => {
    const existing = [obs('A', '2020-01-01', 1), obs('A', '2020-02-01', 2)]
    const incoming = [obs('A', '2020-02-01', 5), obs('B', '2020-01-01', 9)]

    const { observations, dropped } = mergeObservations(existing, incoming)

    expect(dropped).toBe(0)
    expect(observations.map((o) => [o.date, o.indicator, o.value])).toEqual([
      ['2020-01-01', 'A', 1],
      ['2020-01-01', 'B', 9],
      ['2020-02-01', 'A', 5],
    ])
  })

  it('keeps the last of repeated keys within one incoming batch', () => {
    const incoming = [obs('A', '2020-01-01', 1), obs('B', '2020-01-01', 2), obs('A', '2020-01-01', 3)]

    const { observations } = mergeObservations([obs('A', '2020-01-01', 0)], incoming)

    expect(observations.map((o) => [o.date, o.indicator, o.value])).toEqual([
      ['2020-01-01', 'A', 3],
      ['2020-01-01', 'B', 2],
    ])
  })

  it('drops records without a finite value or a real date', () => {
    const { observations, dropped } = mergeObservations(
      [obs('A', '2020-01-01', Number.NaN), obs('A', '2020-13-01', 1)],
      [obs('A', '2020-01-02', 3)]
    )
    expect(dropped).toBe(2)
    expect(observations).toHaveLength(1)
  })

  it('is idempotent under an empty merge', () => {
    const once = mergeObservations([obs('B', '2020-01-01', 1)], [obs('A', '2020-01-01', 2), obs('B', '2020-01-01', 3)])
    expect(mergeObservations(once.observations, []).observations).toEqual(once.observations)
  })

  it('returns nothing for two empty inputs', () => {
    expect(mergeObservations([], [])).toEqual({ observations: [], dropped: 0 })
  })
})

describe('buildWideTable', () => {
  it('pivots to sorted columns with blank cells and latest metadata', () => {
    const table = buildWideTable('Rates', [
      obs('B', '2020-01-01', 1, 'Old name - Monthly', 'Index'),
      obs('A', '2020-02-01', 2, 'Rate A - Daily', '%'),
      obs('B', '2020-02-01', 3, 'New name - Monthly', 'Index 2015=100'),
    ])

    expect(table.columns).toEqual(['A', 'B'])
    expect(table.displayNames).toEqual(['Rate A', 'New name'])
    expect(table.units).toEqual(['%', 'Index 2015=100'])
    expect(table.rows).toEqual([
      { date: '2020-01-01', values: [null, 1] },
      { date: '2020-02-01', values: [2, 3] },
    ])
  })

  it('rejects a repeated key', () => {
    expect(() => buildWideTable('Rates', [obs('A', '2020-01-01', 1), obs('A', '2020-01-01', 2)])).toThrow(
      StoreInvariantError
    )
  })
})

describe('partitionObservations', () => {
  const catalog = buildCatalog('FRED', {
    Rates: { A: 'Rate A - Monthly' },
    Prices: { B: 'Price B' },
    Empty: { C: 'Never reported' },
  })

  it('builds one table per category with data plus the unrestricted table', () => {
    const merged = mergeObservations([], [obs('A', '2020-01-01', 1), obs('B', '2020-01-01', 2), obs('Z', '2020-02-01', 3)])
      .observations

    const result = partitionObservations(merged, catalog)

    expect(result.categories.map((t) => [t.name, t.columns])).toEqual([
      ['Rates', ['A']],
      ['Prices', ['B']],
    ])
    expect(result.emptyCategories).toEqual(['Empty'])
    expect(result.all.name).toBe('All')
    expect(result.all.columns).toEqual(['A', 'B', 'Z'])
    expect(result.all.rows).toEqual([
      { date: '2020-01-01', values: [1, 2, null] },
      { date: '2020-02-01', values: [null, null, 3] },
    ])
  })

  it('omits every category when nothing is stored', () => {
    const result = partitionObservations([], catalog)
    expect(result.categories).toEqual([])
    expect(result.emptyCategories).toEqual(['Rates', 'Prices', 'Empty'])
    expect(result.all.rows).toEqual([])
  })
})
