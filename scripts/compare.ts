/**
 * Compare stored indicators from the terminal
 *
 * Usage:
 *   npm run compare -- --list fred Rates
 *   npm run compare -- -i FRED:UNRATE -i BLS:CUUR0000SA0:yoy:3 --start 2010-01-01 --csv out.csv
 */

import 'dotenv/config'
import { writeFile } from 'node:fs/promises'
import {
  alignedTableToCsv,
  compareIndicators,
  parseAnalysisRequest,
  parseSelectionArg,
  TRANSFORM_LABELS,
} from '@/lib/analysis'
import { getCategoryIndicators, getDisplayName, loadCatalog } from '@/lib/catalog/catalog'
import { loadSettings, filterHiddenIndicators } from '@/lib/settings/settings'
import { getAvailableIndicators, getDateRange, loadAllSourceData, loadSourceData } from '@/lib/sources/source-data'
import { SOURCE_IDS, type SourceId } from '@/lib/store/types'
import { getErrorMessage } from '@/lib/utils/errors'

function optionValues(argv: string[], ...flags: string[]): string[] {
  const values: string[] = []
  argv.forEach((arg, i) => {
    const next = argv[i + 1]
    if (flags.includes(arg) && next !== undefined) values.push(next)
  })
  return values
}

function optionValue(argv: string[], ...flags: string[]): string | undefined {
  return optionValues(argv, ...flags)[0]
}

async function listIndicators(argv: string[]) {
  const at = argv.indexOf('--list')
  const sourceArg = argv[at + 1]?.toUpperCase()
  const source = SOURCE_IDS.find((s) => s === sourceArg)
  const category = argv[at + 2] ?? 'All'
  const sources: readonly SourceId[] = source ? [source] : SOURCE_IDS
  const settings = await loadSettings()

  for (const id of sources) {
    const data = await loadSourceData(id)
    const { start, end } = getDateRange(data)
    const available = Object.keys(getAvailableIndicators(data))
    const indicators = filterHiddenIndicators(getCategoryIndicators(loadCatalog(id), category, available), id, settings)

    console.log(`\n${id} / ${category} (${start ?? '-'} to ${end ?? '-'})`)
    for (const [code, description] of Object.entries(indicators)) {
      console.log(`  ${code.padEnd(24)} ${getDisplayName(description)}`)
    }
  }
}

async function runComparison(argv: string[]) {
  const maxLag = optionValue(argv, '--max-lag')
  const request = parseAnalysisRequest({
    selections: optionValues(argv, '--indicator', '-i').map(parseSelectionArg),
    start: optionValue(argv, '--start'),
    end: optionValue(argv, '--end'),
    baseKey: optionValue(argv, '--base'),
    ...(maxLag !== undefined ? { maxLag: Number(maxLag) } : {}),
  })

  const result = compareIndicators(request, await loadAllSourceData())

  console.log('\nSeries')
  for (const [i, metric] of result.metrics.entries()) {
    const transform = result.series[i]?.transform ?? 'raw'
    console.log(
      `  ${metric.label} [${TRANSFORM_LABELS[transform]}]: ${metric.display ?? 'N/A'} (${metric.changeDisplay ?? 'N/A'}) at ${metric.latestDate ?? '-'}`
    )
  }

  if (result.correlations.length > 0) {
    console.log(`\nCorrelation with ${result.baseKey}`)
    for (const row of result.correlations) {
      console.log(
        `  ${row.label}: ${row.display.correlation} | best lag ${row.display.optimalLag} (${row.display.maxCorrelation})`
      )
    }
  }

  if (result.missing.length > 0) {
    console.warn(`\nNo stored data for ${result.missing.join(', ')}`)
  }

  const csvPath = optionValue(argv, '--csv')
  if (csvPath) {
    const labels = Object.fromEntries(result.series.map((s) => [s.key, s.label]))
    await writeFile(csvPath, alignedTableToCsv(result.aligned, labels), 'utf-8')
    console.log(`\nSaved ${csvPath}`)
  }
}

async function run() {
  const argv = process.argv.slice(2)
  if (argv.includes('--list')) {
    await listIndicators(argv)
  } else {
    await runComparison(argv)
  }
}

run().catch((error: unknown) => {
  console.error(`[compare] ${getErrorMessage(error)}`)
  process.exit(1)
})
