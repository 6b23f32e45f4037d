export const CONFIG = {
  app: {
    name: 'Macro Compare',
    description: 'Incremental macroeconomic series store with cross-source comparison and lag analysis',
    version: '1.0.0',
  },
  api: {
    fred: {
      baseUrl: 'https://api.stlouisfed.org/fred',
      defaultStart: '2000-01-01',
    },
    bls: {
      baseUrl: 'https://api.bls.gov/publicAPI/v2/timeseries/data/',
      defaultStartYear: 2005,
      // v2 caps a single request at 20 years
      maxYears: 20,
      maxUnitLength: 50,
    },
    ecos: {
      baseUrl: 'https://ecos.bok.or.kr/api/StatisticSearch',
      defaultStart: '2000-01-01',
      pageSize: 10000,
    },
  },
  storage: {
    dataDir: process.env.DATA_DIR?.trim() || 'data',
    settingsPath: process.env.SETTINGS_PATH?.trim() || 'saved_settings.json',
    allSheetName: 'All',
    dateHeader: 'date',
    dateLabel: 'Date',
    unitLabel: 'Unit',
    missingUnit: 'N/A',
    defaultCategory: 'Other',
  },
  analysis: {
    maxLag: 24,
    maxLagLimit: 120,
    maxShift: 24,
    minSamplesForCorrelation: 3,
  },
  settings: {
    defaultCategories: ['Rates', 'Inflation', 'Employment', 'Activity', 'Other'],
  },
} as const

export function readApiKey(name: string): string | undefined {
  const raw = process.env[name] || ''
  const trimmed = raw.trim()
  return trimmed || undefined
}
