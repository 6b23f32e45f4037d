/**
 * Saved settings: charts, dashboard layout, chart categories and hidden indicators
 *
 * Settings are an explicit value. load/save touch the file; every other helper
 * returns a new object and leaves its input alone.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { TRANSFORM_MODES } from '@/lib/analysis/types'
import { CONFIG } from '@/lib/config'
import type { SourceId } from '@/lib/store/types'
import { getErrorMessage } from '@/lib/utils/errors'

const ChartIndicatorSchema = z.object({
  source: z.enum(['FRED', 'BLS', 'ECOS']),
  code: z.string().min(1),
  transform: z.enum(TRANSFORM_MODES).default('raw'),
  shift: z.number().int().min(-CONFIG.analysis.maxShift).max(CONFIG.analysis.maxShift).default(0),
  chartType: z.enum(['line', 'bar', 'area']).default('line'),
  reverse: z.boolean().default(false),
  logScale: z.boolean().default(false),
})

const SavedChartSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.string().default(CONFIG.storage.defaultCategory),
  indicators: z.array(ChartIndicatorSchema),
  dateRange: z.tuple([z.string(), z.string()]).optional(),
  separateAxes: z.boolean().default(true),
})

export const SettingsSchema = z.object({
  savedCharts: z.array(SavedChartSchema).default([]),
  mainLayout: z.array(z.object({ chartId: z.string() })).default([]),
  categories: z.array(z.string()).default([...CONFIG.settings.defaultCategories]),
  hiddenIndicators: z.array(z.string()).default([]),
})

export type Settings = z.infer<typeof SettingsSchema>
export type SavedChart = z.infer<typeof SavedChartSchema>
export type SavedChartInput = Omit<z.input<typeof SavedChartSchema>, 'id'>
export type ChartIndicator = z.infer<typeof ChartIndicatorSchema>

export function defaultSettings(): Settings {
  return {
    savedCharts: [],
    mainLayout: [],
    categories: [...CONFIG.settings.defaultCategories],
    hiddenIndicators: [],
  }
}

/**
 * Settings from disk. A missing, unreadable or invalid file yields the defaults.
 */
export async function loadSettings(filePath: string = CONFIG.storage.settingsPath): Promise<Settings> {
  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (error) {
    console.log(`[settings] no settings at ${filePath}, using defaults (${getErrorMessage(error)})`)
    return defaultSettings()
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    console.error(`[settings] invalid JSON in ${filePath}: ${getErrorMessage(error)}`)
    return defaultSettings()
  }

  const parsed = SettingsSchema.safeParse(json)
  if (!parsed.success) {
    console.error(`[settings] invalid settings in ${filePath}:`, parsed.error.issues)
    return defaultSettings()
  }
  return parsed.data
}

export async function saveSettings(filePath: string, settings: Settings): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(filePath, JSON.stringify(settings, null, 2) + '\n', 'utf-8')
  console.log(`[settings] saved ${filePath}`)
}

// ============================================================================
// Pure updates
// ============================================================================

export function addCategory(settings: Settings, category: string): Settings {
  const name = category.trim()
  if (!name || settings.categories.includes(name)) return settings
  return { ...settings, categories: [...settings.categories, name] }
}

/**
 * Store a chart under a fresh id and append it to the main layout.
 * An unknown category is registered along with it.
 */
export function saveChart(settings: Settings, chart: SavedChartInput): { settings: Settings; chart: SavedChart } {
  const saved = SavedChartSchema.parse({ ...chart, id: `chart_${uuidv4()}` })
  const withCategory = addCategory(settings, saved.category)
  return {
    chart: saved,
    settings: {
      ...withCategory,
      savedCharts: [...withCategory.savedCharts, saved],
      mainLayout: [...withCategory.mainLayout, { chartId: saved.id }],
    },
  }
}

export function removeChart(settings: Settings, chartId: string): Settings {
  return {
    ...settings,
    savedCharts: settings.savedCharts.filter((c) => c.id !== chartId),
    mainLayout: settings.mainLayout.filter((l) => l.chartId !== chartId),
  }
}

export function hiddenKey(source: SourceId, code: string): string {
  return `${source}:${code}`
}

export function toggleHiddenIndicator(settings: Settings, source: SourceId, code: string): Settings {
  const key = hiddenKey(source, code)
  const hiddenIndicators = settings.hiddenIndicators.includes(key)
    ? settings.hiddenIndicators.filter((k) => k !== key)
    : [...settings.hiddenIndicators, key]
  return { ...settings, hiddenIndicators }
}

/**
 * Drop indicators the user has hidden for a source
 */
export function filterHiddenIndicators(
  indicators: Record<string, string>,
  source: SourceId,
  settings: Pick<Settings, 'hiddenIndicators'>
): Record<string, string> {
  if (settings.hiddenIndicators.length === 0) return indicators
  const hidden = new Set(settings.hiddenIndicators)
  return Object.fromEntries(Object.entries(indicators).filter(([code]) => !hidden.has(hiddenKey(source, code))))
}

/**
 * Charts in layout order, optionally limited to one category
 */
export function getLayoutCharts(settings: Settings, category?: string): SavedChart[] {
  const byId = new Map(settings.savedCharts.map((c) => [c.id, c]))
  const charts: SavedChart[] = []
  for (const { chartId } of settings.mainLayout) {
    const chart = byId.get(chartId)
    if (chart && (!category || chart.category === category)) charts.push(chart)
  }
  return charts
}
