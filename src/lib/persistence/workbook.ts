/**
 * Workbook persistence for per-source stores
 *
 * Sheet layout (one sheet per category, plus the unrestricted table):
 *   row 1   date | code...        (column headers)
 *   row 2   Date | display name...
 *   row 3   Unit | unit...
 *   row 4+  ISO day | value...    (ascending, blank where absent)
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import * as XLSX from 'xlsx'
import { CONFIG } from '@/lib/config'
import type { IndicatorCatalog } from '@/lib/catalog/catalog'
import { mergeObservations } from '@/lib/store/merge'
import type { Observation, PartitionResult, SourceId, WideTable } from '@/lib/store/types'
import { coerceObservation } from '@/lib/utils/data-validation'
import { toISODay } from '@/lib/utils/dates'

export type SheetCell = string | number | null
export type SheetRow = SheetCell[]

const HEADER_ROWS = 3
const MAX_SHEET_NAME = 31

const WORKBOOK_FILES: Record<SourceId, string> = {
  FRED: 'fred_data.xlsx',
  BLS: 'bls_data.xlsx',
  ECOS: 'ecos_data.xlsx',
}

export function workbookPath(source: SourceId, dataDir: string = CONFIG.storage.dataDir): string {
  return path.join(dataDir, WORKBOOK_FILES[source])
}

// ============================================================================
// Writing
// ============================================================================

export function tableToSheetRows(table: WideTable): SheetRow[] {
  return [
    [CONFIG.storage.dateHeader, ...table.columns],
    [CONFIG.storage.dateLabel, ...table.displayNames],
    [CONFIG.storage.unitLabel, ...table.units],
    ...table.rows.map((row): SheetRow => [row.date, ...row.values]),
  ]
}

/**
 * Excel sheet names: at most 31 chars, none of []:*?/\ and unique case-insensitively
 */
export function sanitizeSheetName(name: string, taken: Set<string>): string {
  const base = name.replace(/[[\]:*?/\\]/g, '_').trim().slice(0, MAX_SHEET_NAME) || 'Sheet'
  let candidate = base
  let n = 2
  while (taken.has(candidate.toLowerCase())) {
    const suffix = ` (${n++})`
    candidate = base.slice(0, MAX_SHEET_NAME - suffix.length) + suffix
  }
  taken.add(candidate.toLowerCase())
  return candidate
}

export function buildWorkbook(partition: PartitionResult): XLSX.WorkBook {
  const wb = XLSX.utils.book_new()
  const taken = new Set<string>()
  // Reserve the unrestricted sheet name so a category can never claim it
  taken.add(partition.all.name.toLowerCase())

  for (const table of partition.categories) {
    const sheet = XLSX.utils.aoa_to_sheet(tableToSheetRows(table))
    XLSX.utils.book_append_sheet(wb, sheet, sanitizeSheetName(table.name, taken))
    console.log(`[workbook] ${table.name}: ${table.rows.length} rows x ${table.columns.length + 1} columns`)
  }

  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(tableToSheetRows(partition.all)), partition.all.name)
  console.log(`[workbook] ${partition.all.name}: ${partition.all.rows.length} rows x ${partition.all.columns.length + 1} columns`)
  return wb
}

export function workbookToBuffer(wb: XLSX.WorkBook): Buffer {
  const out: Buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' })
  return out
}

export async function writeSourceWorkbook(filePath: string, partition: PartitionResult): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(filePath, workbookToBuffer(buildWorkbook(partition)))
  console.log(`[workbook] saved ${filePath}`)
}

// ============================================================================
// Reading
// ============================================================================

export interface ParsedSheet {
  name: string
  columns: string[]
  displayNames: Record<string, string>
  units: Record<string, string>
  observations: Observation[]
  /** Non-empty cells that could not become observations */
  dropped: number
}

export interface ParsedWorkbook {
  sheetNames: string[]
  sheets: ParsedSheet[]
}

function cellText(cell: unknown): string {
  if (typeof cell === 'string') return cell.trim()
  if (typeof cell === 'number' && Number.isFinite(cell)) return String(cell)
  return ''
}

function isBlank(cell: unknown): boolean {
  return cell === null || cell === undefined || (typeof cell === 'string' && cell.trim() === '')
}

/**
 * Decode one sheet's rows. Returns null for a sheet without the date header,
 * which is not one of ours.
 */
export function parseSheetRows(
  name: string,
  rows: readonly (readonly unknown[])[],
  describe: (code: string, displayName: string) => string = (_code, displayName) => displayName
): ParsedSheet | null {
  const header = rows[0]
  if (!header || cellText(header[0]) !== CONFIG.storage.dateHeader) return null

  const nameRow = rows[1] ?? []
  const unitRow = rows[2] ?? []
  const columns: { index: number; code: string }[] = []
  const displayNames: Record<string, string> = {}
  const units: Record<string, string> = {}

  for (let c = 1; c < header.length; c++) {
    const code = cellText(header[c])
    if (!code) continue
    columns.push({ index: c, code })
    displayNames[code] = cellText(nameRow[c]) || code
    units[code] = cellText(unitRow[c]) || CONFIG.storage.missingUnit
  }

  const observations: Observation[] = []
  let dropped = 0

  for (let r = HEADER_ROWS; r < rows.length; r++) {
    const row = rows[r] ?? []
    const date = toISODay(row[0])

    for (const { index, code } of columns) {
      const cell = row[index]
      if (isBlank(cell)) continue
      const obs = date
        ? coerceObservation({
            date,
            indicator: code,
            value: cell,
            description: describe(code, displayNames[code] ?? code),
            unit: units[code],
          })
        : null
      if (obs) {
        observations.push(obs)
      } else {
        dropped++
      }
    }
  }

  if (dropped > 0) {
    console.warn(`[workbook] ${name}: dropped ${dropped} cell(s) with an unparseable date or value`)
  }

  return { name, columns: columns.map((c) => c.code), displayNames, units, observations, dropped }
}

export function parseWorkbook(buffer: Buffer, catalog?: IndicatorCatalog): ParsedWorkbook {
  const wb = XLSX.read(buffer, { type: 'buffer' })
  const describe = (code: string, displayName: string) => catalog?.indicators[code] ?? displayName
  const sheets: ParsedSheet[] = []

  for (const sheetName of wb.SheetNames) {
    const sheet = wb.Sheets[sheetName]
    if (!sheet) continue
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null })
    const parsed = parseSheetRows(sheetName, rows, describe)
    if (parsed) sheets.push(parsed)
  }

  return { sheetNames: wb.SheetNames, sheets }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Parsed workbook, or null when the file does not exist yet
 */
export async function readSourceWorkbook(filePath: string, catalog?: IndicatorCatalog): Promise<ParsedWorkbook | null> {
  let buffer: Buffer
  try {
    buffer = await readFile(filePath)
  } catch (error) {
    if (isNotFound(error)) return null
    throw error
  }
  return parseWorkbook(buffer, catalog)
}

/**
 * Long-form observations from a parsed workbook. The unrestricted sheet already
 * holds every column; without it the category sheets are unioned.
 */
export function collectObservations(parsed: ParsedWorkbook): Observation[] {
  const all = parsed.sheets.find((s) => s.name === CONFIG.storage.allSheetName)
  if (all) return all.observations

  let merged: Observation[] = []
  for (const sheet of parsed.sheets) {
    merged = mergeObservations(merged, sheet.observations).observations
  }
  return merged
}

export async function readStoredObservations(filePath: string, catalog?: IndicatorCatalog): Promise<Observation[]> {
  const parsed = await readSourceWorkbook(filePath, catalog)
  if (!parsed) {
    console.log(`[workbook] no existing file at ${filePath}, starting fresh`)
    return []
  }
  const observations = collectObservations(parsed)
  console.log(`[workbook] loaded ${observations.length} stored observation(s) from ${filePath}`)
  return observations
}
