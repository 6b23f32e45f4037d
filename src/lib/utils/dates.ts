import { addDays, format, isValid, parseISO } from 'date-fns'
import * as XLSX from 'xlsx'

const ISO_DAY = /^\d{4}-\d{2}-\d{2}/

/**
 * Coerce a date-like value to an ISO day string (YYYY-MM-DD).
 *
 * Accepts ISO strings (a time part is ignored), Date instances and Excel serial
 * day numbers. Returns null for anything that is not a real calendar day.
 */
export function toISODay(input: unknown): string | null {
  if (typeof input === 'string') {
    const t = input.trim()
    if (!ISO_DAY.test(t)) return null
    const day = t.slice(0, 10)
    return isValid(parseISO(day)) ? day : null
  }
  if (input instanceof Date) {
    return Number.isNaN(input.getTime()) ? null : input.toISOString().slice(0, 10)
  }
  if (typeof input === 'number' && Number.isFinite(input)) {
    const d = XLSX.SSF.parse_date_code(input)
    if (!d?.y || !d.m || !d.d) return null
    return `${String(d.y).padStart(4, '0')}-${String(d.m).padStart(2, '0')}-${String(d.d).padStart(2, '0')}`
  }
  return null
}

/**
 * Shift an ISO day by a number of calendar days
 */
export function addDaysISO(iso: string, days: number): string {
  return format(addDays(parseISO(iso), days), 'yyyy-MM-dd')
}

/**
 * Ordinal comparison; ISO days and indicator codes both sort by code unit.
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
