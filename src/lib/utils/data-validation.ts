/**
 * Observation validation and coercion
 *
 * Records crossing into the store (provider payloads, workbook cells) are coerced
 * here. Anything without a real calendar day or a finite value is dropped and
 * counted; a bad record never aborts the batch.
 */

import { CONFIG } from '@/lib/config'
import type { Observation } from '@/lib/store/types'
import { toISODay } from './dates'

export interface ObservationInput {
  date: unknown
  indicator: unknown
  value: unknown
  description?: unknown
  unit?: unknown
}

export interface ValidationResult {
  observations: Observation[]
  dropped: number
  warnings: string[]
}

export function toNumber(v: unknown): number | null {
  if (typeof v === 'number' && Number.isFinite(v)) return v
  if (typeof v === 'string') {
    const t = v.replace(/,/g, '').trim()
    if (!t) return null
    const n = Number(t)
    return Number.isFinite(n) ? n : null
  }
  return null
}

function toText(v: unknown, fallback: string): string {
  if (typeof v === 'string' && v.trim()) return v.trim()
  if (typeof v === 'number' && Number.isFinite(v)) return String(v)
  return fallback
}

/**
 * Coerce one raw record, or null when it cannot become an Observation
 */
export function coerceObservation(input: ObservationInput): Observation | null {
  const date = toISODay(input.date)
  const value = toNumber(input.value)
  const indicator = toText(input.indicator, '')
  if (!date || value === null || !indicator) return null
  return {
    date,
    indicator,
    value,
    description: toText(input.description, indicator),
    unit: toText(input.unit, CONFIG.storage.missingUnit),
  }
}

export function validateObservations(inputs: readonly ObservationInput[]): ValidationResult {
  const observations: Observation[] = []
  const warnings: string[] = []
  let dropped = 0

  for (const input of inputs) {
    const obs = coerceObservation(input)
    if (obs) {
      observations.push(obs)
    } else {
      dropped++
    }
  }

  if (dropped > 0) {
    warnings.push(`Dropped ${dropped} record(s) with an unparseable date or non-numeric value`)
  }

  return { observations, dropped, warnings }
}

/**
 * Runtime guard for typed observations whose origin the store does not control
 */
export function isValidObservation(obs: Observation): boolean {
  return (
    typeof obs.indicator === 'string' &&
    obs.indicator.length > 0 &&
    typeof obs.value === 'number' &&
    Number.isFinite(obs.value) &&
    toISODay(obs.date) === obs.date
  )
}
