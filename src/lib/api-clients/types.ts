import { z } from 'zod'
import type { Observation, SourceId } from '@/lib/store/types'

// ============================================================================
// Fetch capability shared by every provider
// ============================================================================

export interface FetchRequest {
  code: string
  description: string
  /**
   * First day wanted (the store's watermark). Nothing earlier may be returned.
   * Null means "from the provider's default start".
   */
  since: string | null
}

export interface SeriesFetcher {
  readonly source: SourceId
  fetchObservations(request: FetchRequest): Promise<Observation[]>
}

export interface ClientOptions {
  apiKey?: string
  /** Attempts per HTTP request */
  retries?: number
  retryDelayMs?: number
  /** Clock for "up to today" ranges */
  now?: () => Date
}

// ============================================================================
// FRED
// ============================================================================

export const FREDObservationSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  value: z.string(),
})

export const FREDResponseSchema = z.object({
  observations: z.array(FREDObservationSchema),
})

export const FREDSeriesInfoSchema = z.object({
  seriess: z.array(z.object({ id: z.string(), units: z.string().optional() })),
})

export type FREDObservation = z.infer<typeof FREDObservationSchema>
export type FREDSeries = FREDObservation[]

// ============================================================================
// BLS
// ============================================================================

export const BLSDatumSchema = z.object({
  year: z.string(),
  period: z.string(),
  value: z.string(),
})

export const BLSResponseSchema = z.object({
  status: z.string(),
  message: z.array(z.string()).optional(),
  Results: z
    .object({
      series: z.array(
        z.object({
          seriesID: z.string().optional(),
          data: z.array(BLSDatumSchema).default([]),
          catalog: z.object({ series_title: z.string().optional() }).passthrough().optional(),
        })
      ),
    })
    .optional(),
})

export type BLSResponse = z.infer<typeof BLSResponseSchema>

// ============================================================================
// ECOS
// ============================================================================

export const ECOSRowSchema = z.object({
  TIME: z.string(),
  DATA_VALUE: z.string().nullable().optional(),
  UNIT_NAME: z.string().nullable().optional(),
})

export const ECOSResponseSchema = z.object({
  StatisticSearch: z
    .object({
      list_total_count: z.number().optional(),
      row: z.array(ECOSRowSchema).default([]),
    })
    .optional(),
  RESULT: z.object({ CODE: z.string().optional(), MESSAGE: z.string().optional() }).optional(),
})

export type ECOSResponse = z.infer<typeof ECOSResponseSchema>
export type ECOSCycle = 'D' | 'M' | 'Q' | 'A'
