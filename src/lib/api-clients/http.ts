import type { z } from 'zod'
import { fetchWithRetry } from '@/lib/utils/retry'
import { APIError, ValidationError } from '@/lib/utils/errors'

export interface JsonRequest<T> {
  provider: string
  url: string
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
  init?: RequestInit
  retries?: number
  retryDelayMs?: number
}

/**
 * Fetch, check status and validate a JSON payload, retrying with backoff
 */
export async function fetchJson<T>({ provider, url, schema, init, retries, retryDelayMs }: JsonRequest<T>): Promise<T> {
  return fetchWithRetry(
    async () => {
      const res = await fetch(url, init)
      if (!res.ok) {
        const text = await res.text().catch(() => '')
        const msg = `${provider} API returned HTTP ${res.status}${text ? `: ${text}` : ''}`
        throw new APIError(msg, res.status, provider)
      }
      const json: unknown = await res.json()
      const parsed = schema.safeParse(json)
      if (!parsed.success) {
        throw new ValidationError(`Invalid ${provider} response: ` + JSON.stringify(parsed.error.issues), 'response')
      }
      return parsed.data
    },
    { retries, baseDelayMs: retryDelayMs, label: provider.toLowerCase() }
  )
}
