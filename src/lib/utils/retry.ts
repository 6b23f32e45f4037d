import { getErrorMessage, isRetryableError } from './errors'

export interface RetryOptions {
  /** Total attempts, including the first */
  retries?: number
  baseDelayMs?: number
  /** Errors failing this check are rethrown at once */
  shouldRetry?: (error: unknown) => boolean
  /** Log prefix */
  label?: string
}

/**
 * Execute a function with exponential backoff retry
 */
export async function fetchWithRetry<T>(fetchFn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 3, baseDelayMs = 1000, shouldRetry = isRetryableError, label = 'retry' } = options
  let lastError: unknown

  for (let attempt = 0; attempt < retries; attempt++) {
    try {
      return await fetchFn()
    } catch (error) {
      lastError = error
      if (!shouldRetry(error)) break
      if (attempt < retries - 1) {
        const delay = baseDelayMs * Math.pow(2, attempt)
        console.warn(`[${label}] attempt ${attempt + 1}/${retries} failed, retrying in ${delay}ms: ${getErrorMessage(error)}`)
        await sleep(delay)
      }
    }
  }

  throw lastError instanceof Error ? lastError : new Error('All retry attempts failed')
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
