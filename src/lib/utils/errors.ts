/**
 * A provider answered with a non-2xx status
 */
export class APIError extends Error {
  constructor(message: string, public statusCode: number, public provider: string) {
    super(message)
    this.name = 'APIError'
  }

  /** Throttling and server-side failures may clear up on a later attempt */
  get retryable(): boolean {
    return this.statusCode === 429 || this.statusCode >= 500
  }
}

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Raised only when the store reaches a state its own contract rules out.
 * Not a runtime condition callers should recover from.
 */
export class StoreInvariantError extends Error {
  constructor(message: string, public source?: string) {
    super(message)
    this.name = 'StoreInvariantError'
  }
}

/**
 * Extract user-friendly error message from error object
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'An unknown error occurred'
}

/**
 * Check if error is due to rate limiting
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof APIError) return error.statusCode === 429
  if (error instanceof Error) return error.message.toLowerCase().includes('rate limit')
  return false
}

/**
 * Whether another attempt could succeed. Bad input and malformed payloads never will;
 * network failures might.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof APIError) return error.retryable
  if (error instanceof ValidationError || error instanceof StoreInvariantError) return false
  return true
}
