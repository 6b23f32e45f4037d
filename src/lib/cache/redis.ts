import path from 'node:path'
import { Redis } from '@upstash/redis'

let client: Redis | null | undefined

/**
 * Shared Upstash client, or null when the REST credentials are not configured.
 * The cache is optional; every caller must work without it.
 */
export function getRedis(): Redis | null {
  if (client !== undefined) return client

  const url = process.env.UPSTASH_REDIS_REST_URL?.trim()
  const token = process.env.UPSTASH_REDIS_REST_TOKEN?.trim()
  if (!url || !token) {
    console.warn('[cache] Redis environment variables are missing: UPSTASH_REDIS_REST_URL, UPSTASH_REDIS_REST_TOKEN; caching disabled')
    client = null
    return client
  }

  client = new Redis({ url, token })
  return client
}

export const CACHE_KEYS = {
  /** Keyed by workbook file */
  SOURCE_DATA: (source: string, filePath: string) => `source:data:${source}:${path.resolve(filePath)}`,
} as const

export const CACHE_TTL = {
  SOURCE_DATA: 3600, // 1 hour, one analysis session
} as const

export async function getCached<T>(key: string): Promise<T | null> {
  const redis = getRedis()
  if (!redis) return null
  try {
    const value = await redis.get<T>(key)
    if (value != null) {
      console.log(`[cache] hit for ${key}`)
      return value
    }
    console.log(`[cache] miss for ${key}`)
    return null
  } catch (error) {
    console.warn(`[cache] get error for ${key}:`, error)
    return null
  }
}

export async function setCached<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
  const redis = getRedis()
  if (!redis) return
  try {
    await redis.set(key, value, { ex: ttlSeconds })
  } catch (error) {
    console.warn(`[cache] set error for ${key}:`, error)
  }
}

export async function deleteCached(key: string): Promise<void> {
  const redis = getRedis()
  if (!redis) return
  try {
    await redis.del(key)
  } catch (error) {
    console.warn(`[cache] delete error for ${key}:`, error)
  }
}
