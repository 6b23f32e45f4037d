import type { SourceId } from '@/lib/store/types'
import { BLSClient } from './bls'
import { ECOSClient } from './ecos'
import { FREDClient } from './fred'
import type { ClientOptions, SeriesFetcher } from './types'

export { BLSClient, blsPeriodToDate, truncateUnit } from './bls'
export { ECOSClient, determineCycle, formatEcosPeriod, parseEcosCode, parseEcosTime } from './ecos'
export { FREDClient } from './fred'
export { fetchJson } from './http'
export type { ClientOptions, FetchRequest, SeriesFetcher } from './types'

export function createFetcher(source: SourceId, options: ClientOptions = {}): SeriesFetcher {
  switch (source) {
    case 'FRED':
      return new FREDClient(options)
    case 'BLS':
      return new BLSClient(options)
    case 'ECOS':
      return new ECOSClient(options)
  }
}
