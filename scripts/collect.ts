/**
 * Incremental collection for FRED, ECOS and BLS
 *
 * Usage:
 *   npm run collect
 *   npm run collect -- --source ecos bls
 */

import 'dotenv/config'
import { collectAll, parseSourceArgs } from '@/lib/collection/collect'
import { getErrorMessage } from '@/lib/utils/errors'

async function run() {
  const sources = parseSourceArgs(process.argv.slice(2))
  console.log(`[collect] started ${new Date().toISOString()} for ${sources.join(', ')}`)

  const outcomes = await collectAll(sources)
  if (outcomes.some((o) => !o.ok)) process.exitCode = 1
}

run().catch((error: unknown) => {
  console.error(`[collect] ${getErrorMessage(error)}`)
  process.exit(1)
})
