import { Command } from 'commander'
import { z } from 'zod'
import { DEFAULT_CHECKPOINT_EVERY } from '@constants/resolution-policy'
import { logger } from '@lib/logger'
import { logError } from '@lib/logger/helpers'
import { loadManualOverrides } from '@lib/overrides/manual-overrides'
import { readTable, writeTable } from '@lib/tabular/csv-table'
import { closeGeocodingEngine } from '@use-cases/factories/make-geocoding-engine'
import { makeGetCacheStatsUseCase } from '@use-cases/factories/make-get-cache-stats-use-case'
import { makePurgeAmbiguousCacheUseCase } from '@use-cases/factories/make-purge-ambiguous-cache-use-case'
import { makeResolveBatchUseCase } from '@use-cases/factories/make-resolve-batch-use-case'

const resolveOptionsSchema = z.object({
  onlyMissing: z.boolean().default(false),
  checkpointEvery: z.coerce.number().int().positive().default(DEFAULT_CHECKPOINT_EVERY),
  overrides: z.string().min(1).optional(),
})

const purgeOptionsSchema = z.object({
  threshold: z.coerce.number().int().min(2).optional(),
})

async function resolveCommand(input: string, output: string, rawOptions: unknown): Promise<void> {
  const options = resolveOptionsSchema.parse(rawOptions)

  const table = await readTable(input)
  const overrides = options.overrides ? await loadManualOverrides(options.overrides) : undefined

  const resolveBatchUseCase = await makeResolveBatchUseCase()
  const { rows, summary } = await resolveBatchUseCase.execute({
    rows: table.rows,
    onlyMissing: options.onlyMissing,
    checkpointEvery: options.checkpointEvery,
    overrides,
    onCheckpoint: (checkpointRows) => writeTable(output, { headers: table.headers, rows: checkpointRows }),
  })

  await writeTable(output, { headers: table.headers, rows })

  console.table(summary.byStatus)
  console.table(summary.quality)
  logger.info({ output, processed: summary.processed, skipped: summary.skipped }, 'Resolved table written')
}

async function purgeCacheCommand(rawOptions: unknown): Promise<void> {
  const options = purgeOptionsSchema.parse(rawOptions)

  const purgeAmbiguousCacheUseCase = await makePurgeAmbiguousCacheUseCase()
  const { removedKeys, backupLocation } = await purgeAmbiguousCacheUseCase.execute({ threshold: options.threshold })

  for (const key of removedKeys) {
    console.log(key)
  }
  if (backupLocation) console.log(`Backup written to ${backupLocation}`)
  console.log(`Removed ${removedKeys.length} cache entries`)
}

async function cacheStatsCommand(): Promise<void> {
  const getCacheStatsUseCase = await makeGetCacheStatsUseCase()
  const stats = getCacheStatsUseCase.execute()

  console.log(`Entries: ${stats.size}${stats.degraded ? ' (store degraded)' : ''}`)
  console.log(`Sharing a coordinate: ${stats.clustered}`)
  console.table(stats.byProvider)
  console.table(stats.byStatus)
}

export function buildProgram(): Command {
  const program = new Command()

  program.name('address-geocoder').description('Resolve postal addresses to coordinates').version('1.0.0')

  program
    .command('resolve')
    .description('Resolve every row of a CSV table and write the coordinates to a new table')
    .argument('<input>', 'Input CSV with name, street_address, settlement and region columns')
    .argument('<output>', 'Output CSV path')
    .option('--only-missing', 'Skip rows that already have coordinates', false)
    .option('--checkpoint-every <n>', 'Write the output table every N resolved rows', String(DEFAULT_CHECKPOINT_EVERY))
    .option('--overrides <file>', 'JSON file of manual coordinates keyed by street||city||region')
    .action(resolveCommand)

  program
    .command('purge-cache')
    .description('Delete cached results in coordinate clusters or with generic display text')
    .option('--threshold <n>', 'Minimum cluster size to purge')
    .action(purgeCacheCommand)

  program.command('cache-stats').description('Print resolution cache statistics').action(cacheStatsCommand)

  return program
}

async function main(): Promise<void> {
  try {
    await buildProgram().parseAsync(process.argv)
  } finally {
    await closeGeocodingEngine()
  }
}

main().catch((error: unknown) => {
  logError(error, {}, 'Command failed')
  process.exitCode = 1
})
