import { DEFAULT_CHECKPOINT_EVERY, QUALITY_BUCKETS } from '@constants/resolution-policy'
import { normalizeAddressRow } from '@lib/address/address-normalizer'
import { logger, runWithRowContext } from '@lib/logger'
import { logError } from '@lib/logger/helpers'
import { ManualOverride, ManualOverrides } from '@lib/overrides/manual-overrides'
import { OutputColumn, TableRow, toAddressRow } from '@lib/tabular/csv-table'
import { InvalidAddressQueryError } from '@use-cases/errors/invalid-address-query-error'
import { ResolveAddressUseCase } from './resolve-address-use-case'
import { FAILED_RESULT, ResolutionResult, ResolutionStatus, statusForProvider } from './resolution-result'

export interface ResolveBatchUseCaseRequest {
  rows: TableRow[]
  onlyMissing?: boolean
  checkpointEvery?: number
  onCheckpoint?: (rows: TableRow[], processed: number) => Promise<void>
  overrides?: ManualOverrides
}

export type QualityBucket = 'excellent' | 'good' | 'fair' | 'failed'

export interface BatchSummary {
  total: number
  processed: number
  skipped: number
  overridden: number
  byStatus: Record<ResolutionStatus, number>
  quality: Record<QualityBucket, number>
}

export interface ResolveBatchUseCaseResponse {
  rows: TableRow[]
  summary: BatchSummary
}

export function qualityBucket(result: ResolutionResult): QualityBucket {
  if (result.status === ResolutionStatus.FAILED) return 'failed'
  if (result.confidence >= QUALITY_BUCKETS.excellent) return 'excellent'
  if (result.confidence >= QUALITY_BUCKETS.good) return 'good'
  if (result.confidence >= QUALITY_BUCKETS.fair) return 'fair'
  return 'failed'
}

const hasCoordinates = (row: TableRow): boolean =>
  [row.lat, row.lng].every((value) => value !== undefined && value.trim() !== '' && Number.isFinite(Number(value)))

/**
 * Resolves table rows strictly one after another. A failing row is recorded as
 * Failed and never stops the batch.
 */
export class ResolveBatchUseCase {
  constructor(private readonly resolveAddress: ResolveAddressUseCase) {}

  async execute({
    rows,
    onlyMissing = false,
    checkpointEvery = DEFAULT_CHECKPOINT_EVERY,
    onCheckpoint,
    overrides = new Map<string, ManualOverride>(),
  }: ResolveBatchUseCaseRequest): Promise<ResolveBatchUseCaseResponse> {
    const output = rows.map((row) => ({ ...row }))
    const summary: BatchSummary = {
      total: rows.length,
      processed: 0,
      skipped: 0,
      overridden: 0,
      byStatus: { [ResolutionStatus.RESOLVED]: 0, [ResolutionStatus.CITY_LEVEL]: 0, [ResolutionStatus.FAILED]: 0 },
      quality: { excellent: 0, good: 0, fair: 0, failed: 0 },
    }

    for (const [index, row] of output.entries()) {
      if (onlyMissing && hasCoordinates(row)) {
        summary.skipped++
        continue
      }

      const { result, overridden } = await runWithRowContext(index, () => this.resolveRow(row, overrides))

      output[index] = { ...row, ...this.toOutputColumns(result) }
      summary.processed++
      summary.byStatus[result.status]++
      summary.quality[qualityBucket(result)]++
      if (overridden) summary.overridden++

      if (onCheckpoint && checkpointEvery > 0 && summary.processed % checkpointEvery === 0) {
        await this.checkpoint(onCheckpoint, output, summary.processed)
      }
    }

    if (onCheckpoint) {
      await this.checkpoint(onCheckpoint, output, summary.processed)
    }

    logger.info({ ...summary }, 'Batch resolution finished')

    return { rows: output, summary }
  }

  private async resolveRow(
    row: TableRow,
    overrides: ManualOverrides,
  ): Promise<{ result: ResolutionResult; overridden: boolean }> {
    const addressRow = toAddressRow(row)

    try {
      const query = normalizeAddressRow(addressRow)
      const rawKey = [addressRow.street_address, addressRow.settlement, addressRow.region]
        .map((value) => (value ?? '').trim())
        .join('||')

      const override = overrides.get(query.cacheKey) ?? overrides.get(rawKey)
      if (override) {
        logger.debug({ key: query.cacheKey }, 'Manual override applied')
        return { result: this.fromOverride(override), overridden: true }
      }

      return { result: await this.resolveAddress.execute(query), overridden: false }
    } catch (error) {
      if (error instanceof InvalidAddressQueryError) {
        logger.warn({ row: addressRow }, 'Row has neither street nor settlement')
      } else {
        logError(error, { row: addressRow }, 'Row resolution failed')
      }
      return { result: FAILED_RESULT, overridden: false }
    }
  }

  private fromOverride(override: ManualOverride): ResolutionResult {
    return {
      status: statusForProvider(override.provider),
      lat: override.lat,
      lng: override.lng,
      providerId: override.provider,
      displayText: override.display_name,
      confidence: override.score,
    }
  }

  private toOutputColumns(result: ResolutionResult): Record<OutputColumn, string> {
    return {
      lat: result.lat === null ? '' : String(result.lat),
      lng: result.lng === null ? '' : String(result.lng),
      provider: result.providerId ?? '',
      display_name: result.displayText ?? '',
      confidence_score: String(result.confidence),
    }
  }

  private async checkpoint(
    onCheckpoint: (rows: TableRow[], processed: number) => Promise<void>,
    rows: TableRow[],
    processed: number,
  ): Promise<void> {
    try {
      await onCheckpoint(rows, processed)
      logger.info({ processed }, 'Checkpoint saved')
    } catch (error) {
      logError(error, { processed }, 'Checkpoint failed, continuing')
    }
  }
}
