import { setTimeout as sleep } from 'timers/promises';
import { AvailabilityService } from './availability.service';
import { logger } from '../utils/logger';

export interface AvailabilityBatchOptions {
  batchSize: number;
  maxAgeHours: number;
  delayMs: number;
  force: boolean;
}

export const DEFAULT_BATCH_OPTIONS: AvailabilityBatchOptions = {
  batchSize: 50,
  maxAgeHours: 168,
  delayMs: 1000,
  force: false,
};

export interface AvailabilityBatchResult {
  processed: number;
  withEntries: number;
  withoutEntries: number;
  skipped: number;
  errors: number;
}

/**
 * Refreshes one batch of items whose stored snapshot is missing or older
 * than `maxAgeHours`. Provider failures leave the row as it was.
 */
export async function refreshStaleAvailability(
  availability: AvailabilityService,
  options: AvailabilityBatchOptions
): Promise<AvailabilityBatchResult> {
  const items = availability.findStale(options.maxAgeHours, options.batchSize, options.force);
  const result: AvailabilityBatchResult = {
    processed: 0,
    withEntries: 0,
    withoutEntries: 0,
    skipped: 0,
    errors: 0,
  };

  logger.info(`[availability] ${items.length} items to refresh`);

  for (const [index, item] of items.entries()) {
    if (options.delayMs > 0 && index > 0) {
      await sleep(options.delayMs);
    }

    const outcome = await availability.refreshAvailability(item, { force: options.force });
    result.processed += 1;
    if (outcome.success) {
      if (outcome.records.length > 0) {
        result.withEntries += 1;
      } else {
        result.withoutEntries += 1;
      }
    } else if (outcome.reason === 'provider_error') {
      result.errors += 1;
    } else {
      result.skipped += 1;
    }
  }

  return result;
}
