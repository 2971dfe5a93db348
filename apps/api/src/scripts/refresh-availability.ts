/**
 * Refreshes stored availability snapshots for items with an IMDb ID.
 *
 * Usage: tsx src/scripts/refresh-availability.ts [--batch-size=50] [--max-age=168]
 *        [--delay=1] [--force] [--update-flags-only]
 */
import { config, validateConfig } from '../config/services.config';
import { closeDatabase, getDatabase } from '../db';
import { ServiceRegistry } from '../services/service-registry';
import { DEFAULT_BATCH_OPTIONS, refreshStaleAvailability } from '../services/availability-batch';
import { CliArgs } from '../utils/cli-args';
import { logger } from '../utils/logger';

async function main(): Promise<void> {
  const args = new CliArgs();
  validateConfig(config);

  const registry = new ServiceRegistry(getDatabase(), config);
  const { availability } = registry.services;

  try {
    if (args.has('update-flags-only')) {
      const flags = availability.syncAvailabilityFlags();
      logger.info(
        `Availability flags synced: ${flags.updated} updated, ` +
          `${flags.withEntries} with entries, ${flags.withoutEntries} without`
      );
      return;
    }

    const result = await refreshStaleAvailability(availability, {
      batchSize: args.getNumber('batch-size', DEFAULT_BATCH_OPTIONS.batchSize),
      maxAgeHours: args.getNumber('max-age', DEFAULT_BATCH_OPTIONS.maxAgeHours),
      delayMs: args.getNumber('delay', DEFAULT_BATCH_OPTIONS.delayMs / 1000) * 1000,
      force: args.has('force'),
    });

    logger.info(
      `Availability refresh finished: ${result.processed} processed, ` +
        `${result.withEntries} with entries, ${result.withoutEntries} without, ` +
        `${result.skipped} skipped, ${result.errors} errors`
    );
  } finally {
    registry.close();
    closeDatabase();
  }
}

main().catch((error: unknown) => {
  logger.error('Availability refresh failed:', error);
  process.exitCode = 1;
});
