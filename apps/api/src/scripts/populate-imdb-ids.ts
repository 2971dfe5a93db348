/**
 * Fills in missing IMDb IDs from TMDB external ids.
 *
 * Usage: tsx src/scripts/populate-imdb-ids.ts [--limit=N] [--dry-run]
 */
import { config, validateConfig } from '../config/services.config';
import { closeDatabase, getDatabase } from '../db';
import { ServiceRegistry } from '../services/service-registry';
import { CliArgs } from '../utils/cli-args';
import { logger } from '../utils/logger';

async function main(): Promise<void> {
  const args = new CliArgs();
  validateConfig(config);

  const registry = new ServiceRegistry(getDatabase(), config);
  const { metadata, metadataSync } = registry.services;

  try {
    if (!metadata.isConfigured()) {
      throw new Error('TMDB API key not configured');
    }

    const limitArg = args.get('limit');
    const result = await metadataSync.populateImdbIds({
      limit: limitArg !== undefined ? args.getNumber('limit', 0) : undefined,
      dryRun: args.has('dry-run'),
    });

    logger.info(
      `${result.dryRun ? '[dry run] ' : ''}IMDb backfill finished: ${result.processed} processed, ` +
        `${result.updated} updated, ${result.notFound} not found, ${result.failed} failed`
    );
  } finally {
    registry.close();
    closeDatabase();
  }
}

main().catch((error: unknown) => {
  logger.error('IMDb backfill failed:', error);
  process.exitCode = 1;
});
