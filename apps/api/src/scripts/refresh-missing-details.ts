/**
 * Refreshes TMDB details for items missing tagline, budget, revenue,
 * production companies, director or UK certification.
 *
 * Usage: tsx src/scripts/refresh-missing-details.ts [--limit=N] [--dry-run] [--force]
 */
import { and, count, gt, isNotNull, ne, SQL } from 'drizzle-orm';
import { AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import { config, validateConfig } from '../config/services.config';
import { closeDatabase, getDatabase } from '../db';
import { catalogItems } from '../db/schema';
import { ServiceRegistry } from '../services/service-registry';
import { CliArgs } from '../utils/cli-args';
import { logger } from '../utils/logger';

const hasText = (column: AnySQLiteColumn) => and(isNotNull(column), ne(column, ''));

const DETAIL_COVERAGE: Array<[string, SQL | undefined]> = [
  ['Taglines', hasText(catalogItems.tagline)],
  ['Revenue', isNotNull(catalogItems.revenue)],
  ['Budget', isNotNull(catalogItems.budget)],
  ['Production Companies', hasText(catalogItems.productionCompanies)],
  ['Director', hasText(catalogItems.director)],
  ['UK Certification', hasText(catalogItems.ukCertification)],
];

async function main(): Promise<void> {
  const args = new CliArgs();
  validateConfig(config);

  const handle = getDatabase();
  const registry = new ServiceRegistry(handle, config);
  const { metadata, metadataSync } = registry.services;

  try {
    if (!metadata.isConfigured()) {
      throw new Error('TMDB API key not configured');
    }

    const limitArg = args.get('limit');
    const result = await metadataSync.refreshMissingDetails({
      limit: limitArg !== undefined ? args.getNumber('limit', 0) : undefined,
      dryRun: args.has('dry-run'),
      force: args.has('force'),
    });

    logger.info(
      `${result.dryRun ? '[dry run] ' : ''}Detail refresh finished: ${result.processed} processed, ` +
        `${result.updated} updated, ${result.skipped} unchanged, ${result.failed} failed`
    );

    const hasTmdbId = gt(catalogItems.tmdbId, 0);
    const countWhere = (where: SQL | undefined) =>
      handle.db.select({ total: count() }).from(catalogItems).where(where).get()?.total ?? 0;

    const total = countWhere(hasTmdbId);
    if (total === 0) return;
    for (const [label, condition] of DETAIL_COVERAGE) {
      const withData = countWhere(and(hasTmdbId, condition));
      logger.info(`  ${label}: ${withData}/${total} (${((withData / total) * 100).toFixed(1)}%)`);
    }
  } finally {
    registry.close();
    closeDatabase();
  }
}

main().catch((error: unknown) => {
  logger.error('Detail refresh failed:', error);
  process.exitCode = 1;
});
