import { setTimeout as sleep } from 'timers/promises';
import type { BulkImportResult } from '@shelfarr/shared-types';
import { CatalogDatabase } from '../db';
import { catalogItems } from '../db/schema';
import { ServiceError } from '../middleware/errorHandler';
import { BulkImportInput } from '../validation/catalog.schemas';
import { DuplicateService } from './duplicate.service';
import { LocationService } from './location.service';
import { MetadataService } from './metadata.service';
import { logger } from '../utils/logger';

export function parseMovieList(movieList: string): string[] {
  return movieList
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Adds one movie per line of a pasted list, taking the first TMDB search
 * hit for each. Per-title failures are collected in the result.
 */
export class BulkImportService {
  constructor(
    private db: CatalogDatabase,
    private metadata: MetadataService,
    private duplicates: DuplicateService,
    private locations: LocationService,
    private options: { delayMs: number } = { delayMs: 0 }
  ) {}

  async importMovies(input: BulkImportInput): Promise<BulkImportResult> {
    if (!this.metadata.isConfigured()) {
      throw new ServiceError('TMDB API key not configured', 'tmdb', 503);
    }

    const titles = parseMovieList(input.movieList);
    const result: BulkImportResult = {
      added: [],
      skipped: [],
      notFound: [],
      errors: [],
      totalProcessed: titles.length,
    };

    const unboxed = input.lifecycleState === 'unboxed';
    const locations = unboxed ? this.locations.nextSequentialLocations(titles.length) : [];
    let nextLocation = 0;

    for (const [index, title] of titles.entries()) {
      if (this.options.delayMs > 0 && index > 0) {
        await sleep(this.options.delayMs);
      }

      try {
        const search = await this.metadata.searchMovies(title);
        const match = search.results[0];
        if (!match) {
          result.notFound.push(title);
          continue;
        }

        const existing = this.duplicates.findByKey({ kind: 'tmdb', tmdbId: match.id });
        if (existing.length > 0 && input.skipExisting) {
          result.skipped.push(`${title} (already exists)`);
          continue;
        }

        const details = await this.metadata.getMovieDetails(match.id);
        const movie = this.metadata.formatMovieData(details);

        let unboxedLocationNumber: string | null = null;
        if (unboxed) {
          unboxedLocationNumber = this.locations.validateUnboxedLocation(locations[nextLocation]);
          nextLocation += 1;
        }

        const item = this.db
          .insert(catalogItems)
          .values({
            ...movie,
            lifecycleState: input.lifecycleState,
            mediaType: input.mediaType,
            copyNumber: this.duplicates.nextCopyNumberForKey({ kind: 'tmdb', tmdbId: match.id }),
            isTartanDvd: input.isTartanDvd,
            isBoxSet: input.isBoxSet,
            boxSetName: input.isBoxSet ? input.boxSetName : null,
            isUnopened: input.isUnopened,
            isUnwatched: input.isUnwatched,
            storageLocation: input.lifecycleState === 'kept' ? input.storageLocation : null,
            unboxedLocationNumber,
          })
          .returning()
          .get();

        const label = item.releaseYear ? `${item.title} (${item.releaseYear})` : item.title;
        result.added.push(existing.length > 0 ? `${label} - copy #${item.copyNumber}` : label);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`[bulk-import] "${title}" failed: ${message}`);
        result.errors.push(`${title}: ${message}`);
      }
    }

    logger.info(
      `[bulk-import] ${result.added.length} added, ${result.skipped.length} skipped, ` +
        `${result.notFound.length} not found, ${result.errors.length} errors`
    );
    return result;
  }
}
