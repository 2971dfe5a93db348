import { randomUUID } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';
import { and, asc, eq, gt, isNotNull, isNull, or } from 'drizzle-orm';
import type { MetadataRefreshProgress } from '@shelfarr/shared-types';
import { CatalogDatabase } from '../db';
import { catalogItems, CatalogItem } from '../db/schema';
import { NotFoundError, ServiceError, ValidationError } from '../middleware/errorHandler';
import { CacheService } from './cache.service';
import { DuplicateService } from './duplicate.service';
import { MetadataService, RefreshableMovieFields } from './metadata.service';
import { logger } from '../utils/logger';

export interface MetadataSyncOptions {
  /** Seconds a refresh-all progress record is kept. */
  progressTTL: number;
  /** Pause between TMDB calls in bulk jobs. */
  delayMs: number;
}

export type ImdbFetchResult =
  | { success: true; imdbId: string; item: CatalogItem }
  | { success: false; message: string };

export interface PopulateImdbIdsResult {
  processed: number;
  updated: number;
  notFound: number;
  failed: number;
  dryRun: boolean;
}

export interface RefreshMissingDetailsOptions {
  limit?: number;
  dryRun?: boolean;
  /** Refresh every item with a TMDB id, complete or not. */
  force?: boolean;
}

export interface RefreshMissingDetailsResult {
  processed: number;
  updated: number;
  skipped: number;
  failed: number;
  dryRun: boolean;
}

type RefreshField = keyof RefreshableMovieFields & keyof CatalogItem;

// Poster choice belongs to the user once set
const DETAIL_FIELDS: readonly RefreshField[] = [
  'imdbId',
  'title',
  'overview',
  'releaseYear',
  'genres',
  'runtime',
  'rating',
  'tmdbUserScore',
  'ukCertification',
  'originalLanguage',
  'budget',
  'revenue',
  'productionCompanies',
  'tagline',
  'director',
];

function takeIfChanged<K extends RefreshField>(
  key: K,
  item: CatalogItem,
  fields: RefreshableMovieFields,
  changes: RefreshableMovieFields
): boolean {
  const value = fields[key];
  if (!value || String(item[key]) === String(value)) return false;
  changes[key] = value;
  return true;
}

const progressKey = (taskId: string) => `metadata-refresh:${taskId}`;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Writes TMDB data back to catalog rows: IMDb id backfill, rematching a
 * wrong match, poster changes and the refresh-all job.
 */
export class MetadataSyncService {
  constructor(
    private db: CatalogDatabase,
    private metadata: MetadataService,
    private duplicates: DuplicateService,
    private cache: CacheService,
    private options: MetadataSyncOptions
  ) {}

  async fetchImdbId(item: CatalogItem): Promise<ImdbFetchResult> {
    if (!item.tmdbId) {
      return { success: false, message: 'No TMDB ID available' };
    }

    const imdbId = await this.metadata.getImdbId(item.tmdbId);
    if (!imdbId) {
      return { success: false, message: 'No IMDB ID found' };
    }

    const updated = this.db
      .update(catalogItems)
      .set({ imdbId, updatedAt: new Date().toISOString() })
      .where(eq(catalogItems.id, item.id))
      .returning()
      .get();
    if (!updated) {
      throw new NotFoundError(`Catalog item ${item.id} not found`);
    }

    logger.info(`Set IMDb ID ${imdbId} on "${updated.title}"`);
    return { success: true, imdbId, item: updated };
  }

  /**
   * Points an item at a different TMDB movie. Metadata is replaced; state,
   * flags, copy notes and locations stay as the user set them.
   */
  async rematch(item: CatalogItem, tmdbId: number): Promise<CatalogItem> {
    const details = await this.metadata.getMovieDetails(tmdbId);
    const fields = this.metadata.formatMovieData(details);
    const movedSets = item.tmdbId !== tmdbId;

    const updated = this.db
      .update(catalogItems)
      .set({
        ...fields,
        ...(movedSets && {
          copyNumber: this.duplicates.nextCopyNumberForKey({ kind: 'tmdb', tmdbId }),
          // The snapshot belonged to the old identifier
          availabilityCache: null,
          availabilityCacheTimestamp: null,
          hasCachedAvailability: false,
        }),
        updatedAt: new Date().toISOString(),
      })
      .where(eq(catalogItems.id, item.id))
      .returning()
      .get();
    if (!updated) {
      throw new NotFoundError(`Catalog item ${item.id} not found`);
    }

    logger.info(`Rematched item ${item.id} "${item.title}" to TMDB ${tmdbId} "${updated.title}"`);
    return updated;
  }

  changePoster(item: CatalogItem, posterPath: string): CatalogItem {
    const path = posterPath.trim();
    if (!path.startsWith('/')) {
      throw new ValidationError('Poster path must start with "/".', 400, 'posterPath');
    }

    const updated = this.db
      .update(catalogItems)
      .set({ posterPath: path, updatedAt: new Date().toISOString() })
      .where(eq(catalogItems.id, item.id))
      .returning()
      .get();
    if (!updated) {
      throw new NotFoundError(`Catalog item ${item.id} not found`);
    }
    return updated;
  }

  /** Starts refreshing every item with a TMDB id and returns the task id to poll. */
  startRefreshAll(): string {
    if (!this.metadata.isConfigured()) {
      throw new ServiceError('TMDB API key not configured', 'tmdb', 503);
    }

    const items = this.db
      .select({ id: catalogItems.id, title: catalogItems.title, tmdbId: catalogItems.tmdbId })
      .from(catalogItems)
      .where(gt(catalogItems.tmdbId, 0))
      .orderBy(asc(catalogItems.id))
      .all();

    const taskId = randomUUID();
    this.saveProgress(taskId, {
      progress: 0,
      status: `Starting refresh of ${items.length} movies`,
      completed: false,
      results: { updated: 0, failed: 0, skipped: 0 },
    });

    logger.info(`[tmdb] Refresh-all task ${taskId} started for ${items.length} items`);
    this.runRefreshAll(taskId, items).catch((error: unknown) => {
      logger.error(`[tmdb] Refresh-all task ${taskId} aborted:`, error);
      const current = this.cache.get<MetadataRefreshProgress>(progressKey(taskId));
      this.saveProgress(taskId, {
        progress: current?.progress ?? 0,
        status: `Failed: ${errorMessage(error)}`,
        completed: true,
        results: current?.results ?? { updated: 0, failed: 0, skipped: 0 },
      });
    });

    return taskId;
  }

  getRefreshProgress(taskId: string): MetadataRefreshProgress {
    const progress = this.cache.get<MetadataRefreshProgress>(progressKey(taskId));
    if (!progress) {
      throw new NotFoundError('Task not found');
    }
    return progress;
  }

  /** Backfills IMDb ids for items that have a TMDB id but no IMDb id. */
  async populateImdbIds(options: { limit?: number; dryRun?: boolean } = {}): Promise<PopulateImdbIdsResult> {
    const dryRun = options.dryRun === true;
    const query = this.db
      .select()
      .from(catalogItems)
      .where(
        and(
          isNotNull(catalogItems.tmdbId),
          or(isNull(catalogItems.imdbId), eq(catalogItems.imdbId, ''))
        )
      )
      .orderBy(asc(catalogItems.id));
    const items = options.limit !== undefined ? query.limit(options.limit).all() : query.all();

    const result: PopulateImdbIdsResult = { processed: 0, updated: 0, notFound: 0, failed: 0, dryRun };

    for (const item of items) {
      result.processed += 1;
      try {
        if (dryRun) {
          const imdbId = item.tmdbId ? await this.metadata.getImdbId(item.tmdbId) : undefined;
          if (imdbId) {
            logger.info(`[dry run] Would set IMDb ID ${imdbId} on "${item.title}"`);
            result.updated += 1;
          } else {
            result.notFound += 1;
          }
        } else {
          const outcome = await this.fetchImdbId(item);
          if (outcome.success) {
            result.updated += 1;
          } else {
            logger.warn(`No IMDb ID for "${item.title}": ${outcome.message}`);
            result.notFound += 1;
          }
        }
      } catch (error) {
        logger.error(`Failed to look up IMDb ID for "${item.title}": ${errorMessage(error)}`);
        result.failed += 1;
      }

      if (this.options.delayMs > 0) {
        await sleep(this.options.delayMs);
      }
    }

    return result;
  }

  /**
   * Refreshes items whose detail fields (tagline, budget, revenue, production
   * companies, director, UK certification) are incomplete. Only non-empty
   * values that differ from the stored ones are written.
   */
  async refreshMissingDetails(
    options: RefreshMissingDetailsOptions = {}
  ): Promise<RefreshMissingDetailsResult> {
    const dryRun = options.dryRun === true;
    const hasTmdbId = gt(catalogItems.tmdbId, 0);
    const missingDetails = or(
      isNull(catalogItems.tagline),
      eq(catalogItems.tagline, ''),
      isNull(catalogItems.budget),
      isNull(catalogItems.revenue),
      isNull(catalogItems.productionCompanies),
      eq(catalogItems.productionCompanies, ''),
      isNull(catalogItems.director),
      eq(catalogItems.director, ''),
      isNull(catalogItems.ukCertification),
      eq(catalogItems.ukCertification, '')
    );
    const query = this.db
      .select()
      .from(catalogItems)
      .where(options.force ? hasTmdbId : and(hasTmdbId, missingDetails))
      .orderBy(asc(catalogItems.id));
    const items = options.limit !== undefined ? query.limit(options.limit).all() : query.all();

    const result: RefreshMissingDetailsResult = { processed: 0, updated: 0, skipped: 0, failed: 0, dryRun };
    logger.info(
      `${dryRun ? '[dry run] ' : ''}Refreshing details for ${items.length} ` +
        `${options.force ? 'items with a TMDB id' : 'items missing details'}`
    );

    for (const [index, item] of items.entries()) {
      result.processed += 1;
      if (!item.tmdbId) continue;

      try {
        const details = await this.metadata.getMovieDetails(item.tmdbId, { force: true });
        const fields = this.metadata.formatMovieDataForRefresh(details);
        const changes: RefreshableMovieFields = {};
        const changed: RefreshField[] = [];
        for (const key of DETAIL_FIELDS) {
          if (takeIfChanged(key, item, fields, changes)) changed.push(key);
        }

        if (changed.length === 0) {
          result.skipped += 1;
        } else {
          if (!dryRun) {
            this.db
              .update(catalogItems)
              .set({ ...changes, updatedAt: new Date().toISOString() })
              .where(eq(catalogItems.id, item.id))
              .run();
          }
          logger.info(
            `[${index + 1}/${items.length}] ${dryRun ? 'Would update' : 'Updated'} ` +
              `"${item.title}": ${changed.join(', ')}`
          );
          result.updated += 1;
        }
      } catch (error) {
        logger.warn(`[tmdb] Detail refresh failed for "${item.title}" (${item.tmdbId}): ${errorMessage(error)}`);
        result.failed += 1;
      }

      if (this.options.delayMs > 0 && index < items.length - 1) {
        await sleep(this.options.delayMs);
      }
    }

    return result;
  }

  private async runRefreshAll(
    taskId: string,
    items: Array<Pick<CatalogItem, 'id' | 'title' | 'tmdbId'>>
  ): Promise<void> {
    const results = { updated: 0, failed: 0, skipped: 0 };
    const total = items.length;

    for (const [index, item] of items.entries()) {
      if (!item.tmdbId) {
        results.skipped += 1;
        continue;
      }

      try {
        const details = await this.metadata.getMovieDetails(item.tmdbId, { force: true });
        const fields = this.metadata.formatMovieDataForRefresh(details);
        if (Object.keys(fields).length === 0) {
          results.skipped += 1;
        } else {
          this.db
            .update(catalogItems)
            .set({ ...fields, updatedAt: new Date().toISOString() })
            .where(eq(catalogItems.id, item.id))
            .run();
          results.updated += 1;
        }
      } catch (error) {
        logger.warn(`[tmdb] Refresh failed for "${item.title}" (${item.tmdbId}): ${errorMessage(error)}`);
        results.failed += 1;
      }

      this.saveProgress(taskId, {
        progress: Math.round(((index + 1) / total) * 100),
        status: `Processing ${index + 1} of ${total}: ${item.title}`,
        completed: false,
        results: { ...results },
      });

      if (this.options.delayMs > 0 && index < total - 1) {
        await sleep(this.options.delayMs);
      }
    }

    this.saveProgress(taskId, {
      progress: 100,
      status: `Completed: ${results.updated} updated, ${results.failed} failed, ${results.skipped} skipped`,
      completed: true,
      results,
    });
    logger.info(`[tmdb] Refresh-all task ${taskId} finished`);
  }

  private saveProgress(taskId: string, progress: MetadataRefreshProgress): void {
    this.cache.set(progressKey(taskId), progress, this.options.progressTTL);
  }
}
