import { and, eq, isNotNull, isNull, lt, ne, or, asc } from 'drizzle-orm';
import type { AvailabilityRecord, AvailabilitySummary } from '@shelfarr/shared-types';
import { CatalogDatabase } from '../db';
import { catalogItems, CatalogItem } from '../db/schema';
import { AvailabilityProvider, YtsTorrent } from '../clients/YTSClient';
import { CacheService } from './cache.service';
import { logger } from '../utils/logger';

export const DEFAULT_MAX_AGE_HOURS = 24;
const HOUR_MS = 60 * 60 * 1000;

export interface AvailabilityOptions {
  qualities: string[];
  maxAgeHours: number;
  /** Seconds a non-empty provider response stays in memory. */
  hitTTL: number;
  /** Seconds an empty provider response stays in memory. */
  emptyTTL: number;
}

export type AvailabilityFailureReason = 'missing_identifier' | 'provider_error' | 'not_found';

export type AvailabilityRefreshResult =
  | { success: true; item: CatalogItem; records: AvailabilityRecord[] }
  | { success: false; reason: AvailabilityFailureReason; message: string };

type CacheFields = Pick<CatalogItem, 'availabilityCache' | 'availabilityCacheTimestamp'>;

export function isCacheFresh(
  item: CacheFields,
  maxAgeHours: number = DEFAULT_MAX_AGE_HOURS,
  now: Date = new Date()
): boolean {
  if (!item.availabilityCacheTimestamp) {
    return false;
  }
  const cachedAt = Date.parse(item.availabilityCacheTimestamp);
  if (Number.isNaN(cachedAt)) {
    return false;
  }
  return now.getTime() - cachedAt < maxAgeHours * HOUR_MS;
}

export function hasAvailableEntries(item: CacheFields): boolean {
  return (item.availabilityCache?.length ?? 0) > 0;
}

export function toAvailabilityRecord(torrent: YtsTorrent): AvailabilityRecord {
  return {
    quality: torrent.quality,
    ...(torrent.type && { type: torrent.type }),
    size: torrent.size,
    sizeBytes: torrent.size_bytes,
    seeds: torrent.seeds,
    peers: torrent.peers,
    url: torrent.url,
    ...(torrent.hash && { hash: torrent.hash }),
  };
}

export class AvailabilityService {
  constructor(
    private db: CatalogDatabase,
    private provider: AvailabilityProvider | undefined,
    private cache: CacheService,
    private options: AvailabilityOptions
  ) {}

  isEnabled(): boolean {
    return this.provider !== undefined;
  }

  get maxAgeHours(): number {
    return this.options.maxAgeHours;
  }

  isCacheFresh(item: CacheFields, maxAgeHours: number = DEFAULT_MAX_AGE_HOURS, now?: Date): boolean {
    return isCacheFresh(item, maxAgeHours, now);
  }

  /**
   * Answers from the stored snapshot only. List and filter views call this,
   * so it must never reach the provider.
   */
  hasAvailableEntries(item: CacheFields): boolean {
    return hasAvailableEntries(item);
  }

  summarize(item: CatalogItem, now?: Date): AvailabilitySummary {
    return {
      itemId: item.id,
      records: item.availabilityCache ?? [],
      cachedAt: item.availabilityCacheTimestamp,
      fresh: this.isCacheFresh(item, this.options.maxAgeHours, now),
      hasAvailableEntries: this.hasAvailableEntries(item),
    };
  }

  async refreshAvailability(
    item: Pick<CatalogItem, 'id' | 'imdbId'>,
    options: { force?: boolean } = {}
  ): Promise<AvailabilityRefreshResult> {
    const imdbId = item.imdbId?.trim();
    if (!imdbId) {
      return {
        success: false,
        reason: 'missing_identifier',
        message: 'Add an IMDb ID to this item before checking availability.',
      };
    }

    let torrents: YtsTorrent[];
    try {
      torrents = await this.fetchTorrents(imdbId, options.force === true);
    } catch (error) {
      logger.warn(
        `[availability] Refresh failed for item ${item.id} (${imdbId}): ${error instanceof Error ? error.message : String(error)}`
      );
      return {
        success: false,
        reason: 'provider_error',
        message: 'The availability service is unavailable. Try again later.',
      };
    }

    const allowed = new Set(this.options.qualities);
    const records = torrents
      .filter((torrent) => allowed.has(torrent.quality))
      .map(toAvailabilityRecord);
    const now = new Date().toISOString();

    // Cache, timestamp and flag are written by one statement
    const updated = this.db
      .update(catalogItems)
      .set({
        availabilityCache: records,
        availabilityCacheTimestamp: now,
        hasCachedAvailability: records.length > 0,
        updatedAt: now,
      })
      .where(eq(catalogItems.id, item.id))
      .returning()
      .get();

    if (!updated) {
      return {
        success: false,
        reason: 'not_found',
        message: `Catalog item ${item.id} no longer exists.`,
      };
    }

    logger.info(
      `[availability] Cached ${records.length} entr${records.length === 1 ? 'y' : 'ies'} for "${updated.title}"`
    );
    return { success: true, item: updated, records };
  }

  /** Items with an IMDb ID whose snapshot is missing or older than the window. */
  findStale(maxAgeHours: number, limit: number, force = false): CatalogItem[] {
    const hasIdentifier = and(isNotNull(catalogItems.imdbId), ne(catalogItems.imdbId, ''));
    const cutoff = new Date(Date.now() - maxAgeHours * HOUR_MS).toISOString();

    const where = force
      ? hasIdentifier
      : and(
          hasIdentifier,
          or(
            isNull(catalogItems.availabilityCacheTimestamp),
            lt(catalogItems.availabilityCacheTimestamp, cutoff)
          )
        );

    return this.db
      .select()
      .from(catalogItems)
      .where(where)
      .orderBy(asc(catalogItems.id))
      .limit(limit)
      .all();
  }

  /** Recomputes the list-filter flag from stored snapshots without network calls. */
  syncAvailabilityFlags(): { updated: number; withEntries: number; withoutEntries: number } {
    const rows = this.db
      .select({
        id: catalogItems.id,
        availabilityCache: catalogItems.availabilityCache,
        availabilityCacheTimestamp: catalogItems.availabilityCacheTimestamp,
        hasCachedAvailability: catalogItems.hasCachedAvailability,
      })
      .from(catalogItems)
      .all();

    let updated = 0;
    let withEntries = 0;
    for (const row of rows) {
      const flag = hasAvailableEntries(row);
      if (flag) withEntries += 1;
      if (flag !== row.hasCachedAvailability) {
        this.db
          .update(catalogItems)
          .set({ hasCachedAvailability: flag })
          .where(eq(catalogItems.id, row.id))
          .run();
        updated += 1;
      }
    }

    return { updated, withEntries, withoutEntries: rows.length - withEntries };
  }

  private async fetchTorrents(imdbId: string, force: boolean): Promise<YtsTorrent[]> {
    const provider = this.provider;
    if (!provider) {
      throw new Error('Availability provider is disabled');
    }

    const cacheKey = `yts:torrents:${imdbId}`;
    if (!force) {
      const cached = this.cache.get<YtsTorrent[]>(cacheKey);
      if (cached !== undefined) {
        return cached;
      }
    }

    const torrents = await provider.getMovieTorrents(imdbId);
    this.cache.set(
      cacheKey,
      torrents,
      torrents.length > 0 ? this.options.hitTTL : this.options.emptyTTL
    );
    return torrents;
  }
}
