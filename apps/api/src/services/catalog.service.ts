import { and, asc, count, desc, eq, isNotNull, like, or, SQL } from 'drizzle-orm';
import type {
  BoxSetSummary,
  CatalogItemView,
  LifecycleState,
  PaginatedResponse,
} from '@shelfarr/shared-types';
import { CatalogDatabase } from '../db';
import { catalogItems, CatalogItem } from '../db/schema';
import { ConflictError, fromZodError, NotFoundError, ValidationError } from '../middleware/errorHandler';
import {
  CatalogFilters,
  CatalogItemInput,
  CatalogItemPatch,
  CreateFromTmdbInput,
  EDITABLE_FIELDS,
  EditableField,
  updateCatalogItemSchema,
} from '../validation/catalog.schemas';
import {
  describeDuplicateKey,
  DuplicateKey,
  DuplicateService,
  duplicateKeyFor,
} from './duplicate.service';
import { LocationService } from './location.service';
import { AvailabilityService } from './availability.service';
import { MetadataService } from './metadata.service';
import { logger } from '../utils/logger';

export type ListFilters = Omit<CatalogFilters, 'page' | 'pageSize'>;

function isEditableField(field: string): field is EditableField {
  return EDITABLE_FIELDS.some((editable) => editable === field);
}

function contains(value: string): string {
  return `%${value}%`;
}

export function splitGenres(genres: string | null): string[] {
  if (!genres) return [];
  return genres
    .split(',')
    .map((genre) => genre.trim())
    .filter(Boolean);
}

export function buildFilterConditions(filters: ListFilters): SQL | undefined {
  const conditions: Array<SQL | undefined> = [];

  const search = filters.search?.trim();
  if (search) {
    const pattern = contains(search);
    conditions.push(
      or(
        like(catalogItems.title, pattern),
        like(catalogItems.overview, pattern),
        like(catalogItems.genres, pattern),
        like(catalogItems.boxSetName, pattern)
      )
    );
  }

  if (filters.lifecycleState) {
    conditions.push(eq(catalogItems.lifecycleState, filters.lifecycleState));
  }
  if (filters.mediaType) {
    conditions.push(eq(catalogItems.mediaType, filters.mediaType));
  }

  const flagFilters = [
    [catalogItems.isTartanDvd, filters.isTartanDvd],
    [catalogItems.isBoxSet, filters.isBoxSet],
    [catalogItems.isUnopened, filters.isUnopened],
    [catalogItems.isUnwatched, filters.isUnwatched],
    // Stored flag only; list views never reach the provider
    [catalogItems.hasCachedAvailability, filters.hasAvailability],
  ] as const;
  for (const [column, value] of flagFilters) {
    if (value !== undefined) {
      conditions.push(eq(column, value === 'true'));
    }
  }

  const company = filters.productionCompany?.trim();
  if (company) {
    conditions.push(like(catalogItems.productionCompanies, contains(company)));
  }

  return conditions.length > 0 ? and(...conditions) : undefined;
}

/**
 * Catalog CRUD. Every write whose resulting state is `unboxed` passes the
 * location check first; any other state clears the location.
 */
export class CatalogService {
  constructor(
    private db: CatalogDatabase,
    private duplicates: DuplicateService,
    private locations: LocationService,
    private availability: AvailabilityService,
    private metadata: MetadataService
  ) {}

  find(id: number): CatalogItem | undefined {
    return this.db.select().from(catalogItems).where(eq(catalogItems.id, id)).get();
  }

  get(id: number): CatalogItem {
    const item = this.find(id);
    if (!item) {
      throw new NotFoundError(`Catalog item ${id} not found`);
    }
    return item;
  }

  private resolveLocation(
    state: LifecycleState,
    value: string | null | undefined,
    itemId?: number
  ): string | null {
    if (state !== 'unboxed') return null;
    return this.locations.validateUnboxedLocation(value, itemId);
  }

  /** Copy numbers are unique within a duplicate set. */
  private resolveCopyNumber(key: DuplicateKey, requested: number | undefined, itemId?: number): number {
    if (requested === undefined) {
      return this.duplicates.nextCopyNumberForKey(key);
    }
    if (this.duplicates.isCopyNumberTaken(key, requested, itemId)) {
      throw new ValidationError(
        `Copy #${requested} already exists for this movie.`,
        400,
        'copyNumber'
      );
    }
    return requested;
  }

  create(input: CatalogItemInput): CatalogItem {
    const unboxedLocationNumber = this.resolveLocation(
      input.lifecycleState,
      input.unboxedLocationNumber
    );
    const copyNumber = this.resolveCopyNumber(duplicateKeyFor(input), input.copyNumber);

    const item = this.db
      .insert(catalogItems)
      .values({ ...input, copyNumber, unboxedLocationNumber })
      .returning()
      .get();

    logger.info(`Added "${item.title}" (id ${item.id}, copy #${item.copyNumber})`);
    return item;
  }

  /**
   * Adds a movie with its TMDB metadata. A movie already in the catalog is a
   * conflict unless the caller asks for another copy.
   */
  async createFromTmdb(tmdbId: number, input: CreateFromTmdbInput): Promise<CatalogItem> {
    const { asCopy, ...userFields } = input;
    const existing = this.duplicates.findByKey({ kind: 'tmdb', tmdbId });
    if (existing.length > 0 && !asCopy) {
      throw new ConflictError(
        `"${existing[0].title}" is already in your collection.`,
        existing[0].id
      );
    }

    const unboxedLocationNumber = this.resolveLocation(
      userFields.lifecycleState,
      userFields.unboxedLocationNumber
    );

    const details = await this.metadata.getMovieDetails(tmdbId);
    const movie = this.metadata.formatMovieData(details);

    const item = this.db
      .insert(catalogItems)
      .values({
        ...movie,
        ...userFields,
        unboxedLocationNumber,
        copyNumber: this.duplicates.nextCopyNumberForKey({ kind: 'tmdb', tmdbId }),
      })
      .returning()
      .get();

    logger.info(`Added "${item.title}" from TMDB ${tmdbId} (copy #${item.copyNumber})`);
    return item;
  }

  update(id: number, patch: CatalogItemPatch): CatalogItem {
    const existing = this.get(id);
    const state = patch.lifecycleState ?? existing.lifecycleState;
    const location =
      patch.unboxedLocationNumber !== undefined
        ? patch.unboxedLocationNumber
        : existing.unboxedLocationNumber;
    const unboxedLocationNumber = this.resolveLocation(state, location, id);

    const currentKey = duplicateKeyFor(existing);
    const targetKey = duplicateKeyFor({
      tmdbId: patch.tmdbId !== undefined ? patch.tmdbId : existing.tmdbId,
      title: patch.title ?? existing.title,
      releaseYear: patch.releaseYear !== undefined ? patch.releaseYear : existing.releaseYear,
    });
    const movedSets = describeDuplicateKey(currentKey) !== describeDuplicateKey(targetKey);
    const copyNumber =
      patch.copyNumber === undefined && !movedSets
        ? existing.copyNumber
        : this.resolveCopyNumber(targetKey, patch.copyNumber, id);

    const updated = this.db
      .update(catalogItems)
      .set({ ...patch, copyNumber, unboxedLocationNumber, updatedAt: new Date().toISOString() })
      .where(eq(catalogItems.id, id))
      .returning()
      .get();

    if (!updated) {
      throw new NotFoundError(`Catalog item ${id} not found`);
    }
    return updated;
  }

  /** Inline edit of one field from the bulk-edit table. */
  updateField(id: number, field: string, value: unknown): CatalogItem {
    if (!isEditableField(field)) {
      throw new ValidationError(`Field "${field}" is not editable`, 400, field);
    }

    const parsed = updateCatalogItemSchema.safeParse({ [field]: value });
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    return this.update(id, parsed.data);
  }

  delete(id: number): CatalogItem {
    const item = this.get(id);
    this.db.delete(catalogItems).where(eq(catalogItems.id, id)).run();
    logger.info(`Deleted "${item.title}" (id ${id})`);
    return item;
  }

  findAll(filters: ListFilters = {}): CatalogItem[] {
    return this.db
      .select()
      .from(catalogItems)
      .where(buildFilterConditions(filters))
      .orderBy(desc(catalogItems.createdAt), desc(catalogItems.id))
      .all();
  }

  list(filters: CatalogFilters): PaginatedResponse<CatalogItemView> {
    const { page, pageSize, ...rest } = filters;
    const where = buildFilterConditions(rest);

    const total =
      this.db.select({ total: count() }).from(catalogItems).where(where).get()?.total ?? 0;

    const rows = this.db
      .select()
      .from(catalogItems)
      .where(where)
      .orderBy(desc(catalogItems.createdAt), desc(catalogItems.id))
      .limit(pageSize)
      .offset((page - 1) * pageSize)
      .all();

    return {
      items: rows.map((row) => this.toView(row)),
      total,
      page,
      pageSize,
      totalPages: Math.ceil(total / pageSize),
    };
  }

  autocompleteBoxSets(query: string): string[] {
    const q = query.trim();
    if (q.length < 2) return [];

    const rows = this.db
      .selectDistinct({ name: catalogItems.boxSetName })
      .from(catalogItems)
      .where(and(isNotNull(catalogItems.boxSetName), like(catalogItems.boxSetName, contains(q))))
      .orderBy(asc(catalogItems.boxSetName))
      .limit(10)
      .all();
    return rows.flatMap((row) => (row.name ? [row.name] : []));
  }

  autocompleteStorageLocations(query: string): string[] {
    const q = query.trim();
    if (q.length < 1) return [];

    const rows = this.db
      .selectDistinct({ location: catalogItems.storageLocation })
      .from(catalogItems)
      .where(
        and(
          eq(catalogItems.lifecycleState, 'kept'),
          isNotNull(catalogItems.storageLocation),
          like(catalogItems.storageLocation, contains(q))
        )
      )
      .orderBy(asc(catalogItems.storageLocation))
      .limit(10)
      .all();
    return rows.flatMap((row) => (row.location ? [row.location] : []));
  }

  listBoxSets(search?: string): BoxSetSummary[] {
    const conditions: SQL[] = [
      eq(catalogItems.isBoxSet, true),
      isNotNull(catalogItems.boxSetName),
    ];
    const q = search?.trim();
    if (q) {
      conditions.push(like(catalogItems.boxSetName, contains(q)));
    }

    const rows = this.db
      .select({
        name: catalogItems.boxSetName,
        posterPath: catalogItems.posterPath,
        createdAt: catalogItems.createdAt,
      })
      .from(catalogItems)
      .where(and(...conditions))
      .orderBy(desc(catalogItems.createdAt), desc(catalogItems.id))
      .all();

    const sets = new Map<string, BoxSetSummary>();
    for (const row of rows) {
      if (!row.name) continue;
      let summary = sets.get(row.name);
      if (!summary) {
        // Rows arrive newest first
        summary = { name: row.name, movieCount: 0, latestAdded: row.createdAt, posterUrls: [] };
        sets.set(row.name, summary);
      }
      summary.movieCount += 1;
      const posterUrl = this.metadata.posterUrl(row.posterPath);
      if (posterUrl && summary.posterUrls.length < 4) {
        summary.posterUrls.push(posterUrl);
      }
    }

    return [...sets.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  toView(item: CatalogItem, now?: Date): CatalogItemView {
    return {
      id: item.id,
      title: item.title,
      lifecycleState: item.lifecycleState,
      mediaType: item.mediaType,
      tmdbId: item.tmdbId,
      imdbId: item.imdbId,
      releaseYear: item.releaseYear,
      copyNumber: item.copyNumber,
      copyNotes: item.copyNotes,
      copyLabel: this.duplicates.formatCopyLabel(item),
      storageLocation: item.storageLocation,
      unboxedLocationNumber: item.unboxedLocationNumber,
      isTartanDvd: item.isTartanDvd,
      isBoxSet: item.isBoxSet,
      boxSetName: item.boxSetName,
      isUnopened: item.isUnopened,
      isUnwatched: item.isUnwatched,
      overview: item.overview,
      genres: splitGenres(item.genres),
      runtime: item.runtime,
      rating: item.rating,
      tmdbUserScore: item.tmdbUserScore,
      ukCertification: item.ukCertification,
      originalLanguage: item.originalLanguage,
      budget: item.budget,
      revenue: item.revenue,
      productionCompanies: item.productionCompanies,
      tagline: item.tagline,
      director: item.director,
      posterUrl: this.metadata.posterUrl(item.posterPath),
      hasAvailableEntries: this.availability.hasAvailableEntries(item),
      availabilityFresh: this.availability.isCacheFresh(item, this.availability.maxAgeHours, now),
      availabilityCacheTimestamp: item.availabilityCacheTimestamp,
      createdAt: item.createdAt,
      updatedAt: item.updatedAt,
    };
  }
}
