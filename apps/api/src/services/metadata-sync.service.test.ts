import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { eq } from 'drizzle-orm';
import { DatabaseHandle } from '../db';
import { catalogItems } from '../db/schema';
import { NotFoundError, ValidationError } from '../middleware/errorHandler';
import { CacheService } from './cache.service';
import { DuplicateService } from './duplicate.service';
import { MetadataService } from './metadata.service';
import { MetadataSyncService } from './metadata-sync.service';
import { ALIEN, createTestDatabase, insertItem, MATRIX, record, stubTmdbClient, TmdbFixtures } from '../testing/fixtures';

describe('MetadataSyncService', () => {
  let handle: DatabaseHandle;
  let cache: CacheService;

  const createService = (fixtures: TmdbFixtures, apiKey = 'test-key') => {
    const tmdb = stubTmdbClient(fixtures, apiKey);
    const metadata = new MetadataService(tmdb.client, cache, {
      imageBaseUrl: 'https://images.test/w500',
      searchTTL: 60,
      detailsTTL: 60,
    });
    const service = new MetadataSyncService(handle.db, metadata, new DuplicateService(handle.db), cache, {
      progressTTL: 60,
      delayMs: 0,
    });
    return { service, spies: tmdb.spies };
  };

  const reload = (id: number) =>
    handle.db.select().from(catalogItems).where(eq(catalogItems.id, id)).get();

  beforeEach(() => {
    handle = createTestDatabase();
    cache = new CacheService({ checkPeriod: 0 });
  });

  afterEach(() => {
    cache.close();
    handle.sqlite.close();
  });

  describe('fetchImdbId', () => {
    it('stores the IMDb id found for the TMDB id', async () => {
      const { service } = createService({ imdbIds: { 603: 'tt0133093' } });
      const item = insertItem(handle.db, { title: 'The Matrix', tmdbId: 603 });

      const result = await service.fetchImdbId(item);

      expect(result).toMatchObject({ success: true, imdbId: 'tt0133093' });
      expect(reload(item.id)?.imdbId).toBe('tt0133093');
    });

    it('needs a TMDB id', async () => {
      const { service, spies } = createService({});
      const item = insertItem(handle.db, { title: 'Home Movies' });

      expect(await service.fetchImdbId(item)).toEqual({ success: false, message: 'No TMDB ID available' });
      expect(spies.getExternalIds).not.toHaveBeenCalled();
    });

    it('reports when TMDB has no IMDb id', async () => {
      const { service } = createService({});
      const item = insertItem(handle.db, { title: 'Obscure', tmdbId: 42 });

      expect(await service.fetchImdbId(item)).toEqual({ success: false, message: 'No IMDB ID found' });
      expect(reload(item.id)?.imdbId).toBeNull();
    });
  });

  describe('rematch', () => {
    it('replaces metadata, renumbers into the new set and drops the old snapshot', async () => {
      const { service } = createService({ movies: [ALIEN], imdbIds: { 348: 'tt0078748' } });
      insertItem(handle.db, { title: 'Alien', tmdbId: 348 });
      const wrong = insertItem(handle.db, {
        title: 'Alien',
        tmdbId: 8077,
        lifecycleState: 'unboxed',
        unboxedLocationNumber: '4',
        copyNotes: 'Director’s Cut',
        availabilityCache: [record('720p')],
        availabilityCacheTimestamp: '2026-01-01T00:00:00.000Z',
        hasCachedAvailability: true,
      });

      const updated = await service.rematch(wrong, 348);

      expect(updated).toMatchObject({
        tmdbId: 348,
        imdbId: 'tt0078748',
        releaseYear: 1979,
        genres: 'Horror, Science Fiction',
        copyNumber: 2,
        lifecycleState: 'unboxed',
        unboxedLocationNumber: '4',
        copyNotes: 'Director’s Cut',
        availabilityCache: null,
        availabilityCacheTimestamp: null,
        hasCachedAvailability: false,
      });
    });

    it('keeps the copy number and snapshot when the TMDB id is unchanged', async () => {
      const { service } = createService({ movies: [MATRIX] });
      const item = insertItem(handle.db, {
        title: 'Matrix',
        tmdbId: 603,
        copyNumber: 3,
        availabilityCache: [record('1080p')],
        hasCachedAvailability: true,
      });

      const updated = await service.rematch(item, 603);

      expect(updated).toMatchObject({
        title: 'The Matrix',
        copyNumber: 3,
        availabilityCache: [record('1080p')],
        hasCachedAvailability: true,
      });
    });
  });

  describe('changePoster', () => {
    it('stores a TMDB poster path', () => {
      const { service } = createService({});
      const item = insertItem(handle.db, { title: 'Heat', posterPath: '/old.jpg' });

      expect(service.changePoster(item, ' /new.jpg ').posterPath).toBe('/new.jpg');
    });

    it('rejects anything that is not a TMDB path', () => {
      const { service } = createService({});
      const item = insertItem(handle.db, { title: 'Heat' });

      expect(() => service.changePoster(item, 'https://elsewhere.test/a.jpg')).toThrow(ValidationError);
      expect(reload(item.id)?.posterPath).toBeNull();
    });
  });

  describe('refresh all', () => {
    it('refuses to start without an API key', () => {
      const { service } = createService({}, '');
      expect(() => service.startRefreshAll()).toThrow('TMDB API key not configured');
    });

    it('refreshes every item with a TMDB id and reports progress', async () => {
      const { service, spies } = createService({ movies: [MATRIX] });
      const matrix = insertItem(handle.db, { title: 'Matrix (1999)', tmdbId: 603, copyNotes: 'Mine' });
      insertItem(handle.db, { title: 'Gone', tmdbId: 999 });
      insertItem(handle.db, { title: 'Home Movies' });

      const taskId = service.startRefreshAll();

      await vi.waitFor(() => {
        expect(service.getRefreshProgress(taskId).completed).toBe(true);
      });

      expect(service.getRefreshProgress(taskId)).toEqual({
        progress: 100,
        status: 'Completed: 1 updated, 1 failed, 0 skipped',
        completed: true,
        results: { updated: 1, failed: 1, skipped: 0 },
      });
      expect(spies.getMovie).toHaveBeenCalledTimes(2);
      expect(reload(matrix.id)).toMatchObject({
        title: 'The Matrix',
        tmdbId: 603,
        copyNotes: 'Mine',
        runtime: 136,
      });
    });

    it('reports an unknown task', () => {
      const { service } = createService({});
      expect(() => service.getRefreshProgress('missing')).toThrow(NotFoundError);
    });
  });

  describe('refreshMissingDetails', () => {
    const complete = {
      tagline: 'In space no one can hear you scream.',
      budget: 11000000,
      revenue: 104931801,
      productionCompanies: 'Brandywine Productions',
      director: 'Ridley Scott',
      ukCertification: '18',
    };

    it('fills incomplete items and skips those with nothing new', async () => {
      const { service, spies } = createService({ movies: [MATRIX, ALIEN] });
      const matrix = insertItem(handle.db, { title: 'The Matrix', tmdbId: 603 });
      insertItem(handle.db, { title: 'Alien', tmdbId: 348, ...complete });
      insertItem(handle.db, { title: 'Gone', tmdbId: 999 });
      insertItem(handle.db, { title: 'Home Movies' });

      const dry = await service.refreshMissingDetails({ dryRun: true });
      expect(dry).toEqual({ processed: 2, updated: 1, skipped: 0, failed: 1, dryRun: true });
      expect(reload(matrix.id)?.tagline).toBeNull();

      const real = await service.refreshMissingDetails();
      expect(real).toEqual({ processed: 2, updated: 1, skipped: 0, failed: 1, dryRun: false });
      expect(reload(matrix.id)).toMatchObject({
        tagline: 'Welcome to the Real World.',
        budget: 63000000,
        productionCompanies: 'Warner Bros., Village Roadshow',
        runtime: 136,
      });

      // Still no director or certification on TMDB, so nothing changes
      const again = await service.refreshMissingDetails();
      expect(again).toEqual({ processed: 2, updated: 0, skipped: 1, failed: 1, dryRun: false });
      expect(spies.getMovie).not.toHaveBeenCalledWith(348);
    });

    it('includes complete items when forced and honours the limit', async () => {
      const { service } = createService({ movies: [MATRIX, ALIEN] });
      insertItem(handle.db, { title: 'The Matrix', tmdbId: 603 });
      const alien = insertItem(handle.db, { title: 'Alien', tmdbId: 348, ...complete });

      expect((await service.refreshMissingDetails({ force: true, limit: 1 })).processed).toBe(1);

      const forced = await service.refreshMissingDetails({ force: true });
      expect(forced).toEqual({ processed: 2, updated: 1, skipped: 1, failed: 0, dryRun: false });
      expect(reload(alien.id)).toMatchObject({ ...complete, runtime: 117, genres: 'Horror, Science Fiction' });
    });
  });

  describe('populateImdbIds', () => {
    it('counts updates and misses and leaves rows alone on a dry run', async () => {
      const { service } = createService({ imdbIds: { 603: 'tt0133093' } });
      const matrix = insertItem(handle.db, { title: 'The Matrix', tmdbId: 603 });
      insertItem(handle.db, { title: 'Obscure', tmdbId: 42, imdbId: '' });
      insertItem(handle.db, { title: 'Done', tmdbId: 7, imdbId: 'tt0000007' });
      insertItem(handle.db, { title: 'Home Movies' });

      const dry = await service.populateImdbIds({ dryRun: true });
      expect(dry).toEqual({ processed: 2, updated: 1, notFound: 1, failed: 0, dryRun: true });
      expect(reload(matrix.id)?.imdbId).toBeNull();

      const real = await service.populateImdbIds();
      expect(real).toEqual({ processed: 2, updated: 1, notFound: 1, failed: 0, dryRun: false });
      expect(reload(matrix.id)?.imdbId).toBe('tt0133093');
    });

    it('honours the limit', async () => {
      const { service } = createService({});
      insertItem(handle.db, { title: 'A', tmdbId: 1 });
      insertItem(handle.db, { title: 'B', tmdbId: 2 });

      expect((await service.populateImdbIds({ limit: 1 })).processed).toBe(1);
    });
  });
});
