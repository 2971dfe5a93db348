import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import { Server } from 'http';
import { createApp } from './app';
import { DatabaseHandle } from './db';
import { ServiceRegistry } from './services/service-registry';
import {
  createTestDatabase,
  fakeAvailabilityProvider,
  MATRIX,
  record,
  stubTmdbClient,
  testConfig,
  torrent,
} from './testing/fixtures';

describe('HTTP API', () => {
  let handle: DatabaseHandle;
  let registry: ServiceRegistry;
  let server: Server;
  let http: AxiosInstance;

  beforeAll(async () => {
    handle = createTestDatabase();
    const { client } = stubTmdbClient({
      movies: [MATRIX],
      imdbIds: { 603: 'tt0133093' },
      search: { matrix: [{ id: 603, title: 'The Matrix', release_date: '1999-03-30' }] },
    });
    const { provider } = fakeAvailabilityProvider(async () => [torrent('720p'), torrent('2160p')]);
    registry = new ServiceRegistry(handle, testConfig(), {
      tmdbClient: client,
      availabilityProvider: provider,
      tmdbDelayMs: 0,
    });
    const app = createApp(registry.getControllers(), { rateLimitPerMinute: 0 });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    http = axios.create({ baseURL: `http://127.0.0.1:${port}/api/v1`, validateStatus: () => true });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    registry.close();
    handle.sqlite.close();
  });

  it('reports health', async () => {
    const response = await http.get('/health');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ status: 'ok', database: true, services: { tmdb: true, yts: true } });
  });

  it('rejects an unboxed item without a location against the field', async () => {
    const response = await http.post('/catalog', { title: 'Heat', lifecycleState: 'unboxed' });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({
      error: {
        message: 'Location is required when status is Unboxed.',
        code: 400,
        field: 'unboxedLocationNumber',
      },
    });
  });

  it('creates, reads, edits and deletes an item', async () => {
    const created = await http.post('/catalog', {
      title: 'Heat',
      lifecycleState: 'unboxed',
      unboxedLocationNumber: '12',
    });
    expect(created.status).toBe(201);
    expect(created.data).toMatchObject({ title: 'Heat', copyNumber: 1, unboxedLocationNumber: '12' });
    const id: number = created.data.id;

    const next = await http.get('/catalog/locations/next', { params: { count: 2 } });
    expect(next.data).toEqual({ nextLocationNumber: 13, locations: ['13', '14'] });

    const check = await http.get('/catalog/locations/check', { params: { value: '12' } });
    expect(check.data).toMatchObject({ ok: false, field: 'unboxedLocationNumber' });

    const edited = await http.patch(`/catalog/${id}/field`, { field: 'lifecycleState', value: 'kept' });
    expect(edited.status).toBe(200);
    expect(edited.data.item).toMatchObject({ lifecycleState: 'kept', unboxedLocationNumber: null });

    const refused = await http.patch(`/catalog/${id}/field`, { field: 'title', value: 'Other' });
    expect(refused.status).toBe(400);
    expect(refused.data.error.message).toBe('Field "title" is not editable');

    expect((await http.delete(`/catalog/${id}`)).status).toBe(204);
    const gone = await http.get(`/catalog/${id}`);
    expect(gone.status).toBe(404);
    expect(gone.data).toEqual({ error: { message: `Catalog item ${id} not found`, code: 404 } });
  });

  it('rejects a malformed id', async () => {
    const response = await http.get('/catalog/abc');

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ error: { message: 'Invalid id', code: 400, field: 'id' } });
  });

  it('adds from TMDB, refuses a repeat and tracks copies', async () => {
    const search = await http.get('/catalog/tmdb/search', { params: { q: 'matrix' } });
    expect(search.data.results).toEqual([
      {
        id: 603,
        title: 'The Matrix',
        releaseDate: '1999-03-30',
        posterUrl: null,
        overview: '',
      },
    ]);

    const first = await http.post('/catalog/tmdb', { tmdbId: 603 });
    expect(first.status).toBe(201);
    expect(first.data).toMatchObject({ title: 'The Matrix', imdbId: 'tt0133093', copyLabel: '' });

    const repeat = await http.post('/catalog/tmdb', { tmdbId: 603 });
    expect(repeat.status).toBe(409);
    expect(repeat.data.error).toEqual({
      message: '"The Matrix" is already in your collection.',
      code: 409,
      existingId: first.data.id,
    });

    const copy = await http.post('/catalog/tmdb', { tmdbId: 603, asCopy: true, copyNotes: '4K' });
    expect(copy.data).toMatchObject({ copyNumber: 2, copyLabel: 'Copy #2 (4K)' });

    const duplicates = await http.get(`/catalog/${first.data.id}/duplicates`);
    expect(duplicates.data).toMatchObject({ hasDuplicates: true, nextCopyNumber: 3, copyLabel: 'Copy #1' });
    expect(duplicates.data.items.map((item: { id: number }) => item.id)).toEqual([first.data.id, copy.data.id]);

    const sets = await http.get('/catalog/duplicates');
    expect(sets.data).toEqual([
      {
        key: 'tmdb:603',
        title: 'The Matrix',
        releaseYear: 1999,
        tmdbId: 603,
        copies: 2,
        itemIds: [first.data.id, copy.data.id],
      },
    ]);
  });

  it('refreshes availability and maps failures to statuses', async () => {
    const withId = await http.post('/catalog', { title: 'Alien', imdbId: 'tt0078748' });
    const withoutId = await http.post('/catalog', { title: 'Home Movies' });

    const refreshed = await http.post(`/catalog/${withId.data.id}/availability/refresh`);
    expect(refreshed.status).toBe(200);
    expect(refreshed.data.availability).toMatchObject({
      itemId: withId.data.id,
      records: [{ ...record('720p'), type: 'bluray', hash: 'HASH720p' }],
      fresh: true,
      hasAvailableEntries: true,
    });

    const missing = await http.post(`/catalog/${withoutId.data.id}/availability/refresh`);
    expect(missing.status).toBe(422);
    expect(missing.data).toEqual({
      success: false,
      reason: 'missing_identifier',
      message: 'Add an IMDb ID to this item before checking availability.',
    });

    const listed = await http.get('/catalog', { params: { hasAvailability: 'true' } });
    expect(listed.data.items.map((item: { title: string }) => item.title)).toEqual(['Alien']);
  });

  it('saves the TMDB key without exposing it', async () => {
    const saved = await http.put('/settings', { tmdbApiKey: 'test-secret' });
    expect(saved.data).toEqual({ tmdb: { configured: true, source: 'database' } });

    const cleared = await http.put('/settings', { tmdbApiKey: '' });
    expect(cleared.data).toEqual({ tmdb: { configured: true, source: 'environment' } });
  });

  it('exports CSV as a download', async () => {
    const response = await http.get('/catalog/export.csv');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(response.headers['content-disposition']).toMatch(/^attachment; filename="movie-collection-\d{4}-\d{2}-\d{2}\.csv"$/);
    expect(String(response.data).startsWith('ID,Title,Year,')).toBe(true);
  });

  it('answers unknown routes with 404', async () => {
    const response = await http.get('/nope');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ error: { message: 'Route GET /api/v1/nope not found', code: 404 } });
  });
});
