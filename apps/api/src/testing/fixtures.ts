import { vi } from 'vitest';
import type { AvailabilityRecord } from '@shelfarr/shared-types';
import { CatalogDatabase, DatabaseHandle, openDatabase } from '../db';
import { catalogItems, CatalogItem, NewCatalogItem } from '../db/schema';
import { AppConfig, loadConfig } from '../config/services.config';
import { TMDBClient, TmdbImage, TmdbMovieDetails, TmdbMovieSummary } from '../clients/TMDBClient';
import { AvailabilityProvider, YtsTorrent } from '../clients/YTSClient';

export function createTestDatabase(): DatabaseHandle {
  return openDatabase(':memory:');
}

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    DATABASE_PATH: ':memory:',
    TMDB_API_KEY: 'test-key',
    TMDB_URL: 'http://tmdb.invalid/3',
    TMDB_IMAGE_URL: 'https://images.test/w500',
    YTS_URL: 'http://yts.invalid/api/v2',
    ...env,
  });
}

export function insertItem(db: CatalogDatabase, values: Partial<NewCatalogItem> = {}): CatalogItem {
  return db
    .insert(catalogItems)
    .values({ title: 'Untitled', ...values })
    .returning()
    .get();
}

export function torrent(quality: string, overrides: Partial<YtsTorrent> = {}): YtsTorrent {
  return {
    url: `https://yts.invalid/torrent/${quality}`,
    hash: `HASH${quality}`,
    quality,
    type: 'bluray',
    size: '1.2 GB',
    size_bytes: 1288490189,
    seeds: 10,
    peers: 2,
    ...overrides,
  };
}

export function record(quality: string): AvailabilityRecord {
  return {
    quality,
    size: '1.2 GB',
    sizeBytes: 1288490189,
    seeds: 10,
    peers: 2,
    url: `https://yts.invalid/torrent/${quality}`,
  };
}

export function fakeAvailabilityProvider(
  impl: (imdbId: string) => Promise<YtsTorrent[]> = async () => []
) {
  const getMovieTorrents = vi.fn(impl);
  const provider: AvailabilityProvider = { getMovieTorrents };
  return { provider, getMovieTorrents };
}

export interface TmdbFixtures {
  movies?: TmdbMovieDetails[];
  search?: Record<string, TmdbMovieSummary[]>;
  imdbIds?: Record<number, string>;
  certifications?: Record<number, string>;
  directors?: Record<number, string[]>;
  posters?: Record<number, TmdbImage[]>;
}

/** A real client with every endpoint stubbed; nothing leaves the process. */
export function stubTmdbClient(fixtures: TmdbFixtures = {}, apiKey = 'test-key') {
  const client = new TMDBClient({ enabled: true, baseUrl: 'http://tmdb.invalid/3', apiKey });
  const movies = new Map((fixtures.movies ?? []).map((movie) => [movie.id, movie]));

  const searchMovies = vi.spyOn(client, 'searchMovies').mockImplementation(async (query: string) => {
    const results = fixtures.search?.[query] ?? [];
    return { page: 1, results, total_results: results.length };
  });
  const getMovie = vi.spyOn(client, 'getMovie').mockImplementation(async (id: number) => {
    const movie = movies.get(id);
    if (!movie) throw new Error(`Request failed with status code 404`);
    return movie;
  });
  const getExternalIds = vi
    .spyOn(client, 'getExternalIds')
    .mockImplementation(async (id: number) => ({ imdb_id: fixtures.imdbIds?.[id] ?? null }));
  const getReleaseDates = vi.spyOn(client, 'getReleaseDates').mockImplementation(async (id: number) => {
    const certification = fixtures.certifications?.[id];
    return {
      results: certification
        ? [
            { iso_3166_1: 'US', release_dates: [{ certification: 'R' }] },
            { iso_3166_1: 'GB', release_dates: [{ certification: '' }, { certification }] },
          ]
        : [],
    };
  });
  const getCredits = vi.spyOn(client, 'getCredits').mockImplementation(async (id: number) => ({
    crew: (fixtures.directors?.[id] ?? []).map((name) => ({ job: 'Director', name })),
  }));
  const getImages = vi
    .spyOn(client, 'getImages')
    .mockImplementation(async (id: number) => ({ posters: fixtures.posters?.[id] ?? [] }));

  return {
    client,
    spies: { searchMovies, getMovie, getExternalIds, getReleaseDates, getCredits, getImages },
  };
}

export const MATRIX: TmdbMovieDetails = {
  id: 603,
  title: 'The Matrix',
  overview: 'A hacker learns the truth about his reality.',
  release_date: '1999-03-30',
  poster_path: '/matrix.jpg',
  genres: [{ name: 'Action' }, { name: 'Science Fiction' }],
  production_companies: [{ name: 'Warner Bros.' }, { name: 'Village Roadshow' }],
  runtime: 136,
  vote_average: 8.2,
  original_language: 'en',
  budget: 63000000,
  revenue: 463517383,
  tagline: 'Welcome to the Real World.',
};

export const ALIEN: TmdbMovieDetails = {
  id: 348,
  title: 'Alien',
  overview: 'The crew of a commercial spacecraft meets a deadly lifeform.',
  release_date: '1979-05-25',
  poster_path: '/alien.jpg',
  genres: [{ name: 'Horror' }, { name: 'Science Fiction' }],
  runtime: 117,
  vote_average: 8.1,
  original_language: 'en',
};
