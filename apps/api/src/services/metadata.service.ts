import type { PosterOption, TmdbSearchResult } from '@shelfarr/shared-types';
import {
  TMDBClient,
  TmdbCredits,
  TmdbImage,
  TmdbMovieDetails,
  TmdbReleaseDates,
  TmdbSearchResponse,
} from '../clients/TMDBClient';
import { NewCatalogItem } from '../db/schema';
import { ServiceError } from '../middleware/errorHandler';
import { CacheService } from './cache.service';
import { logger } from '../utils/logger';

export interface MetadataOptions {
  imageBaseUrl: string;
  searchTTL: number;
  detailsTTL: number;
}

export interface MovieDetails extends TmdbMovieDetails {
  uk_certification?: string;
  director?: string;
}

export type MovieFields = Pick<
  NewCatalogItem,
  | 'tmdbId'
  | 'imdbId'
  | 'title'
  | 'overview'
  | 'posterPath'
  | 'releaseYear'
  | 'genres'
  | 'runtime'
  | 'rating'
  | 'ukCertification'
  | 'tmdbUserScore'
  | 'originalLanguage'
  | 'budget'
  | 'revenue'
  | 'productionCompanies'
  | 'tagline'
  | 'director'
>;

export type RefreshableMovieFields = Partial<Omit<MovieFields, 'tmdbId'>>;

export function extractYear(date: string | undefined | null): number | null {
  if (!date) return null;
  const year = Number.parseInt(date.split('-')[0], 10);
  return Number.isNaN(year) ? null : year;
}

export function findUkCertification(data: TmdbReleaseDates): string | undefined {
  const gb = data.results.find((country) => country.iso_3166_1 === 'GB');
  for (const release of gb?.release_dates ?? []) {
    const certification = release.certification?.trim();
    if (certification) return certification;
  }
  return undefined;
}

export function findDirectors(credits: TmdbCredits): string | undefined {
  const directors = credits.crew
    .filter((person) => person.job === 'Director' && person.name)
    .map((person) => person.name);
  return directors.length > 0 ? directors.join(', ') : undefined;
}

function joinNames(items: Array<{ name: string }> | undefined): string {
  return (items ?? []).map((item) => item.name).join(', ');
}

function emptyToNull(value: string | undefined | null): string | null {
  return value ? value : null;
}

/**
 * TMDB lookups with in-memory caching, plus the mapping from TMDB payloads
 * to catalog columns.
 */
export class MetadataService {
  constructor(
    private client: TMDBClient | undefined,
    private cache: CacheService,
    private options: MetadataOptions
  ) {}

  /** Drops cached TMDB responses, e.g. after the API key changes. */
  clearCache(): void {
    this.cache.delByPattern('tmdb:');
  }

  isConfigured(): boolean {
    return this.client !== undefined && this.client.hasApiKey();
  }

  private requireClient(): TMDBClient {
    if (!this.client || !this.client.hasApiKey()) {
      throw new ServiceError('TMDB API key not configured', 'tmdb', 503);
    }
    return this.client;
  }

  posterUrl(posterPath: string | null | undefined): string | null {
    if (!posterPath) return null;
    if (/^https?:\/\//.test(posterPath)) return posterPath;
    return `${this.options.imageBaseUrl}${posterPath}`;
  }

  async searchMovies(query: string, page = 1): Promise<TmdbSearchResponse> {
    const client = this.requireClient();
    try {
      return await this.cache.getOrSet(
        `tmdb:search:${page}:${query}`,
        this.options.searchTTL,
        () => client.searchMovies(query, page)
      );
    } catch (error) {
      throw new ServiceError('Failed to search TMDB', 'tmdb', 502, error);
    }
  }

  async searchResults(query: string): Promise<TmdbSearchResult[]> {
    const response = await this.searchMovies(query);
    return response.results.slice(0, 10).map((movie) => {
      const overview = movie.overview ?? '';
      return {
        id: movie.id,
        title: movie.title ?? '',
        releaseDate: movie.release_date,
        posterUrl: this.posterUrl(movie.poster_path),
        overview: overview.length > 200 ? `${overview.slice(0, 200)}...` : overview,
      };
    });
  }

  /**
   * Movie details with the IMDb id, GB certification and director(s)
   * merged in. The supplementary lookups are best effort.
   */
  async getMovieDetails(tmdbId: number, options: { force?: boolean } = {}): Promise<MovieDetails> {
    const client = this.requireClient();
    const cacheKey = `tmdb:movie:${tmdbId}`;
    if (!options.force) {
      const cached = this.cache.get<MovieDetails>(cacheKey);
      if (cached) return cached;
    }

    let details: MovieDetails;
    try {
      details = { ...(await client.getMovie(tmdbId)) };
    } catch (error) {
      throw new ServiceError(`Failed to fetch TMDB movie ${tmdbId}`, 'tmdb', 502, error);
    }

    const imdbId = await this.getImdbId(tmdbId);
    if (imdbId) details.imdb_id = imdbId;

    const certification = await this.optional('release dates', tmdbId, async () =>
      findUkCertification(await client.getReleaseDates(tmdbId))
    );
    if (certification) details.uk_certification = certification;

    const director = await this.optional('credits', tmdbId, async () =>
      findDirectors(await client.getCredits(tmdbId))
    );
    if (director) details.director = director;

    this.cache.set(cacheKey, details, this.options.detailsTTL);
    return details;
  }

  async getImdbId(tmdbId: number): Promise<string | undefined> {
    const client = this.requireClient();
    return this.optional('external ids', tmdbId, async () => {
      const ids = await this.cache.getOrSet(
        `tmdb:external-ids:${tmdbId}`,
        this.options.detailsTTL,
        () => client.getExternalIds(tmdbId)
      );
      return ids.imdb_id || undefined;
    });
  }

  /** English posters first, then language-neutral, then the rest; best voted first within each. */
  async getPosterOptions(tmdbId: number): Promise<PosterOption[]> {
    const client = this.requireClient();
    let posters: TmdbImage[];
    try {
      const images = await this.cache.getOrSet(
        `tmdb:images:${tmdbId}`,
        this.options.detailsTTL,
        () => client.getImages(tmdbId)
      );
      posters = images.posters ?? [];
    } catch (error) {
      throw new ServiceError(`Failed to fetch posters for TMDB movie ${tmdbId}`, 'tmdb', 502, error);
    }

    const languageRank = (language: string | null): number =>
      language === 'en' ? 0 : language === null ? 1 : 2;

    return [...posters]
      .sort((a, b) => {
        const byLanguage = languageRank(a.iso_639_1) - languageRank(b.iso_639_1);
        if (byLanguage !== 0) return byLanguage;
        return (b.vote_average ?? 0) - (a.vote_average ?? 0);
      })
      .map((poster) => ({
        filePath: poster.file_path,
        language: poster.iso_639_1,
        voteAverage: poster.vote_average ?? 0,
        fullUrl: `${this.options.imageBaseUrl}${poster.file_path}`,
      }));
  }

  formatMovieData(movie: MovieDetails): MovieFields {
    return {
      tmdbId: movie.id,
      imdbId: emptyToNull(movie.imdb_id),
      title: movie.title ?? '',
      overview: emptyToNull(movie.overview),
      posterPath: emptyToNull(movie.poster_path),
      releaseYear: extractYear(movie.release_date),
      genres: emptyToNull(joinNames(movie.genres)),
      runtime: movie.runtime ?? null,
      rating: movie.vote_average ?? null,
      ukCertification: emptyToNull(movie.uk_certification),
      tmdbUserScore: movie.vote_average ?? null,
      originalLanguage: emptyToNull(movie.original_language),
      budget: movie.budget ?? null,
      revenue: movie.revenue ?? null,
      productionCompanies: emptyToNull(joinNames(movie.production_companies)),
      tagline: emptyToNull(movie.tagline),
      director: emptyToNull(movie.director),
    };
  }

  /** Only the values TMDB actually returned; never changes the TMDB id. */
  formatMovieDataForRefresh(movie: MovieDetails): RefreshableMovieFields {
    const fields: RefreshableMovieFields = {};

    if (movie.imdb_id) fields.imdbId = movie.imdb_id;
    if (movie.title) fields.title = movie.title;
    if (movie.overview) fields.overview = movie.overview;
    if (movie.poster_path) fields.posterPath = movie.poster_path;

    const releaseYear = extractYear(movie.release_date);
    if (releaseYear) fields.releaseYear = releaseYear;

    const genres = joinNames(movie.genres);
    if (genres) fields.genres = genres;

    if (movie.runtime) fields.runtime = movie.runtime;
    if (movie.vote_average) {
      fields.rating = movie.vote_average;
      fields.tmdbUserScore = movie.vote_average;
    }
    if (movie.uk_certification) fields.ukCertification = movie.uk_certification;
    if (movie.original_language) fields.originalLanguage = movie.original_language;
    if (movie.budget !== undefined) fields.budget = movie.budget;
    if (movie.revenue !== undefined) fields.revenue = movie.revenue;

    const companies = joinNames(movie.production_companies);
    if (companies) fields.productionCompanies = companies;

    if (movie.tagline) fields.tagline = movie.tagline;
    if (movie.director) fields.director = movie.director;

    return fields;
  }

  private async optional<T>(
    label: string,
    tmdbId: number,
    load: () => Promise<T | undefined>
  ): Promise<T | undefined> {
    try {
      return await load();
    } catch (error) {
      logger.warn(
        `[tmdb] Could not load ${label} for movie ${tmdbId}: ${error instanceof Error ? error.message : String(error)}`
      );
      return undefined;
    }
  }
}
