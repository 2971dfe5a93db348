import { HttpClient } from './base/HttpClient';
import { ServiceConfig } from '../config/services.config';

export interface TmdbMovieSummary {
  id: number;
  title?: string;
  overview?: string;
  release_date?: string;
  poster_path?: string | null;
}

export interface TmdbSearchResponse {
  page: number;
  results: TmdbMovieSummary[];
  total_results: number;
  total_pages?: number;
}

export interface TmdbNamed {
  id?: number;
  name: string;
}

export interface TmdbMovieDetails {
  id: number;
  title?: string;
  overview?: string;
  release_date?: string;
  poster_path?: string | null;
  genres?: TmdbNamed[];
  production_companies?: TmdbNamed[];
  runtime?: number | null;
  vote_average?: number;
  original_language?: string;
  budget?: number;
  revenue?: number;
  tagline?: string;
  imdb_id?: string | null;
}

export interface TmdbExternalIds {
  imdb_id?: string | null;
}

export interface TmdbReleaseDates {
  results: Array<{
    iso_3166_1: string;
    release_dates: Array<{ certification?: string; type?: number }>;
  }>;
}

export interface TmdbCredits {
  crew: Array<{ job?: string; name?: string }>;
}

export interface TmdbImage {
  file_path: string;
  iso_639_1: string | null;
  vote_average?: number;
}

export interface TmdbImages {
  posters?: TmdbImage[];
}

/**
 * Thin wrapper over the TMDB v3 movie endpoints. The key is resolved per
 * request so a key saved in settings takes effect without a restart.
 */
export class TMDBClient {
  private client: HttpClient;
  private resolveApiKey: () => string;

  constructor(config: ServiceConfig, resolveApiKey?: () => string) {
    this.client = new HttpClient(
      {
        baseUrl: config.baseUrl,
        timeout: config.timeout,
      },
      'tmdb'
    );
    const staticKey = config.apiKey || '';
    this.resolveApiKey = resolveApiKey ?? (() => staticKey);
  }

  hasApiKey(): boolean {
    return this.resolveApiKey() !== '';
  }

  private getWithKey<T>(url: string, params?: Record<string, string | number>): Promise<T> {
    return this.client.get<T>(url, { ...params, api_key: this.resolveApiKey() });
  }

  searchMovies(query: string, page = 1) {
    return this.getWithKey<TmdbSearchResponse>('/search/movie', {
      query,
      page,
      language: 'en-US',
    });
  }

  getMovie(id: number) {
    return this.getWithKey<TmdbMovieDetails>(`/movie/${id}`, { language: 'en-US' });
  }

  getExternalIds(id: number) {
    return this.getWithKey<TmdbExternalIds>(`/movie/${id}/external_ids`);
  }

  getReleaseDates(id: number) {
    return this.getWithKey<TmdbReleaseDates>(`/movie/${id}/release_dates`);
  }

  getCredits(id: number) {
    return this.getWithKey<TmdbCredits>(`/movie/${id}/credits`);
  }

  getImages(id: number) {
    return this.getWithKey<TmdbImages>(`/movie/${id}/images`);
  }
}
