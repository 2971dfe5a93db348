import { HttpClient } from './base/HttpClient';
import { ServiceConfig } from '../config/services.config';

export interface YtsTorrent {
  url: string;
  hash?: string;
  quality: string;
  type?: string;
  size: string;
  size_bytes: number;
  seeds: number;
  peers: number;
}

export interface YtsListMoviesResponse {
  status: string;
  status_message?: string;
  data?: {
    movie_count?: number;
    movies?: Array<{
      id: number;
      imdb_code?: string;
      title?: string;
      torrents?: YtsTorrent[];
    }>;
  };
}

export class YtsProviderError extends Error {
  constructor(message: string, public originalError?: unknown) {
    super(message);
    this.name = 'YtsProviderError';
  }
}

/**
 * Resolves torrent listings for a movie by IMDb id.
 * Throws YtsProviderError for transport failures and malformed responses;
 * an empty array means the index has nothing for the movie.
 */
export interface AvailabilityProvider {
  getMovieTorrents(imdbId: string): Promise<YtsTorrent[]>;
}

export class YTSClient implements AvailabilityProvider {
  private client: HttpClient;

  constructor(config: ServiceConfig) {
    this.client = new HttpClient(
      {
        baseUrl: config.baseUrl,
        timeout: config.timeout,
        maxRetries: 1,
      },
      'yts'
    );
  }

  async getMovieTorrents(imdbId: string): Promise<YtsTorrent[]> {
    let response: YtsListMoviesResponse;
    try {
      response = await this.client.get<YtsListMoviesResponse>('/list_movies.json', {
        query_term: imdbId,
        limit: 1,
        sort_by: 'rating',
        order_by: 'desc',
      });
    } catch (error) {
      throw new YtsProviderError(`YTS request failed for ${imdbId}`, error);
    }

    if (!response || response.status !== 'ok') {
      throw new YtsProviderError(
        `YTS returned an unexpected response for ${imdbId}: ${response?.status_message ?? 'no status'}`
      );
    }

    const movie = response.data?.movies?.[0];
    return movie?.torrents ?? [];
  }
}
