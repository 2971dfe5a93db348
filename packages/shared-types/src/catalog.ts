import type { AvailabilityRecord } from './availability';

export type LifecycleState = 'kept' | 'disposed' | 'unboxed';

export type CatalogMediaType = 'physical' | 'download' | 'rip';

export interface CatalogItemView {
  id: number;
  title: string;
  lifecycleState: LifecycleState;
  mediaType: CatalogMediaType;
  tmdbId: number | null;
  imdbId: string | null;
  releaseYear: number | null;
  copyNumber: number;
  copyNotes: string | null;
  copyLabel: string; // '' for a lone first copy
  storageLocation: string | null;
  unboxedLocationNumber: string | null;
  isTartanDvd: boolean;
  isBoxSet: boolean;
  boxSetName: string | null;
  isUnopened: boolean;
  isUnwatched: boolean;
  overview: string | null;
  genres: string[];
  runtime: number | null;
  rating: number | null;
  tmdbUserScore: number | null;
  ukCertification: string | null;
  originalLanguage: string | null;
  budget: number | null;
  revenue: number | null;
  productionCompanies: string | null;
  tagline: string | null;
  director: string | null;
  posterUrl: string | null;
  hasAvailableEntries: boolean;
  availabilityFresh: boolean;
  availabilityCacheTimestamp: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface PaginatedResponse<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

export interface DuplicateSetSummary {
  key: string;
  title: string;
  releaseYear: number | null;
  tmdbId: number | null;
  copies: number;
  itemIds: number[];
}

export interface BoxSetSummary {
  name: string;
  movieCount: number;
  latestAdded: string;
  posterUrls: string[];
}

export interface BulkImportResult {
  added: string[];
  skipped: string[];
  notFound: string[];
  errors: string[];
  totalProcessed: number;
}

export interface MetadataRefreshProgress {
  progress: number;
  status: string;
  completed: boolean;
  results: {
    updated: number;
    failed: number;
    skipped: number;
  };
}

export interface TmdbSearchResult {
  id: number;
  title: string;
  releaseDate?: string;
  posterUrl: string | null;
  overview: string;
}

export interface PosterOption {
  filePath: string;
  language: string | null;
  voteAverage: number;
  fullUrl: string;
}
