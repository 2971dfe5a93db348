import type { CatalogItemView } from './catalog';

export interface NumericAggregate {
  average: number | null;
  min: number | null;
  max: number | null;
  count: number;
}

export interface CollectionStats {
  total: number;
  byState: {
    kept: number;
    disposed: number;
    unboxed: number;
  };
  byMediaType: {
    physical: number;
    download: number;
    rip: number;
  };
  tartan: number;
  boxSets: number;
  boxSetItems: number;
  unopened: number;
  unwatched: number;
  rating: NumericAggregate;
  runtime: NumericAggregate & { total: number };
  years: {
    earliest: number | null;
    latest: number | null;
    span: number;
    count: number;
  };
  topGenres: Array<{ name: string; count: number }>;
  topBoxSets: Array<{ name: string; count: number }>;
  decades: Array<{ decade: string; count: number }>;
  maxDecadeCount: number;
  duplicates: {
    sets: number;
    surplusCopies: number;
  };
  availability: {
    withEntries: number;
    withoutEntries: number;
    coveragePercent: number;
  };
  recentAdditions: CatalogItemView[];
}
