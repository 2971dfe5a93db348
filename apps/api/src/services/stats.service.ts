import { desc } from 'drizzle-orm';
import type { CollectionStats, NumericAggregate } from '@shelfarr/shared-types';
import { CatalogDatabase } from '../db';
import { catalogItems } from '../db/schema';
import { CatalogService, splitGenres } from './catalog.service';
import { DuplicateService } from './duplicate.service';

const TOP_N = 10;

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function aggregate(values: number[], decimals = 1): NumericAggregate {
  if (values.length === 0) {
    return { average: null, min: null, max: null, count: 0 };
  }
  const sum = values.reduce((total, value) => total + value, 0);
  return {
    average: round(sum / values.length, decimals),
    min: Math.min(...values),
    max: Math.max(...values),
    count: values.length,
  };
}

/** Most frequent first, ties alphabetical. */
export function topCounts(names: string[], limit = TOP_N): Array<{ name: string; count: number }> {
  const counts = new Map<string, number>();
  for (const name of names) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name))
    .slice(0, limit);
}

export class StatsService {
  constructor(
    private db: CatalogDatabase,
    private catalog: CatalogService,
    private duplicates: DuplicateService
  ) {}

  getStats(): CollectionStats {
    const rows = this.db
      .select()
      .from(catalogItems)
      .orderBy(desc(catalogItems.createdAt), desc(catalogItems.id))
      .all();

    const stats: CollectionStats = {
      total: rows.length,
      byState: { kept: 0, disposed: 0, unboxed: 0 },
      byMediaType: { physical: 0, download: 0, rip: 0 },
      tartan: 0,
      boxSets: 0,
      boxSetItems: 0,
      unopened: 0,
      unwatched: 0,
      rating: aggregate([]),
      runtime: { ...aggregate([]), total: 0 },
      years: { earliest: null, latest: null, span: 0, count: 0 },
      topGenres: [],
      topBoxSets: [],
      decades: [],
      maxDecadeCount: 0,
      duplicates: { sets: 0, surplusCopies: 0 },
      availability: { withEntries: 0, withoutEntries: 0, coveragePercent: 0 },
      recentAdditions: [],
    };

    const ratings: number[] = [];
    const runtimes: number[] = [];
    const years: number[] = [];
    const genres: string[] = [];
    const boxSetNames: string[] = [];

    for (const row of rows) {
      stats.byState[row.lifecycleState] += 1;
      stats.byMediaType[row.mediaType] += 1;
      if (row.isTartanDvd) stats.tartan += 1;
      if (row.isUnopened) stats.unopened += 1;
      if (row.isUnwatched) stats.unwatched += 1;
      if (row.isBoxSet) {
        stats.boxSetItems += 1;
        if (row.boxSetName) boxSetNames.push(row.boxSetName);
      }
      if (row.hasCachedAvailability) stats.availability.withEntries += 1;

      if (row.rating !== null) ratings.push(row.rating);
      if (row.runtime !== null && row.runtime > 0) runtimes.push(row.runtime);
      if (row.releaseYear !== null) years.push(row.releaseYear);
      genres.push(...splitGenres(row.genres));
    }

    stats.boxSets = new Set(boxSetNames).size;
    stats.rating = aggregate(ratings);
    stats.runtime = {
      ...aggregate(runtimes, 0),
      total: runtimes.reduce((total, value) => total + value, 0),
    };

    if (years.length > 0) {
      const earliest = Math.min(...years);
      const latest = Math.max(...years);
      stats.years = { earliest, latest, span: latest - earliest, count: years.length };
    }

    stats.topGenres = topCounts(genres);
    stats.topBoxSets = topCounts(boxSetNames);

    const decades = new Map<number, number>();
    for (const year of years) {
      const decade = Math.floor(year / 10) * 10;
      decades.set(decade, (decades.get(decade) ?? 0) + 1);
    }
    stats.decades = [...decades.entries()]
      .sort(([a], [b]) => a - b)
      .map(([decade, count]) => ({ decade: `${decade}s`, count }));
    stats.maxDecadeCount = Math.max(0, ...stats.decades.map((entry) => entry.count));

    const sets = this.duplicates.listDuplicateSets();
    stats.duplicates = {
      sets: sets.length,
      surplusCopies: sets.reduce((total, set) => total + set.copies - 1, 0),
    };

    stats.availability.withoutEntries = rows.length - stats.availability.withEntries;
    stats.availability.coveragePercent =
      rows.length > 0 ? round((stats.availability.withEntries / rows.length) * 100, 1) : 0;

    stats.recentAdditions = rows.slice(0, TOP_N).map((row) => this.catalog.toView(row));

    return stats;
  }
}
