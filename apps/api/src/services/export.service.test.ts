import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseHandle } from '../db';
import { CatalogItem } from '../db/schema';
import { createTestDatabase, insertItem } from '../testing/fixtures';
import { AvailabilityService } from './availability.service';
import { CacheService } from './cache.service';
import { CatalogService } from './catalog.service';
import { DuplicateService } from './duplicate.service';
import { LocationService } from './location.service';
import { MetadataService } from './metadata.service';
import { CSV_COLUMNS, escapeCsvField, ExportService, toCsv, toCsvRow } from './export.service';

const item: CatalogItem = {
  id: 7,
  title: 'Crouching Tiger, Hidden Dragon',
  lifecycleState: 'kept',
  mediaType: 'physical',
  tmdbId: 146,
  imdbId: 'tt0190332',
  releaseYear: 2000,
  copyNumber: 1,
  copyNotes: 'Sleeve says "Special Edition"',
  storageLocation: 'Shelf B',
  unboxedLocationNumber: null,
  isTartanDvd: true,
  isBoxSet: false,
  boxSetName: null,
  isUnopened: false,
  isUnwatched: true,
  overview: null,
  genres: 'Action, Drama',
  runtime: 120,
  rating: 7.9,
  tmdbUserScore: 7.9,
  ukCertification: '12',
  originalLanguage: 'zh',
  budget: null,
  revenue: null,
  productionCompanies: null,
  tagline: null,
  director: 'Ang Lee',
  posterPath: null,
  availabilityCache: null,
  availabilityCacheTimestamp: null,
  hasCachedAvailability: false,
  createdAt: '2026-02-01T10:00:00.000Z',
  updatedAt: '2026-02-01T10:00:00.000Z',
};

describe('escapeCsvField', () => {
  it('leaves plain values alone and renders absent values empty', () => {
    expect(escapeCsvField('Heat')).toBe('Heat');
    expect(escapeCsvField(42)).toBe('42');
    expect(escapeCsvField(null)).toBe('');
    expect(escapeCsvField(undefined)).toBe('');
  });

  it('quotes separators and line breaks and doubles quotes', () => {
    expect(escapeCsvField('Heat, Part 2')).toBe('"Heat, Part 2"');
    expect(escapeCsvField('Line\nbreak')).toBe('"Line\nbreak"');
    expect(escapeCsvField('The "Director\'s" Cut')).toBe('"The ""Director\'s"" Cut"');
  });
});

describe('toCsv', () => {
  it('writes a header and one CRLF-terminated line per item', () => {
    const csv = toCsv([item]);
    const lines = csv.split('\r\n');

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(toCsvRow(CSV_COLUMNS.map((column) => column.header)));
    expect(lines[0].startsWith('ID,Title,Year,Status,Media Type,Copy Number')).toBe(true);
    expect(lines[1]).toBe(
      '7,"Crouching Tiger, Hidden Dragon",2000,kept,physical,1,"Sleeve says ""Special Edition""",' +
        'Shelf B,,Yes,No,,No,Yes,146,tt0190332,"Action, Drama",120,7.9,12,Ang Lee,,2026-02-01T10:00:00.000Z'
    );
    expect(lines[2]).toBe('');
  });
});

describe('ExportService', () => {
  let handle: DatabaseHandle;
  let cache: CacheService;
  let service: ExportService;

  beforeEach(() => {
    handle = createTestDatabase();
    cache = new CacheService({ checkPeriod: 0 });
    const catalog = new CatalogService(
      handle.db,
      new DuplicateService(handle.db),
      new LocationService(handle.db),
      new AvailabilityService(handle.db, undefined, cache, {
        qualities: ['720p'],
        maxAgeHours: 24,
        hitTTL: 60,
        emptyTTL: 60,
      }),
      new MetadataService(undefined, cache, { imageBaseUrl: 'https://images.test/w500', searchTTL: 60, detailsTTL: 60 })
    );
    service = new ExportService(catalog);
  });

  afterEach(() => {
    cache.close();
    handle.sqlite.close();
  });

  it('exports the filtered items newest first', () => {
    insertItem(handle.db, { title: 'Alien', createdAt: '2026-01-01T00:00:00.000Z' });
    insertItem(handle.db, { title: 'Heat', createdAt: '2026-01-02T00:00:00.000Z' });
    insertItem(handle.db, { title: 'Ran', lifecycleState: 'disposed', createdAt: '2026-01-03T00:00:00.000Z' });

    const titles = service
      .exportCsv({ lifecycleState: 'kept' })
      .split('\r\n')
      .slice(1, -1)
      .map((line) => line.split(',')[1]);

    expect(titles).toEqual(['Heat', 'Alien']);
  });

  it('names the download after the date', () => {
    expect(service.filename(new Date('2026-03-04T23:00:00Z'))).toBe('movie-collection-2026-03-04.csv');
  });
});
