import { CatalogItem } from '../db/schema';
import { CatalogService, ListFilters } from './catalog.service';

type CsvValue = string | number | boolean | null | undefined;

interface CsvColumn {
  header: string;
  value: (item: CatalogItem) => CsvValue;
}

const yesNo = (value: boolean) => (value ? 'Yes' : 'No');

export const CSV_COLUMNS: CsvColumn[] = [
  { header: 'ID', value: (item) => item.id },
  { header: 'Title', value: (item) => item.title },
  { header: 'Year', value: (item) => item.releaseYear },
  { header: 'Status', value: (item) => item.lifecycleState },
  { header: 'Media Type', value: (item) => item.mediaType },
  { header: 'Copy Number', value: (item) => item.copyNumber },
  { header: 'Copy Notes', value: (item) => item.copyNotes },
  { header: 'Storage Location', value: (item) => item.storageLocation },
  { header: 'Unboxed Location', value: (item) => item.unboxedLocationNumber },
  { header: 'Tartan DVD', value: (item) => yesNo(item.isTartanDvd) },
  { header: 'Box Set', value: (item) => yesNo(item.isBoxSet) },
  { header: 'Box Set Name', value: (item) => item.boxSetName },
  { header: 'Unopened', value: (item) => yesNo(item.isUnopened) },
  { header: 'Unwatched', value: (item) => yesNo(item.isUnwatched) },
  { header: 'TMDB ID', value: (item) => item.tmdbId },
  { header: 'IMDB ID', value: (item) => item.imdbId },
  { header: 'Genres', value: (item) => item.genres },
  { header: 'Runtime', value: (item) => item.runtime },
  { header: 'Rating', value: (item) => item.rating },
  { header: 'Certification', value: (item) => item.ukCertification },
  { header: 'Director', value: (item) => item.director },
  { header: 'Production Companies', value: (item) => item.productionCompanies },
  { header: 'Added', value: (item) => item.createdAt },
];

/** RFC 4180: fields holding a comma, quote or line break are quoted, quotes doubled. */
export function escapeCsvField(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsvRow(values: CsvValue[]): string {
  return values.map(escapeCsvField).join(',');
}

export function toCsv(items: CatalogItem[]): string {
  const lines = [toCsvRow(CSV_COLUMNS.map((column) => column.header))];
  for (const item of items) {
    lines.push(toCsvRow(CSV_COLUMNS.map((column) => column.value(item))));
  }
  return `${lines.join('\r\n')}\r\n`;
}

export class ExportService {
  constructor(private catalog: CatalogService) {}

  exportCsv(filters: ListFilters = {}): string {
    return toCsv(this.catalog.findAll(filters));
  }

  filename(now: Date = new Date()): string {
    return `movie-collection-${now.toISOString().slice(0, 10)}.csv`;
  }
}
