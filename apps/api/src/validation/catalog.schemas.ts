import { z } from 'zod';
import { LIFECYCLE_STATES, MEDIA_TYPES } from '../db/schema';

// Blank text collapses to null so "no value" has a single encoding
const optionalText = (max = 255) =>
  z
    .string()
    .max(max)
    .nullish()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : null;
    });

const flag = z.preprocess(
  (value) => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean()
);

const optionalInt = (min: number, max: number) => z.number().int().min(min).max(max).nullish();

export const catalogItemShape = {
  title: z.string().trim().min(1, 'Title is required.').max(255),
  lifecycleState: z.enum(LIFECYCLE_STATES).default('kept'),
  mediaType: z.enum(MEDIA_TYPES).default('physical'),
  tmdbId: optionalInt(1, Number.MAX_SAFE_INTEGER),
  imdbId: optionalText(20).refine((value) => value === null || /^tt\d+$/.test(value), {
    message: 'IMDB ID should start with "tt" followed by numbers.',
  }),
  releaseYear: optionalInt(1870, 2100),
  copyNumber: z.coerce.number().int().min(1).max(99).optional(),
  copyNotes: optionalText(),
  storageLocation: optionalText(100),
  unboxedLocationNumber: optionalText(20),
  isTartanDvd: flag.default(false),
  isBoxSet: flag.default(false),
  boxSetName: optionalText(),
  isUnopened: flag.default(false),
  isUnwatched: flag.default(false),
  overview: optionalText(5000),
  genres: optionalText(),
  runtime: optionalInt(0, 10000),
  rating: z.number().min(0).max(10).nullish(),
  tmdbUserScore: z.number().min(0).max(10).nullish(),
  ukCertification: optionalText(10),
  originalLanguage: optionalText(10),
  budget: z.number().int().min(0).nullish(),
  revenue: z.number().int().min(0).nullish(),
  productionCompanies: optionalText(2000),
  tagline: optionalText(),
  director: optionalText(),
  posterPath: optionalText(),
};

export const createCatalogItemSchema = z.object(catalogItemShape);
export const updateCatalogItemSchema = z.object(catalogItemShape).partial();

export type CatalogItemInput = z.infer<typeof createCatalogItemSchema>;
export type CatalogItemPatch = z.infer<typeof updateCatalogItemSchema>;

/** User-owned fields accepted when adding from TMDB; metadata comes from the provider. */
export const createFromTmdbSchema = z.object({
  lifecycleState: catalogItemShape.lifecycleState,
  mediaType: catalogItemShape.mediaType,
  copyNotes: catalogItemShape.copyNotes,
  storageLocation: catalogItemShape.storageLocation,
  unboxedLocationNumber: catalogItemShape.unboxedLocationNumber,
  isTartanDvd: catalogItemShape.isTartanDvd,
  isBoxSet: catalogItemShape.isBoxSet,
  boxSetName: catalogItemShape.boxSetName,
  isUnopened: catalogItemShape.isUnopened,
  isUnwatched: catalogItemShape.isUnwatched,
  asCopy: flag.default(false),
});

export type CreateFromTmdbInput = z.infer<typeof createFromTmdbSchema>;

export const EDITABLE_FIELDS = [
  'lifecycleState',
  'mediaType',
  'isBoxSet',
  'boxSetName',
  'storageLocation',
  'isTartanDvd',
  'unboxedLocationNumber',
  'copyNumber',
  'copyNotes',
] as const;

export type EditableField = (typeof EDITABLE_FIELDS)[number];

export const fieldUpdateSchema = z.object({
  field: z.string().min(1, 'Field is required.'),
  value: z.unknown(),
});

const queryFlag = z.enum(['true', 'false']).optional();

export const catalogFilterSchema = z.object({
  search: z.string().trim().max(255).optional(),
  lifecycleState: z.enum(LIFECYCLE_STATES).optional(),
  mediaType: z.enum(MEDIA_TYPES).optional(),
  isTartanDvd: queryFlag,
  isBoxSet: queryFlag,
  isUnopened: queryFlag,
  isUnwatched: queryFlag,
  hasAvailability: queryFlag,
  productionCompany: z.string().trim().max(255).optional(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(12),
});

export type CatalogFilters = z.infer<typeof catalogFilterSchema>;

export const bulkImportSchema = z.object({
  movieList: z.string().min(1, 'Enter at least one movie title.'),
  lifecycleState: z.enum(LIFECYCLE_STATES).default('kept'),
  mediaType: z.enum(MEDIA_TYPES).default('physical'),
  skipExisting: flag.default(true),
  isTartanDvd: flag.default(false),
  isBoxSet: flag.default(false),
  boxSetName: optionalText(200),
  isUnopened: flag.default(false),
  isUnwatched: flag.default(true),
  storageLocation: optionalText(100),
});

export type BulkImportInput = z.infer<typeof bulkImportSchema>;

export const idParamSchema = z.coerce.number().int().positive();

export const rematchSchema = z.object({
  tmdbId: z.coerce.number().int().positive('Select a movie to match.'),
});

export const posterSchema = z.object({
  posterPath: z.string().trim().min(1, 'Select a poster.'),
});

export const searchQuerySchema = z.object({
  q: z.string().trim().min(1, 'Enter a search term.'),
});

export const locationCountSchema = z.object({
  count: z.coerce.number().int().min(1).max(500).default(1),
});

export const locationCheckSchema = z.object({
  value: z.string().default(''),
  excludeId: z.coerce.number().int().positive().optional(),
});

export const settingsSchema = z.object({
  tmdbApiKey: z.string().max(200).nullish(),
});

export const logQuerySchema = z.object({
  level: z.enum(['info', 'warn', 'error', 'debug']).optional(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(500).default(50),
});
