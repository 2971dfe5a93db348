import { sqliteTable, text, integer, real } from 'drizzle-orm/sqlite-core';
import type {
  AvailabilityRecord,
  CatalogMediaType,
  LifecycleState,
} from '@shelfarr/shared-types';

export const LIFECYCLE_STATES = ['kept', 'disposed', 'unboxed'] as const satisfies readonly LifecycleState[];
export const MEDIA_TYPES = ['physical', 'download', 'rip'] as const satisfies readonly CatalogMediaType[];

export const catalogItems = sqliteTable('catalog_items', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  lifecycleState: text('lifecycle_state', { enum: LIFECYCLE_STATES })
    .notNull()
    .default('kept'),
  mediaType: text('media_type', { enum: MEDIA_TYPES })
    .notNull()
    .default('physical'),

  // Provider identifiers
  tmdbId: integer('tmdb_id'),
  imdbId: text('imdb_id'),
  releaseYear: integer('release_year'),

  // Copies and physical placement
  copyNumber: integer('copy_number').notNull().default(1),
  copyNotes: text('copy_notes'),
  storageLocation: text('storage_location'),
  unboxedLocationNumber: text('unboxed_location_number'),

  // Collection flags
  isTartanDvd: integer('is_tartan_dvd', { mode: 'boolean' }).notNull().default(false),
  isBoxSet: integer('is_box_set', { mode: 'boolean' }).notNull().default(false),
  boxSetName: text('box_set_name'),
  isUnopened: integer('is_unopened', { mode: 'boolean' }).notNull().default(false),
  isUnwatched: integer('is_unwatched', { mode: 'boolean' }).notNull().default(false),

  // TMDB metadata
  overview: text('overview'),
  genres: text('genres'),
  runtime: integer('runtime'),
  rating: real('rating'),
  tmdbUserScore: real('tmdb_user_score'),
  ukCertification: text('uk_certification'),
  originalLanguage: text('original_language'),
  budget: integer('budget'),
  revenue: integer('revenue'),
  productionCompanies: text('production_companies'),
  tagline: text('tagline'),
  director: text('director'),
  posterPath: text('poster_path'),

  // Availability snapshot
  availabilityCache: text('availability_cache', { mode: 'json' }).$type<AvailabilityRecord[]>(),
  availabilityCacheTimestamp: text('availability_cache_timestamp'),
  hasCachedAvailability: integer('has_cached_availability', { mode: 'boolean' })
    .notNull()
    .default(false),

  createdAt: text('created_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at')
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});

export const appSettings = sqliteTable('app_settings', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});

// Types
export type CatalogItem = typeof catalogItems.$inferSelect;
export type NewCatalogItem = typeof catalogItems.$inferInsert;
export type AppSetting = typeof appSettings.$inferSelect;
