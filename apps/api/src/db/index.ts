import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import fs from 'fs';
import path from 'path';
import * as schema from './schema';
import { config } from '../config/services.config';
import { logger } from '../utils/logger';

export type CatalogDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: CatalogDatabase;
  sqlite: Database.Database;
}

function initializeDatabase(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS catalog_items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      lifecycle_state TEXT NOT NULL DEFAULT 'kept',
      media_type TEXT NOT NULL DEFAULT 'physical',
      tmdb_id INTEGER,
      imdb_id TEXT,
      release_year INTEGER,
      copy_number INTEGER NOT NULL DEFAULT 1,
      copy_notes TEXT,
      storage_location TEXT,
      unboxed_location_number TEXT,
      is_tartan_dvd INTEGER NOT NULL DEFAULT 0,
      is_box_set INTEGER NOT NULL DEFAULT 0,
      box_set_name TEXT,
      is_unopened INTEGER NOT NULL DEFAULT 0,
      is_unwatched INTEGER NOT NULL DEFAULT 0,
      overview TEXT,
      genres TEXT,
      runtime INTEGER,
      rating REAL,
      tmdb_user_score REAL,
      uk_certification TEXT,
      original_language TEXT,
      budget INTEGER,
      revenue INTEGER,
      production_companies TEXT,
      tagline TEXT,
      director TEXT,
      poster_path TEXT,
      availability_cache TEXT,
      availability_cache_timestamp TEXT,
      has_cached_availability INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_catalog_items_tmdb_id ON catalog_items (tmdb_id);
    CREATE INDEX IF NOT EXISTS idx_catalog_items_title_year ON catalog_items (title, release_year);
    CREATE INDEX IF NOT EXISTS idx_catalog_items_unboxed
      ON catalog_items (lifecycle_state, unboxed_location_number);
    CREATE INDEX IF NOT EXISTS idx_catalog_items_availability
      ON catalog_items (has_cached_availability);

    CREATE TABLE IF NOT EXISTS app_settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
}

/**
 * Opens (and creates if needed) a catalog database. Pass `:memory:` for a
 * throwaway database.
 */
export function openDatabase(filePath: string): DatabaseHandle {
  const inMemory = filePath === ':memory:';
  if (!inMemory) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  const sqlite = new Database(filePath);
  sqlite.pragma('busy_timeout = 5000');
  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }
  initializeDatabase(sqlite);

  return { db: drizzle(sqlite, { schema }), sqlite };
}

let defaultHandle: DatabaseHandle | undefined;

export function getDatabase(): DatabaseHandle {
  if (!defaultHandle) {
    defaultHandle = openDatabase(config.database.path);
    logger.info(`Database opened at ${config.database.path}`);
  }
  return defaultHandle;
}

export function closeDatabase(): void {
  if (defaultHandle) {
    defaultHandle.sqlite.close();
    defaultHandle = undefined;
  }
}
