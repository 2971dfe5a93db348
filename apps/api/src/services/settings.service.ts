/**
 * Runtime settings stored in the `app_settings` table. The metadata
 * provider key saved here wins over the environment value.
 */

import { eq } from 'drizzle-orm';
import type { SettingsView } from '@shelfarr/shared-types';
import { CatalogDatabase } from '../db';
import { appSettings } from '../db/schema';
import { logger } from '../utils/logger';

export const TMDB_API_KEY_SETTING = 'tmdb_api_key';

export class SettingsService {
  private listeners: Set<(settings: SettingsView) => void> = new Set();

  constructor(
    private db: CatalogDatabase,
    private envTmdbApiKey: string = ''
  ) {}

  private getValue(key: string): string | undefined {
    const row = this.db.select().from(appSettings).where(eq(appSettings.key, key)).get();
    return row?.value;
  }

  getTmdbApiKey(): string {
    const stored = this.getValue(TMDB_API_KEY_SETTING)?.trim();
    return stored || this.envTmdbApiKey;
  }

  /** Saves the key; a blank key removes the stored value and falls back to the environment. */
  setTmdbApiKey(apiKey: string | null | undefined): SettingsView {
    const value = apiKey?.trim() ?? '';
    if (value === '') {
      this.db.delete(appSettings).where(eq(appSettings.key, TMDB_API_KEY_SETTING)).run();
      logger.info('[Settings] Stored TMDB API key removed');
    } else {
      this.db
        .insert(appSettings)
        .values({ key: TMDB_API_KEY_SETTING, value })
        .onConflictDoUpdate({ target: appSettings.key, set: { value } })
        .run();
      logger.info('[Settings] TMDB API key updated');
    }

    const settings = this.getSettings();
    this.notifyListeners(settings);
    return settings;
  }

  // Never exposes the key itself
  getSettings(): SettingsView {
    const stored = this.getValue(TMDB_API_KEY_SETTING)?.trim();
    const source = stored ? 'database' : this.envTmdbApiKey ? 'environment' : 'none';
    return {
      tmdb: {
        configured: source !== 'none',
        source,
      },
    };
  }

  onChange(listener: (settings: SettingsView) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notifyListeners(settings: SettingsView): void {
    for (const listener of this.listeners) {
      try {
        listener(settings);
      } catch (error) {
        logger.error('[Settings] Listener error:', error);
      }
    }
  }
}
