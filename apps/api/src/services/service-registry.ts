import { sql } from 'drizzle-orm';
import { AppConfig } from '../config/services.config';
import { DatabaseHandle } from '../db';
import { TMDBClient } from '../clients/TMDBClient';
import { AvailabilityProvider, YTSClient } from '../clients/YTSClient';
import { CacheService } from './cache.service';
import { SettingsService } from './settings.service';
import { DuplicateService } from './duplicate.service';
import { LocationService } from './location.service';
import { AvailabilityService } from './availability.service';
import { MetadataService } from './metadata.service';
import { MetadataSyncService } from './metadata-sync.service';
import { CatalogService } from './catalog.service';
import { BulkImportService } from './bulk-import.service';
import { StatsService } from './stats.service';
import { ExportService } from './export.service';
import { CatalogController } from '../controllers/catalog.controller';
import { AvailabilityController } from '../controllers/availability.controller';
import { MetadataController } from '../controllers/metadata.controller';
import { SystemController } from '../controllers/system.controller';
import { ServiceControllers } from '../routes';
import { logger } from '../utils/logger';

export interface Services {
  cache: CacheService;
  settings: SettingsService;
  duplicates: DuplicateService;
  locations: LocationService;
  availability: AvailabilityService;
  metadata: MetadataService;
  metadataSync: MetadataSyncService;
  catalog: CatalogService;
  bulkImport: BulkImportService;
  stats: StatsService;
  export: ExportService;
}

/** Replacements for the outbound clients; `null` disables one. */
export interface RegistryOverrides {
  tmdbClient?: TMDBClient | null;
  availabilityProvider?: AvailabilityProvider | null;
  cache?: CacheService;
  /** Pause between TMDB calls in bulk jobs, in milliseconds. */
  tmdbDelayMs?: number;
}

/**
 * Service Registry - builds every service over one database handle and
 * exposes the controllers the router needs.
 */
export class ServiceRegistry {
  readonly services: Services;
  private controllers: ServiceControllers;

  constructor(
    private handle: DatabaseHandle,
    private appConfig: AppConfig,
    overrides: RegistryOverrides = {}
  ) {
    this.services = this.initializeServices(overrides);
    this.controllers = this.initializeControllers();
  }

  private initializeServices(overrides: RegistryOverrides): Services {
    const { db } = this.handle;
    const cfg = this.appConfig;
    const cache = overrides.cache ?? new CacheService({ defaultTTL: cfg.cache.defaultTTL });
    const settings = new SettingsService(db, cfg.tmdb.apiKey ?? '');

    const tmdbClient =
      overrides.tmdbClient !== undefined
        ? overrides.tmdbClient ?? undefined
        : cfg.tmdb.enabled
          ? new TMDBClient(cfg.tmdb, () => settings.getTmdbApiKey())
          : undefined;
    const availabilityProvider =
      overrides.availabilityProvider !== undefined
        ? overrides.availabilityProvider ?? undefined
        : cfg.yts.enabled
          ? new YTSClient(cfg.yts)
          : undefined;

    logger.info(`TMDB client ${tmdbClient ? 'enabled' : 'disabled'}`);
    logger.info(`Availability provider ${availabilityProvider ? 'enabled' : 'disabled'}`);

    const delayMs = overrides.tmdbDelayMs ?? 250;
    const duplicates = new DuplicateService(db);
    const locations = new LocationService(db);
    const availability = new AvailabilityService(db, availabilityProvider, cache, cfg.availability);
    const metadata = new MetadataService(tmdbClient, cache, {
      imageBaseUrl: cfg.tmdb.imageBaseUrl,
      searchTTL: cfg.cache.searchTTL,
      detailsTTL: cfg.cache.detailsTTL,
    });
    const metadataSync = new MetadataSyncService(db, metadata, duplicates, cache, {
      progressTTL: cfg.cache.progressTTL,
      delayMs,
    });
    const catalog = new CatalogService(db, duplicates, locations, availability, metadata);

    // A new key must not be served responses cached under the old one
    settings.onChange(() => metadata.clearCache());

    return {
      cache,
      settings,
      duplicates,
      locations,
      availability,
      metadata,
      metadataSync,
      catalog,
      bulkImport: new BulkImportService(db, metadata, duplicates, locations, { delayMs }),
      stats: new StatsService(db, catalog, duplicates),
      export: new ExportService(catalog),
    };
  }

  private initializeControllers(): ServiceControllers {
    const s = this.services;
    return {
      catalog: new CatalogController(s.catalog, s.duplicates, s.locations, s.export, s.bulkImport),
      availability: new AvailabilityController(s.catalog, s.availability),
      metadata: new MetadataController(s.catalog, s.metadata, s.metadataSync),
      system: new SystemController({
        statsService: s.stats,
        settingsService: s.settings,
        metadataService: s.metadata,
        availabilityEnabled: s.availability.isEnabled(),
        pingDatabase: () => this.pingDatabase(),
      }),
    };
  }

  getControllers(): ServiceControllers {
    return this.controllers;
  }

  pingDatabase(): boolean {
    try {
      this.handle.db.get(sql`select 1`);
      return true;
    } catch (error) {
      logger.error('Database health check failed:', error);
      return false;
    }
  }

  close(): void {
    this.services.cache.close();
  }
}
