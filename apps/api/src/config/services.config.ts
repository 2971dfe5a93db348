import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config();

export interface ServiceConfig {
  enabled: boolean;
  baseUrl: string;
  apiKey?: string;
  timeout?: number;
}

export interface TmdbServiceConfig extends ServiceConfig {
  imageBaseUrl: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  dataDir: string;
  database: {
    path: string;
  };
  tmdb: TmdbServiceConfig;
  yts: ServiceConfig;
  availability: {
    maxAgeHours: number;
    qualities: string[];
    hitTTL: number;
    emptyTTL: number;
  };
  cache: {
    defaultTTL: number;
    searchTTL: number;
    detailsTTL: number;
    progressTTL: number;
  };
  logStoreMax: number;
}

function parseBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) return defaultValue;
  return value === 'true';
}

function parseInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseList(value: string | undefined, defaultValue: string[]): string[] {
  if (!value) return defaultValue;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : defaultValue;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.SHELFARR_DATA_DIR || path.join(process.cwd(), 'data');

  return {
    port: parseInt(env.PORT, 3000),
    nodeEnv: env.NODE_ENV || 'development',
    dataDir,
    database: {
      path: env.DATABASE_PATH || path.join(dataDir, 'shelfarr.db'),
    },

    tmdb: {
      enabled: parseBoolean(env.TMDB_ENABLED, true),
      baseUrl: env.TMDB_URL || 'https://api.themoviedb.org/3',
      imageBaseUrl: env.TMDB_IMAGE_URL || 'https://image.tmdb.org/t/p/w500',
      apiKey: env.TMDB_API_KEY || '',
      timeout: parseInt(env.TMDB_TIMEOUT, 10000),
    },

    yts: {
      enabled: parseBoolean(env.YTS_ENABLED, true),
      baseUrl: env.YTS_URL || 'https://yts.mx/api/v2',
      timeout: parseInt(env.YTS_TIMEOUT, 10000),
    },

    availability: {
      maxAgeHours: parseInt(env.AVAILABILITY_MAX_AGE_HOURS, 24),
      qualities: parseList(env.AVAILABILITY_QUALITIES, ['720p', '1080p']),
      hitTTL: parseInt(env.CACHE_TTL_AVAILABILITY, 21600),
      emptyTTL: parseInt(env.CACHE_TTL_AVAILABILITY_EMPTY, 3600),
    },

    cache: {
      defaultTTL: parseInt(env.CACHE_TTL_DEFAULT, 300),
      searchTTL: parseInt(env.CACHE_TTL_SEARCH, 3600),
      detailsTTL: parseInt(env.CACHE_TTL_DETAILS, 86400),
      progressTTL: parseInt(env.CACHE_TTL_PROGRESS, 3600),
    },

    logStoreMax: parseInt(env.LOG_STORE_MAX, 1000),
  };
}

export function validateConfig(config: AppConfig): void {
  if (!Number.isInteger(config.port) || config.port <= 0) {
    throw new Error('PORT must be a positive integer');
  }
  if (!config.database.path) {
    throw new Error('DATABASE_PATH could not be resolved');
  }

  const services: Array<[string, ServiceConfig]> = [
    ['tmdb', config.tmdb],
    ['yts', config.yts],
  ];
  for (const [name, cfg] of services) {
    if (cfg.enabled && !cfg.baseUrl) {
      throw new Error(
        `${name.toUpperCase()}_URL is required when ${name.toUpperCase()}_ENABLED=true`
      );
    }
  }

  if (config.availability.maxAgeHours <= 0) {
    throw new Error('AVAILABILITY_MAX_AGE_HOURS must be greater than zero');
  }
  if (config.availability.qualities.length === 0) {
    throw new Error('AVAILABILITY_QUALITIES must name at least one quality');
  }
}

export const config = loadConfig();
