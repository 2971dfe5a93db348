import { describe, expect, it } from 'vitest';
import { loadConfig, validateConfig } from './services.config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ SHELFARR_DATA_DIR: '/srv/shelfarr' });

    expect(config.port).toBe(3000);
    expect(config.database.path).toBe('/srv/shelfarr/shelfarr.db');
    expect(config.tmdb).toMatchObject({
      enabled: true,
      baseUrl: 'https://api.themoviedb.org/3',
      apiKey: '',
    });
    expect(config.availability).toEqual({
      maxAgeHours: 24,
      qualities: ['720p', '1080p'],
      hitTTL: 21600,
      emptyTTL: 3600,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DATABASE_PATH: '/tmp/catalog.db',
      YTS_ENABLED: 'false',
      AVAILABILITY_QUALITIES: '1080p, 2160p,',
      AVAILABILITY_MAX_AGE_HOURS: '48',
      CACHE_TTL_SEARCH: 'soon',
    });

    expect(config.port).toBe(8080);
    expect(config.database.path).toBe('/tmp/catalog.db');
    expect(config.yts.enabled).toBe(false);
    expect(config.availability.qualities).toEqual(['1080p', '2160p']);
    expect(config.availability.maxAgeHours).toBe(48);
    expect(config.cache.searchTTL).toBe(3600);
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(() => validateConfig(loadConfig({}))).not.toThrow();
  });

  it('rejects a bad port and a non-positive freshness window', () => {
    expect(() => validateConfig(loadConfig({ PORT: '-1' }))).toThrow('PORT must be a positive integer');
    expect(() => validateConfig(loadConfig({ AVAILABILITY_MAX_AGE_HOURS: '0' }))).toThrow(
      'AVAILABILITY_MAX_AGE_HOURS must be greater than zero'
    );
  });

  it('requires a URL for an enabled service', () => {
    const config = loadConfig({});
    config.yts.baseUrl = '';

    expect(() => validateConfig(config)).toThrow('YTS_URL is required when YTS_ENABLED=true');
  });
});
