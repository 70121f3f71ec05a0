import os from 'os';
import path from 'path';
import { DEFAULT_DATASET_URL, loadConfig } from '../config';

describe('loadConfig', () => {
  test('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.isDevelopment).toBe(true);
    expect(config.dataset).toEqual({
      url: DEFAULT_DATASET_URL,
      path: path.join(os.tmpdir(), 'revised_map_data.gpkg'),
      layer: undefined,
      hazardField: 'SOIL_FLOOD_HAZARD',
      downloadTimeoutMs: 300000,
      preload: true,
    });
    expect(config.geolocation).toEqual({ baseUrl: 'https://get.geojs.io', timeoutMs: 5000 });
    expect(config.maps.cacheSize).toBe(100);
    expect(config.maps.ttlMs).toBe(600000);
  });

  test('converts and trims values', () => {
    const config = loadConfig({
      PORT: '8080',
      NODE_ENV: 'production',
      GEOLOCATION_BASE_URL: 'http://geo.internal/',
      CORS_ALLOWED_ORIGINS: 'https://a.example, https://b.example',
      PRELOAD_DATASET: 'false',
      DATASET_LAYER: 'soil_hazard',
    });

    expect(config.port).toBe(8080);
    expect(config.isProduction).toBe(true);
    expect(config.geolocation.baseUrl).toBe('http://geo.internal');
    expect(config.cors.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.dataset.preload).toBe(false);
    expect(config.dataset.layer).toBe('soil_hazard');
  });

  test('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/Config validation error/);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/Config validation error/);
    expect(() => loadConfig({ DATASET_URL: 'ftp://example.com/data.gpkg' })).toThrow(/Config validation error/);
  });
});
