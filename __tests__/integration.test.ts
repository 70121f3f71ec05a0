import fs from 'fs';
import path from 'path';
import express from 'express';
import request from 'supertest';
import { createApp } from '../src/app';
import { GeolocationClient } from '../src/functions/locateIp';
import { NO_DATA_LABEL } from '../src/functions/lookupFloodHazard';
import { HazardDatasetCache } from '../src/lib/hazard-dataset-cache';
import { MapStore } from '../src/lib/map-store';
import {
  FAKE_PNG,
  HAZARD_FIELD,
  makeTempDir,
  mercatorBox,
  removeDir,
  startServer,
  writeGeoPackage,
  type RunningServer,
} from '../src/__tests__/helpers/fixtures';

// Coordinates the fake geolocation service reports per IP
const KNOWN_IPS: Record<string, { latitude: string; longitude: string }> = {
  '203.0.113.7': { latitude: '1.2500', longitude: '-3.5000' },
  '198.51.100.20': { latitude: '45.0000', longitude: '45.0000' },
};

describe('Flood Hazard Service Integration', () => {
  let workDir: string;
  let upstream: RunningServer;
  let datasetDownloads: number;
  let app: ReturnType<typeof createApp>;

  beforeAll(async () => {
    workDir = await makeTempDir();
    const sourcePath = path.join(workDir, 'source', 'hazard.gpkg');
    await fs.promises.mkdir(path.dirname(sourcePath), { recursive: true });
    writeGeoPackage(sourcePath, {
      srsId: 3857,
      features: [
        { geometry: mercatorBox(-10, -10, 10, 10), properties: { [HAZARD_FIELD]: 'HIGH' } },
        { geometry: mercatorBox(30, 30, 40, 40), properties: { [HAZARD_FIELD]: null } },
      ],
    });

    const mapDir = path.join(workDir, 'maps');
    await fs.promises.mkdir(mapDir);
    await fs.promises.writeFile(path.join(mapDir, 'high.png'), FAKE_PNG);

    datasetDownloads = 0;
    const upstreamApp = express();
    upstreamApp.get('/data/hazard.gpkg', (_req, res) => {
      datasetDownloads += 1;
      res.sendFile(sourcePath);
    });
    upstreamApp.get('/v1/ip/geo/:file', (req, res) => {
      const location = KNOWN_IPS[req.params.file.replace(/\.json$/, '')];
      if (!location) {
        res.status(404).json({ error: 'unknown ip' });
        return;
      }
      res.json({ ip: req.params.file, ...location });
    });
    upstream = await startServer(upstreamApp);

    app = createApp({
      datasets: new HazardDatasetCache({
        url: `${upstream.url}/data/hazard.gpkg`,
        path: path.join(workDir, 'storage', 'hazard.gpkg'),
        downloadTimeoutMs: 5000,
        hazardField: HAZARD_FIELD,
      }),
      geolocation: new GeolocationClient({ baseUrl: upstream.url, timeoutMs: 2000 }),
      maps: new MapStore({ dir: mapDir, cacheSize: 10, ttlMs: 60_000 }),
    });
  });

  afterAll(async () => {
    await upstream.close();
    await removeDir(workDir);
  });

  test('has no map to serve before any check', async () => {
    const res = await request(app).get('/map').expect(404);

    expect(res.text).toBe('Map not found');
  });

  test('downloads the dataset and reports the hazard with its map', async () => {
    const res = await request(app).get('/check_flood_hazard').set('X-Forwarded-For', '203.0.113.7').expect(200);

    expect(res.body).toEqual({
      hazard: 'HIGH',
      map_available: true,
      map_url: expect.stringMatching(/^\/map\?id=/),
    });
    expect(datasetDownloads).toBe(1);

    const map = await request(app).get(res.body.map_url).expect(200);
    expect(Buffer.compare(map.body, FAKE_PNG)).toBe(0);
  });

  test('reports the projected dataset in the health check', async () => {
    const res = await request(app).get('/health').expect(200);

    expect(res.body.dataset).toEqual({ loaded: true, features: 2, crs: 'EPSG:3857' });
  });

  test('reports no data outside the hazard polygons', async () => {
    const res = await request(app).get('/check_flood_hazard').set('X-Forwarded-For', '198.51.100.20').expect(200);

    expect(res.body).toEqual({ hazard: NO_DATA_LABEL, map_available: false });
    expect(datasetDownloads).toBe(1);
  });

  test('skips unlabelled polygons', async () => {
    const res = await request(app).get('/flood-hazard').query({ lat: 35, lng: 35 }).expect(200);

    expect(res.body).toMatchObject({ hazard: NO_DATA_LABEL, matched: false });
  });

  test('returns 502 when the geolocation service has no answer', async () => {
    const res = await request(app).get('/check_flood_hazard').set('X-Forwarded-For', '192.0.2.99').expect(502);

    expect(res.body).toEqual({
      hazard: 'Unknown',
      map_available: false,
      status: 'error',
      statusCode: 502,
      error: 'Could not determine flood hazard for your location',
    });
  });
});
