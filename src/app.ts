/**
 * Express application for the flood hazard service.
 *
 * Built by a factory so the server and the tests can supply their own dataset
 * cache, geolocation client and map store.
 */

import express, { Request, Response } from 'express';
import path from 'path';
import compression from 'compression';
import type {
  CoordinateHazardResponse,
  GeoLocation,
  HazardCheckResponse,
  HazardDataset,
  HazardResult,
} from './types';
import type { MapStore } from './lib/map-store';
import { lookupFloodHazard, isValidCoordinate } from './functions/lookupFloodHazard';
import { config } from './config';
import { logger, describeError } from './utils/logger';
import { AppError, GeolocationUnavailableError, ValidationError } from './utils/errors';
import { helmetMiddleware, corsMiddleware, rateLimitMiddleware } from './middleware/security';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/errorHandler';
import { getGeolocatableIp } from './middleware/clientIp';

export const DEFAULT_PUBLIC_DIR = path.join(__dirname, '../public');

export interface DatasetProvider {
  readonly current: HazardDataset | null;
  ensureLoaded(): Promise<HazardDataset>;
}

export interface Geolocator {
  locate(ip?: string): Promise<GeoLocation | null>;
}

export interface AppDependencies {
  datasets: DatasetProvider;
  geolocation: Geolocator;
  maps: MapStore;
  publicDir?: string;
}

// Hazard endpoints report an unknown hazard alongside any error
const UNKNOWN_HAZARD = { hazard: 'Unknown', map_available: false };

function asHazardError(err: unknown): AppError {
  const appError = err instanceof AppError ? err : new AppError(describeError(err), 500, false);
  if (!(err instanceof AppError) && err instanceof Error && err.stack) {
    appError.stack = err.stack;
  }
  return appError.addDetails(UNKNOWN_HAZARD);
}

function parseCoordinate(value: unknown): number {
  return typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
}

export function createApp({ datasets, geolocation, maps, publicDir = DEFAULT_PUBLIC_DIR }: AppDependencies) {
  const app = express();

  app.disable('x-powered-by');
  if (config.security.trustProxy > 0) {
    app.set('trust proxy', config.security.trustProxy);
  }

  app.use(
    compression({
      threshold: 1024, // Only compress responses larger than 1KB
      level: 6,
    })
  );

  app.use(helmetMiddleware);
  app.use(corsMiddleware);

  // Health check (before rate limiting for monitoring)
  app.get('/health', (_req: Request, res: Response) => {
    const memUsage = process.memoryUsage();
    const dataset = datasets.current;

    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      dataset: {
        loaded: dataset !== null,
        features: dataset ? dataset.features.length : 0,
        crs: dataset ? dataset.crs : null,
      },
      memory: {
        heapUsed: Math.round(memUsage.heapUsed / 1024 / 1024),
        heapTotal: Math.round(memUsage.heapTotal / 1024 / 1024),
        rss: Math.round(memUsage.rss / 1024 / 1024),
      },
    });
  });

  app.use(rateLimitMiddleware);

  app.get('/', (_req: Request, res: Response) => {
    res.sendFile(path.join(publicDir, 'index.html'));
  });

  app.use(express.static(publicDir, { index: false }));

  const toResponse = (result: HazardResult): HazardCheckResponse => {
    if (!result.mapPath) {
      return { hazard: result.hazard, map_available: false };
    }
    const id = maps.register(result.mapPath);
    return { hazard: result.hazard, map_available: true, map_url: `/map?id=${id}` };
  };

  // Hazard for the caller's own location
  app.get(
    '/check_flood_hazard',
    asyncHandler(async (req: Request, res: Response) => {
      // Each response carries its own map reference
      res.set('Cache-Control', 'no-store');

      try {
        const ip = getGeolocatableIp(req);
        logger.info('Checking flood hazard', { ip: ip ?? '(inferred by geolocation service)' });

        const location = await geolocation.locate(ip);
        if (!location) {
          throw new GeolocationUnavailableError();
        }

        const dataset = await datasets.ensureLoaded();
        const result = await lookupFloodHazard(
          { lat: location.latitude, lng: location.longitude },
          dataset,
          maps
        );

        res.json(toResponse(result));
      } catch (err) {
        throw asHazardError(err);
      }
    })
  );

  // Hazard for explicit coordinates
  app.get(
    '/flood-hazard',
    asyncHandler(async (req: Request, res: Response) => {
      res.set('Cache-Control', 'no-store');

      try {
        const lat = parseCoordinate(req.query.lat);
        const lng = parseCoordinate(req.query.lng);
        if (!isValidCoordinate({ lat, lng })) {
          throw new ValidationError('Invalid coordinates');
        }

        const dataset = await datasets.ensureLoaded();
        const result = await lookupFloodHazard({ lat, lng }, dataset, maps);

        const body: CoordinateHazardResponse = {
          ...toResponse(result),
          matched: result.matched,
          coordinates: { lat, lng },
        };
        res.json(body);
      } catch (err) {
        throw asHazardError(err);
      }
    })
  );

  app.get('/map', (req: Request, res: Response) => {
    const id = typeof req.query.id === 'string' ? req.query.id : undefined;
    const mapPath = id ? maps.resolve(id) : undefined;

    const notFound = () => {
      res.status(404).type('text/plain').send('Map not found');
    };

    if (!mapPath) {
      notFound();
      return;
    }

    res.type('image/png');
    res.sendFile(mapPath, err => {
      if (!err) return;
      logger.warn('Failed to send map image', { mapPath, error: describeError(err) });
      if (!res.headersSent) notFound();
    });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
