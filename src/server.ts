/**
 * Flood Hazard Service
 *
 * Geolocates the visitor by IP and reports the flood hazard rating of the
 * polygon that contains them. The polygon dataset is downloaded on first use
 * and cached in memory for the lifetime of the process.
 */

import { config } from './config';
import { logger, describeError } from './utils/logger';
import { createApp } from './app';
import { HazardDatasetCache } from './lib/hazard-dataset-cache';
import { MapStore } from './lib/map-store';
import { GeolocationClient } from './functions/locateIp';

const datasets = new HazardDatasetCache({
  url: config.dataset.url,
  path: config.dataset.path,
  layer: config.dataset.layer,
  hazardField: config.dataset.hazardField,
  downloadTimeoutMs: config.dataset.downloadTimeoutMs,
});

const app = createApp({
  datasets,
  geolocation: new GeolocationClient(config.geolocation),
  maps: new MapStore(config.maps),
});

// Warm the cache on start; requests retry the load if this fails
if (config.dataset.preload) {
  datasets.ensureLoaded().catch(error => {
    logger.warn('Could not load hazard dataset on startup', { error: describeError(error) });
  });
}

const server = app.listen(config.port, () => {
  const memUsage = process.memoryUsage();
  logger.info('Flood Hazard Service started', {
    port: config.port,
    environment: config.nodeEnv,
    dataset: config.dataset.path,
    memory: {
      heapUsed: Math.round(memUsage.heapUsed / 1024 / 1024),
      rss: Math.round(memUsage.rss / 1024 / 1024),
    },
  });
});

async function shutdown(): Promise<void> {
  logger.info('Shutting down gracefully...');

  await new Promise<void>((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });

  logger.info('Shutdown complete');
}

function onSignal(): void {
  shutdown()
    .then(() => process.exit(0))
    .catch(error => {
      logger.error('Error during shutdown', { error: describeError(error) });
      process.exit(1);
    });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

export { app };
