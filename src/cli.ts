#!/usr/bin/env node

import { Command } from 'commander';
import fetch from 'node-fetch';
import { config } from './config';
import { HazardDatasetCache } from './lib/hazard-dataset-cache';
import { GeolocationClient } from './functions/locateIp';
import { lookupFloodHazard, isValidCoordinate } from './functions/lookupFloodHazard';
import { DatasetUnavailableError } from './utils/errors';
import { describeError } from './utils/logger';
import type { CheckOptions, HealthOptions, LocateOptions, LookupOptions } from './types';

const program = new Command();
const defaultHost = `http://localhost:${config.port}`;

function createDatasetCache(): HazardDatasetCache {
  return new HazardDatasetCache({
    url: config.dataset.url,
    path: config.dataset.path,
    layer: config.dataset.layer,
    hazardField: config.dataset.hazardField,
    downloadTimeoutMs: config.dataset.downloadTimeoutMs,
  });
}

function fail(message: string, error?: unknown): never {
  console.error(`Error: ${message}`);
  if (error instanceof DatasetUnavailableError && error.originalError !== undefined) {
    console.error(`Cause: ${describeError(error.originalError)}`);
  } else if (error !== undefined) {
    console.error(`Cause: ${describeError(error)}`);
  }
  process.exit(1);
}

function field(data: unknown, key: string): unknown {
  return typeof data === 'object' && data !== null ? Reflect.get(data, key) : undefined;
}

program
  .name('flood-hazard-cli')
  .description('CLI tool for the Flood Hazard API')
  .version('1.0.0');

program
  .command('fetch-data')
  .description('Download the hazard dataset if missing and check that it parses')
  .action(async () => {
    console.log(`Dataset path: ${config.dataset.path}`);
    try {
      const dataset = await createDatasetCache().ensureLoaded();
      const labelled = dataset.features.filter(feature => feature.label !== null).length;
      console.log(`✓ Loaded ${dataset.features.length} polygons (${labelled} labelled), CRS ${dataset.crs}`);
    } catch (error) {
      fail('Could not load the hazard dataset', error);
    }
  });

program
  .command('lookup')
  .description('Look up the flood hazard for coordinates against the local dataset')
  .option('--lat, --latitude <number>', 'Latitude coordinate')
  .option('--lng, --longitude <number>', 'Longitude coordinate')
  .action(async (options: LookupOptions) => {
    if (!options.latitude || !options.longitude) {
      fail('Both --latitude and --longitude are required');
    }
    const lat = parseFloat(options.latitude);
    const lng = parseFloat(options.longitude);
    if (!isValidCoordinate({ lat, lng })) {
      fail('Latitude and longitude must be valid coordinates');
    }

    try {
      const dataset = await createDatasetCache().ensureLoaded();
      const result = await lookupFloodHazard({ lat, lng }, dataset);
      console.log(`Flood hazard at ${lat}, ${lng}: ${result.hazard}`);
      if (!result.matched) {
        process.exitCode = 2;
      }
    } catch (error) {
      fail('Lookup failed', error);
    }
  });

program
  .command('locate')
  .description('Geolocate an IP address (or this machine when omitted)')
  .option('--ip <address>', 'IP address to locate')
  .action(async (options: LocateOptions) => {
    const location = await new GeolocationClient(config.geolocation).locate(options.ip);
    if (!location) {
      fail(`Could not determine coordinates for ${options.ip ?? 'this machine'}`);
    }
    console.log(`${options.ip ?? 'This machine'}: ${location.latitude}, ${location.longitude}`);
  });

program
  .command('check')
  .description('Ask a running server for the flood hazard of an IP address')
  .option('--ip <address>', 'IP address to check, sent as X-Forwarded-For')
  .option('--host <string>', 'API host', defaultHost)
  .action(async (options: CheckOptions) => {
    try {
      const response = await fetch(`${options.host}/check_flood_hazard`, {
        headers: options.ip ? { 'X-Forwarded-For': options.ip } : {},
      });
      const data: unknown = await response.json();

      console.log(JSON.stringify(data, null, 2));
      if (!response.ok) {
        fail(String(field(data, 'error') ?? `HTTP ${response.status}`));
      }
      console.log(`\n✓ Flood hazard: ${String(field(data, 'hazard'))}`);
    } catch (error) {
      fail('Could not reach the API', error);
    }
  });

program
  .command('health')
  .description('Check if the API is running')
  .option('--host <string>', 'API host', defaultHost)
  .action(async (options: HealthOptions) => {
    try {
      console.log(`Checking API health at: ${options.host}`);
      const response = await fetch(`${options.host}/health`);
      const data: unknown = await response.json();

      if (response.ok && field(data, 'status') === 'ok') {
        const dataset = field(data, 'dataset');
        console.log('✓ API is healthy and running');
        console.log(`  Dataset loaded: ${String(field(dataset, 'loaded'))}, polygons: ${String(field(dataset, 'features'))}`);
      } else {
        fail('API health check failed');
      }
    } catch (error) {
      fail('Could not connect to API', error);
    }
  });

program.parseAsync(process.argv).catch(error => fail('Command failed', error));
