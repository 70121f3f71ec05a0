/**
 * src/lib/hazard-dataset-cache.ts
 *
 * Loads the flood hazard polygon dataset into memory once per process. The file
 * is downloaded on first use when missing, parsed according to its extension and
 * kept as a frozen, read-only collection for the lifetime of the process.
 *
 * Concurrent callers during a cold start share one in-flight load; a failed load
 * is forgotten so the next request tries again.
 */

import path from 'path';
import { bbox } from '@turf/turf';
import type { HazardDataset, HazardFeature, RawHazardLayer } from '../types';
import { ensureDatasetFile, type DatasetSource } from '../utils/datasetHelpers';
import { DatasetUnavailableError } from '../utils/errors';
import { logger, describeError } from '../utils/logger';
import { readGeoPackageLayer } from './geopackage';
import { readGeoJsonLayer } from './geojson';

export interface HazardDatasetOptions extends DatasetSource {
  hazardField: string;
  layer?: string;
}

/**
 * Returns the label of a hazard attribute value, or null when it is missing
 * (absent, null, blank, or a non-finite number).
 */
export function toHazardLabel(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : null;
  const label = String(value).trim();
  return label === '' ? null : label;
}

async function readLayer(filePath: string, layer?: string): Promise<RawHazardLayer> {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case '.gpkg':
      return readGeoPackageLayer(filePath, layer);
    case '.geojson':
    case '.json':
      return readGeoJsonLayer(filePath);
    default:
      throw new Error(`Unsupported dataset format "${extension || filePath}"`);
  }
}

/**
 * Builds the immutable in-memory dataset from a parsed layer.
 */
export function buildDataset(rawLayer: RawHazardLayer, source: string, hazardField: string): HazardDataset {
  const features = rawLayer.features.map(
    ({ properties, geometry }): Readonly<HazardFeature> =>
      Object.freeze({
        label: toHazardLabel(properties[hazardField]),
        geometry,
        bbox: bbox(geometry),
      })
  );

  return Object.freeze({
    source,
    crs: rawLayer.crs,
    hazardField,
    features: Object.freeze(features),
  });
}

export class HazardDatasetCache {
  private dataset: HazardDataset | null = null;
  private pending: Promise<HazardDataset> | null = null;

  constructor(private readonly options: HazardDatasetOptions) {}

  /** The loaded dataset, or null before the first successful load. */
  get current(): HazardDataset | null {
    return this.dataset;
  }

  /**
   * Returns the cached dataset, loading it first if needed. Safe to call on
   * every request.
   *
   * @throws DatasetUnavailableError when the file cannot be downloaded or parsed.
   */
  ensureLoaded(): Promise<HazardDataset> {
    if (this.dataset) {
      return Promise.resolve(this.dataset);
    }

    if (!this.pending) {
      this.pending = this.load().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async load(): Promise<HazardDataset> {
    const { path: filePath, hazardField, layer } = this.options;

    try {
      await ensureDatasetFile(this.options);

      logger.info('[CACHE] Loading hazard dataset into memory...', { path: filePath });
      const rawLayer = await readLayer(filePath, layer);
      const dataset = buildDataset(rawLayer, filePath, hazardField);

      const labelled = dataset.features.filter(feature => feature.label !== null).length;
      const memoryUsage = process.memoryUsage();
      logger.info('[CACHE] Hazard dataset cached', {
        features: dataset.features.length,
        labelled,
        crs: dataset.crs,
        heapUsedMB: Number((memoryUsage.heapUsed / 1024 / 1024).toFixed(2)),
      });

      this.dataset = dataset;
      return dataset;
    } catch (err) {
      logger.error('[CACHE] Error loading hazard dataset', { path: filePath, error: describeError(err) });
      throw err instanceof DatasetUnavailableError ? err : new DatasetUnavailableError(undefined, err);
    }
  }
}
