/**
 * src/lib/geojson.ts
 *
 * Reads a GeoJSON FeatureCollection of hazard polygons. The CRS comes from the
 * legacy `crs` member when present and defaults to WGS84 otherwise.
 */

import fs from 'fs';
import type { Feature, FeatureCollection } from 'geojson';
import type { HazardGeometry, RawHazardFeature, RawHazardLayer } from '../types';
import { WGS84, normalizeCrs } from './crs';

type LegacyCrs = { type?: unknown; properties?: { name?: unknown } };

export function isPolygonal(value: unknown): value is HazardGeometry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || !('coordinates' in value)) return false;
  return (value.type === 'Polygon' || value.type === 'MultiPolygon') && Array.isArray(value.coordinates);
}

function isFeatureCollection(value: unknown): value is FeatureCollection & { crs?: LegacyCrs } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'FeatureCollection' &&
    'features' in value &&
    Array.isArray(value.features)
  );
}

function crsOf(collection: { crs?: LegacyCrs }): string {
  const name = collection.crs?.properties?.name;
  return typeof name === 'string' ? normalizeCrs(name) : WGS84;
}

function toRawFeature(feature: Feature): RawHazardFeature | null {
  if (!isPolygonal(feature.geometry)) {
    return null;
  }
  return { properties: feature.properties ?? {}, geometry: feature.geometry };
}

export function parseGeoJsonLayer(text: string): RawHazardLayer {
  const parsed: unknown = JSON.parse(text);
  if (!isFeatureCollection(parsed)) {
    throw new Error('GeoJSON dataset must be a FeatureCollection');
  }

  const features: RawHazardFeature[] = [];
  for (const feature of parsed.features) {
    const raw = toRawFeature(feature);
    if (raw) features.push(raw);
  }

  return { crs: crsOf(parsed), features };
}

export async function readGeoJsonLayer(filePath: string): Promise<RawHazardLayer> {
  const text = await fs.promises.readFile(filePath, 'utf-8');
  return parseGeoJsonLayer(text);
}
