/**
 * src/functions/lookupFloodHazard.ts
 *
 * Resolves the flood hazard label for a latitude/longitude against the cached
 * hazard dataset, using Turf's booleanPointInPolygon for the containment test.
 */

import { booleanPointInPolygon, point } from '@turf/turf';
import type { BBox } from 'geojson';
import type { HazardDataset, HazardResult } from '../types';
import { toDatasetCrs } from '../lib/crs';
import type { MapStore } from '../lib/map-store';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export const NO_DATA_LABEL = 'No flood hazard data for this location';

export interface Coordinates {
  lat: number;
  lng: number;
}

export function isValidCoordinate({ lat, lng }: Coordinates): boolean {
  return Number.isFinite(lat) && Number.isFinite(lng) && Math.abs(lat) <= 90 && Math.abs(lng) <= 180;
}

function bboxContains([minX, minY, maxX, maxY]: BBox, [x, y]: number[]): boolean {
  return x >= minX && x <= maxX && y >= minY && y <= maxY;
}

/**
 * Finds the hazard label of the first polygon that strictly contains the point.
 * Points on a polygon boundary are not within it. Features without a label are
 * skipped, so a labelled polygon further down the list can still match.
 */
export function findHazardLabel({ lat, lng }: Coordinates, dataset: HazardDataset): string | null {
  if (!isValidCoordinate({ lat, lng })) {
    throw new ValidationError('Invalid coordinates', { lat, lng });
  }

  // [longitude, latitude]
  const position = toDatasetCrs([lng, lat], dataset.crs);
  const pt = point(position);

  for (const feature of dataset.features) {
    if (feature.label === null || !bboxContains(feature.bbox, position)) {
      continue;
    }
    if (booleanPointInPolygon(pt, feature.geometry, { ignoreBoundary: true })) {
      return feature.label;
    }
  }
  return null;
}

/**
 * Looks up the hazard for the given coordinates, attaching a pre-generated map
 * when one exists for the matched label.
 */
export async function lookupFloodHazard(
  coordinates: Coordinates,
  dataset: HazardDataset,
  maps?: MapStore
): Promise<HazardResult> {
  const label = findHazardLabel(coordinates, dataset);

  if (label === null) {
    logger.debug('No hazard polygon contains point', coordinates);
    return { hazard: NO_DATA_LABEL, matched: false, mapPath: null };
  }

  logger.info('Hazard polygon match', { ...coordinates, hazard: label });
  const mapPath = maps ? await maps.findMapForLabel(label) : null;
  return { hazard: label, matched: true, mapPath };
}
