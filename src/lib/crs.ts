/**
 * src/lib/crs.ts
 *
 * Coordinate reference system helpers. Query points always arrive as WGS84
 * longitude/latitude; datasets may be stored in any CRS proj4 can describe.
 */

import proj4 from 'proj4';

export const WGS84 = 'EPSG:4326';

export type Position = [number, number];

// Names that all mean plain WGS84 longitude/latitude
const WGS84_ALIASES = new Set([
  'EPSG:4326',
  'CRS84',
  'OGC:CRS84',
  'URN:OGC:DEF:CRS:OGC:1.3:CRS84',
  'URN:OGC:DEF:CRS:OGC::CRS84',
  'HTTP://WWW.OPENGIS.NET/DEF/CRS/OGC/1.3/CRS84',
]);

/**
 * Normalizes a CRS name to `EPSG:<code>` form where possible.
 * Accepts `EPSG:3857`, `urn:ogc:def:crs:EPSG::3857`, opengis URLs and CRS84 aliases.
 * Unrecognized names are returned trimmed and otherwise untouched.
 */
export function normalizeCrs(name: string): string {
  const trimmed = name.trim();
  const upper = trimmed.toUpperCase();

  if (WGS84_ALIASES.has(upper)) {
    return WGS84;
  }

  const match =
    /^EPSG:+(\d+)$/.exec(upper) ??
    /^URN:OGC:DEF:CRS:EPSG:[\d.]*:(\d+)$/.exec(upper) ??
    /^HTTPS?:\/\/WWW\.OPENGIS\.NET\/DEF\/CRS\/EPSG\/[\d.]+\/(\d+)$/.exec(upper);

  return match ? `EPSG:${match[1]}` : trimmed;
}

export function isWgs84(crs: string): boolean {
  return normalizeCrs(crs) === WGS84;
}

export function isKnownCrs(crs: string): boolean {
  try {
    return Boolean(proj4.defs(crs));
  } catch {
    return false;
  }
}

/**
 * Makes `code` usable for reprojection. Codes proj4 already knows are left alone;
 * otherwise the WKT (or proj string) definition is registered under that code.
 *
 * @throws Error when the code is unknown and no usable definition is given.
 */
export function registerCrs(code: string, definition?: string | null): void {
  if (isKnownCrs(code)) {
    return;
  }

  if (!definition || definition.trim() === '' || definition.trim().toLowerCase() === 'undefined') {
    throw new Error(`Unknown coordinate reference system ${code} and no definition available`);
  }

  proj4.defs(code, definition);

  if (!isKnownCrs(code)) {
    throw new Error(`Could not parse definition for coordinate reference system ${code}`);
  }
}

/** Reprojects a WGS84 longitude/latitude pair into `crs`. */
export function toDatasetCrs(position: Position, crs: string): Position {
  if (isWgs84(crs)) {
    return [position[0], position[1]];
  }
  const [x, y]: number[] = proj4(WGS84, crs, [position[0], position[1]]);
  return [x, y];
}

/** Reprojects a position in `crs` back to WGS84 longitude/latitude. */
export function fromDatasetCrs(position: Position, crs: string): Position {
  if (isWgs84(crs)) {
    return [position[0], position[1]];
  }
  const [lon, lat]: number[] = proj4(crs, WGS84, [position[0], position[1]]);
  return [lon, lat];
}
