/**
 * src/lib/geopackage.ts
 *
 * Minimal OGC GeoPackage reader for polygon layers. A GeoPackage is a SQLite
 * database; the feature table's geometry column holds "GP" blobs, i.e. a small
 * header followed by standard WKB, which wkx decodes into GeoJSON geometry.
 */

import Database from 'better-sqlite3';
import { Geometry } from 'wkx';
import type { RawHazardFeature, RawHazardLayer } from '../types';
import { WGS84, normalizeCrs, registerCrs } from './crs';
import { isPolygonal } from './geojson';

// Envelope byte length by the flags' envelope indicator (bits 1-3)
const ENVELOPE_SIZES: readonly number[] = [0, 32, 48, 48, 64];

export interface GeoPackageGeometryHeader {
  srsId: number;
  empty: boolean;
  wkb: Buffer;
}

interface LayerRow {
  tableName: string;
  columnName: string;
  srsId: number;
}

interface SpatialRefRow {
  organization: string | null;
  coordsysId: number | null;
  definition: string | null;
}

export function parseGeoPackageGeometry(blob: Buffer): GeoPackageGeometryHeader {
  if (blob.length < 8 || blob[0] !== 0x47 || blob[1] !== 0x50) {
    throw new Error('Not a GeoPackage geometry blob');
  }

  const flags = blob[3];
  const littleEndian = (flags & 0x01) === 1;
  const envelopeIndicator = (flags >> 1) & 0x07;
  if (envelopeIndicator >= ENVELOPE_SIZES.length) {
    throw new Error(`Invalid GeoPackage envelope indicator ${envelopeIndicator}`);
  }

  const srsId = littleEndian ? blob.readInt32LE(4) : blob.readInt32BE(4);
  const offset = 8 + ENVELOPE_SIZES[envelopeIndicator];
  if (blob.length < offset) {
    throw new Error('Truncated GeoPackage geometry blob');
  }

  return {
    srsId,
    empty: ((flags >> 4) & 0x01) === 1,
    wkb: blob.subarray(offset),
  };
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function findLayer(db: Database.Database, layer?: string): LayerRow {
  const sql = `
    SELECT c.table_name AS tableName, g.column_name AS columnName, g.srs_id AS srsId
    FROM gpkg_contents c
    JOIN gpkg_geometry_columns g ON g.table_name = c.table_name
    WHERE c.data_type = 'features' ${layer ? 'AND c.table_name = ?' : ''}
    ORDER BY c.rowid
    LIMIT 1
  `;
  const stmt = db.prepare<unknown[], LayerRow>(sql);
  const row = layer ? stmt.get(layer) : stmt.get();

  if (!row) {
    throw new Error(layer ? `GeoPackage has no feature layer named ${layer}` : 'GeoPackage has no feature layers');
  }
  return row;
}

/**
 * Resolves a GeoPackage srs_id to a CRS name proj4 can use, registering the
 * stored WKT definition when the code is not built in.
 */
function resolveCrs(db: Database.Database, srsId: number): string {
  // 0 and -1 are the reserved "undefined geographic/cartesian" systems
  if (srsId === 0 || srsId === -1) {
    return WGS84;
  }

  const row = db
    .prepare<[number], SpatialRefRow>(
      `SELECT organization, organization_coordsys_id AS coordsysId, definition
       FROM gpkg_spatial_ref_sys WHERE srs_id = ?`
    )
    .get(srsId);

  if (!row) {
    throw new Error(`GeoPackage references unknown srs_id ${srsId}`);
  }

  const organization = (row.organization ?? '').trim().toUpperCase();
  const code = normalizeCrs(
    organization && row.coordsysId !== null ? `${organization}:${row.coordsysId}` : `GPKG:${srsId}`
  );

  if (code !== WGS84) {
    registerCrs(code, row.definition);
  }
  return code;
}

function toRawFeature(row: Record<string, unknown>, geometryColumn: string): RawHazardFeature | null {
  const blob = row[geometryColumn];
  if (!Buffer.isBuffer(blob)) {
    return null;
  }

  const header = parseGeoPackageGeometry(blob);
  if (header.empty) {
    return null;
  }

  const geometry = Geometry.parse(header.wkb).toGeoJSON();
  if (!isPolygonal(geometry)) {
    return null;
  }

  const properties: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    if (key !== geometryColumn) properties[key] = value;
  }
  return { properties, geometry };
}

export function readGeoPackageLayer(filePath: string, layer?: string): RawHazardLayer {
  const db = new Database(filePath, { readonly: true, fileMustExist: true });

  try {
    const { tableName, columnName, srsId } = findLayer(db, layer);
    const crs = resolveCrs(db, srsId);

    const features: RawHazardFeature[] = [];
    const rows = db.prepare<[], Record<string, unknown>>(`SELECT * FROM ${quoteIdentifier(tableName)}`).iterate();
    for (const row of rows) {
      const feature = toRawFeature(row, columnName);
      if (feature) features.push(feature);
    }

    return { crs, features };
  } finally {
    db.close();
  }
}
