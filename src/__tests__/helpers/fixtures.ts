import fs from 'fs';
import http from 'http';
import os from 'os';
import path from 'path';
import Database from 'better-sqlite3';
import type { Express } from 'express';
import type { Geometry as GeoJsonGeometry, Polygon } from 'geojson';
import { Geometry } from 'wkx';

export const HAZARD_FIELD = 'SOIL_FLOOD_HAZARD';

// Sphere radius used by EPSG:3857
const MERCATOR_RADIUS = 6378137;

// PNG signature followed by filler bytes; enough for content checks
export const FAKE_PNG = Buffer.concat([
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  Buffer.from('test-map-image'),
]);

export function box(minX: number, minY: number, maxX: number, maxY: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [minX, minY],
        [maxX, minY],
        [maxX, maxY],
        [minX, maxY],
        [minX, minY],
      ],
    ],
  };
}

/** The WGS84 box projected to EPSG:3857 corner by corner. */
export function mercatorBox(minLng: number, minLat: number, maxLng: number, maxLat: number): Polygon {
  const x = (lng: number) => (MERCATOR_RADIUS * lng * Math.PI) / 180;
  const y = (lat: number) => MERCATOR_RADIUS * Math.log(Math.tan(Math.PI / 4 + (lat * Math.PI) / 360));
  return box(x(minLng), y(minLat), x(maxLng), y(maxLat));
}

export async function makeTempDir(prefix = 'flood-hazard-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

interface BlobOptions {
  bigEndian?: boolean;
  envelope?: boolean;
  empty?: boolean;
}

/** Encodes a geometry as a GeoPackage binary blob ("GP" header + WKB). */
export function geoPackageBlob(geometry: GeoJsonGeometry, srsId: number, options: BlobOptions = {}): Buffer {
  const { bigEndian = false, envelope = false, empty = false } = options;
  const header = Buffer.alloc(8);
  header.write('GP', 0, 'ascii');
  header[2] = 0;
  header[3] = (bigEndian ? 0 : 1) | (envelope ? 1 << 1 : 0) | (empty ? 1 << 4 : 0);
  if (bigEndian) {
    header.writeInt32BE(srsId, 4);
  } else {
    header.writeInt32LE(srsId, 4);
  }

  if (empty) {
    return header;
  }

  const envelopeBytes = Buffer.alloc(envelope ? 32 : 0);
  if (envelope) {
    // min_x, max_x, min_y, max_y; readers skip it
    [0, 1, 2, 3].forEach(i => {
      if (bigEndian) envelopeBytes.writeDoubleBE(i, i * 8);
      else envelopeBytes.writeDoubleLE(i, i * 8);
    });
  }

  return Buffer.concat([header, envelopeBytes, Geometry.parseGeoJSON(geometry).toWkb()]);
}

export interface FixtureFeature {
  geometry: GeoJsonGeometry | null;
  properties: Record<string, string | number | null>;
  empty?: boolean;
}

export interface GeoPackageFixture {
  table?: string;
  srsId?: number;
  organization?: string;
  coordsysId?: number;
  definition?: string;
  features: FixtureFeature[];
  // Extra feature tables written before the main one
  extraTables?: string[];
}

function quote(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Writes a minimal GeoPackage with one polygon feature table. */
export function writeGeoPackage(filePath: string, fixture: GeoPackageFixture): void {
  const {
    table = 'flood_zones',
    srsId = 4326,
    organization = 'EPSG',
    coordsysId = srsId,
    definition = 'undefined',
    features,
    extraTables = [],
  } = fixture;

  const db = new Database(filePath);
  try {
    db.exec(`
      CREATE TABLE gpkg_spatial_ref_sys (
        srs_name TEXT NOT NULL,
        srs_id INTEGER PRIMARY KEY,
        organization TEXT NOT NULL,
        organization_coordsys_id INTEGER NOT NULL,
        definition TEXT NOT NULL,
        description TEXT
      );
      CREATE TABLE gpkg_contents (
        table_name TEXT NOT NULL PRIMARY KEY,
        data_type TEXT NOT NULL,
        identifier TEXT UNIQUE,
        description TEXT DEFAULT '',
        srs_id INTEGER
      );
      CREATE TABLE gpkg_geometry_columns (
        table_name TEXT NOT NULL,
        column_name TEXT NOT NULL,
        geometry_type_name TEXT NOT NULL,
        srs_id INTEGER NOT NULL,
        z TINYINT NOT NULL,
        m TINYINT NOT NULL,
        PRIMARY KEY (table_name, column_name)
      );
    `);

    db.prepare(
      `INSERT INTO gpkg_spatial_ref_sys (srs_name, srs_id, organization, organization_coordsys_id, definition)
       VALUES (?, ?, ?, ?, ?)`
    ).run(`test ${srsId}`, srsId, organization, coordsysId, definition);

    // A non-spatial table that readers must ignore
    db.exec(`CREATE TABLE notes (id INTEGER PRIMARY KEY, text TEXT)`);
    db.prepare(`INSERT INTO gpkg_contents (table_name, data_type, identifier) VALUES ('notes', 'attributes', 'notes')`).run();

    const columns = Array.from(new Set(features.flatMap(feature => Object.keys(feature.properties))));

    for (const name of [...extraTables, table]) {
      const columnSql = columns.map(column => `, ${quote(column)}`).join('');
      db.exec(`CREATE TABLE ${quote(name)} (fid INTEGER PRIMARY KEY AUTOINCREMENT, geom BLOB${columnSql})`);
      db.prepare(`INSERT INTO gpkg_contents (table_name, data_type, identifier, srs_id) VALUES (?, 'features', ?, ?)`).run(
        name,
        name,
        srsId
      );
      db.prepare(
        `INSERT INTO gpkg_geometry_columns (table_name, column_name, geometry_type_name, srs_id, z, m)
         VALUES (?, 'geom', 'MULTIPOLYGON', ?, 0, 0)`
      ).run(name, srsId);
    }

    const placeholders = columns.map(() => ', ?').join('');
    const columnList = columns.map(column => `, ${quote(column)}`).join('');
    const insert = db.prepare(`INSERT INTO ${quote(table)} (geom${columnList}) VALUES (?${placeholders})`);

    for (const feature of features) {
      const blob = feature.empty
        ? geoPackageBlob(box(0, 0, 1, 1), srsId, { empty: true })
        : feature.geometry
          ? geoPackageBlob(feature.geometry, srsId)
          : null;
      insert.run(blob, ...columns.map(column => feature.properties[column] ?? null));
    }
  } finally {
    db.close();
  }
}

export interface RunningServer {
  url: string;
  close(): Promise<void>;
}

/** Serves `app` on an ephemeral loopback port. */
export async function startServer(app: Express): Promise<RunningServer> {
  const server = http.createServer(app);
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(err => (err ? reject(err) : resolve()));
      }),
  };
}
