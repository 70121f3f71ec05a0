import type { BBox, MultiPolygon, Polygon } from 'geojson';

export type HazardGeometry = Polygon | MultiPolygon;

// One polygon of the hazard dataset with its label
export interface HazardFeature {
  label: string | null;
  geometry: HazardGeometry;
  bbox: BBox;
}

export interface HazardDataset {
  source: string;
  // Normalized CRS name, e.g. EPSG:4326
  crs: string;
  hazardField: string;
  features: ReadonlyArray<Readonly<HazardFeature>>;
}

// Raw polygon read from a dataset file, before labels are normalized
export interface RawHazardFeature {
  properties: Record<string, unknown>;
  geometry: HazardGeometry;
}

export interface RawHazardLayer {
  crs: string;
  features: RawHazardFeature[];
}

export interface GeoLocation {
  latitude: number;
  longitude: number;
}

export interface HazardResult {
  hazard: string;
  matched: boolean;
  mapPath: string | null;
}

// Body of GET /check_flood_hazard
export interface HazardCheckResponse {
  hazard: string;
  map_available: boolean;
  map_url?: string;
}

// Body of GET /flood-hazard
export interface CoordinateHazardResponse extends HazardCheckResponse {
  matched: boolean;
  coordinates: { lat: number; lng: number };
}

export interface ErrorResponse {
  status: 'error';
  statusCode: number;
  error: string;
  stack?: string;
  [detail: string]: string | number | boolean | null | undefined;
}

// CLI types
export interface LookupOptions {
  latitude?: string;
  longitude?: string;
}

export interface LocateOptions {
  ip?: string;
}

export interface CheckOptions {
  ip?: string;
  host: string;
}

export interface HealthOptions {
  host: string;
}
