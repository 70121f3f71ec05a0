/**
 * src/lib/map-store.ts
 *
 * Hands out short-lived map references. Each hazard response that has a map gets
 * its own id, so concurrent visitors never read each other's map.
 */

import { randomUUID } from 'crypto';
import path from 'path';
import { LRUCache } from '../utils/LRUCache';
import { fileExists } from '../utils/datasetHelpers';

export interface MapStoreOptions {
  dir: string;
  cacheSize: number;
  ttlMs: number;
}

/**
 * Turns a hazard label into the file name stem of its pre-generated map,
 * e.g. "Very High" -> "very-high".
 */
export function mapSlug(label: string): string {
  return label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export class MapStore {
  private readonly entries: LRUCache<string>;

  constructor(private readonly options: MapStoreOptions) {
    this.entries = new LRUCache<string>({ maxSize: options.cacheSize, ttlMs: options.ttlMs });
  }

  /** Path of the pre-generated map for `label`, or null when there is none. */
  async findMapForLabel(label: string): Promise<string | null> {
    const slug = mapSlug(label);
    if (!slug) return null;

    const mapPath = path.join(this.options.dir, `${slug}.png`);
    return (await fileExists(mapPath)) ? mapPath : null;
  }

  register(mapPath: string): string {
    const id = randomUUID();
    this.entries.set(id, mapPath);
    return id;
  }

  resolve(id: string): string | undefined {
    return this.entries.get(id);
  }
}
