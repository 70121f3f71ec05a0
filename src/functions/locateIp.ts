/**
 * src/functions/locateIp.ts
 *
 * Geolocates an IP address through a geojs-compatible HTTP service
 * (`/v1/ip/geo/<ip>.json`, or `/v1/ip/geo.json` for the caller's own address).
 */

import * as Joi from 'joi';
import fetch from 'node-fetch';
import type { GeoLocation } from '../types';
import { logger, describeError } from '../utils/logger';

export interface GeolocationOptions {
  baseUrl: string;
  timeoutMs: number;
}

// The upstream sends coordinates as numeric strings; Joi converts them
const geoResponseSchema = Joi.object<GeoLocation>({
  latitude: Joi.number().min(-90).max(90).required(),
  longitude: Joi.number().min(-180).max(180).required(),
})
  .unknown()
  .required();

export function buildGeolocationUrl(baseUrl: string, ip?: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  return ip ? `${base}/v1/ip/geo/${encodeURIComponent(ip)}.json` : `${base}/v1/ip/geo.json`;
}

export class GeolocationClient {
  constructor(private readonly options: GeolocationOptions) {}

  /**
   * Returns the coordinates for `ip`, or for the calling host when no IP is given.
   * Any failure (network error, timeout, non-2xx status, unusable body) yields null.
   */
  async locate(ip?: string): Promise<GeoLocation | null> {
    const url = buildGeolocationUrl(this.options.baseUrl, ip);

    let body: unknown;
    try {
      const res = await fetch(url, { timeout: this.options.timeoutMs });
      if (!res.ok) {
        logger.warn('Geolocation request failed', { url, status: res.status });
        return null;
      }
      body = await res.json();
    } catch (err) {
      logger.warn('Failed to get location details', { url, error: describeError(err) });
      return null;
    }

    const { error, value } = geoResponseSchema.validate(body);
    if (error) {
      logger.warn('Could not determine coordinates from IP', { ip, reason: error.message });
      return null;
    }

    return { latitude: value.latitude, longitude: value.longitude };
  }
}
