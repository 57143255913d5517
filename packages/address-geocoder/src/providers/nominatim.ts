/**
 * Nominatim Provider (OpenStreetMap, Global)
 *
 * Free-text search against a Nominatim instance. The public instance
 * requires a User-Agent and allows about one request per second, so keep
 * concurrency low against it; self-hosted instances have no such limit.
 */

import { z } from 'zod';
import type { CoordinatePair, GeocodingProvider } from '../core/types.js';
import { GeocodeError, GeocodeErrorCode } from '../core/errors.js';
import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  NOMINATIM_BASE_URL,
} from '../core/constants.js';
import { fetchJson } from './http.js';

// Nominatim returns coordinates as decimal strings
const NominatimResponseSchema = z.array(
  z.object({
    lat: z.string(),
    lon: z.string(),
    display_name: z.string().optional(),
    importance: z.number().optional(),
  })
);

export interface NominatimProviderOptions {
  readonly baseUrl?: string;
  readonly userAgent?: string;
  readonly timeoutMs?: number;
}

export class NominatimProvider implements GeocodingProvider {
  readonly name = 'nominatim';
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(options: NominatimProviderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? NOMINATIM_BASE_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async geocode(address: string): Promise<CoordinatePair> {
    const query = address.trim();
    if (!query) {
      throw new GeocodeError('Address is empty', GeocodeErrorCode.INVALID_ADDRESS, this.name);
    }

    const params = new URLSearchParams({
      q: query,
      format: 'json',
      limit: '1',
    });

    const data = await fetchJson(`${this.baseUrl}/search?${params}`, NominatimResponseSchema, {
      provider: this.name,
      timeoutMs: this.timeoutMs,
      headers: { 'User-Agent': this.userAgent },
    });

    const result = data[0];
    if (!result) {
      throw new GeocodeError('Address not found', GeocodeErrorCode.NOT_FOUND, this.name);
    }

    const latitude = parseFloat(result.lat);
    const longitude = parseFloat(result.lon);
    if (Number.isNaN(latitude) || Number.isNaN(longitude)) {
      throw new GeocodeError(
        `Unparseable coordinates: ${result.lat},${result.lon}`,
        GeocodeErrorCode.PROVIDER_ERROR,
        this.name
      );
    }

    return { latitude, longitude };
  }
}
