/**
 * ArcGIS World Geocoding Provider
 *
 * Single-line address search against an ArcGIS GeocodeServer
 * (`findAddressCandidates`). The public World service answers without a
 * token for non-stored geocoding; a token is sent when configured.
 *
 * Coordinates come back in WGS84 because the request asks for outSR=4326:
 * `location.x` is the longitude, `location.y` the latitude.
 */

import { z } from 'zod';
import type { CoordinatePair, GeocodingProvider } from '../core/types.js';
import { GeocodeError, GeocodeErrorCode } from '../core/errors.js';
import { ARCGIS_BASE_URL, DEFAULT_REQUEST_TIMEOUT_MS } from '../core/constants.js';
import { fetchJson } from './http.js';

const ArcGISResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        address: z.string().optional(),
        location: z.object({
          x: z.number(),
          y: z.number(),
        }),
        score: z.number().optional(),
      })
    )
    .optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string(),
    })
    .optional(),
});

export interface ArcGISProviderOptions {
  readonly baseUrl?: string;
  readonly token?: string;
  readonly timeoutMs?: number;
}

export class ArcGISProvider implements GeocodingProvider {
  readonly name = 'arcgis';
  private readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: ArcGISProviderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? ARCGIS_BASE_URL).replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async geocode(address: string): Promise<CoordinatePair> {
    const singleLine = address.trim();
    if (!singleLine) {
      throw new GeocodeError('Address is empty', GeocodeErrorCode.INVALID_ADDRESS, this.name);
    }

    const params = new URLSearchParams({
      SingleLine: singleLine,
      f: 'json',
      maxLocations: '1',
      outSR: '4326',
    });
    if (this.token) {
      params.set('token', this.token);
    }

    const data = await fetchJson(
      `${this.baseUrl}/findAddressCandidates?${params}`,
      ArcGISResponseSchema,
      { provider: this.name, timeoutMs: this.timeoutMs }
    );

    // ArcGIS reports service errors with HTTP 200 and an error body
    if (data.error) {
      throw new GeocodeError(data.error.message, GeocodeErrorCode.PROVIDER_ERROR, this.name);
    }

    const best = data.candidates?.[0];
    if (!best) {
      throw new GeocodeError('Address not found', GeocodeErrorCode.NOT_FOUND, this.name);
    }

    return {
      latitude: best.location.y,
      longitude: best.location.x,
    };
  }
}
