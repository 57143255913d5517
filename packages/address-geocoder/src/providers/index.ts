/**
 * Geocoding provider selection.
 *
 * Provider choice is configuration, not code: callers ask for a provider
 * by name and get something that satisfies `GeocodingProvider`.
 */

import type { GeocodingProvider } from '../core/types.js';
import { ArcGISProvider } from './arcgis.js';
import { NominatimProvider } from './nominatim.js';

export { ArcGISProvider, type ArcGISProviderOptions } from './arcgis.js';
export { NominatimProvider, type NominatimProviderOptions } from './nominatim.js';

export const PROVIDER_NAMES = ['arcgis', 'nominatim'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export interface ProviderConfig {
  readonly name: ProviderName;
  readonly baseUrl?: string;
  /** ArcGIS only */
  readonly token?: string;
  /** Nominatim only */
  readonly userAgent?: string;
  readonly timeoutMs?: number;
}

/**
 * Build the configured provider
 */
export function createGeocodingProvider(config: ProviderConfig): GeocodingProvider {
  switch (config.name) {
    case 'arcgis':
      return new ArcGISProvider({
        baseUrl: config.baseUrl,
        token: config.token,
        timeoutMs: config.timeoutMs,
      });

    case 'nominatim':
      return new NominatimProvider({
        baseUrl: config.baseUrl,
        userAgent: config.userAgent,
        timeoutMs: config.timeoutMs,
      });
  }
}
