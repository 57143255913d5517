/**
 * Function-style entry points over the composer and the engine.
 *
 * @example
 * ```typescript
 * const addresses = composeAddresses([streets, cities, postcodes]);
 * const coordinates = await fetchCoordinates(addresses, { concurrency: 4 });
 * ```
 */

import type { AddressField, GeocodingProvider, ResolutionOutcome } from './core/types.js';
import { createGeocodingProvider } from './providers/index.js';
import { AddressComposer } from './services/address-composer.js';
import { ResolutionEngine, type ResolutionEngineOptions } from './services/resolution-engine.js';

/**
 * Compose one address per record; see `AddressComposer.composeAddresses`
 */
export function composeAddresses(fields: readonly AddressField[]): string[] {
  return new AddressComposer().composeAddresses(fields);
}

export interface FetchCoordinatesOptions extends Omit<ResolutionEngineOptions, 'provider'> {
  /** Defaults to the ArcGIS World geocoder */
  readonly provider?: GeocodingProvider;
}

/**
 * Resolve addresses with bounded retry; see `ResolutionEngine.fetchCoordinates`
 */
export async function fetchCoordinates(
  addresses: readonly string[],
  options: FetchCoordinatesOptions = {}
): Promise<ResolutionOutcome[]> {
  const engine = new ResolutionEngine({
    ...options,
    provider: options.provider ?? createGeocodingProvider({ name: 'arcgis' }),
  });
  return engine.fetchCoordinates(addresses);
}
