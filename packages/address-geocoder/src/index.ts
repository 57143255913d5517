/**
 * Address Geocoder
 *
 * Compose addresses from raw fields and resolve them to coordinates with
 * concurrent dispatch and bounded retry of failed lookups.
 *
 * @packageDocumentation
 */

export type {
  AddressField,
  BatchResult,
  CoordinatePair,
  GeocodingProvider,
  Index,
  IndexMap,
  ResolutionOutcome,
  RoundSummary,
} from './core/types.js';
export { formatCoordinatePair, isCoordinatePair } from './core/types.js';

export {
  AddressGeocoderError,
  ConfigError,
  GeocodeError,
  GeocodeErrorCode,
  InvalidInputError,
} from './core/errors.js';

export * from './core/constants.js';
export { logger, createLogger, Logger, type LogLevel, type LogMetadata } from './core/utils/logger.js';

export { AddressComposer, findDuplicateAddresses, type AddressComposerOptions } from './services/address-composer.js';
export { ResolutionEngine, type ResolutionEngineOptions } from './services/resolution-engine.js';
export { runWithConcurrency, resolveConcurrency, hostParallelism } from './resilience/worker-pool.js';

export * from './providers/index.js';
export { loadConfig, DEFAULT_CONFIG, type GeocoderConfig, type LoadConfigOptions } from './cli/lib/config.js';

export { composeAddresses, fetchCoordinates, type FetchCoordinatesOptions } from './geocoder.js';
