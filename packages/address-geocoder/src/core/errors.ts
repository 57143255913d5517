/**
 * Address Geocoder Error Types
 *
 * Only structural problems (misaligned inputs, bad settings, unreadable
 * configuration) surface as thrown errors. Remote lookup failures are
 * `GeocodeError`s that the resolution engine absorbs into its retry loop.
 */

/**
 * Base class for every error the library throws on purpose
 */
export class AddressGeocoderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AddressGeocoderError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Malformed caller input: misaligned field sequences, misaligned
 * address/index lists, non-positive concurrency, negative retry ceiling.
 *
 * Fatal. No partial result is produced.
 */
export class InvalidInputError extends AddressGeocoderError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Configuration file could not be read or failed validation
 */
export class ConfigError extends AddressGeocoderError {
  constructor(
    message: string,
    public readonly configPath: string | null = null
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export enum GeocodeErrorCode {
  INVALID_ADDRESS = 'INVALID_ADDRESS',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
}

/**
 * A single lookup failed at the provider boundary
 */
export class GeocodeError extends AddressGeocoderError {
  constructor(
    message: string,
    public readonly code: GeocodeErrorCode,
    public readonly provider: string
  ) {
    super(message);
    this.name = 'GeocodeError';
  }
}
