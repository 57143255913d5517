/**
 * Default settings shared by the library and the CLI.
 */

/** Retry rounds after the first dispatch before giving up */
export const DEFAULT_MAX_RETRIES = 10;

/** Pause before each retry round (no backoff) */
export const DEFAULT_RETRY_DELAY_MS = 0;

/** Per-request timeout enforced by the HTTP providers */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export const ARCGIS_BASE_URL =
  'https://geocode.arcgis.com/arcgis/rest/services/World/GeocodeServer';

export const NOMINATIM_BASE_URL = 'https://nominatim.openstreetmap.org';

export const DEFAULT_USER_AGENT = 'address-geocoder/1.0';

/** Column names appended by the CLI */
export const FULL_ADDRESS_COLUMN = 'full_address';
export const LAT_LON_COLUMN = 'lat_lon';
