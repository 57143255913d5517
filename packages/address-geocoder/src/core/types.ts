/**
 * Core types shared by the composer, the resolution engine and providers.
 */

/**
 * WGS84 latitude/longitude for a resolved address
 */
export interface CoordinatePair {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Per-address result: a pair when resolved, `null` when unresolved
 */
export type ResolutionOutcome = CoordinatePair | null;

/**
 * Position of an address in the original input sequence (0-based)
 */
export type Index = number;

/**
 * Entries still needing resolution, keyed by original index
 */
export type IndexMap = ReadonlyMap<Index, string>;

/**
 * Raw field values for one address component, one entry per record
 */
export type AddressField = ReadonlyArray<string | null | undefined>;

/**
 * Outcome of one concurrent round
 */
export interface BatchResult {
  /** One outcome per dispatched address, in dispatch order */
  readonly outcomes: readonly ResolutionOutcome[];
  /** Indices that failed this round, mapped to their address */
  readonly failed: IndexMap;
  /** Indices that resolved this round */
  readonly succeeded: ReadonlyMap<Index, CoordinatePair>;
}

/**
 * Reported after every round; round 0 is the initial dispatch
 */
export interface RoundSummary {
  readonly round: number;
  readonly attempted: number;
  readonly resolved: number;
  readonly remaining: number;
}

/**
 * Geocoding collaborator.
 *
 * Resolves with a coordinate pair or rejects (normally with a
 * `GeocodeError`). The engine does not distinguish failure causes.
 */
export interface GeocodingProvider {
  readonly name: string;
  geocode(address: string): Promise<CoordinatePair>;
}

export function isCoordinatePair(value: unknown): value is CoordinatePair {
  if (typeof value !== 'object' || value === null) return false;
  if (!('latitude' in value) || !('longitude' in value)) return false;
  return (
    typeof value.latitude === 'number' &&
    typeof value.longitude === 'number' &&
    Number.isFinite(value.latitude) &&
    Number.isFinite(value.longitude)
  );
}

/**
 * `lat,lng` text form, e.g. `40.7128,-74.006`
 */
export function formatCoordinatePair(pair: CoordinatePair): string {
  return `${pair.latitude},${pair.longitude}`;
}
