/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

export { registerComposeCommand, runCompose, type ComposeOptions, type ComposeResult } from './compose.js';
export {
  registerGeocodeCommand,
  runGeocode,
  defaultOutputPath,
  type GeocodeOptions,
  type GeocodeSummary,
  type GeocodeDependencies,
} from './geocode.js';
