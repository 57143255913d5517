import { ConfigError, InvalidInputError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  UNRESOLVED: 1,
  INPUT_ERROR: 2,
  CONFIG_ERROR: 3,
  UNKNOWN_ERROR: 70,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof InvalidInputError) return EXIT_CODES.INPUT_ERROR;
  return EXIT_CODES.UNKNOWN_ERROR;
}
