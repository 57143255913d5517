/**
 * JSON-over-HTTP helper shared by the geocoding providers.
 *
 * Maps every transport failure onto a `GeocodeError` so providers only
 * deal with response bodies.
 */

import type { z } from 'zod';
import { GeocodeError, GeocodeErrorCode } from '../core/errors.js';

export interface FetchJsonOptions {
  readonly provider: string;
  readonly timeoutMs: number;
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * GET `url`, enforce a timeout, and validate the JSON body with `schema`.
 *
 * @throws GeocodeError - TIMEOUT, NETWORK_ERROR, RATE_LIMIT_EXCEEDED
 *   (HTTP 429) or PROVIDER_ERROR (other non-2xx, unparseable or
 *   unexpected body)
 */
export async function fetchJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: FetchJsonOptions
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json', ...options.headers },
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new GeocodeError(
        `Request timed out after ${options.timeoutMs}ms`,
        GeocodeErrorCode.TIMEOUT,
        options.provider
      );
    }

    throw new GeocodeError(
      error instanceof Error ? error.message : 'Unknown error',
      GeocodeErrorCode.NETWORK_ERROR,
      options.provider
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (response.status === 429) {
    throw new GeocodeError('Rate limit exceeded (HTTP 429)', GeocodeErrorCode.RATE_LIMIT_EXCEEDED, options.provider);
  }

  if (!response.ok) {
    throw new GeocodeError(
      `HTTP ${response.status}`,
      GeocodeErrorCode.PROVIDER_ERROR,
      options.provider
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    throw new GeocodeError('Response body is not valid JSON', GeocodeErrorCode.PROVIDER_ERROR, options.provider);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new GeocodeError(
      `Unexpected response shape: ${parsed.error.errors[0]?.message ?? 'invalid body'}`,
      GeocodeErrorCode.PROVIDER_ERROR,
      options.provider
    );
  }

  return parsed.data;
}
