/**
 * Resolution Engine
 *
 * Turns an ordered address sequence into a positionally aligned sequence
 * of coordinates.
 *
 * ALGORITHM:
 * 1. Pair every address with its original index (0..N-1)
 * 2. Dispatch all lookups through a bounded worker pool (round 0)
 * 3. Write successes into a preallocated output at their index
 * 4. While indices still fail and the retry ceiling is not reached,
 *    re-dispatch only the failed `index → address` map
 * 5. Return the output; `null` entries are addresses that never resolved
 *
 * Lookup failures never escape: every provider error collapses to `null`
 * and makes the index eligible for the next round. Identical addresses
 * are looked up independently, one call per index.
 */

import type {
  BatchResult,
  CoordinatePair,
  GeocodingProvider,
  Index,
  IndexMap,
  ResolutionOutcome,
  RoundSummary,
} from '../core/types.js';
import { isCoordinatePair } from '../core/types.js';
import { InvalidInputError } from '../core/errors.js';
import { DEFAULT_MAX_RETRIES, DEFAULT_RETRY_DELAY_MS } from '../core/constants.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { resolveConcurrency, runWithConcurrency } from '../resilience/worker-pool.js';

export interface ResolutionEngineOptions {
  /** Geocoding collaborator used for every lookup */
  readonly provider: GeocodingProvider;
  /** Retry rounds after the first dispatch (default: 10) */
  readonly maxRetries?: number;
  /** Pause before each retry round in milliseconds (default: 0) */
  readonly retryDelayMs?: number;
  /** Default worker count when a call does not pass one */
  readonly concurrency?: number;
  /** Called after every round, including the initial dispatch */
  readonly onRound?: (summary: RoundSummary) => void;
  readonly logger?: Logger;
}

export class ResolutionEngine {
  private readonly provider: GeocodingProvider;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly concurrency: number | undefined;
  private readonly onRound: ((summary: RoundSummary) => void) | undefined;
  private readonly logger: Logger;
  private coordinates: readonly ResolutionOutcome[] | null = null;

  constructor(options: ResolutionEngineOptions) {
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new InvalidInputError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
    }

    const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
      throw new InvalidInputError(`retryDelayMs must be >= 0, got ${retryDelayMs}`);
    }

    if (options.concurrency !== undefined) {
      resolveConcurrency(options.concurrency);
    }

    this.provider = options.provider;
    this.maxRetries = maxRetries;
    this.retryDelayMs = retryDelayMs;
    this.concurrency = options.concurrency;
    this.onRound = options.onRound;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Result of the most recent `fetchCoordinates` call
   */
  get lastCoordinates(): readonly ResolutionOutcome[] | null {
    return this.coordinates;
  }

  /**
   * Look up a single address. Never throws and never retries.
   *
   * Any provider rejection, and any result that is not a finite
   * coordinate pair, is reported as `null`.
   */
  async resolveOne(address: string): Promise<CoordinatePair | null> {
    try {
      const result: unknown = await this.provider.geocode(address);
      if (!isCoordinatePair(result)) {
        this.logger.debug('Provider returned no usable coordinates', {
          provider: this.provider.name,
          address,
        });
        return null;
      }

      return { latitude: result.latitude, longitude: result.longitude };
    } catch (error) {
      this.logger.debug('Lookup failed', {
        provider: this.provider.name,
        address,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Run one round: look up every (address, index) pair concurrently and
   * partition the outcomes by original index.
   *
   * @param addresses - Addresses to look up
   * @param indices - Original index of each address, same length
   * @param concurrency - Worker count, clamped to host parallelism
   * @throws InvalidInputError on misaligned lists or invalid concurrency
   */
  async dispatchBatch(
    addresses: readonly string[],
    indices: readonly Index[],
    concurrency?: number
  ): Promise<BatchResult> {
    if (addresses.length !== indices.length) {
      throw new InvalidInputError(
        `Got ${addresses.length} addresses but ${indices.length} indices`
      );
    }

    const workers = resolveConcurrency(concurrency ?? this.concurrency);
    this.logger.info('Getting coordinates', {
      addresses: addresses.length,
      workers: Math.min(workers, addresses.length),
    });

    const outcomes = await runWithConcurrency(addresses, workers, (address) =>
      this.resolveOne(address)
    );

    const failed = new Map<Index, string>();
    const succeeded = new Map<Index, CoordinatePair>();

    outcomes.forEach((outcome, position) => {
      const index = indices[position];
      const address = addresses[position];
      if (index === undefined || address === undefined) return;

      if (outcome === null) {
        failed.set(index, address);
      } else {
        succeeded.set(index, outcome);
      }
    });

    return { outcomes, failed, succeeded };
  }

  /**
   * Resolve every address, retrying only the failed indices.
   *
   * @param addresses - Addresses in their original order
   * @param concurrency - Worker count per round (default: engine setting,
   *   then host parallelism)
   * @returns One entry per address, same order; `null` where unresolved
   */
  async fetchCoordinates(
    addresses: readonly string[],
    concurrency?: number
  ): Promise<ResolutionOutcome[]> {
    const workers = concurrency ?? this.concurrency;
    const output = new Array<ResolutionOutcome>(addresses.length).fill(null);

    if (addresses.length === 0) {
      this.coordinates = output;
      return output;
    }

    const indices = addresses.map((_, index) => index);
    let batch = await this.dispatchBatch(addresses, indices, workers);
    this.splice(output, batch.succeeded);
    this.reportRound(0, addresses.length, batch);

    let pending: IndexMap = batch.failed;
    let retries = 0;

    while (pending.size > 0 && retries < this.maxRetries) {
      this.logger.info('Retrying failed requests', {
        retry: retries + 1,
        maxRetries: this.maxRetries,
        pending: pending.size,
      });

      if (this.retryDelayMs > 0) {
        await this.sleep(this.retryDelayMs);
      }

      batch = await this.dispatchBatch([...pending.values()], [...pending.keys()], workers);
      this.splice(output, batch.succeeded);

      retries++;
      this.reportRound(retries, pending.size, batch);
      pending = batch.failed;
    }

    if (pending.size > 0) {
      this.logger.warn('Some addresses could not be resolved', {
        unresolved: pending.size,
        total: addresses.length,
        retries,
      });
    }

    this.coordinates = output;
    return output;
  }

  /**
   * Write a round's successes into the output at their original index
   */
  private splice(
    output: ResolutionOutcome[],
    succeeded: ReadonlyMap<Index, CoordinatePair>
  ): void {
    for (const [index, pair] of succeeded) {
      output[index] = pair;
    }
  }

  private reportRound(round: number, attempted: number, batch: BatchResult): void {
    this.onRound?.({
      round,
      attempted,
      resolved: batch.succeeded.size,
      remaining: batch.failed.size,
    });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
