/**
 * Address Composer
 *
 * Builds one canonical address string per record from several aligned
 * field sequences (street, city, postal code, ...), and warns when two
 * records compose to the same string.
 */

import type { AddressField } from '../core/types.js';
import { InvalidInputError } from '../core/errors.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';

export interface AddressComposerOptions {
  readonly logger?: Logger;
}

/**
 * Every occurrence after the first of an exact-match string.
 *
 * @example
 * ```typescript
 * findDuplicateAddresses(['a', 'b', 'a', 'a']); // ['a', 'a']
 * ```
 */
export function findDuplicateAddresses(addresses: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];

  for (const address of addresses) {
    if (seen.has(address)) {
      duplicates.push(address);
    }
    seen.add(address);
  }

  return duplicates;
}

/**
 * Absent values become empty, commas are dropped so the composed string
 * stays safe for CSV-like consumers.
 */
function cleanFieldValue(value: string | null | undefined): string {
  return (value ?? '').replace(/,/g, '').trim();
}

export class AddressComposer {
  private readonly logger: Logger;
  private composed: readonly string[] | null = null;

  constructor(options: AddressComposerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Result of the most recent `composeAddresses` call
   */
  get lastComposed(): readonly string[] | null {
    return this.composed;
  }

  /**
   * Join the cleaned values of each record with single spaces.
   *
   * @param fields - One sequence per address component, all the same length
   * @returns One composed address per record, in input order
   * @throws InvalidInputError when no fields are given or lengths differ
   */
  composeAddresses(fields: readonly AddressField[]): string[] {
    const [first] = fields;
    if (first === undefined) {
      throw new InvalidInputError('At least one address field sequence is required');
    }

    const recordCount = first.length;
    fields.forEach((field, position) => {
      if (field.length !== recordCount) {
        throw new InvalidInputError(
          `Address field ${position} has ${field.length} values, expected ${recordCount}`
        );
      }
    });

    const addresses: string[] = [];
    for (let row = 0; row < recordCount; row++) {
      addresses.push(fields.map((field) => cleanFieldValue(field[row])).join(' '));
    }

    const duplicates = findDuplicateAddresses(addresses);
    if (duplicates.length > 0) {
      this.logger.warn('Duplicated addresses found after address processing', {
        count: duplicates.length,
      });
    }

    this.composed = addresses;
    return addresses;
  }
}
