/**
 * Version attribute for optimistic concurrency control.
 */

import type { AttributeOptions } from './attribute.js';
import { NumberAttribute } from './scalar.js';

/**
 * Number attribute holding the item's version. The mapper sets it to 1 on the
 * first save and increments it on every conditional write; at most one per model.
 */
export class VersionAttribute<N extends boolean = true> extends NumberAttribute<N> {
  constructor(options: Omit<AttributeOptions<number, N>, 'hashKey' | 'rangeKey' | 'default'> = {}) {
    super(options);
  }

  protected override get nullableByDefault(): boolean {
    return true;
  }

  override get isVersion(): boolean {
    return true;
  }
}
