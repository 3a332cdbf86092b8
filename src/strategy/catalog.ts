/**
 * Closed catalog of price transforms.
 *
 * Every entry is a pure `integer -> integer` function. The catalog is
 * fixed at import time; {@link StrategyResolver} never invents a default.
 */

import { MalformedInputError } from '../types/errors.js';

/**
 * A catalog entry.
 */
export interface Strategy {
  /** Catalog identifier, e.g. 'flat-percentage' */
  readonly id: string;

  /** Short numeric code accepted as an alias for the id, e.g. '1' */
  readonly code: string;

  readonly description: string;

  apply(price: number): number;
}

/**
 * Discount tier: prices at or above `threshold` get `discount` off.
 */
export interface DiscountTier {
  readonly threshold: number;
  readonly discount: number;
}

export const DEFAULT_TIERS: readonly DiscountTier[] = [
  { threshold: 100, discount: 5 },
  { threshold: 150, discount: 15 },
  { threshold: 200, discount: 25 },
  { threshold: 300, discount: 40 },
];

function assertPrice(price: number): void {
  if (!Number.isSafeInteger(price)) {
    throw new MalformedInputError(`Price must be an integer, got ${price}`, String(price));
  }
}

/**
 * `price * percent / 100`, rounded half up.
 */
export function percentageOf(price: number, percent: number): number {
  return Math.floor((price * percent + 50) / 100);
}

/**
 * Strategy charging a fixed percentage of the price.
 */
export function flatPercentage(id: string, code: string, percent: number): Strategy {
  return {
    id,
    code,
    description: `Charge ${percent}% of the price, rounded half up`,
    apply(price: number): number {
      assertPrice(price);
      return percentageOf(price, percent);
    },
  };
}

/**
 * Strategy subtracting the discount of the highest tier whose threshold is
 * at or below the price. Prices below every threshold are unchanged.
 */
export function tieredThreshold(
  id: string,
  code: string,
  tiers: readonly DiscountTier[]
): Strategy {
  const descending = [...tiers].sort((a, b) => b.threshold - a.threshold);

  return {
    id,
    code,
    description: `Subtract a discount chosen by price tier (${descending
      .map((tier) => `${tier.threshold}->${tier.discount}`)
      .join(', ')})`,
    apply(price: number): number {
      assertPrice(price);
      const tier = descending.find((candidate) => candidate.threshold <= price);
      return tier ? price - tier.discount : price;
    },
  };
}

export const FLAT_PERCENTAGE = flatPercentage('flat-percentage', '1', 90);
export const TIERED_THRESHOLD = tieredThreshold('tiered-threshold', '2', DEFAULT_TIERS);

export const DEFAULT_CATALOG: readonly Strategy[] = [FLAT_PERCENTAGE, TIERED_THRESHOLD];
