/**
 * Tier Table Construction
 *
 * Validates an ordered list of tier records and freezes it. Checks run in
 * table order and the first violation wins:
 *
 *   empty → first lower bound → per-tier bounds/rate → ordering → gap/overlap
 */

import type { Tier, TierTable } from '../types/pricing';
import { ConfigurationError } from './errors';

function describeTier(tier: Tier, index: number): string {
  return `tier ${index} [${tier.lower}, ${tier.upper}]`;
}

function validateTier(tier: Tier, index: number): void {
  const { lower, upper, rate } = tier;

  if (!Number.isInteger(lower) || lower < 0) {
    throw new ConfigurationError(
      'tier_bounds',
      `${describeTier(tier, index)}: lower bound must be a non-negative integer`,
      index
    );
  }

  if (!Number.isInteger(upper) || upper <= lower) {
    throw new ConfigurationError(
      'tier_bounds',
      `${describeTier(tier, index)}: upper bound must be an integer greater than the lower bound`,
      index
    );
  }

  if (!Number.isFinite(rate) || rate <= 0) {
    throw new ConfigurationError(
      'tier_rate',
      `${describeTier(tier, index)}: rate must be a positive number, got ${rate}`,
      index
    );
  }
}

/**
 * Build a validated, immutable tier table
 *
 * @throws ConfigurationError naming the first invariant violated
 */
export function createTierTable(tiers: readonly Tier[], version = 'custom'): TierTable {
  if (tiers.length === 0) {
    throw new ConfigurationError('empty', 'Tier table must contain at least one tier');
  }

  if (tiers[0].lower !== 0) {
    throw new ConfigurationError(
      'first_lower_bound',
      `First tier must start at 0, got ${tiers[0].lower}`,
      0
    );
  }

  tiers.forEach((tier, index) => {
    validateTier(tier, index);
    if (index === 0) return;

    const previous = tiers[index - 1];
    const expectedLower = previous.upper + 1;

    if (tier.lower <= previous.lower) {
      throw new ConfigurationError(
        'non_ascending',
        `${describeTier(tier, index)} does not start above ${describeTier(previous, index - 1)}`,
        index
      );
    }
    if (tier.lower > expectedLower) {
      throw new ConfigurationError(
        'gap',
        `Gap between ${describeTier(previous, index - 1)} and ${describeTier(tier, index)}: expected lower bound ${expectedLower}`,
        index
      );
    }
    if (tier.lower < expectedLower) {
      throw new ConfigurationError(
        'overlap',
        `${describeTier(tier, index)} overlaps ${describeTier(previous, index - 1)}: expected lower bound ${expectedLower}`,
        index
      );
    }
  });

  const frozen = tiers.map((tier) =>
    Object.freeze({ lower: tier.lower, upper: tier.upper, rate: tier.rate })
  );

  return Object.freeze({ version, tiers: Object.freeze(frozen) });
}

/**
 * Index of the first tier whose upper bound is >= amount, or the last tier
 * when the amount is above the table
 *
 * Binary search over the ascending upper bounds.
 */
export function findTierIndex(table: TierTable, amount: number): number {
  const { tiers } = table;
  let low = 0;
  let high = tiers.length - 1;

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    if (tiers[mid].upper >= amount) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  return low;
}

/** Highest spend the table covers */
export function maxTierUpper(table: TierTable): number {
  return table.tiers[table.tiers.length - 1].upper;
}

/**
 * Volume discount check: every tier is cheaper than the one before it
 */
export function hasDecreasingRates(table: TierTable): boolean {
  return table.tiers.every((tier, index) => index === 0 || tier.rate < table.tiers[index - 1].rate);
}
