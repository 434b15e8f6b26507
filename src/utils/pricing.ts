/**
 * Pricing Engine
 *
 * Pure functions over a validated tier table. Nothing here mutates the
 * table or keeps state between calls, so one engine is shared by every
 * request.
 */

import type {
  CommitBreakdown,
  CommitRecommendation,
  FlexBreakdown,
  PricingComparison,
  PricingEngine,
  PricingPolicy,
  TierBreakdown,
  TierTable,
} from '../types/pricing';
import { DEFAULT_PRICING_POLICY } from '../config/pricing';
import { assertAmount } from './errors';
import { findTierIndex } from './tier-table';

/**
 * Calculate flex pricing tier by tier
 *
 * Example: $200,000 of spend
 * - Tier 1: $125,000 × 0.0330 = $4,125.00
 * - Tier 2:  $75,000 × 0.0315 = $2,362.50
 * - Total: $6,487.50
 *
 * A tier's capacity is upper - lower, so the first tier holds its full upper
 * bound. Spend above the last tier is not billed.
 */
export function calculateFlexBreakdown(
  table: TierTable,
  spend: number,
  policy: PricingPolicy = DEFAULT_PRICING_POLICY
): FlexBreakdown {
  assertAmount('spend', spend);

  const breakdown: TierBreakdown[] = [];
  let remaining = spend;
  let accumulated = 0;

  for (const tier of table.tiers) {
    if (remaining <= 0) break;

    const tierCapacity = tier.upper - tier.lower;
    const tierSpend = Math.min(remaining, tierCapacity);
    const amount = tierSpend * tier.rate;

    breakdown.push({
      tier: `${tier.lower}-${tier.upper}`,
      lower: tier.lower,
      upper: tier.upper,
      rate: tier.rate,
      spend: tierSpend,
      amount,
    });

    accumulated += amount;
    remaining -= tierSpend;
  }

  // Minimum invoice for small accounts
  const floored =
    spend <= policy.minimumInvoiceSpendThreshold &&
    accumulated < policy.minimumInvoiceAmount;

  return {
    spend,
    accumulated,
    minimum_applied: floored,
    total: floored ? policy.minimumInvoiceAmount : accumulated,
    breakdown,
  };
}

/**
 * Calculate commit pricing
 *
 * The committed block (capped at actual spend) is billed at the rate of the
 * first tier whose upper bound reaches the commitment. Spend past the
 * commitment is priced as a fresh flex purchase: the overflow restarts at the
 * first tier and carries its own minimum invoice.
 */
export function calculateCommitBreakdown(
  table: TierTable,
  spend: number,
  commitAmount: number,
  policy: PricingPolicy = DEFAULT_PRICING_POLICY
): CommitBreakdown {
  assertAmount('spend', spend);
  assertAmount('commit_amount', commitAmount);

  if (commitAmount === 0) {
    const flex = calculateFlexBreakdown(table, spend, policy);
    return {
      spend,
      commit_amount: 0,
      commit_tier: null,
      committed_spend: 0,
      committed_amount: 0,
      overflow_spend: spend,
      overflow: flex,
      overflow_amount: flex.total,
      total: flex.total,
    };
  }

  const commitTier = table.tiers[findTierIndex(table, commitAmount)];
  const committedSpend = Math.min(spend, commitAmount);
  const committedAmount = committedSpend * commitTier.rate;

  const overflowSpend = spend > commitAmount ? spend - commitAmount : 0;
  const overflow = overflowSpend > 0 ? calculateFlexBreakdown(table, overflowSpend, policy) : null;
  const overflowAmount = overflow ? overflow.total : 0;

  return {
    spend,
    commit_amount: commitAmount,
    commit_tier: { ...commitTier },
    committed_spend: committedSpend,
    committed_amount: committedAmount,
    overflow_spend: overflowSpend,
    overflow,
    overflow_amount: overflowAmount,
    total: committedAmount + overflowAmount,
  };
}

/**
 * Recommend a commitment level
 *
 * Spend in the top 20% of its tier (by default) is about to cross into the
 * next tier, so that tier's upper bound is recommended; otherwise the current
 * tier's upper bound.
 */
export function calculateRecommendation(
  table: TierTable,
  spend: number,
  policy: PricingPolicy = DEFAULT_PRICING_POLICY
): CommitRecommendation {
  assertAmount('spend', spend);

  const index = findTierIndex(table, spend);
  const currentTier = table.tiers[index];
  const nextTier = index < table.tiers.length - 1 ? table.tiers[index + 1] : null;

  const nearTop = spend > currentTier.upper * policy.recommendationThresholdRatio;
  const recommended = nextTier && nearTop ? nextTier.upper : currentTier.upper;

  return {
    spend,
    recommended_commit: recommended,
    current_tier: { ...currentTier },
    next_tier: nextTier ? { ...nextTier } : null,
  };
}

/**
 * Create a pricing engine bound to one tier table
 */
export function createPricingEngine(
  table: TierTable,
  policy: PricingPolicy = DEFAULT_PRICING_POLICY
): PricingEngine {
  const flexPrice = (spend: number): number => calculateFlexBreakdown(table, spend, policy).total;

  const commitPrice = (spend: number, commitAmount: number): number =>
    calculateCommitBreakdown(table, spend, commitAmount, policy).total;

  const recommendCommitTier = (spend: number): number =>
    calculateRecommendation(table, spend, policy).recommended_commit;

  return {
    table,
    policy,
    flexPrice,
    commitPrice,
    recommendCommitTier,
    listTiers: () => table.tiers,
    flexBreakdown: (spend) => calculateFlexBreakdown(table, spend, policy),
    commitBreakdown: (spend, commitAmount) => calculateCommitBreakdown(table, spend, commitAmount, policy),
    recommendation: (spend) => calculateRecommendation(table, spend, policy),
    comparePricing(spend: number, commitAmount?: number): PricingComparison {
      const recommended = recommendCommitTier(spend);
      const commit = commitAmount ?? recommended;
      const flex = flexPrice(spend);
      const committed = commitPrice(spend, commit);

      return {
        spend,
        commit_amount: commit,
        flex_price: flex,
        commit_price: committed,
        savings: flex - committed,
        recommended_commit: recommended,
      };
    },
  };
}
