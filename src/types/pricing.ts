/**
 * Pricing Types
 */

/** One pricing bracket of monthly spend */
export interface Tier {
  /** Inclusive lower bound of monthly spend (currency units) */
  lower: number;
  /** Inclusive upper bound of monthly spend */
  upper: number;
  /** Price per dollar of spend inside [lower, upper] (e.g., 0.033) */
  rate: number;
}

/** Validated, frozen tier table shared by all pricing calls */
export interface TierTable {
  /** Label of the tier definition (e.g., "reference-v1") */
  readonly version: string;
  readonly tiers: readonly Readonly<Tier>[];
}

/** Commercial constants applied by the engine */
export interface PricingPolicy {
  /** Minimum flex invoice amount */
  minimumInvoiceAmount: number;
  /** Flex spend at or below which the minimum invoice applies */
  minimumInvoiceSpendThreshold: number;
  /** Share of a tier's upper bound past which the next tier is recommended */
  recommendationThresholdRatio: number;
}

export interface TierBreakdown {
  /** Tier range description (e.g., "0-125000") */
  tier: string;
  lower: number;
  upper: number;
  rate: number;
  /** Spend billed at this tier's rate */
  spend: number;
  /** spend * rate */
  amount: number;
}

export interface FlexBreakdown {
  spend: number;
  /** Sum of the tier amounts before the minimum invoice */
  accumulated: number;
  /** Whether the minimum invoice raised the total */
  minimum_applied: boolean;
  total: number;
  breakdown: TierBreakdown[];
}

export interface CommitBreakdown {
  spend: number;
  commit_amount: number;
  /** Tier whose rate prices the commitment (null for a zero commitment) */
  commit_tier: Tier | null;
  committed_spend: number;
  committed_amount: number;
  overflow_spend: number;
  /** Flex pricing of the overflow, restarting from the first tier */
  overflow: FlexBreakdown | null;
  overflow_amount: number;
  total: number;
}

export interface CommitRecommendation {
  spend: number;
  recommended_commit: number;
  current_tier: Tier;
  next_tier: Tier | null;
}

export interface PricingComparison {
  spend: number;
  commit_amount: number;
  flex_price: number;
  commit_price: number;
  /** flex_price - commit_price (negative when the commitment costs more) */
  savings: number;
  recommended_commit: number;
}

export interface PricingEngine {
  readonly table: TierTable;
  readonly policy: PricingPolicy;
  flexPrice(spend: number): number;
  commitPrice(spend: number, commitAmount: number): number;
  recommendCommitTier(spend: number): number;
  listTiers(): readonly Readonly<Tier>[];
  flexBreakdown(spend: number): FlexBreakdown;
  commitBreakdown(spend: number, commitAmount: number): CommitBreakdown;
  recommendation(spend: number): CommitRecommendation;
  comparePricing(spend: number, commitAmount?: number): PricingComparison;
}
