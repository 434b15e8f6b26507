import { Type, type Static } from '@sinclair/typebox';

/**
 * Spend query schema (query params)
 */
export const SpendQuerySchema = Type.Object({
  spend: Type.Number({ minimum: 0 }),
});

/**
 * Commit pricing query schema (query params)
 */
export const CommitQuerySchema = Type.Object({
  spend: Type.Number({ minimum: 0 }),
  commit_amount: Type.Number({ minimum: 0 }),
});

/**
 * Rate tier schema
 */
export const TierSchema = Type.Object({
  lower: Type.Number(),
  upper: Type.Number(),
  rate: Type.Number(),
});

/**
 * Tier row with display strings
 */
export const TierRowSchema = Type.Object({
  lower: Type.Number(),
  upper: Type.Number(),
  rate: Type.Number(),
  spend_range: Type.String(),
  rate_display: Type.String(),
});

/**
 * Tier table response schema
 */
export const TierListResponseSchema = Type.Object({
  version: Type.String(),
  currency: Type.String(),
  tiers: Type.Array(TierRowSchema),
});

/**
 * Per-tier breakdown schema
 */
export const TierBreakdownSchema = Type.Object({
  tier: Type.String(),
  lower: Type.Number(),
  upper: Type.Number(),
  rate: Type.Number(),
  spend: Type.Number(),
  amount: Type.Number(),
});

/**
 * Flex pricing response schema
 */
export const FlexPricingResponseSchema = Type.Object({
  spend: Type.Number(),
  accumulated: Type.Number(),
  minimum_applied: Type.Boolean(),
  total: Type.Number(),
  breakdown: Type.Array(TierBreakdownSchema),
});

/**
 * Commit pricing response schema
 */
export const CommitPricingResponseSchema = Type.Object({
  spend: Type.Number(),
  commit_amount: Type.Number(),
  commit_tier: Type.Union([TierSchema, Type.Null()]),
  committed_spend: Type.Number(),
  committed_amount: Type.Number(),
  overflow_spend: Type.Number(),
  overflow: Type.Union([FlexPricingResponseSchema, Type.Null()]),
  overflow_amount: Type.Number(),
  total: Type.Number(),
});

/**
 * Commitment recommendation response schema
 */
export const RecommendationResponseSchema = Type.Object({
  spend: Type.Number(),
  recommended_commit: Type.Number(),
  current_tier: TierSchema,
  next_tier: Type.Union([TierSchema, Type.Null()]),
});

/**
 * Quote request schema (body)
 */
export const QuoteRequestSchema = Type.Object({
  spend: Type.Number({ minimum: 0 }),
  commit_amount: Type.Optional(Type.Number({ minimum: 0 })),
});

/**
 * Quote response schema
 */
export const QuoteResponseSchema = Type.Object({
  quote_id: Type.String(),
  currency: Type.String(),
  tier_table_version: Type.String(),
  spend: Type.Number(),
  commit_amount: Type.Number(),
  flex: FlexPricingResponseSchema,
  commit: CommitPricingResponseSchema,
  savings: Type.Number(),
  recommended_commit: Type.Number(),
  generated_at: Type.Number(),
});

/**
 * Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
});

// TypeScript types derived from schemas
export type TierListResponse = Static<typeof TierListResponseSchema>;
