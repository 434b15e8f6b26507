/**
 * Quote Generation
 *
 * Packages flex pricing, commit pricing and the recommended commitment for
 * one spend level into a quote document. The engine works in unrounded
 * amounts; the quote rounds every amount to cents.
 */

import { v4 as uuidv4 } from 'uuid';
import type { CommitBreakdown, FlexBreakdown, PricingEngine } from '../types/pricing';
import type { Quote, QuoteParams } from '../types/quote';
import { PRICING_CURRENCY } from '../config/pricing';
import { roundToCents } from './format';

export function roundFlexBreakdown(flex: FlexBreakdown): FlexBreakdown {
  return {
    ...flex,
    accumulated: roundToCents(flex.accumulated),
    total: roundToCents(flex.total),
    breakdown: flex.breakdown.map((line) => ({
      ...line,
      amount: roundToCents(line.amount),
    })),
  };
}

export function roundCommitBreakdown(commit: CommitBreakdown): CommitBreakdown {
  return {
    ...commit,
    committed_amount: roundToCents(commit.committed_amount),
    overflow: commit.overflow ? roundFlexBreakdown(commit.overflow) : null,
    overflow_amount: roundToCents(commit.overflow_amount),
    total: roundToCents(commit.total),
  };
}

/**
 * Build a quote for a customer's monthly spend
 *
 * Without commit_amount the recommended commitment is priced.
 */
export function buildQuote(engine: PricingEngine, params: QuoteParams): Quote {
  const { spend } = params;
  const comparison = engine.comparePricing(spend, params.commit_amount);

  const flex = roundFlexBreakdown(engine.flexBreakdown(spend));
  const commit = roundCommitBreakdown(engine.commitBreakdown(spend, comparison.commit_amount));

  return {
    quote_id: `quote_${uuidv4().replace(/-/g, '').slice(0, 8)}`,
    currency: PRICING_CURRENCY,
    tier_table_version: engine.table.version,
    spend,
    commit_amount: comparison.commit_amount,
    flex,
    commit,
    savings: roundToCents(flex.total - commit.total),
    recommended_commit: comparison.recommended_commit,
    generated_at: Date.now(),
  };
}
