import { describe, it, expect } from 'vitest';
import { createPricingEngine } from '../../src/utils/pricing';
import { createTierTable, maxTierUpper } from '../../src/utils/tier-table';
import { getReferenceTierTable } from '../../src/config/tiers';
import { InvalidArgumentError } from '../../src/utils/errors';

const table = getReferenceTierTable();
const engine = createPricingEngine(table);

describe('Commit Recommendation', () => {
  it('recommends the next tier in the top 20% of the current one', () => {
    // 110,000 > 125,000 × 0.8
    expect(engine.recommendCommitTier(110_000)).toBe(250_000);
  });

  it('stays in the current tier below the threshold', () => {
    expect(engine.recommendCommitTier(0)).toBe(125_000);
    expect(engine.recommendCommitTier(50_000)).toBe(125_000);
  });

  it('requires spend strictly above the threshold', () => {
    expect(engine.recommendCommitTier(100_000)).toBe(125_000);
    expect(engine.recommendCommitTier(100_001)).toBe(250_000);
  });

  it('treats tier bounds as inclusive', () => {
    expect(engine.recommendCommitTier(125_000)).toBe(250_000);
    expect(engine.recommendCommitTier(125_001)).toBe(250_000);
    expect(engine.recommendCommitTier(240_000)).toBe(416_667);
  });

  it('recommends the top tier at the end of the table', () => {
    expect(engine.recommendCommitTier(249_000_000)).toBe(250_000_000);
    expect(engine.recommendCommitTier(300_000_000)).toBe(250_000_000);
  });

  it('returns the current and next tier', () => {
    const result = engine.recommendation(110_000);

    expect(result.current_tier).toEqual({ lower: 0, upper: 125_000, rate: 0.033 });
    expect(result.next_tier).toEqual({ lower: 125_001, upper: 250_000, rate: 0.0315 });
  });

  it('has no next tier at the top of the table', () => {
    expect(engine.recommendation(300_000_000).next_tier).toBeNull();
  });

  it('stays within the table', () => {
    const spends = [0, 99_999, 110_000, 125_000.5, 400_000, 2_000_000, 30_000_000, 210_000_000, 260_000_000];

    for (const spend of spends) {
      const recommended = engine.recommendCommitTier(spend);
      const current = engine.recommendation(spend).current_tier;

      expect(recommended).toBeGreaterThanOrEqual(current.lower);
      expect(recommended).toBeLessThanOrEqual(maxTierUpper(table));
    }
  });

  it('honours a custom threshold ratio', () => {
    const cautious = createPricingEngine(table, {
      minimumInvoiceAmount: 2500,
      minimumInvoiceSpendThreshold: 125_000,
      recommendationThresholdRatio: 0.95,
    });

    expect(cautious.recommendCommitTier(110_000)).toBe(125_000);
    expect(cautious.recommendCommitTier(120_000)).toBe(250_000);
  });

  it('works on a single-tier table', () => {
    const single = createPricingEngine(createTierTable([{ lower: 0, upper: 1000, rate: 0.1 }]));

    expect(single.recommendCommitTier(999)).toBe(1000);
  });

  it('rejects negative spend', () => {
    expect(() => engine.recommendCommitTier(-100)).toThrow(InvalidArgumentError);
  });
});

describe('Pricing Comparison', () => {
  it('prices the recommended commitment when none is given', () => {
    const comparison = engine.comparePricing(200_000);

    expect(comparison.recommended_commit).toBe(250_000);
    expect(comparison.commit_amount).toBe(250_000);
    expect(comparison.flex_price).toBeCloseTo(6487.5, 6);
    expect(comparison.commit_price).toBeCloseTo(6300, 6);
    expect(comparison.savings).toBeCloseTo(187.5, 6);
  });

  it('prices an explicit commitment', () => {
    const comparison = engine.comparePricing(200_000, 0);

    expect(comparison.commit_amount).toBe(0);
    expect(comparison.savings).toBe(0);
    expect(comparison.recommended_commit).toBe(250_000);
  });
});
