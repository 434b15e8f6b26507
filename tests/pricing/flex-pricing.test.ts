import { describe, it, expect } from 'vitest';
import { createPricingEngine } from '../../src/utils/pricing';
import { createTierTable } from '../../src/utils/tier-table';
import { getReferenceTierTable } from '../../src/config/tiers';
import { InvalidArgumentError } from '../../src/utils/errors';
import type { PricingPolicy } from '../../src/types/pricing';

const engine = createPricingEngine(getReferenceTierTable());

const NO_MINIMUM: PricingPolicy = {
  minimumInvoiceAmount: 0,
  minimumInvoiceSpendThreshold: 0,
  recommendationThresholdRatio: 0.8,
};

const smallTable = createTierTable([
  { lower: 0, upper: 100, rate: 0.1 },
  { lower: 101, upper: 200, rate: 0.05 },
  { lower: 201, upper: 1000, rate: 0.01 },
]);

describe('Flex Pricing - Reference Scenarios', () => {
  it('clips small spend to the $2,500 minimum invoice', () => {
    expect(engine.flexPrice(50_000)).toBe(2500);
  });

  it('bills $125,000 entirely at the first tier rate', () => {
    expect(engine.flexPrice(125_000)).toBeCloseTo(4125, 6);
  });

  it('accumulates across the first two tiers', () => {
    expect(engine.flexPrice(200_000)).toBeCloseTo(6487.5, 6);
  });

  it('charges the minimum invoice for zero spend', () => {
    expect(engine.flexPrice(0)).toBe(2500);
  });
});

describe('Flex Pricing - Minimum Invoice', () => {
  it('never drops below $2,500 up to $125,000', () => {
    for (const spend of [0, 1, 1000, 50_000, 75_000, 100_000, 125_000]) {
      expect(engine.flexPrice(spend)).toBeGreaterThanOrEqual(2500);
    }
  });

  it('reports when the minimum was applied', () => {
    const result = engine.flexBreakdown(50_000);

    expect(result.minimum_applied).toBe(true);
    expect(result.accumulated).toBeCloseTo(1650, 6);
    expect(result.total).toBe(2500);
  });

  it('leaves the tiered total alone once it exceeds the minimum', () => {
    const result = engine.flexBreakdown(100_000);

    expect(result.minimum_applied).toBe(false);
    expect(result.total).toBeCloseTo(3300, 6);
  });

  it('does not apply above the $125,000 threshold', () => {
    const policy: PricingPolicy = {
      minimumInvoiceAmount: 10_000,
      minimumInvoiceSpendThreshold: 125_000,
      recommendationThresholdRatio: 0.8,
    };
    const strict = createPricingEngine(getReferenceTierTable(), policy);

    expect(strict.flexPrice(125_000)).toBe(10_000);
    expect(strict.flexPrice(200_000)).toBeCloseTo(6487.5, 6);
  });
});

describe('Flex Pricing - Tier Accumulation', () => {
  const small = createPricingEngine(smallTable, NO_MINIMUM);

  it('bills a tier capacity of upper - lower', () => {
    const result = small.flexBreakdown(150);

    expect(result.breakdown.map((line) => line.spend)).toEqual([100, 50]);
    expect(result.breakdown.map((line) => line.tier)).toEqual(['0-100', '101-200']);
    expect(result.total).toBeCloseTo(12.5, 10);
  });

  it('stops once spend is fully allocated', () => {
    const result = small.flexBreakdown(100);

    expect(result.breakdown).toHaveLength(1);
    expect(result.total).toBeCloseTo(10, 10);
  });

  it('leaves spend above the table unbilled', () => {
    const result = small.flexBreakdown(2000);

    expect(result.breakdown.map((line) => line.spend)).toEqual([100, 99, 799]);
    expect(result.total).toBeCloseTo(24.94, 10);
    expect(small.flexPrice(5000)).toBe(result.total);
  });

  it('caps reference pricing at the top of the table', () => {
    expect(engine.flexPrice(300_000_000)).toBe(engine.flexPrice(250_000_000));
    expect(engine.flexBreakdown(300_000_000).breakdown).toHaveLength(26);
  });

  it('returns an empty breakdown for zero spend', () => {
    expect(small.flexBreakdown(0).breakdown).toEqual([]);
    expect(small.flexPrice(0)).toBe(0);
  });
});

describe('Flex Pricing - Monotonicity', () => {
  it('never costs less for more spend', () => {
    const spends = [
      0, 1, 50_000, 75_000, 100_000, 125_000, 125_001, 150_000, 250_000, 416_668,
      1_000_000, 5_000_000, 50_000_000, 125_000_001, 250_000_000, 300_000_000,
    ];

    for (let i = 1; i < spends.length; i++) {
      expect(engine.flexPrice(spends[i])).toBeGreaterThanOrEqual(engine.flexPrice(spends[i - 1]));
    }
  });

  it('is deterministic', () => {
    expect(engine.flexPrice(1_234_567)).toBe(engine.flexPrice(1_234_567));
  });
});

describe('Flex Pricing - Invalid Input', () => {
  it('rejects negative spend', () => {
    expect(() => engine.flexPrice(-1)).toThrow(InvalidArgumentError);
    expect(() => engine.flexPrice(-1)).toThrow('spend must be >= 0, got -1');
  });

  it('rejects non-finite spend', () => {
    expect(() => engine.flexPrice(Number.NaN)).toThrow('spend must be a finite number, got NaN');
    expect(() => engine.flexPrice(Number.POSITIVE_INFINITY)).toThrow(InvalidArgumentError);
  });
});
