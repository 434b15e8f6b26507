/**
 * Pricing Policy
 *
 * Commercial constants applied on top of the tier table.
 */

import type { PricingPolicy } from '../types/pricing';

/** Currency every amount is expressed in */
export const PRICING_CURRENCY = 'USD';

export const DEFAULT_PRICING_POLICY: Readonly<PricingPolicy> = Object.freeze({
  minimumInvoiceAmount: 2500,         // $2,500 minimum flex invoice...
  minimumInvoiceSpendThreshold: 125_000, // ...for spend up to $125,000
  recommendationThresholdRatio: 0.8,  // top 20% of a tier → recommend the next one
});
