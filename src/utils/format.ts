/**
 * Display formatting for the tier table and quotes
 */

import type { Tier } from '../types/pricing';

const currencyFormat = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const wholeDollarFormat = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/** e.g. 6487.5 → "$6,487.50" */
export function formatCurrency(amount: number): string {
  return currencyFormat.format(amount);
}

/** e.g. 0.033 → "3.30%" */
export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

/**
 * Spend range and rate strings for a tier row
 */
export function formatTier(tier: Tier): { spend_range: string; rate_display: string } {
  return {
    spend_range: `${wholeDollarFormat.format(tier.lower)} - ${wholeDollarFormat.format(tier.upper)}`,
    rate_display: formatRate(tier.rate),
  };
}
