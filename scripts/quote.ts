/**
 * Quote Spend
 *
 * CLI tool to price a monthly spend under flex and commit pricing.
 * Uses the same tier table as the API (TIER_TABLE_PATH or the reference table).
 *
 * Usage: npm run quote -- <monthly_spend> [commit_amount]
 * Example: npm run quote -- 500000 416667
 */

import { resolveTierTable } from '../src/config/tiers';
import { TIER_TABLE_PATH } from '../src/config/server';
import { createPricingEngine } from '../src/utils/pricing';
import { buildQuote } from '../src/utils/quote';
import { formatCurrency, formatRate } from '../src/utils/format';

function main() {
  const spend = Number(process.argv[2]);
  const commitArg = process.argv[3];

  if (process.argv[2] === undefined || Number.isNaN(spend)) {
    console.log('Usage: npm run quote -- <monthly_spend> [commit_amount]');
    console.log('Example: npm run quote -- 500000 416667');
    process.exit(1);
  }

  const engine = createPricingEngine(resolveTierTable(TIER_TABLE_PATH));
  const quote = buildQuote(engine, {
    spend,
    commit_amount: commitArg === undefined ? undefined : Number(commitArg),
  });

  console.log(`\nQuote ${quote.quote_id} (tier table ${quote.tier_table_version}):`);
  console.log(`  Monthly spend:      ${formatCurrency(quote.spend)}`);
  console.log(`  Commitment:         ${formatCurrency(quote.commit_amount)}`);
  console.log(`  Flex pricing:       ${formatCurrency(quote.flex.total)}`);
  console.log(`  Commit pricing:     ${formatCurrency(quote.commit.total)}`);
  if (quote.commit.commit_tier) {
    console.log(`  Commit rate:        ${formatRate(quote.commit.commit_tier.rate)}`);
  }
  if (quote.savings > 0) {
    console.log(`  Monthly savings:    ${formatCurrency(quote.savings)}`);
  }
  console.log(`  Recommended commit: ${formatCurrency(quote.recommended_commit)}`);
}

try {
  main();
} catch (err) {
  console.error('Error:', err);
  process.exit(1);
}
