/**
 * Tier Table Configuration
 *
 * The reference tier table ships with the service. A JSON file named by
 * TIER_TABLE_PATH replaces it at startup; either way the table is validated
 * once and then shared read-only by every pricing call.
 */

import { readFileSync } from 'fs';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { Tier, TierTable } from '../types/pricing';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { createTierTable } from '../utils/tier-table';

export const REFERENCE_TIER_TABLE_VERSION = 'reference-v1';

export const REFERENCE_TIERS: readonly Tier[] = [
  { lower: 0, upper: 125_000, rate: 0.0330 },
  { lower: 125_001, upper: 250_000, rate: 0.0315 },
  { lower: 250_001, upper: 416_667, rate: 0.0297 },
  { lower: 416_668, upper: 833_333, rate: 0.0264 },
  { lower: 833_334, upper: 1_666_667, rate: 0.0231 },
  { lower: 1_666_668, upper: 2_500_000, rate: 0.0215 },
  { lower: 2_500_001, upper: 3_333_333, rate: 0.0198 },
  { lower: 3_333_334, upper: 4_166_667, rate: 0.0182 },
  { lower: 4_166_668, upper: 6_250_000, rate: 0.0165 },
  { lower: 6_250_001, upper: 8_333_333, rate: 0.0132 },
  { lower: 8_333_334, upper: 12_500_000, rate: 0.0116 },
  { lower: 12_500_001, upper: 16_666_667, rate: 0.0107 },
  { lower: 16_666_668, upper: 20_833_333, rate: 0.0100 },
  { lower: 20_833_334, upper: 25_000_000, rate: 0.0095 },
  { lower: 25_000_001, upper: 29_166_667, rate: 0.0091 },
  { lower: 29_166_668, upper: 33_333_333, rate: 0.0088 },
  { lower: 33_333_334, upper: 41_666_667, rate: 0.0084 },
  { lower: 41_666_668, upper: 62_500_000, rate: 0.0069 },
  { lower: 62_500_001, upper: 83_333_333, rate: 0.0062 },
  { lower: 83_333_334, upper: 104_166_667, rate: 0.0054 },
  { lower: 104_166_668, upper: 125_000_000, rate: 0.0050 },
  { lower: 125_000_001, upper: 145_833_333, rate: 0.0046 },
  { lower: 145_833_334, upper: 166_666_667, rate: 0.0043 },
  { lower: 166_666_668, upper: 187_500_000, rate: 0.0040 },
  { lower: 187_500_001, upper: 208_333_333, rate: 0.0038 },
  { lower: 208_333_334, upper: 250_000_000, rate: 0.0034 },
];

/**
 * Shape of a tier table JSON file
 */
export const TierTableFileSchema = Type.Object({
  version: Type.String({ minLength: 1 }),
  tiers: Type.Array(
    Type.Object({
      lower: Type.Number(),
      upper: Type.Number(),
      rate: Type.Number(),
    })
  ),
});

/**
 * Get the reference tier table
 */
export function getReferenceTierTable(): TierTable {
  return createTierTable(REFERENCE_TIERS, REFERENCE_TIER_TABLE_VERSION);
}

/**
 * Load and validate a tier table from a JSON file
 *
 * @throws ConfigurationError if the file can't be read, isn't JSON, doesn't
 *   match TierTableFileSchema, or breaks a table invariant
 */
export function loadTierTable(path: string): TierTable {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError('source', `Cannot read tier table ${path}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError('source', `Tier table ${path} is not valid JSON: ${errorMessage(err)}`);
  }

  if (!Value.Check(TierTableFileSchema, parsed)) {
    const first = Value.Errors(TierTableFileSchema, parsed).First();
    const detail = first ? `${first.path || '/'}: ${first.message}` : 'schema mismatch';
    throw new ConfigurationError('source', `Tier table ${path} is malformed (${detail})`);
  }

  return createTierTable(parsed.tiers, parsed.version);
}

/**
 * Resolve the tier table the service runs with
 */
export function resolveTierTable(path?: string): TierTable {
  return path ? loadTierTable(path) : getReferenceTierTable();
}
