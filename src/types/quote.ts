/**
 * Quote Types
 */

import type { CommitBreakdown, FlexBreakdown } from './pricing';

export interface QuoteParams {
  /** Observed monthly spend */
  spend: number;
  /** Commitment to price; defaults to the recommended commitment */
  commit_amount?: number;
}

export interface Quote {
  /** Unique quote identifier */
  quote_id: string;
  currency: string;
  /** Version of the tier table the quote was priced with */
  tier_table_version: string;
  spend: number;
  commit_amount: number;
  /** Flex pricing, amounts rounded to cents */
  flex: FlexBreakdown;
  /** Commit pricing, amounts rounded to cents */
  commit: CommitBreakdown;
  /** flex.total - commit.total */
  savings: number;
  recommended_commit: number;
  /** When the quote was generated (Unix ms) */
  generated_at: number;
}
