/**
 * Server Configuration
 */

export const PORT = parseInt(process.env.PORT || '3000', 10);
export const HOST = process.env.HOST || '0.0.0.0';
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

/** Optional JSON tier table replacing the reference table */
export const TIER_TABLE_PATH = process.env.TIER_TABLE_PATH || undefined;
