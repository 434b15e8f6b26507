/**
 * Pricing Errors
 *
 * ConfigurationError is fatal and raised once, while the tier table is built.
 * InvalidArgumentError is raised per call and answered with a 400 by the API.
 */

export type TierTableInvariant =
  | 'empty'
  | 'first_lower_bound'
  | 'tier_bounds'
  | 'tier_rate'
  | 'non_ascending'
  | 'gap'
  | 'overlap'
  | 'source';

export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(
    public readonly invariant: TierTableInvariant,
    message: string,
    /** Index of the offending tier, when one tier is at fault */
    public readonly tierIndex?: number
  ) {
    super(message);
  }
}

export class InvalidArgumentError extends Error {
  override readonly name = 'InvalidArgumentError';

  constructor(
    public readonly argument: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * Reject negative, NaN and infinite amounts
 */
export function assertAmount(argument: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(argument, `${argument} must be a finite number, got ${value}`);
  }
  if (value < 0) {
    throw new InvalidArgumentError(argument, `${argument} must be >= 0, got ${value}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
