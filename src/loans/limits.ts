import { InputValidationError } from '../util/errors.js';

export type LimitParams = {
  multiplier?: number;
  roundingUnit?: number;
};

/**
 * Maximum aggregate principal a customer may hold.
 * Tunables:
 * - multiplier: months of income counted toward the limit
 * - roundingUnit: granularity of the result (one lakh by default), ties round up
 */
export function computeApprovedLimit(monthlyIncome: number, params: LimitParams = {}): number {
  const { multiplier = 36, roundingUnit = 100_000 } = params;
  if (!Number.isFinite(monthlyIncome) || monthlyIncome <= 0) {
    throw new InputValidationError(`monthly income must be positive, got ${monthlyIncome}`);
  }
  const units = Number(((multiplier * monthlyIncome) / roundingUnit).toPrecision(15));
  return Math.floor(units + 0.5) * roundingUnit;
}
