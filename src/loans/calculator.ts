import dayjs from 'dayjs';
import { InputValidationError } from '../util/errors.js';
import { LoanRecord } from './types.js';

export const DATE_FORMAT = 'YYYY-MM-DD';

/**
 * Two decimals, half away from zero. The toPrecision pass drops binary noise
 * first, so 1.005 rounds to 1.01 rather than 1.00.
 */
export function roundCurrency(x: number): number {
  const cents = Math.round(Number((Math.abs(x) * 100).toPrecision(15)));
  return (Math.sign(x) * cents) / 100;
}

export function monthlyRateFromAnnual(annualRatePercent: number): number {
  // annual percent → monthly fractional rate
  return annualRatePercent / 12 / 100;
}

export function computeEMI(principal: number, annualRatePercent: number, tenureMonths: number): number {
  if (!Number.isFinite(principal) || principal <= 0) throw new InputValidationError(`principal must be positive, got ${principal}`);
  if (!Number.isFinite(annualRatePercent) || annualRatePercent < 0) throw new InputValidationError(`interest rate must be non-negative, got ${annualRatePercent}`);
  if (!Number.isInteger(tenureMonths) || tenureMonths <= 0) throw new InputValidationError(`tenure must be a positive whole number of months, got ${tenureMonths}`);

  const r = monthlyRateFromAnnual(annualRatePercent);
  if (r === 0) return roundCurrency(principal / tenureMonths);
  const growth = Math.pow(1 + r, tenureMonths);
  return roundCurrency((principal * r * growth) / (growth - 1));
}

export function loanEndDate(startDate: string, tenureMonths: number): string {
  return dayjs(startDate).add(tenureMonths, 'month').format(DATE_FORMAT);
}

/** Installments that have fallen due by `asOf`, capped at the tenure. */
export function installmentsDue(loan: Pick<LoanRecord, 'tenureMonths' | 'startDate' | 'status'>, asOf: Date = new Date()): number {
  if (loan.status === 'closed' || !loan.startDate) return loan.tenureMonths;
  const elapsed = dayjs(asOf).diff(dayjs(loan.startDate), 'month');
  return Math.max(0, Math.min(loan.tenureMonths, elapsed));
}

export function repaymentsLeft(loan: Pick<LoanRecord, 'tenureMonths' | 'emisPaidOnTime'>): number {
  return Math.max(0, loan.tenureMonths - loan.emisPaidOnTime);
}
