import { DEFAULT_POLICY, Policy, RateBand } from "../config/index.js";
import { InputValidationError } from "../util/errors.js";
import { computeEMI, roundCurrency } from "./calculator.js";
import { Customer, Decision, EligibilityResult } from "./types.js";

export type ResolveInput = {
  score: number;
  requestedRate: number;
  principal: number;
  tenureMonths: number;
  customer: Pick<Customer, "id" | "monthlyIncome">;
  existingMonthlyEMITotal: number;
};

export type ResolvePolicy = Pick<Policy, "bands" | "rateCorrection" | "maxBurdenRatio">;

/** First band whose threshold the score clears; null means the score sits below every band. */
export function bandFor(score: number, bands: RateBand[] = DEFAULT_POLICY.bands): RateBand | null {
  return bands.find((b) => score > b.above) ?? null;
}

const cents = (x: number) => Math.round(x * 100);

export function maxAffordableEMI(monthlyIncome: number, maxBurdenRatio: number = DEFAULT_POLICY.maxBurdenRatio): number {
  return monthlyIncome * maxBurdenRatio;
}

export function resolve(input: ResolveInput, policy: ResolvePolicy = DEFAULT_POLICY): EligibilityResult {
  const { score, requestedRate, principal, tenureMonths, customer, existingMonthlyEMITotal } = input;
  if (!Number.isInteger(score) || score < 0 || score > 100) throw new InputValidationError(`score must be an integer in 0..100, got ${score}`);
  if (!Number.isFinite(requestedRate) || requestedRate < 0) throw new InputValidationError(`interest rate must be non-negative, got ${requestedRate}`);
  if (!Number.isFinite(existingMonthlyEMITotal) || existingMonthlyEMITotal < 0) throw new InputValidationError(`existing EMI total must be non-negative, got ${existingMonthlyEMITotal}`);

  let decision: Decision;
  let rate = requestedRate;
  const band = bandFor(score, policy.bands);
  if (!band) {
    decision = { kind: "rejected", reason: "band_floor" };
  } else if (band.floorRate !== null && requestedRate < band.floorRate) {
    rate = band.floorRate;
    decision = policy.rateCorrection === "reject"
      ? { kind: "rejected", reason: "rate_mismatch" }
      : { kind: "approved_corrected", rate, requestedRate };
  } else {
    decision = { kind: "approved", rate };
  }

  const emi = computeEMI(principal, rate, tenureMonths);
  const existing = roundCurrency(existingMonthlyEMITotal);
  // Burden beats any band-level approval; compared in whole cents
  if (decision.kind !== "rejected" && cents(existing) + cents(emi) > cents(maxAffordableEMI(customer.monthlyIncome, policy.maxBurdenRatio))) {
    decision = { kind: "rejected", reason: "income_burden" };
  }

  const approved = decision.kind !== "rejected";
  return {
    customerId: customer.id,
    principal,
    tenureMonths,
    requestedRate,
    correctedRate: rate,
    score,
    breakdown: null,
    monthlyInstallment: emi,
    existingMonthlyEMITotal: existing,
    approved,
    decision,
    rejectionReason: decision.kind === "rejected" ? decision.reason : null,
  };
}
