import dayjs from 'dayjs';
import { DEFAULT_POLICY, Policy } from '../config/index.js';
import { installmentsDue } from './calculator.js';
import { Customer, LoanRecord, ScoreBreakdown, ScoreComponent, ScoreComponentName } from './types.js';

export type ScoreOptions = {
  asOf?: Date;
  policy?: Pick<Policy, 'weights' | 'loanCountPenalty' | 'activityPenalty'>;
};

type Component = Pick<ScoreComponent, 'raw' | 'normalized'>;

const clamp = (x: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, x));

/** On-time installments over installments due; full marks when nothing has fallen due. */
export function paymentHistoryComponent(history: LoanRecord[], asOf: Date = new Date()): Component {
  let due = 0;
  let onTime = 0;
  for (const loan of history) {
    due += installmentsDue(loan, asOf);
    onTime += Math.min(loan.emisPaidOnTime, loan.tenureMonths);
  }
  if (due === 0) return { raw: 1, normalized: 100 };
  const ratio = onTime / due;
  return { raw: ratio, normalized: 100 * clamp(ratio, 0, 1) };
}

export function loanCountComponent(loanCount: number, penalty: number = DEFAULT_POLICY.loanCountPenalty): Component {
  return { raw: loanCount, normalized: clamp(100 - loanCount * penalty, 0, 100) };
}

/** Loans whose start date falls in the calendar year of `asOf`. */
export function currentActivityComponent(history: LoanRecord[], asOf: Date = new Date(), penalty: number = DEFAULT_POLICY.activityPenalty): Component {
  const year = dayjs(asOf).year();
  const opened = history.filter((l) => l.startDate !== null && dayjs(l.startDate).year() === year).length;
  return { raw: opened, normalized: clamp(100 - opened * penalty, 0, 100) };
}

export function volumeComponent(activePrincipal: number, approvedLimit: number): Component {
  if (activePrincipal <= 0) return { raw: 0, normalized: 100 };
  if (approvedLimit <= 0) return { raw: Infinity, normalized: 0 };
  const ratio = activePrincipal / approvedLimit;
  return { raw: ratio, normalized: 100 * (1 - clamp(ratio, 0, 1)) };
}

export function scoreBreakdown(
  customer: Pick<Customer, 'approvedLimit'>,
  loanHistory: LoanRecord[],
  currentLoans: LoanRecord[],
  opts: ScoreOptions = {},
): ScoreBreakdown {
  const asOf = opts.asOf ?? new Date();
  const policy = opts.policy ?? DEFAULT_POLICY;
  const activePrincipal = currentLoans.reduce((sum, l) => sum + l.principal, 0);

  const parts: Record<ScoreComponentName, Component> = {
    paymentHistory: paymentHistoryComponent(loanHistory, asOf),
    loanCount: loanCountComponent(loanHistory.length, policy.loanCountPenalty),
    currentActivity: currentActivityComponent(loanHistory, asOf, policy.activityPenalty),
    volume: volumeComponent(activePrincipal, customer.approvedLimit),
  };

  const weigh = (name: ScoreComponentName): ScoreComponent => {
    const weight = policy.weights[name];
    return { ...parts[name], weight, contribution: (parts[name].normalized * weight) / 100 };
  };
  const components: Record<ScoreComponentName, ScoreComponent> = {
    paymentHistory: weigh('paymentHistory'),
    loanCount: weigh('loanCount'),
    currentActivity: weigh('currentActivity'),
    volume: weigh('volume'),
  };

  const weighted = Object.values(components).reduce((sum, c) => sum + c.contribution, 0);
  // Exposure above the approved limit disqualifies outright
  const overLimit = activePrincipal > customer.approvedLimit;
  const score = overLimit ? 0 : clamp(Math.round(Number(weighted.toPrecision(12))), 0, 100);
  return { components, weighted, activePrincipal, overLimit, score };
}

export function computeScore(
  customer: Pick<Customer, 'approvedLimit'>,
  loanHistory: LoanRecord[],
  currentLoans: LoanRecord[],
  opts: ScoreOptions = {},
): number {
  return scoreBreakdown(customer, loanHistory, currentLoans, opts).score;
}
