import dayjs from 'dayjs';
import { z } from 'zod';
import { DEFAULT_POLICY, Policy } from '../config/index.js';
import { log as rootLog, Logger } from '../log.js';
import { InputValidationError, NotFoundError } from '../util/errors.js';
import { customerLocks, KeyedMutexes } from '../util/locks.js';
import { DATE_FORMAT, loanEndDate, repaymentsLeft } from './calculator.js';
import { scoreBreakdown } from './credit.js';
import { computeApprovedLimit } from './limits.js';
import { CreditRepositories } from './repository.js';
import { CreateLoanOutcome, Customer, EligibilityResult, LoanRecord, LoanRequest } from './types.js';
import { resolve } from './underwrite.js';

const id = z.number().int().positive();

const loanRequestSchema = z.object({
  customerId: id,
  principal: z.number().finite().positive(),
  interestRate: z.number().finite().min(0),
  tenureMonths: z.number().int().positive(),
});

const registrationSchema = z.object({
  firstName: z.string().trim().min(1).max(100),
  lastName: z.string().trim().min(1).max(100),
  age: z.number().int().positive().nullable().optional(),
  monthlyIncome: z.number().finite().positive(),
  phoneNumber: z.string().trim().regex(/^\+?[0-9][0-9 -]{5,19}$/, 'expected a phone number'),
});

export type Registration = z.input<typeof registrationSchema>;

export type LoanView = {
  loan: LoanRecord;
  customer: Pick<Customer, 'id' | 'firstName' | 'lastName' | 'phoneNumber' | 'age'>;
};

export type ActiveLoanSummary = {
  loanId: number;
  principal: number;
  interestRate: number;
  monthlyInstallment: number;
  repaymentsLeft: number;
};

export type EngineOptions = {
  policy?: Policy;
  logger?: Logger;
  clock?: () => Date;
  locks?: KeyedMutexes;
};

function parse<S extends z.ZodTypeAny>(schema: S, context: string, value: unknown): z.output<S> {
  const res = schema.safeParse(value);
  if (!res.success) throw InputValidationError.fromZod(context, res.error);
  return res.data;
}

/**
 * Eligibility and loan lifecycle on top of the repositories. Scoring and the
 * decision itself are pure; this class only loads inputs, persists approvals
 * and keeps read-decide-write for one customer strictly sequential.
 */
export class LoanEngine {
  private readonly policy: Policy;
  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly locks: KeyedMutexes;

  constructor(private readonly repos: CreditRepositories, opts: EngineOptions = {}) {
    this.policy = opts.policy ?? DEFAULT_POLICY;
    this.log = (opts.logger ?? rootLog).child({ scope: 'loan-engine' });
    this.clock = opts.clock ?? (() => new Date());
    this.locks = opts.locks ?? customerLocks;
  }

  async registerCustomer(input: Registration): Promise<Customer> {
    const data = parse(registrationSchema, 'registration', input);
    const approvedLimit = computeApprovedLimit(data.monthlyIncome, {
      multiplier: this.policy.limitMultiplier,
      roundingUnit: this.policy.limitRoundingUnit,
    });
    const customer = await this.repos.customers.insertCustomer({
      firstName: data.firstName,
      lastName: data.lastName,
      age: data.age ?? null,
      phoneNumber: data.phoneNumber,
      monthlyIncome: data.monthlyIncome,
      approvedLimit,
    });
    this.log.info({ msg: 'customer_registered', customerId: customer.id, approvedLimit });
    return customer;
  }

  async recalculateApprovedLimit(customerId: number): Promise<Customer> {
    parse(id, 'customer id', customerId);
    return this.locks.runExclusive(customerId, async () => {
      const customer = await this.requireCustomer(customerId);
      const approvedLimit = computeApprovedLimit(customer.monthlyIncome, {
        multiplier: this.policy.limitMultiplier,
        roundingUnit: this.policy.limitRoundingUnit,
      });
      if (approvedLimit !== customer.approvedLimit) {
        await this.repos.customers.updateApprovedLimit(customerId, approvedLimit);
        this.log.info({ msg: 'approved_limit_changed', customerId, from: customer.approvedLimit, to: approvedLimit });
      }
      return { ...customer, approvedLimit };
    });
  }

  async checkEligibility(customerId: number, principal: number, interestRate: number, tenureMonths: number): Promise<EligibilityResult> {
    const req = parse(loanRequestSchema, 'loan request', { customerId, principal, interestRate, tenureMonths });
    return this.evaluate(req);
  }

  async createLoan(customerId: number, principal: number, interestRate: number, tenureMonths: number): Promise<CreateLoanOutcome> {
    const req = parse(loanRequestSchema, 'loan request', { customerId, principal, interestRate, tenureMonths });
    return this.locks.runExclusive(req.customerId, async (): Promise<CreateLoanOutcome> => {
      const result = await this.evaluate(req);
      if (!result.approved) {
        this.log.info({ msg: 'loan_rejected', customerId, reason: result.rejectionReason, score: result.score });
        return { approved: false, result };
      }
      const startDate = dayjs(this.clock()).format(DATE_FORMAT);
      const loan = await this.repos.loans.insertLoan({
        customerId: req.customerId,
        principal: req.principal,
        interestRate: result.correctedRate,
        tenureMonths: req.tenureMonths,
        emisPaidOnTime: 0,
        startDate,
        endDate: loanEndDate(startDate, req.tenureMonths),
        status: 'active',
      });
      this.log.info({ msg: 'loan_created', loanId: loan.id, customerId, principal: loan.principal, rate: loan.interestRate });
      return { approved: true, loan, result };
    });
  }

  async viewLoan(loanId: number): Promise<LoanView> {
    parse(id, 'loan id', loanId);
    const loan = await this.requireLoan(loanId);
    const c = await this.requireCustomer(loan.customerId);
    return {
      loan,
      customer: { id: c.id, firstName: c.firstName, lastName: c.lastName, phoneNumber: c.phoneNumber, age: c.age },
    };
  }

  async viewLoans(customerId: number): Promise<ActiveLoanSummary[]> {
    parse(id, 'customer id', customerId);
    await this.requireCustomer(customerId);
    const loans = await this.repos.loans.loadActiveLoans(customerId);
    return loans.map((l) => ({
      loanId: l.id,
      principal: l.principal,
      interestRate: l.interestRate,
      monthlyInstallment: l.monthlyInstallment,
      repaymentsLeft: repaymentsLeft(l),
    }));
  }

  /** Sum of active principal. */
  async customerDebt(customerId: number): Promise<number> {
    parse(id, 'customer id', customerId);
    await this.requireCustomer(customerId);
    const loans = await this.repos.loans.loadActiveLoans(customerId);
    return loans.reduce((sum, l) => sum + l.principal, 0);
  }

  async recordOnTimePayment(loanId: number): Promise<LoanRecord> {
    parse(id, 'loan id', loanId);
    const { customerId } = await this.requireLoan(loanId);
    return this.locks.runExclusive(customerId, async () => {
      const loan = await this.requireLoan(loanId);
      if (loan.status === 'closed') throw new InputValidationError(`loan ${loanId} is closed`);
      const emisPaidOnTime = loan.emisPaidOnTime + 1;
      const next: LoanRecord = {
        ...loan,
        emisPaidOnTime,
        status: emisPaidOnTime >= loan.tenureMonths ? 'closed' : 'active',
      };
      const saved = await this.repos.loans.updateLoan(next);
      this.log.info({ msg: 'loan_payment', loanId, emisPaidOnTime, status: saved.status });
      return saved;
    });
  }

  async closeLoan(loanId: number): Promise<LoanRecord> {
    parse(id, 'loan id', loanId);
    const { customerId } = await this.requireLoan(loanId);
    return this.locks.runExclusive(customerId, async () => {
      const loan = await this.requireLoan(loanId);
      if (loan.status === 'closed') return loan;
      const next: LoanRecord = { ...loan, status: 'closed' };
      const saved = await this.repos.loans.updateLoan(next);
      this.log.info({ msg: 'loan_status', loanId, status: 'closed' });
      return saved;
    });
  }

  private async evaluate(req: LoanRequest): Promise<EligibilityResult> {
    const customer = await this.requireCustomer(req.customerId);
    const [history, active, existing] = await Promise.all([
      this.repos.loans.loadLoanHistory(customer.id),
      this.repos.loans.loadActiveLoans(customer.id),
      this.repos.loans.sumActiveMonthlyEMIs(customer.id),
    ]);
    const breakdown = scoreBreakdown(customer, history, active, { asOf: this.clock(), policy: this.policy });
    const result = resolve({
      score: breakdown.score,
      requestedRate: req.interestRate,
      principal: req.principal,
      tenureMonths: req.tenureMonths,
      customer,
      existingMonthlyEMITotal: existing,
    }, this.policy);
    this.log.debug({ msg: 'eligibility_checked', customerId: customer.id, score: breakdown.score, decision: result.decision.kind });
    return { ...result, breakdown };
  }

  private async requireCustomer(customerId: number): Promise<Customer> {
    const customer = await this.repos.customers.loadCustomer(customerId);
    if (!customer) throw new NotFoundError('customer', customerId);
    return customer;
  }

  private async requireLoan(loanId: number): Promise<LoanRecord> {
    const loan = await this.repos.loans.getLoan(loanId);
    if (!loan) throw new NotFoundError('loan', loanId);
    return loan;
  }
}
