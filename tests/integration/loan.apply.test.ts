import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { DEFAULT_POLICY } from '../../src/config/index.js';
import { InputValidationError, NotFoundError } from '../../src/util/errors.js';
import { Customer } from '../../src/loans/types.js';
import { openTestRig, seedLoan, TestRig } from './helpers.js';

describe('loan engine over sqlite', () => {
  let rig: TestRig;
  let customer: Customer;

  beforeEach(async () => {
    rig = openTestRig();
    customer = await rig.engine.registerCustomer({
      firstName: 'Asha',
      lastName: 'Rao',
      age: 34,
      monthlyIncome: 50_000,
      phoneNumber: '9000000001',
    });
  });

  afterEach(() => {
    rig.db.close();
  });

  test('registration derives the approved limit', async () => {
    expect(customer.approvedLimit).toBe(1_800_000);
    const stored = await rig.customers.loadCustomer(customer.id);
    expect(stored).toEqual(customer);
  });

  test('clean customer is approved at the requested rate', async () => {
    const r = await rig.engine.checkEligibility(customer.id, 500_000, 15, 24);
    expect(r.score).toBe(100);
    expect(r.approved).toBe(true);
    expect(r.correctedRate).toBe(15);
    expect(r.monthlyInstallment).toBe(24243.32);
    expect(r.breakdown?.components.volume.normalized).toBe(100);
    // read-only
    expect(await rig.loans.loadLoanHistory(customer.id)).toEqual([]);
  });

  test('approved loan is persisted with derived schedule', async () => {
    const out = await rig.engine.createLoan(customer.id, 500_000, 15, 24);
    if (!out.approved) throw new Error('expected approval');
    expect(out.loan).toEqual({
      id: out.loan.id,
      customerId: customer.id,
      principal: 500_000,
      interestRate: 15,
      tenureMonths: 24,
      monthlyInstallment: 24243.32,
      emisPaidOnTime: 0,
      startDate: '2024-06-15',
      endDate: '2026-06-15',
      status: 'active',
    });
    expect(await rig.loans.getLoan(out.loan.id)).toEqual(out.loan);
    expect(await rig.engine.viewLoans(customer.id)).toEqual([
      { loanId: out.loan.id, principal: 500_000, interestRate: 15, monthlyInstallment: 24243.32, repaymentsLeft: 24 },
    ]);
    expect(await rig.engine.customerDebt(customer.id)).toBe(500_000);
  });

  test('corrected rate is what gets persisted', async () => {
    // four closed loans opened this year with nothing paid on time:
    // 0 (history) + 12 (count) + 4 (activity) + 30 (volume)
    for (let i = 0; i < 4; i++) {
      await seedLoan(rig, { customerId: customer.id, principal: 50_000, status: 'closed', startDate: '2024-01-01' });
    }
    const out = await rig.engine.createLoan(customer.id, 100_000, 9, 12);
    expect(out.result.score).toBe(46);
    expect(out.result.decision).toEqual({ kind: 'approved_corrected', rate: 12, requestedRate: 9 });
    if (!out.approved) throw new Error('expected approval');
    expect(out.loan.interestRate).toBe(12);
    expect(out.loan.monthlyInstallment).toBe(8884.88);
  });

  test('second loan breaching the income burden is rejected and not stored', async () => {
    await rig.engine.createLoan(customer.id, 500_000, 15, 24);
    const out = await rig.engine.createLoan(customer.id, 100_000, 15, 24);
    expect(out.approved).toBe(false);
    expect(out.result.rejectionReason).toBe('income_burden');
    expect(out.result.existingMonthlyEMITotal).toBe(24243.32);
    expect(await rig.loans.loadLoanHistory(customer.id)).toHaveLength(1);
  });

  test('exposure above the approved limit forces score 0 and rejection', async () => {
    await seedLoan(rig, { customerId: customer.id, principal: 1_000_000, tenureMonths: 60, emisPaidOnTime: 29 });
    await seedLoan(rig, { customerId: customer.id, principal: 900_000, tenureMonths: 60, emisPaidOnTime: 29 });
    const r = await rig.engine.checkEligibility(customer.id, 100_000, 10, 12);
    expect(r.breakdown?.activePrincipal).toBe(1_900_000);
    expect(r.breakdown?.overLimit).toBe(true);
    expect(r.score).toBe(0);
    expect(r.approved).toBe(false);
    expect(r.rejectionReason).toBe('band_floor');
  });

  test('unknown customer and bad input surface as errors', async () => {
    await expect(rig.engine.checkEligibility(999, 100_000, 10, 12)).rejects.toThrow(NotFoundError);
    await expect(rig.engine.createLoan(999, 100_000, 10, 12)).rejects.toThrow(NotFoundError);
    await expect(rig.engine.checkEligibility(customer.id, 0, 10, 12)).rejects.toThrow(InputValidationError);
    await expect(rig.engine.checkEligibility(customer.id, 1000, 10, 2.5)).rejects.toThrow(InputValidationError);
    await expect(rig.engine.createLoan(customer.id, 1000, -1, 12)).rejects.toThrow(InputValidationError);
    await expect(rig.engine.viewLoans(999)).rejects.toThrow('customer 999 not found');
  });

  test('on-time payments close the loan at the end of its tenure', async () => {
    const out = await rig.engine.createLoan(customer.id, 20_000, 12, 2);
    if (!out.approved) throw new Error('expected approval');
    expect(out.loan.monthlyInstallment).toBe(10150.25);
    const first = await rig.engine.recordOnTimePayment(out.loan.id);
    expect(first).toMatchObject({ emisPaidOnTime: 1, status: 'active' });
    const second = await rig.engine.recordOnTimePayment(out.loan.id);
    expect(second).toMatchObject({ emisPaidOnTime: 2, status: 'closed' });
    await expect(rig.engine.recordOnTimePayment(out.loan.id)).rejects.toThrow(InputValidationError);
    expect(await rig.engine.viewLoans(customer.id)).toEqual([]);
    expect(await rig.loans.sumActiveMonthlyEMIs(customer.id)).toBe(0);
  });

  test('closing a loan frees its installment from the burden check', async () => {
    const first = await rig.engine.createLoan(customer.id, 500_000, 15, 24);
    if (!first.approved) throw new Error('expected approval');
    const closed = await rig.engine.closeLoan(first.loan.id);
    expect(closed.status).toBe('closed');
    expect(await rig.engine.closeLoan(first.loan.id)).toEqual(closed);
    const r = await rig.engine.checkEligibility(customer.id, 100_000, 15, 24);
    expect(r.existingMonthlyEMITotal).toBe(0);
  });

  test('view loan joins the customer summary', async () => {
    const out = await rig.engine.createLoan(customer.id, 100_000, 14, 12);
    if (!out.approved) throw new Error('expected approval');
    const view = await rig.engine.viewLoan(out.loan.id);
    expect(view.customer).toEqual({ id: customer.id, firstName: 'Asha', lastName: 'Rao', phoneNumber: '9000000001', age: 34 });
    expect(view.loan.monthlyInstallment).toBe(8978.71);
    await expect(rig.engine.viewLoan(4242)).rejects.toThrow('loan 4242 not found');
  });

  test('approved limit changes only on explicit recalculation', async () => {
    const tighter = openTestRig({ ...DEFAULT_POLICY, limitMultiplier: 24 }, rig.db);
    expect((await tighter.customers.loadCustomer(customer.id))?.approvedLimit).toBe(1_800_000);
    const updated = await tighter.engine.recalculateApprovedLimit(customer.id);
    expect(updated.approvedLimit).toBe(1_200_000);
    expect((await rig.customers.loadCustomer(customer.id))?.approvedLimit).toBe(1_200_000);
  });

  test('the store derives the installment from principal, rate and tenure', async () => {
    const loan = await seedLoan(rig, { customerId: customer.id, principal: 100_000, interestRate: 12, tenureMonths: 12 });
    expect(loan.monthlyInstallment).toBe(8884.88);
    expect((await rig.loans.getLoan(loan.id))?.monthlyInstallment).toBe(8884.88);
    expect(await rig.loans.sumActiveMonthlyEMIs(customer.id)).toBe(8884.88);

    const saved = await rig.loans.updateLoan({ ...loan, principal: 300_000, monthlyInstallment: 1 });
    expect(saved.monthlyInstallment).toBe(26654.64);
    expect(await rig.loans.sumActiveMonthlyEMIs(customer.id)).toBe(26654.64);
  });

  test('registration validates its input', async () => {
    await expect(rig.engine.registerCustomer({ firstName: 'A', lastName: 'B', monthlyIncome: 0, phoneNumber: '9000000002' }))
      .rejects.toThrow(InputValidationError);
    await expect(rig.engine.registerCustomer({ firstName: 'A', lastName: 'B', monthlyIncome: 1000, phoneNumber: 'call me' }))
      .rejects.toThrow(/phoneNumber: expected a phone number/);
  });
});
