import type { Db } from '../db/connection.js';
import { computeEMI } from './calculator.js';
import { LoanRepository } from './repository.js';
import { LoanDraft, LoanRecord, LoanStatus } from './types.js';

type LoanRow = {
  id: number;
  customer_id: number;
  principal: number;
  interest_rate: number;
  tenure_months: number;
  monthly_installment: number;
  emis_paid_on_time: number;
  start_date: string | null;
  end_date: string | null;
  status: string;
};

function toStatus(s: string): LoanStatus {
  return s === 'closed' ? 'closed' : 'active';
}

function toLoan(row: LoanRow): LoanRecord {
  return {
    id: Number(row.id),
    customerId: Number(row.customer_id),
    principal: Number(row.principal),
    interestRate: Number(row.interest_rate),
    tenureMonths: Number(row.tenure_months),
    monthlyInstallment: Number(row.monthly_installment),
    emisPaidOnTime: Number(row.emis_paid_on_time || 0),
    startDate: row.start_date ?? null,
    endDate: row.end_date ?? null,
    status: toStatus(row.status),
  };
}

export class SqliteLoanStore implements LoanRepository {
  constructor(private readonly db: Db) {}

  async loadLoanHistory(customerId: number): Promise<LoanRecord[]> {
    const rows = this.db.prepare<[number], LoanRow>('SELECT * FROM loans WHERE customer_id = ? ORDER BY id ASC').all(customerId);
    return rows.map(toLoan);
  }

  async loadActiveLoans(customerId: number): Promise<LoanRecord[]> {
    const rows = this.db.prepare<[number], LoanRow>("SELECT * FROM loans WHERE customer_id = ? AND status = 'active' ORDER BY id ASC").all(customerId);
    return rows.map(toLoan);
  }

  async sumActiveMonthlyEMIs(customerId: number): Promise<number> {
    const total = this.db.prepare(
      `SELECT COALESCE(SUM(monthly_installment), 0) FROM loans WHERE customer_id = ? AND status = 'active'`
    ).pluck().get(customerId);
    return Number(total ?? 0);
  }

  async insertLoan(draft: LoanDraft): Promise<LoanRecord> {
    const monthlyInstallment = computeEMI(draft.principal, draft.interestRate, draft.tenureMonths);
    const info = this.db.prepare(
      `INSERT INTO loans(customer_id, principal, interest_rate, tenure_months, monthly_installment, emis_paid_on_time, start_date, end_date, status, created_at)
       VALUES(?,?,?,?,?,?,?,?,?,?)`
    ).run(draft.customerId, draft.principal, draft.interestRate, draft.tenureMonths, monthlyInstallment, draft.emisPaidOnTime, draft.startDate, draft.endDate, draft.status, Date.now());
    return { id: Number(info.lastInsertRowid), ...draft, monthlyInstallment };
  }

  async getLoan(id: number): Promise<LoanRecord | null> {
    const row = this.db.prepare<[number], LoanRow>('SELECT * FROM loans WHERE id = ?').get(id);
    return row ? toLoan(row) : null;
  }

  /** Persists the loan with its installment re-derived from principal, rate and tenure. */
  async updateLoan(loan: LoanRecord): Promise<LoanRecord> {
    const stored: LoanRecord = { ...loan, monthlyInstallment: computeEMI(loan.principal, loan.interestRate, loan.tenureMonths) };
    this.db.prepare('UPDATE loans SET principal=?, interest_rate=?, tenure_months=?, monthly_installment=?, emis_paid_on_time=?, start_date=?, end_date=?, status=? WHERE id = ?')
      .run(stored.principal, stored.interestRate, stored.tenureMonths, stored.monthlyInstallment, stored.emisPaidOnTime, stored.startDate, stored.endDate, stored.status, stored.id);
    return stored;
  }
}
