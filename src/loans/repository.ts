import { Customer, LoanDraft, LoanRecord } from './types.js';

export type CustomerDraft = Omit<Customer, 'id'>;

/** Customer persistence the engine depends on. */
export interface CustomerRepository {
  loadCustomer(id: number): Promise<Customer | null>;
  insertCustomer(draft: CustomerDraft): Promise<Customer>;
  updateApprovedLimit(id: number, approvedLimit: number): Promise<void>;
}

/**
 * Loan persistence the engine depends on. "Active" means status = 'active';
 * history is every loan the customer has held, closed ones included.
 */
export interface LoanRepository {
  loadLoanHistory(customerId: number): Promise<LoanRecord[]>;
  loadActiveLoans(customerId: number): Promise<LoanRecord[]>;
  sumActiveMonthlyEMIs(customerId: number): Promise<number>;
  insertLoan(draft: LoanDraft): Promise<LoanRecord>;
  getLoan(id: number): Promise<LoanRecord | null>;
  updateLoan(loan: LoanRecord): Promise<LoanRecord>;
}

export type CreditRepositories = {
  customers: CustomerRepository;
  loans: LoanRepository;
};
