import { DEFAULT_POLICY, Policy } from '../../src/config/index.js';
import { openDb, Db } from '../../src/db/connection.js';
import { SqliteCustomerStore } from '../../src/customers/store.js';
import { LoanEngine } from '../../src/loans/engine.js';
import { SqliteLoanStore } from '../../src/loans/store.js';
import { LoanDraft, LoanRecord } from '../../src/loans/types.js';
import { KeyedMutexes } from '../../src/util/locks.js';

export const AS_OF = new Date(2024, 5, 15);

export type TestRig = {
  db: Db;
  engine: LoanEngine;
  customers: SqliteCustomerStore;
  loans: SqliteLoanStore;
};

/** Fresh in-memory database, migrated, with an engine pinned to AS_OF. */
export function openTestRig(policy: Policy = DEFAULT_POLICY, db: Db = openDb(':memory:')): TestRig {
  const customers = new SqliteCustomerStore(db);
  const loans = new SqliteLoanStore(db);
  const engine = new LoanEngine({ customers, loans }, { policy, clock: () => AS_OF, locks: new KeyedMutexes() });
  return { db, engine, customers, loans };
}

/** Insert a historical loan directly, bypassing eligibility. */
export function seedLoan(rig: TestRig, draft: Partial<LoanDraft> & { customerId: number; principal: number }): Promise<LoanRecord> {
  const interestRate = draft.interestRate ?? 12;
  const tenureMonths = draft.tenureMonths ?? 12;
  return rig.loans.insertLoan({
    interestRate,
    tenureMonths,
    emisPaidOnTime: 0,
    startDate: '2022-01-01',
    endDate: null,
    status: 'active',
    ...draft,
  });
}
