import type { Db } from '../db/connection.js';
import { CustomerDraft, CustomerRepository } from '../loans/repository.js';
import { Customer } from '../loans/types.js';

type CustomerRow = {
  id: number;
  first_name: string;
  last_name: string;
  age: number | null;
  phone_number: string;
  monthly_income: number;
  approved_limit: number;
};

function toCustomer(row: CustomerRow): Customer {
  return {
    id: Number(row.id),
    firstName: row.first_name,
    lastName: row.last_name,
    age: row.age === null ? null : Number(row.age),
    phoneNumber: String(row.phone_number),
    monthlyIncome: Number(row.monthly_income),
    approvedLimit: Number(row.approved_limit),
  };
}

export class SqliteCustomerStore implements CustomerRepository {
  constructor(private readonly db: Db) {}

  async loadCustomer(id: number): Promise<Customer | null> {
    const row = this.db.prepare<[number], CustomerRow>('SELECT * FROM customers WHERE id = ?').get(id);
    return row ? toCustomer(row) : null;
  }

  async insertCustomer(draft: CustomerDraft): Promise<Customer> {
    const info = this.db.prepare(
      'INSERT INTO customers(first_name, last_name, age, phone_number, monthly_income, approved_limit, created_at) VALUES(?,?,?,?,?,?,?)'
    ).run(draft.firstName, draft.lastName, draft.age, draft.phoneNumber, draft.monthlyIncome, draft.approvedLimit, Date.now());
    return { id: Number(info.lastInsertRowid), ...draft };
  }

  async updateApprovedLimit(id: number, approvedLimit: number): Promise<void> {
    this.db.prepare('UPDATE customers SET approved_limit = ? WHERE id = ?').run(approvedLimit, id);
  }
}
