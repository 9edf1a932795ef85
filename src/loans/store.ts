import { randomUUID } from 'node:crypto';
import dayjs from 'dayjs';
import Database from 'better-sqlite3';
import { openDb } from '../db/connection.js';
import { migrate } from '../db/migrate.js';
import { Decimal, type DecimalLike } from '../lib/num/index.js';
import { silentLogger, type Logger } from '../log.js';
import { ConflictError, NotFoundError } from '../utils/errors.js';
import { ISO_DATE, approvedLimitFor, loanEndDate, monthlyInstallment } from './calculator.js';
import type { Customer, HistoricalLoan, Loan, NewCustomer } from './types.js';

type CustomerRow = {
  id: string;
  source_id: number | null;
  first_name: string;
  last_name: string;
  age: number;
  phone_number: string;
  monthly_income: string;
  approved_limit: string;
  current_debt: string;
  registered_at: number;
};

type LoanRow = {
  id: number;
  customer_id: string;
  principal: string;
  interest_rate: string;
  tenure: number;
  monthly_installment: string;
  emis_paid_on_time: number;
  start_date: string;
  end_date: string;
  created_at: number;
};

function toCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    source_id: row.source_id ?? null,
    first_name: row.first_name,
    last_name: row.last_name,
    age: Number(row.age),
    phone_number: row.phone_number,
    monthly_income: Decimal.fromString(row.monthly_income),
    approved_limit: Decimal.fromString(row.approved_limit),
    current_debt: Decimal.fromString(row.current_debt),
    registered_at: Number(row.registered_at),
  };
}

function toLoan(row: LoanRow): Loan {
  return {
    id: Number(row.id),
    customer_id: row.customer_id,
    principal: Decimal.fromString(row.principal),
    interest_rate: Decimal.fromString(row.interest_rate),
    tenure: Number(row.tenure),
    monthly_installment: Decimal.fromString(row.monthly_installment),
    emis_paid_on_time: Number(row.emis_paid_on_time),
    start_date: row.start_date,
    end_date: row.end_date,
    created_at: Number(row.created_at),
  };
}

function isUniqueViolation(err: unknown, column: string): boolean {
  return err instanceof Database.SqliteError
    && err.code === 'SQLITE_CONSTRAINT_UNIQUE'
    && err.message.includes(column);
}

export type CreateLoanArgs = {
  customer_id: string;
  amount: DecimalLike;
  interest_rate: DecimalLike;
  tenure: number;
  monthly_installment: DecimalLike;
  start_date?: string;
};

/**
 * Customer and loan records over one SQLite connection. Construct it with
 * {@link openStore} and hand it to every caller that needs it.
 */
export class CreditStore {
  constructor(readonly db: Database.Database, private readonly log: Logger = silentLogger) {}

  // ============================================================================
  // Customers
  // ============================================================================

  getCustomer(id: string): Customer | null {
    const row = this.db.prepare<[string], CustomerRow>('SELECT * FROM customers WHERE id = ?').get(id);
    return row ? toCustomer(row) : null;
  }

  requireCustomer(id: string): Customer {
    const customer = this.getCustomer(id);
    if (!customer) throw new NotFoundError('Customer not found.');
    return customer;
  }

  getCustomerByPhone(phone: string): Customer | null {
    const row = this.db.prepare<[string], CustomerRow>('SELECT * FROM customers WHERE phone_number = ?').get(phone);
    return row ? toCustomer(row) : null;
  }

  getCustomerBySourceId(sourceId: number): Customer | null {
    const row = this.db.prepare<[number], CustomerRow>('SELECT * FROM customers WHERE source_id = ?').get(sourceId);
    return row ? toCustomer(row) : null;
  }

  /**
   * Insert a customer; the approved limit is derived from monthly income here
   * and never recomputed.
   */
  insertCustomer(input: NewCustomer, now: number = Date.now()): Customer {
    const id = input.id ?? randomUUID();
    const limit = approvedLimitFor(input.monthly_income);
    try {
      this.db.prepare(
        `INSERT INTO customers(id, source_id, first_name, last_name, age, phone_number, monthly_income, approved_limit, current_debt, registered_at)
         VALUES(?,?,?,?,?,?,?,?,?,?)`,
      ).run(
        id, input.source_id, input.first_name, input.last_name, input.age, input.phone_number,
        input.monthly_income.toString(), limit.toString(), input.current_debt.toString(), now,
      );
    } catch (e) {
      if (isUniqueViolation(e, 'customers.phone_number')) {
        throw new ConflictError('Customer with this phone number already exists.', [
          { field: 'phone_number', message: 'already registered' },
        ]);
      }
      throw e;
    }
    return this.requireCustomer(id);
  }

  // ============================================================================
  // Loans
  // ============================================================================

  getLoan(id: number): Loan | null {
    const row = this.db.prepare<[number], LoanRow>('SELECT * FROM loans WHERE id = ?').get(id);
    return row ? toLoan(row) : null;
  }

  hasLoan(id: number): boolean {
    return !!this.db.prepare<[number], { x: number }>('SELECT 1 AS x FROM loans WHERE id = ?').get(id);
  }

  getLoansForCustomer(customerId: string): Loan[] {
    const rows = this.db
      .prepare<[string], LoanRow>('SELECT * FROM loans WHERE customer_id = ? ORDER BY start_date DESC, id DESC')
      .all(customerId);
    return rows.map(toLoan);
  }

  /**
   * Insert a newly approved loan and add its principal to the customer's
   * current debt. Both writes happen in one transaction.
   */
  createLoan(args: CreateLoanArgs, now: number = Date.now()): Loan {
    const startDate = args.start_date ?? dayjs(now).format(ISO_DATE);
    const amount = Decimal.from(args.amount);
    const tx = this.db.transaction(() => {
      const customer = this.requireCustomer(args.customer_id);
      const info = this.db.prepare(
        `INSERT INTO loans(customer_id, principal, interest_rate, tenure, monthly_installment, emis_paid_on_time, start_date, end_date, created_at)
         VALUES(?,?,?,?,?,?,?,?,?)`,
      ).run(
        args.customer_id, amount.toString(), Decimal.from(args.interest_rate).toString(), args.tenure,
        Decimal.from(args.monthly_installment).toString(), 0, startDate, loanEndDate(startDate, args.tenure), now,
      );
      this.db.prepare('UPDATE customers SET current_debt = ? WHERE id = ?')
        .run(customer.current_debt.add(amount).toString(), customer.id);
      return Number(info.lastInsertRowid);
    });
    const id = tx.immediate();
    const loan = this.getLoan(id);
    if (!loan) throw new Error(`Loan ${id} vanished after insert`);
    this.log.debug({ msg: 'loan_inserted', loanId: id, customerId: args.customer_id, principal: amount.toString() });
    return loan;
  }

  /**
   * Insert a loan from ingested history and add its principal to the owner's
   * current debt. The installment is recomputed from principal, rate and tenure.
   */
  insertHistoricalLoan(input: HistoricalLoan, now: number = Date.now()): Loan {
    const installment = monthlyInstallment(input.principal, input.interest_rate, input.tenure);
    this.transaction(() => {
      const customer = this.requireCustomer(input.customer_id);
      this.db.prepare(
        `INSERT INTO loans(id, customer_id, principal, interest_rate, tenure, monthly_installment, emis_paid_on_time, start_date, end_date, created_at)
         VALUES(?,?,?,?,?,?,?,?,?,?)`,
      ).run(
        input.id, input.customer_id, input.principal.toString(), input.interest_rate.toString(), input.tenure,
        installment.toString(), input.emis_paid_on_time, input.start_date, input.end_date, now,
      );
      this.db.prepare('UPDATE customers SET current_debt = ? WHERE id = ?')
        .run(customer.current_debt.add(input.principal).toString(), customer.id);
    });
    const loan = this.getLoan(input.id);
    if (!loan) throw new Error(`Loan ${input.id} vanished after insert`);
    return loan;
  }

  // ============================================================================
  // Plumbing
  // ============================================================================

  /** Run `fn` inside BEGIN IMMEDIATE; a throw rolls everything back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

/**
 * Open the database file (or ":memory:"), apply pending migrations and wrap it.
 */
export function openStore(file: string, log: Logger = silentLogger): CreditStore {
  const db = openDb(file);
  migrate(db, log);
  return new CreditStore(db, log);
}
