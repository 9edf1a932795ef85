import { Decimal, sum } from '../lib/num/index.js';
import type { Logger } from '../log.js';
import { ConflictError, NotFoundError } from '../utils/errors.js';
import { isActive, repaymentsLeft } from './calculator.js';
import {
  customerIdParam,
  loanIdParam,
  loanRequestSchema,
  parseRequest,
  registerSchema,
  type LoanRequest,
} from './schemas.js';
import type { CreditStore } from './store.js';
import type { Customer, EligibilityDecision, Loan } from './types.js';
import { assessEligibility } from './underwrite.js';

export type ServiceContext = {
  store: CreditStore;
  log: Logger;
  now?: () => Date;
};

export type RegisterResponse = {
  customer_id: string;
  name: string;
  age: number;
  monthly_income: string;
  approved_limit: string;
  phone_number: string;
};

export type EligibilityResponse = {
  customer_id: string;
  approval: boolean;
  interest_rate: string;
  corrected_interest_rate: string;
  tenure: number;
  monthly_installment: string;
  credit_score: number | null;
  message?: string;
};

export type CreateLoanResponse = {
  loan_id: number | null;
  customer_id: string;
  loan_approved: boolean;
  message: string;
  monthly_installment: string | null;
};

export type ViewLoanResponse = {
  loan_id: number;
  customer: {
    id: string;
    first_name: string;
    last_name: string;
    phone_number: string;
    age: number;
  };
  loan_amount: string;
  interest_rate: string;
  monthly_installment: string;
  tenure: number;
  repayments_left: number;
};

export type LoanSummary = {
  loan_id: number;
  loan_amount: string;
  interest_rate: string;
  monthly_installment: string;
  repayments_left: number;
};

const money = (d: { toFixed(decimals: number): string }) => d.toFixed(2);

function clock(ctx: ServiceContext): Date {
  return ctx.now ? ctx.now() : new Date();
}

/**
 * Score the request against the customer's stored history. Pure read.
 */
export function evaluate(customer: Customer, loans: Loan[], req: LoanRequest, now: Date): EligibilityDecision {
  const active = loans.filter((l) => isActive(l, now));
  return assessEligibility({
    profile: {
      loans,
      current_debt: customer.current_debt,
      approved_limit: customer.approved_limit,
    },
    monthly_income: customer.monthly_income,
    active_installments: sum(active.map((l) => l.monthly_installment)),
    loan_amount: req.loan_amount,
    interest_rate: req.interest_rate,
    tenure: req.tenure,
    now,
  });
}

export function registerCustomer(ctx: ServiceContext, body: unknown): RegisterResponse {
  const req = parseRequest(registerSchema, body);
  if (ctx.store.getCustomerByPhone(req.phone_number)) {
    throw new ConflictError('Customer with this phone number already exists.', [
      { field: 'phone_number', message: 'already registered' },
    ]);
  }
  const customer = ctx.store.insertCustomer({
    source_id: null,
    first_name: req.first_name,
    last_name: req.last_name,
    age: req.age,
    phone_number: req.phone_number,
    monthly_income: req.monthly_income,
    current_debt: Decimal.ZERO,
  }, clock(ctx).getTime());
  ctx.log.info({ msg: 'customer_registered', customerId: customer.id, approvedLimit: customer.approved_limit.toString() });
  return {
    customer_id: customer.id,
    name: `${customer.first_name} ${customer.last_name}`,
    age: customer.age,
    monthly_income: money(customer.monthly_income),
    approved_limit: money(customer.approved_limit),
    phone_number: customer.phone_number,
  };
}

export function checkEligibility(ctx: ServiceContext, body: unknown): EligibilityResponse {
  const req = parseRequest(loanRequestSchema, body);
  const customer = ctx.store.requireCustomer(req.customer_id);
  const decision = evaluate(customer, ctx.store.getLoansForCustomer(customer.id), req, clock(ctx));
  ctx.log.info({ msg: 'eligibility_checked', customerId: customer.id, approved: decision.approved, score: decision.score, reason: decision.reason });
  const res: EligibilityResponse = {
    customer_id: customer.id,
    approval: decision.approved,
    interest_rate: money(decision.interest_rate),
    corrected_interest_rate: money(decision.corrected_interest_rate),
    tenure: req.tenure,
    monthly_installment: money(decision.monthly_installment),
    credit_score: decision.score,
  };
  if (decision.message) res.message = decision.message;
  return res;
}

/**
 * Assess and, when approved, persist the loan at the corrected rate and add
 * its principal to the customer's debt. The read-assess-write sequence runs in
 * one immediate transaction so concurrent requests for the same customer
 * serialize on the database write lock.
 */
export function createLoan(ctx: ServiceContext, body: unknown): CreateLoanResponse {
  const req = parseRequest(loanRequestSchema, body);
  const now = clock(ctx);

  const { decision, loan } = ctx.store.transaction(() => {
    const customer = ctx.store.requireCustomer(req.customer_id);
    const decision = evaluate(customer, ctx.store.getLoansForCustomer(customer.id), req, now);
    if (!decision.approved) return { decision, loan: null };
    const loan = ctx.store.createLoan({
      customer_id: customer.id,
      amount: req.loan_amount,
      interest_rate: decision.corrected_interest_rate,
      tenure: req.tenure,
      monthly_installment: decision.monthly_installment,
    }, now.getTime());
    return { decision, loan };
  });

  if (!loan) {
    ctx.log.info({ msg: 'loan_rejected', customerId: req.customer_id, reason: decision.reason, score: decision.score });
    return {
      loan_id: null,
      customer_id: req.customer_id,
      loan_approved: false,
      message: decision.message ?? 'Loan not approved due to eligibility criteria.',
      monthly_installment: null,
    };
  }

  ctx.log.info({ msg: 'loan_created', loanId: loan.id, customerId: loan.customer_id, principal: loan.principal.toString(), rate: loan.interest_rate.toString() });
  return {
    loan_id: loan.id,
    customer_id: loan.customer_id,
    loan_approved: true,
    message: 'Loan approved successfully.',
    monthly_installment: money(loan.monthly_installment),
  };
}

export function viewLoan(ctx: ServiceContext, loanId: unknown): ViewLoanResponse {
  const id = parseRequest(loanIdParam, loanId, 'Invalid loan id');
  const loan = ctx.store.getLoan(id);
  if (!loan) throw new NotFoundError('Loan not found.');
  const customer = ctx.store.requireCustomer(loan.customer_id);
  return {
    loan_id: loan.id,
    customer: {
      id: customer.id,
      first_name: customer.first_name,
      last_name: customer.last_name,
      phone_number: customer.phone_number,
      age: customer.age,
    },
    loan_amount: money(loan.principal),
    interest_rate: money(loan.interest_rate),
    monthly_installment: money(loan.monthly_installment),
    tenure: loan.tenure,
    repayments_left: repaymentsLeft(loan, clock(ctx)),
  };
}

export function viewLoans(ctx: ServiceContext, customerId: unknown): LoanSummary[] {
  const id = parseRequest(customerIdParam, customerId, 'Invalid customer id');
  const customer = ctx.store.requireCustomer(id);
  const now = clock(ctx);
  return ctx.store.getLoansForCustomer(customer.id).map((loan) => ({
    loan_id: loan.id,
    loan_amount: money(loan.principal),
    interest_rate: money(loan.interest_rate),
    monthly_installment: money(loan.monthly_installment),
    repayments_left: repaymentsLeft(loan, now),
  }));
}
