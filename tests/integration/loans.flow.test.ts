import dayjs from 'dayjs';
import { Decimal } from '../../src/lib/num/index.js';
import {
  checkEligibility,
  createLoan,
  registerCustomer,
  viewLoan,
  viewLoans,
} from '../../src/loans/service.js';
import type { CreditStore } from '../../src/loans/store.js';
import { ConflictError, NotFoundError, ValidationError } from '../../src/utils/errors.js';
import { FIXED_NOW, openTestStore, registration, testContext } from './helpers.js';

const UNKNOWN_ID = '00000000-0000-4000-8000-000000000000';

describe('loan lifecycle', () => {
  let store: CreditStore;

  beforeEach(() => {
    store = openTestStore();
  });

  afterEach(() => {
    store.close();
  });

  test('register derives the approved limit', () => {
    const ctx = testContext(store);
    const res = registerCustomer(ctx, registration({ first_name: 'Asha', last_name: 'Rao', phone_number: 9876543210 }));
    expect(res).toEqual({
      customer_id: expect.stringMatching(/^[0-9a-f-]{36}$/),
      name: 'Asha Rao',
      age: 30,
      monthly_income: '80000.00',
      approved_limit: '2900000.00',
      phone_number: '9876543210',
    });
    const stored = store.requireCustomer(res.customer_id);
    expect(stored.current_debt.toString()).toBe('0');
    expect(stored.source_id).toBeNull();
  });

  test('duplicate phone numbers conflict', () => {
    const ctx = testContext(store);
    registerCustomer(ctx, registration({ phone_number: '9811111111' }));
    expect(() => registerCustomer(ctx, registration({ phone_number: '9811111111' }))).toThrow(ConflictError);
  });

  test('invalid registration lists each field', () => {
    const ctx = testContext(store);
    try {
      registerCustomer(ctx, registration({ age: -4, monthly_income: 'lots' }));
      throw new Error('expected a validation error');
    } catch (e) {
      expect(e).toBeInstanceOf(ValidationError);
      if (!(e instanceof ValidationError)) return;
      expect(e.issues.map((i) => i.field).sort()).toEqual(['age', 'monthly_income']);
    }
  });

  test('eligibility for a customer with no history', () => {
    const ctx = testContext(store);
    const { customer_id } = registerCustomer(ctx, registration());
    const res = checkEligibility(ctx, { customer_id, loan_amount: 500000, interest_rate: 10, tenure: 24 });
    expect(res).toEqual({
      customer_id,
      approval: true,
      interest_rate: '10.00',
      corrected_interest_rate: '10.00',
      tenure: 24,
      monthly_installment: '23072.46',
      credit_score: 100,
    });
  });

  test('create, correct the rate on a second loan, then view', () => {
    const ctx = testContext(store);
    const { customer_id } = registerCustomer(ctx, registration());

    const first = createLoan(ctx, { customer_id, loan_amount: 500000, interest_rate: 10, tenure: 24 });
    expect(first).toEqual({
      loan_id: expect.any(Number),
      customer_id,
      loan_approved: true,
      message: 'Loan approved successfully.',
      monthly_installment: '23072.46',
    });
    expect(store.requireCustomer(customer_id).current_debt.toString()).toBe('500000');

    // One unpaid loan this year scores 49, so 8% is raised to the 12% floor.
    const check = checkEligibility(ctx, { customer_id, loan_amount: '100000', interest_rate: '8', tenure: 12 });
    expect(check.credit_score).toBe(49);
    expect(check.corrected_interest_rate).toBe('12.00');
    expect(check.monthly_installment).toBe('8884.88');

    const second = createLoan(ctx, { customer_id, loan_amount: '100000', interest_rate: '8', tenure: 12 });
    expect(second.loan_approved).toBe(true);
    expect(second.monthly_installment).toBe('8884.88');
    if (second.loan_id === null) throw new Error('expected a loan id');

    const view = viewLoan(ctx, String(second.loan_id));
    expect(view).toEqual({
      loan_id: second.loan_id,
      customer: {
        id: customer_id,
        first_name: 'Test',
        last_name: 'Customer',
        phone_number: expect.any(String),
        age: 30,
      },
      loan_amount: '100000.00',
      interest_rate: '12.00',
      monthly_installment: '8884.88',
      tenure: 12,
      repayments_left: 12,
    });

    const stored = store.getLoan(second.loan_id);
    expect(stored?.start_date).toBe(dayjs(FIXED_NOW).format('YYYY-MM-DD'));
    expect(stored?.end_date).toBe(dayjs(FIXED_NOW).add(12, 'month').format('YYYY-MM-DD'));

    expect(viewLoans(ctx, customer_id)).toEqual([
      { loan_id: second.loan_id, loan_amount: '100000.00', interest_rate: '12.00', monthly_installment: '8884.88', repayments_left: 12 },
      { loan_id: first.loan_id, loan_amount: '500000.00', interest_rate: '10.00', monthly_installment: '23072.46', repayments_left: 24 },
    ]);
    expect(store.requireCustomer(customer_id).current_debt.toString()).toBe('600000');
  });

  test('repayments left counts down as months pass', () => {
    const ctx = testContext(store);
    const { customer_id } = registerCustomer(ctx, registration());
    const { loan_id } = createLoan(ctx, { customer_id, loan_amount: 100000, interest_rate: 10, tenure: 12 });
    const later = testContext(store, dayjs(FIXED_NOW).add(5, 'month').toDate());
    expect(viewLoan(later, loan_id).repayments_left).toBe(7);
    const done = testContext(store, dayjs(FIXED_NOW).add(2, 'year').toDate());
    expect(viewLoans(done, customer_id)[0].repayments_left).toBe(0);
  });

  test('a rejected loan is not stored and leaves debt alone', () => {
    const ctx = testContext(store);
    const { customer_id } = registerCustomer(ctx, registration());
    createLoan(ctx, { customer_id, loan_amount: 500000, interest_rate: 10, tenure: 24 });
    createLoan(ctx, { customer_id, loan_amount: 100000, interest_rate: 8, tenure: 12 });

    const res = createLoan(ctx, { customer_id, loan_amount: 3000000, interest_rate: 10, tenure: 120 });
    expect(res).toEqual({
      loan_id: null,
      customer_id,
      loan_approved: false,
      message: "Requested loan amount exceeds the customer's approved limit.",
      monthly_installment: null,
    });
    expect(viewLoans(ctx, customer_id)).toHaveLength(2);
    expect(store.requireCustomer(customer_id).current_debt.toString()).toBe('600000');
  });

  test('a raised rate can push the installments over the income cap', () => {
    const ctx = testContext(store);
    const { customer_id } = registerCustomer(ctx, registration());
    createLoan(ctx, { customer_id, loan_amount: 500000, interest_rate: 10, tenure: 24 });

    // 23072.46 + 16701.78 at 8% fits under 40000; 23072.46 + 17058.97 at 12% does not.
    const body = { customer_id, loan_amount: 192000, interest_rate: 8, tenure: 12 };
    expect(checkEligibility(ctx, body)).toEqual({
      customer_id,
      approval: false,
      interest_rate: '8.00',
      corrected_interest_rate: '12.00',
      tenure: 12,
      monthly_installment: '17058.97',
      credit_score: 49,
      message: 'Sum of all current installments exceeds 50% of monthly income.',
    });
    expect(createLoan(ctx, body)).toEqual({
      loan_id: null,
      customer_id,
      loan_approved: false,
      message: 'Sum of all current installments exceeds 50% of monthly income.',
      monthly_installment: null,
    });
    expect(store.requireCustomer(customer_id).current_debt.toString()).toBe('500000');

    const atFloor = checkEligibility(ctx, { ...body, interest_rate: 12, loan_amount: 190000 });
    expect(atFloor.approval).toBe(true);
    expect(atFloor.corrected_interest_rate).toBe('12.00');
  });

  test('debt equals the sum of approved principals', () => {
    const ctx = testContext(store);
    const { customer_id } = registerCustomer(ctx, registration({ monthly_income: 200000 }));
    const results = [1, 2, 3].map(() =>
      createLoan(ctx, { customer_id, loan_amount: 50000, interest_rate: 16, tenure: 12 }));
    expect(results.map((r) => r.loan_approved)).toEqual([true, true, true]);
    expect(results.map((r) => r.monthly_installment)).toEqual(['4536.54', '4536.54', '4536.54']);
    expect(store.requireCustomer(customer_id).current_debt.toString()).toBe('150000');
  });

  test('customers already over their limit are scored 0', () => {
    const ctx = testContext(store);
    const over = store.insertCustomer({
      source_id: null,
      first_name: 'Over',
      last_name: 'Limit',
      age: 41,
      phone_number: '9822222222',
      monthly_income: Decimal.from(80000),
      current_debt: Decimal.from(5000000),
    });
    const body = { customer_id: over.id, loan_amount: 100000, interest_rate: 10, tenure: 12 };
    const check = checkEligibility(ctx, body);
    expect(check.approval).toBe(false);
    expect(check.credit_score).toBe(0);
    expect(check.message).toBe('Current debt exceeds the approved credit limit.');
    expect(createLoan(ctx, body).loan_approved).toBe(false);
  });

  test('installment above half the income has no score', () => {
    const ctx = testContext(store);
    const { customer_id } = registerCustomer(ctx, registration({ monthly_income: 20000 }));
    const res = checkEligibility(ctx, { customer_id, loan_amount: 500000, interest_rate: 10, tenure: 24 });
    expect(res.approval).toBe(false);
    expect(res.credit_score).toBeNull();
    expect(res.message).toBe('Monthly installment exceeds 50% of monthly income.');
  });

  test('unknown ids and malformed ids', () => {
    const ctx = testContext(store);
    expect(() => checkEligibility(ctx, { customer_id: UNKNOWN_ID, loan_amount: 1000, interest_rate: 10, tenure: 12 })).toThrow(NotFoundError);
    expect(() => viewLoan(ctx, '999')).toThrow(NotFoundError);
    expect(() => viewLoan(ctx, 'abc')).toThrow(ValidationError);
    expect(() => viewLoans(ctx, 'not-a-uuid')).toThrow(ValidationError);
    expect(() => viewLoans(ctx, UNKNOWN_ID)).toThrow(NotFoundError);
  });
});
