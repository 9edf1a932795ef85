import dayjs from 'dayjs';
import { Decimal, type DecimalLike } from '../lib/num/index.js';
import type { Loan } from './types.js';

const MONTHS_PER_YEAR = 12;
const LIMIT_MULTIPLIER = 36; // months of income
const LIMIT_STEP = 100_000;
const MONEY_DECIMALS = 2;

export const ISO_DATE = 'YYYY-MM-DD';

/** Periodic rate for an annual percentage rate: rate / 12 / 100. */
export function monthlyRateFromAnnual(annualRatePct: DecimalLike): Decimal {
  return Decimal.from(annualRatePct).div(MONTHS_PER_YEAR * 100);
}

/**
 * Fixed monthly installment on a reducing balance:
 * P * r * (1+r)^n / ((1+r)^n - 1), or P / n when the rate is zero.
 * Rounded half-even to the cent.
 */
export function monthlyInstallment(principal: DecimalLike, annualRatePct: DecimalLike, tenureMonths: number): Decimal {
  const p = Decimal.from(principal);
  const rate = Decimal.from(annualRatePct);
  if (!Number.isInteger(tenureMonths) || tenureMonths <= 0) throw new RangeError('tenure must be a positive integer');
  if (!p.isPositive()) throw new RangeError('principal must be positive');
  if (rate.isNegative()) throw new RangeError('interest rate must not be negative');

  const n = Decimal.fromBigInt(BigInt(tenureMonths));
  if (rate.isZero()) return p.div(n).round(MONEY_DECIMALS);

  const r = monthlyRateFromAnnual(rate);
  const growth = Decimal.ONE.add(r).pow(tenureMonths);
  const denominator = growth.sub(Decimal.ONE);
  if (denominator.isZero()) return p.div(n).round(MONEY_DECIMALS);
  return p.mul(r).mul(growth).div(denominator).round(MONEY_DECIMALS);
}

/**
 * 36 months of income, rounded to the nearest 100,000 (ties round up).
 */
export function approvedLimitFor(monthlyIncome: DecimalLike): Decimal {
  const raw = Decimal.from(monthlyIncome).mul(LIMIT_MULTIPLIER);
  if (!raw.isPositive()) return Decimal.ZERO;
  return raw.div(LIMIT_STEP).round(0, 'half-up').mul(LIMIT_STEP);
}

export function loanEndDate(startDate: string, tenureMonths: number): string {
  return dayjs(startDate).add(tenureMonths, 'month').format(ISO_DATE);
}

/** Whole months between the loan start and `asOf`, never negative. */
export function monthsElapsed(startDate: string, asOf: Date = new Date()): number {
  const diff = dayjs(asOf).diff(dayjs(startDate), 'month');
  return Math.max(0, diff);
}

export function repaymentsLeft(loan: Pick<Loan, 'tenure' | 'start_date'>, asOf: Date = new Date()): number {
  return Math.max(0, Math.min(loan.tenure, loan.tenure - monthsElapsed(loan.start_date, asOf)));
}

export function isActive(loan: Pick<Loan, 'tenure' | 'start_date'>, asOf: Date = new Date()): boolean {
  return repaymentsLeft(loan, asOf) > 0;
}
