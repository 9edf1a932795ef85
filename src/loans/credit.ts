import dayjs from 'dayjs';
import { Decimal, clamp, sum } from '../lib/num/index.js';
import type { CreditProfile, CreditScore, LoanHistoryEntry, ScoreBreakdown } from './types.js';

// Percent weights; they add up to 100.
export const SCORE_WEIGHTS: Readonly<ScoreBreakdown> = {
  onTime: 40,
  loanCount: 20,
  currentActivity: 20,
  volume: 20,
};

const PER_LOAN_PENALTY = 10;
const PER_CURRENT_YEAR_LOAN_PENALTY = 25;

/** Whole percent of a ratio held to [0, 1], rounded down. */
function toPercent(ratio: Decimal): number {
  return Number(Decimal.HUNDRED.mul(clamp(ratio, Decimal.ZERO, Decimal.ONE)).floor().toBigInt());
}

export function onTimeComponent(loans: LoanHistoryEntry[]): number {
  const expected = loans.reduce((acc, l) => acc + l.tenure, 0);
  if (expected <= 0) return 100;
  const paid = loans.reduce((acc, l) => acc + l.emis_paid_on_time, 0);
  return toPercent(Decimal.fromBigInt(BigInt(paid)).div(expected));
}

export function loanCountComponent(loans: LoanHistoryEntry[]): number {
  return Math.max(0, 100 - PER_LOAN_PENALTY * loans.length);
}

export function currentActivityComponent(loans: LoanHistoryEntry[], now: Date = new Date()): number {
  const year = dayjs(now).year();
  const recent = loans.filter((l) => dayjs(l.start_date).year() === year).length;
  return Math.max(0, 100 - PER_CURRENT_YEAR_LOAN_PENALTY * recent);
}

export function volumeComponent(loans: LoanHistoryEntry[], approvedLimit: Decimal): number {
  const total = sum(loans.map((l) => l.principal));
  if (!approvedLimit.isPositive()) return total.isZero() ? 100 : 0;
  return toPercent(Decimal.ONE.sub(total.div(approvedLimit)));
}

/**
 * Weighted composite of the four components, or exactly 0 when the customer
 * already owes more than their approved limit.
 */
export function scoreCredit(profile: CreditProfile, now: Date = new Date()): CreditScore {
  if (profile.current_debt.gt(profile.approved_limit)) {
    return { score: 0, gated: true, components: null };
  }

  const components: ScoreBreakdown = {
    onTime: onTimeComponent(profile.loans),
    loanCount: loanCountComponent(profile.loans),
    currentActivity: currentActivityComponent(profile.loans, now),
    volume: volumeComponent(profile.loans, profile.approved_limit),
  };

  const weighted =
    SCORE_WEIGHTS.onTime * components.onTime +
    SCORE_WEIGHTS.loanCount * components.loanCount +
    SCORE_WEIGHTS.currentActivity * components.currentActivity +
    SCORE_WEIGHTS.volume * components.volume;

  const score = Math.max(0, Math.min(100, Math.floor(weighted / 100)));
  return { score, gated: false, components };
}
