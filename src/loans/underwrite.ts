import { Decimal } from '../lib/num/index.js';
import { monthlyInstallment } from './calculator.js';
import { scoreCredit } from './credit.js';
import type { CreditProfile, EligibilityDecision, RejectionReason } from './types.js';

export type RateSlab = {
  above: number; // score must be strictly greater
  minRate: Decimal | null;
};

// Ordered from best to worst; a score at or below the last slab is rejected.
export const RATE_SLABS: readonly RateSlab[] = [
  { above: 50, minRate: null },
  { above: 30, minRate: Decimal.fromString('12') },
  { above: 10, minRate: Decimal.fromString('16') },
];

export const MAX_INSTALLMENT_SHARE = Decimal.fromString('0.5');

export const REJECTION_MESSAGES: Record<RejectionReason, string> = {
  installment_exceeds_income: 'Monthly installment exceeds 50% of monthly income.',
  debt_exceeds_limit: 'Current debt exceeds the approved credit limit.',
  score_too_low: 'Credit score too low for loan approval.',
  amount_exceeds_limit: "Requested loan amount exceeds the customer's approved limit.",
  installments_exceed_income: 'Sum of all current installments exceeds 50% of monthly income.',
};

export type EligibilityInput = {
  profile: CreditProfile;
  monthly_income: Decimal;
  active_installments: Decimal; // sum over loans with repayments left
  loan_amount: Decimal;
  interest_rate: Decimal;
  tenure: number;
  now?: Date;
};

export function slabFor(score: number): RateSlab | null {
  return RATE_SLABS.find((s) => score > s.above) ?? null;
}

export function correctRate(requested: Decimal, slab: RateSlab): Decimal {
  if (slab.minRate && requested.lt(slab.minRate)) return slab.minRate;
  return requested;
}

export function assessEligibility(input: EligibilityInput): EligibilityDecision {
  const { profile, loan_amount, interest_rate, tenure } = input;
  const incomeCap = input.monthly_income.mul(MAX_INSTALLMENT_SHARE);

  const reject = (reason: RejectionReason, score: number | null, corrected: Decimal, installment: Decimal): EligibilityDecision => ({
    approved: false,
    score,
    interest_rate,
    corrected_interest_rate: corrected,
    monthly_installment: installment,
    reason,
    message: REJECTION_MESSAGES[reason],
  });

  const requestedInstallment = monthlyInstallment(loan_amount, interest_rate, tenure);
  if (requestedInstallment.gt(incomeCap)) {
    return reject('installment_exceeds_income', null, interest_rate, requestedInstallment);
  }

  const credit = scoreCredit(profile, input.now);
  if (credit.gated) return reject('debt_exceeds_limit', credit.score, interest_rate, requestedInstallment);

  const slab = slabFor(credit.score);
  if (!slab) return reject('score_too_low', credit.score, interest_rate, requestedInstallment);

  const corrected = correctRate(interest_rate, slab);
  const installment = corrected.eq(interest_rate)
    ? requestedInstallment
    : monthlyInstallment(loan_amount, corrected, tenure);

  if (loan_amount.gt(profile.approved_limit)) {
    return reject('amount_exceeds_limit', credit.score, corrected, installment);
  }
  if (input.active_installments.add(installment).gt(incomeCap)) {
    return reject('installments_exceed_income', credit.score, corrected, installment);
  }

  return {
    approved: true,
    score: credit.score,
    interest_rate,
    corrected_interest_rate: corrected,
    monthly_installment: installment,
    reason: null,
    message: null,
  };
}
