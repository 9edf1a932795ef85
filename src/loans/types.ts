import type { Decimal } from '../lib/num/index.js';

export type Customer = {
  id: string;
  source_id: number | null; // customer id from the ingestion sheet
  first_name: string;
  last_name: string;
  age: number;
  phone_number: string;
  monthly_income: Decimal;
  approved_limit: Decimal;
  current_debt: Decimal;
  registered_at: number; // ms since epoch
};

export type Loan = {
  id: number;
  customer_id: string;
  principal: Decimal;
  interest_rate: Decimal; // percent per annum
  tenure: number; // months
  monthly_installment: Decimal;
  emis_paid_on_time: number;
  start_date: string; // YYYY-MM-DD
  end_date: string;   // YYYY-MM-DD
  created_at: number; // ms since epoch
};

export type NewCustomer = Omit<Customer, 'id' | 'approved_limit' | 'registered_at'> & { id?: string };

export type HistoricalLoan = Omit<Loan, 'monthly_installment' | 'created_at'>;

export type LoanHistoryEntry = Pick<Loan, 'principal' | 'tenure' | 'emis_paid_on_time' | 'start_date'>;

export type CreditProfile = {
  loans: LoanHistoryEntry[];
  current_debt: Decimal;
  approved_limit: Decimal;
};

export type ScoreBreakdown = {
  onTime: number;
  loanCount: number;
  currentActivity: number;
  volume: number;
};

export type CreditScore = {
  score: number; // 0..100
  gated: boolean; // current debt above approved limit
  components: ScoreBreakdown | null;
};

export type RejectionReason =
  | 'installment_exceeds_income'
  | 'debt_exceeds_limit'
  | 'score_too_low'
  | 'amount_exceeds_limit'
  | 'installments_exceed_income';

export type EligibilityDecision = {
  approved: boolean;
  score: number | null; // null when rejected before scoring
  interest_rate: Decimal;
  corrected_interest_rate: Decimal;
  monthly_installment: Decimal;
  reason: RejectionReason | null;
  message: string | null;
};
