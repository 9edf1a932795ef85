import { z } from 'zod';
import { Decimal } from '../lib/num/index.js';
import { fromZodError } from '../utils/errors.js';

const MAX_TENURE_MONTHS = 600;

// Money and rates carry at most two decimal places and twelve digits in all.
const MAX_DECIMAL_PLACES = 2;
const DECIMAL_CEILING = Decimal.fromString('1e10');

/** A JSON number or a decimal string, turned into an exact Decimal. */
export const decimalInput = z
  .union([
    z.number().finite(),
    z.string().trim().refine((s) => Decimal.isDecimalString(s), { message: 'Expected a decimal number' }),
  ])
  .transform((v) => Decimal.from(v));

/**
 * A bounded decimal that must also satisfy `check`. The checks sit behind
 * `pipe` so they only ever see a parsed Decimal.
 */
export function decimalWhere(check: (d: Decimal) => boolean, message: string) {
  return decimalInput.pipe(
    z
      .custom<Decimal>((v) => v instanceof Decimal)
      .superRefine((d, ctx) => {
        if (d.scale > MAX_DECIMAL_PLACES) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `At most ${MAX_DECIMAL_PLACES} decimal places` });
        } else if (!d.lt(DECIMAL_CEILING) || !d.gt(DECIMAL_CEILING.negate())) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must have at most 10 integer digits' });
        } else if (!check(d)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message });
        }
      }),
  );
}

export const positiveDecimal = decimalWhere((d) => d.isPositive(), 'Must be greater than 0');
export const nonNegativeDecimal = decimalWhere((d) => !d.isNegative(), 'Must not be negative');
export const percentRate = decimalWhere((d) => !d.isNegative() && d.lte(100), 'Must be between 0 and 100');

const name = z.string().trim().min(1).max(100);

export const phoneNumber = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((v) => String(v).trim())
  .pipe(z.string().regex(/^\+?\d{7,15}$/, 'Expected 7 to 15 digits'));

export const registerSchema = z.object({
  first_name: name,
  last_name: name,
  age: z.number().int().positive(),
  monthly_income: positiveDecimal,
  phone_number: phoneNumber,
}).strict();

export const loanRequestSchema = z.object({
  customer_id: z.string().uuid(),
  loan_amount: positiveDecimal,
  interest_rate: percentRate,
  tenure: z.number().int().positive().max(MAX_TENURE_MONTHS),
}).strict();

export const customerIdParam = z.string().uuid();

export const loanIdParam = z
  .union([z.number(), z.string().regex(/^\d+$/, 'Expected a positive integer')])
  .transform(Number)
  .pipe(z.number().int().positive());

export type LoanRequest = z.infer<typeof loanRequestSchema>;

/** Parse or throw a ValidationError listing every offending field. */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown, message = 'Invalid request'): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw fromZodError(parsed.error, message);
  return parsed.data;
}
