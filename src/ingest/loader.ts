import path from 'node:path';
import dayjs from 'dayjs';
import { Workbook, type CellValue, type Worksheet } from 'exceljs';
import { z } from 'zod';
import type { RowPolicy } from '../config/index.js';
import { Decimal } from '../lib/num/index.js';
import { silentLogger, type Logger } from '../log.js';
import { ISO_DATE, loanEndDate } from '../loans/calculator.js';
import { nonNegativeDecimal, percentRate, phoneNumber, positiveDecimal } from '../loans/schemas.js';
import type { CreditStore } from '../loans/store.js';
import { ValidationError, issuesFromZod, type FieldIssue } from '../utils/errors.js';

export type Cell = string | number | boolean | null;
export type SheetRow = { row: number; values: Record<string, Cell> };

export type SheetName = 'customers' | 'loans';

export type IngestProblem = { sheet: SheetName; row: number; message: string };

export type SheetSummary = { created: number; existing: number; skipped: number };

export type IngestSummary = {
  customers: SheetSummary;
  loans: SheetSummary;
  problems: IngestProblem[];
};

export type IngestOptions = {
  customersFile: string;
  loansFile: string;
  onInvalidRow: RowPolicy;
};

export type ProgressFn = (sheet: SheetName, done: number, total: number) => void;

// ============================================================================
// Reading
// ============================================================================

/** "Monthly Salary" → "monthly_salary", "EMIs paid on Time" → "emis_paid_on_time". */
export function normalizeHeader(h: string): string {
  return h
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_]/g, '');
}

function toCell(v: CellValue): Cell {
  if (v === null || v === undefined) return null;
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  if (v instanceof Date) return v.toISOString().slice(0, 10);
  if ('richText' in v) return v.richText.map((t) => t.text).join('');
  if ('hyperlink' in v) return v.text;
  if ('error' in v) return null;
  if ('result' in v && v.result !== undefined) return toCell(v.result);
  return null;
}

async function firstWorksheet(file: string): Promise<Worksheet | undefined> {
  const wb = new Workbook();
  if (path.extname(file).toLowerCase() === '.csv') {
    return wb.csv.readFile(file, { map: (value: string) => value });
  }
  await wb.xlsx.readFile(file);
  return wb.worksheets[0];
}

/**
 * First worksheet of an .xlsx or .csv file as header-keyed rows. Blank rows are
 * dropped; CSV values stay strings for the row schemas to coerce.
 */
export async function readSheet(file: string): Promise<SheetRow[]> {
  const ws = await firstWorksheet(file);
  if (!ws) throw new ValidationError(`No worksheet found in ${file}`);

  const headers: string[] = [];
  ws.getRow(1).eachCell({ includeEmpty: true }, (cell, col) => {
    headers[col] = normalizeHeader(String(toCell(cell.value) ?? ''));
  });

  const rows: SheetRow[] = [];
  ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;
    const values: Record<string, Cell> = {};
    let blank = true;
    headers.forEach((h, col) => {
      if (!h) return;
      const cell = toCell(row.getCell(col).value);
      const value = typeof cell === 'string' && cell.trim() === '' ? null : cell;
      if (value !== null) blank = false;
      values[h] = value;
    });
    if (!blank) rows.push({ row: rowNumber, values });
  });
  return rows;
}

// ============================================================================
// Row schemas
// ============================================================================

const emptyToUndefined = (v: unknown) => (v === null || v === '' ? undefined : v);

const intField = (min: number) => z.preprocess(emptyToUndefined, z.coerce.number().int().min(min));

const isoDate = z.string().trim().refine((s) => /^\d{4}-\d{2}-\d{2}$/.test(s) && dayjs(s).format(ISO_DATE) === s, {
  message: 'Expected a YYYY-MM-DD date',
});

export const customerRowSchema = z.object({
  customer_id: intField(1),
  first_name: z.preprocess(emptyToUndefined, z.coerce.string().trim().min(1)),
  last_name: z.preprocess(emptyToUndefined, z.coerce.string().trim().min(1)),
  age: intField(1),
  phone_number: z.preprocess(emptyToUndefined, phoneNumber),
  monthly_salary: z.preprocess(emptyToUndefined, positiveDecimal),
  current_debt: z.preprocess(emptyToUndefined, nonNegativeDecimal.optional()),
});

export const loanRowSchema = z.object({
  customer_id: intField(1),
  loan_id: intField(1),
  loan_amount: z.preprocess(emptyToUndefined, positiveDecimal),
  tenure: intField(1),
  interest_rate: z.preprocess(emptyToUndefined, percentRate),
  emis_paid_on_time: z.preprocess((v) => emptyToUndefined(v) ?? 0, z.coerce.number().int().min(0)),
  date_of_approval: z.preprocess(emptyToUndefined, isoDate),
  end_date: z.preprocess(emptyToUndefined, isoDate.optional()),
});

// ============================================================================
// Loading
// ============================================================================

type Outcome = 'created' | 'existing' | { problem: string; issues?: FieldIssue[] };

function summarizeIssues(issues: FieldIssue[]): string {
  return issues.map((i) => `${i.field}: ${i.message}`).join('; ');
}

function loadSheet(
  store: CreditStore,
  sheet: SheetName,
  rows: SheetRow[],
  policy: RowPolicy,
  log: Logger,
  apply: (values: Record<string, Cell>) => Outcome,
  onProgress?: ProgressFn,
): { summary: SheetSummary; problems: IngestProblem[] } {
  const summary: SheetSummary = { created: 0, existing: 0, skipped: 0 };
  const problems: IngestProblem[] = [];

  store.transaction(() => {
    rows.forEach((r, i) => {
      const outcome = apply(r.values);
      if (outcome === 'created' || outcome === 'existing') {
        summary[outcome] += 1;
      } else {
        if (policy === 'fail') {
          throw new ValidationError(`${sheet} sheet row ${r.row}: ${outcome.problem}`, outcome.issues);
        }
        summary.skipped += 1;
        problems.push({ sheet, row: r.row, message: outcome.problem });
        log.warn({ msg: 'ingest_row_skipped', sheet, row: r.row, reason: outcome.problem });
      }
      onProgress?.(sheet, i + 1, rows.length);
    });
  });
  return { summary, problems };
}

export function ingestCustomers(
  store: CreditStore,
  rows: SheetRow[],
  policy: RowPolicy = 'skip',
  log: Logger = silentLogger,
  onProgress?: ProgressFn,
  now: number = Date.now(),
) {
  return loadSheet(store, 'customers', rows, policy, log, (values) => {
    const parsed = customerRowSchema.safeParse(values);
    if (!parsed.success) {
      const issues = issuesFromZod(parsed.error);
      return { problem: summarizeIssues(issues), issues };
    }
    const row = parsed.data;
    if (store.getCustomerBySourceId(row.customer_id)) return 'existing';
    if (store.getCustomerByPhone(row.phone_number)) {
      return { problem: `phone_number ${row.phone_number} already belongs to another customer` };
    }
    store.insertCustomer({
      source_id: row.customer_id,
      first_name: row.first_name,
      last_name: row.last_name,
      age: row.age,
      phone_number: row.phone_number,
      monthly_income: row.monthly_salary,
      current_debt: row.current_debt ?? Decimal.ZERO,
    }, now);
    return 'created';
  }, onProgress);
}

export function ingestLoans(
  store: CreditStore,
  rows: SheetRow[],
  policy: RowPolicy = 'skip',
  log: Logger = silentLogger,
  onProgress?: ProgressFn,
  now: number = Date.now(),
) {
  return loadSheet(store, 'loans', rows, policy, log, (values) => {
    const parsed = loanRowSchema.safeParse(values);
    if (!parsed.success) {
      const issues = issuesFromZod(parsed.error);
      return { problem: summarizeIssues(issues), issues };
    }
    const row = parsed.data;
    if (store.hasLoan(row.loan_id)) return 'existing';
    const customer = store.getCustomerBySourceId(row.customer_id);
    if (!customer) return { problem: `unknown customer_id ${row.customer_id}` };
    store.insertHistoricalLoan({
      id: row.loan_id,
      customer_id: customer.id,
      principal: row.loan_amount,
      interest_rate: row.interest_rate,
      tenure: row.tenure,
      emis_paid_on_time: row.emis_paid_on_time,
      start_date: row.date_of_approval,
      end_date: row.end_date ?? loanEndDate(row.date_of_approval, row.tenure),
    }, now);
    return 'created';
  }, onProgress);
}

/**
 * Load the customer sheet, then the loan sheet. Safe to run repeatedly: rows
 * already present are counted as existing.
 */
export async function ingestFiles(
  store: CreditStore,
  opts: IngestOptions,
  log: Logger = silentLogger,
  onProgress?: ProgressFn,
): Promise<IngestSummary> {
  const customerRows = await readSheet(opts.customersFile);
  const loanRows = await readSheet(opts.loansFile);

  const customers = ingestCustomers(store, customerRows, opts.onInvalidRow, log, onProgress);
  const loans = ingestLoans(store, loanRows, opts.onInvalidRow, log, onProgress);

  const summary: IngestSummary = {
    customers: customers.summary,
    loans: loans.summary,
    problems: [...customers.problems, ...loans.problems],
  };
  log.info({ msg: 'ingest_done', customers: summary.customers, loans: summary.loans, problems: summary.problems.length });
  return summary;
}
