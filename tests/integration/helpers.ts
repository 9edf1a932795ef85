import { MEMORY } from '../../src/db/connection.js';
import { openStore, type CreditStore } from '../../src/loans/store.js';
import type { ServiceContext } from '../../src/loans/service.js';
import { silentLogger } from '../../src/log.js';

// Midday keeps the local calendar date stable across time zones.
export const FIXED_NOW = new Date('2026-03-15T12:00:00Z');

export function openTestStore(): CreditStore {
  return openStore(MEMORY, silentLogger);
}

export function testContext(store: CreditStore, now: Date = FIXED_NOW): ServiceContext {
  return { store, log: silentLogger, now: () => now };
}

let phoneSeq = 9000000000;

export function registration(over: Record<string, unknown> = {}): Record<string, unknown> {
  phoneSeq += 1;
  return {
    first_name: 'Test',
    last_name: 'Customer',
    age: 30,
    monthly_income: 80000,
    phone_number: String(phoneSeq),
    ...over,
  };
}
