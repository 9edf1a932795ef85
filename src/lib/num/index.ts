/**
 * Exact decimal arithmetic for money and interest rates.
 */

export {
  Decimal,
  clamp,
  sum
} from './Decimal.js';

export type { DecimalLike, RoundingMode } from './Decimal.js';
