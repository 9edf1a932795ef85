/**
 * Tests for Decimal exact arithmetic
 */

import { describe, test, expect } from '@jest/globals';
import { Decimal, clamp, sum } from './index.js';

describe('Decimal', () => {
  describe('Construction', () => {
    test('from string drops trailing zeros', () => {
      expect(Decimal.fromString('123.4500').toString()).toBe('123.45');
      expect(Decimal.fromString('-0.05').toString()).toBe('-0.05');
      expect(Decimal.fromString('007').toString()).toBe('7');
    });

    test('exponent notation', () => {
      expect(Decimal.fromString('1.5e3').toString()).toBe('1500');
      expect(Decimal.fromString('25e-3').toString()).toBe('0.025');
      expect(Decimal.fromString('1e-999').scale).toBe(999);
      expect(Decimal.from(1e21).toString()).toBe('1000000000000000000000');
    });

    test('exponents longer than three digits are rejected', () => {
      expect(Decimal.isDecimalString('1e1000')).toBe(false);
      expect(Decimal.isDecimalString('1e-2000000000')).toBe(false);
      expect(() => Decimal.fromString('1e-2000000000')).toThrow(SyntaxError);
    });

    test('from number uses the shortest representation', () => {
      expect(Decimal.fromNumber(0.1).add(0.2).toString()).toBe('0.3');
      expect(() => Decimal.fromNumber(Infinity)).toThrow(RangeError);
    });

    test('rejects malformed input', () => {
      expect(() => Decimal.fromString('abc')).toThrow(SyntaxError);
      expect(() => Decimal.fromString('1,000')).toThrow(SyntaxError);
      expect(Decimal.isDecimalString(' 12.5 ')).toBe(true);
      expect(Decimal.isDecimalString('12.5.1')).toBe(false);
    });

    test('zero', () => {
      expect(Decimal.ZERO.isZero()).toBe(true);
      expect(Decimal.ZERO.toBigInt()).toBe(0n);
    });
  });

  describe('Arithmetic', () => {
    test('add and sub are exact', () => {
      expect(Decimal.from('1000000.01').add('0.99').toString()).toBe('1000001');
      expect(Decimal.from('10').sub('10.25').toString()).toBe('-0.25');
    });

    test('mul', () => {
      expect(Decimal.from('1.25').mul(4).toString()).toBe('5');
      expect(Decimal.from('0.1').mul('0.1').toString()).toBe('0.01');
    });

    test('div truncates, caller rounds', () => {
      expect(Decimal.from(1).div(3).round(4).toString()).toBe('0.3333');
      expect(Decimal.from(2).div(3).round(2).toString()).toBe('0.67');
      expect(Decimal.from(10).div('0.5').toString()).toBe('20');
      expect(() => Decimal.from(1).div(0)).toThrow(RangeError);
    });

    test('pow by squaring', () => {
      expect(Decimal.from('1.1').pow(2).toString()).toBe('1.21');
      expect(Decimal.from(2).pow(10).toString()).toBe('1024');
      expect(Decimal.from(5).pow(0).toString()).toBe('1');
    });
  });

  describe('Rounding', () => {
    test('half-even is the default', () => {
      expect(Decimal.from('2.345').round(2).toString()).toBe('2.34');
      expect(Decimal.from('2.355').round(2).toString()).toBe('2.36');
      expect(Decimal.from('2.3451').round(2).toString()).toBe('2.35');
    });

    test('other modes', () => {
      expect(Decimal.from('2.345').round(2, 'half-up').toString()).toBe('2.35');
      expect(Decimal.from('-1.5').round(0, 'floor').toString()).toBe('-2');
      expect(Decimal.from('1.01').round(0, 'ceil').toString()).toBe('2');
      expect(Decimal.from('1.99').round(0, 'down').toString()).toBe('1');
      expect(Decimal.from('7.9').floor().toString()).toBe('7');
    });

    test('toFixed pads to the requested digits', () => {
      expect(Decimal.from(1200.5).toFixed(2)).toBe('1200.50');
      expect(Decimal.from(7).toFixed(2)).toBe('7.00');
      expect(Decimal.from('0.005').toFixed(2)).toBe('0.00');
      expect(Decimal.from('-1.5').toFixed(2)).toBe('-1.50');
    });
  });

  describe('Comparison and helpers', () => {
    test('compares across scales', () => {
      expect(Decimal.from('1.50').eq('1.5')).toBe(true);
      expect(Decimal.from('1.49').lt('1.5')).toBe(true);
      expect(Decimal.from(2).gte('2.00')).toBe(true);
      expect(Decimal.from(-3).cmp(-2)).toBe(-1);
    });

    test('sum and clamp', () => {
      expect(sum(['0.1', '0.2', 3]).toString()).toBe('3.3');
      expect(sum([]).toString()).toBe('0');
      const a = Decimal.from(5);
      const b = Decimal.from('5.5');
      const inside = Decimal.from('5.25');
      expect(clamp(Decimal.from(12), a, b)).toBe(b);
      expect(clamp(Decimal.from(-1), a, b)).toBe(a);
      expect(clamp(inside, a, b)).toBe(inside);
    });

    test('serializes as a plain string', () => {
      expect(JSON.stringify({ amount: Decimal.from('1.10') })).toBe('{"amount":"1.1"}');
    });
  });
});
