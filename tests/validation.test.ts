import { describe, it, expect } from 'vitest';
import {
  BudgetSchema,
  ExpenseAmountSchema,
  ExpenseDateSchema,
  MenuChoiceSchema,
  isCalendarDate,
  parseAmount,
  validateInput,
} from '../src/services/validation/schemas';

describe('Input Validation', () => {
  describe('Expense Date', () => {
    it('should accept YYYY-MM-DD dates', () => {
      expect(isCalendarDate('2024-01-15')).toBe(true);
      expect(isCalendarDate('2024-02-29')).toBe(true);
    });

    it('should reject impossible months and days', () => {
      expect(isCalendarDate('2024-13-01')).toBe(false);
      expect(isCalendarDate('2023-02-29')).toBe(false);
      expect(isCalendarDate('2024-04-31')).toBe(false);
      expect(isCalendarDate('0000-01-01')).toBe(false);
    });

    it('should reject other layouts', () => {
      expect(isCalendarDate('15-01-2024')).toBe(false);
      expect(isCalendarDate('not-a-date')).toBe(false);
      expect(isCalendarDate('2024-1-5')).toBe(false);
      expect(isCalendarDate(' 2024-01-15')).toBe(false);
    });

    it('should report the date format message', () => {
      const result = validateInput(ExpenseDateSchema, '2024-13-01');
      expect(result).toEqual({ valid: false, error: 'Invalid date format. Please use YYYY-MM-DD.' });
    });

    it('should keep the date text as typed', () => {
      const result = validateInput(ExpenseDateSchema, '2024-01-15');
      expect(result).toEqual({ valid: true, data: '2024-01-15' });
    });
  });

  describe('Expense Amount', () => {
    it('should parse decimals, zero and negatives', () => {
      expect(parseAmount('12.50')).toBe(12.5);
      expect(parseAmount('0')).toBe(0);
      expect(parseAmount('-5')).toBe(-5);
      expect(parseAmount('1e3')).toBe(1000);
    });

    it('should ignore surrounding whitespace', () => {
      expect(parseAmount(' 7.25 ')).toBe(7.25);
    });

    it('should reject non-numbers', () => {
      expect(parseAmount('abc')).toBeNull();
      expect(parseAmount('')).toBeNull();
      expect(parseAmount('12.5.1')).toBeNull();
      expect(parseAmount('Infinity')).toBeNull();
      expect(parseAmount('0x10')).toBeNull();
      expect(parseAmount('1e400')).toBeNull();
    });

    it('should report the amount message', () => {
      const result = validateInput(ExpenseAmountSchema, 'abc');
      expect(result).toEqual({ valid: false, error: 'Invalid amount. Please enter a number.' });
    });
  });

  describe('Budget', () => {
    it('should accept zero and positive budgets', () => {
      expect(validateInput(BudgetSchema, '0')).toEqual({ valid: true, data: 0 });
      expect(validateInput(BudgetSchema, '250.75')).toEqual({ valid: true, data: 250.75 });
    });

    it('should reject negative budgets', () => {
      const result = validateInput(BudgetSchema, '-1');
      expect(result).toEqual({ valid: false, error: 'Budget must be a positive number.' });
    });

    it('should reject non-numbers with the amount message', () => {
      const result = validateInput(BudgetSchema, 'lots');
      expect(result).toEqual({ valid: false, error: 'Invalid amount. Please enter a number.' });
    });
  });

  describe('Menu Choice', () => {
    it('should accept the five menu keys', () => {
      for (const key of ['1', '2', '3', '4', '5']) {
        expect(validateInput(MenuChoiceSchema, key).valid).toBe(true);
      }
    });

    it('should reject anything else', () => {
      const expected = { valid: false, error: 'Invalid choice. Please enter a number between 1 and 5.' };
      expect(validateInput(MenuChoiceSchema, '6')).toEqual(expected);
      expect(validateInput(MenuChoiceSchema, ' 1')).toEqual(expected);
      expect(validateInput(MenuChoiceSchema, '')).toEqual(expected);
    });
  });
});
