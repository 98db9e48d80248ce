import { z } from 'zod';
import { DATE_PATTERN } from '../../config/constants';
import { messages } from '../feedback/messages';

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a decimal number such as "12.50", "-5" or "1e3".
 * Surrounding whitespace is ignored; anything else returns null.
 */
export function parseAmount(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * True when text is YYYY-MM-DD and names a day that exists (no 2024-02-30).
 */
export function isCalendarDate(text: string): boolean {
  const match = DATE_PATTERN.exec(text);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) {
    return false;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Expense date validation
 */
export const ExpenseDateSchema = z.string().refine(isCalendarDate, messages.error.invalidDate);

/**
 * Expense amount validation (any sign)
 */
export const ExpenseAmountSchema = z.string().transform((val, ctx) => {
  const amount = parseAmount(val);
  if (amount === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: messages.error.invalidAmount });
    return z.NEVER;
  }
  return amount;
});

/**
 * Budget validation
 */
export const BudgetSchema = ExpenseAmountSchema.pipe(z.number().nonnegative(messages.error.negativeBudget));

/**
 * Menu choice validation
 */
export const MenuChoiceSchema = z.enum(['1', '2', '3', '4', '5'], {
  errorMap: () => ({ message: messages.error.invalidChoice }),
});

/**
 * Validate and parse user input safely
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: string): { valid: true; data: T } | { valid: false; error: string } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, data: result.data };
  }
  return { valid: false, error: result.error.errors[0]?.message || 'Invalid input' };
}
