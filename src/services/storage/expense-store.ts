import fs from 'fs';
import { EXPENSE_FIELDS } from '../../config/constants';
import type { Expense, SaveResult } from '../../types/expense';
import { ExpenseParseError, ExpenseWriteError } from '../../types/errors';
import { logger } from '../../utils/logger';
import { parseAmount } from '../validation/schemas';
import { type CsvRow, formatCsvRow, parseCsvRows } from './csv';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toExpense(row: CsvRow, filePath: string): Expense {
  if (row.fields.length !== EXPENSE_FIELDS.length) {
    throw new ExpenseParseError(
      `Expected ${EXPENSE_FIELDS.length} fields, found ${row.fields.length}`,
      filePath,
      row.line
    );
  }

  const [date, category, amountText, description] = row.fields;
  const amount = parseAmount(amountText);
  if (amount === null) {
    throw new ExpenseParseError(`Invalid amount "${amountText}"`, filePath, row.line);
  }

  // Stored dates are passed through as written
  return { date, category, amount, description };
}

/**
 * Load expenses from a CSV file, in file order.
 * A missing file is an empty ledger; a corrupt row throws ExpenseParseError.
 */
export function loadExpenses(filePath: string): Expense[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      logger.info('No expenses file yet, starting empty', { filePath });
      return [];
    }
    throw error;
  }

  const [, ...dataRows] = parseCsvRows(text, filePath);
  const expenses = dataRows.map((row) => toExpense(row, filePath));

  logger.info('Loaded expenses', { filePath, count: expenses.length });
  return expenses;
}

function toCsvLine(expense: Expense): string {
  return formatCsvRow([expense.date, expense.category, String(expense.amount), expense.description]);
}

/**
 * Overwrite the file with a header line and one line per expense.
 * Not atomic: a failed write can leave the file truncated.
 */
export function saveExpenses(filePath: string, expenses: readonly Expense[]): SaveResult {
  const lines = [formatCsvRow(EXPENSE_FIELDS), ...expenses.map(toCsvLine)];
  const content = lines.map((line) => `${line}\n`).join('');

  try {
    fs.writeFileSync(filePath, content, { encoding: 'utf8', flag: 'w' });
  } catch (error) {
    throw new ExpenseWriteError(filePath, { cause: error });
  }

  logger.info('Saved expenses', { filePath, count: expenses.length });
  return { path: filePath, count: expenses.length };
}
