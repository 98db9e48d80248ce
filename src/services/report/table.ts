import { TABLE_RULE_WIDTH } from '../../config/constants';
import type { Expense } from '../../types/expense';
import { formatCurrency, messages } from '../feedback/messages';

export function formatExpenseTable(expenses: readonly Expense[], currencySymbol: string): string[] {
  if (expenses.length === 0) {
    return [messages.error.noData];
  }

  const rule = '-'.repeat(TABLE_RULE_WIDTH);
  const header = `${'Date'.padEnd(12)} | ${'Category'.padEnd(15)} | ${'Amount'.padEnd(10)} | Description`;
  const rows = expenses.map(
    (expense) =>
      `${expense.date.padEnd(12)} | ${expense.category.padEnd(15)} | ${formatCurrency(expense.amount, currencySymbol).padEnd(10)} | ${expense.description}`
  );

  return [messages.heading.expenses, header, rule, ...rows, rule];
}
