import { SUMMARY_RULE_WIDTH } from '../../config/constants';
import type { BudgetSummary } from '../../types/budget';
import type { Expense } from '../../types/expense';
import { askUntilValid, type Prompter } from '../console/prompter';
import { formatCurrency, messages } from '../feedback/messages';
import { BudgetSchema } from '../validation/schemas';

// Unrounded sum in cents; rounding happens once, on the result
const sumCents = (expenses: readonly Expense[]): number =>
  expenses.reduce((sum, expense) => sum + expense.amount * 100, 0);

export function calculateTotal(expenses: readonly Expense[]): number {
  return Math.round(sumCents(expenses)) / 100;
}

export function summarizeBudget(expenses: readonly Expense[], budget: number): BudgetSummary {
  const remainingCents = budget * 100 - sumCents(expenses);

  return {
    budget,
    totalSpent: calculateTotal(expenses),
    remaining: Math.round(remainingCents) / 100,
    isOverBudget: remainingCents < 0,
  };
}

export function promptBudget(io: Prompter): Promise<number> {
  return askUntilValid(io, messages.prompt.budget, BudgetSchema);
}

export function formatBudgetSummary(summary: BudgetSummary, currencySymbol: string): string[] {
  const outcome = summary.isOverBudget
    ? messages.success.overBudget(formatCurrency(-summary.remaining, currencySymbol))
    : messages.success.underBudget(formatCurrency(summary.remaining, currencySymbol));

  return [
    messages.heading.budget,
    `Total Budget:    ${formatCurrency(summary.budget, currencySymbol)}`,
    `Total Expenses:  ${formatCurrency(summary.totalSpent, currencySymbol)}`,
    '-'.repeat(SUMMARY_RULE_WIDTH),
    outcome,
  ];
}
