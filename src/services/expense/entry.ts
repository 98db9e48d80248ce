import type { Expense } from '../../types/expense';
import { askUntilValid, type Prompter } from '../console/prompter';
import { messages } from '../feedback/messages';
import { ExpenseAmountSchema, ExpenseDateSchema } from '../validation/schemas';

/**
 * Collect one expense from the user. Date and amount are asked again until
 * they parse; category and description are taken as typed, empty included.
 */
export async function promptExpense(io: Prompter): Promise<Expense> {
  const date = await askUntilValid(io, messages.prompt.date, ExpenseDateSchema);
  const amount = await askUntilValid(io, messages.prompt.amount, ExpenseAmountSchema);
  const category = await io.ask(messages.prompt.category);
  const description = await io.ask(messages.prompt.description);

  io.print();
  io.print(messages.success.expenseAdded);

  return { date, category, amount, description };
}
