import { MENU_OPTIONS } from '../../config/constants';
import type { Expense } from '../../types/expense';
import { formatBudgetSummary, promptBudget, summarizeBudget } from '../budget';
import type { Prompter } from '../console/prompter';
import { promptExpense } from '../expense/entry';
import { messages } from '../feedback/messages';
import { formatExpenseTable } from '../report/table';
import { loadExpenses, saveExpenses } from '../storage/expense-store';
import { MenuChoiceSchema, validateInput } from '../validation/schemas';

export interface SessionOptions {
  io: Prompter;
  filePath: string;
  currencySymbol: string;
}

function printLines(io: Prompter, lines: readonly string[]): void {
  for (const line of lines) {
    io.print(line);
  }
}

function printMenu(io: Prompter): void {
  io.print();
  io.print(messages.heading.menu);
  printLines(
    io,
    MENU_OPTIONS.map((option) => `${option.key}. ${option.label}`)
  );
}

/**
 * Run the menu loop until the user exits. Expenses are loaded from filePath on
 * start and written back on "save" and on exit. Load and save errors are not
 * caught here.
 */
export async function runSession({ io, filePath, currencySymbol }: SessionOptions): Promise<Expense[]> {
  const expenses = loadExpenses(filePath);

  const save = (): void => {
    saveExpenses(filePath, expenses);
    io.print(messages.success.saved);
  };

  for (;;) {
    printMenu(io);
    const choice = validateInput(MenuChoiceSchema, await io.ask(messages.prompt.menuChoice));
    if (!choice.valid) {
      io.print(choice.error);
      continue;
    }

    switch (choice.data) {
      case '1':
        expenses.push(await promptExpense(io));
        break;
      case '2':
        io.print();
        printLines(io, formatExpenseTable(expenses, currencySymbol));
        break;
      case '3': {
        const budget = await promptBudget(io);
        io.print();
        printLines(io, formatBudgetSummary(summarizeBudget(expenses, budget), currencySymbol));
        break;
      }
      case '4':
        save();
        break;
      case '5':
        save();
        io.print(messages.success.goodbye);
        return expenses;
    }
  }
}
