/**
 * User-facing text printed by the interactive session
 */

export const messages = {
  success: {
    expenseAdded: 'Expense added successfully!',
    saved: 'Expenses saved successfully!',
    goodbye: 'Exiting the program. Goodbye!',
    underBudget: (remaining: string) => `✅ You have ${remaining} left for the month.`,
    overBudget: (overBy: string) => `⚠️ You have exceeded your budget by ${overBy}!`,
  },

  error: {
    invalidDate: 'Invalid date format. Please use YYYY-MM-DD.',
    invalidAmount: 'Invalid amount. Please enter a number.',
    negativeBudget: 'Budget must be a positive number.',
    invalidChoice: 'Invalid choice. Please enter a number between 1 and 5.',
    noData: 'No expenses recorded yet.',
  },

  prompt: {
    date: 'Enter the date of the expense (YYYY-MM-DD): ',
    amount: 'Enter the amount spent: ',
    category: 'Enter the category (e.g., Food, Travel): ',
    description: 'Enter a brief description: ',
    budget: 'Enter your monthly budget: ',
    menuChoice: 'Enter your choice (1-5): ',
  },

  heading: {
    menu: '--- Personal Expense Tracker ---',
    expenses: '--- All Expenses ---',
    budget: '--- Budget Summary ---',
  },
};

export function formatCurrency(amount: number, symbol: string = '$'): string {
  return `${symbol}${amount.toFixed(2)}`;
}
