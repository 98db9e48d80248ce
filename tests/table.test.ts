import { describe, it, expect } from 'vitest';
import { formatExpenseTable } from '../src/services/report/table';

describe('Expense Table', () => {
  it('should show a message instead of an empty table', () => {
    expect(formatExpenseTable([], '$')).toEqual(['No expenses recorded yet.']);
  });

  it('should lay out one padded line per expense', () => {
    const lines = formatExpenseTable(
      [
        { date: '2024-01-15', category: 'Food', amount: 12.5, description: 'Lunch' },
        { date: '2024-01-16', category: 'Travel', amount: -5, description: 'Refund' },
      ],
      '$'
    );

    expect(lines).toEqual([
      '--- All Expenses ---',
      'Date         | Category        | Amount     | Description',
      '-'.repeat(60),
      '2024-01-15   | Food            | $12.50     | Lunch',
      '2024-01-16   | Travel          | $-5.00     | Refund',
      '-'.repeat(60),
    ]);
  });
});
