export const EXPENSE_FIELDS = ['date', 'category', 'amount', 'description'] as const;

export const CSV_DELIMITER = ',';
export const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const MENU_OPTIONS = [
  { key: '1', label: 'Add an expense' },
  { key: '2', label: 'View expenses' },
  { key: '3', label: 'Track budget' },
  { key: '4', label: 'Save expenses' },
  { key: '5', label: 'Exit' },
] as const;

export const TABLE_RULE_WIDTH = 60;
export const SUMMARY_RULE_WIDTH = 25;
