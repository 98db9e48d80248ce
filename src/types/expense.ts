export interface Expense {
  date: string;
  category: string;
  amount: number;
  description: string;
}

export interface SaveResult {
  path: string;
  count: number;
}
