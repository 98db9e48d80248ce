export interface BudgetSummary {
  budget: number;
  totalSpent: number;
  remaining: number;
  isOverBudget: boolean;
}
