import type { ValidationError } from './errors';

// Expense record types
export interface ExpenseRecord {
  id: string;
  amount: number; // Currency units, always > 0
  category: string; // Key into the category registry
  description: string;
  date: string; // Calendar date (YYYY-MM-DD)
  timestamp: string; // ISO creation instant, kept for file compatibility
  createdAt: string; // ISO insertion instant, primary sort key
  owner?: string;
}

export interface RecordInput {
  amount: number;
  category: string;
  description: string;
  owner?: string;
  date?: string; // Defaults to today on create, to the existing date on update
}

// Snapshot as written to the backing file: id -> record
export type RecordMap = Record<string, ExpenseRecord>;

export interface ExportEnvelope {
  records: RecordMap;
  exportDate: string;
  recordCount: number;
  totalAmount: number;
}

export interface CategorySettings {
  categories: Record<string, string>;
}

export interface CategorySummary {
  displayName: string;
  total: number;
  count: number;
}

export interface MonthlySummary {
  month: string; // YYYY-MM
  start: string;
  end: string;
  totalAmount: number;
  count: number;
  categoryTotals: Record<string, number>;
  records: ExpenseRecord[];
}

export interface MonthlyTrendPoint {
  month: string;
  total: number;
  count: number;
}

export interface RecordFilter {
  start?: string;
  end?: string;
  category?: string;
  owner?: string;
  text?: string;
}

export interface LoadResult {
  recordCount: number;
  adoptedCategories: string[]; // Keys registered because loaded records used them
}

export interface ApiError {
  error: string;
  code?: string;
  details?: string[];
  context?: Record<string, unknown>;
}

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: ValidationError };
