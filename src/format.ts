import { ExpenseRecord } from './types';

export function formatCurrency(amount: number, symbol = '$'): string {
  const sign = amount < 0 ? '-' : '';
  return `${sign}${symbol}${Math.abs(amount).toFixed(2)}`;
}

/**
 * Single-line rendering of a record for logs and plain-text listings.
 * Category keys are shown by display name when a registry is given.
 */
export function formatRecordLine(
  record: ExpenseRecord,
  categories: Readonly<Record<string, string>> = {},
  symbol = '$'
): string {
  return [
    `ID: ${record.id}`,
    `Date: ${record.date}`,
    `Amount: ${formatCurrency(record.amount, symbol)}`,
    `Category: ${categories[record.category] ?? record.category}`,
    `Owner: ${record.owner ?? 'N/A'}`,
    `Description: ${record.description}`
  ].join(' | ');
}
