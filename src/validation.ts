import { ValidationError } from './errors';
import { RecordInput, ValidationResult } from './types';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const CATEGORY_KEY_PATTERN = /^[a-z0-9_]+$/;

export interface ValidationContext {
  categories: Readonly<Record<string, string>>;
  owners: readonly string[]; // Empty list disables owner tracking
}

function fail<T>(field: string, message: string, value?: unknown): ValidationResult<T> {
  return { valid: false, error: new ValidationError(field, message, value) };
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;

  const [year, month, day] = value.split('-').map(Number);
  return year >= 1 && month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

export function formatDate(year: number, month: number, day: number): string {
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0')
  ].join('-');
}

// Local calendar date of an instant
export function toDateString(instant: Date): string {
  return formatDate(instant.getFullYear(), instant.getMonth() + 1, instant.getDate());
}

export function parseDateOrThrow(field: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError(field, `${field} must be a string`, value);
  }
  if (!DATE_PATTERN.test(value)) {
    throw new ValidationError(field, `${field} must be YYYY-MM-DD`, value);
  }
  if (!isValidDate(value)) {
    throw new ValidationError(field, `${field} is not a valid calendar date`, value);
  }
  return value;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a record payload against the current registries.
 * Fields are checked in a fixed order and the first failure is reported.
 */
export function validateRecordInput(input: unknown, context: ValidationContext): ValidationResult<RecordInput> {
  if (!isObject(input)) {
    return fail('input', 'input must be an object', input);
  }

  const data = input;

  // Amount
  if (data.amount === undefined || data.amount === null) {
    return fail('amount', 'amount is required');
  }
  if (typeof data.amount !== 'number' || !Number.isFinite(data.amount)) {
    return fail('amount', 'amount must be a number', data.amount);
  }
  if (data.amount <= 0) {
    return fail('amount', 'amount must be positive', data.amount);
  }

  // Category
  if (typeof data.category !== 'string') {
    return fail('category', 'category must be a string', data.category);
  }
  const category = data.category.trim();
  if (!Object.prototype.hasOwnProperty.call(context.categories, category)) {
    return fail('category', 'unknown category', data.category);
  }

  // Owner, only checked when owner tracking is on
  let owner: string | undefined;
  if (context.owners.length > 0) {
    if (typeof data.owner !== 'string') {
      return fail('owner', 'owner is required', data.owner);
    }
    owner = data.owner.trim();
    if (!context.owners.includes(owner)) {
      return fail('owner', 'unknown owner', data.owner);
    }
  }

  // Description
  if (typeof data.description !== 'string') {
    return fail('description', 'description must be a string', data.description);
  }
  if (data.description.trim().length === 0) {
    return fail('description', 'description must not be empty', data.description);
  }

  // Date is optional
  let date: string | undefined;
  if (data.date !== undefined && data.date !== null && data.date !== '') {
    try {
      date = parseDateOrThrow('date', data.date);
    } catch (error) {
      if (error instanceof ValidationError) return { valid: false, error };
      throw error;
    }
  }

  return {
    valid: true,
    value: sanitizeInput({ amount: data.amount, category, description: data.description, owner, date })
  };
}

export function sanitizeInput(input: RecordInput): RecordInput {
  const sanitized: RecordInput = {
    amount: input.amount,
    category: input.category.trim(),
    description: input.description.trim()
  };
  if (input.owner !== undefined) sanitized.owner = input.owner.trim();
  if (input.date !== undefined) sanitized.date = input.date.trim();
  return sanitized;
}

export function validateCategory(
  key: unknown,
  displayName: unknown,
  categories: Readonly<Record<string, string>>
): ValidationResult<{ key: string; displayName: string }> {
  if (typeof displayName !== 'string' || displayName.trim().length === 0) {
    return fail('displayName', 'category name must not be empty', displayName);
  }
  if (typeof key !== 'string' || key.length === 0) {
    return fail('key', 'category key must not be empty', key);
  }
  if (!CATEGORY_KEY_PATTERN.test(key)) {
    return fail('key', 'category key may only contain lowercase letters, digits and underscores', key);
  }
  if (Object.prototype.hasOwnProperty.call(categories, key)) {
    return fail('key', 'a category with this key already exists', key);
  }

  const name = displayName.trim();
  if (Object.values(categories).includes(name)) {
    return fail('displayName', 'a category with this name already exists', displayName);
  }

  return { valid: true, value: { key, displayName: name } };
}

// "Food & Dining" -> "fooddining"
export function categoryKeyFor(displayName: string): string {
  return displayName.trim().toLowerCase().replace(/[\s&-]/g, '');
}
