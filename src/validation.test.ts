import {
  categoryKeyFor,
  daysInMonth,
  isValidDate,
  parseDateOrThrow,
  sanitizeInput,
  validateCategory,
  validateRecordInput,
  ValidationContext
} from './validation';
import { ValidationError } from './errors';

const context: ValidationContext = {
  categories: { food: 'Food & Dining', other: 'Other' },
  owners: []
};

function failure(input: unknown, ctx: ValidationContext = context) {
  const result = validateRecordInput(input, ctx);
  if (result.valid) throw new Error('expected validation to fail');
  return result.error;
}

describe('validateRecordInput', () => {
  const validInput = {
    amount: 100.5,
    category: 'food',
    description: 'Lunch at restaurant',
    date: '2024-01-15'
  };

  it('should validate correct input', () => {
    const result = validateRecordInput(validInput, context);
    expect(result).toEqual({ valid: true, value: validInput });
  });

  it('should accept input without a date', () => {
    const result = validateRecordInput({ amount: 5, category: 'other', description: 'Stamps' }, context);
    expect(result).toEqual({ valid: true, value: { amount: 5, category: 'other', description: 'Stamps' } });
  });

  it('should reject missing amount', () => {
    const error = failure({ ...validInput, amount: undefined });
    expect(error.field).toBe('amount');
    expect(error.message).toBe('amount is required');
  });

  it('should reject non-numeric amount', () => {
    const error = failure({ ...validInput, amount: '12' });
    expect(error.message).toBe('amount must be a number');
    expect(error.value).toBe('12');
  });

  it('should reject negative amount', () => {
    expect(failure({ ...validInput, amount: -10 }).message).toBe('amount must be positive');
  });

  it('should reject zero amount', () => {
    expect(failure({ ...validInput, amount: 0 }).message).toBe('amount must be positive');
  });

  it('should reject unknown category', () => {
    const error = failure({ ...validInput, category: 'travel' });
    expect(error.field).toBe('category');
    expect(error.message).toBe('unknown category');
    expect(error.value).toBe('travel');
  });

  it('should reject empty description', () => {
    const error = failure({ ...validInput, description: '   ' });
    expect(error.field).toBe('description');
    expect(error.message).toBe('description must not be empty');
  });

  it('should reject invalid date format', () => {
    const error = failure({ ...validInput, date: '15-01-2024' });
    expect(error.field).toBe('date');
    expect(error.message).toBe('date must be YYYY-MM-DD');
  });

  it('should reject dates that do not exist', () => {
    expect(failure({ ...validInput, date: '2023-02-29' }).message).toBe('date is not a valid calendar date');
  });

  it('should report the first failing field in order', () => {
    const error = failure({ amount: 0, category: 'travel', description: '', date: 'soon' });
    expect(error.field).toBe('amount');
  });

  it('should reject null input', () => {
    const error = failure(null);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('input must be an object');
  });

  it('should trim text fields in the returned value', () => {
    const result = validateRecordInput(
      { amount: 3, category: ' food ', description: '  Coffee  ', date: '2024-03-01' },
      context
    );
    expect(result).toEqual({
      valid: true,
      value: { amount: 3, category: 'food', description: 'Coffee', date: '2024-03-01' }
    });
  });

  describe('with owner tracking enabled', () => {
    const withOwners: ValidationContext = { ...context, owners: ['Alice', 'Bob'] };

    it('should require a known owner', () => {
      expect(failure(validInput, withOwners).message).toBe('owner is required');
      expect(failure({ ...validInput, owner: 'Mallory' }, withOwners).message).toBe('unknown owner');
    });

    it('should check the owner before the description', () => {
      const error = failure({ ...validInput, owner: 'Mallory', description: '' }, withOwners);
      expect(error.field).toBe('owner');
    });

    it('should keep a listed owner', () => {
      const result = validateRecordInput({ ...validInput, owner: 'Bob' }, withOwners);
      expect(result.valid && result.value.owner).toBe('Bob');
    });
  });

  it('should ignore owner when owner tracking is disabled', () => {
    const result = validateRecordInput({ ...validInput, owner: 'Anyone' }, context);
    expect(result.valid && result.value.owner).toBeUndefined();
  });
});

describe('sanitizeInput', () => {
  it('should trim whitespace from strings', () => {
    const result = sanitizeInput({
      amount: 100.555,
      category: '  food  ',
      description: '  Lunch  ',
      date: ' 2024-01-15 ',
      owner: ' Alice '
    });

    expect(result).toEqual({
      amount: 100.555,
      category: 'food',
      description: 'Lunch',
      date: '2024-01-15',
      owner: 'Alice'
    });
  });
});

describe('dates', () => {
  it('should know month lengths', () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(1900, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
    expect(daysInMonth(2024, 4)).toBe(30);
    expect(daysInMonth(2024, 12)).toBe(31);
  });

  it('should validate calendar dates', () => {
    expect(isValidDate('2024-02-29')).toBe(true);
    expect(isValidDate('2024-13-01')).toBe(false);
    expect(isValidDate('2024-04-31')).toBe(false);
    expect(isValidDate('2024-1-5')).toBe(false);
  });

  it('should name the field in date errors', () => {
    expect(() => parseDateOrThrow('end', 'yesterday')).toThrow('end must be YYYY-MM-DD');
  });
});

describe('validateCategory', () => {
  it('should accept a new key and name', () => {
    expect(validateCategory('travel', ' Travel ', context.categories)).toEqual({
      valid: true,
      value: { key: 'travel', displayName: 'Travel' }
    });
  });

  it('should reject an existing key', () => {
    const result = validateCategory('food', 'Groceries', context.categories);
    expect(result.valid).toBe(false);
    expect(!result.valid && result.error.message).toBe('a category with this key already exists');
  });

  it('should reject an existing display name', () => {
    const result = validateCategory('dining', 'Food & Dining', context.categories);
    expect(!result.valid && result.error.field).toBe('displayName');
  });

  it('should reject malformed keys', () => {
    const result = validateCategory('Pet Care', 'Pet Care', context.categories);
    expect(!result.valid && result.error.field).toBe('key');
  });
});

describe('categoryKeyFor', () => {
  it('should derive keys from display names', () => {
    expect(categoryKeyFor('Food & Dining')).toBe('fooddining');
    expect(categoryKeyFor(' Pet-Care ')).toBe('petcare');
  });
});
