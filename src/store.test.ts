import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { IOError, ParseError } from './errors';
import { createFileStore, defaultSettingsFile, toRecord, toRecordMap, unwrapRecords } from './store';

describe('createFileStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'store-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should derive the settings file from the data file', () => {
    expect(defaultSettingsFile(join('data', 'expenses.json'))).toBe(join('data', 'expenses.categories.json'));
    expect(createFileStore(join(dir, 'ledger.json')).settingsFile).toBe(join(dir, 'ledger.categories.json'));
  });

  it('should return undefined for missing files', () => {
    const store = createFileStore(join(dir, 'expenses.json'));
    expect(store.loadRecords()).toBeUndefined();
    expect(store.loadCategories()).toBeUndefined();
  });

  it('should write pretty-printed snapshots without leaving temp files', () => {
    const store = createFileStore(join(dir, 'expenses.json'));
    store.saveRecords({
      r1: {
        id: 'r1',
        amount: 4.2,
        category: 'food',
        description: 'Tea',
        date: '2024-01-01',
        timestamp: '2024-01-01T10:00:00.000Z',
        createdAt: '2024-01-01T10:00:00.000Z'
      }
    });

    const text = readFileSync(join(dir, 'expenses.json'), 'utf8');
    expect(text.startsWith('{\n  "r1": {\n    "id": "r1",')).toBe(true);
    expect(readdirSync(dir)).toEqual(['expenses.json']);
  });

  it('should round-trip the category registry', () => {
    const store = createFileStore(join(dir, 'expenses.json'));
    store.saveCategories({ food: 'Food & Dining', pets: 'Pets' });

    expect(store.loadCategories()).toEqual({ food: 'Food & Dining', pets: 'Pets' });
  });

  it('should reject a malformed settings file', () => {
    const store = createFileStore(join(dir, 'expenses.json'));
    writeFileSync(store.settingsFile, JSON.stringify({ categories: { food: 3 } }));

    expect(() => store.loadCategories()).toThrow(ParseError);
  });

  it('should raise IOError when the directory does not exist', () => {
    const store = createFileStore(join(dir, 'nested', 'expenses.json'));

    expect(() => store.saveRecords({})).toThrow(IOError);
    expect(existsSync(join(dir, 'nested'))).toBe(false);
  });

  it('should keep "__proto__" as an ordinary category key', () => {
    const store = createFileStore(join(dir, 'expenses.json'));
    store.saveCategories(Object.fromEntries([['food', 'Food & Dining'], ['__proto__', 'Proto']]));

    expect(Object.entries(store.loadCategories() ?? {})).toEqual([
      ['food', 'Food & Dining'],
      ['__proto__', 'Proto']
    ]);
  });

  it('should not repeat file content in a parse error', () => {
    const file = join(dir, 'expenses.json');
    writeFileSync(file, 'SECRET_TOKEN=test-secret');

    expect(() => createFileStore(file).loadRecords()).toThrow(new ParseError(file, `Invalid JSON in ${file}`));
  });

  it('should report a missing merge source as IOError', () => {
    const store = createFileStore(join(dir, 'expenses.json'));
    expect(() => store.readMergeSource(join(dir, 'nope.json'))).toThrow('does not exist');
  });
});

describe('toRecord', () => {
  it('should normalize the older field names', () => {
    const record = toRecord(
      'x1',
      {
        id: 'x1',
        amount: 4,
        category: 'food',
        description: 'Tea',
        user: 'Sam',
        date: '2024-02-02',
        timestamp: '2024-02-02T00:00:00',
        created_at: '2024-02-02T09:15:00'
      },
      'legacy.json'
    );

    expect(record).toEqual({
      id: 'x1',
      amount: 4,
      category: 'food',
      description: 'Tea',
      owner: 'Sam',
      date: '2024-02-02',
      timestamp: '2024-02-02T00:00:00',
      createdAt: '2024-02-02T09:15:00'
    });
  });

  it('should use the map key as the id', () => {
    const record = toRecord('key1', { id: 'other', amount: 1, category: 'food', description: 'Gum', date: '2024-02-02' }, 'f.json');
    expect(record.id).toBe('key1');
    expect(record.createdAt).toBe('2024-02-02T00:00:00.000Z');
  });

  it.each([
    [{ amount: '3', category: 'food', description: 'Gum', date: '2024-02-02' }, 'amount must be a positive number'],
    [{ amount: 3, category: '', description: 'Gum', date: '2024-02-02' }, 'category must be a non-empty string'],
    [{ amount: 3, category: 'food', description: ' ', date: '2024-02-02' }, 'description must be a non-empty string'],
    [{ amount: 3, category: 'food', description: 'Gum', date: '02/02/2024' }, 'date must be YYYY-MM-DD'],
    ['just text', 'expected an object']
  ])('should reject %p', (raw, message) => {
    expect(() => toRecord('r', raw, 'f.json')).toThrow(`Record r: ${message}`);
  });
});

describe('toRecordMap', () => {
  it('should keep a record stored under "__proto__"', () => {
    const data: unknown = JSON.parse('{"__proto__": {"amount": 1, "category": "food", "description": "Gum", "date": "2024-01-01"}}');
    const records = toRecordMap(data, 'f.json');

    expect(Object.keys(records)).toEqual(['__proto__']);
    expect(Object.values(records)[0]).toMatchObject({ id: '__proto__', amount: 1 });
  });
});

describe('unwrapRecords', () => {
  const mapping = { a1: { id: 'a1', amount: 1, category: 'food', description: 'Gum', date: '2024-01-01' } };

  it('should pass a bare mapping through', () => {
    expect(unwrapRecords(mapping, 'f.json')).toBe(mapping);
  });

  it('should unwrap records and expenses envelopes', () => {
    expect(unwrapRecords({ records: mapping, recordCount: 1 }, 'f.json')).toBe(mapping);
    expect(unwrapRecords({ expenses: mapping, total_expenses: 1 }, 'f.json')).toBe(mapping);
  });

  it('should treat a record stored under the id "records" as part of a bare mapping', () => {
    const data = { records: { id: 'records', amount: 1, category: 'food', description: 'Gum', date: '2024-01-01' } };
    expect(unwrapRecords(data, 'f.json')).toBe(data);
  });
});
