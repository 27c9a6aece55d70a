import { join } from 'node:path';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      dataFile: 'expenses.json',
      categoriesFile: 'expenses.categories.json',
      owners: [],
      currencySymbol: '$',
      loadFailurePolicy: 'abort'
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DATA_FILE: join('data', 'ledger.json'),
      OWNERS: ' Alice, ,Bob ',
      CURRENCY_SYMBOL: '€',
      LOAD_FAILURE_POLICY: 'start-empty'
    });

    expect(config).toEqual({
      port: 8080,
      dataFile: join('data', 'ledger.json'),
      categoriesFile: join('data', 'ledger.categories.json'),
      owners: ['Alice', 'Bob'],
      currencySymbol: '€',
      loadFailurePolicy: 'start-empty'
    });
  });

  it('should prefer an explicit categories file', () => {
    expect(loadConfig({ CATEGORIES_FILE: 'categories.json' }).categoriesFile).toBe('categories.json');
  });

  it('should reject an unknown load failure policy', () => {
    expect(() => loadConfig({ LOAD_FAILURE_POLICY: 'ignore' })).toThrow(
      'LOAD_FAILURE_POLICY must be one of: abort, start-empty'
    );
  });

  it('should reject a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'http' })).toThrow('PORT must be an integer');
  });
});
