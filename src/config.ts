import { defaultSettingsFile } from './store';

export type LoadFailurePolicy = 'abort' | 'start-empty';

export interface AppConfig {
  port: number;
  dataFile: string;
  categoriesFile: string;
  owners: string[];
  currencySymbol: string;
  loadFailurePolicy: LoadFailurePolicy;
}

const LOAD_FAILURE_POLICIES: readonly LoadFailurePolicy[] = ['abort', 'start-empty'];

function isLoadFailurePolicy(value: string): value is LoadFailurePolicy {
  return LOAD_FAILURE_POLICIES.some(policy => policy === value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number(env.PORT || 3001);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
  }

  const policy = env.LOAD_FAILURE_POLICY || 'abort';
  if (!isLoadFailurePolicy(policy)) {
    throw new Error(`LOAD_FAILURE_POLICY must be one of: ${LOAD_FAILURE_POLICIES.join(', ')}`);
  }

  const dataFile = env.DATA_FILE || 'expenses.json';

  return {
    port,
    dataFile,
    categoriesFile: env.CATEGORIES_FILE || defaultSettingsFile(dataFile),
    owners: (env.OWNERS || '')
      .split(',')
      .map(owner => owner.trim())
      .filter(owner => owner.length > 0),
    currencySymbol: env.CURRENCY_SYMBOL || '$',
    loadFailurePolicy: policy
  };
}
