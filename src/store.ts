import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { IOError, ParseError, describeError } from './errors';
import { isValidDate } from './validation';
import { CategorySettings, ExpenseRecord, ExportEnvelope, RecordMap } from './types';

export interface LedgerStore {
  readonly dataFile: string;
  readonly settingsFile: string;
  loadRecords(): RecordMap | undefined;
  saveRecords(records: RecordMap): void;
  loadCategories(): Record<string, string> | undefined;
  saveCategories(categories: Record<string, string>): void;
  readMergeSource(path: string): RecordMap;
  writeExport(path: string, envelope: ExportEnvelope): void;
}

// expenses.json -> expenses.categories.json
export function defaultSettingsFile(dataFile: string): string {
  const ext = extname(dataFile);
  return join(dirname(dataFile), `${basename(dataFile, ext)}.categories.json`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads and parses a JSON file. Returns undefined when the file does not exist.
 */
export function readJsonFile(path: string): unknown {
  if (!existsSync(path)) return undefined;

  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new IOError(`Could not read ${path}: ${describeError(error)}`, {
      path,
      operation: 'read',
      cause: error
    });
  }

  // The parser message quotes file content, so it stays on `cause` only
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ParseError(path, `Invalid JSON in ${path}`, { cause: error });
  }
}

/**
 * Writes a complete snapshot through a temp file and rename, so readers
 * never observe a half-written file.
 */
export function writeJsonFileAtomic(path: string, data: unknown): void {
  const tempPath = `${path}.${process.pid}.tmp`;
  try {
    writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
    renameSync(tempPath, path);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw new IOError(`Could not save data to ${path}: ${describeError(error)}`, {
      path,
      operation: 'write',
      cause: error
    });
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Checks one stored record and normalizes the older field names
 * (`user`, `created_at`). The map key is the authoritative id.
 */
export function toRecord(id: string, raw: unknown, path: string): ExpenseRecord {
  const problem = (message: string) => new ParseError(path, `Record ${id}: ${message}`);

  if (!isPlainObject(raw)) throw problem('expected an object');
  if (typeof raw.amount !== 'number' || !Number.isFinite(raw.amount) || raw.amount <= 0) {
    throw problem('amount must be a positive number');
  }
  if (typeof raw.category !== 'string' || raw.category.length === 0) {
    throw problem('category must be a non-empty string');
  }
  if (typeof raw.description !== 'string' || raw.description.trim().length === 0) {
    throw problem('description must be a non-empty string');
  }
  if (typeof raw.date !== 'string' || !isValidDate(raw.date)) {
    throw problem('date must be YYYY-MM-DD');
  }

  const createdAt =
    optionalString(raw.createdAt) ??
    optionalString(raw.created_at) ??
    optionalString(raw.timestamp) ??
    `${raw.date}T00:00:00.000Z`;

  const record: ExpenseRecord = {
    id,
    amount: raw.amount,
    category: raw.category,
    description: raw.description,
    date: raw.date,
    timestamp: optionalString(raw.timestamp) ?? createdAt,
    createdAt
  };

  const owner = optionalString(raw.owner) ?? optionalString(raw.user);
  if (owner !== undefined) record.owner = owner;

  return record;
}

// Built with Object.fromEntries so ids such as "__proto__" stay own properties
export function toRecordMap(data: unknown, path: string): RecordMap {
  if (!isPlainObject(data)) {
    throw new ParseError(path, `Invalid file format in ${path}: expected a JSON object`);
  }

  return Object.fromEntries(Object.entries(data).map(([id, raw]) => [id, toRecord(id, raw, path)]));
}

function looksLikeRecord(value: unknown): boolean {
  return isPlainObject(value) && 'amount' in value && 'description' in value;
}

/**
 * Accepts a bare id -> record mapping or an export envelope holding the
 * mapping under `records` (or the older `expenses`).
 */
export function unwrapRecords(data: unknown, path: string): unknown {
  if (!isPlainObject(data)) {
    throw new ParseError(path, `Invalid file format in ${path}: expected a JSON object`);
  }

  for (const field of ['records', 'expenses']) {
    const inner = data[field];
    if (isPlainObject(inner) && !looksLikeRecord(inner)) return inner;
  }
  return data;
}

// Records of an already parsed merge document; `source` names it in errors
export function toMergeRecords(data: unknown, source: string): RecordMap {
  return toRecordMap(unwrapRecords(data, source), source);
}

export function createFileStore(dataFile: string, settingsFile = defaultSettingsFile(dataFile)): LedgerStore {
  return {
    dataFile,
    settingsFile,

    loadRecords(): RecordMap | undefined {
      const data = readJsonFile(dataFile);
      if (data === undefined) return undefined;
      return toRecordMap(data, dataFile);
    },

    saveRecords(records: RecordMap): void {
      writeJsonFileAtomic(dataFile, records);
    },

    loadCategories(): Record<string, string> | undefined {
      const data = readJsonFile(settingsFile);
      if (data === undefined) return undefined;

      if (!isPlainObject(data) || !isPlainObject(data.categories)) {
        throw new ParseError(settingsFile, `Invalid settings file ${settingsFile}: expected a categories object`);
      }

      const categories = new Map<string, string>();
      for (const [key, name] of Object.entries(data.categories)) {
        if (typeof name !== 'string') {
          throw new ParseError(settingsFile, `Category ${key}: display name must be a string`);
        }
        categories.set(key, name);
      }
      return Object.fromEntries(categories);
    },

    saveCategories(categories: Record<string, string>): void {
      const settings: CategorySettings = { categories };
      writeJsonFileAtomic(settingsFile, settings);
    },

    readMergeSource(path: string): RecordMap {
      const data = readJsonFile(path);
      if (data === undefined) {
        throw new IOError(`File ${path} does not exist`, { path, operation: 'read' });
      }
      return toMergeRecords(data, path);
    },

    writeExport(path: string, envelope: ExportEnvelope): void {
      writeJsonFileAtomic(path, envelope);
    }
  };
}
