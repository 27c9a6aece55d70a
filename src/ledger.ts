import { v4 as uuidv4 } from 'uuid';
import { ConflictError, IOError, MergeError, NotFoundError, ParseError, ValidationError } from './errors';
import { LedgerStore, toMergeRecords } from './store';
import {
  CategorySummary,
  ExpenseRecord,
  ExportEnvelope,
  LoadResult,
  MonthlySummary,
  MonthlyTrendPoint,
  RecordFilter,
  RecordInput,
  RecordMap
} from './types';
import {
  ValidationContext,
  daysInMonth,
  formatDate,
  parseDateOrThrow,
  toDateString,
  validateCategory,
  validateRecordInput
} from './validation';

export const DEFAULT_CATEGORIES: Readonly<Record<string, string>> = {
  food: 'Food & Dining',
  transport: 'Transportation',
  utilities: 'Utilities',
  entertainment: 'Entertainment',
  healthcare: 'Healthcare',
  shopping: 'Shopping',
  education: 'Education',
  other: 'Other'
};

export const PROTECTED_CATEGORIES: readonly string[] = ['food', 'transport', 'utilities', 'other'];

const MAX_ID_ATTEMPTS = 100;

export function generateShortId(): string {
  return uuidv4().slice(0, 8);
}

export interface LedgerOptions {
  store: LedgerStore;
  categories?: Readonly<Record<string, string>>;
  protectedCategories?: readonly string[];
  owners?: readonly string[]; // Empty or absent disables owner tracking
  now?: () => Date;
  generateId?: () => string;
}

function instantOf(record: ExpenseRecord): number {
  const time = Date.parse(record.createdAt);
  return Number.isNaN(time) ? 0 : time;
}

/**
 * In-memory expense ledger backed by a JSON snapshot file.
 *
 * Every mutation is validated, applied in memory and then persisted as a
 * whole-file snapshot. If the save fails the mutation stays applied and an
 * IOError with `committed: true` is thrown; `hasUnsavedChanges()` stays true
 * until a later save succeeds.
 *
 * Listings are ordered newest insertion first and are always copies.
 */
export class LedgerEngine {
  private readonly store: LedgerStore;
  private readonly records = new Map<string, ExpenseRecord>();
  private readonly sequence = new Map<string, number>();
  private nextSequence = 0;
  private categories: Map<string, string>;
  private readonly initialCategories: Readonly<Record<string, string>>;
  private readonly protectedCategories: ReadonlySet<string>;
  private readonly owners: readonly string[];
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private dirty = false;

  constructor(options: LedgerOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? generateShortId;
    this.initialCategories = options.categories ?? DEFAULT_CATEGORIES;
    this.protectedCategories = new Set(options.protectedCategories ?? PROTECTED_CATEGORIES);
    this.owners = [...new Set((options.owners ?? []).map(owner => owner.trim()).filter(owner => owner.length > 0))];
    this.categories = this.withProtected(new Map(Object.entries(this.initialCategories)));
  }

  // ─── Persistence ───────────────────────────────────────────────────────

  /**
   * Replaces in-memory state with the backing files. A missing file yields
   * an empty collection; a malformed one throws ParseError and leaves the
   * current state untouched.
   */
  load(): LoadResult {
    const storedCategories = this.store.loadCategories();
    const storedRecords = this.store.loadRecords() ?? {};

    const categories = this.withProtected(
      new Map(Object.entries(storedCategories ?? this.initialCategories))
    );
    const adoptedCategories: string[] = [];
    for (const record of Object.values(storedRecords)) {
      if (!categories.has(record.category)) {
        categories.set(record.category, record.category);
        adoptedCategories.push(record.category);
      }
    }

    this.categories = categories;
    this.records.clear();
    this.sequence.clear();
    for (const record of Object.values(storedRecords)) {
      this.insert(record);
    }
    this.dirty = adoptedCategories.length > 0;

    return { recordCount: this.records.size, adoptedCategories };
  }

  /**
   * Writes the full record snapshot and the category registry.
   */
  save(): void {
    this.store.saveRecords(this.snapshot());
    this.store.saveCategories(this.getCategories());
    this.dirty = false;
  }

  hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  /**
   * Merges records from another file. Incoming ids that already exist are
   * reassigned; existing records are never touched.
   *
   * @returns the number of records added
   */
  mergeLoad(path: string): number {
    return this.merge(path, () => this.store.readMergeSource(path));
  }

  /**
   * Same as `mergeLoad` for a document that is already parsed, such as an
   * uploaded export. `source` names it in errors.
   */
  mergeData(data: unknown, source: string): number {
    return this.merge(source, () => toMergeRecords(data, source));
  }

  exportSnapshot(): ExportEnvelope {
    return {
      records: this.snapshot(),
      exportDate: this.now().toISOString(),
      recordCount: this.records.size,
      totalAmount: this.totalAmount()
    };
  }

  exportTo(path: string): ExportEnvelope {
    const envelope = this.exportSnapshot();
    this.store.writeExport(path, envelope);
    return envelope;
  }

  // ─── Records ───────────────────────────────────────────────────────────

  create(input: RecordInput): string {
    const value = this.validate(input);
    const createdAt = this.now();

    const record: ExpenseRecord = {
      id: this.freshId(),
      amount: value.amount,
      category: value.category,
      description: value.description,
      date: value.date ?? toDateString(createdAt),
      timestamp: createdAt.toISOString(),
      createdAt: createdAt.toISOString()
    };
    if (value.owner !== undefined) record.owner = value.owner;

    this.insert(record);
    this.commit(record.id);
    return record.id;
  }

  /**
   * Replaces every editable field of a record. An omitted date keeps the
   * current one.
   */
  update(id: string, input: RecordInput): ExpenseRecord {
    const existing = this.records.get(id);
    if (!existing) throw new NotFoundError(id);

    const value = this.validate(input);
    const updated: ExpenseRecord = {
      id,
      amount: value.amount,
      category: value.category,
      description: value.description,
      date: value.date ?? existing.date,
      timestamp: existing.timestamp,
      createdAt: existing.createdAt
    };
    const owner = this.isOwnerTrackingEnabled() ? value.owner : existing.owner;
    if (owner !== undefined) updated.owner = owner;

    this.records.set(id, updated);
    this.commit(id);
    return { ...updated };
  }

  delete(id: string): boolean {
    if (!this.records.delete(id)) return false;
    this.sequence.delete(id);
    this.commit(id);
    return true;
  }

  clearAll(): number {
    const removed = this.records.size;
    this.records.clear();
    this.sequence.clear();
    this.commit();
    return removed;
  }

  getRecord(id: string): ExpenseRecord | undefined {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  listAll(): ExpenseRecord[] {
    return this.sorted(this.records.values());
  }

  filterByDateRange(start: string, end: string): ExpenseRecord[] {
    return this.filter({ start, end });
  }

  filterByCategory(key: string): ExpenseRecord[] {
    return this.filter({ category: key });
  }

  filterByOwner(owner: string): ExpenseRecord[] {
    return this.filter({ owner });
  }

  /**
   * Case-insensitive substring match on the description. An empty query
   * matches nothing.
   */
  search(query: string): ExpenseRecord[] {
    const needle = query.trim().toLowerCase();
    if (needle.length === 0) return [];
    return this.filter({ text: needle });
  }

  /**
   * Applies every given criterion. Blank text is ignored.
   */
  filter(criteria: RecordFilter): ExpenseRecord[] {
    const start = criteria.start !== undefined ? parseDateOrThrow('start', criteria.start) : undefined;
    const end = criteria.end !== undefined ? parseDateOrThrow('end', criteria.end) : undefined;
    if (start !== undefined && end !== undefined && start > end) {
      throw new ValidationError('start', 'start date cannot be after end date', start);
    }

    const category = criteria.category;
    if (category !== undefined && !this.categories.has(category)) {
      throw new ValidationError('category', 'unknown category', category);
    }

    const owner = criteria.owner;
    if (owner !== undefined) {
      if (!this.isOwnerTrackingEnabled()) {
        throw new ValidationError('owner', 'owner tracking is disabled', owner);
      }
      if (!this.owners.includes(owner)) {
        throw new ValidationError('owner', 'unknown owner', owner);
      }
    }

    const text = criteria.text?.trim().toLowerCase() ?? '';

    const matches = [...this.records.values()].filter(record =>
      (start === undefined || record.date >= start) &&
      (end === undefined || record.date <= end) &&
      (category === undefined || record.category === category) &&
      (owner === undefined || record.owner === owner) &&
      (text.length === 0 || record.description.toLowerCase().includes(text))
    );
    return this.sorted(matches);
  }

  totalAmount(): number {
    let total = 0;
    for (const record of this.records.values()) total += record.amount;
    return total;
  }

  /**
   * One entry per registered category, including unused ones.
   */
  summaryByCategory(): Record<string, CategorySummary> {
    const summary = new Map<string, CategorySummary>();
    for (const [key, displayName] of this.categories) {
      summary.set(key, { displayName, total: 0, count: 0 });
    }

    for (const record of this.records.values()) {
      const entry = summary.get(record.category);
      if (entry === undefined) continue;
      entry.total += record.amount;
      entry.count += 1;
    }
    return Object.fromEntries(summary);
  }

  monthlySummary(year: number, month: number): MonthlySummary {
    if (!Number.isInteger(year) || year < 1 || year > 9999) {
      throw new ValidationError('year', 'invalid year', year);
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new ValidationError('month', 'month must be between 1 and 12', month);
    }

    const start = formatDate(year, month, 1);
    const end = formatDate(year, month, daysInMonth(year, month));
    const records = this.filter({ start, end });

    let totalAmount = 0;
    const categoryTotals = new Map<string, number>();
    for (const record of records) {
      totalAmount += record.amount;
      categoryTotals.set(record.category, (categoryTotals.get(record.category) ?? 0) + record.amount);
    }

    return {
      month: start.slice(0, 7),
      start,
      end,
      totalAmount,
      count: records.length,
      categoryTotals: Object.fromEntries(categoryTotals),
      records
    };
  }

  // Totals per calendar month of the record date, oldest first
  monthlyTrend(): MonthlyTrendPoint[] {
    const months = new Map<string, MonthlyTrendPoint>();
    for (const record of this.records.values()) {
      const month = record.date.slice(0, 7);
      const point = months.get(month) ?? { month, total: 0, count: 0 };
      point.total += record.amount;
      point.count += 1;
      months.set(month, point);
    }
    return [...months.values()].sort((a, b) => a.month.localeCompare(b.month));
  }

  // ─── Registries ────────────────────────────────────────────────────────

  getCategories(): Record<string, string> {
    return Object.fromEntries(this.categories);
  }

  getProtectedCategories(): string[] {
    return [...this.protectedCategories];
  }

  getOwners(): string[] {
    return [...this.owners];
  }

  isOwnerTrackingEnabled(): boolean {
    return this.owners.length > 0;
  }

  addCategory(key: string, displayName: string): void {
    const result = validateCategory(key, displayName, this.getCategories());
    if (!result.valid) throw result.error;

    this.categories.set(result.value.key, result.value.displayName);
    this.commit();
  }

  deleteCategory(key: string): void {
    const name = this.categories.get(key);
    if (name === undefined) {
      throw new NotFoundError(key, `Category ${key} not found`);
    }
    if (this.protectedCategories.has(key)) {
      throw new ConflictError(key, 'protected category', `Category '${name}' is protected and cannot be deleted`);
    }

    const inUse = [...this.records.values()].filter(record => record.category === key).length;
    if (inUse > 0) {
      throw new ConflictError(
        key,
        'category in use',
        `Cannot delete category '${name}': category in use by ${inUse} record(s)`
      );
    }

    this.categories.delete(key);
    this.commit();
  }

  // ─── Internals ─────────────────────────────────────────────────────────

  private validationContext(): ValidationContext {
    return { categories: this.getCategories(), owners: this.owners };
  }

  private validate(input: RecordInput): RecordInput {
    const result = validateRecordInput(input, this.validationContext());
    if (!result.valid) throw result.error;
    return result.value;
  }

  private withProtected(categories: Map<string, string>): Map<string, string> {
    for (const key of this.protectedCategories) {
      if (!categories.has(key)) {
        categories.set(key, this.initialCategories[key] ?? DEFAULT_CATEGORIES[key] ?? key);
      }
    }
    return categories;
  }

  private insert(record: ExpenseRecord): void {
    this.records.set(record.id, record);
    this.sequence.set(record.id, this.nextSequence++);
  }

  private freshId(taken: ReadonlySet<string> = new Set()): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.generateId();
      if (!this.records.has(id) && !taken.has(id)) return id;
    }
    throw new Error(`Could not generate a unique record id after ${MAX_ID_ATTEMPTS} attempts`);
  }

  /**
   * Reads the incoming records and settles every target id before anything
   * is inserted, so a failure leaves the ledger as it was. Read failures keep
   * their own type; anything else becomes a MergeError.
   */
  private merge(source: string, read: () => RecordMap): number {
    let planned: ExpenseRecord[];
    try {
      const incoming = Object.entries(read());
      const taken = new Set(incoming.map(([id]) => id));
      planned = incoming.map(([id, record]) => {
        if (!this.records.has(id)) return { ...record, id };
        const targetId = this.freshId(taken);
        taken.add(targetId);
        return { ...record, id: targetId };
      });
    } catch (error) {
      if (error instanceof ParseError || error instanceof IOError) throw error;
      throw new MergeError(source, error);
    }

    for (const record of planned) {
      if (!this.categories.has(record.category)) {
        this.categories.set(record.category, record.category);
      }
      this.insert(record);
    }

    this.commit();
    return planned.length;
  }

  private snapshot(): RecordMap {
    return Object.fromEntries([...this.records].map(([id, record]) => [id, { ...record }]));
  }

  // Newest insertion first; equal instants fall back to insertion order
  private sorted(records: Iterable<ExpenseRecord>): ExpenseRecord[] {
    return [...records]
      .sort((a, b) =>
        instantOf(b) - instantOf(a) ||
        (this.sequence.get(b.id) ?? 0) - (this.sequence.get(a.id) ?? 0)
      )
      .map(record => ({ ...record }));
  }

  private commit(recordId?: string): void {
    this.dirty = true;
    try {
      this.save();
    } catch (error) {
      if (error instanceof IOError) throw error.asCommitted(recordId);
      throw error;
    }
  }
}
