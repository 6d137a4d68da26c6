import { PersistenceError } from '../lib/errors.js';
import type { DocumentStore, WriteCondition } from './documentStore.js';
import { collectionSchemas, type CollectionDocuments, type CollectionName } from './documents.js';
import {
  compareDocuments,
  compileFilter,
  matchesClause,
  matchesFilter,
  type DocumentFilter,
  type FilterClause,
  type QueryOptions,
} from './documentFilter.js';

/**
 * In-process DocumentStore. Documents are held as their serialized JSON so a
 * replay can be checked byte for byte, and so callers never share references
 * with the stored state.
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly driver = 'memory' as const;
  private readonly collections = new Map<CollectionName, Map<string, string>>();
  private closed = false;

  private bucket(collection: CollectionName): Map<string, string> {
    let bucket = this.collections.get(collection);
    if (!bucket) {
      bucket = new Map();
      this.collections.set(collection, bucket);
    }
    return bucket;
  }

  private assertOpen(operation: string, collection: string): void {
    if (this.closed) {
      throw new PersistenceError(operation, collection, new Error('store is closed'));
    }
  }

  private decode<C extends CollectionName>(operation: string, collection: C, raw: string): CollectionDocuments[C] {
    try {
      return collectionSchemas[collection].parse(JSON.parse(raw));
    } catch (err: unknown) {
      throw new PersistenceError(operation, collection, err);
    }
  }

  private encode<C extends CollectionName>(operation: string, collection: C, doc: CollectionDocuments[C]): string {
    try {
      return JSON.stringify(collectionSchemas[collection].parse(doc));
    } catch (err: unknown) {
      throw new PersistenceError(operation, collection, err);
    }
  }

  async upsert<C extends CollectionName>(collection: C, key: string, doc: CollectionDocuments[C]): Promise<void> {
    this.assertOpen('upsert', collection);
    this.bucket(collection).set(key, this.encode('upsert', collection, doc));
  }

  // No await between the check and the write: nothing can interleave.
  async compareAndSet<C extends CollectionName>(
    collection: C,
    key: string,
    doc: CollectionDocuments[C],
    condition: WriteCondition<CollectionDocuments[C]>,
  ): Promise<boolean> {
    this.assertOpen('compareAndSet', collection);
    const serialized = this.encode('compareAndSet', collection, doc);
    const bucket = this.bucket(collection);
    const raw = bucket.get(key);
    if (condition === null) {
      if (raw !== undefined) return false;
    } else {
      if (raw === undefined) return false;
      const current = this.decode('compareAndSet', collection, raw);
      if (!matchesClause(current, { field: condition.field, op: 'eq', value: condition.equals })) return false;
    }
    bucket.set(key, serialized);
    return true;
  }

  async get<C extends CollectionName>(collection: C, key: string): Promise<CollectionDocuments[C] | null> {
    this.assertOpen('get', collection);
    const raw = this.bucket(collection).get(key);
    return raw === undefined ? null : this.decode('get', collection, raw);
  }

  private select<C extends CollectionName>(
    operation: string,
    collection: C,
    filter: DocumentFilter<CollectionDocuments[C]>,
  ): Array<{ key: string; doc: CollectionDocuments[C] }> {
    this.assertOpen(operation, collection);
    let clauses: FilterClause[];
    try {
      clauses = compileFilter(filter);
    } catch (err: unknown) {
      throw new PersistenceError(operation, collection, err);
    }
    const rows: Array<{ key: string; doc: CollectionDocuments[C] }> = [];
    for (const [key, raw] of this.bucket(collection)) {
      const doc = this.decode(operation, collection, raw);
      if (matchesFilter(doc, clauses)) rows.push({ key, doc });
    }
    return rows;
  }

  async query<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<CollectionDocuments[C]> = {},
    options: QueryOptions<CollectionDocuments[C]> = {},
  ): Promise<CollectionDocuments[C][]> {
    const rows = this.select('query', collection, filter);
    const sort = options.sort ?? [];
    rows.sort((a, b) => compareDocuments(a.doc, b.doc, sort) || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    const limited = options.limit !== undefined ? rows.slice(0, Math.max(0, options.limit)) : rows;
    return limited.map((row) => row.doc);
  }

  async count<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<CollectionDocuments[C]> = {},
  ): Promise<number> {
    return this.select('count', collection, filter).length;
  }

  async ping(): Promise<void> {
    this.assertOpen('ping', 'store');
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Serialized contents of one collection, keyed and sorted by document key. */
  snapshot(collection: CollectionName): Record<string, string> {
    const entries = [...this.bucket(collection)].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries);
  }
}
