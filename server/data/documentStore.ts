import type { CollectionDocuments, CollectionName } from './documents.js';
import type { DocumentFilter, JsonScalar, QueryOptions, ScalarFieldKeys } from './documentFilter.js';

export type StoreDriverName = 'postgres' | 'memory';

/** Precondition of a conditional write; `null` means the key must not exist yet. */
export type WriteCondition<T> = { field: ScalarFieldKeys<T>; equals: JsonScalar } | null;

/**
 * Keyed document persistence shared by the ledger, the registry and the record
 * stores. Each write is a single-row atomic upsert or compare-and-set; there
 * are no multi-row transactions.
 *
 * Implementations wrap every driver failure, and every stored document that
 * fails its collection schema, in a PersistenceError.
 */
export interface DocumentStore {
  readonly driver: StoreDriverName;
  upsert<C extends CollectionName>(collection: C, key: string, doc: CollectionDocuments[C]): Promise<void>;
  /**
   * Writes `doc` only if the stored document still satisfies `condition`,
   * checked and written as one atomic step. Resolves false when it did not.
   */
  compareAndSet<C extends CollectionName>(
    collection: C,
    key: string,
    doc: CollectionDocuments[C],
    condition: WriteCondition<CollectionDocuments[C]>,
  ): Promise<boolean>;
  get<C extends CollectionName>(collection: C, key: string): Promise<CollectionDocuments[C] | null>;
  /** Without a sort, results come back in key order. */
  query<C extends CollectionName>(
    collection: C,
    filter?: DocumentFilter<CollectionDocuments[C]>,
    options?: QueryOptions<CollectionDocuments[C]>,
  ): Promise<CollectionDocuments[C][]>;
  count<C extends CollectionName>(collection: C, filter?: DocumentFilter<CollectionDocuments[C]>): Promise<number>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
