import { sql, type Kysely, type RawBuilder, type SqlBool } from 'kysely';
import type { Database } from '../db/types.js';
import { PersistenceError } from '../lib/errors.js';
import type { DocumentStore, WriteCondition } from './documentStore.js';
import { collectionSchemas, type CollectionDocuments, type CollectionName } from './documents.js';
import {
  compileFilter,
  isFieldName,
  type DocumentFilter,
  type FilterClause,
  type JsonScalar,
  type QueryOptions,
} from './documentFilter.js';

const RANGE_SQL = { lt: '<', lte: '<=', gt: '>', gte: '>=' } as const;

function fieldRef(field: string): RawBuilder<unknown> {
  if (!isFieldName(field)) {
    throw new TypeError(`Unsupported field "${field}"`);
  }
  return sql`body -> ${sql.lit(field)}`;
}

function jsonbParam(value: JsonScalar): RawBuilder<unknown> {
  return sql`${JSON.stringify(value)}::jsonb`;
}

/** Translates one filter clause into a jsonb predicate; null equality also matches a missing field. */
export function clauseToSql(clause: FilterClause): RawBuilder<SqlBool> {
  const ref = fieldRef(clause.field);
  switch (clause.op) {
    case 'eq':
      return clause.value === null
        ? sql<SqlBool>`(${ref} is null or ${ref} = 'null'::jsonb)`
        : sql<SqlBool>`${ref} = ${jsonbParam(clause.value)}`;
    case 'ne':
      return clause.value === null
        ? sql<SqlBool>`(${ref} is not null and ${ref} <> 'null'::jsonb)`
        : sql<SqlBool>`${ref} is distinct from ${jsonbParam(clause.value)}`;
    case 'in': {
      if (clause.values.length === 0) return sql<SqlBool>`false`;
      const matchesNull = clause.values.some((value) => value === null);
      const present = clause.values.filter((value) => value !== null);
      const parts: RawBuilder<SqlBool>[] = [];
      if (present.length > 0) parts.push(sql<SqlBool>`${ref} in (${sql.join(present.map(jsonbParam))})`);
      if (matchesNull) parts.push(sql<SqlBool>`${ref} is null or ${ref} = 'null'::jsonb`);
      return sql<SqlBool>`(${sql.join(parts, sql` or `)})`;
    }
    default:
      return sql<SqlBool>`(jsonb_typeof(${ref}) = ${typeof clause.value} and ${ref} ${sql.raw(RANGE_SQL[clause.op])} ${jsonbParam(clause.value)})`;
  }
}

/**
 * DocumentStore over the single `documents` table. Bodies are jsonb; filters
 * and sorts are evaluated by Postgres so only matching rows cross the wire.
 */
export class PostgresDocumentStore implements DocumentStore {
  readonly driver = 'postgres' as const;
  private readonly db: Kysely<Database>;

  constructor(db: Kysely<Database>) {
    this.db = db;
  }

  private decode<C extends CollectionName>(operation: string, collection: C, body: unknown): CollectionDocuments[C] {
    const parsed = collectionSchemas[collection].safeParse(body);
    if (!parsed.success) {
      throw new PersistenceError(operation, collection, parsed.error);
    }
    return parsed.data;
  }

  private where<C extends CollectionName>(
    operation: string,
    collection: C,
    filter: DocumentFilter<CollectionDocuments[C]>,
  ): RawBuilder<SqlBool>[] {
    try {
      return compileFilter(filter).map(clauseToSql);
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
    const body = this.encode('upsert', collection, doc);
    try {
      await this.db
        .insertInto('documents')
        .values({ collection, doc_key: key, body, updated_at: new Date() })
        .onConflict((oc) =>
          oc.columns(['collection', 'doc_key']).doUpdateSet((eb) => ({
            body: sql<string>`excluded.body`,
            updated_at: eb.ref('excluded.updated_at'),
          })),
        )
        .execute();
    } catch (err: unknown) {
      throw new PersistenceError('upsert', collection, err);
    }
  }

  /**
   * Insert-if-absent via `on conflict do nothing`, or an update guarded by a
   * jsonb equality on the stored body. The affected row count decides.
   */
  async compareAndSet<C extends CollectionName>(
    collection: C,
    key: string,
    doc: CollectionDocuments[C],
    condition: WriteCondition<CollectionDocuments[C]>,
  ): Promise<boolean> {
    const body = this.encode('compareAndSet', collection, doc);
    try {
      if (condition === null) {
        const inserted = await this.db
          .insertInto('documents')
          .values({ collection, doc_key: key, body, updated_at: new Date() })
          .onConflict((oc) => oc.columns(['collection', 'doc_key']).doNothing())
          .executeTakeFirst();
        return (inserted.numInsertedOrUpdatedRows ?? 0n) > 0n;
      }
      const updated = await this.db
        .updateTable('documents')
        .set({ body, updated_at: new Date() })
        .where('collection', '=', collection)
        .where('doc_key', '=', key)
        .where(clauseToSql({ field: condition.field, op: 'eq', value: condition.equals }))
        .executeTakeFirst();
      return updated.numUpdatedRows > 0n;
    } catch (err: unknown) {
      throw new PersistenceError('compareAndSet', collection, err);
    }
  }

  async get<C extends CollectionName>(collection: C, key: string): Promise<CollectionDocuments[C] | null> {
    let row: { body: unknown } | undefined;
    try {
      row = await this.db
        .selectFrom('documents')
        .select('body')
        .where('collection', '=', collection)
        .where('doc_key', '=', key)
        .executeTakeFirst();
    } catch (err: unknown) {
      throw new PersistenceError('get', collection, err);
    }
    return row ? this.decode('get', collection, row.body) : null;
  }

  async query<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<CollectionDocuments[C]> = {},
    options: QueryOptions<CollectionDocuments[C]> = {},
  ): Promise<CollectionDocuments[C][]> {
    const predicates = this.where('query', collection, filter);
    let query = this.db.selectFrom('documents').select('body').where('collection', '=', collection);
    for (const predicate of predicates) {
      query = query.where(predicate);
    }
    for (const { field, direction } of options.sort ?? []) {
      query = query.orderBy(
        sql`nullif(${fieldRef(field)}, 'null'::jsonb)`,
        direction === 'desc' ? sql`desc nulls last` : sql`asc nulls last`,
      );
    }
    query = query.orderBy('doc_key');
    if (options.limit !== undefined) {
      query = query.limit(Math.max(0, options.limit));
    }
    let rows: Array<{ body: unknown }>;
    try {
      rows = await query.execute();
    } catch (err: unknown) {
      throw new PersistenceError('query', collection, err);
    }
    return rows.map((row) => this.decode('query', collection, row.body));
  }

  async count<C extends CollectionName>(
    collection: C,
    filter: DocumentFilter<CollectionDocuments[C]> = {},
  ): Promise<number> {
    const predicates = this.where('count', collection, filter);
    let query = this.db
      .selectFrom('documents')
      .select((eb) => eb.fn.countAll<string>().as('count'))
      .where('collection', '=', collection);
    for (const predicate of predicates) {
      query = query.where(predicate);
    }
    try {
      const row = await query.executeTakeFirst();
      return Number(row?.count ?? 0);
    } catch (err: unknown) {
      throw new PersistenceError('count', collection, err);
    }
  }

  async ping(): Promise<void> {
    try {
      await sql`select 1`.execute(this.db);
    } catch (err: unknown) {
      throw new PersistenceError('ping', 'documents', err);
    }
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
