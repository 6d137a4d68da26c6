import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('documents')
    .ifNotExists()
    .addColumn('collection', 'varchar(64)', (col) => col.notNull())
    .addColumn('doc_key', 'varchar(200)', (col) => col.notNull())
    .addColumn('body', 'jsonb', (col) => col.notNull())
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addPrimaryKeyConstraint('documents_pkey', ['collection', 'doc_key'])
    .execute();

  // Ledger lookups: runs of one job by logical date.
  await sql`CREATE INDEX IF NOT EXISTS idx_documents_job_date ON documents (collection, (body -> 'jobName'), (body -> 'logicalDate'))`.execute(
    db,
  );
  // Raw and analysis records of one entity over a date window.
  await sql`CREATE INDEX IF NOT EXISTS idx_documents_entity_date ON documents (collection, (body -> 'entityId'), (body -> 'date'))`.execute(
    db,
  );
  // Registry backlog scans.
  await sql`CREATE INDEX IF NOT EXISTS idx_documents_active ON documents (collection, (body -> 'isActive'))`.execute(db);
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('documents').ifExists().execute();
}
