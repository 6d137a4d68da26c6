import type { ColumnType } from 'kysely';

/** pg hands jsonb back parsed; writes go in as serialized JSON text. */
export type JsonbBody = ColumnType<unknown, string, string>;

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export interface DocumentsTable {
  collection: string;
  doc_key: string;
  body: JsonbBody;
  updated_at: Timestamp;
}

export interface Database {
  documents: DocumentsTable;
}
