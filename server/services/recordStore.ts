import type { DocumentStore } from '../data/documentStore.js';
import {
  entityDateKey,
  type AnalysisRecordDocument,
  type RawRecordDocument,
} from '../data/documents.js';

export interface RawRow {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

function sameBar(a: RawRecordDocument, b: RawRow, source: string): boolean {
  return (
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.volume === b.volume &&
    a.source === source
  );
}

/** Raw OHLCV rows and analysis results, both keyed by (entityId, date). */
export class RecordStore {
  private readonly store: DocumentStore;

  constructor(store: DocumentStore) {
    this.store = store;
  }

  /**
   * Idempotent upsert of one bar. An unchanged bar keeps its original
   * `ingestedAt`, so replaying a date leaves the stored document untouched.
   * Returns true when the stored document changed.
   */
  async upsertRawRecord(entityId: string, row: RawRow, source: string, ingestedAt: string): Promise<boolean> {
    const key = entityDateKey(entityId, row.date);
    const existing = await this.store.get('rawRecords', key);
    if (existing && sameBar(existing, row, source)) {
      return false;
    }
    await this.store.upsert('rawRecords', key, {
      entityId,
      date: row.date,
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
      source,
      ingestedAt,
    });
    return true;
  }

  async getRawRecord(entityId: string, date: string): Promise<RawRecordDocument | null> {
    return this.store.get('rawRecords', entityDateKey(entityId, date));
  }

  /** Rows in `[from, to]`, oldest first. */
  async listRawRecords(entityId: string, from: string, to: string): Promise<RawRecordDocument[]> {
    return this.store.query(
      'rawRecords',
      { entityId, date: { $gte: from, $lte: to } },
      { sort: [{ field: 'date', direction: 'asc' }] },
    );
  }

  async countRawRecords(entityId: string): Promise<number> {
    return this.store.count('rawRecords', { entityId });
  }

  async saveAnalysisRecord(record: AnalysisRecordDocument): Promise<void> {
    await this.store.upsert('analysisRecords', entityDateKey(record.entityId, record.date), record);
  }

  async getAnalysisRecord(entityId: string, date: string): Promise<AnalysisRecordDocument | null> {
    return this.store.get('analysisRecords', entityDateKey(entityId, date));
  }

  async countAnalysisRecords(date: string): Promise<number> {
    return this.store.count('analysisRecords', { date });
  }
}
