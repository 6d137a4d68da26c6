/**
 * Document shapes for every collection the jobs persist.
 *
 * The zod schemas double as the read-side validation of whatever the store
 * hands back, and their key order is the canonical serialization order.
 */

import { z } from 'zod';

export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const JobAttemptSchema = z.object({
  runId: z.string(),
  status: z.enum(JOB_STATUSES),
  startedAt: z.string(),
  finishedAt: z.string().nullable(),
  detail: z.string(),
});

export type JobAttempt = z.infer<typeof JobAttemptSchema>;

export const JobRunDocumentSchema = z.object({
  jobName: z.string().min(1),
  logicalDate: z.string(),
  status: z.enum(JOB_STATUSES),
  runId: z.string(),
  attempts: z.number().int().nonnegative(),
  startedAt: z.string(),
  finishedAt: z.string().nullable(),
  detail: z.string(),
  stats: z.record(z.string(), z.number()),
  history: z.array(JobAttemptSchema),
});

export type JobRunDocument = z.infer<typeof JobRunDocumentSchema>;

export const EntityDocumentSchema = z.object({
  id: z.string().min(1),
  displayName: z.string(),
  priorityWeight: z.number(),
  isActive: z.boolean(),
  addedOn: z.string(),
  lastAnalyzedDate: z.string().nullable(),
  updatedAt: z.string(),
});

export type EntityDocument = z.infer<typeof EntityDocumentSchema>;

export const RawRecordDocumentSchema = z.object({
  entityId: z.string().min(1),
  date: z.string(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
  source: z.string(),
  ingestedAt: z.string(),
});

export type RawRecordDocument = z.infer<typeof RawRecordDocumentSchema>;

export const AnalysisRecordDocumentSchema = z.object({
  entityId: z.string().min(1),
  date: z.string(),
  indicators: z.record(z.string(), z.number().nullable()),
  signals: z.array(z.string()),
  rowsUsed: z.number().int().nonnegative(),
  analyzedAt: z.string(),
});

export type AnalysisRecordDocument = z.infer<typeof AnalysisRecordDocumentSchema>;

export interface CollectionDocuments {
  jobRuns: JobRunDocument;
  entities: EntityDocument;
  rawRecords: RawRecordDocument;
  analysisRecords: AnalysisRecordDocument;
}

export type CollectionName = keyof CollectionDocuments;

export const collectionSchemas: { [C in CollectionName]: z.ZodType<CollectionDocuments[C]> } = {
  jobRuns: JobRunDocumentSchema,
  entities: EntityDocumentSchema,
  rawRecords: RawRecordDocumentSchema,
  analysisRecords: AnalysisRecordDocumentSchema,
};

export function jobRunKey(jobName: string, logicalDate: string): string {
  return `${logicalDate}_${jobName}`;
}

export function entityDateKey(entityId: string, date: string): string {
  return `${entityId}:${date}`;
}
