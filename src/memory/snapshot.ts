import { z } from 'zod';
import { LEARNING_KINDS, RECORD_TYPES, RELATION_KINDS, TIERS } from './types.js';
import type { MetadataValue } from './types.js';

export const SNAPSHOT_VERSION = 1;

const MetadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(MetadataValueSchema),
    z.record(MetadataValueSchema),
  ])
);

const Timestamp = z.string().datetime({ offset: true });

export const SnapshotRecordSchema = z.object({
  id: z.string().min(1),
  content: z.string().refine((s) => s.trim().length > 0, 'content must be non-empty'),
  tier: z.enum(TIERS),
  type: z.enum(RECORD_TYPES),
  salience: z.number().min(0).max(1),
  createdAt: Timestamp,
  updatedAt: Timestamp,
  accessedAt: Timestamp.nullable(),
  accessCount: z.number().int().nonnegative(),
  metadata: z.record(MetadataValueSchema),
});

export const SnapshotEdgeSchema = z
  .object({
    source: z.string().min(1),
    target: z.string().min(1),
    kind: z.enum(RELATION_KINDS),
  })
  .refine((e) => e.source !== e.target, 'self edges are not allowed');

export const SnapshotLearningSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(LEARNING_KINDS),
  trigger: z.string(),
  content: z.string(),
  recordId: z.string().nullable(),
  timesApplied: z.number().int().nonnegative(),
  createdAt: Timestamp,
  lastAppliedAt: Timestamp.nullable(),
  metadata: z.record(MetadataValueSchema),
});

export const SnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  exportedAt: Timestamp,
  identity: z.record(z.string()),
  activeContext: z.record(z.string()),
  records: z.array(SnapshotRecordSchema),
  edges: z.array(SnapshotEdgeSchema),
  learnings: z.array(SnapshotLearningSchema),
});

export type MemorySnapshot = z.infer<typeof SnapshotSchema>;
export type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>;
export type SnapshotLearning = z.infer<typeof SnapshotLearningSchema>;

export interface ImportOptions {
  // 'replace' clears the store first; 'merge' keeps existing rows and skips ids already present.
  mode?: 'merge' | 'replace';
}

export interface ImportReport {
  records: number;
  skippedRecords: number;
  edges: number;
  identity: number;
  active: number;
  learnings: number;
}
