// Three ownership scopes in one store: identity (always loaded), active (hot
// context, bounded) and archive (unbounded, searchable). Tier is data, not a
// subtype.

import type { ConsistencyWarning } from '../core/errors.js';

export const TIERS = ['identity', 'active', 'archive'] as const;
export type Tier = (typeof TIERS)[number];

export const RECORD_TYPES = [
  'fact',
  'decision',
  'preference',
  'insight',
  'goal',
  'daily',
  'long_term',
  'event',
  'task',
] as const;
export type RecordType = (typeof RECORD_TYPES)[number];

export const RELATION_KINDS = ['updates', 'extends', 'derives'] as const;
export type RelationKind = (typeof RELATION_KINDS)[number];

export const LEARNING_KINDS = ['recall_hit', 'recall_miss', 'correction', 'insight', 'error'] as const;
export type LearningKind = (typeof LEARNING_KINDS)[number];

// Default salience range per type; a record captured without salience gets the midpoint.
export const TYPE_SALIENCE: Record<RecordType, { min: number; max: number }> = {
  fact: { min: 0.4, max: 0.7 },
  decision: { min: 0.7, max: 0.9 },
  preference: { min: 0.6, max: 0.8 },
  insight: { min: 0.6, max: 0.9 },
  goal: { min: 0.75, max: 0.95 },
  daily: { min: 0.2, max: 0.5 },
  long_term: { min: 0.6, max: 0.9 },
  event: { min: 0.3, max: 0.6 },
  task: { min: 0.5, max: 0.8 },
};

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type Metadata = Record<string, MetadataValue>;

export interface MemoryRecord {
  id: string;
  content: string;
  tier: Tier;
  type: RecordType;
  salience: number;
  embedding: Float32Array | null;
  createdAt: Date;
  updatedAt: Date;
  accessedAt: Date | null;
  accessCount: number;
  metadata: Metadata;
}

export interface NewRecordInput {
  content: string;
  tier?: Tier;
  type?: RecordType;
  salience?: number;
  metadata?: Metadata;
}

export interface RecordUpdate {
  content?: string;
  tier?: Tier;
  type?: RecordType;
  salience?: number;
  metadata?: Metadata;
}

export interface RecordFilter {
  tier?: Tier | Tier[];
  type?: RecordType | RecordType[];
  minSalience?: number;
  limit?: number;
  offset?: number;
}

export interface KeyValueEntry {
  key: string;
  value: string;
  updatedAt: Date;
}

export interface GraphEdge {
  sourceId: string;
  targetId: string;
  kind: RelationKind;
  createdAt: Date;
}

export interface LearningEntry {
  id: string;
  kind: LearningKind;
  trigger: string;
  content: string;
  recordId: string | null;
  timesApplied: number;
  createdAt: Date;
  lastAppliedAt: Date | null;
  metadata: Metadata;
}

export interface NewLearningInput {
  kind: LearningKind;
  trigger: string;
  content: string;
  recordId?: string | null;
  metadata?: Metadata;
}

export interface SearchOptions {
  limit?: number;
  tier?: Tier | Tier[];
  type?: RecordType | RecordType[];
  minSalience?: number;
  floor?: number;
  touch?: boolean;
  now?: Date;
}

export interface SearchHit {
  record: MemoryRecord;
  similarity: number;  // Raw cosine similarity
  score: number;       // After recency multiplier, in [0,1]
}

export interface EnrichedRecord {
  record: MemoryRecord;
  related: {
    extends: MemoryRecord[];
    derives: MemoryRecord[];
  };
}

export interface Resolution {
  record: MemoryRecord;
  chain: string[];
  ambiguous: boolean;
  warnings: ConsistencyWarning[];
}

export interface ConflictSignal {
  recordId: string;
  otherId: string;
  similarity: number;
  sharedEntities: string[];
}

export interface ConsolidationReport {
  merged: number;
  pruned: number;
  promoted: number;
  demoted: number;
  expired: number;
  warnings: ConsistencyWarning[];
  durationMs: number;
}

export type SurfacingRule = 'entity' | 'semantic' | 'temporal';

export interface TemporalRange {
  start: Date;
  end: Date;
  label: string;
}

export interface SurfacedResult {
  record: MemoryRecord;
  confidence: number;
  reasons: SurfacingRule[];
  matchedEntities: string[];
  similarity: number | null;
  conflicts: string[];
  temporal: TemporalRange | null;
}

export interface ExtractedCandidate {
  content: string;
  type: RecordType;
  confidence: number;
  salience: number;
}

export interface MemoryStats {
  totalRecords: number;
  byTier: Record<Tier, number>;
  byType: Partial<Record<RecordType, number>>;
  identityKeys: number;
  activeKeys: number;
  embeddedRecords: number;
  edges: number;
  learnings: number;
  averageSalience: number;
  oldestRecord?: Date;
  newestRecord?: Date;
}

export function isTier(value: unknown): value is Tier {
  return typeof value === 'string' && (TIERS as readonly string[]).includes(value);
}

export function isRecordType(value: unknown): value is RecordType {
  return typeof value === 'string' && (RECORD_TYPES as readonly string[]).includes(value);
}

export function isRelationKind(value: unknown): value is RelationKind {
  return typeof value === 'string' && (RELATION_KINDS as readonly string[]).includes(value);
}

export function isLearningKind(value: unknown): value is LearningKind {
  return typeof value === 'string' && (LEARNING_KINDS as readonly string[]).includes(value);
}
