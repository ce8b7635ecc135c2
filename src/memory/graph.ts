import { NotFoundError, ValidationError, consistencyWarning } from '../core/errors.js';
import type { ConsistencyWarning } from '../core/errors.js';
import { silentLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { GraphConfig } from '../config/index.js';
import { cosineSimilarity } from './embeddings.js';
import type { RecordStore } from './record-store.js';
import { PatternEntityExtractor } from './signals.js';
import type { EntityExtractor } from './signals.js';
import { isRelationKind } from './types.js';
import type {
  ConflictSignal,
  EnrichedRecord,
  MemoryRecord,
  RelationKind,
  Resolution,
} from './types.js';

export type EdgeDirection = 'out' | 'in' | 'both';

export interface RelationSuggestion {
  kind: RelationKind;
  confidence: number;
}

export interface GraphStats {
  totalEdges: number;
  byKind: Record<RelationKind, number>;
  superseded: number;
}

export const DEFAULT_GRAPH: GraphConfig = {
  conflictThreshold: 0.75,
  updateThreshold: 0.72,
  extendThreshold: 0.65,
  deriveThreshold: 0.45,
};

/**
 * Entities recorded on a record, falling back to extraction from content.
 */
export function entitiesOf(record: MemoryRecord, extractor: EntityExtractor): string[] {
  const tagged = record.metadata.entities;
  if (Array.isArray(tagged)) {
    const names = tagged.filter((e): e is string => typeof e === 'string' && e.trim().length > 0);
    if (names.length > 0) return names;
  }
  return extractor.extract(record.content);
}

export class GraphLayer {
  private readonly config: GraphConfig;
  private readonly logger: Logger;

  constructor(
    private records: RecordStore,
    config: Partial<GraphConfig> = {},
    private entityExtractor: EntityExtractor = new PatternEntityExtractor(),
    logger: Logger = silentLogger
  ) {
    this.config = { ...DEFAULT_GRAPH, ...config };
    this.logger = logger.child('graph');
  }

  // ==================== EDGES ====================

  /**
   * Add a directed edge. Returns false if the edge already existed.
   * An `updates` edge marks the source as superseded by the target.
   */
  async link(sourceId: string, targetId: string, kind: RelationKind): Promise<boolean> {
    if (!isRelationKind(kind)) {
      throw new ValidationError(`Unknown relation kind: ${String(kind)}`);
    }
    if (sourceId === targetId) {
      throw new ValidationError(`Cannot link a record to itself: ${sourceId}`);
    }

    const store = this.records.store;
    return this.records.lock.run(() =>
      store.transaction(() => {
        const source = store.getRecord(sourceId);
        if (!source) throw new ValidationError(`Unknown source record: ${sourceId}`);
        if (!store.hasRecord(targetId)) throw new ValidationError(`Unknown target record: ${targetId}`);

        const created = store.addEdge(sourceId, targetId, kind);
        if (kind === 'updates' && source.metadata.superseded !== true) {
          store.updateRecord(sourceId, {
            metadata: { ...source.metadata, superseded: true },
            touchUpdatedAt: false,
          });
        }
        if (created) {
          this.logger.debug('edge added', { source: sourceId, target: targetId, kind });
        }
        return created;
      })
    );
  }

  async unlink(sourceId: string, targetId: string, kind: RelationKind): Promise<boolean> {
    const store = this.records.store;
    return this.records.lock.run(() =>
      store.transaction(() => {
        const removed = store.removeEdge(sourceId, targetId, kind);
        if (removed && kind === 'updates' && store.edgesFrom(sourceId, 'updates').length === 0) {
          const source = store.getRecord(sourceId);
          if (source && source.metadata.superseded !== undefined) {
            const { superseded: _superseded, ...metadata } = source.metadata;
            store.updateRecord(sourceId, { metadata, touchUpdatedAt: false });
          }
        }
        return removed;
      })
    );
  }

  neighbors(id: string, kind?: RelationKind, direction: EdgeDirection = 'both'): Set<string> {
    const store = this.records.store;
    const ids = new Set<string>();
    if (direction !== 'in') {
      for (const edge of store.edgesFrom(id, kind)) ids.add(edge.targetId);
    }
    if (direction !== 'out') {
      for (const edge of store.edgesTo(id, kind)) ids.add(edge.sourceId);
    }
    return ids;
  }

  // ==================== RESOLUTION ====================

  /**
   * Follow outgoing `updates` edges to the live version of a record. Stops
   * at a record with no outgoing `updates` edge, or on revisiting a record,
   * in which case the original comes back flagged `ambiguous_resolution`.
   */
  resolve(id: string): MemoryRecord {
    return this.resolveDetailed(id).record;
  }

  resolveDetailed(id: string): Resolution {
    const store = this.records.store;
    const origin = store.getRecord(id);
    if (!origin) throw new NotFoundError('record', id);

    const visited = new Set<string>([origin.id]);
    const chain: string[] = [origin.id];
    let current = origin;

    while (true) {
      const next = this.latestSuccessor(current.id);
      if (!next) {
        return { record: current, chain, ambiguous: false, warnings: [] };
      }

      if (visited.has(next.id)) {
        const warning = consistencyWarning(
          'cycle_detected',
          `updates cycle reached from ${origin.id} at ${next.id}`,
          chain
        );
        this.logWarnings([warning]);
        return {
          record: { ...origin, metadata: { ...origin.metadata, ambiguous_resolution: true } },
          chain,
          ambiguous: true,
          warnings: [warning],
        };
      }

      visited.add(next.id);
      chain.push(next.id);
      current = next;
    }
  }

  // Most recently updated target of an outgoing `updates` edge.
  private latestSuccessor(id: string): MemoryRecord | null {
    const store = this.records.store;
    const targets = store.getRecords(store.edgesFrom(id, 'updates').map((e) => e.targetId));

    let best: MemoryRecord | null = null;
    for (const target of targets) {
      if (
        !best ||
        target.updatedAt.getTime() > best.updatedAt.getTime() ||
        (target.updatedAt.getTime() === best.updatedAt.getTime() && target.id < best.id)
      ) {
        best = target;
      }
    }
    return best;
  }

  /**
   * Attach `extends` and `derives` neighbours without replacing the record.
   */
  enrich(records: MemoryRecord[]): EnrichedRecord[] {
    const store = this.records.store;
    return records.map((record) => ({
      record,
      related: {
        extends: store.getRecords([...this.neighbors(record.id, 'extends')]),
        derives: store.getRecords([...this.neighbors(record.id, 'derives')]),
      },
    }));
  }

  // ==================== CONFLICTS ====================

  /**
   * Records that look like competing versions of `id`: very similar, sharing
   * an entity, and not already related by `updates` or `extends`.
   */
  async findConflicts(id: string, candidates?: MemoryRecord[]): Promise<ConflictSignal[]> {
    const record = this.records.store.getRecord(id);
    if (!record) throw new NotFoundError('record', id);

    const vector = await this.records.ensureEmbedding(record);
    if (!vector) return [];

    const entities = new Map(
      entitiesOf(record, this.entityExtractor).map((e) => [e.toLowerCase(), e])
    );
    if (entities.size === 0) return [];

    const related = new Set([
      ...this.neighbors(id, 'updates'),
      ...this.neighbors(id, 'extends'),
    ]);

    const signals: ConflictSignal[] = [];
    for (const other of candidates ?? this.records.list()) {
      if (other.id === id || related.has(other.id)) continue;

      const otherVector = await this.records.ensureEmbedding(other);
      if (!otherVector) continue;

      const similarity = cosineSimilarity(vector, otherVector);
      if (similarity < this.config.conflictThreshold) continue;

      const sharedEntities = entitiesOf(other, this.entityExtractor)
        .filter((e) => entities.has(e.toLowerCase()));
      if (sharedEntities.length === 0) continue;

      signals.push({ recordId: id, otherId: other.id, similarity, sharedEntities });
    }

    return signals.sort((a, b) => b.similarity - a.similarity);
  }

  // ==================== RELATION DETECTION ====================

  /**
   * Guess how new content relates to an existing record:
   * - contradiction language on the same subject → updates
   * - additive language or new detail on the same subject → extends
   * - loose overlap at moderate similarity → derives
   */
  suggestRelation(newContent: string, existingContent: string, similarity: number): RelationSuggestion | null {
    const kind = this.classifyRelation(newContent, existingContent, similarity);
    if (!kind) return null;
    return { kind, confidence: relationConfidence(kind, similarity, newContent) };
  }

  private classifyRelation(newContent: string, existingContent: string, similarity: number): RelationKind | null {
    const { updateThreshold, extendThreshold, deriveThreshold } = this.config;
    const next = newContent.toLowerCase();
    const existing = existingContent.toLowerCase();

    if (similarity >= updateThreshold) {
      if (hasContradictionSignals(next, existing)) return 'updates';
      if (similarity >= 0.85 && newContent.length > existingContent.length * 0.5) return 'extends';
    }

    if (similarity >= extendThreshold) {
      const sameSubject = sharesSubject(newContent, existingContent);
      if (hasContradictionSignals(next, existing) && sameSubject) return 'updates';
      if (EXTENSION_PATTERNS.some((p) => p.test(next))) return 'extends';
      if (sameSubject && hasNewInformation(next, existing)) return 'extends';
    }

    if (similarity >= deriveThreshold && similarity < extendThreshold) {
      if (hasInferrableConnection(next, existing)) return 'derives';
    }

    return null;
  }

  stats(): GraphStats {
    const byKind: Record<RelationKind, number> = { updates: 0, extends: 0, derives: 0 };
    const sources = new Set<string>();
    const edges = this.records.store.allEdges();
    for (const edge of edges) {
      byKind[edge.kind]++;
      if (edge.kind === 'updates') sources.add(edge.sourceId);
    }
    return { totalEdges: edges.length, byKind, superseded: sources.size };
  }

  private logWarnings(warnings: ConsistencyWarning[]): void {
    for (const warning of warnings) {
      this.logger.warn(warning.message, { code: warning.code, records: warning.recordIds.join(',') });
    }
  }
}

const CONTRADICTION_PATTERNS: RegExp[] = [
  /\b(?:actually|no longer|not|isn't|wasn't|changed to|moved to|switched to|now)\b/,
  /\b(?:instead of|rather than|correcting|correction|updated?|updates)\b/,
  /\b(?:used to|previously|formerly|was|were)\b/,
];

const EXTENSION_PATTERNS: RegExp[] = [
  /\b(?:also|additionally|furthermore|moreover|plus)\b/,
  /\b(?:specifically|in particular|for example|e\.g\.)/,
  /\b(?:details|more about|expanding on)\b/,
];

function words(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter((w) => w.length > 0));
}

function hasContradictionSignals(next: string, existing: string): boolean {
  const leadNew = new Set(next.split(/\s+/).slice(0, 8));
  const leadExisting = new Set(existing.split(/\s+/).slice(0, 8));
  let shared = 0;
  for (const w of leadNew) if (leadExisting.has(w)) shared++;
  const sharedStart = shared / Math.max(leadNew.size, 1);

  if (CONTRADICTION_PATTERNS.some((p) => p.test(next)) && sharedStart > 0.3) {
    return true;
  }

  // Same statement with a different value ("price is $5" vs "price is $7")
  const numbersNew = new Set(next.match(/\$?\d+\.?\d*/g) ?? []);
  const numbersExisting = new Set(existing.match(/\$?\d+\.?\d*/g) ?? []);
  if (numbersNew.size > 0 && numbersExisting.size > 0 && !sameSet(numbersNew, numbersExisting)) {
    return sharedStart > 0.4;
  }
  return false;
}

function sharesSubject(next: string, existing: string): boolean {
  const subjects = (text: string): Set<string> => new Set(text.match(/\b[A-Z][a-z]+\b/g) ?? []);
  const a = subjects(next);
  const b = subjects(existing);
  for (const s of a) if (b.has(s)) return true;
  return false;
}

function hasNewInformation(next: string, existing: string): boolean {
  const newWords = words(next);
  const existingWords = words(existing);
  let novel = 0;
  for (const w of newWords) if (!existingWords.has(w)) novel++;
  return novel / Math.max(newWords.size, 1) > 0.3;
}

function hasInferrableConnection(next: string, existing: string): boolean {
  const a = words(next);
  const b = words(existing);
  let shared = 0;
  for (const w of a) if (b.has(w)) shared++;
  const overlap = shared / Math.max(Math.min(a.size, b.size), 1);
  return overlap > 0.15 && overlap < 0.5;
}

function relationConfidence(kind: RelationKind, similarity: number, newContent: string): number {
  let base = similarity;
  const lower = newContent.toLowerCase();
  if (kind === 'updates' && /\b(?:actually|no longer|changed|correction)\b/.test(lower)) {
    base = Math.min(base + 0.15, 1);
  } else if (kind === 'extends' && /\b(?:also|additionally|specifically)\b/.test(lower)) {
    base = Math.min(base + 0.1, 1);
  } else if (kind === 'derives') {
    base *= 0.7;
  }
  return Math.round(base * 1000) / 1000;
}

function sameSet(a: Set<string>, b: Set<string>): boolean {
  if (a.size !== b.size) return false;
  for (const v of a) if (!b.has(v)) return false;
  return true;
}
