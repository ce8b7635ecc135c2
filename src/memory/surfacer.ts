import { ProviderUnavailableError } from '../core/errors.js';
import { silentLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { SurfacingConfig } from '../config/index.js';
import type { GraphLayer } from './graph.js';
import type { LearningLog } from './learnings.js';
import type { RecordStore } from './record-store.js';
import { clamp01 } from './record-store.js';
import type { SemanticIndex } from './semantic-index.js';
import { PatternEntityExtractor, extractTemporalRange, mentions, withinRange } from './signals.js';
import type { EntityExtractor } from './signals.js';
import type {
  MemoryRecord,
  SurfacedResult,
  SurfacingRule,
  TemporalRange,
} from './types.js';

export interface PredictOptions {
  limit?: number;
  now?: Date;
}

export interface SurfacerDeps {
  records: RecordStore;
  index: SemanticIndex;
  graph: GraphLayer;
  learnings?: LearningLog;
  entityExtractor?: EntityExtractor;
  config?: Partial<SurfacingConfig>;
  logger?: Logger;
}

export const DEFAULT_SURFACING: SurfacingConfig = {
  entityConfidence: 0.85,
  semanticConfidence: 0.65,
  temporalConfidence: 0.4,
  defaultLimit: 5,
};

interface Candidate {
  record: MemoryRecord;
  matchedEntities: string[];
  similarity: number | null;
  temporal: boolean;
}

/**
 * Predicts which records matter for a piece of context, without an explicit
 * query. Each record is scored by the strongest rule it satisfies.
 */
export class Surfacer {
  private readonly records: RecordStore;
  private readonly index: SemanticIndex;
  private readonly graph: GraphLayer;
  private readonly learnings: LearningLog | undefined;
  private readonly entityExtractor: EntityExtractor;
  private readonly config: SurfacingConfig;
  private readonly logger: Logger;

  constructor(deps: SurfacerDeps) {
    this.records = deps.records;
    this.index = deps.index;
    this.graph = deps.graph;
    this.learnings = deps.learnings;
    this.entityExtractor = deps.entityExtractor ?? new PatternEntityExtractor();
    this.config = { ...DEFAULT_SURFACING, ...deps.config };
    this.logger = (deps.logger ?? silentLogger).child('surface');
  }

  async predict(context: string, options: PredictOptions = {}): Promise<SurfacedResult[]> {
    if (context.trim().length === 0) return [];

    const limit = options.limit ?? this.config.defaultLimit;
    const now = options.now ?? this.records.store.now();

    const entities = this.entityExtractor.extract(context);
    const temporal = extractTemporalRange(context, now);
    const candidates = new Map<string, Candidate>();
    const candidateFor = (record: MemoryRecord): Candidate => {
      let candidate = candidates.get(record.id);
      if (!candidate) {
        candidate = { record, matchedEntities: [], similarity: null, temporal: false };
        candidates.set(record.id, candidate);
      }
      return candidate;
    };

    const all = entities.length > 0 || temporal ? this.records.list() : [];

    if (entities.length > 0) {
      for (const record of all) {
        const matched = matchEntities(record, entities);
        if (matched.length > 0) candidateFor(record).matchedEntities = matched;
      }
    }

    for (const hit of await this.semanticHits(context, now)) {
      candidateFor(hit.record).similarity = hit.similarity;
    }

    if (temporal) {
      for (const record of all) {
        if (withinRange(record.createdAt, temporal) || withinRange(record.updatedAt, temporal)) {
          candidateFor(record).temporal = true;
        }
      }
    }

    const scored = [...candidates.values()]
      .map((candidate) => this.score(candidate, temporal))
      .filter((result) => result.confidence > 0)
      .sort(compareSurfaced)
      .slice(0, limit);

    const results: SurfacedResult[] = [];
    for (const result of scored) {
      const conflicts = await this.graph.findConflicts(result.record.id);
      const record = this.records.get(result.record.id) ?? result.record;
      results.push({ ...result, record, conflicts: conflicts.map((c) => c.otherId) });
    }

    this.logger.debug('surfaced', {
      entities: entities.join(','),
      temporal: temporal?.label,
      candidates: candidates.size,
      returned: results.length,
    });
    return results;
  }

  private async semanticHits(context: string, now: Date): Promise<Array<{ record: MemoryRecord; similarity: number }>> {
    let queryEmbedding: Float32Array;
    try {
      queryEmbedding = await this.records.embedText(context);
    } catch (error) {
      if (error instanceof ProviderUnavailableError) {
        this.logger.warn('semantic rule skipped, provider unavailable', { error: error.message });
        return [];
      }
      throw error;
    }
    return this.index.scoreCandidates(queryEmbedding, { now });
  }

  private score(candidate: Candidate, temporal: TemporalRange | null): SurfacedResult {
    const { entityConfidence, semanticConfidence, temporalConfidence } = this.config;
    const reasons: SurfacingRule[] = [];
    let confidence = 0;

    if (candidate.matchedEntities.length > 0) {
      reasons.push('entity');
      confidence = Math.max(confidence, entityConfidence);
    }

    if (candidate.similarity !== null) {
      reasons.push('semantic');
      const floor = this.index.floor;
      const scale = floor >= 1 ? 1 : (candidate.similarity - floor) / (1 - floor);
      confidence = Math.max(confidence, semanticConfidence * clamp01(scale));
    }

    if (candidate.temporal) {
      reasons.push('temporal');
      confidence = Math.max(confidence, temporalConfidence);
    }

    if (this.learnings) {
      const bias = this.learnings.bias(candidate.record.id);
      if (bias.hasLearnings) confidence = clamp01(confidence + bias.adjustment);
    }

    return {
      record: candidate.record,
      confidence: Math.round(confidence * 1000) / 1000,
      reasons,
      matchedEntities: candidate.matchedEntities,
      similarity: candidate.similarity,
      conflicts: [],
      temporal: candidate.temporal ? temporal : null,
    };
  }
}

function matchEntities(record: MemoryRecord, entities: string[]): string[] {
  const tagged = Array.isArray(record.metadata.entities)
    ? record.metadata.entities.filter((e): e is string => typeof e === 'string').map((e) => e.toLowerCase())
    : [];
  return entities.filter((entity) => mentions(record.content, entity) || tagged.includes(entity.toLowerCase()));
}

function compareSurfaced(a: SurfacedResult, b: SurfacedResult): number {
  if (b.confidence !== a.confidence) return b.confidence - a.confidence;
  const byUpdated = b.record.updatedAt.getTime() - a.record.updatedAt.getTime();
  if (byUpdated !== 0) return byUpdated;
  return a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0;
}
