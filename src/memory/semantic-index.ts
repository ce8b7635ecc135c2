import { differenceInMilliseconds } from 'date-fns';
import { silentLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { SearchConfig } from '../config/index.js';
import { cosineSimilarity } from './embeddings.js';
import type { RecordStore } from './record-store.js';
import { clamp01 } from './record-store.js';
import type { MemoryRecord, SearchHit, SearchOptions } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_SEARCH: SearchConfig = {
  floor: 0.15,
  recencyWeight: 0,
  defaultLimit: 5,
};

/**
 * Multiplier in (1 - weight, 1]; 1 for a record updated just now.
 */
export function recencyMultiplier(updatedAt: Date, now: Date, weight: number): number {
  if (weight <= 0) return 1;
  const ageMs = Math.max(0, differenceInMilliseconds(now, updatedAt));
  const ageDays = ageMs / DAY_MS;
  return 1 - weight + weight / (1 + ageDays);
}

// Score desc, then most recently updated, then id for a stable order.
export function compareHits(a: SearchHit, b: SearchHit): number {
  if (b.score !== a.score) return b.score - a.score;
  const byUpdated = b.record.updatedAt.getTime() - a.record.updatedAt.getTime();
  if (byUpdated !== 0) return byUpdated;
  return a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0;
}

export class SemanticIndex {
  private readonly config: SearchConfig;
  private readonly logger: Logger;

  constructor(
    private records: RecordStore,
    config: Partial<SearchConfig> = {},
    logger: Logger = silentLogger
  ) {
    this.config = { ...DEFAULT_SEARCH, ...config };
    this.logger = logger.child('search');
  }

  get floor(): number {
    return this.config.floor;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    if (query.trim().length === 0) return [];

    const limit = options.limit ?? this.config.defaultLimit;
    if (limit <= 0) return [];

    const queryEmbedding = await this.records.embedText(query);
    const hits = await this.scoreCandidates(queryEmbedding, options);
    const top = hits.slice(0, limit);

    if (options.touch === false) return top;

    // Touch results and hand back the post-access snapshot
    return top.flatMap((hit) => {
      const record = this.records.get(hit.record.id);
      return record ? [{ ...hit, record }] : [];
    });
  }

  /**
   * Every filtered candidate at or above the floor, ranked. Does not touch.
   */
  async scoreCandidates(queryEmbedding: Float32Array, options: SearchOptions = {}): Promise<SearchHit[]> {
    const floor = options.floor ?? this.config.floor;
    const now = options.now ?? this.records.store.now();

    const candidates = this.records.list({
      tier: options.tier,
      type: options.type,
      minSalience: options.minSalience,
    });

    const hits: SearchHit[] = [];
    let reembedded = 0;
    for (const record of candidates) {
      const vector = await this.vectorFor(record);
      if (!vector) continue;
      if (!record.embedding) reembedded++;

      const similarity = cosineSimilarity(queryEmbedding, vector);
      if (similarity < floor) continue;

      const score = clamp01(similarity * recencyMultiplier(record.updatedAt, now, this.config.recencyWeight));
      hits.push({ record: { ...record, embedding: vector }, similarity, score });
    }

    if (reembedded > 0) {
      this.logger.debug('lazily re-embedded candidates', { count: reembedded });
    }

    return hits.sort(compareHits);
  }

  private async vectorFor(record: MemoryRecord): Promise<Float32Array | null> {
    return record.embedding ?? this.records.ensureEmbedding(record);
  }
}
