import { subDays } from 'date-fns';
import { consistencyWarning, errorMessage } from '../core/errors.js';
import type { ConsistencyWarning } from '../core/errors.js';
import { silentLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { ConsolidationConfig } from '../config/index.js';
import { cosineSimilarity } from './embeddings.js';
import type { RecordStore } from './record-store.js';
import { contentHash } from './store.js';
import type { RecordInsert } from './store.js';
import type { ConsolidationReport, MemoryRecord, Metadata, MetadataValue } from './types.js';

export interface ConsolidateOptions {
  now?: Date;
}

export interface ConsolidationPreview {
  expired: number;
  clusters: number;
  mergeable: number;
  prunable: number;
  promotable: number;
  activeOverflow: number;
}

export const DEFAULT_CONSOLIDATION: ConsolidationConfig = {
  mergeThreshold: 0.85,
  pruneSalienceFloor: 0.3,
  retentionDays: 30,
  promoteAccessThreshold: 3,
  promoteWindowDays: 7,
  activeSoftCap: 30,
  identitySoftCap: 20,
};

type PassCounts = Omit<ConsolidationReport, 'warnings' | 'durationMs'>;

const MAX_PASSES = 3;

interface Embedded {
  record: MemoryRecord;
  vector: Float32Array;
}

/**
 * Periodic maintenance: expire, merge near-duplicates, prune cold records,
 * promote hot ones. Each step takes the write lock on its own so readers
 * only ever see pre- or post-step state.
 */
export class Consolidator {
  private readonly config: ConsolidationConfig;
  private readonly logger: Logger;

  constructor(
    private records: RecordStore,
    config: Partial<ConsolidationConfig> = {},
    logger: Logger = silentLogger
  ) {
    this.config = { ...DEFAULT_CONSOLIDATION, ...config };
    this.logger = logger.child('consolidate');
  }

  async consolidate(options: ConsolidateOptions = {}): Promise<ConsolidationReport> {
    const started = Date.now();
    const now = options.now ?? this.records.store.now();
    const warnings: ConsistencyWarning[] = [];
    const totals: PassCounts = { merged: 0, pruned: 0, promoted: 0, demoted: 0, expired: 0 };

    // Records demoted in a pass reach the archive after it was clustered and
    // pruned, so another pass picks them up.
    for (let pass = 0; pass < MAX_PASSES; pass++) {
      const counts = await this.runPass(now, warnings);
      totals.merged += counts.merged;
      totals.pruned += counts.pruned;
      totals.promoted += counts.promoted;
      totals.demoted += counts.demoted;
      totals.expired += counts.expired;
      if (counts.demoted === 0) break;
    }

    this.checkIdentityCap();

    const report: ConsolidationReport = { ...totals, warnings, durationMs: Date.now() - started };
    this.logger.info('consolidation finished', {
      ...totals,
      warnings: warnings.length,
      durationMs: report.durationMs,
    });
    return report;
  }

  private async runPass(now: Date, warnings: ConsistencyWarning[]): Promise<PassCounts> {
    const expired = await this.expire(now);
    let merged = 0;
    for (const cluster of await this.cluster()) {
      const warning = await this.merge(cluster);
      if (warning) {
        warnings.push(warning);
        this.logger.warn(warning.message, { code: warning.code, records: warning.recordIds.join(',') });
      } else {
        merged++;
      }
    }
    const pruned = await this.prune(now);
    const { promoted, demoted } = await this.promote(now);
    return { merged, pruned, promoted, demoted, expired };
  }

  /**
   * What a consolidation run would do right now, without writing records.
   */
  async preview(options: ConsolidateOptions = {}): Promise<ConsolidationPreview> {
    const now = options.now ?? this.records.store.now();
    const clusters = await this.cluster();
    const active = this.records.list({ tier: 'active' }).length;

    return {
      expired: this.expiredRecords(now).length,
      clusters: clusters.length,
      mergeable: clusters.reduce((sum, c) => sum + c.length, 0),
      prunable: this.prunableRecords(now).length,
      promotable: this.promotionCandidates(now).length,
      activeOverflow: Math.max(0, active - this.config.activeSoftCap),
    };
  }

  // ==================== EXPIRE ====================

  private expiredRecords(now: Date): MemoryRecord[] {
    return this.records.list({ tier: 'archive' }).filter((record) => {
      const expiresAt = record.metadata.expires_at;
      if (typeof expiresAt !== 'string') return false;
      const when = Date.parse(expiresAt);
      return !Number.isNaN(when) && when <= now.getTime();
    });
  }

  // Lower salience under the prune floor so a later prune can reclaim the record.
  private async expire(now: Date): Promise<number> {
    const store = this.records.store;
    const targets = this.expiredRecords(now);
    if (targets.length === 0) return 0;

    const ceiling = Math.max(0, this.config.pruneSalienceFloor - 0.01);
    return this.records.lock.run(() =>
      store.transaction(() => {
        let count = 0;
        for (const target of targets) {
          const current = store.getRecord(target.id);
          if (!current) continue;
          const { expires_at: _expiresAt, ...metadata } = current.metadata;
          store.updateRecord(current.id, {
            salience: Math.min(current.salience, ceiling),
            metadata,
            touchUpdatedAt: false,
          });
          count++;
        }
        return count;
      })
    );
  }

  // ==================== CLUSTER ====================

  /**
   * Connected components of same-type archive records, where an edge is a
   * pair at or above the merge threshold. Only components of two or more.
   */
  private async cluster(): Promise<MemoryRecord[][]> {
    const byType = new Map<string, Embedded[]>();
    for (const record of this.records.list({ tier: 'archive' })) {
      const vector = await this.records.ensureEmbedding(record);
      if (!vector) continue;
      const group = byType.get(record.type) ?? [];
      group.push({ record: { ...record, embedding: vector }, vector });
      byType.set(record.type, group);
    }

    const clusters: MemoryRecord[][] = [];
    for (const group of byType.values()) {
      const parent = group.map((_, i) => i);
      const find = (i: number): number => {
        while (parent[i] !== i) {
          parent[i] = parent[parent[i]];
          i = parent[i];
        }
        return i;
      };

      for (let i = 0; i < group.length; i++) {
        for (let j = i + 1; j < group.length; j++) {
          if (cosineSimilarity(group[i].vector, group[j].vector) >= this.config.mergeThreshold) {
            parent[find(i)] = find(j);
          }
        }
      }

      const components = new Map<number, MemoryRecord[]>();
      group.forEach((item, i) => {
        const root = find(i);
        const component = components.get(root) ?? [];
        component.push(item.record);
        components.set(root, component);
      });

      for (const component of components.values()) {
        if (component.length >= 2) clusters.push(component);
      }
    }

    return clusters;
  }

  // ==================== MERGE ====================

  private async merge(cluster: MemoryRecord[]): Promise<ConsistencyWarning | null> {
    const store = this.records.store;
    const ids = cluster.map((r) => r.id);
    const merged = mergeRecords(cluster);

    // Content is the representative's, so its vector is reused when cached
    const representative = pickRepresentative(cluster);
    let vector = representative.embedding;
    if (!vector) {
      try {
        vector = await this.records.embedText(merged.content);
      } catch (error) {
        return consistencyWarning(
          'merge_skipped',
          `cluster not merged, embedding failed: ${errorMessage(error)}`,
          ids
        );
      }
    }
    const mergedVector = vector;

    return this.records.lock.run(() =>
      store.transaction(() => {
        for (const original of cluster) {
          const current = store.getRecord(original.id);
          if (
            !current ||
            current.updatedAt.getTime() !== original.updatedAt.getTime() ||
            current.accessCount !== original.accessCount
          ) {
            return consistencyWarning('merge_skipped', 'cluster changed during consolidation', ids);
          }
        }

        const mergedId = store.insertRecord(merged);
        store.setEmbedding(mergedId, mergedVector, contentHash(merged.content));
        store.repointEdges(ids, mergedId);
        if (store.edgesFrom(mergedId, 'updates').length > 0) {
          store.updateRecord(mergedId, {
            metadata: { ...merged.metadata, superseded: true },
            touchUpdatedAt: false,
          });
        }
        for (const id of ids) store.deleteRecord(id);

        this.logger.debug('cluster merged', { into: mergedId, size: ids.length });
        return null;
      })
    );
  }

  // ==================== PRUNE ====================

  private prunableRecords(now: Date): MemoryRecord[] {
    const cutoff = subDays(now, this.config.retentionDays).getTime();
    return this.records.list({ tier: 'archive' }).filter((record) =>
      record.salience < this.config.pruneSalienceFloor &&
      record.accessCount === 0 &&
      record.createdAt.getTime() < cutoff
    );
  }

  private async prune(now: Date): Promise<number> {
    const store = this.records.store;
    let pruned = 0;
    for (const record of this.prunableRecords(now)) {
      const removed = await this.records.lock.run(() => {
        // Re-check under the lock: an access in between saves the record
        const current = store.getRecord(record.id);
        if (!current || current.tier !== 'archive' || current.accessCount !== 0) return false;
        return store.deleteRecord(record.id);
      });
      if (removed) pruned++;
    }
    return pruned;
  }

  // ==================== PROMOTE ====================

  private promotionCandidates(now: Date): MemoryRecord[] {
    const windowStart = subDays(now, this.config.promoteWindowDays).getTime();
    return this.records.list({ tier: 'archive' })
      .filter((record) =>
        record.accessCount >= this.config.promoteAccessThreshold &&
        record.accessedAt !== null &&
        record.accessedAt.getTime() >= windowStart
      )
      .sort((a, b) =>
        b.accessCount - a.accessCount ||
        b.salience - a.salience ||
        (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
      );
  }

  private async promote(now: Date): Promise<{ promoted: number; demoted: number }> {
    const store = this.records.store;
    const cap = this.config.activeSoftCap;
    const demotedAt = now.toISOString();
    let promoted = 0;
    let demoted = 0;

    const demote = (record: MemoryRecord): void => {
      store.updateRecord(record.id, {
        tier: 'archive',
        metadata: { ...record.metadata, demoted_at: demotedAt },
        touchUpdatedAt: false,
      });
      demoted++;
    };

    // Overflow from direct writes goes first
    await this.records.lock.run(() =>
      store.transaction(() => {
        const active = lowestFirst(store.listRecords({ tier: 'active' }));
        for (let i = 0; i < active.length - cap; i++) demote(active[i]);
      })
    );

    for (const candidate of this.promotionCandidates(now)) {
      await this.records.lock.run(() =>
        store.transaction(() => {
          const current = store.getRecord(candidate.id);
          if (!current || current.tier !== 'archive') return;

          const active = lowestFirst(store.listRecords({ tier: 'active' }));
          if (active.length >= cap) {
            const weakest = active[0];
            if (!weakest || current.salience <= weakest.salience) return;
            demote(weakest);
          }
          store.updateRecord(current.id, { tier: 'active', touchUpdatedAt: false });
          promoted++;
        })
      );
    }

    return { promoted, demoted };
  }

  private checkIdentityCap(): void {
    const identity = this.records.store.countByTier().identity;
    if (identity > this.config.identitySoftCap) {
      this.logger.warn('identity tier over soft cap', { count: identity, cap: this.config.identitySoftCap });
    }
  }
}

// Lowest salience first, oldest update breaking ties.
function lowestFirst(records: MemoryRecord[]): MemoryRecord[] {
  return [...records].sort((a, b) =>
    a.salience - b.salience ||
    a.updatedAt.getTime() - b.updatedAt.getTime() ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

export function pickRepresentative(cluster: MemoryRecord[]): MemoryRecord {
  return cluster.reduce((best, record) => {
    if (record.salience !== best.salience) return record.salience > best.salience ? record : best;
    if (record.updatedAt.getTime() !== best.updatedAt.getTime()) {
      return record.updatedAt.getTime() > best.updatedAt.getTime() ? record : best;
    }
    return record.id < best.id ? record : best;
  });
}

/**
 * Collapse a cluster into one record: the representative's content and type,
 * the highest salience, summed access counts, the earliest creation and the
 * latest update and access.
 */
export function mergeRecords(cluster: MemoryRecord[]): RecordInsert {
  const representative = pickRepresentative(cluster);

  const metadata: Metadata = {};
  const entities = new Set<string>();
  const mergedFrom = new Set<string>();
  // Representative last so it wins key collisions
  for (const record of [...cluster.filter((r) => r !== representative), representative]) {
    Object.assign(metadata, record.metadata);
    for (const entity of stringList(record.metadata.entities)) entities.add(entity);
    for (const id of stringList(record.metadata.merged_from)) mergedFrom.add(id);
    mergedFrom.add(record.id);
  }
  // Recomputed from the merged record's own edges once they are re-pointed
  delete metadata.superseded;
  if (entities.size > 0) metadata.entities = [...entities].sort();
  metadata.merged_from = [...mergedFrom].sort();

  const time = (d: Date | null): number => (d ? d.getTime() : Number.NEGATIVE_INFINITY);
  const accessed = cluster.reduce<Date | null>(
    (latest, r) => (time(r.accessedAt) > time(latest) ? r.accessedAt : latest),
    null
  );

  return {
    content: representative.content,
    tier: representative.tier,
    type: representative.type,
    salience: Math.max(...cluster.map((r) => r.salience)),
    metadata,
    createdAt: new Date(Math.min(...cluster.map((r) => r.createdAt.getTime()))),
    updatedAt: new Date(Math.max(...cluster.map((r) => r.updatedAt.getTime()))),
    accessedAt: accessed,
    accessCount: cluster.reduce((sum, r) => sum + r.accessCount, 0),
  };
}

function stringList(value: MetadataValue | undefined): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
