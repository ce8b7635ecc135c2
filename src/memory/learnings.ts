import { NotFoundError } from '../core/errors.js';
import type { MemoryStore } from './store.js';
import type { LearningEntry, LearningKind, NewLearningInput } from './types.js';

export interface LearningStats {
  total: number;
  byKind: Partial<Record<LearningKind, number>>;
  applied: number;
  applicationRate: number;
}

export interface LearningBias {
  adjustment: number;
  hasLearnings: boolean;
}

const KIND_ICONS: Record<LearningKind, string> = {
  recall_hit: '✓',
  recall_miss: '✗',
  correction: '⚠',
  insight: '★',
  error: '🔧',
};

const MAX_TERMS = 10;

/**
 * Experience log: which recalls worked, which missed, what the user
 * corrected. Feeds surfacing bias and the startup context.
 */
export class LearningLog {
  constructor(private store: MemoryStore) {}

  record(input: NewLearningInput): LearningEntry {
    const id = this.store.addLearning(input);
    const entry = this.store.getLearning(id);
    if (!entry) throw new NotFoundError('learning', id);
    return entry;
  }

  recordHit(query: string, summary: string, recordId?: string): LearningEntry {
    return this.record({
      kind: 'recall_hit',
      trigger: query,
      content: `Query '${query}' found: ${summary}`,
      recordId,
    });
  }

  recordMiss(query: string, needed: string): LearningEntry {
    return this.record({
      kind: 'recall_miss',
      trigger: query,
      content: `Query '${query}' missed. Needed: ${needed}`,
      metadata: { gap: needed },
    });
  }

  recordCorrection(wrong: string, right: string, recordId?: string): LearningEntry {
    return this.record({
      kind: 'correction',
      trigger: wrong,
      content: `WRONG: ${wrong} → RIGHT: ${right}`,
      recordId,
    });
  }

  recordInsight(observation: string, pattern: string): LearningEntry {
    return this.record({ kind: 'insight', trigger: observation, content: pattern });
  }

  recordError(failed: string, fix: string): LearningEntry {
    return this.record({ kind: 'error', trigger: failed, content: `FIX: ${fix}` });
  }

  /**
   * Learnings whose trigger or content mentions a term from `context`.
   * Terms are words longer than three characters, at most ten of them.
   */
  relevant(context: string, options: { kind?: LearningKind; limit?: number } = {}): LearningEntry[] {
    const terms = context
      .split(/\s+/)
      .map((t) => t.toLowerCase().trim())
      .filter((t) => t.length > 3)
      .slice(0, MAX_TERMS);

    return this.store.searchLearnings(terms, { kind: options.kind, limit: options.limit ?? 5 });
  }

  recent(options: { kind?: LearningKind; limit?: number } = {}): LearningEntry[] {
    return this.store.listLearnings({ kind: options.kind, limit: options.limit ?? 10 });
  }

  forRecord(recordId: string): LearningEntry[] {
    return this.store.listLearnings({ recordId });
  }

  markApplied(id: string): void {
    if (!this.store.markLearningApplied(id)) {
      throw new NotFoundError('learning', id);
    }
  }

  /**
   * Surfacing adjustment for a record: +0.05 per recall hit (up to +0.1),
   * -0.1 per correction (down to -0.2).
   */
  bias(recordId: string): LearningBias {
    const entries = this.forRecord(recordId);
    let hits = 0;
    let corrections = 0;
    for (const entry of entries) {
      if (entry.kind === 'recall_hit') hits++;
      else if (entry.kind === 'correction') corrections++;
    }

    const boost = Math.min(hits * 0.05, 0.1);
    const penalty = Math.min(corrections * 0.1, 0.2);
    return {
      adjustment: Math.round((boost - penalty) * 1000) / 1000,
      hasLearnings: entries.length > 0,
    };
  }

  stats(): LearningStats {
    const all = this.store.listLearnings();
    const byKind: Partial<Record<LearningKind, number>> = {};
    let applied = 0;
    for (const entry of all) {
      byKind[entry.kind] = (byKind[entry.kind] ?? 0) + 1;
      if (entry.timesApplied > 0) applied++;
    }
    return {
      total: all.length,
      byKind,
      applied,
      applicationRate: all.length > 0 ? applied / all.length : 0,
    };
  }

  formatContext(context: string, limit: number = 3): string {
    const entries = this.relevant(context, { limit });
    if (entries.length === 0) return '';
    return formatLearnings(entries);
  }
}

export function formatLearnings(entries: LearningEntry[]): string {
  const lines = ['# Learnings (from past experience)'];
  for (const entry of entries) {
    lines.push(`${KIND_ICONS[entry.kind]} [${entry.kind}] ${entry.content}`);
  }
  return lines.join('\n');
}
