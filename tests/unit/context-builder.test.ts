import { describe, it, expect } from 'vitest';
import { ContextBuilder, estimateTokens } from '../../src/core/context-builder.js';
import type { KeyValueEntry, LearningEntry, MemoryRecord, SurfacedResult } from '../../src/memory/types.js';

const AT = new Date('2024-06-15T12:00:00.000Z');

function record(id: string, fields: Partial<MemoryRecord>): MemoryRecord {
  return {
    id,
    content: id,
    tier: 'archive',
    type: 'fact',
    salience: 0.5,
    embedding: null,
    createdAt: AT,
    updatedAt: AT,
    accessedAt: null,
    accessCount: 0,
    metadata: {},
    ...fields,
  };
}

const identity: KeyValueEntry[] = [{ key: 'name', value: 'Bill', updatedAt: AT }];
const active: KeyValueEntry[] = [{ key: 'focus', value: 'Phase 6', updatedAt: AT }];

const surfaced: SurfacedResult = {
  record: record('s1', { content: 'Stevie prefers tabs' }),
  confidence: 0.85,
  reasons: ['entity', 'semantic'],
  matchedEntities: ['Stevie'],
  similarity: 0.41,
  conflicts: ['s2'],
  temporal: null,
};

const learning: LearningEntry = {
  id: 'l1',
  kind: 'recall_hit',
  trigger: 'database',
  content: "Query 'database' found: We use sqlite",
  recordId: null,
  timesApplied: 0,
  createdAt: AT,
  lastAppliedAt: null,
  metadata: {},
};

describe('ContextBuilder', () => {
  it('renders every section in order', () => {
    const built = new ContextBuilder().build({
      identity,
      identityRecords: [record('i1', { content: 'Bill prefers dark mode', type: 'preference' })],
      active,
      surfaced: [surfaced],
      learnings: [learning],
    });

    expect(built.text).toBe(
      [
        '# Identity',
        '- name: Bill',
        '- [preference] Bill prefers dark mode',
        '',
        '# Active Context',
        '## focus',
        'Phase 6',
        '',
        '# Relevant Context',
        '- [fact] Stevie prefers tabs (entity+semantic, 85%) [may conflict]',
        '',
        '# Learnings',
        "- [recall_hit] Query 'database' found: We use sqlite",
      ].join('\n')
    );
    expect(built.included).toEqual({ identity: 2, active: 1, surfaced: 1, learnings: 1 });
    expect(built.tokenEstimate).toBe(estimateTokens(built.text));
  });

  it('orders tier records by salience', () => {
    const built = new ContextBuilder().build({
      identity: [],
      active: [],
      activeRecords: [
        record('low', { content: 'low', salience: 0.2 }),
        record('high', { content: 'high', salience: 0.9 }),
      ],
    });

    expect(built.text).toBe('# Active Context\n- [fact] high\n- [fact] low');
  });

  it('trims lines to the section budget', () => {
    const built = new ContextBuilder({ identityTokens: 4 }).build({
      identity,
      identityRecords: [record('i1', { content: 'Bill prefers dark mode', type: 'preference' })],
      active: [],
    });

    expect(built.text).toBe('# Identity\n- name: Bill');
    expect(built.included.identity).toBe(1);
  });

  it('drops trailing sections past the total budget', () => {
    // "# Identity\n- name: Bill" is 6 tokens, the active block 9
    const built = new ContextBuilder({ maxTokens: 10 }).build({
      identity,
      active,
      learnings: [learning],
    });

    expect(built.text).toBe('# Identity\n- name: Bill');
    expect(built.included).toEqual({ identity: 1, active: 0, surfaced: 0, learnings: 0 });
    expect(built.tokenEstimate).toBe(6);
  });

  it('returns empty text for empty input', () => {
    expect(new ContextBuilder().build({ identity: [], active: [] })).toEqual({
      text: '',
      tokenEstimate: 0,
      included: { identity: 0, active: 0, surfaced: 0, learnings: 0 },
    });
  });

  it('applies updated configuration', () => {
    const builder = new ContextBuilder();
    builder.setConfig({ maxTokens: 1 });
    expect(builder.build({ identity, active }).text).toBe('');
  });
});

describe('estimateTokens', () => {
  it('rounds a quarter of the length up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});
