import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryStore, contentHash, parseMetadata } from '../../src/memory/store.js';
import { NotFoundError } from '../../src/core/errors.js';
import { TestClock, cleanDb, must, tmpDb, HOUR } from '../helpers/db.js';

function vector(dimensions: number, axis: number): Float32Array {
  const v = new Float32Array(dimensions);
  v[axis] = 1;
  return v;
}

describe('MemoryStore', () => {
  let store: MemoryStore;
  let dbPath: string;
  let clock: TestClock;

  beforeEach(() => {
    dbPath = tmpDb();
    clock = new TestClock();
    store = new MemoryStore(dbPath, { dimensions: 8, clock: clock.now });
  });

  afterEach(() => {
    store.close();
    cleanDb(dbPath);
  });

  describe('records', () => {
    it('inserts and reads a record with store timestamps', () => {
      const id = store.insertRecord({
        content: 'Use tabs',
        tier: 'archive',
        type: 'fact',
        salience: 0.55,
        metadata: { source: 'chat' },
      });

      const record = must(store.getRecord(id));
      expect(record.content).toBe('Use tabs');
      expect(record.tier).toBe('archive');
      expect(record.type).toBe('fact');
      expect(record.salience).toBe(0.55);
      expect(record.metadata).toEqual({ source: 'chat' });
      expect(record.createdAt.toISOString()).toBe('2024-06-15T12:00:00.000Z');
      expect(record.updatedAt.toISOString()).toBe('2024-06-15T12:00:00.000Z');
      expect(record.accessedAt).toBeNull();
      expect(record.accessCount).toBe(0);
      expect(record.embedding).toBeNull();
    });

    it('keeps explicit ids and timestamps', () => {
      store.insertRecord({
        id: 'rec-1',
        content: 'Imported',
        tier: 'active',
        type: 'task',
        salience: 0.6,
        metadata: {},
        createdAt: new Date('2024-01-01T00:00:00.000Z'),
        updatedAt: new Date('2024-02-01T00:00:00.000Z'),
        accessedAt: new Date('2024-03-01T00:00:00.000Z'),
        accessCount: 4,
      });

      const record = must(store.getRecord('rec-1'));
      expect(record.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
      expect(record.updatedAt.toISOString()).toBe('2024-02-01T00:00:00.000Z');
      expect(record.accessedAt?.toISOString()).toBe('2024-03-01T00:00:00.000Z');
      expect(record.accessCount).toBe(4);
    });

    it('returns null for a missing record', () => {
      expect(store.getRecord('nope')).toBeNull();
      expect(store.hasRecord('nope')).toBe(false);
    });

    it('touch counts an access without changing updatedAt', () => {
      const id = store.insertRecord({ content: 'x', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      clock.advance(HOUR);

      expect(store.touch(id)).toBe(true);
      const record = must(store.getRecord(id));
      expect(record.accessCount).toBe(1);
      expect(record.accessedAt?.toISOString()).toBe('2024-06-15T13:00:00.000Z');
      expect(record.updatedAt.toISOString()).toBe('2024-06-15T12:00:00.000Z');
      expect(store.touch('missing')).toBe(false);
    });

    it('updateRecord bumps updatedAt unless told not to', () => {
      const id = store.insertRecord({ content: 'x', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      clock.advance(HOUR);

      const bumped = store.updateRecord(id, { salience: 0.9 });
      expect(bumped.salience).toBe(0.9);
      expect(bumped.updatedAt.toISOString()).toBe('2024-06-15T13:00:00.000Z');

      clock.advance(HOUR);
      const quiet = store.updateRecord(id, { metadata: { k: 1 }, touchUpdatedAt: false });
      expect(quiet.metadata).toEqual({ k: 1 });
      expect(quiet.updatedAt.toISOString()).toBe('2024-06-15T13:00:00.000Z');
    });

    it('updateRecord throws NotFoundError for an unknown id', () => {
      expect(() => store.updateRecord('missing', { salience: 0.1 })).toThrow(NotFoundError);
    });

    it('lists by tier, type and salience, newest first', () => {
      const a = store.insertRecord({ content: 'a', tier: 'archive', type: 'fact', salience: 0.2, metadata: {} });
      clock.advance(1000);
      const b = store.insertRecord({ content: 'b', tier: 'active', type: 'task', salience: 0.7, metadata: {} });
      clock.advance(1000);
      const c = store.insertRecord({ content: 'c', tier: 'archive', type: 'decision', salience: 0.8, metadata: {} });

      expect(store.listRecords().map((r) => r.id)).toEqual([c, b, a]);
      expect(store.listRecords({ tier: 'archive' }).map((r) => r.id)).toEqual([c, a]);
      expect(store.listRecords({ type: ['task', 'fact'] }).map((r) => r.id)).toEqual([b, a]);
      expect(store.listRecords({ minSalience: 0.7 }).map((r) => r.id)).toEqual([c, b]);
      expect(store.listRecords({ limit: 1, offset: 1 }).map((r) => r.id)).toEqual([b]);
      expect(store.countByTier()).toEqual({ identity: 0, active: 1, archive: 2 });
    });

    it('getRecords keeps the requested order and skips unknown ids', () => {
      const a = store.insertRecord({ content: 'a', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      const b = store.insertRecord({ content: 'b', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      expect(store.getRecords([b, 'ghost', a]).map((r) => r.content)).toEqual(['b', 'a']);
    });
  });

  describe('embeddings', () => {
    it('stores a vector tagged with the content hash', () => {
      const id = store.insertRecord({ content: 'hello', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      store.setEmbedding(id, vector(8, 3), contentHash('hello'));

      const record = must(store.getRecord(id));
      expect(Array.from(must(record.embedding))).toEqual([0, 0, 0, 1, 0, 0, 0, 0]);
      expect(store.getEmbedding(id)?.contentHash).toBe(contentHash('hello'));
    });

    it('treats a vector computed from older content as missing', () => {
      const id = store.insertRecord({ content: 'old', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      store.setEmbedding(id, vector(8, 0), contentHash('old'));
      store.updateRecord(id, { content: 'new' });

      expect(must(store.getRecord(id)).embedding).toBeNull();
    });

    it('rejects a vector of the wrong dimension', () => {
      const id = store.insertRecord({ content: 'x', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      expect(() => store.setEmbedding(id, new Float32Array(4), contentHash('x'))).toThrow(
        'Embedding dimension mismatch: expected 8, got 4'
      );
    });

    it('hands out copies, not views of the row', () => {
      const id = store.insertRecord({ content: 'x', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      store.setEmbedding(id, vector(8, 1), contentHash('x'));

      const first = must(must(store.getRecord(id)).embedding);
      first[1] = 42;
      expect(must(store.getRecord(id)).embedding?.[1]).toBe(1);
    });

    it('drops the vector with the record', () => {
      const id = store.insertRecord({ content: 'x', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      store.setEmbedding(id, vector(8, 1), contentHash('x'));
      expect(store.deleteRecord(id)).toBe(true);
      expect(store.getEmbedding(id)).toBeNull();
      expect(store.deleteRecord(id)).toBe(false);
    });
  });

  describe('identity and active context', () => {
    it('overwrites on set and deletes by key', () => {
      store.setIdentity('name', 'Ada');
      store.setIdentity('name', 'Ada L.');
      store.setActive('focus', 'release prep');

      expect(store.getIdentity().map((e) => [e.key, e.value])).toEqual([['name', 'Ada L.']]);
      expect(store.getActive().map((e) => e.value)).toEqual(['release prep']);
      expect(store.deleteActive('focus')).toBe(true);
      expect(store.deleteActive('focus')).toBe(false);
      expect(store.getActive()).toEqual([]);
    });
  });

  describe('edges', () => {
    let a: string;
    let b: string;

    beforeEach(() => {
      a = store.insertRecord({ content: 'a', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      b = store.insertRecord({ content: 'b', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
    });

    it('adds each triple once', () => {
      expect(store.addEdge(a, b, 'extends')).toBe(true);
      expect(store.addEdge(a, b, 'extends')).toBe(false);
      expect(store.addEdge(a, b, 'derives')).toBe(true);
      expect(store.edgesFrom(a).map((e) => e.kind).sort()).toEqual(['derives', 'extends']);
      expect(store.edgesTo(b, 'extends').map((e) => e.sourceId)).toEqual([a]);
    });

    it('rejects self edges', () => {
      expect(() => store.addEdge(a, a, 'updates')).toThrow();
    });

    it('cascades edges when a record is deleted', () => {
      store.addEdge(a, b, 'updates');
      store.deleteRecord(b);
      expect(store.allEdges()).toEqual([]);
    });

    it('repoints edges onto a replacement record', () => {
      const c = store.insertRecord({ content: 'c', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      const d = store.insertRecord({ content: 'd', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });
      store.addEdge(a, c, 'extends');
      store.addEdge(d, b, 'derives');
      store.addEdge(a, b, 'updates');
      const m = store.insertRecord({ content: 'm', tier: 'archive', type: 'fact', salience: 0.5, metadata: {} });

      expect(store.repointEdges([a, b], m)).toBe(2);
      const edges = store.allEdges().map((e) => `${e.sourceId}>${e.targetId}:${e.kind}`).sort();
      expect(edges).toEqual([`${d}>${m}:derives`, `${m}>${c}:extends`].sort());
    });
  });

  describe('learnings', () => {
    it('adds, searches and marks learnings applied', () => {
      const id = store.addLearning({ kind: 'insight', trigger: 'deploys on Friday', content: 'Friday deploys break' });
      store.addLearning({ kind: 'recall_miss', trigger: 'database choice', content: 'missed' });

      expect(store.searchLearnings(['friday'], { limit: 5 }).map((l) => l.id)).toEqual([id]);
      expect(store.searchLearnings([], { limit: 5 })).toEqual([]);

      clock.advance(HOUR);
      expect(store.markLearningApplied(id)).toBe(true);
      const entry = must(store.getLearning(id));
      expect(entry.timesApplied).toBe(1);
      expect(entry.lastAppliedAt?.toISOString()).toBe('2024-06-15T13:00:00.000Z');
      expect(store.markLearningApplied('missing')).toBe(false);
    });
  });

  describe('clear and stats', () => {
    it('reports counts and clears everything', () => {
      const id = store.insertRecord({ content: 'x', tier: 'identity', type: 'preference', salience: 0.6, metadata: {} });
      store.setEmbedding(id, vector(8, 0), contentHash('x'));
      store.insertRecord({ content: 'y', tier: 'archive', type: 'fact', salience: 0.4, metadata: {} });
      store.setIdentity('name', 'Ada');
      store.addLearning({ kind: 'insight', trigger: 't', content: 'c' });

      const stats = store.getStats();
      expect(stats.totalRecords).toBe(2);
      expect(stats.byTier).toEqual({ identity: 1, active: 0, archive: 1 });
      expect(stats.byType).toEqual({ preference: 1, fact: 1 });
      expect(stats.embeddedRecords).toBe(1);
      expect(stats.identityKeys).toBe(1);
      expect(stats.learnings).toBe(1);
      expect(stats.averageSalience).toBeCloseTo(0.5);

      store.clear();
      const empty = store.getStats();
      expect(empty.totalRecords).toBe(0);
      expect(empty.identityKeys).toBe(0);
      expect(empty.learnings).toBe(0);
      expect(empty.oldestRecord).toBeUndefined();
    });
  });
});

describe('parseMetadata', () => {
  it('drops malformed JSON and non-object payloads', () => {
    expect(parseMetadata('not json')).toEqual({});
    expect(parseMetadata('[1,2]')).toEqual({});
    expect(parseMetadata(null)).toEqual({});
    expect(parseMetadata('{"a":[1,"b",{"c":null}]}')).toEqual({ a: [1, 'b', { c: null }] });
  });
});
