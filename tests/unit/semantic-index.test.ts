import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryStore } from '../../src/memory/store.js';
import { RecordStore } from '../../src/memory/record-store.js';
import { SemanticIndex, recencyMultiplier } from '../../src/memory/semantic-index.js';
import { ConceptEmbedder } from '../helpers/concept-embedder.js';
import { TestClock, cleanDb, must, tmpDb, DAY } from '../helpers/db.js';

describe('SemanticIndex', () => {
  let dbPath: string;
  let store: MemoryStore;
  let embedder: ConceptEmbedder;
  let records: RecordStore;
  let index: SemanticIndex;
  let clock: TestClock;

  beforeEach(() => {
    dbPath = tmpDb();
    clock = new TestClock();
    store = new MemoryStore(dbPath, { clock: clock.now });
    embedder = new ConceptEmbedder();
    records = new RecordStore(store, embedder, { retry: { attempts: 1 } });
    index = new SemanticIndex(records);
  });

  afterEach(() => {
    store.close();
    cleanDb(dbPath);
  });

  it('finds "Bill prefers dark mode" without keyword overlap', async () => {
    const bill = await records.put({ content: 'Bill prefers dark mode', type: 'preference', salience: 0.7 });
    await records.put({ content: 'The cafeteria serves soup on Fridays' });

    const hits = await index.search('how does Bill like his UI', { limit: 3 });

    expect(hits.map((h) => h.record.id)).toEqual([bill]);
    // (1,1,1)/√3 · (1,1,2)/√6
    expect(hits[0].similarity).toBeCloseTo(4 / Math.sqrt(18), 5);
    expect(hits[0].score).toBeCloseTo(4 / Math.sqrt(18), 5);
  });

  it('never returns a hit below the floor', async () => {
    await records.put({ content: 'Bill likes soup' });
    await records.put({ content: 'Bill' });

    const defaults = await index.search('Bill', { limit: 10 });
    expect(defaults.map((h) => h.record.content)).toEqual(['Bill', 'Bill likes soup']);
    expect(defaults[1].similarity).toBeCloseTo(1 / Math.sqrt(3), 5);

    const strict = await index.search('Bill', { limit: 10, floor: 0.6 });
    expect(strict.map((h) => h.record.content)).toEqual(['Bill']);
    for (const hit of strict) expect(hit.similarity).toBeGreaterThanOrEqual(0.6);
  });

  it('applies tier, type and salience filters', async () => {
    await records.put({ content: 'postgres database', tier: 'archive', type: 'fact', salience: 0.4 });
    await records.put({ content: 'sqlite database', tier: 'active', type: 'decision', salience: 0.9 });

    expect((await index.search('database', { tier: 'active' })).map((h) => h.record.content)).toEqual(['sqlite database']);
    expect((await index.search('database', { type: 'fact' })).map((h) => h.record.content)).toEqual(['postgres database']);
    expect((await index.search('database', { minSalience: 0.5 })).map((h) => h.record.content)).toEqual(['sqlite database']);
  });

  it('breaks similarity ties by most recent update', async () => {
    const older = await records.put({ content: 'deploy' });
    clock.advance(DAY);
    const newer = await records.put({ content: 'release' });

    const hits = await index.search('deploy release', { touch: false });
    expect(hits.map((h) => h.record.id)).toEqual([newer, older]);
  });

  it('weights recency into the score when configured', async () => {
    const weighted = new SemanticIndex(records, { recencyWeight: 0.5 });
    const old = await records.put({ content: 'sqlite' });
    clock.advance(DAY);
    await records.put({ content: 'postgres' });

    const hits = await weighted.search('database', { touch: false });
    expect(hits[0].record.content).toBe('postgres');
    expect(hits[0].score).toBeCloseTo(1, 5);
    expect(hits[1].record.id).toBe(old);
    expect(hits[1].score).toBeCloseTo(0.75, 5);
  });

  it('touches results unless asked not to', async () => {
    const id = await records.put({ content: 'sqlite' });

    await index.search('database', { touch: false });
    expect(must(records.peek(id)).accessCount).toBe(0);

    const hits = await index.search('database');
    expect(hits[0].record.accessCount).toBe(1);
    expect(must(records.peek(id)).accessCount).toBe(1);
  });

  it('re-embeds records stored during an outage', async () => {
    embedder.down = true;
    const id = await records.put({ content: 'release on friday' });
    embedder.down = false;

    const hits = await index.search('deploy', { touch: false });
    expect(hits.map((h) => h.record.id)).toEqual([id]);
    expect(must(records.peek(id)).embedding).not.toBeNull();
  });

  it('returns nothing for an empty query or zero limit without embedding', async () => {
    await records.put({ content: 'sqlite' });
    const calls = embedder.calls;

    expect(await index.search('   ')).toEqual([]);
    expect(await index.search('database', { limit: 0 })).toEqual([]);
    expect(embedder.calls).toBe(calls);
  });

  it('propagates a provider outage on the query', async () => {
    embedder.down = true;
    await expect(index.search('database')).rejects.toThrow('concept: offline');
  });
});

describe('recencyMultiplier', () => {
  const now = new Date('2024-06-15T12:00:00.000Z');

  it('is 1 when the weight is 0', () => {
    expect(recencyMultiplier(new Date('2020-01-01T00:00:00.000Z'), now, 0)).toBe(1);
  });

  it('halves the weighted share after one day', () => {
    expect(recencyMultiplier(new Date(now.getTime() - DAY), now, 0.5)).toBeCloseTo(0.75, 10);
  });

  it('treats a future timestamp as fresh', () => {
    expect(recencyMultiplier(new Date(now.getTime() + DAY), now, 0.5)).toBe(1);
  });
});
