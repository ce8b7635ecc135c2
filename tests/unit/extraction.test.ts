import { describe, it, expect } from 'vitest';
import { PatternExtractor, classifyTier, estimateSalience, splitIntoChunks } from '../../src/memory/extraction.js';

const TRANSCRIPT = [
  'We decided to use sqlite. I prefer dark mode in every editor! Short.',
  'The key insight is caching.',
  'Our goal is to ship by June',
].join('\n');

describe('PatternExtractor', () => {
  it('tags decisions, preferences, insights and goals', () => {
    const candidates = new PatternExtractor().extract(TRANSCRIPT);

    expect(candidates).toEqual([
      { content: 'We decided to use sqlite', type: 'decision', confidence: 0.7, salience: 0.8 },
      { content: 'I prefer dark mode in every editor', type: 'preference', confidence: 0.6, salience: 0.7 },
      { content: 'The key insight is caching', type: 'insight', confidence: 0.6, salience: 0.75 },
      { content: 'Our goal is to ship by June', type: 'goal', confidence: 0.7, salience: 0.85 },
    ]);
  });

  it('drops candidates under the confidence floor', () => {
    const candidates = new PatternExtractor({ minConfidence: 0.65 }).extract(TRANSCRIPT);
    expect(candidates.map((c) => c.type)).toEqual(['decision', 'goal']);
  });

  it('dedupes chunks that open the same way', () => {
    const candidates = new PatternExtractor().extract('We decided to use sqlite. we decided to use SQLITE');
    expect(candidates).toHaveLength(1);
  });

  it('ignores plain statements', () => {
    expect(new PatternExtractor().extract('The sky was grey over the harbour all afternoon.')).toEqual([]);
  });
});

describe('splitIntoChunks', () => {
  it('splits on sentence ends, newlines and dashes', () => {
    expect(splitIntoChunks('one - two — three\nfour. five!')).toEqual(['one', 'two', 'three', 'four', 'five']);
  });
});

describe('classifyTier', () => {
  it('routes self-description to identity', () => {
    expect(classifyTier('My name is Ada and I am a pilot')).toBe('identity');
  });

  it('routes current work to active', () => {
    expect(classifyTier('Currently working on the release')).toBe('active');
  });

  it('routes everything else to archive', () => {
    expect(classifyTier('Water boils at 100 degrees')).toBe('archive');
  });

  it('leans on the record type', () => {
    expect(classifyTier('Fix the flaky test', 'task')).toBe('active');
    expect(classifyTier('Tabs over spaces', 'preference')).toBe('identity');
  });
});

describe('estimateSalience', () => {
  it('starts from the midpoint of the type range', () => {
    expect(estimateSalience('Water boils', 'fact')).toBe(0.55);
    expect(estimateSalience('Water boils')).toBe(0.55);
  });

  it('raises salience for emphatic wording, capped at the type maximum', () => {
    expect(estimateSalience('This is a critical decision', 'decision')).toBe(0.9);
    expect(estimateSalience('Important lesson learned', 'fact')).toBe(0.7);
    expect(estimateSalience('Important critical rule, never skip it', 'daily')).toBe(0.5);
  });
});
