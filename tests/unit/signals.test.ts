import { describe, it, expect } from 'vitest';
import {
  PatternEntityExtractor,
  detectExpiry,
  extractTemporalRange,
  mentions,
  withinRange,
} from '../../src/memory/signals.js';
import { must } from '../helpers/db.js';

const NOW = new Date('2024-06-15T12:00:00.000Z');

describe('PatternEntityExtractor', () => {
  const extractor = new PatternEntityExtractor();

  it('finds people and numbered projects', () => {
    expect(extractor.extract('Yesterday Stevie and I worked on Phase 6')).toEqual(['Phase 6', 'Stevie']);
  });

  it('finds people by what they do', () => {
    expect(extractor.extract('Sarah prefers tabs')).toEqual(['Sarah']);
  });

  it('finds handles and topic tags', () => {
    expect(extractor.extract('Ping @dana about #billing')).toEqual(['billing', 'dana']);
  });

  it('finds tasks', () => {
    expect(extractor.extract('Note: we need to fix the login bug.')).toEqual(['fix the login bug']);
  });

  it('skips capitalised time words', () => {
    expect(extractor.extract('Yesterday was long')).toEqual([]);
  });

  it('dedupes case-insensitively', () => {
    expect(extractor.extract('Ping @dana. Dana said hi')).toEqual(['Dana']);
  });
});

describe('mentions', () => {
  it('matches whole words ignoring case', () => {
    expect(mentions('Talked with Stevie today', 'stevie')).toBe(true);
    expect(mentions('The Stevies band', 'Stevie')).toBe(false);
  });

  it('does not match inside a tag or handle', () => {
    expect(mentions('see #stevie', 'stevie')).toBe(false);
    expect(mentions('ask @stevie', 'stevie')).toBe(false);
  });

  it('escapes regex characters', () => {
    expect(mentions('C++ rocks', 'C++')).toBe(true);
    expect(mentions('anything', '')).toBe(false);
  });
});

describe('extractTemporalRange', () => {
  it('maps yesterday to the whole previous day', () => {
    const range = must(extractTemporalRange('Yesterday Stevie and I worked on Phase 6', NOW));
    expect(range.label).toBe('yesterday');
    expect(range.start.toISOString()).toBe('2024-06-14T00:00:00.000Z');
    expect(range.end.toISOString()).toBe('2024-06-14T23:59:59.999Z');
  });

  it('maps "N days ago" to that day', () => {
    const range = must(extractTemporalRange('we spoke 3 days ago', NOW));
    expect(range.label).toBe('3 days ago');
    expect(range.start.toISOString()).toBe('2024-06-12T00:00:00.000Z');
    expect(range.end.toISOString()).toBe('2024-06-12T23:59:59.999Z');
  });

  it('maps short relative phrases to windows ending now', () => {
    const hour = must(extractTemporalRange('an hour ago', NOW));
    expect([hour.start.toISOString(), hour.end.toISOString()]).toEqual([
      '2024-06-15T11:00:00.000Z',
      '2024-06-15T12:00:00.000Z',
    ]);
    expect(must(extractTemporalRange('what did we do recently', NOW)).start.toISOString()).toBe(
      '2024-06-12T12:00:00.000Z'
    );
    expect(must(extractTemporalRange('this week', NOW)).start.toISOString()).toBe('2024-06-09T00:00:00.000Z');
    expect(must(extractTemporalRange('last month', NOW)).start.toISOString()).toBe('2024-05-16T12:00:00.000Z');
  });

  it('returns null without a time phrase', () => {
    expect(extractTemporalRange('Stevie likes soup', NOW)).toBeNull();
  });
});

describe('withinRange', () => {
  it('includes both ends', () => {
    const range = { start: new Date('2024-06-14T00:00:00.000Z'), end: new Date('2024-06-14T23:59:59.999Z'), label: 'yesterday' };
    expect(withinRange(range.start, range)).toBe(true);
    expect(withinRange(range.end, range)).toBe(true);
    expect(withinRange(NOW, range)).toBe(false);
  });
});

describe('detectExpiry', () => {
  it('reads relative deadlines', () => {
    expect(detectExpiry('Call the dentist tomorrow', NOW)?.toISOString()).toBe('2024-06-17T12:00:00.000Z');
    expect(detectExpiry('Standup in 30 minutes', NOW)?.toISOString()).toBe('2024-06-15T12:30:00.000Z');
    expect(detectExpiry('Meeting at 3 with the team', NOW)?.toISOString()).toBe('2024-06-16T12:00:00.000Z');
  });

  it('returns null for lasting facts', () => {
    expect(detectExpiry('We chose sqlite', NOW)).toBeNull();
  });
});
