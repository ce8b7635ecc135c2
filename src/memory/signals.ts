import {
  addDays,
  addHours,
  addMinutes,
  addWeeks,
  endOfDay,
  startOfDay,
  startOfWeek,
  subDays,
  subHours,
} from 'date-fns';
import type { TemporalRange } from './types.js';

/**
 * Pulls entity mentions (people, projects, topics, tasks) out of free text.
 */
export interface EntityExtractor {
  extract(text: string): string[];
}

const PERSON_PATTERNS: RegExp[] = [
  /(?:with|from|to|by)\s+([A-Z][a-z]+)(?=[\s,.]|$)/g,
  /\b([A-Z][a-z]+)\s+(?:said|says|wants|asks|asked|mentioned|prefers|likes|did|thinks)\b/g,
  /@([a-zA-Z0-9_]+)/g,
  /\b([A-Z][a-z]+)\b(?=\s+(?:is|are|was|were|and|or|will|has|had)\b)/g,
];

const PROJECT_PATTERNS: RegExp[] = [
  /\b(?:project|building|working on|worked on|developing)\s+["']?([A-Za-z][\w-]*(?:\s+\d+(?:\.\d+)?)?)/gi,
  /(?:^|\s)[~#]([a-z][a-z0-9-]*)/g,
  // "Phase 6", "Sprint 12"
  /\b([A-Z][a-z]+\s+\d+(?:\.\d+)?)\b/g,
];

const TASK_PATTERNS: RegExp[] = [
  /\b(?:need to|should|let's|can you)\s+([a-z][a-zA-Z\s]+?)(?=[?.])/gi,
  /\b(?:task|goal|objective):\s+([^.]+)/gi,
];

const QUOTED_PATTERN = /"([^"]{3,})"/g;

// Capitalised words that start sentences or mark time, not names.
const STOPWORDS = new Set([
  'a', 'an', 'and', 'but', 'i', 'if', 'it', 'its', 'my', 'our', 'so', 'that', 'the', 'then',
  'there', 'these', 'this', 'those', 'we', 'what', 'when', 'where', 'which', 'who', 'why',
  'how', 'you', 'your', 'he', 'she', 'they', 'also', 'actually', 'yes', 'no', 'ok', 'okay',
  'yesterday', 'today', 'tomorrow', 'tonight', 'earlier', 'recently', 'later', 'now',
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
  'hi', 'hello', 'hey', 'thanks', 'please', 'note', 'remember',
]);

export class PatternEntityExtractor implements EntityExtractor {
  extract(text: string): string[] {
    const entities = new Map<string, string>();
    const add = (raw: string, minLength: number): void => {
      const entity = raw.trim().replace(/\s+/g, ' ');
      const key = entity.toLowerCase();
      if (entity.length < minLength || STOPWORDS.has(key) || entities.has(key)) return;
      entities.set(key, entity);
    };

    for (const pattern of PERSON_PATTERNS) {
      for (const match of text.matchAll(pattern)) add(match[1], 2);
    }
    for (const pattern of PROJECT_PATTERNS) {
      for (const match of text.matchAll(pattern)) add(match[1], 2);
    }
    for (const pattern of TASK_PATTERNS) {
      for (const match of text.matchAll(pattern)) add(match[1], 4);
    }
    for (const match of text.matchAll(QUOTED_PATTERN)) add(match[1], 3);

    return [...entities.values()].sort();
  }
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive occurrence of `entity` in `text`.
 */
export function mentions(text: string, entity: string): boolean {
  if (entity.trim().length === 0) return false;
  return new RegExp(`(?<![\\w@#~])${escapeRegExp(entity)}(?!\\w)`, 'i').test(text);
}

interface TemporalRule {
  pattern: RegExp;
  range: (now: Date, match: RegExpMatchArray) => TemporalRange;
}

// First match wins, so narrower phrases come first.
const TEMPORAL_RULES: TemporalRule[] = [
  {
    pattern: /\b(\d+) days? ago\b/,
    range: (now, match) => {
      const days = Number(match[1]);
      const day = subDays(now, days);
      return { start: startOfDay(day), end: endOfDay(day), label: `${days} days ago` };
    },
  },
  {
    pattern: /\byesterday\b/,
    range: (now) => ({ start: startOfDay(subDays(now, 1)), end: endOfDay(subDays(now, 1)), label: 'yesterday' }),
  },
  {
    pattern: /\ban hour ago\b/,
    range: (now) => ({ start: subHours(now, 1), end: now, label: 'past hour' }),
  },
  {
    pattern: /\ba few hours\b/,
    range: (now) => ({ start: subHours(now, 3), end: now, label: 'past 3 hours' }),
  },
  {
    pattern: /\bearlier\b/,
    range: (now) => ({ start: subHours(now, 6), end: now, label: 'past 6 hours' }),
  },
  {
    pattern: /\btoday\b/,
    range: (now) => ({ start: startOfDay(now), end: now, label: 'today' }),
  },
  {
    pattern: /\brecently\b/,
    range: (now) => ({ start: subDays(now, 3), end: now, label: 'last 3 days' }),
  },
  {
    pattern: /\bthis week\b/,
    range: (now) => ({ start: startOfWeek(now), end: now, label: 'this week' }),
  },
  {
    pattern: /\blast week\b/,
    range: (now) => ({ start: subDays(now, 7), end: now, label: 'past week' }),
  },
  {
    pattern: /\blast month\b/,
    range: (now) => ({ start: subDays(now, 30), end: now, label: 'past month' }),
  },
];

/**
 * Absolute date range for the first relative time phrase in `text`.
 */
export function extractTemporalRange(text: string, now: Date): TemporalRange | null {
  const lower = text.toLowerCase();
  for (const rule of TEMPORAL_RULES) {
    const match = lower.match(rule.pattern);
    if (match) return rule.range(now, match);
  }
  return null;
}

// Both ends inclusive.
export function withinRange(date: Date, range: TemporalRange): boolean {
  const time = date.getTime();
  return time >= range.start.getTime() && time <= range.end.getTime();
}

interface ExpiryRule {
  pattern: RegExp;
  expires: (now: Date, amount: number) => Date;
}

const EXPIRY_RULES: ExpiryRule[] = [
  { pattern: /\b(?:tomorrow|tmrw)\b/, expires: (now) => addDays(now, 2) },
  { pattern: /\btonight\b/, expires: (now) => addHours(now, 12) },
  { pattern: /\btoday\b/, expires: (now) => addDays(now, 1) },
  { pattern: /\bthis week\b/, expires: (now) => addWeeks(now, 1) },
  { pattern: /\bthis month\b/, expires: (now) => addDays(now, 31) },
  { pattern: /\bnext week\b/, expires: (now) => addWeeks(now, 2) },
  { pattern: /\bnext month\b/, expires: (now) => addDays(now, 62) },
  { pattern: /\bin (\d+) minutes?\b/, expires: (now, n) => addMinutes(now, n) },
  { pattern: /\bin (\d+) hours?\b/, expires: (now, n) => addHours(now, n) },
  { pattern: /\bin (\d+) days?\b/, expires: (now, n) => addDays(now, n) },
  { pattern: /\b(?:meeting|call|appointment|interview) (?:at|@) \d/, expires: (now) => addDays(now, 1) },
];

/**
 * When content describes something short-lived ("call at 3 tomorrow"),
 * the moment it stops being relevant.
 */
export function detectExpiry(content: string, now: Date): Date | null {
  const lower = content.toLowerCase();
  for (const rule of EXPIRY_RULES) {
    const match = lower.match(rule.pattern);
    if (match) {
      const amount = match[1] === undefined ? 0 : Number(match[1]);
      return rule.expires(now, amount);
    }
  }
  return null;
}
