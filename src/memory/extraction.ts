import { TYPE_SALIENCE } from './types.js';
import type { ExtractedCandidate, RecordType, Tier } from './types.js';

/**
 * Turns free text (a conversation turn, a note) into capture candidates.
 */
export interface Extractor {
  extract(text: string): ExtractedCandidate[];
}

interface CandidateRule {
  type: RecordType;
  pattern: RegExp;
  salience: number;
  confidence: number;
}

// Checked in order; the first rule that fires claims the chunk.
const CANDIDATE_RULES: CandidateRule[] = [
  {
    type: 'decision',
    pattern: /we (?:decided|agreed|chose|will|should|going to|need to)\b|let'?s\b|the plan is\b|\b(?:i|we) (?:want|need) to\b|pivot(?:ed|ing)?\b/i,
    salience: 0.8,
    confidence: 0.7,
  },
  {
    type: 'preference',
    pattern: /\b(?:i|you|we|they) (?:prefer|like|love|want|don'?t like|hate)\b|\b[a-z]+ (?:prefers|loves|hates|dislikes)\b|\b(?:better|best|favou?rite|rather)\b/i,
    salience: 0.7,
    confidence: 0.6,
  },
  {
    type: 'insight',
    pattern: /\b(?:the key|important|insight|learned|realized|realised|discovered)\b|turns out\b|the (?:problem|issue|challenge|opportunity) is\b/i,
    salience: 0.75,
    confidence: 0.6,
  },
  {
    type: 'goal',
    pattern: /\b(?:goal|objective|target|aim) is\b|we'?re (?:building|creating|making|trying to)\b|the vision is\b/i,
    salience: 0.85,
    confidence: 0.7,
  },
];

const MIN_CHUNK_LENGTH = 20;
const DEDUPE_PREFIX = 50;

export interface PatternExtractorOptions {
  minConfidence?: number;
}

/**
 * Regex-driven extractor: splits text into sentence-like chunks and tags the
 * ones that read like decisions, preferences, insights or goals.
 */
export class PatternExtractor implements Extractor {
  private readonly minConfidence: number;

  constructor(options: PatternExtractorOptions = {}) {
    this.minConfidence = options.minConfidence ?? 0.3;
  }

  extract(text: string): ExtractedCandidate[] {
    const candidates: ExtractedCandidate[] = [];
    const seen = new Set<string>();

    for (const chunk of splitIntoChunks(text)) {
      if (chunk.length < MIN_CHUNK_LENGTH) continue;

      const rule = CANDIDATE_RULES.find((r) => r.pattern.test(chunk));
      if (!rule || rule.confidence < this.minConfidence) continue;

      const key = chunk.toLowerCase().slice(0, DEDUPE_PREFIX);
      if (seen.has(key)) continue;
      seen.add(key);

      candidates.push({
        content: chunk,
        type: rule.type,
        confidence: rule.confidence,
        salience: rule.salience,
      });
    }

    return candidates;
  }
}

export function splitIntoChunks(text: string): string[] {
  return text
    .split(/[\n.!?]+/)
    .flatMap((chunk) => chunk.split(/\s*[—–]\s*|\s+-\s+/))
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.length > 0);
}

// ==================== CLASSIFICATION ====================

const IDENTITY_PATTERNS: RegExp[] = [
  /\bmy name\b/,
  /\bi am\b/,
  /\bwho i am\b/,
  /\bborn\b.*\d{4}/,
  /\bcreated\b.*\d{4}/,
  /\b(?:human|owner)[:\s]/,
  /\bidentity\b/,
  /\bpersonality\b/,
  /\bcore (?:values?|traits?|beliefs?)\b/,
  /\bi (?:prefer|believe|value|always)\b/,
  /\bmy (?:human|creator|partner|timezone|pronouns)\b/,
];

const ACTIVE_PATTERNS: RegExp[] = [
  /\bcurrent(?:ly)?\b/,
  /\bworking on\b/,
  /\bright now\b/,
  /\btoday\b/,
  /\bthis (?:week|session|sprint)\b/,
  /\bnext step\b/,
  /\btodo\b/,
  /\bin progress\b/,
  /\bactive\b.*project/,
  /\bblocked\b/,
  /\bwaiting (?:on|for)\b/,
  /\bjust (?:shipped|pushed|deployed|built|created)\b/,
  /\bnew directive\b/,
];

const HIGH_SALIENCE_KEYWORDS = [
  'decision', 'decided', 'important', 'critical', 'never', 'always',
  'lesson', 'learned', 'mistake', 'breakthrough', 'preference',
  'correction', 'directive', 'rule', 'principle',
];

/**
 * Route content to a tier from its wording and type.
 */
export function classifyTier(content: string, type?: RecordType): Tier {
  const lower = content.toLowerCase();
  let identity = IDENTITY_PATTERNS.filter((p) => p.test(lower)).length;
  let active = ACTIVE_PATTERNS.filter((p) => p.test(lower)).length;

  if (type === 'task') active += 3;
  else if (type === 'preference') identity += 1;
  else if (type === 'decision') active += 1;

  if (identity >= 2) return 'identity';
  if (active >= 2) return 'active';
  if (identity === 1 && active === 0) return 'identity';
  if (active === 1 && identity === 0) return 'active';
  return 'archive';
}

/**
 * Salience from wording: the type's midpoint, raised by emphatic keywords
 * and length, never above the type's range.
 */
export function estimateSalience(content: string, type: RecordType = 'fact'): number {
  const range = TYPE_SALIENCE[type];
  const lower = content.toLowerCase();
  let salience = (range.min + range.max) / 2;

  for (const keyword of HIGH_SALIENCE_KEYWORDS) {
    if (lower.includes(keyword)) salience += 0.05;
  }

  const wordCount = content.split(/\s+/).filter((w) => w.length > 0).length;
  if (wordCount > 30) salience += 0.05;
  if (wordCount > 60) salience += 0.05;

  return Math.round(Math.min(range.max, salience) * 1000) / 1000;
}
