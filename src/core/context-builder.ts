import type {
  KeyValueEntry,
  LearningEntry,
  MemoryRecord,
  SurfacedResult,
} from '../memory/types.js';

export interface ContextConfig {
  maxTokens: number;        // Total token budget
  identityTokens: number;   // Reserved for identity entries and records
  activeTokens: number;     // Reserved for active context
  surfacedTokens: number;   // Reserved for predictively surfaced records
  learningTokens: number;   // Reserved for learnings
}

export const DEFAULT_CONTEXT_CONFIG: ContextConfig = {
  maxTokens: 2000,
  identityTokens: 500,
  activeTokens: 800,
  surfacedTokens: 500,
  learningTokens: 200,
};

export interface ContextInput {
  identity: KeyValueEntry[];
  identityRecords?: MemoryRecord[];
  active: KeyValueEntry[];
  activeRecords?: MemoryRecord[];
  surfaced?: SurfacedResult[];
  learnings?: LearningEntry[];
}

export interface BuiltContext {
  text: string;
  tokenEstimate: number;
  included: {
    identity: number;
    active: number;
    surfaced: number;
    learnings: number;
  };
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

interface Section {
  name: keyof BuiltContext['included'];
  heading: string;
  lines: string[];
}

/**
 * Renders always-loaded memory (identity, active context) plus optional
 * surfaced records and learnings as prompt text under a token budget.
 */
export class ContextBuilder {
  private config: ContextConfig;

  constructor(config: Partial<ContextConfig> = {}) {
    this.config = { ...DEFAULT_CONTEXT_CONFIG, ...config };
  }

  build(input: ContextInput): BuiltContext {
    const identity = fitLines(
      [
        ...input.identity.map((e) => `- ${e.key}: ${e.value}`),
        ...bySalience(input.identityRecords ?? []).map(formatRecord),
      ],
      this.config.identityTokens
    );

    const active = fitLines(
      [
        ...input.active.map((e) => `## ${e.key}\n${e.value}`),
        ...bySalience(input.activeRecords ?? []).map(formatRecord),
      ],
      this.config.activeTokens
    );

    const surfaced = fitLines(
      (input.surfaced ?? []).map(
        (s) => `- [${s.record.type}] ${s.record.content} (${s.reasons.join('+')}, ${Math.round(s.confidence * 100)}%)` +
          (s.conflicts.length > 0 ? ' [may conflict]' : '')
      ),
      this.config.surfacedTokens
    );

    const learnings = fitLines(
      (input.learnings ?? []).map((l) => `- [${l.kind}] ${l.content}`),
      this.config.learningTokens
    );

    const sections: Section[] = [
      { name: 'identity', heading: '# Identity', lines: identity },
      { name: 'active', heading: '# Active Context', lines: active },
      { name: 'surfaced', heading: '# Relevant Context', lines: surfaced },
      { name: 'learnings', heading: '# Learnings', lines: learnings },
    ];

    const included: BuiltContext['included'] = { identity: 0, active: 0, surfaced: 0, learnings: 0 };
    const rendered: string[] = [];
    let total = 0;

    // Whole sections drop from the end when the total budget is exceeded
    for (const section of sections) {
      if (section.lines.length === 0) continue;
      const block = [section.heading, ...section.lines].join('\n');
      const tokens = estimateTokens(block);
      if (total + tokens > this.config.maxTokens) break;
      rendered.push(block);
      included[section.name] = section.lines.length;
      total += tokens;
    }

    const text = rendered.join('\n\n');
    return { text, tokenEstimate: estimateTokens(text), included };
  }

  /**
   * Update configuration
   */
  setConfig(config: Partial<ContextConfig>): void {
    this.config = { ...this.config, ...config };
  }
}

function formatRecord(record: MemoryRecord): string {
  return `- [${record.type}] ${record.content}`;
}

function bySalience(records: MemoryRecord[]): MemoryRecord[] {
  return [...records].sort((a, b) =>
    b.salience - a.salience || b.updatedAt.getTime() - a.updatedAt.getTime()
  );
}

/**
 * Keep lines in order until the budget runs out.
 */
function fitLines(lines: string[], maxTokens: number): string[] {
  const result: string[] = [];
  let totalTokens = 0;

  for (const line of lines) {
    const lineTokens = estimateTokens(line);
    if (totalTokens + lineTokens > maxTokens) break;
    result.push(line);
    totalTokens += lineTokens;
  }

  return result;
}
