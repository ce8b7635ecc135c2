import { ProviderUnavailableError } from '../../src/core/errors.js';
import type { Embedder } from '../../src/memory/embeddings.js';

// Word → concept axis. Words on the same axis embed identically, so
// "prefers" and "like" match without sharing a literal keyword.
const CONCEPTS: Record<string, number> = {
  bill: 0,
  prefers: 1,
  prefer: 1,
  like: 1,
  likes: 1,
  ui: 2,
  dark: 2,
  mode: 2,
  theme: 2,
  timezone: 3,
  pst: 3,
  est: 3,
  stevie: 4,
  phase: 5,
  project: 5,
  worked: 6,
  working: 6,
  cafeteria: 7,
  soup: 7,
  lunch: 7,
  database: 8,
  postgres: 8,
  sqlite: 8,
  deploy: 9,
  release: 9,
  friday: 10,
  fridays: 10,
  tests: 11,
  vitest: 11,
};

/**
 * Deterministic stand-in for a sentence model: one axis per concept, words
 * it does not know contribute nothing. Text with no known words embeds to
 * the zero vector, which has similarity 0 with everything.
 */
export class ConceptEmbedder implements Embedder {
  readonly name = 'concept';
  down = false;
  calls = 0;
  // Runs before each embedding; lets a test interleave a write
  onEmbed: ((text: string) => void) | null = null;

  constructor(readonly dimensions: number = 384) {}

  async initialize(): Promise<void> {
    // nothing to load
  }

  async embed(text: string): Promise<Float32Array> {
    this.calls++;
    this.onEmbed?.(text);
    if (this.down) {
      throw new ProviderUnavailableError(this.name, 'offline');
    }
    return this.vector(text);
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const vectors: Float32Array[] = [];
    for (const text of texts) vectors.push(await this.embed(text));
    return vectors;
  }

  private vector(text: string): Float32Array {
    const vector = new Float32Array(this.dimensions);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const axis = CONCEPTS[word];
      if (axis !== undefined) vector[axis] += 1;
    }

    let norm = 0;
    for (const v of vector) norm += v * v;
    if (norm === 0) return vector;
    norm = Math.sqrt(norm);
    for (let i = 0; i < vector.length; i++) vector[i] /= norm;
    return vector;
  }
}
