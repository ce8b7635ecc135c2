import { ProviderUnavailableError, ValidationError, errorMessage } from '../core/errors.js';
import type { EmbeddingsConfig } from '../config/index.js';
import type { Logger } from '../core/logger.js';

// Embedding dimension for all-MiniLM-L6-v2
export const LOCAL_EMBEDDING_DIM = 384;

// Embedding dimension for Ollama nomic-embed-text
export const OLLAMA_EMBEDDING_DIM = 768;

// Embedding dimension for text-embedding-3-small
export const OPENAI_EMBEDDING_DIM = 1536;

/**
 * Text to fixed-length vector. Implementations must be deterministic for a
 * given model and signal outages with ProviderUnavailableError.
 */
export interface Embedder {
  readonly dimensions: number;
  readonly name: string;
  initialize(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new ValidationError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// Character-level hashing fallback. For testing only, not production.
export class SimpleEmbedder implements Embedder {
  readonly name = 'simple';

  constructor(readonly dimensions: number = LOCAL_EMBEDDING_DIM) {}

  async initialize(): Promise<void> {
    // No initialization needed
  }

  async embed(text: string): Promise<Float32Array> {
    return this.hashToEmbedding(text);
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => this.hashToEmbedding(text));
  }

  /**
   * Deterministic embedding from character codes, positions and word hashes
   */
  private hashToEmbedding(text: string): Float32Array {
    const embedding = new Float32Array(this.dimensions);
    const normalized = text.toLowerCase().trim();

    for (let i = 0; i < this.dimensions; i++) {
      embedding[i] = Math.sin(i * 0.1 + normalized.length * 0.01) * 0.01;
    }

    for (let i = 0; i < normalized.length; i++) {
      const charCode = normalized.charCodeAt(i);
      const position = i % this.dimensions;

      embedding[position] += Math.sin(charCode * 0.1) * 0.1;
      embedding[(position + 1) % this.dimensions] += Math.cos(charCode * 0.1) * 0.1;
      embedding[charCode % this.dimensions] += 0.05;
    }

    // Word-level features
    for (const word of normalized.split(/\s+/)) {
      embedding[simpleHash(word) % this.dimensions] += 0.1;
    }

    return normalize(embedding);
  }
}

export class OllamaEmbedder implements Embedder {
  readonly name = 'ollama';

  constructor(
    private baseUrl: string = 'http://127.0.0.1:11434',
    private model: string = 'nomic-embed-text',
    readonly dimensions: number = OLLAMA_EMBEDDING_DIM,
    private logger?: Logger
  ) {}

  async initialize(): Promise<void> {
    // Check that Ollama is up and the model is pulled
    const data = await this.request<{ models?: Array<{ name: string }> }>('/api/tags');
    const hasModel = data.models?.some((m) => m.name.includes(this.model)) ?? false;

    if (!hasModel) {
      this.logger?.warn('embedding model not found, pulling', { model: this.model });
      await this.pullModel();
    }
  }

  private async pullModel(): Promise<void> {
    const response = await this.post('/api/pull', { name: this.model, stream: false });
    // Drain the body so the connection is released
    await response.text();
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const response = await this.post('/api/embed', { model: this.model, input: texts });
    const data = await response.json() as { embeddings?: number[][] };

    if (!data.embeddings || data.embeddings.length !== texts.length) {
      throw new ProviderUnavailableError(this.name, 'malformed embedding response');
    }
    return data.embeddings.map((e) => checkDimensions(this, e));
  }

  private async request<T>(route: string): Promise<T> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${route}`);
    } catch (error) {
      throw new ProviderUnavailableError(this.name, `failed to connect to ${this.baseUrl}`, error);
    }
    if (!response.ok) {
      throw new ProviderUnavailableError(this.name, `server responded ${response.status}`);
    }
    return await response.json() as T;
  }

  private async post(route: string, body: unknown): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${route}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new ProviderUnavailableError(this.name, `failed to connect to ${this.baseUrl}`, error);
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new ProviderUnavailableError(this.name, `request to ${route} failed: ${detail}`);
    }
    return response;
  }
}

export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai';

  constructor(
    private apiKey: string,
    private model: string = 'text-embedding-3-small',
    readonly dimensions: number = OPENAI_EMBEDDING_DIM
  ) {}

  async initialize(): Promise<void> {
    await this.embed('test');
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    let response: Response;
    try {
      response = await fetch('https://api.openai.com/v1/embeddings', {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          input: texts,
          dimensions: this.dimensions,
        }),
      });
    } catch (error) {
      throw new ProviderUnavailableError(this.name, errorMessage(error), error);
    }

    if (!response.ok) {
      const error = await response.text();
      throw new ProviderUnavailableError(this.name, `embedding failed: ${error}`);
    }

    const data = await response.json() as {
      data: Array<{ embedding: number[]; index: number }>;
    };

    // Sort by index to maintain order
    const sorted = [...data.data].sort((a, b) => a.index - b.index);
    return sorted.map((d) => checkDimensions(this, d.embedding));
  }
}

export async function createEmbedder(config: EmbeddingsConfig, logger?: Logger): Promise<Embedder> {
  let embedder: Embedder;

  switch (config.provider) {
    case 'simple':
      embedder = new SimpleEmbedder(config.dimensions ?? LOCAL_EMBEDDING_DIM);
      break;

    case 'ollama':
      embedder = new OllamaEmbedder(
        config.ollamaUrl,
        config.model ?? 'nomic-embed-text',
        config.dimensions ?? OLLAMA_EMBEDDING_DIM,
        logger
      );
      break;

    case 'openai':
      if (!config.openaiApiKey) {
        throw new ValidationError('OpenAI API key required for OpenAI embeddings');
      }
      embedder = new OpenAIEmbedder(
        config.openaiApiKey,
        config.model ?? 'text-embedding-3-small',
        config.dimensions ?? OPENAI_EMBEDDING_DIM
      );
      break;

    default:
      throw new ValidationError(`Unknown embedder provider: ${String(config.provider)}`);
  }

  await embedder.initialize();
  return embedder;
}

// A model that answers with another size than configured is a setup error, not an outage.
function checkDimensions(embedder: Embedder, values: number[]): Float32Array {
  if (values.length !== embedder.dimensions) {
    throw new ValidationError(
      `${embedder.name}: expected ${embedder.dimensions}-dimension vectors, got ${values.length}`
    );
  }
  return new Float32Array(values);
}

function normalize(vector: Float32Array): Float32Array {
  let norm = 0;
  for (let i = 0; i < vector.length; i++) {
    norm += vector[i] * vector[i];
  }
  norm = Math.sqrt(norm);

  if (norm > 0) {
    for (let i = 0; i < vector.length; i++) {
      vector[i] /= norm;
    }
  }
  return vector;
}

function simpleHash(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) - hash) + str.charCodeAt(i);
    hash = hash & hash; // Convert to 32bit integer
  }
  return Math.abs(hash);
}
