import { ProviderUnavailableError, ValidationError, NotFoundError } from '../core/errors.js';
import { silentLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { RetryConfig } from '../config/index.js';
import type { Embedder } from './embeddings.js';
import { withRetry } from './retry.js';
import { contentHash, isMetadataValue } from './store.js';
import type { MemoryStore, RecordPatch } from './store.js';
import { WriteLock } from './write-lock.js';
import { TYPE_SALIENCE, isRecordType, isTier } from './types.js';
import type {
  KeyValueEntry,
  MemoryRecord,
  Metadata,
  NewRecordInput,
  RecordFilter,
  RecordType,
  RecordUpdate,
} from './types.js';

export interface RecordStoreOptions {
  lock?: WriteLock;
  retry?: Partial<RetryConfig>;
  logger?: Logger;
}

export type ValidRecordInput = Required<NewRecordInput>;

export function defaultSalience(type: RecordType): number {
  const range = TYPE_SALIENCE[type];
  return Math.round(((range.min + range.max) / 2) * 1000) / 1000;
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Embedding-aware record operations on top of MemoryStore. Vectors are
 * computed before the write section is entered; the write itself is short.
 */
export class RecordStore {
  readonly lock: WriteLock;
  private readonly retry: Partial<RetryConfig>;
  private readonly logger: Logger;

  constructor(
    readonly store: MemoryStore,
    readonly embedder: Embedder,
    options: RecordStoreOptions = {}
  ) {
    if (embedder.dimensions !== store.dimensions) {
      throw new ValidationError(
        `Embedding dimension mismatch: store expects ${store.dimensions}, ${embedder.name} produces ${embedder.dimensions}`
      );
    }
    this.lock = options.lock ?? new WriteLock();
    this.retry = options.retry ?? {};
    this.logger = (options.logger ?? silentLogger).child('records');
  }

  /**
   * Check an input the way `put` does and fill its defaults, without writing.
   */
  validate(input: NewRecordInput): ValidRecordInput {
    const content = validateContent(input.content);
    const tier = input.tier ?? 'archive';
    const type = input.type ?? 'fact';
    if (!isTier(tier)) throw new ValidationError(`Unknown tier: ${String(tier)}`);
    if (!isRecordType(type)) throw new ValidationError(`Unknown record type: ${String(type)}`);

    const salience = input.salience === undefined ? defaultSalience(type) : validateSalience(input.salience);
    const metadata = validateMetadata(input.metadata ?? {});
    return { content, tier, type, salience, metadata };
  }

  async put(input: NewRecordInput): Promise<string> {
    const { content, tier, type, salience, metadata } = this.validate(input);

    const embedding = await this.embedForStorage(content);

    return this.lock.run(() =>
      this.store.transaction(() => {
        const id = this.store.insertRecord({ content, tier, type, salience, metadata });
        if (embedding) {
          this.store.setEmbedding(id, embedding, contentHash(content));
        }
        this.logger.debug('record stored', { id, tier, type, embedded: embedding !== null });
        return id;
      })
    );
  }

  /**
   * Read a record and count the access.
   */
  get(id: string): MemoryRecord | null {
    if (!this.store.touch(id)) return null;
    return this.store.getRecord(id);
  }

  // Read without counting an access (consolidation, graph traversal, listing).
  peek(id: string): MemoryRecord | null {
    return this.store.getRecord(id);
  }

  async update(id: string, fields: RecordUpdate): Promise<MemoryRecord> {
    const existing = this.store.getRecord(id);
    if (!existing) throw new NotFoundError('record', id);

    const patch: RecordPatch = {};
    if (fields.content !== undefined) patch.content = validateContent(fields.content);
    if (fields.tier !== undefined) {
      if (!isTier(fields.tier)) throw new ValidationError(`Unknown tier: ${String(fields.tier)}`);
      patch.tier = fields.tier;
    }
    if (fields.type !== undefined) {
      if (!isRecordType(fields.type)) throw new ValidationError(`Unknown record type: ${String(fields.type)}`);
      patch.type = fields.type;
    }
    if (fields.salience !== undefined) patch.salience = validateSalience(fields.salience);
    if (fields.metadata !== undefined) patch.metadata = validateMetadata(fields.metadata);

    let embedding: Float32Array | null = null;
    const newContent = patch.content;
    if (newContent !== undefined && newContent !== existing.content) {
      const cached = this.store.getEmbedding(id);
      if (!cached || cached.contentHash !== contentHash(newContent)) {
        embedding = await this.embedForStorage(newContent);
      }
    }

    return this.lock.run(() =>
      this.store.transaction(() => {
        if (!this.store.hasRecord(id)) throw new NotFoundError('record', id);
        const updated = this.store.updateRecord(id, patch);
        if (embedding && newContent !== undefined) {
          this.store.setEmbedding(id, embedding, contentHash(newContent));
          return this.store.getRecord(id) ?? updated;
        }
        return updated;
      })
    );
  }

  touch(id: string): void {
    if (!this.store.touch(id)) throw new NotFoundError('record', id);
  }

  async delete(id: string): Promise<boolean> {
    return this.lock.run(() => this.store.deleteRecord(id));
  }

  list(filter: RecordFilter = {}): MemoryRecord[] {
    return this.store.listRecords(filter);
  }

  setIdentity(key: string, value: string): void {
    this.store.setIdentity(validateKey(key), value);
  }

  getIdentity(): KeyValueEntry[] {
    return this.store.getIdentity();
  }

  setActive(key: string, value: string): void {
    this.store.setActive(validateKey(key), value);
  }

  getActive(): KeyValueEntry[] {
    return this.store.getActive();
  }

  /**
   * Embed text for a query. Provider failures surface after retries.
   */
  async embedText(text: string): Promise<Float32Array> {
    return withRetry(() => this.embedder.embed(text), this.retry, this.logger);
  }

  /**
   * Vector for a record, recomputing it when missing or computed from older
   * content. Returns null when the provider is down.
   */
  async ensureEmbedding(record: MemoryRecord): Promise<Float32Array | null> {
    if (record.embedding) return record.embedding;

    const vector = await this.embedForStorage(record.content);
    if (!vector) return null;

    const hash = contentHash(record.content);
    await this.lock.run(() => {
      const current = this.store.getRecord(record.id);
      if (!current || contentHash(current.content) !== hash) {
        this.logger.debug('stale embedding write skipped', { id: record.id });
        return;
      }
      this.store.setEmbedding(record.id, vector, hash);
    });
    return vector;
  }

  /**
   * Vector for content about to be written, or null when the provider is
   * down. The record is stored either way and embedded on first search.
   */
  async embedForStorage(content: string): Promise<Float32Array | null> {
    try {
      return await this.embedText(content);
    } catch (error) {
      if (error instanceof ProviderUnavailableError) {
        this.logger.warn('embedding deferred, provider unavailable', { error: error.message });
        return null;
      }
      throw error;
    }
  }
}

function validateContent(content: unknown): string {
  if (typeof content !== 'string' || content.trim().length === 0) {
    throw new ValidationError('Record content must be a non-empty string');
  }
  return content;
}

function validateSalience(salience: unknown): number {
  if (typeof salience !== 'number' || !Number.isFinite(salience)) {
    throw new ValidationError(`Salience must be a finite number, got ${String(salience)}`);
  }
  return clamp01(salience);
}

function validateMetadata(metadata: unknown): Metadata {
  if (typeof metadata !== 'object' || metadata === null || Array.isArray(metadata)) {
    throw new ValidationError('Metadata must be an object');
  }
  const result: Metadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (!isMetadataValue(value)) {
      throw new ValidationError(`Metadata value for "${key}" is not JSON-serialisable`);
    }
    result[key] = value;
  }
  return result;
}

function validateKey(key: string): string {
  if (key.trim().length === 0) {
    throw new ValidationError('Key must be non-empty');
  }
  return key;
}
