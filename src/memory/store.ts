import * as fs from 'fs';
import { createHash } from 'crypto';
import Database from 'better-sqlite3';
import { nanoid } from 'nanoid';
import { NotFoundError, ValidationError } from '../core/errors.js';
import {
  isLearningKind,
  isRecordType,
  isRelationKind,
  isTier,
} from './types.js';
import type {
  GraphEdge,
  KeyValueEntry,
  LearningEntry,
  LearningKind,
  MemoryRecord,
  MemoryStats,
  Metadata,
  MetadataValue,
  NewLearningInput,
  RecordFilter,
  RecordType,
  RelationKind,
  Tier,
} from './types.js';

export const DEFAULT_EMBEDDING_DIM = 384;

export interface MemoryStoreOptions {
  dimensions?: number;
  clock?: () => Date;
}

// Fully-specified row as written by insertRecord; timestamps default to the store clock.
export interface RecordInsert {
  id?: string;
  content: string;
  tier: Tier;
  type: RecordType;
  salience: number;
  metadata: Metadata;
  createdAt?: Date;
  updatedAt?: Date;
  accessedAt?: Date | null;
  accessCount?: number;
}

export interface RecordPatch {
  content?: string;
  tier?: Tier;
  type?: RecordType;
  salience?: number;
  metadata?: Metadata;
  accessCount?: number;
  accessedAt?: Date | null;
  touchUpdatedAt?: boolean;
}

// Learning row as written; imports carry their original counters and timestamps.
export interface LearningInsert extends NewLearningInput {
  id?: string;
  timesApplied?: number;
  createdAt?: Date;
  lastAppliedAt?: Date | null;
}

export interface StoredEmbedding {
  vector: Float32Array;
  contentHash: string;
}

export function contentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export class MemoryStore {
  private db: Database.Database;
  readonly dimensions: number;
  private readonly clock: () => Date;

  constructor(dbPath: string, options: MemoryStoreOptions = {}) {
    this.dimensions = options.dimensions ?? DEFAULT_EMBEDDING_DIM;
    this.clock = options.clock ?? (() => new Date());
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.runMigrations();

    if (dbPath !== ':memory:') {
      // Owner read/write only; some filesystems refuse chmod
      try {
        fs.chmodSync(dbPath, 0o600);
      } catch {
        // not critical
      }
    }
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT DEFAULT (datetime('now'))
      );
    `);

    const appliedMigrations = new Set(
      this.db.prepare('SELECT name FROM migrations').all()
        .map((row) => (row as { name: string }).name)
    );

    if (!appliedMigrations.has('001_initial')) {
      this.db.exec(`
        CREATE TABLE records (
          id TEXT PRIMARY KEY,
          content TEXT NOT NULL,
          tier TEXT NOT NULL CHECK (tier IN ('identity', 'active', 'archive')),
          type TEXT NOT NULL,
          salience REAL NOT NULL DEFAULT 0.5,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          accessed_at TEXT,
          access_count INTEGER NOT NULL DEFAULT 0,
          metadata TEXT NOT NULL DEFAULT '{}'
        );

        -- One vector per record, tagged with the hash of the content it was computed from
        CREATE TABLE record_embeddings (
          record_id TEXT PRIMARY KEY REFERENCES records(id) ON DELETE CASCADE,
          embedding BLOB NOT NULL,
          content_hash TEXT NOT NULL,
          dimensions INTEGER NOT NULL
        );

        CREATE TABLE identity (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE active_context (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE edges (
          source_id TEXT NOT NULL REFERENCES records(id) ON DELETE CASCADE,
          target_id TEXT NOT NULL REFERENCES records(id) ON DELETE CASCADE,
          kind TEXT NOT NULL CHECK (kind IN ('updates', 'extends', 'derives')),
          created_at TEXT NOT NULL,
          PRIMARY KEY (source_id, target_id, kind),
          CHECK (source_id != target_id)
        );

        CREATE TABLE learnings (
          id TEXT PRIMARY KEY,
          kind TEXT NOT NULL,
          trigger_text TEXT NOT NULL,
          content TEXT NOT NULL,
          record_id TEXT,
          times_applied INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL,
          last_applied_at TEXT,
          metadata TEXT NOT NULL DEFAULT '{}'
        );

        CREATE INDEX idx_records_tier ON records(tier);
        CREATE INDEX idx_records_type ON records(type);
        CREATE INDEX idx_records_updated ON records(updated_at);
        CREATE INDEX idx_edges_target ON edges(target_id);
        CREATE INDEX idx_learnings_kind ON learnings(kind);
        CREATE INDEX idx_learnings_record ON learnings(record_id);
      `);

      this.db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_initial');
    }
  }

  close(): void {
    this.db.close();
  }

  now(): Date {
    return this.clock();
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Remove every record, edge, key-value entry and learning.
   */
  clear(): void {
    this.transaction(() => {
      this.db.exec(`
        DELETE FROM edges;
        DELETE FROM record_embeddings;
        DELETE FROM records;
        DELETE FROM identity;
        DELETE FROM active_context;
        DELETE FROM learnings;
      `);
    });
  }

  // ==================== RECORDS ====================

  insertRecord(input: RecordInsert): string {
    const id = input.id ?? nanoid();
    const now = this.clock();
    const createdAt = input.createdAt ?? now;

    this.db.prepare(`
      INSERT INTO records (id, content, tier, type, salience, created_at, updated_at,
                           accessed_at, access_count, metadata)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      input.content,
      input.tier,
      input.type,
      input.salience,
      createdAt.toISOString(),
      (input.updatedAt ?? createdAt).toISOString(),
      input.accessedAt ? input.accessedAt.toISOString() : null,
      input.accessCount ?? 0,
      JSON.stringify(input.metadata)
    );

    return id;
  }

  getRecord(id: string): MemoryRecord | null {
    const row = this.db.prepare(`
      SELECT r.*, e.embedding, e.content_hash
      FROM records r
      LEFT JOIN record_embeddings e ON e.record_id = r.id
      WHERE r.id = ?
    `).get(id) as RecordRow | undefined;

    return row ? this.rowToRecord(row) : null;
  }

  hasRecord(id: string): boolean {
    return this.db.prepare('SELECT 1 FROM records WHERE id = ?').get(id) !== undefined;
  }

  getRecords(ids: string[]): MemoryRecord[] {
    if (ids.length === 0) return [];
    const placeholders = ids.map(() => '?').join(',');
    const rows = this.db.prepare(`
      SELECT r.*, e.embedding, e.content_hash
      FROM records r
      LEFT JOIN record_embeddings e ON e.record_id = r.id
      WHERE r.id IN (${placeholders})
    `).all(...ids) as RecordRow[];

    const byId = new Map(rows.map((row) => [row.id, this.rowToRecord(row)]));
    return ids.flatMap((id) => {
      const record = byId.get(id);
      return record ? [record] : [];
    });
  }

  updateRecord(id: string, patch: RecordPatch): MemoryRecord {
    const sets: string[] = [];
    const params: (string | number | null)[] = [];

    if (patch.content !== undefined) {
      sets.push('content = ?');
      params.push(patch.content);
    }
    if (patch.tier !== undefined) {
      sets.push('tier = ?');
      params.push(patch.tier);
    }
    if (patch.type !== undefined) {
      sets.push('type = ?');
      params.push(patch.type);
    }
    if (patch.salience !== undefined) {
      sets.push('salience = ?');
      params.push(patch.salience);
    }
    if (patch.metadata !== undefined) {
      sets.push('metadata = ?');
      params.push(JSON.stringify(patch.metadata));
    }
    if (patch.accessCount !== undefined) {
      sets.push('access_count = ?');
      params.push(patch.accessCount);
    }
    if (patch.accessedAt !== undefined) {
      sets.push('accessed_at = ?');
      params.push(patch.accessedAt ? patch.accessedAt.toISOString() : null);
    }
    if (patch.touchUpdatedAt !== false) {
      sets.push('updated_at = ?');
      params.push(this.clock().toISOString());
    }

    if (sets.length > 0) {
      const result = this.db.prepare(`
        UPDATE records SET ${sets.join(', ')} WHERE id = ?
      `).run(...params, id);

      if (result.changes === 0) {
        throw new NotFoundError('record', id);
      }
    }

    const updated = this.getRecord(id);
    if (!updated) {
      throw new NotFoundError('record', id);
    }
    return updated;
  }

  touch(id: string): boolean {
    const result = this.db.prepare(`
      UPDATE records
      SET accessed_at = ?, access_count = access_count + 1
      WHERE id = ?
    `).run(this.clock().toISOString(), id);

    return result.changes > 0;
  }

  deleteRecord(id: string): boolean {
    // Embeddings and edges go with the record (ON DELETE CASCADE)
    const result = this.db.prepare('DELETE FROM records WHERE id = ?').run(id);
    return result.changes > 0;
  }

  listRecords(filter: RecordFilter = {}): MemoryRecord[] {
    const { where, params } = this.buildFilter(filter);

    let sql = `
      SELECT r.*, e.embedding, e.content_hash
      FROM records r
      LEFT JOIN record_embeddings e ON e.record_id = r.id
      WHERE ${where}
      ORDER BY r.updated_at DESC, r.id ASC
    `;

    if (filter.limit !== undefined) {
      sql += ' LIMIT ? OFFSET ?';
      params.push(filter.limit, filter.offset ?? 0);
    }

    const rows = this.db.prepare(sql).all(...params) as RecordRow[];
    return rows.map((row) => this.rowToRecord(row));
  }

  countByTier(): Record<Tier, number> {
    const counts: Record<Tier, number> = { identity: 0, active: 0, archive: 0 };
    const rows = this.db.prepare(`
      SELECT tier, COUNT(*) AS count FROM records GROUP BY tier
    `).all() as Array<{ tier: string; count: number }>;

    for (const row of rows) {
      if (isTier(row.tier)) counts[row.tier] = row.count;
    }
    return counts;
  }

  private buildFilter(filter: RecordFilter): { where: string; params: (string | number)[] } {
    const clauses: string[] = ['1=1'];
    const params: (string | number)[] = [];

    if (filter.tier !== undefined) {
      const tiers = Array.isArray(filter.tier) ? filter.tier : [filter.tier];
      if (tiers.length > 0) {
        clauses.push(`r.tier IN (${tiers.map(() => '?').join(',')})`);
        params.push(...tiers);
      }
    }

    if (filter.type !== undefined) {
      const types = Array.isArray(filter.type) ? filter.type : [filter.type];
      if (types.length > 0) {
        clauses.push(`r.type IN (${types.map(() => '?').join(',')})`);
        params.push(...types);
      }
    }

    if (filter.minSalience !== undefined) {
      clauses.push('r.salience >= ?');
      params.push(filter.minSalience);
    }

    return { where: clauses.join(' AND '), params };
  }

  // ==================== EMBEDDINGS ====================

  setEmbedding(id: string, embedding: Float32Array, hash: string): void {
    if (embedding.length !== this.dimensions) {
      throw new ValidationError(`Embedding dimension mismatch: expected ${this.dimensions}, got ${embedding.length}`);
    }

    const buffer = Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);

    this.db.prepare(`
      INSERT OR REPLACE INTO record_embeddings (record_id, embedding, content_hash, dimensions)
      VALUES (?, ?, ?, ?)
    `).run(id, buffer, hash, embedding.length);
  }

  getEmbedding(id: string): StoredEmbedding | null {
    const row = this.db.prepare(`
      SELECT embedding, content_hash FROM record_embeddings WHERE record_id = ?
    `).get(id) as { embedding: Buffer; content_hash: string } | undefined;

    if (!row) return null;

    const vector = this.bufferToVector(row.embedding);
    return vector ? { vector, contentHash: row.content_hash } : null;
  }

  clearEmbedding(id: string): void {
    this.db.prepare('DELETE FROM record_embeddings WHERE record_id = ?').run(id);
  }

  private bufferToVector(buffer: Buffer): Float32Array | null {
    const expectedBytes = this.dimensions * 4;
    if (buffer.length !== expectedBytes) {
      return null;
    }
    // Copy out of the row buffer so callers own their snapshot
    const copy = buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);
    return new Float32Array(copy);
  }

  // ==================== IDENTITY / ACTIVE CONTEXT ====================

  setIdentity(key: string, value: string): void {
    this.setKeyValue('identity', key, value);
  }

  getIdentity(): KeyValueEntry[] {
    return this.getKeyValues('identity');
  }

  deleteIdentity(key: string): boolean {
    return this.deleteKeyValue('identity', key);
  }

  setActive(key: string, value: string): void {
    this.setKeyValue('active_context', key, value);
  }

  getActive(): KeyValueEntry[] {
    return this.getKeyValues('active_context');
  }

  deleteActive(key: string): boolean {
    return this.deleteKeyValue('active_context', key);
  }

  private setKeyValue(table: KeyValueTable, key: string, value: string): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO ${table} (key, value, updated_at)
      VALUES (?, ?, ?)
    `).run(key, value, this.clock().toISOString());
  }

  private getKeyValues(table: KeyValueTable): KeyValueEntry[] {
    const rows = this.db.prepare(`
      SELECT key, value, updated_at FROM ${table} ORDER BY key ASC
    `).all() as Array<{ key: string; value: string; updated_at: string }>;

    return rows.map((row) => ({
      key: row.key,
      value: row.value,
      updatedAt: new Date(row.updated_at),
    }));
  }

  private deleteKeyValue(table: KeyValueTable, key: string): boolean {
    return this.db.prepare(`DELETE FROM ${table} WHERE key = ?`).run(key).changes > 0;
  }

  // ==================== EDGES ====================

  addEdge(sourceId: string, targetId: string, kind: RelationKind): boolean {
    const result = this.db.prepare(`
      INSERT OR IGNORE INTO edges (source_id, target_id, kind, created_at)
      VALUES (?, ?, ?, ?)
    `).run(sourceId, targetId, kind, this.clock().toISOString());

    return result.changes > 0;
  }

  removeEdge(sourceId: string, targetId: string, kind: RelationKind): boolean {
    const result = this.db.prepare(`
      DELETE FROM edges WHERE source_id = ? AND target_id = ? AND kind = ?
    `).run(sourceId, targetId, kind);

    return result.changes > 0;
  }

  edgesFrom(id: string, kind?: RelationKind): GraphEdge[] {
    const rows = kind
      ? this.db.prepare('SELECT * FROM edges WHERE source_id = ? AND kind = ? ORDER BY created_at ASC')
        .all(id, kind) as EdgeRow[]
      : this.db.prepare('SELECT * FROM edges WHERE source_id = ? ORDER BY created_at ASC')
        .all(id) as EdgeRow[];
    return rows.map(rowToEdge);
  }

  edgesTo(id: string, kind?: RelationKind): GraphEdge[] {
    const rows = kind
      ? this.db.prepare('SELECT * FROM edges WHERE target_id = ? AND kind = ? ORDER BY created_at ASC')
        .all(id, kind) as EdgeRow[]
      : this.db.prepare('SELECT * FROM edges WHERE target_id = ? ORDER BY created_at ASC')
        .all(id) as EdgeRow[];
    return rows.map(rowToEdge);
  }

  allEdges(): GraphEdge[] {
    const rows = this.db.prepare('SELECT * FROM edges ORDER BY created_at ASC').all() as EdgeRow[];
    return rows.map(rowToEdge);
  }

  /**
   * Move every edge touching one of `fromIds` onto `toId`. Edges that would
   * become self-edges or duplicates are dropped. Call inside a transaction.
   */
  repointEdges(fromIds: string[], toId: string): number {
    const from = new Set(fromIds);
    const touched = new Map<string, GraphEdge>();

    for (const id of fromIds) {
      for (const edge of [...this.edgesFrom(id), ...this.edgesTo(id)]) {
        touched.set(`${edge.sourceId}|${edge.targetId}|${edge.kind}`, edge);
      }
    }

    const remove = this.db.prepare('DELETE FROM edges WHERE source_id = ? AND target_id = ? AND kind = ?');
    const insert = this.db.prepare(`
      INSERT OR IGNORE INTO edges (source_id, target_id, kind, created_at)
      VALUES (?, ?, ?, ?)
    `);

    let moved = 0;
    for (const edge of touched.values()) {
      remove.run(edge.sourceId, edge.targetId, edge.kind);
      const source = from.has(edge.sourceId) ? toId : edge.sourceId;
      const target = from.has(edge.targetId) ? toId : edge.targetId;
      if (source === target) continue;
      moved += insert.run(source, target, edge.kind, edge.createdAt.toISOString()).changes;
    }
    return moved;
  }

  // ==================== LEARNINGS ====================

  addLearning(input: LearningInsert): string {
    const id = input.id ?? nanoid();
    this.db.prepare(`
      INSERT INTO learnings (id, kind, trigger_text, content, record_id, times_applied,
                             created_at, last_applied_at, metadata)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      input.kind,
      input.trigger,
      input.content,
      input.recordId ?? null,
      input.timesApplied ?? 0,
      (input.createdAt ?? this.clock()).toISOString(),
      input.lastAppliedAt ? input.lastAppliedAt.toISOString() : null,
      JSON.stringify(input.metadata ?? {})
    );
    return id;
  }

  getLearning(id: string): LearningEntry | null {
    const row = this.db.prepare('SELECT * FROM learnings WHERE id = ?').get(id) as LearningRow | undefined;
    return row ? rowToLearning(row) : null;
  }

  listLearnings(options: { kind?: LearningKind; recordId?: string; limit?: number } = {}): LearningEntry[] {
    let sql = 'SELECT * FROM learnings WHERE 1=1';
    const params: (string | number)[] = [];

    if (options.kind) {
      sql += ' AND kind = ?';
      params.push(options.kind);
    }
    if (options.recordId) {
      sql += ' AND record_id = ?';
      params.push(options.recordId);
    }

    sql += ' ORDER BY created_at DESC, id ASC';
    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(options.limit);
    }

    const rows = this.db.prepare(sql).all(...params) as LearningRow[];
    return rows.map(rowToLearning);
  }

  searchLearnings(terms: string[], options: { kind?: LearningKind; limit: number }): LearningEntry[] {
    if (terms.length === 0) return [];

    const conditions: string[] = [];
    const params: (string | number)[] = [];
    for (const term of terms) {
      conditions.push('(LOWER(trigger_text) LIKE ? OR LOWER(content) LIKE ?)');
      params.push(`%${term}%`, `%${term}%`);
    }

    let where = conditions.join(' OR ');
    if (options.kind) {
      where = `kind = ? AND (${where})`;
      params.unshift(options.kind);
    }

    const rows = this.db.prepare(`
      SELECT * FROM learnings
      WHERE ${where}
      ORDER BY created_at DESC, id ASC
      LIMIT ?
    `).all(...params, options.limit) as LearningRow[];

    return rows.map(rowToLearning);
  }

  markLearningApplied(id: string): boolean {
    const result = this.db.prepare(`
      UPDATE learnings
      SET times_applied = times_applied + 1, last_applied_at = ?
      WHERE id = ?
    `).run(this.clock().toISOString(), id);
    return result.changes > 0;
  }

  // ==================== STATS ====================

  getStats(): MemoryStats {
    const counts = this.db.prepare(`
      SELECT
        COUNT(*) AS total,
        AVG(salience) AS avg_salience,
        MIN(created_at) AS oldest,
        MAX(created_at) AS newest
      FROM records
    `).get() as {
      total: number;
      avg_salience: number | null;
      oldest: string | null;
      newest: string | null;
    };

    const byType: Partial<Record<RecordType, number>> = {};
    const typeRows = this.db.prepare(`
      SELECT type, COUNT(*) AS count FROM records GROUP BY type
    `).all() as Array<{ type: string; count: number }>;
    for (const row of typeRows) {
      if (isRecordType(row.type)) byType[row.type] = row.count;
    }

    const count = (sql: string): number => (this.db.prepare(sql).get() as { count: number }).count;

    return {
      totalRecords: counts.total,
      byTier: this.countByTier(),
      byType,
      identityKeys: count('SELECT COUNT(*) AS count FROM identity'),
      activeKeys: count('SELECT COUNT(*) AS count FROM active_context'),
      embeddedRecords: count('SELECT COUNT(*) AS count FROM record_embeddings'),
      edges: count('SELECT COUNT(*) AS count FROM edges'),
      learnings: count('SELECT COUNT(*) AS count FROM learnings'),
      averageSalience: counts.avg_salience ?? 0,
      oldestRecord: counts.oldest ? new Date(counts.oldest) : undefined,
      newestRecord: counts.newest ? new Date(counts.newest) : undefined,
    };
  }

  private rowToRecord(row: RecordRow): MemoryRecord {
    if (!isTier(row.tier) || !isRecordType(row.type)) {
      throw new Error(`Corrupt record row ${row.id}: tier=${row.tier} type=${row.type}`);
    }

    // A vector computed from older content is treated as missing
    let embedding: Float32Array | null = null;
    if (row.embedding && row.content_hash === contentHash(row.content)) {
      embedding = this.bufferToVector(row.embedding);
    }

    return {
      id: row.id,
      content: row.content,
      tier: row.tier,
      type: row.type,
      salience: row.salience,
      embedding,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      accessedAt: row.accessed_at ? new Date(row.accessed_at) : null,
      accessCount: row.access_count,
      metadata: parseMetadata(row.metadata),
    };
  }
}

export function parseMetadata(text: string | null): Metadata {
  if (!text) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }

  const metadata: Metadata = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isMetadataValue(value)) metadata[key] = value;
  }
  return metadata;
}

export function isMetadataValue(value: unknown): value is MetadataValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isMetadataValue);
      return Object.values(value).every(isMetadataValue);
    default:
      return false;
  }
}

function rowToEdge(row: EdgeRow): GraphEdge {
  if (!isRelationKind(row.kind)) {
    throw new Error(`Corrupt edge row: kind=${row.kind}`);
  }
  return {
    sourceId: row.source_id,
    targetId: row.target_id,
    kind: row.kind,
    createdAt: new Date(row.created_at),
  };
}

function rowToLearning(row: LearningRow): LearningEntry {
  if (!isLearningKind(row.kind)) {
    throw new Error(`Corrupt learning row ${row.id}: kind=${row.kind}`);
  }
  return {
    id: row.id,
    kind: row.kind,
    trigger: row.trigger_text,
    content: row.content,
    recordId: row.record_id,
    timesApplied: row.times_applied,
    createdAt: new Date(row.created_at),
    lastAppliedAt: row.last_applied_at ? new Date(row.last_applied_at) : null,
    metadata: parseMetadata(row.metadata),
  };
}

type KeyValueTable = 'identity' | 'active_context';

// Database row types
interface RecordRow {
  id: string;
  content: string;
  tier: string;
  type: string;
  salience: number;
  created_at: string;
  updated_at: string;
  accessed_at: string | null;
  access_count: number;
  metadata: string;
  embedding: Buffer | null;
  content_hash: string | null;
}

interface EdgeRow {
  source_id: string;
  target_id: string;
  kind: string;
  created_at: string;
}

interface LearningRow {
  id: string;
  kind: string;
  trigger_text: string;
  content: string;
  record_id: string | null;
  times_applied: number;
  created_at: string;
  last_applied_at: string | null;
  metadata: string;
}
