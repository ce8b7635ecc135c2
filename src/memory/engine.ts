import { ValidationError, NotFoundError } from '../core/errors.js';
import type { ConsistencyWarning } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { ContextBuilder } from '../core/context-builder.js';
import type { BuiltContext, ContextConfig } from '../core/context-builder.js';
import { ConfigSchema, getMemoryDbPath, loadConfig } from '../config/index.js';
import type { Config, ConfigInput } from '../config/index.js';
import { Consolidator } from './consolidator.js';
import type { ConsolidateOptions, ConsolidationPreview } from './consolidator.js';
import { createEmbedder } from './embeddings.js';
import type { Embedder } from './embeddings.js';
import { PatternExtractor, classifyTier, estimateSalience } from './extraction.js';
import type { Extractor } from './extraction.js';
import { GraphLayer } from './graph.js';
import type { GraphStats } from './graph.js';
import { LearningLog } from './learnings.js';
import type { LearningStats } from './learnings.js';
import { RecordStore } from './record-store.js';
import type { ValidRecordInput } from './record-store.js';
import { SemanticIndex } from './semantic-index.js';
import { PatternEntityExtractor, detectExpiry } from './signals.js';
import type { EntityExtractor } from './signals.js';
import { SNAPSHOT_VERSION, SnapshotSchema } from './snapshot.js';
import type { ImportOptions, ImportReport, MemorySnapshot } from './snapshot.js';
import { MemoryStore, contentHash } from './store.js';
import { Surfacer } from './surfacer.js';
import type { PredictOptions } from './surfacer.js';
import type {
  ConsolidationReport,
  EnrichedRecord,
  KeyValueEntry,
  MemoryRecord,
  MemoryStats,
  NewRecordInput,
  RecordFilter,
  RecordUpdate,
  RelationKind,
  Resolution,
  SearchOptions,
  SurfacedResult,
} from './types.js';
import { isRecordType } from './types.js';

export interface AgentMemoryOptions {
  dbPath: string;
  embedder?: Embedder;
  config?: ConfigInput;
  extractor?: Extractor;
  entityExtractor?: EntityExtractor;
  logger?: Logger;
  clock?: () => Date;
  context?: Partial<ContextConfig>;
}

export interface RecallOptions extends SearchOptions {
  // Follow `updates` edges to the live version (default true)
  resolve?: boolean;
  // Record a recall_hit / recall_miss learning (default true)
  learn?: boolean;
}

export interface RecallResult extends EnrichedRecord {
  similarity: number;
  score: number;
  resolvedFrom: string | null;
  warnings: ConsistencyWarning[];
}

export interface StartupContextOptions {
  context?: string;
  now?: Date;
  limit?: number;
}

export interface EngineStats extends MemoryStats {
  graph: GraphStats;
  learningStats: LearningStats;
}

/**
 * Caller-facing memory engine: one SQLite file, one write lock, every
 * component wired to the same store and configuration.
 */
export class AgentMemory {
  readonly store: MemoryStore;
  readonly records: RecordStore;
  readonly index: SemanticIndex;
  readonly graph: GraphLayer;
  readonly consolidator: Consolidator;
  readonly surfacer: Surfacer;
  readonly learnings: LearningLog;
  readonly config: Config;

  private readonly extractor: Extractor;
  private readonly entityExtractor: EntityExtractor;
  private readonly contextBuilder: ContextBuilder;
  private readonly logger: Logger;

  private constructor(
    store: MemoryStore,
    embedder: Embedder,
    config: Config,
    options: AgentMemoryOptions,
    logger: Logger
  ) {
    this.store = store;
    this.config = config;
    this.logger = logger.child('engine');
    this.entityExtractor = options.entityExtractor ?? new PatternEntityExtractor();
    this.extractor = options.extractor ?? new PatternExtractor({ minConfidence: config.extraction.minConfidence });

    this.records = new RecordStore(store, embedder, { retry: config.retry, logger });
    this.index = new SemanticIndex(this.records, config.search, logger);
    this.graph = new GraphLayer(this.records, config.graph, this.entityExtractor, logger);
    this.consolidator = new Consolidator(this.records, config.consolidation, logger);
    this.learnings = new LearningLog(store);
    this.surfacer = new Surfacer({
      records: this.records,
      index: this.index,
      graph: this.graph,
      learnings: this.learnings,
      entityExtractor: this.entityExtractor,
      config: config.surfacing,
      logger,
    });
    this.contextBuilder = new ContextBuilder(options.context);
  }

  static async open(options: AgentMemoryOptions): Promise<AgentMemory> {
    const config = ConfigSchema.parse(options.config ?? {});
    const logger = options.logger ?? new Logger({ level: config.logging.level });
    const embedder = options.embedder ?? (await createEmbedder(config.embeddings, logger));

    const store = new MemoryStore(options.dbPath, { dimensions: embedder.dimensions, clock: options.clock });
    try {
      return new AgentMemory(store, embedder, config, options, logger);
    } catch (error) {
      store.close();
      throw error;
    }
  }

  /**
   * Open the database under `<root>/.memtier`, reading its config file.
   */
  static async openProject(
    projectRoot?: string,
    options: Omit<AgentMemoryOptions, 'dbPath' | 'config'> = {}
  ): Promise<AgentMemory> {
    const config = loadConfig(projectRoot, options.logger);
    return AgentMemory.open({ ...options, dbPath: getMemoryDbPath(projectRoot), config });
  }

  close(): void {
    this.store.close();
  }

  // ==================== CAPTURE ====================

  /**
   * Store a record. Tier and salience are inferred from the wording when
   * not given; entities and `expires_at` are filled into metadata when absent.
   */
  async capture(input: NewRecordInput): Promise<MemoryRecord> {
    return this.write(this.prepareCapture(input));
  }

  /**
   * Capture several records in order. Every input is checked before the
   * first write.
   */
  async captureBatch(inputs: NewRecordInput[]): Promise<MemoryRecord[]> {
    const prepared = inputs.map((input, i) => {
      try {
        return this.prepareCapture(input);
      } catch (error) {
        if (error instanceof ValidationError) {
          throw new ValidationError(`${error.message} (item ${i})`);
        }
        throw error;
      }
    });

    const captured: MemoryRecord[] = [];
    for (const input of prepared) {
      captured.push(await this.write(input));
    }
    return captured;
  }

  // Fill tier, salience, entities and expiry, then validate as `put` would.
  private prepareCapture(input: NewRecordInput): ValidRecordInput {
    if (typeof input.content !== 'string' || input.content.trim().length === 0) {
      throw new ValidationError('Record content must be a non-empty string');
    }
    const type = input.type ?? 'fact';
    if (!isRecordType(type)) throw new ValidationError(`Unknown record type: ${String(type)}`);
    const metadata = { ...input.metadata };

    if (metadata.entities === undefined) {
      const entities = this.entityExtractor.extract(input.content);
      if (entities.length > 0) metadata.entities = entities;
    }
    if (metadata.expires_at === undefined) {
      const expiry = detectExpiry(input.content, this.store.now());
      if (expiry) metadata.expires_at = expiry.toISOString();
    }

    return this.records.validate({
      content: input.content,
      type,
      tier: input.tier ?? classifyTier(input.content, input.type),
      salience: input.salience ?? estimateSalience(input.content, type),
      metadata,
    });
  }

  private async write(input: ValidRecordInput): Promise<MemoryRecord> {
    const id = await this.records.put(input);
    const record = this.records.peek(id);
    if (!record) throw new NotFoundError('record', id);
    return record;
  }

  /**
   * Run the extractor over free text and capture every candidate.
   */
  async captureFromText(text: string): Promise<MemoryRecord[]> {
    const candidates = this.extractor
      .extract(text)
      .filter((c) => c.confidence >= this.config.extraction.minConfidence);

    const captured = await this.captureBatch(
      candidates.map((c) => ({
        content: c.content,
        type: c.type,
        salience: c.salience,
        metadata: { extraction_confidence: c.confidence },
      }))
    );
    this.logger.debug('captured from text', { candidates: candidates.length, captured: captured.length });
    return captured;
  }

  // ==================== READ ====================

  async recall(query: string, options: RecallOptions = {}): Promise<RecallResult[]> {
    const hits = await this.index.search(query, options);
    const seen = new Set<string>();
    const results: RecallResult[] = [];

    for (const hit of hits) {
      const resolution: Resolution = options.resolve === false
        ? { record: hit.record, chain: [hit.record.id], ambiguous: false, warnings: [] }
        : this.graph.resolveDetailed(hit.record.id);

      let record = resolution.record;
      if (seen.has(record.id)) continue;
      seen.add(record.id);

      const replaced = record.id !== hit.record.id;
      if (replaced && options.touch !== false) {
        record = this.records.get(record.id) ?? record;
      }

      for (const enriched of this.graph.enrich([record])) {
        results.push({
          ...enriched,
          similarity: hit.similarity,
          score: hit.score,
          resolvedFrom: replaced ? hit.record.id : null,
          warnings: resolution.warnings,
        });
      }
    }

    if (options.learn !== false) {
      const top = results[0];
      if (top) {
        this.learnings.recordHit(query, top.record.content.slice(0, 80), top.record.id);
      } else {
        this.learnings.recordMiss(query, 'no record above the similarity floor');
      }
    }

    return results;
  }

  get(id: string): MemoryRecord | null {
    return this.records.get(id);
  }

  list(filter: RecordFilter = {}): MemoryRecord[] {
    return this.records.list(filter);
  }

  resolve(id: string): MemoryRecord {
    return this.graph.resolve(id);
  }

  async predict(context: string, options: PredictOptions = {}): Promise<SurfacedResult[]> {
    return this.surfacer.predict(context, options);
  }

  // ==================== WRITE ====================

  async update(id: string, fields: RecordUpdate): Promise<MemoryRecord> {
    return this.records.update(id, fields);
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async link(sourceId: string, targetId: string, kind: RelationKind): Promise<boolean> {
    return this.graph.link(sourceId, targetId, kind);
  }

  async unlink(sourceId: string, targetId: string, kind: RelationKind): Promise<boolean> {
    return this.graph.unlink(sourceId, targetId, kind);
  }

  /**
   * Replace a record's content with a new version: the new record keeps the
   * old tier, type and salience, and an `updates` edge points old → new.
   */
  async correct(id: string, content: string): Promise<MemoryRecord> {
    const existing = this.records.peek(id);
    if (!existing) throw new NotFoundError('record', id);

    const replacement = await this.capture({
      content,
      tier: existing.tier,
      type: existing.type,
      salience: existing.salience,
      metadata: { corrects: id },
    });
    await this.graph.link(id, replacement.id, 'updates');
    this.learnings.recordCorrection(existing.content, content, id);

    this.logger.info('record corrected', { from: id, to: replacement.id });
    return this.records.peek(replacement.id) ?? replacement;
  }

  // ==================== IDENTITY / ACTIVE ====================

  setIdentity(key: string, value: string): void {
    this.records.setIdentity(key, value);
  }

  getIdentity(): KeyValueEntry[] {
    return this.records.getIdentity();
  }

  deleteIdentity(key: string): boolean {
    return this.store.deleteIdentity(key);
  }

  setActive(key: string, value: string): void {
    this.records.setActive(key, value);
  }

  getActive(): KeyValueEntry[] {
    return this.records.getActive();
  }

  deleteActive(key: string): boolean {
    return this.store.deleteActive(key);
  }

  /**
   * Prompt text for the start of a session: identity and active context
   * always; surfaced records and learnings when `context` is given.
   */
  async startupContext(options: StartupContextOptions = {}): Promise<BuiltContext> {
    const context = options.context?.trim() ?? '';
    const surfaced = context.length > 0
      ? await this.surfacer.predict(context, { now: options.now, limit: options.limit })
      : [];
    const learnings = context.length > 0 ? this.learnings.relevant(context) : [];

    return this.contextBuilder.build({
      identity: this.records.getIdentity(),
      identityRecords: this.records.list({ tier: 'identity' }),
      active: this.records.getActive(),
      activeRecords: this.records.list({ tier: 'active' }),
      surfaced,
      learnings,
    });
  }

  // ==================== MAINTENANCE ====================

  async consolidate(options: ConsolidateOptions = {}): Promise<ConsolidationReport> {
    return this.consolidator.consolidate(options);
  }

  async previewConsolidation(options: ConsolidateOptions = {}): Promise<ConsolidationPreview> {
    return this.consolidator.preview(options);
  }

  stats(): EngineStats {
    return {
      ...this.store.getStats(),
      graph: this.graph.stats(),
      learningStats: this.learnings.stats(),
    };
  }

  // ==================== EXPORT / IMPORT ====================

  exportSnapshot(): MemorySnapshot {
    const toMap = (entries: KeyValueEntry[]): Record<string, string> =>
      Object.fromEntries(entries.map((e) => [e.key, e.value]));

    return {
      version: SNAPSHOT_VERSION,
      exportedAt: this.store.now().toISOString(),
      identity: toMap(this.store.getIdentity()),
      activeContext: toMap(this.store.getActive()),
      records: this.store.listRecords().map((r) => ({
        id: r.id,
        content: r.content,
        tier: r.tier,
        type: r.type,
        salience: r.salience,
        createdAt: r.createdAt.toISOString(),
        updatedAt: r.updatedAt.toISOString(),
        accessedAt: r.accessedAt ? r.accessedAt.toISOString() : null,
        accessCount: r.accessCount,
        metadata: r.metadata,
      })),
      edges: this.store.allEdges().map((e) => ({ source: e.sourceId, target: e.targetId, kind: e.kind })),
      learnings: this.store.listLearnings().map((l) => ({
        id: l.id,
        kind: l.kind,
        trigger: l.trigger,
        content: l.content,
        recordId: l.recordId,
        timesApplied: l.timesApplied,
        createdAt: l.createdAt.toISOString(),
        lastAppliedAt: l.lastAppliedAt ? l.lastAppliedAt.toISOString() : null,
        metadata: l.metadata,
      })),
    };
  }

  /**
   * Load a snapshot produced by `exportSnapshot`. The whole snapshot is
   * validated before anything is written, and written in one transaction.
   */
  async importSnapshot(input: unknown, options: ImportOptions = {}): Promise<ImportReport> {
    const parsed = SnapshotSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ValidationError(`Invalid snapshot: ${issues}`);
    }
    const snapshot = parsed.data;
    const mode = options.mode ?? 'merge';

    const pending = mode === 'replace'
      ? snapshot.records
      : snapshot.records.filter((r) => !this.store.hasRecord(r.id));
    const vectors = new Map<string, Float32Array>();
    for (const record of pending) {
      const vector = await this.records.embedForStorage(record.content);
      if (vector) vectors.set(record.id, vector);
    }

    const report = await this.records.lock.run(() =>
      this.store.transaction((): ImportReport => {
        if (mode === 'replace') this.store.clear();

        const result: ImportReport = { records: 0, skippedRecords: 0, edges: 0, identity: 0, active: 0, learnings: 0 };

        for (const record of snapshot.records) {
          if (this.store.hasRecord(record.id)) {
            result.skippedRecords++;
            continue;
          }
          this.store.insertRecord({
            id: record.id,
            content: record.content,
            tier: record.tier,
            type: record.type,
            salience: record.salience,
            metadata: record.metadata,
            createdAt: new Date(record.createdAt),
            updatedAt: new Date(record.updatedAt),
            accessedAt: record.accessedAt ? new Date(record.accessedAt) : null,
            accessCount: record.accessCount,
          });
          const vector = vectors.get(record.id);
          if (vector) this.store.setEmbedding(record.id, vector, contentHash(record.content));
          result.records++;
        }

        for (const edge of snapshot.edges) {
          if (!this.store.hasRecord(edge.source) || !this.store.hasRecord(edge.target)) continue;
          if (this.store.addEdge(edge.source, edge.target, edge.kind)) result.edges++;
        }

        for (const [key, value] of Object.entries(snapshot.identity)) {
          this.store.setIdentity(key, value);
          result.identity++;
        }
        for (const [key, value] of Object.entries(snapshot.activeContext)) {
          this.store.setActive(key, value);
          result.active++;
        }

        for (const learning of snapshot.learnings) {
          if (this.store.getLearning(learning.id)) continue;
          this.store.addLearning({
            id: learning.id,
            kind: learning.kind,
            trigger: learning.trigger,
            content: learning.content,
            recordId: learning.recordId,
            metadata: learning.metadata,
            timesApplied: learning.timesApplied,
            createdAt: new Date(learning.createdAt),
            lastAppliedAt: learning.lastAppliedAt ? new Date(learning.lastAppliedAt) : null,
          });
          result.learnings++;
        }

        return result;
      })
    );

    this.logger.info('snapshot imported', { mode, ...report });
    return report;
  }
}
