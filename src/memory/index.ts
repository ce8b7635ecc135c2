/**
 * Tiered memory: identity and active context are always loaded, the archive
 * is searched by meaning. Records link through `updates`, `extends` and
 * `derives` edges and are periodically consolidated.
 */

export * from './types.js';
export * from './store.js';
export * from './embeddings.js';
export * from './retry.js';
export * from './write-lock.js';
export * from './record-store.js';
export * from './semantic-index.js';
export * from './signals.js';
export * from './graph.js';
export * from './extraction.js';
export * from './learnings.js';
export * from './surfacer.js';
export * from './consolidator.js';
export * from './snapshot.js';
export * from './engine.js';
