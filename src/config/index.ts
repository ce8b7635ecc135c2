import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '../core/logger.js';

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['simple', 'ollama', 'openai']).default('simple'),
  model: z.string().optional(),
  // Defaults to the provider's model size: simple 384, ollama 768, openai 1536
  dimensions: z.number().int().positive().optional(),
  ollamaUrl: z.string().default('http://127.0.0.1:11434'),
  openaiApiKey: z.string().optional(),
});

export const SearchConfigSchema = z.object({
  floor: z.number().min(0).max(1).default(0.15),
  recencyWeight: z.number().min(0).max(1).default(0),
  defaultLimit: z.number().int().positive().default(5),
});

export const GraphConfigSchema = z.object({
  conflictThreshold: z.number().min(0).max(1).default(0.75),
  updateThreshold: z.number().min(0).max(1).default(0.72),
  extendThreshold: z.number().min(0).max(1).default(0.65),
  deriveThreshold: z.number().min(0).max(1).default(0.45),
});

export const ConsolidationConfigSchema = z.object({
  mergeThreshold: z.number().min(0).max(1).default(0.85),
  pruneSalienceFloor: z.number().min(0).max(1).default(0.3),
  retentionDays: z.number().nonnegative().default(30),
  // Inclusive: an archive record accessed this many times in the window is promoted
  promoteAccessThreshold: z.number().int().positive().default(3),
  promoteWindowDays: z.number().positive().default(7),
  activeSoftCap: z.number().int().positive().default(30),
  identitySoftCap: z.number().int().positive().default(20),
});

export const SurfacingConfigSchema = z.object({
  entityConfidence: z.number().min(0).max(1).default(0.85),
  semanticConfidence: z.number().min(0).max(1).default(0.65),
  temporalConfidence: z.number().min(0).max(1).default(0.4),
  defaultLimit: z.number().int().positive().default(5),
});

export const ExtractionConfigSchema = z.object({
  minConfidence: z.number().min(0).max(1).default(0.3),
});

export const RetryConfigSchema = z.object({
  attempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().nonnegative().default(50),
  maxDelayMs: z.number().nonnegative().default(1000),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  embeddings: EmbeddingsConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  graph: GraphConfigSchema.default({}),
  consolidation: ConsolidationConfigSchema.default({}),
  surfacing: SurfacingConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type ConsolidationConfig = z.infer<typeof ConsolidationConfigSchema>;
export type SurfacingConfig = z.infer<typeof SurfacingConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const MEMTIER_DIR = '.memtier';
export const CONFIG_FILE = 'config.json';
export const MEMORY_DB = 'memory.db';

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    const memPath = path.join(currentDir, MEMTIER_DIR);
    if (fs.existsSync(memPath) && fs.statSync(memPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getMemtierPath(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new Error(`No ${MEMTIER_DIR} directory found. Call initProject() first.`);
  }
  return path.join(root, MEMTIER_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getMemtierPath(projectRoot), CONFIG_FILE);
}

export function getMemoryDbPath(projectRoot?: string): string {
  return path.join(getMemtierPath(projectRoot), MEMORY_DB);
}

export function loadConfig(projectRoot?: string, logger?: Logger): Config {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger?.warn('config file is not valid JSON, using defaults', {
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return defaultConfig();
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger?.warn('config file failed validation, using defaults', {
      path: configPath,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    });
    return defaultConfig();
  }
  return parsed.data;
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): string {
  const memPath = path.join(targetDir, MEMTIER_DIR);

  if (fs.existsSync(memPath) && !force) {
    throw new Error(`${MEMTIER_DIR} already exists in ${targetDir}. Pass force to reinitialize.`);
  }

  fs.mkdirSync(memPath, { recursive: true, mode: 0o700 });

  fs.writeFileSync(
    path.join(memPath, CONFIG_FILE),
    JSON.stringify(defaultConfig(), null, 2),
    { mode: 0o600 }
  );

  fs.writeFileSync(path.join(memPath, '.gitignore'), `# memtier local files
memory.db
memory.db-journal
memory.db-wal
memory.db-shm
`);

  return memPath;
}

export function setConfigValue(key: string, value: string, projectRoot?: string): void {
  const config: Record<string, unknown> = { ...loadConfig(projectRoot) };
  const keys = key.split('.');

  let current: Record<string, unknown> = config;
  for (let i = 0; i < keys.length - 1; i++) {
    const next = current[keys[i]];
    if (!isRecord(next)) {
      throw new Error(`Invalid config key: ${key}`);
    }
    const copy = { ...next };
    current[keys[i]] = copy;
    current = copy;
  }

  const lastKey = keys[keys.length - 1];

  const existingValue = current[lastKey];
  if (typeof existingValue === 'number') {
    current[lastKey] = parseFloat(value);
  } else if (typeof existingValue === 'boolean') {
    current[lastKey] = value === 'true';
  } else {
    current[lastKey] = value;
  }

  const validated = ConfigSchema.parse(config);
  saveConfig(validated, projectRoot);
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  const config = loadConfig(projectRoot);
  const keys = key.split('.');

  let current: unknown = config;
  for (const k of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
