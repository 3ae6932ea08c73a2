import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { availableParallelism } from 'os';
import { parse as parseYaml } from 'yaml';
import { BenchConfigSchema, type BenchConfig } from './types.js';
import { ConfigError, toError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.dispatch-bench.yaml';

type Env = Record<string, string | undefined>;

export class ConfigManager {
  private config: BenchConfig | null = null;
  private projectDir: string;
  private env: Env;

  constructor(projectDir?: string, env: Env = process.env) {
    this.projectDir = projectDir || process.cwd();
    this.env = env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- project config <- env vars <- overrides
   */
  load(overrides?: Partial<BenchConfig>): BenchConfig {
    let raw: Record<string, unknown> = { workers: availableParallelism() };

    // 1. Project config
    const projectConfigPath = join(this.projectDir, PROJECT_CONFIG_FILE);
    if (existsSync(projectConfigPath)) {
      let parsed: unknown;
      try {
        parsed = parseYaml(readFileSync(projectConfigPath, 'utf-8'));
      } catch (err) {
        throw new ConfigError(`Failed to parse project config at ${projectConfigPath}`, toError(err));
      }
      if (isRecord(parsed)) {
        raw = this.deepMerge(raw, parsed);
      }
    }

    // 2. Environment variables
    raw = this.applyEnvVars(raw);

    // 3. Overrides
    if (overrides) {
      raw = this.deepMerge(raw, stripUndefined(overrides));
    }

    // 4. Validate with Zod
    const result = BenchConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): BenchConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const next = { ...raw };

    if (this.env.DISPATCH_MODEL) {
      next.model = this.env.DISPATCH_MODEL;
    }
    if (this.env.DISPATCH_WORKERS) {
      next.workers = parseNumber('DISPATCH_WORKERS', this.env.DISPATCH_WORKERS);
    }
    if (this.env.DISPATCH_TASKS) {
      next.tasks = parseNumber('DISPATCH_TASKS', this.env.DISPATCH_TASKS);
    }
    if (this.env.DISPATCH_SEED) {
      next.seed = parseNumber('DISPATCH_SEED', this.env.DISPATCH_SEED);
    }
    if (this.env.DISPATCH_TIMEOUT_MS) {
      next.timeoutMs = parseNumber('DISPATCH_TIMEOUT_MS', this.env.DISPATCH_TIMEOUT_MS);
    }
    if (this.env.DISPATCH_LOG_LEVEL) {
      next.logLevel = this.env.DISPATCH_LOG_LEVEL;
    }

    return next;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}
