/**
 * leakguard configuration.
 *
 * Resolution order: DEFAULT_CONFIG ← JSON config file ← environment ←
 * explicit overrides.
 *
 * Environment variables:
 *   LEAKGUARD_ROOTS               - Comma-separated monitored roots
 *   LEAKGUARD_DB                  - Path to the audit database
 *   LEAKGUARD_PORT                - Dashboard port
 *   LEAKGUARD_MIN_CONFIDENCE      - Minimum confidence floor
 *   LEAKGUARD_ENTROPY_THRESHOLD   - Normalized entropy threshold
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../shared/errors.js';

export interface ExclusionConfig {
  /** Lower-case extensions, leading dot included. */
  extensions: string[];
  /** Directory names skipped anywhere under a root. */
  directories: string[];
  /** Files larger than this are skipped. Exactly this size is scanned. */
  maxFileSizeBytes: number;
  /** Bytes inspected by the binary/UTF-8 probe. */
  utf8ProbeBytes: number;
}

export interface DetectionConfig {
  entropyThreshold: number;
  minTokenLength: number;
  minConfidence: number;
  contextWindow: number;
  testDataMarkers: string[];
  inlineTestMarkers: string[];
}

export interface WorkerConfig {
  readTimeoutMs: number;
  /** Distinct paths a root's queue holds before notifications are dropped. */
  queueCapacity: number;
}

export interface AuditConfig {
  databasePath: string;
  /** Findings held in memory while the sink is failing. */
  bufferSize: number;
  maxAttempts: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  retentionDays: number;
}

export interface LeakGuardConfig {
  roots: string[];
  exclusion: ExclusionConfig;
  detection: DetectionConfig;
  worker: WorkerConfig;
  audit: AuditConfig;
  dashboard: { port: number };
}

export const CONFIG_FILE_NAME = '.leakguard.json';

export const DEFAULT_BINARY_EXTENSIONS: readonly string[] = [
  '.pyc', '.pyo', '.pyd', '.so', '.dll', '.exe', '.bin', '.obj', '.o', '.a', '.lib',
  '.class', '.jar', '.wasm', '.zip', '.tar', '.gz', '.bz2', '.xz', '.7z', '.rar',
  '.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx',
  '.jpg', '.jpeg', '.png', '.gif', '.bmp', '.ico', '.webp', '.svg',
  '.mp3', '.mp4', '.avi', '.mov', '.wmv', '.flv', '.woff', '.woff2', '.ttf', '.eot',
  '.db', '.sqlite',
];

export const DEFAULT_EXCLUDED_DIRECTORIES: readonly string[] = [
  '.git', '.svn', '.hg', 'node_modules', '__pycache__', '.venv', 'venv',
  '.tox', 'dist', 'build', '.pytest_cache', '.mypy_cache', '.next', 'coverage',
];

export const DEFAULT_CONFIG: LeakGuardConfig = {
  roots: ['.'],
  exclusion: {
    extensions: [...DEFAULT_BINARY_EXTENSIONS],
    directories: [...DEFAULT_EXCLUDED_DIRECTORIES],
    maxFileSizeBytes: 10 * 1024 * 1024,
    utf8ProbeBytes: 8192,
  },
  detection: {
    entropyThreshold: 0.75,
    minTokenLength: 20,
    minConfidence: 0.3,
    contextWindow: 40,
    testDataMarkers: ['test', 'tests', '__tests__', 'fixtures', '__fixtures__', 'testdata'],
    inlineTestMarkers: ['example', 'dummy', 'fake', 'sample', 'placeholder', 'test'],
  },
  worker: {
    readTimeoutMs: 5000,
    queueCapacity: 1024,
  },
  audit: {
    databasePath: join(homedir(), '.leakguard', 'audit.db'),
    bufferSize: 1000,
    maxAttempts: 8,
    baseBackoffMs: 50,
    maxBackoffMs: 5000,
    retentionDays: 90,
  },
  dashboard: {
    port: 3848,
  },
};

// ─── Validation ──────────────────────────────────────────────

const unit = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();

export const ConfigFileSchema = z
  .object({
    roots: z.array(z.string().min(1)).min(1),
    exclusion: z
      .object({
        extensions: z.array(z.string().regex(/^\./, 'extensions start with a dot')),
        directories: z.array(z.string().min(1)),
        maxFileSizeBytes: positiveInt,
        utf8ProbeBytes: positiveInt,
      })
      .partial()
      .strict(),
    detection: z
      .object({
        entropyThreshold: unit,
        minTokenLength: positiveInt,
        minConfidence: unit,
        contextWindow: z.number().int().min(0),
        testDataMarkers: z.array(z.string().min(1)),
        inlineTestMarkers: z.array(z.string().min(1)),
      })
      .partial()
      .strict(),
    worker: z
      .object({
        readTimeoutMs: positiveInt,
        queueCapacity: positiveInt,
      })
      .partial()
      .strict(),
    audit: z
      .object({
        databasePath: z.string().min(1),
        bufferSize: positiveInt,
        maxAttempts: positiveInt,
        baseBackoffMs: z.number().int().min(0),
        maxBackoffMs: z.number().int().min(0),
        retentionDays: positiveInt,
      })
      .partial()
      .strict(),
    dashboard: z.object({ port: z.number().int().min(0).max(65535) }).partial().strict(),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

const EnvSchema = z.object({
  LEAKGUARD_ROOTS: z.string().optional(),
  LEAKGUARD_DB: z.string().min(1).optional(),
  LEAKGUARD_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  LEAKGUARD_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).optional(),
  LEAKGUARD_ENTROPY_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
});

export interface LoadConfigOptions {
  /** Directory searched for the config file and used to resolve roots. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; must exist. */
  configPath?: string;
  overrides?: ConfigOverrides;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

function readConfigFile(filePath: string): ConfigOverrides {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatIssues(parsed.error)}`, { filePath });
  }
  return parsed.data;
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }

  const e = parsed.data;
  const overrides: ConfigOverrides = {};
  if (e.LEAKGUARD_ROOTS) {
    const roots = e.LEAKGUARD_ROOTS.split(',').map(r => r.trim()).filter(r => r.length > 0);
    if (roots.length > 0) overrides.roots = roots;
  }
  if (e.LEAKGUARD_DB !== undefined) overrides.audit = { databasePath: e.LEAKGUARD_DB };
  if (e.LEAKGUARD_PORT !== undefined) overrides.dashboard = { port: e.LEAKGUARD_PORT };

  const detection: NonNullable<ConfigOverrides['detection']> = {};
  if (e.LEAKGUARD_MIN_CONFIDENCE !== undefined) detection.minConfidence = e.LEAKGUARD_MIN_CONFIDENCE;
  if (e.LEAKGUARD_ENTROPY_THRESHOLD !== undefined) detection.entropyThreshold = e.LEAKGUARD_ENTROPY_THRESHOLD;
  if (Object.keys(detection).length > 0) overrides.detection = detection;

  return overrides;
}

/** Applies overrides field by field; absent fields keep the base value. */
export function mergeConfig(base: LeakGuardConfig, overrides: ConfigOverrides): LeakGuardConfig {
  const ex = overrides.exclusion ?? {};
  const det = overrides.detection ?? {};
  const wk = overrides.worker ?? {};
  const au = overrides.audit ?? {};
  const db = overrides.dashboard ?? {};

  return {
    roots: overrides.roots ?? base.roots,
    exclusion: {
      extensions: ex.extensions ?? base.exclusion.extensions,
      directories: ex.directories ?? base.exclusion.directories,
      maxFileSizeBytes: ex.maxFileSizeBytes ?? base.exclusion.maxFileSizeBytes,
      utf8ProbeBytes: ex.utf8ProbeBytes ?? base.exclusion.utf8ProbeBytes,
    },
    detection: {
      entropyThreshold: det.entropyThreshold ?? base.detection.entropyThreshold,
      minTokenLength: det.minTokenLength ?? base.detection.minTokenLength,
      minConfidence: det.minConfidence ?? base.detection.minConfidence,
      contextWindow: det.contextWindow ?? base.detection.contextWindow,
      testDataMarkers: det.testDataMarkers ?? base.detection.testDataMarkers,
      inlineTestMarkers: det.inlineTestMarkers ?? base.detection.inlineTestMarkers,
    },
    worker: {
      readTimeoutMs: wk.readTimeoutMs ?? base.worker.readTimeoutMs,
      queueCapacity: wk.queueCapacity ?? base.worker.queueCapacity,
    },
    audit: {
      databasePath: au.databasePath ?? base.audit.databasePath,
      bufferSize: au.bufferSize ?? base.audit.bufferSize,
      maxAttempts: au.maxAttempts ?? base.audit.maxAttempts,
      baseBackoffMs: au.baseBackoffMs ?? base.audit.baseBackoffMs,
      maxBackoffMs: au.maxBackoffMs ?? base.audit.maxBackoffMs,
      retentionDays: au.retentionDays ?? base.audit.retentionDays,
    },
    dashboard: {
      port: db.port ?? base.dashboard.port,
    },
  };
}

export function loadConfig(options: LoadConfigOptions = {}): LeakGuardConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let config = DEFAULT_CONFIG;

  if (options.configPath) {
    const filePath = resolve(cwd, options.configPath);
    if (!existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`, { filePath });
    }
    config = mergeConfig(config, readConfigFile(filePath));
  } else {
    const filePath = join(cwd, CONFIG_FILE_NAME);
    if (existsSync(filePath)) {
      config = mergeConfig(config, readConfigFile(filePath));
    }
  }

  config = mergeConfig(config, envOverrides(env));

  if (options.overrides) {
    const parsed = ConfigFileSchema.safeParse(options.overrides);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    config = mergeConfig(config, parsed.data);
  }

  if (config.audit.maxBackoffMs < config.audit.baseBackoffMs) {
    throw new ConfigError('audit.maxBackoffMs must not be below audit.baseBackoffMs');
  }

  return { ...config, roots: config.roots.map(r => resolve(cwd, r)) };
}
