/**
 * swiftpick Configuration & Constants
 * Pipeline thresholds, paths and env overrides.
 */
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';

// ============================================================================
// Limits
// ============================================================================
export const MAX_QUERY_LENGTH = 1024;
export const MAX_SESSIONS = 16;
export const SESSION_MAX_AGE_MS = 30 * 60 * 1000;

// ============================================================================
// Pipeline Defaults
// ============================================================================
export const DEFAULT_PRELOAD_CAPACITY = 100;
export const DEFAULT_DEBOUNCE_MS = 200;

/** Candidate count above which filtering moves to a subprocess. */
export const ENGINE_THRESHOLDS = {
  builtin: 10_000,
  native: 100_000,
} as const;

/** Forerunner output beyond this many lines is spilled to a temp file. */
export const DEFAULT_FORERUNNER_THRESHOLD = 30_000;

/** Cached forerunner output older than this is pruned on startup. */
export const CACHE_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000;

// ============================================================================
// Paths
// ============================================================================
export const DEFAULT_DATA_DIR = join(homedir(), '.swiftpick');
export const CACHE_DB_NAME = 'cache.db';
export const SPILL_DIR_NAME = 'spill';

// ============================================================================
// Config Schema
// ============================================================================

const commandString = z
  .string()
  .transform((s) => s.trim().split(/\s+/).filter((part) => part.length > 0))
  .refine((argv) => argv.length > 0, { message: 'command must not be empty' });

const booleanString = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

export const ConfigSchema = z.object({
  preloadCapacity: z.coerce.number().int().min(0).default(DEFAULT_PRELOAD_CAPACITY),
  debounceMs: z.coerce.number().int().min(0).default(DEFAULT_DEBOUNCE_MS),
  builtinThreshold: z.coerce.number().int().min(0).default(ENGINE_THRESHOLDS.builtin),
  nativeThreshold: z.coerce.number().int().min(0).default(ENGINE_THRESHOLDS.native),
  engine: z.enum(['builtin', 'native']).default('builtin'),
  rgPath: z.string().min(1).default('rg'),
  engineCommand: commandString.default('maple filter'),
  workerCommand: commandString.default('maple rpc'),
  rpcFraming: z.enum(['line', 'content-length']).default('content-length'),
  forerunnerThreshold: z.coerce.number().int().min(1).default(DEFAULT_FORERUNNER_THRESHOLD),
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
  debug: booleanString.default('false'),
});

export type PipelineConfig = z.output<typeof ConfigSchema>;
export type MatchEngine = PipelineConfig['engine'];

const ENV_KEYS: Record<keyof PipelineConfig, string> = {
  preloadCapacity: 'SWIFTPICK_PRELOAD_CAPACITY',
  debounceMs: 'SWIFTPICK_DEBOUNCE_MS',
  builtinThreshold: 'SWIFTPICK_BUILTIN_THRESHOLD',
  nativeThreshold: 'SWIFTPICK_NATIVE_THRESHOLD',
  engine: 'SWIFTPICK_ENGINE',
  rgPath: 'SWIFTPICK_RG_PATH',
  engineCommand: 'SWIFTPICK_ENGINE_COMMAND',
  workerCommand: 'SWIFTPICK_WORKER_COMMAND',
  rpcFraming: 'SWIFTPICK_RPC_FRAMING',
  forerunnerThreshold: 'SWIFTPICK_FORERUNNER_THRESHOLD',
  dataDir: 'SWIFTPICK_DATA_DIR',
  debug: 'SWIFTPICK_DEBUG',
};

const ENV_KEY_BY_FIELD = new Map<string, string>(Object.entries(ENV_KEYS));

/**
 * Build the pipeline configuration from environment variables.
 * Unset or empty variables fall back to the defaults above.
 *
 * @throws {Error} listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const raw: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const field = String(issue.path[0] ?? '');
      const envKey = ENV_KEY_BY_FIELD.get(field) ?? field;
      return `${envKey}: ${issue.message}`;
    });
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return parsed.data;
}

/** Defaults only, ignoring the environment. */
export function defaultConfig(): PipelineConfig {
  return ConfigSchema.parse({});
}

/** Threshold for the given matching engine. */
export function thresholdFor(config: PipelineConfig, engine: MatchEngine = config.engine): number {
  return engine === 'native' ? config.nativeThreshold : config.builtinThreshold;
}

export function cacheDbPath(config: PipelineConfig): string {
  return join(config.dataDir, CACHE_DB_NAME);
}

export function spillDir(config: PipelineConfig): string {
  return join(config.dataDir, SPILL_DIR_NAME);
}
