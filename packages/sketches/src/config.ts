// ---------------------------------------------------------------------------
// Configuration: defaults and environment overrides
// ---------------------------------------------------------------------------
// Defaults for the optional constructor parameters, plus the log level.
// Resolution order: environment override > default. An unparsable override
// is ignored and reported in `issues`.
// ---------------------------------------------------------------------------

import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface SketchConfig {
  readonly logLevel: LogLevel;
  readonly hllPrecision: number;
  readonly tdigestCompression: number;
  readonly kllK: number;
  readonly cuckooMaxKicks: number;
  readonly minHashPermutations: number;
}

export type SketchConfigKey = keyof SketchConfig;

export const DEFAULT_SKETCH_CONFIG: SketchConfig = {
  logLevel: 'silent',
  hllPrecision: 14,
  tdigestCompression: 100,
  kllK: 200,
  cuckooMaxKicks: 500,
  minHashPermutations: 128,
};

/** Environment variable consulted for each setting. */
export const CONFIG_ENV_KEYS: Record<SketchConfigKey, string> = {
  logLevel: 'SKETCHKIT_LOG_LEVEL',
  hllPrecision: 'SKETCHKIT_HLL_PRECISION',
  tdigestCompression: 'SKETCHKIT_TDIGEST_COMPRESSION',
  kllK: 'SKETCHKIT_KLL_K',
  cuckooMaxKicks: 'SKETCHKIT_CUCKOO_MAX_KICKS',
  minHashPermutations: 'SKETCHKIT_MINHASH_PERMUTATIONS',
};

const envSchemas = {
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  hllPrecision: z.coerce.number().int().min(4).max(18),
  tdigestCompression: z.coerce.number().finite().min(10),
  kllK: z.coerce.number().int().min(2),
  cuckooMaxKicks: z.coerce.number().int().min(1),
  minHashPermutations: z.coerce.number().int().min(1),
} satisfies Record<SketchConfigKey, z.ZodTypeAny>;

export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface LoadedConfig {
  readonly config: SketchConfig;
  /** One line per override that was present but rejected. */
  readonly issues: readonly string[];
}

function readEnv(key: string, env: EnvSource): string | undefined {
  const raw = env[key];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

/** Resolve the configuration from an environment map (defaults to `process.env`). */
export function loadSketchConfig(env: EnvSource = processEnv()): LoadedConfig {
  const issues: string[] = [];

  function resolve<K extends SketchConfigKey>(key: K, schema: z.ZodType<SketchConfig[K]>): SketchConfig[K] {
    const envKey = CONFIG_ENV_KEYS[key];
    const raw = readEnv(envKey, env);
    if (raw === undefined) return DEFAULT_SKETCH_CONFIG[key];
    const parsed = schema.safeParse(raw);
    if (parsed.success) return parsed.data;
    issues.push(`${envKey}=${raw} ignored: ${parsed.error.issues[0]?.message ?? 'invalid value'}`);
    return DEFAULT_SKETCH_CONFIG[key];
  }

  const config: SketchConfig = {
    logLevel: resolve('logLevel', envSchemas.logLevel),
    hllPrecision: resolve('hllPrecision', envSchemas.hllPrecision),
    tdigestCompression: resolve('tdigestCompression', envSchemas.tdigestCompression),
    kllK: resolve('kllK', envSchemas.kllK),
    cuckooMaxKicks: resolve('cuckooMaxKicks', envSchemas.cuckooMaxKicks),
    minHashPermutations: resolve('minHashPermutations', envSchemas.minHashPermutations),
  };

  return { config, issues };
}

function processEnv(): EnvSource {
  if (typeof process !== 'undefined' && process.env) return process.env;
  return {};
}

/** Configuration resolved once at load time. */
export const sketchConfig: SketchConfig = loadSketchConfig().config;
