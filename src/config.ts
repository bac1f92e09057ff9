/**
 * Runtime configuration.
 *
 * Defaults cover every setting. `loadConfig` reads `GEOSYNC_*` environment
 * variables for the server; library callers pass overrides to `createConfig`.
 *
 * Usage:
 *   const config = createConfig({ matching: { highConfidence: 0.8 } });
 *   const ctx = createGeoSyncContext({ config });
 */

import { z } from 'zod';
import { GeoSyncError, createTypedError } from './domain/errors';
import { LogLevel } from './logger';

/**
 * Administrative words that carry no identity on their own: "Ward 32" and
 * "32" name the same ward under one parent.
 */
export const DEFAULT_NOISE_WORDS = [
  'ward',
  'wada',
  'municipality',
  'metropolitan',
  'city',
  'rural',
  'nagarpalika',
  'gaunpalika',
  'mahanagarpalika',
  'vdc',
  'district',
  'zilla',
  'jilla',
  'province',
  'pradesh',
  'state',
  'region',
  'no',
];

const matchingSchema = z
  .object({
    /** Minimum score for automatic linking. Inclusive. */
    highConfidence: z.number().min(0).max(1).default(0.75),
    /** A runner-up closer than this to the top score blocks automatic linking. */
    tieMargin: z.number().min(0).max(1).default(0.05),
    /** Candidates below this score are not considered at all. */
    floor: z.number().min(0).max(1).default(0.3),
    noiseWords: z.array(z.string().min(1)).default(DEFAULT_NOISE_WORDS),
  })
  .refine((m) => m.floor <= m.highConfidence, {
    message: 'floor must not exceed highConfidence',
    path: ['floor'],
  });

const configSchema = z.object({
  matching: matchingSchema.default({}),
  hierarchy: z
    .object({
      /** Deepest level accepted; 7 allows 4 official and 4 custom levels. */
      maxLevel: z.number().int().min(0).max(31).default(7),
    })
    .default({}),
  sync: z
    .object({
      /** `immediate` matches on submit; `deferred` leaves drafts for syncPending(). */
      mode: z.enum(['immediate', 'deferred']).default('immediate'),
      /** Attempts at the create path before a lost race is reported. */
      maxCreateAttempts: z.number().int().min(1).default(3),
    })
    .default({}),
  /** Locale whose declared name becomes the unit's primary name. */
  defaultLocale: z.string().min(1).default('en'),
  port: z.number().int().min(0).max(65535).default(5000),
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.Info),
});

export type GeoSyncConfig = z.infer<typeof configSchema>;
export type MatchingConfig = GeoSyncConfig['matching'];
export type ConfigOverrides = z.input<typeof configSchema>;

/** Raised when configuration fails validation. */
export class ConfigError extends GeoSyncError {
  constructor(issues: string[]) {
    super(
      createTypedError({
        code: 'CONFIG.INVALID',
        message: `Invalid configuration: ${issues.join('; ')}`,
        retryable: false,
        details: { issues },
      }),
    );
    this.name = 'ConfigError';
  }
}

/** Build a configuration from defaults and overrides. */
export function createConfig(overrides: ConfigOverrides = {}): GeoSyncConfig {
  const parsed = configSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data;
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((w) => w.trim())
    .filter((w) => w.length > 0);
}

/** Unparseable numbers become NaN, which the schema rejects. */
function toNumber(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

function parseSyncMode(value: string | undefined): 'immediate' | 'deferred' | undefined {
  if (value === undefined) return undefined;
  if (value === 'immediate' || value === 'deferred') return value;
  throw new ConfigError([`sync.mode: unknown mode "${value}"`]);
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = Object.values(LogLevel).find((l) => l === value.toLowerCase());
  if (!level) throw new ConfigError([`logLevel: unknown level "${value}"`]);
  return level;
}

/** Build a configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GeoSyncConfig {
  return createConfig({
    matching: {
      highConfidence: toNumber(env.GEOSYNC_HIGH_CONFIDENCE),
      tieMargin: toNumber(env.GEOSYNC_TIE_MARGIN),
      floor: toNumber(env.GEOSYNC_MATCH_FLOOR),
      noiseWords: splitList(env.GEOSYNC_NOISE_WORDS),
    },
    hierarchy: { maxLevel: toNumber(env.GEOSYNC_MAX_LEVEL) },
    sync: {
      mode: parseSyncMode(env.GEOSYNC_SYNC_MODE),
      maxCreateAttempts: toNumber(env.GEOSYNC_MAX_CREATE_ATTEMPTS),
    },
    defaultLocale: env.GEOSYNC_DEFAULT_LOCALE,
    port: toNumber(env.PORT),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  });
}
