/**
 * In-silico PCR Configuration
 * Default settings for binding-site search and product prediction
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';

const count = z.number().int().nonnegative();
const percent = z.number().min(0).max(100);
const concentration = z.number().nonnegative();

/**
 * Schema for a fully resolved configuration
 */
export const InsilicoConfigSchema = z.object({
  // Binding requirements
  min3PrimeMatch: count,
  max5PrimeMismatch: count,
  minTotalMatchPercent: percent,
  threePrimeDgMax: z.number(),
  threePrimeDgStrong: z.number(),
  threePrimeDgWeak: z.number(),

  // Salt conditions
  naConc: concentration,
  mgConc: concentration,
  dntpConc: concentration,

  // Product filtering
  productSizeMin: count,
  productSizeMax: count,
  maxProducts: z.number().int().min(1),
  reportThreshold: percent,

  circular: z.boolean(),
  maxAmpliconForExtension: count,
});

/**
 * Configuration object for in-silico PCR
 */
export type InsilicoConfig = z.infer<typeof InsilicoConfigSchema>;

/**
 * User-supplied overrides; any omitted option takes its default
 */
export type InsilicoConfigInput = Partial<InsilicoConfig>;

const InsilicoConfigInputSchema = InsilicoConfigSchema.partial().strict();

/**
 * Default configuration for in-silico PCR
 */
export const DEFAULT_INSILICO_CONFIG: Readonly<InsilicoConfig> = Object.freeze({
  min3PrimeMatch: 3,              // bp perfect match at 3' end
  max5PrimeMismatch: 2,           // max mismatches in the 5' region
  minTotalMatchPercent: 80,       // minimum % identity
  threePrimeDgMax: -2.0,          // max ΔG at 3' end (kcal/mol)
  threePrimeDgStrong: -9.0,       // below this the 3' end is too stable
  threePrimeDgWeak: -3.0,         // above this the 3' end is too weak

  naConc: 50,                     // mM
  mgConc: 2.0,                    // mM
  dntpConc: 0.2,                  // mM

  productSizeMin: 50,             // bp
  productSizeMax: 10000,          // bp
  maxProducts: 10,
  reportThreshold: 70,            // min match % to report a binding

  circular: false,
  maxAmpliconForExtension: 3000,  // bp
});

/**
 * Merge user config with defaults.
 *
 * @param userConfig - Overrides; validated before merging
 * @returns Frozen, fully resolved configuration
 * @throws ConfigError on unknown keys (`ERR_CONFIG_UNKNOWN_KEY`) or invalid values (`ERR_CONFIG_INVALID`)
 */
export function resolveConfig(userConfig: unknown = {}): Readonly<InsilicoConfig> {
  const parsed = InsilicoConfigInputSchema.safeParse(userConfig);

  if (!parsed.success) {
    const unknownKeys = parsed.error.issues.flatMap(issue =>
      issue.code === 'unrecognized_keys' ? issue.keys : [],
    );
    if (unknownKeys.length > 0) {
      throw new ConfigError(
        `Unknown configuration option(s): ${unknownKeys.join(', ')}`,
        'ERR_CONFIG_UNKNOWN_KEY',
        { keys: unknownKeys },
      );
    }
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(
      `Invalid configuration: ${problems.join('; ')}`,
      'ERR_CONFIG_INVALID',
      { issues: problems },
    );
  }

  // explicit `undefined` keeps the default
  const overrides = Object.fromEntries(
    Object.entries(parsed.data).filter(([, value]) => value !== undefined),
  );
  const config = InsilicoConfigSchema.parse({ ...DEFAULT_INSILICO_CONFIG, ...overrides });

  if (config.productSizeMin > config.productSizeMax) {
    throw new ConfigError(
      `productSizeMin (${config.productSizeMin}) > productSizeMax (${config.productSizeMax})`,
      'ERR_CONFIG_INVALID',
      { productSizeMin: config.productSizeMin, productSizeMax: config.productSizeMax },
    );
  }

  return Object.freeze(config);
}

/**
 * Stable string identifying a resolved configuration, used in cache keys
 */
export function configKey(config: Readonly<InsilicoConfig>): string {
  const entries = Object.entries(config).sort(([a], [b]) => a.localeCompare(b));
  return JSON.stringify(entries);
}
