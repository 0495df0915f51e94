import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '@/utils/logger';
import { BITS_PER_CHAR_OPTIONS, EncodingDefaults } from './GeocodeConstants';
import type { BoundaryPolicy, Coordinate } from './GridQuantizer';
import { type DecodedCode, decode, decodeExactly, encode } from './HilbertGeohash';

const bitsPerCharSchema = z.union([
  z.literal(BITS_PER_CHAR_OPTIONS[0]),
  z.literal(BITS_PER_CHAR_OPTIONS[1]),
  z.literal(BITS_PER_CHAR_OPTIONS[2]),
]);

// Schema for config/geocode.json
export const geocodeConfigSchema = z.object({
  defaults: z.object({
    precision: z.number().int().nonnegative(),
    bitsPerChar: bitsPerCharSchema,
  }),
  boundaryPolicy: z.enum(['clamp', 'reject']),
});

export type GeocodeConfig = z.infer<typeof geocodeConfigSchema>;

export interface GeocodeConfigOverrides {
  defaults?: Partial<GeocodeConfig['defaults']>;
  boundaryPolicy?: BoundaryPolicy;
}

export const DEFAULT_GEOCODE_CONFIG: GeocodeConfig = {
  defaults: {
    precision: EncodingDefaults.PRECISION,
    bitsPerChar: EncodingDefaults.BITS_PER_CHAR,
  },
  boundaryPolicy: 'clamp',
};

export const DEFAULT_CONFIG_PATH = './config/geocode.json';

// Singleton config instance
let loadedConfig: GeocodeConfig | null = null;

/**
 * Load geocode config from a JSON file.
 * Falls back to defaults if the file is missing or invalid.
 */
export function loadGeocodeConfig(configPath?: string): GeocodeConfig {
  const filePath = configPath || process.env.GEOCODE_CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const resolvedPath = path.resolve(filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    logger.warn({ error, path: resolvedPath }, 'Could not read geocode config, using defaults');
    loadedConfig = DEFAULT_GEOCODE_CONFIG;
    return DEFAULT_GEOCODE_CONFIG;
  }

  const parsed = geocodeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues, path: resolvedPath }, 'Invalid geocode config, using defaults');
    loadedConfig = DEFAULT_GEOCODE_CONFIG;
    return DEFAULT_GEOCODE_CONFIG;
  }

  logger.info(
    { path: resolvedPath, boundaryPolicy: parsed.data.boundaryPolicy },
    'Loaded geocode config'
  );
  loadedConfig = parsed.data;
  return parsed.data;
}

/**
 * Get the currently loaded config (loads it on first use)
 */
export function getGeocodeConfig(): GeocodeConfig {
  if (!loadedConfig) {
    return loadGeocodeConfig();
  }
  return loadedConfig;
}

/**
 * Reload config from disk
 */
export function reloadGeocodeConfig(configPath?: string): GeocodeConfig {
  loadedConfig = null;
  return loadGeocodeConfig(configPath);
}

/**
 * Override parts of the active config in-process, without touching disk.
 */
export function setGeocodeConfig(overrides: GeocodeConfigOverrides): GeocodeConfig {
  const current = getGeocodeConfig();
  const next = geocodeConfigSchema.parse({
    defaults: { ...current.defaults, ...overrides.defaults },
    boundaryPolicy: overrides.boundaryPolicy ?? current.boundaryPolicy,
  });
  loadedConfig = next;
  return next;
}

/**
 * Codec functions bound to a config's defaults and boundary policy.
 * encode/decode themselves never read the config; this is the opt-in path.
 */
export interface Geocoder {
  readonly config: GeocodeConfig;
  encode(lng: number, lat: number, precision?: number, bitsPerChar?: number): string;
  decode(code: string, bitsPerChar?: number): Coordinate;
  decodeExactly(code: string, bitsPerChar?: number): DecodedCode;
}

export function createGeocoder(config: GeocodeConfig = getGeocodeConfig()): Geocoder {
  const { precision: defaultPrecision, bitsPerChar: defaultBitsPerChar } = config.defaults;
  const options = { boundaryPolicy: config.boundaryPolicy };

  return {
    config,
    encode: (lng, lat, precision = defaultPrecision, bitsPerChar = defaultBitsPerChar) =>
      encode(lng, lat, precision, bitsPerChar, options),
    decode: (code, bitsPerChar = defaultBitsPerChar) => decode(code, bitsPerChar),
    decodeExactly: (code, bitsPerChar = defaultBitsPerChar) => decodeExactly(code, bitsPerChar),
  };
}
