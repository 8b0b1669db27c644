/**
 * Rating Engine Configuration Loader
 *
 * Loads config/rating-engine.yml and validates it. Any key left out of the YAML
 * takes the default declared in the schema below.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from '../errors';

const positive = z.number().positive();

const rankDecaySchema = (weight: number) =>
  z
    .object({
      weight: z.number().nonnegative().default(weight),
      decay: positive.default(25),
    })
    .default({});

export const EngineConfigSchema = z.object({
  elo: z
    .object({
      k_factor: positive.default(32),
      rating_scale: positive.default(400),
      home_field_advantage: z.number().nonnegative().default(65),
      max_mov_multiplier: positive.default(2.5),
      mov_gap_damping: positive.default(2.2),
      tier_multipliers: z
        .object({
          P5_G5: positive.default(0.9),
          G5_P5: positive.default(1.1),
          P5_FCS: positive.default(0.5),
          G5_FCS: positive.default(0.6),
          FCS_P5: positive.default(1.5),
          FCS_G5: positive.default(1.25),
        })
        .default({}),
    })
    .default({}),
  preseason: z
    .object({
      baseline: positive.default(1500),
      tier_offsets: z
        .object({
          P5: z.number().default(0),
          G5: z.number().default(0),
          FCS: z.number().default(-200),
        })
        .default({}),
      unknown_rank: z.number().int().positive().default(999),
      recruiting: rankDecaySchema(200),
      transfer: rankDecaySchema(100),
      returning_production: z
        .object({
          weight: z.number().nonnegative().default(80),
          midpoint: z.number().min(0).max(1).default(0.5),
        })
        .default({}),
      clamp_band: positive.default(300),
    })
    .default({}),
  season: z
    .object({
      min_week: z.number().int().nonnegative().default(0),
      max_week: z.number().int().positive().default(20),
    })
    .default({})
    .refine(s => s.min_week <= s.max_week, { message: 'min_week must not exceed max_week' }),
  sos: z
    .object({
      neutral_value: z.number().default(1500),
    })
    .default({}),
  prediction: z
    .object({
      base_score: z.number().nonnegative().default(30),
      points_per_100: z.number().nonnegative().default(3.5),
      max_score: positive.default(150),
      confidence: z
        .object({
          high: z.number().min(0.5).max(1).default(0.8),
          medium: z.number().min(0.5).max(1).default(0.65),
        })
        .default({}),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Validate a parsed config object, naming the first offending key on failure
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.join('.') || '(root)';
    throw new ConfigError(`Invalid rating engine config at "${key}": ${issue.message}`);
  }
  return result.data;
}

/**
 * All-defaults configuration, independent of any file on disk
 */
export function defaultEngineConfig(): EngineConfig {
  return parseEngineConfig({});
}

export function resolveConfigPath(): string {
  return process.env.RATING_ENGINE_CONFIG ?? path.join(__dirname, '../../config/rating-engine.yml');
}

let cachedConfig: EngineConfig | null = null;

/**
 * Load engine configuration from YAML (cached after the first successful load)
 */
export function loadEngineConfig(configPath: string = resolveConfigPath()): EngineConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read rating engine config ${configPath}: ${reason}`);
  }

  cachedConfig = parseEngineConfig(yaml.load(content));
  return cachedConfig;
}

export function getEngineConfig(): EngineConfig {
  return loadEngineConfig();
}

/**
 * Clear the cached configuration (useful for testing)
 */
export function clearEngineConfigCache(): void {
  cachedConfig = null;
}
