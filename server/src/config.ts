// ============================================
// Colony Configuration
// JSON file validated with zod; falls back to defaults on any failure
// ============================================

import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';
import { COLONY_CONSTANTS, Scent, type Dimension, type EntityKind, type Location } from '#shared';
import { logger } from './logger';
import { describeError } from './errors';

const DEFAULT_CONFIG_PATH = 'conf.json';

const Byte = z.number().int().min(0).max(255);
const Flag = z.object({ visible: z.boolean().default(false) }).default({});

const EnvironmentSchema = z
  .object({
    dimension: z.tuple([z.number().int().positive(), z.number().int().positive()]).default([30, 30]),
    tileSide: z.number().positive().default(25),
    background: z.tuple([Byte, Byte, Byte]).default([25, 75, 75]),
    grid: Flag,
    boundary: z.enum(['wrap', 'clamp']).default('wrap'),
  })
  .default({});

const NestSchema = z
  .object({
    visible: z.boolean().default(true),
    location: z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]).default([25, 25]),
  })
  .default({});

const AntsSchema = z
  .object({
    visible: z.boolean().default(true),
    count: z.number().int().nonnegative().default(10),
    memorySpan: z.number().int().nonnegative().default(30),
    maxPheroConcentration: z.number().int().nonnegative().max(COLONY_CONSTANTS.MAX_CONCENTRATION).default(200),
    pheroDecrease: z.number().int().nonnegative().max(COLONY_CONSTANTS.MAX_CONCENTRATION).default(2),
    pheroIncreaseRatio: z.number().nonnegative().default(0.1),
  })
  .default({});

const MorselsSchema = z
  .object({
    visible: z.boolean().default(true),
    count: z.number().int().nonnegative().default(20),
    storage: z.number().int().nonnegative().default(30),
  })
  .default({});

const PheromonesSchema = z
  .object({
    colony: Flag,
    food: Flag,
  })
  .default({});

export const ConfigSchema = z
  .object({
    // Target ticks per second; null runs unthrottled
    fps: z.number().positive().nullable().default(24),
    seed: z.number().int().nonnegative().default(0),
    // Iteration cap; null runs until all food is collected
    maxGenerations: z.number().int().positive().nullable().default(null),
    // Ticks between viewer snapshots
    broadcastInterval: z.number().int().positive().default(1),
    env: EnvironmentSchema,
    nest: NestSchema,
    ants: AntsSchema,
    morsels: MorselsSchema,
    pheromones: PheromonesSchema,
  })
  .superRefine((config, ctx) => {
    const [width, height] = config.env.dimension;
    const [x, y] = config.nest.location;
    if (x >= width || y >= height) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['nest', 'location'],
        message: `nest location (${x}, ${y}) lies outside the ${width}x${height} grid`,
      });
    }
  });

export type SimConfig = z.output<typeof ConfigSchema>;
export type SimConfigInput = z.input<typeof ConfigSchema>;

/**
 * The documented defaults
 */
export function defaultConfig(): SimConfig {
  return ConfigSchema.parse({});
}

/**
 * Validate raw configuration (throws ZodError on invalid input)
 */
export function parseConfig(input: unknown): SimConfig {
  return ConfigSchema.parse(input);
}

export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env.FORMICA_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return path.resolve(pathToUse);
}

/**
 * Load configuration from disk.
 * Any read, parse or validation failure is logged and the defaults are used.
 */
export async function loadConfig(explicitPath?: string): Promise<SimConfig> {
  const configPath = resolveConfigPath(explicitPath);
  try {
    const raw = await fs.readFile(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    const config = parseConfig(parsed);
    logger.info({ event: 'config_loaded', path: configPath }, `Parsed configuration from ${configPath}`);
    return config;
  } catch (error) {
    const { error: reason } = describeError(error);
    logger.warn(
      { event: 'config_fallback', path: configPath, error: reason },
      `Using default configuration: ${reason}`
    );
    return defaultConfig();
  }
}

// ============================================
// Accessors
// ============================================

export function gridDimension(config: SimConfig): Dimension {
  const [x, y] = config.env.dimension;
  return { x, y };
}

export function nestLocation(config: SimConfig): Location {
  const [x, y] = config.nest.location;
  return { x, y };
}

/**
 * Total food initially placed in the environment
 */
export function totalStorage(config: SimConfig): number {
  return config.morsels.count * config.morsels.storage;
}

/**
 * Presentation flag for an entity kind (trails are split by scent)
 */
export function isVisible(config: SimConfig, kind: EntityKind | 'grid', scent?: Scent): boolean {
  switch (kind) {
    case 'grid':
      return config.env.grid.visible;
    case 'ant':
      return config.ants.visible;
    case 'nest':
      return config.nest.visible;
    case 'morsel':
      return config.morsels.visible;
    case 'trail':
      return scent === Scent.FOOD ? config.pheromones.food.visible : config.pheromones.colony.visible;
  }
}
