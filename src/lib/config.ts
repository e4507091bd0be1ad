// pattern: Functional Core
// Environment-driven settings, parsed once at startup.

import { DEFAULT_WEIGHTS } from './heuristics';
import { DEFAULT_CACHE_TTL_MS } from './ttl-cache';
import type { WeightTable } from '../types';

/** Weight of an active heuristic that has no entry in the table. */
export const DEFAULT_WEIGHT = 0.7;

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

export type FeatureFlags = {
  readonly semanticScoring: boolean;
  readonly namedEntities: boolean;
};

export type TaggerConfig = {
  readonly weights: Readonly<Record<string, number>>;
  readonly features: FeatureFlags;
  /** Corroboration is enabled only when a User-Agent is configured */
  readonly musicbrainzUserAgent: string | null;
  readonly cacheTtlMs: number;
  /** SQLite file for cached lookups; null keeps them in memory */
  readonly cacheDbPath: string | null;
  readonly ytDlpPath: string;
};

type Env = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off', '']);

function checkWeight(variable: string, id: string, weight: number): void {
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new ConfigError(variable, `weight for "${id}" must be a positive number, got ${weight}`);
  }
}

/**
 * Parse "separator=1.2,last_word=0.4" into a weight map.
 */
export function parseWeightOverrides(text: string, variable = 'TAGGER_WEIGHTS'): Record<string, number> {
  const weights: Record<string, number> = {};

  for (const entry of text.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const match = /^([a-z_]+)\s*=\s*(\S+)$/i.exec(trimmed);
    if (!match) {
      throw new ConfigError(variable, `expected id=weight, got "${trimmed}"`);
    }
    const [, id = '', rawWeight = ''] = match;
    const weight = Number(rawWeight);
    checkWeight(variable, id, weight);
    weights[id] = weight;
  }

  return weights;
}

export function parseFlag(value: string | undefined, variable: string): boolean {
  const normalized = (value ?? '').trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigError(variable, `expected a boolean flag, got "${value}"`);
}

function parsePositiveInteger(value: string | undefined, variable: string, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(variable, `expected a positive integer, got "${value}"`);
  }
  return parsed;
}

function optional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Build the weight table for the active heuristics.
 *
 * Defaults come first, then overrides. Overrides for heuristics that are not
 * active are dropped with a warning; an active heuristic without any entry
 * weighs DEFAULT_WEIGHT.
 */
export function resolveWeights(
  activeIds: readonly string[],
  overrides: Readonly<Record<string, number>> = {}
): WeightTable {
  const active = new Set(activeIds);
  const table: Record<string, number> = {};

  for (const id of activeIds) {
    table[id] = DEFAULT_WEIGHTS[id] ?? DEFAULT_WEIGHT;
  }

  for (const [id, weight] of Object.entries(overrides)) {
    if (!active.has(id)) {
      console.warn(`ignoring weight for unknown heuristic "${id}"`);
      continue;
    }
    checkWeight('weights', id, weight);
    table[id] = weight;
  }

  return Object.freeze(table);
}

/**
 * Read settings from the environment. Throws ConfigError on the first invalid value.
 */
export function loadConfig(env: Env = process.env): TaggerConfig {
  return {
    weights: env['TAGGER_WEIGHTS'] ? parseWeightOverrides(env['TAGGER_WEIGHTS']) : {},
    features: {
      semanticScoring: parseFlag(env['TAGGER_SEMANTIC'], 'TAGGER_SEMANTIC'),
      namedEntities: parseFlag(env['TAGGER_NER'], 'TAGGER_NER'),
    },
    musicbrainzUserAgent: optional(env['MUSICBRAINZ_USER_AGENT']),
    cacheTtlMs: parsePositiveInteger(env['TAGGER_CACHE_TTL_MS'], 'TAGGER_CACHE_TTL_MS', DEFAULT_CACHE_TTL_MS),
    cacheDbPath: optional(env['TAGGER_CACHE_DB']),
    ytDlpPath: optional(env['YTDLP_PATH']) ?? 'yt-dlp',
  };
}
