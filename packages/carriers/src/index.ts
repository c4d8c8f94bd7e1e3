import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseEngineConfig, type EngineConfig } from '@protrace/core';

/**
 * Seed carrier profiles
 *
 * Endpoints and form fields were gathered from the carriers' public tracking pages and
 * are not a stable contract; expect to override them.
 */
export const SEED_CONFIG_PATH = fileURLToPath(new URL('../config/carriers.json', import.meta.url));

export function readSeedConfig(): unknown {
  return JSON.parse(readFileSync(SEED_CONFIG_PATH, 'utf8'));
}

/**
 * Validated seed configuration. Top-level sections of `overrides` replace the seed's.
 */
export function loadSeedConfig(overrides: Record<string, unknown> = {}): EngineConfig {
  const seed = readSeedConfig();
  const base = seed !== null && typeof seed === 'object' ? seed : {};
  return parseEngineConfig({ ...base, ...overrides });
}
