import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { ConfigError, describeError } from './utils/errors.js';
import type { GlyphSetName, LayoutMode } from './types.js';

// =============================================================================
// Configuration - defaults, ~/.tapdash/config.json, then TAPDASH_* env vars
// =============================================================================

export interface DashboardDefaults {
  capacity: number;
  updateInterval: number;
  frameRate: number;
  tickRate: number;
  layout: LayoutMode;
  barWidth: number;
  barGap: number;
  groupGap: number;
  markerInterval: number;
  glyphs: GlyphSetName;
}

export interface Config {
  storageDir: string;
  version: string;
  defaults: DashboardDefaults;
}

export const BUILTIN_DEFAULTS: DashboardDefaults = {
  capacity: 200,
  updateInterval: 1000,
  frameRate: 10,
  tickRate: 4,
  layout: 'auto',
  barWidth: 1,
  barGap: 0,
  groupGap: 0,
  markerInterval: 30,
  glyphs: 'braille',
};

const LAYOUTS: readonly LayoutMode[] = ['horizontal', 'vertical', 'auto'];
const GLYPH_SETS: readonly GlyphSetName[] = ['braille', 'blocks'];

export function isLayoutMode(value: string): value is LayoutMode {
  return LAYOUTS.some(l => l === value);
}

export function isGlyphSetName(value: string): value is GlyphSetName {
  return GLYPH_SETS.some(g => g === value);
}

function readCount(source: string, key: string, value: unknown, allowZero: boolean): number {
  const min = allowZero ? 0 : 1;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${source}: "${key}" must be an integer >= ${min}`);
  }
  return value;
}

/**
 * Merge a partial, untrusted settings object over the defaults.
 * Unknown keys are ignored; known keys with the wrong type are fatal.
 */
export function mergeDefaults(
  base: DashboardDefaults,
  overrides: Record<string, unknown>,
  source: string
): DashboardDefaults {
  const merged = { ...base };

  for (const [key, value] of Object.entries(overrides)) {
    switch (key) {
      case 'capacity':
      case 'updateInterval':
      case 'frameRate':
      case 'tickRate':
      case 'barWidth':
      case 'markerInterval':
        merged[key] = readCount(source, key, value, false);
        break;
      case 'barGap':
      case 'groupGap':
        merged[key] = readCount(source, key, value, true);
        break;
      case 'layout':
        if (typeof value !== 'string' || !isLayoutMode(value)) {
          throw new ConfigError(`${source}: "layout" must be one of ${LAYOUTS.join(', ')}`);
        }
        merged.layout = value;
        break;
      case 'glyphs':
        if (typeof value !== 'string' || !isGlyphSetName(value)) {
          throw new ConfigError(`${source}: "glyphs" must be one of ${GLYPH_SETS.join(', ')}`);
        }
        merged.glyphs = value;
        break;
    }
  }

  return merged;
}

function readConfigFile(configFile: string): Record<string, unknown> {
  if (!existsSync(configFile)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configFile, 'utf8'));
  } catch (error) {
    throw new ConfigError(`${configFile}: ${describeError(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${configFile}: expected a JSON object`);
  }
  return { ...parsed };
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const numeric: Array<[string, keyof DashboardDefaults]> = [
    ['TAPDASH_CAPACITY', 'capacity'],
    ['TAPDASH_UPDATE_FREQUENCY', 'updateInterval'],
    ['TAPDASH_FRAME_RATE', 'frameRate'],
  ];

  for (const [name, key] of numeric) {
    const raw = env[name];
    if (raw !== undefined && raw !== '') {
      overrides[key] = Number(raw);
    }
  }
  if (env.TAPDASH_LAYOUT) overrides.layout = env.TAPDASH_LAYOUT;
  if (env.TAPDASH_GLYPHS) overrides.glyphs = env.TAPDASH_GLYPHS;

  return overrides;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): Config {
  const storageDir = env.TAPDASH_HOME || join(home, '.tapdash');
  const configFile = join(storageDir, 'config.json');

  // Config file first, environment variables take precedence over it
  const fromFile = mergeDefaults(BUILTIN_DEFAULTS, readConfigFile(configFile), configFile);
  const defaults = mergeDefaults(fromFile, readEnvOverrides(env), 'environment');

  return {
    storageDir,
    version: '0.3.0',
    defaults,
  };
}

let cachedConfig: Config | null = null;

/**
 * Process-wide configuration, loaded on first use
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
