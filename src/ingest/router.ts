/**
 * Sample router - turns one line of input into pushes on the series pool
 *
 * Three mutually exclusive modes, fixed at construction:
 * - units:      each unit label is a slot; "<number> <unit>" is matched per slot
 * - patterns:   each named regex is a slot; its first capture group is the value
 * - positional: whitespace tokens are parsed as numbers, optionally picked by
 *               1-based column index
 */

import type { PoolWriter } from '../stores/seriesStore.js';
import type { NamedPattern } from '../types.js';
import { ConfigError, describeError } from '../utils/errors.js';

// =============================================================================
// Types
// =============================================================================

export type RouterMode =
  | { kind: 'units'; units: readonly string[] }
  | { kind: 'patterns'; patterns: readonly NamedPattern[] }
  | { kind: 'positional'; indices?: readonly number[] };

export interface Sample {
  slot: number;
  value: number;
  unit?: string;
}

export interface Router {
  readonly mode: RouterMode['kind'];
  /** Number of series the pool should start with */
  readonly initialSlots: number;
  /** Extract samples from a line without touching the pool */
  extract(line: string): Sample[];
  /** Extract samples and push them; returns how many were recorded */
  route(line: string, writer: PoolWriter): number;
}

interface SlotMatcher {
  regex: RegExp;
  unit?: string;
}

// =============================================================================
// Number parsing
// =============================================================================

const NUMBER_TOKEN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const SPECIAL_TOKEN = /^([+-]?)(inf(?:inity)?|nan)$/i;

/**
 * Parse a whole token as a decimal number, or return undefined.
 * `inf`, `infinity` and `nan` are accepted in any case, with an optional sign.
 * Hex, empty strings and trailing garbage are rejected.
 */
export function parseNumberToken(token: string): number | undefined {
  const special = SPECIAL_TOKEN.exec(token);
  if (special) {
    if (special[2].toLowerCase() === 'nan') {
      return NaN;
    }
    return special[1] === '-' ? -Infinity : Infinity;
  }
  if (!NUMBER_TOKEN.test(token)) {
    return undefined;
  }
  return Number(token);
}

// =============================================================================
// Matchers
// =============================================================================

function compile(source: string, what: string): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (error) {
    throw new ConfigError(`Invalid ${what}: ${describeError(error)}`);
  }
}

/**
 * A number, optional whitespace, then the unit as a whole word.
 * The unit text is used as a regex fragment.
 */
export function unitMatcher(unit: string): SlotMatcher {
  if (unit.trim() === '') {
    throw new ConfigError('Unit labels must not be empty');
  }
  return {
    regex: compile(`\\b(\\d+(?:\\.\\d+)?)\\s*${unit}\\b`, `unit "${unit}"`),
    unit,
  };
}

export function patternMatcher(pattern: NamedPattern): SlotMatcher {
  const regex = compile(pattern.regex, `pattern "${pattern.name}"`);
  // A successful match against the empty alternative reveals the group count
  const groups = new RegExp(`${regex.source}|`).exec('');
  if (!groups || groups.length < 2) {
    throw new ConfigError(`Pattern "${pattern.name}" needs a capture group for the value`);
  }
  return { regex };
}

function matchSlots(matchers: readonly SlotMatcher[], line: string): Sample[] {
  const samples: Sample[] = [];
  matchers.forEach((matcher, slot) => {
    const captured = matcher.regex.exec(line)?.[1];
    if (captured === undefined) return;
    const value = parseNumberToken(captured.trim());
    if (value === undefined) return;
    samples.push({ slot, value, unit: matcher.unit });
  });
  return samples;
}

function extractPositional(line: string, indices: readonly number[] | undefined): Sample[] {
  const values = line
    .split(/\s+/)
    .filter(token => token !== '')
    .map(parseNumberToken)
    .filter((v): v is number => v !== undefined);

  if (!indices || indices.length === 0) {
    return values.map((value, slot) => ({ slot, value }));
  }

  // Out-of-range columns are skipped and the remaining picks fill successive slots
  return indices
    .map(index => values[index - 1])
    .filter((v): v is number => v !== undefined)
    .map((value, slot) => ({ slot, value }));
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build a router. All regexes compile here, so a bad configuration fails
 * before anything is read.
 */
export function createRouter(mode: RouterMode): Router {
  let extract: (line: string) => Sample[];
  let initialSlots: number;

  switch (mode.kind) {
    case 'units': {
      if (mode.units.length === 0) {
        throw new ConfigError('Unit mode needs at least one unit');
      }
      const matchers = mode.units.map(unitMatcher);
      extract = line => matchSlots(matchers, line);
      initialSlots = matchers.length;
      break;
    }
    case 'patterns': {
      if (mode.patterns.length === 0) {
        throw new ConfigError('Pattern mode needs at least one pattern');
      }
      const matchers = mode.patterns.map(patternMatcher);
      extract = line => matchSlots(matchers, line);
      initialSlots = matchers.length;
      break;
    }
    case 'positional': {
      const indices = mode.indices;
      for (const index of indices ?? []) {
        if (!Number.isInteger(index) || index < 1) {
          throw new ConfigError(`Column indices are 1-based, got ${index}`);
        }
      }
      extract = line => extractPositional(line, indices);
      initialSlots = indices && indices.length > 0 ? indices.length : 1;
      break;
    }
  }

  return {
    mode: mode.kind,
    initialSlots,
    extract,
    route(line, writer) {
      const samples = extract(line);
      for (const sample of samples) {
        writer.push(sample.slot, sample.value, sample.unit);
      }
      return samples.length;
    },
  };
}
