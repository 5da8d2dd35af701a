/**
 * Pattern Store - named value-extraction regexes saved on disk
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import type { NamedPattern } from '../types.js';
import { patternMatcher } from '../ingest/router.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { log } from '../utils/logger.js';

interface StoredPatterns {
  patterns: Record<string, string>;
}

export function defaultPatternFile(storageDir: string): string {
  return join(storageDir, 'patterns.json');
}

export class PatternStore {
  constructor(private readonly file: string) {}

  list(): NamedPattern[] {
    const { patterns } = this.load();
    return Object.keys(patterns)
      .sort()
      .map(name => ({ name, regex: patterns[name] }));
  }

  get(name: string): NamedPattern | undefined {
    const regex = this.load().patterns[name];
    return regex === undefined ? undefined : { name, regex };
  }

  /**
   * Look up every name, failing on the first unknown one
   */
  resolve(names: readonly string[]): NamedPattern[] {
    return names.map(name => {
      const pattern = this.get(name);
      if (!pattern) {
        throw new ConfigError(`Unknown pattern "${name}". Run "tapdash list" to see saved patterns.`);
      }
      return pattern;
    });
  }

  /**
   * Save a pattern, replacing any pattern with the same name
   */
  add(name: string, regex: string): NamedPattern {
    if (name.trim() === '') {
      throw new ConfigError('Pattern name must not be empty');
    }
    const pattern = { name, regex };
    patternMatcher(pattern);

    const stored = this.load();
    stored.patterns[name] = regex;
    this.save(stored);
    log.info('Pattern saved', { name });
    return pattern;
  }

  remove(name: string): boolean {
    const stored = this.load();
    if (!(name in stored.patterns)) {
      return false;
    }
    delete stored.patterns[name];
    this.save(stored);
    log.info('Pattern removed', { name });
    return true;
  }

  private load(): StoredPatterns {
    if (!existsSync(this.file)) {
      return { patterns: {} };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.file, 'utf8'));
    } catch (error) {
      throw new ConfigError(`${this.file}: ${describeError(error)}`);
    }

    const patterns: Record<string, string> = {};
    const raw = typeof parsed === 'object' && parsed !== null && 'patterns' in parsed ? parsed.patterns : undefined;
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigError(`${this.file}: expected {"patterns": {...}}`);
    }
    for (const [name, regex] of Object.entries(raw)) {
      if (typeof regex !== 'string') {
        throw new ConfigError(`${this.file}: pattern "${name}" is not a string`);
      }
      patterns[name] = regex;
    }
    return { patterns };
  }

  private save(stored: StoredPatterns): void {
    mkdirSync(dirname(this.file), { recursive: true });
    writeFileSync(this.file, JSON.stringify(stored, null, 2) + '\n');
  }
}
