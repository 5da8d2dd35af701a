import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PatternStore, defaultPatternFile } from '../patternStore.js';
import { ConfigError } from '../../utils/errors.js';

describe('PatternStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tapdash-patterns-'));
    file = defaultPatternFile(join(dir, 'home'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('is empty before anything is saved', () => {
    expect(new PatternStore(file).list()).toEqual([]);
  });

  it('saves patterns to disk and lists them by name', () => {
    const store = new PatternStore(file);
    store.add('rps', '([0-9.]+) req/s');
    store.add('errors', 'errors=(\\d+)');

    expect(new PatternStore(file).list()).toEqual([
      { name: 'errors', regex: 'errors=(\\d+)' },
      { name: 'rps', regex: '([0-9.]+) req/s' },
    ]);
    expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual({
      patterns: { rps: '([0-9.]+) req/s', errors: 'errors=(\\d+)' },
    });
  });

  it('replaces a pattern with the same name', () => {
    const store = new PatternStore(file);
    store.add('rps', '(\\d+) rps');
    store.add('rps', '(\\d+) req/s');
    expect(store.get('rps')).toEqual({ name: 'rps', regex: '(\\d+) req/s' });
  });

  it('resolves names in the order given', () => {
    const store = new PatternStore(file);
    store.add('a', 'a=(\\d+)');
    store.add('b', 'b=(\\d+)');
    expect(store.resolve(['b', 'a']).map(p => p.name)).toEqual(['b', 'a']);
    expect(() => store.resolve(['c'])).toThrow('Unknown pattern "c". Run "tapdash list" to see saved patterns.');
  });

  it('removes patterns', () => {
    const store = new PatternStore(file);
    store.add('a', 'a=(\\d+)');
    expect(store.remove('a')).toBe(true);
    expect(store.remove('a')).toBe(false);
    expect(store.list()).toEqual([]);
  });

  it('refuses patterns that cannot extract a value', () => {
    const store = new PatternStore(file);
    expect(() => store.add('bad', '\\d+')).toThrow(ConfigError);
    expect(() => store.add('', '(\\d+)')).toThrow('Pattern name must not be empty');
    expect(store.list()).toEqual([]);
  });

  it('fails on a malformed file', () => {
    writeFileSync(join(dir, 'broken.json'), JSON.stringify({ patterns: { a: 1 } }));
    expect(() => new PatternStore(join(dir, 'broken.json')).list()).toThrow('pattern "a" is not a string');

    writeFileSync(join(dir, 'flat.json'), JSON.stringify(['a']));
    expect(() => new PatternStore(join(dir, 'flat.json')).list()).toThrow(ConfigError);
  });
});
