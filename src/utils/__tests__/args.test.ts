import { describe, it, expect } from 'vitest';
import { parseArgs } from '../args.js';
import { BUILTIN_DEFAULTS } from '../../config.js';
import { ConfigError } from '../errors.js';

describe('parseArgs', () => {
  it('starts from the defaults', () => {
    const { flags, options, subcommand } = parseArgs([], BUILTIN_DEFAULTS);
    expect(flags).toEqual({});
    expect(subcommand).toBeUndefined();
    expect(options).toMatchObject({
      titles: [],
      units: [],
      indices: [],
      patternNames: [],
      group: false,
      layout: 'auto',
      capacity: 200,
      updateInterval: 1000,
      glyphs: 'braille',
    });
    expect(options.max).toBeUndefined();
  });

  it('reads short, long and inline flags', () => {
    const { options } = parseArgs(
      ['-u', 'ms', '-u', 'kb', '-t', 'Latency', '--max=50', '-l', 'Vertical', '--bar-gap', '1', '-g'],
      BUILTIN_DEFAULTS
    );
    expect(options.units).toEqual(['ms', 'kb']);
    expect(options.titles).toEqual(['Latency']);
    expect(options.max).toBe(50);
    expect(options.layout).toBe('vertical');
    expect(options.barGap).toBe(1);
    expect(options.group).toBe(true);
  });

  it('reads boolean and rate flags', () => {
    const { options } = parseArgs(['--group=false', '-f', '30', '--tick-rate', '2.5', '--glyphs', 'blocks'], BUILTIN_DEFAULTS);
    expect(options.group).toBe(false);
    expect(options.frameRate).toBe(30);
    expect(options.tickRate).toBe(2.5);
    expect(options.glyphs).toBe('blocks');
  });

  it('reads help and version flags', () => {
    expect(parseArgs(['-h'], BUILTIN_DEFAULTS).flags).toEqual({ help: true });
    expect(parseArgs(['--version'], BUILTIN_DEFAULTS).flags).toEqual({ version: true });
  });

  it('rejects mixing extraction modes', () => {
    expect(() => parseArgs(['-u', 'ms', '-i', '2'], BUILTIN_DEFAULTS)).toThrow(
      '--unit, --index and --pattern cannot be combined'
    );
  });

  it('rejects bad values', () => {
    expect(() => parseArgs(['-i', '0'], BUILTIN_DEFAULTS)).toThrow('--index expects an integer >= 1, got "0"');
    expect(() => parseArgs(['--max', '-3'], BUILTIN_DEFAULTS)).toThrow(ConfigError);
    expect(() => parseArgs(['--layout', 'grid'], BUILTIN_DEFAULTS)).toThrow(ConfigError);
    expect(() => parseArgs(['--capacity'], BUILTIN_DEFAULTS)).toThrow('--capacity needs a value');
    expect(() => parseArgs(['--nope'], BUILTIN_DEFAULTS)).toThrow('Unknown option --nope');
  });

  describe('subcommands', () => {
    it('parses add, remove and list', () => {
      expect(parseArgs(['add', '-n', 'rps', '-r', '(\\d+) req/s'], BUILTIN_DEFAULTS).subcommand).toEqual({
        kind: 'add',
        name: 'rps',
        regex: '(\\d+) req/s',
      });
      expect(parseArgs(['remove', '--name', 'rps'], BUILTIN_DEFAULTS).subcommand).toEqual({ kind: 'remove', name: 'rps' });
      expect(parseArgs(['list'], BUILTIN_DEFAULTS).subcommand).toEqual({ kind: 'list' });
    });

    it('rejects incomplete or unknown commands', () => {
      expect(() => parseArgs(['add', '-n', 'rps'], BUILTIN_DEFAULTS)).toThrow('add needs --name and --regex');
      expect(() => parseArgs(['remove'], BUILTIN_DEFAULTS)).toThrow('remove needs --name');
      expect(() => parseArgs(['list', 'extra'], BUILTIN_DEFAULTS)).toThrow('Unexpected argument "extra"');
      expect(() => parseArgs(['draw'], BUILTIN_DEFAULTS)).toThrow('Unknown command "draw"');
    });
  });
});
