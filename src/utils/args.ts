import chalk from 'chalk';
import type { DashboardDefaults } from '../config.js';
import { isGlyphSetName, isLayoutMode } from '../config.js';
import { CLI_COMMANDS, CLI_FLAGS, KEYBOARD_SHORTCUTS } from '../help/commands.js';
import type { Flags, GlyphSetName, LayoutMode, Subcommand } from '../types.js';
import { ConfigError } from './errors.js';

/**
 * Dashboard settings as given on the command line, merged over defaults.
 * Pattern names are resolved against the pattern store later.
 */
export interface CliOptions {
  titles: string[];
  units: string[];
  indices: number[];
  patternNames: string[];
  group: boolean;
  layout: LayoutMode;
  max?: number;
  updateInterval: number;
  capacity: number;
  barWidth: number;
  barGap: number;
  groupGap: number;
  glyphs: GlyphSetName;
  frameRate: number;
  tickRate: number;
  markerInterval: number;
}

export interface ParsedArgs {
  flags: Flags;
  subcommand?: Subcommand;
  options: CliOptions;
}

// Long names for short flags that take a value
const SHORT_VALUE_FLAGS: Record<string, string> = {
  '-t': '--title',
  '-u': '--unit',
  '-i': '--index',
  '-p': '--pattern',
  '-l': '--layout',
  '-m': '--max',
  '-f': '--frame-rate',
  '-n': '--name',
  '-r': '--regex',
};

function parseInteger(flag: string, raw: string, min: number): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${flag} expects an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parsePositive(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${flag} expects a positive number, got "${raw}"`);
  }
  return value;
}

function parseBoolean(flag: string, raw: string): boolean {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new ConfigError(`${flag} expects true or false, got "${raw}"`);
}

export function parseArgs(argv: readonly string[], defaults: DashboardDefaults): ParsedArgs {
  const flags: Flags = {};
  const positional: string[] = [];
  const options: CliOptions = {
    titles: [],
    units: [],
    indices: [],
    patternNames: [],
    group: false,
    layout: defaults.layout,
    updateInterval: defaults.updateInterval,
    capacity: defaults.capacity,
    barWidth: defaults.barWidth,
    barGap: defaults.barGap,
    groupGap: defaults.groupGap,
    glyphs: defaults.glyphs,
    frameRate: defaults.frameRate,
    tickRate: defaults.tickRate,
    markerInterval: defaults.markerInterval,
  };
  let name: string | undefined;
  let regex: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('-') || arg === '-') {
      positional.push(arg);
      continue;
    }

    // --flag=value
    const eq = arg.indexOf('=');
    let flag = eq > 0 && arg.startsWith('--') ? arg.slice(0, eq) : arg;
    const inline = eq > 0 && arg.startsWith('--') ? arg.slice(eq + 1) : undefined;
    flag = SHORT_VALUE_FLAGS[flag] ?? flag;

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined) {
        throw new ConfigError(`${flag} needs a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--help':
      case '-h':
        flags.help = true;
        break;
      case '--version':
      case '-v':
        flags.version = true;
        break;
      case '--group':
      case '-g':
        options.group = inline === undefined ? true : parseBoolean(flag, inline);
        break;
      case '--title':
        options.titles.push(value());
        break;
      case '--unit':
        options.units.push(value());
        break;
      case '--index':
        options.indices.push(parseInteger(flag, value(), 1));
        break;
      case '--pattern':
        options.patternNames.push(value());
        break;
      case '--layout': {
        const layout = value().toLowerCase();
        if (!isLayoutMode(layout)) {
          throw new ConfigError(`--layout must be horizontal, vertical or auto, got "${layout}"`);
        }
        options.layout = layout;
        break;
      }
      case '--glyphs': {
        const glyphs = value().toLowerCase();
        if (!isGlyphSetName(glyphs)) {
          throw new ConfigError(`--glyphs must be braille or blocks, got "${glyphs}"`);
        }
        options.glyphs = glyphs;
        break;
      }
      case '--max':
        options.max = parsePositive(flag, value());
        break;
      case '--update-frequency':
        options.updateInterval = parseInteger(flag, value(), 1);
        break;
      case '--capacity':
        options.capacity = parseInteger(flag, value(), 1);
        break;
      case '--bar-width':
        options.barWidth = parseInteger(flag, value(), 1);
        break;
      case '--bar-gap':
        options.barGap = parseInteger(flag, value(), 0);
        break;
      case '--group-gap':
        options.groupGap = parseInteger(flag, value(), 0);
        break;
      case '--frame-rate':
        options.frameRate = parsePositive(flag, value());
        break;
      case '--tick-rate':
        options.tickRate = parsePositive(flag, value());
        break;
      case '--name':
        name = value();
        break;
      case '--regex':
        regex = value();
        break;
      default:
        throw new ConfigError(`Unknown option ${arg}`);
    }
  }

  const modes = [options.units.length > 0, options.indices.length > 0, options.patternNames.length > 0];
  if (modes.filter(Boolean).length > 1) {
    throw new ConfigError('--unit, --index and --pattern cannot be combined');
  }

  return { flags, options, subcommand: parseSubcommand(positional, name, regex) };
}

function parseSubcommand(positional: string[], name: string | undefined, regex: string | undefined): Subcommand | undefined {
  const [command, ...rest] = positional;
  if (command === undefined) return undefined;
  if (rest.length > 0) {
    throw new ConfigError(`Unexpected argument "${rest[0]}"`);
  }

  switch (command) {
    case 'add':
      if (!name || regex === undefined) {
        throw new ConfigError('add needs --name and --regex');
      }
      return { kind: 'add', name, regex };
    case 'remove':
      if (!name) {
        throw new ConfigError('remove needs --name');
      }
      return { kind: 'remove', name };
    case 'list':
      return { kind: 'list' };
    default:
      throw new ConfigError(`Unknown command "${command}"`);
  }
}

export function printHelp(version: string): void {
  console.log(`
${chalk.green.bold('tapdash')} ${chalk.dim(`v${version}`)} - live bar charts from numbers on standard input

${chalk.bold('Usage:')}`);

  for (const cmd of CLI_COMMANDS) {
    console.log(`  ${cmd.command.padEnd(36)} ${chalk.dim(cmd.description)}`);
  }

  console.log(`
${chalk.bold('Options:')}`);
  for (const flag of CLI_FLAGS) {
    console.log(`  ${flag.flag.padEnd(28)} ${chalk.dim(flag.description)}`);
  }

  console.log(`
${chalk.bold('Keys:')}`);
  for (const shortcut of KEYBOARD_SHORTCUTS) {
    console.log(`  ${shortcut.key.padEnd(10)} ${chalk.dim(shortcut.description)}`);
  }

  console.log(`
${chalk.bold('Examples:')}
  ping example.com | tapdash -u ms -t "Latency"
  vmstat 1 | tapdash -i 13 -i 14 -t user -t system
  tapdash add -n rps -r "([0-9.]+) req/s" && tail -f app.log | tapdash -p rps
`);
}

export function printVersion(version: string): void {
  console.log(`tapdash v${version}`);
}
