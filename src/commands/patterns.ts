import chalk from 'chalk';
import type { PatternStore } from '../stores/patternStore.js';
import type { Subcommand } from '../types.js';

/**
 * Run a pattern subcommand; returns the process exit code
 */
export function runPatternCommand(store: PatternStore, command: Subcommand, out: (line: string) => void = console.log): number {
  switch (command.kind) {
    case 'add': {
      const pattern = store.add(command.name, command.regex);
      out(`${chalk.green('✓')} Saved pattern ${chalk.bold(pattern.name)}`);
      return 0;
    }
    case 'remove':
      if (!store.remove(command.name)) {
        out(`${chalk.red('✗')} No pattern named ${chalk.bold(command.name)}`);
        return 1;
      }
      out(`${chalk.green('✓')} Removed pattern ${chalk.bold(command.name)}`);
      return 0;
    case 'list': {
      const patterns = store.list();
      if (patterns.length === 0) {
        out(chalk.dim('No saved patterns. Add one with: tapdash add -n <name> -r <regex>'));
        return 0;
      }
      const width = Math.max(...patterns.map(p => p.name.length));
      for (const pattern of patterns) {
        out(`${pattern.name.padEnd(width)}  ${pattern.regex}`);
      }
      return 0;
    }
  }
}
