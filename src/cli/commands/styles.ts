/**
 * CLI command listing the style catalog in precedence order.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { STYLE_CATALOG } from '../../core/styles/catalog.js';

interface StylesCommandOptions {
  json?: boolean;
}

export function createStylesCommand(): Command {
  return new Command('styles')
    .description('List the recognized case styles, first match first')
    .option('--json', 'Output as JSON')
    .action((options: StylesCommandOptions) => {
      console.log(formatStyles(options));
    });
}

export function formatStyles(options: StylesCommandOptions = {}): string {
  if (options.json) {
    return JSON.stringify(
      STYLE_CATALOG.map((e, i) => ({ order: i + 1, label: e.label, pattern: e.pattern.source })),
      null,
      2
    );
  }

  const width = Math.max(...STYLE_CATALOG.map((e) => e.label.length));
  return STYLE_CATALOG.map(
    (e, i) => `${String(i + 1).padStart(2)}. ${e.label.padEnd(width)}  ${chalk.dim(e.pattern.source)}`
  ).join('\n');
}
