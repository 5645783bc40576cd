/**
 * CLI command that classifies identifiers given on the command line.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { classifyAll, type ClassifyOutcome } from '../../core/styles/classifier.js';
import { logger } from '../../utils/logger.js';

interface ClassifyCommandOptions {
  json?: boolean;
}

export function createClassifyCommand(): Command {
  return new Command('classify')
    .description('Print the case style of each identifier')
    .argument('<names...>', 'Identifiers to classify')
    .option('--json', 'Output as JSON')
    .action((names: string[], options: ClassifyCommandOptions) => {
      const outcomes = runClassify(names, options);
      if (outcomes.some((o) => 'error' in o)) {
        process.exit(1);
      }
    });
}

export function runClassify(names: string[], options: ClassifyCommandOptions = {}): ClassifyOutcome[] {
  const outcomes = classifyAll(names);

  if (options.json) {
    console.log(JSON.stringify(outcomes, null, 2));
    return outcomes;
  }

  const width = Math.max(0, ...names.map((n) => n.length));
  for (const outcome of outcomes) {
    if ('error' in outcome) {
      logger.error(outcome.error);
    } else {
      console.log(`${outcome.name.padEnd(width)}  ${chalk.cyan(outcome.style)}`);
    }
  }
  return outcomes;
}
