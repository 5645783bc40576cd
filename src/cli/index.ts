/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createScanCommand } from './commands/scan.js';
import { createClassifyCommand } from './commands/classify.js';
import { createStylesCommand } from './commands/styles.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('case-census')
    .description('Census of the case styles used by the exports of JavaScript libraries')
    .version(readVersion());
  [createScanCommand, createClassifyCommand, createStylesCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
