/**
 * CLI command that scans libraries and prints the case style census.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { builtinLibraryNames, readLibraryList } from '../../core/scan/libraries.js';
import { scanLibraries } from '../../core/scan/driver.js';
import type { ModuleLoader } from '../../core/scan/types.js';
import { buildReport, createFormatter, type CensusReport } from '../formatters/index.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

export interface ScanCommandOptions {
  builtins?: boolean;
  json?: boolean;
  members?: boolean;
  strict?: boolean;
  includeDefault?: boolean;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
}

export interface ScanDependencies {
  loader?: ModuleLoader;
  projectRoot?: string;
}

export function createScanCommand(): Command {
  return new Command('scan')
    .description('Classify the case style of every exported symbol of a list of libraries')
    .argument('[list-file]', 'Newline-delimited list of libraries (default: libraries_file from config)')
    .option('--builtins', 'Scan the Node.js built-in modules instead of a list file')
    .option('--json', 'Output as JSON')
    .option('--members', 'Include the (type, name) members of every table cell')
    .option('--strict', 'Abort on the first symbol that cannot be classified')
    .option('--include-default', 'Count the default export of each library')
    .option('-c, --config <path>', 'Path to config file')
    .option('--no-color', 'Disable colored output')
    .option('-v, --verbose', 'Log every scanned library')
    .option('-q, --quiet', 'Only log errors')
    .action(async (listFile: string | undefined, options: ScanCommandOptions) => {
      try {
        await runScan(listFile, options);
      } catch (error) {
        logger.error(errorMessage(error), error);
        process.exit(1);
      }
    });
}

function applyLogLevel(config: Config, options: ScanCommandOptions): void {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  } else if (options.json && (config.log_level === 'debug' || config.log_level === 'info')) {
    logger.setLevel('warn');
  } else {
    logger.setLevel(config.log_level);
  }
}

async function resolveLibraries(
  listFile: string | undefined,
  options: ScanCommandOptions,
  config: Config,
  projectRoot: string
): Promise<string[]> {
  if (options.builtins) {
    return builtinLibraryNames();
  }
  return readLibraryList(path.resolve(projectRoot, listFile ?? config.libraries_file));
}

/**
 * Run a scan, print the report and return it.
 */
export async function runScan(
  listFile: string | undefined,
  options: ScanCommandOptions,
  deps: ScanDependencies = {}
): Promise<CensusReport> {
  const projectRoot = deps.projectRoot ?? process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  applyLogLevel(config, options);

  const libraries = await resolveLibraries(listFile, options, config, projectRoot);
  logger.debug(`Scanning ${libraries.length} libraries`);

  const result = await scanLibraries(libraries, {
    loader: deps.loader,
    strict: options.strict ?? config.scan.strict,
    includeDefaultExport: options.includeDefault ?? config.scan.include_default_export,
    excludeNames: config.scan.exclude_names,
  });

  const report = buildReport(result, {
    examples: config.examples,
    members: options.members ?? false,
  });
  const formatter = createFormatter(options.json ? 'json' : 'human', options.color ?? true);
  console.log(formatter.format(report));

  if (!options.json) {
    logger.success(
      `Scanned ${result.scanned.length}/${libraries.length} libraries, ${result.census.total} symbols`
    );
  }
  return report;
}
