/**
 * Scan driver: loads each library, enumerates its exports and feeds them to
 * the census. Load failures are absorbed; one broken library never stops
 * the libraries after it.
 */
import { StyleCensus } from '../aggregate/census.js';
import { LibraryLoadError, errorMessage, isContractViolation } from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';
import type { ExportFilter, ExportedSymbol, ModuleLoader, ScanOptions, ScanResult } from './types.js';

const DUNDER = /^__.*__$/;

export const importModule: ModuleLoader = (name) => import(name);

/**
 * Own enumerable exports of a loaded library, minus dunder names, the
 * default export (unless asked for) and excluded names.
 */
export function exportedSymbols(namespace: unknown, filter: ExportFilter = {}): ExportedSymbol[] {
  if ((typeof namespace !== 'object' && typeof namespace !== 'function') || namespace === null) {
    return [];
  }
  const excluded = new Set(filter.excludeNames ?? []);
  const symbols: ExportedSymbol[] = [];
  for (const [name, value] of Object.entries(namespace)) {
    if (DUNDER.test(name)) continue;
    if (name === 'default' && !filter.includeDefaultExport) continue;
    if (excluded.has(name)) continue;
    symbols.push({ name, value });
  }
  return symbols;
}

/**
 * @throws LibraryLoadError when the loader rejects
 */
export async function loadLibrary(
  name: string,
  loader: ModuleLoader = importModule
): Promise<unknown> {
  try {
    return await loader(name);
  } catch (error) {
    throw new LibraryLoadError(name, errorMessage(error));
  }
}

/**
 * Scan libraries one after another and fold their exports into a census.
 */
export async function scanLibraries(
  names: Iterable<string>,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const log = options.logger ?? rootLogger;
  const result: ScanResult = {
    census: options.census ?? new StyleCensus(),
    scanned: [],
    failures: [],
    unclassified: [],
  };

  for (const library of names) {
    let namespace: unknown;
    try {
      namespace = await loadLibrary(library, options.loader);
    } catch (error) {
      if (!(error instanceof LibraryLoadError)) throw error;
      log.warn(`LIB IMPORT ERROR: ${error.message}`);
      result.failures.push(error);
      continue;
    }

    const symbols = exportedSymbols(namespace, options);
    for (const { name, value } of symbols) {
      try {
        result.census.record(library, value, name);
      } catch (error) {
        if (!isContractViolation(error) || options.strict) throw error;
        log.error(`Unclassified symbol ${library}.${name}: ${error.message}`);
        result.unclassified.push({ library, name, error });
      }
    }
    log.debug(`${library}: ${symbols.length} exported symbols`);
    result.scanned.push(library);
  }

  return result;
}
