/**
 * Scan driver types.
 */
import type { StyleCensus } from '../aggregate/census.js';
import type { LibraryLoadError, NoExpectedStyleError, NoStyleMatchError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

/** Loads a library by name and resolves to its namespace. */
export type ModuleLoader = (name: string) => Promise<unknown>;

export interface ExportedSymbol {
  name: string;
  value: unknown;
}

export interface ExportFilter {
  /** Keep the `default` export (default: false) */
  includeDefaultExport?: boolean;
  /** Names to skip */
  excludeNames?: readonly string[];
}

export interface ScanOptions extends ExportFilter {
  loader?: ModuleLoader;
  /** Rethrow the first unclassifiable symbol instead of recording it */
  strict?: boolean;
  /** Census to fold into; a fresh one is created otherwise */
  census?: StyleCensus;
  logger?: Logger;
}

export interface UnclassifiedSymbol {
  library: string;
  name: string;
  error: NoStyleMatchError | NoExpectedStyleError;
}

export interface ScanResult {
  census: StyleCensus;
  /** Libraries scanned successfully, in scan order */
  scanned: string[];
  failures: LibraryLoadError[];
  unclassified: UnclassifiedSymbol[];
}
