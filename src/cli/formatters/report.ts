/**
 * Shapes a scan result into a report.
 */
import type { ScanResult } from '../../core/scan/types.js';
import type { Conformance } from '../../core/aggregate/types.js';
import type { CensusReport } from './types.js';

export interface ReportOptions {
  /** Libraries to dump on their own */
  examples?: readonly string[];
  /** Include the (type, name) membership sets */
  members?: boolean;
}

export function buildReport(result: ScanResult, options: ReportOptions = {}): CensusReport {
  const { census } = result;
  const conformance: Record<string, Conformance> = Object.fromEntries(
    census.libraries().map((library) => [library, census.conformance(library)])
  );

  return {
    counts: census.counts(),
    conformance,
    overall: census.conformance(),
    examples: (options.examples ?? []).map((library) => ({
      library,
      counts: census.libraryCounts(library),
    })),
    membership: options.members ? census.membership() : undefined,
    failures: result.failures.map((f) => ({ library: f.library, message: f.message })),
    unclassified: result.unclassified.map((u) => ({
      library: u.library,
      name: u.name,
      code: u.error.code,
      message: u.error.message,
    })),
  };
}
