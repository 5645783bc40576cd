/**
 * Formatter type definitions.
 */
import type { Conformance, CountTable, LibraryCounts, MembershipTable } from '../../core/aggregate/types.js';

export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
}

export interface ExampleSection {
  library: string;
  /** Undefined when the library contributed nothing */
  counts: LibraryCounts | undefined;
}

/**
 * Everything a scan produced, shaped for output.
 */
export interface CensusReport {
  counts: CountTable;
  conformance: Record<string, Conformance>;
  overall: Conformance;
  examples: ExampleSection[];
  /** Present only when membership output was requested */
  membership?: MembershipTable;
  failures: Array<{ library: string; message: string }>;
  unclassified: Array<{ library: string; name: string; code: string; message: string }>;
}

export interface IReportFormatter {
  format(report: CensusReport): string;
}
