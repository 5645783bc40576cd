/**
 * JSON output formatter for machine consumption.
 */
import type { CensusReport, IReportFormatter } from './types.js';

export class JsonFormatter implements IReportFormatter {
  private pretty: boolean;

  constructor(options: { pretty?: boolean } = {}) {
    this.pretty = options.pretty ?? true;
  }

  format(report: CensusReport): string {
    const output: Record<string, unknown> = {
      libraries: report.counts,
      conformance: report.conformance,
      overall: report.overall,
      examples: Object.fromEntries(report.examples.map((e) => [e.library, e.counts ?? null])),
      failures: report.failures,
      unclassified: report.unclassified,
    };
    if (report.membership) {
      output.membership = report.membership;
    }
    return this.pretty ? JSON.stringify(output, null, 2) : JSON.stringify(output);
  }
}
