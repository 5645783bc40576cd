/**
 * Human-readable nested dump of a census report.
 */
import chalk from 'chalk';
import type { Conformance, LibraryCounts, Member } from '../../core/aggregate/types.js';
import { STYLE_LABELS, type StyleLabel } from '../../core/styles/catalog.js';
import type { CensusReport, FormatOptions, IReportFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim' | 'bold';

const INDENT = '  ';

export class HumanFormatter implements IReportFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
    };
  }

  format(report: CensusReport): string {
    const lines: string[] = [];

    for (const library of Object.keys(report.counts).sort()) {
      lines.push(
        `${this.colorize(library, 'bold')} ${this.formatConformance(report.conformance[library])}`
      );
      lines.push(...this.formatCounts(report.counts[library], 1));
    }
    if (lines.length === 0) {
      lines.push(this.colorize('No symbols recorded.', 'dim'));
    }

    lines.push('');
    lines.push(`Overall ${this.formatConformance(report.overall)}`);

    for (const example of report.examples) {
      lines.push('');
      lines.push(this.colorize(`== ${example.library}`, 'cyan'));
      if (example.counts) {
        lines.push(...this.formatCounts(example.counts, 1));
      } else {
        lines.push(`${INDENT}${this.colorize('(not scanned)', 'dim')}`);
      }
    }

    if (report.membership) {
      lines.push('');
      lines.push(this.colorize('MEMBERS:', 'blue'));
      for (const library of Object.keys(report.membership).sort()) {
        lines.push(`${INDENT}${library}`);
        const byExpected = report.membership[library];
        for (const expected of sortedLabels(byExpected)) {
          lines.push(`${INDENT.repeat(2)}${expected}`);
          const byObserved = byExpected[expected] ?? {};
          for (const observed of sortedLabels(byObserved)) {
            const members = byObserved[observed] ?? [];
            lines.push(`${INDENT.repeat(3)}${observed}: ${members.map(formatMember).join(', ')}`);
          }
        }
      }
    }

    if (report.failures.length > 0) {
      lines.push('');
      lines.push(this.colorize(`LOAD FAILURES (${report.failures.length}):`, 'yellow'));
      for (const failure of report.failures) {
        lines.push(`${INDENT}${failure.library}: ${failure.message}`);
      }
    }

    if (report.unclassified.length > 0) {
      lines.push('');
      lines.push(this.colorize(`UNCLASSIFIED (${report.unclassified.length}):`, 'red'));
      for (const symbol of report.unclassified) {
        lines.push(`${INDENT}${symbol.library}.${symbol.name} [${symbol.code}] ${symbol.message}`);
      }
    }

    return lines.join('\n');
  }

  private formatCounts(counts: LibraryCounts, depth: number): string[] {
    const lines: string[] = [];
    for (const expected of sortedLabels(counts)) {
      lines.push(`${INDENT.repeat(depth)}${expected}`);
      const byObserved = counts[expected] ?? {};
      for (const observed of sortedLabels(byObserved)) {
        const text = `${observed}: ${byObserved[observed]}`;
        lines.push(
          `${INDENT.repeat(depth + 1)}${observed === expected ? this.colorize(text, 'green') : text}`
        );
      }
    }
    return lines;
  }

  private formatConformance(conformance: Conformance | undefined): string {
    if (!conformance) return '';
    const percent = (conformance.ratio * 100).toFixed(1);
    return this.colorize(`(${conformance.conforming}/${conformance.total} conforming, ${percent}%)`, 'dim');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}

/** Labels present in the table, in catalog precedence order. */
function sortedLabels<V>(table: Partial<Record<StyleLabel, V>>): StyleLabel[] {
  return STYLE_LABELS.filter((label) => table[label] !== undefined);
}

function formatMember(member: Member): string {
  return `${member.name} <${member.typeName}>`;
}
