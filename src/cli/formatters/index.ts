export * from './types.js';
export * from './report.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';

import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { IReportFormatter, OutputFormat } from './types.js';

export function createFormatter(format: OutputFormat, colors: boolean = true): IReportFormatter {
  return format === 'json' ? new JsonFormatter() : new HumanFormatter({ colors });
}
