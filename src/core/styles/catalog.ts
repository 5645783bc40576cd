/**
 * The case style catalog.
 *
 * Entries are evaluated in order and the first full match wins, so the order
 * below decides every overlap (`barry_as_FLUFL` is both `snake_case`-ish and
 * `changing_CASE`-ish). Reordering changes classification results.
 */

export const STYLE_LABELS = [
  'MixedCase',
  'snake_case',
  'camelCase',
  'Mixed_snake_case',
  'UPPER_CASE',
  'Mixed_Snake_Case',
  'snakeCamel_case',
  'changing_CASE',
  'Py_CASES',
  'LOWFINAL_CAse',
  'VERSIONv1.1_CASE',
  '_',
] as const;

export type StyleLabel = (typeof STYLE_LABELS)[number];

export interface StyleEntry {
  readonly label: StyleLabel;
  /** Anchored, case-sensitive pattern over an identifier without leading underscores */
  readonly pattern: RegExp;
}

function entry(label: StyleLabel, body: string): StyleEntry {
  return Object.freeze({ label, pattern: new RegExp(`^(?:${body})$`) });
}

export const STYLE_CATALOG: readonly StyleEntry[] = Object.freeze([
  entry('MixedCase', '[A-Z][a-z0-9]*([A-Z][a-z0-9]*)*'),
  entry('snake_case', '[a-z_0-9]+'),
  entry('camelCase', '[a-z0-9]+([A-Z][a-z0-9]*)*'),
  entry('Mixed_snake_case', '[A-Z][a-z0-9]*(_[a-z0-9]+)*'),
  entry('UPPER_CASE', '[A-Z0-9_]+'),
  entry('Mixed_Snake_Case', '[A-Z][a-z0-9]*(_[A-Z][a-z0-9]*)*'),
  entry(
    'snakeCamel_case',
    '([a-z0-9]+[A-Z][a-z0-9]+|[a-z0-9]+)(_([a-z0-9]+[A-Z][a-z0-9]+|[a-z0-9]+))+'
  ),
  entry('changing_CASE', '([a-z0-9]+|[A-Z0-9]+)(_([a-z0-9]+|[A-Z0-9]+))+'),
  // Special cases
  entry('Py_CASES', 'Py[A-Z0-9]*(_([A-Z0-9]+|[A-Z0-9]+))+'),
  entry('LOWFINAL_CAse', '[A-Z0-9]*(_([A-Z0-9]+|[A-Z0-9]+))*_[A-Z0-9]+[_a-z0-9]+'),
  entry('VERSIONv1.1_CASE', '[A-Z0-9_]+v[0-9.]+[_A-Z0-9]+'),
  // Only an identifier made of underscores gets here
  entry('_', ''),
]);

/**
 * Labels in precedence order.
 */
export function styleLabels(): StyleLabel[] {
  return STYLE_CATALOG.map((e) => e.label);
}

/**
 * Look up the catalog entry for a label.
 */
export function findStyle(label: string): StyleEntry | undefined {
  return STYLE_CATALOG.find((e) => e.label === label);
}

export function isStyleLabel(value: string): value is StyleLabel {
  return STYLE_CATALOG.some((e) => e.label === value);
}
