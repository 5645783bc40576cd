/**
 * Identifier case classification against the style catalog.
 */
import { NoStyleMatchError, errorMessage } from '../../utils/errors.js';
import { STYLE_CATALOG, type StyleEntry, type StyleLabel } from './catalog.js';

export type ClassifyOutcome =
  | { name: string; style: StyleLabel }
  | { name: string; error: string };

export function stripLeadingUnderscores(identifier: string): string {
  return identifier.replace(/^_+/, '');
}

/**
 * Return the label of the first catalog entry that fully matches the
 * identifier once its leading underscores are removed.
 *
 * @throws NoStyleMatchError when no entry matches
 */
export function classify(
  identifier: string,
  catalog: readonly StyleEntry[] = STYLE_CATALOG
): StyleLabel {
  const core = stripLeadingUnderscores(identifier);
  for (const { pattern, label } of catalog) {
    if (pattern.test(core)) {
      return label;
    }
  }
  throw new NoStyleMatchError(identifier);
}

/**
 * Classify a batch. A failing name is reported in place rather than
 * aborting the rest.
 */
export function classifyAll(
  identifiers: readonly string[],
  catalog: readonly StyleEntry[] = STYLE_CATALOG
): ClassifyOutcome[] {
  return identifiers.map((name) => {
    try {
      return { name, style: classify(name, catalog) };
    } catch (error) {
      if (error instanceof NoStyleMatchError) {
        return { name, error: errorMessage(error) };
      }
      throw error;
    }
  });
}
