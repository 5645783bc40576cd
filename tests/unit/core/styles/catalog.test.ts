/**
 * Tests for the style catalog.
 */
import { describe, it, expect } from 'vitest';
import {
  STYLE_CATALOG,
  STYLE_LABELS,
  findStyle,
  isStyleLabel,
  styleLabels,
} from '../../../../src/core/styles/catalog.js';

describe('STYLE_CATALOG', () => {
  it('should list the labels in precedence order', () => {
    expect(styleLabels()).toEqual([
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
    ]);
    expect(styleLabels()).toEqual([...STYLE_LABELS]);
  });

  it('should end with the empty fallback pattern', () => {
    expect(STYLE_CATALOG[STYLE_CATALOG.length - 1].pattern.source).toBe('^(?:)$');
  });

  it('should anchor every pattern', () => {
    for (const entry of STYLE_CATALOG) {
      expect(entry.pattern.source.startsWith('^(?:')).toBe(true);
      expect(entry.pattern.source.endsWith(')$')).toBe(true);
    }
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(STYLE_CATALOG)).toBe(true);
    expect(Object.isFrozen(STYLE_CATALOG[0])).toBe(true);
  });
});

describe('findStyle', () => {
  it('should return the entry for a known label', () => {
    expect(findStyle('snake_case')?.pattern.source).toBe('^(?:[a-z_0-9]+)$');
  });

  it('should return undefined for an unknown label', () => {
    expect(findStyle('kebab-case')).toBeUndefined();
  });
});

describe('isStyleLabel', () => {
  it('should accept catalog labels only', () => {
    expect(isStyleLabel('camelCase')).toBe(true);
    expect(isStyleLabel('PascalCase')).toBe(false);
  });
});
