/**
 * Tests for the styles command.
 */
import { describe, it, expect } from 'vitest';
import { createStylesCommand, formatStyles } from '../../../../src/cli/commands/styles.js';

describe('styles command', () => {
  it('should create a command with correct name', () => {
    expect(createStylesCommand().name()).toBe('styles');
  });

  it('should list the catalog as JSON in order', () => {
    const parsed = JSON.parse(formatStyles({ json: true }));

    expect(parsed).toHaveLength(12);
    expect(parsed[0]).toEqual({
      order: 1,
      label: 'MixedCase',
      pattern: '^(?:[A-Z][a-z0-9]*([A-Z][a-z0-9]*)*)$',
    });
    expect(parsed[11]).toEqual({ order: 12, label: '_', pattern: '^(?:)$' });
  });

  it('should number and pad the labels in text output', () => {
    const lines = formatStyles().split('\n');

    expect(lines).toHaveLength(12);
    expect(lines[0].startsWith(` 1. ${'MixedCase'.padEnd(16)}  `)).toBe(true);
    expect(lines[11].startsWith(`12. ${'_'.padEnd(16)}  `)).toBe(true);
  });
});
