/**
 * Tests for the scan command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { createScanCommand, runScan } from '../../../../src/cli/commands/scan.js';
import type { ModuleLoader } from '../../../../src/core/scan/types.js';
import { logger } from '../../../../src/utils/logger.js';

const modules: Record<string, unknown> = {
  fs: { readFile: () => undefined, F_OK: 0 },
  events: { EventEmitter: class EventEmitter { on(): void {} } },
};

const loader: ModuleLoader = async (name) => {
  if (name in modules) return modules[name];
  throw new Error(`Cannot find module '${name}'`);
};

describe('scan command', () => {
  let testDir: string;
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

  beforeEach(async () => {
    vi.clearAllMocks();
    testDir = join(tmpdir(), `census-scan-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    await writeFile(join(testDir, 'libraries.txt'), 'fs\nmissing\nevents\n');
  });

  afterEach(async () => {
    logger.setLevel('info');
    await rm(testDir, { recursive: true, force: true });
  });

  describe('createScanCommand', () => {
    it('should create a command with correct name', () => {
      expect(createScanCommand().name()).toBe('scan');
    });

    it('should have an optional list-file argument', () => {
      const args = createScanCommand().registeredArguments;
      expect(args.length).toBe(1);
      expect(args[0].name()).toBe('list-file');
      expect(args[0].required).toBe(false);
    });

    it('should have the scan options', () => {
      const optionNames = createScanCommand().options.map((opt) => opt.long);
      expect(optionNames).toContain('--builtins');
      expect(optionNames).toContain('--json');
      expect(optionNames).toContain('--members');
      expect(optionNames).toContain('--strict');
      expect(optionNames).toContain('--include-default');
      expect(optionNames).toContain('--config');
    });
  });

  describe('runScan', () => {
    it('should scan the configured list and skip libraries that fail to load', async () => {
      const report = await runScan(undefined, { json: true }, { loader, projectRoot: testDir });

      expect(report.counts).toEqual({
        fs: {
          snake_case: { camelCase: 1 },
          UPPER_CASE: { UPPER_CASE: 1 },
        },
        events: {
          MixedCase: { MixedCase: 1 },
        },
      });
      expect(report.failures).toEqual([
        { library: 'missing', message: "Cannot load library 'missing': Cannot find module 'missing'" },
      ]);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should print the JSON report', async () => {
      await runScan('libraries.txt', { json: true }, { loader, projectRoot: testDir });

      expect(log).toHaveBeenCalledTimes(1);
      const printed = JSON.parse(String(log.mock.calls[0][0]));
      expect(printed.examples).toEqual({
        fs: { snake_case: { camelCase: 1 }, UPPER_CASE: { UPPER_CASE: 1 } },
        events: { MixedCase: { MixedCase: 1 } },
        util: null,
      });
    });

    it('should apply config settings', async () => {
      await mkdir(join(testDir, '.census'), { recursive: true });
      await writeFile(
        join(testDir, '.census', 'config.yaml'),
        'libraries_file: only-events.txt\nexamples: []\nscan:\n  exclude_names: [EventEmitter]\n'
      );
      await writeFile(join(testDir, 'only-events.txt'), 'events\n');

      const report = await runScan(undefined, { json: true }, { loader, projectRoot: testDir });

      expect(report.counts).toEqual({});
      expect(report.examples).toEqual([]);
    });

    it('should include members when asked', async () => {
      const report = await runScan(
        undefined,
        { json: true, members: true },
        { loader, projectRoot: testDir }
      );

      expect(report.membership?.events.MixedCase?.MixedCase).toEqual([
        { typeName: 'Function', name: 'EventEmitter' },
      ]);
    });

    it('should reject when the list file is missing', async () => {
      await expect(
        runScan('nope.txt', { json: true }, { loader, projectRoot: testDir })
      ).rejects.toThrow('Cannot read library list');
    });
  });
});
