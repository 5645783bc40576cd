/**
 * Configuration schema for `.census/config.yaml`.
 */
import { z } from 'zod';

/**
 * Make an object field optional and fill in its inner defaults when absent.
 * Both undefined and null are treated as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Scan settings. */
export const ScanSettingsSchema = z.object({
  /** Count a module's `default` export as a symbol */
  include_default_export: z.boolean().default(false),
  /** Export names never recorded */
  exclude_names: z.array(z.string()).default([]),
  /** Abort the scan on the first unclassifiable symbol */
  strict: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  /** Newline-delimited list of libraries to scan, relative to the project root */
  libraries_file: z.string().default('libraries.txt'),
  /** Libraries whose sub-tables are dumped on their own after the full report */
  examples: z.array(z.string()).default(['fs', 'events', 'util']),
  scan: withDefaults(ScanSettingsSchema),
  log_level: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
