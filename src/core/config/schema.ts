/**
 * Zod schema for `.layersmith.yaml`.
 */
import { z } from 'zod';
import { SUPPORTED_ARCHITECTURES, SUPPORTED_RUNTIMES, DEFAULT_ARCHITECTURE, DEFAULT_RUNTIME } from '../runtimes.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't apply inner defaults for objects.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Installer settings. */
export const InstallSettingsSchema = z.object({
  /** Installer command; may carry leading args, e.g. "python3 -m pip" */
  command: z.string().min(1).default('pip'),
  index_url: z.string().url().nullable().default(null),
  timeout_seconds: z.number().positive().default(600),
});

/** What the pruning pass removes. */
export const CleanupSettingsSchema = z.object({
  bytecode: z.boolean().default(true),
  tests: z.boolean().default(true),
  metadata: z.boolean().default(true),
  scripts: z.boolean().default(true),
  extra_patterns: z.array(z.string()).default([]),
});

/** Publish and retry settings. */
export const PublishSettingsSchema = z.object({
  max_attempts: z.number().int().min(1).max(10).default(4),
  base_delay_ms: z.number().min(0).default(500),
  max_delay_ms: z.number().min(0).default(8000),
  timeout_seconds: z.number().positive().default(300),
});

/** Archive size limits in bytes. */
export const LimitsSettingsSchema = z.object({
  max_zipped_bytes: z.number().int().positive().default(50 * 1024 * 1024),
  max_unzipped_bytes: z.number().int().positive().default(250 * 1024 * 1024),
});

export const ConfigSchema = z.object({
  runtime: z.enum(SUPPORTED_RUNTIMES).default(DEFAULT_RUNTIME),
  architecture: z.enum(SUPPORTED_ARCHITECTURES).default(DEFAULT_ARCHITECTURE),
  install: withDefaults(InstallSettingsSchema),
  cleanup: withDefaults(CleanupSettingsSchema),
  publish: withDefaults(PublishSettingsSchema),
  limits: withDefaults(LimitsSettingsSchema),
});

export type InstallSettings = z.infer<typeof InstallSettingsSchema>;
export type CleanupSettings = z.infer<typeof CleanupSettingsSchema>;
export type PublishSettings = z.infer<typeof PublishSettingsSchema>;
export type LimitsSettings = z.infer<typeof LimitsSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
