import { z } from 'zod';
import type { GlobalOptions, Severity } from './types.js';

export const SeveritySchema = z.enum(['error', 'warning', 'info']);

/**
 * Per-rule configuration
 */
export const RuleConfigSchema = z
  .object({
    /** Whether to run this rule */
    enabled: z.boolean().optional(),
    /** Severity reported for this rule's violations */
    severity: SeveritySchema.optional(),
    /** Rule-specific parameters, validated by the rule itself */
    parameters: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export type RuleConfig = z.infer<typeof RuleConfigSchema>;

/**
 * Per-category configuration, applied to every rule in the category unless
 * the rule has its own setting
 */
export const CategoryConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    severity: SeveritySchema.optional(),
  })
  .strict();

/**
 * Full stylegate configuration file schema
 */
export const ConfigSchema = z
  .object({
    /** JSON schema URL for IDE support */
    $schema: z.string().optional(),

    /** Rule configurations keyed by rule id */
    rules: z.record(z.string(), RuleConfigSchema).optional(),

    /** Category configurations keyed by category name */
    categories: z.record(z.string(), CategoryConfigSchema).optional(),

    /** Upper bound on fix passes per file */
    maxFixIterations: z.number().int().positive().optional(),

    /** Maximum line length */
    lineLength: z.number().int().positive().optional(),

    /** Spaces per indentation level */
    indentWidth: z.number().int().positive().optional(),

    /** Glob patterns for files to include */
    include: z.array(z.string()).optional(),

    /** Glob patterns for files to exclude */
    exclude: z.array(z.string()).optional(),

    /** Exit code threshold */
    failOn: SeveritySchema.optional(),

    /** Number of files processed at once */
    concurrency: z.number().int().positive().optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Default configuration values
 */
const DEFAULT_FAIL_ON: Severity = 'error';

export const CONFIG_DEFAULTS = {
  include: ['**/*.swift'],
  exclude: ['**/node_modules/**', '**/.build/**', '**/.git/**', '**/Pods/**', '**/DerivedData/**'],
  failOn: DEFAULT_FAIL_ON,
  options: {
    maxFixIterations: 10,
    lineLength: 100,
    indentWidth: 2,
  } satisfies GlobalOptions,
};

/**
 * Config file names to search for (in order of preference)
 */
export const CONFIG_FILES = [
  'stylegate.jsonc',
  'stylegate.json',
  '.config/stylegate.jsonc',
  '.config/stylegate.json',
] as const;
