import { z } from 'zod';
import { SeveritySchema } from './config.js';
import { RULE_CATEGORIES } from './types.js';

const DIAGNOSTIC_CATEGORIES = [...RULE_CATEGORIES, 'tool-error'] as const;

export const DiagnosticCategorySchema = z.enum(DIAGNOSTIC_CATEGORIES);

export const DiagnosticSchema = z.object({
  path: z.string(),
  line: z.number().int().positive(),
  column: z.number().int().positive(),
  endLine: z.number().int().positive(),
  endColumn: z.number().int().positive(),
  severity: SeveritySchema,
  category: DiagnosticCategorySchema,
  ruleId: z.string(),
  message: z.string(),
  fixable: z.boolean(),
  fixed: z.boolean(),
});

export const FileSummarySchema = z.object({
  path: z.string(),
  outcome: z.enum(['clean', 'violations-remain', 'fixed', 'tool-error']),
  fixedCount: z.number().int().nonnegative(),
  passes: z.number().int().nonnegative(),
});

export const SummarySchema = z.object({
  files: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
  warnings: z.number().int().nonnegative(),
  info: z.number().int().nonnegative(),
  toolErrors: z.number().int().nonnegative(),
  fixable: z.number().int().nonnegative(),
  fixed: z.number().int().nonnegative(),
});

/**
 * Shape of `stylegate check --format json`
 */
export const CheckOutputSchema = z.object({
  outcome: z.enum(['clean', 'violations-remain', 'tool-error']),
  interrupted: z.boolean(),
  summary: SummarySchema,
  files: z.array(FileSummarySchema),
  diagnostics: z.array(DiagnosticSchema),
});

export type CheckOutput = z.infer<typeof CheckOutputSchema>;

export const RuleListingSchema = z.array(
  z.object({
    id: z.string(),
    title: z.string(),
    category: z.enum(RULE_CATEGORIES),
    severity: SeveritySchema,
    fixable: z.boolean(),
    enabled: z.boolean(),
  })
);
