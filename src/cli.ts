import { Command, CommanderError } from 'commander';
import path from 'node:path';
import { z } from 'zod';
import { SeveritySchema, type Config } from './config.js';
import { ConfigError, describeError } from './errors.js';
import { init } from './init.js';
import { createLogger, renderReport, reportExitCode, type MessageStream } from './reporter/index.js';
import { formatRuleTable, toRuleListing } from './reporter/format-rules.js';
import { BUILTIN_RULES } from './rules/builtin/index.js';
import { loadRegistry } from './rules/registry.js';
import { runCheck } from './runner.js';
import type { CheckOptions } from './types.js';
import { getConfigWithDefaults, loadConfig, toRegistryOverrides } from './utils/config-loader.js';
import { defaultConcurrency } from './utils/pool.js';
import { ProgressDisplay } from './utils/progress.js';

export const VERSION = '0.1.0';

/**
 * Process surroundings the commands read from and write to
 */
export interface CliIO {
  stdout: MessageStream;
  stderr: MessageStream;
  /** Whether stdout is an interactive terminal (enables colors) */
  stdoutIsTTY: boolean;
  /** Whether stderr is an interactive terminal (enables the spinner) */
  stderrIsTTY: boolean;
  cwd: string;
  /** Aborted on SIGINT */
  signal?: AbortSignal;
}

const positiveInt = (flag: string) =>
  z
    .string()
    .regex(/^\d+$/, `${flag} must be a positive integer`)
    .transform(Number)
    .refine(n => n > 0, `${flag} must be a positive integer`);

const CheckFlagsSchema = z.object({
  fix: z.boolean().default(false),
  format: z.enum(['text', 'json']).default('text'),
  config: z.string().optional(),
  failOn: SeveritySchema.optional(),
  concurrency: positiveInt('--concurrency').optional(),
  maxFixIterations: positiveInt('--max-fix-iterations').optional(),
  pretty: z.boolean().default(false),
  color: z.boolean().default(true),
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
  cwd: z.string().optional(),
});

export type CheckFlags = z.infer<typeof CheckFlagsSchema>;

const RulesFlagsSchema = z.object({ format: z.enum(['text', 'json']).default('text') });

const InitFlagsSchema = z.object({ force: z.boolean().default(false) });

function flagName(key: string | number | undefined): string {
  return `--${String(key ?? '').replace(/[A-Z]/g, c => `-${c.toLowerCase()}`)}`;
}

function validateFlags<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`Invalid ${flagName(issue.path[0])} value: ${issue.message}`);
  }
  return result.data;
}

/**
 * Validate raw option values from the command line
 * @throws ConfigError naming the offending flag
 */
export function parseCheckFlags(raw: unknown): CheckFlags {
  return validateFlags(CheckFlagsSchema, raw);
}

function commandOptions(command: unknown): unknown {
  return command instanceof Command ? command.opts() : {};
}

/**
 * Merge flags over config over defaults
 */
export function resolveCheckOptions(
  paths: string[],
  flags: CheckFlags,
  config: Config,
  env: { cwd: string; interactive: boolean }
): CheckOptions {
  const defaults = getConfigWithDefaults(config);

  return {
    paths: paths.length > 0 ? paths : defaults.include,
    exclude: defaults.exclude,
    fix: flags.fix,
    format: flags.format,
    pretty: flags.pretty,
    failOn: flags.failOn ?? defaults.failOn,
    concurrency: flags.concurrency ?? defaults.concurrency ?? defaultConcurrency(),
    cwd: env.cwd,
    quiet: flags.quiet,
    verbose: flags.verbose,
    color: flags.color && env.interactive && flags.format === 'text',
    options: {
      ...defaults.options,
      maxFixIterations: flags.maxFixIterations ?? defaults.options.maxFixIterations,
    },
  };
}

async function check(paths: string[], rawFlags: unknown, io: CliIO): Promise<number> {
  const flags = parseCheckFlags(rawFlags);
  const logger = createLogger({ quiet: flags.quiet, verbose: flags.verbose }, io.stderr);
  const cwd = flags.cwd ? path.resolve(io.cwd, flags.cwd) : io.cwd;

  const loaded = loadConfig(cwd, flags.config);
  if (loaded.configPath) {
    logger.info(`using config from ${path.relative(cwd, loaded.configPath)}`);
  }

  const options = resolveCheckOptions(paths, flags, loaded.config, { cwd, interactive: io.stdoutIsTTY });
  const registry = loadRegistry(BUILTIN_RULES, toRegistryOverrides(loaded.config, options.options));

  const progress = io.stderrIsTTY && !flags.quiet && !flags.verbose ? new ProgressDisplay(io.stderr) : undefined;
  const report = await runCheck(registry, options, { logger, progress, signal: io.signal });

  io.stdout.write(renderReport(report, options));
  return reportExitCode(report, options.failOn);
}

/**
 * Build the command tree. Actions report their exit code through `setExitCode`
 * instead of exiting the process.
 */
export function createProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('stylegate')
    .description('Check Swift sources against a configurable style guide and fix what can be fixed')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout.write(text),
      writeErr: text => io.stderr.write(text),
    });

  const guarded =
    (action: (...args: unknown[]) => Promise<number>) =>
    async (...args: unknown[]): Promise<void> => {
      try {
        setExitCode(await action(...args));
      } catch (error) {
        io.stderr.write(`stylegate: ${describeError(error)}\n`);
        setExitCode(2);
      }
    };

  program
    .command('check', { isDefault: true })
    .description('Check files for style violations')
    .argument('[paths...]', 'Files, directories or globs to check')
    .option('--fix', 'Apply fixes and write files back', false)
    .option('--format <format>', 'Output format: text|json', 'text')
    .option('--config <path>', 'Config file (default: stylegate.jsonc in cwd)')
    .option('--fail-on <level>', 'Exit non-zero threshold: error|warning|info')
    .option('--concurrency <n>', 'Files processed at once')
    .option('--max-fix-iterations <n>', 'Upper bound on fix passes per file')
    .option('--pretty', 'Pretty-print JSON output', false)
    .option('--no-color', 'Disable colored output')
    .option('--quiet', 'Suppress stderr progress messages', false)
    .option('--verbose', 'Log each file with its timing', false)
    .option('--cwd <path>', 'Working directory')
    .action(
      guarded(async (paths, _options, command) => {
        const argv = Array.isArray(paths) ? paths.map(String) : [];
        return check(argv, commandOptions(command), io);
      })
    );

  program
    .command('rules')
    .description('List the built-in rules')
    .option('--format <format>', 'Output format: text|json', 'text')
    .action(
      guarded(async (_options, command) => {
        const { format } = validateFlags(RulesFlagsSchema, commandOptions(command));
        io.stdout.write(
          format === 'json' ? JSON.stringify(toRuleListing(BUILTIN_RULES), null, 2) + '\n' : formatRuleTable(BUILTIN_RULES)
        );
        return 0;
      })
    );

  program
    .command('init')
    .description('Write stylegate.jsonc listing every rule with its defaults')
    .option('--force', 'Overwrite existing config', false)
    .action(
      guarded(async (_options, command) => {
        const { force } = validateFlags(InitFlagsSchema, commandOptions(command));
        const result = await init(BUILTIN_RULES, { cwd: io.cwd, force });
        io.stderr.write(
          `stylegate: ${result.overwritten ? 'overwrote' : 'created'} ${path.relative(io.cwd, result.configPath)} with ${result.ruleCount} rules\n`
        );
        return 0;
      })
    );

  return program;
}

/**
 * Parse `args` (without the node and script entries) and run the command
 * @returns the process exit code
 */
export async function runCli(args: string[], io: CliIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }

  return exitCode;
}
