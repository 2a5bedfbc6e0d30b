import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describeError } from './errors.js';
import { failedFileResult, processSource, toolDiagnostic } from './engine/pipeline.js';
import { mergeResults, silentLogger, type Logger } from './reporter/index.js';
import type { RuleRegistry } from './rules/registry.js';
import { LineIndex } from './source/line-index.js';
import { swiftParser, type Parser } from './source/parser.js';
import type { CheckOptions, FileResult, RunReport } from './types.js';
import { resolveFiles } from './utils/files.js';
import { runInBatches } from './utils/pool.js';
import type { ProgressDisplay } from './utils/progress.js';

export type RunOptions = Pick<CheckOptions, 'paths' | 'exclude' | 'fix' | 'concurrency' | 'cwd'>;

export interface RunHooks {
  logger?: Logger;
  progress?: ProgressDisplay;
  /** Stops scheduling new files once aborted */
  signal?: AbortSignal;
  parser?: Parser;
}

/** Path relative to cwd with forward slashes */
function displayPath(cwd: string, file: string): string {
  return path.relative(cwd, file).split(path.sep).join('/');
}

async function checkFile(
  file: string,
  registry: RuleRegistry,
  options: RunOptions,
  parser: Parser,
  logger: Logger
): Promise<FileResult> {
  const relative = displayPath(options.cwd, file);
  const started = Date.now();

  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (error) {
    return failedFileResult(relative, '', 'io-failure', `Cannot read file: ${describeError(error)}`);
  }

  const result = processSource(relative, text, registry, { fix: options.fix, parser });

  if (options.fix && result.changed) {
    try {
      await writeFile(file, result.output, 'utf-8');
    } catch (error) {
      const failure = toolDiagnostic(
        relative,
        new LineIndex(result.output),
        'io-failure',
        `Cannot write fixed file: ${describeError(error)}`
      );
      return { ...result, diagnostics: [failure, ...result.diagnostics], outcome: 'tool-error', changed: false };
    }
  }

  logger.debug(`${relative}: ${result.outcome} (${Date.now() - started}ms)`);
  return result;
}

/**
 * Check (and with `fix`, rewrite) every file the options select.
 * Files run concurrently; the report lists them in path order.
 */
export async function runCheck(registry: RuleRegistry, options: RunOptions, hooks: RunHooks = {}): Promise<RunReport> {
  const logger = hooks.logger ?? silentLogger;
  const parser = hooks.parser ?? swiftParser;

  const { files, missing } = await resolveFiles(options.paths, options.cwd, options.exclude, parser.extensions);
  const missingResults = missing.map(p =>
    failedFileResult(p.split(path.sep).join('/'), '', 'io-failure', `No such file or directory: ${p}`)
  );

  if (files.length === 0) {
    logger.info('no Swift files matched');
    return mergeResults(missingResults, false);
  }

  logger.info(`checking ${files.length} file${files.length === 1 ? '' : 's'} with ${registry.rules.length} rules`);
  hooks.progress?.start(files.length);

  try {
    const run = await runInBatches(
      files,
      options.concurrency,
      async file => {
        const result = await checkFile(file, registry, options, parser, logger);
        hooks.progress?.advance(result.path);
        return result;
      },
      (file, reason) =>
        failedFileResult(displayPath(options.cwd, file), '', 'internal-error', `Internal error: ${describeError(reason)}`),
      hooks.signal
    );

    if (run.interrupted) {
      logger.error(`interrupted; ${run.results.length} of ${files.length} files were checked`);
    }

    return mergeResults([...missingResults, ...run.results], run.interrupted);
  } finally {
    hooks.progress?.stop();
  }
}
