import fg from 'fast-glob';
import fs from 'node:fs';
import path from 'node:path';

const DEFAULT_EXTENSIONS: readonly string[] = ['swift'];
const DEFAULT_IGNORE = ['**/node_modules/**', '**/.build/**', '**/.git/**', '**/Pods/**', '**/DerivedData/**'];

function isGlob(pattern: string): boolean {
  return fg.isDynamicPattern(pattern);
}

/** `*.swift`, or `*.{a,b}` for several extensions */
function sourceFilePattern(extensions: readonly string[]): string {
  return extensions.length === 1 ? `*.${extensions[0]}` : `*.{${extensions.join(',')}}`;
}

/**
 * Expand a directory to the source files below it; files and globs pass through
 */
function expandPattern(pattern: string, cwd: string, extensions: readonly string[]): string {
  if (isGlob(pattern)) {
    return pattern;
  }

  const fullPath = path.resolve(cwd, pattern);
  const stat = fs.statSync(fullPath, { throwIfNoEntry: false });
  if (stat?.isDirectory()) {
    return fg.convertPathToPattern(path.join(pattern, '**', sourceFilePattern(extensions)));
  }

  return fg.convertPathToPattern(pattern);
}

export interface ResolvedFiles {
  /** Absolute paths, sorted */
  files: string[];
  /** Explicit (non-glob) paths that matched nothing */
  missing: string[];
}

/**
 * Resolve paths and globs to the files to check. Directories, and an empty
 * pattern list, select files with one of `extensions`.
 */
export async function resolveFiles(
  patterns: string[],
  cwd: string,
  exclude: string[] = [],
  extensions: readonly string[] = DEFAULT_EXTENSIONS
): Promise<ResolvedFiles> {
  const effectivePatterns =
    patterns.length === 0
      ? [`**/${sourceFilePattern(extensions)}`]
      : patterns.map(p => expandPattern(p, cwd, extensions));
  const ignore = [...DEFAULT_IGNORE, ...exclude];

  const files = await fg(effectivePatterns, {
    cwd,
    absolute: true,
    ignore,
    onlyFiles: true,
    dot: false,
  });

  const missing = patterns.filter(p => !isGlob(p) && !fs.existsSync(path.resolve(cwd, p)));

  return {
    files: [...new Set(files.map(file => path.normalize(file)))].sort(),
    missing,
  };
}
