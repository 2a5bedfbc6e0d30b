import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BUILTIN_RULES } from '../../src/rules/builtin/index.js';
import { loadRegistry } from '../../src/rules/registry.js';
import { runCheck, type RunOptions } from '../../src/runner.js';
import { swiftParser, type Parser } from '../../src/source/parser.js';

describe('runCheck', () => {
  let dir: string;
  let options: RunOptions;
  const registry = loadRegistry(BUILTIN_RULES);

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'stylegate-runner-'));
    options = { paths: [], exclude: [], fix: false, concurrency: 2, cwd: dir };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports files in path order with relative paths', async () => {
    writeFileSync(path.join(dir, 'b.swift'), 'let b = 1\n');
    writeFileSync(path.join(dir, 'a.swift'), 'let a=1\n');
    const report = await runCheck(registry, options);
    expect(report.interrupted).toBe(false);
    expect(report.files.map(file => [file.path, file.outcome])).toEqual([
      ['a.swift', 'violations-remain'],
      ['b.swift', 'clean'],
    ]);
  });

  it('writes fixed files back only with fix', async () => {
    const file = path.join(dir, 'a.swift');
    writeFileSync(file, 'let a=1\n');
    await runCheck(registry, options);
    expect(readFileSync(file, 'utf-8')).toBe('let a=1\n');

    const report = await runCheck(registry, { ...options, fix: true });
    expect(report.files[0].outcome).toBe('fixed');
    expect(readFileSync(file, 'utf-8')).toBe('let a = 1\n');
  });

  it('turns a crashing parser into an internal error for that file', async () => {
    writeFileSync(path.join(dir, 'a.swift'), 'let a = 1\n');
    const parser: Parser = {
      language: 'swift',
      extensions: ['swift'],
      parse() {
        throw new Error('kaboom');
      },
    };
    const report = await runCheck(registry, options, { parser });
    expect(report.files[0].outcome).toBe('tool-error');
    expect(report.files[0].diagnostics[0]).toMatchObject({
      path: 'a.swift',
      ruleId: 'internal-error',
      category: 'tool-error',
      message: 'Internal error: kaboom',
    });
  });

  it('selects files by the parser extensions', async () => {
    writeFileSync(path.join(dir, 'a.swift'), 'let a = 1\n');
    writeFileSync(path.join(dir, 'b.swiftinterface'), 'let b = 1\n');
    const parser: Parser = { ...swiftParser, extensions: ['swiftinterface'] };
    const report = await runCheck(registry, options, { parser });
    expect(report.files.map(file => file.path)).toEqual(['b.swiftinterface']);
  });

  it('reports explicit paths that do not exist', async () => {
    const report = await runCheck(registry, { ...options, paths: ['Missing.swift'] });
    expect(report.files).toHaveLength(1);
    expect(report.files[0].diagnostics[0]).toMatchObject({
      path: 'Missing.swift',
      ruleId: 'io-failure',
      message: 'No such file or directory: Missing.swift',
    });
  });

  it('omits unprocessed files after an abort', async () => {
    writeFileSync(path.join(dir, 'a.swift'), 'let a = 1\n');
    const controller = new AbortController();
    controller.abort();
    const report = await runCheck(registry, options, { signal: controller.signal });
    expect(report).toEqual({ files: [], interrupted: true });
  });
});
