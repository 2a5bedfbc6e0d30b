#!/usr/bin/env node

import { runCli } from './cli.js';

const controller = new AbortController();
process.once('SIGINT', () => {
  process.stderr.write('stylegate: interrupt received, finishing files in progress\n');
  controller.abort();
});

const exitCode = await runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  stdoutIsTTY: process.stdout.isTTY === true,
  stderrIsTTY: process.stderr.isTTY === true,
  cwd: process.cwd(),
  signal: controller.signal,
});

process.stdout.write('', () => {
  process.exit(exitCode);
});
