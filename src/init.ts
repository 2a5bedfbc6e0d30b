import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { CONFIG_DEFAULTS, CONFIG_FILES } from './config.js';
import { ConfigError } from './errors.js';
import type { Rule } from './rules/types.js';

export interface InitOptions {
  cwd: string;
  force: boolean;
}

export interface InitResult {
  configPath: string;
  ruleCount: number;
  overwritten: boolean;
}

function indentJson(value: unknown, depth: number): string {
  return JSON.stringify(value, null, 2).replace(/\n/g, '\n' + '  '.repeat(depth));
}

/**
 * JSONC text listing every rule with its defaults
 */
export function renderInitConfig(rules: readonly Rule[]): string {
  const entries = rules.map((rule, i) => {
    const config: Record<string, unknown> = { enabled: rule.meta.enabledByDefault, severity: rule.meta.severity };
    if (Object.keys(rule.defaults).length > 0) {
      config.parameters = rule.defaults;
    }
    const comma = i < rules.length - 1 ? ',' : '';
    return `    // ${rule.meta.title}${rule.meta.fixable ? ' (fixable)' : ''}\n    ${JSON.stringify(rule.meta.id)}: ${indentJson(config, 2)}${comma}`;
  });

  const { options } = CONFIG_DEFAULTS;
  return [
    '{',
    '  // Upper bound on fix passes per file',
    `  "maxFixIterations": ${options.maxFixIterations},`,
    `  "lineLength": ${options.lineLength},`,
    `  "indentWidth": ${options.indentWidth},`,
    `  "include": ${JSON.stringify(CONFIG_DEFAULTS.include)},`,
    `  "exclude": ${indentJson(CONFIG_DEFAULTS.exclude, 1)},`,
    '  // Lowest severity that makes `stylegate check` exit 1',
    `  "failOn": ${JSON.stringify(CONFIG_DEFAULTS.failOn)},`,
    '  "rules": {',
    ...entries,
    '  }',
    '}',
    '',
  ].join('\n');
}

/**
 * Write stylegate.jsonc in `cwd`
 * @throws ConfigError when a config file exists and `force` is not set
 */
export async function init(rules: readonly Rule[], options: InitOptions): Promise<InitResult> {
  const configPath = path.join(options.cwd, CONFIG_FILES[0]);
  const existing = CONFIG_FILES.map(file => path.join(options.cwd, file)).find(file => existsSync(file));

  if (existing && !options.force) {
    throw new ConfigError(`${path.relative(options.cwd, existing)} already exists (use --force to overwrite)`, {
      path: existing,
    });
  }

  await writeFile(configPath, renderInitConfig(rules), 'utf-8');

  return { configPath, ruleCount: rules.length, overwritten: existing === configPath };
}
