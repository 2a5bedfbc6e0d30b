import { processSource } from '../src/engine/pipeline.js';
import { check } from '../src/engine/matcher.js';
import { loadRegistry, type RegistryOverrides, type RuleRegistry } from '../src/rules/registry.js';
import { defineRule, noParameters, type Rule } from '../src/rules/types.js';
import { swiftParser } from '../src/source/parser.js';
import { buildSourceModel, type SourceModel } from '../src/source/source-model.js';
import type { FileResult, Violation } from '../src/types.js';

export function parseModel(text: string, path = 'Test.swift'): SourceModel {
  const built = buildSourceModel(path, text, swiftParser);
  if (!built.success) {
    throw built.error;
  }
  return built.model;
}

export function registryOf(rules: readonly Rule[], overrides?: RegistryOverrides): RuleRegistry {
  return loadRegistry(rules, overrides);
}

export function checkText(text: string, rules: readonly Rule[], overrides?: RegistryOverrides): Violation[] {
  return check(parseModel(text), registryOf(rules, overrides));
}

export function fixText(text: string, rules: readonly Rule[], overrides?: RegistryOverrides): FileResult {
  return processSource('Test.swift', text, registryOf(rules, overrides), { fix: true, parser: swiftParser });
}

/** Apply every fix and return the resulting text */
export function fixedOutput(text: string, rules: readonly Rule[], overrides?: RegistryOverrides): string {
  return fixText(text, rules, overrides).output;
}

/**
 * A rule that replaces the first occurrence of `target` with `replacement`
 */
export function replacingRule(id: string, target: string, replacement: string): Rule {
  return defineRule({
    meta: {
      id,
      title: `Replace ${target}`,
      category: 'structure',
      severity: 'error',
      fixable: true,
      enabledByDefault: true,
    },
    parameters: noParameters,
    create({ source, report }) {
      return {
        file() {
          const start = source.text.indexOf(target);
          if (start === -1) return;
          const end = start + target.length;
          report({
            startOffset: start,
            endOffset: end,
            message: `Found ${target}`,
            fix: [{ startOffset: start, endOffset: end, text: replacement }],
          });
        },
      };
    },
  });
}
