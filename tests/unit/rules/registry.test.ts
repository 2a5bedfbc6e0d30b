import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../../src/errors.js';
import { BUILTIN_RULES } from '../../../src/rules/builtin/index.js';
import { compareIds, loadRegistry } from '../../../src/rules/registry.js';
import { replacingRule } from '../../helpers.js';

function severityOf(registry: ReturnType<typeof loadRegistry>, id: string) {
  return registry.rules.find(rule => rule.meta.id === id)?.severity;
}

describe('loadRegistry', () => {
  it('orders rules by id whatever the load order', () => {
    const registry = loadRegistry([replacingRule('b/rule', 'x', 'y'), replacingRule('a/rule', 'x', 'y')]);
    expect(registry.rules.map(rule => rule.meta.id)).toEqual(['a/rule', 'b/rule']);
  });

  it('loads every built-in rule with default options', () => {
    const registry = loadRegistry(BUILTIN_RULES);
    expect(registry.rules).toHaveLength(16);
    expect(registry.options).toEqual({ maxFixIterations: 10, lineLength: 100, indentWidth: 2 });
  });

  it('is immutable', () => {
    const registry = loadRegistry(BUILTIN_RULES);
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.rules)).toBe(true);
    expect(Object.isFrozen(registry.options)).toBe(true);
  });

  it('rejects duplicate ids', () => {
    expect(() => loadRegistry([replacingRule('a/rule', 'x', 'y'), replacingRule('a/rule', 'z', 'y')])).toThrow(
      'Duplicate rule id: a/rule'
    );
  });

  it('rejects overrides for unknown rules', () => {
    expect(() => loadRegistry(BUILTIN_RULES, { rules: { 'spacing/nope': { enabled: false } } })).toThrow(ConfigError);
    expect(() => loadRegistry(BUILTIN_RULES, { rules: { 'spacing/nope': { enabled: false } } })).toThrow(
      'Unknown rule(s): spacing/nope'
    );
  });

  it('rejects unknown categories', () => {
    expect(() => loadRegistry(BUILTIN_RULES, { categories: { bogus: { enabled: false } } })).toThrow(
      'Unknown category: bogus.'
    );
  });

  it('rejects invalid parameters, even for disabled rules', () => {
    expect(() =>
      loadRegistry(BUILTIN_RULES, {
        rules: { 'spacing/vertical-whitespace': { enabled: false, parameters: { maxEmptyLines: -1 } } },
      })
    ).toThrow('Invalid parameters for rule spacing/vertical-whitespace');
  });

  it('rule overrides beat category overrides, which beat defaults', () => {
    const registry = loadRegistry(BUILTIN_RULES, {
      categories: { spacing: { severity: 'warning' } },
      rules: { 'spacing/operator-spacing': { severity: 'info' } },
    });
    expect(severityOf(registry, 'spacing/operator-spacing')).toBe('info');
    expect(severityOf(registry, 'spacing/comma-spacing')).toBe('warning');
    expect(severityOf(registry, 'naming/type-name-case')).toBe('error');
  });

  it('a rule can be enabled inside a disabled category', () => {
    const registry = loadRegistry(BUILTIN_RULES, {
      categories: { spacing: { enabled: false } },
      rules: { 'spacing/comma-spacing': { enabled: true } },
    });
    const spacing = registry.rules.filter(rule => rule.meta.category === 'spacing').map(rule => rule.meta.id);
    expect(spacing).toEqual(['spacing/comma-spacing']);
    expect(registry.isActive('spacing/operator-spacing')).toBe(false);
    expect(registry.all).toHaveLength(16);
  });

  it('fills missing options from the defaults', () => {
    const registry = loadRegistry(BUILTIN_RULES, { options: { lineLength: 80 } });
    expect(registry.options).toEqual({ maxFixIterations: 10, lineLength: 80, indentWidth: 2 });
  });
});

describe('compareIds', () => {
  it('compares by code unit, not locale', () => {
    expect(['b', 'B', 'a'].sort(compareIds)).toEqual(['B', 'a', 'b']);
  });
});
