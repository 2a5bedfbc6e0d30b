import { ConfigError } from '../errors.js';
import { CONFIG_DEFAULTS } from '../config.js';
import { RULE_CATEGORIES, type GlobalOptions, type RuleCategory, type Severity } from '../types.js';
import type { Rule, RuleFactory, RuleMeta } from './types.js';

/**
 * Per-rule override from configuration
 */
export interface RuleOverride {
  enabled?: boolean;
  severity?: Severity;
  parameters?: Record<string, unknown>;
}

/**
 * Per-category override from configuration
 */
export interface CategoryOverride {
  enabled?: boolean;
  severity?: Severity;
}

export interface RegistryOverrides {
  rules?: Record<string, RuleOverride>;
  categories?: Record<string, CategoryOverride>;
  options?: Partial<GlobalOptions>;
}

/**
 * A rule that will run, with its effective severity
 */
export interface ActiveRule {
  readonly meta: RuleMeta;
  readonly severity: Severity;
  readonly create: RuleFactory;
}

/**
 * Immutable set of rules for one invocation. Active rules are ordered by id,
 * which fixes the tie-breaking order of overlapping fixes.
 */
export class RuleRegistry {
  readonly rules: readonly ActiveRule[];
  readonly options: Readonly<GlobalOptions>;
  private readonly known: ReadonlyMap<string, Rule>;

  constructor(known: ReadonlyMap<string, Rule>, rules: ActiveRule[], options: GlobalOptions) {
    this.known = known;
    this.rules = Object.freeze([...rules].sort((a, b) => compareIds(a.meta.id, b.meta.id)));
    this.options = Object.freeze({ ...options });
    Object.freeze(this);
  }

  /** Every rule that was loaded, enabled or not, ordered by id */
  get all(): Rule[] {
    return [...this.known.values()].sort((a, b) => compareIds(a.meta.id, b.meta.id));
  }

  isActive(id: string): boolean {
    return this.rules.some(rule => rule.meta.id === id);
  }
}

/**
 * Ordinal string comparison, independent of locale
 */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isCategory(value: string): value is RuleCategory {
  return (RULE_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Build the registry from built-in rules and configuration overrides
 * @throws ConfigError for unknown rule ids or categories and invalid parameters
 */
export function loadRegistry(builtins: readonly Rule[], overrides: RegistryOverrides = {}): RuleRegistry {
  const known = new Map<string, Rule>();
  for (const rule of builtins) {
    if (known.has(rule.meta.id)) {
      throw new ConfigError(`Duplicate rule id: ${rule.meta.id}`, { ruleId: rule.meta.id });
    }
    known.set(rule.meta.id, rule);
  }

  const ruleOverrides = overrides.rules ?? {};
  const unknownRules = Object.keys(ruleOverrides).filter(id => !known.has(id));
  if (unknownRules.length > 0) {
    throw new ConfigError(`Unknown rule(s): ${unknownRules.sort(compareIds).join(', ')}`, { rules: unknownRules });
  }

  const categoryOverrides = overrides.categories ?? {};
  const unknownCategories = Object.keys(categoryOverrides).filter(name => !isCategory(name));
  if (unknownCategories.length > 0) {
    throw new ConfigError(
      `Unknown categor${unknownCategories.length === 1 ? 'y' : 'ies'}: ${unknownCategories.join(', ')}. Valid: ${RULE_CATEGORIES.join(', ')}`,
      { categories: unknownCategories }
    );
  }

  const active: ActiveRule[] = [];
  for (const rule of known.values()) {
    const ruleOverride = ruleOverrides[rule.meta.id] ?? {};
    const categoryOverride = categoryOverrides[rule.meta.category] ?? {};

    // Parameters are validated even for disabled rules so typos surface early
    const create = rule.configure(ruleOverride.parameters);

    const enabled = ruleOverride.enabled ?? categoryOverride.enabled ?? rule.meta.enabledByDefault;
    if (!enabled) continue;

    active.push({
      meta: rule.meta,
      severity: ruleOverride.severity ?? categoryOverride.severity ?? rule.meta.severity,
      create,
    });
  }

  const options: GlobalOptions = {
    maxFixIterations: overrides.options?.maxFixIterations ?? CONFIG_DEFAULTS.options.maxFixIterations,
    lineLength: overrides.options?.lineLength ?? CONFIG_DEFAULTS.options.lineLength,
    indentWidth: overrides.options?.indentWidth ?? CONFIG_DEFAULTS.options.indentWidth,
  };

  return new RuleRegistry(known, active, options);
}
