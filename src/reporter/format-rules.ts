import type { Rule } from '../rules/types.js';

/**
 * One entry of `stylegate rules --format json`
 */
export interface RuleListing {
  id: string;
  title: string;
  category: Rule['meta']['category'];
  severity: Rule['meta']['severity'];
  fixable: boolean;
  enabled: boolean;
}

export function toRuleListing(rules: readonly Rule[]): RuleListing[] {
  return rules.map(({ meta }) => ({
    id: meta.id,
    title: meta.title,
    category: meta.category,
    severity: meta.severity,
    fixable: meta.fixable,
    enabled: meta.enabledByDefault,
  }));
}

/**
 * Aligned table: id, severity, fixability, title
 */
export function formatRuleTable(rules: readonly Rule[]): string {
  const width = Math.max(0, ...rules.map(rule => rule.meta.id.length));
  const lines = toRuleListing(rules).map(rule => {
    const fix = rule.fixable ? 'fixable' : '-';
    const off = rule.enabled ? '' : ' (off by default)';
    return `${rule.id.padEnd(width)}  ${rule.severity.padEnd(7)}  ${fix.padEnd(7)}  ${rule.title}${off}`;
  });
  return lines.join('\n') + '\n';
}
