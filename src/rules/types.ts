import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { SourceModel } from '../source/source-model.js';
import type { Edit, GlobalOptions, RuleCategory, Severity, Token, TokenKind } from '../types.js';

/**
 * Static metadata describing a rule
 */
export interface RuleMeta {
  /** Unique identifier, `<category>/<name>` */
  id: string;
  /** Short human-readable title */
  title: string;
  category: RuleCategory;
  /** Severity used unless configuration overrides it */
  severity: Severity;
  /** Whether the rule offers autofixes */
  fixable: boolean;
  /** Whether the rule runs when configuration says nothing about it */
  enabledByDefault: boolean;
}

/**
 * What a rule hands to `context.report`
 */
export interface ReportDescriptor {
  startOffset: number;
  endOffset: number;
  message: string;
  /** Edits that correct the violation, in any order; they must not overlap */
  fix?: Edit[];
}

/**
 * Context shared by every rule during one check pass
 */
export interface BaseRuleContext {
  readonly source: SourceModel;
  readonly options: GlobalOptions;
  report(descriptor: ReportDescriptor): void;
}

export interface RuleContext<P> extends BaseRuleContext {
  readonly params: P;
}

export type TokenHandler = (token: Token, index: number) => void;

/**
 * Handlers a rule registers: one per token kind it cares about, plus an
 * optional hook that runs once after every token has been visited.
 */
export type RuleVisitor = { readonly [K in TokenKind]?: TokenHandler } & {
  readonly file?: () => void;
};

export interface RuleDefinition<P> {
  meta: RuleMeta;
  /** Schema for the `parameters` a configuration may pass */
  parameters: z.ZodType<P, z.ZodTypeDef, unknown>;
  create(context: RuleContext<P>): RuleVisitor;
}

/** A rule bound to validated parameters */
export type RuleFactory = (context: BaseRuleContext) => RuleVisitor;

/**
 * A registered rule. Parameters are validated once, when the registry loads.
 */
export interface Rule {
  readonly meta: RuleMeta;
  /** Default parameter values, as written by `stylegate init` */
  readonly defaults: Record<string, unknown>;
  configure(parameters: Record<string, unknown> | undefined): RuleFactory;
}

/** Schema for rules that take no parameters */
export const noParameters = z.object({}).strict();

export function defineRule<P>(definition: RuleDefinition<P>): Rule {
  const parse = (raw: Record<string, unknown> | undefined): P => {
    const result = definition.parameters.safeParse(raw ?? {});
    if (!result.success) {
      throw new ConfigError(`Invalid parameters for rule ${definition.meta.id}: ${result.error.message}`, {
        ruleId: definition.meta.id,
      });
    }
    return result.data;
  };

  const defaults = parse(undefined);

  return {
    meta: Object.freeze({ ...definition.meta }),
    defaults: isRecord(defaults) ? defaults : {},
    configure(parameters) {
      const params = parameters === undefined ? defaults : parse(parameters);
      return context => definition.create({ ...context, params });
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
