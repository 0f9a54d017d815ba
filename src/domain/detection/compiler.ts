import { RuleCompileError, errorMessage } from '../../infra/errors.js';
import { err, ok } from '../../infra/types.js';
import type { Result } from '../../infra/types.js';
import type { RuleDefinition } from '../rule/types.js';

/** A rule with its regexes built. `matcher` is null for AST rules, whose findings come from outside. */
export interface CompiledRule {
  readonly rule: RuleDefinition;
  readonly matcher: RegExp | null;
  readonly condition?: RegExp;
}

/** Capture group holding the called name in call rules. */
export const FUNCTION_GROUP = 'function';

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function flags(caseSensitive: boolean, global: boolean): string {
  return `${global ? 'gm' : 'm'}${caseSensitive ? '' : 'i'}`;
}

function build(rule: RuleDefinition): RegExp | null {
  const { detector } = rule;
  switch (detector.kind) {
    case 'pattern':
      return new RegExp(detector.pattern, flags(rule.caseSensitive, true));
    case 'call': {
      if (detector.functionNames.length === 0) throw new Error('no function names');
      const names = detector.functionNames.map(escapeRegExp).join('|');
      return new RegExp(`(?<![\\w$])(?<${FUNCTION_GROUP}>${names})\\s*\\(`, flags(rule.caseSensitive, true));
    }
    case 'ast':
      return null;
  }
}

/** Builds every regex a rule needs exactly once; a bad pattern yields an error, never a throw. */
export function compileRule(rule: RuleDefinition): Result<CompiledRule, RuleCompileError> {
  let matcher: RegExp | null;
  try {
    matcher = build(rule);
  } catch (e) {
    return err(new RuleCompileError(rule.name, errorMessage(e), { cause: e }));
  }

  let condition: RegExp | undefined;
  if (rule.contentCondition) {
    try {
      condition = new RegExp(rule.contentCondition.pattern, flags(rule.contentCondition.caseSensitive, false));
    } catch (e) {
      return err(new RuleCompileError(rule.name, `content_condition: ${errorMessage(e)}`, { cause: e }));
    }
  }

  const compiled: CompiledRule = { rule, matcher, condition };
  return ok(Object.freeze(compiled));
}

/** Whether the rule's content condition lets it run against `text`. Rules without one always pass. */
export function conditionHolds(compiled: CompiledRule, text: string | undefined): boolean {
  const { condition } = compiled;
  const gate = compiled.rule.contentCondition;
  if (!condition || !gate) return true;
  if (text === undefined) return false;
  return condition.test(text) === (gate.when === 'present');
}
