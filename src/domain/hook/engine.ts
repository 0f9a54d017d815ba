import { errorMessage } from '../../infra/errors.js';
import { Logger } from '../../logging/logger.js';
import type { CompiledRule } from '../detection/compiler.js';
import { conditionHolds } from '../detection/compiler.js';
import { detect } from '../detection/detector.js';
import { applyFixes } from '../detection/fixer.js';
import { matchesFileGlob } from '../detection/scope.js';
import type { ProjectLintEvent } from '../event/types.js';
import type { EffectivePolicy } from '../policy/types.js';
import { SEVERITY_RANK } from '../rule/types.js';
import type { Severity } from '../rule/types.js';
import type { Decision, HookOutcome, MatchTarget, RuleMatch } from './types.js';

/** Label used as `{file}` when the event carries no path. */
const NO_FILE = '<event>';

export const DENY_EXIT_CODE = 2;

export function exitCodeFor(decision: Decision): number {
  return decision.kind === 'deny' ? DENY_EXIT_CODE : 0;
}

function decisionFor(severity: Severity, message: string): Decision {
  switch (severity) {
    case 'critical':
    case 'error':
      return { kind: 'deny', message };
    case 'warning':
      return { kind: 'warn', message };
    case 'info':
      return { kind: 'allow', message };
  }
}

function resolveTarget(compiled: CompiledRule, event: ProjectLintEvent): { target: MatchTarget; text: string } | null {
  switch (compiled.rule.target) {
    case 'command':
      return event.command === undefined ? null : { target: 'command', text: event.command };
    case 'content':
      return event.content === undefined ? null : { target: 'content', text: event.content };
    case 'file_path':
      return event.filePath === undefined ? null : { target: 'file_path', text: event.filePath };
    case 'auto':
      if (event.command !== undefined) return { target: 'command', text: event.command };
      if (event.content !== undefined) return { target: 'content', text: event.content };
      return null;
  }
}

/**
 * Evaluates one event against a policy and yields exactly one decision.
 * Never touches the filesystem; the event and policy are all it reads.
 */
export class DecisionEngine {
  constructor(private logger: Logger = Logger.silent()) {}

  evaluate(event: ProjectLintEvent, policy: EffectivePolicy): HookOutcome {
    const matches: RuleMatch[] = [];
    const rewriters: CompiledRule[] = [];

    for (const compiled of policy.rules) {
      try {
        const match = this.evaluateRule(compiled, event);
        if (!match) continue;
        matches.push(match);
        if (match.target === 'command' && compiled.rule.fix.kind === 'template') rewriters.push(compiled);
      } catch (e) {
        this.logger.error('Rule evaluation failed; treated as no match', {
          rule: compiled.rule.name,
          error: errorMessage(e),
        });
      }
    }

    const outcome: HookOutcome = { decision: reduce(matches), matches };
    const rewritten = this.rewrite(event, rewriters);
    if (rewritten !== undefined) outcome.rewrittenCommand = rewritten;

    this.logger.debug('Event evaluated', {
      kind: event.kind,
      rules: policy.rules.length,
      matches: matches.length,
      decision: outcome.decision.kind,
    });
    return outcome;
  }

  private evaluateRule(compiled: CompiledRule, event: ProjectLintEvent): RuleMatch | null {
    const { rule } = compiled;
    if (rule.triggers.length > 0 && !rule.triggers.some((t) => t === event.kind)) return null;
    if (rule.detector.kind === 'ast') return null;
    if (rule.fileGlob !== undefined) {
      if (event.filePath === undefined || !matchesFileGlob(rule, event.filePath)) return null;
    }

    const resolved = resolveTarget(compiled, event);
    if (!resolved) return null;
    if (!conditionHolds(compiled, event.content ?? event.command)) return null;

    const [first] = detect(compiled, resolved.text, event.filePath ?? NO_FILE);
    if (!first) return null;
    return {
      ruleName: rule.name,
      severity: rule.severity,
      message: first.message,
      target: resolved.target,
      matchedText: first.matchedText,
    };
  }

  /** Applies each command fix in declaration order, each to the output of the previous one. */
  private rewrite(event: ProjectLintEvent, rewriters: readonly CompiledRule[]): string | undefined {
    if (event.command === undefined || rewriters.length === 0) return undefined;
    let command = event.command;
    for (const compiled of rewriters) {
      try {
        command = applyFixes(command, detect(compiled, command, event.filePath ?? NO_FILE)).content;
      } catch (e) {
        this.logger.error('Command rewrite failed; fix skipped', {
          rule: compiled.rule.name,
          error: errorMessage(e),
        });
      }
    }
    return command === event.command ? undefined : command;
  }
}

/** Strongest severity decides; among equals the first declared rule's message is used. */
function reduce(matches: readonly RuleMatch[]): Decision {
  let strongest: RuleMatch | undefined;
  for (const match of matches) {
    if (!strongest || SEVERITY_RANK[match.severity] > SEVERITY_RANK[strongest.severity]) strongest = match;
  }
  return strongest ? decisionFor(strongest.severity, strongest.message) : { kind: 'allow' };
}
