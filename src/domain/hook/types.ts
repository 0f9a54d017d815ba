import type { Severity } from '../rule/types.js';

export type Decision =
  | { kind: 'allow'; message?: string }
  | { kind: 'warn'; message: string }
  | { kind: 'deny'; message: string };

export type DecisionKind = Decision['kind'];

/** Event field a rule was evaluated against. */
export type MatchTarget = 'command' | 'content' | 'file_path';

export interface RuleMatch {
  ruleName: string;
  severity: Severity;
  message: string;
  target: MatchTarget;
  matchedText: string;
}

export interface HookOutcome {
  decision: Decision;
  /** Present only when at least one fix changed the command. */
  rewrittenCommand?: string;
  /** Every rule that matched, in declaration order. */
  matches: readonly RuleMatch[];
}
