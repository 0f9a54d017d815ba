import type { KnownEventKind } from '../event/types.js';

export const SEVERITIES = ['info', 'warning', 'error', 'critical'] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Aliases accepted in documents for compatibility with older rule sets. */
export const SEVERITY_ALIASES: Readonly<Record<string, Severity>> = {
  low: 'info',
  medium: 'warning',
  high: 'error',
};

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  info: 0,
  warning: 1,
  error: 2,
  critical: 3,
};

export type RuleDetector =
  | { kind: 'pattern'; pattern: string }
  | { kind: 'call'; functionNames: readonly string[] }
  | { kind: 'ast'; query: string };

export type FixSpec = { kind: 'none' } | { kind: 'template'; template: string };

export const NO_FIX: FixSpec = Object.freeze({ kind: 'none' });

export interface ContentCondition {
  pattern: string;
  /** `present`: the rule applies only when the pattern occurs; `absent`: only when it does not. */
  when: 'present' | 'absent';
  caseSensitive: boolean;
}

export const RULE_TARGETS = ['auto', 'command', 'content', 'file_path'] as const;
export type RuleTarget = (typeof RULE_TARGETS)[number];

export interface RuleDefinition {
  readonly name: string;
  readonly detector: RuleDetector;
  readonly severity: Severity;
  readonly messageTemplate: string;
  readonly fix: FixSpec;
  readonly caseSensitive: boolean;
  /** Empty means every event kind. */
  readonly triggers: readonly KnownEventKind[];
  readonly fileGlob?: string;
  readonly contentCondition?: ContentCondition;
  readonly target: RuleTarget;
  readonly category: string;
  /** Document the rule was declared in. */
  readonly source: string;
}

export type PolicyMode = 'allowlist' | 'denylist';
export const POLICY_MODES: readonly PolicyMode[] = ['allowlist', 'denylist'];

export interface DocumentMetadata {
  name: string;
  version: string;
  scope: string;
  description: string;
}

export interface SliceDocument {
  readonly metadata: DocumentMetadata;
  readonly messages: Readonly<Record<string, string>>;
  /** Category name to rules, both in declaration order. */
  readonly categories: ReadonlyMap<string, readonly RuleDefinition[]>;
  readonly source: string;
}

export interface ContentActivation {
  matches: readonly string[];
  globs: readonly string[];
  position: 'any' | 'header';
}

export interface ActivationSpec {
  indicators: readonly string[];
  paths: readonly string[];
  globs: readonly string[];
  content: readonly ContentActivation[];
}

export interface ProfileDocument {
  readonly metadata: DocumentMetadata;
  readonly activation: ActivationSpec;
  readonly checks: { enable: readonly string[]; disable: readonly string[] };
  readonly slices: readonly string[];
  readonly source: string;
}

export interface ActiveRuleDocument {
  readonly metadata: DocumentMetadata;
  readonly enabled: boolean;
  readonly rules: readonly RuleDefinition[];
  readonly source: string;
}

export interface BaseDocument {
  readonly metadata: DocumentMetadata;
  readonly settings: Record<string, unknown>;
  readonly rules: readonly RuleDefinition[];
  readonly source: string;
}

export interface OverrideDocument {
  readonly mode?: PolicyMode;
  readonly enabledChecks: readonly string[];
  readonly disabledChecks: readonly string[];
  readonly settings: Record<string, unknown>;
  readonly rules: readonly RuleDefinition[];
  readonly source: string;
}

export const EMPTY_OVERRIDE: OverrideDocument = Object.freeze({
  enabledChecks: [],
  disabledChecks: [],
  settings: {},
  rules: [],
  source: '<none>',
});
