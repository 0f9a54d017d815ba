// Infrastructure
export { validate, assertValid, ValidatorError } from './infra/validator.js';
export type { FieldRule, Schema } from './infra/validator.js';
export { ok, err } from './infra/types.js';
export type { Result } from './infra/types.js';
export {
  AppError, DocumentError, DocumentLoadError, RuleCompileError,
  FixApplicationError, EventParseError, UsageError,
} from './infra/errors.js';
export { Semaphore, KeyedLock, runPool } from './orchestration/pool.js';

// Logging
export { Logger, stderrTransport, formatEntry } from './logging/logger.js';
export type { LogLevel, LogEntry, Transport } from './logging/logger.js';

// Domain: Events
export { EVENT_KINDS, parseEventKind, isEventKind } from './domain/event/types.js';
export type { EventKind, KnownEventKind, EventSource, ProjectLintEvent } from './domain/event/types.js';
export {
  createMapper, ClaudeMapper, WindsurfMapper, KiroMapper, GenericMapper, EVENT_SOURCES,
} from './domain/event/mappers/index.js';
export type { EventMapper } from './domain/event/mappers/index.js';

// Domain: Rule Store
export {
  parseSliceDocument, parseProfileDocument, parseActiveRuleDocument,
  parseBaseDocument, parseOverrideDocument,
} from './domain/rule/documents.js';
export { RuleStore } from './domain/rule/store.js';
export type { RuleStoreInit } from './domain/rule/store.js';
export { RuleStoreLoader } from './domain/rule/loader.js';
export { SEVERITIES } from './domain/rule/types.js';
export type {
  Severity, RuleDefinition, RuleDetector, FixSpec, ContentCondition, RuleTarget,
  PolicyMode, SliceDocument, ProfileDocument, ActiveRuleDocument, BaseDocument, OverrideDocument,
} from './domain/rule/types.js';

// Domain: Profiles
export { ProfileActivator } from './domain/profile/activator.js';
export { createInMemoryEvidence, collectProjectEvidence } from './domain/profile/evidence.js';
export type { ProjectEvidence } from './domain/profile/types.js';

// Domain: Policy
export { RuleComposer } from './domain/policy/composer.js';
export type { EffectivePolicy, ComposeInput } from './domain/policy/types.js';

// Domain: Detection
export { compileRule } from './domain/detection/compiler.js';
export type { CompiledRule } from './domain/detection/compiler.js';
export { detect } from './domain/detection/detector.js';
export { applyFixes } from './domain/detection/fixer.js';
export { FixWriter } from './domain/detection/writer.js';
export { matchesFileGlob } from './domain/detection/scope.js';
export { astFindingsToIssues } from './domain/detection/ast.js';
export type { AstFinding } from './domain/detection/ast.js';
export type { DetectionIssue, IssueFix, FixOutcome } from './domain/detection/types.js';

// Domain: Hook decisions
export { DecisionEngine, exitCodeFor } from './domain/hook/engine.js';
export type { Decision, HookOutcome, RuleMatch } from './domain/hook/types.js';

// Domain: Config
export { resolveConfig, readSettings } from './domain/config/loader.js';
export { findProjectConfigDir, globalConfigDir, resolveConfigDir } from './domain/config/paths.js';
export { DEFAULT_CONFIG } from './domain/config/types.js';
export type { RulegateConfig } from './domain/config/types.js';

// Domain: Lint
export { Linter } from './domain/lint/linter.js';
export { formatReport, hasBlockingIssues } from './domain/lint/reporter.js';
export type { LintReport, LintRequest, FixMode } from './domain/lint/types.js';

// CLI
export { createRuntime } from './cli/runtime.js';
export type { Runtime, RuntimeOptions } from './cli/runtime.js';
export { main } from './cli/main.js';
