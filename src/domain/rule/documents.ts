import { parse as parseToml } from 'smol-toml';
import { DocumentError, errorMessage } from '../../infra/errors.js';
import { isTable, validate } from '../../infra/validator.js';
import type { Schema } from '../../infra/validator.js';
import type { KnownEventKind } from '../event/types.js';
import { isEventKind } from '../event/types.js';
import {
  activeRuleSchema, baseSchema, overrideSchema,
  profileSchema, ruleEntrySchema, sliceSchema,
} from './schemas.js';
import { NO_FIX, SEVERITY_ALIASES } from './types.js';
import type {
  ActiveRuleDocument, BaseDocument, ContentActivation, ContentCondition,
  DocumentMetadata, OverrideDocument, ProfileDocument,
  RuleDefinition, RuleDetector, RuleTarget, Severity, SliceDocument,
} from './types.js';

type Table = Record<string, unknown>;

interface RuleContext {
  category: string;
  source: string;
  messages: Readonly<Record<string, string>>;
  path: string;
}

function readToml(raw: string, source: string): Table {
  try {
    return parseToml(raw);
  } catch (e) {
    throw new DocumentError(source, [`TOML syntax error: ${errorMessage(e)}`], { cause: e });
  }
}

function check(doc: Table, schema: Schema, source: string): void {
  const problems = validate(doc, schema);
  if (problems.length > 0) throw new DocumentError(source, problems);
}

function str(table: Table, key: string): string | undefined {
  const value = table[key];
  return typeof value === 'string' ? value : undefined;
}

function strings(table: Table | undefined, key: string): string[] {
  const value = table?.[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function bool(table: Table, key: string): boolean | undefined {
  const value = table[key];
  return typeof value === 'boolean' ? value : undefined;
}

function table(parent: Table, key: string): Table | undefined {
  const value = parent[key];
  return isTable(value) ? value : undefined;
}

function tables(parent: Table, key: string): Table[] {
  const value = parent[key];
  return Array.isArray(value) ? value.filter(isTable) : [];
}

function stringRecord(parent: Table, key: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(table(parent, key) ?? {})) {
    if (typeof v === 'string') out[k] = v;
  }
  return out;
}

function readMetadata(doc: Table): DocumentMetadata {
  const meta = table(doc, 'metadata') ?? {};
  return {
    name: str(meta, 'name') ?? '',
    version: str(meta, 'version') ?? '',
    scope: str(meta, 'scope') ?? '',
    description: str(meta, 'description') ?? '',
  };
}

export function normalizeSeverity(value: string): Severity | undefined {
  switch (value) {
    case 'info':
    case 'warning':
    case 'error':
    case 'critical':
      return value;
    default:
      return SEVERITY_ALIASES[value];
  }
}

function readTarget(entry: Table): RuleTarget {
  switch (str(entry, 'target')) {
    case 'command':
      return 'command';
    case 'content':
      return 'content';
    case 'file_path':
      return 'file_path';
    default:
      return 'auto';
  }
}

function readTriggers(entry: Table): KnownEventKind[] {
  const raw = strings(entry, 'triggers');
  if (raw.includes('all')) return [];
  return raw.filter(isEventKind);
}

/**
 * Turns one `[[rules...]]` table into a rule definition, collecting every
 * problem into `problems` rather than stopping at the first one.
 */
function readRule(entry: Table, ctx: RuleContext, problems: string[]): RuleDefinition | null {
  const fieldProblems = validate(entry, ruleEntrySchema, ctx.path);
  const detectorFields = ['pattern', 'functions', 'query'].filter((f) => entry[f] !== undefined);
  if (detectorFields.length !== 1) {
    fieldProblems.push(`${ctx.path} must declare exactly one of pattern, functions, query`);
  }

  let messageTemplate = str(entry, 'message');
  const messageKey = str(entry, 'message_key');
  if (messageTemplate === undefined && messageKey !== undefined) {
    messageTemplate = Object.hasOwn(ctx.messages, messageKey) ? ctx.messages[messageKey] : undefined;
    if (messageTemplate === undefined) {
      fieldProblems.push(`${ctx.path}.message_key refers to unknown message "${messageKey}"`);
    }
  }
  if (messageTemplate === undefined && messageKey === undefined) {
    fieldProblems.push(`${ctx.path} must declare message or message_key`);
  }

  const severity = normalizeSeverity(str(entry, 'severity') ?? '');
  if (fieldProblems.length > 0 || severity === undefined || messageTemplate === undefined) {
    problems.push(...fieldProblems);
    return null;
  }

  let detector: RuleDetector;
  const pattern = str(entry, 'pattern');
  const query = str(entry, 'query');
  if (pattern !== undefined) {
    detector = { kind: 'pattern', pattern };
  } else if (query !== undefined) {
    detector = { kind: 'ast', query };
  } else {
    detector = { kind: 'call', functionNames: Object.freeze(strings(entry, 'functions')) };
  }

  const fix = str(entry, 'fix');
  const conditionTable = table(entry, 'content_condition');
  let contentCondition: ContentCondition | undefined;
  if (conditionTable) {
    contentCondition = {
      pattern: str(conditionTable, 'pattern') ?? '',
      when: str(conditionTable, 'when') === 'absent' ? 'absent' : 'present',
      caseSensitive: bool(conditionTable, 'case_sensitive') ?? false,
    };
  }

  const rule: RuleDefinition = {
    name: str(entry, 'name') ?? '',
    detector,
    severity,
    messageTemplate,
    fix: fix === undefined ? NO_FIX : { kind: 'template', template: fix },
    caseSensitive: bool(entry, 'case_sensitive') ?? false,
    triggers: Object.freeze(readTriggers(entry)),
    fileGlob: str(entry, 'file_glob'),
    contentCondition,
    target: readTarget(entry),
    category: ctx.category,
    source: ctx.source,
  };
  return Object.freeze(rule);
}

function readRuleList(
  entries: Table[],
  ctx: Omit<RuleContext, 'path'>,
  pathPrefix: string,
  problems: string[],
): RuleDefinition[] {
  const rules: RuleDefinition[] = [];
  entries.forEach((entry, i) => {
    const rule = readRule(entry, { ...ctx, path: `${pathPrefix}[${i}]` }, problems);
    if (rule) rules.push(rule);
  });
  return rules;
}

export function parseSliceDocument(raw: string, source: string): SliceDocument {
  const doc = readToml(raw, source);
  check(doc, sliceSchema, source);

  const messages = Object.freeze(stringRecord(doc, 'messages'));
  const problems: string[] = [];
  const categories = new Map<string, readonly RuleDefinition[]>();
  for (const [category, value] of Object.entries(table(doc, 'rules') ?? {})) {
    const entries = Array.isArray(value) ? value.filter(isTable) : [];
    categories.set(
      category,
      Object.freeze(readRuleList(entries, { category, source, messages }, `rules.${category}`, problems)),
    );
  }
  if (problems.length > 0) throw new DocumentError(source, problems);

  const slice: SliceDocument = { metadata: readMetadata(doc), messages, categories, source };
  return Object.freeze(slice);
}

export function parseProfileDocument(raw: string, source: string): ProfileDocument {
  const doc = readToml(raw, source);
  check(doc, profileSchema, source);

  const activation = table(doc, 'activation');
  const content: ContentActivation[] = (activation ? tables(activation, 'content') : []).map((c): ContentActivation => ({
    matches: strings(c, 'matches'),
    globs: strings(c, 'globs'),
    position: str(c, 'position') === 'header' ? 'header' : 'any',
  }));
  const checks = table(doc, 'checks');

  const profile: ProfileDocument = {
    metadata: readMetadata(doc),
    activation: {
      indicators: strings(activation, 'indicators'),
      paths: strings(activation, 'paths'),
      globs: strings(activation, 'globs'),
      content,
    },
    checks: { enable: strings(checks, 'enable'), disable: strings(checks, 'disable') },
    slices: strings(doc, 'slices'),
    source,
  };
  return Object.freeze(profile);
}

export function parseActiveRuleDocument(raw: string, source: string): ActiveRuleDocument {
  const doc = readToml(raw, source);
  check(doc, activeRuleSchema, source);

  const metadata = readMetadata(doc);
  const problems: string[] = [];
  const rules = readRuleList(
    tables(doc, 'rules'),
    { category: metadata.name, source, messages: stringRecord(doc, 'messages') },
    'rules',
    problems,
  );
  if (problems.length > 0) throw new DocumentError(source, problems);

  const active: ActiveRuleDocument = { metadata, enabled: bool(doc, 'enabled') ?? true, rules, source };
  return Object.freeze(active);
}

export function parseBaseDocument(raw: string, source: string): BaseDocument {
  const doc = readToml(raw, source);
  check(doc, baseSchema, source);

  const problems: string[] = [];
  const rules = readRuleList(
    tables(doc, 'rules'),
    { category: 'base', source, messages: stringRecord(doc, 'messages') },
    'rules',
    problems,
  );
  if (problems.length > 0) throw new DocumentError(source, problems);

  const base: BaseDocument = { metadata: readMetadata(doc), settings: table(doc, 'settings') ?? {}, rules, source };
  return Object.freeze(base);
}

export function parseOverrideDocument(raw: string, source: string): OverrideDocument {
  const doc = readToml(raw, source);
  check(doc, overrideSchema, source);

  const problems: string[] = [];
  const rules = readRuleList(
    tables(doc, 'rules'),
    { category: 'override', source, messages: stringRecord(doc, 'messages') },
    'rules',
    problems,
  );
  if (problems.length > 0) throw new DocumentError(source, problems);

  const mode = str(doc, 'mode');
  const override: OverrideDocument = {
    mode: mode === 'allowlist' || mode === 'denylist' ? mode : undefined,
    enabledChecks: strings(doc, 'enabled_checks'),
    disabledChecks: strings(doc, 'disabled_checks'),
    settings: table(doc, 'settings') ?? {},
    rules,
    source,
  };
  return Object.freeze(override);
}
