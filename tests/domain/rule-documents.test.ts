import { describe, it, expect } from 'vitest';
import {
  normalizeSeverity, parseActiveRuleDocument, parseBaseDocument,
  parseOverrideDocument, parseProfileDocument, parseSliceDocument,
} from '../../src/domain/rule/documents.js';
import { DocumentError } from '../../src/infra/errors.js';

function reasonsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof DocumentError) return e.reasons;
    throw e;
  }
  throw new Error('expected a DocumentError');
}

const META = `[metadata]
name = "security"
version = "1.0.0"
scope = "project"
`;

describe('parseSliceDocument', () => {
  const raw = `${META}description = "Security checks"

[messages]
secret = "Secret found in {file}"

[[rules.secrets]]
name = "private-key"
pattern = "-----BEGIN [A-Z ]*PRIVATE KEY-----"
severity = "critical"
message_key = "secret"

[[rules.unsafe_c]]
name = "no-strcpy"
functions = ["strcpy", "gets"]
severity = "high"
message = "Avoid {function}"
fix = "strncpy"
file_glob = "*.{c,h}"
`;

  it('reads categories in declaration order', () => {
    const slice = parseSliceDocument(raw, 'slices/security.toml');
    expect([...slice.categories.keys()]).toEqual(['secrets', 'unsafe_c']);
    expect(slice.metadata).toEqual({
      name: 'security', version: '1.0.0', scope: 'project', description: 'Security checks',
    });
  });

  it('resolves message keys and defaults', () => {
    const slice = parseSliceDocument(raw, 'slices/security.toml');
    const [rule] = slice.categories.get('secrets') ?? [];
    expect(rule).toEqual({
      name: 'private-key',
      detector: { kind: 'pattern', pattern: '-----BEGIN [A-Z ]*PRIVATE KEY-----' },
      severity: 'critical',
      messageTemplate: 'Secret found in {file}',
      fix: { kind: 'none' },
      caseSensitive: false,
      triggers: [],
      fileGlob: undefined,
      contentCondition: undefined,
      target: 'auto',
      category: 'secrets',
      source: 'slices/security.toml',
    });
  });

  it('reads call rules, severity aliases, and fixes', () => {
    const slice = parseSliceDocument(raw, 'slices/security.toml');
    const [rule] = slice.categories.get('unsafe_c') ?? [];
    expect(rule.detector).toEqual({ kind: 'call', functionNames: ['strcpy', 'gets'] });
    expect(rule.severity).toBe('error');
    expect(rule.fix).toEqual({ kind: 'template', template: 'strncpy' });
    expect(rule.fileGlob).toBe('*.{c,h}');
  });

  it('collects every rule problem in one error', () => {
    const reasons = reasonsOf(() => parseSliceDocument(`${META}
[[rules.x]]
name = "r1"
pattern = "a"
functions = ["b"]
message = "m"
`, 'bad.toml'));
    expect(reasons).toEqual([
      'rules.x[0].severity is required',
      'rules.x[0] must declare exactly one of pattern, functions, query',
    ]);
  });

  it('names the document in the error message', () => {
    expect(() => parseSliceDocument('[metadata]\nname = "x"\nscope = "p"\n', 'slices/x.toml'))
      .toThrow('Invalid document slices/x.toml: metadata.version is required');
  });

  it('rejects unknown message keys', () => {
    const reasons = reasonsOf(() => parseSliceDocument(`${META}
[[rules.x]]
name = "r1"
pattern = "a"
severity = "info"
message_key = "nope"
`, 'bad.toml'));
    expect(reasons).toEqual(['rules.x[0].message_key refers to unknown message "nope"']);
  });

  it('requires a message', () => {
    const reasons = reasonsOf(() => parseSliceDocument(`${META}
[[rules.x]]
name = "r1"
pattern = "a"
severity = "info"
`, 'bad.toml'));
    expect(reasons).toEqual(['rules.x[0] must declare message or message_key']);
  });

  it('reports TOML syntax errors', () => {
    const reasons = reasonsOf(() => parseSliceDocument('[metadata\nname = ', 'broken.toml'));
    expect(reasons).toHaveLength(1);
    expect(reasons[0].startsWith('TOML syntax error: ')).toBe(true);
  });

  it('requires metadata', () => {
    expect(reasonsOf(() => parseSliceDocument('', 'empty.toml'))).toEqual(['metadata is required']);
  });
});

describe('parseProfileDocument', () => {
  it('reads activation, checks, and slices', () => {
    const profile = parseProfileDocument(`slices = ["security"]

[metadata]
name = "web"
version = "1"
scope = "project"

[activation]
indicators = ["package.json"]
globs = ["**/*.tsx"]

[[activation.content]]
matches = ["react"]
globs = ["package.json"]
position = "header"

[checks]
enable = ["no-console"]
disable = ["no-var"]
`, 'profiles/web.toml');
    expect(profile.activation).toEqual({
      indicators: ['package.json'],
      paths: [],
      globs: ['**/*.tsx'],
      content: [{ matches: ['react'], globs: ['package.json'], position: 'header' }],
    });
    expect(profile.checks).toEqual({ enable: ['no-console'], disable: ['no-var'] });
    expect(profile.slices).toEqual(['security']);
    expect(profile.source).toBe('profiles/web.toml');
  });

  it('defaults every activation list to empty', () => {
    const profile = parseProfileDocument(`[metadata]
name = "bare"
version = "1"
scope = "project"
`, 'profiles/bare.toml');
    expect(profile.activation).toEqual({ indicators: [], paths: [], globs: [], content: [] });
    expect(profile.checks).toEqual({ enable: [], disable: [] });
    expect(profile.slices).toEqual([]);
  });

  it('requires content matches', () => {
    const reasons = reasonsOf(() => parseProfileDocument(`[metadata]
name = "p"
version = "1"
scope = "project"

[[activation.content]]
matches = []
`, 'p.toml'));
    expect(reasons).toEqual(['activation.content[0].matches must have at least 1 items']);
  });
});

describe('parseActiveRuleDocument', () => {
  const raw = `enabled = false

[metadata]
name = "pnpm-only"
version = "1"
scope = "project"

[[rules]]
name = "use-pnpm"
pattern = "^npm "
severity = "medium"
message = "Use pnpm"
fix = "pnpm "
triggers = ["pre_run_command"]
target = "command"

[[rules]]
name = "react-import"
pattern = "useState"
severity = "info"
message = "React hook used"
triggers = ["all", "pre_write_code"]
case_sensitive = true

[rules.content_condition]
pattern = "import React"
when = "absent"
`;

  it('reads rules with the document name as category', () => {
    const doc = parseActiveRuleDocument(raw, 'active/pnpm.toml');
    expect(doc.enabled).toBe(false);
    expect(doc.rules.map((r) => r.name)).toEqual(['use-pnpm', 'react-import']);
    expect(doc.rules[0]).toMatchObject({
      severity: 'warning',
      triggers: ['pre_run_command'],
      target: 'command',
      category: 'pnpm-only',
      fix: { kind: 'template', template: 'pnpm ' },
    });
  });

  it('treats "all" as every trigger and reads content conditions', () => {
    const [, rule] = parseActiveRuleDocument(raw, 'active/pnpm.toml').rules;
    expect(rule.triggers).toEqual([]);
    expect(rule.caseSensitive).toBe(true);
    expect(rule.contentCondition).toEqual({ pattern: 'import React', when: 'absent', caseSensitive: false });
  });

  it('defaults enabled to true', () => {
    const doc = parseActiveRuleDocument(`[metadata]
name = "a"
version = "1"
scope = "project"
`, 'active/a.toml');
    expect(doc.enabled).toBe(true);
    expect(doc.rules).toEqual([]);
  });

  it('rejects malformed rule names', () => {
    const reasons = reasonsOf(() => parseActiveRuleDocument(`[metadata]
name = "a"
version = "1"
scope = "project"

[[rules]]
name = "bad name"
pattern = "x"
severity = "info"
message = "m"
`, 'active/a.toml'));
    expect(reasons).toEqual(['rules[0].name has invalid format']);
  });
});

describe('parseBaseDocument', () => {
  it('keeps settings and tags rules with the base category', () => {
    const base = parseBaseDocument(`[metadata]
name = "base"
version = "1"
scope = "global"

[settings]
mode = "allowlist"

[settings.lint]
concurrency = 2

[[rules]]
name = "no-debugger"
pattern = "\\\\bdebugger\\\\b"
severity = "error"
message = "Remove debugger"
`, 'base.toml');
    expect(base.settings).toEqual({ mode: 'allowlist', lint: { concurrency: 2 } });
    expect(base.rules[0].category).toBe('base');
    expect(base.rules[0].detector).toEqual({ kind: 'pattern', pattern: '\\bdebugger\\b' });
  });
});

describe('parseOverrideDocument', () => {
  it('reads mode and check lists without metadata', () => {
    const override = parseOverrideDocument(`mode = "allowlist"
enabled_checks = ["private-key"]
disabled_checks = ["no-console"]
`, 'override.toml');
    expect(override.mode).toBe('allowlist');
    expect(override.enabledChecks).toEqual(['private-key']);
    expect(override.disabledChecks).toEqual(['no-console']);
    expect(override.rules).toEqual([]);
    expect(override.settings).toEqual({});
  });

  it('rejects unknown modes', () => {
    expect(reasonsOf(() => parseOverrideDocument('mode = "strict"\n', 'override.toml')))
      .toEqual(['mode must be one of: allowlist, denylist']);
  });
});

describe('normalizeSeverity', () => {
  it('maps aliases and rejects unknown values', () => {
    expect(normalizeSeverity('critical')).toBe('critical');
    expect(normalizeSeverity('low')).toBe('info');
    expect(normalizeSeverity('medium')).toBe('warning');
    expect(normalizeSeverity('high')).toBe('error');
    expect(normalizeSeverity('urgent')).toBeUndefined();
  });
});
