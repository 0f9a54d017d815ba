import { DocumentError } from '../../infra/errors.js';
import { isTable, validate } from '../../infra/validator.js';
import type { Schema } from '../../infra/validator.js';
import { LOG_LEVELS, isLogLevel } from '../../logging/logger.js';
import { EVENT_SOURCES, isEventSource } from '../event/mappers/index.js';
import type { BaseDocument, OverrideDocument } from '../rule/types.js';
import { POLICY_MODES } from '../rule/types.js';
import type { ConfigPatch, RulegateConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const UNSAFE_MERGE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

export function deepMerge<T extends object>(base: T, override: Partial<Record<keyof T, unknown>>): T {
  const result = { ...base };
  for (const key of Object.keys(override) as (keyof T)[]) {
    if (UNSAFE_MERGE_KEYS.has(key as string)) continue;
    const val = override[key];
    if (val !== undefined && typeof val === 'object' && !Array.isArray(val) && val !== null) {
      result[key] = deepMerge(
        (result[key] ?? {}) as Record<string, unknown>,
        val as Record<string, unknown>,
      ) as T[keyof T];
    } else if (val !== undefined) {
      result[key] = val as T[keyof T];
    }
  }
  return result;
}

const positiveInt = (min: number) => ({ type: 'number', integer: true, min, required: false }) as const;

/** `[settings]` as written in base.toml and override.toml. */
export const settingsSchema: Schema = {
  mode: { type: 'enum', required: false, values: POLICY_MODES },
  logging: {
    type: 'table',
    required: false,
    fields: { level: { type: 'enum', required: false, values: LOG_LEVELS } },
  },
  lint: {
    type: 'table',
    required: false,
    fields: {
      concurrency: positiveInt(1),
      ignore: { type: 'array', required: false, item: { type: 'string', min: 1 } },
      max_file_size_bytes: positiveInt(1),
    },
  },
  output: {
    type: 'table',
    required: false,
    fields: {
      show_rule_names: { type: 'boolean', required: false },
      group_by_severity: { type: 'boolean', required: false },
      max_issues_per_rule: positiveInt(0),
    },
  },
  hook: {
    type: 'table',
    required: false,
    fields: { default_source: { type: 'enum', required: false, values: EVENT_SOURCES } },
  },
};

function num(value: unknown): number | undefined {
  if (typeof value === 'bigint') return Number(value);
  return typeof value === 'number' ? value : undefined;
}

function section(settings: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = settings[key];
  return isTable(value) ? value : {};
}

/** Drops keys whose value is undefined so they never overwrite a lower layer. */
function defined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj) as (keyof T)[]) {
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

/** Validates one `[settings]` table and converts its snake_case keys. Throws `DocumentError`. */
export function readSettings(settings: Record<string, unknown>, source: string): ConfigPatch {
  const problems = validate(settings, settingsSchema, 'settings');
  if (problems.length > 0) throw new DocumentError(source, problems);

  const mode = settings.mode;
  const level = section(settings, 'logging').level;
  const lint = section(settings, 'lint');
  const output = section(settings, 'output');
  const defaultSource = section(settings, 'hook').default_source;
  const ignore = lint.ignore;

  return defined({
    mode: mode === 'allowlist' || mode === 'denylist' ? mode : undefined,
    logging: defined({ level: isLogLevel(level) ? level : undefined }),
    lint: defined({
      concurrency: num(lint.concurrency),
      ignore: Array.isArray(ignore) ? ignore.filter((g): g is string => typeof g === 'string') : undefined,
      maxFileSizeBytes: num(lint.max_file_size_bytes),
    }),
    output: defined({
      showRuleNames: typeof output.show_rule_names === 'boolean' ? output.show_rule_names : undefined,
      groupBySeverity: typeof output.group_by_severity === 'boolean' ? output.group_by_severity : undefined,
      maxIssuesPerRule: num(output.max_issues_per_rule),
    }),
    hook: defined({
      defaultSource: typeof defaultSource === 'string' && isEventSource(defaultSource) ? defaultSource : undefined,
    }),
  });
}

/**
 * Three-layer settings: DEFAULT_CONFIG, then base.toml `[settings]`, then
 * override.toml `[settings]`. A top-level `mode` in the override beats every
 * `[settings]` value.
 */
export function resolveConfig(base?: BaseDocument, override?: OverrideDocument): RulegateConfig {
  let config = structuredClone(DEFAULT_CONFIG);
  if (base) config = deepMerge(config, readSettings(base.settings, base.source));
  if (override) config = deepMerge(config, readSettings(override.settings, override.source));
  if (override?.mode) config.mode = override.mode;
  return config;
}
