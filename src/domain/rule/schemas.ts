import type { FieldRule, Schema } from '../../infra/validator.js';
import { EVENT_KINDS } from '../event/types.js';
import { POLICY_MODES, RULE_TARGETS, SEVERITIES, SEVERITY_ALIASES } from './types.js';

const RULE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

const stringList: FieldRule = { type: 'array', required: false, item: { type: 'string', min: 1 } };

export const metadataSchema: Schema = {
  name: { type: 'string', min: 1, max: 200, pattern: RULE_NAME_PATTERN },
  version: { type: 'string', min: 1 },
  scope: { type: 'string', min: 1 },
  description: { type: 'string', required: false },
};

export const ruleEntrySchema: Schema = {
  name: { type: 'string', min: 1, max: 200, pattern: RULE_NAME_PATTERN },
  pattern: { type: 'string', required: false, min: 1 },
  functions: { type: 'array', required: false, minItems: 1, item: { type: 'string', pattern: /^[A-Za-z_$][\w$]*$/ } },
  query: { type: 'string', required: false, min: 1 },
  severity: { type: 'enum', values: [...SEVERITIES, ...Object.keys(SEVERITY_ALIASES)] },
  message: { type: 'string', required: false },
  message_key: { type: 'string', required: false, min: 1 },
  fix: { type: 'string', required: false },
  case_sensitive: { type: 'boolean', required: false },
  triggers: {
    type: 'array',
    required: false,
    item: { type: 'enum', values: [...EVENT_KINDS, 'all'] },
  },
  file_glob: { type: 'string', required: false, min: 1 },
  content_condition: {
    type: 'table',
    required: false,
    fields: {
      pattern: { type: 'string', min: 1 },
      when: { type: 'enum', required: false, values: ['present', 'absent'] },
      case_sensitive: { type: 'boolean', required: false },
    },
  },
  target: { type: 'enum', required: false, values: RULE_TARGETS },
};

export const activationSchema: Schema = {
  indicators: stringList,
  paths: stringList,
  globs: stringList,
  content: {
    type: 'array',
    required: false,
    item: {
      type: 'table',
      fields: {
        matches: { type: 'array', minItems: 1, item: { type: 'string', min: 1 } },
        globs: stringList,
        position: { type: 'enum', required: false, values: ['any', 'header'] },
      },
    },
  },
};

export const profileSchema: Schema = {
  metadata: { type: 'table', fields: metadataSchema },
  activation: { type: 'table', required: false, fields: activationSchema },
  checks: {
    type: 'table',
    required: false,
    fields: { enable: stringList, disable: stringList },
  },
  slices: stringList,
};

export const sliceSchema: Schema = {
  metadata: { type: 'table', fields: metadataSchema },
  messages: { type: 'table', required: false, values: { type: 'string' } },
  rules: { type: 'table', required: false, values: { type: 'array', item: { type: 'table' } } },
};

export const activeRuleSchema: Schema = {
  metadata: { type: 'table', fields: metadataSchema },
  enabled: { type: 'boolean', required: false },
  messages: { type: 'table', required: false, values: { type: 'string' } },
  rules: { type: 'array', required: false, item: { type: 'table' } },
};

export const baseSchema: Schema = {
  metadata: { type: 'table', fields: metadataSchema },
  messages: { type: 'table', required: false, values: { type: 'string' } },
  settings: { type: 'table', required: false },
  rules: { type: 'array', required: false, item: { type: 'table' } },
};

export const overrideSchema: Schema = {
  metadata: { type: 'table', required: false, fields: metadataSchema },
  mode: { type: 'enum', required: false, values: POLICY_MODES },
  enabled_checks: stringList,
  disabled_checks: stringList,
  messages: { type: 'table', required: false, values: { type: 'string' } },
  settings: { type: 'table', required: false },
  rules: { type: 'array', required: false, item: { type: 'table' } },
};
