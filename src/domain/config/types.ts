import type { LogLevel } from '../../logging/logger.js';
import type { EventSource } from '../event/types.js';
import type { PolicyMode } from '../rule/types.js';

export interface RulegateConfig {
  mode: PolicyMode;
  logging: {
    level: LogLevel;
  };
  lint: {
    concurrency: number;
    /** Globs, relative to the lint root, never scanned. */
    ignore: string[];
    maxFileSizeBytes: number;
  };
  output: {
    showRuleNames: boolean;
    groupBySeverity: boolean;
    /** 0 means no cap. */
    maxIssuesPerRule: number;
  };
  hook: {
    defaultSource: EventSource;
  };
}

export type ConfigPatch = {
  [K in keyof RulegateConfig]?: RulegateConfig[K] extends object ? Partial<RulegateConfig[K]> : RulegateConfig[K];
};

export const DEFAULT_CONFIG: RulegateConfig = {
  mode: 'denylist',
  logging: { level: 'warn' },
  lint: {
    concurrency: 8,
    ignore: ['dist/**', 'build/**', 'coverage/**'],
    maxFileSizeBytes: 1024 * 1024,
  },
  output: {
    showRuleNames: true,
    groupBySeverity: false,
    maxIssuesPerRule: 0,
  },
  hook: {
    defaultSource: 'claude',
  },
};
