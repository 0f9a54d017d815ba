/**
 * Shared test helpers and factories.
 */
import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Logger } from '../../src/logging/logger.js';
import type { LogEntry } from '../../src/logging/logger.js';
import type { ProjectLintEvent } from '../../src/domain/event/types.js';
import type { RuleDefinition } from '../../src/domain/rule/types.js';

/** Portable temp directory base for tests (never hardcode /tmp) */
export const TEST_BASE = path.join(os.tmpdir(), 'rulegate-test');

export async function makeTempDir(prefix: string): Promise<string> {
  await fs.mkdir(TEST_BASE, { recursive: true });
  return fs.mkdtemp(path.join(TEST_BASE, `${prefix}-`));
}

/** Writes `files` (relative path to content) under `root`, creating directories. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, 'utf-8');
  }
}

/** A debug-level logger that records every entry. */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug' }).addTransport((e) => entries.push(e));
  return { logger, entries };
}

export function messagesAt(entries: LogEntry[], level: LogEntry['level']): string[] {
  return entries.filter((e) => e.level === level).map((e) => e.message);
}

/** A pattern rule with every optional field defaulted. */
export function makeRule(overrides: Partial<RuleDefinition> & { name: string }): RuleDefinition {
  return {
    detector: { kind: 'pattern', pattern: overrides.name },
    severity: 'warning',
    messageTemplate: `${overrides.name} found`,
    fix: { kind: 'none' },
    caseSensitive: false,
    triggers: [],
    target: 'auto',
    category: 'test',
    source: 'test.toml',
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<ProjectLintEvent> = {}): ProjectLintEvent {
  return {
    kind: 'pre_run_command',
    source: 'generic',
    sessionId: 'session-1',
    timestamp: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}
