import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { EXIT_SOFTWARE, EXIT_USAGE, USAGE, VERSION, main } from '../../src/cli/main.js';
import type { MainIO } from '../../src/cli/main.js';
import { fixModeFor } from '../../src/cli/lint.js';
import { Logger } from '../../src/logging/logger.js';
import { captureLogger, makeTempDir, messagesAt, writeTree } from '../fixtures/test-helpers.js';

const PRESETS = fileURLToPath(new URL('../../presets', import.meta.url));

const CONFIG = {
  '.rulegate/base.toml': `[metadata]
name = "base"
version = "1.0.0"
scope = "project"

[[rules]]
name = "no-debugger"
pattern = '\\bdebugger\\b'
severity = "error"
message = "Remove debugger"
triggers = ["pre_write_code"]

[[rules]]
name = "rm-root"
pattern = 'rm -rf /(\\s|$)'
severity = "critical"
message = "Refusing to delete the filesystem root"
`,
  '.rulegate/slices/pnpm.toml': `[metadata]
name = "pnpm"
version = "1.0.0"
scope = "project"

[[rules.package_manager]]
name = "use-pnpm"
pattern = "^npm "
severity = "warning"
message = "Use pnpm in this project"
fix = "pnpm "
triggers = ["pre_run_command", "pre_tool_use"]
target = "command"
`,
  '.rulegate/profiles/pnpm.toml': `slices = ["pnpm"]

[metadata]
name = "pnpm"
version = "1.0.0"
scope = "project"

[activation]
indicators = ["pnpm-lock.yaml"]
`,
};

function captureIO(stdin = ''): { io: MainIO; out: { stdout: string; stderr: string } } {
  const out = { stdout: '', stderr: '' };
  return {
    out,
    io: {
      stdout: (text) => { out.stdout += text; },
      stderr: (text) => { out.stderr += text; },
      readStdin: async () => stdin,
    },
  };
}

const bash = (command: string, cwd: string) => JSON.stringify({
  hook_event_name: 'PreToolUse',
  session_id: 'session-1',
  cwd,
  tool_name: 'Bash',
  tool_input: { command },
});

describe('main', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('cli');
    await writeTree(dir, {
      ...CONFIG,
      'pnpm-lock.yaml': "lockfileVersion: '9.0'\n",
      'src/a.js': 'debugger;\n',
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const opts = () => ({ cwd: dir, logger: new Logger() });

  describe('arguments', () => {
    it('prints the version', async () => {
      const { io, out } = captureIO();
      expect(await main(['--version'], io)).toBe(0);
      expect(out.stdout).toBe(`rulegate ${VERSION}\n`);
    });

    it('prints usage without a command', async () => {
      const { io, out } = captureIO();
      expect(await main([], io)).toBe(0);
      expect(out.stdout).toBe(`${USAGE}\n`);
    });

    it('rejects unknown options', async () => {
      const { io, out } = captureIO();
      expect(await main(['lint', '--bogus'], io)).toBe(EXIT_USAGE);
      expect(out.stderr.endsWith(`\n\n${USAGE}\n`)).toBe(true);
    });

    it('rejects unknown commands', async () => {
      const { io, out } = captureIO();
      expect(await main(['frob'], io, opts())).toBe(EXIT_USAGE);
      expect(out.stderr).toBe(`Unknown command "frob"\n\n${USAGE}\n`);
    });

    it('rejects --fix with --dry-run', async () => {
      const { io, out } = captureIO();
      expect(await main(['lint', '--fix', '--dry-run'], io, opts())).toBe(EXIT_USAGE);
      expect(out.stderr.startsWith('--fix and --dry-run cannot be used together\n')).toBe(true);
    });

    it('maps flags to a fix mode', () => {
      expect(fixModeFor({})).toBe('off');
      expect(fixModeFor({ fix: true })).toBe('write');
      expect(fixModeFor({ dryRun: true })).toBe('dry-run');
    });
  });

  describe('lint', () => {
    it('reports issues and fails on errors', async () => {
      const { io, out } = captureIO();
      expect(await main(['lint'], io, opts())).toBe(1);
      expect(out.stdout).toBe('❌ src/a.js:1:1 error: Remove debugger [no-debugger]\n\n1 issue (1 error) in 2 files\n');
    });

    it('passes a clean tree', async () => {
      await fs.writeFile(join(dir, 'src/a.js'), 'const a = 1;\n');
      const { io, out } = captureIO();
      expect(await main(['lint', '.'], io, opts())).toBe(0);
      expect(out.stdout).toBe('No issues found in 2 files\n');
    });

    it('keeps hook-only preset rules away from file text', async () => {
      await writeTree(dir, { '.gitignore': 'node_modules\n.env\n', 'README.md': '# App\n\nnpm install\n' });
      const { io, out } = captureIO();
      expect(await main(['lint', '--fix', '--config', PRESETS], io, opts())).toBe(0);
      expect(out.stdout).toBe('No issues found in 4 files\n');
      expect(await fs.readFile(join(dir, 'README.md'), 'utf-8')).toBe('# App\n\nnpm install\n');
    });

    it('exits with the software code when rules cannot be loaded', async () => {
      await fs.writeFile(join(dir, '.rulegate/base.toml'), '[metadata\n');
      const { io, out } = captureIO();
      expect(await main(['lint'], io, opts())).toBe(EXIT_SOFTWARE);
      expect(out.stderr.startsWith('Failed to load 1 document(s):\n  Invalid document ')).toBe(true);
    });
  });

  describe('hook', () => {
    it('warns and rewrites a command', async () => {
      const { io, out } = captureIO(bash('npm install express', dir));
      expect(await main(['hook', '--source', 'claude'], io, opts())).toBe(0);
      expect(JSON.parse(out.stdout)).toEqual({
        continue: true,
        systemMessage: 'Use pnpm in this project',
        hookSpecificOutput: {
          hookEventName: 'PreToolUse',
          permissionDecision: 'allow',
          updatedInput: { command: 'pnpm install express' },
        },
      });
    });

    it('denies with exit code 2', async () => {
      const { io, out } = captureIO(bash('rm -rf /', dir));
      expect(await main(['hook'], io, opts())).toBe(2);
      expect(out.stdout).toBe('{"continue":false,"stopReason":"Refusing to delete the filesystem root"}\n');
    });

    it('answers in the shape of the chosen source', async () => {
      const payload = JSON.stringify({ agent_action_name: 'pre_run_command', tool_info: { command_line: 'npm ci', cwd: dir } });
      const { io, out } = captureIO(payload);
      expect(await main(['hook', '-s', 'windsurf'], io, opts())).toBe(0);
      expect(JSON.parse(out.stdout)).toEqual({
        decision: 'warn',
        message: 'Use pnpm in this project',
        modified_input: { command_line: 'pnpm ci' },
      });
    });

    it('allows empty input without output', async () => {
      const { io, out } = captureIO('  \n');
      expect(await main(['hook'], io, opts())).toBe(0);
      expect(out).toEqual({ stdout: '', stderr: '' });
    });

    it('allows unparseable input and logs it', async () => {
      const { logger, entries } = captureLogger();
      const { io, out } = captureIO('{oops');
      expect(await main(['hook'], io, { cwd: dir, logger })).toBe(0);
      expect(out.stdout).toBe('');
      expect(messagesAt(entries, 'error')).toEqual(['Hook payload rejected; allowing event']);
    });

    it('allows when rules cannot be loaded', async () => {
      await fs.writeFile(join(dir, '.rulegate/profiles/pnpm.toml'), 'slices = 3\n');
      const { logger, entries } = captureLogger();
      const { io, out } = captureIO(bash('rm -rf /', dir));
      expect(await main(['hook'], io, { cwd: dir, logger })).toBe(0);
      expect(out.stdout).toBe('');
      expect(messagesAt(entries, 'error')).toEqual(['Rules could not be loaded; allowing event']);
    });

    it('runs the shipped presets', async () => {
      const { io, out } = captureIO(bash('npm install express', dir));
      expect(await main(['hook', '--config', PRESETS], io, opts())).toBe(0);
      expect(JSON.parse(out.stdout)).toEqual({
        continue: true,
        systemMessage: 'This project uses pnpm; rewriting `npm install`',
        hookSpecificOutput: {
          hookEventName: 'PreToolUse',
          permissionDecision: 'allow',
          updatedInput: { command: 'pnpm install express' },
        },
      });
    });
  });
});
