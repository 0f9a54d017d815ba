import { resolve } from 'node:path';
import { UsageError } from '../infra/errors.js';
import { Linter } from '../domain/lint/linter.js';
import { formatReport, hasBlockingIssues } from '../domain/lint/reporter.js';
import type { FixMode } from '../domain/lint/types.js';
import { collectProjectEvidence } from '../domain/profile/evidence.js';
import { createRuntime } from './runtime.js';
import type { RuntimeOptions } from './runtime.js';

export interface LintArgs {
  path?: string;
  fix?: boolean;
  dryRun?: boolean;
  configDir?: string;
}

export interface CommandIO {
  stdout(text: string): void;
}

export function fixModeFor(args: Pick<LintArgs, 'fix' | 'dryRun'>): FixMode {
  if (args.fix && args.dryRun) throw new UsageError('--fix and --dry-run cannot be used together');
  if (args.fix) return 'write';
  return args.dryRun ? 'dry-run' : 'off';
}

/** `rulegate lint`: exit code 1 when any error or critical issue is found. */
export async function runLint(args: LintArgs, io: CommandIO, opts: RuntimeOptions = {}): Promise<number> {
  const fix = fixModeFor(args);
  const root = resolve(opts.cwd ?? process.cwd(), args.path ?? '.');
  const runtime = await createRuntime({ ...opts, cwd: root, configDir: args.configDir ?? opts.configDir });
  const { config, logger } = runtime;

  const evidence = await collectProjectEvidence(root, { ignore: config.lint.ignore });
  const policy = await runtime.policyFor(evidence);
  logger.info('Linting', { root, files: evidence.files.length, rules: policy.rules.length, fix });

  const linter = new Linter({
    concurrency: config.lint.concurrency,
    maxFileSizeBytes: config.lint.maxFileSizeBytes,
    logger: logger.child('lint'),
  });
  const report = await linter.lint({ root, files: evidence.files, policy, fix });

  io.stdout(formatReport(report, config.output) + '\n');
  return hasBlockingIssues(report) ? 1 : 0;
}
