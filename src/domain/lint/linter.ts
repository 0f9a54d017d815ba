import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { errorMessage } from '../../infra/errors.js';
import { decodeUtf8 } from '../../infra/fs-utils.js';
import { Logger } from '../../logging/logger.js';
import { runPool } from '../../orchestration/pool.js';
import { astFindingsToIssues } from '../detection/ast.js';
import { conditionHolds } from '../detection/compiler.js';
import type { CompiledRule } from '../detection/compiler.js';
import { detect } from '../detection/detector.js';
import { applyFixes } from '../detection/fixer.js';
import { matchesFileGlob } from '../detection/scope.js';
import type { DetectionIssue, IssueFix } from '../detection/types.js';
import { FixWriter } from '../detection/writer.js';
import type { EffectivePolicy } from '../policy/types.js';
import type { FileError, FileFixResult, FixMode, LintReport, LintRequest } from './types.js';

export interface LinterOptions {
  concurrency: number;
  maxFileSizeBytes: number;
  logger?: Logger;
  writer?: FixWriter;
}

interface FileResult {
  issues: DetectionIssue[];
  error?: FileError;
  fix?: FileFixResult;
}

const NO_FIX: IssueFix = { kind: 'none' };

/** A `file_path` rule checked against the path itself: at most one issue, with no position and no fix. */
function detectInPath(compiled: CompiledRule, file: string): DetectionIssue[] {
  const [first] = detect(compiled, file, file);
  if (!first) return [];
  const issue: DetectionIssue = {
    ruleName: first.ruleName,
    severity: first.severity,
    filePath: file,
    message: first.message,
    matchedText: first.matchedText,
    fix: NO_FIX,
  };
  return [Object.freeze(issue)];
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareIssues(a: DetectionIssue, b: DetectionIssue): number {
  return (
    compareText(a.filePath, b.filePath) ||
    (a.line ?? 0) - (b.line ?? 0) ||
    (a.column ?? 0) - (b.column ?? 0) ||
    compareText(a.ruleName, b.ruleName)
  );
}

/**
 * One pass over a file list. Each file is read, scanned and fixed on its own;
 * a failure on one file is recorded in the report and the pass carries on.
 *
 * Rules aimed at commands belong to hook events and never run here. Rules
 * aimed at file paths see the relative path, not the file's text.
 */
export class Linter {
  private logger: Logger;
  private writer: FixWriter;

  constructor(private opts: LinterOptions) {
    this.logger = opts.logger ?? Logger.silent();
    this.writer = opts.writer ?? new FixWriter(this.logger);
  }

  async lint(req: LintRequest): Promise<LintReport> {
    const fixMode: FixMode = req.fix ?? 'off';
    const results = await runPool(req.files, this.opts.concurrency, (file) =>
      this.lintFile(req.root, file, req.policy, fixMode),
    );

    const issues = results.flatMap((r) => r.issues);
    if (req.astFindings) issues.push(...(await astFindingsToIssues(req.astFindings, req.policy)));
    issues.sort(compareIssues);

    const errors = results
      .flatMap((r) => (r.error ? [r.error] : []))
      .sort((a, b) => compareText(a.filePath, b.filePath));
    const fixes = results.flatMap((r) => (r.fix ? [r.fix] : []));

    this.logger.info('Lint finished', { files: req.files.length, issues: issues.length, errors: errors.length });
    return { filesScanned: req.files.length, issues, errors, fixes, fixMode };
  }

  private async lintFile(root: string, file: string, policy: EffectivePolicy, fixMode: FixMode): Promise<FileResult> {
    const scoped = policy.rules.filter(
      (c) => c.matcher !== null && c.rule.target !== 'command' && matchesFileGlob(c.rule, file),
    );
    const pathRules = scoped.filter((c) => c.rule.target === 'file_path');
    const textRules = scoped.filter((c) => c.rule.target !== 'file_path');
    const gatedPathRules = pathRules.filter((c) => c.rule.contentCondition !== undefined);
    const pathIssues = pathRules
      .filter((c) => c.rule.contentCondition === undefined)
      .flatMap((c) => detectInPath(c, file));
    if (textRules.length === 0 && gatedPathRules.length === 0) return { issues: pathIssues };

    const fullPath = join(root, file);
    let bytes: Buffer;
    try {
      const stat = await fs.stat(fullPath);
      if (stat.size > this.opts.maxFileSizeBytes) {
        return {
          issues: pathIssues,
          error: { filePath: file, message: `larger than ${this.opts.maxFileSizeBytes} bytes; skipped` },
        };
      }
      bytes = await fs.readFile(fullPath);
    } catch (e) {
      return { issues: pathIssues, error: { filePath: file, message: errorMessage(e) } };
    }
    if (bytes.includes(0)) {
      this.logger.debug('Binary file skipped', { file });
      return { issues: pathIssues };
    }

    const decoded = decodeUtf8(bytes);
    const text = decoded ?? bytes.toString('utf-8');
    const issues = [
      ...pathIssues,
      ...gatedPathRules.filter((c) => conditionHolds(c, text)).flatMap((c) => detectInPath(c, file)),
      ...textRules.filter((c) => conditionHolds(c, text)).flatMap((c) => detect(c, text, file)),
    ];
    if (fixMode === 'off' || !issues.some((i) => i.fix.kind === 'replace')) return { issues };
    if (decoded === null) return { issues, error: { filePath: file, message: 'not valid UTF-8; fixes skipped' } };

    if (fixMode === 'dry-run') {
      const outcome = applyFixes(text, issues);
      return {
        issues,
        fix: {
          filePath: file,
          applied: outcome.applied.length,
          skipped: outcome.skipped.length,
          written: false,
          preview: outcome.content,
        },
      };
    }

    const written = await this.writer.apply(fullPath, issues, { expectedText: text });
    if (!written.ok) return { issues, error: { filePath: file, message: written.error.message } };
    return {
      issues,
      fix: {
        filePath: file,
        applied: written.value.applied.length,
        skipped: written.value.skipped.length,
        written: written.value.written,
      },
    };
  }
}
