import type { AstFinding } from '../detection/ast.js';
import type { DetectionIssue } from '../detection/types.js';
import type { EffectivePolicy } from '../policy/types.js';

export type FixMode = 'off' | 'dry-run' | 'write';

export interface LintRequest {
  /** Absolute directory the file paths are relative to. */
  root: string;
  /** POSIX paths relative to `root`. */
  files: readonly string[];
  policy: EffectivePolicy;
  astFindings?: AsyncIterable<AstFinding> | Iterable<AstFinding>;
  fix?: FixMode;
}

export interface FileError {
  filePath: string;
  message: string;
}

export interface FileFixResult {
  filePath: string;
  applied: number;
  skipped: number;
  written: boolean;
  /** Fixed content; set in dry-run mode only. */
  preview?: string;
}

export interface LintReport {
  filesScanned: number;
  /** Sorted by file, line, column, then rule name. */
  issues: DetectionIssue[];
  errors: FileError[];
  fixes: FileFixResult[];
  fixMode: FixMode;
}
