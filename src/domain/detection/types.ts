import type { Severity } from '../rule/types.js';

/** Offsets index into the text that was scanned, `end` exclusive. */
export type IssueFix =
  | { kind: 'none' }
  | { kind: 'replace'; start: number; end: number; replacement: string };

export interface DetectionIssue {
  readonly ruleName: string;
  readonly severity: Severity;
  readonly filePath: string;
  /** 1-based; absent for findings that carry no position. */
  readonly line?: number;
  readonly column?: number;
  readonly message: string;
  readonly matchedText: string;
  readonly fix: IssueFix;
}

export interface FixOutcome {
  content: string;
  applied: DetectionIssue[];
  /** Issues whose span overlapped one already applied. */
  skipped: DetectionIssue[];
}
