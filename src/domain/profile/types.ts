/**
 * What the activator may look at in a project. Paths are POSIX and relative
 * to the project root.
 */
export interface ProjectEvidence {
  readonly files: readonly string[];
  /** True for files and directories alike. */
  pathExists(path: string): Promise<boolean>;
  /** Reads at most `limitBytes` when given; rejects when the file cannot be read. */
  readText(path: string, limitBytes?: number): Promise<string>;
}

/** Bytes read for `position = "header"` content checks. */
export const HEADER_BYTES = 1024;
